import { ConnectionPoolManager } from '../connections/ConnectionPoolManager';
import { ClusterNode, SettleMode, SettleOutcome } from '../types';
import { CancelledError, SettleTimeoutError, errorMessage } from '../common/errors';
import { HarnessLogger, createLogger } from '../common/logger';
import { delay, throwIfAborted } from '../common/utils';
import { REPLAY_POSITION_QUERY, ReplayPositionRow } from './queries';

export interface SettleContext {
  replicas: ClusterNode[];
  pools: ConnectionPoolManager;
  /** Primary WAL position after the last write; null when it could not be read. */
  walPosition: string | null;
  signal?: AbortSignal;
}

export interface SettleResult {
  outcome: SettleOutcome;
  /** Set when polling gave up before every replica caught up. */
  warning?: SettleTimeoutError;
}

export interface SettleStrategy {
  readonly mode: SettleMode;
  settle(context: SettleContext): Promise<SettleResult>;
}

export class FixedDelaySettleStrategy implements SettleStrategy {
  readonly mode = 'fixed' as const;

  constructor(private readonly waitMs: number, private readonly now: () => number = Date.now) {}

  async settle(context: SettleContext): Promise<SettleResult> {
    const started = this.now();
    if (this.waitMs > 0) {
      await delay(this.waitMs, context.signal, 'settle');
    }
    return {
      outcome: {
        mode: this.mode,
        waitedMs: this.now() - started,
        // A fixed delay says nothing about whether replicas caught up
        caughtUp: false,
        laggingNodes: []
      }
    };
  }
}

export interface PollingSettleOptions {
  timeoutMs: number;
  pollIntervalMs?: number;
  logger?: HarnessLogger;
  now?: () => number;
}

/**
 * Polls each replica until it has replayed up to the primary's post-write
 * WAL position, or the timeout passes.
 */
export class ReplayPositionSettleStrategy implements SettleStrategy {
  readonly mode = 'poll' as const;
  private readonly pollIntervalMs: number;
  private readonly logger: HarnessLogger;
  private readonly now: () => number;

  constructor(private readonly options: PollingSettleOptions) {
    this.pollIntervalMs = Math.max(1, options.pollIntervalMs ?? 250);
    this.logger = options.logger ?? createLogger();
    this.now = options.now ?? Date.now;
  }

  async settle(context: SettleContext): Promise<SettleResult> {
    const started = this.now();
    const deadline = started + this.options.timeoutMs;

    if (context.walPosition === null) {
      this.logger.warn('primary WAL position unknown; waiting the full settle interval instead of polling');
      return new FixedDelaySettleStrategy(this.options.timeoutMs, this.now).settle(context).then(result => ({
        outcome: { ...result.outcome, mode: this.mode }
      }));
    }

    const walPosition = context.walPosition;
    let pending = context.replicas.map(replica => replica.id);

    for (;;) {
      throwIfAborted(context.signal, 'settle');

      const checks = await Promise.all(pending.map(async nodeId => ({
        nodeId,
        caughtUp: await this.hasReplayed(nodeId, walPosition, context)
      })));
      pending = checks.filter(check => !check.caughtUp).map(check => check.nodeId);

      if (pending.length === 0) {
        const waitedMs = this.now() - started;
        this.logger.stage('settle', `all replicas caught up after ${waitedMs}ms`);
        return { outcome: { mode: this.mode, waitedMs, caughtUp: true, laggingNodes: [] } };
      }

      const remaining = deadline - this.now();
      if (remaining <= 0) {
        const waitedMs = this.now() - started;
        const warning = new SettleTimeoutError(pending, waitedMs);
        this.logger.warn(warning.message);
        return {
          outcome: { mode: this.mode, waitedMs, caughtUp: false, laggingNodes: pending },
          warning
        };
      }

      await delay(Math.min(this.pollIntervalMs, remaining), context.signal, 'settle');
    }
  }

  private async hasReplayed(nodeId: string, walPosition: string, context: SettleContext): Promise<boolean> {
    try {
      return await context.pools.withConnection(nodeId, async connection => {
        const { rows } = await connection.query<ReplayPositionRow>(REPLAY_POSITION_QUERY, [walPosition]);
        return rows[0]?.caught_up === true;
      }, context.signal);
    } catch (error) {
      if (error instanceof CancelledError) throw error;
      // Keep polling; a replica that never answers ends up in laggingNodes
      this.logger.warn(`${nodeId}: replay position check failed: ${errorMessage(error)}`);
      return false;
    }
  }
}

export interface SettleCoordinatorConfig {
  mode: SettleMode;
  waitSeconds: number;
  pollIntervalMs?: number;
}

/**
 * Holds the run between writes and reads according to the configured strategy.
 */
export class SettleCoordinator {
  readonly strategy: SettleStrategy;

  constructor(config: SettleCoordinatorConfig, logger?: HarnessLogger, strategy?: SettleStrategy) {
    const waitMs = Math.max(0, config.waitSeconds) * 1000;
    this.strategy = strategy ?? (config.mode === 'fixed'
      ? new FixedDelaySettleStrategy(waitMs)
      : new ReplayPositionSettleStrategy({ timeoutMs: waitMs, pollIntervalMs: config.pollIntervalMs, logger }));
  }

  settle(context: SettleContext): Promise<SettleResult> {
    return this.strategy.settle(context);
  }
}
