import { EventEmitter } from 'eventemitter3';
import { NodeRegistry } from '../cluster/NodeRegistry';
import { ConnectionPoolManager } from '../connections/ConnectionPoolManager';
import { pgClientFactory } from '../connections/adapters/PgClientAdapter';
import { SqlClientFactory } from '../connections/types';
import { HarnessConfig } from '../config/HarnessConfiguration';
import {
  ConsistencyReport,
  PoolSnapshot,
  ReadResult,
  ReplicationStatus,
  RunReport,
  SettleOutcome,
  Stage,
  TestRecord,
  WriteSummary
} from '../types';
import { CancelledError, HarnessError, WriteError, errorMessage } from '../common/errors';
import { HarnessLogger, createLogger } from '../common/logger';
import { cancellationError, raceAbort } from '../common/utils';
import { tableQueries } from './queries';
import { SchemaBootstrapper } from './SchemaBootstrapper';
import { ReplicaStatusProber } from './ReplicaStatusProber';
import { WriteLoadGenerator } from './WriteLoadGenerator';
import { SettleCoordinator, SettleStrategy } from './SettleCoordinator';
import { ReadLoadDispatcher } from './ReadLoadDispatcher';
import { ConsistencyVerifier } from './ConsistencyVerifier';
import { aggregate } from './ReportAggregator';

export interface StageEvent {
  stage: Stage;
}

export interface StageCompletedEvent extends StageEvent {
  elapsedMs: number;
  ok: boolean;
}

export interface WriteProgressEvent {
  written: number;
  total: number;
}

export interface WarningEvent extends StageEvent {
  message: string;
  nodeId?: string;
}

export interface HarnessEvents {
  'stage-started': (event: StageEvent) => void;
  'stage-completed': (event: StageCompletedEvent) => void;
  'write-progress': (event: WriteProgressEvent) => void;
  warning: (event: WarningEvent) => void;
}

export interface ReplicationHarnessOptions {
  clientFactory?: SqlClientFactory;
  logger?: HarnessLogger;
  random?: () => number;
  now?: () => number;
  /** Replaces the strategy chosen from settle.mode. */
  settleStrategy?: SettleStrategy;
}

interface RunState {
  currentStage: Stage;
  statuses: ReplicationStatus[];
  records: TestRecord[];
  writes: WriteSummary | null;
  settle: SettleOutcome | null;
  reads: ReadResult[];
  consistency: ConsistencyReport[];
  pools: PoolSnapshot[];
  warnings: string[];
  errors: HarnessError[];
}

/**
 * Runs one verification pass against a primary and its replicas:
 * connect, bootstrap, probe, write, settle, read, verify, report.
 *
 * Connection, schema and write failures end the run early. Probe, read and
 * consistency failures are collected and the remaining stages still run.
 */
export class ReplicationHarness extends EventEmitter<HarnessEvents> {
  private readonly logger: HarnessLogger;
  private readonly clientFactory: SqlClientFactory;
  private readonly random: () => number;
  private readonly now: () => number;
  private running = false;

  constructor(private readonly config: HarnessConfig, private readonly options: ReplicationHarnessOptions = {}) {
    super();
    this.logger = options.logger ?? createLogger();
    this.clientFactory = options.clientFactory ?? pgClientFactory({ connectTimeoutMs: config.pool.acquireTimeoutMs });
    this.random = options.random ?? Math.random;
    this.now = options.now ?? Date.now;
  }

  async run(signal?: AbortSignal): Promise<RunReport> {
    if (this.running) {
      throw new Error('a run is already in progress');
    }
    this.running = true;

    const startedAt = new Date(this.now());
    const state: RunState = {
      currentStage: 'configuration',
      statuses: [],
      records: [],
      writes: null,
      settle: null,
      reads: [],
      consistency: [],
      pools: [],
      warnings: [],
      errors: []
    };

    const primaryEndpoint = this.config.nodes.find(node => node.role === 'primary');
    let primaryId = primaryEndpoint?.id ?? 'unknown';
    let replicaIds = this.config.nodes.filter(node => node.role === 'replica').map(node => node.id);

    const controller = new AbortController();
    const timeoutMs = this.config.run.timeoutSeconds * 1000;
    const timer = setTimeout(() => {
      controller.abort(new Error(`run exceeded ${this.config.run.timeoutSeconds}s`));
    }, timeoutMs);
    timer.unref();

    const forwardAbort = () => controller.abort(signal?.reason);
    if (signal?.aborted) {
      forwardAbort();
    } else {
      signal?.addEventListener('abort', forwardAbort, { once: true });
    }

    let pools: ConnectionPoolManager | null = null;

    try {
      const registry = await this.stage(state, 'configuration', async () =>
        NodeRegistry.create(this.config.nodes, this.config.credential)
      );
      primaryId = registry.primary().id;
      replicaIds = registry.replicas().map(node => node.id);

      pools = new ConnectionPoolManager(registry, this.clientFactory, {
        maxConnections: this.config.pool.maxConnections,
        acquireTimeout: this.config.pool.acquireTimeoutMs
      }, this.logger);
      await this.execute(state, pools, registry, controller.signal);
    } catch (error) {
      state.errors.push(this.classify(error, state.currentStage, controller.signal));
    } finally {
      clearTimeout(timer);
      signal?.removeEventListener('abort', forwardAbort);
      if (pools) {
        state.pools = pools.snapshot();
        await pools.closeAll();
      }
      this.running = false;
    }

    this.emit('stage-started', { stage: 'report' });
    const report = aggregate({
      startedAt,
      finishedAt: new Date(this.now()),
      primary: primaryId,
      replicas: replicaIds,
      statuses: state.statuses,
      writes: state.writes,
      settle: state.settle,
      reads: state.reads,
      consistency: state.consistency,
      pools: state.pools,
      warnings: state.warnings,
      errors: state.errors
    });
    this.emit('stage-completed', { stage: 'report', elapsedMs: 0, ok: report.passed });
    this.logger.harness(`run ${report.status} (exit code ${report.exitCode})`);
    return report;
  }

  private async execute(
    state: RunState,
    pools: ConnectionPoolManager,
    registry: NodeRegistry,
    signal: AbortSignal
  ): Promise<void> {
    const { config } = this;
    const primary = registry.primary();
    const replicas = registry.replicas();
    const queries = tableQueries(config.schema.table);

    await this.stage(state, 'connect', () => raceAbort(pools.open(), signal, 'connect'));

    await this.stage(state, 'bootstrap', () => {
      const bootstrapper = new SchemaBootstrapper(queries, { reset: config.schema.reset, logger: this.logger });
      return pools.withConnection(primary, connection => bootstrapper.ensureSchema(connection), signal);
    });

    await this.stage(state, 'probe', async () => {
      const outcome = await new ReplicaStatusProber(this.logger, this.now).probeAll(registry, pools, signal);
      state.statuses = outcome.statuses;
      state.errors.push(...outcome.failures);
    });

    await this.stage(state, 'write', async () => {
      const writer = new WriteLoadGenerator(queries, {
        batchSize: config.workload.batchSize,
        progressInterval: config.workload.progressInterval,
        random: this.random,
        signal,
        logger: this.logger,
        onProgress: (written, total) => this.emit('write-progress', { written, total })
      });
      const started = this.now();
      try {
        await pools.withConnection(primary, async connection => {
          state.records = await writer.writeRecords(connection, config.workload.writes);
          const walPosition = await writer.currentWalPosition(connection);
          state.writes = {
            requested: config.workload.writes,
            committed: state.records.length,
            firstId: state.records[0]?.id ?? null,
            lastId: state.records[state.records.length - 1]?.id ?? null,
            elapsedMs: this.now() - started,
            walPosition
          };
          if (walPosition === null) {
            this.warn(state, 'write', 'primary WAL position unavailable', primary.id);
          }
        }, signal);
      } catch (error) {
        if (error instanceof WriteError) {
          state.writes = {
            requested: config.workload.writes,
            committed: error.committedCount,
            firstId: null,
            lastId: null,
            elapsedMs: this.now() - started,
            walPosition: null
          };
        }
        throw error;
      }
    });

    await this.stage(state, 'settle', async () => {
      const coordinator = new SettleCoordinator({
        mode: config.settle.mode,
        waitSeconds: config.settle.waitSeconds,
        pollIntervalMs: config.settle.pollIntervalMs
      }, this.logger, this.options.settleStrategy);
      const result = await coordinator.settle({
        replicas,
        pools,
        walPosition: state.writes?.walPosition ?? null,
        signal
      });
      state.settle = result.outcome;
      if (result.warning) {
        this.warn(state, 'settle', result.warning.message);
      }
    });

    await this.stage(state, 'read', async () => {
      const dispatcher = new ReadLoadDispatcher(queries, pools, {
        selection: config.workload.readSelection,
        random: this.random,
        logger: this.logger
      });
      const outcome = await dispatcher.dispatchReads(replicas, state.records, config.workload.reads, signal);
      state.reads = outcome.results;
      state.errors.push(...outcome.failures);
    });

    await this.stage(state, 'verify', async () => {
      const verifier = new ConsistencyVerifier(queries, pools, {
        depth: config.verification.depth,
        sampleSize: config.verification.sampleSize,
        random: this.random,
        logger: this.logger
      });
      const missedIds = new Map(state.reads.map(read => [read.nodeId, read.missedIds]));
      const outcome = await verifier.verify(state.records, replicas, { missedIds }, signal);
      state.consistency = outcome.reports;
      state.errors.push(...outcome.failures);
    });
  }

  private async stage<T>(state: RunState, stage: Stage, fn: () => Promise<T>): Promise<T> {
    state.currentStage = stage;
    const started = this.now();
    this.emit('stage-started', { stage });
    this.logger.harness(`stage ${stage} started`);

    try {
      const result = await fn();
      this.emit('stage-completed', { stage, elapsedMs: this.now() - started, ok: true });
      return result;
    } catch (error) {
      this.emit('stage-completed', { stage, elapsedMs: this.now() - started, ok: false });
      throw error;
    }
  }

  private warn(state: RunState, stage: Stage, message: string, nodeId?: string): void {
    state.warnings.push(nodeId ? `${nodeId}: ${message}` : message);
    this.emit('warning', { stage, message, nodeId });
  }

  private classify(error: unknown, stage: Stage, signal: AbortSignal): HarnessError {
    // Anything that fails after the deadline or an interrupt is a symptom of the abort
    if (signal.aborted) {
      return cancellationError(signal, stage);
    }
    if (error instanceof CancelledError) {
      return error;
    }
    if (error instanceof HarnessError) {
      return error;
    }
    this.logger.error(`unexpected failure during ${stage}: ${errorMessage(error)}`);
    return new HarnessError(stage, errorMessage(error), { cause: error });
  }
}
