import { EventEmitter } from 'events';
import { performance } from 'perf_hooks';
import { NodeRegistry } from '../cluster/NodeRegistry';
import { ConnectionPoolManager } from '../connections/ConnectionPoolManager';
import { pgClientFactory } from '../connections/adapters/PgClientAdapter';
import { SqlClientFactory } from '../connections/types';
import { HarnessConfig } from '../config/HarnessConfiguration';
import { ClusterNode, LatencySummary } from '../types';
import { CancelledError, HarnessError, errorMessage } from '../common/errors';
import { HarnessLogger, createLogger } from '../common/logger';
import { createMarker, delay, throwIfAborted } from '../common/utils';
import { MarkerRow, TableQueries, tableQueries } from '../harness/queries';
import { SchemaBootstrapper } from '../harness/SchemaBootstrapper';

export interface LatencyMonitorConfig {
  pollInterval: number;       // How often each replica is checked for the marker (ms)
  visibilityTimeout: number;  // Give up on a replica after this long (ms)
  sampleInterval: number;     // Pause between samples (ms)
}

/** Per-replica latency for one sample; null when the marker never showed up. */
export type LatencySample = Map<string, number | null>;

/**
 * Measures how long a committed row takes to become visible on each replica.
 * Each sample inserts a unique marker on the primary and polls every replica
 * concurrently until the marker can be read back.
 */
export class ReplicationLatencyMonitor extends EventEmitter {
  private config: LatencyMonitorConfig = {
    pollInterval: 50,
    visibilityTimeout: 10000,
    sampleInterval: 500
  };
  private readonly logger: HarnessLogger;

  constructor(
    private readonly queries: TableQueries,
    private readonly registry: NodeRegistry,
    private readonly pools: ConnectionPoolManager,
    config: Partial<LatencyMonitorConfig> = {},
    logger?: HarnessLogger,
    private readonly clock: () => number = () => performance.now()
  ) {
    super();
    this.config = { ...this.config, ...config };
    this.logger = logger ?? createLogger();
  }

  async measure(samples: number, signal?: AbortSignal): Promise<LatencySummary[]> {
    const replicas = this.registry.replicas();
    const latencies = new Map<string, Array<number | null>>(replicas.map(replica => [replica.id, []]));

    for (let index = 0; index < samples; index++) {
      throwIfAborted(signal, 'read');
      const sample = await this.sample(signal);
      for (const [nodeId, latency] of sample) {
        latencies.get(nodeId)?.push(latency);
      }
      this.emit('sample', { index: index + 1, samples, latencies: sample });

      if (index < samples - 1) {
        await delay(this.config.sampleInterval, signal, 'read');
      }
    }

    return replicas.map(replica => summarizeLatencies(replica.id, latencies.get(replica.id) ?? []));
  }

  async sample(signal?: AbortSignal): Promise<LatencySample> {
    const marker = createMarker();
    await this.pools.withConnection(this.registry.primary(), async connection => {
      const { rows } = await connection.query<MarkerRow>(this.queries.insertMarker, [marker]);
      if (rows.length !== 1) {
        throw new HarnessError('write', 'marker insert returned no row', { nodeId: connection.node.id });
      }
    }, signal);
    const committedAt = this.clock();

    const replicas = this.registry.replicas();
    const results = await Promise.all(replicas.map(replica => this.waitForMarker(replica, marker, committedAt, signal)));
    return new Map(replicas.map((replica, index) => [replica.id, results[index]]));
  }

  private async waitForMarker(
    replica: ClusterNode,
    marker: string,
    committedAt: number,
    signal?: AbortSignal
  ): Promise<number | null> {
    const deadline = committedAt + this.config.visibilityTimeout;

    for (;;) {
      try {
        const visible = await this.pools.withConnection(replica, async connection => {
          const { rows } = await connection.query<MarkerRow>(this.queries.selectMarker, [marker]);
          return rows.length > 0;
        }, signal);
        if (visible) {
          return this.clock() - committedAt;
        }
      } catch (error) {
        if (error instanceof CancelledError) throw error;
        this.logger.warn(`${replica.id}: marker lookup failed: ${errorMessage(error)}`);
      }

      const remaining = deadline - this.clock();
      if (remaining <= 0) {
        this.logger.warn(`${replica.id}: marker not visible within ${this.config.visibilityTimeout}ms`);
        return null;
      }
      await delay(Math.min(this.config.pollInterval, remaining), signal, 'read');
    }
  }
}

/**
 * Reduce one replica's samples to average, min, max and p95. A replica with
 * no successful sample gets nulls throughout.
 */
export function summarizeLatencies(nodeId: string, samples: ReadonlyArray<number | null>): LatencySummary {
  const successful = samples.filter((latency): latency is number => latency !== null).sort((a, b) => a - b);
  if (successful.length === 0) {
    return { nodeId, samples: samples.length, successful: 0, averageMs: null, minMs: null, maxMs: null, p95Ms: null };
  }

  const total = successful.reduce((sum, latency) => sum + latency, 0);
  const maxMs = successful[successful.length - 1];
  return {
    nodeId,
    samples: samples.length,
    successful: successful.length,
    averageMs: total / successful.length,
    minMs: successful[0],
    maxMs,
    p95Ms: successful.length > 1 ? successful[Math.floor(successful.length * 0.95)] : maxMs
  };
}

export interface LatencyRunOptions {
  clientFactory?: SqlClientFactory;
  logger?: HarnessLogger;
  monitor?: Partial<LatencyMonitorConfig>;
  signal?: AbortSignal;
}

/**
 * Open pools for the configured cluster, make sure the table exists, take
 * `samples` latency samples and close everything again.
 */
export async function measureReplicationLatency(
  config: HarnessConfig,
  samples: number,
  options: LatencyRunOptions = {}
): Promise<LatencySummary[]> {
  const logger = options.logger ?? createLogger();
  const registry = NodeRegistry.create(config.nodes, config.credential);
  const queries = tableQueries(config.schema.table);
  const pools = new ConnectionPoolManager(
    registry,
    options.clientFactory ?? pgClientFactory({ connectTimeoutMs: config.pool.acquireTimeoutMs }),
    { maxConnections: config.pool.maxConnections, acquireTimeout: config.pool.acquireTimeoutMs },
    logger
  );

  try {
    await pools.open();
    const bootstrapper = new SchemaBootstrapper(queries, { logger });
    await pools.withConnection(registry.primary(), connection => bootstrapper.ensureSchema(connection), options.signal);

    const monitor = new ReplicationLatencyMonitor(queries, registry, pools, options.monitor, logger);
    return await monitor.measure(samples, options.signal);
  } finally {
    await pools.closeAll();
  }
}

export function formatLatencySummaries(summaries: LatencySummary[]): string {
  const ms = (value: number | null) => (value === null ? '-' : `${value.toFixed(1)}ms`);
  const lines = ['Replication latency by replica:'];
  for (const summary of summaries) {
    if (summary.successful === 0) {
      lines.push(`  ${summary.nodeId}: FAILED (0/${summary.samples} samples visible)`);
      continue;
    }
    lines.push(
      `  ${summary.nodeId}: ${summary.successful}/${summary.samples} samples, ` +
      `avg ${ms(summary.averageMs)}, min ${ms(summary.minMs)}, max ${ms(summary.maxMs)}, p95 ${ms(summary.p95Ms)}`
    );
  }
  return lines.join('\n');
}
