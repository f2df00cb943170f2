import { performance } from 'perf_hooks';
import { ConnectionPoolManager } from '../connections/ConnectionPoolManager';
import { ClusterNode, ReadResult, TestRecord } from '../types';
import { CancelledError, ReadError, errorMessage } from '../common/errors';
import { HarnessLogger, createLogger } from '../common/logger';
import { splitEvenly } from '../common/utils';
import { RecordRow, TableQueries } from './queries';
import { runBounded } from './WorkerPool';

export type ReadSelection = 'random' | 'sequential';

export interface ReadLoadOptions {
  selection?: ReadSelection;
  random?: () => number;
  /** Millisecond clock used for elapsed time. */
  clock?: () => number;
  logger?: HarnessLogger;
}

export interface DispatchOutcome {
  results: ReadResult[];
  failures: ReadError[];
}

/**
 * Spreads point reads of written records across replicas, each replica's
 * share on its own worker pool sized to its connection pool.
 */
export class ReadLoadDispatcher {
  private readonly selection: ReadSelection;
  private readonly random: () => number;
  private readonly clock: () => number;
  private readonly logger: HarnessLogger;

  constructor(
    private readonly queries: TableQueries,
    private readonly pools: ConnectionPoolManager,
    options: ReadLoadOptions = {}
  ) {
    this.selection = options.selection ?? 'random';
    this.random = options.random ?? Math.random;
    this.clock = options.clock ?? (() => performance.now());
    this.logger = options.logger ?? createLogger();
  }

  async dispatchReads(
    replicas: ClusterNode[],
    records: TestRecord[],
    totalReads: number,
    signal?: AbortSignal
  ): Promise<DispatchOutcome> {
    if (totalReads <= 0 || replicas.length === 0) {
      return { results: [], failures: [] };
    }
    if (records.length === 0) {
      this.logger.warn(`no records were written; skipping ${totalReads} read(s)`);
    }

    const shares = splitEvenly(totalReads, replicas.length);
    let offset = 0;
    const plans = replicas.map((replica, index) => {
      const ids = this.selectIds(records, shares[index], offset);
      offset += shares[index];
      return { replica, ids };
    });

    this.logger.stage('read', `dispatching ${totalReads} read(s) across ${replicas.length} replica(s)`);

    const settled = await Promise.allSettled(plans.map(plan => this.readFromReplica(plan.replica, plan.ids, signal)));

    const results: ReadResult[] = [];
    const failures: ReadError[] = [];
    for (const result of settled) {
      if (result.status === 'rejected') {
        throw result.reason;
      }
      results.push(result.value.result);
      if (result.value.failure) {
        failures.push(result.value.failure);
      }
    }
    return { results, failures };
  }

  private selectIds(records: TestRecord[], count: number, offset: number): number[] {
    if (records.length === 0) return [];
    return Array.from({ length: count }, (_, index) => {
      const position = this.selection === 'sequential'
        ? (offset + index) % records.length
        : Math.floor(this.random() * records.length);
      return records[position].id;
    });
  }

  private async readFromReplica(
    replica: ClusterNode,
    ids: number[],
    signal?: AbortSignal
  ): Promise<{ result: ReadResult; failure?: ReadError }> {
    const missedIds = new Set<number>();
    let recordsReturned = 0;
    let misses = 0;
    let failedReads = 0;
    let firstError: unknown;

    const concurrency = this.pools.capacityOf(replica);
    const started = this.clock();

    await runBounded(ids.length, async index => {
      const id = ids[index];
      try {
        const { rows } = await this.pools.withConnection(
          replica,
          connection => connection.query<RecordRow>(this.queries.selectById, [id]),
          signal
        );
        if (rows.length > 0) {
          recordsReturned++;
        } else {
          misses++;
          missedIds.add(id);
        }
      } catch (error) {
        if (error instanceof CancelledError) throw error;
        failedReads++;
        firstError ??= error;
      }
    }, { concurrency, signal, stage: 'read' });

    const elapsedMs = ids.length > 0 ? Math.max(0, this.clock() - started) : 0;
    const throughput = elapsedMs > 0 && recordsReturned > 0 ? recordsReturned / (elapsedMs / 1000) : 0;

    this.logger.stage(
      'read',
      `${replica.id}: ${recordsReturned} reads in ${(elapsedMs / 1000).toFixed(2)}s (${throughput.toFixed(2)} reads/s), ${misses} miss(es)`
    );

    const result: ReadResult = {
      nodeId: replica.id,
      requested: ids.length,
      recordsReturned,
      misses,
      missedIds: [...missedIds].sort((a, b) => a - b),
      failedReads,
      elapsedMs,
      throughput
    };

    if (failedReads > 0) {
      const failure = new ReadError(
        replica.id,
        `${failedReads} of ${ids.length} read(s) failed; first error: ${errorMessage(firstError)}`,
        firstError
      );
      return { result, failure };
    }
    return { result };
  }
}
