import { ConnectionPoolManager } from '../connections/ConnectionPoolManager';
import { ClusterNode, ConsistencyReport, TestRecord, VerificationDepth } from '../types';
import { CancelledError, ConsistencyError, HarnessError, errorMessage } from '../common/errors';
import { HarnessLogger, createLogger } from '../common/logger';
import { chunk, sampleWithoutReplacement } from '../common/utils';
import { CountRow, IdRow, RecordRow, TableQueries } from './queries';

// Keeps each ANY($1) array to a sane size on large runs
const ID_BATCH_SIZE = 1000;

export interface ConsistencyOptions {
  depth?: VerificationDepth;
  sampleSize?: number;
  random?: () => number;
  logger?: HarnessLogger;
}

export interface VerificationHints {
  /** Ids a replica missed during the read stage; always rechecked on that replica. */
  missedIds?: ReadonlyMap<string, readonly number[]>;
}

export interface VerificationOutcome {
  reports: ConsistencyReport[];
  /** Mismatches and per-replica query failures, one per affected replica. */
  failures: HarnessError[];
}

/**
 * Compares what each replica holds against the records committed on the
 * primary: row count over every written id, then per-row payload and value
 * equality over all ids (full) or a sample (sample). When a sampled
 * replica comes up short, every absent id is still listed.
 */
export class ConsistencyVerifier {
  private readonly depth: VerificationDepth;
  private readonly sampleSize: number;
  private readonly random: () => number;
  private readonly logger: HarnessLogger;

  constructor(
    private readonly queries: TableQueries,
    private readonly pools: ConnectionPoolManager,
    options: ConsistencyOptions = {}
  ) {
    this.depth = options.depth ?? 'full';
    this.sampleSize = Math.max(1, options.sampleSize ?? 100);
    this.random = options.random ?? Math.random;
    this.logger = options.logger ?? createLogger();
  }

  async verify(
    records: TestRecord[],
    replicas: ClusterNode[],
    hints: VerificationHints = {},
    signal?: AbortSignal
  ): Promise<VerificationOutcome> {
    const settled = await Promise.allSettled(
      replicas.map(replica => this.verifyReplica(replica, records, hints.missedIds?.get(replica.id) ?? [], signal))
    );

    const reports: ConsistencyReport[] = [];
    const failures: HarnessError[] = [];

    settled.forEach((result, index) => {
      const replica = replicas[index];
      if (result.status === 'fulfilled') {
        const report = result.value;
        reports.push(report);
        if (!report.matched) {
          failures.push(new ConsistencyError(
            replica.id,
            `expected ${report.expectedCount} row(s), observed ${report.observedCount}; ` +
            `${report.mismatchedIds.length} mismatched id(s)`,
            report.mismatchedIds
          ));
        }
        return;
      }

      if (result.reason instanceof CancelledError) {
        throw result.reason;
      }
      this.logger.error(`${replica.id}: consistency check failed: ${errorMessage(result.reason)}`);
      failures.push(new HarnessError('verify', `consistency check failed: ${errorMessage(result.reason)}`, {
        nodeId: replica.id,
        cause: result.reason
      }));
    });

    return { reports, failures };
  }

  async verifyReplica(
    replica: ClusterNode,
    records: TestRecord[],
    missedIds: readonly number[] = [],
    signal?: AbortSignal
  ): Promise<ConsistencyReport> {
    const expected = new Map(records.map(record => [record.id, record]));
    const allIds = [...expected.keys()];
    const checkIds = this.selectIds(records, missedIds, expected);

    const { observedCount, rows, absentIds } = await this.pools.withConnection(replica, async connection => {
      let count = 0;
      for (const ids of chunk(allIds, ID_BATCH_SIZE)) {
        const result = await connection.query<CountRow>(this.queries.countIds, [ids]);
        count += Number(result.rows[0]?.count ?? 0);
      }

      const fetched: RecordRow[] = [];
      for (const ids of chunk(checkIds, ID_BATCH_SIZE)) {
        const result = await connection.query<RecordRow>(this.queries.selectByIds, [ids]);
        fetched.push(...result.rows);
      }

      // A sample can miss lost rows; name every absent id when the count is short
      const absent: number[] = [];
      if (count !== allIds.length && checkIds.length < allIds.length) {
        const present = new Set<number>();
        for (const ids of chunk(allIds, ID_BATCH_SIZE)) {
          const result = await connection.query<IdRow>(this.queries.selectPresentIds, [ids]);
          result.rows.forEach(row => present.add(Number(row.id)));
        }
        absent.push(...allIds.filter(id => !present.has(id)));
      }
      return { observedCount: count, rows: fetched, absentIds: absent };
    }, signal);

    const seen = new Map(rows.map(row => [Number(row.id), row]));
    const mismatched = new Set<number>(absentIds);
    for (const id of checkIds) {
      const written = expected.get(id);
      const row = seen.get(id);
      if (!written || !row || row.payload !== written.payload || Number(row.random_value) !== written.randomValue) {
        mismatched.add(id);
      }
    }
    const mismatchedIds = [...mismatched].sort((a, b) => a - b);

    const matched = observedCount === records.length && mismatchedIds.length === 0;
    const report: ConsistencyReport = {
      nodeId: replica.id,
      matched,
      expectedCount: records.length,
      observedCount,
      checkedCount: checkIds.length,
      depth: checkIds.length === records.length ? 'full' : 'sample',
      mismatchedIds
    };

    if (matched) {
      this.logger.stage('verify', `${replica.id}: data is consistent (${checkIds.length} row(s) compared)`);
    } else {
      this.logger.error(
        `${replica.id}: ${observedCount}/${records.length} rows present, ${mismatchedIds.length} mismatched id(s)`
      );
    }
    return report;
  }

  private selectIds(records: TestRecord[], missedIds: readonly number[], expected: Map<number, TestRecord>): number[] {
    if (this.depth === 'full' || records.length <= this.sampleSize) {
      return records.map(record => record.id);
    }

    const ids = new Set(sampleWithoutReplacement(records, this.sampleSize, this.random).map(record => record.id));
    for (const id of missedIds) {
      if (expected.has(id)) {
        ids.add(id);
      }
    }
    return [...ids].sort((a, b) => a - b);
  }
}
