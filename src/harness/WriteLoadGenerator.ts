import { Connection } from '../connections/Connection';
import { TestRecord } from '../types';
import { CancelledError, WriteError, errorMessage } from '../common/errors';
import { HarnessLogger, createLogger } from '../common/logger';
import { throwIfAborted } from '../common/utils';
import { CURRENT_WAL_POSITION_QUERY, InsertedRow, TableQueries, WalPositionRow } from './queries';

const PAYLOAD_ALPHABET = 'ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz0123456789';
export const PAYLOAD_LENGTH = 50;
export const MAX_PAYLOAD_LENGTH = 255;
export const RANDOM_VALUE_MAX = 1_000_000;

export interface WriteLoadOptions {
  batchSize?: number;
  progressInterval?: number;
  random?: () => number;
  onProgress?: (written: number, total: number) => void;
  signal?: AbortSignal;
  logger?: HarnessLogger;
}

export interface GeneratedRecord {
  payload: string;
  randomValue: number;
}

export function generatePayload(random: () => number = Math.random, length = PAYLOAD_LENGTH): string {
  let payload = '';
  for (let i = 0; i < length; i++) {
    payload += PAYLOAD_ALPHABET[Math.floor(random() * PAYLOAD_ALPHABET.length)];
  }
  return payload;
}

export function generateRandomValue(random: () => number = Math.random): number {
  return 1 + Math.floor(random() * RANDOM_VALUE_MAX);
}

/**
 * Inserts synthetic records on the primary. Each batch is its own statement
 * and therefore its own commit, so every returned record is durable on the
 * primary by the time the next batch starts.
 */
export class WriteLoadGenerator {
  private readonly batchSize: number;
  private readonly progressInterval: number;
  private readonly random: () => number;
  private readonly logger: HarnessLogger;

  constructor(private readonly queries: TableQueries, private readonly options: WriteLoadOptions = {}) {
    this.batchSize = Math.max(1, options.batchSize ?? 1);
    this.progressInterval = Math.max(1, options.progressInterval ?? 100);
    this.random = options.random ?? Math.random;
    this.logger = options.logger ?? createLogger();
  }

  async writeRecords(primary: Connection, count: number, generate?: (index: number) => GeneratedRecord): Promise<TestRecord[]> {
    const nodeId = primary.node.id;
    if (primary.node.role !== 'primary') {
      throw new WriteError(nodeId, `writes must target the primary, not ${primary.node.role}`, 0);
    }

    const written: TestRecord[] = [];
    let nextProgress = this.progressInterval;

    while (written.length < count) {
      throwIfAborted(this.options.signal, 'write');

      const size = Math.min(this.batchSize, count - written.length);
      const batch = Array.from({ length: size }, (_, offset) =>
        generate ? generate(written.length + offset) : this.generate()
      );

      for (const record of batch) {
        if (record.payload.length > MAX_PAYLOAD_LENGTH) {
          throw new WriteError(nodeId, `payload exceeds ${MAX_PAYLOAD_LENGTH} characters`, written.length);
        }
      }

      let rows: InsertedRow[];
      try {
        const result = await primary.query<InsertedRow>(this.queries.insertBatch, [
          batch.map(record => record.payload),
          batch.map(record => record.randomValue)
        ]);
        rows = result.rows;
      } catch (error) {
        if (error instanceof CancelledError) throw error;
        throw new WriteError(
          nodeId,
          `insert failed after ${written.length} committed record(s): ${errorMessage(error)}`,
          written.length,
          error
        );
      }

      if (rows.length !== size) {
        throw new WriteError(nodeId, `insert returned ${rows.length} row(s) for a batch of ${size}`, written.length);
      }

      for (const row of [...rows].sort((a, b) => a.id - b.id)) {
        written.push({
          id: Number(row.id),
          payload: row.payload,
          createdAt: row.created_at,
          randomValue: Number(row.random_value)
        });
      }

      while (written.length >= nextProgress) {
        this.options.onProgress?.(nextProgress, count);
        this.logger.stage('write', `written ${nextProgress}/${count} records`);
        nextProgress += this.progressInterval;
      }
    }

    assertContiguous(nodeId, written);
    this.logger.stage('write', `wrote ${written.length} record(s) to ${nodeId}`);
    return written;
  }

  /**
   * The primary's WAL position after the last commit; replicas that have
   * replayed up to it hold every record written so far.
   */
  async currentWalPosition(primary: Connection): Promise<string | null> {
    try {
      const { rows } = await primary.query<WalPositionRow>(CURRENT_WAL_POSITION_QUERY);
      return rows[0]?.lsn ?? null;
    } catch (error) {
      this.logger.warn(`could not read WAL position on ${primary.node.id}: ${errorMessage(error)}`);
      return null;
    }
  }

  private generate(): GeneratedRecord {
    return {
      payload: generatePayload(this.random),
      randomValue: generateRandomValue(this.random)
    };
  }
}

function assertContiguous(nodeId: string, records: TestRecord[]): void {
  for (let i = 1; i < records.length; i++) {
    if (records[i].id !== records[i - 1].id + 1) {
      throw new WriteError(
        nodeId,
        `identifiers are not contiguous (${records[i - 1].id} then ${records[i].id}); another writer is using the table`,
        records.length
      );
    }
  }
}
