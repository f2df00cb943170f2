/**
 * SQL issued by the harness. Table names are validated identifiers (see
 * HarnessConfiguration), never user-supplied values, so interpolation is safe.
 */

export interface TableQueries {
  table: string;
  createTable: string;
  createIdIndex: string;
  createCreatedAtIndex: string;
  dropTable: string;
  insertBatch: string;
  insertMarker: string;
  selectById: string;
  selectByIds: string;
  countIds: string;
  selectPresentIds: string;
  selectMarker: string;
}

export const TABLE_NAME_PATTERN = /^[a-z_][a-z0-9_]{0,62}$/;

export function tableQueries(table: string): TableQueries {
  if (!TABLE_NAME_PATTERN.test(table)) {
    throw new RangeError(`invalid table name "${table}"`);
  }

  return {
    table,
    createTable:
      `CREATE TABLE IF NOT EXISTS ${table} (` +
      'id SERIAL PRIMARY KEY, ' +
      'payload VARCHAR(255) NOT NULL, ' +
      'created_at TIMESTAMPTZ NOT NULL DEFAULT now(), ' +
      'random_value INTEGER NOT NULL)',
    createIdIndex: `CREATE INDEX IF NOT EXISTS ${table}_id_idx ON ${table} (id)`,
    createCreatedAtIndex: `CREATE INDEX IF NOT EXISTS ${table}_created_at_idx ON ${table} (created_at)`,
    dropTable: `DROP TABLE IF EXISTS ${table} CASCADE`,
    insertBatch:
      `INSERT INTO ${table} (payload, random_value) ` +
      'SELECT * FROM unnest($1::varchar[], $2::int[]) ' +
      'RETURNING id, payload, random_value, created_at',
    insertMarker: `INSERT INTO ${table} (payload, random_value) VALUES ($1, 0) RETURNING id, created_at`,
    selectById: `SELECT id, payload, random_value FROM ${table} WHERE id = $1`,
    selectByIds: `SELECT id, payload, random_value FROM ${table} WHERE id = ANY($1::int[]) ORDER BY id`,
    countIds: `SELECT count(*)::int AS count FROM ${table} WHERE id = ANY($1::int[])`,
    selectPresentIds: `SELECT id FROM ${table} WHERE id = ANY($1::int[]) ORDER BY id`,
    selectMarker: `SELECT created_at FROM ${table} WHERE payload = $1`
  };
}

export const RECOVERY_STATUS_QUERY =
  'SELECT pg_is_in_recovery() AS in_recovery, ' +
  'EXTRACT(EPOCH FROM (now() - pg_last_xact_replay_timestamp()))::float8 AS lag_seconds';

export const CURRENT_WAL_POSITION_QUERY = 'SELECT pg_current_wal_lsn()::text AS lsn';

export const REPLAY_POSITION_QUERY =
  'SELECT pg_last_wal_replay_lsn()::text AS replay_lsn, ' +
  'COALESCE(pg_wal_lsn_diff(pg_last_wal_replay_lsn(), $1::pg_lsn) >= 0, false) AS caught_up, ' +
  'EXTRACT(EPOCH FROM (now() - pg_last_xact_replay_timestamp()))::float8 AS lag_seconds';

export type RecordRow = {
  id: number;
  payload: string;
  random_value: number;
};

export type InsertedRow = RecordRow & {
  created_at: Date;
};

export type RecoveryStatusRow = {
  in_recovery: boolean;
  lag_seconds: number | null;
};

export type WalPositionRow = {
  lsn: string;
};

export type ReplayPositionRow = {
  replay_lsn: string | null;
  caught_up: boolean;
  lag_seconds: number | null;
};

export type IdRow = {
  id: number;
};

export type CountRow = {
  count: number;
};

export type MarkerRow = {
  id?: number;
  created_at: Date;
};
