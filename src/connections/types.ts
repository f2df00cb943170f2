import { ClusterNode } from '../types';

export type SqlRow = Record<string, unknown>;

export interface SqlResult<R extends SqlRow> {
  rows: R[];
  rowCount: number;
}

/**
 * The slice of a PostgreSQL client the harness relies on. The `pg` adapter
 * implements it for real servers; tests supply an in-process stand-in.
 */
export interface SqlClient {
  connect(): Promise<void>;
  query<R extends SqlRow>(text: string, values?: unknown[]): Promise<SqlResult<R>>;
  end(): Promise<void>;
  onError(listener: (error: Error) => void): void;
}

export type SqlClientFactory = (node: ClusterNode) => SqlClient;

export type ConnectionStatus = 'active' | 'busy' | 'closed' | 'error';

export interface ConnectionConfig {
  connectTimeoutMs?: number;
  statementTimeoutMs?: number;
}
