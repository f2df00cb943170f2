import { Client } from 'pg';
import { ClusterNode } from '../../types';
import { ConnectionConfig, SqlClient, SqlClientFactory, SqlResult, SqlRow } from '../types';

/**
 * SqlClient backed by a single node-postgres client
 */
export class PgClientAdapter implements SqlClient {
  private readonly client: Client;

  constructor(node: ClusterNode, config: ConnectionConfig = {}) {
    this.client = new Client({
      host: node.host,
      port: node.port,
      database: node.database,
      user: node.credential.user,
      password: node.credential.password,
      connectionTimeoutMillis: config.connectTimeoutMs ?? 5000,
      statement_timeout: config.statementTimeoutMs,
      application_name: `pg-replication-harness:${node.id}`
    });
  }

  async connect(): Promise<void> {
    await this.client.connect();
  }

  async query<R extends SqlRow>(text: string, values?: unknown[]): Promise<SqlResult<R>> {
    const result = await this.client.query<R>(text, values);
    return { rows: result.rows, rowCount: result.rowCount ?? result.rows.length };
  }

  async end(): Promise<void> {
    await this.client.end();
  }

  onError(listener: (error: Error) => void): void {
    this.client.on('error', listener);
  }
}

export function pgClientFactory(config: ConnectionConfig = {}): SqlClientFactory {
  return node => new PgClientAdapter(node, config);
}
