import { EventEmitter } from 'events';
import { ClusterNode } from '../types';
import { ConnectionStatus, SqlClient, SqlResult, SqlRow } from './types';

export interface Connection {
  on(event: 'closed', listener: (reason?: string) => void): this;
  on(event: 'error', listener: (error: Error) => void): this;
  on(event: string, listener: (...args: unknown[]) => void): this;

  emit(event: 'closed', reason?: string): boolean;
  emit(event: 'error', error: Error): boolean;
  emit(event: string, ...args: unknown[]): boolean;
}

/**
 * One open session against a single cluster node. Connections never cross
 * nodes and serve one query at a time.
 */
export class Connection extends EventEmitter {
  private status: ConnectionStatus = 'active';

  constructor(
    public readonly id: string,
    public readonly node: ClusterNode,
    private readonly client: SqlClient
  ) {
    super();

    this.client.onError(error => {
      this.status = 'error';
      // Only forward when someone listens; an unhandled 'error' would throw
      if (this.listenerCount('error') > 0) {
        this.emit('error', error);
      }
    });
  }

  async query<R extends SqlRow>(text: string, values?: unknown[]): Promise<SqlResult<R>> {
    if (this.status === 'closed' || this.status === 'error') {
      throw new Error(`Cannot query on ${this.status} connection ${this.id}`);
    }
    if (this.status === 'busy') {
      throw new Error(`Connection ${this.id} already has a query in flight`);
    }

    this.status = 'busy';
    try {
      return await this.client.query<R>(text, values);
    } finally {
      if (this.status === 'busy') {
        this.status = 'active';
      }
    }
  }

  async close(reason?: string): Promise<void> {
    if (this.status === 'closed') return;

    this.status = 'closed';
    try {
      await this.client.end();
    } finally {
      this.emit('closed', reason);
      this.removeAllListeners();
    }
  }

  getStatus(): ConnectionStatus {
    return this.status;
  }

  isActive(): boolean {
    return this.status === 'active';
  }
}
