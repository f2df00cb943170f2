import { EventEmitter } from 'events';
import { Connection } from './Connection';
import { ConnectionPool, ReleaseOptions } from './ConnectionPool';
import { SqlClientFactory } from './types';
import { NodeRegistry } from '../cluster/NodeRegistry';
import { ClusterNode, PoolSnapshot } from '../types';
import { CancelledError, ConnectionError, errorMessage } from '../common/errors';
import { HarnessLogger, createLogger } from '../common/logger';
import { createId, raceAbort } from '../common/utils';

export interface PoolManagerConfig {
  maxConnections: number;
  acquireTimeout: number;
  minConnections?: number;
}

type NodeRef = ClusterNode | string;

/**
 * Owns one private pool per registered node. Every other component gets its
 * connections through here, never directly from a client.
 */
export class ConnectionPoolManager extends EventEmitter {
  private pools = new Map<string, ConnectionPool>();
  private opened = false;
  private closed = false;
  private readonly logger: HarnessLogger;

  constructor(
    private readonly registry: NodeRegistry,
    private readonly clientFactory: SqlClientFactory,
    private readonly config: PoolManagerConfig,
    logger?: HarnessLogger
  ) {
    super();
    this.logger = logger ?? createLogger();
  }

  /**
   * Create and initialize every pool. The first unreachable node aborts the
   * whole open with ConnectionError; pools already opened are drained.
   */
  async open(): Promise<void> {
    if (this.opened) return;
    this.opened = true;

    for (const node of this.registry.all()) {
      const pool = new ConnectionPool(node.id, () => this.connect(node), {
        minConnections: this.config.minConnections ?? 1,
        maxConnections: this.config.maxConnections,
        acquireTimeout: this.config.acquireTimeout,
        logger: this.logger
      });
      this.pools.set(node.id, pool);
    }

    const results = await Promise.allSettled(
      Array.from(this.pools.values()).map(pool => pool.initialize())
    );
    const failure = results.find((result): result is PromiseRejectedResult => result.status === 'rejected');
    if (failure) {
      await this.closeAll();
      throw failure.reason;
    }

    this.emit('opened', { nodes: this.pools.size });
    this.logger.harness(`connection pools open for ${this.pools.size} node(s)`);
  }

  private async connect(node: ClusterNode): Promise<Connection> {
    const client = this.clientFactory(node);
    try {
      await client.connect();
    } catch (error) {
      throw new ConnectionError(node.id, `Cannot connect to ${node.host}:${node.port}: ${errorMessage(error)}`, error);
    }
    return new Connection(`${node.id}-${createId().slice(0, 8)}`, node, client);
  }

  acquire(node: NodeRef, signal?: AbortSignal): Promise<Connection> {
    return this.poolFor(node).acquire(signal);
  }

  release(node: NodeRef, connection: Connection, options: ReleaseOptions = {}): void {
    const pool = this.pools.get(nodeIdOf(node));
    if (!pool) return;
    pool.release(connection, options);
  }

  /**
   * Run `fn` with a connection from the node's pool. The connection is
   * released on success, error and cancellation; when the signal aborts
   * mid-query the connection is discarded rather than reused.
   */
  async withConnection<T>(node: NodeRef, fn: (connection: Connection) => Promise<T>, signal?: AbortSignal): Promise<T> {
    const pool = this.poolFor(node);
    const connection = await pool.acquire(signal);
    let discard = false;

    try {
      return await raceAbort(fn(connection), signal, 'connect');
    } catch (error) {
      discard = error instanceof CancelledError || !connection.isActive();
      throw error;
    } finally {
      pool.release(connection, { discard });
    }
  }

  capacityOf(node: NodeRef): number {
    return this.poolFor(node).capacity;
  }

  snapshot(): PoolSnapshot[] {
    return Array.from(this.pools.entries()).map(([nodeId, pool]) => {
      const stats = pool.getStats();
      return {
        nodeId,
        capacity: pool.capacity,
        totalCreated: stats.totalCreated,
        totalAcquired: stats.totalAcquired,
        totalReleased: stats.totalReleased,
        totalDestroyed: stats.totalDestroyed,
        peakInUse: stats.peakInUse,
        averageAcquireTime: stats.averageAcquireTime
      };
    });
  }

  /**
   * Drain every pool. Safe to call more than once.
   */
  async closeAll(): Promise<void> {
    if (this.closed) return;
    this.closed = true;

    await Promise.allSettled(Array.from(this.pools.values()).map(pool => pool.drain()));
    this.emit('closed');
    this.logger.harness('all connection pools closed');
  }

  private poolFor(node: NodeRef): ConnectionPool {
    const nodeId = nodeIdOf(node);
    const pool = this.pools.get(nodeId);
    if (!pool) {
      throw new ConnectionError(nodeId, `No connection pool for node ${nodeId}`);
    }
    return pool;
  }
}

function nodeIdOf(node: NodeRef): string {
  return typeof node === 'string' ? node : node.id;
}
