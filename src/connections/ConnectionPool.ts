import { EventEmitter } from 'events';
import { Connection } from './Connection';
import { ConnectionError, errorMessage } from '../common/errors';
import { HarnessLogger, createLogger } from '../common/logger';
import { cancellationError } from '../common/utils';

export interface ConnectionPoolOptions {
  minConnections?: number;
  maxConnections?: number;
  acquireTimeout?: number;
  logger?: HarnessLogger;
}

export interface PoolConnection {
  connection: Connection;
  id: string;
  inUse: boolean;
  isHealthy: boolean;
}

export interface PoolStats {
  totalConnections: number;
  inUseConnections: number;
  idleConnections: number;
  queuedRequests: number;
  totalAcquired: number;
  totalReleased: number;
  totalCreated: number;
  totalDestroyed: number;
  peakInUse: number;
  averageAcquireTime: number;
}

export interface ReleaseOptions {
  /** Close the connection instead of returning it, e.g. after an abandoned query. */
  discard?: boolean;
}

interface Waiter {
  resolve: (connection: Connection) => void;
  reject: (error: Error) => void;
  timeout: NodeJS.Timeout;
  detach: () => void;
}

/**
 * Bounded connection pool for a single node. Capacity is the only
 * backpressure: once every connection is in use, acquirers queue in FIFO
 * order until one is released or the acquire timeout passes.
 */
export class ConnectionPool extends EventEmitter {
  private connections = new Map<string, PoolConnection>();
  private availableConnections: string[] = [];
  private waitingQueue: Waiter[] = [];
  private pendingCreates = 0;
  private draining = false;

  private stats = {
    totalAcquired: 0,
    totalReleased: 0,
    totalCreated: 0,
    totalDestroyed: 0,
    peakInUse: 0,
    acquireTimes: [] as number[]
  };

  private readonly options: Required<Omit<ConnectionPoolOptions, 'logger'>>;
  private readonly logger: HarnessLogger;

  constructor(
    private readonly nodeId: string,
    private readonly createConnection: () => Promise<Connection>,
    options: ConnectionPoolOptions = {}
  ) {
    super();

    this.options = {
      minConnections: options.minConnections ?? 1,
      maxConnections: options.maxConnections ?? 10,
      acquireTimeout: options.acquireTimeout ?? 10000
    };
    this.logger = options.logger ?? createLogger();

    if (this.options.maxConnections < 1) {
      throw new RangeError(`Pool for ${nodeId} needs at least one connection`);
    }
    if (this.options.minConnections > this.options.maxConnections) {
      throw new RangeError(`Pool for ${nodeId}: minConnections exceeds maxConnections`);
    }
  }

  get capacity(): number {
    return this.options.maxConnections;
  }

  /**
   * Open the minimum connections. Unreachable nodes and rejected credentials
   * surface here as ConnectionError.
   */
  async initialize(): Promise<void> {
    const initPromises: Promise<PoolConnection>[] = [];
    for (let i = 0; i < this.options.minConnections; i++) {
      initPromises.push(this.createAndAddConnection());
    }

    const results = await Promise.allSettled(initPromises);
    const failure = results.find((result): result is PromiseRejectedResult => result.status === 'rejected');
    if (failure) {
      this.emit('initialization-error', failure.reason);
      throw failure.reason;
    }

    for (const result of results) {
      if (result.status === 'fulfilled') {
        this.availableConnections.push(result.value.id);
      }
    }

    this.emit('initialized', { minConnections: this.options.minConnections });
    this.logger.pool(this.nodeId, `initialized with ${this.connections.size} connection(s)`);
  }

  /**
   * Acquire connection from pool
   */
  async acquire(signal?: AbortSignal): Promise<Connection> {
    const startTime = Date.now();

    try {
      const connection = await this.acquireConnection(signal);
      const acquireTime = Date.now() - startTime;

      this.stats.totalAcquired++;
      this.stats.acquireTimes.push(acquireTime);
      this.stats.peakInUse = Math.max(this.stats.peakInUse, this.getInUseCount());

      // Keep only last 100 acquire times for average calculation
      if (this.stats.acquireTimes.length > 100) {
        this.stats.acquireTimes.shift();
      }

      this.emit('connection-acquired', {
        connectionId: connection.id,
        acquireTime,
        poolSize: this.connections.size
      });

      return connection;
    } catch (error) {
      this.emit('acquire-error', { error, acquireTime: Date.now() - startTime });
      throw error;
    }
  }

  private async acquireConnection(signal?: AbortSignal): Promise<Connection> {
    if (this.draining) {
      throw new ConnectionError(this.nodeId, 'Pool is draining');
    }
    if (signal?.aborted) {
      throw cancellationError(signal, 'connect');
    }

    const availableId = this.getAvailableConnection();
    if (availableId) {
      return this.checkOut(availableId);
    }

    // Open another connection while under capacity
    if (this.connections.size + this.pendingCreates < this.options.maxConnections) {
      const poolConn = await this.createAndAddConnection();
      return this.checkOut(poolConn.id);
    }

    return this.waitForConnection(signal);
  }

  private getAvailableConnection(): string | null {
    while (this.availableConnections.length > 0) {
      const connectionId = this.availableConnections.shift();
      if (connectionId === undefined) break;
      const poolConn = this.connections.get(connectionId);
      if (poolConn && !poolConn.inUse && poolConn.isHealthy && poolConn.connection.isActive()) {
        return connectionId;
      }
      if (poolConn) {
        this.removeConnection(connectionId);
      }
    }
    return null;
  }

  private checkOut(connectionId: string): Connection {
    const poolConn = this.connections.get(connectionId);
    if (!poolConn) {
      throw new ConnectionError(this.nodeId, `Connection ${connectionId} left the pool`);
    }
    poolConn.inUse = true;
    return poolConn.connection;
  }

  /**
   * Wait for connection to become available
   */
  private waitForConnection(signal?: AbortSignal): Promise<Connection> {
    return new Promise((resolve, reject) => {
      const onAbort = () => {
        this.removeWaiter(waiter);
        reject(cancellationError(signal, 'connect'));
      };

      const timeout = setTimeout(() => {
        this.removeWaiter(waiter);
        reject(new ConnectionError(
          this.nodeId,
          `Connection acquire timeout after ${this.options.acquireTimeout}ms`
        ));
      }, this.options.acquireTimeout);
      timeout.unref();

      const waiter: Waiter = {
        resolve,
        reject,
        timeout,
        detach: () => signal?.removeEventListener('abort', onAbort)
      };

      signal?.addEventListener('abort', onAbort, { once: true });
      this.waitingQueue.push(waiter);
    });
  }

  private removeWaiter(waiter: Waiter): void {
    clearTimeout(waiter.timeout);
    waiter.detach();
    const index = this.waitingQueue.indexOf(waiter);
    if (index >= 0) {
      this.waitingQueue.splice(index, 1);
    }
  }

  /**
   * Release connection back to pool
   */
  release(connection: Connection, options: ReleaseOptions = {}): void {
    const poolConn = this.connections.get(connection.id);

    if (!poolConn) {
      this.logger.pool(this.nodeId, `Releasing unknown connection ${connection.id}`);
      return;
    }

    if (!poolConn.inUse) {
      this.logger.pool(this.nodeId, `Releasing connection that wasn't in use ${connection.id}`);
      return;
    }

    poolConn.inUse = false;
    this.stats.totalReleased++;

    if (!options.discard && poolConn.isHealthy && poolConn.connection.isActive() && !this.draining) {
      this.availableConnections.push(poolConn.id);
      this.processWaitingQueue();

      this.emit('connection-released', {
        connectionId: poolConn.id,
        poolSize: this.connections.size,
        availableCount: this.availableConnections.length
      });
    } else {
      this.removeConnection(poolConn.id);
      this.replenishForWaiters();
    }
  }

  private processWaitingQueue(): void {
    while (this.waitingQueue.length > 0) {
      const connectionId = this.getAvailableConnection();
      if (!connectionId) return;

      const waiter = this.waitingQueue.shift();
      if (!waiter) {
        this.availableConnections.unshift(connectionId);
        return;
      }

      clearTimeout(waiter.timeout);
      waiter.detach();
      waiter.resolve(this.checkOut(connectionId));
    }
  }

  /**
   * A discarded connection frees a slot; open a replacement for whoever is queued.
   */
  private replenishForWaiters(): void {
    if (this.waitingQueue.length === 0 || this.draining) return;
    if (this.connections.size + this.pendingCreates >= this.options.maxConnections) return;

    this.createAndAddConnection().then(
      poolConn => {
        this.availableConnections.push(poolConn.id);
        this.processWaitingQueue();
      },
      error => {
        const waiter = this.waitingQueue.shift();
        if (waiter) {
          clearTimeout(waiter.timeout);
          waiter.detach();
          waiter.reject(error instanceof Error ? error : new ConnectionError(this.nodeId, errorMessage(error)));
        }
      }
    );
  }

  private async createAndAddConnection(): Promise<PoolConnection> {
    this.pendingCreates++;
    try {
      const connection = await this.createConnection();
      // A connect that outlives drain() would never be closed
      if (this.draining) {
        await connection.close('pool-draining');
        throw new ConnectionError(this.nodeId, 'Pool is draining');
      }
      const poolConn = this.addConnectionToPool(connection);
      this.stats.totalCreated++;

      this.emit('connection-created', {
        connectionId: connection.id,
        poolSize: this.connections.size
      });

      return poolConn;
    } catch (error) {
      this.emit('connection-creation-error', error);
      throw error instanceof ConnectionError
        ? error
        : new ConnectionError(this.nodeId, `Failed to connect: ${errorMessage(error)}`, error);
    } finally {
      this.pendingCreates--;
    }
  }

  private addConnectionToPool(connection: Connection): PoolConnection {
    const poolConn: PoolConnection = {
      connection,
      id: connection.id,
      inUse: false,
      isHealthy: true
    };

    this.connections.set(connection.id, poolConn);

    connection.on('error', () => this.handleConnectionError(connection.id));

    return poolConn;
  }

  private handleConnectionError(connectionId: string): void {
    const poolConn = this.connections.get(connectionId);
    if (poolConn) {
      poolConn.isHealthy = false;
      this.emit('connection-error', { connectionId });

      if (!poolConn.inUse) {
        this.removeConnection(connectionId);
      }
    }
  }

  private removeConnection(connectionId: string): void {
    const poolConn = this.connections.get(connectionId);
    if (!poolConn) return;

    const index = this.availableConnections.indexOf(connectionId);
    if (index >= 0) {
      this.availableConnections.splice(index, 1);
    }

    this.connections.delete(connectionId);
    this.stats.totalDestroyed++;

    poolConn.connection.close('pool-removal').catch(error => {
      this.logger.pool(this.nodeId, `Error closing connection ${connectionId}: ${errorMessage(error)}`);
    });

    this.emit('connection-removed', {
      connectionId,
      poolSize: this.connections.size
    });
  }

  private getInUseCount(): number {
    return Array.from(this.connections.values()).filter(conn => conn.inUse).length;
  }

  /**
   * Get pool statistics
   */
  getStats(): PoolStats {
    const avgAcquireTime = this.stats.acquireTimes.length > 0
      ? this.stats.acquireTimes.reduce((sum, time) => sum + time, 0) / this.stats.acquireTimes.length
      : 0;
    const inUse = this.getInUseCount();

    return {
      totalConnections: this.connections.size,
      inUseConnections: inUse,
      idleConnections: this.connections.size - inUse,
      queuedRequests: this.waitingQueue.length,
      totalAcquired: this.stats.totalAcquired,
      totalReleased: this.stats.totalReleased,
      totalCreated: this.stats.totalCreated,
      totalDestroyed: this.stats.totalDestroyed,
      peakInUse: this.stats.peakInUse,
      averageAcquireTime: avgAcquireTime
    };
  }

  /**
   * Reject queued acquirers and close every connection, in use or not
   */
  async drain(): Promise<void> {
    if (this.draining && this.connections.size === 0) return;
    this.draining = true;
    this.logger.pool(this.nodeId, 'draining');

    for (const waiter of [...this.waitingQueue]) {
      this.removeWaiter(waiter);
      waiter.reject(new ConnectionError(this.nodeId, 'Pool is draining'));
    }

    const closing = Array.from(this.connections.values()).map(poolConn => poolConn.connection.close('pool-draining'));
    this.stats.totalDestroyed += this.connections.size;
    this.connections.clear();
    this.availableConnections = [];

    const results = await Promise.allSettled(closing);
    for (const result of results) {
      if (result.status === 'rejected') {
        this.logger.pool(this.nodeId, `Error closing connection: ${errorMessage(result.reason)}`);
      }
    }

    this.emit('drained');
    this.logger.pool(this.nodeId, 'drained');
  }
}
