import { Connection } from '../connections/Connection';
import { ConnectionPoolManager } from '../connections/ConnectionPoolManager';
import { NodeRegistry } from '../cluster/NodeRegistry';
import { ReplicationStatus } from '../types';
import { CancelledError, HarnessError, TopologyError, errorMessage } from '../common/errors';
import { HarnessLogger, createLogger } from '../common/logger';
import { RECOVERY_STATUS_QUERY, RecoveryStatusRow } from './queries';

export interface ProbeOutcome {
  statuses: ReplicationStatus[];
  failures: HarnessError[];
}

/**
 * Confirms replicas are replaying (read-only) and the primary is not, and
 * reads each node's replay lag.
 */
export class ReplicaStatusProber {
  private readonly logger: HarnessLogger;

  constructor(logger?: HarnessLogger, private readonly now: () => number = Date.now) {
    this.logger = logger ?? createLogger();
  }

  async probe(connection: Connection): Promise<ReplicationStatus> {
    const { rows } = await connection.query<RecoveryStatusRow>(RECOVERY_STATUS_QUERY);
    const row = rows[0];
    if (!row) {
      throw new Error('recovery status query returned no rows');
    }

    return {
      nodeId: connection.node.id,
      role: connection.node.role,
      inRecovery: row.in_recovery,
      lagSeconds: row.lag_seconds === null ? null : Math.max(0, Number(row.lag_seconds)),
      probedAt: this.now()
    };
  }

  /**
   * Probe every node. One node's failure never stops the others; failures
   * are returned alongside the statuses that were obtained.
   */
  async probeAll(registry: NodeRegistry, pools: ConnectionPoolManager, signal?: AbortSignal): Promise<ProbeOutcome> {
    const nodes = registry.all();
    const results = await Promise.allSettled(
      nodes.map(node => pools.withConnection(node, connection => this.probe(connection), signal))
    );

    const statuses: ReplicationStatus[] = [];
    const failures: HarnessError[] = [];

    results.forEach((result, index) => {
      const node = nodes[index];
      if (result.status === 'rejected') {
        if (result.reason instanceof CancelledError) {
          throw result.reason;
        }
        failures.push(result.reason instanceof HarnessError
          ? result.reason
          : new HarnessError('probe', `status probe failed: ${errorMessage(result.reason)}`, { nodeId: node.id, cause: result.reason }));
        this.logger.error(`${node.id}: status probe failed: ${errorMessage(result.reason)}`);
        return;
      }

      const status = result.value;
      statuses.push(status);

      if (node.role === 'replica' && !status.inRecovery) {
        failures.push(new TopologyError(node.id, `${node.id} is configured as a replica but is not in recovery mode`));
        this.logger.error(`${node.id} is NOT in recovery mode`);
      } else if (node.role === 'primary' && status.inRecovery) {
        failures.push(new TopologyError(node.id, `${node.id} is configured as the primary but is in recovery mode`));
        this.logger.error(`${node.id} (primary) is in recovery mode`);
      } else {
        const lag = status.lagSeconds === null ? 'unavailable' : `${status.lagSeconds.toFixed(2)}s`;
        this.logger.stage('probe', `${node.id} ${node.role} in_recovery=${status.inRecovery} lag=${lag}`);
      }
    });

    return { statuses, failures };
  }
}
