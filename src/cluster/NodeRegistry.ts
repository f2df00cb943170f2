import { ClusterNode, Credential, NodeEndpoint } from '../types';
import { ConfigurationError } from '../common/errors';
import { isValidAddress } from '../common/utils';

/**
 * The validated set of cluster members for one run: exactly one primary and
 * at least one replica, all sharing one credential.
 */
export class NodeRegistry {
  private readonly nodes: ReadonlyArray<ClusterNode>;
  private readonly byId: ReadonlyMap<string, ClusterNode>;

  private constructor(nodes: ClusterNode[]) {
    this.nodes = Object.freeze(nodes);
    this.byId = new Map(nodes.map(node => [node.id, node]));
  }

  static create(endpoints: readonly NodeEndpoint[], credential: Credential): NodeRegistry {
    if (!credential.user) {
      throw new ConfigurationError('is required', 'credentials.user');
    }
    if (!credential.password) {
      throw new ConfigurationError('is required', 'credentials.password');
    }

    const primaries = endpoints.filter(endpoint => endpoint.role === 'primary');
    if (primaries.length !== 1) {
      throw new ConfigurationError(`exactly one primary is required, found ${primaries.length}`, 'nodes');
    }
    if (!endpoints.some(endpoint => endpoint.role === 'replica')) {
      throw new ConfigurationError('at least one replica is required', 'nodes');
    }

    const sharedCredential = Object.freeze({ ...credential });
    const seen = new Set<string>();
    const nodes = endpoints.map((endpoint, index) => {
      const field = `nodes[${index}]`;
      if (seen.has(endpoint.id)) {
        throw new ConfigurationError(`duplicate node id "${endpoint.id}"`, `${field}.id`);
      }
      seen.add(endpoint.id);

      if (!isValidAddress(endpoint.host)) {
        throw new ConfigurationError(`invalid host "${endpoint.host}"`, `${field}.host`);
      }
      if (!Number.isInteger(endpoint.port) || endpoint.port < 1 || endpoint.port > 65535) {
        throw new ConfigurationError(`invalid port ${endpoint.port}`, `${field}.port`);
      }
      if (!endpoint.database) {
        throw new ConfigurationError('is required', `${field}.database`);
      }

      return Object.freeze({ ...endpoint, credential: sharedCredential });
    });

    return new NodeRegistry(nodes);
  }

  primary(): ClusterNode {
    const primary = this.nodes.find(node => node.role === 'primary');
    if (!primary) {
      throw new ConfigurationError('registry has no primary', 'nodes');
    }
    return primary;
  }

  replicas(): ClusterNode[] {
    return this.nodes.filter(node => node.role === 'replica');
  }

  all(): ClusterNode[] {
    return [...this.nodes];
  }

  get(id: string): ClusterNode | undefined {
    return this.byId.get(id);
  }

  size(): number {
    return this.nodes.length;
  }
}
