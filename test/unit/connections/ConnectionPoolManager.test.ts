import { NodeRegistry } from '../../../src/cluster/NodeRegistry';
import { ConnectionPoolManager } from '../../../src/connections/ConnectionPoolManager';
import { CancelledError, ConnectionError } from '../../../src/common/errors';
import { FakeCluster, fakeCluster } from '../../helpers/fakePostgres';
import { openPools } from '../../helpers/pools';

describe('ConnectionPoolManager', () => {
  let cluster: FakeCluster;
  let pools: ConnectionPoolManager | undefined;

  beforeEach(() => {
    cluster = fakeCluster(2);
  });

  afterEach(async () => {
    await pools?.closeAll();
    pools = undefined;
  });

  it('opens one pool per node', async () => {
    pools = (await openPools(cluster, 3)).pools;

    expect(pools.snapshot().map(snapshot => snapshot.nodeId)).toEqual(['primary', 'replica-1', 'replica-2']);
    expect(pools.capacityOf('replica-1')).toBe(3);
    expect(cluster.connectCount('primary')).toBe(1);
  });

  it('fails open with ConnectionError naming the unreachable node and closes the rest', async () => {
    cluster.failConnect('replica-2');
    const registry = NodeRegistry.create(cluster.nodes, { user: 'postgres', password: 'test-secret' });
    const manager = new ConnectionPoolManager(registry, cluster.clientFactory, { maxConnections: 2, acquireTimeout: 100 });

    const error = await manager.open().catch((reason: unknown) => reason);

    expect(error).toBeInstanceOf(ConnectionError);
    expect(error).toMatchObject({
      nodeId: 'replica-2',
      message: 'Cannot connect to 10.0.0.12:5432: connect ECONNREFUSED'
    });
    expect(cluster.openClients()).toBe(0);
  });

  it('never lets more queries run on a node than its pool allows', async () => {
    pools = (await openPools(cluster, 2)).pools;
    const manager = pools;

    await Promise.all(Array.from({ length: 8 }, () =>
      manager.withConnection('replica-1', connection => connection.query('SELECT 1').catch(() => undefined))
    ));

    expect(cluster.peakConcurrency('replica-1')).toBe(2);
    expect(manager.snapshot().find(snapshot => snapshot.nodeId === 'replica-1')).toMatchObject({
      capacity: 2,
      totalAcquired: 8,
      totalReleased: 8,
      peakInUse: 2
    });
  });

  it('discards a connection whose query was abandoned on cancellation', async () => {
    pools = (await openPools(cluster, 1)).pools;
    cluster.hangQueries('replica-1', () => true);

    const controller = new AbortController();
    const pending = pools.withConnection('replica-1', connection => connection.query('SELECT 1'), controller.signal);
    controller.abort('stop');

    await expect(pending).rejects.toBeInstanceOf(CancelledError);
    expect(pools.snapshot().find(snapshot => snapshot.nodeId === 'replica-1')?.totalDestroyed).toBe(1);
  });

  it('rejects unknown nodes', async () => {
    pools = (await openPools(cluster)).pools;
    expect(() => pools?.capacityOf('nowhere')).toThrow('No connection pool for node nowhere');
  });

  it('closes every client exactly once', async () => {
    pools = (await openPools(cluster)).pools;
    await pools.closeAll();
    await pools.closeAll();

    expect(cluster.openClients()).toBe(0);
  });
});
