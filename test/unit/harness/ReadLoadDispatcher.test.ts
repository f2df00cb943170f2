import { ReadLoadDispatcher } from '../../../src/harness/ReadLoadDispatcher';
import { SchemaBootstrapper } from '../../../src/harness/SchemaBootstrapper';
import { WriteLoadGenerator } from '../../../src/harness/WriteLoadGenerator';
import { NodeRegistry } from '../../../src/cluster/NodeRegistry';
import { ConnectionPoolManager } from '../../../src/connections/ConnectionPoolManager';
import { ReadError } from '../../../src/common/errors';
import { TestRecord } from '../../../src/types';
import { FakeCluster, FakePgError, fakeCluster } from '../../helpers/fakePostgres';
import { openPools } from '../../helpers/pools';

describe('ReadLoadDispatcher', () => {
  let cluster: FakeCluster;
  let registry: NodeRegistry;
  let pools: ConnectionPoolManager;

  async function write(count: number): Promise<TestRecord[]> {
    return pools.withConnection('primary', async connection => {
      await new SchemaBootstrapper(cluster.queries).ensureSchema(connection);
      return new WriteLoadGenerator(cluster.queries, { batchSize: 50 }).writeRecords(connection, count);
    });
  }

  function readIds(nodeId: string): number[] {
    return cluster.queriesOn(nodeId, cluster.queries.selectById)
      .map(query => Number(query.values[0]))
      .sort((a, b) => a - b);
  }

  function tickingClock(): () => number {
    let now = 0;
    return () => (now += 100);
  }

  beforeEach(async () => {
    cluster = fakeCluster(2);
    ({ registry, pools } = await openPools(cluster, 2));
  });

  afterEach(async () => {
    await pools.closeAll();
  });

  it('splits reads evenly and finds every record on healthy replicas', async () => {
    const records = await write(10);
    const dispatcher = new ReadLoadDispatcher(cluster.queries, pools, { selection: 'sequential', clock: tickingClock() });

    const { results, failures } = await dispatcher.dispatchReads(registry.replicas(), records, 10);

    expect(failures).toEqual([]);
    expect(results.map(result => [result.nodeId, result.requested, result.recordsReturned, result.misses])).toEqual([
      ['replica-1', 5, 5, 0],
      ['replica-2', 5, 5, 0]
    ]);
    expect(readIds('replica-1')).toEqual([1, 2, 3, 4, 5]);
    expect(readIds('replica-2')).toEqual([6, 7, 8, 9, 10]);

    for (const result of results) {
      expect(result.elapsedMs).toBeGreaterThan(0);
      expect(result.throughput).toBeCloseTo(5 / (result.elapsedMs / 1000));
    }
  });

  it('draws random ids from the written records', async () => {
    const records = await write(10);
    const dispatcher = new ReadLoadDispatcher(cluster.queries, pools, { random: () => 0 });

    await dispatcher.dispatchReads(registry.replicas(), records, 4);

    expect(readIds('replica-1')).toEqual([1, 1]);
  });

  it('counts reads that find nothing as misses', async () => {
    cluster.holdReplication('replica-2');
    const records = await write(10);
    const dispatcher = new ReadLoadDispatcher(cluster.queries, pools, { selection: 'sequential' });

    const { results, failures } = await dispatcher.dispatchReads(registry.replicas(), records, 10);
    const lagging = results.find(result => result.nodeId === 'replica-2');

    expect(failures).toEqual([]);
    expect(lagging).toMatchObject({ recordsReturned: 0, misses: 5, missedIds: [6, 7, 8, 9, 10], throughput: 0 });
  });

  it('returns no results for zero reads', async () => {
    const records = await write(3);
    const dispatcher = new ReadLoadDispatcher(cluster.queries, pools);

    await expect(dispatcher.dispatchReads(registry.replicas(), records, 0)).resolves.toEqual({ results: [], failures: [] });
  });

  it('skips reads when nothing was written', async () => {
    await write(0);
    const dispatcher = new ReadLoadDispatcher(cluster.queries, pools);

    const { results } = await dispatcher.dispatchReads(registry.replicas(), [], 10);

    expect(results.map(result => [result.requested, result.recordsReturned, result.throughput])).toEqual([[0, 0, 0], [0, 0, 0]]);
    expect(cluster.queriesOn('replica-1', cluster.queries.selectById)).toHaveLength(0);
  });

  it('counts failed reads separately from misses', async () => {
    const records = await write(10);
    cluster.failQueries('replica-1', text => text === cluster.queries.selectById,
      new FakePgError('canceling statement due to statement timeout', '57014'), 2);
    const dispatcher = new ReadLoadDispatcher(cluster.queries, pools, { selection: 'sequential' });

    const { results, failures } = await dispatcher.dispatchReads(registry.replicas(), records, 10);

    expect(results[0]).toMatchObject({ nodeId: 'replica-1', recordsReturned: 3, misses: 0, failedReads: 2 });
    expect(failures).toHaveLength(1);
    expect(failures[0]).toBeInstanceOf(ReadError);
    expect(failures[0].message).toBe('2 of 5 read(s) failed; first error: canceling statement due to statement timeout');
  });

  it('keeps concurrency per replica at pool capacity', async () => {
    const records = await write(40);
    const dispatcher = new ReadLoadDispatcher(cluster.queries, pools, { selection: 'sequential' });

    await dispatcher.dispatchReads(registry.replicas(), records, 40);

    expect(cluster.peakConcurrency('replica-1')).toBe(2);
    expect(cluster.peakConcurrency('replica-2')).toBe(2);
  });
});
