import { CommanderError } from 'commander';
import { createProgram } from '../../../src/cli/program';
import { HarnessConfiguration } from '../../../src/config/HarnessConfiguration';
import { createLogger } from '../../../src/common/logger';
import { RunReport } from '../../../src/types';
import { FakeCluster, fakeCluster } from '../../helpers/fakePostgres';

const environment = {
  PRIMARY_IP: '10.0.0.10',
  REPLICA_1_IP: '10.0.0.11',
  REPLICA_2_IP: '10.0.0.12',
  POSTGRES_PASSWORD: 'test-secret'
};

interface CliRun {
  out: string[];
  err: string[];
  exitCode: number | undefined;
}

async function runCli(
  cluster: FakeCluster,
  args: string[],
  overrides: { environment?: Record<string, string | undefined>; signal?: AbortSignal } = {}
): Promise<CliRun> {
  const result: CliRun = { out: [], err: [], exitCode: undefined };
  const program = createProgram({
    environment: overrides.environment ?? environment,
    clientFactory: cluster.clientFactory,
    logger: createLogger({ enableTestMode: true }),
    out: text => result.out.push(text),
    err: text => result.err.push(text),
    setExitCode: code => { result.exitCode = code; },
    signal: overrides.signal
  });
  await program.parseAsync(['node', 'pg-replication-harness', ...args]);
  return result;
}

describe('command line', () => {
  let cluster: FakeCluster;

  beforeEach(() => {
    cluster = fakeCluster(2);
  });

  describe('run', () => {
    it('verifies the cluster and exits 0', async () => {
      const { out, exitCode } = await runCli(cluster, ['run', '--writes', '30', '--reads', '12']);

      expect(exitCode).toBe(0);
      expect(cluster.rowCount()).toBe(30);
      const lines = out.join('\n').split('\n');
      expect(lines).toContain('RESULT: PASSED');
      expect(lines.some(line => /^ {2}30\/30 committed \(ids 1\.\.30\) in \d+\.\d{2}s$/.test(line))).toBe(true);
    });

    it('is the default command', async () => {
      const { exitCode } = await runCli(cluster, ['--writes', '5', '--reads', '5']);

      expect(exitCode).toBe(0);
      expect(cluster.rowCount()).toBe(5);
    });

    it('prints the report as JSON', async () => {
      const { out, exitCode } = await runCli(cluster, ['run', '--writes', '4', '--reads', '0', '--json']);
      const report: Pick<RunReport, 'status' | 'reads' | 'replicas'> = JSON.parse(out[0]);

      expect(exitCode).toBe(0);
      expect(report.status).toBe('passed');
      expect(report.reads).toEqual([]);
      expect(report.replicas).toEqual(['replica-1', 'replica-2']);
    });

    it('exits 1 when a replica has not caught up', async () => {
      cluster.holdReplication('replica-2');

      const { out, exitCode } = await runCli(cluster, ['run', '--writes', '10', '--reads', '10', '--wait', '0']);

      expect(exitCode).toBe(1);
      expect(out.join('\n').split('\n')).toContain('RESULT: FAILED');
    });

    it('exits 2 on a configuration error', async () => {
      const { err, exitCode } = await runCli(cluster, ['run'], { environment: { PRIMARY_IP: '10.0.0.10' } });

      expect(exitCode).toBe(2);
      expect(err[0]).toMatch(/^configuration error: credentials\.password: /);
      expect(cluster.connectCount('primary')).toBe(0);
    });

    it('exits 3 when cancelled', async () => {
      const controller = new AbortController();
      controller.abort(new Error('interrupted'));

      const { exitCode } = await runCli(cluster, ['run'], { signal: controller.signal });

      expect(exitCode).toBe(3);
      expect(cluster.rowCount()).toBe(0);
    });

    it('rejects an unknown settle mode before running', async () => {
      const program = createProgram({
        environment,
        clientFactory: cluster.clientFactory,
        logger: createLogger({ enableTestMode: true }),
        out: () => undefined,
        err: () => undefined,
        setExitCode: () => undefined
      });

      await expect(program.parseAsync(['node', 'pg-replication-harness', 'run', '--settle', 'eventually']))
        .rejects.toBeInstanceOf(CommanderError);
      expect(cluster.connectCount('primary')).toBe(0);
    });

    it('rejects a negative write count', async () => {
      const program = createProgram({
        environment,
        clientFactory: cluster.clientFactory,
        logger: createLogger({ enableTestMode: true }),
        out: () => undefined,
        err: () => undefined,
        setExitCode: () => undefined
      });

      await expect(program.parseAsync(['node', 'pg-replication-harness', 'run', '--writes', '-5']))
        .rejects.toMatchObject({ exitCode: 1 });
    });
  });

  describe('latency', () => {
    it('summarizes every replica', async () => {
      const { out, exitCode } = await runCli(cluster, ['latency', '--samples', '1']);
      const lines = out[0].split('\n');

      expect(exitCode).toBe(0);
      expect(lines[0]).toBe('Replication latency by replica:');
      expect(lines).toHaveLength(3);
      expect(lines[1]).toMatch(/^ {2}replica-1: 1\/1 samples, avg /);
    });
  });

  describe('config', () => {
    it('prints the resolved configuration with the password masked', async () => {
      const { out, exitCode } = await runCli(cluster, ['config']);
      const printed = new HarnessConfiguration().parseFromYaml(out[0]);

      expect(exitCode).toBe(0);
      expect(out[0]).not.toContain('test-secret');
      expect(printed.credentials?.password).toBe('********');
      expect(printed.nodes?.map(node => node.host)).toEqual(['10.0.0.10', '10.0.0.11', '10.0.0.12']);
    });
  });
});
