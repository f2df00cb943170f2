import {
  AggregateInput,
  EXIT_CANCELLED,
  EXIT_CONFIGURATION,
  EXIT_FAILED,
  EXIT_PASSED,
  aggregate,
  formatReport
} from '../../../src/harness/ReportAggregator';
import { CancelledError, ConfigurationError, ConsistencyError, ReadError } from '../../../src/common/errors';
import { ConsistencyReport, ReadResult } from '../../../src/types';

function readResult(nodeId: string, overrides: Partial<ReadResult> = {}): ReadResult {
  return {
    nodeId,
    requested: 500,
    recordsReturned: 500,
    misses: 0,
    missedIds: [],
    failedReads: 0,
    elapsedMs: 1250,
    throughput: 400,
    ...overrides
  };
}

function consistency(nodeId: string, overrides: Partial<ConsistencyReport> = {}): ConsistencyReport {
  return {
    nodeId,
    matched: true,
    expectedCount: 1000,
    observedCount: 1000,
    checkedCount: 1000,
    depth: 'full',
    mismatchedIds: [],
    ...overrides
  };
}

function healthyInput(overrides: Partial<AggregateInput> = {}): AggregateInput {
  return {
    startedAt: new Date('2024-05-01T10:00:00Z'),
    finishedAt: new Date('2024-05-01T10:00:03.5Z'),
    primary: 'primary',
    replicas: ['replica-1', 'replica-2'],
    statuses: [
      { nodeId: 'primary', role: 'primary', inRecovery: false, lagSeconds: null, probedAt: 0 },
      { nodeId: 'replica-1', role: 'replica', inRecovery: true, lagSeconds: 0, probedAt: 0 },
      { nodeId: 'replica-2', role: 'replica', inRecovery: true, lagSeconds: 0.25, probedAt: 0 }
    ],
    writes: { requested: 1000, committed: 1000, firstId: 1, lastId: 1000, elapsedMs: 2000, walPosition: '0/3000060' },
    settle: { mode: 'poll', waitedMs: 120, caughtUp: true, laggingNodes: [] },
    reads: [readResult('replica-1'), readResult('replica-2')],
    consistency: [consistency('replica-1'), consistency('replica-2')],
    errors: [],
    ...overrides
  };
}

describe('aggregate', () => {
  it('passes a run where every replica matched', () => {
    const report = aggregate(healthyInput());

    expect(report.status).toBe('passed');
    expect(report.passed).toBe(true);
    expect(report.exitCode).toBe(EXIT_PASSED);
    expect(report.failures).toEqual([]);
    expect(Object.isFrozen(report)).toBe(true);
  });

  it('is pure', () => {
    const input = healthyInput();
    expect(aggregate(input)).toEqual(aggregate(input));
  });

  it('fails when any replica mismatched', () => {
    const report = aggregate(healthyInput({
      consistency: [consistency('replica-1'), consistency('replica-2', { matched: false, observedCount: 990, mismatchedIds: [991] })],
      errors: [new ConsistencyError('replica-2', 'expected 1000 row(s), observed 990; 1 mismatched id(s)', [991])]
    }));

    expect(report.status).toBe('failed');
    expect(report.exitCode).toBe(EXIT_FAILED);
    expect(report.failures).toEqual([{
      stage: 'verify',
      nodeId: 'replica-2',
      kind: 'ConsistencyError',
      message: 'expected 1000 row(s), observed 990; 1 mismatched id(s)'
    }]);
  });

  it('fails on an unmatched report even without a recorded error', () => {
    const report = aggregate(healthyInput({
      consistency: [consistency('replica-1')]
    }));

    expect(report.passed).toBe(false);
    expect(report.failures).toEqual([
      { stage: 'verify', nodeId: 'replica-2', kind: 'VerificationFailure', message: 'no consistency report for replica' }
    ]);
  });

  it('fails when a replica is not in recovery', () => {
    const input = healthyInput();
    const report = aggregate({
      ...input,
      statuses: input.statuses.map(status => (status.nodeId === 'replica-1' ? { ...status, inRecovery: false } : status))
    });

    expect(report.failures.map(failure => failure.message)).toEqual(['replica is not in recovery mode']);
  });

  it('fails read errors', () => {
    const report = aggregate(healthyInput({
      errors: [new ReadError('replica-1', '3 of 500 read(s) failed; first error: timeout')]
    }));

    expect(report.exitCode).toBe(EXIT_FAILED);
    expect(report.failures[0]).toMatchObject({ stage: 'read', kind: 'ReadError' });
  });

  it('uses the configuration exit code for configuration errors', () => {
    const report = aggregate(healthyInput({
      writes: null,
      errors: [new ConfigurationError('exactly one primary is required, found 0', 'nodes')]
    }));

    expect(report.exitCode).toBe(EXIT_CONFIGURATION);
  });

  it('reports cancellation over every other outcome', () => {
    const report = aggregate(healthyInput({
      reads: [],
      consistency: [],
      errors: [new CancelledError('read', 'interrupted')]
    }));

    expect(report.status).toBe('cancelled');
    expect(report.exitCode).toBe(EXIT_CANCELLED);
    expect(report.failures).toEqual([
      { stage: 'read', nodeId: undefined, kind: 'CancelledError', message: 'run cancelled: interrupted' }
    ]);
  });
});

describe('formatReport', () => {
  it('renders per-replica reads and consistency', () => {
    const text = formatReport(aggregate(healthyInput()));
    const lines = text.split('\n');

    expect(lines[1]).toBe('REPLICATION VERIFICATION REPORT');
    expect(lines).toContain('Duration: 3.50s');
    expect(lines).toContain('  replica-2 [replica] in_recovery=true lag=0.25s');
    expect(lines).toContain('  primary [primary] in_recovery=false lag=unavailable');
    expect(lines).toContain('  1000/1000 committed (ids 1..1000) in 2.00s');
    expect(lines).toContain('Settle: poll 0.12s (caught up)');
    expect(lines).toContain('    - Successful reads: 500/500');
    expect(lines).toContain('    - Time: 1.25s');
    expect(lines).toContain('    - Throughput: 400.00 reads/s');
    expect(lines).toContain('  replica-1: PASS (1000/1000 rows, 1000 compared, full)');
    expect(lines[lines.length - 2]).toBe('RESULT: PASSED');
  });

  it('lists mismatched ids and failures', () => {
    const ids = Array.from({ length: 25 }, (_, index) => index + 1);
    const report = aggregate(healthyInput({
      consistency: [consistency('replica-1'), consistency('replica-2', { matched: false, observedCount: 975, mismatchedIds: ids })],
      warnings: ['replicas still behind after 0ms: replica-2'],
      errors: [new ConsistencyError('replica-2', 'expected 1000 row(s), observed 975; 25 mismatched id(s)', ids)]
    }));

    const lines = formatReport(report).split('\n');

    expect(lines).toContain('  replica-2: FAIL (975/1000 rows, 1000 compared, full)');
    expect(lines).toContain('    mismatched ids: 1, 2, 3, 4, 5, 6, 7, 8, 9, 10, 11, 12, 13, 14, 15, 16, 17, 18, 19, 20, ... (5 more)');
    expect(lines).toContain('  ! replicas still behind after 0ms: replica-2');
    expect(lines).toContain('  x [verify/replica-2] ConsistencyError: expected 1000 row(s), observed 975; 25 mismatched id(s)');
    expect(lines[lines.length - 2]).toBe('RESULT: FAILED');
  });

  it('notes when no reads ran', () => {
    const lines = formatReport(aggregate(healthyInput({ reads: [] }))).split('\n');
    expect(lines).toContain('  (no reads)');
  });
});
