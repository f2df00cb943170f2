import {
  ConsistencyReport,
  PoolSnapshot,
  ReadResult,
  ReplicationStatus,
  RunReport,
  RunStatus,
  SettleOutcome,
  StageFailure,
  WriteSummary
} from '../types';
import { CancelledError, ConfigurationError, HarnessError } from '../common/errors';

export const EXIT_PASSED = 0;
export const EXIT_FAILED = 1;
export const EXIT_CONFIGURATION = 2;
export const EXIT_CANCELLED = 3;

export interface AggregateInput {
  startedAt: Date;
  finishedAt: Date;
  primary: string;
  replicas: string[];
  statuses: ReplicationStatus[];
  writes: WriteSummary | null;
  settle: SettleOutcome | null;
  reads: ReadResult[];
  consistency: ConsistencyReport[];
  pools?: PoolSnapshot[];
  warnings?: string[];
  errors: HarnessError[];
}

export function toStageFailure(error: HarnessError): StageFailure {
  return {
    stage: error.stage,
    nodeId: error.nodeId,
    kind: error.name,
    message: error.message
  };
}

/**
 * Merge every stage's output into the run's verdict. Pure: the same input
 * always yields the same report.
 */
export function aggregate(input: AggregateInput): RunReport {
  const failures = input.errors.map(toStageFailure);
  const cancelled = input.errors.some(error => error instanceof CancelledError);

  // Verdicts that must hold even when no stage raised an error for them
  if (!cancelled && failures.length === 0) {
    const primaryStatus = input.statuses.find(status => status.nodeId === input.primary);
    if (!primaryStatus) {
      failures.push(missing('probe', input.primary, 'no recovery status for the primary'));
    }
    for (const replica of input.replicas) {
      const status = input.statuses.find(candidate => candidate.nodeId === replica);
      if (!status) {
        failures.push(missing('probe', replica, 'no recovery status for replica'));
      } else if (!status.inRecovery) {
        failures.push(missing('probe', replica, 'replica is not in recovery mode'));
      }

      const report = input.consistency.find(candidate => candidate.nodeId === replica);
      if (!report) {
        failures.push(missing('verify', replica, 'no consistency report for replica'));
      } else if (!report.matched) {
        failures.push(missing('verify', replica, 'replica data does not match the primary'));
      }
    }
    if (!input.writes) {
      failures.push(missing('write', input.primary, 'write stage did not complete'));
    } else if (input.writes.committed !== input.writes.requested) {
      failures.push(missing('write', input.primary,
        `committed ${input.writes.committed} of ${input.writes.requested} record(s)`));
    }
  }

  let status: RunStatus = 'passed';
  let exitCode = EXIT_PASSED;
  if (cancelled) {
    status = 'cancelled';
    exitCode = EXIT_CANCELLED;
  } else if (failures.length > 0) {
    status = 'failed';
    exitCode = input.errors.some(error => error instanceof ConfigurationError) ? EXIT_CONFIGURATION : EXIT_FAILED;
  }

  return Object.freeze({
    status,
    passed: status === 'passed',
    exitCode,
    startedAt: input.startedAt,
    finishedAt: input.finishedAt,
    primary: input.primary,
    replicas: [...input.replicas],
    statuses: [...input.statuses],
    writes: input.writes,
    settle: input.settle,
    reads: [...input.reads],
    consistency: [...input.consistency],
    pools: [...(input.pools ?? [])],
    warnings: [...(input.warnings ?? [])],
    failures
  });
}

function missing(stage: StageFailure['stage'], nodeId: string, message: string): StageFailure {
  return { stage, nodeId, kind: 'VerificationFailure', message };
}

const RULE = '='.repeat(70);

function formatLag(lagSeconds: number | null): string {
  return lagSeconds === null ? 'unavailable' : `${lagSeconds.toFixed(2)}s`;
}

function formatIds(ids: number[], limit = 20): string {
  const shown = ids.slice(0, limit).join(', ');
  return ids.length > limit ? `${shown}, ... (${ids.length - limit} more)` : shown;
}

/**
 * Human-readable rendering of a run report
 */
export function formatReport(report: RunReport): string {
  const lines: string[] = [];
  const seconds = (report.finishedAt.getTime() - report.startedAt.getTime()) / 1000;

  lines.push(RULE, 'REPLICATION VERIFICATION REPORT', RULE);
  lines.push(`Primary:  ${report.primary}`);
  lines.push(`Replicas: ${report.replicas.join(', ')}`);
  lines.push(`Duration: ${seconds.toFixed(2)}s`);

  lines.push('', 'Node status:');
  if (report.statuses.length === 0) {
    lines.push('  (not probed)');
  }
  for (const status of report.statuses) {
    lines.push(`  ${status.nodeId} [${status.role}] in_recovery=${status.inRecovery} lag=${formatLag(status.lagSeconds)}`);
  }

  lines.push('', 'Writes:');
  if (report.writes) {
    const range = report.writes.firstId === null ? 'none' : `${report.writes.firstId}..${report.writes.lastId}`;
    lines.push(`  ${report.writes.committed}/${report.writes.requested} committed (ids ${range}) in ${(report.writes.elapsedMs / 1000).toFixed(2)}s`);
  } else {
    lines.push('  (not run)');
  }

  if (report.settle) {
    const verdict = report.settle.mode === 'fixed' ? 'fixed delay' : report.settle.caughtUp ? 'caught up' : 'timed out';
    lines.push('', `Settle: ${report.settle.mode} ${(report.settle.waitedMs / 1000).toFixed(2)}s (${verdict})`);
  }

  lines.push('', 'Read performance by replica:');
  if (report.reads.length === 0) {
    lines.push('  (no reads)');
  }
  for (const read of report.reads) {
    lines.push(`  ${read.nodeId}:`);
    lines.push(`    - Successful reads: ${read.recordsReturned}/${read.requested}`);
    lines.push(`    - Misses: ${read.misses}`);
    if (read.failedReads > 0) {
      lines.push(`    - Failed reads: ${read.failedReads}`);
    }
    lines.push(`    - Time: ${(read.elapsedMs / 1000).toFixed(2)}s`);
    lines.push(`    - Throughput: ${read.throughput.toFixed(2)} reads/s`);
  }

  lines.push('', 'Consistency by replica:');
  if (report.consistency.length === 0) {
    lines.push('  (not verified)');
  }
  for (const check of report.consistency) {
    const verdict = check.matched ? 'PASS' : 'FAIL';
    lines.push(`  ${check.nodeId}: ${verdict} (${check.observedCount}/${check.expectedCount} rows, ${check.checkedCount} compared, ${check.depth})`);
    if (check.mismatchedIds.length > 0) {
      lines.push(`    mismatched ids: ${formatIds(check.mismatchedIds)}`);
    }
  }

  if (report.warnings.length > 0) {
    lines.push('', 'Warnings:');
    for (const warning of report.warnings) {
      lines.push(`  ! ${warning}`);
    }
  }

  if (report.failures.length > 0) {
    lines.push('', 'Failures:');
    for (const failure of report.failures) {
      const where = failure.nodeId ? `${failure.stage}/${failure.nodeId}` : failure.stage;
      lines.push(`  x [${where}] ${failure.kind}: ${failure.message}`);
    }
  }

  lines.push('', RULE, `RESULT: ${report.status.toUpperCase()}`, RULE);
  return lines.join('\n');
}
