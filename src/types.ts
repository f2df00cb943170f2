/**
 * Type definitions for the replication harness
 */

export type NodeRole = 'primary' | 'replica';

export interface Credential {
  user: string;
  password: string;
}

export interface NodeEndpoint {
  id: string;
  role: NodeRole;
  host: string;
  port: number;
  database: string;
}

/**
 * A registered cluster member. Created once from configuration, never mutated.
 */
export interface ClusterNode extends NodeEndpoint {
  credential: Credential;
}

export interface TestRecord {
  id: number;
  payload: string;
  createdAt: Date;
  randomValue: number;
}

export interface ReplicationStatus {
  nodeId: string;
  role: NodeRole;
  inRecovery: boolean;
  /** Seconds since the last replayed transaction; null when nothing has been replayed yet. */
  lagSeconds: number | null;
  probedAt: number;
}

export interface ReadResult {
  nodeId: string;
  requested: number;
  recordsReturned: number;
  misses: number;
  missedIds: number[];
  failedReads: number;
  elapsedMs: number;
  /** Records returned per second. */
  throughput: number;
}

export type VerificationDepth = 'full' | 'sample';

export interface ConsistencyReport {
  nodeId: string;
  matched: boolean;
  expectedCount: number;
  observedCount: number;
  checkedCount: number;
  depth: VerificationDepth;
  mismatchedIds: number[];
}

export type SettleMode = 'fixed' | 'poll';

export interface SettleOutcome {
  mode: SettleMode;
  waitedMs: number;
  caughtUp: boolean;
  laggingNodes: string[];
}

export interface WriteSummary {
  requested: number;
  committed: number;
  firstId: number | null;
  lastId: number | null;
  elapsedMs: number;
  /** Primary WAL position right after the last commit. */
  walPosition: string | null;
}

export type Stage =
  | 'configuration'
  | 'connect'
  | 'bootstrap'
  | 'probe'
  | 'write'
  | 'settle'
  | 'read'
  | 'verify'
  | 'report';

export interface StageFailure {
  stage: Stage;
  nodeId?: string;
  kind: string;
  message: string;
}

export interface PoolSnapshot {
  nodeId: string;
  capacity: number;
  totalCreated: number;
  totalAcquired: number;
  totalReleased: number;
  totalDestroyed: number;
  peakInUse: number;
  averageAcquireTime: number;
}

export type RunStatus = 'passed' | 'failed' | 'cancelled';

export interface RunReport {
  status: RunStatus;
  passed: boolean;
  exitCode: number;
  startedAt: Date;
  finishedAt: Date;
  primary: string;
  replicas: string[];
  statuses: ReplicationStatus[];
  writes: WriteSummary | null;
  settle: SettleOutcome | null;
  reads: ReadResult[];
  consistency: ConsistencyReport[];
  pools: PoolSnapshot[];
  warnings: string[];
  failures: StageFailure[];
}

export interface LatencySummary {
  nodeId: string;
  samples: number;
  successful: number;
  averageMs: number | null;
  minMs: number | null;
  maxMs: number | null;
  p95Ms: number | null;
}
