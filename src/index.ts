// Main entry point for pg-replication-harness library

// Types
export * from './types';

// Configuration
export * from './config/HarnessConfiguration';

// Cluster
export * from './cluster/NodeRegistry';

// Connection modules
export * from './connections/Connection';
export * from './connections/ConnectionPool';
export * from './connections/ConnectionPoolManager';
export * from './connections/adapters/PgClientAdapter';
export * from './connections/types';

// Harness stages
export * from './harness/queries';
export * from './harness/SchemaBootstrapper';
export * from './harness/ReplicaStatusProber';
export * from './harness/WriteLoadGenerator';
export * from './harness/SettleCoordinator';
export * from './harness/WorkerPool';
export * from './harness/ReadLoadDispatcher';
export * from './harness/ConsistencyVerifier';
export * from './harness/ReportAggregator';
export * from './harness/ReplicationHarness';

// Monitoring
export * from './monitoring/ReplicationLatencyMonitor';

// Common modules
export * from './common/errors';
export * from './common/logger';
export * from './common/utils';
