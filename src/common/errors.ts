import { Stage } from '../types';

export interface HarnessErrorOptions {
  nodeId?: string;
  cause?: unknown;
}

/**
 * Base class for every failure the harness reports. Carries the stage it
 * happened in and, where one is involved, the node.
 */
export class HarnessError extends Error {
  readonly stage: Stage;
  readonly nodeId?: string;

  constructor(stage: Stage, message: string, options: HarnessErrorOptions = {}) {
    super(message, options.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = new.target.name;
    this.stage = stage;
    this.nodeId = options.nodeId;
  }
}

export class ConfigurationError extends HarnessError {
  constructor(message: string, readonly field?: string) {
    super('configuration', field ? `${field}: ${message}` : message);
  }
}

export class ConnectionError extends HarnessError {
  constructor(nodeId: string, message: string, cause?: unknown) {
    super('connect', message, { nodeId, cause });
  }
}

export class SchemaError extends HarnessError {
  constructor(nodeId: string, message: string, cause?: unknown) {
    super('bootstrap', message, { nodeId, cause });
  }
}

export class TopologyError extends HarnessError {
  constructor(nodeId: string, message: string) {
    super('probe', message, { nodeId });
  }
}

export class WriteError extends HarnessError {
  constructor(nodeId: string, message: string, readonly committedCount: number, cause?: unknown) {
    super('write', message, { nodeId, cause });
  }
}

export class SettleTimeoutError extends HarnessError {
  constructor(readonly laggingNodes: string[], readonly waitedMs: number) {
    super('settle', `replicas still behind after ${waitedMs}ms: ${laggingNodes.join(', ')}`);
  }
}

export class ReadError extends HarnessError {
  constructor(nodeId: string, message: string, cause?: unknown) {
    super('read', message, { nodeId, cause });
  }
}

export class ConsistencyError extends HarnessError {
  constructor(nodeId: string, message: string, readonly mismatchedIds: number[] = []) {
    super('verify', message, { nodeId });
  }
}

export class CancelledError extends HarnessError {
  constructor(stage: Stage, reason?: string) {
    super(stage, reason ? `run cancelled: ${reason}` : 'run cancelled');
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Extract the SQLSTATE code a database driver attaches to its errors.
 */
export function sqlState(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error) {
    const { code } = error;
    return typeof code === 'string' ? code : undefined;
  }
  return undefined;
}
