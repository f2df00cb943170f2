/**
 * Logging utility for the replication harness
 * Provides configurable logging for different components
 *
 * Categories, each behind its own flag:
 * - harness: run lifecycle, stage transitions and pool manager open/close
 * - stage: progress inside bootstrap, probe, write, settle, read and verify
 * - pool: per-node connection pool activity such as initialize, release and drain
 */

export interface LoggingConfig {
  enableHarnessLogs?: boolean;
  enableStageLogs?: boolean;
  enablePoolLogs?: boolean;
  enableTestMode?: boolean;
}

export class HarnessLogger {
  constructor(private config: LoggingConfig = {}) {
    // Auto-detect test mode if not explicitly set
    if (this.config.enableTestMode === undefined) {
      this.config.enableTestMode = process.env.NODE_ENV === 'test' || process.env.JEST_WORKER_ID !== undefined;
    }
  }

  /**
   * Log run-level messages
   */
  harness(message: string, ...args: unknown[]): void {
    if (this.config.enableHarnessLogs && !this.config.enableTestMode) {
      console.log(`[HARNESS] ${message}`, ...args);
    }
  }

  /**
   * Log progress inside a stage
   */
  stage(stage: string, message: string, ...args: unknown[]): void {
    if (this.config.enableStageLogs && !this.config.enableTestMode) {
      console.log(`[${stage.toUpperCase()}] ${message}`, ...args);
    }
  }

  /**
   * Log connection pool activity
   */
  pool(nodeId: string, message: string, ...args: unknown[]): void {
    if (this.config.enablePoolLogs && !this.config.enableTestMode) {
      console.log(`[POOL:${nodeId}] ${message}`, ...args);
    }
  }

  /**
   * Log error messages (always shown unless in test mode)
   */
  error(message: string, ...args: unknown[]): void {
    if (!this.config.enableTestMode) {
      console.error(`[ERROR] ${message}`, ...args);
    }
  }

  /**
   * Log warning messages (always shown unless in test mode)
   */
  warn(message: string, ...args: unknown[]): void {
    if (!this.config.enableTestMode) {
      console.warn(`[WARN] ${message}`, ...args);
    }
  }

  /**
   * Log debug messages (only in development)
   */
  debug(message: string, ...args: unknown[]): void {
    if (process.env.NODE_ENV === 'development' && !this.config.enableTestMode) {
      console.debug(`[DEBUG] ${message}`, ...args);
    }
  }
}

/**
 * Create a logger instance with the given configuration
 */
export function createLogger(config: LoggingConfig = {}): HarnessLogger {
  return new HarnessLogger(config);
}

