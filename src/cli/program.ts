import { Command, InvalidArgumentError, Option } from 'commander';
import { HarnessConfig, HarnessConfigOverrides, HarnessConfiguration } from '../config/HarnessConfiguration';
import { SqlClientFactory } from '../connections/types';
import { ReplicationHarness } from '../harness/ReplicationHarness';
import { EXIT_CANCELLED, EXIT_CONFIGURATION, EXIT_FAILED, EXIT_PASSED, formatReport } from '../harness/ReportAggregator';
import { formatLatencySummaries, measureReplicationLatency } from '../monitoring/ReplicationLatencyMonitor';
import { CancelledError, ConfigurationError, errorMessage } from '../common/errors';
import { HarnessLogger, createLogger } from '../common/logger';
import { SettleMode, VerificationDepth } from '../types';

const pkg = {
  name: 'pg-replication-harness',
  version: '0.1.0',
  description: 'Verify PostgreSQL streaming replication: write to the primary, read and compare on every replica'
};

export interface CliDependencies {
  environment?: Record<string, string | undefined>;
  clientFactory?: SqlClientFactory;
  logger?: HarnessLogger;
  out?: (text: string) => void;
  err?: (text: string) => void;
  setExitCode?: (code: number) => void;
  /** Aborts the active run; the entry point wires SIGINT to it. */
  signal?: AbortSignal;
}

interface RunOptions {
  writes?: number;
  reads?: number;
  wait?: number;
  config?: string;
  settle?: SettleMode;
  verify?: VerificationDepth;
  sampleSize?: number;
  batchSize?: number;
  timeout?: number;
  reset?: boolean;
  json?: boolean;
}

interface LatencyOptions {
  samples: number;
  config?: string;
  json?: boolean;
}

interface ConfigOptions {
  config?: string;
}

function parseCount(value: string): number {
  if (!/^\d+$/.test(value)) {
    throw new InvalidArgumentError('Expected a non-negative integer.');
  }
  return Number(value);
}

function parsePositive(value: string): number {
  const parsed = parseCount(value);
  if (parsed < 1) {
    throw new InvalidArgumentError('Expected a positive integer.');
  }
  return parsed;
}

/**
 * Build the command tree. Dependencies are injectable so the commands can
 * run against an in-process cluster.
 */
export function createProgram(deps: CliDependencies = {}): Command {
  const out = deps.out ?? ((text: string) => process.stdout.write(`${text}\n`));
  const err = deps.err ?? ((text: string) => process.stderr.write(`${text}\n`));
  const setExitCode = deps.setExitCode ?? ((code: number) => { process.exitCode = code; });
  const logger = deps.logger ?? createLogger({ enableHarnessLogs: true, enableStageLogs: true });

  async function loadConfig(path: string | undefined, overrides: HarnessConfigOverrides = {}): Promise<HarnessConfig | null> {
    const configuration = new HarnessConfiguration(deps.environment ?? process.env);
    try {
      if (path) {
        await configuration.loadFromFile(path);
      }
      return configuration.resolve(overrides);
    } catch (error) {
      if (error instanceof ConfigurationError) {
        err(`configuration error: ${error.message}`);
        setExitCode(EXIT_CONFIGURATION);
        return null;
      }
      throw error;
    }
  }

  const program = new Command()
    .name(pkg.name)
    .description(pkg.description)
    .version(pkg.version, '-v, --version', 'Show version number')
    .exitOverride()
    .configureOutput({ writeOut: text => out(text.trimEnd()), writeErr: text => err(text.trimEnd()) });

  program
    .command('run', { isDefault: true })
    .description('Write records to the primary, then read and verify them on every replica')
    .option('--writes <n>', 'Records to write to the primary (default: 1000)', parseCount)
    .option('--reads <n>', 'Reads spread across all replicas (default: 1000)', parseCount)
    .option('--wait <seconds>', 'Settle time (fixed) or catch-up timeout (poll) (default: 2)', parseCount)
    .option('-c, --config <file>', 'YAML configuration file')
    .addOption(new Option('--settle <mode>', 'How to wait for replication').choices(['fixed', 'poll']))
    .addOption(new Option('--verify <depth>', 'Consistency check depth').choices(['full', 'sample']))
    .option('--sample-size <n>', 'Rows compared per replica in sample mode', parsePositive)
    .option('--batch-size <n>', 'Records per insert statement', parsePositive)
    .option('--timeout <seconds>', 'Abort the run after this long', parsePositive)
    .option('--reset', 'Drop the test table before writing')
    .option('--json', 'Print the report as JSON')
    .action(async (options: RunOptions) => {
      const config = await loadConfig(options.config, {
        writes: options.writes,
        reads: options.reads,
        waitSeconds: options.wait,
        settleMode: options.settle,
        depth: options.verify,
        sampleSize: options.sampleSize,
        batchSize: options.batchSize,
        timeoutSeconds: options.timeout,
        reset: options.reset
      });
      if (!config) return;

      logger.harness(`verifying ${config.clusterName}: ${config.workload.writes} writes, ${config.workload.reads} reads`);
      const harness = new ReplicationHarness(config, { clientFactory: deps.clientFactory, logger });
      harness.on('warning', event => logger.warn(`[${event.stage}] ${event.message}`));

      const report = await harness.run(deps.signal);
      out(options.json ? JSON.stringify(report, null, 2) : formatReport(report));
      setExitCode(report.exitCode);
    });

  program
    .command('latency')
    .description('Measure commit-to-visible replication latency on every replica')
    .option('--samples <n>', 'Number of marker samples', parsePositive, 20)
    .option('-c, --config <file>', 'YAML configuration file')
    .option('--json', 'Print the summaries as JSON')
    .action(async (options: LatencyOptions) => {
      const config = await loadConfig(options.config);
      if (!config) return;

      try {
        const summaries = await measureReplicationLatency(config, options.samples, {
          clientFactory: deps.clientFactory,
          logger,
          signal: deps.signal
        });
        out(options.json ? JSON.stringify(summaries, null, 2) : formatLatencySummaries(summaries));
        setExitCode(summaries.every(summary => summary.successful > 0) ? EXIT_PASSED : EXIT_FAILED);
      } catch (error) {
        err(`latency measurement failed: ${errorMessage(error)}`);
        if (error instanceof CancelledError) {
          setExitCode(EXIT_CANCELLED);
        } else {
          setExitCode(error instanceof ConfigurationError ? EXIT_CONFIGURATION : EXIT_FAILED);
        }
      }
    });

  program
    .command('config')
    .description('Print the resolved configuration with the password masked')
    .option('-c, --config <file>', 'YAML configuration file')
    .action(async (options: ConfigOptions) => {
      const config = await loadConfig(options.config);
      if (!config) return;
      out(HarnessConfiguration.toYaml(config).trimEnd());
      setExitCode(EXIT_PASSED);
    });

  return program;
}
