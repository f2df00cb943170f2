import * as yaml from 'js-yaml';
import { promises as fs } from 'fs';
import { EventEmitter } from 'events';
import { Credential, NodeEndpoint, NodeRole, SettleMode, VerificationDepth } from '../types';
import { ConfigurationError, errorMessage } from '../common/errors';
import { TABLE_NAME_PATTERN } from '../harness/queries';
import { ReadSelection } from '../harness/ReadLoadDispatcher';

/**
 * YAML configuration schema
 */
export interface YamlHarnessConfig {
  cluster?: {
    name?: string;
  };

  credentials?: {
    user?: string;
    password?: string;
  };

  nodes?: Array<{
    id?: string;
    host: string;
    port?: number;
    database?: string;
    role: NodeRole;
  }>;

  pool?: {
    max_connections?: number;
    acquire_timeout_ms?: number;
  };

  workload?: {
    writes?: number;
    reads?: number;
    batch_size?: number;
    progress_interval?: number;
    read_selection?: ReadSelection;
  };

  settle?: {
    mode?: SettleMode;
    wait_seconds?: number;
    poll_interval_ms?: number;
  };

  verification?: {
    depth?: VerificationDepth;
    sample_size?: number;
  };

  schema?: {
    table?: string;
    reset?: boolean;
  };

  run?: {
    timeout_seconds?: number;
  };
}

/**
 * Validated configuration for one run, built once at startup
 */
export interface HarnessConfig {
  clusterName: string;
  nodes: NodeEndpoint[];
  credential: Credential;
  pool: {
    maxConnections: number;
    acquireTimeoutMs: number;
  };
  workload: {
    writes: number;
    reads: number;
    batchSize: number;
    progressInterval: number;
    readSelection: ReadSelection;
  };
  settle: {
    mode: SettleMode;
    waitSeconds: number;
    pollIntervalMs: number;
  };
  verification: {
    depth: VerificationDepth;
    sampleSize: number;
  };
  schema: {
    table: string;
    reset: boolean;
  };
  run: {
    timeoutSeconds: number;
  };
}

/**
 * Command-line overrides; each takes precedence over file and environment
 */
export interface HarnessConfigOverrides {
  writes?: number;
  reads?: number;
  waitSeconds?: number;
  settleMode?: SettleMode;
  depth?: VerificationDepth;
  sampleSize?: number;
  batchSize?: number;
  timeoutSeconds?: number;
  reset?: boolean;
}

export const DEFAULT_PORT = 5432;
export const DEFAULT_DATABASE = 'postgres';
export const DEFAULT_USER = 'postgres';
export const MAX_POOL_CAPACITY = 100;

export const DEFAULTS: Omit<HarnessConfig, 'nodes' | 'credential'> = {
  clusterName: 'replication-cluster',
  pool: { maxConnections: 10, acquireTimeoutMs: 10000 },
  workload: { writes: 1000, reads: 1000, batchSize: 1, progressInterval: 100, readSelection: 'random' },
  settle: { mode: 'poll', waitSeconds: 2, pollIntervalMs: 250 },
  verification: { depth: 'full', sampleSize: 100 },
  schema: { table: 'replication_test', reset: false },
  run: { timeoutSeconds: 300 }
};

type Environment = Record<string, string | undefined>;

/**
 * Loads harness configuration from a YAML file and the environment the
 * provisioning layer exports, then applies command-line overrides.
 */
export class HarnessConfiguration extends EventEmitter {
  private fileConfig: YamlHarnessConfig | null = null;
  private configPath: string | null = null;

  constructor(private readonly environment: Environment = process.env) {
    super();
  }

  /**
   * Load configuration from YAML file
   */
  async loadFromFile(filePath: string): Promise<void> {
    let content: string;
    try {
      content = await fs.readFile(filePath, 'utf8');
    } catch (error) {
      this.emit('config-error', { filePath, error });
      throw new ConfigurationError(`cannot read ${filePath}: ${errorMessage(error)}`, 'config');
    }

    this.loadFromString(content);
    this.configPath = filePath;
    this.emit('config-loaded', { filePath });
  }

  /**
   * Use YAML content as the file layer
   */
  loadFromString(yamlContent: string): void {
    this.fileConfig = this.parseFromYaml(yamlContent);
  }

  /**
   * Parse YAML content into configuration object
   */
  parseFromYaml(yamlContent: string): YamlHarnessConfig {
    let parsed: unknown;
    try {
      parsed = yaml.load(yamlContent);
    } catch (error) {
      throw new ConfigurationError(`invalid YAML: ${errorMessage(error)}`, 'config');
    }
    if (parsed === undefined || parsed === null) {
      return {};
    }
    return validateYamlShape(parsed);
  }

  getConfigPath(): string | null {
    return this.configPath;
  }

  /**
   * Nodes and credential as exported by provisioning: PRIMARY_IP,
   * REPLICA_<n>_IP, POSTGRES_PASSWORD and optional POSTGRES_USER,
   * POSTGRES_DB, POSTGRES_PORT.
   */
  fromEnvironment(): { nodes: NodeEndpoint[]; credential: Partial<Credential> } {
    const env = this.environment;
    const port = env.POSTGRES_PORT !== undefined ? parseInteger(env.POSTGRES_PORT, 'POSTGRES_PORT') : DEFAULT_PORT;
    const database = env.POSTGRES_DB || DEFAULT_DATABASE;
    const nodes: NodeEndpoint[] = [];

    if (env.PRIMARY_IP) {
      nodes.push({ id: 'primary', role: 'primary', host: env.PRIMARY_IP, port, database });
    }

    const replicaKeys = Object.keys(env)
      .map(key => /^REPLICA_(\d+)_IP$/.exec(key))
      .filter((match): match is RegExpExecArray => match !== null && Boolean(env[match[0]]))
      .sort((a, b) => Number(a[1]) - Number(b[1]));

    for (const match of replicaKeys) {
      const host = env[match[0]];
      if (host) {
        nodes.push({ id: `replica-${match[1]}`, role: 'replica', host, port, database });
      }
    }

    return {
      nodes,
      credential: {
        user: env.POSTGRES_USER || undefined,
        password: env.POSTGRES_PASSWORD || undefined
      }
    };
  }

  /**
   * Merge defaults, environment, file and overrides into a validated config
   */
  resolve(overrides: HarnessConfigOverrides = {}): HarnessConfig {
    const file = this.fileConfig ?? {};
    const env = this.fromEnvironment();

    const nodes = file.nodes && file.nodes.length > 0
      ? file.nodes.map((node, index) => ({
          id: node.id ?? `${node.role}-${index}`,
          role: node.role,
          host: node.host,
          port: node.port ?? DEFAULT_PORT,
          database: node.database ?? DEFAULT_DATABASE
        }))
      : env.nodes;

    if (nodes.length === 0) {
      throw new ConfigurationError('no nodes configured (set nodes in the config file or PRIMARY_IP/REPLICA_<n>_IP)', 'nodes');
    }

    const password = file.credentials?.password ?? env.credential.password;
    if (!password) {
      throw new ConfigurationError('no password configured (set credentials.password or POSTGRES_PASSWORD)', 'credentials.password');
    }

    const config: HarnessConfig = {
      clusterName: file.cluster?.name ?? DEFAULTS.clusterName,
      nodes,
      credential: {
        user: file.credentials?.user ?? env.credential.user ?? DEFAULT_USER,
        password
      },
      pool: {
        maxConnections: file.pool?.max_connections ?? DEFAULTS.pool.maxConnections,
        acquireTimeoutMs: file.pool?.acquire_timeout_ms ?? DEFAULTS.pool.acquireTimeoutMs
      },
      workload: {
        writes: overrides.writes ?? file.workload?.writes ?? DEFAULTS.workload.writes,
        reads: overrides.reads ?? file.workload?.reads ?? DEFAULTS.workload.reads,
        batchSize: overrides.batchSize ?? file.workload?.batch_size ?? DEFAULTS.workload.batchSize,
        progressInterval: file.workload?.progress_interval ?? DEFAULTS.workload.progressInterval,
        readSelection: file.workload?.read_selection ?? DEFAULTS.workload.readSelection
      },
      settle: {
        mode: overrides.settleMode ?? file.settle?.mode ?? DEFAULTS.settle.mode,
        waitSeconds: overrides.waitSeconds ?? file.settle?.wait_seconds ?? DEFAULTS.settle.waitSeconds,
        pollIntervalMs: file.settle?.poll_interval_ms ?? DEFAULTS.settle.pollIntervalMs
      },
      verification: {
        depth: overrides.depth ?? file.verification?.depth ?? DEFAULTS.verification.depth,
        sampleSize: overrides.sampleSize ?? file.verification?.sample_size ?? DEFAULTS.verification.sampleSize
      },
      schema: {
        table: file.schema?.table ?? DEFAULTS.schema.table,
        reset: overrides.reset ?? file.schema?.reset ?? DEFAULTS.schema.reset
      },
      run: {
        timeoutSeconds: overrides.timeoutSeconds ?? file.run?.timeout_seconds ?? DEFAULTS.run.timeoutSeconds
      }
    };

    validateConfig(config);
    this.emit('config-resolved', { clusterName: config.clusterName, nodes: config.nodes.length });
    return config;
  }

  /**
   * Render a resolved config as YAML with the password masked
   */
  static toYaml(config: HarnessConfig): string {
    const document: YamlHarnessConfig = {
      cluster: { name: config.clusterName },
      credentials: { user: config.credential.user, password: '********' },
      nodes: config.nodes.map(node => ({
        id: node.id,
        host: node.host,
        port: node.port,
        database: node.database,
        role: node.role
      })),
      pool: { max_connections: config.pool.maxConnections, acquire_timeout_ms: config.pool.acquireTimeoutMs },
      workload: {
        writes: config.workload.writes,
        reads: config.workload.reads,
        batch_size: config.workload.batchSize,
        progress_interval: config.workload.progressInterval,
        read_selection: config.workload.readSelection
      },
      settle: {
        mode: config.settle.mode,
        wait_seconds: config.settle.waitSeconds,
        poll_interval_ms: config.settle.pollIntervalMs
      },
      verification: { depth: config.verification.depth, sample_size: config.verification.sampleSize },
      schema: { table: config.schema.table, reset: config.schema.reset },
      run: { timeout_seconds: config.run.timeoutSeconds }
    };

    return yaml.dump(document, {
      indent: 2,
      lineWidth: 100,
      quotingType: '"',
      forceQuotes: false
    });
  }
}

function parseInteger(value: string, field: string): number {
  if (!/^\d+$/.test(value.trim())) {
    throw new ConfigurationError(`expected a non-negative integer, got "${value}"`, field);
  }
  return Number(value);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function section(root: Record<string, unknown>, key: string): Record<string, unknown> | undefined {
  const value = root[key];
  if (value === undefined || value === null) return undefined;
  if (!isRecord(value)) {
    throw new ConfigurationError('must be a mapping', key);
  }
  return value;
}

function optionalString(source: Record<string, unknown>, key: string, field: string): string | undefined {
  const value = source[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value === 'number') return String(value);
  if (typeof value !== 'string') {
    throw new ConfigurationError('must be a string', field);
  }
  return value;
}

function optionalInteger(source: Record<string, unknown>, key: string, field: string): number | undefined {
  const value = source[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== 'number' || !Number.isInteger(value) || value < 0) {
    throw new ConfigurationError('must be a non-negative integer', field);
  }
  return value;
}

function optionalBoolean(source: Record<string, unknown>, key: string, field: string): boolean | undefined {
  const value = source[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== 'boolean') {
    throw new ConfigurationError('must be true or false', field);
  }
  return value;
}

function optionalChoice<T extends string>(
  source: Record<string, unknown>,
  key: string,
  field: string,
  choices: readonly T[]
): T | undefined {
  const value = source[key];
  if (value === undefined || value === null) return undefined;
  const match = choices.find(choice => choice === value);
  if (match === undefined) {
    throw new ConfigurationError(`must be one of ${choices.join(', ')}`, field);
  }
  return match;
}

/**
 * Validate configuration structure
 */
function validateYamlShape(parsed: unknown): YamlHarnessConfig {
  if (!isRecord(parsed)) {
    throw new ConfigurationError('top level must be a mapping', 'config');
  }

  const cluster = section(parsed, 'cluster');
  const credentials = section(parsed, 'credentials');
  const pool = section(parsed, 'pool');
  const workload = section(parsed, 'workload');
  const settle = section(parsed, 'settle');
  const verification = section(parsed, 'verification');
  const schema = section(parsed, 'schema');
  const run = section(parsed, 'run');

  let nodes: YamlHarnessConfig['nodes'];
  const rawNodes = parsed.nodes;
  if (rawNodes !== undefined && rawNodes !== null) {
    if (!Array.isArray(rawNodes)) {
      throw new ConfigurationError('must be a list', 'nodes');
    }
    nodes = rawNodes.map((raw: unknown, index) => {
      const field = `nodes[${index}]`;
      if (!isRecord(raw)) {
        throw new ConfigurationError('must be a mapping', field);
      }
      const host = optionalString(raw, 'host', `${field}.host`);
      if (!host) {
        throw new ConfigurationError('is required', `${field}.host`);
      }
      const role = optionalChoice(raw, 'role', `${field}.role`, ['primary', 'replica'] as const);
      if (!role) {
        throw new ConfigurationError('is required', `${field}.role`);
      }
      return {
        id: optionalString(raw, 'id', `${field}.id`),
        host,
        port: optionalInteger(raw, 'port', `${field}.port`),
        database: optionalString(raw, 'database', `${field}.database`),
        role
      };
    });
  }

  return {
    cluster: cluster && { name: optionalString(cluster, 'name', 'cluster.name') },
    credentials: credentials && {
      user: optionalString(credentials, 'user', 'credentials.user'),
      password: optionalString(credentials, 'password', 'credentials.password')
    },
    nodes,
    pool: pool && {
      max_connections: optionalInteger(pool, 'max_connections', 'pool.max_connections'),
      acquire_timeout_ms: optionalInteger(pool, 'acquire_timeout_ms', 'pool.acquire_timeout_ms')
    },
    workload: workload && {
      writes: optionalInteger(workload, 'writes', 'workload.writes'),
      reads: optionalInteger(workload, 'reads', 'workload.reads'),
      batch_size: optionalInteger(workload, 'batch_size', 'workload.batch_size'),
      progress_interval: optionalInteger(workload, 'progress_interval', 'workload.progress_interval'),
      read_selection: optionalChoice(workload, 'read_selection', 'workload.read_selection', ['random', 'sequential'] as const)
    },
    settle: settle && {
      mode: optionalChoice(settle, 'mode', 'settle.mode', ['fixed', 'poll'] as const),
      wait_seconds: optionalInteger(settle, 'wait_seconds', 'settle.wait_seconds'),
      poll_interval_ms: optionalInteger(settle, 'poll_interval_ms', 'settle.poll_interval_ms')
    },
    verification: verification && {
      depth: optionalChoice(verification, 'depth', 'verification.depth', ['full', 'sample'] as const),
      sample_size: optionalInteger(verification, 'sample_size', 'verification.sample_size')
    },
    schema: schema && {
      table: optionalString(schema, 'table', 'schema.table'),
      reset: optionalBoolean(schema, 'reset', 'schema.reset')
    },
    run: run && {
      timeout_seconds: optionalInteger(run, 'timeout_seconds', 'run.timeout_seconds')
    }
  };
}

function requireCount(value: number, field: string): void {
  if (!Number.isInteger(value) || value < 0) {
    throw new ConfigurationError(`must be a non-negative integer, got ${value}`, field);
  }
}

function requirePositive(value: number, field: string): void {
  if (!Number.isInteger(value) || value < 1) {
    throw new ConfigurationError(`must be a positive integer, got ${value}`, field);
  }
}

function validateConfig(config: HarnessConfig): void {
  requireCount(config.workload.writes, 'workload.writes');
  requireCount(config.workload.reads, 'workload.reads');
  requirePositive(config.workload.batchSize, 'workload.batch_size');
  requirePositive(config.workload.progressInterval, 'workload.progress_interval');
  requireCount(config.settle.waitSeconds, 'settle.wait_seconds');
  requirePositive(config.settle.pollIntervalMs, 'settle.poll_interval_ms');
  requirePositive(config.verification.sampleSize, 'verification.sample_size');
  requirePositive(config.pool.acquireTimeoutMs, 'pool.acquire_timeout_ms');
  requirePositive(config.run.timeoutSeconds, 'run.timeout_seconds');

  requirePositive(config.pool.maxConnections, 'pool.max_connections');
  if (config.pool.maxConnections > MAX_POOL_CAPACITY) {
    throw new ConfigurationError(`must be at most ${MAX_POOL_CAPACITY}`, 'pool.max_connections');
  }

  if (!TABLE_NAME_PATTERN.test(config.schema.table)) {
    throw new ConfigurationError(`"${config.schema.table}" is not a valid table name`, 'schema.table');
  }
}
