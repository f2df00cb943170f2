import { Connection } from '../connections/Connection';
import { SchemaError, errorMessage, sqlState } from '../common/errors';
import { HarnessLogger, createLogger } from '../common/logger';
import { TableQueries } from './queries';

// duplicate_table, duplicate_object, and the unique_violation a concurrent
// CREATE ... IF NOT EXISTS can raise on pg_type
const ALREADY_EXISTS_STATES = new Set(['42P07', '42710', '23505']);

export interface SchemaBootstrapperOptions {
  /** Drop the table before creating it. */
  reset?: boolean;
  logger?: HarnessLogger;
}

export class SchemaBootstrapper {
  private readonly logger: HarnessLogger;

  constructor(private readonly queries: TableQueries, private readonly options: SchemaBootstrapperOptions = {}) {
    this.logger = options.logger ?? createLogger();
  }

  /**
   * Create the test table and its indexes on the primary if absent.
   */
  async ensureSchema(primary: Connection): Promise<void> {
    if (primary.node.role !== 'primary') {
      throw new SchemaError(primary.node.id, `schema bootstrap must run on the primary, not ${primary.node.role}`);
    }

    if (this.options.reset) {
      await this.execute(primary, this.queries.dropTable);
      this.logger.stage('bootstrap', `dropped ${this.queries.table}`);
    }

    await this.execute(primary, this.queries.createTable);
    await this.execute(primary, this.queries.createIdIndex);
    await this.execute(primary, this.queries.createCreatedAtIndex);

    this.logger.stage('bootstrap', `table ${this.queries.table} ready on ${primary.node.id}`);
  }

  private async execute(primary: Connection, statement: string): Promise<void> {
    try {
      await primary.query(statement);
    } catch (error) {
      const state = sqlState(error);
      if (state && ALREADY_EXISTS_STATES.has(state)) {
        this.logger.debug(`ignoring "already exists" (${state}) for: ${statement}`);
        return;
      }
      throw new SchemaError(primary.node.id, `bootstrap failed: ${errorMessage(error)}`, error);
    }
  }
}
