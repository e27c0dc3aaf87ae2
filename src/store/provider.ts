import type { Row, SqlEntity, SqlParameter } from '../types.js';
import type { SqlQuery } from '../query/sql-query.js';
import { QueryExecutionError } from '../errors.js';
import { createLogger, type Logger } from '../logger.js';
import { mapRow, mapRows } from './row-mapper.js';

export interface ExecutionResult {
  rows: Row[];
  rowCount: number | null;
}

/**
 * Anything that runs SQL with positional parameters. `pg.Pool`,
 * `pg.PoolClient` and `pg.Client` all fit, so queries can run inside a
 * transaction the caller opened on a client.
 */
export interface SqlExecutor {
  query(sql: string, params: SqlParameter[]): Promise<ExecutionResult>;
}

export interface ProviderConfig {
  executor: SqlExecutor;
  logger?: Logger;
}

export class Provider {
  private readonly executor: SqlExecutor;
  private readonly logger: Logger;

  constructor(config: ProviderConfig) {
    this.executor = config.executor;
    this.logger = config.logger ?? createLogger();
  }

  async fetch<E>(entity: SqlEntity<E>, query: SqlQuery): Promise<E[]> {
    const { rows } = await this.run(query);
    return mapRows(entity, rows);
  }

  /** First entity of the result, or null when there is none. */
  async fetchOne<E>(entity: SqlEntity<E>, query: SqlQuery): Promise<E | null> {
    const { rows } = await this.run(query);
    const first = rows[0];
    return first === undefined ? null : mapRow(entity, first);
  }

  /** Runs a statement for its effect and returns the affected row count. */
  async execute(query: SqlQuery): Promise<number> {
    const { rowCount } = await this.run(query);
    return rowCount ?? 0;
  }

  private async run(query: SqlQuery): Promise<ExecutionResult> {
    const { sql, params } = query.render();
    this.logger.debug({ sql, parameterCount: params.length }, 'executing query');
    try {
      return await this.executor.query(sql, params);
    } catch (err) {
      this.logger.error({ sql, err }, 'query failed');
      throw new QueryExecutionError(`Failed to execute query: ${String(err)}`, sql, err);
    }
  }
}
