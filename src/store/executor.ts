import pg from 'pg';
import type { BoundStatement } from '../query/types.js';
import type { ExecuteOptions, RawRow, StatementExecutor } from '../types.js';
import { toPositional } from './placeholders.js';

export interface PostgresExecutorConfig {
  pool: pg.Pool;
}

/**
 * Runs bound statements on a pg pool. The pool belongs to the caller;
 * close() ends it.
 */
export class PostgresStatementExecutor implements StatementExecutor {
  private readonly pool: pg.Pool;

  constructor(config: PostgresExecutorConfig) {
    this.pool = config.pool;
  }

  async execute(statement: BoundStatement, options: ExecuteOptions = {}): Promise<readonly RawRow[]> {
    // pg has no way to cancel a query in flight; honour the signal up front
    options.signal?.throwIfAborted();
    const { text, values } = toPositional(statement);
    const result = await this.pool.query<RawRow>(text, values);
    return result.rows;
  }

  async close(): Promise<void> {
    await this.pool.end();
  }
}
