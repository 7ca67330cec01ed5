import type { Pool, PoolClient } from "pg";
import type { SqlExecutor, SqlParam, QueryResult } from "./sql-executor.js";
import { isSqlExecutor } from "./sql-executor.js";

/**
 * PostgreSQL Executor (Default)
 *
 * Wraps pg.Pool or pg.PoolClient to implement SqlExecutor.
 */
export class PgSqlExecutor implements SqlExecutor {
  constructor(private readonly client: Pool | PoolClient) {}

  async query<T>(sql: string, params?: readonly SqlParam[]): Promise<QueryResult<T>> {
    const result = await this.client.query(sql, params ? [...params] : undefined);
    return {
      rows: result.rows,
      rowCount: result.rowCount,
    };
  }
}

export function toSqlExecutor(source: Pool | PoolClient | SqlExecutor): SqlExecutor {
  return isSqlExecutor(source) ? source : new PgSqlExecutor(source);
}
