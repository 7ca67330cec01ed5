/**
 * SQL Executor Interface
 *
 * Abstracts the driver so repositories run against a pool, a checked-out
 * client inside a transaction, or a test double.
 */

export type SqlParam = string | number | boolean | null | readonly string[];

export interface QueryResult<T> {
  rows: T[];
  rowCount: number | null;
}

export interface SqlExecutor {
  query<T>(sql: string, params?: readonly SqlParam[]): Promise<QueryResult<T>>;
}

export function isSqlExecutor(obj: object): obj is SqlExecutor {
  return "query" in obj && typeof obj.query === "function" && !("connect" in obj);
}
