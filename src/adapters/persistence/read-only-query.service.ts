/**
 * Read-only Query Service
 *
 * Runs ad-hoc SELECT statements against the HR tables, and checks single
 * statements with EXPLAIN, inside a READ ONLY transaction that is always
 * rolled back.
 */

import pg from "pg";
import type { Pool, PoolClient } from "pg";
import { ReadOnlyQueryError } from "../../core/domain/errors/index.js";
import { consoleLogger, type SeedLogger } from "../../core/ports/logger.port.js";

export interface ReadOnlyQueryResult {
  sql: string;
  columns: string[];
  rows: Record<string, unknown>[];
}

export interface SqlValidationResult {
  valid: boolean;
  message: string;
  sql: string;
}

/**
 * Strip Markdown code fences, collapse whitespace and drop trailing
 * semicolons: "```sql\nSELECT *\n  FROM employees;\n```" -> "SELECT * FROM employees"
 */
export function normalizeSql(raw: string): string {
  let text = raw.trim();

  if (text.startsWith("```")) {
    text = text
      .split("\n")
      .filter((line) => !line.trim().startsWith("```"))
      .join("\n");
  }

  return text.split(/\s+/).filter(Boolean).join(" ").replace(/[\s;]+$/, "");
}

export function assertSingleStatement(sql: string): void {
  if (sql.length === 0) {
    throw new ReadOnlyQueryError("empty statement", sql);
  }
  if (sql.includes(";")) {
    throw new ReadOnlyQueryError("multiple statements are not supported", sql);
  }
}

export function assertReadOnly(sql: string): void {
  assertSingleStatement(sql);

  const keyword = sql.split(" ")[0]?.toUpperCase();
  if (keyword !== "SELECT" && keyword !== "WITH") {
    throw new ReadOnlyQueryError("only SELECT statements are supported", sql);
  }
}

export class ReadOnlyQueryService {
  constructor(
    private readonly pool: Pool,
    private readonly logger: SeedLogger = consoleLogger,
  ) {}

  async execute(rawSql: string): Promise<ReadOnlyQueryResult> {
    const sql = normalizeSql(rawSql);
    assertReadOnly(sql);

    const result = await this.inReadOnlyTransaction((client) =>
      client.query<Record<string, unknown>>(sql),
    );

    return {
      sql,
      columns: result.fields.map((f) => f.name),
      rows: result.rows,
    };
  }

  /**
   * Parses and plans the statement with EXPLAIN without running it.
   * Errors reported by the server come back as { valid: false }.
   */
  async validate(rawSql: string): Promise<SqlValidationResult> {
    const sql = normalizeSql(rawSql);

    try {
      assertSingleStatement(sql);
      await this.inReadOnlyTransaction((client) => client.query(`EXPLAIN ${sql}`));
    } catch (error) {
      if (error instanceof ReadOnlyQueryError || error instanceof pg.DatabaseError) {
        return { valid: false, message: error.message, sql };
      }
      throw error;
    }

    return { valid: true, message: "SQL is valid", sql };
  }

  private async inReadOnlyTransaction<T>(work: (client: PoolClient) => Promise<T>): Promise<T> {
    const client = await this.pool.connect();

    let result: T;
    try {
      await client.query("BEGIN TRANSACTION READ ONLY");
      result = await work(client);
    } catch (error) {
      await this.rollbackAndRelease(client).catch((rollbackError: unknown) => {
        this.logger.error("[ReadOnlyQuery] Rollback failed:", rollbackError);
      });
      throw error;
    }

    await this.rollbackAndRelease(client);
    return result;
  }

  private async rollbackAndRelease(client: PoolClient): Promise<void> {
    try {
      await client.query("ROLLBACK");
    } catch (error) {
      // Releasing with an error destroys the connection
      client.release(error instanceof Error ? error : true);
      throw error;
    }
    client.release();
  }
}
