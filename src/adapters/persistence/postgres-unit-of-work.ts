/**
 * PostgreSQL Unit of Work
 *
 * Checks a client out of the pool, opens a transaction on it and hands out a
 * repository bound to that client. The client goes back to the pool once the
 * transaction is committed or rolled back.
 */

import type { Pool, PoolClient } from "pg";
import type {
  TransactionPort,
  UnitOfWorkPort,
} from "../../core/ports/unit-of-work.port.js";
import type { HrRepositoryPort } from "../../core/ports/hr-repository.port.js";
import { PostgresHrRepository } from "./postgres-hr.repository.js";

export class PostgresUnitOfWork implements UnitOfWorkPort {
  constructor(private readonly pool: Pool) {}

  async begin(): Promise<TransactionPort> {
    const client = await this.pool.connect();
    try {
      await client.query("BEGIN");
    } catch (error) {
      client.release(error instanceof Error ? error : true);
      throw error;
    }
    return new PostgresTransaction(client);
  }
}

export class PostgresTransaction implements TransactionPort {
  readonly repository: HrRepositoryPort;
  private finished = false;

  constructor(private readonly client: PoolClient) {
    this.repository = new PostgresHrRepository(client);
  }

  async commit(): Promise<void> {
    this.assertOpen();
    // A failed COMMIT leaves the client for rollback() to release
    await this.client.query("COMMIT");
    this.finished = true;
    this.client.release();
  }

  async rollback(): Promise<void> {
    if (this.finished) return;
    this.finished = true;

    try {
      await this.client.query("ROLLBACK");
    } catch (error) {
      // Releasing with an error destroys the connection
      this.client.release(error instanceof Error ? error : true);
      throw error;
    }
    this.client.release();
  }

  private assertOpen(): void {
    if (this.finished) {
      throw new Error("Transaction already finished");
    }
  }
}
