/**
 * Seed Database Use Case
 *
 * Runs schema creation, data seeding and commit inside one transaction.
 * Either everything is committed or nothing is.
 */

import type { UnitOfWorkPort } from "../ports/unit-of-work.port.js";
import { consoleLogger, type SeedLogger } from "../ports/logger.port.js";
import { HR_SEED, type SeedBatch } from "../domain/seed-data.js";
import {
  InitializeSchemaUseCase,
  type ConflictPolicy,
} from "./initialize-schema.use-case.js";
import { SeedDataUseCase } from "./seed-data.use-case.js";
import { FinalizeTransactionUseCase } from "./finalize-transaction.use-case.js";

export interface SeedDatabaseConfig {
  onConflict: ConflictPolicy;
  batch?: SeedBatch;
}

export interface SeedReport {
  tablesCreated: string[];
  tablesDropped: string[];
  rowsInserted: { departments: number; employees: number };
  durationMs: number;
}

export class SeedDatabaseUseCase {
  constructor(
    private readonly unitOfWork: UnitOfWorkPort,
    private readonly config: SeedDatabaseConfig = { onConflict: "abort" },
    private readonly logger: SeedLogger = consoleLogger,
  ) {}

  async execute(): Promise<SeedReport> {
    const startedAt = Date.now();
    const transaction = await this.unitOfWork.begin();

    let report: Omit<SeedReport, "durationMs">;
    try {
      const schema = await new InitializeSchemaUseCase(
        transaction.repository,
        { onConflict: this.config.onConflict },
        this.logger,
      ).execute();

      const rows = await new SeedDataUseCase(
        transaction.repository,
        this.config.batch ?? HR_SEED,
        this.logger,
      ).execute();

      report = { ...schema, rowsInserted: rows };
    } catch (error) {
      this.logger.error("[SeedDatabase] ❌ Seeding failed, rolling back:", error);
      try {
        await transaction.rollback();
      } catch (rollbackError) {
        this.logger.error("[SeedDatabase] Rollback failed:", rollbackError);
      }
      throw error;
    }

    // Rolls back on its own if the commit fails
    await new FinalizeTransactionUseCase(transaction, this.logger).execute();

    return { ...report, durationMs: Date.now() - startedAt };
  }
}
