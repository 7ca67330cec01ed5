/**
 * Seed Logic
 *
 * Creates the HR tables and loads the seed batch as one transaction.
 */
import type { UnitOfWorkPort } from "../core/ports/unit-of-work.port.js";
import { consoleLogger, type SeedLogger } from "../core/ports/logger.port.js";
import type { SeedBatch } from "../core/domain/seed-data.js";
import type { ConflictPolicy } from "../core/use-cases/initialize-schema.use-case.js";
import {
  SeedDatabaseUseCase,
  type SeedReport,
} from "../core/use-cases/seed-database.use-case.js";

export interface SeedOptions {
  onConflict?: ConflictPolicy;
  batch?: SeedBatch;
}

export async function runSeed(
  unitOfWork: UnitOfWorkPort,
  options: SeedOptions = {},
  logger: SeedLogger = consoleLogger,
): Promise<SeedReport> {
  logger.info("🌱 Seeding HR tables...");

  const report = await new SeedDatabaseUseCase(
    unitOfWork,
    { onConflict: options.onConflict ?? "abort", batch: options.batch },
    logger,
  ).execute();

  logger.info(
    `✅ Seeding complete: ${report.rowsInserted.departments} departments, ` +
      `${report.rowsInserted.employees} employees in ${report.durationMs}ms`,
  );
  return report;
}
