/**
 * Migration Logic
 *
 * Creates the HR tables in their own transaction, without seed rows.
 */
import type { UnitOfWorkPort } from "../core/ports/unit-of-work.port.js";
import { consoleLogger, type SeedLogger } from "../core/ports/logger.port.js";
import {
  InitializeSchemaUseCase,
  type ConflictPolicy,
  type InitializeSchemaResult,
} from "../core/use-cases/initialize-schema.use-case.js";
import { FinalizeTransactionUseCase } from "../core/use-cases/finalize-transaction.use-case.js";

export interface MigrationConfig {
  onConflict?: ConflictPolicy;
}

export async function runMigrations(
  unitOfWork: UnitOfWorkPort,
  config: MigrationConfig = {},
  logger: SeedLogger = consoleLogger,
): Promise<InitializeSchemaResult> {
  const { onConflict = "abort" } = config;

  logger.info(`📦 Applying HR schema (on conflict: ${onConflict})`);
  const transaction = await unitOfWork.begin();

  let result: InitializeSchemaResult;
  try {
    result = await new InitializeSchemaUseCase(
      transaction.repository,
      { onConflict },
      logger,
    ).execute();
  } catch (error) {
    logger.error("❌ Migration failed, rolling back:", error);
    try {
      await transaction.rollback();
    } catch (rollbackError) {
      logger.error("Rollback failed:", rollbackError);
    }
    throw error;
  }

  await new FinalizeTransactionUseCase(transaction, logger).execute();
  return result;
}
