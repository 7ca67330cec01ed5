/**
 * Finalize Transaction Use Case
 *
 * Commits the seed transaction. A failed commit is rolled back and reported
 * as TransactionCommitError; there is no retry.
 */

import type { TransactionPort } from "../ports/unit-of-work.port.js";
import { consoleLogger, type SeedLogger } from "../ports/logger.port.js";
import { TransactionCommitError } from "../domain/errors/index.js";

export class FinalizeTransactionUseCase {
  constructor(
    private readonly transaction: TransactionPort,
    private readonly logger: SeedLogger = consoleLogger,
  ) {}

  async execute(): Promise<void> {
    try {
      await this.transaction.commit();
    } catch (error) {
      try {
        await this.transaction.rollback();
      } catch (rollbackError) {
        this.logger.error("[TransactionFinalizer] Rollback after failed commit also failed:", rollbackError);
      }
      throw new TransactionCommitError(error);
    }

    this.logger.info("[TransactionFinalizer] ✅ Committed");
  }
}
