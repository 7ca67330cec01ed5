/**
 * Initialize Schema Use Case
 *
 * Creates the HR tables in dependency order. An existing table aborts the
 * run unless the caller asked for a recreate.
 */

import type { HrRepositoryPort } from "../ports/hr-repository.port.js";
import { consoleLogger, type SeedLogger } from "../ports/logger.port.js";
import { HR_SCHEMA, type TableDefinition } from "../domain/schema/hr-schema.js";
import { SchemaConflictError } from "../domain/errors/index.js";

export type ConflictPolicy = "abort" | "recreate";

export interface InitializeSchemaConfig {
  onConflict: ConflictPolicy;
  tables?: readonly TableDefinition[];
}

export interface InitializeSchemaResult {
  tablesCreated: string[];
  tablesDropped: string[];
}

export class InitializeSchemaUseCase {
  private readonly tables: readonly TableDefinition[];

  constructor(
    private readonly repository: HrRepositoryPort,
    private readonly config: InitializeSchemaConfig = { onConflict: "abort" },
    private readonly logger: SeedLogger = consoleLogger,
  ) {
    this.tables = config.tables ?? HR_SCHEMA;
  }

  async execute(): Promise<InitializeSchemaResult> {
    const result: InitializeSchemaResult = { tablesCreated: [], tablesDropped: [] };

    if (this.config.onConflict === "recreate") {
      // Dependents first
      for (const table of [...this.tables].reverse()) {
        if (await this.repository.tableExists(table.name)) {
          this.logger.warn(`[SchemaInitializer] Dropping existing table ${table.name}`);
          await this.repository.dropTable(table.name);
          result.tablesDropped.push(table.name);
        }
      }
    }

    for (const table of this.tables) {
      if (await this.repository.tableExists(table.name)) {
        throw new SchemaConflictError(table.name);
      }

      await this.repository.createTable(table);
      result.tablesCreated.push(table.name);
      this.logger.info(`[SchemaInitializer] 📦 Created table ${table.name}`);
    }

    return result;
  }
}
