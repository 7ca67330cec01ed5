/**
 * Seed Data Use Case
 *
 * Inserts a batch of departments, then employees, in the given order.
 * The first failing row aborts the batch.
 */

import type { HrRepositoryPort } from "../ports/hr-repository.port.js";
import { consoleLogger, type SeedLogger } from "../ports/logger.port.js";
import { Department } from "../domain/entities/department.js";
import { Employee } from "../domain/entities/employee.js";
import { HR_SEED, type SeedBatch } from "../domain/seed-data.js";

export interface SeedDataResult {
  departments: number;
  employees: number;
}

export class SeedDataUseCase {
  constructor(
    private readonly repository: HrRepositoryPort,
    private readonly batch: SeedBatch = HR_SEED,
    private readonly logger: SeedLogger = consoleLogger,
  ) {}

  async execute(): Promise<SeedDataResult> {
    const result: SeedDataResult = { departments: 0, employees: 0 };

    for (const props of this.batch.departments) {
      await this.repository.insertDepartment(Department.create(props));
      result.departments++;
    }
    this.logger.info(`[DataSeeder] 🌱 Inserted ${result.departments} department row(s)`);

    for (const props of this.batch.employees) {
      await this.repository.insertEmployee(Employee.create(props));
      result.employees++;
    }
    this.logger.info(`[DataSeeder] 🌱 Inserted ${result.employees} employee row(s)`);

    return result;
  }
}
