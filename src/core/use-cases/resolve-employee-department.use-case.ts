/**
 * Resolve Employee Department Use Case
 *
 * Follows the enforced employees.department_id reference.
 */

import type { HrRepositoryPort } from "../ports/hr-repository.port.js";
import type { Department } from "../domain/entities/department.js";
import { EmployeeNotFoundError } from "../domain/errors/index.js";

export class ResolveEmployeeDepartmentUseCase {
  constructor(private readonly repository: HrRepositoryPort) {}

  /**
   * Returns null when the employee has no department
   */
  async execute(employeeId: number): Promise<Department | null> {
    const employee = await this.repository.findEmployeeById(employeeId);
    if (!employee) {
      throw new EmployeeNotFoundError(employeeId);
    }

    if (employee.departmentId === null) {
      return null;
    }

    return this.repository.findDepartmentById(employee.departmentId);
  }
}
