/**
 * HR Repository Port
 *
 * Persistence operations on the departments and employees tables. An
 * instance is bound to one transaction (see UnitOfWorkPort).
 */

import type { Department } from "../domain/entities/department.js";
import type { Employee } from "../domain/entities/employee.js";
import type { TableDefinition } from "../domain/schema/hr-schema.js";

export interface ColumnDescription {
  name: string;
  type: string;
  length: number | null;
  precision: number | null;
  scale: number | null;
  nullable: boolean;
}

export interface TableDescription {
  name: string;
  columns: ColumnDescription[];
}

export interface HrRepositoryPort {
  tableExists(table: string): Promise<boolean>;

  /**
   * Create a table with its keys and constraints
   * Throws SchemaConflictError if it already exists
   */
  createTable(table: TableDefinition): Promise<void>;

  /**
   * Drop a table if present
   */
  dropTable(table: string): Promise<void>;

  /**
   * Positional insert of every column.
   * Throws UniqueConstraintViolationError or NotNullViolationError
   */
  insertDepartment(department: Department): Promise<void>;

  /**
   * Positional insert of every column.
   * Throws ForeignKeyViolationError, UniqueConstraintViolationError or
   * NotNullViolationError
   */
  insertEmployee(employee: Employee): Promise<void>;

  findDepartmentById(departmentId: number): Promise<Department | null>;

  findEmployeeById(employeeId: number): Promise<Employee | null>;

  /**
   * All departments ordered by department_id
   */
  listDepartments(): Promise<Department[]>;

  /**
   * All employees ordered by employee_id
   */
  listEmployees(): Promise<Employee[]>;

  /**
   * Columns of the given tables, in declared order
   */
  describeTables(tables: readonly string[]): Promise<TableDescription[]>;
}
