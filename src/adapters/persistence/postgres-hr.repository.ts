/**
 * PostgreSQL HR Repository
 *
 * Implements HrRepositoryPort on the departments and employees tables.
 * Pass a PoolClient (or an executor over one) to work inside a transaction.
 */

import type { Pool, PoolClient } from "pg";
import type {
  HrRepositoryPort,
  TableDescription,
} from "../../core/ports/hr-repository.port.js";
import { Department } from "../../core/domain/entities/department.js";
import { Employee } from "../../core/domain/entities/employee.js";
import {
  DEPARTMENTS_TABLE,
  EMPLOYEES_TABLE,
  type TableDefinition,
} from "../../core/domain/schema/hr-schema.js";
import type { RowKey } from "../../core/domain/errors/index.js";
import type { ColumnValue } from "../../core/domain/value-objects/column-type.js";
import { renderCreateTable } from "../sql/seed-script.js";
import type { SqlExecutor } from "./sql-executor.js";
import { toSqlExecutor } from "./pg-executor.js";
import { translatePgError } from "./pg-errors.js";

// NUMERIC columns arrive as strings from pg
interface DepartmentRow {
  department_id: string;
  department_name: string;
  manager_id: string | null;
  location_id: string | null;
}

interface EmployeeRow {
  employee_id: string;
  first_name: string | null;
  last_name: string;
  email: string;
  phone_number: string | null;
  hire_date: string;
  job_id: string;
  salary: string | null;
  commission_pct: string | null;
  manager_id: string | null;
  department_id: string | null;
}

interface ColumnRow {
  table_name: string;
  column_name: string;
  data_type: string;
  character_maximum_length: number | null;
  numeric_precision: number | null;
  numeric_scale: number | null;
  is_nullable: "YES" | "NO";
}

const IDENTIFIER = /^[a-z_][a-z0-9_]*$/;

const DEPARTMENT_COLUMNS = "department_id, department_name, manager_id, location_id";

const EMPLOYEE_COLUMNS = `employee_id, first_name, last_name, email, phone_number,
  to_char(hire_date, 'YYYY-MM-DD') AS hire_date, job_id, salary, commission_pct,
  manager_id, department_id`;

export class PostgresHrRepository implements HrRepositoryPort {
  private readonly executor: SqlExecutor;

  constructor(poolOrExecutor: Pool | PoolClient | SqlExecutor) {
    this.executor = toSqlExecutor(poolOrExecutor);
  }

  async tableExists(table: string): Promise<boolean> {
    const { rows } = await this.executor.query<{ exists: boolean }>(
      `SELECT to_regclass($1) IS NOT NULL AS exists`,
      [table],
    );

    return rows[0]?.exists ?? false;
  }

  async createTable(table: TableDefinition): Promise<void> {
    await this.run(table.name, null, renderCreateTable(table, "postgres"));
  }

  async dropTable(table: string): Promise<void> {
    if (!IDENTIFIER.test(table)) {
      throw new Error(`Invalid table name: ${table}`);
    }
    await this.executor.query(`DROP TABLE IF EXISTS ${table}`);
  }

  async insertDepartment(department: Department): Promise<void> {
    await this.insertRow(DEPARTMENTS_TABLE, department.departmentId, department.toRow());
  }

  async insertEmployee(employee: Employee): Promise<void> {
    await this.insertRow(EMPLOYEES_TABLE, employee.employeeId, employee.toRow());
  }

  async findDepartmentById(departmentId: number): Promise<Department | null> {
    const { rows } = await this.executor.query<DepartmentRow>(
      `SELECT ${DEPARTMENT_COLUMNS} FROM departments WHERE department_id = $1`,
      [departmentId],
    );

    const row = rows[0];
    return row ? this.mapDepartment(row) : null;
  }

  async findEmployeeById(employeeId: number): Promise<Employee | null> {
    const { rows } = await this.executor.query<EmployeeRow>(
      `SELECT ${EMPLOYEE_COLUMNS} FROM employees WHERE employee_id = $1`,
      [employeeId],
    );

    const row = rows[0];
    return row ? this.mapEmployee(row) : null;
  }

  async listDepartments(): Promise<Department[]> {
    const { rows } = await this.executor.query<DepartmentRow>(
      `SELECT ${DEPARTMENT_COLUMNS} FROM departments ORDER BY department_id`,
    );
    return rows.map((row) => this.mapDepartment(row));
  }

  async listEmployees(): Promise<Employee[]> {
    const { rows } = await this.executor.query<EmployeeRow>(
      `SELECT ${EMPLOYEE_COLUMNS} FROM employees ORDER BY employee_id`,
    );
    return rows.map((row) => this.mapEmployee(row));
  }

  async describeTables(tables: readonly string[]): Promise<TableDescription[]> {
    const { rows } = await this.executor.query<ColumnRow>(
      `SELECT table_name, column_name, data_type, character_maximum_length,
              numeric_precision, numeric_scale, is_nullable
       FROM information_schema.columns
       WHERE table_schema = current_schema()
         AND table_name = ANY($1)
       ORDER BY table_name, ordinal_position`,
      [tables],
    );

    return tables
      .map((name) => ({
        name,
        columns: rows
          .filter((row) => row.table_name === name)
          .map((row) => ({
            name: row.column_name,
            type: row.data_type,
            length: row.character_maximum_length,
            precision: row.numeric_precision,
            scale: row.numeric_scale,
            nullable: row.is_nullable === "YES",
          })),
      }))
      .filter((table) => table.columns.length > 0);
  }

  private async insertRow(
    table: TableDefinition,
    key: RowKey,
    row: ColumnValue[],
  ): Promise<void> {
    const placeholders = table.columns.map((_, i) => `$${i + 1}`).join(", ");
    await this.run(table.name, key, `INSERT INTO ${table.name} VALUES (${placeholders})`, row);
  }

  private async run(
    table: string,
    key: RowKey,
    sql: string,
    params?: ColumnValue[],
  ): Promise<void> {
    try {
      await this.executor.query(sql, params);
    } catch (error) {
      throw translatePgError(error, table, key);
    }
  }

  private mapDepartment(row: DepartmentRow): Department {
    return Department.reconstitute({
      departmentId: Number(row.department_id),
      departmentName: row.department_name,
      managerId: toNumber(row.manager_id),
      locationId: toNumber(row.location_id),
    });
  }

  private mapEmployee(row: EmployeeRow): Employee {
    return Employee.reconstitute({
      employeeId: Number(row.employee_id),
      firstName: row.first_name,
      lastName: row.last_name,
      email: row.email,
      phoneNumber: row.phone_number,
      hireDate: row.hire_date,
      jobId: row.job_id,
      salary: toNumber(row.salary),
      commissionPct: toNumber(row.commission_pct),
      managerId: toNumber(row.manager_id),
      departmentId: toNumber(row.department_id),
    });
  }
}

function toNumber(value: string | null): number | null {
  return value === null ? null : Number(value);
}
