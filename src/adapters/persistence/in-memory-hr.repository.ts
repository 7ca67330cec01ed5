/**
 * In-memory HR store (for testing/development)
 *
 * Enforces the same keys and constraints as the PostgreSQL schema. Each
 * transaction works on a private copy that replaces the committed state on
 * commit.
 */

import type {
  ColumnDescription,
  HrRepositoryPort,
  TableDescription,
} from "../../core/ports/hr-repository.port.js";
import type {
  TransactionPort,
  UnitOfWorkPort,
} from "../../core/ports/unit-of-work.port.js";
import { Department } from "../../core/domain/entities/department.js";
import { Employee } from "../../core/domain/entities/employee.js";
import {
  DEPARTMENTS_TABLE,
  EMPLOYEES_TABLE,
  primaryKeyConstraintName,
  uniqueConstraintName,
  type ColumnDefinition,
  type TableDefinition,
} from "../../core/domain/schema/hr-schema.js";
import {
  ForeignKeyViolationError,
  SchemaConflictError,
  UniqueConstraintViolationError,
  type RowKey,
} from "../../core/domain/errors/index.js";
import { validateRow } from "../../core/domain/services/row-validator.js";
import type { ColumnValue } from "../../core/domain/value-objects/column-type.js";

interface StoredTable {
  definition: TableDefinition;
  rows: ColumnValue[][];
}

export type InMemoryState = Map<string, StoredTable>;

function cloneState(state: InMemoryState): InMemoryState {
  return new Map(
    [...state].map(([name, table]): [string, StoredTable] => [
      name,
      { definition: table.definition, rows: table.rows.map((row) => [...row]) },
    ]),
  );
}

export class InMemoryHrRepository implements HrRepositoryPort {
  constructor(
    private readonly state: InMemoryState = new Map(),
    private readonly isFinished: () => boolean = () => false,
  ) {}

  async tableExists(table: string): Promise<boolean> {
    return this.state.has(table);
  }

  async createTable(table: TableDefinition): Promise<void> {
    this.assertWritable();
    if (this.state.has(table.name)) {
      throw new SchemaConflictError(table.name);
    }
    for (const fk of table.foreignKeys) {
      if (!this.state.has(fk.references.table)) {
        throw new Error(`relation "${fk.references.table}" does not exist`);
      }
    }

    this.state.set(table.name, { definition: table, rows: [] });
  }

  async dropTable(table: string): Promise<void> {
    this.assertWritable();
    for (const other of this.state.values()) {
      const dependent = other.definition.foreignKeys.find(
        (fk) => fk.references.table === table && other.definition.name !== table,
      );
      if (dependent) {
        throw new Error(
          `cannot drop table ${table} because ${other.definition.name} depends on it (${dependent.name})`,
        );
      }
    }
    this.state.delete(table);
  }

  async insertDepartment(department: Department): Promise<void> {
    this.assertWritable();
    this.insertRow(DEPARTMENTS_TABLE.name, department.departmentId, department.toRow());
  }

  async insertEmployee(employee: Employee): Promise<void> {
    this.assertWritable();
    this.insertRow(EMPLOYEES_TABLE.name, employee.employeeId, employee.toRow());
  }

  async findDepartmentById(departmentId: number): Promise<Department | null> {
    const row = this.findRow(DEPARTMENTS_TABLE.name, departmentId);
    return row ? toDepartment(row) : null;
  }

  async findEmployeeById(employeeId: number): Promise<Employee | null> {
    const row = this.findRow(EMPLOYEES_TABLE.name, employeeId);
    return row ? toEmployee(row) : null;
  }

  async listDepartments(): Promise<Department[]> {
    return this.sortedRows(DEPARTMENTS_TABLE.name).map(toDepartment);
  }

  async listEmployees(): Promise<Employee[]> {
    return this.sortedRows(EMPLOYEES_TABLE.name).map(toEmployee);
  }

  async describeTables(tables: readonly string[]): Promise<TableDescription[]> {
    const result: TableDescription[] = [];
    for (const name of tables) {
      const stored = this.state.get(name);
      if (stored) {
        result.push({ name, columns: stored.definition.columns.map(describeColumn) });
      }
    }
    return result;
  }

  private assertWritable(): void {
    if (this.isFinished()) {
      throw new Error("Transaction already finished");
    }
  }

  private table(name: string): StoredTable {
    const stored = this.state.get(name);
    if (!stored) {
      throw new Error(`relation "${name}" does not exist`);
    }
    return stored;
  }

  private insertRow(tableName: string, key: RowKey, values: ColumnValue[]): void {
    const stored = this.table(tableName);
    const { definition } = stored;

    const row = validateRow(
      definition,
      Object.fromEntries(definition.columns.map((c, i) => [c.name, values[i] ?? null])),
    );

    const pkIndex = columnIndex(definition, definition.primaryKey);
    if (stored.rows.some((existing) => existing[pkIndex] === row[pkIndex])) {
      throw new UniqueConstraintViolationError(
        primaryKeyConstraintName(definition.name),
        definition.name,
        key,
        `Key (${definition.primaryKey})=(${String(row[pkIndex])}) already exists`,
      );
    }

    definition.columns.forEach((column, i) => {
      const value = row[i] ?? null;
      if (!column.unique || value === null) return;
      if (stored.rows.some((existing) => existing[i] === value)) {
        throw new UniqueConstraintViolationError(
          uniqueConstraintName(definition.name, column.name),
          definition.name,
          key,
          `Key (${column.name})=(${String(value)}) already exists`,
        );
      }
    });

    for (const fk of definition.foreignKeys) {
      const value = row[columnIndex(definition, fk.column)] ?? null;
      if (value === null) continue;

      const target = this.table(fk.references.table);
      const targetIndex = columnIndex(target.definition, fk.references.column);
      if (!target.rows.some((existing) => existing[targetIndex] === value)) {
        throw new ForeignKeyViolationError(
          fk.name,
          definition.name,
          key,
          `Key (${fk.column})=(${String(value)}) is not present in table "${fk.references.table}"`,
        );
      }
    }

    stored.rows.push(row);
  }

  private findRow(tableName: string, key: number): ColumnValue[] | undefined {
    const { definition, rows } = this.table(tableName);
    const pkIndex = columnIndex(definition, definition.primaryKey);
    return rows.find((row) => row[pkIndex] === key);
  }

  private sortedRows(tableName: string): ColumnValue[][] {
    const { definition, rows } = this.table(tableName);
    const pkIndex = columnIndex(definition, definition.primaryKey);
    return [...rows].sort((a, b) => Number(a[pkIndex]) - Number(b[pkIndex]));
  }
}

export class InMemoryUnitOfWork implements UnitOfWorkPort {
  private committed: InMemoryState = new Map();

  async begin(): Promise<TransactionPort> {
    const working = cloneState(this.committed);
    let finished = false;

    const finish = () => {
      if (finished) throw new Error("Transaction already finished");
      finished = true;
    };

    return {
      repository: new InMemoryHrRepository(working, () => finished),
      commit: async () => {
        finish();
        this.committed = working;
      },
      rollback: async () => {
        if (!finished) finish();
      },
    };
  }

  /**
   * Repository over committed state, outside any transaction
   */
  reader(): HrRepositoryPort {
    return new InMemoryHrRepository(cloneState(this.committed));
  }
}

function columnIndex(table: TableDefinition, column: string): number {
  const index = table.columns.findIndex((c) => c.name === column);
  if (index < 0) {
    throw new Error(`column "${column}" of relation "${table.name}" does not exist`);
  }
  return index;
}

function describeColumn(column: ColumnDefinition): ColumnDescription {
  const { type } = column;
  switch (type.kind) {
    case "number":
      return {
        name: column.name,
        type: "numeric",
        length: null,
        precision: type.precision,
        scale: type.scale,
        nullable: column.nullable,
      };
    case "varchar":
      return {
        name: column.name,
        type: "character varying",
        length: type.length,
        precision: null,
        scale: null,
        nullable: column.nullable,
      };
    case "date":
      return {
        name: column.name,
        type: "date",
        length: null,
        precision: null,
        scale: null,
        nullable: column.nullable,
      };
  }
}

function num(value: ColumnValue | undefined): number {
  return typeof value === "number" ? value : Number(value);
}

function optionalNum(value: ColumnValue | undefined): number | null {
  return value === null || value === undefined ? null : num(value);
}

function str(value: ColumnValue | undefined): string {
  return String(value);
}

function optionalStr(value: ColumnValue | undefined): string | null {
  return value === null || value === undefined ? null : String(value);
}

function toDepartment(row: ColumnValue[]): Department {
  return Department.reconstitute({
    departmentId: num(row[0]),
    departmentName: str(row[1]),
    managerId: optionalNum(row[2]),
    locationId: optionalNum(row[3]),
  });
}

function toEmployee(row: ColumnValue[]): Employee {
  return Employee.reconstitute({
    employeeId: num(row[0]),
    firstName: optionalStr(row[1]),
    lastName: str(row[2]),
    email: str(row[3]),
    phoneNumber: optionalStr(row[4]),
    hireDate: str(row[5]),
    jobId: str(row[6]),
    salary: optionalNum(row[7]),
    commissionPct: optionalNum(row[8]),
    managerId: optionalNum(row[9]),
    departmentId: optionalNum(row[10]),
  });
}
