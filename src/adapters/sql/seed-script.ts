/**
 * Seed Script Renderer
 *
 * Renders the HR schema and seed batch as SQL text. Statement order:
 * CREATE TABLE departments, CREATE TABLE employees, department inserts,
 * employee inserts, COMMIT. Inserts are positional.
 */

import type { ColumnType, ColumnValue } from "../../core/domain/value-objects/column-type.js";
import {
  HR_SCHEMA,
  DEPARTMENTS_TABLE,
  EMPLOYEES_TABLE,
  type ColumnDefinition,
  type TableDefinition,
} from "../../core/domain/schema/hr-schema.js";
import { Department } from "../../core/domain/entities/department.js";
import { Employee } from "../../core/domain/entities/employee.js";
import { HR_SEED, type SeedBatch } from "../../core/domain/seed-data.js";

export type SqlDialect = "oracle" | "postgres";

export const SQL_DIALECTS: readonly SqlDialect[] = ["oracle", "postgres"];

export function isSqlDialect(value: string): value is SqlDialect {
  return (SQL_DIALECTS as readonly string[]).includes(value);
}

export function renderColumnType(type: ColumnType, dialect: SqlDialect): string {
  switch (type.kind) {
    case "number": {
      const base = dialect === "oracle" ? "NUMBER" : "NUMERIC";
      return type.scale > 0
        ? `${base}(${type.precision},${type.scale})`
        : `${base}(${type.precision})`;
    }
    case "varchar":
      return `${dialect === "oracle" ? "VARCHAR2" : "VARCHAR"}(${type.length})`;
    case "date":
      return "DATE";
  }
}

function renderColumn(
  table: TableDefinition,
  column: ColumnDefinition,
  dialect: SqlDialect,
): string {
  const parts = [column.name, renderColumnType(column.type, dialect)];

  if (column.name === table.primaryKey) {
    parts.push("PRIMARY KEY");
  } else if (!column.nullable) {
    parts.push("NOT NULL");
  }
  if (column.unique) {
    parts.push("UNIQUE");
  }

  return parts.join(" ");
}

export function renderCreateTable(table: TableDefinition, dialect: SqlDialect): string {
  const lines = table.columns.map((c) => renderColumn(table, c, dialect));

  for (const fk of table.foreignKeys) {
    lines.push(
      `CONSTRAINT ${fk.name} FOREIGN KEY (${fk.column}) REFERENCES ${fk.references.table}(${fk.references.column})`,
    );
  }

  return `CREATE TABLE ${table.name} (\n${lines.map((l) => `    ${l}`).join(",\n")}\n)`;
}

export function renderLiteral(value: ColumnValue, type: ColumnType): string {
  if (value === null) return "NULL";
  if (type.kind === "date") return `DATE '${value}'`;
  if (typeof value === "number") return String(value);
  return `'${value.replace(/'/g, "''")}'`;
}

export function renderInsert(table: TableDefinition, row: readonly ColumnValue[]): string {
  const values = table.columns.map((column, i) => renderLiteral(row[i] ?? null, column.type));
  return `INSERT INTO ${table.name} VALUES (${values.join(", ")})`;
}

/**
 * Every statement of the seed script, without terminators
 */
export function renderSeedStatements(
  dialect: SqlDialect,
  batch: SeedBatch = HR_SEED,
): string[] {
  return [
    ...HR_SCHEMA.map((table) => renderCreateTable(table, dialect)),
    ...batch.departments.map((props) =>
      renderInsert(DEPARTMENTS_TABLE, Department.create(props).toRow()),
    ),
    ...batch.employees.map((props) =>
      renderInsert(EMPLOYEES_TABLE, Employee.create(props).toRow()),
    ),
    "COMMIT",
  ];
}

export function renderSeedScript(
  dialect: SqlDialect,
  batch: SeedBatch = HR_SEED,
): string {
  return renderSeedStatements(dialect, batch)
    .map((statement) => `${statement};`)
    .join("\n") + "\n";
}
