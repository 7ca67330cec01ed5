/**
 * HR Schema
 *
 * Table definitions for departments and employees. Column order is the
 * declared order and drives every positional insert.
 */

import {
  type ColumnType,
  dateType,
  numberType,
  varcharType,
} from "../value-objects/column-type.js";

export interface ColumnDefinition {
  name: string;
  type: ColumnType;
  nullable: boolean;
  unique?: boolean;
}

export interface ForeignKeyDefinition {
  name: string;
  column: string;
  references: { table: string; column: string };
}

export interface TableDefinition {
  name: string;
  columns: readonly ColumnDefinition[];
  primaryKey: string;
  foreignKeys: readonly ForeignKeyDefinition[];
}

export const DEPARTMENTS_TABLE: TableDefinition = {
  name: "departments",
  primaryKey: "department_id",
  columns: [
    { name: "department_id", type: numberType(4), nullable: false },
    { name: "department_name", type: varcharType(30), nullable: false },
    // Unenforced reference to employees.employee_id
    { name: "manager_id", type: numberType(6), nullable: true },
    { name: "location_id", type: numberType(4), nullable: true },
  ],
  foreignKeys: [],
};

export const EMPLOYEES_TABLE: TableDefinition = {
  name: "employees",
  primaryKey: "employee_id",
  columns: [
    { name: "employee_id", type: numberType(6), nullable: false },
    { name: "first_name", type: varcharType(20), nullable: true },
    { name: "last_name", type: varcharType(25), nullable: false },
    { name: "email", type: varcharType(25), nullable: false, unique: true },
    { name: "phone_number", type: varcharType(20), nullable: true },
    { name: "hire_date", type: dateType, nullable: false },
    { name: "job_id", type: varcharType(10), nullable: false },
    { name: "salary", type: numberType(8, 2), nullable: true },
    { name: "commission_pct", type: numberType(2, 2), nullable: true },
    // Unenforced reference to employees.employee_id
    { name: "manager_id", type: numberType(6), nullable: true },
    { name: "department_id", type: numberType(4), nullable: true },
  ],
  foreignKeys: [
    {
      name: "fk_emp_dept",
      column: "department_id",
      references: { table: "departments", column: "department_id" },
    },
  ],
};

/**
 * Creation order. Referenced tables come first.
 */
export const HR_SCHEMA: readonly TableDefinition[] = [
  DEPARTMENTS_TABLE,
  EMPLOYEES_TABLE,
];

export function uniqueConstraintName(table: string, column: string): string {
  return `${table}_${column}_key`;
}

export function primaryKeyConstraintName(table: string): string {
  return `${table}_pkey`;
}
