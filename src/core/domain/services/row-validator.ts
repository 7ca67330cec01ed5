/**
 * Row Validator
 *
 * Checks a row against its table definition and returns the positional
 * value list in declared column order. Fractional digits beyond a number
 * column's scale are rounded half away from zero, as the database does.
 */

import type { TableDefinition, ColumnDefinition } from "../schema/hr-schema.js";
import {
  countDigits,
  isIsoDate,
  roundToScale,
  type ColumnValue,
} from "../value-objects/column-type.js";
import {
  InvalidColumnValueError,
  NotNullViolationError,
  ValueTooLargeError,
  type RowKey,
} from "../errors/index.js";

export type RowValues = Readonly<Record<string, ColumnValue | undefined>>;

export function validateRow(
  table: TableDefinition,
  values: RowValues,
): ColumnValue[] {
  const key = primaryKeyOf(table, values);

  return table.columns.map((column) => {
    const value = values[column.name] ?? null;

    if (value === null) {
      if (!column.nullable) {
        throw new NotNullViolationError(column.name, table.name, key);
      }
      return null;
    }

    return checkValue(table.name, column, value, key);
  });
}

/**
 * Same checks as validateRow, keyed by column name
 */
export function validateColumns(
  table: TableDefinition,
  values: RowValues,
): Record<string, ColumnValue> {
  const row = validateRow(table, values);
  return Object.fromEntries(table.columns.map((c, i) => [c.name, row[i] ?? null]));
}

export function primaryKeyOf(table: TableDefinition, values: RowValues): RowKey {
  return values[table.primaryKey] ?? null;
}

function checkValue(
  table: string,
  column: ColumnDefinition,
  value: number | string,
  key: RowKey,
): number | string {
  const { type } = column;

  switch (type.kind) {
    case "number": {
      if (typeof value !== "number" || !Number.isFinite(value)) {
        throw new InvalidColumnValueError(column.name, table, key, `Expected a number for ${column.name}`);
      }
      if (value.toString().includes("e")) {
        throw new InvalidColumnValueError(column.name, table, key, `Unrepresentable number ${value} for ${column.name}`);
      }
      if (type.scale === 0 && !Number.isInteger(value)) {
        throw new InvalidColumnValueError(column.name, table, key, `Expected an integer for ${column.name}, got ${value}`);
      }

      const rounded = countDigits(value).fraction > type.scale ? roundToScale(value, type.scale) : value;
      if (countDigits(rounded).integer > type.precision - type.scale) {
        throw new ValueTooLargeError(
          column.name,
          table,
          key,
          `Value ${value} exceeds precision ${type.precision},${type.scale} of ${column.name}`,
        );
      }
      return rounded;
    }

    case "varchar": {
      if (typeof value !== "string") {
        throw new InvalidColumnValueError(column.name, table, key, `Expected a string for ${column.name}`);
      }
      const length = [...value].length;
      if (length > type.length) {
        throw new ValueTooLargeError(
          column.name,
          table,
          key,
          `Value too large for ${column.name} (actual: ${length}, maximum: ${type.length})`,
        );
      }
      return value;
    }

    case "date":
      if (typeof value !== "string" || !isIsoDate(value)) {
        throw new InvalidColumnValueError(
          column.name,
          table,
          key,
          `Expected a YYYY-MM-DD date for ${column.name}, got ${String(value)}`,
        );
      }
      return value;
  }
}
