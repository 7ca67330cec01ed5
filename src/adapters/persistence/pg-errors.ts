/**
 * PostgreSQL error translation
 *
 * Maps SQLSTATE codes raised by the server to domain errors. Anything not
 * listed is returned unchanged.
 */

import pg from "pg";
import {
  ForeignKeyViolationError,
  NotNullViolationError,
  SchemaConflictError,
  UniqueConstraintViolationError,
  ValueTooLargeError,
  type RowKey,
} from "../../core/domain/errors/index.js";

export const PG_ERROR_CODES = {
  DUPLICATE_TABLE: "42P07",
  FOREIGN_KEY_VIOLATION: "23503",
  UNIQUE_VIOLATION: "23505",
  NOT_NULL_VIOLATION: "23502",
  STRING_DATA_RIGHT_TRUNCATION: "22001",
  NUMERIC_VALUE_OUT_OF_RANGE: "22003",
} as const;

export function translatePgError(error: unknown, table: string, key: RowKey): unknown {
  if (!(error instanceof pg.DatabaseError)) return error;

  const constraint = error.constraint ?? "unknown";
  const column = error.column ?? "unknown";
  const detail = error.detail ?? error.message;
  const target = error.table ?? table;

  switch (error.code) {
    case PG_ERROR_CODES.DUPLICATE_TABLE:
      return new SchemaConflictError(table);
    case PG_ERROR_CODES.FOREIGN_KEY_VIOLATION:
      return new ForeignKeyViolationError(constraint, target, key, detail);
    case PG_ERROR_CODES.UNIQUE_VIOLATION:
      return new UniqueConstraintViolationError(constraint, target, key, detail);
    case PG_ERROR_CODES.NOT_NULL_VIOLATION:
      return new NotNullViolationError(column, target, key);
    case PG_ERROR_CODES.STRING_DATA_RIGHT_TRUNCATION:
    case PG_ERROR_CODES.NUMERIC_VALUE_OUT_OF_RANGE:
      return new ValueTooLargeError(column, target, key, error.message);
    default:
      return error;
  }
}
