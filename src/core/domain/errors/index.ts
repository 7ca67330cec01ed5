/**
 * Domain Errors
 *
 * Every seed failure is terminal for the batch. Constraint errors name the
 * violated constraint and the primary key of the offending row.
 */

export type RowKey = number | string | null;

export class DomainError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "DomainError";
  }
}

export class SchemaConflictError extends DomainError {
  constructor(readonly table: string) {
    super(`Table already exists: ${table}`);
    this.name = "SchemaConflictError";
  }
}

/**
 * Base for violations raised while writing a row
 */
export abstract class ConstraintViolationError extends DomainError {
  constructor(
    readonly constraint: string,
    readonly table: string,
    readonly key: RowKey,
    detail: string,
  ) {
    super(`${detail} [constraint=${constraint}, table=${table}, key=${String(key)}]`);
    this.name = "ConstraintViolationError";
  }
}

export class ForeignKeyViolationError extends ConstraintViolationError {
  constructor(constraint: string, table: string, key: RowKey, detail?: string) {
    super(constraint, table, key, detail ?? "Referenced row does not exist");
    this.name = "ForeignKeyViolationError";
  }
}

export class UniqueConstraintViolationError extends ConstraintViolationError {
  constructor(constraint: string, table: string, key: RowKey, detail?: string) {
    super(constraint, table, key, detail ?? "Duplicate value");
    this.name = "UniqueConstraintViolationError";
  }
}

export class NotNullViolationError extends ConstraintViolationError {
  constructor(readonly column: string, table: string, key: RowKey) {
    super(`${table}.${column} NOT NULL`, table, key, `Missing required value for ${column}`);
    this.name = "NotNullViolationError";
  }
}

export class ValueTooLargeError extends ConstraintViolationError {
  constructor(
    readonly column: string,
    table: string,
    key: RowKey,
    detail: string,
  ) {
    super(`${table}.${column} SIZE`, table, key, detail);
    this.name = "ValueTooLargeError";
  }
}

export class InvalidColumnValueError extends ConstraintViolationError {
  constructor(
    readonly column: string,
    table: string,
    key: RowKey,
    detail: string,
  ) {
    super(`${table}.${column} TYPE`, table, key, detail);
    this.name = "InvalidColumnValueError";
  }
}

export class TransactionCommitError extends DomainError {
  constructor(readonly reason: unknown) {
    super(
      `Commit failed: ${reason instanceof Error ? reason.message : String(reason)}`,
    );
    this.name = "TransactionCommitError";
  }
}

export class EmployeeNotFoundError extends DomainError {
  constructor(employeeId: number) {
    super(`Employee not found: ${employeeId}`);
    this.name = "EmployeeNotFoundError";
  }
}

export class ReadOnlyQueryError extends DomainError {
  constructor(reason: string, readonly sql: string) {
    super(`Rejected query: ${reason}`);
    this.name = "ReadOnlyQueryError";
  }
}

export class ConfigurationError extends DomainError {
  constructor(variable: string, value: string, expected: string) {
    super(`Invalid ${variable}="${value}" (expected ${expected})`);
    this.name = "ConfigurationError";
  }
}
