/**
 * @module adapters/persistence
 * PostgreSQL and in-memory persistence adapters
 */

export * from "./sql-executor.js";
export * from "./pg-executor.js";
export * from "./pg-errors.js";
export * from "./postgres-hr.repository.js";
export * from "./postgres-unit-of-work.js";
export * from "./in-memory-hr.repository.js";
export * from "./read-only-query.service.js";
