/**
 * @module core/use-cases
 * Application use cases (orchestration layer)
 */

export * from "./initialize-schema.use-case.js";
export * from "./seed-data.use-case.js";
export * from "./finalize-transaction.use-case.js";
export * from "./seed-database.use-case.js";
export * from "./resolve-employee-department.use-case.js";
