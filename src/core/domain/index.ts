/**
 * @module core/domain
 * Domain entities, schema, seed data, value objects and errors
 */

export * from "./entities/index.js";
export * from "./value-objects/column-type.js";
export * from "./schema/hr-schema.js";
export * from "./seed-data.js";
export * from "./services/index.js";
export * from "./errors/index.js";
