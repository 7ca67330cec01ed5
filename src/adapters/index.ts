/**
 * @module adapters
 * Adapters for external systems (persistence, SQL rendering)
 */

export * from "./persistence/index.js";
export * from "./sql/index.js";
