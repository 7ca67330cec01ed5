/**
 * @module adapters/sql
 * SQL text rendering
 */

export * from "./seed-script.js";
