/**
 * @module core
 * Core layer exports (domain + ports + use-cases)
 */

export * from "./domain/index.js";
export * from "./ports/index.js";
export * from "./use-cases/index.js";
