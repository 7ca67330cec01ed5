/**
 * @module main
 * Composition root and entry point
 */

// Core exports
export * from "../core/index.js";

// Adapter exports
export * from "../adapters/index.js";

// Script exports
export * from "../scripts/run-migrations.js";
export * from "../scripts/run-seed.js";

export * from "./config.js";
