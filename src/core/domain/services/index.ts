/**
 * Domain Services Index
 */

export * from "./row-validator.js";
export * from "./seed-verifier.js";
