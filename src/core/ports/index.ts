/**
 * @module core/ports
 * Ports (interfaces) for hexagonal architecture
 */

export * from "./hr-repository.port.js";
export * from "./unit-of-work.port.js";
export * from "./logger.port.js";
