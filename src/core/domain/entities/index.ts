/**
 * @module core/domain/entities
 */

export * from "./department.js";
export * from "./employee.js";
