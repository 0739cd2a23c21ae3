/**
 * @module core/domain/value-objects
 */

export * from "./sql-value.js";
export * from "./criterion.js";
export * from "./column-definition.js";
export * from "./write-lock.js";
