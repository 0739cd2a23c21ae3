/**
 * @module adapters/persistence
 * SQLite and PostgreSQL persistence adapters
 */

export * from "./dal.js";
export * from "./connect.js";
export * from "./sql-dialect.js";
export * from "./sql-executor.js";
export * from "./sqlite-executor.js";
export * from "./pg-executor.js";
