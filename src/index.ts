/**
 * sqlite-dal
 *
 * Simplified CRUD data-access layer over an embedded SQLite database,
 * with an optional PostgreSQL backend.
 */

export * from "./core/index.js";
export * from "./adapters/index.js";
export * from "./scripts/apply-schema.js";
export { loadConfig, DEFAULT_DATABASE_FILE, type DalConfig } from "./config.js";
