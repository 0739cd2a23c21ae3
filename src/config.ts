/**
 * Configuration from environment
 */

import { ConfigurationError } from "./core/domain/errors/index.js";
import type { DialectName } from "./core/ports/sql-dialect.port.js";

export interface DalConfig {
  dialect: DialectName;
  /** SQLite database file, created when missing */
  databaseFile: string;
  /** PostgreSQL connection string */
  databaseUrl?: string;
  verbose: boolean;
  schemaFile?: string;
}

export const DEFAULT_DATABASE_FILE = "sqlite.db";

function parseDialect(value: string | undefined): DialectName {
  const dialect = (value || "sqlite").toLowerCase();
  if (dialect === "sqlite" || dialect === "postgres") {
    return dialect;
  }
  throw new ConfigurationError(
    `DAL_DIALECT must be "sqlite" or "postgres", got "${value}"`,
  );
}

function parseFlag(value: string | undefined): boolean {
  return value === "1" || value?.toLowerCase() === "true";
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): DalConfig {
  const dialect = parseDialect(env.DAL_DIALECT);
  const databaseUrl = env.DATABASE_URL || undefined;

  if (dialect === "postgres" && !databaseUrl) {
    throw new ConfigurationError(
      "DATABASE_URL is required when DAL_DIALECT is postgres",
    );
  }

  return {
    dialect,
    databaseFile: env.DAL_DB_FILE || DEFAULT_DATABASE_FILE,
    databaseUrl,
    verbose: parseFlag(env.DAL_VERBOSE),
    schemaFile: env.DAL_SCHEMA_FILE || undefined,
  };
}
