import pg from "pg";
import { Dal } from "./dal.js";
import { PgSqlExecutor } from "./pg-executor.js";
import { SqliteSqlExecutor } from "./sqlite-executor.js";
import { postgresDialect, sqliteDialect } from "./sql-dialect.js";
import type { DalConfig } from "../../config.js";
import { ConfigurationError } from "../../core/domain/errors/index.js";

/**
 * Builds the executor named by the configuration and opens a Dal on it
 */
export async function connectDal(config: DalConfig): Promise<Dal> {
  if (config.dialect === "postgres") {
    if (!config.databaseUrl) {
      throw new ConfigurationError("DATABASE_URL is required for postgres");
    }
    const pool = new pg.Pool({ connectionString: config.databaseUrl });
    return Dal.open(new PgSqlExecutor(pool), {
      dialect: postgresDialect,
      verbose: config.verbose,
    });
  }

  return Dal.open(await SqliteSqlExecutor.open(config.databaseFile), {
    dialect: sqliteDialect,
    verbose: config.verbose,
  });
}
