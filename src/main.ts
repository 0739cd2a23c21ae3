/**
 * Application Entry Point
 *
 * Opens the configured database, applies DAL_SCHEMA_FILE when set and
 * reports the tables found.
 */

import { loadConfig } from "./config.js";
import { connectDal } from "./adapters/persistence/connect.js";
import { applySchema, loadSchemaFile } from "./scripts/apply-schema.js";

async function bootstrap() {
  const config = loadConfig();
  const dal = await connectDal(config);

  try {
    if (config.schemaFile) {
      const created = await applySchema(dal, loadSchemaFile(config.schemaFile));
      console.log(`[Main] Created ${created.length} table(s) from ${config.schemaFile}`);
    }

    const target =
      config.dialect === "sqlite" ? config.databaseFile : "postgres";
    console.log(`[Main] ${target}: ${dal.tables().length} table(s)`);
    for (const table of dal.tables()) {
      console.log(`  ${table} (${dal.columns(table).join(", ")})`);
    }
  } finally {
    await dal.close();
  }
}

bootstrap().catch((error: unknown) => {
  console.error("[Main] Failed:", error);
  process.exit(1);
});
