/**
 * Schema File Loader
 *
 * Reads table definitions from a JSON file and creates the tables that
 * do not exist yet:
 *
 *   { "tables": { "users": [{ "columnName": "id", "type": "INTEGER", "options": "PRIMARY KEY" }] } }
 */
import fs from "fs";
import type { DataAccessPort } from "../core/ports/data-access.port.js";
import {
  isColumnDefinition,
  type ColumnDefinition,
} from "../core/domain/value-objects/column-definition.js";
import { SchemaFileError } from "../core/domain/errors/index.js";

export type SchemaDefinition = Record<string, ColumnDefinition[]>;

export function parseSchema(source: string, path: string): SchemaDefinition {
  let parsed: unknown;
  try {
    parsed = JSON.parse(source);
  } catch (error) {
    throw new SchemaFileError(
      path,
      error instanceof Error ? error.message : String(error),
    );
  }

  if (
    typeof parsed !== "object" ||
    parsed === null ||
    !("tables" in parsed) ||
    typeof parsed.tables !== "object" ||
    parsed.tables === null ||
    Array.isArray(parsed.tables)
  ) {
    throw new SchemaFileError(path, 'expected an object with a "tables" map');
  }

  const schema: SchemaDefinition = {};
  for (const [table, columns] of Object.entries(parsed.tables)) {
    if (!Array.isArray(columns) || columns.length === 0) {
      throw new SchemaFileError(path, `table ${table} needs a list of columns`);
    }
    const definitions: ColumnDefinition[] = [];
    for (const column of columns) {
      if (!isColumnDefinition(column)) {
        throw new SchemaFileError(
          path,
          `table ${table} has a column without columnName and type`,
        );
      }
      definitions.push(column);
    }
    schema[table] = definitions;
  }
  return schema;
}

export function loadSchemaFile(path: string): SchemaDefinition {
  if (!fs.existsSync(path)) {
    throw new SchemaFileError(path, "file not found");
  }
  return parseSchema(fs.readFileSync(path, "utf-8"), path);
}

/**
 * @returns names of the tables created, in file order
 */
export async function applySchema(
  dal: DataAccessPort,
  schema: SchemaDefinition,
): Promise<string[]> {
  const existing = new Set(dal.tables());
  const created: string[] = [];

  for (const [table, columns] of Object.entries(schema)) {
    if (existing.has(table)) {
      console.log(`[Schema] Skipping ${table}: already exists`);
      continue;
    }
    await dal.createTable(table, columns);
    created.push(table);
  }
  return created;
}
