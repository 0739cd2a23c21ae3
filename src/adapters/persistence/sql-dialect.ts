import type {
  DialectName,
  SqlDialect,
} from "../../core/ports/sql-dialect.port.js";
import {
  ListOperators,
  ScalarOperators,
} from "../../core/domain/value-objects/criterion.js";

function quoteWithDoubleQuotes(identifier: string): string {
  return `"${identifier.replace(/"/g, '""')}"`;
}

/**
 * SQLite: positional `?` placeholders, schema from sqlite_master.
 * Internal tables are exactly those named `sqlite_...`.
 */
export const sqliteDialect: SqlDialect = {
  name: "sqlite",
  placeholder: () => "?",
  quoteIdentifier: quoteWithDoubleQuotes,
  operators: [...ScalarOperators, ...ListOperators],
  bindsIsOperand: true,
  schemaQuery: `SELECT m.name AS table_name, p.name AS column_name
    FROM sqlite_master AS m
    JOIN pragma_table_info(m.name) AS p
    WHERE m.type = 'table' AND substr(m.name, 1, 7) <> 'sqlite_'
    ORDER BY m.name, p.cid`,
};

/**
 * PostgreSQL: numbered `$n` placeholders, schema from information_schema
 * (base tables only, views excluded)
 */
export const postgresDialect: SqlDialect = {
  name: "postgres",
  placeholder: (index) => `$${index}`,
  quoteIdentifier: quoteWithDoubleQuotes,
  operators: [
    ...ScalarOperators.filter((operator) => operator !== "==" && operator !== "GLOB"),
    ...ListOperators,
  ],
  bindsIsOperand: false,
  schemaQuery: `SELECT c.table_name, c.column_name
    FROM information_schema.columns AS c
    JOIN information_schema.tables AS t
      ON t.table_schema = c.table_schema AND t.table_name = c.table_name
    WHERE c.table_schema = current_schema() AND t.table_type = 'BASE TABLE'
    ORDER BY c.table_name, c.ordinal_position`,
};

export function dialectFor(name: DialectName): SqlDialect {
  return name === "postgres" ? postgresDialect : sqliteDialect;
}
