/**
 * SQL Dialect Port
 *
 * The few places where the statements sent by the Dal differ between
 * engines: parameter placeholders, identifier quoting, accepted criterion
 * operators and schema discovery.
 */

import type { Operator } from "../domain/value-objects/criterion.js";

export type DialectName = "sqlite" | "postgres";

export interface SchemaRow {
  table_name: string;
  column_name: string;
}

export interface SqlDialect {
  readonly name: DialectName;
  /** Placeholder for the 1-based parameter position */
  placeholder(index: number): string;
  quoteIdentifier(identifier: string): string;
  /**
   * Criterion operators the engine understands. `==` and `GLOB` exist in
   * SQLite only.
   */
  readonly operators: readonly Operator[];
  /**
   * Whether `IS` / `IS NOT` may compare with a bound value. `IS NULL` and
   * `IS NOT NULL` are always rendered without a parameter.
   */
  readonly bindsIsOperand: boolean;
  /** Returns SchemaRow rows for base tables, ordered by table, then column position */
  readonly schemaQuery: string;
}
