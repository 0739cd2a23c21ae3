/**
 * Data Access Port
 *
 * Simplified CRUD over the tables of one database.
 */

import type { Row, SqlValue } from "../domain/value-objects/sql-value.js";
import type { Criterion } from "../domain/value-objects/criterion.js";
import type { ColumnDefinition } from "../domain/value-objects/column-definition.js";

export interface GetOptions {
  /** Column compared with the id (default "id") */
  idField?: string;
  /** Columns to return (default all) */
  fields?: readonly string[];
}

export interface SearchOptions {
  fields?: readonly string[];
  /** Joined with AND; omitted or empty returns every row */
  criteria?: readonly Criterion[];
  limit?: number;
}

export interface WriteOptions {
  /** Required and non-empty */
  criteria?: readonly Criterion[];
}

export interface DataAccessPort {
  tables(): string[];
  columns(table: string): readonly string[];
  refreshSchema(): Promise<void>;

  createTable(table: string, columns: readonly ColumnDefinition[]): Promise<void>;
  dropTable(table: string): Promise<void>;

  insert(
    table: string,
    row: readonly SqlValue[] | Readonly<Record<string, SqlValue>>,
  ): Promise<number>;
  get(table: string, id: SqlValue, options?: GetOptions): Promise<Row | null>;
  search(table: string, options?: SearchOptions): Promise<Row[]>;
  update(
    table: string,
    changes: Readonly<Record<string, SqlValue>>,
    options: WriteOptions,
  ): Promise<number>;
  delete(table: string, options: WriteOptions): Promise<number>;

  close(): Promise<void>;
}
