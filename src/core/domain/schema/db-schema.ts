/**
 * Database Schema Cache
 *
 * Table name → ordered column names, as last read from the database.
 * Used to reject unknown tables and columns before any SQL is built.
 */

import { UnknownColumnError, UnknownTableError } from "../errors/index.js";
import type { SchemaRow } from "../../ports/sql-dialect.port.js";

export class DbSchema {
  private constructor(
    private readonly tableColumns: ReadonlyMap<string, readonly string[]>,
  ) {}

  static empty(): DbSchema {
    return new DbSchema(new Map());
  }

  static fromRows(rows: readonly SchemaRow[]): DbSchema {
    const tableColumns = new Map<string, string[]>();
    for (const { table_name, column_name } of rows) {
      const columns = tableColumns.get(table_name);
      if (columns) {
        columns.push(column_name);
      } else {
        tableColumns.set(table_name, [column_name]);
      }
    }
    return new DbSchema(tableColumns);
  }

  tables(): string[] {
    return [...this.tableColumns.keys()];
  }

  hasTable(table: string): boolean {
    return this.tableColumns.has(table);
  }

  columnsOf(table: string): readonly string[] {
    const columns = this.tableColumns.get(table);
    if (!columns) {
      throw new UnknownTableError(table);
    }
    return columns;
  }

  hasColumn(table: string, column: string): boolean {
    return this.tableColumns.get(table)?.includes(column) ?? false;
  }

  requireTable(table: string): void {
    if (!this.hasTable(table)) {
      throw new UnknownTableError(table);
    }
  }

  /**
   * Throws one error naming every unknown column, in the order given
   */
  requireColumns(table: string, columns: Iterable<string>): void {
    const known = this.columnsOf(table);
    const unknown = [...new Set(columns)].filter(
      (column) => !known.includes(column),
    );
    if (unknown.length > 0) {
      throw new UnknownColumnError(table, unknown);
    }
  }
}
