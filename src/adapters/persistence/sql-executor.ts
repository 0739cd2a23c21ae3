/**
 * SQL Executor Interface
 *
 * Abstracts the database driver so the Dal can run against the embedded
 * SQLite driver or a PostgreSQL pool with the same statements.
 */

import type { SqlValue } from "../../core/domain/value-objects/sql-value.js";

export interface QueryResult<T> {
  rows: T[];
  /** Rows returned by a read, rows affected by a write */
  rowCount: number | null;
}

export interface SqlExecutor {
  query<T>(sql: string, params?: readonly SqlValue[]): Promise<QueryResult<T>>;
  close?(): Promise<void>;
}
