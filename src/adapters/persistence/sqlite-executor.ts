import fs from "fs";
// sql.js is CommonJS; its init function is the module's default export
import * as sqlJsModule from "sql.js";
import type { Database, SqlJsStatic, SqlValue as SqlJsValue } from "sql.js";
import type { SqlExecutor, QueryResult } from "./sql-executor.js";
import type { SqlValue } from "../../core/domain/value-objects/sql-value.js";

export const IN_MEMORY = ":memory:";

let sqlJs: Promise<SqlJsStatic> | undefined;

function loadSqlJs(): Promise<SqlJsStatic> {
  sqlJs ??= sqlJsModule.default();
  return sqlJs;
}

const WRITE_STATEMENT = /^\s*(INSERT|UPDATE|DELETE|REPLACE)\b/i;

/**
 * SQLite Executor (Default)
 *
 * Runs statements on a sql.js (WASM) database. A file-backed database is
 * read into memory on open and written back after every statement that
 * changes it, and again on close.
 */
export class SqliteSqlExecutor implements SqlExecutor {
  private closed = false;

  private constructor(
    private readonly db: Database,
    private readonly file: string | null,
  ) {}

  /**
   * Opens `file`, creating it when missing. `:memory:` is never persisted.
   */
  static async open(file = "sqlite.db"): Promise<SqliteSqlExecutor> {
    const SQL = await loadSqlJs();

    if (file === IN_MEMORY) {
      return new SqliteSqlExecutor(new SQL.Database(), null);
    }

    const db = fs.existsSync(file)
      ? new SQL.Database(fs.readFileSync(file))
      : new SQL.Database();
    const executor = new SqliteSqlExecutor(db, file);
    executor.persist();
    return executor;
  }

  async query<T>(
    sql: string,
    params: readonly SqlValue[] = [],
  ): Promise<QueryResult<T>> {
    const statement = this.db.prepare(sql);
    const bound = params.map(toSqliteValue);

    try {
      if (statement.getColumnNames().length > 0) {
        statement.bind(bound);
        const rows: T[] = [];
        while (statement.step()) {
          // Rows come back keyed by column name; T is the caller's view of them
          rows.push(statement.getAsObject() as T);
        }
        return { rows, rowCount: rows.length };
      }

      statement.run(bound);
    } finally {
      statement.free();
    }

    // sqlite3_changes() is not reset by DDL, so only DML reports it
    const rowCount = WRITE_STATEMENT.test(sql) ? this.db.getRowsModified() : 0;
    this.persist();
    return { rows: [], rowCount };
  }

  async close(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.persist();
    this.db.close();
    this.closed = true;
  }

  private persist(): void {
    if (this.file !== null) {
      fs.writeFileSync(this.file, this.db.export());
    }
  }
}

/**
 * sql.js binds numbers, strings, byte arrays and null
 */
export function toSqliteValue(value: SqlValue): SqlJsValue {
  if (typeof value === "boolean") {
    return value ? 1 : 0;
  }
  if (value instanceof Date) {
    return value.toISOString();
  }
  if (typeof value === "bigint") {
    return Number.isSafeInteger(Number(value)) ? Number(value) : value.toString();
  }
  return value;
}
