/**
 * Dal
 *
 * Simplified CRUD over one database connection. Each call is checked against
 * the cached schema, rendered to a single parameterized statement and run
 * through the SqlExecutor. Writes are serialized by an in-process lock, and
 * a write checks the schema only once it holds the lock.
 *
 * @example
 *   const dal = await openSqliteDal("app.db");
 *   await dal.createTable("users", [
 *     { columnName: "id", type: "INTEGER", options: "PRIMARY KEY" },
 *     { columnName: "name", type: "TEXT" },
 *   ]);
 *   await dal.insert("users", { id: 1, name: "Ada" });
 *   await dal.update("users", { name: "Grace" }, { criteria: [["id", "=", 1]] });
 */

import type { SqlExecutor } from "./sql-executor.js";
import { SqliteSqlExecutor } from "./sqlite-executor.js";
import { sqliteDialect } from "./sql-dialect.js";
import type {
  SchemaRow,
  SqlDialect,
} from "../../core/ports/sql-dialect.port.js";
import type {
  DataAccessPort,
  GetOptions,
  SearchOptions,
  WriteOptions,
} from "../../core/ports/data-access.port.js";
import { DbSchema } from "../../core/domain/schema/db-schema.js";
import {
  StatementBuilder,
  type Statement,
} from "../../core/domain/services/statement-builder.js";
import { WriteLock } from "../../core/domain/value-objects/write-lock.js";
import type { Row, SqlValue } from "../../core/domain/value-objects/sql-value.js";
import type { ColumnDefinition } from "../../core/domain/value-objects/column-definition.js";
import type { Criterion } from "../../core/domain/value-objects/criterion.js";
import {
  MissingCriteriaError,
  TableExistsError,
} from "../../core/domain/errors/index.js";

export interface DalOptions {
  /** Defaults to SQLite */
  dialect?: SqlDialect;
  /** Log every statement sent to the database */
  verbose?: boolean;
}

export type InsertValues = readonly SqlValue[];
export type InsertRecord = Readonly<Record<string, SqlValue>>;

export class Dal implements DataAccessPort {
  private schema = DbSchema.empty();
  private readonly statements: StatementBuilder;
  private readonly writeLock = new WriteLock();
  private readonly verbose: boolean;

  private constructor(
    private readonly executor: SqlExecutor,
    readonly dialect: SqlDialect,
    verbose: boolean,
  ) {
    this.statements = new StatementBuilder(dialect);
    this.verbose = verbose;
  }

  /**
   * Connects the Dal to an executor and loads the current schema
   */
  static async open(executor: SqlExecutor, options: DalOptions = {}): Promise<Dal> {
    const dal = new Dal(
      executor,
      options.dialect ?? sqliteDialect,
      options.verbose ?? false,
    );
    await dal.refreshSchema();
    return dal;
  }

  // ============================================
  // Schema
  // ============================================

  async refreshSchema(): Promise<void> {
    const { rows } = await this.executor.query<SchemaRow>(
      this.dialect.schemaQuery,
    );
    this.schema = DbSchema.fromRows(rows);
  }

  tables(): string[] {
    return this.schema.tables();
  }

  columns(table: string): readonly string[] {
    return this.schema.columnsOf(table);
  }

  async createTable(
    table: string,
    columns: readonly ColumnDefinition[],
  ): Promise<void> {
    await this.writeLock.runExclusive(async () => {
      if (this.schema.hasTable(table)) {
        throw new TableExistsError(table);
      }
      await this.run(this.statements.createTable(table, columns));
      await this.refreshSchema();
    });
    console.log(`[Dal] Created table ${table} (${columns.length} columns)`);
  }

  async dropTable(table: string): Promise<void> {
    await this.writeLock.runExclusive(async () => {
      this.schema.requireTable(table);
      await this.run(this.statements.dropTable(table));
      await this.refreshSchema();
    });
    console.log(`[Dal] Dropped table ${table}`);
  }

  // ============================================
  // Writes
  // ============================================

  /**
   * Inserts one row.
   *
   * An array is bound positionally to every column in table order. An object
   * inserts only its own keys, all of which must be columns of the table.
   *
   * @returns rows affected
   */
  async insert(table: string, row: InsertValues | InsertRecord): Promise<number> {
    return this.writeLock.runExclusive(async () => {
      this.schema.requireTable(table);

      let statement: Statement;
      if (isInsertValues(row)) {
        statement = this.statements.insertValues(table, row);
      } else {
        const columns = Object.keys(row);
        this.schema.requireColumns(table, columns);
        statement = this.statements.insertRecord(table, columns, Object.values(row));
      }
      return this.write(statement);
    });
  }

  /**
   * Updates every row matching all criteria. Criteria are mandatory; to touch
   * every row pass one that always holds, e.g. `["id", ">", 0]`.
   *
   * @returns rows affected
   */
  async update(
    table: string,
    changes: InsertRecord,
    options: WriteOptions,
  ): Promise<number> {
    return this.writeLock.runExclusive(async () => {
      this.schema.requireTable(table);
      const criteria = requireCriteria("update", options.criteria);
      this.schema.requireColumns(table, [
        ...Object.keys(changes),
        ...criteriaColumns(criteria),
      ]);
      return this.write(this.statements.update(table, changes, criteria));
    });
  }

  /**
   * @returns rows affected
   */
  async delete(table: string, options: WriteOptions): Promise<number> {
    return this.writeLock.runExclusive(async () => {
      this.schema.requireTable(table);
      const criteria = requireCriteria("delete", options.criteria);
      this.schema.requireColumns(table, criteriaColumns(criteria));
      return this.write(this.statements.delete(table, criteria));
    });
  }

  // ============================================
  // Reads
  // ============================================

  /**
   * First row whose id column equals `id`, or null
   */
  async get(
    table: string,
    id: SqlValue,
    options: GetOptions = {},
  ): Promise<Row | null> {
    const { idField = "id", fields = [] } = options;
    this.schema.requireTable(table);
    this.schema.requireColumns(table, [idField, ...fields]);

    const { rows } = await this.run<Row>(
      this.statements.select(table, {
        fields,
        criteria: [[idField, "=", id]],
        limit: 1,
      }),
    );
    return rows[0] ?? null;
  }

  /**
   * Rows matching every criterion; all rows when no criteria are given
   */
  async search(table: string, options: SearchOptions = {}): Promise<Row[]> {
    const { fields = [], criteria = [], limit } = options;
    this.schema.requireTable(table);
    this.schema.requireColumns(table, [...fields, ...criteriaColumns(criteria)]);

    const { rows } = await this.run<Row>(
      this.statements.select(table, { fields, criteria, limit }),
    );
    return rows;
  }

  async close(): Promise<void> {
    await this.executor.close?.();
  }

  // ============================================
  // Helpers
  // ============================================

  private async run<T>(statement: Statement) {
    if (this.verbose) {
      console.log(`[Dal] ${statement.sql}`, statement.params);
    }
    return this.executor.query<T>(statement.sql, statement.params);
  }

  private async write(statement: Statement): Promise<number> {
    const { rowCount } = await this.run(statement);
    return rowCount ?? 0;
  }
}

/**
 * Opens (creating if needed) a SQLite database file
 */
export async function openSqliteDal(
  file = "sqlite.db",
  options: Omit<DalOptions, "dialect"> = {},
): Promise<Dal> {
  return Dal.open(await SqliteSqlExecutor.open(file), {
    ...options,
    dialect: sqliteDialect,
  });
}

function isInsertValues(row: InsertValues | InsertRecord): row is InsertValues {
  return Array.isArray(row);
}

function requireCriteria(
  operation: "update" | "delete",
  criteria: readonly Criterion[] | undefined,
): readonly Criterion[] {
  if (!criteria || criteria.length === 0) {
    throw new MissingCriteriaError(operation);
  }
  return criteria;
}

function criteriaColumns(criteria: readonly Criterion[]): string[] {
  return criteria.map(([column]) => column);
}
