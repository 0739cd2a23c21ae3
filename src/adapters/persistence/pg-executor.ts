import type { Pool, PoolClient } from "pg";
import type { SqlExecutor, QueryResult } from "./sql-executor.js";
import type { SqlValue } from "../../core/domain/value-objects/sql-value.js";

/**
 * PostgreSQL Executor
 *
 * Wraps pg.Pool or pg.PoolClient to implement SqlExecutor.
 */
export class PgSqlExecutor implements SqlExecutor {
  constructor(private readonly client: Pool | PoolClient) {}

  async query<T>(
    sql: string,
    params: readonly SqlValue[] = [],
  ): Promise<QueryResult<T>> {
    const result = await this.client.query(sql, [...params]);
    return {
      rows: result.rows,
      rowCount: result.rowCount,
    };
  }

  /**
   * Releases a checked-out client back to its pool, or ends the pool
   */
  async close(): Promise<void> {
    if ("release" in this.client) {
      this.client.release();
      return;
    }
    await this.client.end();
  }
}
