import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { Dal } from "../../src/adapters/persistence/dal.js";
import { postgresDialect } from "../../src/adapters/persistence/sql-dialect.js";
import type { SqlExecutor } from "../../src/adapters/persistence/sql-executor.js";
import {
  MissingCriteriaError,
  TableExistsError,
  UnknownColumnError,
  UnknownTableError,
} from "../../src/core/domain/errors/index.js";

const usersSchema = [
  { table_name: "users", column_name: "id" },
  { table_name: "users", column_name: "name" },
  { table_name: "users", column_name: "age" },
];

describe("Dal", () => {
  let executor: SqlExecutor;
  let dal: Dal;

  beforeEach(async () => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    executor = {
      query: vi.fn(),
      close: vi.fn(),
    };
    vi.mocked(executor.query).mockResolvedValueOnce({
      rows: usersSchema,
      rowCount: usersSchema.length,
    });
    dal = await Dal.open(executor, { dialect: postgresDialect });
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("should load the schema when opened", () => {
    expect(executor.query).toHaveBeenCalledWith(postgresDialect.schemaQuery);
    expect(dal.tables()).toEqual(["users"]);
    expect(dal.columns("users")).toEqual(["id", "name", "age"]);
  });

  describe("insert", () => {
    it("should insert positional values", async () => {
      vi.mocked(executor.query).mockResolvedValueOnce({ rows: [], rowCount: 1 });

      const inserted = await dal.insert("users", [1, "Ada", 36]);

      expect(inserted).toBe(1);
      expect(executor.query).toHaveBeenLastCalledWith(
        'INSERT INTO "users" VALUES ($1, $2, $3)',
        [1, "Ada", 36],
      );
    });

    it("should insert only the keys of a record", async () => {
      vi.mocked(executor.query).mockResolvedValueOnce({ rows: [], rowCount: 1 });

      await dal.insert("users", { name: "Ada", age: 36 });

      expect(executor.query).toHaveBeenLastCalledWith(
        'INSERT INTO "users" ("name", "age") VALUES ($1, $2)',
        ["Ada", 36],
      );
    });

    it("should reject unknown columns without querying", async () => {
      await expect(
        dal.insert("users", { name: "Ada", city: "London", zip: "N1" }),
      ).rejects.toThrow(
        "Column city not in table users; Column zip not in table users",
      );
      expect(executor.query).toHaveBeenCalledTimes(1);
    });

    it("should reject unknown tables", async () => {
      await expect(dal.insert("posts", [1])).rejects.toThrow(UnknownTableError);
    });

    it("should report zero when the driver gives no row count", async () => {
      vi.mocked(executor.query).mockResolvedValueOnce({ rows: [], rowCount: null });

      await expect(dal.insert("users", { name: "Ada" })).resolves.toBe(0);
    });
  });

  describe("get", () => {
    it("should select by id with a limit of one", async () => {
      vi.mocked(executor.query).mockResolvedValueOnce({
        rows: [{ id: 3, name: "Ada", age: 36 }],
        rowCount: 1,
      });

      const row = await dal.get("users", 3);

      expect(row).toEqual({ id: 3, name: "Ada", age: 36 });
      expect(executor.query).toHaveBeenLastCalledWith(
        'SELECT * FROM "users" WHERE "id" = $1 LIMIT $2',
        [3, 1],
      );
    });

    it("should honour idField and fields", async () => {
      vi.mocked(executor.query).mockResolvedValueOnce({
        rows: [{ age: 36 }],
        rowCount: 1,
      });

      await dal.get("users", "Ada", { idField: "name", fields: ["age"] });

      expect(executor.query).toHaveBeenLastCalledWith(
        'SELECT "age" FROM "users" WHERE "name" = $1 LIMIT $2',
        ["Ada", 1],
      );
    });

    it("should return null when nothing matches", async () => {
      vi.mocked(executor.query).mockResolvedValueOnce({ rows: [], rowCount: 0 });

      await expect(dal.get("users", 99)).resolves.toBeNull();
    });

    it("should reject an unknown id field", async () => {
      await expect(
        dal.get("users", 1, { idField: "uuid" }),
      ).rejects.toThrow(UnknownColumnError);
    });
  });

  describe("search", () => {
    it("should return all rows without criteria", async () => {
      const rows = [
        { id: 1, name: "Ada", age: 36 },
        { id: 2, name: "Grace", age: 45 },
      ];
      vi.mocked(executor.query).mockResolvedValueOnce({ rows, rowCount: 2 });

      await expect(dal.search("users")).resolves.toEqual(rows);
      expect(executor.query).toHaveBeenLastCalledWith('SELECT * FROM "users"', []);
    });

    it("should validate criteria columns", async () => {
      await expect(
        dal.search("users", { criteria: [["email", "=", "a@example.com"]] }),
      ).rejects.toThrow("Column email not in table users");
    });
  });

  describe("update", () => {
    it("should require criteria", async () => {
      await expect(dal.update("users", { name: "Grace" }, {})).rejects.toThrow(
        "Criteria not specified. Dangerous update aborted.",
      );
      await expect(
        dal.update("users", { name: "Grace" }, { criteria: [] }),
      ).rejects.toThrow(MissingCriteriaError);
      expect(executor.query).toHaveBeenCalledTimes(1);
    });

    it("should return rows affected", async () => {
      vi.mocked(executor.query).mockResolvedValueOnce({ rows: [], rowCount: 2 });

      const updated = await dal.update(
        "users",
        { age: 50 },
        { criteria: [["age", ">", 40]] },
      );

      expect(updated).toBe(2);
      expect(executor.query).toHaveBeenLastCalledWith(
        'UPDATE "users" SET "age" = $1 WHERE "age" > $2',
        [50, 40],
      );
    });

    it("should validate changed columns", async () => {
      await expect(
        dal.update("users", { nickname: "G" }, { criteria: [["id", "=", 1]] }),
      ).rejects.toThrow("Column nickname not in table users");
    });
  });

  describe("delete", () => {
    it("should require criteria", async () => {
      await expect(dal.delete("users", {})).rejects.toThrow(
        "Criteria not specified. Dangerous delete aborted.",
      );
    });

    it("should delete matching rows", async () => {
      vi.mocked(executor.query).mockResolvedValueOnce({ rows: [], rowCount: 1 });

      await expect(
        dal.delete("users", { criteria: [["id", "=", 1]] }),
      ).resolves.toBe(1);
      expect(executor.query).toHaveBeenLastCalledWith(
        'DELETE FROM "users" WHERE "id" = $1',
        [1],
      );
    });
  });

  describe("tables", () => {
    it("should create a table and reload the schema", async () => {
      vi.mocked(executor.query)
        .mockResolvedValueOnce({ rows: [], rowCount: null })
        .mockResolvedValueOnce({
          rows: [...usersSchema, { table_name: "posts", column_name: "id" }],
          rowCount: 4,
        });

      await dal.createTable("posts", [{ columnName: "id", type: "SERIAL", options: "PRIMARY KEY" }]);

      expect(executor.query).toHaveBeenNthCalledWith(
        2,
        'CREATE TABLE "posts" ("id" SERIAL PRIMARY KEY)',
        [],
      );
      expect(executor.query).toHaveBeenNthCalledWith(3, postgresDialect.schemaQuery);
      expect(dal.tables()).toEqual(["users", "posts"]);
      expect(console.log).toHaveBeenCalledWith("[Dal] Created table posts (1 columns)");
    });

    it("should refuse to create an existing table", async () => {
      await expect(
        dal.createTable("users", [{ columnName: "id", type: "INTEGER" }]),
      ).rejects.toThrow(TableExistsError);
    });

    it("should drop a table and reload the schema", async () => {
      vi.mocked(executor.query)
        .mockResolvedValueOnce({ rows: [], rowCount: null })
        .mockResolvedValueOnce({ rows: [], rowCount: 0 });

      await dal.dropTable("users");

      expect(executor.query).toHaveBeenNthCalledWith(2, 'DROP TABLE "users"', []);
      expect(dal.tables()).toEqual([]);
    });

    it("should refuse to drop an unknown table", async () => {
      await expect(dal.dropTable("posts")).rejects.toThrow(
        "Table name specified posts does not exist in DB.",
      );
    });
  });

  it("should log statements when verbose", async () => {
    vi.mocked(executor.query)
      .mockResolvedValueOnce({ rows: usersSchema, rowCount: 3 })
      .mockResolvedValueOnce({ rows: [], rowCount: 0 });
    const verbose = await Dal.open(executor, {
      dialect: postgresDialect,
      verbose: true,
    });

    await verbose.search("users", { criteria: [["age", "<", 30]] });

    expect(console.log).toHaveBeenCalledWith(
      '[Dal] SELECT * FROM "users" WHERE "age" < $1',
      [30],
    );
  });

  it("should close the executor", async () => {
    await dal.close();
    expect(executor.close).toHaveBeenCalledTimes(1);
  });
});
