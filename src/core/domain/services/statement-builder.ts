/**
 * Statement Builder
 *
 * Turns Dal calls into one parameterized statement each. Identifiers are
 * quoted by the dialect; values only ever travel as bound parameters.
 * Names are assumed to have been checked against the schema already.
 */

import type { SqlDialect } from "../../ports/sql-dialect.port.js";
import type { SqlValue } from "../value-objects/sql-value.js";
import type { ColumnDefinition } from "../value-objects/column-definition.js";
import {
  normalizeCriterion,
  type Criterion,
} from "../value-objects/criterion.js";
import {
  ColumnCountMismatchError,
  EmptyRecordError,
  InvalidCriterionError,
} from "../errors/index.js";

export interface Statement {
  sql: string;
  params: SqlValue[];
}

export interface SelectOptions {
  fields?: readonly string[];
  criteria?: readonly Criterion[];
  limit?: number;
}

/**
 * Collects bound values and hands out the matching placeholders,
 * so numbering runs on from SET into WHERE.
 */
class ParameterList {
  readonly values: SqlValue[] = [];

  constructor(private readonly dialect: SqlDialect) {}

  bind(value: SqlValue): string {
    this.values.push(value);
    return this.dialect.placeholder(this.values.length);
  }
}

export class StatementBuilder {
  constructor(private readonly dialect: SqlDialect) {}

  createTable(table: string, columns: readonly ColumnDefinition[]): Statement {
    if (columns.length === 0) {
      throw new EmptyRecordError(`Table ${table} needs at least one column`);
    }
    const definitions = columns.map(({ columnName, type, options }) =>
      [this.quote(columnName), type, options]
        .filter((part) => part !== undefined && part.trim() !== "")
        .join(" "),
    );
    return {
      sql: `CREATE TABLE ${this.quote(table)} (${definitions.join(", ")})`,
      params: [],
    };
  }

  dropTable(table: string): Statement {
    return { sql: `DROP TABLE ${this.quote(table)}`, params: [] };
  }

  /**
   * Positional insert: one value per column, in table order
   */
  insertValues(table: string, values: readonly SqlValue[]): Statement {
    if (values.length === 0) {
      throw new EmptyRecordError(`No values to insert into ${table}`);
    }
    const params = new ParameterList(this.dialect);
    const placeholders = values.map((value) => params.bind(value));
    return {
      sql: `INSERT INTO ${this.quote(table)} VALUES (${placeholders.join(", ")})`,
      params: params.values,
    };
  }

  insertRecord(
    table: string,
    columns: readonly string[],
    values: readonly SqlValue[],
  ): Statement {
    if (columns.length !== values.length) {
      throw new ColumnCountMismatchError(columns.length, values.length);
    }
    if (columns.length === 0) {
      throw new EmptyRecordError(`No columns to insert into ${table}`);
    }
    const params = new ParameterList(this.dialect);
    const placeholders = values.map((value) => params.bind(value));
    const columnList = columns.map((column) => this.quote(column)).join(", ");
    return {
      sql: `INSERT INTO ${this.quote(table)} (${columnList}) VALUES (${placeholders.join(", ")})`,
      params: params.values,
    };
  }

  select(table: string, options: SelectOptions = {}): Statement {
    const { fields = [], criteria = [], limit } = options;
    const params = new ParameterList(this.dialect);

    const projection =
      fields.length > 0
        ? fields.map((field) => this.quote(field)).join(", ")
        : "*";
    let sql = `SELECT ${projection} FROM ${this.quote(table)}`;
    sql += this.where(criteria, params);
    if (limit !== undefined) {
      sql += ` LIMIT ${params.bind(limit)}`;
    }
    return { sql, params: params.values };
  }

  update(
    table: string,
    changes: Readonly<Record<string, SqlValue>>,
    criteria: readonly Criterion[],
  ): Statement {
    const entries = Object.entries(changes);
    if (entries.length === 0) {
      throw new EmptyRecordError(`No columns to update in ${table}`);
    }
    const params = new ParameterList(this.dialect);
    const assignments = entries
      .map(([column, value]) => `${this.quote(column)} = ${params.bind(value)}`)
      .join(", ");
    return {
      sql: `UPDATE ${this.quote(table)} SET ${assignments}${this.where(criteria, params)}`,
      params: params.values,
    };
  }

  delete(table: string, criteria: readonly Criterion[]): Statement {
    const params = new ParameterList(this.dialect);
    return {
      sql: `DELETE FROM ${this.quote(table)}${this.where(criteria, params)}`,
      params: params.values,
    };
  }

  private where(criteria: readonly Criterion[], params: ParameterList): string {
    if (criteria.length === 0) {
      return "";
    }
    const predicates = criteria.map((criterion) => {
      const { column, operator, values, list } = normalizeCriterion(criterion);
      if (!this.dialect.operators.includes(operator)) {
        throw new InvalidCriterionError(
          `Operator ${operator} is not supported by ${this.dialect.name}`,
        );
      }

      const target = this.quote(column);
      if (operator === "IS" || operator === "IS NOT") {
        const [value] = values;
        if (value === null) {
          return `${target} ${operator} NULL`;
        }
        if (!this.dialect.bindsIsOperand) {
          throw new InvalidCriterionError(
            `Operator ${operator} on ${column} only accepts null with ${this.dialect.name}`,
          );
        }
      }

      const placeholders = values.map((value) => params.bind(value));
      const operand = list ? `(${placeholders.join(", ")})` : placeholders.join("");
      return `${target} ${operator} ${operand}`;
    });
    return ` WHERE ${predicates.join(" AND ")}`;
  }

  private quote(identifier: string): string {
    return this.dialect.quoteIdentifier(identifier);
  }
}
