/**
 * Criterion Value Object
 *
 * A (column, operator, value) triple rendered as one predicate of a WHERE
 * clause. Predicates are always joined with AND.
 */

import { InvalidCriterionError } from "../errors/index.js";
import type { SqlValue } from "./sql-value.js";

export const ScalarOperators = [
  "=",
  "==",
  "!=",
  "<>",
  "<",
  "<=",
  ">",
  ">=",
  "LIKE",
  "NOT LIKE",
  "GLOB",
  "IS",
  "IS NOT",
] as const;

export const ListOperators = ["IN", "NOT IN"] as const;

export type ScalarOperator = (typeof ScalarOperators)[number];
export type ListOperator = (typeof ListOperators)[number];
export type Operator = ScalarOperator | ListOperator;

export type CriterionValue = SqlValue | readonly SqlValue[];

export type Criterion = readonly [
  column: string,
  operator: Operator | Lowercase<Operator>,
  value: CriterionValue,
];

export interface NormalizedCriterion {
  column: string;
  operator: Operator;
  values: readonly SqlValue[];
  list: boolean;
}

function isScalarOperator(operator: string): operator is ScalarOperator {
  return ScalarOperators.some((candidate) => candidate === operator);
}

function isListOperator(operator: string): operator is ListOperator {
  return ListOperators.some((candidate) => candidate === operator);
}

function isValueList(value: CriterionValue): value is readonly SqlValue[] {
  return Array.isArray(value);
}

/**
 * Upper-cases the operator and collapses inner whitespace ("not  like")
 */
export function normalizeOperator(operator: string): Operator {
  const normalized = operator.trim().replace(/\s+/g, " ").toUpperCase();

  if (isScalarOperator(normalized) || isListOperator(normalized)) {
    return normalized;
  }
  throw new InvalidCriterionError(`Unsupported operator: ${operator}`);
}

export function normalizeCriterion(criterion: Criterion): NormalizedCriterion {
  const [column, rawOperator, value] = criterion;
  const operator = normalizeOperator(rawOperator);

  if (isListOperator(operator)) {
    if (!isValueList(value) || value.length === 0) {
      throw new InvalidCriterionError(
        `Operator ${operator} on ${column} needs a non-empty list of values`,
      );
    }
    return { column, operator, values: value, list: true };
  }

  if (isValueList(value)) {
    throw new InvalidCriterionError(
      `Operator ${operator} on ${column} takes a single value`,
    );
  }
  return { column, operator, values: [value], list: false };
}
