/**
 * Column Definition Value Object
 *
 * `type` and `options` are copied into CREATE TABLE verbatim; never build
 * them from untrusted input.
 */

export interface ColumnDefinition {
  columnName: string;
  type: string;
  /** e.g. "PRIMARY KEY", "NOT NULL DEFAULT 0" */
  options?: string;
}

export function isColumnDefinition(value: unknown): value is ColumnDefinition {
  if (
    typeof value !== "object" ||
    value === null ||
    !("columnName" in value) ||
    !("type" in value)
  ) {
    return false;
  }
  const options = "options" in value ? value.options : undefined;
  return (
    typeof value.columnName === "string" &&
    value.columnName.length > 0 &&
    typeof value.type === "string" &&
    value.type.length > 0 &&
    (options === undefined || typeof options === "string")
  );
}
