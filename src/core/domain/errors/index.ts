/**
 * Domain Errors
 *
 * Driver errors (constraint violations, malformed SQL) are not wrapped and
 * reach the caller as the driver raised them.
 */

export class DalError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "DalError";
  }
}

export class UnknownTableError extends DalError {
  constructor(public readonly table: string) {
    super(`Table name specified ${table} does not exist in DB.`);
    this.name = "UnknownTableError";
  }
}

export class TableExistsError extends DalError {
  constructor(public readonly table: string) {
    super(`Table name specified ${table} is already in DB.`);
    this.name = "TableExistsError";
  }
}

export class UnknownColumnError extends DalError {
  constructor(
    public readonly table: string,
    public readonly columns: readonly string[],
  ) {
    super(columns.map((column) => `Column ${column} not in table ${table}`).join("; "));
    this.name = "UnknownColumnError";
  }
}

export class MissingCriteriaError extends DalError {
  constructor(operation: "update" | "delete") {
    super(
      operation === "update"
        ? "Criteria not specified. Dangerous update aborted."
        : "Criteria not specified. Dangerous delete aborted.",
    );
    this.name = "MissingCriteriaError";
  }
}

export class InvalidCriterionError extends DalError {
  constructor(message: string) {
    super(message);
    this.name = "InvalidCriterionError";
  }
}

export class ColumnCountMismatchError extends DalError {
  constructor(columnCount: number, valueCount: number) {
    super(
      `${columnCount} columns specified. ${valueCount} values specified. Length must match`,
    );
    this.name = "ColumnCountMismatchError";
  }
}

export class EmptyRecordError extends DalError {
  constructor(message: string) {
    super(message);
    this.name = "EmptyRecordError";
  }
}

export class SchemaFileError extends DalError {
  constructor(path: string, reason: string) {
    super(`Invalid schema file ${path}: ${reason}`);
    this.name = "SchemaFileError";
  }
}

export class ConfigurationError extends DalError {
  constructor(message: string) {
    super(message);
    this.name = "ConfigurationError";
  }
}
