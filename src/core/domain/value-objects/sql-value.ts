/**
 * Values that may be bound to a statement parameter
 */
export type SqlValue =
  | string
  | number
  | bigint
  | boolean
  | Date
  | Uint8Array
  | null;

/** A row as returned by any read, keyed by column name */
export type Row = Record<string, unknown>;
