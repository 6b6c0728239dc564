/**
 * Type definitions for tabedit
 */

/**
 * A parsed row: column name to string value.
 *
 * Duplicate column names are allowed in a header, but name-keyed access
 * then resolves to the last column with that name.
 */
export type Row = Record<string, string>;

/** Canonical table shape used by the codec */
export interface Table {
  columns: string[];
  rows: Row[];
}

/** Loosely typed table accepted by the edit session; normalized before use */
export interface TableInput {
  columns: readonly string[];
  rows: readonly Record<string, unknown>[];
}

/** Built-in column types understood by the validator */
export type ColumnType =
  | "string"
  | "number"
  | "integer"
  | "float"
  | "boolean"
  | "date"
  | "currency"
  | "percent";

/**
 * Caller-supplied column type. `parse` throws when the value is invalid;
 * its return value is discarded.
 */
export interface CustomColumnType {
  name: string;
  parse: (value: string) => unknown;
}

export type ColumnTypeSpec = ColumnType | CustomColumnType;

/** Result of comparing an original row set against an edited one */
export interface TableDiff {
  /** Rows whose key exists only in the edited table */
  added: Row[];
  /** Rows whose key exists only in the original table */
  removed: Row[];
  /** `[original, edited]` pairs sharing a key but differing in some field */
  modified: [before: Row, after: Row][];
}

/** Quoting and comment settings shared by the reader and the writer */
export interface DialectOptions {
  /** Field delimiter, one or more characters (default: "\t") */
  delimiter?: string;
  /** Comment line prefix (default: "#") */
  commentPrefix?: string;
  /** Quote character (default: ") */
  quoteChar?: string;
}
