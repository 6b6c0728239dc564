/**
 * Table adapters
 *
 * Each adapter turns one concrete input shape into the canonical
 * `{ columns, rows }` form with string values. Pick the adapter that matches
 * the data you hold; nothing here inspects shapes at runtime.
 */

import type { Row, Table, TableInput } from "./types";

/**
 * Read a column from a row, ignoring inherited members such as
 * `constructor` or `toString`.
 */
export function ownValue<T>(record: Readonly<Record<string, T>>, key: string): T | undefined {
  return Object.hasOwn(record, key) ? record[key] : undefined;
}

/** Serialize a cell value to string */
export function stringifyValue(value: unknown): string {
  if (value === null || value === undefined) return "";
  if (value instanceof Date) return value.toISOString();
  return String(value);
}

/**
 * Column-oriented table: `{ id: [1, 2], name: ["Alice", "Bob"] }`.
 * Columns shorter than the longest one read as empty strings.
 */
export function fromColumns(columns: Readonly<Record<string, readonly unknown[]>>): Table {
  const names = Object.keys(columns);
  const rowCount = Math.max(0, ...names.map((name) => columns[name]?.length ?? 0));
  const rows: Row[] = [];

  for (let i = 0; i < rowCount; i++) {
    rows.push(Object.fromEntries(names.map((name): [string, string] => [name, stringifyValue(columns[name]?.[i])])));
  }

  return { columns: names, rows };
}

/**
 * Explicit column order plus row records. Keys missing from a record read
 * as empty strings; keys outside `columns` are dropped.
 */
export function fromRows(columns: readonly string[], rows: readonly Record<string, unknown>[]): Table {
  const names = [...columns];
  return {
    columns: names,
    rows: rows.map((row) =>
      Object.fromEntries(names.map((name): [string, string] => [name, stringifyValue(ownValue(row, name))])),
    ),
  };
}

/**
 * Row records only. Columns are the union of keys in order of first
 * appearance.
 */
export function fromRecords(records: readonly Record<string, unknown>[]): Table {
  const keySet = new Set<string>();
  for (const record of records) {
    for (const key of Object.keys(record)) {
      keySet.add(key);
    }
  }
  return fromRows(Array.from(keySet), records);
}

/** Normalize the loosely typed session input */
export function toTable(input: TableInput): Table {
  return fromRows(input.columns, input.rows);
}
