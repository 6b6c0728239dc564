/**
 * diff command - Key-based comparison of two data files
 */

import { changedColumns, diffTable } from "../../ts/diff";
import { ownValue } from "../../ts/normalize";
import type { Row, TableDiff } from "../../ts/types";
import { readTable } from "../io";
import { formatOutput, printErrors, resolveFormat, type OutputMode } from "../output";

export interface DiffCommandOptions {
  delimiter?: string;
  commentPrefix: string;
  quoteChar: string;
  keyColumns: string[];
  format: OutputMode;
}

/**
 * Flatten a diff into displayable rows. Each row starts with a `change`
 * marker ("+" added, "-" removed, "~" modified) and modified rows list the
 * columns that changed.
 */
export function diffRows(diff: TableDiff, columns: readonly string[]): { columns: string[]; rows: Row[] } {
  const pick = (row: Row): Row => Object.fromEntries(columns.map((c): [string, string] => [c, ownValue(row, c) ?? ""]));
  const rows: Row[] = [
    ...diff.added.map((row) => ({ change: "+", ...pick(row), changed: "" })),
    ...diff.removed.map((row) => ({ change: "-", ...pick(row), changed: "" })),
    ...diff.modified.map(([before, after]) => ({
      change: "~",
      ...pick(after),
      changed: changedColumns(before, after).join(","),
    })),
  ];
  return { columns: ["change", ...columns, "changed"], rows };
}

/** Returns the process exit code */
export function diff(originalPath: string, editedPath: string, options: DiffCommandOptions): number {
  if (options.keyColumns.length === 0) {
    console.error("diff needs at least one key column (--key)");
    return 1;
  }

  const dialect = {
    delimiter: options.delimiter,
    commentPrefix: options.commentPrefix,
    quoteChar: options.quoteChar,
  };
  const original = readTable(originalPath, dialect);
  const edited = readTable(editedPath, dialect);

  for (const [path, result] of [
    [originalPath, original],
    [editedPath, edited],
  ] as const) {
    if (result.errors.length > 0) {
      console.error(`✗ ${path} could not be read:`);
      printErrors(result.errors);
      return 1;
    }
  }

  const changes = diffTable(original.rows, edited.rows, options.keyColumns);

  if (resolveFormat(options.format) === "json") {
    const modified = changes.modified.map(([before, after]) => ({
      before,
      after,
      changed: changedColumns(before, after),
    }));
    console.log(JSON.stringify({ added: changes.added, removed: changes.removed, modified }, null, 2));
  } else {
    const columns = [...new Set([...original.columns, ...edited.columns])];
    const table = diffRows(changes, columns);
    console.log(formatOutput(table.columns, table.rows, options.format));
  }

  console.error(
    `✓ ${changes.added.length} added, ${changes.removed.length} removed, ${changes.modified.length} modified`,
  );
  return 0;
}
