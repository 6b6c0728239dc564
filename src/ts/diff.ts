import { ownValue } from "./normalize";
import type { Row, TableDiff } from "./types";

/**
 * Key-based row diff between an original and an edited table.
 *
 * Duplicate keys within one side are not reported here (the validator does
 * that); the last row with a given key wins.
 *
 * @param originalRows - Rows before editing
 * @param editedRows   - Rows after editing
 * @param keyColumns   - Columns whose combined values identify a row
 * @returns            - Added, removed and modified rows. Added and modified
 *                       follow the edited table's key order, removed follows
 *                       the original's; sort by key if a fixed order matters.
 *
 * @example
 * const d = diffTable(
 *   [{ id: "1", name: "Alice" }, { id: "2", name: "Bob" }],
 *   [{ id: "1", name: "Alice X" }, { id: "3", name: "Carol" }],
 *   ["id"],
 * );
 * // d.added    → [{ id: "3", name: "Carol" }]
 * // d.removed  → [{ id: "2", name: "Bob" }]
 * // d.modified → [[{ id: "1", name: "Alice" }, { id: "1", name: "Alice X" }]]
 */
export function diffTable(
  originalRows: readonly Row[],
  editedRows: readonly Row[],
  keyColumns: readonly string[],
): TableDiff {
  const keyOf = (row: Row) => JSON.stringify(keyColumns.map((col) => ownValue(row, col) ?? null));
  const originalByKey = new Map(originalRows.map((row): [string, Row] => [keyOf(row), row]));
  const editedByKey = new Map(editedRows.map((row): [string, Row] => [keyOf(row), row]));

  const diff: TableDiff = { added: [], removed: [], modified: [] };

  for (const [key, edited] of editedByKey) {
    const original = originalByKey.get(key);
    if (original === undefined) {
      diff.added.push(edited);
    } else if (!rowsEqual(original, edited)) {
      diff.modified.push([original, edited]);
    }
  }

  for (const [key, original] of originalByKey) {
    if (!editedByKey.has(key)) {
      diff.removed.push(original);
    }
  }

  return diff;
}

/** Structural row equality: same column names with the same values */
export function rowsEqual(a: Row, b: Row): boolean {
  const aKeys = Object.keys(a);
  if (aKeys.length !== Object.keys(b).length) return false;
  return aKeys.every((key) => Object.hasOwn(b, key) && a[key] === b[key]);
}

/** Columns whose values differ between two versions of a row */
export function changedColumns(before: Row, after: Row): string[] {
  const names = new Set([...Object.keys(before), ...Object.keys(after)]);
  return [...names].filter((name) => ownValue(before, name) !== ownValue(after, name));
}
