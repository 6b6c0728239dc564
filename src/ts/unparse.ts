/**
 * unparse() - Convert a table to editable delimited text
 */

import stringWidth from "string-width";
import { resolveDialect } from "./dialect";
import { ownValue } from "./normalize";
import type { DialectOptions, Table } from "./types";

/** Configuration for unparse */
export interface UnparseConfig extends DialectOptions {
  /** Comment lines written above the header (default: none) */
  headerCommentLines?: string[];
  /** Comment lines written below the data; overrides the default footer when set */
  footerCommentLines?: string[];
  /** Write the usage footer when no footer lines are given (default: true) */
  defaultFooter?: boolean;
  /** Write a row of dashes under the header (default: true) */
  headerSeparator?: boolean;
  /** Pad cells so columns line up (default: true) */
  alignColumns?: boolean;
  /** Write the header row (default: true) */
  header?: boolean;
  /**
   * Quote the first cell of a line that would otherwise read back as a
   * comment or a separator row (default: true)
   */
  quoteAmbiguousRows?: boolean;
}

/** Runs of spaces: padding would read back as extra delimiters */
const SPACE_DELIMITER = /^ +$/;
const SEPARATOR_CELL = /^-*$/;

/** Footer lines explaining how to edit the buffer */
export function defaultFooterLines(commentPrefix: string): string[] {
  return [
    "",
    'Empty fields: leave cell empty, or use "" inside quoted fields.',
    `Lines starting with ${commentPrefix} are ignored. Edit data rows above.`,
  ];
}

/**
 * Quote a field if it contains the delimiter, a line break or the quote
 * character. Quote characters inside the field are doubled.
 */
export function escapeField(value: string, delimiter: string, quoteChar: string): string {
  const needsQuote =
    value.includes(delimiter) ||
    value.includes("\n") ||
    value.includes("\r") ||
    value.includes(quoteChar);

  if (!needsQuote) {
    return value;
  }

  return quoteChar + value.replaceAll(quoteChar, quoteChar + quoteChar) + quoteChar;
}

/**
 * Convert a table to delimited text.
 *
 * @example
 * ```ts
 * unparse({ columns: ["id", "name"], rows: [{ id: "1", name: "Alice" }] }, {
 *   delimiter: ",",
 *   defaultFooter: false,
 *   headerSeparator: false,
 *   alignColumns: false,
 * });
 * // "id,name\n1,Alice\n"
 * ```
 */
export function unparse(table: Table, config: UnparseConfig = {}): string {
  const { delimiter, commentPrefix, quoteChar } = resolveDialect(config);
  const includeHeader = config.header ?? true;
  const headerSeparator = config.headerSeparator ?? true;
  const alignColumns = (config.alignColumns ?? true) && !SPACE_DELIMITER.test(delimiter);
  const defaultFooter = config.defaultFooter ?? true;

  const escape = (value: string) => escapeField(value, delimiter, quoteChar);
  const quoteAmbiguousRows = config.quoteAmbiguousRows ?? true;
  const guard = (cells: string[]) => (quoteAmbiguousRows ? guardLine(cells, commentPrefix, quoteChar) : cells);
  const columns = table.columns;

  let headerCells = guard(columns.map(escape));
  let rowCells = table.rows.map((row) => guard(columns.map((col) => escape(ownValue(row, col) ?? ""))));

  let widths: number[] = columns.map(() => 0);
  if (alignColumns && rowCells.length > 0) {
    const measured = includeHeader ? [headerCells, ...rowCells] : rowCells;
    widths = columns.map((_, i) =>
      Math.max(headerSeparator && includeHeader ? 1 : 0, ...measured.map((cells) => stringWidth(cells[i] ?? ""))),
    );
    headerCells = headerCells.map((cell, i) => padCell(cell, widths[i] ?? 0));
    rowCells = rowCells.map((cells) => cells.map((cell, i) => padCell(cell, widths[i] ?? 0)));
  }

  const lines: string[] = [];

  for (const line of config.headerCommentLines ?? []) {
    lines.push(commentLine(commentPrefix, line));
  }

  if (includeHeader) {
    lines.push(headerCells.join(delimiter));
    if (headerSeparator) {
      lines.push(widths.map((w) => "-".repeat(Math.max(w, 1))).join(delimiter));
    }
  }

  for (const cells of rowCells) {
    lines.push(cells.join(delimiter));
  }

  const footer = config.footerCommentLines ?? (defaultFooter ? defaultFooterLines(commentPrefix) : []);
  for (const line of footer) {
    lines.push(commentLine(commentPrefix, line));
  }

  return lines.map((line) => line + "\n").join("");
}

/**
 * A line starting with the comment prefix, or made only of empty or dashed
 * cells, is skipped by the parser unless a quote character appears in it.
 */
function guardLine(cells: string[], commentPrefix: string, quoteChar: string): string[] {
  const [first = "", ...rest] = cells;
  if (cells.length === 0 || first.startsWith(quoteChar)) return cells;

  const looksLikeComment = first.trimStart().startsWith(commentPrefix);
  const looksLikeSeparator = cells.every((cell) => SEPARATOR_CELL.test(cell));
  if (!looksLikeComment && !looksLikeSeparator) return cells;

  // Unquoted cells hold no quote character, so wrapping is enough
  return [quoteChar + first + quoteChar, ...rest];
}

function commentLine(prefix: string, text: string): string {
  return text.length === 0 ? prefix : `${prefix} ${text}`;
}

/** Right-pad to a display width (wide characters count as two columns) */
function padCell(cell: string, width: number): string {
  const gap = width - stringWidth(cell);
  return gap > 0 ? cell + " ".repeat(gap) : cell;
}
