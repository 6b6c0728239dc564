/**
 * Output helpers shared by the CLI commands
 */

import stringWidth from "string-width";
import { ownValue } from "../ts/normalize";
import { escapeField } from "../ts/unparse";
import { formatParseError, type ParseError, type ParseWarning } from "../ts/errors";
import type { Row } from "../ts/types";
import type { OutputFormat } from "./config";

export type OutputMode = OutputFormat | "auto";

/** Check if output is TTY for auto-formatting */
function isTTY(): boolean {
  return process.stdout.isTTY ?? false;
}

/** Pick the concrete format for "auto" */
export function resolveFormat(format: OutputMode, tty: boolean = isTTY()): OutputFormat {
  if (format === "auto") {
    return tty ? "table" : "csv";
  }
  return format;
}

/** Format rows for stdout */
export function formatOutput(columns: readonly string[], rows: readonly Row[], format: OutputMode): string {
  switch (resolveFormat(format)) {
    case "json":
      return JSON.stringify(rows, null, 2);

    case "csv": {
      const lines = [
        columns.map((c) => escapeField(c, ",", '"')).join(","),
        ...rows.map((row) => columns.map((c) => escapeField(ownValue(row, c) ?? "", ",", '"')).join(",")),
      ];
      return lines.join("\n");
    }

    case "table":
    default:
      return formatTable(columns, rows);
  }
}

/** Format rows as an ASCII table; embedded newlines are shown as "\n" */
export function formatTable(columns: readonly string[], rows: readonly Row[]): string {
  if (columns.length === 0) return "(empty)";

  const cell = (value: string | undefined): string => (value ?? "").replace(/\r?\n/g, "\\n");
  const pad = (value: string, width: number): string => value + " ".repeat(Math.max(0, width - stringWidth(value)));

  const widths = columns.map((c) => Math.max(stringWidth(c), ...rows.map((row) => stringWidth(cell(ownValue(row, c))))));

  const lines: string[] = [];
  lines.push(columns.map((c, i) => pad(c, widths[i] ?? 0)).join(" | ").trimEnd());
  lines.push(widths.map((w) => "-".repeat(w)).join("-+-"));
  for (const row of rows) {
    lines.push(columns.map((c, i) => pad(cell(ownValue(row, c)), widths[i] ?? 0)).join(" | ").trimEnd());
  }

  return lines.join("\n");
}

/** Print errors one per line, capped at `limit` */
export function printErrors(errors: readonly ParseError[], limit = 20): void {
  for (const error of errors.slice(0, limit)) {
    console.error(`  ${formatParseError(error)}`);
  }
  if (errors.length > limit) {
    console.error(`  ... and ${errors.length - limit} more`);
  }
}

export function printWarnings(warnings: readonly ParseWarning[]): void {
  for (const warning of warnings) {
    console.error(`⚠ Line ${warning.line}: ${warning.message}`);
  }
}

/** Print summary stats after operation */
export function printSummary(rowCount: number, startTime: number): void {
  const elapsed = (performance.now() - startTime) / 1000;
  console.error(`✓ Processed ${rowCount.toLocaleString()} rows in ${elapsed.toFixed(2)}s`);
}
