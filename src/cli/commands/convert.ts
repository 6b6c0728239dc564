/**
 * convert command - Convert between CSV, TSV, JSON and the edit buffer format
 */

import { unparse } from "../../ts/unparse";
import type { Table } from "../../ts/types";
import { formatDataFile, readTable, writeOutput } from "../io";
import { printErrors, printSummary, printWarnings } from "../output";

export const CONVERT_TARGETS = ["csv", "tsv", "json", "text"] as const;

export type ConvertTarget = (typeof CONVERT_TARGETS)[number];

export interface ConvertCommandOptions {
  delimiter?: string;
  bufferDelimiter: string;
  commentPrefix: string;
  quoteChar: string;
  alignColumns: boolean;
  headerSeparator: boolean;
  defaultFooter: boolean;
  to: string;
  output?: string;
}

export function isConvertTarget(value: string): value is ConvertTarget {
  return CONVERT_TARGETS.some((target) => target === value);
}

/** Returns the process exit code */
export function convert(filePath: string, options: ConvertCommandOptions): number {
  const startTime = performance.now();
  const target = options.to.toLowerCase();
  if (!isConvertTarget(target)) {
    throw new Error(`Unknown format: ${options.to}. Supported: ${CONVERT_TARGETS.join(", ")}`);
  }

  const { columns, rows, errors, warnings } = readTable(filePath, {
    delimiter: options.delimiter,
    commentPrefix: options.commentPrefix,
    quoteChar: options.quoteChar,
  });
  if (errors.length > 0) {
    console.error(`✗ ${filePath} could not be read:`);
    printErrors(errors);
    return 1;
  }
  printWarnings(warnings);

  const output = render(target, { columns, rows }, options);
  writeOutput(output, options.output);
  if (options.output) {
    console.error(`Wrote ${rows.length.toLocaleString()} rows to ${options.output}`);
  }

  printSummary(rows.length, startTime);
  return 0;
}

function render(target: ConvertTarget, table: Table, options: ConvertCommandOptions): string {
  switch (target) {
    case "json":
      return JSON.stringify(table.rows, null, 2);
    case "csv":
      return formatDataFile(table, ",", options.quoteChar);
    case "tsv":
      return formatDataFile(table, "\t", options.quoteChar);
    case "text":
      return unparse(table, {
        delimiter: options.bufferDelimiter,
        commentPrefix: options.commentPrefix,
        quoteChar: options.quoteChar,
        alignColumns: options.alignColumns,
        headerSeparator: options.headerSeparator,
        defaultFooter: options.defaultFooter,
      });
  }
}
