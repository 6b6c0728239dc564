/**
 * validate command - Parse a data file and run the table checks
 */

import { validate as validateTable } from "../../ts/validator";
import type { ColumnTypeSpec } from "../../ts/types";
import { readTable } from "../io";
import { printErrors, printSummary, printWarnings } from "../output";

export interface ValidateCommandOptions {
  delimiter?: string;
  commentPrefix: string;
  quoteChar: string;
  keyColumns: string[];
  requiredColumns: string[];
  columnTypes: Record<string, ColumnTypeSpec>;
}

/** Returns the process exit code */
export function validate(filePath: string, options: ValidateCommandOptions): number {
  const startTime = performance.now();

  const { columns, rows, errors: parseErrors, warnings } = readTable(filePath, {
    delimiter: options.delimiter,
    commentPrefix: options.commentPrefix,
    quoteChar: options.quoteChar,
  });

  const errors = [
    ...parseErrors,
    ...validateTable(columns, rows, {
      requiredColumns: options.requiredColumns,
      keyColumns: options.keyColumns,
      columnTypes: options.columnTypes,
    }),
  ];

  if (errors.length === 0) {
    console.log("✓ Table is valid");
  } else {
    console.log(`✗ Found ${errors.length} error${errors.length === 1 ? "" : "s"}:`);
    printErrors(errors);
  }
  printWarnings(warnings);

  console.log(`\nRows: ${rows.length.toLocaleString()}`);
  console.log(`Columns: ${columns.length}`);

  printSummary(rows.length, startTime);

  return errors.length === 0 ? 0 : 1;
}
