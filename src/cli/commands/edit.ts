/**
 * edit command - Open a data file in the editor and write the result back
 */

import { basename } from "path";
import { diffTable } from "../../ts/diff";
import type { EditorLauncher } from "../../ts/editor";
import { editTable } from "../../ts/session";
import type { ColumnTypeSpec } from "../../ts/types";
import { formatDataFile, inferDelimiter, readTable, writeOutput } from "../io";
import { printErrors, printWarnings } from "../output";

export interface EditCommandOptions {
  /** Delimiter of the data file (default: from its extension) */
  delimiter?: string;
  /** Delimiter of the edit buffer */
  bufferDelimiter: string;
  commentPrefix: string;
  quoteChar: string;
  alignColumns: boolean;
  headerSeparator: boolean;
  defaultFooter: boolean;
  editor?: string | string[];
  keyColumns: string[];
  requiredColumns: string[];
  columnTypes: Record<string, ColumnTypeSpec>;
  /** Destination; the input file is overwritten when omitted */
  output?: string;
  launchEditor?: EditorLauncher;
}

/** Returns the process exit code */
export function edit(filePath: string, options: EditCommandOptions): number {
  if (filePath === "-") {
    console.error("edit needs a file path (stdin is not supported)");
    return 1;
  }

  const delimiter = options.delimiter ?? inferDelimiter(filePath);
  const input = readTable(filePath, {
    delimiter,
    commentPrefix: options.commentPrefix,
    quoteChar: options.quoteChar,
  });
  if (input.errors.length > 0) {
    console.error(`✗ ${filePath} could not be read:`);
    printErrors(input.errors);
    return 1;
  }
  printWarnings(input.warnings);

  const original = { columns: input.columns, rows: input.rows };
  const outcome = editTable(original, {
    delimiter: options.bufferDelimiter,
    commentPrefix: options.commentPrefix,
    quoteChar: options.quoteChar,
    alignColumns: options.alignColumns,
    headerSeparator: options.headerSeparator,
    defaultFooter: options.defaultFooter,
    headerCommentLines: [`Editing ${basename(filePath)} (${original.rows.length} rows)`],
    editor: options.editor,
    requiredColumns: options.requiredColumns,
    keyColumns: options.keyColumns,
    columnTypes: options.columnTypes,
    launchEditor: options.launchEditor,
  });

  if (!outcome.ok) {
    console.error("✗ Edit rejected, file left unchanged:");
    printErrors(outcome.errors);
    return 1;
  }
  if (outcome.result.mode !== "full") {
    throw new Error(`Unexpected result mode: ${outcome.result.mode}`);
  }

  const { columns, rows } = outcome.result;
  writeOutput(formatDataFile({ columns, rows }, delimiter, options.quoteChar), options.output ?? filePath);

  if (options.keyColumns.length > 0) {
    const diff = diffTable(original.rows, rows, options.keyColumns);
    console.error(
      `✓ ${diff.added.length} added, ${diff.removed.length} removed, ${diff.modified.length} modified`,
    );
  } else {
    console.error(`✓ Saved ${rows.length.toLocaleString()} rows`);
  }

  return 0;
}
