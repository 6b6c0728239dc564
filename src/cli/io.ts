/**
 * File access for the CLI commands
 */

import { existsSync, readFileSync, writeFileSync } from "fs";
import { extname } from "path";
import { TableParser, type ParseResult } from "../ts/parser";
import { unparse } from "../ts/unparse";
import type { DialectOptions, Table } from "../ts/types";

/** Delimiter implied by a file name: tab for .tsv/.tab, comma otherwise */
export function inferDelimiter(filePath: string): string {
  const ext = extname(filePath).toLowerCase();
  return ext === ".tsv" || ext === ".tab" ? "\t" : ",";
}

/** Read a data file ("-" for stdin) */
export function readInput(filePath: string): string {
  if (filePath === "-") {
    return readFileSync(0, "utf-8");
  }
  if (!existsSync(filePath)) {
    throw new Error(`File not found: ${filePath}`);
  }
  return readFileSync(filePath, "utf-8");
}

/**
 * Parse a data file; the delimiter falls back to the one its name implies.
 * Every non-blank line after the header is data, including lines starting
 * with the comment prefix.
 */
export function readTable(filePath: string, dialect: DialectOptions = {}): ParseResult {
  const parser = new TableParser({
    ...dialect,
    delimiter: dialect.delimiter ?? inferDelimiter(filePath),
    skipComments: false,
    skipSeparatorRows: false,
  });
  return parser.parse(readInput(filePath));
}

/** Plain delimited text as `readTable` reads it: no alignment, comments or extra quoting */
export function formatDataFile(table: Table, delimiter: string, quoteChar?: string): string {
  return unparse(table, {
    delimiter,
    quoteChar,
    alignColumns: false,
    headerSeparator: false,
    defaultFooter: false,
    quoteAmbiguousRows: false,
  });
}

/** Write to a file, or stdout when no path is given */
export function writeOutput(text: string, outputPath?: string): void {
  if (outputPath) {
    writeFileSync(outputPath, text, "utf-8");
    return;
  }
  process.stdout.write(text.endsWith("\n") ? text : text + "\n");
}
