/**
 * TableParser - Parse edited delimited text back into a table
 */

import { readFileSync } from "fs";
import { resolveDialect, type Dialect } from "./dialect";
import { createParseError, type ParseError, type ParseErrorCallback, type ParseWarning } from "./errors";
import { scanLogicalLines } from "./lines";
import { splitFields } from "./tokenizer";
import type { DialectOptions, Row } from "./types";

/** Parser options */
export interface TableParserOptions extends DialectOptions {
  /** Error callback invoked for each collected error, in document order */
  onError?: ParseErrorCallback;
  /** Skip lines starting with the comment prefix (default: true) */
  skipComments?: boolean;
  /** Skip unquoted rows whose fields are all empty or all dashes (default: true) */
  skipSeparatorRows?: boolean;
}

/** Parsed document */
export interface ParseResult {
  /** Header fields, trimmed */
  columns: string[];
  /** Data rows that matched the header's field count */
  rows: Row[];
  /** Document and row-shape errors in line order */
  errors: ParseError[];
  /** Soft diagnostics, e.g. an unterminated quote */
  warnings: ParseWarning[];
}

const SEPARATOR_FIELD = /^-*$/;

/**
 * Parser for the edit buffer format.
 *
 * Comment and blank lines are skipped, the first remaining line is the
 * header, unquoted lines of dashes or empty fields are ignored, and each
 * data line must have as many fields as the header. Malformed rows are
 * reported and skipped; the parse never aborts on bad data. Turn off
 * `skipComments` and `skipSeparatorRows` to read plain CSV/TSV files.
 *
 * @example
 * ```ts
 * const parser = new TableParser({ delimiter: "," });
 * const { columns, rows, errors } = parser.parse("id,name\n1,Alice\n");
 * ```
 */
export class TableParser {
  private dialect: Dialect;
  private onError: ParseErrorCallback | null;
  private skipComments: boolean;
  private skipSeparatorRows: boolean;

  constructor(options: TableParserOptions = {}) {
    this.dialect = resolveDialect(options);
    this.onError = options.onError ?? null;
    this.skipComments = options.skipComments ?? true;
    this.skipSeparatorRows = options.skipSeparatorRows ?? true;
  }

  /** Parse document text */
  parse(text: string): ParseResult {
    const { delimiter, quoteChar } = this.dialect;
    const { lines, unterminatedQuoteLine } = scanLogicalLines(text, quoteChar);
    const errors: ParseError[] = [];
    const warnings: ParseWarning[] = [];

    if (unterminatedQuoteLine !== null) {
      warnings.push({
        code: "UnterminatedQuote",
        line: unterminatedQuoteLine,
        message: `Unterminated quoted field; the rest of the document was read as line ${unterminatedQuoteLine}`,
      });
    }

    const headerIndex = lines.findIndex((line) => !this.isSkippable(line));
    if (headerIndex === -1) {
      this.recordError(
        errors,
        createParseError("NoHeader", 1, 1, "No header line found (only comments or empty lines)"),
      );
      return { columns: [], rows: [], errors, warnings };
    }

    const columns = splitFields(lines[headerIndex] ?? "", delimiter, quoteChar).map((c) => c.trim());
    const ncols = columns.length;
    const rows: Row[] = [];

    for (let idx = headerIndex + 1; idx < lines.length; idx++) {
      const line = lines[idx] ?? "";
      if (this.isSkippable(line)) continue;

      const fields = splitFields(line, delimiter, quoteChar).map((f) => f.trim());
      if (fields.length !== ncols) {
        this.recordError(
          errors,
          createParseError("FieldCountMismatch", idx + 1, 1, `Expected ${ncols} columns, got ${fields.length}`),
        );
        continue;
      }

      // Header separator decoration; a quoted cell makes the row data
      if (this.skipSeparatorRows && !line.includes(quoteChar) && fields.every((f) => SEPARATOR_FIELD.test(f))) {
        continue;
      }

      rows.push(Object.fromEntries(columns.map((col, i): [string, string] => [col, fields[i] ?? ""])));
    }

    return { columns, rows, errors, warnings };
  }

  /** Read and parse a UTF-8 file */
  parseFile(path: string): ParseResult {
    return this.parse(readFileSync(path, "utf-8"));
  }

  private isSkippable(line: string): boolean {
    const stripped = line.trimStart();
    // With separator rows kept, a line of bare tab delimiters is a row of empty fields
    if (stripped.length === 0) return this.skipSeparatorRows || !line.includes(this.dialect.delimiter);
    return this.skipComments && stripped.startsWith(this.dialect.commentPrefix);
  }

  private recordError(errors: ParseError[], error: ParseError): void {
    errors.push(error);
    this.onError?.(error);
  }
}

/** Parse document text with a one-off parser */
export function parseTable(text: string, options?: TableParserOptions): ParseResult {
  return new TableParser(options).parse(text);
}

/** Read and parse a file with a one-off parser */
export function parseTableFile(path: string, options?: TableParserOptions): ParseResult {
  return new TableParser(options).parseFile(path);
}
