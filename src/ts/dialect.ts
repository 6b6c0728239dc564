/**
 * Defaults and option checks for the text format
 */

import type { DialectOptions } from "./types";

export const DEFAULT_DELIMITER = "\t";
export const DEFAULT_COMMENT_PREFIX = "#";
export const DEFAULT_QUOTE_CHAR = '"';

export type Dialect = Required<DialectOptions>;

/**
 * Fill in defaults and reject settings the tokenizer cannot honour.
 */
export function resolveDialect(options: DialectOptions = {}): Dialect {
  const dialect: Dialect = {
    delimiter: options.delimiter ?? DEFAULT_DELIMITER,
    commentPrefix: options.commentPrefix ?? DEFAULT_COMMENT_PREFIX,
    quoteChar: options.quoteChar ?? DEFAULT_QUOTE_CHAR,
  };

  if (dialect.delimiter.length === 0) {
    throw new RangeError("Delimiter must not be empty.");
  }
  if (dialect.commentPrefix.length === 0) {
    throw new RangeError("Comment prefix must not be empty.");
  }
  if (dialect.quoteChar.length !== 1) {
    throw new TypeError(`Quote character must be a single character, got "${dialect.quoteChar}".`);
  }
  if (dialect.delimiter.includes(dialect.quoteChar)) {
    throw new RangeError(`Delimiter "${dialect.delimiter}" must not contain the quote character.`);
  }
  if (dialect.delimiter.includes("\n") || dialect.delimiter.includes("\r")) {
    throw new RangeError("Delimiter must not contain line breaks.");
  }

  return dialect;
}
