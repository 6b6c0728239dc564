/**
 * Flag value parsing for the CLI
 */

import type { ColumnType } from "../ts/types";
import { ColumnTypeSchema, OutputFormatSchema, type CLIConfig } from "./config";
import type { OutputMode } from "./output";

/** Split "a,b, c" into ["a", "b", "c"] */
export function parseList(value: string): string[] {
  return value
    .split(",")
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

/** Parse "id:integer,price:float" into a column type map */
export function parseColumnTypes(value: string): Record<string, ColumnType> {
  const types: Record<string, ColumnType> = {};
  for (const entry of parseList(value)) {
    const sep = entry.lastIndexOf(":");
    if (sep <= 0) {
      throw new Error(`Invalid column type "${entry}" (expected column:type)`);
    }
    const column = entry.slice(0, sep).trim();
    const type = ColumnTypeSchema.safeParse(entry.slice(sep + 1).trim());
    if (!type.success) {
      throw new Error(
        `Unknown column type "${entry.slice(sep + 1)}". Supported: ${ColumnTypeSchema.options.join(", ")}`,
      );
    }
    types[column] = type.data;
  }
  return types;
}

/** "auto" or one of the configured output formats */
export function parseOutputMode(value: string | undefined): OutputMode {
  if (value === undefined || value === "auto") return "auto";
  const format = OutputFormatSchema.safeParse(value);
  if (!format.success) {
    throw new Error(`Unknown output format: ${value}. Supported: auto, table, csv, json`);
  }
  return format.data;
}

/** Decode "\t" and the word "tab" so tabs can be typed on a command line */
export function parseDelimiter(value: string): string {
  if (value === "\\t" || value.toLowerCase() === "tab") return "\t";
  return value;
}

export interface FlagValues {
  delimiter?: string;
  "buffer-delimiter"?: string;
  comment?: string;
  quote?: string;
  format?: string;
  editor?: string;
  key?: string;
  required?: string;
  types?: string;
  "no-align"?: boolean;
  "no-separator"?: boolean;
  "no-footer"?: boolean;
}

/** Config overrides for the flags that were given; absent flags are left out */
export function configFromFlags(values: FlagValues): CLIConfig {
  const config: CLIConfig = {};
  if (values.delimiter !== undefined) config.delimiter = parseDelimiter(values.delimiter);
  if (values["buffer-delimiter"] !== undefined) config.bufferDelimiter = parseDelimiter(values["buffer-delimiter"]);
  if (values.comment !== undefined) config.commentPrefix = values.comment;
  if (values.quote !== undefined) config.quoteChar = values.quote;
  if (values.format !== undefined) {
    const mode = parseOutputMode(values.format);
    if (mode !== "auto") config.format = mode;
  }
  if (values.editor !== undefined) config.editor = values.editor;
  if (values.key !== undefined) config.keyColumns = parseList(values.key);
  if (values.required !== undefined) config.requiredColumns = parseList(values.required);
  if (values.types !== undefined) config.columnTypes = parseColumnTypes(values.types);
  if (values["no-align"]) config.alignColumns = false;
  if (values["no-separator"]) config.headerSeparator = false;
  if (values["no-footer"]) config.defaultFooter = false;
  return config;
}
