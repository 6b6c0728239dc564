/**
 * Structural and type validation for parsed tables
 */

import { createParseError, type ParseError } from "./errors";
import { ownValue } from "./normalize";
import type { ColumnType, ColumnTypeSpec, Row } from "./types";

export interface ValidateOptions {
  /** Columns that must be present in the header */
  requiredColumns?: readonly string[];
  /** Columns whose combined values must be unique per row */
  keyColumns?: readonly string[];
  /** Per-column type checks */
  columnTypes?: Readonly<Record<string, ColumnTypeSpec>>;
  /** Decimal separator replaced by "." before float parsing (default: ",") */
  decimalSeparator?: string;
}

const TRUE_TOKENS = ["true", "1", "yes", "ja"];
const FALSE_TOKENS = ["false", "0", "no", "nein"];
const INTEGER = /^[+-]?\d+$/;
const DECIMAL = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;
const ISO_DATE = /^\d{4}-\d{2}-\d{2}([T ]\d{2}:\d{2}(:\d{2}(\.\d+)?)?(Z|[+-]\d{2}:?\d{2})?)?$/;

/**
 * Validate parsed columns and rows.
 *
 * Errors come back in a fixed order: required columns, then duplicate keys,
 * then type failures. Row-scoped errors report the 1-based row number plus
 * one, which is the document line when the header sits on line 1 and no
 * comments precede the data.
 */
export function validate(columns: readonly string[], rows: readonly Row[], options: ValidateOptions = {}): ParseError[] {
  const errors: ParseError[] = [];

  if (options.requiredColumns) {
    const present = new Set(columns);
    for (const name of options.requiredColumns) {
      if (!present.has(name)) {
        errors.push(createParseError("MissingColumn", 1, name, `Required column missing: ${name}`));
      }
    }
  }

  const keyColumns = options.keyColumns ?? [];
  if (keyColumns.length > 0) {
    const seen = new Map<string, number>();
    rows.forEach((row, i) => {
      const rowNumber = i + 1;
      const values = keyColumns.map((col) => ownValue(row, col));
      const key = JSON.stringify(values);
      const first = seen.get(key);
      if (first === undefined) {
        seen.set(key, rowNumber);
        return;
      }
      errors.push(
        createParseError(
          "DuplicateKey",
          rowNumber + 1,
          1,
          `Duplicate key ${formatKey(values)} (first at row ${first + 1})`,
        ),
      );
    });
  }

  const decimalSeparator = options.decimalSeparator ?? ",";
  for (const [column, spec] of Object.entries(options.columnTypes ?? {})) {
    rows.forEach((row, i) => {
      const value = ownValue(row, column) ?? "";
      if (value === "" && spec !== "string") return;
      if (!coerces(value, spec, decimalSeparator)) {
        errors.push(
          createParseError("TypeMismatch", i + 2, column, `Could not parse "${value}" as ${typeName(spec)}`),
        );
      }
    });
  }

  return errors;
}

/** Name used for a column type in error messages */
export function typeName(spec: ColumnTypeSpec): string {
  return typeof spec === "string" ? spec : spec.name;
}

/**
 * Attempt to convert a value to the given type. Returns the typed value, or
 * `undefined` when the value does not parse. The row is never changed.
 */
export function coerceValue(value: string, spec: ColumnTypeSpec, decimalSeparator = ","): unknown {
  if (typeof spec !== "string") {
    try {
      spec.parse(value);
      return value;
    } catch {
      return undefined;
    }
  }
  return coerceBuiltin(value, spec, decimalSeparator);
}

function coerces(value: string, spec: ColumnTypeSpec, decimalSeparator: string): boolean {
  return coerceValue(value, spec, decimalSeparator) !== undefined;
}

function coerceBuiltin(value: string, type: ColumnType, decimalSeparator: string): unknown {
  const trimmed = value.trim();

  switch (type) {
    case "string":
      return value;

    case "integer": {
      if (!INTEGER.test(trimmed)) return undefined;
      const parsed = Number.parseInt(trimmed, 10);
      return Number.isSafeInteger(parsed) ? parsed : undefined;
    }

    case "number":
    case "float": {
      const normalized = decimalSeparator === "." ? trimmed : trimmed.replaceAll(decimalSeparator, ".");
      return DECIMAL.test(normalized) ? Number(normalized) : undefined;
    }

    case "boolean": {
      const lower = trimmed.toLowerCase();
      if (TRUE_TOKENS.includes(lower)) return true;
      if (FALSE_TOKENS.includes(lower)) return false;
      return undefined;
    }

    case "date": {
      if (!ISO_DATE.test(trimmed)) return undefined;
      const date = new Date(trimmed);
      return Number.isNaN(date.getTime()) ? undefined : date;
    }

    case "currency": {
      const cleaned = trimmed
        .replace(/[$€£¥,\s]/g, "")
        .replace(/^\(([0-9.]+)\)$/, "-$1"); // Accounting negative
      return DECIMAL.test(cleaned) ? Number(cleaned) : undefined;
    }

    case "percent": {
      const cleaned = trimmed.replace(/%$/, "").replace(/,/g, "");
      return DECIMAL.test(cleaned) ? Number(cleaned) / 100 : undefined;
    }
  }
}

function formatKey(values: (string | undefined)[]): string {
  return `(${values.map((v) => (v === undefined ? "missing" : JSON.stringify(v))).join(", ")})`;
}
