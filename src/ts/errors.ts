/**
 * Structured error types for parsing, validation and edit sessions
 */

/** Error type categories */
export type ParseErrorType = "Document" | "RowShape" | "Validation" | "Configuration";

/** Error codes */
export type ParseErrorCode =
  | "NoHeader"
  | "FieldCountMismatch"
  | "MissingColumn"
  | "DuplicateKey"
  | "TypeMismatch"
  | "MissingOriginal"
  | "UnknownReturnMode";

/** A single parse, validation or configuration error */
export interface ParseError {
  /** Error category */
  readonly type: ParseErrorType;
  /** Specific error code */
  readonly code: ParseErrorCode;
  /** 1-based logical line number, or 0 for whole-document errors */
  readonly line: number;
  /** 1-based column index (positional) or column name (column-scoped) */
  readonly column: number | string;
  /** Human-readable error message */
  readonly message: string;
}

/** Warning codes */
export type ParseWarningCode = "UnterminatedQuote";

/** Soft diagnostic that does not invalidate the parse */
export interface ParseWarning {
  readonly code: ParseWarningCode;
  readonly line: number;
  readonly message: string;
}

/** Error callback function type */
export type ParseErrorCallback = (error: ParseError) => void;

const TYPE_BY_CODE: Record<ParseErrorCode, ParseErrorType> = {
  NoHeader: "Document",
  FieldCountMismatch: "RowShape",
  MissingColumn: "Validation",
  DuplicateKey: "Validation",
  TypeMismatch: "Validation",
  MissingOriginal: "Configuration",
  UnknownReturnMode: "Configuration",
};

export function createParseError(
  code: ParseErrorCode,
  line: number,
  column: number | string,
  message: string,
): ParseError {
  return Object.freeze({ type: TYPE_BY_CODE[code], code, line, column, message });
}

/** Render an error as `Line 3, column "age": message` */
export function formatParseError(error: ParseError): string {
  const column = typeof error.column === "number" ? String(error.column) : `"${error.column}"`;
  if (error.line === 0) {
    return error.message;
  }
  return `Line ${error.line}, column ${column}: ${error.message}`;
}

/** Raised when the external editor cannot be started or exits unsuccessfully */
export class EditorError extends Error {
  readonly exitCode: number | null;

  constructor(message: string, exitCode: number | null = null) {
    super(message);
    this.name = "EditorError";
    this.exitCode = exitCode;
  }
}
