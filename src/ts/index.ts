/**
 * tabedit - Edit tables as delimited text in an external editor
 *
 * @module tabedit
 */

export { splitLogicalLines, scanLogicalLines, type LineScan } from "./lines";
export { splitFields } from "./tokenizer";
export { unparse, escapeField, defaultFooterLines, type UnparseConfig } from "./unparse";
export { TableParser, parseTable, parseTableFile, type TableParserOptions, type ParseResult } from "./parser";
export { validate, coerceValue, typeName, type ValidateOptions } from "./validator";
export { diffTable, rowsEqual, changedColumns } from "./diff";
export { fromColumns, fromRows, fromRecords, toTable, stringifyValue, ownValue } from "./normalize";
export { resolveEditorCommand, spawnEditor, DEFAULT_EDITOR, type EditorLauncher } from "./editor";
export {
  prepareEdit,
  finishEdit,
  editTable,
  createEditSession,
  type ReturnMode,
  type PrepareEditOptions,
  type FinishEditOptions,
  type EditTableOptions,
  type EditPayload,
  type FinishResult,
  type EditSession,
} from "./session";
export { DEFAULT_DELIMITER, DEFAULT_COMMENT_PREFIX, DEFAULT_QUOTE_CHAR, resolveDialect } from "./dialect";
export { createParseError, formatParseError, EditorError } from "./errors";
export type {
  ParseError,
  ParseErrorType,
  ParseErrorCode,
  ParseErrorCallback,
  ParseWarning,
  ParseWarningCode,
} from "./errors";
export type {
  Row,
  Table,
  TableInput,
  TableDiff,
  ColumnType,
  CustomColumnType,
  ColumnTypeSpec,
  DialectOptions,
} from "./types";
