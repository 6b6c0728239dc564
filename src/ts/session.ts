/**
 * Edit session - table → file → editor → parse → validate → result
 */

import { mkdtempSync, rmSync, writeFileSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { diffTable } from "./diff";
import { resolveEditorCommand, spawnEditor, type EditorLauncher } from "./editor";
import { createParseError, type ParseError } from "./errors";
import { toTable } from "./normalize";
import { TableParser, type TableParserOptions } from "./parser";
import { unparse, type UnparseConfig } from "./unparse";
import { validate, type ValidateOptions } from "./validator";
import type { DialectOptions, Row, TableDiff, TableInput } from "./types";

/** What `finishEdit` returns on success */
export type ReturnMode = "full" | "diff" | "changes_only";

export interface PrepareEditOptions extends UnparseConfig {
  /** Destination file; a temporary file is created when omitted */
  path?: string;
}

export interface FinishEditOptions extends DialectOptions, ValidateOptions {
  /** Table the buffer was created from; required for "diff" and "changes_only" */
  originalTable?: TableInput;
  /** Result shape (default: "full") */
  returnMode?: ReturnMode;
  /** Error callback forwarded to the parser */
  onError?: TableParserOptions["onError"];
}

export interface EditTableOptions extends PrepareEditOptions, FinishEditOptions {
  /** Editor command; defaults to $EDITOR, then "vi" */
  editor?: string | string[];
  /** Replaces the process launcher, e.g. with a scripted edit in tests */
  launchEditor?: EditorLauncher;
}

export type EditPayload =
  | { mode: "full"; columns: string[]; rows: Row[] }
  | { mode: "diff"; diff: TableDiff }
  | { mode: "changes_only"; added: Row[]; modified: Row[] };

/** All-or-nothing outcome: any error means no payload */
export type FinishResult =
  | { ok: true; result: EditPayload; errors: [] }
  | { ok: false; result: null; errors: ParseError[] };

export interface EditSession {
  /** File holding the editable buffer */
  path: string;
  /** Parse, validate and build the result from the file's current content */
  finish: () => FinishResult;
  /** Remove the temporary directory if the session created one */
  dispose: () => void;
}

const TEMP_FILE_NAME = "table.tsv";

/**
 * Write the table to `options.path` or a fresh temporary file and return the
 * path written.
 */
export function prepareEdit(table: TableInput, options: PrepareEditOptions = {}): string {
  return writeBuffer(table, options).path;
}

function writeBuffer(table: TableInput, options: PrepareEditOptions): { path: string; tempDir: string | null } {
  const text = unparse(toTable(table), options);
  if (options.path) {
    writeFileSync(options.path, text, "utf-8");
    return { path: options.path, tempDir: null };
  }

  const tempDir = mkdtempSync(join(tmpdir(), "tabedit-"));
  const path = join(tempDir, TEMP_FILE_NAME);
  writeFileSync(path, text, "utf-8");
  return { path, tempDir };
}

/**
 * Parse and validate an edited file.
 *
 * Parse errors are returned without validating; validation errors are
 * returned without building a result.
 */
export function finishEdit(path: string, options: FinishEditOptions = {}): FinishResult {
  const parser = new TableParser({
    delimiter: options.delimiter,
    commentPrefix: options.commentPrefix,
    quoteChar: options.quoteChar,
    onError: options.onError,
  });
  const { columns, rows, errors: parseErrors } = parser.parseFile(path);
  if (parseErrors.length > 0) {
    return failure(parseErrors);
  }

  const validationErrors = validate(columns, rows, options);
  if (validationErrors.length > 0) {
    return failure(validationErrors);
  }

  const mode = options.returnMode ?? "full";
  if (mode === "full") {
    return success({ mode, columns, rows });
  }

  if (mode !== "diff" && mode !== "changes_only") {
    const unknownMode: never = mode;
    return failure([createParseError("UnknownReturnMode", 0, 1, `Unknown return mode: ${String(unknownMode)}`)]);
  }

  const { originalTable, keyColumns } = options;
  if (originalTable === undefined || keyColumns === undefined || keyColumns.length === 0) {
    return failure([
      createParseError("MissingOriginal", 0, 1, `Return mode "${mode}" requires originalTable and keyColumns`),
    ]);
  }

  const diff = diffTable(toTable(originalTable).rows, rows, keyColumns);
  if (mode === "diff") {
    return success({ mode, diff });
  }
  return success({ mode, added: diff.added, modified: diff.modified.map(([, after]) => after) });
}

/**
 * Write the table, return its path and a callback that finishes the edit.
 * Nothing is launched; edit the file yourself, then call `finish()`, and
 * `dispose()` once the file is no longer needed. A caller-supplied `path`
 * is never removed.
 */
export function createEditSession(table: TableInput, options: EditTableOptions = {}): EditSession {
  const { path, tempDir } = writeBuffer(table, options);
  return {
    path,
    finish: () => finishEdit(path, options),
    dispose: () => {
      if (tempDir !== null) {
        rmSync(tempDir, { recursive: true, force: true });
      }
    },
  };
}

/**
 * Edit a table in an external editor, blocking until the editor exits.
 *
 * @example
 * ```ts
 * const table = fromRecords(people);
 * const outcome = editTable(table, { originalTable: table, keyColumns: ["id"], returnMode: "diff" });
 * if (outcome.ok && outcome.result.mode === "diff") {
 *   console.log(outcome.result.diff.modified);
 * }
 * ```
 */
export function editTable(table: TableInput, options: EditTableOptions = {}): FinishResult {
  const session = createEditSession(table, options);
  try {
    const launch = options.launchEditor ?? spawnEditor;
    launch(session.path, resolveEditorCommand(options.editor));
    return session.finish();
  } finally {
    session.dispose();
  }
}

function success(result: EditPayload): FinishResult {
  return { ok: true, result, errors: [] };
}

function failure(errors: ParseError[]): FinishResult {
  return { ok: false, result: null, errors };
}
