/**
 * Tests for edit sessions
 */

import { describe, test, expect, beforeEach, afterEach } from "vitest";
import { existsSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from "fs";
import { tmpdir } from "os";
import { basename, dirname, join } from "path";
import { prepareEdit, finishEdit, createEditSession, editTable } from "../../src/ts/session";
import { unparse } from "../../src/ts/unparse";
import type { EditorLauncher } from "../../src/ts/editor";

const PEOPLE = {
  columns: ["id", "name"],
  rows: [
    { id: 1, name: "Alice" },
    { id: 2, name: "Bob" },
  ],
};

let dir: string;

beforeEach(() => {
  dir = mkdtempSync(join(tmpdir(), "tabedit-session-"));
});

afterEach(() => {
  rmSync(dir, { recursive: true, force: true });
});

function writeBuffer(text: string): string {
  const path = join(dir, "buffer.tsv");
  writeFileSync(path, text);
  return path;
}

describe("prepareEdit", () => {
  test("writes the serialized table to the given path", () => {
    const path = join(dir, "people.tsv");
    expect(prepareEdit(PEOPLE, { path })).toBe(path);
    expect(readFileSync(path, "utf-8")).toBe(
      unparse({
        columns: ["id", "name"],
        rows: [
          { id: "1", name: "Alice" },
          { id: "2", name: "Bob" },
        ],
      }),
    );
  });

  test("creates a temporary file when no path is given", () => {
    const path = prepareEdit(PEOPLE);
    try {
      expect(basename(path)).toBe("table.tsv");
      expect(existsSync(path)).toBe(true);
    } finally {
      rmSync(join(path, ".."), { recursive: true, force: true });
    }
  });
});

describe("finishEdit", () => {
  test("returns the full table by default", () => {
    const outcome = finishEdit(writeBuffer("id\tname\n1\tAlice\n"));
    expect(outcome).toEqual({
      ok: true,
      result: { mode: "full", columns: ["id", "name"], rows: [{ id: "1", name: "Alice" }] },
      errors: [],
    });
  });

  test("returns parse errors without a result", () => {
    const outcome = finishEdit(writeBuffer("id\tname\n1\n"), { requiredColumns: ["email"] });
    expect(outcome.ok).toBe(false);
    expect(outcome.result).toBeNull();
    expect(outcome.errors.map((e) => e.code)).toEqual(["FieldCountMismatch"]);
  });

  test("returns validation errors without a result", () => {
    const outcome = finishEdit(writeBuffer("id\tname\n1\tA\n1\tB\n"), { keyColumns: ["id"] });
    expect(outcome.ok).toBe(false);
    expect(outcome.errors.map((e) => e.message)).toEqual(['Duplicate key ("1") (first at row 2)']);
  });

  test("returns a diff against the original table", () => {
    const outcome = finishEdit(writeBuffer("id\tname\n1\tAlice X\n3\tCarol\n"), {
      originalTable: PEOPLE,
      keyColumns: ["id"],
      returnMode: "diff",
    });
    expect(outcome).toEqual({
      ok: true,
      result: {
        mode: "diff",
        diff: {
          added: [{ id: "3", name: "Carol" }],
          removed: [{ id: "2", name: "Bob" }],
          modified: [[{ id: "1", name: "Alice" }, { id: "1", name: "Alice X" }]],
        },
      },
      errors: [],
    });
  });

  test("returns only added and modified rows", () => {
    const outcome = finishEdit(writeBuffer("id\tname\n1\tAlice X\n3\tCarol\n"), {
      originalTable: PEOPLE,
      keyColumns: ["id"],
      returnMode: "changes_only",
    });
    expect(outcome.result).toEqual({
      mode: "changes_only",
      added: [{ id: "3", name: "Carol" }],
      modified: [{ id: "1", name: "Alice X" }],
    });
  });

  test("requires an original table for diff modes", () => {
    const outcome = finishEdit(writeBuffer("id\n1\n"), { keyColumns: ["id"], returnMode: "diff" });
    expect(outcome).toEqual({
      ok: false,
      result: null,
      errors: [
        {
          type: "Configuration",
          code: "MissingOriginal",
          line: 0,
          column: 1,
          message: 'Return mode "diff" requires originalTable and keyColumns',
        },
      ],
    });
  });

  test("requires key columns for diff modes", () => {
    const outcome = finishEdit(writeBuffer("id\n1\n"), { originalTable: PEOPLE, returnMode: "changes_only" });
    expect(outcome.errors.map((e) => e.message)).toEqual([
      'Return mode "changes_only" requires originalTable and keyColumns',
    ]);
  });
});

describe("createEditSession", () => {
  test("finishes with whatever the file holds", () => {
    const session = createEditSession(PEOPLE, { path: join(dir, "s.tsv") });
    writeFileSync(session.path, "id\tname\n2\tBobby\n");
    const outcome = session.finish();
    expect(outcome.ok && outcome.result).toEqual({ mode: "full", columns: ["id", "name"], rows: [{ id: "2", name: "Bobby" }] });
  });

  test("dispose removes the temporary directory it created", () => {
    const session = createEditSession(PEOPLE);
    expect(existsSync(session.path)).toBe(true);
    session.dispose();
    expect(existsSync(dirname(session.path))).toBe(false);
  });

  test("dispose keeps a caller-supplied file", () => {
    const session = createEditSession(PEOPLE, { path: join(dir, "kept.tsv") });
    session.dispose();
    expect(existsSync(session.path)).toBe(true);
  });
});

describe("editTable", () => {
  test("returns the table unchanged when nothing is edited", () => {
    const outcome = editTable(PEOPLE, { path: join(dir, "e.tsv"), launchEditor: () => {} });
    expect(outcome.result).toEqual({
      mode: "full",
      columns: ["id", "name"],
      rows: [
        { id: "1", name: "Alice" },
        { id: "2", name: "Bob" },
      ],
    });
  });

  test("passes the resolved editor command and reads the edit", () => {
    let command: string[] = [];
    const launch: EditorLauncher = (path, cmd) => {
      command = cmd;
      writeFileSync(path, readFileSync(path, "utf-8").replace("Bob", "Robert"));
    };

    const outcome = editTable(PEOPLE, {
      path: join(dir, "e.tsv"),
      editor: "code --wait",
      launchEditor: launch,
      originalTable: PEOPLE,
      keyColumns: ["id"],
      returnMode: "diff",
    });

    expect(command).toEqual(["code", "--wait"]);
    expect(outcome.result).toEqual({
      mode: "diff",
      diff: {
        added: [],
        removed: [],
        modified: [[{ id: "2", name: "Bob" }, { id: "2", name: "Robert" }]],
      },
    });
  });

  test("removes the temporary buffer after the edit", () => {
    let edited = "";
    const outcome = editTable(PEOPLE, {
      launchEditor: (path) => {
        edited = path;
      },
    });
    expect(outcome.ok).toBe(true);
    expect(edited).not.toBe("");
    expect(existsSync(edited)).toBe(false);
    expect(existsSync(dirname(edited))).toBe(false);
  });

  test("removes the temporary buffer when the editor fails", () => {
    let edited = "";
    const launch: EditorLauncher = (path) => {
      edited = path;
      throw new Error("editor crashed");
    };
    expect(() => editTable(PEOPLE, { launchEditor: launch })).toThrow("editor crashed");
    expect(existsSync(dirname(edited))).toBe(false);
  });

  test("leaves a caller-supplied buffer in place", () => {
    const path = join(dir, "kept.tsv");
    editTable(PEOPLE, { path, launchEditor: () => {} });
    expect(existsSync(path)).toBe(true);
  });

  test("uses the buffer dialect on both sides", () => {
    const outcome = editTable(
      { columns: ["a", "b"], rows: [{ a: "x;y", b: "1" }] },
      { path: join(dir, "e.txt"), delimiter: ";", commentPrefix: "//", launchEditor: () => {} },
    );
    expect(outcome.ok && outcome.result).toEqual({ mode: "full", columns: ["a", "b"], rows: [{ a: "x;y", b: "1" }] });
  });
});
