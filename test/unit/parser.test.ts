/**
 * Tests for TableParser
 */

import { describe, test, expect, beforeAll, afterAll } from "vitest";
import { mkdtempSync, rmSync, writeFileSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { TableParser, parseTable, parseTableFile } from "../../src/ts/parser";
import type { ParseError } from "../../src/ts/errors";

describe("TableParser", () => {
  test("keeps a comma inside a quoted field", () => {
    const result = parseTable('a,b\n1,"Contains, comma"\n', { delimiter: "," });
    expect(result.rows).toEqual([{ a: "1", b: "Contains, comma" }]);
    expect(result.errors).toEqual([]);
  });

  test("decodes doubled quotes", () => {
    const result = parseTable('a,b\n1,"Say ""hello"""\n', { delimiter: "," });
    expect(result.rows).toEqual([{ a: "1", b: 'Say "hello"' }]);
  });

  test("reads a quoted newline as part of one row", () => {
    const result = parseTable('a,b\n1,"line1\nline2"\n', { delimiter: "," });
    expect(result.rows).toEqual([{ a: "1", b: "line1\nline2" }]);
  });

  test("reports a document without a header", () => {
    const result = parseTable("# only\n\n", { delimiter: "," });
    expect(result.columns).toEqual([]);
    expect(result.rows).toEqual([]);
    expect(result.errors).toHaveLength(1);
    expect(result.errors[0]).toMatchObject({
      type: "Document",
      code: "NoHeader",
      line: 1,
      column: 1,
      message: "No header line found (only comments or empty lines)",
    });
  });

  test("reports a row with too many fields and keeps going", () => {
    const result = parseTable("a,b\n1,2,3\n4,5\n", { delimiter: "," });
    expect(result.rows).toEqual([{ a: "4", b: "5" }]);
    expect(result.errors).toHaveLength(1);
    expect(result.errors[0]).toMatchObject({
      type: "RowShape",
      code: "FieldCountMismatch",
      line: 2,
      column: 1,
      message: "Expected 2 columns, got 3",
    });
  });

  test("collects every malformed row", () => {
    const result = parseTable("a,b\n1\n2,3\n4,5,6\n", { delimiter: "," });
    expect(result.rows).toEqual([{ a: "2", b: "3" }]);
    expect(result.errors.map((e) => [e.line, e.message])).toEqual([
      [2, "Expected 2 columns, got 1"],
      [4, "Expected 2 columns, got 3"],
    ]);
  });

  test("counts comment lines in error line numbers", () => {
    const result = parseTable("# note\na,b\n1\n", { delimiter: "," });
    expect(result.errors[0]?.line).toBe(3);
  });

  test("uses tab as the default delimiter", () => {
    const result = new TableParser().parse("id\tname\n1\tAlice\n");
    expect(result.columns).toEqual(["id", "name"]);
    expect(result.rows).toEqual([{ id: "1", name: "Alice" }]);
  });

  test("skips the header separator and alignment padding", () => {
    const result = parseTable("id\tname \n--\t-----\n1 \tAlice\n22\tBo   \n");
    expect(result.columns).toEqual(["id", "name"]);
    expect(result.rows).toEqual([
      { id: "1", name: "Alice" },
      { id: "22", name: "Bo" },
    ]);
  });

  test("skips rows whose fields are all empty", () => {
    const result = parseTable("a,b\n,\n1,2\n", { delimiter: "," });
    expect(result.rows).toEqual([{ a: "1", b: "2" }]);
  });

  test("skips comment lines, indented comments and blank lines", () => {
    const result = parseTable("# top\nid\n\n  # indented\n1\n   \n# end\n");
    expect(result.rows).toEqual([{ id: "1" }]);
    expect(result.errors).toEqual([]);
  });

  test("trims header and data fields", () => {
    const result = parseTable("a , b\n 1 , 2 \n", { delimiter: "," });
    expect(result.columns).toEqual(["a", "b"]);
    expect(result.rows).toEqual([{ a: "1", b: "2" }]);
  });

  test("keeps a quoted value that starts with the comment prefix", () => {
    const result = parseTable('ref\tnote\nR1\t"# not a comment"\n');
    expect(result.rows).toEqual([{ ref: "R1", note: "# not a comment" }]);
  });

  test("treats a data line starting with the prefix as a comment", () => {
    const result = parseTable("id\n#1\n2\n");
    expect(result.rows).toEqual([{ id: "2" }]);
  });

  test("reads a data line starting with the prefix when skipComments is off", () => {
    const result = parseTable("id\n#1\n2\n", { skipComments: false });
    expect(result.rows).toEqual([{ id: "#1" }, { id: "2" }]);
  });

  test("keeps empty and dashed rows when skipSeparatorRows is off", () => {
    const result = parseTable("a,b\n,\n---,--\n", { delimiter: ",", skipSeparatorRows: false });
    expect(result.rows).toEqual([
      { a: "", b: "" },
      { a: "---", b: "--" },
    ]);
  });

  test("keeps a tab-only line as an empty row when skipSeparatorRows is off", () => {
    const result = parseTable("a\tb\n\t\n\n1\t2\n", { skipSeparatorRows: false });
    expect(result.rows).toEqual([
      { a: "", b: "" },
      { a: "1", b: "2" },
    ]);
  });

  test("reads a row of dashes with a quoted cell as data", () => {
    const result = parseTable('a,b\n"---",--\n"",\n', { delimiter: "," });
    expect(result.rows).toEqual([
      { a: "---", b: "--" },
      { a: "", b: "" },
    ]);
  });

  test("warns about an unterminated quote and reads to the end", () => {
    const result = parseTable('a,b\n1,"open\n2,3\n', { delimiter: "," });
    expect(result.rows).toEqual([{ a: "1", b: "open\n2,3" }]);
    expect(result.errors).toEqual([]);
    expect(result.warnings).toEqual([
      {
        code: "UnterminatedQuote",
        line: 2,
        message: "Unterminated quoted field; the rest of the document was read as line 2",
      },
    ]);
  });

  test("calls onError for each error in order", () => {
    const seen: ParseError[] = [];
    const parser = new TableParser({ delimiter: ",", onError: (error) => seen.push(error) });
    const result = parser.parse("a,b\n1\n2,3,4\n");
    expect(seen).toEqual(result.errors);
    expect(seen.map((e) => e.line)).toEqual([2, 3]);
  });

  test("rejects a delimiter containing the quote character", () => {
    expect(() => new TableParser({ delimiter: '"' })).toThrow(RangeError);
  });
});

describe("parseTableFile", () => {
  let dir: string;

  beforeAll(() => {
    dir = mkdtempSync(join(tmpdir(), "tabedit-parser-"));
    writeFileSync(join(dir, "people.tsv"), "id\tname\r\n1\tAlice\r\n2\tBob\r\n");
  });

  afterAll(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  test("reads a CRLF file", () => {
    const result = parseTableFile(join(dir, "people.tsv"));
    expect(result.rows).toEqual([
      { id: "1", name: "Alice" },
      { id: "2", name: "Bob" },
    ]);
  });
});
