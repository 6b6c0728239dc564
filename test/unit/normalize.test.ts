/**
 * Tests for table adapters
 */

import { describe, test, expect } from "vitest";
import { fromColumns, fromRows, fromRecords, toTable, stringifyValue, ownValue } from "../../src/ts/normalize";

describe("stringifyValue", () => {
  test("renders missing values as empty", () => {
    expect(stringifyValue(null)).toBe("");
    expect(stringifyValue(undefined)).toBe("");
  });

  test("renders dates as ISO strings", () => {
    expect(stringifyValue(new Date(Date.UTC(2024, 0, 2)))).toBe("2024-01-02T00:00:00.000Z");
  });

  test("renders other values with String()", () => {
    expect(stringifyValue(42)).toBe("42");
    expect(stringifyValue(false)).toBe("false");
    expect(stringifyValue("x")).toBe("x");
  });
});

describe("fromColumns", () => {
  test("pads short columns with empty strings", () => {
    expect(fromColumns({ id: [1, 2], name: ["A"] })).toEqual({
      columns: ["id", "name"],
      rows: [
        { id: "1", name: "A" },
        { id: "2", name: "" },
      ],
    });
  });

  test("handles an empty mapping", () => {
    expect(fromColumns({})).toEqual({ columns: [], rows: [] });
  });
});

describe("ownValue", () => {
  test("returns own properties only", () => {
    expect(ownValue({ a: "1" }, "a")).toBe("1");
    expect(ownValue({}, "constructor")).toBeUndefined();
    expect(ownValue({ constructor: "x" }, "constructor")).toBe("x");
  });
});

describe("fromRows", () => {
  test("follows the given column order and drops extra keys", () => {
    expect(fromRows(["b", "a"], [{ a: 1, b: null, c: 3 }])).toEqual({
      columns: ["b", "a"],
      rows: [{ b: "", a: "1" }],
    });
  });

  test("does not pick up inherited members", () => {
    expect(fromRows(["valueOf", "constructor"], [{}])).toEqual({
      columns: ["valueOf", "constructor"],
      rows: [{ valueOf: "", constructor: "" }],
    });
  });
});

describe("fromRecords", () => {
  test("unions keys in order of first appearance", () => {
    expect(fromRecords([{ a: 1 }, { b: true, a: 2 }])).toEqual({
      columns: ["a", "b"],
      rows: [
        { a: "1", b: "" },
        { a: "2", b: "true" },
      ],
    });
  });
});

describe("toTable", () => {
  test("stringifies loosely typed rows", () => {
    expect(toTable({ columns: ["id"], rows: [{ id: 7 }] })).toEqual({ columns: ["id"], rows: [{ id: "7" }] });
  });
});
