/**
 * Testing utilities for tabedit
 */

import type { Row, Table } from "./types";

export interface GenerateTableOptions {
  rows: number;
  /** Column specs as "name" or "name:type" */
  columns: string[];
  seed?: number;
}

export interface FuzzTableOptions {
  /** Delimiter the values should collide with (default: "\t") */
  delimiter?: string;
  /** Comment prefix the values should start with (default: "#") */
  commentPrefix?: string;
  includeUnicode?: boolean;
  rows?: number;
  seed?: number;
}

/** Simple seeded random number generator */
class SeededRandom {
  private seed: number;

  constructor(seed: number) {
    this.seed = seed;
  }

  next(): number {
    this.seed = (this.seed * 1103515245 + 12345) & 0x7fffffff;
    return this.seed / 0x7fffffff;
  }

  nextInt(min: number, max: number): number {
    return Math.floor(this.next() * (max - min + 1)) + min;
  }

  pick<T>(array: readonly T[], fallback: T): T {
    return array[this.nextInt(0, array.length - 1)] ?? fallback;
  }
}

const FIRST_NAMES = ["Alice", "Bob", "Charlie", "Diana", "Eve", "Frank"];
const LAST_NAMES = ["Smith", "Johnson", "Williams", "Brown", "Jones", "Davis"];
const CITIES = ["NYC", "LA", "Chicago", "Houston", "Phoenix", "Philadelphia"];

/** Generate a table of plain values. Column "id" (or the first column) stays unique. */
export function generateTable(options: GenerateTableOptions): Table {
  const rng = new SeededRandom(options.seed ?? 42);

  const columns = options.columns.map((col) => {
    const [name = col, type = "string"] = col.split(":");
    return { name, type };
  });

  const rows: Row[] = [];
  for (let i = 0; i < options.rows; i++) {
    const row: Row = {};
    columns.forEach((col, c) => {
      row[col.name] = c === 0 || col.name === "id" ? String(i + 1) : generateValue(rng, col.type);
    });
    rows.push(row);
  }

  return { columns: columns.map((c) => c.name), rows };
}

function generateValue(rng: SeededRandom, type: string): string {
  switch (type) {
    case "number":
    case "integer":
      return String(rng.nextInt(1, 10000));
    case "float":
      return (rng.next() * 1000).toFixed(2);
    case "date": {
      const year = rng.nextInt(1990, 2024);
      const month = String(rng.nextInt(1, 12)).padStart(2, "0");
      const day = String(rng.nextInt(1, 28)).padStart(2, "0");
      return `${year}-${month}-${day}`;
    }
    case "boolean":
      return rng.next() > 0.5 ? "true" : "false";
    case "name":
      return `${rng.pick(FIRST_NAMES, "Alice")} ${rng.pick(LAST_NAMES, "Smith")}`;
    case "city":
      return rng.pick(CITIES, "NYC");
    case "email":
      return `${rng.pick(FIRST_NAMES, "Alice").toLowerCase()}${rng.nextInt(1, 999)}@example.com`;
    case "string":
    default:
      return `value_${rng.nextInt(1, 1000)}`;
  }
}

/**
 * Generate a two-column table (`ref`, `note`) whose notes mix the
 * delimiter, quotes, newlines and the comment prefix. Values never start
 * or end with whitespace and hold no carriage returns, so they come back
 * unchanged from a write/parse round trip.
 */
export function fuzzTable(options: FuzzTableOptions = {}): Table {
  const delimiter = options.delimiter ?? "\t";
  const prefix = options.commentPrefix ?? "#";
  const rng = new SeededRandom(options.seed ?? 12345);

  const pieces = [
    "plain",
    `a${delimiter}b`,
    '"quoted"',
    'say ""twice""',
    "line1\nline2",
    `${prefix} not a comment`,
    "comma, semi; pipe|",
    "---",
    '"',
  ];
  if (options.includeUnicode) {
    pieces.push("日本語", "émoji 😀", "Привет");
  }

  const notes = [...pieces];
  const count = options.rows ?? pieces.length * 3;
  while (notes.length < count) {
    const parts = [rng.pick(pieces, "plain"), rng.pick(pieces, "plain"), rng.pick(pieces, "plain")];
    notes.push(parts.join(rng.pick([" ", delimiter, "\n", '"'], " ")));
  }

  return {
    columns: ["ref", "note"],
    rows: notes.slice(0, count).map((note, i) => ({ ref: `R${i + 1}`, note })),
  };
}
