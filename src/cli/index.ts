#!/usr/bin/env tsx
/**
 * tabedit CLI
 */

import { parseArgs } from "util";
import { configFromFlags } from "./args";
import { convert } from "./commands/convert";
import { diff } from "./commands/diff";
import { edit } from "./commands/edit";
import { validate } from "./commands/validate";
import { loadConfig, mergeConfig } from "./config";

const HELP = `
tabedit - Edit tables as plain delimited text in your editor

Usage: tabedit <command> [options] <file>

Commands:
  edit        Open a CSV/TSV file in $EDITOR and save the validated result
  validate    Check a file for shape, key and type errors
  diff        Compare two files by key columns
  convert     Convert between csv, tsv, json and the edit buffer text

Options:
  -h, --help               Show this help message
  -v, --version            Show version
  -d, --delimiter          Delimiter of the data file (default: from extension)
  --buffer-delimiter       Delimiter of the edit buffer (default: tab)
  --comment                Comment prefix (default: #)
  --quote                  Quote character (default: ")
  -k, --key                Key columns, comma separated
  --required               Required columns, comma separated
  --types                  Column types, e.g. id:integer,price:float
  --editor                 Editor command (default: $EDITOR, then vi)
  --no-align               Do not pad columns in the edit buffer
  --no-separator           Do not write the dashed line under the header
  --no-footer              Do not write the usage footer
  --format                 Output format: table, csv, json (default: auto)
  --to                     Target format for convert: csv, tsv, json, text
  -o, --output             Write the result to this file

Examples:
  tabedit edit people.csv
  tabedit edit -k id --types id:integer,age:integer people.csv
  tabedit validate --required id,name -k id people.csv
  tabedit diff -k id before.csv after.csv
  tabedit convert --to json people.tsv
  cat people.csv | tabedit convert --to text
`;

const VERSION = "0.1.0";

/** Main CLI entry point; resolves to the exit code */
async function main(): Promise<number> {
  const { values, positionals } = parseArgs({
    args: process.argv.slice(2),
    options: {
      help: { type: "boolean", short: "h" },
      version: { type: "boolean", short: "v" },
      delimiter: { type: "string", short: "d" },
      "buffer-delimiter": { type: "string" },
      comment: { type: "string" },
      quote: { type: "string" },
      key: { type: "string", short: "k" },
      required: { type: "string" },
      types: { type: "string" },
      editor: { type: "string" },
      "no-align": { type: "boolean" },
      "no-separator": { type: "boolean" },
      "no-footer": { type: "boolean" },
      format: { type: "string" },
      to: { type: "string" },
      output: { type: "string", short: "o" },
    },
    allowPositionals: true,
  });

  // Handle global flags (version first, since help triggers on empty positionals)
  if (values.version) {
    console.log(`tabedit v${VERSION}`);
    return 0;
  }

  if (values.help || positionals.length === 0) {
    console.log(HELP);
    return 0;
  }

  const [command, filePath = "-", secondPath] = positionals;

  // Load config file
  const { config: fileConfig, path: configPath } = loadConfig();
  if (configPath && process.env.TABEDIT_DEBUG) {
    console.error(`Loaded config from: ${configPath}`);
  }

  // Merge config sources: CLI > env > file config > defaults
  const config = mergeConfig(configFromFlags(values), fileConfig);
  if (process.env.TABEDIT_DEBUG) {
    console.error(`Effective config: ${JSON.stringify(config)}`);
  }

  const dialect = {
    delimiter: config.delimiter,
    commentPrefix: config.commentPrefix ?? "#",
    quoteChar: config.quoteChar ?? '"',
  };
  const layout = {
    bufferDelimiter: config.bufferDelimiter ?? "\t",
    alignColumns: config.alignColumns ?? true,
    headerSeparator: config.headerSeparator ?? true,
    defaultFooter: config.defaultFooter ?? true,
  };
  const checks = {
    keyColumns: config.keyColumns ?? [],
    requiredColumns: config.requiredColumns ?? [],
    columnTypes: config.columnTypes ?? {},
  };

  switch (command) {
    case "edit":
      return edit(filePath, {
        ...dialect,
        ...layout,
        ...checks,
        editor: config.editor,
        output: values.output,
      });

    case "validate":
      return validate(filePath, { ...dialect, ...checks });

    case "diff":
      if (secondPath === undefined) {
        console.error("Usage: tabedit diff -k <columns> <original> <edited>");
        console.error("Example: tabedit diff -k id before.csv after.csv");
        return 1;
      }
      return diff(filePath, secondPath, {
        ...dialect,
        keyColumns: checks.keyColumns,
        format: config.format ?? "auto",
      });

    case "convert":
      if (!values.to) {
        console.error("Usage: tabedit convert --to <format> [--output <file>] <file>");
        console.error("Example: tabedit convert --to json people.csv");
        return 1;
      }
      return convert(filePath, {
        ...dialect,
        ...layout,
        to: values.to,
        output: values.output,
      });

    default:
      console.error(`Unknown command: ${command}`);
      console.log(HELP);
      return 1;
  }
}

main()
  .then((code) => process.exit(code))
  .catch((error: unknown) => {
    console.error(`Error: ${error instanceof Error ? error.message : String(error)}`);
    process.exit(1);
  });
