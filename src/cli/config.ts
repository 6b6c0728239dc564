/**
 * Config file loader for the tabedit CLI
 * Supports .tabeditrc (JSON) in current directory or parent directories
 */

import { existsSync, readFileSync } from "fs";
import { join, dirname } from "path";
import { homedir } from "os";
import { z } from "zod";

export const ColumnTypeSchema = z.enum(["string", "number", "integer", "float", "boolean", "date", "currency", "percent"]);

export const OutputFormatSchema = z.enum(["table", "csv", "json"]);

export const CLIConfigSchema = z
  .object({
    delimiter: z.string().min(1),
    bufferDelimiter: z.string().min(1),
    commentPrefix: z.string().min(1),
    quoteChar: z.string().length(1),
    format: OutputFormatSchema,
    alignColumns: z.boolean(),
    headerSeparator: z.boolean(),
    defaultFooter: z.boolean(),
    editor: z.union([z.string().min(1), z.array(z.string()).min(1)]),
    keyColumns: z.array(z.string()),
    requiredColumns: z.array(z.string()),
    columnTypes: z.record(ColumnTypeSchema),
  })
  .partial()
  .strict();

export type CLIConfig = z.infer<typeof CLIConfigSchema>;
export type OutputFormat = z.infer<typeof OutputFormatSchema>;

const CONFIG_FILENAMES = [".tabeditrc", ".tabeditrc.json", "tabedit.config.json"];

/**
 * Search for config file starting from the given directory,
 * walking up to parent directories and finally home directory.
 */
function findConfigFile(startDir: string = process.cwd(), home: string = homedir()): string | null {
  let currentDir = startDir;

  // Walk up directory tree
  while (true) {
    for (const filename of CONFIG_FILENAMES) {
      const configPath = join(currentDir, filename);
      if (existsSync(configPath)) {
        return configPath;
      }
    }
    const parentDir = dirname(currentDir);
    if (parentDir === currentDir) break;
    currentDir = parentDir;
  }

  // Check home directory
  const homeConfig = join(home, ".tabeditrc");
  if (existsSync(homeConfig)) {
    return homeConfig;
  }

  return null;
}

/**
 * Load configuration from file. An unreadable or invalid file is reported on
 * stderr and ignored.
 */
export function loadConfig(startDir?: string, home?: string): { config: CLIConfig; path: string | null } {
  const configPath = findConfigFile(startDir, home);

  if (!configPath) {
    return { config: {}, path: null };
  }

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(configPath, "utf-8"));
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    console.error(`Warning: Failed to parse config file ${configPath}: ${message}`);
    return { config: {}, path: configPath };
  }

  const parsed = CLIConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`);
    console.error(`Warning: Ignoring invalid config file ${configPath}: ${issues.join("; ")}`);
    return { config: {}, path: configPath };
  }

  return { config: parsed.data, path: configPath };
}

/** Read overrides from environment variables */
export function configFromEnv(env: NodeJS.ProcessEnv = process.env): CLIConfig {
  const envConfig: CLIConfig = {};

  if (env.TABEDIT_DELIMITER) {
    envConfig.delimiter = env.TABEDIT_DELIMITER;
  }
  if (env.TABEDIT_COMMENT_PREFIX) {
    envConfig.commentPrefix = env.TABEDIT_COMMENT_PREFIX;
  }
  if (env.TABEDIT_FORMAT) {
    const format = OutputFormatSchema.safeParse(env.TABEDIT_FORMAT);
    if (format.success) {
      envConfig.format = format.data;
    } else {
      console.error(`Warning: Ignoring TABEDIT_FORMAT="${env.TABEDIT_FORMAT}" (expected table, csv or json)`);
    }
  }
  if (env.TABEDIT_EDITOR) {
    envConfig.editor = env.TABEDIT_EDITOR;
  }

  return envConfig;
}

/**
 * Merge configuration sources with proper precedence.
 * CLI args > environment variables > config file > defaults
 * `cliArgs` must only carry the flags that were actually given.
 */
export function mergeConfig(
  cliArgs: CLIConfig,
  fileConfig: CLIConfig,
  env: NodeJS.ProcessEnv = process.env,
): CLIConfig {
  return {
    ...getDefaults(),
    ...fileConfig,
    ...configFromEnv(env),
    ...cliArgs,
  };
}

/**
 * Get default configuration values.
 */
export function getDefaults(): CLIConfig {
  return {
    bufferDelimiter: "\t",
    commentPrefix: "#",
    quoteChar: '"',
    alignColumns: true,
    headerSeparator: true,
    defaultFooter: true,
  };
}
