/**
 * External editor launcher
 */

import { spawnSync } from "child_process";
import { EditorError } from "./errors";

/** Opens `path` in an editor and returns once the user is done */
export type EditorLauncher = (path: string, command: string[]) => void;

export const DEFAULT_EDITOR = "vi";

/**
 * Resolve the editor command line.
 * Explicit setting > $EDITOR > "vi". Strings are split on whitespace.
 */
export function resolveEditorCommand(
  editor?: string | readonly string[],
  env: NodeJS.ProcessEnv = process.env,
): string[] {
  const source = editor ?? env.EDITOR ?? DEFAULT_EDITOR;
  const parts = typeof source === "string" ? source.trim().split(/\s+/) : [...source];
  const command = parts.filter((part) => part.length > 0);
  return command.length > 0 ? command : [DEFAULT_EDITOR];
}

/**
 * Run the editor on `path` with the caller's stdin/stdout/stderr, blocking
 * until it exits. No timeout.
 */
export const spawnEditor: EditorLauncher = (path, command) => {
  const [program, ...args] = command;
  if (program === undefined) {
    throw new EditorError("Editor command is empty");
  }

  const result = spawnSync(program, [...args, path], { stdio: "inherit" });

  if (result.error) {
    throw new EditorError(`Failed to start editor "${program}": ${result.error.message}`);
  }
  if (result.status !== 0) {
    const reason = result.signal ? `was killed by ${result.signal}` : `exited with code ${result.status}`;
    throw new EditorError(`Editor "${program}" ${reason}`, result.status);
  }
};
