/**
 * Environment and configuration resolution
 */

import * as path from "node:path";
import { homedir } from "node:os";

/**
 * Expand tilde (~) to home directory
 */
export function expandTilde(input: string): string {
  if (!input.startsWith("~")) {
    return input;
  }

  if (input === "~") {
    return homedir();
  }

  const match = input.match(/^~([\\/]|$)(.*)/);
  if (!match) {
    // Leave "~user" style references untouched for now.
    return input;
  }

  const rest = match[2] ?? "";
  return path.join(homedir(), rest);
}

/**
 * Resolve a file or directory argument to an absolute path
 */
export function resolveFilePath(input: string): string {
  return path.resolve(expandTilde(input));
}

/**
 * Resolve the directory loads are confined to
 * Priority: CLI option > DOCPATH_BASE_DIR env var > unrestricted
 */
export function resolveBaseDir(cliBaseDir?: string): string | undefined {
  const baseDir = cliBaseDir ?? process.env.DOCPATH_BASE_DIR;
  if (!baseDir) {
    return undefined;
  }
  return resolveFilePath(baseDir);
}

/**
 * Check if running in verbose mode
 */
export function isVerbose(): boolean {
  return process.env.DOCPATH_CLI_DEBUG === "1";
}
