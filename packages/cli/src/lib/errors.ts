/**
 * CLI error handling and exit code mapping
 */

import { CommanderError } from "commander";
import { DocumentNotFoundError } from "@docpath/sdk";

/**
 * Base CLI error class
 */
export class CliError extends Error {
  exitCode: number;

  constructor(message: string, options?: { exitCode?: number; cause?: unknown }) {
    super(message, { cause: options?.cause });
    this.name = "CliError";
    this.exitCode = options?.exitCode ?? 1;
  }
}

/**
 * Map errors to CLI exit codes
 * - 0: success (help and version output)
 * - 1: usage/validation/IO/unknown error
 * - 2: document or path not found
 */
export function mapErrorToExitCode(error: unknown): number {
  // Check for CliError first (has exitCode property)
  if (error instanceof CliError) {
    return error.exitCode;
  }

  if (error instanceof DocumentNotFoundError) {
    return 2;
  }

  if (error instanceof CommanderError) {
    return error.exitCode === 0 ? 0 : 1;
  }

  // Default to exit code 1 for unknown errors
  return 1;
}

/**
 * Format an error for CLI output
 */
export function formatCliError(error: unknown, verbose = false): string {
  if (error instanceof Error) {
    let message = error.message;

    // Redact large payloads from error messages
    if (message.length > 2000) {
      message = message.substring(0, 2000) + "... (truncated)";
    }

    if (verbose && error.cause) {
      message += `\n  Cause: ${String(error.cause)}`;
    }

    if (verbose && error.stack) {
      message += `\n${error.stack}`;
    }

    return message;
  }

  return String(error);
}
