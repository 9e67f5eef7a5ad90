/**
 * Console capture for in-process CLI tests
 */

import { format } from "node:util";

/**
 * Output captured while a function ran
 */
export interface CapturedOutput<T> {
  /** Value the function resolved with */
  result: T;
  /** Everything written through console.log, one line per call */
  stdout: string;
  /** Everything written through console.error and console.warn */
  stderr: string;
}

/**
 * Run fn with console.log, console.error and console.warn redirected into buffers
 *
 * The original console methods are restored even when fn rejects.
 */
export async function captureOutput<T>(fn: () => Promise<T>): Promise<CapturedOutput<T>> {
  const out: string[] = [];
  const err: string[] = [];
  const original = { log: console.log, error: console.error, warn: console.warn };

  console.log = (...args: unknown[]) => {
    out.push(format(...args) + "\n");
  };
  console.error = (...args: unknown[]) => {
    err.push(format(...args) + "\n");
  };
  console.warn = console.error;

  try {
    const result = await fn();
    return { result, stdout: out.join(""), stderr: err.join("") };
  } finally {
    console.log = original.log;
    console.error = original.error;
    console.warn = original.warn;
  }
}

/**
 * Parse JSON output from CLI
 * @param stdout - Standard output from CLI
 * @returns Parsed JSON value
 */
export function parseJsonOutput(stdout: string): unknown {
  return JSON.parse(stdout.trim());
}
