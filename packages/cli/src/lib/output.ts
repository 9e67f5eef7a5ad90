/**
 * Printing documents, paths and status lines
 *
 * Documents go to stdout as JSON: indented by default, compact with --raw.
 */

import { MISSING_GROUP, type DocumentValue, type GroupKey, type Scalar } from "@docpath/sdk";
import type { GlobalOptions } from "./document.js";

type OutputOptions = Pick<GlobalOptions, "raw" | "quiet">;

/**
 * One groupBy bucket as printed by `query --group-by`
 */
export type GroupJson =
  | { value: DocumentValue; items: DocumentValue[] }
  | { missing: true; items: DocumentValue[] };

/**
 * Render a value the way every command prints it
 */
export function renderJson(value: unknown, options: OutputOptions = {}): string {
  return options.raw ? JSON.stringify(value) : JSON.stringify(value, null, 2);
}

/**
 * Print a document value, report or count
 */
export function printValue(value: unknown, options: OutputOptions = {}): void {
  console.log(renderJson(value, options));
}

/**
 * Print one path per line
 */
export function printPaths(paths: readonly string[]): void {
  for (const path of paths) {
    console.log(path);
  }
}

/**
 * Print flattened leaves as one object keyed by rendered path
 */
export function printFlattened(leaves: Map<string, Scalar>, options: OutputOptions = {}): void {
  printValue(Object.fromEntries(leaves), options);
}

/**
 * Shape groupBy buckets for JSON output
 *
 * Object keys would fold 1, "1" and a missing field together, so buckets
 * become a list of `{ value, items }`, with `{ missing: true, items }` for
 * elements that lack the field.
 */
export function groupsToJson(groups: Map<GroupKey, DocumentValue[]>): GroupJson[] {
  return [...groups].map(([key, items]): GroupJson =>
    key === MISSING_GROUP ? { missing: true, items } : { value: key, items }
  );
}

/**
 * Print a confirmation line unless --quiet
 */
export function printStatus(message: string, options: OutputOptions = {}): void {
  if (!options.quiet) {
    console.log(message);
  }
}

/**
 * Highlight a usage error in red when stderr is a terminal
 */
export function formatUsageError(text: string, stream: NodeJS.WriteStream = process.stderr): string {
  const message = text.trimEnd();
  return stream.isTTY ? `\x1b[31m${message}\x1b[0m` : message;
}
