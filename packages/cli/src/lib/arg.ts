/**
 * Argument parsing and validation helpers
 */

import { InvalidArgumentError } from "commander";
import { toDocumentValue, type DocumentValue } from "@docpath/sdk";

/**
 * Parse a non-negative integer argument
 */
export function parseNonNegativeInt(value: string, name: string): number {
  const trimmed = value.trim();
  if (!/^\d+$/.test(trimmed)) {
    throw new InvalidArgumentError(`${name} must be a non-negative integer`);
  }
  const parsed = Number.parseInt(trimmed, 10);
  // Enforce reasonable max to prevent runaway queries
  if (parsed > 10000) {
    throw new InvalidArgumentError(`${name} must be <= 10000`);
  }
  return parsed;
}

/**
 * Parse a byte count (no upper bound)
 */
export function parseByteSize(value: string, name: string): number {
  const trimmed = value.trim();
  if (!/^\d+$/.test(trimmed)) {
    throw new InvalidArgumentError(`${name} must be a non-negative number of bytes`);
  }
  return Number.parseInt(trimmed, 10);
}

/**
 * Parse an indent width for saved files
 */
export function parseIndent(value: string, name: string): number {
  const parsed = parseNonNegativeInt(value, name);
  if (parsed > 10) {
    throw new InvalidArgumentError(`${name} must be <= 10`);
  }
  return parsed;
}

/**
 * Parse a value argument as JSON, keeping it as a plain string when it is not JSON
 *
 * `42` is a number, `"42"` and `42abc` are strings, `{"a":1}` is a map.
 */
export function parseValue(value: string): DocumentValue {
  let parsed: unknown;
  try {
    parsed = JSON.parse(value);
  } catch {
    return value;
  }
  return toDocumentValue(parsed);
}

/**
 * Parse a `field=json` equality filter
 * @returns The field name and the value it must equal
 */
export function parseWhere(value: string): [string, DocumentValue] {
  const at = value.indexOf("=");
  if (at <= 0) {
    throw new InvalidArgumentError(`--where expects field=value, got "${value}"`);
  }
  return [value.slice(0, at), parseValue(value.slice(at + 1))];
}

/**
 * Collect a repeatable `--where` option
 */
export function collectWhere(
  value: string,
  previous: Array<[string, DocumentValue]>
): Array<[string, DocumentValue]> {
  return [...previous, parseWhere(value)];
}
