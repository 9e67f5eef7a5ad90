/**
 * Dot-path tokenization
 *
 * Paths are split on "." with no escaping. Keys containing a literal dot
 * can only be reached through direct key access on the document.
 */

import type { PathSegment } from "./types.js";
import { EmptyPathError, EmptySegmentError } from "./errors.js";

export const SEPARATOR = ".";

// "0" or digits without a leading zero; "01" stays a map key
const INDEX_TOKEN = /^(?:0|[1-9][0-9]*)$/;

/**
 * Check whether a token addresses a list position
 */
export function isIndexToken(token: string): boolean {
  return INDEX_TOKEN.test(token) && Number.isSafeInteger(Number(token));
}

/**
 * Tag a single token as a key or an index segment
 */
export function toSegment(token: string): PathSegment {
  if (isIndexToken(token)) {
    return { kind: "index", text: token, index: Number(token) };
  }
  return { kind: "key", text: token };
}

/**
 * Parse a dot-separated path into segments
 * @throws {EmptyPathError} If the path is empty or whitespace-only
 * @throws {EmptySegmentError} If any segment is empty (".", "a..b", ".a", "a.")
 */
export function parsePath(path: string): PathSegment[] {
  if (path.trim() === "") {
    throw new EmptyPathError(path);
  }

  const tokens = path.split(SEPARATOR);
  return tokens.map((token, position) => {
    if (token === "") {
      throw new EmptySegmentError(path, position);
    }
    return toSegment(token);
  });
}

/**
 * Parse a path, returning undefined instead of throwing when it is malformed
 */
export function tryParsePath(path: string): PathSegment[] | undefined {
  try {
    return parsePath(path);
  } catch (err) {
    if (err instanceof EmptyPathError || err instanceof EmptySegmentError) {
      return undefined;
    }
    throw err;
  }
}

/**
 * Join a prefix and a segment token into a path
 */
export function joinPath(prefix: string, token: string, separator = SEPARATOR): string {
  return prefix === "" ? token : `${prefix}${separator}${token}`;
}
