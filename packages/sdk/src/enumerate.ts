/**
 * Leaf enumeration and glob path matching
 *
 * Traversal is depth-first in key order for maps and index order for lists.
 * Maps and lists are never leaves themselves, and empty containers yield
 * nothing. Key order follows JavaScript object semantics, so integer-like
 * keys come before string keys within the same map.
 */

import type { DocumentMap, DocumentValue, FlatEntry, Scalar } from "./types.js";
import { isList, isMap } from "./node.js";
import { SEPARATOR, joinPath, tryParsePath } from "./path.js";

/**
 * Callbacks for a depth-first walk
 */
export interface TreeVisitor {
  /** Called for every scalar with its path and container depth */
  leaf?(path: string, value: Scalar, depth: number): void;
  /** Called for every map or list below the root, before its children */
  container?(path: string, value: DocumentMap | DocumentValue[], depth: number): void;
}

/**
 * Walk a tree depth-first
 *
 * Depth counts the containers entered: children of the root are at depth 1.
 */
export function walkTree(root: DocumentValue, visitor: TreeVisitor, separator = SEPARATOR): void {
  const visit = (value: DocumentValue, path: string, depth: number): void => {
    if (isMap(value)) {
      for (const [key, child] of Object.entries(value)) {
        const childPath = joinPath(path, key, separator);
        if (isMap(child) || isList(child)) {
          visitor.container?.(childPath, child, depth);
        }
        visit(child, childPath, depth + 1);
      }
      return;
    }
    if (isList(value)) {
      value.forEach((child, index) => {
        const childPath = joinPath(path, String(index), separator);
        if (isMap(child) || isList(child)) {
          visitor.container?.(childPath, child, depth);
        }
        visit(child, childPath, depth + 1);
      });
      return;
    }
    visitor.leaf?.(path, value, depth - 1);
  };

  visit(root, "", 1);
}

/**
 * Enumerate every scalar leaf with its path
 */
export function flattenEntries(root: DocumentValue, separator = SEPARATOR): FlatEntry[] {
  const entries: FlatEntry[] = [];
  walkTree(
    root,
    {
      leaf(path, value) {
        entries.push({ path, value });
      },
    },
    separator
  );
  return entries;
}

/**
 * Keep the paths that live under a prefix
 * @param prefix - Path prefix; empty keeps everything
 */
export function filterByPrefix(paths: readonly string[], prefix: string): string[] {
  if (prefix === "") {
    return [...paths];
  }
  const head = `${prefix}${SEPARATOR}`;
  return paths.filter((path) => path.startsWith(head));
}

/**
 * Match path segments against pattern segments
 *
 * `*` matches exactly one segment and `**` matches zero or more. Everything
 * else must be equal. Backtracks over `**` with memoization, so patterns like
 * `a.**.b.**.z` stay linear in path length times pattern length.
 */
export function matchSegments(path: readonly string[], pattern: readonly string[]): boolean {
  const width = pattern.length + 1;
  const memo = new Map<number, boolean>();

  const match = (pi: number, qi: number): boolean => {
    if (qi === pattern.length) {
      return pi === path.length;
    }

    const key = pi * width + qi;
    const cached = memo.get(key);
    if (cached !== undefined) {
      return cached;
    }

    const token = pattern[qi];
    let result: boolean;
    if (token === "**") {
      result = match(pi, qi + 1) || (pi < path.length && match(pi + 1, qi));
    } else if (pi === path.length) {
      result = false;
    } else {
      result = (token === "*" || token === path[pi]) && match(pi + 1, qi + 1);
    }

    memo.set(key, result);
    return result;
  };

  return match(0, 0);
}

/**
 * Build a matcher for a glob path pattern
 * @returns A predicate over leaf paths, or undefined for a malformed pattern
 */
export function compilePattern(pattern: string): ((path: string) => boolean) | undefined {
  const segments = tryParsePath(pattern);
  if (!segments) {
    return undefined;
  }
  const tokens = segments.map((segment) => segment.text);
  return (path) => matchSegments(path.split(SEPARATOR), tokens);
}

/**
 * Final segment of a leaf path
 */
export function lastSegment(path: string): string {
  const at = path.lastIndexOf(SEPARATOR);
  return at === -1 ? path : path.slice(at + 1);
}
