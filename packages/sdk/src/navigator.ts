/**
 * Path-driven reads and writes over a document tree
 *
 * Only malformed path strings and write conflicts throw. Missing data is
 * reported as undefined (reads) or false (deletes).
 */

import type { DiffResult, DocumentMap, DocumentValue, PathSegment, Scalar } from "./types.js";
import { PathTypeConflictError } from "./errors.js";
import { SEPARATOR, parsePath } from "./path.js";
import {
  assignKey,
  cloneValue,
  defineEntry,
  deleteSegment,
  getSegment,
  isList,
  isMap,
  readKey,
  setSegment,
  typeName,
} from "./node.js";
import { flattenEntries } from "./enumerate.js";

/**
 * Walk segments from a node, stopping at the first absent step
 */
export function resolveSegments(
  root: DocumentValue,
  segments: readonly PathSegment[]
): DocumentValue | undefined {
  let node: DocumentValue | undefined = root;
  for (const segment of segments) {
    node = getSegment(node, segment);
    if (node === undefined) {
      return undefined;
    }
  }
  return node;
}

/**
 * Read the value at a path
 * @throws {PathError} If the path is malformed
 */
export function getPath(root: DocumentValue, path: string): DocumentValue | undefined {
  return resolveSegments(root, parsePath(path));
}

/**
 * Check whether a path resolves to a value (null counts as present)
 * @throws {PathError} If the path is malformed
 */
export function hasPath(root: DocumentValue, path: string): boolean {
  return getPath(root, path) !== undefined;
}

/**
 * Write a value at a path, creating missing intermediate maps
 *
 * Lists are never created or extended on the way down.
 * @throws {PathError} If the path is malformed
 * @throws {PathTypeConflictError} If an existing node cannot take the next segment
 */
export function setPath(root: DocumentMap, path: string, value: DocumentValue): void {
  const segments = parsePath(path);
  const last = segments.length - 1;
  let node: DocumentMap | DocumentValue[] = root;

  for (let i = 0; i < last; i++) {
    const segment = segments[i];
    const child = getSegment(node, segment);

    if (child === undefined) {
      if (isMap(node)) {
        const created: DocumentMap = {};
        assignKey(node, segment.text, created);
        node = created;
        continue;
      }
      throw new PathTypeConflictError(
        path,
        segment.kind === "index"
          ? `index ${segment.index} is out of range for list of length ${node.length}`
          : `key "${segment.text}" cannot address a list`
      );
    }

    if (!isMap(child) && !isList(child)) {
      const at = segments
        .slice(0, i + 1)
        .map((s) => s.text)
        .join(SEPARATOR);
      throw new PathTypeConflictError(path, `"${at}" holds a ${typeName(child)} value`);
    }
    node = child;
  }

  setSegment(node, segments[last], value, path);
}

/**
 * Remove the value at a path (list elements are spliced out)
 * @returns false when any segment along the way is absent
 * @throws {PathError} If the path is malformed
 */
export function deletePath(root: DocumentValue, path: string): boolean {
  const segments = parsePath(path);
  const parent = resolveSegments(root, segments.slice(0, -1));
  if (parent === undefined) {
    return false;
  }
  return deleteSegment(parent, segments[segments.length - 1]);
}

/**
 * Deep-merge src into dst
 *
 * Only map-vs-map conflicts recurse. Any other value from src, lists
 * included, replaces what dst holds.
 */
export function deepMerge(dst: DocumentMap, src: DocumentMap): void {
  for (const [key, incoming] of Object.entries(src)) {
    const existing = readKey(dst, key);
    if (isMap(existing) && isMap(incoming)) {
      deepMerge(existing, incoming);
    } else {
      assignKey(dst, key, cloneValue(incoming));
    }
  }
}

function leafMap(root: DocumentMap): Map<string, Scalar> {
  return new Map(flattenEntries(root).map((entry) => [entry.path, entry.value]));
}

/**
 * Leaf-level difference from a to b
 *
 * Compares flattened leaf paths, so empty containers never show up and a
 * map replaced by a scalar reports its old leaves as removed.
 */
export function diffDocuments(a: DocumentMap, b: DocumentMap): DiffResult {
  const before = leafMap(a);
  const after = leafMap(b);
  const result: DiffResult = { added: {}, removed: {}, changed: {} };

  for (const [path, value] of after) {
    if (!before.has(path)) {
      defineEntry(result.added, path, value);
    }
  }

  for (const [path, value] of before) {
    if (!after.has(path)) {
      defineEntry(result.removed, path, value);
      continue;
    }
    const next = after.get(path) ?? null;
    if (next !== value) {
      defineEntry(result.changed, path, { old: value, new: next });
    }
  }

  return result;
}

/**
 * Check whether two documents have identical leaf paths and values
 */
export function documentsEqual(a: DocumentMap, b: DocumentMap): boolean {
  const before = leafMap(a);
  const after = leafMap(b);
  if (before.size !== after.size) {
    return false;
  }
  for (const [path, value] of before) {
    if (!after.has(path) || after.get(path) !== value) {
      return false;
    }
  }
  return true;
}
