/**
 * Single-segment operations on document tree nodes
 *
 * Reads never throw: any segment that does not fit the node it is applied to
 * is simply absent (undefined). Writes throw PathTypeConflictError instead.
 */

import type {
  DocumentList,
  DocumentMap,
  DocumentValue,
  PathSegment,
  Scalar,
  ValueTypeName,
} from "./types.js";
import {
  CircularReferenceError,
  PathTypeConflictError,
  UnsupportedValueError,
} from "./errors.js";
import { joinPath } from "./path.js";

export function isMap(value: DocumentValue | undefined): value is DocumentMap {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

export function isList(value: DocumentValue | undefined): value is DocumentList {
  return Array.isArray(value);
}

export function isScalar(value: DocumentValue | undefined): value is Scalar {
  return value === null || (value !== undefined && typeof value !== "object");
}

export function typeName(value: DocumentValue): ValueTypeName {
  if (value === null) return "null";
  if (Array.isArray(value)) return "list";
  if (typeof value === "object") return "map";
  if (typeof value === "string") return "string";
  if (typeof value === "number") return "number";
  return "boolean";
}

/**
 * Bind a key on a record as an own property
 *
 * Plain assignment of "__proto__" would replace the prototype instead of
 * creating a key, so that one key is defined explicitly.
 */
export function defineEntry<T>(record: Record<string, T>, key: string, value: T): void {
  if (key === "__proto__") {
    Object.defineProperty(record, key, {
      value,
      writable: true,
      enumerable: true,
      configurable: true,
    });
    return;
  }
  record[key] = value;
}

export function assignKey(map: DocumentMap, key: string, value: DocumentValue): void {
  defineEntry(map, key, value);
}

/**
 * Look up an own key of a map
 */
export function readKey(map: DocumentMap, key: string): DocumentValue | undefined {
  return Object.hasOwn(map, key) ? map[key] : undefined;
}

/**
 * Read one segment from a node
 *
 * Index segments against a map use their literal text as the key.
 */
export function getSegment(
  node: DocumentValue | undefined,
  segment: PathSegment
): DocumentValue | undefined {
  if (isMap(node)) {
    return readKey(node, segment.text);
  }
  if (isList(node) && segment.kind === "index") {
    return segment.index < node.length ? node[segment.index] : undefined;
  }
  return undefined;
}

export function hasSegment(node: DocumentValue | undefined, segment: PathSegment): boolean {
  return getSegment(node, segment) !== undefined;
}

/**
 * Write one segment on a node
 *
 * Lists are never extended: an index past the end is a conflict.
 * @param path - Full path being written, for error messages
 * @throws {PathTypeConflictError} If the node cannot hold the segment
 */
export function setSegment(
  node: DocumentValue,
  segment: PathSegment,
  value: DocumentValue,
  path: string
): void {
  if (isMap(node)) {
    assignKey(node, segment.text, value);
    return;
  }

  if (isList(node)) {
    if (segment.kind !== "index") {
      throw new PathTypeConflictError(path, `key "${segment.text}" cannot address a list`);
    }
    if (segment.index >= node.length) {
      throw new PathTypeConflictError(
        path,
        `index ${segment.index} is out of range for list of length ${node.length}`
      );
    }
    node[segment.index] = value;
    return;
  }

  throw new PathTypeConflictError(
    path,
    `segment "${segment.text}" cannot address a ${typeName(node)} value`
  );
}

/**
 * Remove one segment from a node; list removal shifts later elements down
 * @returns true if something was removed
 */
export function deleteSegment(node: DocumentValue | undefined, segment: PathSegment): boolean {
  if (isMap(node)) {
    if (!Object.hasOwn(node, segment.text)) return false;
    delete node[segment.text];
    return true;
  }
  if (isList(node) && segment.kind === "index" && segment.index < node.length) {
    node.splice(segment.index, 1);
    return true;
  }
  return false;
}

/**
 * Deep copy of a tree that is already known to be valid
 */
export function cloneValue<T extends DocumentValue>(value: T): T;
export function cloneValue(value: DocumentValue): DocumentValue {
  if (isList(value)) {
    return value.map((item) => cloneValue(item));
  }
  if (isMap(value)) {
    const out: DocumentMap = {};
    for (const [key, item] of Object.entries(value)) {
      assignKey(out, key, cloneValue(item));
    }
    return out;
  }
  return value;
}

function describeForeign(value: unknown): string {
  if (value === undefined) return "undefined";
  if (typeof value === "number") return String(value);
  if (typeof value === "object" && value !== null) {
    return value.constructor?.name ?? "object";
  }
  return typeof value;
}

function isPlainObject(value: object): value is Record<string, unknown> {
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

/**
 * Validate arbitrary input as a document tree and return an independent copy
 * @throws {CircularReferenceError} If the input references itself
 * @throws {UnsupportedValueError} If the input holds non JSON-like values
 */
export function toDocumentValue(input: unknown): DocumentValue {
  const ancestors = new WeakSet<object>();

  const visit = (value: unknown, at: string): DocumentValue => {
    if (value === null || typeof value === "string" || typeof value === "boolean") {
      return value;
    }
    if (typeof value === "number") {
      if (!Number.isFinite(value)) {
        throw new UnsupportedValueError(at, describeForeign(value));
      }
      return value;
    }
    if (typeof value !== "object") {
      throw new UnsupportedValueError(at, describeForeign(value));
    }

    if (ancestors.has(value)) {
      throw new CircularReferenceError(at);
    }
    ancestors.add(value);

    try {
      if (Array.isArray(value)) {
        const items: unknown[] = value;
        return items.map((item, i) => visit(item, joinPath(at, String(i))));
      }
      if (!isPlainObject(value)) {
        throw new UnsupportedValueError(at, describeForeign(value));
      }
      const out: DocumentMap = {};
      for (const [key, item] of Object.entries(value)) {
        assignKey(out, key, visit(item, joinPath(at, key)));
      }
      return out;
    } finally {
      ancestors.delete(value);
    }
  };

  return visit(input, "");
}

/**
 * Structural equality: maps compare by key set, lists by position
 */
export function valuesEqual(a: DocumentValue, b: DocumentValue): boolean {
  if (isList(a)) {
    return isList(b) && a.length === b.length && a.every((item, i) => valuesEqual(item, b[i]));
  }
  if (isMap(a)) {
    if (!isMap(b)) return false;
    const keys = Object.keys(a);
    if (keys.length !== Object.keys(b).length) return false;
    return keys.every((key) => {
      const other = readKey(b, key);
      return other !== undefined && valuesEqual(a[key], other);
    });
  }
  return a === b;
}
