/**
 * Bulk mutators and whole-tree transforms
 *
 * Mutators work in place and return how many leaves or containers they
 * touched. Transforms build a fresh tree and leave their input alone.
 */

import type {
  DocumentMap,
  DocumentValue,
  KeyTransform,
  LeafPredicate,
  LeafTransform,
  PathTransform,
} from "./types.js";
import { assignKey, cloneValue, isList, isMap, toDocumentValue } from "./node.js";
import { joinPath } from "./path.js";

type Container = DocumentMap | DocumentValue[];

function isContainer(value: DocumentValue): value is Container {
  return isMap(value) || isList(value);
}

/**
 * Replace every leaf accepted by condition with transform(value)
 *
 * Every replacement is computed and validated before the first write, so a
 * throwing condition or transform leaves the tree unchanged.
 * @returns Number of leaves that matched
 */
export function updateLeaves(
  root: DocumentMap,
  condition: LeafPredicate,
  transform: LeafTransform
): number {
  const writes: Array<() => void> = [];

  const visit = (node: Container, path: string): void => {
    const collect = (key: string, value: DocumentValue, write: (next: DocumentValue) => void) => {
      const childPath = joinPath(path, key);
      if (isContainer(value)) {
        visit(value, childPath);
        return;
      }
      if (condition(childPath, value)) {
        const next = toDocumentValue(transform(value));
        writes.push(() => write(next));
      }
    };

    if (isList(node)) {
      node.forEach((value, index) => {
        collect(String(index), value, (next) => {
          node[index] = next;
        });
      });
      return;
    }
    for (const [key, value] of Object.entries(node)) {
      collect(key, value, (next) => assignKey(node, key, next));
    }
  };

  visit(root, "");
  writes.forEach((write) => write());
  return writes.length;
}

/**
 * Remove null map entries and null list elements at every depth
 * @returns Number of nulls removed
 */
export function removeNullValues(root: DocumentMap): number {
  let count = 0;

  const visit = (node: Container): void => {
    if (isList(node)) {
      for (let i = node.length - 1; i >= 0; i--) {
        const value = node[i];
        if (value === null) {
          node.splice(i, 1);
          count++;
        } else if (isContainer(value)) {
          visit(value);
        }
      }
      return;
    }
    for (const [key, value] of Object.entries(node)) {
      if (value === null) {
        delete node[key];
        count++;
      } else if (isContainer(value)) {
        visit(value);
      }
    }
  };

  visit(root);
  return count;
}

/**
 * Remove empty maps and lists at every depth, bottom-up
 *
 * A container emptied by this pass is removed in the same pass, so a second
 * call always returns 0. The root itself is never removed.
 * @returns Number of containers removed
 */
export function removeEmptyContainers(root: DocumentMap): number {
  let count = 0;

  const isEmptyAfterVisit = (value: DocumentValue): boolean => {
    if (!isContainer(value)) {
      return false;
    }
    visit(value);
    return isList(value) ? value.length === 0 : Object.keys(value).length === 0;
  };

  const visit = (node: Container): void => {
    if (isList(node)) {
      for (let i = node.length - 1; i >= 0; i--) {
        if (isEmptyAfterVisit(node[i])) {
          node.splice(i, 1);
          count++;
        }
      }
      return;
    }
    for (const [key, value] of Object.entries(node)) {
      if (isEmptyAfterVisit(value)) {
        delete node[key];
        count++;
      }
    }
  };

  visit(root);
  return count;
}

/**
 * Build a copy with every leaf replaced by fn(path, value)
 *
 * Empty containers are copied as they are.
 */
export function mapLeaves(root: DocumentMap, fn: PathTransform): DocumentMap {
  const visit = (value: DocumentValue, path: string): DocumentValue => {
    if (isList(value)) {
      return value.map((item, index) => visit(item, joinPath(path, String(index))));
    }
    if (isMap(value)) {
      const out: DocumentMap = {};
      for (const [key, item] of Object.entries(value)) {
        assignKey(out, key, visit(item, joinPath(path, key)));
      }
      return out;
    }
    return toDocumentValue(fn(path, value));
  };

  const out: DocumentMap = {};
  for (const [key, item] of Object.entries(root)) {
    assignKey(out, key, visit(item, key));
  }
  return out;
}

/**
 * Build a copy with every map key replaced by fn(key), at every depth
 *
 * When two keys of one map transform to the same name, the later one wins.
 */
export function mapKeys(root: DocumentMap, fn: KeyTransform): DocumentMap {
  const visit = (value: DocumentValue): DocumentValue => {
    if (isList(value)) {
      return value.map(visit);
    }
    if (isMap(value)) {
      return renameKeys(value);
    }
    return cloneValue(value);
  };

  const renameKeys = (map: DocumentMap): DocumentMap => {
    const out: DocumentMap = {};
    for (const [key, item] of Object.entries(map)) {
      assignKey(out, fn(key), visit(item));
    }
    return out;
  };

  return renameKeys(root);
}
