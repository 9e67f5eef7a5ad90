/**
 * Read-only structure reports
 */

import type {
  Description,
  DocumentMap,
  DocumentStats,
  DocumentValue,
  ValueDescription,
  ValueTypeName,
} from "./types.js";
import { defineEntry, isList, isMap, typeName } from "./node.js";
import { walkTree } from "./enumerate.js";

function describeValue(value: DocumentValue): ValueDescription {
  if (isMap(value)) {
    return { type: "map", keys: Object.keys(value), structure: describeMap(value) };
  }
  if (isList(value)) {
    const itemTypes = new Set<ValueTypeName>(value.map(typeName));
    return { type: "list", length: value.length, itemTypes: [...itemTypes].sort() };
  }
  if (value === null) {
    return { type: "null", value };
  }
  if (typeof value === "string") {
    return { type: "string", value };
  }
  if (typeof value === "number") {
    return { type: "number", value };
  }
  return { type: "boolean", value };
}

/**
 * Describe every key of a map: type plus keys/structure for maps, length and
 * element types for lists, and the value itself for scalars
 */
export function describeMap(map: DocumentMap): Description {
  const out: Description = {};
  for (const [key, value] of Object.entries(map)) {
    defineEntry(out, key, describeValue(value));
  }
  return out;
}

/**
 * Count maps, lists, keys and scalars in one depth-first walk
 */
export function collectStats(root: DocumentMap): DocumentStats {
  const stats: DocumentStats = {
    totalKeys: Object.keys(root).length,
    maxDepth: 0,
    totalMaps: 1,
    totalLists: 0,
    totalValues: 0,
  };

  walkTree(root, {
    leaf(_path, _value, depth) {
      stats.totalValues++;
      stats.maxDepth = Math.max(stats.maxDepth, depth);
    },
    container(_path, value, depth) {
      if (isMap(value)) {
        stats.totalMaps++;
        stats.totalKeys += Object.keys(value).length;
      } else {
        stats.totalLists++;
      }
      stats.maxDepth = Math.max(stats.maxDepth, depth + 1);
    },
  });

  return stats;
}
