/**
 * Deterministic JSON formatting utilities
 */

import type { DocumentMap, DocumentValue } from "./types.js";
import { assignKey, isList, isMap } from "./node.js";

export interface FormatOptions {
  /** Spaces per level; null writes compact JSON */
  indent?: number | null;
  /** Write map keys in alphabetical order */
  sortKeys?: boolean;
}

/**
 * Stable, deterministic JSON stringification with alphabetical key order
 * @param value - Value to stringify
 * @param indent - Number of spaces for indentation (default: 2)
 * @returns Formatted JSON string with trailing newline
 */
export function stableStringify(value: DocumentValue, indent = 2): string {
  const normalize = (node: DocumentValue): DocumentValue => {
    // Arrays: preserve order but normalize contents
    if (isList(node)) {
      return node.map(normalize);
    }
    // Maps: sort keys and normalize values
    if (isMap(node)) {
      const out: DocumentMap = {};
      for (const key of Object.keys(node).sort((a, b) => a.localeCompare(b))) {
        assignKey(out, key, normalize(node[key]));
      }
      return out;
    }
    return node;
  };

  return JSON.stringify(normalize(value), null, indent) + "\n";
}

/**
 * Serialize a document for writing to disk
 * @returns JSON text with trailing newline
 */
export function formatDocument(value: DocumentValue, options: FormatOptions = {}): string {
  const indent = options.indent === undefined ? 2 : options.indent;
  if (options.sortKeys) {
    return stableStringify(value, indent ?? 0);
  }
  return JSON.stringify(value, null, indent ?? undefined) + "\n";
}
