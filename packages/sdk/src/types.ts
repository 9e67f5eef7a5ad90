/**
 * Core types for docpath documents
 */

/**
 * Leaf value of a document tree
 */
export type Scalar = string | number | boolean | null;

/**
 * Ordered mapping of string keys to values
 */
export interface DocumentMap {
  [key: string]: DocumentValue;
}

/**
 * Ordered sequence of values
 */
export type DocumentList = DocumentValue[];

/**
 * Any node of a document tree, as produced by parsing JSON
 */
export type DocumentValue = Scalar | DocumentList | DocumentMap;

/**
 * One parsed segment of a dot-separated path
 *
 * `text` is always the literal token from the path string. Index segments
 * also carry the numeric value so list lookups don't need to re-parse.
 */
export type PathSegment =
  | { kind: "key"; text: string }
  | { kind: "index"; text: string; index: number };

/**
 * A leaf path paired with its scalar value
 */
export interface FlatEntry {
  path: string;
  value: Scalar;
}

/**
 * Before/after pair for a leaf whose value differs between two documents
 */
export interface ValueChange {
  old: Scalar;
  new: Scalar;
}

/**
 * Leaf-level difference between two documents, keyed by leaf path
 */
export interface DiffResult {
  added: Record<string, Scalar>;
  removed: Record<string, Scalar>;
  changed: Record<string, ValueChange>;
}

/**
 * Type names reported by describe()
 */
export type ValueTypeName = "map" | "list" | "string" | "number" | "boolean" | "null";

/**
 * Structural description of one value
 */
export type ValueDescription =
  | { type: "map"; keys: string[]; structure: Description }
  | { type: "list"; length: number; itemTypes: ValueTypeName[] }
  | { type: Exclude<ValueTypeName, "map" | "list">; value: Scalar };

/**
 * Description of every top-level key of a map
 */
export type Description = Record<string, ValueDescription>;

/**
 * Counts gathered by a single depth-first walk of the document
 */
export interface DocumentStats {
  /** Map entries at every depth */
  totalKeys: number;
  /** Deepest container nesting (0 for an empty root) */
  maxDepth: number;
  /** Maps, including the root */
  totalMaps: number;
  totalLists: number;
  /** Scalar leaves, including scalars inside lists */
  totalValues: number;
}

/**
 * Predicate over a leaf value
 */
export type ValuePredicate = (value: Scalar) => boolean;

/**
 * Predicate over a leaf path and its value
 */
export type LeafPredicate = (path: string, value: Scalar) => boolean;

/**
 * Replacement for a leaf value
 */
export type LeafTransform = (value: Scalar) => DocumentValue;

/**
 * Replacement for a leaf value that also sees the leaf path
 */
export type PathTransform = (path: string, value: Scalar) => DocumentValue;

/**
 * Replacement for a map key
 */
export type KeyTransform = (key: string) => string;
