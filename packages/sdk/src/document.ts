/**
 * Path-addressable document facade
 */

import type {
  Description,
  DiffResult,
  DocumentMap,
  DocumentStats,
  DocumentValue,
  KeyTransform,
  LeafPredicate,
  LeafTransform,
  PathTransform,
  Scalar,
  ValuePredicate,
} from "./types.js";
import { NotAMapError } from "./errors.js";
import { SEPARATOR, tryParsePath } from "./path.js";
import {
  assignKey,
  cloneValue,
  defineEntry,
  isList,
  isMap,
  readKey,
  toDocumentValue,
  typeName,
} from "./node.js";
import {
  deepMerge,
  deletePath,
  diffDocuments,
  documentsEqual,
  getPath,
  resolveSegments,
  setPath,
} from "./navigator.js";
import { compilePattern, filterByPrefix, flattenEntries, lastSegment } from "./enumerate.js";
import { PathCache, type PathCacheStats } from "./cache.js";
import { QueryPipeline, type ItemPredicate } from "./query.js";
import {
  mapKeys,
  mapLeaves,
  removeEmptyContainers,
  removeNullValues,
  updateLeaves,
} from "./transform.js";
import { collectStats, describeMap } from "./introspect.js";
import { loadDirectory, loadFile, saveFile } from "./io.js";
import type { DirectoryLoadOptions, LoadOptions, SaveOptions } from "./config.js";
import { logger } from "./observability/logs.js";

/**
 * Options for creating a document
 */
export interface DocumentOptions {
  /** Name used in logs and path cache metrics (default: "document") */
  label?: string;
}

/**
 * Anything a comparison or merge accepts as the other side
 */
export type DocumentLike = Document | DocumentMap;

function toRoot(input: unknown): DocumentMap {
  const value = toDocumentValue(input);
  if (!isMap(value)) {
    throw new NotAMapError(typeName(value));
  }
  return value;
}

/**
 * Mutable tree of maps, lists and scalars addressed by dot-separated paths
 *
 * Reads that return maps or lists hand out deep copies, and `view()` wraps a
 * copy of a nested map in a new Document. Changing what a read returned
 * never changes this document; only the mutating methods do.
 *
 * Malformed paths ("", ".", "a..b", ".a", "a.") throw PathError from every
 * single-path method. `getMany` and the `find*` methods are best-effort
 * instead: a malformed path there reads as absent.
 *
 * @example
 * ```typescript
 * const doc = new Document({ site: { name: "Field Notes" } });
 *
 * doc.set("site.theme.color", "teal");   // creates site.theme
 * doc.get("site.name");                  // "Field Notes"
 * doc.get("site.owner", "nobody");       // "nobody"
 * doc.findPaths("site.**");              // ["site.name", "site.theme.color"]
 * ```
 */
export class Document {
  #root: DocumentMap;
  readonly #cache: PathCache;
  readonly #label: string;

  /**
   * @param data - Initial content; copied, never referenced
   * @throws {CircularReferenceError} If data references itself
   * @throws {UnsupportedValueError} If data holds non JSON-like values
   * @throws {NotAMapError} If data is not a map
   */
  constructor(data: DocumentMap = {}, options: DocumentOptions = {}) {
    this.#label = options.label ?? "document";
    this.#root = toRoot(data);
    this.#cache = new PathCache(this.#label);
  }

  /**
   * Create a document from untyped input, such as the result of JSON.parse
   */
  static from(input: unknown, options?: DocumentOptions): Document {
    const doc = new Document({}, options);
    doc.#root = toRoot(input);
    return doc;
  }

  /**
   * Load a document from a JSON file
   */
  static async fromFile(
    filePath: string,
    options: LoadOptions & DocumentOptions = {}
  ): Promise<Document> {
    const { label, ...load } = options;
    const root = await loadFile(filePath, load);
    return Document.#wrap(root, label ?? filePath);
  }

  /**
   * Load and deep-merge every matching JSON file of a directory
   */
  static async fromDirectory(
    dirPath: string,
    options: DirectoryLoadOptions & DocumentOptions = {}
  ): Promise<Document> {
    const { label, ...load } = options;
    const root = await loadDirectory(dirPath, load);
    return Document.#wrap(root, label ?? dirPath);
  }

  /**
   * Adopt an already validated root without copying it
   */
  static #wrap(root: DocumentMap, label: string): Document {
    const doc = new Document({}, { label });
    doc.#root = root;
    return doc;
  }

  /**
   * Read the value at a path
   * @returns A copy of the value, or defaultValue when the path is absent
   * @throws {PathError} If the path is malformed
   */
  get(path: string): DocumentValue | undefined;
  get(path: string, defaultValue: DocumentValue): DocumentValue;
  get(path: string, defaultValue?: DocumentValue): DocumentValue | undefined {
    const value = getPath(this.#root, path);
    return value === undefined ? defaultValue : cloneValue(value);
  }

  /**
   * Write a value at a path, creating missing intermediate maps
   *
   * Lists are never created: setting "a.0" where "a" is absent makes a map
   * with key "0".
   * @throws {PathError} If the path is malformed
   * @throws {PathTypeConflictError} If an existing node cannot take the next segment,
   *   including list indexes past the end of the list
   */
  set(path: string, value: DocumentValue): void {
    setPath(this.#root, path, toDocumentValue(value));
    this.#cache.invalidate();
  }

  /**
   * Remove the value at a path
   *
   * Removing a list element splices the list, so later elements shift down
   * one index and the same index path can be deleted again until the list
   * runs out.
   * @returns true if something was removed
   * @throws {PathError} If the path is malformed
   */
  delete(path: string): boolean {
    const removed = deletePath(this.#root, path);
    if (removed) {
      this.#cache.invalidate();
    }
    return removed;
  }

  /**
   * Check whether a path holds a value (null counts as present)
   * @throws {PathError} If the path is malformed
   */
  has(path: string): boolean {
    return getPath(this.#root, path) !== undefined;
  }

  /**
   * Read several paths at once
   *
   * Absent and malformed paths both map to null.
   */
  getMany(paths: readonly string[]): Record<string, DocumentValue> {
    const out: Record<string, DocumentValue> = {};
    for (const path of paths) {
      const segments = tryParsePath(path);
      const value = segments ? resolveSegments(this.#root, segments) : undefined;
      defineEntry(out, path, value === undefined ? null : cloneValue(value));
    }
    return out;
  }

  /**
   * Wrap a copy of the map at a path in a new document
   * @returns undefined when the path is absent or does not hold a map
   * @throws {PathError} If the path is malformed
   */
  view(path: string): Document | undefined {
    const value = getPath(this.#root, path);
    if (!isMap(value)) {
      return undefined;
    }
    return Document.#wrap(cloneValue(value), `${this.#label}:${path}`);
  }

  /**
   * Read a top-level key without path parsing, so the key may contain dots
   */
  getKey(key: string): DocumentValue | undefined {
    const value = readKey(this.#root, key);
    return value === undefined ? undefined : cloneValue(value);
  }

  setKey(key: string, value: DocumentValue): void {
    assignKey(this.#root, key, toDocumentValue(value));
    this.#cache.invalidate();
  }

  deleteKey(key: string): boolean {
    if (!Object.hasOwn(this.#root, key)) {
      return false;
    }
    delete this.#root[key];
    this.#cache.invalidate();
    return true;
  }

  hasKey(key: string): boolean {
    return Object.hasOwn(this.#root, key);
  }

  keys(): string[] {
    return Object.keys(this.#root);
  }

  values(): DocumentValue[] {
    return Object.values(this.#root).map((value) => cloneValue(value));
  }

  entries(): Array<[string, DocumentValue]> {
    return Object.entries(this.#root).map(([key, value]) => [key, cloneValue(value)]);
  }

  /**
   * Number of top-level keys
   */
  get size(): number {
    return Object.keys(this.#root).length;
  }

  get label(): string {
    return this.#label;
  }

  /**
   * Flatten every scalar leaf into path → value, in depth-first order
   * @param separator - Joins segments in the returned keys (default ".")
   */
  flatten(separator = SEPARATOR): Map<string, Scalar> {
    const entries =
      separator === SEPARATOR ? this.#cache.entries(this.#root) : flattenEntries(this.#root, separator);
    return new Map(entries.map((entry) => [entry.path, entry.value]));
  }

  /**
   * List leaf paths, optionally only those under a prefix
   */
  listPaths(prefix = ""): string[] {
    return filterByPrefix(this.#cache.paths(this.#root), prefix);
  }

  /**
   * List leaf paths matching a glob pattern (`*` one segment, `**` any number)
   * @returns Matches in depth-first order; empty for a malformed pattern
   */
  findPaths(pattern: string): string[] {
    const matches = compilePattern(pattern);
    if (!matches) {
      return [];
    }
    return this.#cache.paths(this.#root).filter(matches);
  }

  /**
   * List leaf paths whose last segment is keyName
   */
  findAllKeys(keyName: string): string[] {
    return this.#cache.paths(this.#root).filter((path) => lastSegment(path) === keyName);
  }

  /**
   * Collect leaves whose value satisfies predicate
   */
  findValues(predicate: ValuePredicate): Map<string, Scalar> {
    const found = new Map<string, Scalar>();
    for (const entry of this.#cache.entries(this.#root)) {
      if (predicate(entry.value)) {
        found.set(entry.path, entry.value);
      }
    }
    return found;
  }

  /**
   * Path cache statistics for this document
   */
  cacheStats(): PathCacheStats {
    return this.#cache.stats();
  }

  /**
   * Start a query over the list at a path
   *
   * The pipeline works on a snapshot; an absent or non-list path gives an
   * empty source.
   * @throws {PathError} If the path is malformed
   */
  query(path: string): QueryPipeline {
    const value = getPath(this.#root, path);
    return new QueryPipeline(isList(value) ? value : []);
  }

  /**
   * Copies of the list elements at a path that satisfy predicate
   * @throws {PathError} If the path is malformed
   */
  filterList(path: string, predicate: ItemPredicate): DocumentValue[] {
    return this.query(path).where(predicate).execute();
  }

  /**
   * Deep-merge another document into this one; its values win
   */
  merge(other: DocumentLike): void {
    const incoming = other instanceof Document ? other.#root : toRoot(other);
    deepMerge(this.#root, incoming);
    this.#cache.invalidate();
  }

  /**
   * Leaf-level difference from this document to other
   */
  diff(other: DocumentLike): DiffResult {
    const target = other instanceof Document ? other.#root : toRoot(other);
    return diffDocuments(this.#root, target);
  }

  /**
   * Check whether other has exactly the same leaf paths and values
   */
  equals(other: DocumentLike): boolean {
    const target = other instanceof Document ? other.#root : toRoot(other);
    return documentsEqual(this.#root, target);
  }

  /**
   * Replace every leaf that satisfies condition with transform(value)
   * @returns Number of matched leaves
   */
  updateWhere(condition: LeafPredicate, transform: LeafTransform): number {
    return this.#bulk("updateWhere", updateLeaves(this.#root, condition, transform));
  }

  /**
   * Remove null map entries and null list elements at every depth
   * @returns Number of nulls removed
   */
  removeNulls(): number {
    return this.#bulk("removeNulls", removeNullValues(this.#root));
  }

  /**
   * Remove empty maps and lists at every depth
   * @returns Number of containers removed
   */
  removeEmpty(): number {
    return this.#bulk("removeEmpty", removeEmptyContainers(this.#root));
  }

  #bulk(operation: string, count: number): number {
    if (count > 0) {
      this.#cache.invalidate();
    }
    logger.debug("document.bulk", { label: this.#label, message: operation, details: { count } });
    return count;
  }

  /**
   * New document with every leaf replaced by fn(path, value)
   */
  transformAll(fn: PathTransform): Document {
    return Document.#wrap(mapLeaves(this.#root, fn), this.#label);
  }

  /**
   * New document with every map key replaced by fn(key)
   */
  transformKeys(fn: KeyTransform): Document {
    return Document.#wrap(mapKeys(this.#root, fn), this.#label);
  }

  describe(): Description {
    return describeMap(this.#root);
  }

  stats(): DocumentStats {
    return collectStats(this.#root);
  }

  /**
   * Deep copy of the whole tree
   */
  toCopy(): DocumentMap {
    return cloneValue(this.#root);
  }

  toJSON(): DocumentMap {
    return this.toCopy();
  }

  toString(): string {
    return JSON.stringify(this.#root, null, 2);
  }

  /**
   * Write the document to a JSON file, creating parent directories
   */
  async save(filePath: string, options?: SaveOptions): Promise<void> {
    await saveFile(filePath, this.#root, options);
  }
}
