/**
 * Chainable query pipeline over a list snapshot
 */

import type { DocumentValue } from "./types.js";
import { cloneValue, isMap, isScalar, readKey } from "./node.js";
import { stableStringify } from "./format.js";

/**
 * Predicate applied to each list element
 */
export type ItemPredicate = (item: DocumentValue) => boolean;

/**
 * Sort key extractor: a function over the element, or a top-level field name
 */
export type SortKey = ((item: DocumentValue) => DocumentValue | undefined) | string;

/**
 * Group key for elements whose group field is absent
 */
export const MISSING_GROUP = Symbol("docpath.missing");

/**
 * Key of a groupBy bucket: the field value, or MISSING_GROUP
 */
export type GroupKey = DocumentValue | typeof MISSING_GROUP;

/**
 * Read a top-level field of a list element
 * @returns undefined when the element is not a map or lacks the field
 */
export function fieldOf(item: DocumentValue, key: string): DocumentValue | undefined {
  return isMap(item) ? readKey(item, key) : undefined;
}

/**
 * Compare two values for sorting
 * Handles mixed types by type precedence: absent/null < boolean < number < string < list < map
 * @returns -1, 0, or 1
 */
export function compareValues(a: DocumentValue | undefined, b: DocumentValue | undefined): number {
  const rank = (value: DocumentValue | undefined): number => {
    if (value === undefined || value === null) return 0;
    if (typeof value === "boolean") return 1;
    if (typeof value === "number") return 2;
    if (typeof value === "string") return 3;
    return Array.isArray(value) ? 4 : 5;
  };

  const rankA = rank(a);
  const rankB = rank(b);
  if (rankA !== rankB) {
    return rankA < rankB ? -1 : 1;
  }

  if (typeof a === "number" && typeof b === "number") {
    return a < b ? -1 : a > b ? 1 : 0;
  }
  if (typeof a === "string" && typeof b === "string") {
    return a < b ? -1 : a > b ? 1 : 0;
  }
  if (typeof a === "boolean" && typeof b === "boolean") {
    return a === b ? 0 : a ? 1 : -1;
  }
  return 0;
}


function toCount(n: number): number {
  return Number.isNaN(n) ? 0 : Math.max(0, Math.trunc(n));
}

/**
 * Query pipeline over a snapshot of list elements
 *
 * Builder calls mutate and return the pipeline. Whatever order they are
 * called in, execution applies filters, then sort, then offset, then limit.
 * Executing never touches the document the snapshot was taken from.
 *
 * @example
 * ```typescript
 * const top = doc
 *   .query("posts")
 *   .where((post) => fieldOf(post, "published") === true)
 *   .sort("views", true)
 *   .limit(3)
 *   .pluck("title");
 * ```
 */
export class QueryPipeline {
  readonly #source: readonly DocumentValue[];
  #filters: ItemPredicate[] = [];
  #sortKey: ((item: DocumentValue) => DocumentValue | undefined) | undefined;
  #sorted = false;
  #reverse = false;
  #offset = 0;
  #limit: number | undefined;

  /**
   * @param source - Elements to query; the pipeline keeps its own copy
   */
  constructor(source: readonly DocumentValue[]) {
    this.#source = source.map((item) => cloneValue(item));
  }

  /**
   * Add a filter; all filters must pass
   */
  where(predicate: ItemPredicate): this {
    this.#filters.push(predicate);
    return this;
  }

  /**
   * Sort by a key (or by the element itself when no key is given)
   *
   * The sort is stable in both directions.
   */
  sort(key?: SortKey, reverse = false): this {
    if (typeof key === "string") {
      const field = key;
      this.#sortKey = (item) => fieldOf(item, field);
    } else {
      this.#sortKey = key;
    }
    this.#sorted = true;
    this.#reverse = reverse;
    return this;
  }

  /**
   * Skip the first n results (negative values and NaN count as 0)
   */
  offset(n: number): this {
    this.#offset = toCount(n);
    return this;
  }

  /**
   * Keep at most n results (negative values and NaN count as 0, Infinity keeps all)
   */
  limit(n: number): this {
    this.#limit = toCount(n);
    return this;
  }

  #filtered(): DocumentValue[] {
    return this.#source.filter((item) => this.#filters.every((predicate) => predicate(item)));
  }

  #ordered(): DocumentValue[] {
    const items = this.#filtered();
    if (!this.#sorted) {
      return items;
    }

    const extract = this.#sortKey ?? ((item: DocumentValue) => item);
    const direction = this.#reverse ? -1 : 1;
    const keyed = items.map((item) => ({ item, key: extract(item) }));
    keyed.sort((a, b) => direction * compareValues(a.key, b.key));
    return keyed.map((entry) => entry.item);
  }

  /**
   * Run the full pipeline
   */
  execute(): DocumentValue[] {
    const ordered = this.#ordered();
    const start = Math.min(this.#offset, ordered.length);
    const end = this.#limit === undefined ? ordered.length : start + this.#limit;
    return ordered.slice(start, end).map((item) => cloneValue(item));
  }

  /**
   * Count elements that pass the filters (sort, offset and limit are ignored)
   */
  count(): number {
    return this.#filtered().length;
  }

  /**
   * First element after filtering and sorting, ignoring offset and limit
   */
  first(): DocumentValue | undefined {
    const [head] = this.#ordered();
    return head === undefined ? undefined : cloneValue(head);
  }

  /**
   * Run the pipeline and project one field of each result (null when absent)
   */
  pluck(key: string): DocumentValue[] {
    return this.execute().map((item) => fieldOf(item, key) ?? null);
  }

  /**
   * Run the pipeline and bucket results by one field
   *
   * Scalars key their bucket directly, so 1 and "1" stay apart. Equal maps or
   * lists share one bucket keyed by the first of them. Elements missing the
   * field go under MISSING_GROUP; null is a value of its own. Buckets keep
   * pipeline order.
   */
  groupBy(key: string): Map<GroupKey, DocumentValue[]> {
    const groups = new Map<GroupKey, DocumentValue[]>();
    const containers = new Map<string, DocumentValue>();

    const keyOf = (value: DocumentValue | undefined): GroupKey => {
      if (value === undefined) {
        return MISSING_GROUP;
      }
      if (isScalar(value)) {
        return value;
      }
      const text = stableStringify(value, 0);
      const existing = containers.get(text);
      if (existing !== undefined) {
        return existing;
      }
      const representative = cloneValue(value);
      containers.set(text, representative);
      return representative;
    };

    for (const item of this.execute()) {
      const name = keyOf(fieldOf(item, key));
      const bucket = groups.get(name);
      if (bucket) {
        bucket.push(item);
      } else {
        groups.set(name, [item]);
      }
    }
    return groups;
  }
}
