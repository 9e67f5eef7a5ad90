/**
 * Cached leaf-path enumeration for a single document
 */

import { performance } from "node:perf_hooks";
import type { DocumentMap, FlatEntry } from "./types.js";
import { flattenEntries } from "./enumerate.js";
import { logger } from "./observability/logs.js";
import { metrics } from "./observability/metrics.js";

/**
 * Cache statistics for monitoring and debugging
 */
export interface PathCacheStats {
  /** Whether an enumeration is currently held */
  cached: boolean;
  /** Number of cached leaf paths (0 when empty) */
  size: number;
  hits: number;
  misses: number;
}

/**
 * Holds the full depth-first leaf enumeration of a document
 *
 * Invariant: whenever entries are held, they equal a fresh flatten of the
 * current root. Owners must call invalidate() after every structural change.
 */
export class PathCache {
  #entries: FlatEntry[] | null = null;
  #paths: string[] | null = null;
  #hits = 0;
  #misses = 0;
  readonly #label: string;

  constructor(label = "document") {
    this.#label = label;
  }

  /**
   * Get the leaf entries, rebuilding from root when the cache is empty
   */
  entries(root: DocumentMap): readonly FlatEntry[] {
    if (this.#entries) {
      this.#hits++;
      metrics.recordHit(this.#label);
      return this.#entries;
    }

    this.#misses++;
    metrics.recordMiss(this.#label);

    const start = performance.now();
    const entries = flattenEntries(root);
    const duration = performance.now() - start;

    metrics.recordRebuild(this.#label, duration, entries.length);
    logger.debug("paths.rebuild", {
      label: this.#label,
      details: { paths: entries.length, durationMs: Number(duration.toFixed(3)) },
    });

    this.#entries = entries;
    this.#paths = null;
    return entries;
  }

  /**
   * Get the leaf path strings, in depth-first order
   */
  paths(root: DocumentMap): readonly string[] {
    const entries = this.entries(root);
    if (!this.#paths) {
      this.#paths = entries.map((entry) => entry.path);
    }
    return this.#paths;
  }

  /**
   * Drop the cached enumeration
   */
  invalidate(): void {
    this.#entries = null;
    this.#paths = null;
  }

  get isCached(): boolean {
    return this.#entries !== null;
  }

  stats(): PathCacheStats {
    return {
      cached: this.#entries !== null,
      size: this.#entries?.length ?? 0,
      hits: this.#hits,
      misses: this.#misses,
    };
  }
}
