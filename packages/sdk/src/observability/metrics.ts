/**
 * Metrics tracking for path cache usage
 */

export interface PathCacheMetrics {
  hitCount: number;
  missCount: number;
  rebuildTimeMs: number[];
  /** Leaf paths produced by the most recent rebuild */
  paths: number;
}

const MAX_SAMPLES = 100;

class MetricsCollector {
  #metrics = new Map<string, PathCacheMetrics>();

  /**
   * Get or create metrics for a document label
   */
  #getMetrics(label: string): PathCacheMetrics {
    let entry = this.#metrics.get(label);
    if (!entry) {
      entry = {
        hitCount: 0,
        missCount: 0,
        rebuildTimeMs: [],
        paths: 0,
      };
      this.#metrics.set(label, entry);
    }
    return entry;
  }

  /**
   * Record a read served from the cached enumeration
   */
  recordHit(label: string): void {
    this.#getMetrics(label).hitCount++;
  }

  /**
   * Record a read that found the cache empty
   */
  recordMiss(label: string): void {
    this.#getMetrics(label).missCount++;
  }

  /**
   * Record a rebuild and the number of paths it produced
   */
  recordRebuild(label: string, ms: number, paths: number): void {
    const entry = this.#getMetrics(label);
    entry.rebuildTimeMs.push(ms);
    entry.paths = paths;

    // Keep only the latest samples
    if (entry.rebuildTimeMs.length > MAX_SAMPLES) {
      entry.rebuildTimeMs.shift();
    }
  }

  getMetrics(label: string): PathCacheMetrics | undefined {
    return this.#metrics.get(label);
  }

  getAllMetrics(): Map<string, PathCacheMetrics> {
    return new Map(this.#metrics);
  }

  /**
   * Hit rate for a label (0 when nothing was recorded)
   */
  getHitRate(label: string): number {
    const entry = this.#metrics.get(label);
    if (!entry) return 0;
    const total = entry.hitCount + entry.missCount;
    return total > 0 ? entry.hitCount / total : 0;
  }

  /**
   * Calculate p95 for a list of samples
   */
  getP95(values: readonly number[]): number {
    if (values.length === 0) return 0;

    const sorted = [...values].sort((a, b) => a - b);
    const idx = Math.max(0, Math.ceil(sorted.length * 0.95) - 1);
    return sorted[idx] ?? 0;
  }

  /**
   * Reset metrics for one label, or all of them
   */
  reset(label?: string): void {
    if (label) {
      this.#metrics.delete(label);
    } else {
      this.#metrics.clear();
    }
  }
}

/**
 * Global metrics collector instance
 */
export const metrics = new MetricsCollector();
