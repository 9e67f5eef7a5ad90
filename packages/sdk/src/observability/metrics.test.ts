import { describe, it, expect, beforeEach } from "vitest";
import { metrics } from "./metrics.js";

describe("metrics", () => {
  beforeEach(() => {
    metrics.reset();
  });

  it("should compute the hit rate per label", () => {
    metrics.recordMiss("doc");
    metrics.recordHit("doc");
    metrics.recordHit("doc");
    metrics.recordHit("doc");
    expect(metrics.getHitRate("doc")).toBe(0.75);
    expect(metrics.getHitRate("other")).toBe(0);
  });

  it("should keep only the latest rebuild samples", () => {
    for (let i = 0; i < 105; i++) {
      metrics.recordRebuild("doc", i, 10);
    }
    const recorded = metrics.getMetrics("doc");
    expect(recorded?.rebuildTimeMs).toHaveLength(100);
    expect(recorded?.rebuildTimeMs[0]).toBe(5);
  });

  it("should compute p95 over samples", () => {
    const samples = Array.from({ length: 20 }, (_, i) => i + 1);
    expect(metrics.getP95(samples)).toBe(19);
    expect(metrics.getP95([])).toBe(0);
  });

  it("should reset one label or all of them", () => {
    metrics.recordHit("a");
    metrics.recordHit("b");
    metrics.reset("a");
    expect(metrics.getMetrics("a")).toBeUndefined();
    expect([...metrics.getAllMetrics().keys()]).toEqual(["b"]);
    metrics.reset();
    expect(metrics.getAllMetrics().size).toBe(0);
  });
});
