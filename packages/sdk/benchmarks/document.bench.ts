/**
 * Performance benchmarks for path enumeration and list queries
 * Run with: npm run bench
 */

import { describe, it, expect, beforeEach } from "vitest";
import { performance } from "node:perf_hooks";
import { Document } from "../src/document.js";
import { fieldOf } from "../src/query.js";
import type { DocumentMap } from "../src/types.js";

// Only run benchmarks if DOCPATH_PERF is set
const describeIf = process.env.DOCPATH_PERF ? describe : describe.skip;

function seed(count: number): DocumentMap {
  const posts: DocumentMap[] = [];
  for (let i = 1; i <= count; i++) {
    posts.push({
      id: i,
      status: i % 3 === 0 ? "open" : i % 3 === 1 ? "closed" : "ready",
      views: (i * 7919) % 1000,
      meta: { author: `author-${i % 10}`, tags: [`t${i % 5}`, `t${i % 7}`] },
    });
  }
  return { site: { name: "Bench" }, posts };
}

function time<T>(fn: () => T): { result: T; ms: number } {
  const start = performance.now();
  const result = fn();
  return { result, ms: performance.now() - start };
}

describeIf("Document Performance Benchmarks", () => {
  let doc: Document;

  beforeEach(() => {
    doc = new Document(seed(5000), { label: "bench" });
  });

  it("5000 elements, cold enumeration < 200ms, warm < 5ms", () => {
    const cold = time(() => doc.listPaths());
    const warm = time(() => doc.listPaths());

    console.log(`Enumerate ${cold.result.length} paths: cold ${cold.ms.toFixed(2)}ms, warm ${warm.ms.toFixed(2)}ms`);
    expect(cold.result.length).toBe(1 + 5000 * 6);
    expect(cold.ms).toBeLessThanOrEqual(200);
    expect(warm.ms).toBeLessThanOrEqual(5);
  });

  it("5000 elements, glob match over cached paths < 100ms", () => {
    doc.listPaths();
    const { result, ms } = time(() => doc.findPaths("posts.*.meta.tags.0"));

    console.log(`Glob match: ${result.length} paths in ${ms.toFixed(2)}ms`);
    expect(result).toHaveLength(5000);
    expect(ms).toBeLessThanOrEqual(100);
  });

  it("5000 elements, filter + sort + limit < 100ms", () => {
    const { result, ms } = time(() =>
      doc
        .query("posts")
        .where((item) => fieldOf(item, "status") === "open")
        .sort("views", true)
        .limit(20)
        .execute()
    );

    console.log(`Filter + sort: ${result.length} results in ${ms.toFixed(2)}ms`);
    expect(result).toHaveLength(20);
    expect(result.every((item) => fieldOf(item, "status") === "open")).toBe(true);
    expect(ms).toBeLessThanOrEqual(100);
  });
});
