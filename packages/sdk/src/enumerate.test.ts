import { describe, it, expect } from "vitest";
import {
  flattenEntries,
  filterByPrefix,
  matchSegments,
  compilePattern,
  lastSegment,
  walkTree,
} from "./enumerate.js";

describe("flattenEntries", () => {
  it("should yield scalar leaves depth-first", () => {
    expect(
      flattenEntries({ a: { b: 1, c: [true, null] }, d: "x" })
    ).toEqual([
      { path: "a.b", value: 1 },
      { path: "a.c.0", value: true },
      { path: "a.c.1", value: null },
      { path: "d", value: "x" },
    ]);
  });

  it("should elide empty maps and lists", () => {
    expect(flattenEntries({ a: {}, b: [], c: { d: [] } })).toEqual([]);
  });

  it("should join with a custom separator", () => {
    expect(flattenEntries({ a: { b: 1 } }, "_")).toEqual([{ path: "a_b", value: 1 }]);
  });
});

describe("walkTree", () => {
  it("should report container depth and leaf depth", () => {
    const seen: string[] = [];
    walkTree(
      { a: { b: [1] }, c: 2 },
      {
        leaf: (path, _value, depth) => seen.push(`leaf ${path} ${depth}`),
        container: (path, _value, depth) => seen.push(`container ${path} ${depth}`),
      }
    );
    expect(seen).toEqual([
      "container a 1",
      "container a.b 2",
      "leaf a.b.0 3",
      "leaf c 1",
    ]);
  });
});

describe("filterByPrefix", () => {
  const paths = ["site.name", "site.url", "sites.count", "posts.0.title"];

  it("should keep everything for an empty prefix", () => {
    expect(filterByPrefix(paths, "")).toEqual(paths);
  });

  it("should match whole segments only", () => {
    expect(filterByPrefix(paths, "site")).toEqual(["site.name", "site.url"]);
  });

  it("should not include the prefix itself", () => {
    expect(filterByPrefix(["a", "a.b"], "a")).toEqual(["a.b"]);
  });
});

describe("matchSegments", () => {
  const match = (path: string, pattern: string) =>
    matchSegments(path.split("."), pattern.split("."));

  it("should match literal segments exactly", () => {
    expect(match("a.b", "a.b")).toBe(true);
    expect(match("a.b", "a.c")).toBe(false);
    expect(match("a.b.c", "a.b")).toBe(false);
  });

  it("should match one segment with *", () => {
    expect(match("a.title", "*.title")).toBe(true);
    expect(match("a.b.title", "*.title")).toBe(false);
    expect(match("title", "*.title")).toBe(false);
  });

  it("should match zero or more segments with **", () => {
    expect(match("x.y.email", "**.email")).toBe(true);
    expect(match("email", "**.email")).toBe(true);
    expect(match("x.y.email.backup", "**.email")).toBe(false);
  });

  it("should backtrack over ** in the middle", () => {
    expect(match("a.z", "a.**.z")).toBe(true);
    expect(match("a.b.c.z", "a.**.z")).toBe(true);
    expect(match("a.z.b.z", "a.**.z")).toBe(true);
    expect(match("a.z.b", "a.**.z")).toBe(false);
    expect(match("b.c.z", "a.**.z")).toBe(false);
  });

  it("should combine ** and *", () => {
    expect(match("a.b.c.d", "a.**.*.d")).toBe(true);
    expect(match("a.d", "a.**.*.d")).toBe(false);
    expect(match("p.q.r", "**.**")).toBe(true);
  });
});

describe("compilePattern", () => {
  it("should return undefined for malformed patterns", () => {
    expect(compilePattern("")).toBeUndefined();
    expect(compilePattern("a..b")).toBeUndefined();
  });

  it("should build a path predicate", () => {
    const matches = compilePattern("posts.*.title");
    expect(matches?.("posts.0.title")).toBe(true);
    expect(matches?.("posts.title")).toBe(false);
  });
});

describe("lastSegment", () => {
  it("should return the final segment", () => {
    expect(lastSegment("a.b.email")).toBe("email");
    expect(lastSegment("name")).toBe("name");
  });
});
