import { describe, it, expect } from "vitest";
import { QueryPipeline, compareValues, fieldOf, MISSING_GROUP } from "./query.js";
import type { DocumentValue } from "./types.js";

const num = (item: DocumentValue, key: string): number => {
  const value = fieldOf(item, key);
  return typeof value === "number" ? value : 0;
};

describe("compareValues", () => {
  it("should order by type precedence", () => {
    const values: (DocumentValue | undefined)[] = [{ a: 1 }, [1], "s", 2, true, null];
    const sorted = [...values].sort(compareValues);
    expect(sorted).toEqual([null, true, 2, "s", [1], { a: 1 }]);
  });

  it("should treat absent like null", () => {
    expect(compareValues(undefined, null)).toBe(0);
    expect(compareValues(undefined, 0)).toBe(-1);
  });

  it("should compare within a type", () => {
    expect(compareValues(1, 2)).toBe(-1);
    expect(compareValues("b", "a")).toBe(1);
    expect(compareValues(false, true)).toBe(-1);
    expect(compareValues([1], [2])).toBe(0);
  });
});

describe("fieldOf", () => {
  it("should read a top-level field of a map", () => {
    expect(fieldOf({ v: 1 }, "v")).toBe(1);
    expect(fieldOf({ v: 1 }, "w")).toBeUndefined();
  });

  it("should return undefined for non-map elements", () => {
    expect(fieldOf(5, "v")).toBeUndefined();
    expect(fieldOf([1], "0")).toBeUndefined();
  });
});

describe("QueryPipeline", () => {
  it("should filter, sort and limit", () => {
    const items = [{ v: 1 }, { v: 3 }, { v: 2 }];
    const pipeline = new QueryPipeline(items).where((item) => num(item, "v") > 1).sort("v");
    expect(pipeline.execute()).toEqual([{ v: 2 }, { v: 3 }]);
    expect(pipeline.limit(1).execute()).toEqual([{ v: 2 }]);
  });

  it("should apply stages in a fixed order whatever the call order", () => {
    const items = [5, 1, 4, 2, 3].map((v) => ({ v }));
    const result = new QueryPipeline(items)
      .limit(2)
      .offset(1)
      .sort("v")
      .where((item) => num(item, "v") !== 4)
      .execute();
    expect(result).toEqual([{ v: 2 }, { v: 3 }]);
  });

  it("should require every filter to pass", () => {
    const items = [{ a: 1, b: 1 }, { a: 1, b: 2 }, { a: 2, b: 1 }];
    const result = new QueryPipeline(items)
      .where((item) => fieldOf(item, "a") === 1)
      .where((item) => fieldOf(item, "b") === 1)
      .execute();
    expect(result).toEqual([{ a: 1, b: 1 }]);
  });

  it("should sort stably in both directions", () => {
    const items = [
      { k: 1, id: "a" },
      { k: 0, id: "b" },
      { k: 1, id: "c" },
      { k: 0, id: "d" },
    ];
    expect(new QueryPipeline(items).sort("k").pluck("id")).toEqual(["b", "d", "a", "c"]);
    expect(new QueryPipeline(items).sort("k", true).pluck("id")).toEqual(["a", "c", "b", "d"]);
  });

  it("should sort by a key function", () => {
    const items = ["ccc", "a", "bb"];
    const result = new QueryPipeline(items)
      .sort((item) => (typeof item === "string" ? item.length : null))
      .execute();
    expect(result).toEqual(["a", "bb", "ccc"]);
  });

  it("should sort elements themselves when no key is given", () => {
    expect(new QueryPipeline([3, "x", 1, null]).sort().execute()).toEqual([null, 1, 3, "x"]);
  });

  it("should put elements missing the sort field first", () => {
    const items: DocumentValue[] = [{ v: 2 }, { other: true }, { v: 1 }];
    expect(new QueryPipeline(items).sort("v").execute()).toEqual([
      { other: true },
      { v: 1 },
      { v: 2 },
    ]);
  });

  it("should clamp negative offset and limit to zero", () => {
    const items = [1, 2, 3];
    expect(new QueryPipeline(items).offset(-5).execute()).toEqual([1, 2, 3]);
    expect(new QueryPipeline(items).limit(-1).execute()).toEqual([]);
  });

  it("should treat NaN offset and limit as zero", () => {
    const items = [1, 2, 3];
    expect(new QueryPipeline(items).offset(Number.NaN).execute()).toEqual([1, 2, 3]);
    expect(new QueryPipeline(items).limit(Number.NaN).execute()).toEqual([]);
    expect(new QueryPipeline(items).limit(Number.POSITIVE_INFINITY).execute()).toEqual([1, 2, 3]);
  });

  it("should return nothing when offset passes the end", () => {
    expect(new QueryPipeline([1, 2]).offset(10).execute()).toEqual([]);
  });

  it("should count filtered elements only", () => {
    const pipeline = new QueryPipeline([1, 2, 3, 4])
      .where((item) => typeof item === "number" && item > 1)
      .limit(1)
      .offset(1);
    expect(pipeline.count()).toBe(3);
  });

  it("should return the first element after filtering and sorting", () => {
    const pipeline = new QueryPipeline([{ v: 3 }, { v: 1 }, { v: 2 }]).sort("v").offset(2);
    expect(pipeline.first()).toEqual({ v: 1 });
    expect(new QueryPipeline([]).first()).toBeUndefined();
  });

  it("should pluck null for absent fields", () => {
    const items: DocumentValue[] = [{ name: "a" }, { other: 1 }, 7];
    expect(new QueryPipeline(items).pluck("name")).toEqual(["a", null, null]);
  });

  it("should group by field value in pipeline order", () => {
    const items: DocumentValue[] = [
      { id: 1, tag: "x" },
      { id: 2, tag: null },
      { id: 3, tag: "y" },
      { id: 4 },
      { id: 5, tag: "x" },
    ];
    const groups = new QueryPipeline(items).groupBy("tag");
    expect([...groups.keys()]).toEqual(["x", null, "y", MISSING_GROUP]);
    expect(groups.get("x")).toEqual([
      { id: 1, tag: "x" },
      { id: 5, tag: "x" },
    ]);
    expect(groups.get(null)).toEqual([{ id: 2, tag: null }]);
    expect(groups.get(MISSING_GROUP)).toEqual([{ id: 4 }]);
  });

  it("should keep values of different types in separate groups", () => {
    const items: DocumentValue[] = [{ k: 1 }, { k: "1" }, { k: "null" }, {}, { k: true }, { k: "true" }];
    const groups = new QueryPipeline(items).groupBy("k");
    expect([...groups.entries()]).toEqual([
      [1, [{ k: 1 }]],
      ["1", [{ k: "1" }]],
      ["null", [{ k: "null" }]],
      [MISSING_GROUP, [{}]],
      [true, [{ k: true }]],
      ["true", [{ k: "true" }]],
    ]);
  });

  it("should share one group between equal containers", () => {
    const items: DocumentValue[] = [
      { id: 1, g: { b: 1, a: 2 } },
      { id: 2, g: { a: 2, b: 1 } },
      { id: 3, g: '{"a":2,"b":1}' },
      { id: 4, g: [1] },
    ];
    const groups = new QueryPipeline(items).groupBy("g");
    expect([...groups.keys()]).toEqual([{ b: 1, a: 2 }, '{"a":2,"b":1}', [1]]);
    expect([...groups.values()].map((bucket) => bucket.map((item) => fieldOf(item, "id")))).toEqual([
      [1, 2],
      [3],
      [4],
    ]);
  });

  it("should not share structure with the source or between runs", () => {
    const source = [{ v: { n: 1 } }];
    const pipeline = new QueryPipeline(source);
    source[0] = { v: { n: 2 } };
    const first = pipeline.execute();
    expect(first).toEqual([{ v: { n: 1 } }]);
    expect(pipeline.execute()).not.toBe(first);
    expect(pipeline.execute()[0]).not.toBe(first[0]);
  });
});
