import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, rm, readFile, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { Document } from "./document.js";
import { fieldOf } from "./query.js";
import {
  CircularReferenceError,
  DocumentNotFoundError,
  EmptyPathError,
  EmptySegmentError,
  NotAMapError,
  PathTypeConflictError,
  UnsupportedValueError,
} from "./errors.js";
import type { DocumentMap } from "./types.js";

const sample = (): DocumentMap => ({
  site: { name: "Field Notes", url: "https://example.test" },
  posts: [
    { title: "First", views: 10, published: true },
    { title: "Second", views: 30, published: false },
    { title: "Third", views: 20, published: true },
  ],
  authors: { ann: { email: "ann@example.test" }, bo: { email: "bo@example.test" } },
});

describe("Document", () => {
  describe("construction", () => {
    it("should copy its input", () => {
      const input: DocumentMap = { a: { b: 1 } };
      const doc = new Document(input);
      doc.set("a.b", 2);
      expect(input).toEqual({ a: { b: 1 } });
    });

    it("should reject circular input", () => {
      const input: DocumentMap = {};
      const inner: DocumentMap = { back: input };
      input.inner = inner;
      expect(() => new Document(input)).toThrow(CircularReferenceError);
    });

    it("should accept untyped input through from()", () => {
      expect(Document.from(JSON.parse('{"a":[1]}')).get("a.0")).toBe(1);
      expect(() => Document.from([1, 2])).toThrow(NotAMapError);
      expect(() => Document.from({ a: new Map() })).toThrow(UnsupportedValueError);
    });

    it("should default its label", () => {
      expect(new Document().label).toBe("document");
      expect(new Document({}, { label: "settings" }).label).toBe("settings");
    });
  });

  describe("get / set / delete / has", () => {
    it("should read back what was written", () => {
      const doc = new Document(sample());
      doc.set("site.theme.color", "teal");
      expect(doc.get("site.theme.color")).toBe("teal");
      doc.set("posts.1.title", "Renamed");
      expect(doc.get("posts.1.title")).toBe("Renamed");
      doc.set("site", { replaced: true });
      expect(doc.get("site")).toEqual({ replaced: true });
    });

    it("should return the default only for absent paths", () => {
      const doc = new Document({ zero: 0, none: null });
      expect(doc.get("zero", 5)).toBe(0);
      expect(doc.get("none", 5)).toBeNull();
      expect(doc.get("missing", 5)).toBe(5);
      expect(doc.get("missing")).toBeUndefined();
    });

    it("should return copies from get", () => {
      const doc = new Document(sample());
      const site = doc.get("site");
      if (site !== null && typeof site === "object" && !Array.isArray(site)) {
        site.name = "Changed";
      }
      expect(doc.get("site.name")).toBe("Field Notes");
    });

    it("should remove a value once", () => {
      const doc = new Document({ temp: { value: "x" } });
      expect(doc.delete("temp.value")).toBe(true);
      expect(doc.delete("temp.value")).toBe(false);
      expect(doc.has("temp.value")).toBe(false);
      expect(doc.has("temp")).toBe(true);
    });

    it("should shift later list elements down when an index is deleted", () => {
      const doc = new Document({ l: ["a", "b"] });
      expect(doc.delete("l.0")).toBe(true);
      expect(doc.get("l")).toEqual(["b"]);
      expect(doc.delete("l.0")).toBe(true);
      expect(doc.get("l")).toEqual([]);
      expect(doc.delete("l.0")).toBe(false);
    });

    it("should throw on malformed paths from every single-path method", () => {
      const doc = new Document(sample());
      for (const path of ["", "   "]) {
        expect(() => doc.get(path)).toThrow(EmptyPathError);
        expect(() => doc.set(path, 1)).toThrow(EmptyPathError);
        expect(() => doc.delete(path)).toThrow(EmptyPathError);
        expect(() => doc.has(path)).toThrow(EmptyPathError);
      }
      for (const path of [".", ".a", "a.", "a..b"]) {
        expect(() => doc.get(path)).toThrow(EmptySegmentError);
        expect(() => doc.set(path, 1)).toThrow(EmptySegmentError);
        expect(() => doc.delete(path)).toThrow(EmptySegmentError);
        expect(() => doc.has(path)).toThrow(EmptySegmentError);
      }
    });

    it("should leave the document unchanged when a write conflicts", () => {
      const doc = new Document(sample());
      const before = doc.toCopy();
      expect(() => doc.set("site.name.first", "x")).toThrow(PathTypeConflictError);
      expect(() => doc.set("posts.9", {})).toThrow(PathTypeConflictError);
      expect(doc.toCopy()).toEqual(before);
    });

    it("should reject values that are not JSON-like", () => {
      const doc = new Document();
      expect(() => doc.set("a", Number.NaN)).toThrow(UnsupportedValueError);
      expect(doc.has("a")).toBe(false);
    });
  });

  describe("getMany", () => {
    it("should map absent and malformed paths to null", () => {
      const doc = new Document(sample());
      expect(doc.getMany(["site.name", "site.owner", "a..b", "posts.0.views"])).toEqual({
        "site.name": "Field Notes",
        "site.owner": null,
        "a..b": null,
        "posts.0.views": 10,
      });
    });
  });

  describe("view", () => {
    it("should wrap a copy of a nested map", () => {
      const doc = new Document(sample());
      const site = doc.view("site");
      expect(site?.get("name")).toBe("Field Notes");
      site?.set("name", "Changed");
      expect(doc.get("site.name")).toBe("Field Notes");
      expect(site?.label).toBe("document:site");
    });

    it("should return undefined for lists, scalars and absent paths", () => {
      const doc = new Document(sample());
      expect(doc.view("posts")).toBeUndefined();
      expect(doc.view("site.name")).toBeUndefined();
      expect(doc.view("nope")).toBeUndefined();
    });
  });

  describe("top-level keys", () => {
    it("should address keys containing dots without parsing", () => {
      const doc = new Document();
      doc.setKey("a.b", 1);
      expect(doc.getKey("a.b")).toBe(1);
      expect(doc.hasKey("a.b")).toBe(true);
      expect(doc.has("a.b")).toBe(false);
      expect(doc.keys()).toEqual(["a.b"]);
      expect(doc.deleteKey("a.b")).toBe(true);
      expect(doc.deleteKey("a.b")).toBe(false);
      expect(doc.size).toBe(0);
    });

    it("should list keys, values and entries in insertion order", () => {
      const doc = new Document({ b: 1, a: { c: 2 } });
      expect(doc.keys()).toEqual(["b", "a"]);
      expect(doc.values()).toEqual([1, { c: 2 }]);
      expect(doc.entries()).toEqual([
        ["b", 1],
        ["a", { c: 2 }],
      ]);
      expect(doc.size).toBe(2);
    });
  });

  describe("flatten / listPaths / find", () => {
    it("should flatten to a path map", () => {
      const doc = new Document({ a: { b: 1, c: [true] }, e: {} });
      expect([...doc.flatten()]).toEqual([
        ["a.b", 1],
        ["a.c.0", true],
      ]);
      expect([...doc.flatten("/").keys()]).toEqual(["a/b", "a/c/0"]);
    });

    it("should rebuild an equal document from flatten for map-only trees", () => {
      const doc = new Document({ a: { b: 1, c: { d: "x" } }, e: null });
      const rebuilt = new Document();
      for (const [path, value] of doc.flatten()) {
        rebuilt.set(path, value);
      }
      expect(rebuilt.equals(doc)).toBe(true);
    });

    it("should rebuild a leaf-equal document from flatten when lists are present", () => {
      const doc = new Document({ a: [1, { b: 2 }], c: { d: [true] }, e: "x" });
      const rebuilt = new Document();
      for (const [path, value] of doc.flatten()) {
        rebuilt.set(path, value);
      }
      expect(rebuilt.equals(doc)).toBe(true);
      // set never creates lists, so list positions come back as index-named keys
      expect(rebuilt.get("a")).toEqual({ "0": 1, "1": { b: 2 } });
      expect(rebuilt.get("a.1.b")).toBe(2);
    });

    it("should list paths under a prefix", () => {
      const doc = new Document(sample());
      expect(doc.listPaths("site")).toEqual(["site.name", "site.url"]);
      expect(doc.listPaths()).toHaveLength(13);
    });

    it("should find paths by glob", () => {
      const doc = new Document(sample());
      expect(doc.findPaths("posts.*.title")).toEqual([
        "posts.0.title",
        "posts.1.title",
        "posts.2.title",
      ]);
      expect(doc.findPaths("**.email")).toEqual(["authors.ann.email", "authors.bo.email"]);
      expect(doc.findPaths("*.title")).toEqual([]);
      expect(doc.findPaths("a..b")).toEqual([]);
    });

    it("should find paths by final key", () => {
      const doc = new Document(sample());
      expect(doc.findAllKeys("views")).toEqual(["posts.0.views", "posts.1.views", "posts.2.views"]);
    });

    it("should find leaves by value", () => {
      const doc = new Document(sample());
      const found = doc.findValues((value) => typeof value === "number" && value >= 20);
      expect([...found]).toEqual([
        ["posts.1.views", 30],
        ["posts.2.views", 20],
      ]);
    });
  });

  describe("path cache", () => {
    it("should reuse the enumeration between reads", () => {
      const doc = new Document(sample());
      doc.listPaths();
      doc.findPaths("**.title");
      doc.flatten();
      expect(doc.cacheStats()).toEqual({ cached: true, size: 13, hits: 2, misses: 1 });
    });

    it("should never serve stale paths after a mutation", () => {
      const doc = new Document({ a: 1 });
      expect(doc.listPaths()).toEqual(["a"]);
      doc.set("b.c", 2);
      expect(doc.listPaths()).toEqual(["a", "b.c"]);
      doc.delete("a");
      expect(doc.listPaths()).toEqual(["b.c"]);
      doc.setKey("d", true);
      expect(doc.listPaths()).toEqual(["b.c", "d"]);
      doc.merge({ e: 1 });
      expect(doc.listPaths()).toEqual(["b.c", "d", "e"]);
      doc.updateWhere(() => true, () => ({ x: 1 }));
      expect(doc.listPaths()).toEqual(["b.c.x", "d.x", "e.x"]);
    });

    it("should keep the cache when nothing changed", () => {
      const doc = new Document({ a: 1 });
      doc.listPaths();
      doc.delete("missing");
      doc.removeNulls();
      doc.removeEmpty();
      expect(doc.cacheStats().cached).toBe(true);
    });

    it("should not expose the cached enumeration", () => {
      const doc = new Document({ a: 1 });
      const paths = doc.listPaths();
      paths.push("injected");
      expect(doc.listPaths()).toEqual(["a"]);
    });
  });

  describe("query", () => {
    it("should filter, sort and limit list elements", () => {
      const doc = new Document({ items: [{ v: 1 }, { v: 3 }, { v: 2 }] });
      const pipeline = doc
        .query("items")
        .where((item) => {
          const v = fieldOf(item, "v");
          return typeof v === "number" && v > 1;
        })
        .sort("v");
      expect(pipeline.execute()).toEqual([{ v: 2 }, { v: 3 }]);
      expect(pipeline.limit(1).execute()).toEqual([{ v: 2 }]);
    });

    it("should work on a snapshot", () => {
      const doc = new Document(sample());
      const pipeline = doc.query("posts");
      doc.delete("posts.0");
      expect(pipeline.count()).toBe(3);
      const [first] = pipeline.execute();
      if (first !== null && typeof first === "object" && !Array.isArray(first)) {
        first.title = "Mutated";
      }
      expect(doc.get("posts.0.title")).toBe("Second");
    });

    it("should query an empty source for absent or non-list paths", () => {
      const doc = new Document(sample());
      expect(doc.query("missing").execute()).toEqual([]);
      expect(doc.query("site").count()).toBe(0);
    });

    it("should filter a list directly", () => {
      const doc = new Document(sample());
      expect(
        doc.filterList("posts", (post) => fieldOf(post, "published") === true).length
      ).toBe(2);
    });

    it("should chain sort, limit and pluck", () => {
      const doc = new Document(sample());
      expect(doc.query("posts").sort("views", true).limit(2).pluck("title")).toEqual([
        "Second",
        "Third",
      ]);
    });
  });

  describe("merge / diff / equals", () => {
    it("should deep-merge another document", () => {
      const doc = new Document({ site: { name: "Old", url: "u" } });
      doc.merge(new Document({ site: { name: "New" }, extra: 1 }));
      expect(doc.toCopy()).toEqual({ site: { name: "New", url: "u" }, extra: 1 });
    });

    it("should diff against a document or a map", () => {
      const doc = new Document({ a: 1, b: 2 });
      const expected = { added: { c: 4 }, removed: { a: 1 }, changed: { b: { old: 2, new: 3 } } };
      expect(doc.diff({ b: 3, c: 4 })).toEqual(expected);
      expect(doc.diff(new Document({ b: 3, c: 4 }))).toEqual(expected);
    });

    it("should compare by leaves", () => {
      expect(new Document({ a: 1, b: 2 }).equals({ b: 2, a: 1 })).toBe(true);
      expect(new Document({ a: 1 }).equals(new Document({ a: "1" }))).toBe(false);
    });
  });

  describe("bulk mutators", () => {
    it("should update matching leaves", () => {
      const doc = new Document(sample());
      const count = doc.updateWhere(
        (path) => path.endsWith(".views"),
        (value) => (typeof value === "number" ? value + 1 : value)
      );
      expect(count).toBe(3);
      expect(doc.get("posts.1.views")).toBe(31);
    });

    it("should leave the document and its paths unchanged when a transform fails", () => {
      const doc = new Document({ a: 1, b: 2 });
      expect(doc.listPaths()).toEqual(["a", "b"]);
      let calls = 0;
      expect(() =>
        doc.updateWhere(
          () => true,
          (value) => (calls++ === 0 ? { x: value } : Number.NaN)
        )
      ).toThrow(UnsupportedValueError);
      expect(calls).toBe(2);
      expect(doc.toCopy()).toEqual({ a: 1, b: 2 });
      expect(doc.listPaths()).toEqual(["a", "b"]);
      expect(doc.listPaths()).toEqual(new Document(doc.toCopy()).listPaths());
    });

    it("should remove nulls and empty containers idempotently", () => {
      const doc = new Document({ a: { b: null }, c: [null, 1], d: 0 });
      expect(doc.removeNulls()).toBe(2);
      expect(doc.removeNulls()).toBe(0);
      expect(doc.removeEmpty()).toBe(1);
      expect(doc.removeEmpty()).toBe(0);
      expect(doc.toCopy()).toEqual({ c: [1], d: 0 });
    });
  });

  describe("transforms", () => {
    it("should build a new document from leaves", () => {
      const doc = new Document({ a: "x", b: { c: "y" } });
      const upper = doc.transformAll((_path, value) =>
        typeof value === "string" ? value.toUpperCase() : value
      );
      expect(upper.toCopy()).toEqual({ a: "X", b: { c: "Y" } });
      expect(doc.get("a")).toBe("x");
    });

    it("should build a new document with renamed keys", () => {
      const doc = new Document({ first_name: "Ann", meta: { created_at: 1 } });
      const renamed = doc.transformKeys((key) =>
        key.replace(/_([a-z])/g, (_match, char: string) => char.toUpperCase())
      );
      expect(renamed.toCopy()).toEqual({ firstName: "Ann", meta: { createdAt: 1 } });
    });
  });

  describe("describe / stats / serialization", () => {
    it("should describe top-level keys", () => {
      const doc = new Document({ name: "x", tags: ["a"] });
      expect(doc.describe()).toEqual({
        name: { type: "string", value: "x" },
        tags: { type: "list", length: 1, itemTypes: ["string"] },
      });
    });

    it("should report stats", () => {
      expect(new Document(sample()).stats()).toEqual({
        totalKeys: 18,
        maxDepth: 3,
        totalMaps: 8,
        totalLists: 1,
        totalValues: 13,
      });
    });

    it("should serialize to JSON", () => {
      const doc = new Document({ a: 1 });
      expect(doc.toString()).toBe('{\n  "a": 1\n}');
      expect(JSON.stringify({ doc })).toBe('{"doc":{"a":1}}');
    });
  });

  describe("files", () => {
    let testDir: string;

    beforeEach(async () => {
      testDir = await mkdtemp(join(tmpdir(), "docpath-doc-"));
    });

    afterEach(async () => {
      await rm(testDir, { recursive: true, force: true });
    });

    it("should save and load a document", async () => {
      const file = join(testDir, "site.json");
      await new Document(sample()).save(file, { sortKeys: true });
      const loaded = await Document.fromFile(file);
      expect(loaded.equals(sample())).toBe(true);
      expect(loaded.label).toBe(file);
      expect(await readFile(file, "utf-8")).toMatch(/^\{\n {2}"authors"/);
    });

    it("should load a directory as one merged document", async () => {
      await writeFile(join(testDir, "01-base.json"), '{"db":{"host":"localhost","port":5432}}');
      await writeFile(join(testDir, "02-prod.json"), '{"db":{"host":"db.internal"}}');
      const doc = await Document.fromDirectory(testDir, { label: "config" });
      expect(doc.toCopy()).toEqual({ db: { host: "db.internal", port: 5432 } });
      expect(doc.label).toBe("config");
    });

    it("should report missing files", async () => {
      await expect(Document.fromFile(join(testDir, "nope.json"))).rejects.toThrow(
        DocumentNotFoundError
      );
    });
  });
});
