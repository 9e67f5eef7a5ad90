import { describe, it, expect, afterEach, vi } from "vitest";
import {
  resolveLoadOptions,
  resolveDirectoryLoadOptions,
  resolveSaveOptions,
  DEFAULT_MAX_SIZE,
} from "./config.js";
import { ConfigError } from "./errors.js";

describe("resolveLoadOptions", () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it("should apply defaults", () => {
    vi.stubEnv("DOCPATH_MAX_FILE_SIZE", "");
    expect(resolveLoadOptions()).toEqual({ baseDir: undefined, maxSize: DEFAULT_MAX_SIZE });
    expect(DEFAULT_MAX_SIZE).toBe(10 * 1024 * 1024);
  });

  it("should take the default size ceiling from the environment", () => {
    vi.stubEnv("DOCPATH_MAX_FILE_SIZE", "2048");
    expect(resolveLoadOptions().maxSize).toBe(2048);
    expect(resolveLoadOptions({ maxSize: 10 }).maxSize).toBe(10);
  });

  it("should ignore a malformed environment value", () => {
    vi.stubEnv("DOCPATH_MAX_FILE_SIZE", "lots");
    expect(resolveLoadOptions().maxSize).toBe(DEFAULT_MAX_SIZE);
  });

  it("should reject invalid values", () => {
    expect(() => resolveLoadOptions({ maxSize: -1 })).toThrow(ConfigError);
    expect(() => resolveLoadOptions({ baseDir: "" })).toThrow(
      "Invalid options: baseDir: baseDir must be non-empty"
    );
  });

  it("should reject unknown keys", () => {
    const input = { maxSize: 1, maxsize: 1 };
    expect(() => resolveLoadOptions(input)).toThrow(ConfigError);
  });
});

describe("resolveDirectoryLoadOptions", () => {
  it("should default the pattern", () => {
    expect(resolveDirectoryLoadOptions({ maxSize: 1 })).toEqual({
      baseDir: undefined,
      maxSize: 1,
      pattern: "*.json",
    });
  });

  it("should reject patterns with separators", () => {
    try {
      resolveDirectoryLoadOptions({ pattern: "nested/*.json" });
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(ConfigError);
      if (err instanceof ConfigError) {
        expect(err.issues).toEqual(["pattern: pattern cannot contain path separators"]);
        expect(err.code).toBe("E_CONFIG");
      }
    }
  });
});

describe("resolveSaveOptions", () => {
  it("should apply defaults", () => {
    expect(resolveSaveOptions()).toEqual({ indent: 2, sortKeys: false });
  });

  it("should keep a null indent", () => {
    expect(resolveSaveOptions({ indent: null, sortKeys: true })).toEqual({
      indent: null,
      sortKeys: true,
    });
  });

  it("should reject out-of-range indents", () => {
    expect(() => resolveSaveOptions({ indent: 11 })).toThrow(ConfigError);
    expect(() => resolveSaveOptions({ indent: 1.5 })).toThrow(ConfigError);
  });
});
