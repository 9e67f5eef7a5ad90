/**
 * Document loading and persistence
 *
 * Invariants:
 * - Loads never read a file that resolves outside baseDir (symlinks included)
 * - Size limits are checked from file metadata before reading
 * - Directory loads consume matching files in lexicographic order
 * - Writes are atomic: never observe partial file contents
 * - Temp files always reside in the same directory as target and are removed on failure
 *
 * Write pattern: write → fsync → rename → fsync directory
 */

import { randomUUID } from "node:crypto";
import * as fs from "node:fs/promises";
import { basename, dirname, isAbsolute, join, relative, resolve, sep } from "node:path";
import type { DocumentMap } from "./types.js";
import {
  AccessDeniedError,
  DirectoryError,
  DocumentNotFoundError,
  DocumentParseError,
  DocumentTooLargeError,
  DocumentWriteError,
  NotAMapError,
} from "./errors.js";
import {
  resolveDirectoryLoadOptions,
  resolveLoadOptions,
  resolveSaveOptions,
  type DirectoryLoadOptions,
  type LoadOptions,
  type SaveOptions,
} from "./config.js";
import { isMap, toDocumentValue, typeName } from "./node.js";
import { deepMerge } from "./navigator.js";
import { formatDocument } from "./format.js";
import { logger } from "./observability/logs.js";

/**
 * Feature flag to control directory fsync (can be disabled on problematic platforms)
 */
const ENABLE_DIR_FSYNC = true;

function errorCode(err: unknown): string | undefined {
  if (err instanceof Error && "code" in err && typeof err.code === "string") {
    return err.code;
  }
  return undefined;
}

/**
 * Convert a filename glob to a regular expression
 *
 * `*` matches any run of characters and `?` matches one; everything else is literal.
 */
export function fileGlobToRegExp(pattern: string): RegExp {
  let source = "";
  for (const char of pattern) {
    if (char === "*") {
      source += ".*";
    } else if (char === "?") {
      source += ".";
    } else {
      source += char.replace(/[.+^${}()|[\]\\]/g, "\\$&");
    }
  }
  return new RegExp(`^${source}$`, "s");
}

/**
 * Check whether a resolved path lies inside a directory
 */
export function isWithin(dir: string, target: string): boolean {
  const rel = relative(dir, target);
  return rel !== ".." && !rel.startsWith(`..${sep}`) && !isAbsolute(rel);
}

async function realpathOrResolve(target: string): Promise<string> {
  try {
    return await fs.realpath(target);
  } catch (err) {
    if (errorCode(err) === "ENOENT") {
      return resolve(target);
    }
    throw err;
  }
}

/**
 * Reject paths that resolve outside baseDir
 * @throws {AccessDeniedError} If the real path escapes the real base directory
 */
async function assertInsideBase(filePath: string, baseDir: string | undefined): Promise<void> {
  if (!baseDir) {
    return;
  }
  const base = await realpathOrResolve(baseDir);
  const target = await realpathOrResolve(filePath);
  if (!isWithin(base, target)) {
    throw new AccessDeniedError(filePath, baseDir);
  }
}

/**
 * Parse JSON text into a document root
 * @throws {DocumentParseError} If the text is not valid JSON
 * @throws {NotAMapError} If the parsed root is not a map
 */
export function parseDocument(text: string, source: string): DocumentMap {
  let parsed: unknown;
  try {
    // Strip BOM if present
    const cleaned = text.charCodeAt(0) === 0xfeff ? text.slice(1) : text;
    parsed = JSON.parse(cleaned);
  } catch (err) {
    throw new DocumentParseError(source, { cause: err });
  }

  const value = toDocumentValue(parsed);
  if (!isMap(value)) {
    throw new NotAMapError(typeName(value));
  }
  return value;
}

/**
 * Load a single JSON file
 * @returns The parsed root map
 * @throws {AccessDeniedError} If the file resolves outside baseDir
 * @throws {DocumentNotFoundError} If the file doesn't exist
 * @throws {DocumentTooLargeError} If the file exceeds maxSize bytes
 * @throws {DocumentParseError} If the file is not valid JSON
 * @throws {NotAMapError} If the JSON root is not an object
 */
export async function loadFile(filePath: string, options?: LoadOptions): Promise<DocumentMap> {
  const { baseDir, maxSize } = resolveLoadOptions(options);
  await assertInsideBase(filePath, baseDir);

  let size: number;
  try {
    const stats = await fs.stat(filePath);
    if (!stats.isFile()) {
      throw new DocumentNotFoundError(filePath);
    }
    size = stats.size;
  } catch (err) {
    if (err instanceof DocumentNotFoundError) throw err;
    if (errorCode(err) === "ENOENT") {
      throw new DocumentNotFoundError(filePath, { cause: err });
    }
    throw new DocumentParseError(filePath, { cause: err });
  }

  if (size > maxSize) {
    throw new DocumentTooLargeError(filePath, size, maxSize);
  }

  let text: string;
  try {
    text = await fs.readFile(filePath, "utf-8");
  } catch (err) {
    if (errorCode(err) === "ENOENT") {
      throw new DocumentNotFoundError(filePath, { cause: err });
    }
    throw new DocumentParseError(filePath, { cause: err });
  }

  const root = parseDocument(text, filePath);
  logger.debug("document.load", { details: { filePath, bytes: size } });
  return root;
}

/**
 * List regular files in a directory whose names match a glob, sorted by name
 * @throws {DocumentNotFoundError} If the directory doesn't exist
 * @throws {DirectoryError} For other listing failures
 */
export async function listMatchingFiles(dirPath: string, pattern: string): Promise<string[]> {
  const matcher = fileGlobToRegExp(pattern);
  try {
    const entries = await fs.readdir(dirPath, { withFileTypes: true });
    return entries
      .filter((entry) => entry.isFile() && !entry.isSymbolicLink() && matcher.test(entry.name))
      .map((entry) => entry.name)
      .sort((a, b) => (a < b ? -1 : a > b ? 1 : 0));
  } catch (err) {
    if (errorCode(err) === "ENOENT" || errorCode(err) === "ENOTDIR") {
      throw new DocumentNotFoundError(dirPath, { cause: err });
    }
    throw new DirectoryError(dirPath, { cause: err });
  }
}

/**
 * Load every matching file of a directory and deep-merge them in name order
 *
 * Later files win on conflicting scalars and lists; maps merge recursively.
 * @returns The merged root map (empty when nothing matches)
 */
export async function loadDirectory(
  dirPath: string,
  options?: DirectoryLoadOptions
): Promise<DocumentMap> {
  const { baseDir, maxSize, pattern } = resolveDirectoryLoadOptions(options);
  await assertInsideBase(dirPath, baseDir);

  const names = await listMatchingFiles(dirPath, pattern);
  const merged: DocumentMap = {};
  for (const name of names) {
    const part = await loadFile(join(dirPath, name), { baseDir, maxSize });
    deepMerge(merged, part);
  }

  logger.debug("document.load.merge", { details: { dirPath, pattern, files: names } });
  return merged;
}

/**
 * Ensure a directory exists, creating it and parent directories as needed
 * @param dirPath - Directory path to create
 */
export async function ensureDirectory(dirPath: string): Promise<void> {
  if (!dirPath) {
    throw new DirectoryError(String(dirPath), {
      cause: new TypeError("Directory path must be a non-empty string"),
    });
  }

  try {
    await fs.mkdir(dirPath, { recursive: true });
  } catch (err) {
    throw new DirectoryError(dirPath, { cause: err });
  }
}

/**
 * Atomically write content to a file using write-rename-sync pattern
 * @param filePath - Target file path
 * @param content - Content to write (UTF-8 string)
 * @throws {DirectoryError} If the parent directory cannot be created
 * @throws {DocumentWriteError} If the write fails
 */
export async function atomicWrite(filePath: string, content: string): Promise<void> {
  const dir = dirname(filePath);
  const base = basename(filePath);
  const tmp = join(dir, `.${base}.${randomUUID()}.tmp`);

  await ensureDirectory(dir);

  let fileHandle: fs.FileHandle | null = null;

  try {
    fileHandle = await fs.open(tmp, "w", 0o644);
    await fileHandle.writeFile(content, "utf-8");

    // Prefer datasync for performance, fall back to sync
    try {
      await fileHandle.datasync();
    } catch (err) {
      const code = errorCode(err);
      // ENOTSUP/ENOSYS: not supported on this platform
      // EINVAL: some CIFS/FUSE mounts report this instead
      if (code === "ENOTSUP" || code === "ENOSYS" || code === "EINVAL") {
        await fileHandle.sync();
      } else {
        throw err;
      }
    }

    await fileHandle.close();
    fileHandle = null;

    await fs.rename(tmp, filePath);

    if (ENABLE_DIR_FSYNC) {
      try {
        const dirHandle = await fs.open(dir, "r");
        try {
          await dirHandle.sync();
        } finally {
          await dirHandle.close();
        }
      } catch (err) {
        // Platforms without directory fsync report one of these
        const code = errorCode(err);
        if (code !== "EINVAL" && code !== "ENOTSUP" && code !== "EBADF" && code !== "EISDIR") {
          logger.warn("document.save", {
            message: `Directory fsync failed for ${dir}`,
            details: { code },
          });
        }
      }
    }
  } catch (err) {
    if (fileHandle) {
      await fileHandle.close().catch((closeErr: unknown) => {
        logger.debug("document.save", {
          message: "Failed to close temp file",
          details: { tmp, error: String(closeErr) },
        });
      });
    }

    await fs.unlink(tmp).catch((unlinkErr: unknown) => {
      if (errorCode(unlinkErr) !== "ENOENT") {
        logger.warn("document.save", {
          message: "Failed to remove temp file",
          details: { tmp, error: String(unlinkErr) },
        });
      }
    });

    throw new DocumentWriteError(filePath, { cause: err });
  }
}

/**
 * Serialize and atomically write a document root
 * @throws {ConfigError} If options are invalid
 * @throws {DocumentWriteError} If the write fails
 */
export async function saveFile(
  filePath: string,
  data: DocumentMap,
  options?: SaveOptions
): Promise<void> {
  const resolved = resolveSaveOptions(options);
  const content = formatDocument(data, resolved);
  await atomicWrite(filePath, content);
  logger.debug("document.save", {
    details: { filePath, bytes: Buffer.byteLength(content, "utf-8") },
  });
}
