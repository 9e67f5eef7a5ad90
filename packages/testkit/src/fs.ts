/**
 * File system test utilities
 */

import { mkdir, mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { dirname, join } from "node:path";

/**
 * Create a unique temporary directory for testing
 * @param prefix - Prefix for the temp directory (default: "docpath-test-")
 * @returns Absolute path to temp directory
 */
export async function createTempDir(prefix = "docpath-test-"): Promise<string> {
  return await mkdtemp(join(tmpdir(), prefix));
}

/**
 * Remove a directory recursively
 * @param path - Path to remove
 */
export async function removeDir(path: string): Promise<void> {
  await rm(path, { recursive: true, force: true });
}

/**
 * Execute a function with a clean temp directory
 * @param fn - Function to execute with temp directory path
 * @returns Result of fn
 */
export async function withTempDir<T>(fn: (dir: string) => Promise<T>): Promise<T> {
  const dir = await createTempDir();
  try {
    return await fn(dir);
  } finally {
    await removeDir(dir);
  }
}

/**
 * Write a value as a JSON fixture, creating parent directories
 * @param dir - Directory the fixture lives under
 * @param name - Relative file name, may include subdirectories
 * @returns Absolute path of the written file
 */
export async function writeJsonFixture(dir: string, name: string, data: unknown): Promise<string> {
  const filePath = join(dir, name);
  await mkdir(dirname(filePath), { recursive: true });
  await writeFile(filePath, JSON.stringify(data, null, 2) + "\n", "utf-8");
  return filePath;
}
