/**
 * Document loading and saving for CLI commands
 */

import { Document } from "@docpath/sdk";
import { resolveBaseDir, resolveFilePath } from "./env.js";

/**
 * Global options shared by every command
 */
export type GlobalOptions = {
  baseDir?: string;
  maxSize?: number;
  verbose?: boolean;
  quiet?: boolean;
  raw?: boolean;
};

/**
 * Options of commands that write a file
 */
export type WriteOptions = {
  indent?: number;
  compact?: boolean;
  sortKeys?: boolean;
};

/**
 * Load one JSON file under the global size and base directory limits
 */
export async function openDocument(file: string, globals: GlobalOptions): Promise<Document> {
  return Document.fromFile(resolveFilePath(file), {
    baseDir: resolveBaseDir(globals.baseDir),
    maxSize: globals.maxSize,
  });
}

/**
 * Load and merge every matching file of a directory
 */
export async function openDirectory(
  dir: string,
  globals: GlobalOptions,
  pattern?: string
): Promise<Document> {
  return Document.fromDirectory(resolveFilePath(dir), {
    baseDir: resolveBaseDir(globals.baseDir),
    maxSize: globals.maxSize,
    pattern,
  });
}

/**
 * Write a document back to disk
 */
export async function saveDocument(
  doc: Document,
  file: string,
  options: WriteOptions
): Promise<void> {
  await doc.save(resolveFilePath(file), {
    indent: options.compact ? null : options.indent,
    sortKeys: options.sortKeys,
  });
}
