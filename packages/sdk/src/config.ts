/**
 * Zod schemas for loader and persister options
 * Provides runtime validation with descriptive errors
 */

import { z } from "zod";
import { ConfigError } from "./errors.js";

/** 10 MiB */
export const DEFAULT_MAX_SIZE = 10 * 1024 * 1024;

export const DEFAULT_PATTERN = "*.json";

/**
 * Resolve the default size ceiling, honoring DOCPATH_MAX_FILE_SIZE
 */
export function defaultMaxSize(): number {
  const fromEnv = process.env.DOCPATH_MAX_FILE_SIZE;
  if (fromEnv !== undefined && /^\d+$/.test(fromEnv.trim())) {
    return Number.parseInt(fromEnv.trim(), 10);
  }
  return DEFAULT_MAX_SIZE;
}

const MaxSizeSchema = z.number().int().nonnegative();

export const LoadOptionsSchema = z
  .object({
    baseDir: z.string().min(1, "baseDir must be non-empty").optional(),
    maxSize: MaxSizeSchema.optional(),
  })
  .strict();

export const DirectoryLoadOptionsSchema = LoadOptionsSchema.extend({
  pattern: z
    .string()
    .min(1, "pattern must be non-empty")
    .refine((value) => !/[\\/]/.test(value), "pattern cannot contain path separators")
    .optional(),
}).strict();

export const SaveOptionsSchema = z
  .object({
    indent: z.number().int().min(0).max(10).nullable().optional(),
    sortKeys: z.boolean().optional(),
  })
  .strict();

export type LoadOptions = z.input<typeof LoadOptionsSchema>;
export type DirectoryLoadOptions = z.input<typeof DirectoryLoadOptionsSchema>;
export type SaveOptions = z.input<typeof SaveOptionsSchema>;

export interface ResolvedLoadOptions {
  baseDir: string | undefined;
  maxSize: number;
}

export interface ResolvedDirectoryLoadOptions extends ResolvedLoadOptions {
  pattern: string;
}

export interface ResolvedSaveOptions {
  indent: number | null;
  sortKeys: boolean;
}

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const where = issue.path.length > 0 ? `${issue.path.join(".")}: ` : "";
    return `${where}${issue.message}`;
  });
}

function parseWith<S extends z.ZodTypeAny>(schema: S, input: unknown): z.output<S> {
  const result = schema.safeParse(input ?? {});
  if (!result.success) {
    throw new ConfigError(formatIssues(result.error), { cause: result.error });
  }
  return result.data;
}

/**
 * Validate file loader options and apply defaults
 * @throws {ConfigError} If an option is invalid
 */
export function resolveLoadOptions(input?: LoadOptions): ResolvedLoadOptions {
  const parsed = parseWith(LoadOptionsSchema, input);
  return {
    baseDir: parsed.baseDir,
    maxSize: parsed.maxSize ?? defaultMaxSize(),
  };
}

/**
 * Validate directory loader options and apply defaults
 * @throws {ConfigError} If an option is invalid
 */
export function resolveDirectoryLoadOptions(
  input?: DirectoryLoadOptions
): ResolvedDirectoryLoadOptions {
  const parsed = parseWith(DirectoryLoadOptionsSchema, input);
  return {
    baseDir: parsed.baseDir,
    maxSize: parsed.maxSize ?? defaultMaxSize(),
    pattern: parsed.pattern ?? DEFAULT_PATTERN,
  };
}

/**
 * Validate persister options and apply defaults
 * @throws {ConfigError} If an option is invalid
 */
export function resolveSaveOptions(input?: SaveOptions): ResolvedSaveOptions {
  const parsed = parseWith(SaveOptionsSchema, input);
  return {
    indent: parsed.indent === undefined ? 2 : parsed.indent,
    sortKeys: parsed.sortKeys ?? false,
  };
}
