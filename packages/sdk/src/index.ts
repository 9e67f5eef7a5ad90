/**
 * docpath SDK
 *
 * Path-addressable nested documents: dot-path access, glob path matching,
 * cached leaf enumeration, list queries, deep merge and leaf diffs
 */

// Re-export types
export type {
  Scalar,
  DocumentMap,
  DocumentList,
  DocumentValue,
  PathSegment,
  FlatEntry,
  ValueChange,
  DiffResult,
  ValueTypeName,
  ValueDescription,
  Description,
  DocumentStats,
  ValuePredicate,
  LeafPredicate,
  LeafTransform,
  PathTransform,
  KeyTransform,
} from "./types.js";

// Document facade
export { Document } from "./document.js";
export type { DocumentOptions, DocumentLike } from "./document.js";

// Path parsing and tree primitives
export { SEPARATOR, parsePath, tryParsePath, isIndexToken, joinPath } from "./path.js";
export {
  isMap,
  isList,
  isScalar,
  typeName,
  cloneValue,
  toDocumentValue,
  valuesEqual,
} from "./node.js";
export {
  getPath,
  setPath,
  deletePath,
  hasPath,
  deepMerge,
  diffDocuments,
  documentsEqual,
} from "./navigator.js";
export { flattenEntries, matchSegments, compilePattern, walkTree } from "./enumerate.js";
export type { TreeVisitor } from "./enumerate.js";

// Queries
export { QueryPipeline, fieldOf, compareValues, MISSING_GROUP } from "./query.js";
export type { ItemPredicate, SortKey, GroupKey } from "./query.js";

// Cache
export { PathCache } from "./cache.js";
export type { PathCacheStats } from "./cache.js";

// Formatting, configuration and I/O
export { stableStringify, formatDocument } from "./format.js";
export type { FormatOptions } from "./format.js";
export {
  resolveLoadOptions,
  resolveDirectoryLoadOptions,
  resolveSaveOptions,
  DEFAULT_MAX_SIZE,
  DEFAULT_PATTERN,
} from "./config.js";
export type { LoadOptions, DirectoryLoadOptions, SaveOptions } from "./config.js";
export {
  loadFile,
  loadDirectory,
  saveFile,
  atomicWrite,
  ensureDirectory,
  parseDocument,
} from "./io.js";

// Observability
export { logger } from "./observability/logs.js";
export type { LogLevel, LogEntry } from "./observability/logs.js";
export { metrics } from "./observability/metrics.js";
export type { PathCacheMetrics } from "./observability/metrics.js";

// Errors
export {
  DocPathError,
  PathError,
  EmptyPathError,
  EmptySegmentError,
  PathTypeConflictError,
  CircularReferenceError,
  UnsupportedValueError,
  NotAMapError,
  ConfigError,
  LoadError,
  DocumentNotFoundError,
  AccessDeniedError,
  DocumentTooLargeError,
  DocumentParseError,
  DocumentWriteError,
  DirectoryError,
} from "./errors.js";
