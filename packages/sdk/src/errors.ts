/**
 * Error types for docpath operations
 *
 * Invariants:
 * - Every error has a stable `name` and `code` for programmatic handling
 * - Every error supports a `cause` for wrapping underlying errors
 * - Absence of a value is never an error; only malformed paths, write conflicts,
 *   invalid input and I/O failures throw
 */

/**
 * Base class for all docpath errors
 */
export abstract class DocPathError extends Error {
  abstract readonly code: string;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = this.constructor.name;
    // Maintain proper stack trace in V8 environments
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/**
 * Base class for malformed paths and write conflicts
 */
export abstract class PathError extends DocPathError {
  constructor(
    public readonly path: string,
    message: string,
    options?: ErrorOptions
  ) {
    super(message, options);
  }
}

/**
 * Thrown when a path is empty or whitespace-only
 */
export class EmptyPathError extends PathError {
  readonly code = "E_PATH_EMPTY";

  constructor(path: string, options?: ErrorOptions) {
    super(path, "Path cannot be empty", options);
  }
}

/**
 * Thrown when a path contains an empty segment (leading, trailing or double dot)
 */
export class EmptySegmentError extends PathError {
  readonly code = "E_PATH_SEGMENT";

  constructor(
    path: string,
    public readonly position: number,
    options?: ErrorOptions
  ) {
    super(path, `Invalid path "${path}": segment ${position} is empty`, options);
  }
}

/**
 * Thrown when a write goes through a node whose type cannot take the next segment
 */
export class PathTypeConflictError extends PathError {
  readonly code = "E_PATH_CONFLICT";

  constructor(path: string, reason: string, options?: ErrorOptions) {
    super(path, `Cannot write "${path}": ${reason}`, options);
  }
}

/**
 * Thrown when input data references itself
 */
export class CircularReferenceError extends DocPathError {
  readonly code = "E_CIRCULAR";

  constructor(public readonly at: string, options?: ErrorOptions) {
    super(`Circular reference detected at ${at || "<root>"}`, options);
  }
}

/**
 * Thrown when input data holds something that is not a map, list or JSON scalar
 */
export class UnsupportedValueError extends DocPathError {
  readonly code = "E_VALUE";

  constructor(
    public readonly at: string,
    public readonly received: string,
    options?: ErrorOptions
  ) {
    super(`Unsupported value at ${at || "<root>"}: ${received}`, options);
  }
}

/**
 * Thrown when a document root is not a map
 */
export class NotAMapError extends DocPathError {
  readonly code = "E_NOT_MAP";

  constructor(public readonly received: string, options?: ErrorOptions) {
    super(`Document root must be a map, received ${received}`, options);
  }
}

/**
 * Thrown when loader or persister options fail validation
 */
export class ConfigError extends DocPathError {
  readonly code = "E_CONFIG";

  constructor(
    public readonly issues: string[],
    options?: ErrorOptions
  ) {
    super(`Invalid options: ${issues.join("; ")}`, options);
  }
}

/**
 * Base class for loader failures
 */
export abstract class LoadError extends DocPathError {
  constructor(
    public readonly filePath: string,
    message: string,
    options?: ErrorOptions
  ) {
    super(message, options);
  }
}

/**
 * Thrown when a file or directory to load does not exist
 */
export class DocumentNotFoundError extends LoadError {
  readonly code = "ENOENT";

  constructor(filePath: string, options?: ErrorOptions) {
    super(filePath, `Document not found: ${filePath}`, options);
  }
}

/**
 * Thrown when a file resolves outside the permitted base directory
 */
export class AccessDeniedError extends LoadError {
  readonly code = "E_ACCESS";

  constructor(
    filePath: string,
    public readonly baseDir: string,
    options?: ErrorOptions
  ) {
    super(filePath, `Access denied: ${filePath} is outside ${baseDir}`, options);
  }
}

/**
 * Thrown when a file exceeds the configured size ceiling
 */
export class DocumentTooLargeError extends LoadError {
  readonly code = "E_TOO_LARGE";

  constructor(
    filePath: string,
    public readonly size: number,
    public readonly maxSize: number,
    options?: ErrorOptions
  ) {
    super(filePath, `Document too large: ${filePath} is ${size} bytes (max ${maxSize})`, options);
  }
}

/**
 * Thrown when a file does not contain valid JSON
 */
export class DocumentParseError extends LoadError {
  readonly code = "E_PARSE";

  constructor(filePath: string, options?: ErrorOptions) {
    super(filePath, `Failed to parse document: ${filePath}`, options);
  }
}

/**
 * Thrown when a document write operation fails
 */
export class DocumentWriteError extends DocPathError {
  readonly code = "WRITE_ERROR";

  constructor(
    public readonly filePath: string,
    options?: ErrorOptions
  ) {
    super(`Failed to write document: ${filePath}`, options);
  }
}

/**
 * Thrown when a directory operation fails
 */
export class DirectoryError extends DocPathError {
  readonly code = "DIRECTORY_ERROR";

  constructor(
    public readonly dirPath: string,
    options?: ErrorOptions
  ) {
    super(`Directory operation failed: ${dirPath}`, options);
  }
}
