/**
 * Error types for eml-attachment-extractor
 */

/**
 * Error source categories
 */
export type ErrorSource = 'parse' | 'filesystem' | 'input';

/**
 * File system operations that can fail during extraction
 */
export type FileSystemOperation = 'read' | 'mkdir' | 'write';

/**
 * Base extractor error class
 */
export class ExtractorError extends Error {
  /** Error code */
  code: string;
  /** Error source category */
  source: ErrorSource;

  constructor(message: string, code: string, source: ErrorSource) {
    super(message);
    this.name = 'ExtractorError';
    this.code = code;
    this.source = source;
    // Maintains proper stack trace for where error was thrown
    Error.captureStackTrace?.(this, this.constructor);
  }
}

/**
 * Source bytes could not be parsed as a message container
 */
export class MalformedMessageError extends ExtractorError {
  override source: 'parse' = 'parse';
  /** Leading excerpt of the data that failed to parse */
  rawData: string;

  constructor(message: string, rawData: string) {
    super(message, 'PARSE_ERROR', 'parse');
    this.name = 'MalformedMessageError';
    this.rawData = rawData.slice(0, 200);
  }
}

/**
 * Directory creation, file read or file write failure
 */
export class FileSystemError extends ExtractorError {
  override source: 'filesystem' = 'filesystem';
  /** Path the operation was applied to */
  path: string;
  /** Failed operation */
  operation: FileSystemOperation;
  /** errno code of the underlying failure (e.g. EACCES), if any */
  errno?: string;

  constructor(message: string, path: string, operation: FileSystemOperation, cause?: Error) {
    super(message, 'FILESYSTEM_ERROR', 'filesystem');
    this.name = 'FileSystemError';
    this.path = path;
    this.operation = operation;
    if (cause) {
      this.cause = cause;
      if ('code' in cause && typeof cause.code === 'string') {
        this.errno = cause.code;
      }
    }
  }
}

/**
 * Caller supplied an unusable request or option
 */
export class InvalidRequestError extends ExtractorError {
  override source: 'input' = 'input';

  constructor(message: string) {
    super(message, 'INPUT_ERROR', 'input');
    this.name = 'InvalidRequestError';
  }
}

/**
 * Wraps an unknown thrown value from a Node.js fs call
 */
export function toFileSystemError(
  err: unknown,
  path: string,
  operation: FileSystemOperation
): FileSystemError {
  if (err instanceof FileSystemError) return err;
  const cause = err instanceof Error ? err : new Error(String(err));
  return new FileSystemError(`Failed to ${operation} ${path}: ${cause.message}`, path, operation, cause);
}
