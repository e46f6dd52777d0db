/**
 * Type exports for eml-attachment-extractor
 */

// Configuration types
export type { ExtractorOptions, LogSink } from './config.js';
export { DEFAULT_EXTRACTOR_OPTIONS, ILLEGAL_NAME_CHARS, resolveOptions } from './config.js';

// Message types
export type {
  Headers,
  ContentType,
  ContentDisposition,
  DispositionType,
  MessagePart,
  Attachment
} from './message.js';

// Extraction types
export type {
  ExtractionRequest,
  ExtractionResult,
  BatchEntry,
  BatchSummary,
  BatchResult
} from './extraction.js';

// Error types
export {
  ExtractorError,
  MalformedMessageError,
  FileSystemError,
  InvalidRequestError,
  toFileSystemError
} from './errors.js';

export type { ErrorSource, FileSystemOperation } from './errors.js';
