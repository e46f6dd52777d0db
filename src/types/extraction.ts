/**
 * Extraction request and result types
 */

/**
 * One unit of work: a single message file and where to put its attachments
 */
export interface ExtractionRequest {
  /** Path to a single message-container file */
  readonly sourcePath: string;
  /** Destination directory (created lazily) */
  readonly outputRoot: string;
  /** Group attachments under a folder named after the message subject */
  readonly createSubjectSubfolder: boolean;
  /** Group attachments under a folder named after their extension */
  readonly classifyByExtension: boolean;
}

/**
 * Outcome of one ExtractionRequest
 */
export interface ExtractionResult {
  /** Written file paths in traversal order; empty on error */
  writtenPaths: string[];
  /** Error description, when the request failed */
  error?: string;
  /** Error code of the failure (e.g. "PARSE_ERROR") */
  errorCode?: string;
  /** Decoded message subject, when the message could be parsed */
  subject?: string;
}

/**
 * A request paired with its result
 */
export interface BatchEntry {
  request: ExtractionRequest;
  result: ExtractionResult;
}

/**
 * Aggregate counts for a batch
 */
export interface BatchSummary {
  /** Requests processed (each input exactly once) */
  total: number;
  /** Requests without an error, including messages without attachments */
  succeeded: number;
  /** Requests with an error */
  failed: number;
  /** Requests that produced at least one file */
  withAttachments: number;
  /** Written files across all results */
  attachments: number;
  /** True when the batch stopped early on cancel() */
  cancelled: boolean;
}

/**
 * Result of a whole batch
 */
export interface BatchResult {
  entries: BatchEntry[];
  summary: BatchSummary;
}
