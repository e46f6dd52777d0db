/**
 * Batch driver
 *
 * Runs extractOne over a list of requests strictly in order and reports
 * progress through events.
 *
 * @packageDocumentation
 */

import { EventEmitter } from 'events';
import { extractOne } from './extractor.js';
import type { PipelineContext } from './extractor.js';
import { silentLogger } from '../logging/logger.js';
import { resolveOptions } from '../types/config.js';
import type { LogSink } from '../types/config.js';
import type {
  BatchEntry,
  BatchResult,
  BatchSummary,
  ExtractionRequest,
  ExtractionResult,
} from '../types/extraction.js';

/**
 * Progress event payload, emitted once per request
 */
export interface FileProgress {
  /** Zero-based position of the request */
  index: number;
  /** Number of requests in the batch */
  total: number;
  request: ExtractionRequest;
  result: ExtractionResult;
}

/**
 * Counts a batch's entries
 */
export function summarize(entries: readonly BatchEntry[], cancelled: boolean = false): BatchSummary {
  const summary: BatchSummary = {
    total: entries.length,
    succeeded: 0,
    failed: 0,
    withAttachments: 0,
    attachments: 0,
    cancelled,
  };

  for (const { result } of entries) {
    if (result.error !== undefined) {
      summary.failed++;
      continue;
    }
    summary.succeeded++;
    summary.attachments += result.writtenPaths.length;
    if (result.writtenPaths.length > 0) summary.withAttachments++;
  }

  return summary;
}

export interface ExtractionSession {
  on(event: 'start', listener: (total: number) => void): this;
  on(event: 'file', listener: (progress: FileProgress) => void): this;
  on(event: 'done', listener: (summary: BatchSummary) => void): this;
  once(event: 'start', listener: (total: number) => void): this;
  once(event: 'file', listener: (progress: FileProgress) => void): this;
  once(event: 'done', listener: (summary: BatchSummary) => void): this;
}

/**
 * Sequential batch extraction with progress events
 *
 * Events:
 * - `start` (total) before the first request
 * - `file` ({@link FileProgress}) after each request
 * - `done` ({@link BatchSummary}) after the last processed request
 *
 * `cancel()` takes effect between requests; a request already running
 * completes first.
 *
 * @example
 * ```typescript
 * const session = new ExtractionSession();
 * session.on('file', ({ index, total, result }) => {
 *   console.log(`${index + 1}/${total}`, result.error ?? result.writtenPaths);
 * });
 * const { summary } = session.run(requests);
 * ```
 */
export class ExtractionSession extends EventEmitter {
  private readonly context: PipelineContext;
  private readonly logger: LogSink;
  private cancelRequested = false;
  private running = false;

  /**
   * @throws InvalidRequestError when the naming options are unusable
   */
  constructor(context: PipelineContext = {}) {
    super();
    resolveOptions(context.options);
    this.context = context;
    this.logger = context.logger ?? silentLogger;
  }

  /**
   * Whether a batch is in progress
   */
  get isRunning(): boolean {
    return this.running;
  }

  /**
   * Stops the batch before the next request
   */
  cancel(): void {
    this.cancelRequested = true;
  }

  /**
   * Processes the requests in order
   *
   * @param requests - Requests, processed in the given order
   * @returns Every processed request with its result, and the summary
   * @throws Error when the session is already running
   */
  run(requests: readonly ExtractionRequest[]): BatchResult {
    if (this.running) {
      throw new Error('ExtractionSession is already running');
    }
    this.running = true;
    this.cancelRequested = false;

    const entries: BatchEntry[] = [];
    try {
      this.emit('start', requests.length);
      this.logger.debug(`Processing ${requests.length} message file(s)`);

      for (const [index, request] of requests.entries()) {
        if (this.cancelRequested) {
          this.logger.warn(`Cancelled after ${index} of ${requests.length} file(s)`);
          break;
        }

        this.logger.debug(`[${index + 1}/${requests.length}] ${request.sourcePath}`);
        const result = extractOne(request, this.context);
        if (result.error !== undefined) {
          this.logger.debug(`  failed: ${result.error}`, { code: result.errorCode });
        }

        entries.push({ request, result });
        this.emit('file', { index, total: requests.length, request, result });
      }

      const summary = summarize(entries, this.cancelRequested && entries.length < requests.length);
      this.emit('done', summary);
      return { entries, summary };
    } finally {
      this.running = false;
    }
  }
}

/**
 * One-shot batch extraction
 *
 * @param requests - Requests, processed in the given order
 * @param context - Naming options and logger
 */
export function extractBatch(requests: readonly ExtractionRequest[], context: PipelineContext = {}): BatchResult {
  return new ExtractionSession(context).run(requests);
}
