/**
 * Single-message extraction
 *
 * @packageDocumentation
 */

import * as path from 'path';
import { collectAttachments, getSubject, parseMessage } from '../mime/message-decoder.js';
import { ensureDirectory, readFileBytes, writeUniqueFile } from './file-writer.js';
import { extensionLabel, sanitizeName } from './sanitize.js';
import { silentLogger } from '../logging/logger.js';
import { resolveOptions } from '../types/config.js';
import { ExtractorError } from '../types/errors.js';
import type { ExtractorOptions, LogSink } from '../types/config.js';
import type { ExtractionRequest, ExtractionResult } from '../types/extraction.js';

/**
 * Naming options and log sink for the pipeline
 */
export interface PipelineContext {
  /** Naming options; layout flags come from the request */
  options?: Partial<Omit<ExtractorOptions, 'createSubjectSubfolder' | 'classifyByExtension'>>;
  /** Log sink (default: silent) */
  logger?: LogSink;
}

/**
 * Extracts the attachments of one message file
 *
 * Never throws: parse and file-system failures are returned in
 * `error`/`errorCode` with an empty `writtenPaths`. Files written before a
 * failure stay on disk.
 *
 * @param request - What to extract and where
 * @param context - Naming options and logger
 * @returns Written paths in traversal order, or the error
 */
export function extractOne(request: ExtractionRequest, context: PipelineContext = {}): ExtractionResult {
  const logger = context.logger ?? silentLogger;
  const written: string[] = [];

  try {
    const options = resolveOptions(context.options);
    const root = parseMessage(readFileBytes(request.sourcePath));

    const subject = getSubject(root) || path.parse(request.sourcePath).name;
    const baseDir = request.createSubjectSubfolder
      ? path.join(request.outputRoot, sanitizeName(subject, options))
      : request.outputRoot;
    ensureDirectory(baseDir);

    for (const attachment of collectAttachments(root)) {
      const filename = sanitizeName(attachment.filename, options);
      const targetDir = request.classifyByExtension
        ? path.join(baseDir, extensionLabel(filename, options.otherExtensionLabel))
        : baseDir;
      ensureDirectory(targetDir);

      const target = writeUniqueFile(targetDir, filename, attachment.payload);
      written.push(target);
      logger.debug(`  wrote ${target}`, { bytes: attachment.payload.length });
    }

    return { writtenPaths: written, subject };
  } catch (err) {
    const error = err instanceof Error ? err : new Error(String(err));
    if (written.length > 0) {
      logger.warn(`  ${written.length} file(s) from ${request.sourcePath} were written before the failure`, {
        writtenPaths: written,
      });
    }
    return {
      writtenPaths: [],
      error: error.message,
      errorCode: error instanceof ExtractorError ? error.code : 'UNKNOWN_ERROR',
    };
  }
}
