/**
 * Extraction Pipeline Module
 *
 * @packageDocumentation
 */

export { sanitizeName, splitExtension, extensionLabel } from './sanitize.js';
export { readFileBytes, ensureDirectory, candidatePath, writeUniqueFile } from './file-writer.js';
export { extractOne } from './extractor.js';
export type { PipelineContext } from './extractor.js';
export { ExtractionSession, extractBatch, summarize } from './batch.js';
export type { FileProgress } from './batch.js';
export {
  discoverMessageFiles,
  defaultOutputRoot,
  buildRequests,
  MESSAGE_FILE_EXTENSION,
} from './inputs.js';
export type { DiscoverOptions, RequestOptions } from './inputs.js';
