/**
 * The extract command: discovers inputs, runs the batch and prints results
 */

import * as path from 'path';
import { ExtractionSession } from '../extraction/batch.js';
import { buildRequests, discoverMessageFiles } from '../extraction/inputs.js';
import { Logger } from '../logging/logger.js';
import type { ExtractCommandOptions } from './program.js';

export const EXIT_OK = 0;
export const EXIT_FAILURES = 1;
export const EXIT_USAGE = 2;

/**
 * Runs the extract command
 *
 * @param inputs - File and directory arguments
 * @param options - Parsed command options
 * @param logger - Output sink (default: console logger built from options)
 * @returns Process exit code
 */
export function runExtract(
  inputs: string[],
  options: ExtractCommandOptions,
  logger: Logger = new Logger({ quiet: options.quiet, verbose: options.verbose, json: options.json })
): number {
  let sources: string[];
  try {
    sources = discoverMessageFiles(inputs, { recursive: options.recursive });
  } catch (err) {
    logger.error('Error: cannot read inputs', err);
    return EXIT_USAGE;
  }

  if (sources.length === 0) {
    logger.error('Error: no .eml files found');
    return EXIT_USAGE;
  }

  const requests = buildRequests(sources, {
    outputRoot: options.output,
    createSubjectSubfolder: options.subfolder,
    classifyByExtension: options.classify,
  });
  const outputRoot = requests[0].outputRoot;

  const session = new ExtractionSession({ logger });
  session.on('file', ({ index, total, request, result }) => {
    if (result.error === undefined) {
      logger.info(`✓ [${index + 1}/${total}] ${path.basename(request.sourcePath)}: ${result.writtenPaths.length} attachment(s)`, {
        writtenPaths: result.writtenPaths,
      });
    } else {
      logger.error(`✗ [${index + 1}/${total}] ${path.basename(request.sourcePath)}: ${result.error} (${result.errorCode})`);
    }
  });

  const { summary } = session.run(requests);

  // The summary is printed even in quiet mode
  const line = `Done: ${summary.succeeded} succeeded, ${summary.failed} failed, ${summary.attachments} attachment(s) extracted to ${outputRoot}`;
  if (options.json) {
    console.log(JSON.stringify({ level: 'info', message: 'summary', outputRoot, ...summary }));
  } else {
    console.log(line);
  }

  return summary.failed > 0 ? EXIT_FAILURES : EXIT_OK;
}
