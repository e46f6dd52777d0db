/**
 * Input discovery and request construction
 *
 * @packageDocumentation
 */

import * as fs from 'fs';
import * as path from 'path';
import { DEFAULT_EXTRACTOR_OPTIONS } from '../types/config.js';
import { InvalidRequestError, toFileSystemError } from '../types/errors.js';
import type { ExtractionRequest } from '../types/extraction.js';

/**
 * Extension of message files picked up from directories
 */
export const MESSAGE_FILE_EXTENSION = '.eml';

export interface DiscoverOptions {
  /** Descend into subdirectories (default: true) */
  recursive?: boolean;
}

function listMessageFiles(dir: string, recursive: boolean, out: string[]): void {
  let entries: fs.Dirent[];
  try {
    entries = fs.readdirSync(dir, { withFileTypes: true });
  } catch (err) {
    throw toFileSystemError(err, dir, 'read');
  }

  entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
  for (const entry of entries) {
    const full = path.join(dir, entry.name);
    if (entry.isDirectory()) {
      if (recursive) listMessageFiles(full, recursive, out);
    } else if (entry.isFile() && path.extname(entry.name).toLowerCase() === MESSAGE_FILE_EXTENSION) {
      out.push(full);
    }
  }
}

/**
 * Expands a list of files and directories into message file paths
 *
 * Files are taken as given (whatever their extension); directories
 * contribute their *.eml files, sorted by name. The result keeps the first
 * occurrence of each resolved path.
 *
 * @param inputs - File and directory paths
 * @param options - Discovery options
 * @returns Absolute message file paths
 * @throws FileSystemError when an input does not exist or cannot be read
 */
export function discoverMessageFiles(inputs: readonly string[], options: DiscoverOptions = {}): string[] {
  const recursive = options.recursive ?? true;
  const found: string[] = [];

  for (const input of inputs) {
    const resolved = path.resolve(input);
    let stat: fs.Stats;
    try {
      stat = fs.statSync(resolved);
    } catch (err) {
      throw toFileSystemError(err, resolved, 'read');
    }

    if (stat.isDirectory()) {
      listMessageFiles(resolved, recursive, found);
    } else {
      found.push(resolved);
    }
  }

  return [...new Set(found)];
}

/**
 * Output root used when the caller gives none: a fixed-name folder next to
 * the first input file
 */
export function defaultOutputRoot(
  firstInput: string,
  folderName: string = DEFAULT_EXTRACTOR_OPTIONS.defaultOutputFolderName
): string {
  return path.join(path.dirname(path.resolve(firstInput)), folderName);
}

export interface RequestOptions {
  /** Output root; defaults to defaultOutputRoot(first source) */
  outputRoot?: string;
  createSubjectSubfolder?: boolean;
  classifyByExtension?: boolean;
  /** Folder name for the default output root */
  defaultOutputFolderName?: string;
}

/**
 * Builds one request per source path, all sharing the same output root
 * and layout flags
 *
 * @throws InvalidRequestError when sources is empty
 */
export function buildRequests(sources: readonly string[], options: RequestOptions = {}): ExtractionRequest[] {
  if (sources.length === 0) {
    throw new InvalidRequestError('No message files to process');
  }

  const outputRoot = options.outputRoot
    ? path.resolve(options.outputRoot)
    : defaultOutputRoot(sources[0], options.defaultOutputFolderName);

  return sources.map(sourcePath => ({
    sourcePath,
    outputRoot,
    createSubjectSubfolder: options.createSubjectSubfolder ?? DEFAULT_EXTRACTOR_OPTIONS.createSubjectSubfolder,
    classifyByExtension: options.classifyByExtension ?? DEFAULT_EXTRACTOR_OPTIONS.classifyByExtension,
  }));
}
