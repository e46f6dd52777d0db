/**
 * Blocking file-system helpers for the extraction pipeline
 *
 * @packageDocumentation
 */

import * as fs from 'fs';
import * as path from 'path';
import { splitExtension } from './sanitize.js';
import { toFileSystemError } from '../types/errors.js';

/**
 * Reads a whole file
 *
 * @throws FileSystemError
 */
export function readFileBytes(filePath: string): Buffer {
  try {
    return fs.readFileSync(filePath);
  } catch (err) {
    throw toFileSystemError(err, filePath, 'read');
  }
}

/**
 * Creates a directory and its missing ancestors; an existing directory
 * is left as it is
 *
 * @throws FileSystemError
 */
export function ensureDirectory(dirPath: string): void {
  try {
    fs.mkdirSync(dirPath, { recursive: true });
  } catch (err) {
    throw toFileSystemError(err, dirPath, 'mkdir');
  }
}

/**
 * Candidate path for the n-th collision: name.ext, name_1.ext, name_2.ext, ...
 */
export function candidatePath(dir: string, filename: string, counter: number): string {
  if (counter === 0) return path.join(dir, filename);
  const { stem, ext } = splitExtension(filename);
  return path.join(dir, `${stem}_${counter}${ext}`);
}

/**
 * Writes bytes to a new file in dir, never touching an existing one
 *
 * Each candidate is opened with O_CREAT | O_EXCL ("wx"); on EEXIST the next
 * suffix is tried. The counter only grows, so the search ends after at most
 * one attempt per file already present with the same stem and extension.
 *
 * @param dir - Target directory (must exist)
 * @param filename - Sanitized file name
 * @param payload - Bytes to write
 * @returns Path of the written file
 * @throws FileSystemError on any failure other than a name collision
 */
export function writeUniqueFile(dir: string, filename: string, payload: Uint8Array): string {
  for (let counter = 0; ; counter++) {
    const target = candidatePath(dir, filename, counter);
    try {
      fs.writeFileSync(target, payload, { flag: 'wx' });
      return target;
    } catch (err) {
      if (isAlreadyExists(err)) continue;
      throw toFileSystemError(err, target, 'write');
    }
  }
}

function isAlreadyExists(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'EEXIST';
}
