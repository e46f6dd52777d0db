/**
 * Configuration types for eml-attachment-extractor
 */

import { InvalidRequestError } from './errors.js';

/**
 * Minimal logging interface the pipeline writes to
 */
export interface LogSink {
  debug(message: string, data?: Record<string, unknown>): void;
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, error?: unknown): void;
}

/**
 * Naming and layout options
 */
export interface ExtractorOptions {
  /** Group attachments under a folder named after the subject (default: true) */
  createSubjectSubfolder: boolean;
  /** Group attachments by lowercased extension (default: false) */
  classifyByExtension: boolean;
  /** Maximum length of a sanitized path component, in characters (default: 200) */
  maxNameLength: number;
  /** Substitute for names that sanitize to nothing (default: "untitled") */
  placeholderName: string;
  /** Folder label for attachments without an extension (default: "other") */
  otherExtensionLabel: string;
  /** Output folder created next to the first input when no root is given */
  defaultOutputFolderName: string;
  /** Replacement for characters that are illegal in file names (default: "_") */
  replacementChar: string;
}

/**
 * Characters that may not appear in a sanitized path component
 */
export const ILLEGAL_NAME_CHARS = /[<>:"/\\|?*]/g;

export const DEFAULT_EXTRACTOR_OPTIONS: Readonly<ExtractorOptions> = {
  createSubjectSubfolder: true,
  classifyByExtension: false,
  maxNameLength: 200,
  placeholderName: 'untitled',
  otherExtensionLabel: 'other',
  defaultOutputFolderName: 'extracted-attachments',
  replacementChar: '_',
};

/**
 * Merges partial options over the defaults and validates the result
 *
 * @throws InvalidRequestError when an option cannot produce legal names
 */
export function resolveOptions(partial: Partial<ExtractorOptions> = {}): ExtractorOptions {
  const options: ExtractorOptions = { ...DEFAULT_EXTRACTOR_OPTIONS, ...partial };

  if (!Number.isInteger(options.maxNameLength) || options.maxNameLength < 1) {
    throw new InvalidRequestError(`maxNameLength must be a positive integer, got ${options.maxNameLength}`);
  }
  if ([...options.replacementChar].length !== 1 || new RegExp(ILLEGAL_NAME_CHARS.source).test(options.replacementChar)) {
    throw new InvalidRequestError(`replacementChar must be a single legal character, got "${options.replacementChar}"`);
  }
  for (const key of ['placeholderName', 'otherExtensionLabel', 'defaultOutputFolderName'] as const) {
    const value = options[key];
    if (!value.trim() || new RegExp(ILLEGAL_NAME_CHARS.source).test(value)) {
      throw new InvalidRequestError(`${key} must be a non-empty legal name, got "${value}"`);
    }
  }

  return options;
}
