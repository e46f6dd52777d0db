/**
 * Path component naming rules
 *
 * @packageDocumentation
 */

import { DEFAULT_EXTRACTOR_OPTIONS, ILLEGAL_NAME_CHARS } from '../types/config.js';
import type { ExtractorOptions } from '../types/config.js';

type NamingOptions = Pick<ExtractorOptions, 'maxNameLength' | 'placeholderName' | 'replacementChar'>;

/**
 * Makes a string safe to use as a single file or folder name
 *
 * Illegal characters (< > : " / \ | ? *) become the replacement character,
 * leading and trailing whitespace and dots are stripped, the result is cut
 * to maxNameLength characters (code points, not bytes) and an empty result
 * becomes the placeholder name.
 *
 * @param name - Decoded subject or filename
 * @param options - Naming options (defaults apply)
 * @returns Sanitized name
 */
export function sanitizeName(name: string, options: Partial<NamingOptions> = {}): string {
  const { maxNameLength, placeholderName, replacementChar } = { ...DEFAULT_EXTRACTOR_OPTIONS, ...options };

  let sanitized = name.replace(ILLEGAL_NAME_CHARS, replacementChar);
  sanitized = sanitized.replace(/^[\s.]+|[\s.]+$/g, '');

  const chars = [...sanitized];
  if (chars.length > maxNameLength) {
    // Cutting can expose a trailing dot or space again
    sanitized = chars.slice(0, maxNameLength).join('').replace(/[\s.]+$/, '');
  }

  return sanitized || placeholderName;
}

/**
 * Splits a file name into stem and extension (with its dot)
 *
 * A leading dot does not start an extension: ".profile" has none.
 *
 * @example
 * splitExtension('report.final.pdf') // { stem: 'report.final', ext: '.pdf' }
 */
export function splitExtension(filename: string): { stem: string; ext: string } {
  const dot = filename.lastIndexOf('.');
  if (dot <= 0 || dot === filename.length - 1) {
    return { stem: filename, ext: '' };
  }
  return { stem: filename.substring(0, dot), ext: filename.substring(dot) };
}

/**
 * Folder label used when classifying by extension: the lowercased
 * extension without its dot, or the fallback label
 */
export function extensionLabel(filename: string, otherLabel: string = DEFAULT_EXTRACTOR_OPTIONS.otherExtensionLabel): string {
  const { ext } = splitExtension(filename);
  return ext ? ext.substring(1).toLowerCase() : otherLabel;
}
