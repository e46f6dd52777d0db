/**
 * MIME Multipart Parser
 *
 * Handles multipart boundary detection and part extraction per RFC 2046.
 *
 * Raw content is carried as latin1 strings (one code unit per byte) so
 * that binary bodies survive the split untouched; header blocks are read
 * as UTF-8 before they are parsed.
 *
 * @packageDocumentation
 */

import {
  getHeader,
  isHeaderField,
  parseContentDisposition,
  parseContentType,
  parseHeaders,
} from './header-parser.js';
import { base64Decode } from '../encoding/base64.js';
import { quotedPrintableDecode } from '../encoding/quoted-printable.js';
import { decodeWithCharset, latin1Bytes } from '../encoding/charset.js';
import { MalformedMessageError } from '../types/errors.js';
import type { MessagePart } from '../types/message.js';

/**
 * Nesting limit for multiparts and embedded messages
 */
export const MAX_PART_DEPTH = 64;

/**
 * Splits raw content at the end of its header section
 *
 * The header section ends at the first empty line, or at the first line
 * that is neither a header field nor a continuation line.
 *
 * @param raw - Raw part content (latin1)
 * @returns Header block and body
 */
export function splitHeaderAndBody(raw: string): { headerBlock: string; body: string } {
  let lineStart = 0;

  while (lineStart < raw.length) {
    let lineEnd = raw.indexOf('\n', lineStart);
    if (lineEnd === -1) lineEnd = raw.length;
    const line = raw.substring(lineStart, lineEnd).replace(/\r$/, '');

    if (line === '') {
      return { headerBlock: raw.substring(0, lineStart), body: raw.substring(lineEnd + 1) };
    }
    const continuation = lineStart > 0 && /^[ \t]/.test(line);
    if (!continuation && !isHeaderField(line)) {
      return { headerBlock: raw.substring(0, lineStart), body: raw.substring(lineStart) };
    }
    lineStart = lineEnd + 1;
  }

  return { headerBlock: raw, body: '' };
}

/**
 * Removes the line break that belongs to the following delimiter
 */
function trimDelimiterBreak(content: string): string {
  if (content.endsWith('\r\n')) return content.slice(0, -2);
  if (content.endsWith('\n')) return content.slice(0, -1);
  return content;
}

/**
 * Splits a multipart body into individual parts
 *
 * Delimiters are only recognised at the start of a line. The preamble and
 * epilogue are dropped; a body without a closing delimiter keeps its last
 * part.
 *
 * @param body - Raw multipart body
 * @param boundary - Boundary string (without --)
 * @returns Array of raw part strings
 */
export function splitMultipartBody(body: string, boundary: string): string[] {
  const parts: string[] = [];
  const delimiter = `--${boundary}`;
  let partStart = -1;
  let lineStart = 0;

  while (lineStart <= body.length) {
    let lineEnd = body.indexOf('\n', lineStart);
    if (lineEnd === -1) lineEnd = body.length;

    if (body.startsWith(delimiter, lineStart)) {
      const rest = body.substring(lineStart + delimiter.length, lineEnd).replace(/\r$/, '');
      const closing = rest.startsWith('--');

      // Anything but transport padding after the boundary means a longer boundary
      if (closing || rest.trim() === '') {
        if (partStart !== -1) {
          const partContent = trimDelimiterBreak(body.substring(partStart, lineStart));
          if (partContent.length > 0) parts.push(partContent);
        }
        if (closing) return parts;
        partStart = lineEnd + 1;
      }
    }

    lineStart = lineEnd + 1;
  }

  if (partStart !== -1 && partStart < body.length) {
    parts.push(body.substring(partStart));
  }

  return parts;
}

/**
 * Decodes content based on Content-Transfer-Encoding
 *
 * @param content - Raw content (latin1)
 * @param encoding - Content-Transfer-Encoding value
 * @returns Decoded bytes
 */
export function decodeContent(content: string, encoding: string): Buffer {
  switch (encoding.toLowerCase()) {
    case 'base64':
      return base64Decode(content);
    case 'quoted-printable':
      return quotedPrintableDecode(content);
    case '7bit':
    case '8bit':
    case 'binary':
    default:
      return latin1Bytes(content);
  }
}

/**
 * Parses a single MIME part (headers + body) and its descendants
 *
 * @param rawPart - Raw part content (latin1)
 * @param depth - Current nesting depth
 * @returns Parsed part tree
 * @throws MalformedMessageError on a root multipart without boundary or excessive nesting
 */
export function parsePart(rawPart: string, depth: number = 0): MessagePart {
  if (depth > MAX_PART_DEPTH) {
    throw new MalformedMessageError(`Parts nested deeper than ${MAX_PART_DEPTH} levels`, rawPart);
  }

  const { headerBlock, body } = splitHeaderAndBody(rawPart);
  const headers = parseHeaders(decodeWithCharset(latin1Bytes(headerBlock), 'utf-8'));

  const contentType = parseContentType(getHeader(headers, 'content-type'));
  const encoding = (getHeader(headers, 'content-transfer-encoding') ?? '7bit').toLowerCase();

  const dispositionHeader = getHeader(headers, 'content-disposition');
  const disposition = dispositionHeader === undefined ? undefined : parseContentDisposition(dispositionHeader);
  const rawFilenameHeader = disposition?.params['filename'] ?? contentType.params['name'];

  const base = {
    headers,
    contentType,
    contentDisposition: disposition?.type || undefined,
    rawFilenameHeader,
    encoding,
  };

  if (contentType.type === 'multipart') {
    const boundary = contentType.params['boundary'];
    if (!boundary) {
      if (depth === 0) {
        throw new MalformedMessageError(`multipart/${contentType.subtype} message has no boundary parameter`, headerBlock);
      }
      // An inner part without a boundary cannot be split; keep its body
      return { ...base, payload: decodeContent(body, encoding), children: [] };
    }
    const children = splitMultipartBody(body, boundary).map(p => parsePart(p, depth + 1));
    return { ...base, children };
  }

  if (contentType.type === 'message' && contentType.subtype === 'rfc822') {
    const inner = encoding === 'base64' || encoding === 'quoted-printable'
      ? decodeContent(body, encoding).toString('latin1')
      : body;
    return { ...base, children: [parsePart(inner, depth + 1)] };
  }

  return { ...base, payload: decodeContent(body, encoding), children: [] };
}
