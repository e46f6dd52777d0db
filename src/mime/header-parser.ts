/**
 * MIME Header Parser
 *
 * Parses MIME message headers including:
 * - Folded headers (RFC 5322)
 * - Encoded words (RFC 2047)
 * - Parameter value continuations and charsets (RFC 2231)
 *
 * @packageDocumentation
 */

import { base64Decode } from '../encoding/base64.js';
import { qEncodingDecode } from '../encoding/quoted-printable.js';
import { decodeStrict, decodeWithCharset, normalizeCharset } from '../encoding/charset.js';
import type { ContentDisposition, ContentType, Headers } from '../types/message.js';

/**
 * RFC 2047 encoded word: =?charset?encoding?encoded_text?=
 */
const ENCODED_WORD_PATTERN = /=\?([^?\s]+)\?([BbQq])\?([^?\s]*)\?=/g;

/**
 * A header field line: printable ASCII name (no colon) followed by ':'
 */
const HEADER_FIELD_PATTERN = /^[\x21-\x39\x3b-\x7e]+[ \t]*:/;

interface EncodedChunk {
  charset: string;
  /** Decoded bytes of each word in the run */
  words: Buffer[];
}

/**
 * Decodes header text that may contain RFC 2047 encoded words
 *
 * Adjacent encoded words are joined without the whitespace between them,
 * and consecutive words in the same charset are decoded as one byte run,
 * so a multi-byte character split across two words survives. When the run
 * is not valid as a whole, each word is decoded on its own.
 *
 * @param value - Header value, or undefined when the header is absent
 * @returns Decoded text ("" for an absent header)
 */
export function decodeHeaderText(value: string | undefined): string {
  if (value === undefined) return '';

  let result = '';
  let pending: EncodedChunk | undefined;
  let lastIndex = 0;

  const flush = (): void => {
    if (pending) {
      result += decodeRun(pending);
      pending = undefined;
    }
  };

  for (const match of value.matchAll(ENCODED_WORD_PATTERN)) {
    const [word, charset, encoding, encodedText] = match;
    const start = match.index ?? 0;
    const between = value.substring(lastIndex, start);
    lastIndex = start + word.length;

    // Whitespace between two encoded words is not part of the text
    if (between.length > 0 && !(pending && /^[ \t\r\n]*$/.test(between))) {
      flush();
      result += between;
    }

    const bytes = encoding.toUpperCase() === 'B' ? base64Decode(encodedText) : qEncodingDecode(encodedText);
    const normalized = charset.toLowerCase();
    if (pending && pending.charset === normalized) {
      pending.words.push(bytes);
    } else {
      flush();
      pending = { charset: normalized, words: [bytes] };
    }
  }

  flush();
  return result + value.substring(lastIndex);
}

function decodeRun(run: EncodedChunk): string {
  const joined = Buffer.concat(run.words);
  if (run.words.length === 1 || normalizeCharset(run.charset) === undefined) {
    return decodeWithCharset(joined, run.charset);
  }
  return decodeStrict(joined, run.charset) ?? run.words.map(word => decodeWithCharset(word, run.charset)).join('');
}

/**
 * Unfolds folded headers (RFC 5322)
 * Folded headers have CRLF followed by whitespace
 *
 * @param headerBlock - Raw header block with potential folding
 * @returns Unfolded header block
 */
export function unfoldHeaders(headerBlock: string): string {
  // Also handle bare LF for compatibility
  return headerBlock
    .replace(/\r\n[ \t]+/g, ' ')
    .replace(/\n[ \t]+/g, ' ');
}

/**
 * Tests whether a line starts a header field
 */
export function isHeaderField(line: string): boolean {
  return HEADER_FIELD_PATTERN.test(line);
}

/**
 * Parses a header block into key-value pairs
 *
 * Values are unfolded and trimmed; encoded words are left in place
 * (see decodeHeaderText).
 *
 * @param headerBlock - Raw header block (headers separated by CRLF)
 * @returns Map of lowercased header names to values
 */
export function parseHeaders(headerBlock: string): Headers {
  const headers: Headers = new Map();

  const lines = unfoldHeaders(headerBlock).split(/\r?\n/);

  for (const line of lines) {
    if (!line.trim()) continue;
    if (!isHeaderField(line)) continue;

    const colonIndex = line.indexOf(':');
    const name = line.substring(0, colonIndex).trim().toLowerCase();
    const value = line.substring(colonIndex + 1).trim();

    // Handle multiple values for the same header
    const existing = headers.get(name);
    if (existing !== undefined) {
      if (Array.isArray(existing)) {
        existing.push(value);
      } else {
        headers.set(name, [existing, value]);
      }
    } else {
      headers.set(name, value);
    }
  }

  return headers;
}

/**
 * Returns the first value of a header
 */
export function getHeader(headers: Headers, name: string): string | undefined {
  const value = headers.get(name.toLowerCase());
  return Array.isArray(value) ? value[0] : value;
}

/**
 * Removes surrounding quotes and backslash escapes from a parameter value
 */
function unquote(value: string): string {
  const trimmed = value.trim();
  if (trimmed.length >= 2 && trimmed.startsWith('"') && trimmed.endsWith('"')) {
    return trimmed.slice(1, -1).replace(/\\(.)/g, '$1');
  }
  return trimmed;
}

/**
 * Splits "value; a=1; b="x; y"" into its leading value and raw parameters,
 * honouring quoted strings and backslash escapes
 */
function splitParams(headerValue: string): { value: string; params: Array<[string, string]> } {
  const segments: string[] = [];
  let current = '';
  let quoted = false;

  for (let i = 0; i < headerValue.length; i++) {
    const char = headerValue[i];
    if (quoted && char === '\\' && i + 1 < headerValue.length) {
      current += char + headerValue[++i];
    } else if (char === ';' && !quoted) {
      segments.push(current);
      current = '';
    } else {
      if (char === '"') quoted = !quoted;
      current += char;
    }
  }
  segments.push(current);

  const params: Array<[string, string]> = [];
  for (const segment of segments.slice(1)) {
    const eqIndex = segment.indexOf('=');
    if (eqIndex === -1) continue;
    const name = segment.substring(0, eqIndex).trim().toLowerCase();
    if (name) {
      params.push([name, unquote(segment.substring(eqIndex + 1))]);
    }
  }

  return { value: unquote(segments[0]), params };
}

interface ParamSection {
  index: number;
  extended: boolean;
  value: string;
}

/**
 * Percent-decodes an RFC 2231 extended value to bytes
 */
function percentDecode(value: string): Buffer {
  const bytes: number[] = [];
  for (let i = 0; i < value.length; i++) {
    const hex = value.substring(i + 1, i + 3);
    if (value[i] === '%' && /^[0-9A-Fa-f]{2}$/.test(hex)) {
      bytes.push(parseInt(hex, 16));
      i += 2;
    } else {
      bytes.push(...Buffer.from(value[i], 'utf-8'));
    }
  }
  return Buffer.from(bytes);
}

/**
 * Collapses RFC 2231 parameter sections (name*, name*0, name*1*, ...)
 * into plain name/value pairs. An extended value wins over a plain one.
 */
function collapseParams(raw: Array<[string, string]>): Record<string, string> {
  const params: Record<string, string> = {};
  const sections = new Map<string, ParamSection[]>();

  for (const [name, value] of raw) {
    const match = name.match(/^([^*]+)\*(?:(\d+)(\*)?)?$/);
    if (!match) {
      params[name] = value;
      continue;
    }
    const [, base, index, star] = match;
    const list = sections.get(base) ?? [];
    list.push({
      index: index === undefined ? 0 : Number(index),
      // "name*" alone is extended; "name*N" only with a trailing star
      extended: index === undefined || star === '*',
      value,
    });
    sections.set(base, list);
  }

  for (const [base, list] of sections) {
    list.sort((a, b) => a.index - b.index);
    if (!list.some(section => section.extended)) {
      params[base] = list.map(section => section.value).join('');
      continue;
    }

    let charset = 'utf-8';
    const chunks: Buffer[] = [];

    list.forEach((section, position) => {
      let value = section.value;
      if (section.extended && position === 0) {
        const parts = value.split("'");
        if (parts.length >= 3) {
          charset = parts[0] || 'utf-8';
          value = parts.slice(2).join("'");
        }
      }
      chunks.push(section.extended ? percentDecode(value) : Buffer.from(value, 'utf-8'));
    });

    params[base] = decodeWithCharset(Buffer.concat(chunks), charset);
  }

  return params;
}

/**
 * Parses parameters of a structured header value
 *
 * @param headerValue - Full header value with parameters
 * @returns Leading value and decoded parameters (names lowercased)
 */
export function parseHeaderParams(headerValue: string): { value: string; params: Record<string, string> } {
  const { value, params } = splitParams(headerValue);
  return { value, params: collapseParams(params) };
}

/**
 * Extracts a specific parameter from a header value
 * e.g., from "multipart/mixed; boundary=abc" extracts "abc"
 *
 * @param headerValue - Full header value with parameters
 * @param paramName - Parameter name to extract
 * @returns Parameter value or undefined
 */
export function extractHeaderParam(headerValue: string, paramName: string): string | undefined {
  return parseHeaderParams(headerValue).params[paramName.toLowerCase()];
}

/**
 * Parses a Content-Type header value
 *
 * A missing or unparseable type defaults to text/plain (RFC 2045 section 5.2).
 *
 * @param contentType - Content-Type header value
 * @returns Parsed type, subtype, and parameters
 */
export function parseContentType(contentType: string | undefined): ContentType {
  const { value, params } = parseHeaderParams(contentType ?? '');
  const match = value.toLowerCase().match(/^([^\s/]+)\s*\/\s*([^\s]+)$/);

  if (!match) {
    return { type: 'text', subtype: 'plain', params };
  }
  return { type: match[1], subtype: match[2], params };
}

/**
 * Parses a Content-Disposition header value
 *
 * @param disposition - Content-Disposition header value
 * @returns Disposition type (lowercased) and parameters
 */
export function parseContentDisposition(disposition: string): ContentDisposition {
  const { value, params } = parseHeaderParams(disposition);
  return { type: value.toLowerCase(), params };
}
