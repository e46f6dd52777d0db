/**
 * Content decoding utilities for message parsing
 *
 * Implements base64, quoted-printable and charset decoding using only
 * Node.js built-ins.
 *
 * @packageDocumentation
 */

export { base64Decode } from './base64.js';
export { quotedPrintableDecode, qEncodingDecode } from './quoted-printable.js';
export { decodeWithCharset, decodeStrict, normalizeCharset, latin1Bytes } from './charset.js';
