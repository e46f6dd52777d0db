/**
 * MIME Parser Module
 *
 * Provides message parsing capabilities including:
 * - Header parsing with RFC 2047 encoded word and RFC 2231 parameter support
 * - Multipart boundary detection and part extraction
 * - Part tree traversal and attachment discovery
 *
 * @packageDocumentation
 */

// Header parsing
export {
  decodeHeaderText,
  parseHeaders,
  unfoldHeaders,
  getHeader,
  isHeaderField,
  parseHeaderParams,
  extractHeaderParam,
  parseContentType,
  parseContentDisposition,
} from './header-parser.js';

// Multipart parsing
export {
  splitHeaderAndBody,
  splitMultipartBody,
  decodeContent,
  parsePart,
  MAX_PART_DEPTH,
} from './multipart-parser.js';

// Message decoding
export {
  parseMessage,
  walkParts,
  collectAttachments,
  getFilename,
  getSubject,
} from './message-decoder.js';
