/**
 * Message types for eml-attachment-extractor
 */

/**
 * Parsed message headers.
 *
 * Keys are lowercased header names. Values are unfolded and read as
 * UTF-8; RFC 2047 encoded words are left in place (see decodeHeaderText).
 */
export type Headers = Map<string, string | string[]>;

/**
 * Parsed Content-Type header
 */
export interface ContentType {
  /** Top-level media type (e.g., "multipart", "application") */
  type: string;
  /** Media subtype (e.g., "mixed", "pdf") */
  subtype: string;
  /** Parameters (e.g., charset, boundary, name) */
  params: Record<string, string>;
}

/**
 * Content-Disposition values recognised by the decoder
 */
export type DispositionType = 'attachment' | 'inline' | 'form-data';

/**
 * Parsed Content-Disposition header
 */
export interface ContentDisposition {
  /** Disposition type, lowercased */
  type: DispositionType | string;
  /** Parameters; RFC 2231 extended values are already collapsed and decoded */
  params: Record<string, string>;
}

/**
 * A node in the parsed message tree.
 *
 * Constructed once per input file by the decoder and never mutated.
 */
export interface MessagePart {
  /** Part headers */
  readonly headers: Headers;
  /** Content type information */
  readonly contentType: ContentType;
  /** Content-Disposition type, when the header is present */
  readonly contentDisposition?: string;
  /** Raw filename header value (Content-Disposition filename, else Content-Type name) */
  readonly rawFilenameHeader?: string;
  /** Content transfer encoding, lowercased */
  readonly encoding: string;
  /** Decoded binary body; absent for containers */
  readonly payload?: Buffer;
  /** Child parts (multipart containers and embedded messages) */
  readonly children: readonly MessagePart[];
}

/**
 * An attachment found while walking a message
 */
export interface Attachment {
  /** Decoded, unsanitized filename */
  filename: string;
  /** Attachment bytes */
  payload: Buffer;
  /** The part the attachment was taken from */
  part: MessagePart;
}
