/**
 * Message Decoder
 *
 * Turns the raw bytes of a single-message container (.eml) into a tree of
 * typed parts and finds the attachments inside it.
 *
 * @packageDocumentation
 */

import { decodeHeaderText, getHeader, isHeaderField } from './header-parser.js';
import { parsePart } from './multipart-parser.js';
import { MalformedMessageError } from '../types/errors.js';
import type { Attachment, MessagePart } from '../types/message.js';

/**
 * Parses a raw message into its part tree
 *
 * An mbox "From " envelope line before the headers is skipped.
 *
 * @param raw - Raw message bytes
 * @returns Root part
 * @throws MalformedMessageError when the bytes are not a message
 */
export function parseMessage(raw: Uint8Array): MessagePart {
  let text = Buffer.from(raw.buffer, raw.byteOffset, raw.byteLength).toString('latin1');

  if (text.startsWith('From ')) {
    const newline = text.indexOf('\n');
    text = newline === -1 ? '' : text.substring(newline + 1);
  }

  if (text.trim().length === 0) {
    throw new MalformedMessageError('Message is empty', text);
  }

  const firstLine = text.substring(0, text.search(/\r?\n|$/));
  if (!isHeaderField(firstLine)) {
    throw new MalformedMessageError('Message does not start with a header field', text);
  }

  return parsePart(text);
}

/**
 * Walks the part tree depth-first in document order, yielding every
 * container and leaf exactly once (the root first)
 *
 * @param root - Root part
 */
export function* walkParts(root: MessagePart): Generator<MessagePart> {
  const stack: MessagePart[] = [root];
  while (stack.length > 0) {
    const part = stack.pop();
    if (part === undefined) break;
    yield part;
    for (let i = part.children.length - 1; i >= 0; i--) {
      stack.push(part.children[i]);
    }
  }
}

/**
 * Decoded filename of a part, "" when it has none
 */
export function getFilename(part: MessagePart): string {
  return decodeHeaderText(part.rawFilenameHeader);
}

/**
 * Yields every attachment part in traversal order
 *
 * A part qualifies when its disposition is "attachment", its filename
 * decodes to a non-empty string and its payload is non-empty.
 *
 * @param root - Root part
 */
export function* collectAttachments(root: MessagePart): Generator<Attachment> {
  for (const part of walkParts(root)) {
    if (part.contentDisposition !== 'attachment') continue;

    const filename = getFilename(part);
    if (!filename) continue;

    const payload = part.payload;
    if (!payload || payload.length === 0) continue;

    yield { filename, payload, part };
  }
}

/**
 * Decoded subject of a message, "" when absent
 */
export function getSubject(root: MessagePart): string {
  return decodeHeaderText(getHeader(root.headers, 'subject'));
}
