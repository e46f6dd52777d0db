/**
 * Charset-aware text decoding
 *
 * Uses the WHATWG TextDecoder shipped with Node.js (full ICU), which knows
 * the legacy mail charsets (gb2312, big5, shift_jis, iso-2022-jp, koi8-r,
 * windows-125x, ...). Never throws.
 */

/**
 * Charset names seen in mail headers that TextDecoder does not accept
 */
const CHARSET_ALIASES: Record<string, string> = {
  'latin-1': 'latin1',
  'cp936': 'gbk',
  'ms936': 'gbk',
  'cp932': 'shift_jis',
  'ms932': 'shift_jis',
  'cp949': 'euc-kr',
  'cp950': 'big5',
  'utf-8-sig': 'utf-8',
};

/**
 * Returns a TextDecoder label for a charset name, or undefined when the
 * charset is not supported
 */
export function normalizeCharset(charset: string): string | undefined {
  const name = charset.trim().toLowerCase();
  // RFC 2231 allows a language suffix: utf-8*en
  const bare = name.split('*')[0];
  const label = CHARSET_ALIASES[bare] ?? bare;
  try {
    return new TextDecoder(label).encoding;
  } catch {
    return undefined;
  }
}

/**
 * Decodes bytes using the given charset
 *
 * Unknown charsets and byte sequences that are invalid for the declared
 * charset fall back to UTF-8 with U+FFFD substitution.
 *
 * @param bytes - Bytes to decode
 * @param charset - Declared character set (may be empty)
 * @returns Decoded string
 */
export function decodeWithCharset(bytes: Uint8Array, charset: string = 'utf-8'): string {
  return decodeStrict(bytes, charset) ?? new TextDecoder('utf-8').decode(bytes);
}

/**
 * Decodes bytes only if they are valid in a supported charset
 *
 * @returns The text, or undefined for an unknown charset or invalid bytes
 */
export function decodeStrict(bytes: Uint8Array, charset: string): string | undefined {
  const label = normalizeCharset(charset || 'utf-8');
  if (label === undefined) return undefined;
  try {
    return new TextDecoder(label, { fatal: true }).decode(bytes);
  } catch {
    return undefined;
  }
}

/**
 * Converts a latin1 string (one byte per code unit) back to bytes
 */
export function latin1Bytes(value: string): Buffer {
  return Buffer.from(value, 'latin1');
}
