/**
 * Quoted-Printable decoding
 *
 * Implements RFC 2045 quoted-printable bodies and the RFC 2047 "Q" variant
 * used inside encoded words. Input strings are expected to hold one byte
 * per code unit (latin1), as produced by the multipart parser.
 */

/**
 * Decodes a quoted-printable string to a Buffer
 *
 * Hard line breaks are copied byte for byte.
 *
 * @param encoded - The quoted-printable encoded string
 * @returns Decoded Buffer
 */
export function quotedPrintableDecode(encoded: string): Buffer {
  const bytes: number[] = [];
  let i = 0;

  while (i < encoded.length) {
    const char = encoded[i];

    if (char === '=') {
      // Soft line break, optionally preceded by trailing whitespace
      const rest = encoded.substring(i + 1, i + 80);
      const soft = rest.match(/^[ \t]*(\r\n|\n)/);
      if (soft) {
        i += 1 + soft[0].length;
        continue;
      }

      // Decode hex sequence =XX
      const hex = encoded.substring(i + 1, i + 3);
      if (/^[0-9A-Fa-f]{2}$/.test(hex)) {
        bytes.push(parseInt(hex, 16));
        i += 3;
      } else {
        // Invalid sequence, keep the '=' as literal
        bytes.push(0x3d);
        i++;
      }
    } else {
      bytes.push(encoded.charCodeAt(i) & 0xff);
      i++;
    }
  }

  return Buffer.from(bytes);
}

/**
 * Decodes the "Q" encoding of RFC 2047 section 4.2
 *
 * Same as quoted-printable except that "_" stands for a space (0x20)
 * and there are no line breaks.
 *
 * @param encoded - Encoded text of a single encoded word
 * @returns Decoded Buffer
 */
export function qEncodingDecode(encoded: string): Buffer {
  return quotedPrintableDecode(encoded.replace(/_/g, '=20'));
}
