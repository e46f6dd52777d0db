/**
 * Base64 decoding using Node.js Buffer
 *
 * Used for base64 Content-Transfer-Encoding and "B" encoded words.
 */

/**
 * Decodes a base64 string to a Buffer
 *
 * Characters outside the base64 alphabet (line breaks, stray spaces) are
 * ignored, and decoding stops at the first padding character, so a
 * truncated or noisy body still yields its leading bytes.
 *
 * @param encoded - The base64 encoded string
 * @returns Decoded Buffer
 */
export function base64Decode(encoded: string): Buffer {
  const cleaned = encoded.replace(/[^A-Za-z0-9+/=]/g, '');
  const padIndex = cleaned.indexOf('=');
  const data = padIndex === -1 ? cleaned : cleaned.substring(0, padIndex);
  return Buffer.from(data, 'base64');
}
