/**
 * Hashing helpers for the CA bundle exchange.
 *
 * The join token has two derivations that must never be conflated:
 *   - hashBase64(token)                      → bearer value sent to the server
 *   - HMAC-SHA512(key = token, nonce‖0‖body‖0) → integrity check of the response
 *
 * The raw token itself is never transmitted during bootstrap.
 */

import { createHash, createHmac, timingSafeEqual } from 'crypto';

const SEPARATOR = Buffer.from([0]);

/** Lowercase hex SHA256. Used as the CA bundle checksum. */
export function hashHex(data: Buffer | string): string {
  return createHash('sha256').update(data).digest('hex');
}

/** Standard base64 SHA256. Used as the bootstrap bearer value. */
export function hashBase64(data: Buffer | string): string {
  return createHash('sha256').update(data).digest('base64');
}

/** base64(HMAC-SHA512(token, nonce ‖ 0x00 ‖ body ‖ 0x00)) */
export function responseHash(token: string, nonce: string, body: Buffer): string {
  return createHmac('sha512', token)
    .update(nonce, 'utf8')
    .update(SEPARATOR)
    .update(body)
    .update(SEPARATOR)
    .digest('base64');
}

/**
 * Check the X-Cattle-Hash value the server sent for this nonce and body.
 * A missing header never verifies.
 */
export function verifyResponseHash(
  token: string,
  nonce: string,
  body: Buffer,
  received: string | undefined
): boolean {
  if (received === undefined) return false;
  const expected = Buffer.from(responseHash(token, nonce, body), 'utf8');
  const actual = Buffer.from(received, 'utf8');
  if (expected.length !== actual.length) return false;
  return timingSafeEqual(expected, actual);
}
