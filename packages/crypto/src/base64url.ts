/**
 * Base64url encoding/decoding (RFC 4648 §5)
 * Used for the text form of payment requests
 */

import { CryptoError } from './errors';

const BASE64URL_PATTERN = /^[A-Za-z0-9_-]*$/;

/**
 * Encode bytes to base64url string (no padding)
 */
export function base64urlEncode(bytes: Uint8Array): string {
  return Buffer.from(bytes)
    .toString('base64')
    .replace(/\+/g, '-')
    .replace(/\//g, '_')
    .replace(/=/g, '');
}

/**
 * Decode base64url string to bytes
 *
 * Padding is optional. Characters outside the URL-safe alphabet are rejected
 * instead of being skipped silently.
 */
export function base64urlDecode(str: string): Uint8Array {
  const unpadded = str.replace(/=+$/, '');
  if (!BASE64URL_PATTERN.test(unpadded) || unpadded.length % 4 === 1) {
    throw new CryptoError('CRYPTO_INVALID_BASE64URL', 'Invalid base64url string');
  }
  const base64 = unpadded.replace(/-/g, '+').replace(/_/g, '/');
  return new Uint8Array(Buffer.from(base64, 'base64'));
}
