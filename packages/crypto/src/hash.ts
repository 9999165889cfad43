/**
 * Hex and SHA-256 utilities
 *
 * SHA-256 goes through the Web Crypto API, which Node.js 20 exposes as
 * `globalThis.crypto`.
 *
 * @packageDocumentation
 */

import { CryptoError } from './errors';

const HEX_PATTERN = /^[0-9a-fA-F]*$/;

/**
 * Compute SHA-256 hash of data and return as lowercase hex string
 *
 * @returns Lowercase hex string (64 characters)
 */
export async function sha256Hex(data: Uint8Array | string): Promise<string> {
  return bytesToHex(await sha256Bytes(data));
}

/**
 * Compute SHA-256 hash of data (32 bytes)
 */
export async function sha256Bytes(data: Uint8Array | string): Promise<Uint8Array> {
  const bytes = typeof data === 'string' ? new TextEncoder().encode(data) : data;
  const hashBuffer = await globalThis.crypto.subtle.digest('SHA-256', bytes);
  return new Uint8Array(hashBuffer);
}

/**
 * Convert hex string to bytes
 *
 * Accepts either case; rejects odd lengths and non-hex characters.
 */
export function hexToBytes(hex: string): Uint8Array {
  if (hex.length % 2 !== 0 || !HEX_PATTERN.test(hex)) {
    throw new CryptoError('CRYPTO_INVALID_HEX', 'Invalid hex string');
  }
  const bytes = new Uint8Array(hex.length / 2);
  for (let i = 0; i < bytes.length; i++) {
    bytes[i] = parseInt(hex.slice(i * 2, i * 2 + 2), 16);
  }
  return bytes;
}

/**
 * Convert bytes to lowercase hex string
 */
export function bytesToHex(bytes: Uint8Array): string {
  return Array.from(bytes)
    .map((b) => b.toString(16).padStart(2, '0'))
    .join('');
}

/**
 * Constant-shape byte comparison
 */
export function bytesEqual(a: Uint8Array, b: Uint8Array): boolean {
  if (a.length !== b.length) {
    return false;
  }
  let diff = 0;
  for (let i = 0; i < a.length; i++) {
    diff |= a[i] ^ b[i];
  }
  return diff === 0;
}
