/**
 * Deterministic CBOR (RFC 8949) helpers on top of cbor-x
 *
 * Records are disabled and map sizes are variable, so every object is written
 * as a plain CBOR map with a definite, shortest-form length header, keys in
 * insertion order. Integers use the shortest integer form, non-integral
 * numbers are IEEE-754 doubles.
 */

import { Decoder, Encoder } from 'cbor-x';
import { CryptoError } from './errors';

/**
 * Values allowed inside a canonical voucher map
 */
export type CborScalar = string | number | bigint | boolean | null;

export type CanonicalEntries = ReadonlyArray<readonly [string, CborScalar]>;

const encoder = new Encoder({
  useRecords: false,
  variableMapSize: true,
});

const decoder = new Decoder({
  useRecords: false,
  mapsAsObjects: true,
});

/**
 * cbor-x writes numbers beyond the 32-bit range as floats; route those
 * through bigint to keep the major-type 0/1 integer form.
 */
function normalizeScalar(key: string, value: CborScalar): CborScalar {
  if (typeof value !== 'number') {
    return value;
  }
  if (!Number.isFinite(value)) {
    throw new CryptoError('CRYPTO_NON_CANONICAL_VALUE', `Field ${key} must be a finite number`);
  }
  if (Number.isInteger(value) && (value > 0xffffffff || value < -0x80000000)) {
    return BigInt(value);
  }
  return value;
}

/**
 * Encode an ordered list of entries as a definite-length CBOR map
 *
 * Entry order is preserved exactly; it is part of the canonical form.
 */
export function encodeCanonicalMap(entries: CanonicalEntries): Uint8Array {
  const map: Record<string, CborScalar> = {};
  for (const [key, value] of entries) {
    if (Object.prototype.hasOwnProperty.call(map, key)) {
      throw new CryptoError('CRYPTO_NON_CANONICAL_VALUE', `Duplicate map key: ${key}`);
    }
    map[key] = normalizeScalar(key, value);
  }
  // Copy out of the encoder's shared buffer
  return new Uint8Array(encoder.encode(map));
}

/**
 * Encode a JSON-like structure (objects become CBOR maps in key order)
 */
export function encodeCbor(value: unknown): Uint8Array {
  return new Uint8Array(encoder.encode(value));
}

/**
 * Decode a single CBOR item
 *
 * Maps with text keys decode to plain objects.
 */
export function decodeCbor(bytes: Uint8Array): unknown {
  let decoded: unknown;
  try {
    decoded = decoder.decode(bytes);
  } catch (err) {
    throw new CryptoError('CRYPTO_INVALID_CBOR', 'Malformed CBOR data', { cause: err });
  }
  return decoded instanceof Map ? Object.fromEntries(decoded) : decoded;
}
