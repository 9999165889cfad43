/**
 * JSON Canonicalization Scheme (RFC 8785)
 *
 * Merchant metadata is carried inside the signed voucher as canonical JSON
 * text, so two maps with the same entries always sign the same bytes.
 */

import { CryptoError } from './errors';

/**
 * Canonicalize a JSON value according to RFC 8785
 *
 * Object members whose value is `undefined` are omitted, as JSON.stringify does.
 */
export function canonicalize(value: unknown): string {
  if (value === null) {
    return 'null';
  }

  switch (typeof value) {
    case 'boolean':
      return value ? 'true' : 'false';
    case 'string':
      return JSON.stringify(value);
    case 'number':
      return canonicalNumber(value);
    case 'object':
      return Array.isArray(value) ? canonicalArray(value) : canonicalObject(value);
    default:
      throw new CryptoError(
        'CRYPTO_NON_CANONICAL_VALUE',
        `Cannot canonicalize type: ${typeof value}`
      );
  }
}

function canonicalNumber(value: number): string {
  if (!Number.isFinite(value)) {
    throw new CryptoError('CRYPTO_NON_CANONICAL_VALUE', 'Cannot canonicalize non-finite number');
  }
  if (Object.is(value, -0)) {
    return '0';
  }
  // ECMAScript number-to-string is the RFC 8785 number form
  return String(value);
}

function canonicalArray(values: readonly unknown[]): string {
  return `[${values.map((v) => (v === undefined ? 'null' : canonicalize(v))).join(',')}]`;
}

function canonicalObject(obj: object): string {
  // Sort keys lexicographically by UTF-16 code unit
  const pairs = Object.entries(obj)
    .filter(([, v]) => v !== undefined)
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    .map(([key, v]) => `${JSON.stringify(key)}:${canonicalize(v)}`);
  return `{${pairs.join(',')}}`;
}
