/**
 * Canonical byte encoding of voucher terms
 *
 * The canonical form is the exact signature input: a definite-length CBOR map
 * with the ten fields of CANONICAL_FIELDS in that order. Absent optionals are
 * written as null, never omitted, so the map shape never varies.
 */

import { CANONICAL_FIELDS, PreconditionError } from '@vouchers/kernel';
import { CryptoError, decodeCbor, encodeCanonicalMap, type CborScalar } from '@vouchers/crypto';
import {
  CanonicalVoucherFieldsSchema,
  formatIssues,
  type CanonicalVoucherFields,
} from '@vouchers/schema';

export function encodeCanonicalFields(fields: CanonicalVoucherFields): Uint8Array {
  const entries = CANONICAL_FIELDS.map(
    (name): readonly [string, CborScalar] => [name, fields[name]]
  );
  return encodeCanonicalMap(entries);
}

/**
 * Decode canonical bytes back into their field map
 *
 * Shape errors only; value ranges are checked when the secret is rebuilt.
 */
export function decodeCanonicalFields(bytes: Uint8Array): CanonicalVoucherFields {
  let decoded: unknown;
  try {
    decoded = decodeCbor(bytes);
  } catch (err) {
    if (err instanceof CryptoError) {
      throw new PreconditionError(`Malformed voucher secret: ${err.message}`);
    }
    throw err;
  }

  const parsed = CanonicalVoucherFieldsSchema.safeParse(decoded);
  if (!parsed.success) {
    throw new PreconditionError(`Malformed voucher secret: ${formatIssues(parsed.error)}`);
  }
  return parsed.data;
}
