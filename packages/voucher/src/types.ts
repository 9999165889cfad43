/**
 * Voucher value types shared by the signing, validation and protocol layers
 */

import type { BackingStrategy, JsonObject } from '@vouchers/kernel';
import type { VoucherSecret } from './secret';

/**
 * Terms for a new voucher secret
 *
 * `voucherId` is generated (UUIDv7) when omitted. Absent optionals may be
 * given as `null` or left out.
 */
export interface VoucherSecretInit {
  voucherId?: string;
  issuerId: string;
  unit: string;
  /** Positive integer in the unit's smallest denomination */
  faceValue: number;
  /** Absolute expiry, Unix epoch seconds */
  expiresAt?: number | null;
  memo?: string | null;
  backingStrategy?: BackingStrategy;
  issuanceRatio?: number;
  faceDecimals?: number;
  merchantMetadata?: JsonObject | null;
}

/**
 * Anything that can check an issuer signature over a voucher secret
 */
export interface VoucherVerifier {
  verify(secret: VoucherSecret, signature: Uint8Array, publicKeyHex: string): Promise<boolean>;
}

/**
 * Outcome of a validation call
 *
 * `errors` is non-empty exactly when `valid` is false, in the order the checks ran.
 */
export interface ValidationResult {
  readonly valid: boolean;
  readonly errors: readonly string[];
}
