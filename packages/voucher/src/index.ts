/**
 * Voucher Package
 *
 * Voucher terms, their canonical encoding, issuer signatures and validation.
 *
 * @packageDocumentation
 */

export type { VoucherSecretInit, VoucherVerifier, ValidationResult } from './types';
export { validationSuccess, validationFailure, validationFromErrors } from './result';
export { encodeCanonicalFields, decodeCanonicalFields } from './encoding';
export { VoucherSecret, encodeVoucherSecret, decodeVoucherSecret } from './secret';
export { verifyCanonicalSignature } from './verification';
export { SignedVoucher, signedVoucherFromJson } from './signed-voucher';
export { VoucherSignatureService, defaultSignatureService } from './signature-service';
export {
  VoucherValidator,
  VALIDATION_ERRORS,
  type VoucherValidatorOptions,
} from './validator';

// Re-exported so callers need a single import for voucher terms
export {
  BackingStrategy,
  isSplittable,
  hasFineGrainedSplits,
} from '@vouchers/kernel';
