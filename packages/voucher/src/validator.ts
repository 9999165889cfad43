/**
 * VoucherValidator
 *
 * Composite checks over a SignedVoucher. Every failing check adds its reason;
 * nothing short-circuits and nothing throws for an invalid voucher.
 */

import { epochSeconds, requireNonBlank, requirePresent, type EpochClock } from '@vouchers/kernel';
import { validationFailure, validationFromErrors, validationSuccess } from './result';
import { defaultSignatureService } from './signature-service';
import type { SignedVoucher } from './signed-voucher';
import type { ValidationResult, VoucherVerifier } from './types';

export const VALIDATION_ERRORS = {
  invalidSignature: 'Invalid issuer signature',
  expired: 'Voucher has expired',
} as const;

export interface VoucherValidatorOptions {
  verifier?: VoucherVerifier;
  clock?: EpochClock;
}

export class VoucherValidator {
  private readonly verifier: VoucherVerifier;
  private readonly clock: EpochClock;

  constructor(options: VoucherValidatorOptions = {}) {
    this.verifier = options.verifier ?? defaultSignatureService;
    this.clock = options.clock ?? epochSeconds;
  }

  /**
   * Signature and expiry checks
   */
  async validate(voucher: SignedVoucher): Promise<ValidationResult> {
    requirePresent(voucher, 'Voucher');
    const errors: string[] = [];

    if (!(await voucher.verify(this.verifier))) {
      errors.push(VALIDATION_ERRORS.invalidSignature);
    }
    if (voucher.isExpired(this.clock())) {
      errors.push(VALIDATION_ERRORS.expired);
    }

    return validationFromErrors(errors);
  }

  /**
   * Full validation, then the issuer match
   *
   * An issuer mismatch is reported only for vouchers that pass `validate`.
   */
  async validateWithIssuer(voucher: SignedVoucher, expectedIssuerId: string): Promise<ValidationResult> {
    requireNonBlank(expectedIssuerId, 'Expected issuer ID');
    const result = await this.validate(voucher);
    if (!result.valid) {
      return result;
    }
    if (voucher.issuerId !== expectedIssuerId) {
      return validationFailure(
        `Voucher was issued by '${voucher.issuerId}' but expected issuer is '${expectedIssuerId}'`
      );
    }
    return validationSuccess();
  }

  async validateSignatureOnly(voucher: SignedVoucher): Promise<ValidationResult> {
    requirePresent(voucher, 'Voucher');
    return (await voucher.verify(this.verifier))
      ? validationSuccess()
      : validationFailure(VALIDATION_ERRORS.invalidSignature);
  }

  /**
   * Expiry alone, e.g. for reconciliation that ignores signatures already checked
   */
  validateExpiryOnly(voucher: SignedVoucher): ValidationResult {
    requirePresent(voucher, 'Voucher');
    return voucher.isExpired(this.clock())
      ? validationFailure(VALIDATION_ERRORS.expired)
      : validationSuccess();
  }

  async isValid(voucher: SignedVoucher): Promise<boolean> {
    return (await this.validate(voucher)).valid;
  }
}
