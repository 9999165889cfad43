/**
 * MerchantVerificationService
 *
 * Verification and redemption at the issuing merchant ("Model B"). Offline
 * checks need no I/O; online checks add the public ledger status, which is
 * what detects double-spends.
 */

import {
  epochSeconds,
  ERROR_CODES,
  errorMessage,
  formatObservedStatus,
  isUnrecognizedStatus,
  LedgerOperationError,
  requireNonBlank,
  requirePresent,
  VoucherStatus,
  type EpochClock,
  type ObservedStatus,
} from '@vouchers/kernel';
import type { PaymentPayload, PaymentRequest } from '@vouchers/schema';
import {
  defaultSignatureService,
  validationFailure,
  validationFromErrors,
  validationSuccess,
  VoucherValidator,
  type SignedVoucher,
  type ValidationResult,
  type VoucherVerifier,
} from '@vouchers/voucher';
import { componentLogger, type Logger } from './logging';
import { allProofsHaveDleq, isMintPermitted, totalProofAmount } from './payment-request';
import type { VoucherLedgerPort } from './ports';
import type { RedeemVoucherRequest, RedemptionOutcome } from './types';

export const LEDGER_STATUS_ERRORS = {
  notFound: 'Voucher not found in public ledger',
  redeemed: 'Voucher already redeemed (double-spend attempt detected)',
  revoked: 'Voucher has been revoked by issuer',
  expired: 'Voucher has expired according to the ledger',
} as const;

export interface MerchantVerificationOptions {
  verifier?: VoucherVerifier;
  clock?: EpochClock;
  logger?: Logger;
}

export class MerchantVerificationService {
  private readonly ledger: VoucherLedgerPort;
  private readonly validator: VoucherValidator;
  private readonly log: Logger;

  constructor(ledger: VoucherLedgerPort, options: MerchantVerificationOptions = {}) {
    this.ledger = requirePresent(ledger, 'Ledger port');
    this.validator = new VoucherValidator({
      verifier: options.verifier ?? defaultSignatureService,
      clock: options.clock ?? epochSeconds,
    });
    this.log = options.logger ?? componentLogger('merchant-verification');
  }

  /**
   * Issuer match plus signature and expiry, without touching the ledger
   *
   * Every failing check contributes its reason.
   */
  async verifyOffline(voucher: SignedVoucher, expectedIssuerId: string): Promise<ValidationResult> {
    requirePresent(voucher, 'Voucher');
    requireNonBlank(expectedIssuerId, 'Expected issuer ID');

    const errors: string[] = [];
    if (voucher.issuerId !== expectedIssuerId) {
      const error = `Voucher issued by '${voucher.issuerId}' but expected issuer is '${expectedIssuerId}' (Model B: vouchers only redeemable at issuing merchant)`;
      this.log.warn({ voucherId: voucher.voucherId }, error);
      errors.push(error);
    }

    const result = await this.validator.validate(voucher);
    errors.push(...result.errors);

    this.log.debug({ voucherId: voucher.voucherId, errors }, 'Offline verification finished');
    return validationFromErrors(errors);
  }

  /**
   * Offline checks, then the ledger status
   *
   * The ledger is not queried when the offline stage fails. A query failure
   * is reported as a failed verification, not thrown.
   */
  async verifyOnline(voucher: SignedVoucher, expectedIssuerId: string): Promise<ValidationResult> {
    const offline = await this.verifyOffline(voucher, expectedIssuerId);
    const voucherId = voucher.voucherId;
    if (!offline.valid) {
      this.log.warn({ voucherId }, 'Online verification failed at offline stage');
      return offline;
    }

    let status: ObservedStatus | null;
    try {
      status = await this.ledger.queryStatus(voucherId);
    } catch (err) {
      this.log.error({ voucherId, err }, 'Ledger query failed');
      return validationFailure(`Failed to query voucher status from ledger: ${errorMessage(err)}`);
    }

    return this.checkLedgerStatus(voucherId, status);
  }

  private checkLedgerStatus(voucherId: string, status: ObservedStatus | null): ValidationResult {
    if (status === null) {
      this.log.warn({ voucherId }, LEDGER_STATUS_ERRORS.notFound);
      return validationFailure(LEDGER_STATUS_ERRORS.notFound);
    }
    if (isUnrecognizedStatus(status)) {
      // Fail closed
      this.log.error({ voucherId, status: status.unrecognized }, 'Unknown status in ledger');
      return validationFailure(`Unknown voucher status: ${formatObservedStatus(status)}`);
    }

    switch (status) {
      case VoucherStatus.ISSUED:
        this.log.info({ voucherId }, 'Online verification passed');
        return validationSuccess();
      case VoucherStatus.REDEEMED:
        this.log.warn({ voucherId }, 'Double-spend detected');
        return validationFailure(LEDGER_STATUS_ERRORS.redeemed);
      case VoucherStatus.REVOKED:
        this.log.warn({ voucherId }, 'Revoked voucher presented');
        return validationFailure(LEDGER_STATUS_ERRORS.revoked);
      case VoucherStatus.EXPIRED:
        this.log.warn({ voucherId }, 'Voucher expired according to ledger');
        return validationFailure(LEDGER_STATUS_ERRORS.expired);
      default:
        // Raw value from an adapter that skipped parseObservedStatus
        this.log.error({ voucherId, status: String(status) }, 'Unknown status in ledger');
        return validationFailure(`Unknown voucher status: ${String(status)}`);
    }
  }

  /**
   * Record REDEEMED in the ledger
   *
   * @throws LedgerOperationError (E_LEDGER_UPDATE_FAILED); the voucher was
   *   verified but its state is now inconsistent
   */
  async markRedeemed(voucherId: string): Promise<void> {
    requireNonBlank(voucherId, 'Voucher ID');
    this.log.info({ voucherId }, 'Marking voucher as redeemed');
    try {
      await this.ledger.updateStatus(voucherId, VoucherStatus.REDEEMED);
    } catch (err) {
      this.log.error({ voucherId, err }, 'Failed to mark voucher as redeemed');
      throw new LedgerOperationError(
        ERROR_CODES.E_LEDGER_UPDATE_FAILED,
        `Failed to mark voucher as redeemed: ${errorMessage(err)}`,
        err
      );
    }
  }

  async redeem(request: RedeemVoucherRequest, voucher: SignedVoucher): Promise<RedemptionOutcome> {
    requirePresent(request, 'Redeem request');
    requirePresent(voucher, 'Voucher');
    const voucherId = voucher.voucherId;
    this.log.info({ voucherId, merchantId: request.merchantId }, 'Processing redemption');

    let verification: ValidationResult;
    if (request.verifyOnline ?? true) {
      verification = await this.verifyOnline(voucher, request.merchantId);
    } else {
      this.log.warn({ voucherId }, 'Offline redemption requested: double-spend not prevented');
      verification = await this.verifyOffline(voucher, request.merchantId);
    }

    if (!verification.valid) {
      this.log.warn({ voucherId, errors: verification.errors }, 'Redemption rejected');
      return { status: 'rejected', voucherId, errors: verification.errors };
    }

    try {
      await this.markRedeemed(voucherId);
    } catch (err) {
      this.log.error({ voucherId, err }, 'Redemption verified but not recorded');
      return {
        status: 'verified_not_recorded',
        voucherId,
        error: `Verification passed but failed to mark as redeemed: ${errorMessage(err)}`,
      };
    }

    this.log.info({ voucherId, amount: voucher.secret.faceValue }, 'Voucher redeemed');
    return {
      status: 'redeemed',
      voucherId,
      amount: voucher.secret.faceValue,
      unit: voucher.secret.unit,
    };
  }

  /**
   * Match a customer payment against the request it answers
   */
  validatePaymentPayload(payload: PaymentPayload, request: PaymentRequest): ValidationResult {
    requirePresent(payload, 'Payment payload');
    requirePresent(request, 'Payment request');
    const errors: string[] = [];

    const paymentId = request.paymentId;
    if (paymentId !== undefined && paymentId.trim().length > 0 && payload.id !== paymentId) {
      errors.push(`Payment ID mismatch: expected '${paymentId}', got '${payload.id ?? ''}'`);
    }

    if (payload.issuerId !== request.issuerId) {
      errors.push(`Issuer ID mismatch: expected '${request.issuerId}', got '${payload.issuerId}'`);
    }

    if (request.amount !== undefined) {
      const total = totalProofAmount(payload);
      if (total < request.amount) {
        errors.push(`Insufficient amount: expected at least ${request.amount}, got ${total}`);
      }
    }

    if (request.mints !== undefined && request.mints.length > 0 && !isMintPermitted(request, payload.mint)) {
      errors.push(`Mint '${payload.mint}' not in permitted list: [${request.mints.join(', ')}]`);
    }

    if (request.offlineVerification === true && !allProofsHaveDleq(payload)) {
      errors.push('Offline verification required but proofs missing DLEQ');
    }

    const result = validationFromErrors(errors);
    if (result.valid) {
      this.log.info({ paymentId: payload.id }, 'Payment payload validation passed');
    } else {
      this.log.warn({ paymentId: payload.id, errors }, 'Payment payload validation failed');
    }
    return result;
  }

  /**
   * Validate a payload; proof redemption against the mint happens elsewhere
   */
  processPaymentPayload(payload: PaymentPayload, request: PaymentRequest): ValidationResult {
    this.log.info(
      { paymentId: payload.id, proofCount: payload.proofs.length },
      'Processing payment payload'
    );
    const result = this.validatePaymentPayload(payload, request);
    if (result.valid) {
      this.log.info(
        { paymentId: payload.id, total: totalProofAmount(payload) },
        'Payment payload processed'
      );
    }
    return result;
  }
}
