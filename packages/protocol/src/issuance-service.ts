import { PolicyViolationError, requirePresent } from '@vouchers/kernel';
import type { IssuancePolicy, IssuancePolicyInput } from '@vouchers/schema';
import type { SignedVoucher } from '@vouchers/voucher';
import { componentLogger, type Logger } from './logging';
import { createIssuancePolicy } from './policy';
import type { VoucherService } from './voucher-service';
import type { IssueVoucherRequest } from './types';

/**
 * Policy gate in front of VoucherService
 *
 * Ceilings are checked before any signing or ledger work.
 */
export class VoucherIssuanceService {
  readonly policy: IssuancePolicy;
  private readonly voucherService: VoucherService;
  private readonly log: Logger;

  constructor(voucherService: VoucherService, policy: IssuancePolicyInput = {}, logger?: Logger) {
    this.voucherService = requirePresent(voucherService, 'Voucher service');
    this.policy = Object.freeze(createIssuancePolicy(policy));
    this.log = logger ?? componentLogger('issuance-service');
    this.log.info(this.policy, 'Issuance policy configured');
  }

  /**
   * @throws PolicyViolationError when the request exceeds a ceiling
   */
  async issue(request: IssueVoucherRequest): Promise<SignedVoucher> {
    requirePresent(request, 'Issue request');
    this.enforcePolicy(request);

    try {
      const voucher = await this.voucherService.issue(request);
      this.log.info({ voucherId: voucher.voucherId, amount: request.amount }, 'Voucher issued');
      return voucher;
    } catch (err) {
      this.log.error({ issuerId: request.issuerId, amount: request.amount, err }, 'Failed to issue voucher');
      throw err;
    }
  }

  private enforcePolicy(request: IssueVoucherRequest): void {
    const { maxVoucherAmount, maxExpiryDays } = this.policy;

    if (request.amount > maxVoucherAmount) {
      const message = `Voucher amount ${request.amount} exceeds maximum allowed ${maxVoucherAmount}`;
      this.log.warn({ issuerId: request.issuerId }, message);
      throw new PolicyViolationError(message);
    }

    if (request.expiresInDays !== undefined && request.expiresInDays > maxExpiryDays) {
      const message = `Voucher expiry ${request.expiresInDays} days exceeds maximum allowed ${maxExpiryDays} days`;
      this.log.warn({ issuerId: request.issuerId }, message);
      throw new PolicyViolationError(message);
    }
  }
}
