import type { BackingStrategy, JsonObject } from '@vouchers/kernel';

/**
 * Merchant request for a new voucher
 */
export interface IssueVoucherRequest {
  issuerId: string;
  unit: string;
  /** Face value in the unit's smallest denomination */
  amount: number;
  /** Relative expiry; omitted means the voucher never expires */
  expiresInDays?: number;
  memo?: string;
  /** Caller-chosen UUID, e.g. for idempotent retries; generated when omitted */
  voucherId?: string;
  backingStrategy?: BackingStrategy;
  issuanceRatio?: number;
  faceDecimals?: number;
  merchantMetadata?: JsonObject;
}

export interface RedeemVoucherRequest {
  /** Merchant performing the redemption; must be the voucher's issuer */
  merchantId: string;
  /**
   * Check the public ledger before redeeming. Defaults to true; turning it off
   * leaves double-spends undetected.
   */
  verifyOnline?: boolean;
}

/**
 * Result of a redemption attempt
 *
 * `verified_not_recorded` means the voucher checked out but its REDEEMED status
 * could not be written. Goods must not be handed over; the ledger needs manual
 * reconciliation.
 */
export type RedemptionOutcome =
  | { status: 'redeemed'; voucherId: string; amount: number; unit: string }
  | { status: 'rejected'; voucherId: string; errors: readonly string[] }
  | { status: 'verified_not_recorded'; voucherId: string; error: string };
