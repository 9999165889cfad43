import { epochSeconds, requirePresent, type ObservedStatus } from '@vouchers/kernel';
import type { SignedVoucher } from '@vouchers/voucher';

export interface StoredVoucherInit {
  addedAt?: number;
  lastBackupAt?: number;
  cachedStatus?: ObservedStatus;
  statusUpdatedAt?: number;
  userLabel?: string;
}

/**
 * Wallet-side record of a voucher plus its backup and status bookkeeping
 *
 * All timestamps are Unix epoch seconds.
 */
export class StoredVoucher {
  readonly voucher: SignedVoucher;
  addedAt: number;
  lastBackupAt?: number;
  cachedStatus?: ObservedStatus;
  statusUpdatedAt?: number;
  userLabel?: string;

  constructor(voucher: SignedVoucher, init: StoredVoucherInit = {}) {
    this.voucher = requirePresent(voucher, 'Voucher');
    this.addedAt = init.addedAt ?? epochSeconds();
    this.lastBackupAt = init.lastBackupAt;
    this.cachedStatus = init.cachedStatus;
    this.statusUpdatedAt = init.statusUpdatedAt;
    this.userLabel = init.userLabel;
  }

  static from(voucher: SignedVoucher, userLabel?: string, now: number = epochSeconds()): StoredVoucher {
    return new StoredVoucher(voucher, { addedAt: now, userLabel });
  }

  get voucherId(): string {
    return this.voucher.voucherId;
  }

  get amount(): number {
    return this.voucher.secret.faceValue;
  }

  get unit(): string {
    return this.voucher.secret.unit;
  }

  get expiresAt(): number | null {
    return this.voucher.secret.expiresAt;
  }

  /**
   * Never backed up, or changed since the last backup
   */
  needsBackup(): boolean {
    return this.lastBackupAt === undefined || this.addedAt > this.lastBackupAt;
  }

  markBackedUp(now: number = epochSeconds()): void {
    this.lastBackupAt = now;
  }

  updateStatus(status: ObservedStatus, now: number = epochSeconds()): void {
    this.cachedStatus = status;
    this.statusUpdatedAt = now;
  }

  /**
   * True when the cached status is missing or older than the threshold
   */
  isStatusStale(thresholdSeconds: number, now: number = epochSeconds()): boolean {
    if (this.statusUpdatedAt === undefined) {
      return true;
    }
    return now - this.statusUpdatedAt > thresholdSeconds;
  }

  isExpired(now: number = epochSeconds()): boolean {
    return this.voucher.isExpired(now);
  }
}
