/**
 * VoucherBackupService
 *
 * Vouchers are not derivable from a wallet seed, so each one must reach the
 * user's backup before it can survive a device loss.
 */

import { epochSeconds, errorMessage, requireNonBlank, requirePresent, type EpochClock } from '@vouchers/kernel';
import type { SignedVoucher } from '@vouchers/voucher';
import { componentLogger, type Logger } from './logging';
import { StoredVoucher } from './stored-voucher';
import type { VoucherService } from './voucher-service';

export interface VoucherBackupServiceOptions {
  clock?: EpochClock;
  logger?: Logger;
}

export class VoucherBackupService {
  private readonly voucherService: VoucherService;
  private readonly clock: EpochClock;
  private readonly log: Logger;

  constructor(voucherService: VoucherService, options: VoucherBackupServiceOptions = {}) {
    this.voucherService = requirePresent(voucherService, 'Voucher service');
    this.clock = options.clock ?? epochSeconds;
    this.log = options.logger ?? componentLogger('backup-service');
  }

  /**
   * Back up only the vouchers that need it
   *
   * Backup timestamps are stamped after the store accepts the batch, so a
   * failed attempt leaves the same set pending for the next call.
   *
   * @returns number of vouchers backed up
   */
  async backupIfNeeded(vouchers: readonly StoredVoucher[], userKey: string): Promise<number> {
    requirePresent(vouchers, 'Vouchers');
    requireNonBlank(userKey, 'User key');

    const pending = vouchers.filter((v) => v.needsBackup());
    if (pending.length === 0) {
      this.log.debug({ total: vouchers.length }, 'No vouchers need backup');
      return 0;
    }

    this.log.info({ pending: pending.length, total: vouchers.length }, 'Backing up vouchers');
    await this.voucherService.backup(
      pending.map((v) => v.voucher),
      userKey
    );

    const now = this.clock();
    for (const v of pending) {
      v.markBackedUp(now);
    }
    return pending.length;
  }

  async backupAll(vouchers: readonly StoredVoucher[], userKey: string): Promise<void> {
    requirePresent(vouchers, 'Vouchers');
    requireNonBlank(userKey, 'User key');

    this.log.info({ total: vouchers.length }, 'Backing up all vouchers');
    await this.voucherService.backup(
      vouchers.map((v) => v.voucher),
      userKey
    );

    const now = this.clock();
    for (const v of vouchers) {
      v.markBackedUp(now);
    }
  }

  /**
   * Restored vouchers, each marked as backed up
   */
  async restore(userKey: string): Promise<StoredVoucher[]> {
    const restored = await this.voucherService.restore(userKey);
    return this.toStored(restored);
  }

  /**
   * Merge the backup into the local list
   *
   * Local entries win on id collision; their cached state is fresher than the
   * backup's. Result: local vouchers in their original order, then vouchers
   * found only in the backup, in backup order.
   */
  async restoreAndMerge(local: readonly StoredVoucher[], userKey: string): Promise<StoredVoucher[]> {
    requirePresent(local, 'Local vouchers');
    const restored = await this.restore(userKey);

    const seen = new Set(local.map((v) => v.voucherId));
    const merged = [...local];
    for (const candidate of restored) {
      if (!seen.has(candidate.voucherId)) {
        seen.add(candidate.voucherId);
        merged.push(candidate);
      }
    }

    this.log.info(
      { local: local.length, restored: restored.length, added: merged.length - local.length },
      'Backup merged'
    );
    return merged;
  }

  /**
   * True when every expected id is present in the backup
   *
   * A failed fetch is logged and reported as false.
   */
  async verifyBackup(expectedIds: readonly string[], userKey: string): Promise<boolean> {
    requirePresent(expectedIds, 'Expected voucher IDs');
    requireNonBlank(userKey, 'User key');

    let restored: SignedVoucher[];
    try {
      restored = await this.voucherService.restore(userKey);
    } catch (err) {
      this.log.error({ err: errorMessage(err) }, 'Backup verification failed');
      return false;
    }

    const present = new Set(restored.map((v) => v.voucherId));
    const missing = expectedIds.filter((id) => !present.has(id));
    if (missing.length > 0) {
      this.log.warn({ missing }, 'Backup verification found missing vouchers');
      return false;
    }
    this.log.info({ expected: expectedIds.length }, 'Backup verification passed');
    return true;
  }

  private toStored(vouchers: readonly SignedVoucher[]): StoredVoucher[] {
    const now = this.clock();
    return vouchers.map((voucher) => {
      const stored = StoredVoucher.from(voucher, undefined, now);
      stored.markBackedUp(now);
      return stored;
    });
  }
}
