import {
  canTransition,
  ERROR_CODES,
  LedgerConflictError,
  parseVoucherStatus,
  VoucherStatus,
  type ObservedStatus,
} from '@vouchers/kernel';
import { componentLogger, type Logger, type VoucherLedgerPort } from '@vouchers/protocol';
import type { SignedVoucher } from '@vouchers/voucher';

interface LedgerEntry {
  status: string;
  voucher: SignedVoucher;
}

/**
 * Process-local ledger
 *
 * Each write checks and sets within a single synchronous step, so two
 * concurrent REDEEMED writes for one id cannot both succeed.
 */
export class InMemoryVoucherLedger implements VoucherLedgerPort {
  private readonly entries = new Map<string, LedgerEntry>();
  private readonly log: Logger;

  constructor(logger?: Logger) {
    this.log = logger ?? componentLogger('memory-ledger');
  }

  async publish(voucher: SignedVoucher, status: VoucherStatus): Promise<void> {
    const voucherId = voucher.voucherId;
    if (this.entries.has(voucherId)) {
      throw new LedgerConflictError(
        ERROR_CODES.E_DUPLICATE_VOUCHER,
        voucherId,
        `Voucher ${voucherId} is already published`
      );
    }
    this.entries.set(voucherId, { status, voucher });
    this.log.debug({ voucherId, status }, 'Voucher published');
  }

  async queryStatus(voucherId: string): Promise<ObservedStatus | null> {
    const entry = this.entries.get(voucherId);
    return entry ? parseVoucherStatus(entry.status) : null;
  }

  /**
   * Compare-and-set from the current state
   *
   * @throws LedgerConflictError when the id is unknown or the move is illegal
   */
  async updateStatus(voucherId: string, status: VoucherStatus): Promise<void> {
    const entry = this.entries.get(voucherId);
    if (!entry) {
      throw new LedgerConflictError(
        ERROR_CODES.E_VOUCHER_NOT_FOUND,
        voucherId,
        `Voucher ${voucherId} not found in ledger`
      );
    }
    const current = parseVoucherStatus(entry.status);
    if (current !== VoucherStatus.ISSUED || !canTransition(current, status)) {
      throw new LedgerConflictError(
        ERROR_CODES.E_LEDGER_CONFLICT,
        voucherId,
        `Voucher ${voucherId} cannot move from ${entry.status} to ${status}`
      );
    }
    entry.status = status;
    this.log.debug({ voucherId, status }, 'Voucher status updated');
  }

  async exists(voucherId: string): Promise<boolean> {
    return this.entries.has(voucherId);
  }

  async queryVoucher(voucherId: string): Promise<SignedVoucher | null> {
    return this.entries.get(voucherId)?.voucher ?? null;
  }

  /**
   * Raw write for tests and migrations; bypasses transition checks
   */
  setRawStatus(voucherId: string, status: string): void {
    const entry = this.entries.get(voucherId);
    if (entry) {
      entry.status = status;
    }
  }

  get size(): number {
    return this.entries.size;
  }

  clear(): void {
    this.entries.clear();
  }
}
