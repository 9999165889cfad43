/**
 * Ports to the outside world
 *
 * The protocol core never talks to storage directly. Ledger and backup
 * transports implement these interfaces; any thrown error counts as an
 * operation failure and its cause is never inspected.
 */

import { BackupOperationError, ERROR_CODES, type ObservedStatus, type VoucherStatus } from '@vouchers/kernel';
import type { SignedVoucher } from '@vouchers/voucher';

/**
 * Public status ledger
 *
 * `updateStatus` must be linearizable per voucher id: once a REDEEMED write is
 * acknowledged, no reader may observe ISSUED for that id again.
 */
export interface VoucherLedgerPort {
  publish(voucher: SignedVoucher, status: VoucherStatus): Promise<void>;
  /** null when the ledger has never seen the id */
  queryStatus(voucherId: string): Promise<ObservedStatus | null>;
  updateStatus(voucherId: string, status: VoucherStatus): Promise<void>;
  exists?(voucherId: string): Promise<boolean>;
  queryVoucher?(voucherId: string): Promise<SignedVoucher | null>;
}

/**
 * Private per-user backup storage
 *
 * `userKey` is an opaque secret the store uses to locate (and typically
 * encrypt) one user's backups. It is never logged.
 */
export interface VoucherBackupPort {
  backup(vouchers: readonly SignedVoucher[], userKey: string): Promise<void>;
  restore(userKey: string): Promise<SignedVoucher[]>;
  hasBackups?(userKey: string): Promise<boolean>;
  deleteBackups?(userKey: string): Promise<void>;
}

export async function ledgerExists(ledger: VoucherLedgerPort, voucherId: string): Promise<boolean> {
  if (ledger.exists) {
    return ledger.exists(voucherId);
  }
  return (await ledger.queryStatus(voucherId)) !== null;
}

export async function backupExists(store: VoucherBackupPort, userKey: string): Promise<boolean> {
  if (store.hasBackups) {
    return store.hasBackups(userKey);
  }
  return (await store.restore(userKey)).length > 0;
}

export async function deleteBackups(store: VoucherBackupPort, userKey: string): Promise<void> {
  if (!store.deleteBackups) {
    throw new BackupOperationError(
      ERROR_CODES.E_BACKUP_UNSUPPORTED,
      'Backup store does not support deleting backups'
    );
  }
  await store.deleteBackups(userKey);
}
