import { describe, it, expect, beforeEach } from 'vitest';
import { VoucherStatus } from '@vouchers/kernel';
import { StoredVoucher, VoucherBackupService, VoucherService, type StoredVoucherInit } from '../src/index';
import { clock, FakeBackupStore, FakeLedger, issuerKeys, NOW, signedVoucher, USER_KEY } from './helpers';

let backups: FakeBackupStore;
let service: VoucherBackupService;

beforeEach(async () => {
  backups = new FakeBackupStore();
  const core = new VoucherService(new FakeLedger(), backups, await issuerKeys(), { clock });
  service = new VoucherBackupService(core, { clock });
});

async function stored(faceValue: number, init: StoredVoucherInit = {}): Promise<StoredVoucher> {
  return new StoredVoucher(await signedVoucher({ faceValue }), { addedAt: NOW - 100, ...init });
}

describe('StoredVoucher', () => {
  it('needs backup until backed up after its last change', async () => {
    const voucher = await stored(1);
    expect(voucher.needsBackup()).toBe(true);
    voucher.markBackedUp(NOW - 100);
    expect(voucher.needsBackup()).toBe(false);
    voucher.addedAt = NOW - 50;
    expect(voucher.needsBackup()).toBe(true);
  });

  it('tracks status staleness', async () => {
    const voucher = await stored(1);
    expect(voucher.isStatusStale(300, NOW)).toBe(true);
    voucher.updateStatus(VoucherStatus.ISSUED, NOW - 300);
    expect(voucher.isStatusStale(300, NOW)).toBe(false);
    expect(voucher.isStatusStale(299, NOW)).toBe(true);
    expect(voucher.cachedStatus).toBe('ISSUED');
  });

  it('exposes voucher terms', async () => {
    const voucher = await stored(250);
    expect(voucher.amount).toBe(250);
    expect(voucher.unit).toBe('sat');
    expect(voucher.expiresAt).toBe(NOW + 86400);
    expect(voucher.isExpired(NOW)).toBe(false);
  });
});

describe('backupIfNeeded', () => {
  it('backs up pending vouchers once', async () => {
    const vouchers = [await stored(1), await stored(2)];
    expect(await service.backupIfNeeded(vouchers, USER_KEY)).toBe(2);
    expect(await service.backupIfNeeded(vouchers, USER_KEY)).toBe(0);
    expect(backups.backup).toHaveBeenCalledTimes(1);
    expect(vouchers.map((v) => v.lastBackupAt)).toEqual([NOW, NOW]);
  });

  it('sends only the vouchers that need it', async () => {
    const done = await stored(1, { lastBackupAt: NOW - 10 });
    const fresh = await stored(2);
    expect(await service.backupIfNeeded([done, fresh], USER_KEY)).toBe(1);
    expect(backups.backup.mock.calls[0]?.[0].map((v) => v.voucherId)).toEqual([fresh.voucherId]);
  });

  it('leaves timestamps untouched when the store fails', async () => {
    const vouchers = [await stored(1)];
    backups.backup.mockRejectedValueOnce(new Error('offline'));
    await expect(service.backupIfNeeded(vouchers, USER_KEY)).rejects.toMatchObject({ code: 'E_BACKUP_FAILED' });
    expect(vouchers[0]?.lastBackupAt).toBeUndefined();
    expect(await service.backupIfNeeded(vouchers, USER_KEY)).toBe(1);
  });

  it('backupAll ignores backup state', async () => {
    const vouchers = [await stored(1, { lastBackupAt: NOW - 10 })];
    await service.backupAll(vouchers, USER_KEY);
    expect(backups.backup).toHaveBeenCalledTimes(1);
    expect(vouchers[0]?.lastBackupAt).toBe(NOW);
  });
});

describe('restoreAndMerge', () => {
  it('keeps the local copy on id collision', async () => {
    const shared = await stored(1);
    await service.backupAll([shared], USER_KEY);

    const local = new StoredVoucher(shared.voucher, { addedAt: NOW - 5 });
    local.updateStatus(VoucherStatus.REDEEMED, NOW - 5);

    const merged = await service.restoreAndMerge([local], USER_KEY);
    expect(merged).toHaveLength(1);
    expect(merged[0]).toBe(local);
    expect(merged[0]?.cachedStatus).toBe('REDEEMED');
  });

  it('appends backup-only vouchers after local ones, in backup order', async () => {
    const a = await stored(1);
    const b = await stored(2);
    const c = await stored(3);
    await service.backupAll([b, c], USER_KEY);

    const merged = await service.restoreAndMerge([a], USER_KEY);
    expect(merged.map((v) => v.amount)).toEqual([1, 2, 3]);
    expect(merged[1]?.needsBackup()).toBe(false);
    expect(merged[1]?.lastBackupAt).toBe(NOW);
  });

  it('restores everything as backed up', async () => {
    await service.backupAll([await stored(7)], USER_KEY);
    const restored = await service.restore(USER_KEY);
    expect(restored.map((v) => [v.amount, v.needsBackup()])).toEqual([[7, false]]);
  });
});

describe('verifyBackup', () => {
  it('checks set inclusion', async () => {
    const a = await stored(1);
    const b = await stored(2);
    await service.backupAll([a], USER_KEY);
    expect(await service.verifyBackup([a.voucherId], USER_KEY)).toBe(true);
    expect(await service.verifyBackup([a.voucherId, b.voucherId], USER_KEY)).toBe(false);
  });

  it('returns false when the backup cannot be fetched', async () => {
    backups.restore.mockRejectedValueOnce(new Error('offline'));
    expect(await service.verifyBackup(['x'], USER_KEY)).toBe(false);
  });
});
