import { vi } from 'vitest';
import { bytesToHex } from '@vouchers/crypto';
import { generateKeypairFromSeed, seedFromLabel } from '@vouchers/crypto/testkit';
import type { ObservedStatus, VoucherStatus } from '@vouchers/kernel';
import {
  defaultSignatureService,
  VoucherSecret,
  type SignedVoucher,
  type VoucherSecretInit,
} from '@vouchers/voucher';
import type { VoucherBackupPort, VoucherLedgerPort } from '../src/index';

export const NOW = 1_750_000_000;
export const clock = (): number => NOW;
export const MERCHANT = 'bakery-42';
export const USER_KEY = 'test-user-key';

export interface IssuerKeys {
  privateKey: Uint8Array;
  publicKeyHex: string;
}

export async function issuerKeys(label = 1): Promise<IssuerKeys> {
  const { privateKey, publicKey } = await generateKeypairFromSeed(seedFromLabel(label));
  return { privateKey, publicKeyHex: bytesToHex(publicKey) };
}

export async function signedVoucher(overrides: Partial<VoucherSecretInit> = {}, label = 1): Promise<SignedVoucher> {
  const keys = await issuerKeys(label);
  const secret = VoucherSecret.create({
    issuerId: MERCHANT,
    unit: 'sat',
    faceValue: 1000,
    expiresAt: NOW + 86400,
    ...overrides,
  });
  return defaultSignatureService.createSigned(secret, keys.privateKey, keys.publicKeyHex);
}

/**
 * Map-backed ledger with spied methods
 */
export class FakeLedger implements VoucherLedgerPort {
  readonly statuses = new Map<string, ObservedStatus>();

  publish = vi.fn(async (voucher: SignedVoucher, status: VoucherStatus): Promise<void> => {
    this.statuses.set(voucher.voucherId, status);
  });

  queryStatus = vi.fn(async (voucherId: string): Promise<ObservedStatus | null> => {
    return this.statuses.get(voucherId) ?? null;
  });

  updateStatus = vi.fn(async (voucherId: string, status: VoucherStatus): Promise<void> => {
    this.statuses.set(voucherId, status);
  });
}

/**
 * Map-backed backup store keyed by user key; later copies replace earlier ones
 */
export class FakeBackupStore implements VoucherBackupPort {
  readonly entries = new Map<string, SignedVoucher[]>();

  backup = vi.fn(async (vouchers: readonly SignedVoucher[], userKey: string): Promise<void> => {
    const current = this.entries.get(userKey) ?? [];
    const ids = new Set(vouchers.map((v) => v.voucherId));
    this.entries.set(userKey, [...current.filter((v) => !ids.has(v.voucherId)), ...vouchers]);
  });

  restore = vi.fn(async (userKey: string): Promise<SignedVoucher[]> => {
    return [...(this.entries.get(userKey) ?? [])];
  });
}
