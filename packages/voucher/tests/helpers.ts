import { bytesToHex } from '@vouchers/crypto';
import { generateKeypairFromSeed, seedFromLabel } from '@vouchers/crypto/testkit';
import { VoucherSecret, defaultSignatureService, type SignedVoucher, type VoucherSecretInit } from '../src/index';

export const NOW = 1_750_000_000;
export const VOUCHER_ID = '0190b6b4-8d4e-7c3a-9f00-2b1c3d4e5f60';

export interface IssuerKeys {
  privateKey: Uint8Array;
  publicKeyHex: string;
}

export async function issuerKeys(label = 1): Promise<IssuerKeys> {
  const { privateKey, publicKey } = await generateKeypairFromSeed(seedFromLabel(label));
  return { privateKey, publicKeyHex: bytesToHex(publicKey) };
}

export function sampleSecret(overrides: Partial<VoucherSecretInit> = {}): VoucherSecret {
  return VoucherSecret.create({
    voucherId: VOUCHER_ID,
    issuerId: 'bakery-42',
    unit: 'sat',
    faceValue: 1000,
    expiresAt: NOW + 86400,
    memo: 'Gift card',
    ...overrides,
  });
}

export async function signedSample(
  overrides: Partial<VoucherSecretInit> = {},
  label = 1
): Promise<SignedVoucher> {
  const keys = await issuerKeys(label);
  return defaultSignatureService.createSigned(sampleSecret(overrides), keys.privateKey, keys.publicKeyHex);
}
