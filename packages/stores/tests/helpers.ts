import { bytesToHex } from '@vouchers/crypto';
import { generateKeypairFromSeed, seedFromLabel } from '@vouchers/crypto/testkit';
import { defaultSignatureService, VoucherSecret, type SignedVoucher } from '@vouchers/voucher';

export const NOW = 1_750_000_000;
export const USER_KEY = 'test-user-key';

export async function signedVoucher(faceValue = 1000, issuanceRatio = 1): Promise<SignedVoucher> {
  const { privateKey, publicKey } = await generateKeypairFromSeed(seedFromLabel(9));
  const secret = VoucherSecret.create({
    issuerId: 'bakery-42',
    unit: 'sat',
    faceValue,
    expiresAt: NOW + 3600,
    issuanceRatio,
  });
  return defaultSignatureService.createSigned(secret, privateKey, bytesToHex(publicKey));
}
