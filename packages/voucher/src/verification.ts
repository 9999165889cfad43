/**
 * Signature check over canonical bytes that never throws
 */

import { SIGNATURE } from '@vouchers/kernel';
import { hexToBytes, type SignatureScheme } from '@vouchers/crypto';

/**
 * False for a wrong signature length, a key that is not hex of the scheme's
 * key length, or a cryptographic mismatch.
 */
export async function verifyCanonicalSignature(
  scheme: SignatureScheme,
  message: Uint8Array,
  signature: Uint8Array,
  publicKeyHex: string
): Promise<boolean> {
  if (signature.length !== SIGNATURE.length) {
    return false;
  }

  let publicKey: Uint8Array;
  try {
    publicKey = hexToBytes(publicKeyHex.trim());
  } catch {
    return false;
  }
  if (publicKey.length !== scheme.publicKeyLength) {
    return false;
  }

  try {
    return await scheme.verify(signature, message, publicKey);
  } catch {
    // Schemes may throw on points that do not decode
    return false;
  }
}
