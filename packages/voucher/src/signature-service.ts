/**
 * VoucherSignatureService
 *
 * Stateless signer/verifier over canonical voucher bytes. One instance is
 * built per scheme and passed by reference to everything that signs or
 * verifies; there is no process-wide mutable state.
 */

import { PreconditionError, requirePresent, SIGNATURE } from '@vouchers/kernel';
import { bytesToHex, ed25519Scheme, type SignatureScheme } from '@vouchers/crypto';
import { VoucherSecret } from './secret';
import { SignedVoucher } from './signed-voucher';
import { verifyCanonicalSignature } from './verification';
import type { VoucherVerifier } from './types';

function requirePrivateKey(scheme: SignatureScheme, privateKey: Uint8Array): void {
  requirePresent(privateKey, 'Private key');
  if (privateKey.length !== scheme.privateKeyLength) {
    throw new PreconditionError(
      `Private key must be ${scheme.privateKeyLength} bytes, got: ${privateKey.length}`
    );
  }
}

export class VoucherSignatureService implements VoucherVerifier {
  readonly scheme: SignatureScheme;

  constructor(scheme: SignatureScheme = ed25519Scheme) {
    this.scheme = scheme;
  }

  /**
   * Sign the canonical bytes of a secret
   *
   * @returns 64-byte signature
   */
  async sign(secret: VoucherSecret, privateKey: Uint8Array): Promise<Uint8Array> {
    requirePresent(secret, 'Voucher secret');
    requirePrivateKey(this.scheme, privateKey);

    const signature = await this.scheme.sign(secret.toCanonicalBytes(), privateKey);
    if (signature.length !== SIGNATURE.length) {
      throw new PreconditionError(
        `Signature scheme ${this.scheme.name} produced ${signature.length} bytes, expected ${SIGNATURE.length}`
      );
    }
    return signature;
  }

  /**
   * Check an issuer signature
   *
   * Returns false, never throws, for malformed signatures or keys. Only
   * missing arguments are precondition errors.
   */
  async verify(secret: VoucherSecret, signature: Uint8Array, publicKeyHex: string): Promise<boolean> {
    requirePresent(secret, 'Voucher secret');
    requirePresent(signature, 'Signature');
    requirePresent(publicKeyHex, 'Public key');
    return verifyCanonicalSignature(this.scheme, secret.toCanonicalBytes(), signature, publicKeyHex);
  }

  async derivePublicKeyHex(privateKey: Uint8Array): Promise<string> {
    requirePrivateKey(this.scheme, privateKey);
    return bytesToHex(await this.scheme.derivePublicKey(privateKey));
  }

  /**
   * Sign a secret and bundle it with the issuer public key
   *
   * The public key is derived from the private key when not given.
   */
  async createSigned(
    secret: VoucherSecret,
    privateKey: Uint8Array,
    publicKeyHex?: string
  ): Promise<SignedVoucher> {
    const signature = await this.sign(secret, privateKey);
    const publicKey = publicKeyHex ?? (await this.derivePublicKeyHex(privateKey));
    return new SignedVoucher(secret, signature, publicKey);
  }
}

/**
 * Shared Ed25519 service; frozen so it cannot be reconfigured at runtime
 */
export const defaultSignatureService: VoucherSignatureService = Object.freeze(
  new VoucherSignatureService()
);
