/**
 * Issuer-pluggable signature schemes
 *
 * A scheme signs arbitrary message bytes with a raw private key and checks
 * signatures against a raw public key. Voucher code depends only on this
 * interface; Ed25519 is the default implementation.
 */

import { getPublicKey, randomSecretKey, sign, verify } from './ed25519';
import { CryptoError } from './errors';

export interface SignatureScheme {
  /** Scheme identifier, e.g. "ed25519" */
  readonly name: string;
  readonly privateKeyLength: number;
  readonly publicKeyLength: number;
  readonly signatureLength: number;

  sign(message: Uint8Array, privateKey: Uint8Array): Promise<Uint8Array>;

  /**
   * Check a signature. Implementations may throw on malformed input; callers
   * that must not throw wrap this call.
   */
  verify(signature: Uint8Array, message: Uint8Array, publicKey: Uint8Array): Promise<boolean>;

  derivePublicKey(privateKey: Uint8Array): Promise<Uint8Array>;

  generatePrivateKey(): Uint8Array;
}

export interface Keypair {
  privateKey: Uint8Array;
  publicKey: Uint8Array;
}

function requireKeyLength(key: Uint8Array, expected: number, kind: string): void {
  if (key.length !== expected) {
    throw new CryptoError(
      'CRYPTO_INVALID_KEY_LENGTH',
      `Ed25519 ${kind} key must be ${expected} bytes, got ${key.length}`
    );
  }
}

/**
 * Ed25519 (RFC 8032): 32-byte keys, 64-byte signatures, deterministic nonces
 */
export const ed25519Scheme: SignatureScheme = Object.freeze({
  name: 'ed25519',
  privateKeyLength: 32,
  publicKeyLength: 32,
  signatureLength: 64,

  async sign(message: Uint8Array, privateKey: Uint8Array): Promise<Uint8Array> {
    requireKeyLength(privateKey, 32, 'private');
    return sign(message, privateKey);
  },

  async verify(signature: Uint8Array, message: Uint8Array, publicKey: Uint8Array): Promise<boolean> {
    if (signature.length !== 64 || publicKey.length !== 32) {
      return false;
    }
    return verify(signature, message, publicKey);
  },

  async derivePublicKey(privateKey: Uint8Array): Promise<Uint8Array> {
    requireKeyLength(privateKey, 32, 'private');
    return getPublicKey(privateKey);
  },

  generatePrivateKey(): Uint8Array {
    return randomSecretKey();
  },
});

/**
 * Generate a fresh keypair for a scheme
 */
export async function generateKeypair(scheme: SignatureScheme = ed25519Scheme): Promise<Keypair> {
  const privateKey = scheme.generatePrivateKey();
  const publicKey = await scheme.derivePublicKey(privateKey);
  return { privateKey, publicKey };
}
