/**
 * Crypto Test Kit
 *
 * Utilities for TEST FIXTURES ONLY. Not exported from the main entry point.
 *
 * Import path: @vouchers/crypto/testkit
 */

import { getPublicKey } from './ed25519';
import { CryptoError } from './errors';
import type { Keypair } from './signature';

/**
 * Generate an Ed25519 keypair from a deterministic seed.
 *
 * WARNING: FOR TEST FIXTURES ONLY. Seeded keys are predictable.
 *
 * @example
 * ```ts
 * import { generateKeypairFromSeed, seedFromLabel } from '@vouchers/crypto/testkit';
 *
 * const { privateKey, publicKey } = await generateKeypairFromSeed(seedFromLabel(1));
 * ```
 */
export async function generateKeypairFromSeed(seed: Uint8Array): Promise<Keypair> {
  if (seed.length !== 32) {
    throw new CryptoError('CRYPTO_INVALID_SEED_LENGTH', 'Ed25519 seed must be 32 bytes');
  }

  // In Ed25519 the private key is the seed itself
  const privateKey = new Uint8Array(seed);
  const publicKey = await getPublicKey(privateKey);

  return { privateKey, publicKey };
}

/**
 * 32-byte seed filled with a single byte value, for readable fixtures
 */
export function seedFromLabel(label: number): Uint8Array {
  return new Uint8Array(32).fill(label & 0xff);
}
