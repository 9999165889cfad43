/**
 * Internal Ed25519 wrapper -- async-only surface
 *
 * Only the async methods of @noble/ed25519 are used. They run on the
 * built-in Web Crypto SHA-512 and need no hash configuration. Other modules
 * in this package import from here, never from '@noble/ed25519' directly.
 *
 * Key material:
 * - private keys are 32-byte seeds
 * - public keys are 32-byte compressed points
 * - key bytes are never logged
 */

import { getPublicKeyAsync, signAsync, utils, verifyAsync } from '@noble/ed25519';

/** Sign a message with Ed25519 (deterministic nonce) */
export const sign = signAsync;

/** Verify an Ed25519 signature */
export const verify = verifyAsync;

/** Derive the public key from a private key */
export const getPublicKey = getPublicKeyAsync;

/** Generate a random 32-byte secret key (CSPRNG) */
export const randomSecretKey = utils.randomSecretKey;
