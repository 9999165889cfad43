/**
 * Typed errors for @vouchers/crypto
 *
 * CRYPTO_* codes are package-internal. The voucher layer turns them into
 * precondition errors or a `false` verification result.
 */

export type CryptoErrorCode =
  | 'CRYPTO_INVALID_KEY_LENGTH'
  | 'CRYPTO_INVALID_SEED_LENGTH'
  | 'CRYPTO_INVALID_HEX'
  | 'CRYPTO_INVALID_BASE64URL'
  | 'CRYPTO_INVALID_CBOR'
  | 'CRYPTO_NON_CANONICAL_VALUE';

/**
 * Typed error for crypto and encoding operations
 *
 * Use `err.code` to handle errors programmatically without message parsing.
 */
export class CryptoError extends Error {
  readonly code: CryptoErrorCode;

  constructor(code: CryptoErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'CryptoError';
    this.code = code;
    // Maintain proper prototype chain for instanceof checks
    Object.setPrototypeOf(this, CryptoError.prototype);
  }
}
