/**
 * SignedVoucher: terms, issuer signature and issuer public key
 *
 * The signature is copied when the voucher is built and on every read, so no
 * caller-held array can change a voucher after construction.
 */

import {
  epochSeconds,
  PreconditionError,
  requireNonBlank,
  requirePresent,
  SIGNATURE,
} from '@vouchers/kernel';
import { bytesEqual, bytesToHex, ed25519Scheme, hexToBytes } from '@vouchers/crypto';
import { formatIssues, SignedVoucherJsonSchema, type SignedVoucherJson } from '@vouchers/schema';
import { VoucherSecret } from './secret';
import { verifyCanonicalSignature } from './verification';
import type { VoucherVerifier } from './types';

export class SignedVoucher {
  readonly secret: VoucherSecret;
  readonly issuerPublicKey: string;
  private readonly signatureBytes: Uint8Array;

  constructor(secret: VoucherSecret, issuerSignature: Uint8Array, issuerPublicKey: string) {
    this.secret = requirePresent(secret, 'Voucher secret');
    requirePresent(issuerSignature, 'Issuer signature');
    if (issuerSignature.length !== SIGNATURE.length) {
      throw new PreconditionError(
        `Issuer signature must be exactly ${SIGNATURE.length} bytes, got: ${issuerSignature.length}`
      );
    }
    this.issuerPublicKey = requireNonBlank(issuerPublicKey, 'Issuer public key');
    this.signatureBytes = new Uint8Array(issuerSignature);
  }

  /**
   * Copy of the 64 signature bytes
   */
  get issuerSignature(): Uint8Array {
    return new Uint8Array(this.signatureBytes);
  }

  get voucherId(): string {
    return this.secret.voucherId;
  }

  get issuerId(): string {
    return this.secret.issuerId;
  }

  /**
   * Pure signature check; Ed25519 unless another verifier is supplied
   */
  async verify(verifier?: VoucherVerifier): Promise<boolean> {
    if (verifier) {
      return verifier.verify(this.secret, this.signatureBytes, this.issuerPublicKey);
    }
    return verifyCanonicalSignature(
      ed25519Scheme,
      this.secret.toCanonicalBytes(),
      this.signatureBytes,
      this.issuerPublicKey
    );
  }

  /**
   * True once `now` reaches expiresAt; vouchers without expiry never expire
   */
  isExpired(now: number = epochSeconds()): boolean {
    const expiresAt = this.secret.expiresAt;
    return expiresAt !== null && expiresAt <= now;
  }

  async isValid(verifier?: VoucherVerifier, now?: number): Promise<boolean> {
    return (await this.verify(verifier)) && !this.isExpired(now);
  }

  equals(other: SignedVoucher): boolean {
    return (
      this.secret.equals(other.secret) &&
      bytesEqual(this.signatureBytes, other.signatureBytes) &&
      this.issuerPublicKey === other.issuerPublicKey
    );
  }

  toJSON(): SignedVoucherJson {
    return {
      secret: this.secret.toHex(),
      issuerSignature: bytesToHex(this.signatureBytes),
      issuerPublicKey: this.issuerPublicKey,
    };
  }

  toString(): string {
    return `SignedVoucher{voucherId='${this.voucherId}', issuerId='${this.issuerId}', faceValue=${this.secret.faceValue} ${this.secret.unit}}`;
  }

  /**
   * @throws PreconditionError when the input is not a well-formed voucher
   */
  static fromJSON(input: unknown): SignedVoucher {
    const parsed = SignedVoucherJsonSchema.safeParse(input);
    if (!parsed.success) {
      throw new PreconditionError(`Invalid signed voucher: ${formatIssues(parsed.error)}`);
    }
    const { secret, issuerSignature, issuerPublicKey } = parsed.data;
    return new SignedVoucher(
      VoucherSecret.fromHex(secret),
      hexToBytes(issuerSignature),
      issuerPublicKey
    );
  }
}

export function signedVoucherFromJson(input: unknown): SignedVoucher {
  return SignedVoucher.fromJSON(input);
}
