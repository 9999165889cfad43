/**
 * VoucherSecret: the immutable terms a merchant signs
 */

import { uuidv7 } from 'uuidv7';
import {
  BackingStrategy,
  ISSUANCE,
  PreconditionError,
  isBackingStrategy,
  requireNonBlank,
  requireUuid,
  type JsonObject,
} from '@vouchers/kernel';
import { bytesEqual, bytesToHex, canonicalize, CryptoError, hexToBytes } from '@vouchers/crypto';
import { formatIssues, JsonObjectSchema, type CanonicalVoucherFields } from '@vouchers/schema';
import { decodeCanonicalFields, encodeCanonicalFields } from './encoding';
import type { VoucherSecretInit } from './types';

function normalizeMemo(memo: string | null | undefined): string | null {
  return memo === undefined || memo === null || memo.trim().length === 0 ? null : memo;
}

/**
 * Metadata travels as RFC 8785 text; an empty map is the same as no map
 */
function canonicalMetadata(metadata: JsonObject | null | undefined): string | null {
  if (metadata === undefined || metadata === null) {
    return null;
  }
  const parsed = JsonObjectSchema.safeParse(metadata);
  if (!parsed.success) {
    throw new PreconditionError(
      `Merchant metadata must be JSON-safe: ${formatIssues(parsed.error)}`
    );
  }
  return Object.keys(parsed.data).length === 0 ? null : canonicalize(parsed.data);
}

function parseMetadata(text: string): JsonObject {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    throw new PreconditionError(`Merchant metadata is not valid JSON: ${String(err)}`);
  }
  const parsed = JsonObjectSchema.safeParse(raw);
  if (!parsed.success) {
    throw new PreconditionError(`Merchant metadata must be a JSON object: ${formatIssues(parsed.error)}`);
  }
  return parsed.data;
}

export class VoucherSecret {
  readonly voucherId: string;
  readonly issuerId: string;
  readonly unit: string;
  readonly faceValue: number;
  readonly expiresAt: number | null;
  readonly memo: string | null;
  readonly backingStrategy: BackingStrategy;
  readonly issuanceRatio: number;
  readonly faceDecimals: number;
  /** Canonical JSON text of the merchant metadata, or null */
  readonly merchantMetadata: string | null;

  private constructor(fields: CanonicalVoucherFields) {
    this.voucherId = fields.voucherId;
    this.issuerId = fields.issuerId;
    this.unit = fields.unit;
    this.faceValue = fields.faceValue;
    this.expiresAt = fields.expiresAt;
    this.memo = fields.memo;
    this.backingStrategy = fields.backingStrategy;
    this.issuanceRatio = fields.issuanceRatio;
    this.faceDecimals = fields.faceDecimals;
    this.merchantMetadata = fields.merchantMetadata;
    Object.freeze(this);
  }

  /**
   * Validate terms and build a secret
   *
   * @throws PreconditionError for blank ids, non-positive amounts or ratios,
   *   a malformed voucher id or metadata that is not JSON-safe
   */
  static create(init: VoucherSecretInit): VoucherSecret {
    const faceValue = init.faceValue;
    if (typeof faceValue !== 'number' || !Number.isSafeInteger(faceValue) || faceValue <= 0) {
      throw new PreconditionError(`Face value must be positive, got: ${String(faceValue)}`);
    }

    const expiresAt = init.expiresAt ?? null;
    if (expiresAt !== null && (!Number.isSafeInteger(expiresAt) || expiresAt <= 0)) {
      throw new PreconditionError('Expiry timestamp must be positive if provided');
    }

    const backingStrategy = init.backingStrategy ?? ISSUANCE.defaultBackingStrategy;
    if (!isBackingStrategy(backingStrategy)) {
      throw new PreconditionError(`Unknown backing strategy: ${String(backingStrategy)}`);
    }

    const issuanceRatio = init.issuanceRatio ?? ISSUANCE.defaultIssuanceRatio;
    if (!Number.isFinite(issuanceRatio) || issuanceRatio <= 0) {
      throw new PreconditionError(`Issuance ratio must be positive, got: ${issuanceRatio}`);
    }

    const faceDecimals = init.faceDecimals ?? ISSUANCE.defaultFaceDecimals;
    if (!Number.isSafeInteger(faceDecimals) || faceDecimals < 0) {
      throw new PreconditionError(`Face decimals must be non-negative, got: ${faceDecimals}`);
    }

    return new VoucherSecret({
      voucherId: init.voucherId === undefined ? uuidv7() : requireUuid(init.voucherId, 'Voucher ID'),
      issuerId: requireNonBlank(init.issuerId, 'Issuer ID'),
      unit: requireNonBlank(init.unit, 'Unit'),
      faceValue,
      expiresAt,
      memo: normalizeMemo(init.memo),
      backingStrategy,
      issuanceRatio,
      faceDecimals,
      merchantMetadata: canonicalMetadata(init.merchantMetadata),
    });
  }

  /**
   * Rebuild a secret from its canonical bytes
   *
   * Bytes that decode but would not re-encode identically are rejected, so a
   * decoded secret always signs the bytes it came from.
   */
  static fromCanonicalBytes(bytes: Uint8Array): VoucherSecret {
    const fields = decodeCanonicalFields(bytes);
    const secret = VoucherSecret.create({
      ...fields,
      merchantMetadata: fields.merchantMetadata === null ? null : parseMetadata(fields.merchantMetadata),
    });
    if (!bytesEqual(secret.toCanonicalBytes(), bytes)) {
      throw new PreconditionError('Voucher secret is not canonically encoded');
    }
    return secret;
  }

  static fromHex(hex: string): VoucherSecret {
    let bytes: Uint8Array;
    try {
      bytes = hexToBytes(hex);
    } catch (err) {
      if (err instanceof CryptoError) {
        throw new PreconditionError(`Voucher secret must be hex: ${err.message}`);
      }
      throw err;
    }
    return VoucherSecret.fromCanonicalBytes(bytes);
  }

  toCanonicalFields(): CanonicalVoucherFields {
    return {
      voucherId: this.voucherId,
      issuerId: this.issuerId,
      unit: this.unit,
      faceValue: this.faceValue,
      expiresAt: this.expiresAt,
      memo: this.memo,
      backingStrategy: this.backingStrategy,
      issuanceRatio: this.issuanceRatio,
      faceDecimals: this.faceDecimals,
      merchantMetadata: this.merchantMetadata,
    };
  }

  /**
   * The exact bytes that are signed and verified
   */
  toCanonicalBytes(): Uint8Array {
    return encodeCanonicalFields(this.toCanonicalFields());
  }

  toHex(): string {
    return bytesToHex(this.toCanonicalBytes());
  }

  /**
   * Fresh copy of the merchant metadata map
   */
  metadata(): JsonObject | null {
    return this.merchantMetadata === null ? null : parseMetadata(this.merchantMetadata);
  }

  /**
   * Same terms, field by field
   */
  equals(other: VoucherSecret): boolean {
    return (
      this.voucherId === other.voucherId &&
      this.issuerId === other.issuerId &&
      this.unit === other.unit &&
      this.faceValue === other.faceValue &&
      this.expiresAt === other.expiresAt &&
      this.memo === other.memo &&
      this.backingStrategy === other.backingStrategy &&
      this.issuanceRatio === other.issuanceRatio &&
      this.faceDecimals === other.faceDecimals &&
      this.merchantMetadata === other.merchantMetadata
    );
  }

  toString(): string {
    const expiry = this.expiresAt === null ? '' : `, expiresAt=${this.expiresAt}`;
    return `VoucherSecret{voucherId='${this.voucherId}', issuerId='${this.issuerId}', unit='${this.unit}', faceValue=${this.faceValue}${expiry}}`;
  }
}

export function encodeVoucherSecret(secret: VoucherSecret): Uint8Array {
  return secret.toCanonicalBytes();
}

export function decodeVoucherSecret(bytes: Uint8Array): VoucherSecret {
  return VoucherSecret.fromCanonicalBytes(bytes);
}
