/**
 * Wire forms of signed vouchers and their canonical secret map
 */

import { z } from 'zod';
import { BackingStrategy, BACKUP } from '@vouchers/kernel';
import { FiniteNumberSchema, nonBlank, SafeIntegerSchema } from './primitives';

const HEX_PATTERN = /^(?:[0-9a-fA-F]{2})+$/;

/**
 * Decoded canonical voucher map: all ten fields, nulls for absent optionals
 *
 * Range checks (positive face value, ratio, ...) belong to VoucherSecret.
 */
export const CanonicalVoucherFieldsSchema = z
  .object({
    voucherId: z.string(),
    issuerId: z.string(),
    unit: z.string(),
    faceValue: SafeIntegerSchema,
    expiresAt: SafeIntegerSchema.nullable(),
    memo: z.string().nullable(),
    backingStrategy: z.nativeEnum(BackingStrategy),
    issuanceRatio: FiniteNumberSchema,
    faceDecimals: SafeIntegerSchema,
    merchantMetadata: z.string().nullable(),
  })
  .strict();

export type CanonicalVoucherFields = z.output<typeof CanonicalVoucherFieldsSchema>;

/**
 * JSON form of a signed voucher
 *
 * `secret` is the hex of the canonical CBOR bytes, so the signed input travels
 * unchanged.
 */
export const SignedVoucherJsonSchema = z
  .object({
    secret: z.string().regex(HEX_PATTERN, 'secret must be hex-encoded canonical bytes'),
    issuerSignature: z
      .string()
      .regex(/^[0-9a-fA-F]{128}$/, 'issuerSignature must be 64 hex-encoded bytes'),
    issuerPublicKey: nonBlank('issuerPublicKey'),
  })
  .strict();

export type SignedVoucherJson = z.infer<typeof SignedVoucherJsonSchema>;

/**
 * Versioned payload written by backup stores
 */
export const BackupPayloadSchema = z
  .object({
    version: z.literal(BACKUP.payloadVersion),
    createdAt: z.number().int().nonnegative(),
    vouchers: z.array(SignedVoucherJsonSchema),
  })
  .strict();

export type BackupPayload = z.infer<typeof BackupPayloadSchema>;
