/**
 * NUT-18V payment requests and payloads
 *
 * A request exists in two shapes: the descriptive form used in code and the
 * short-key raw form that is CBOR-encoded into `vreqA...` text.
 */

import { z } from 'zod';
import { nonBlank, SafeIntegerSchema } from './primitives';

export const TRANSPORT_TYPES = ['merchant', 'post', 'nostr'] as const;

export type TransportType = (typeof TRANSPORT_TYPES)[number];

const TagsSchema = z.array(z.array(z.string()));

export const PaymentTransportSchema = z
  .object({
    type: z.enum(TRANSPORT_TYPES),
    target: nonBlank('target'),
    tags: TagsSchema.optional(),
  })
  .strict();

export type PaymentTransport = z.infer<typeof PaymentTransportSchema>;

export const PaymentRequestSchema = z
  .object({
    paymentId: z.string().optional(),
    issuerId: nonBlank('issuerId'),
    amount: z.number().int().positive().optional(),
    unit: z.string().optional(),
    description: z.string().optional(),
    mints: z.array(z.string()).optional(),
    singleUse: z.boolean().optional(),
    offlineVerification: z.boolean().optional(),
    expiresAt: z.number().int().positive().optional(),
    transports: z.array(PaymentTransportSchema),
  })
  .strict();

export type PaymentRequest = z.infer<typeof PaymentRequestSchema>;

export const RawPaymentTransportSchema = z
  .object({
    t: z.enum(TRANSPORT_TYPES),
    a: nonBlank('transport target'),
    g: TagsSchema.optional(),
  })
  .strict();

export type RawPaymentTransport = z.infer<typeof RawPaymentTransportSchema>;

/**
 * Short keys: i id, a amount, u unit, s single use, m mints, d description,
 * t transports, v issuer, o offline verification, e expiry
 */
export const RawPaymentRequestSchema = z
  .object({
    i: z.string().optional(),
    a: SafeIntegerSchema.optional(),
    u: z.string().optional(),
    s: z.boolean().optional(),
    m: z.array(z.string()).optional(),
    d: z.string().optional(),
    t: z.array(RawPaymentTransportSchema),
    v: nonBlank('issuer'),
    o: z.boolean().optional(),
    e: SafeIntegerSchema.optional(),
  })
  .strict();

export type RawPaymentRequest = z.input<typeof RawPaymentRequestSchema>;

export const DleqProofSchema = z
  .object({
    e: nonBlank('dleq.e'),
    s: nonBlank('dleq.s'),
    r: z.string().optional(),
  })
  .strict();

export const PaymentProofSchema = z
  .object({
    amount: z.number().int().positive(),
    keysetId: nonBlank('keysetId'),
    secret: nonBlank('secret'),
    signature: nonBlank('signature'),
    dleq: DleqProofSchema.optional(),
  })
  .strict();

export type PaymentProof = z.infer<typeof PaymentProofSchema>;

export const PaymentPayloadSchema = z
  .object({
    id: z.string().optional(),
    issuerId: z.string(),
    mint: z.string(),
    unit: z.string(),
    memo: z.string().optional(),
    proofs: z.array(PaymentProofSchema),
  })
  .strict();

export type PaymentPayload = z.infer<typeof PaymentPayloadSchema>;
