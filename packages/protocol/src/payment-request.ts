/**
 * NUT-18V payment requests
 *
 * Text form: `vreqA` followed by base64url (no padding) of the CBOR-encoded
 * short-key map. The clickable form adds the `cashu:` URI scheme.
 */

import { PAYMENT_REQUEST, PreconditionError, requireNonBlank } from '@vouchers/kernel';
import { base64urlDecode, base64urlEncode, CryptoError, decodeCbor, encodeCbor } from '@vouchers/crypto';
import {
  formatIssues,
  PaymentRequestSchema,
  RawPaymentRequestSchema,
  type PaymentPayload,
  type PaymentRequest,
  type PaymentTransport,
  type RawPaymentRequest,
  type RawPaymentTransport,
} from '@vouchers/schema';
import { uuidv4 } from 'uuidv7';

/**
 * Merchant-side options for a new payment request
 */
export interface PaymentRequestInput {
  issuerId: string;
  /** Defaults to the first 8 characters of a random UUID */
  paymentId?: string;
  amount?: number;
  /** Required when amount is set */
  unit?: string;
  description?: string;
  singleUse?: boolean;
  offlineVerification?: boolean;
  expiresAt?: number;
  mints?: readonly string[];
  callbackUrl?: string;
  nostrNprofile?: string;
  /** Defaults to true */
  includeMerchantTransport?: boolean;
  clickable?: boolean;
}

export interface GeneratedPaymentRequest {
  encoded: string;
  request: PaymentRequest;
}

export function merchantTransport(issuerId: string): PaymentTransport {
  return { type: 'merchant', target: `merchant:${issuerId}`, tags: [['issuer', issuerId]] };
}

export function httpPostTransport(url: string): PaymentTransport {
  return { type: 'post', target: url };
}

export function nostrTransport(nprofile: string): PaymentTransport {
  return { type: 'nostr', target: nprofile, tags: [['n', '17']] };
}

function present(value: string | undefined): value is string {
  return value !== undefined && value.trim().length > 0;
}

/**
 * Assemble a request from merchant options
 *
 * @throws PreconditionError for a blank issuer or an amount without unit
 */
export function buildPaymentRequest(input: PaymentRequestInput): PaymentRequest {
  requireNonBlank(input.issuerId, 'Issuer ID');
  if (input.amount !== undefined && !present(input.unit)) {
    throw new PreconditionError('Unit is required when amount is specified');
  }

  const transports: PaymentTransport[] = [];
  if (input.includeMerchantTransport ?? true) {
    transports.push(merchantTransport(input.issuerId));
  }
  if (present(input.callbackUrl)) {
    transports.push(httpPostTransport(input.callbackUrl));
  }
  if (present(input.nostrNprofile)) {
    transports.push(nostrTransport(input.nostrNprofile));
  }

  const request: PaymentRequest = {
    paymentId: present(input.paymentId)
      ? input.paymentId
      : uuidv4().slice(0, PAYMENT_REQUEST.paymentIdLength),
    issuerId: input.issuerId,
    amount: input.amount,
    unit: input.unit,
    description: input.description,
    mints: input.mints && input.mints.length > 0 ? [...input.mints] : undefined,
    singleUse: input.singleUse,
    offlineVerification: input.offlineVerification ?? false,
    expiresAt: input.expiresAt,
    transports,
  };
  return validatePaymentRequest(request);
}

export function validatePaymentRequest(request: unknown): PaymentRequest {
  const result = PaymentRequestSchema.safeParse(request);
  if (!result.success) {
    throw new PreconditionError(`Invalid payment request: ${formatIssues(result.error)}`);
  }
  return result.data;
}

function toRawTransport(transport: PaymentTransport): RawPaymentTransport {
  return transport.tags === undefined
    ? { t: transport.type, a: transport.target }
    : { t: transport.type, a: transport.target, g: transport.tags };
}

/**
 * Short-key form; absent fields are left out of the map entirely
 */
export function toRawPaymentRequest(request: PaymentRequest): RawPaymentRequest {
  const raw: RawPaymentRequest = { t: [], v: request.issuerId };
  if (request.paymentId !== undefined) raw.i = request.paymentId;
  if (request.amount !== undefined) raw.a = request.amount;
  if (request.unit !== undefined) raw.u = request.unit;
  if (request.singleUse !== undefined) raw.s = request.singleUse;
  if (request.mints !== undefined) raw.m = request.mints;
  if (request.description !== undefined) raw.d = request.description;
  raw.t = request.transports.map(toRawTransport);
  if (request.offlineVerification !== undefined) raw.o = request.offlineVerification;
  if (request.expiresAt !== undefined) raw.e = request.expiresAt;
  return raw;
}

export function fromRawPaymentRequest(input: unknown): PaymentRequest {
  const result = RawPaymentRequestSchema.safeParse(input);
  if (!result.success) {
    throw new PreconditionError(`Malformed payment request: ${formatIssues(result.error)}`);
  }
  const raw = result.data;
  return validatePaymentRequest({
    paymentId: raw.i,
    issuerId: raw.v,
    amount: raw.a,
    unit: raw.u,
    description: raw.d,
    mints: raw.m,
    singleUse: raw.s,
    offlineVerification: raw.o,
    expiresAt: raw.e,
    transports: raw.t.map((t) => ({ type: t.t, target: t.a, tags: t.g })),
  });
}

export function encodePaymentRequest(request: PaymentRequest, clickable = false): string {
  const valid = validatePaymentRequest(request);
  const encoded = `${PAYMENT_REQUEST.prefix}${base64urlEncode(encodeCbor(toRawPaymentRequest(valid)))}`;
  return clickable ? `${PAYMENT_REQUEST.uriScheme}${encoded}` : encoded;
}

/**
 * Parse `vreqA...` text, with or without the `cashu:` scheme
 */
export function decodePaymentRequest(text: string): PaymentRequest {
  let body = requireNonBlank(text, 'Payment request').trim();
  if (body.startsWith(PAYMENT_REQUEST.uriScheme)) {
    body = body.slice(PAYMENT_REQUEST.uriScheme.length);
  }
  if (!body.startsWith(PAYMENT_REQUEST.prefix)) {
    throw new PreconditionError(`Payment request must start with '${PAYMENT_REQUEST.prefix}'`);
  }

  let decoded: unknown;
  try {
    decoded = decodeCbor(base64urlDecode(body.slice(PAYMENT_REQUEST.prefix.length)));
  } catch (err) {
    if (err instanceof CryptoError) {
      throw new PreconditionError(`Malformed payment request: ${err.message}`);
    }
    throw err;
  }
  return fromRawPaymentRequest(decoded);
}

export function totalProofAmount(payload: PaymentPayload): number {
  return payload.proofs.reduce((sum, proof) => sum + proof.amount, 0);
}

export function allProofsHaveDleq(payload: PaymentPayload): boolean {
  return payload.proofs.every((proof) => proof.dleq !== undefined);
}

/**
 * An unrestricted request (no mints listed) accepts any mint
 */
export function isMintPermitted(request: PaymentRequest, mint: string): boolean {
  return request.mints === undefined || request.mints.length === 0 || request.mints.includes(mint);
}
