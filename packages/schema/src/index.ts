/**
 * Voucher Schema Package
 * zod schemas for every wire form that crosses a package boundary
 */

export { isPlainObject, JsonPrimitiveSchema, JsonValueSchema, JsonObjectSchema } from './json';

export { FiniteNumberSchema, nonBlank, SafeIntegerSchema } from './primitives';

export {
  CanonicalVoucherFieldsSchema,
  SignedVoucherJsonSchema,
  BackupPayloadSchema,
} from './voucher';
export type { CanonicalVoucherFields, SignedVoucherJson, BackupPayload } from './voucher';

export { IssuancePolicySchema } from './policy';
export type { IssuancePolicy, IssuancePolicyInput } from './policy';

export {
  TRANSPORT_TYPES,
  PaymentTransportSchema,
  PaymentRequestSchema,
  RawPaymentTransportSchema,
  RawPaymentRequestSchema,
  DleqProofSchema,
  PaymentProofSchema,
  PaymentPayloadSchema,
} from './payment';
export type {
  TransportType,
  PaymentTransport,
  PaymentRequest,
  RawPaymentTransport,
  RawPaymentRequest,
  PaymentProof,
  PaymentPayload,
} from './payment';

export { formatIssues } from './issues';
