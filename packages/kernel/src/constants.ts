/**
 * Voucher Protocol Constants
 *
 * Fixed sizes, prefixes and defaults shared by every package.
 */

/**
 * Signature and key sizes
 *
 * Signatures are always 64 bytes, whichever scheme the issuer plugs in.
 * Ed25519 keys (the default scheme) are 32 bytes.
 */
export const SIGNATURE = {
  length: 64,
  publicKeyLength: 32,
  privateKeyLength: 32,
} as const;

/**
 * Canonical encoding field order
 *
 * Every field is always present in the encoded map; absent optionals are
 * written as the null sentinel.
 */
export const CANONICAL_FIELDS = [
  'voucherId',
  'issuerId',
  'unit',
  'faceValue',
  'expiresAt',
  'memo',
  'backingStrategy',
  'issuanceRatio',
  'faceDecimals',
  'merchantMetadata',
] as const;

/**
 * Issuance defaults
 */
export const ISSUANCE = {
  defaultBackingStrategy: 'FIXED' as const,
  defaultIssuanceRatio: 1,
  defaultFaceDecimals: 0,
  maxVoucherAmount: Number.MAX_SAFE_INTEGER,
  maxExpiryDays: 3650, // 10 years
  secondsPerDay: 86400,
} as const;

/**
 * NUT-18V payment request encoding
 */
export const PAYMENT_REQUEST = {
  prefix: 'vreqA' as const,
  uriScheme: 'cashu:' as const,
  paymentIdLength: 8,
} as const;

/**
 * Backup payload settings
 */
export const BACKUP = {
  payloadVersion: 1 as const,
} as const;

/**
 * Wallet cache defaults
 */
export const WALLET = {
  statusStaleAfterSeconds: 300,
} as const;
