/**
 * Voucher Crypto Package
 *
 * Ed25519 signing behind a pluggable scheme interface, deterministic CBOR,
 * JSON Canonicalization (RFC 8785) and byte/text helpers.
 *
 * @packageDocumentation
 */

export * from './base64url';
export * from './cbor';
export * from './errors';
export * from './hash';
export * from './jcs';
export * from './signature';
