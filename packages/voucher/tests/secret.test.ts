/**
 * Tests for voucher terms and their canonical encoding
 */

import { describe, it, expect } from 'vitest';
import * as fc from 'fast-check';
import { PreconditionError, type BackingStrategy } from '@vouchers/kernel';
import { bytesToHex, hexToBytes } from '@vouchers/crypto';
import {
  VoucherSecret,
  decodeVoucherSecret,
  encodeVoucherSecret,
  type VoucherSecretInit,
} from '../src/index';
import { sampleSecret, VOUCHER_ID } from './helpers';

const MINIMAL_HEX =
  'aa69766f75636865724964782430313930623662342d386434652d376333612d396630302d3262316333643465356636' +
  '306869737375657249646473686f7064756e697463736174696661636556616c75651903e869657870697265734174f6' +
  '646d656d6ff66f6261636b696e6753747261746567796546495845446d69737375616e6365526174696f016c66616365' +
  '446563696d616c7300706d65726368616e744d65746164617461f6';

const FULL_HEX =
  'aa69766f75636865724964782430313930623662342d386434652d376333612d396630302d3262316333643465356636' +
  '306869737375657249646473686f7064756e697463736174696661636556616c75651903e8696578706972657341741a' +
  '684ee180646d656d6f64476966746f6261636b696e6753747261746567796c50524f504f5254494f4e414c6d69737375' +
  '616e6365526174696ffb3fe00000000000006c66616365446563696d616c7302706d65726368616e744d657461646174' +
  '61677b2261223a317d';

describe('VoucherSecret.create', () => {
  it('applies issuance defaults', () => {
    const secret = VoucherSecret.create({ issuerId: 'shop', unit: 'sat', faceValue: 10 });
    expect(secret.backingStrategy).toBe('FIXED');
    expect(secret.issuanceRatio).toBe(1);
    expect(secret.faceDecimals).toBe(0);
    expect(secret.expiresAt).toBeNull();
    expect(secret.memo).toBeNull();
    expect(secret.merchantMetadata).toBeNull();
  });

  it('generates time-ordered UUIDs when no id is given', () => {
    const secret = VoucherSecret.create({ issuerId: 'shop', unit: 'sat', faceValue: 10 });
    expect(secret.voucherId).toMatch(/^[0-9a-f]{8}-[0-9a-f]{4}-7[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/);
  });

  it('lowercases supplied ids', () => {
    expect(sampleSecret({ voucherId: VOUCHER_ID.toUpperCase() }).voucherId).toBe(VOUCHER_ID);
  });

  it('treats a blank memo as absent', () => {
    expect(sampleSecret({ memo: '   ' }).memo).toBeNull();
  });

  it('treats empty metadata as absent', () => {
    expect(sampleSecret({ merchantMetadata: {} }).merchantMetadata).toBeNull();
  });

  it('stores metadata as canonical JSON', () => {
    const secret = sampleSecret({ merchantMetadata: { tier: 'gold', branch: 7 } });
    expect(secret.merchantMetadata).toBe('{"branch":7,"tier":"gold"}');
    expect(secret.metadata()).toEqual({ tier: 'gold', branch: 7 });
  });

  const invalid: Array<[Partial<VoucherSecretInit>, string]> = [
    [{ faceValue: 0 }, 'Face value must be positive, got: 0'],
    [{ faceValue: -5 }, 'Face value must be positive, got: -5'],
    [{ faceValue: 2.5 }, 'Face value must be positive, got: 2.5'],
    [{ issuerId: ' ' }, 'Issuer ID cannot be blank'],
    [{ unit: '' }, 'Unit cannot be blank'],
    [{ expiresAt: 0 }, 'Expiry timestamp must be positive if provided'],
    [{ issuanceRatio: 0 }, 'Issuance ratio must be positive, got: 0'],
    [{ faceDecimals: -1 }, 'Face decimals must be non-negative, got: -1'],
    [{ voucherId: 'voucher-1' }, 'Voucher ID must be a valid UUID'],
  ];

  it.each(invalid)('rejects %j', (overrides, message) => {
    expect(() => sampleSecret(overrides)).toThrow(PreconditionError);
    expect(() => sampleSecret(overrides)).toThrow(message);
  });

  it('rejects metadata that is not JSON-safe', () => {
    expect(() => sampleSecret({ merchantMetadata: { ratio: NaN } })).toThrow(PreconditionError);
  });

  it('is frozen', () => {
    expect(Object.isFrozen(sampleSecret())).toBe(true);
  });
});

describe('canonical encoding', () => {
  it('encodes absent optionals as null in fixed field order', () => {
    const secret = VoucherSecret.create({
      voucherId: VOUCHER_ID,
      issuerId: 'shop',
      unit: 'sat',
      faceValue: 1000,
    });
    expect(bytesToHex(encodeVoucherSecret(secret))).toBe(MINIMAL_HEX);
  });

  it('encodes every optional field', () => {
    const secret = VoucherSecret.create({
      voucherId: VOUCHER_ID,
      issuerId: 'shop',
      unit: 'sat',
      faceValue: 1000,
      expiresAt: 1_750_000_000,
      memo: 'Gift',
      backingStrategy: 'PROPORTIONAL',
      issuanceRatio: 0.5,
      faceDecimals: 2,
      merchantMetadata: { a: 1 },
    });
    expect(secret.toHex()).toBe(FULL_HEX);
  });

  it('ignores metadata key order', () => {
    const a = sampleSecret({ merchantMetadata: { x: 1, y: 2 } });
    const b = sampleSecret({ merchantMetadata: { y: 2, x: 1 } });
    expect(a.toCanonicalBytes()).toEqual(b.toCanonicalBytes());
  });

  it('changes with any field', () => {
    const base = sampleSecret().toHex();
    expect(sampleSecret({ faceValue: 1001 }).toHex()).not.toBe(base);
    expect(sampleSecret({ memo: null }).toHex()).not.toBe(base);
    expect(sampleSecret({ faceDecimals: 1 }).toHex()).not.toBe(base);
  });
});

describe('decodeVoucherSecret', () => {
  it('restores every field', () => {
    const secret = sampleSecret({
      backingStrategy: 'MINIMAL',
      issuanceRatio: 1.25,
      faceDecimals: 2,
      merchantMetadata: { campaign: 'spring' },
    });
    const decoded = decodeVoucherSecret(secret.toCanonicalBytes());
    expect(decoded.equals(secret)).toBe(true);
    expect(decoded.metadata()).toEqual({ campaign: 'spring' });
  });

  it('keeps whole issuance ratios beyond 32 bits', () => {
    for (const issuanceRatio of [5e9, 1e20]) {
      const secret = sampleSecret({ issuanceRatio });
      const decoded = VoucherSecret.fromHex(secret.toHex());
      expect(decoded.issuanceRatio).toBe(issuanceRatio);
      expect(decoded.equals(secret)).toBe(true);
    }
  });

  it('keeps large integers exact', () => {
    const secret = sampleSecret({ faceValue: 9_007_199_254_740_991, expiresAt: 5_000_000_000 });
    const decoded = VoucherSecret.fromHex(secret.toHex());
    expect(decoded.faceValue).toBe(9_007_199_254_740_991);
    expect(decoded.expiresAt).toBe(5_000_000_000);
  });

  it('rejects bytes that are not a voucher map', () => {
    expect(() => decodeVoucherSecret(hexToBytes('a16161f6'))).toThrow(/^Malformed voucher secret/);
  });

  it('rejects truncated bytes', () => {
    const bytes = sampleSecret().toCanonicalBytes();
    expect(() => decodeVoucherSecret(bytes.slice(0, 20))).toThrow(PreconditionError);
  });

  it('rejects non-canonical encodings of valid terms', () => {
    // Same terms with the voucher id in upper case
    const upper = MINIMAL_HEX.replace('30313930623662342d', '30313930423642342d');
    expect(() => VoucherSecret.fromHex(upper)).toThrow('Voucher secret is not canonically encoded');
  });

  it('rejects non-hex text', () => {
    expect(() => VoucherSecret.fromHex('zz')).toThrow('Voucher secret must be hex');
  });
});

describe('canonical encoding properties', () => {
  const text = fc.string({ minLength: 1, maxLength: 24 }).filter((s) => s.trim().length > 0);

  const init: fc.Arbitrary<VoucherSecretInit> = fc.record({
    voucherId: fc.uuid().map((id) => id.toLowerCase()),
    issuerId: text,
    unit: text,
    faceValue: fc.integer({ min: 1, max: 2 ** 40 }),
    expiresAt: fc.option(fc.integer({ min: 1, max: 2 ** 40 }), { nil: null }),
    memo: fc.option(text, { nil: null }),
    backingStrategy: fc.constantFrom<BackingStrategy>('FIXED', 'MINIMAL', 'PROPORTIONAL'),
    issuanceRatio: fc.oneof(
      fc.double({ min: 0.001, max: 1_000_000, noNaN: true }),
      fc.integer({ min: 2 ** 32, max: Number.MAX_SAFE_INTEGER }),
      fc.double({ min: 2 ** 53, max: 1e30, noNaN: true })
    ),
    faceDecimals: fc.integer({ min: 0, max: 8 }),
    merchantMetadata: fc.option(
      fc.dictionary(fc.constantFrom('campaign', 'tier', 'region'), fc.string({ maxLength: 12 })),
      { nil: null }
    ),
  });

  it('decodes to the terms it was encoded from', () => {
    fc.assert(
      fc.property(init, (terms) => {
        const secret = VoucherSecret.create(terms);
        const decoded = decodeVoucherSecret(encodeVoucherSecret(secret));
        expect(decoded.equals(secret)).toBe(true);
      })
    );
  });

  it('always writes a ten-entry map header', () => {
    fc.assert(
      fc.property(init, (terms) => {
        expect(encodeVoucherSecret(VoucherSecret.create(terms))[0]).toBe(0xaa);
      })
    );
  });
});
