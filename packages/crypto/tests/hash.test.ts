/**
 * Hex and SHA-256 utilities tests
 */

import { describe, it, expect } from 'vitest';
import { sha256Hex, sha256Bytes, hexToBytes, bytesToHex, bytesEqual } from '../src/hash';
import { CryptoError } from '../src/errors';

describe('sha256', () => {
  it('should hash a string', async () => {
    expect(await sha256Hex('hello')).toBe(
      '2cf24dba5fb0a30e26e83b2ac5b9e29e1b161e5c1fa7425e73043362938b9824'
    );
  });

  it('should hash the empty string', async () => {
    expect(await sha256Hex('')).toBe(
      'e3b0c44298fc1c149afbf4c8996fb92427ae41e4649b934ca495991b7852b855'
    );
  });

  it('should treat strings and their UTF-8 bytes alike', async () => {
    const fromBytes = await sha256Bytes(new TextEncoder().encode('hello'));
    expect(fromBytes.length).toBe(32);
    expect(bytesToHex(fromBytes)).toBe(await sha256Hex('hello'));
  });
});

describe('hexToBytes and bytesToHex', () => {
  it('should convert both ways', () => {
    const original = new Uint8Array([0x00, 0x11, 0x22, 0xff]);
    expect(bytesToHex(original)).toBe('001122ff');
    expect(hexToBytes('001122ff')).toEqual(original);
  });

  it('should accept mixed case', () => {
    expect(hexToBytes('aAbBcC')).toEqual(new Uint8Array([0xaa, 0xbb, 0xcc]));
  });

  it('should handle empty input', () => {
    expect(bytesToHex(new Uint8Array([]))).toBe('');
    expect(hexToBytes('')).toEqual(new Uint8Array([]));
  });

  it.each(['xyz', 'abc', '0x1234', 'aa bb', 'aa-bb'])('should reject %s', (input) => {
    expect(() => hexToBytes(input)).toThrow(CryptoError);
  });

  it('should tag invalid hex with its code', () => {
    try {
      hexToBytes('zz');
      expect.unreachable('hexToBytes should throw');
    } catch (err) {
      expect(err).toBeInstanceOf(CryptoError);
      if (err instanceof CryptoError) {
        expect(err.code).toBe('CRYPTO_INVALID_HEX');
      }
    }
  });
});

describe('bytesEqual', () => {
  it('should compare content and length', () => {
    expect(bytesEqual(new Uint8Array([1, 2]), new Uint8Array([1, 2]))).toBe(true);
    expect(bytesEqual(new Uint8Array([1, 2]), new Uint8Array([1, 3]))).toBe(false);
    expect(bytesEqual(new Uint8Array([1, 2]), new Uint8Array([1, 2, 3]))).toBe(false);
  });
});
