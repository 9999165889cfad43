/**
 * Export surface tests for @vouchers/kernel
 */

import { describe, it, expect } from 'vitest';
import * as kernel from '../src/index';

describe('@vouchers/kernel export surface', () => {
  it.each(['SIGNATURE', 'CANONICAL_FIELDS', 'ISSUANCE', 'PAYMENT_REQUEST', 'BACKUP', 'WALLET'])(
    'should export %s',
    (name) => {
      expect(name in kernel).toBe(true);
    }
  );

  it('should not export a grouped constants object', () => {
    expect('CONSTANTS' in kernel).toBe(false);
  });
});
