import { describe, it, expect } from 'vitest';
import {
  ERROR_CODES,
  ERRORS,
  getError,
  isRetriable,
  VoucherError,
  PreconditionError,
  LedgerOperationError,
  LedgerConflictError,
} from '../src/index';

describe('error registry', () => {
  it('has a definition for every code', () => {
    for (const code of Object.values(ERROR_CODES)) {
      expect(ERRORS[code].code).toBe(code);
    }
  });

  it('looks up definitions and retriability', () => {
    expect(getError('E_LEDGER_UPDATE_FAILED')?.category).toBe('ledger');
    expect(getError('E_UNKNOWN')).toBeUndefined();
    expect(isRetriable('E_LEDGER_QUERY_FAILED')).toBe(true);
    expect(isRetriable('E_PRECONDITION')).toBe(false);
    expect(isRetriable('E_UNKNOWN')).toBe(false);
  });
});

describe('typed errors', () => {
  it('keeps the prototype chain and code', () => {
    const err = new PreconditionError('Unit cannot be blank');
    expect(err).toBeInstanceOf(PreconditionError);
    expect(err).toBeInstanceOf(VoucherError);
    expect(err).toBeInstanceOf(Error);
    expect(err.code).toBe('E_PRECONDITION');
    expect(err.name).toBe('PreconditionError');
  });

  it('preserves the cause of wrapped port failures', () => {
    const cause = new Error('relay offline');
    const err = new LedgerOperationError('E_LEDGER_UPDATE_FAILED', 'Failed to mark voucher as redeemed', cause);
    expect(err.cause).toBe(cause);
    expect(err.code).toBe('E_LEDGER_UPDATE_FAILED');
  });

  it('carries the voucher id on conflicts', () => {
    const err = new LedgerConflictError('E_LEDGER_CONFLICT', 'v-1', 'already REDEEMED');
    expect(err.voucherId).toBe('v-1');
  });
});
