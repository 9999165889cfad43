/**
 * Redis-backed ledger
 *
 * One hash per voucher: `status` and the signed voucher's JSON. Publish and
 * status updates run as Lua scripts, so each check-and-write is atomic on the
 * server and REDEEMED can be set at most once per voucher.
 */

import type { Redis } from 'ioredis';
import {
  canTransition,
  ERROR_CODES,
  LedgerConflictError,
  parseVoucherStatus,
  VoucherStatus,
  type ObservedStatus,
} from '@vouchers/kernel';
import { componentLogger, type Logger, type VoucherLedgerPort } from '@vouchers/protocol';
import { signedVoucherFromJson, type SignedVoucher } from '@vouchers/voucher';

export type RedisLedgerClient = Pick<Redis, 'eval' | 'hget' | 'exists'>;

export interface RedisVoucherLedgerOptions {
  keyPrefix?: string;
  logger?: Logger;
}

// Returns 1 when written, 0 when the key already exists
const PUBLISH_SCRIPT = `
if redis.call('EXISTS', KEYS[1]) == 1 then
  return 0
end
redis.call('HSET', KEYS[1], 'status', ARGV[1])
redis.call('HSET', KEYS[1], 'voucher', ARGV[2])
return 1
`;

// Returns 1 when swapped, 0 on a status mismatch, -1 when the key is missing
const COMPARE_AND_SET_SCRIPT = `
local current = redis.call('HGET', KEYS[1], 'status')
if not current then
  return -1
end
if current ~= ARGV[1] then
  return 0
end
redis.call('HSET', KEYS[1], 'status', ARGV[2])
return 1
`;

function scriptResult(value: unknown): number {
  const n = typeof value === 'string' ? Number(value) : value;
  if (typeof n !== 'number' || !Number.isInteger(n)) {
    throw new Error(`Unexpected ledger script reply: ${String(value)}`);
  }
  return n;
}

export class RedisVoucherLedger implements VoucherLedgerPort {
  private readonly redis: RedisLedgerClient;
  private readonly keyPrefix: string;
  private readonly log: Logger;

  constructor(redis: RedisLedgerClient, options: RedisVoucherLedgerOptions = {}) {
    this.redis = redis;
    this.keyPrefix = options.keyPrefix ?? 'vouchers:';
    this.log = options.logger ?? componentLogger('redis-ledger');
  }

  private key(voucherId: string): string {
    return `${this.keyPrefix}${voucherId}`;
  }

  async publish(voucher: SignedVoucher, status: VoucherStatus): Promise<void> {
    const voucherId = voucher.voucherId;
    const written = scriptResult(
      await this.redis.eval(PUBLISH_SCRIPT, 1, this.key(voucherId), status, JSON.stringify(voucher))
    );
    if (written !== 1) {
      throw new LedgerConflictError(
        ERROR_CODES.E_DUPLICATE_VOUCHER,
        voucherId,
        `Voucher ${voucherId} is already published`
      );
    }
    this.log.debug({ voucherId, status }, 'Voucher published');
  }

  async queryStatus(voucherId: string): Promise<ObservedStatus | null> {
    const raw = await this.redis.hget(this.key(voucherId), 'status');
    return raw === null ? null : parseVoucherStatus(raw);
  }

  /**
   * Compare-and-set from ISSUED
   *
   * @throws LedgerConflictError when the id is unknown or no longer ISSUED
   */
  async updateStatus(voucherId: string, status: VoucherStatus): Promise<void> {
    if (!canTransition(VoucherStatus.ISSUED, status)) {
      throw new LedgerConflictError(
        ERROR_CODES.E_LEDGER_CONFLICT,
        voucherId,
        `Voucher ${voucherId} cannot move to ${status}`
      );
    }

    const result = scriptResult(
      await this.redis.eval(COMPARE_AND_SET_SCRIPT, 1, this.key(voucherId), VoucherStatus.ISSUED, status)
    );
    if (result === -1) {
      throw new LedgerConflictError(
        ERROR_CODES.E_VOUCHER_NOT_FOUND,
        voucherId,
        `Voucher ${voucherId} not found in ledger`
      );
    }
    if (result === 0) {
      const current = await this.redis.hget(this.key(voucherId), 'status');
      throw new LedgerConflictError(
        ERROR_CODES.E_LEDGER_CONFLICT,
        voucherId,
        `Voucher ${voucherId} cannot move from ${current ?? 'unknown'} to ${status}`
      );
    }
    this.log.debug({ voucherId, status }, 'Voucher status updated');
  }

  async exists(voucherId: string): Promise<boolean> {
    return (await this.redis.exists(this.key(voucherId))) === 1;
  }

  async queryVoucher(voucherId: string): Promise<SignedVoucher | null> {
    const raw = await this.redis.hget(this.key(voucherId), 'voucher');
    if (raw === null) {
      return null;
    }
    const parsed: unknown = JSON.parse(raw);
    return signedVoucherFromJson(parsed);
  }
}
