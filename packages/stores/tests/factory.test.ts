import { describe, it, expect } from 'vitest';
import RedisMock from 'ioredis-mock';
import { createVoucherLedger, InMemoryVoucherLedger, RedisVoucherLedger } from '../src/index';

const base = { redisUrl: 'redis://localhost:6379', keyPrefix: 'vouchers:' };

describe('createVoucherLedger', () => {
  it('builds the in-memory ledger', () => {
    expect(createVoucherLedger({ ...base, backend: 'memory' })).toBeInstanceOf(InMemoryVoucherLedger);
  });

  it('builds the Redis ledger on a supplied client', async () => {
    const redis = new RedisMock();
    const ledger = createVoucherLedger({ ...base, backend: 'redis' }, { redis });
    expect(ledger).toBeInstanceOf(RedisVoucherLedger);
    expect(await ledger.queryStatus('nothing-here')).toBeNull();
    await redis.quit();
  });
});
