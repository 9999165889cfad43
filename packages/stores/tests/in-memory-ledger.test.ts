import { describe, it, expect, beforeEach } from 'vitest';
import { LedgerConflictError, VoucherStatus } from '@vouchers/kernel';
import { MerchantVerificationService } from '@vouchers/protocol';
import { InMemoryVoucherLedger } from '../src/index';
import { NOW, signedVoucher } from './helpers';

let ledger: InMemoryVoucherLedger;

beforeEach(() => {
  ledger = new InMemoryVoucherLedger();
});

describe('InMemoryVoucherLedger', () => {
  it('publishes and reads back', async () => {
    const voucher = await signedVoucher();
    await ledger.publish(voucher, VoucherStatus.ISSUED);
    expect(await ledger.queryStatus(voucher.voucherId)).toBe('ISSUED');
    expect(await ledger.exists(voucher.voucherId)).toBe(true);
    expect((await ledger.queryVoucher(voucher.voucherId))?.equals(voucher)).toBe(true);
    expect(await ledger.queryStatus('missing')).toBeNull();
  });

  it('refuses to publish an id twice', async () => {
    const voucher = await signedVoucher();
    await ledger.publish(voucher, VoucherStatus.ISSUED);
    await expect(ledger.publish(voucher, VoucherStatus.ISSUED)).rejects.toMatchObject({
      code: 'E_DUPLICATE_VOUCHER',
    });
  });

  it('rejects a second REDEEMED transition', async () => {
    const voucher = await signedVoucher();
    await ledger.publish(voucher, VoucherStatus.ISSUED);
    await ledger.updateStatus(voucher.voucherId, VoucherStatus.REDEEMED);

    const err = await ledger.updateStatus(voucher.voucherId, VoucherStatus.REDEEMED).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(LedgerConflictError);
    expect(err).toMatchObject({ code: 'E_LEDGER_CONFLICT', voucherId: voucher.voucherId });
  });

  it('lets exactly one of two concurrent redemptions through', async () => {
    const voucher = await signedVoucher();
    await ledger.publish(voucher, VoucherStatus.ISSUED);

    const results = await Promise.allSettled([
      ledger.updateStatus(voucher.voucherId, VoucherStatus.REDEEMED),
      ledger.updateStatus(voucher.voucherId, VoucherStatus.REDEEMED),
    ]);
    expect(results.map((r) => r.status).sort()).toEqual(['fulfilled', 'rejected']);
  });

  it('reports unknown ids', async () => {
    await expect(ledger.updateStatus('missing', VoucherStatus.REVOKED)).rejects.toMatchObject({
      code: 'E_VOUCHER_NOT_FOUND',
    });
  });

  it('keeps unknown raw values in the unrecognized arm', async () => {
    const voucher = await signedVoucher();
    await ledger.publish(voucher, VoucherStatus.ISSUED);
    ledger.setRawStatus(voucher.voucherId, 'SUSPENDED');
    expect(await ledger.queryStatus(voucher.voucherId)).toEqual({ unrecognized: 'SUSPENDED' });
  });

  it('backs double-spend detection end to end', async () => {
    const voucher = await signedVoucher();
    await ledger.publish(voucher, VoucherStatus.ISSUED);
    const merchant = new MerchantVerificationService(ledger, { clock: () => NOW });

    expect((await merchant.redeem({ merchantId: 'bakery-42' }, voucher)).status).toBe('redeemed');
    const replay = await merchant.redeem({ merchantId: 'bakery-42', verifyOnline: false }, voucher);
    expect(replay.status).toBe('verified_not_recorded');
  });
});
