/**
 * Voucher Stores
 *
 * Reference implementations of the ledger and backup ports.
 *
 * @packageDocumentation
 */

export { InMemoryVoucherLedger } from './in-memory-ledger';
export { RedisVoucherLedger, type RedisLedgerClient, type RedisVoucherLedgerOptions } from './redis-ledger';
export { InMemoryVoucherBackupStore, type InMemoryBackupOptions } from './in-memory-backup';
export { createVoucherLedger, type LedgerFactoryOptions } from './factory';
