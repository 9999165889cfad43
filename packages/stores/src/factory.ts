import { Redis } from 'ioredis';
import { componentLogger, type LedgerConfig, type Logger, type VoucherLedgerPort } from '@vouchers/protocol';
import { InMemoryVoucherLedger } from './in-memory-ledger';
import { RedisVoucherLedger, type RedisLedgerClient } from './redis-ledger';

export interface LedgerFactoryOptions {
  /** Existing client to use instead of connecting to `redisUrl` */
  redis?: RedisLedgerClient;
  logger?: Logger;
}

/**
 * Build the ledger named by configuration
 */
export function createVoucherLedger(config: LedgerConfig, options: LedgerFactoryOptions = {}): VoucherLedgerPort {
  const log = options.logger ?? componentLogger('ledger-factory');

  switch (config.backend) {
    case 'redis': {
      const client =
        options.redis ??
        new Redis(config.redisUrl, {
          maxRetriesPerRequest: 1,
          lazyConnect: true,
          enableReadyCheck: true,
        });
      log.info({ backend: 'redis', keyPrefix: config.keyPrefix }, 'Ledger backend configured');
      return new RedisVoucherLedger(client, { keyPrefix: config.keyPrefix, logger: options.logger });
    }
    case 'memory':
      log.info({ backend: 'memory' }, 'Ledger backend configured');
      return new InMemoryVoucherLedger(options.logger);
  }
}
