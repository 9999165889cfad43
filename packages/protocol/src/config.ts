import { PreconditionError, WALLET } from '@vouchers/kernel';
import type { IssuancePolicy } from '@vouchers/schema';
import { createIssuancePolicy, loadIssuancePolicy } from './policy';

export type LedgerBackend = 'memory' | 'redis';

export interface LedgerConfig {
  backend: LedgerBackend;
  redisUrl: string;
  keyPrefix: string;
}

export interface VoucherConfig {
  logLevel: string;
  policy: IssuancePolicy;
  /** Set when the policy came from VOUCHER_POLICY_FILE */
  policyFile?: string;
  ledger: LedgerConfig;
  wallet: {
    statusStaleAfterSeconds: number;
  };
}

export type Env = Record<string, string | undefined>;

function str(v: string | undefined, d: string): string {
  return v && v.trim() ? v.trim() : d;
}

function num(v: string | undefined, d: number): number {
  const n = v ? Number(v) : NaN;
  return Number.isFinite(n) ? n : d;
}

function backend(v: string | undefined): LedgerBackend {
  const value = str(v, 'memory').toLowerCase();
  if (value === 'memory' || value === 'redis') {
    return value;
  }
  throw new PreconditionError(`Unknown ledger backend '${value}', expected 'memory' or 'redis'`);
}

/**
 * Read configuration from the environment
 *
 * A policy file, when named, replaces the two ceiling variables.
 */
export function loadConfig(env: Env = process.env): VoucherConfig {
  const policyFile = env.VOUCHER_POLICY_FILE?.trim() || undefined;
  const policy = policyFile
    ? loadIssuancePolicy(policyFile)
    : createIssuancePolicy({
        maxVoucherAmount: num(env.VOUCHER_MAX_AMOUNT, Number.MAX_SAFE_INTEGER),
        maxExpiryDays: num(env.VOUCHER_MAX_EXPIRY_DAYS, 3650),
      });

  return {
    logLevel: str(env.LOG_LEVEL, 'info'),
    policy,
    policyFile,
    ledger: {
      backend: backend(env.VOUCHER_LEDGER_BACKEND),
      redisUrl: str(env.REDIS_URL, 'redis://localhost:6379'),
      keyPrefix: str(env.VOUCHER_LEDGER_PREFIX, 'vouchers:'),
    },
    wallet: {
      statusStaleAfterSeconds: num(env.VOUCHER_STATUS_STALE_SECONDS, WALLET.statusStaleAfterSeconds),
    },
  };
}
