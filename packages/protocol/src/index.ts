/**
 * Voucher Protocol
 *
 * Issuance, merchant redemption with double-spend detection, backup merge and
 * NUT-18V payment requests. Storage sits behind the ledger and backup ports.
 *
 * @packageDocumentation
 */

export type { VoucherLedgerPort, VoucherBackupPort } from './ports';
export { ledgerExists, backupExists, deleteBackups } from './ports';

export type { IssueVoucherRequest, RedeemVoucherRequest, RedemptionOutcome } from './types';

export { VoucherService, type IssuerKeys, type VoucherServiceOptions } from './voucher-service';
export { VoucherIssuanceService } from './issuance-service';
export {
  MerchantVerificationService,
  LEDGER_STATUS_ERRORS,
  type MerchantVerificationOptions,
} from './merchant-verification';
export { VoucherBackupService, type VoucherBackupServiceOptions } from './backup-service';
export { StoredVoucher, type StoredVoucherInit } from './stored-voucher';

export {
  buildPaymentRequest,
  validatePaymentRequest,
  encodePaymentRequest,
  decodePaymentRequest,
  toRawPaymentRequest,
  fromRawPaymentRequest,
  merchantTransport,
  httpPostTransport,
  nostrTransport,
  totalProofAmount,
  allProofsHaveDleq,
  isMintPermitted,
  type PaymentRequestInput,
  type GeneratedPaymentRequest,
} from './payment-request';

export {
  createIssuancePolicy,
  validateIssuancePolicy,
  parseIssuancePolicy,
  loadIssuancePolicy,
  serializeIssuancePolicyYaml,
  PolicyLoadError,
  PolicyValidationError,
  type PolicyFormat,
} from './policy';

export { loadConfig, type VoucherConfig, type LedgerConfig, type LedgerBackend, type Env } from './config';
export { logger, componentLogger, REDACT_PATHS, type Logger } from './logging';
