/**
 * VoucherService
 *
 * Issuance and ledger/backup access for one issuing merchant. Signing happens
 * here; storage is delegated to the ports.
 */

import {
  BackupOperationError,
  canTransition,
  epochSeconds,
  ERROR_CODES,
  errorMessage,
  formatObservedStatus,
  ISSUANCE,
  isUnrecognizedStatus,
  LedgerConflictError,
  LedgerOperationError,
  PreconditionError,
  requireNonBlank,
  requirePositiveInteger,
  requirePresent,
  VoucherStatus,
  type EpochClock,
  type ObservedStatus,
} from '@vouchers/kernel';
import {
  defaultSignatureService,
  VoucherSecret,
  type SignedVoucher,
  type VoucherSignatureService,
} from '@vouchers/voucher';
import { componentLogger, type Logger } from './logging';
import {
  buildPaymentRequest,
  encodePaymentRequest,
  type GeneratedPaymentRequest,
  type PaymentRequestInput,
} from './payment-request';
import { ledgerExists, type VoucherBackupPort, type VoucherLedgerPort } from './ports';
import type { IssueVoucherRequest } from './types';

export interface IssuerKeys {
  privateKey: Uint8Array;
  /** Derived from the private key when omitted */
  publicKeyHex?: string;
}

export interface VoucherServiceOptions {
  signatureService?: VoucherSignatureService;
  clock?: EpochClock;
  logger?: Logger;
}

export class VoucherService {
  private readonly ledger: VoucherLedgerPort;
  private readonly backupStore: VoucherBackupPort;
  private readonly issuer: IssuerKeys;
  private readonly signatureService: VoucherSignatureService;
  private readonly clock: EpochClock;
  private readonly log: Logger;

  constructor(
    ledger: VoucherLedgerPort,
    backupStore: VoucherBackupPort,
    issuer: IssuerKeys,
    options: VoucherServiceOptions = {}
  ) {
    this.ledger = requirePresent(ledger, 'Ledger port');
    this.backupStore = requirePresent(backupStore, 'Backup port');
    requirePresent(issuer, 'Issuer keys');
    requirePresent(issuer.privateKey, 'Issuer private key');
    if (issuer.publicKeyHex !== undefined) {
      requireNonBlank(issuer.publicKeyHex, 'Issuer public key');
    }
    this.issuer = { privateKey: new Uint8Array(issuer.privateKey), publicKeyHex: issuer.publicKeyHex };
    this.signatureService = options.signatureService ?? defaultSignatureService;
    this.clock = options.clock ?? epochSeconds;
    this.log = options.logger ?? componentLogger('voucher-service');
  }

  /**
   * Build, sign and publish a voucher as ISSUED
   *
   * @throws PreconditionError for invalid request fields, before any signing
   * @throws LedgerOperationError (E_LEDGER_PUBLISH_FAILED) when the ledger
   *   rejects the publish; the signed voucher is then not usable
   */
  async issue(request: IssueVoucherRequest): Promise<SignedVoucher> {
    requirePresent(request, 'Issue request');
    requireNonBlank(request.issuerId, 'Issuer ID');
    requireNonBlank(request.unit, 'Unit');
    requirePositiveInteger(request.amount, 'Amount');
    if (request.expiresInDays !== undefined) {
      requirePositiveInteger(request.expiresInDays, 'Expiry days');
    }

    this.log.info(
      { issuerId: request.issuerId, unit: request.unit, amount: request.amount },
      'Issuing voucher'
    );

    const expiresAt =
      request.expiresInDays === undefined
        ? null
        : this.clock() + request.expiresInDays * ISSUANCE.secondsPerDay;

    const secret = VoucherSecret.create({
      voucherId: request.voucherId?.trim() ? request.voucherId : undefined,
      issuerId: request.issuerId,
      unit: request.unit,
      faceValue: request.amount,
      expiresAt,
      memo: request.memo,
      backingStrategy: request.backingStrategy,
      issuanceRatio: request.issuanceRatio,
      faceDecimals: request.faceDecimals,
      merchantMetadata: request.merchantMetadata,
    });

    const voucher = await this.signatureService.createSigned(
      secret,
      this.issuer.privateKey,
      this.issuer.publicKeyHex
    );

    try {
      await this.ledger.publish(voucher, VoucherStatus.ISSUED);
    } catch (err) {
      this.log.error({ voucherId: secret.voucherId, err }, 'Failed to publish voucher to ledger');
      throw new LedgerOperationError(
        ERROR_CODES.E_LEDGER_PUBLISH_FAILED,
        `Failed to publish voucher to ledger: ${errorMessage(err)}`,
        err
      );
    }

    this.log.info({ voucherId: secret.voucherId, status: VoucherStatus.ISSUED }, 'Voucher published to ledger');
    return voucher;
  }

  /**
   * Current ledger status, null when the ledger has never seen the id
   *
   * @throws LedgerOperationError (E_LEDGER_QUERY_FAILED)
   */
  async queryStatus(voucherId: string): Promise<ObservedStatus | null> {
    requireNonBlank(voucherId, 'Voucher ID');
    try {
      const status = await this.ledger.queryStatus(voucherId);
      this.log.debug(
        { voucherId, status: status === null ? null : formatObservedStatus(status) },
        'Voucher status queried'
      );
      return status;
    } catch (err) {
      this.log.error({ voucherId, err }, 'Failed to query voucher status');
      throw new LedgerOperationError(
        ERROR_CODES.E_LEDGER_QUERY_FAILED,
        `Failed to query voucher status: ${errorMessage(err)}`,
        err
      );
    }
  }

  /**
   * Move a voucher to a terminal state
   *
   * @throws LedgerConflictError (E_VOUCHER_NOT_FOUND) for an unknown id
   * @throws PreconditionError when the current status does not allow the move
   * @throws LedgerOperationError (E_LEDGER_UPDATE_FAILED) when the write fails
   */
  async updateStatus(voucherId: string, status: VoucherStatus): Promise<void> {
    const current = await this.queryStatus(voucherId);
    if (current === null) {
      throw new LedgerConflictError(
        ERROR_CODES.E_VOUCHER_NOT_FOUND,
        voucherId,
        `Voucher ${voucherId} not found in ledger`
      );
    }
    if (isUnrecognizedStatus(current) || !canTransition(current, status)) {
      throw new PreconditionError(
        `Cannot move voucher ${voucherId} from ${formatObservedStatus(current)} to ${status}`
      );
    }

    this.log.info({ voucherId, status }, 'Updating voucher status');
    try {
      await this.ledger.updateStatus(voucherId, status);
    } catch (err) {
      if (err instanceof LedgerConflictError) {
        throw err;
      }
      this.log.error({ voucherId, status, err }, 'Failed to update voucher status');
      throw new LedgerOperationError(
        ERROR_CODES.E_LEDGER_UPDATE_FAILED,
        `Failed to update voucher status: ${errorMessage(err)}`,
        err
      );
    }
  }

  async exists(voucherId: string): Promise<boolean> {
    requireNonBlank(voucherId, 'Voucher ID');
    try {
      return await ledgerExists(this.ledger, voucherId);
    } catch (err) {
      throw new LedgerOperationError(
        ERROR_CODES.E_LEDGER_QUERY_FAILED,
        `Failed to check voucher existence: ${errorMessage(err)}`,
        err
      );
    }
  }

  /**
   * Store vouchers in the user's backup; an empty list is a no-op
   *
   * @throws BackupOperationError (E_BACKUP_FAILED)
   */
  async backup(vouchers: readonly SignedVoucher[], userKey: string): Promise<void> {
    requirePresent(vouchers, 'Vouchers');
    requireNonBlank(userKey, 'User key');
    if (vouchers.length === 0) {
      this.log.debug('No vouchers to back up');
      return;
    }

    try {
      await this.backupStore.backup(vouchers, userKey);
    } catch (err) {
      this.log.error({ count: vouchers.length, err }, 'Failed to back up vouchers');
      throw new BackupOperationError(
        ERROR_CODES.E_BACKUP_FAILED,
        `Failed to back up vouchers: ${errorMessage(err)}`,
        err
      );
    }
    this.log.info({ count: vouchers.length }, 'Vouchers backed up');
  }

  /**
   * @throws BackupOperationError (E_RESTORE_FAILED)
   */
  async restore(userKey: string): Promise<SignedVoucher[]> {
    requireNonBlank(userKey, 'User key');
    let restored: SignedVoucher[];
    try {
      restored = await this.backupStore.restore(userKey);
    } catch (err) {
      this.log.error({ err }, 'Failed to restore vouchers');
      throw new BackupOperationError(
        ERROR_CODES.E_RESTORE_FAILED,
        `Failed to restore vouchers: ${errorMessage(err)}`,
        err
      );
    }
    this.log.info({ count: restored.length }, 'Vouchers restored');
    return restored;
  }

  generatePaymentRequest(input: PaymentRequestInput): GeneratedPaymentRequest {
    requirePresent(input, 'Payment request input');
    const request = buildPaymentRequest(input);
    const encoded = encodePaymentRequest(request, input.clickable ?? false);
    this.log.info(
      { paymentId: request.paymentId, issuerId: request.issuerId, length: encoded.length },
      'Generated payment request'
    );
    return { encoded, request };
  }
}
