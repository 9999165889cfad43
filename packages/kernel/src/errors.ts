/**
 * Voucher Protocol Error Codes
 *
 * Thrown errors are reserved for broken preconditions, policy ceilings and
 * port failures. Verification outcomes are never thrown; they are returned
 * as validation results.
 */

import type { ErrorDefinition } from './types';

/**
 * Error code constants
 */
export const ERROR_CODES = {
  E_PRECONDITION: 'E_PRECONDITION',
  E_POLICY_VIOLATION: 'E_POLICY_VIOLATION',
  E_LEDGER_PUBLISH_FAILED: 'E_LEDGER_PUBLISH_FAILED',
  E_LEDGER_UPDATE_FAILED: 'E_LEDGER_UPDATE_FAILED',
  E_LEDGER_QUERY_FAILED: 'E_LEDGER_QUERY_FAILED',
  E_LEDGER_CONFLICT: 'E_LEDGER_CONFLICT',
  E_VOUCHER_NOT_FOUND: 'E_VOUCHER_NOT_FOUND',
  E_DUPLICATE_VOUCHER: 'E_DUPLICATE_VOUCHER',
  E_BACKUP_FAILED: 'E_BACKUP_FAILED',
  E_RESTORE_FAILED: 'E_RESTORE_FAILED',
  E_BACKUP_UNSUPPORTED: 'E_BACKUP_UNSUPPORTED',
} as const;

export type ErrorCode = (typeof ERROR_CODES)[keyof typeof ERROR_CODES];

/**
 * Error definitions map
 */
export const ERRORS: Record<ErrorCode, ErrorDefinition> = {
  E_PRECONDITION: {
    code: 'E_PRECONDITION',
    title: 'Precondition Failed',
    description: 'A required argument is missing, blank or malformed',
    retriable: false,
    category: 'precondition',
  },
  E_POLICY_VIOLATION: {
    code: 'E_POLICY_VIOLATION',
    title: 'Issuance Policy Violation',
    description: 'Requested voucher exceeds a configured issuance ceiling',
    retriable: false,
    category: 'policy',
  },
  E_LEDGER_PUBLISH_FAILED: {
    code: 'E_LEDGER_PUBLISH_FAILED',
    title: 'Ledger Publish Failed',
    description: 'Voucher was signed but its ISSUED status could not be published',
    retriable: true,
    category: 'ledger',
  },
  E_LEDGER_UPDATE_FAILED: {
    code: 'E_LEDGER_UPDATE_FAILED',
    title: 'Ledger Update Failed',
    description: 'Voucher status could not be recorded in the ledger',
    retriable: true,
    category: 'ledger',
  },
  E_LEDGER_QUERY_FAILED: {
    code: 'E_LEDGER_QUERY_FAILED',
    title: 'Ledger Query Failed',
    description: 'Voucher status could not be read from the ledger',
    retriable: true,
    category: 'ledger',
  },
  E_LEDGER_CONFLICT: {
    code: 'E_LEDGER_CONFLICT',
    title: 'Ledger Conflict',
    description: 'Requested status transition is not allowed from the current ledger state',
    retriable: false,
    category: 'ledger',
  },
  E_VOUCHER_NOT_FOUND: {
    code: 'E_VOUCHER_NOT_FOUND',
    title: 'Voucher Not Found',
    description: 'Voucher id is not present in the ledger',
    retriable: false,
    category: 'ledger',
  },
  E_DUPLICATE_VOUCHER: {
    code: 'E_DUPLICATE_VOUCHER',
    title: 'Duplicate Voucher',
    description: 'A voucher with this id has already been published',
    retriable: false,
    category: 'ledger',
  },
  E_BACKUP_FAILED: {
    code: 'E_BACKUP_FAILED',
    title: 'Backup Failed',
    description: 'Vouchers could not be written to backup storage',
    retriable: true,
    category: 'backup',
  },
  E_RESTORE_FAILED: {
    code: 'E_RESTORE_FAILED',
    title: 'Restore Failed',
    description: 'Vouchers could not be read from backup storage',
    retriable: true,
    category: 'backup',
  },
  E_BACKUP_UNSUPPORTED: {
    code: 'E_BACKUP_UNSUPPORTED',
    title: 'Backup Operation Unsupported',
    description: 'The backup store does not implement this operation',
    retriable: false,
    category: 'backup',
  },
};

/**
 * Get error definition by code
 */
export function getError(code: string): ErrorDefinition | undefined {
  return isErrorCode(code) ? ERRORS[code] : undefined;
}

export function isErrorCode(code: string): code is ErrorCode {
  return Object.prototype.hasOwnProperty.call(ERRORS, code);
}

/**
 * Check if error is retriable
 */
export function isRetriable(code: string): boolean {
  return getError(code)?.retriable ?? false;
}

/**
 * Base class for every thrown voucher error
 *
 * Use `err.code` to handle errors programmatically without message parsing.
 */
export class VoucherError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'VoucherError';
    this.code = code;
    // Maintain proper prototype chain for instanceof checks
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * Missing, blank or malformed input, raised before any crypto or I/O
 */
export class PreconditionError extends VoucherError {
  constructor(message: string) {
    super(ERROR_CODES.E_PRECONDITION, message);
    this.name = 'PreconditionError';
  }
}

/**
 * Issuance request outside the configured policy ceilings
 */
export class PolicyViolationError extends VoucherError {
  constructor(message: string) {
    super(ERROR_CODES.E_POLICY_VIOLATION, message);
    this.name = 'PolicyViolationError';
  }
}

/**
 * Ledger port failure that leaves state unknown or inconsistent
 */
export class LedgerOperationError extends VoucherError {
  constructor(
    code:
      | typeof ERROR_CODES.E_LEDGER_PUBLISH_FAILED
      | typeof ERROR_CODES.E_LEDGER_UPDATE_FAILED
      | typeof ERROR_CODES.E_LEDGER_QUERY_FAILED,
    message: string,
    cause?: unknown
  ) {
    super(code, message, { cause });
    this.name = 'LedgerOperationError';
  }
}

/**
 * Ledger state refuses the requested write
 */
export class LedgerConflictError extends VoucherError {
  readonly voucherId: string;

  constructor(
    code:
      | typeof ERROR_CODES.E_LEDGER_CONFLICT
      | typeof ERROR_CODES.E_VOUCHER_NOT_FOUND
      | typeof ERROR_CODES.E_DUPLICATE_VOUCHER,
    voucherId: string,
    message: string
  ) {
    super(code, message);
    this.name = 'LedgerConflictError';
    this.voucherId = voucherId;
  }
}

/**
 * Backup port failure
 */
export class BackupOperationError extends VoucherError {
  constructor(
    code:
      | typeof ERROR_CODES.E_BACKUP_FAILED
      | typeof ERROR_CODES.E_RESTORE_FAILED
      | typeof ERROR_CODES.E_BACKUP_UNSUPPORTED,
    message: string,
    cause?: unknown
  ) {
    super(code, message, { cause });
    this.name = 'BackupOperationError';
  }
}

/**
 * Message of an unknown thrown value
 */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
