/**
 * Voucher Kernel
 * Normative constants, lifecycle states and errors for the voucher protocol
 *
 * @packageDocumentation
 */

// Export types
export type {
  JsonPrimitive,
  JsonValue,
  JsonArray,
  JsonObject,
  ErrorDefinition,
  EpochClock,
} from './types';
export { epochSeconds } from './types';

// Export constants
export {
  SIGNATURE,
  CANONICAL_FIELDS,
  ISSUANCE,
  PAYMENT_REQUEST,
  BACKUP,
  WALLET,
} from './constants';

// Export lifecycle
export {
  VoucherStatus,
  type UnrecognizedStatus,
  type ObservedStatus,
  isVoucherStatus,
  isUnrecognizedStatus,
  parseVoucherStatus,
  isTerminal,
  canBeRedeemed,
  canTransition,
  describeStatus,
  formatObservedStatus,
} from './status';

// Export backing strategies
export {
  BackingStrategy,
  BACKING_STRATEGIES,
  isBackingStrategy,
  isSplittable,
  hasFineGrainedSplits,
} from './backing';

// Export errors
export {
  ERROR_CODES,
  ERRORS,
  getError,
  isRetriable,
  isErrorCode,
  errorMessage,
  VoucherError,
  PreconditionError,
  PolicyViolationError,
  LedgerOperationError,
  LedgerConflictError,
  BackupOperationError,
  type ErrorCode,
} from './errors';

// Export guards
export {
  requirePresent,
  requireNonBlank,
  requirePositiveInteger,
  requireUuid,
  isUuid,
} from './preconditions';
