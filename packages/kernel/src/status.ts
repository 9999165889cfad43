/**
 * Voucher lifecycle states
 *
 * ISSUED is the only non-terminal state. Every transition starts at ISSUED and
 * ends in one of the three terminal states; nothing leaves a terminal state.
 */

export const VoucherStatus = {
  ISSUED: 'ISSUED',
  REDEEMED: 'REDEEMED',
  REVOKED: 'REVOKED',
  EXPIRED: 'EXPIRED',
} as const;

export type VoucherStatus = (typeof VoucherStatus)[keyof typeof VoucherStatus];

/**
 * A status value read from a ledger that is not one of the known states.
 *
 * Always treated as invalid by verification.
 */
export interface UnrecognizedStatus {
  readonly unrecognized: string;
}

/**
 * What a ledger read can yield: a known state or the unrecognized arm
 */
export type ObservedStatus = VoucherStatus | UnrecognizedStatus;

const KNOWN_STATUSES: ReadonlySet<string> = new Set(Object.values(VoucherStatus));

const DESCRIPTIONS: Record<VoucherStatus, string> = {
  ISSUED: 'Voucher is active and ready for redemption',
  REDEEMED: 'Voucher has been redeemed and cannot be reused',
  REVOKED: 'Voucher has been revoked by the issuer',
  EXPIRED: 'Voucher has expired and can no longer be redeemed',
};

export function isVoucherStatus(value: unknown): value is VoucherStatus {
  return typeof value === 'string' && KNOWN_STATUSES.has(value);
}

export function isUnrecognizedStatus(value: ObservedStatus): value is UnrecognizedStatus {
  return typeof value === 'object';
}

/**
 * Parse a raw ledger value, keeping unknown values in the unrecognized arm
 */
export function parseVoucherStatus(raw: string): ObservedStatus {
  return isVoucherStatus(raw) ? raw : { unrecognized: raw };
}

export function isTerminal(status: VoucherStatus): boolean {
  return status !== VoucherStatus.ISSUED;
}

export function canBeRedeemed(status: VoucherStatus): boolean {
  return status === VoucherStatus.ISSUED;
}

/**
 * Check a lifecycle transition: ISSUED -> REDEEMED | REVOKED | EXPIRED
 */
export function canTransition(from: VoucherStatus, to: VoucherStatus): boolean {
  return from === VoucherStatus.ISSUED && isTerminal(to);
}

export function describeStatus(status: VoucherStatus): string {
  return DESCRIPTIONS[status];
}

/**
 * Render an observed status for messages and logs
 */
export function formatObservedStatus(status: ObservedStatus): string {
  return isUnrecognizedStatus(status) ? status.unrecognized : status;
}
