/**
 * Issuance policy document
 *
 * Loaded from YAML or JSON; both ceilings default to the kernel limits.
 */

import { z } from 'zod';
import { ISSUANCE } from '@vouchers/kernel';

export const IssuancePolicySchema = z
  .object({
    maxVoucherAmount: z
      .number()
      .int()
      .positive('maxVoucherAmount must be positive')
      .max(Number.MAX_SAFE_INTEGER)
      .default(ISSUANCE.maxVoucherAmount),
    maxExpiryDays: z
      .number()
      .int()
      .positive('maxExpiryDays must be positive')
      .default(ISSUANCE.maxExpiryDays),
  })
  .strict();

export type IssuancePolicy = z.output<typeof IssuancePolicySchema>;
export type IssuancePolicyInput = z.input<typeof IssuancePolicySchema>;
