/**
 * Field schemas shared by the wire forms
 */

import { z } from 'zod';

export const nonBlank = (field: string) =>
  z.string().refine((s) => s.trim().length > 0, `${field} cannot be blank`);

/**
 * Integer that may arrive as a bigint from CBOR (major type 0, 8-byte form)
 */
export const SafeIntegerSchema = z
  .union([z.number().int(), z.bigint()])
  .transform((value, ctx) => {
    const n = Number(value);
    if (!Number.isSafeInteger(n)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'Integer outside the safe range' });
      return z.NEVER;
    }
    return n;
  });

/**
 * Finite real; whole values at or above 2^32 come back from CBOR as bigint
 */
export const FiniteNumberSchema = z
  .union([z.number().finite(), z.bigint()])
  .transform((value, ctx) => {
    const n = Number(value);
    if (!Number.isFinite(n)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'Number outside the finite range' });
      return z.NEVER;
    }
    return n;
  });
