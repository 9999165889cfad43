/**
 * JSON-safe validation schemas
 *
 * Merchant metadata must survive canonical JSON encoding unchanged, so it is
 * limited to finite numbers, strings, booleans, null, arrays and plain objects.
 */

import { z } from 'zod';
import type { JsonValue, JsonObject } from '@vouchers/kernel';

/**
 * A plain object has prototype of Object.prototype or null.
 * This rejects Date, Map, Set and class instances.
 */
export function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (value === null || typeof value !== 'object') {
    return false;
  }
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

const PlainObjectSchema = z.custom<Record<string, unknown>>(
  isPlainObject,
  'Expected plain object, received non-plain object (Date, Map, Set, or class instance)'
);

/**
 * JSON number schema - rejects NaN and Infinity
 */
export const JsonPrimitiveSchema = z.union([z.string(), z.number().finite(), z.boolean(), z.null()]);

export const JsonValueSchema: z.ZodType<JsonValue, z.ZodTypeDef, unknown> = z.lazy(() =>
  z.union([
    JsonPrimitiveSchema,
    z.array(JsonValueSchema),
    PlainObjectSchema.pipe(z.record(z.string(), JsonValueSchema)),
  ])
);

export const JsonObjectSchema: z.ZodType<JsonObject, z.ZodTypeDef, unknown> =
  PlainObjectSchema.pipe(z.record(z.string(), JsonValueSchema));
