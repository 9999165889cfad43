/**
 * Argument guards that throw PreconditionError
 */

import { PreconditionError } from './errors';

const UUID_PATTERN = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;

/**
 * Reject null or undefined arguments from untyped callers
 */
export function requirePresent<T>(value: T | null | undefined, name: string): T {
  if (value === null || value === undefined) {
    throw new PreconditionError(`${name} is required`);
  }
  return value;
}

export function requireNonBlank(value: string | null | undefined, name: string): string {
  if (typeof value !== 'string' || value.trim().length === 0) {
    throw new PreconditionError(`${name} cannot be blank`);
  }
  return value;
}

export function requirePositiveInteger(value: number | null | undefined, name: string): number {
  if (typeof value !== 'number' || !Number.isSafeInteger(value) || value <= 0) {
    throw new PreconditionError(`${name} must be a positive integer, got: ${String(value)}`);
  }
  return value;
}

export function isUuid(value: string): boolean {
  return UUID_PATTERN.test(value);
}

export function requireUuid(value: string, name: string): string {
  if (!isUuid(value)) {
    throw new PreconditionError(
      `${name} must be a valid UUID (e.g., 550e8400-e29b-41d4-a716-446655440000), got: ${value}`
    );
  }
  return value.toLowerCase();
}
