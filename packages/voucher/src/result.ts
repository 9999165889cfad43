import { PreconditionError } from '@vouchers/kernel';
import type { ValidationResult } from './types';

const SUCCESS: ValidationResult = Object.freeze({ valid: true, errors: Object.freeze([]) });

export function validationSuccess(): ValidationResult {
  return SUCCESS;
}

export function validationFailure(...errors: string[]): ValidationResult {
  if (errors.length === 0) {
    throw new PreconditionError('A failed validation needs at least one error');
  }
  return Object.freeze({ valid: false, errors: Object.freeze([...errors]) });
}

/**
 * Valid iff no errors were collected
 */
export function validationFromErrors(errors: readonly string[]): ValidationResult {
  return errors.length === 0 ? SUCCESS : validationFailure(...errors);
}
