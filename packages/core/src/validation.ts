/**
 * ValidationResult builders and required-field helpers
 */

import type { ValidationResult } from "./types.js";

const SUCCESS: ValidationResult = { valid: true, errors: [] };
Object.freeze(SUCCESS);

/**
 * A passing validation result
 */
export function validationSuccess(): ValidationResult {
  return SUCCESS;
}

/**
 * A failing validation result. `errors` must not be empty.
 */
export function validationFailure(errors: readonly string[]): ValidationResult {
  const [first, ...rest] = errors;
  if (first === undefined) {
    throw new RangeError("A failed validation needs at least one error");
  }
  const result: ValidationResult = { valid: false, errors: [first, ...rest] };
  Object.freeze(result.errors);
  return Object.freeze(result);
}

/**
 * Success when `errors` is empty, failure otherwise
 */
export function toValidationResult(errors: readonly string[]): ValidationResult {
  return errors.length === 0 ? validationSuccess() : validationFailure(errors);
}

/**
 * True for undefined, empty and whitespace-only values
 */
export function isBlank(value: string | undefined): value is undefined | "" {
  return value === undefined || value.trim() === "";
}

/**
 * Message reported for a missing required field
 */
export function requiredMessage(field: string): string {
  return `${field} is required`;
}

/**
 * Names of the required fields that are missing or blank, in declared order
 */
export function findMissingFields(
  fields: readonly string[],
  read: (field: string) => string | undefined
): string[] {
  return fields.filter((field) => isBlank(read(field)));
}
