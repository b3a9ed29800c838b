/**
 * Domain validation: field checks shared by the entity constructors.
 * Framework-independent. No business logic.
 */

import { ValidationError } from "./errors.js";
import { isDateOnly } from "./dates.js";

/** Returns the value unchanged, or a ValidationError when it is blank. */
export function requireText(field: string, value: string): string | ValidationError {
  if (value.trim().length === 0) {
    return new ValidationError(field, `${field} must not be empty`);
  }
  return value;
}

/** Returns a ValidationError unless value is a real YYYY-MM-DD date. */
export function checkDate(field: string, value: string): ValidationError | null {
  if (!isDateOnly(value)) {
    return new ValidationError(field, `${field} must be a date in YYYY-MM-DD form`, { value });
  }
  return null;
}

/** Loose email check: something on both sides of a single "@". */
export function checkEmail(field: string, value: string): ValidationError | null {
  const at = value.indexOf("@");
  if (at <= 0 || at === value.length - 1 || value.indexOf("@", at + 1) !== -1) {
    return new ValidationError(field, `${field} must contain an "@" separator`, { value });
  }
  return null;
}

/** Call in unreachable branches (e.g. exhaustive switch). Always throws. */
export function neverReached(value: never, message = "Unreachable"): never {
  throw new Error(`${message}: ${String(value)}`);
}
