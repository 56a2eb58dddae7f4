/**
 * Input assertions used at every public entry point of the protocol.
 * Each throws a {@link ValidationError} naming the offending field.
 */

import { BackstopErrorCode, ValidationError } from './errors';

// ─── Type guards ────────────────────────────────────────────────────────────────

/** Check whether `value` is a non-empty string (after trimming). */
export function isNonEmptyString(value: unknown): value is string {
  return typeof value === 'string' && value.trim().length > 0;
}

/** Check whether `value` is a plain object (not null, not an array). */
export function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    return false;
  }
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

// ─── Assertions ─────────────────────────────────────────────────────────────────

/**
 * Assert that `value` is a usable identity (account or venue id).
 *
 * @example
 * ```typescript
 * validateIdentity(caller, 'caller');
 * ```
 */
export function validateIdentity(value: string, name: string): void {
  if (!isNonEmptyString(value)) {
    throw new ValidationError(`${name} must be a non-empty identity`, name, BackstopErrorCode.INVALID_IDENTITY);
  }
}

/** Assert that `value` is a non-negative integer amount. */
export function validateNonNegativeAmount(value: bigint, name: string): void {
  if (typeof value !== 'bigint' || value < 0n) {
    throw new ValidationError(`${name} must be a non-negative integer amount`, name, BackstopErrorCode.INVALID_AMOUNT);
  }
}

/**
 * Assert that `value` is a strictly positive integer amount.
 *
 * @throws {ValidationError} `ZERO_AMOUNT` for zero, `INVALID_AMOUNT` for
 *   negatives and non-bigint values.
 */
export function validatePositiveAmount(value: bigint, name: string): void {
  validateNonNegativeAmount(value, name);
  if (value === 0n) {
    throw new ValidationError(`${name} must be greater than zero`, name, BackstopErrorCode.ZERO_AMOUNT);
  }
}

/** Assert that `value` is an integer within [min, max]. */
export function validateIntegerRange(value: number, min: number, max: number, name: string): void {
  if (typeof value !== 'number' || !Number.isInteger(value) || value < min || value > max) {
    throw new ValidationError(
      `${name} must be an integer between ${min} and ${max} (got ${String(value)})`,
      name,
      BackstopErrorCode.INVALID_INPUT,
    );
  }
}

/** Exhaustiveness check for `switch` statements over unions. */
export function assertNever(value: never, message?: string): never {
  throw new Error(message ?? `Unexpected value: ${String(value)}`);
}
