/**
 * @backstop/types -- shared errors, logging and input guards.
 *
 * @packageDocumentation
 */

// ─── Identities & amounts ───────────────────────────────────────────────────────

/** An account on the collateral asset: underwriter, owner, operator, vault or contract. */
export type AccountId = string;

/** Identifier of a registered venue. */
export type VenueId = string;

/** Integer token amount. */
export type Amount = bigint;

/** Seconds since the Unix epoch. */
export type UnixSeconds = number;

/** Basis points used for protocol fee rates (10 000 = 100%). */
export const BPS_DENOMINATOR = 10_000n;

// ─── Errors ─────────────────────────────────────────────────────────────────────

export {
  BackstopErrorCode,
  BackstopError,
  AuthorizationError,
  NotVenueOwnerError,
  NotFoundError,
  StateError,
  NoShortfallError,
  InsufficientResourceError,
  TransferError,
  ValidationError,
  formatError,
  isBackstopError,
} from './errors';
export type { BackstopErrorOptions, BackstopErrorJSON } from './errors';

// ─── Guards ─────────────────────────────────────────────────────────────────────

export {
  isNonEmptyString,
  isPlainObject,
  validateIdentity,
  validateNonNegativeAmount,
  validatePositiveAmount,
  validateIntegerRange,
  assertNever,
} from './guards';

// ─── Structured logging ─────────────────────────────────────────────────────────

export { Logger, LogLevel, createLogger, silentLogger, parseLogLevel, bigintReplacer } from './logger';
export type { LogEntry, LogFields, LogOutput, LoggerOptions } from './logger';
