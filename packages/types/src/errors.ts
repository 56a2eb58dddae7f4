/**
 * Error code system for the Backstop protocol.
 *
 * Every failure path maps to a documented code (BKS_Exxx) and to one of the
 * error classes below, so callers can branch on `instanceof` or on `code`
 * without parsing messages.
 *
 * @packageDocumentation
 */

// ─── Error codes ────────────────────────────────────────────────────────────────

/** All Backstop error codes. */
export enum BackstopErrorCode {
  // Validation (1xx)
  /** A required amount was zero. */
  ZERO_AMOUNT = 'BKS_E100',
  /** An amount was negative or not an integer. */
  INVALID_AMOUNT = 'BKS_E101',
  /** An identity or venue id was empty. */
  INVALID_IDENTITY = 'BKS_E102',
  /** Fewer underwriters than the protocol minimum were supplied. */
  TOO_FEW_UNDERWRITERS = 'BKS_E103',
  /** The same underwriter appeared twice in one request. */
  DUPLICATE_UNDERWRITER = 'BKS_E104',
  /** A configuration value was missing or out of range. */
  INVALID_CONFIG = 'BKS_E105',
  /** Input lists had mismatched lengths or were otherwise malformed. */
  INVALID_INPUT = 'BKS_E106',

  // Authorization (2xx)
  /** The caller does not hold the role the operation requires. */
  UNAUTHORIZED = 'BKS_E200',
  /** The identity is not registered in the underwriter pool. */
  NOT_REGISTERED = 'BKS_E201',
  /** The caller is not the owner of the venue. */
  NOT_VENUE_OWNER = 'BKS_E202',

  // Lookup (3xx)
  /** The venue is unknown. */
  VENUE_NOT_FOUND = 'BKS_E300',
  /** No monthly report exists for the requested month. */
  REPORT_NOT_FOUND = 'BKS_E301',
  /** The venue has no underwriting assignment. */
  ASSIGNMENT_NOT_FOUND = 'BKS_E302',
  /** The underwriter has never registered stake. */
  UNDERWRITER_NOT_FOUND = 'BKS_E303',

  // State (4xx)
  /** The venue already carries an underwriting assignment. */
  ALREADY_ASSIGNED = 'BKS_E400',
  /** The liability for this month has already been settled. */
  ALREADY_SETTLED = 'BKS_E401',
  /** Fees for this venue have already been distributed. */
  ALREADY_DISTRIBUTED = 'BKS_E402',
  /** The fee has already been claimed by this underwriter. */
  ALREADY_CLAIMED = 'BKS_E403',
  /** The contract period has not yet elapsed. */
  NOT_MATURED = 'BKS_E404',
  /** A guarded operation was entered while already executing. */
  REENTRANT_CALL = 'BKS_E405',
  /** The operation is not allowed in the current lifecycle state. */
  INVALID_STATE = 'BKS_E406',
  /** The underwriter is already on the roster. */
  ALREADY_ON_ROSTER = 'BKS_E407',
  /** The assignment is no longer active. */
  ASSIGNMENT_INACTIVE = 'BKS_E408',
  /** The report shows no missing revenue. */
  NO_SHORTFALL = 'BKS_E409',

  // Resources (5xx)
  /** Available stake is below the requested amount. */
  INSUFFICIENT_STAKE = 'BKS_E500',
  /** Aggregate committed stake does not cover the promised revenue. */
  INSUFFICIENT_COVERAGE = 'BKS_E501',
  /** Locked stake cannot cover a liability share. */
  INSUFFICIENT_LOCKED = 'BKS_E502',
  /** The fee escrow holds no funds. */
  EMPTY_ESCROW = 'BKS_E503',

  // Transfers (6xx)
  /** The collateral asset reported a failed transfer. */
  TRANSFER_FAILED = 'BKS_E600',
}

// ─── Error classes ──────────────────────────────────────────────────────────────

/** Options for constructing a BackstopError. */
export interface BackstopErrorOptions {
  /** Additional structured context for diagnostics and logging. */
  context?: Record<string, unknown>;
  /** A human-readable hint suggesting how to resolve the error. */
  hint?: string;
  /** The underlying cause of this error, for error chaining. */
  cause?: Error;
}

/** JSON form produced by {@link BackstopError.toJSON}. */
export interface BackstopErrorJSON {
  name: string;
  code: string;
  message: string;
  hint?: string;
  context?: Record<string, unknown>;
}

/**
 * Base error class for all Backstop errors.
 *
 * @example
 * ```typescript
 * throw new StateError(
 *   BackstopErrorCode.ALREADY_ASSIGNED,
 *   'Venue venue-1 already has an underwriting assignment',
 *   { context: { venueId: 'venue-1' } },
 * );
 * ```
 */
export class BackstopError extends Error {
  readonly code: BackstopErrorCode;
  readonly context?: Record<string, unknown>;
  readonly hint?: string;

  constructor(code: BackstopErrorCode, message: string, options?: BackstopErrorOptions) {
    super(message, options?.cause ? { cause: options.cause } : undefined);
    this.name = 'BackstopError';
    this.code = code;
    this.context = options?.context;
    this.hint = options?.hint;
  }

  /** Return a structured representation suitable for logging. */
  toJSON(): BackstopErrorJSON {
    const result: BackstopErrorJSON = {
      name: this.name,
      code: this.code,
      message: this.message,
    };
    if (this.hint !== undefined) {
      result.hint = this.hint;
    }
    if (this.context !== undefined) {
      result.context = this.context;
    }
    return result;
  }
}

/** Wrong role, or an identity the protocol does not recognise. */
export class AuthorizationError extends BackstopError {
  constructor(message: string, options?: BackstopErrorOptions, code: BackstopErrorCode = BackstopErrorCode.UNAUTHORIZED) {
    super(code, message, options);
    this.name = 'AuthorizationError';
  }
}

/**
 * The caller is not the venue's owner.
 *
 * Kept apart from {@link AuthorizationError} so callers can tell an owner
 * mismatch from a missing operator/admin role.
 */
export class NotVenueOwnerError extends BackstopError {
  readonly venueId: string;

  constructor(venueId: string, caller: string) {
    super(BackstopErrorCode.NOT_VENUE_OWNER, `${caller} is not the owner of venue ${venueId}`, {
      context: { venueId, caller },
    });
    this.name = 'NotVenueOwnerError';
    this.venueId = venueId;
  }
}

/** Unknown venue, month, assignment or underwriter. */
export class NotFoundError extends BackstopError {
  constructor(code: BackstopErrorCode, message: string, options?: BackstopErrorOptions) {
    super(code, message, options);
    this.name = 'NotFoundError';
  }
}

/** The operation conflicts with the current lifecycle state. */
export class StateError extends BackstopError {
  constructor(code: BackstopErrorCode, message: string, options?: BackstopErrorOptions) {
    super(code, message, options);
    this.name = 'StateError';
  }
}

/** A report was asked to settle liability but shows no missing revenue. */
export class NoShortfallError extends BackstopError {
  readonly month: number;

  constructor(month: number) {
    super(BackstopErrorCode.NO_SHORTFALL, `Report for month ${month} has no missing revenue`, {
      context: { month },
    });
    this.name = 'NoShortfallError';
    this.month = month;
  }
}

/** Stake, coverage or escrow is too low for the request. */
export class InsufficientResourceError extends BackstopError {
  constructor(code: BackstopErrorCode, message: string, options?: BackstopErrorOptions) {
    super(code, message, options);
    this.name = 'InsufficientResourceError';
  }
}

/** The collateral asset refused a transfer. */
export class TransferError extends BackstopError {
  constructor(message: string, options?: BackstopErrorOptions) {
    super(BackstopErrorCode.TRANSFER_FAILED, message, options);
    this.name = 'TransferError';
  }
}

/** An input failed validation. */
export class ValidationError extends BackstopError {
  /** The name of the field or parameter that failed validation. */
  readonly field: string;

  constructor(message: string, field: string, code: BackstopErrorCode = BackstopErrorCode.INVALID_INPUT) {
    super(code, message, { context: { field } });
    this.name = 'ValidationError';
    this.field = field;
  }
}

// ─── Utility functions ──────────────────────────────────────────────────────────

/**
 * Format an error for display.
 *
 * @example
 * ```typescript
 * formatError(new TransferError('transfer of 10 from a to b failed'));
 * // [BKS_E600] TransferError: transfer of 10 from a to b failed
 * ```
 */
export function formatError(error: BackstopError): string {
  const lines: string[] = [];
  lines.push(`[${error.code}] ${error.name}: ${error.message}`);
  if (error.hint) {
    lines.push(`Hint: ${error.hint}`);
  }
  return lines.join('\n');
}

/** Narrow an unknown thrown value to a {@link BackstopError}. */
export function isBackstopError(value: unknown): value is BackstopError {
  return value instanceof BackstopError;
}
