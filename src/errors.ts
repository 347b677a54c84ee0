/**
 * Typed error hierarchy for the exchange core.
 *
 * All errors extend ExchangeError and carry a machine-readable code and
 * category for programmatic handling plus a human-readable message.
 * Nothing is retried or coerced: every failure aborts its operation.
 */

import { ErrorCode, ErrorParser, ERROR_MESSAGES } from './errors/parser';

export { ErrorCode, ErrorParser } from './errors/parser';

export type ErrorCategory =
  | 'authorization'
  | 'state'
  | 'validation'
  | 'economic'
  | 'numeric'
  | 'ledger'
  | 'unknown';

/**
 * Base error class for all exchange errors.
 */
export class ExchangeError extends Error {
  readonly code: ErrorCode;
  readonly category: ErrorCategory;
  readonly details?: Record<string, unknown>;

  constructor(
    code: ErrorCode,
    category: ErrorCategory,
    message: string,
    details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = 'ExchangeError';
    this.code = code;
    this.category = category;
    this.details = details;
    Object.setPrototypeOf(this, new.target.prototype);
  }

  /** Numeric identifier of this error's code, as a host would report it. */
  get numericCode(): number | null {
    return ErrorParser.toNumber(this.code);
  }
}

/**
 * Caller is not the registry owner.
 */
export class AuthorizationError extends ExchangeError {
  constructor(caller: string, owner: string, details?: Record<string, unknown>) {
    super(ErrorCode.UNAUTHORIZED, 'authorization', ERROR_MESSAGES[ErrorCode.UNAUTHORIZED], {
      caller,
      owner,
      ...details,
    });
    this.name = 'AuthorizationError';
  }
}

/**
 * Record is in the wrong lifecycle state, or missing.
 */
export class LifecycleError extends ExchangeError {
  constructor(
    code:
      | ErrorCode.ALREADY_CONFIGURED
      | ErrorCode.NOT_CONFIGURED
      | ErrorCode.PAIR_EXISTS
      | ErrorCode.PAIR_NOT_FOUND
      | ErrorCode.REGISTRY_EXISTS
      | ErrorCode.REGISTRY_NOT_FOUND,
    address: string,
  ) {
    super(code, 'state', `${ERROR_MESSAGES[code]}: ${address}`, { address });
    this.name = 'LifecycleError';
  }
}

/**
 * Invalid input parameters or references.
 */
export class ValidationError extends ExchangeError {
  constructor(
    code:
      | ErrorCode.IDENTICAL_ASSETS
      | ErrorCode.INVALID_ASSET
      | ErrorCode.INVALID_CUSTODY_REFERENCE
      | ErrorCode.INVALID_SHARE_MINT
      | ErrorCode.INVALID_PAIR_REGISTRY
      | ErrorCode.INVALID_AMOUNT
      | ErrorCode.INVALID_ADDRESS,
    message?: string,
    details?: Record<string, unknown>,
  ) {
    super(code, 'validation', message ?? ERROR_MESSAGES[code], details);
    this.name = 'ValidationError';
  }
}

/**
 * Operation would violate a slippage bound, liquidity requirement or
 * the constant-product invariant.
 */
export class EconomicError extends ExchangeError {
  constructor(
    code:
      | ErrorCode.INSUFFICIENT_AMOUNT
      | ErrorCode.INSUFFICIENT_LIQUIDITY_MINTED
      | ErrorCode.INSUFFICIENT_LIQUIDITY_BURNED
      | ErrorCode.INSUFFICIENT_OUTPUT_AMOUNT
      | ErrorCode.INSUFFICIENT_LIQUIDITY
      | ErrorCode.INVARIANT_VIOLATED,
    details?: Record<string, unknown>,
  ) {
    super(code, 'economic', ERROR_MESSAGES[code], details);
    this.name = 'EconomicError';
  }
}

/**
 * Checked arithmetic failed or an amount does not fit its integer width.
 */
export class NumericError extends ExchangeError {
  constructor(
    code:
      | ErrorCode.AMOUNT_OVERFLOW
      | ErrorCode.ARITHMETIC_OVERFLOW
      | ErrorCode.ARITHMETIC_UNDERFLOW
      | ErrorCode.DIVISION_BY_ZERO,
    details?: Record<string, unknown>,
  ) {
    super(code, 'numeric', ERROR_MESSAGES[code], details);
    this.name = 'NumericError';
  }
}

/**
 * Custody or share-token collaborator refused an instruction.
 */
export class LedgerError extends ExchangeError {
  constructor(
    code:
      | ErrorCode.INSUFFICIENT_BALANCE
      | ErrorCode.UNKNOWN_ACCOUNT
      | ErrorCode.TRANSFER_NOT_AUTHORIZED,
    details?: Record<string, unknown>,
  ) {
    super(code, 'ledger', ERROR_MESSAGES[code], details);
    this.name = 'LedgerError';
  }
}

/**
 * Rebuild a typed error from a code reported by the host.
 */
function fromCode(code: ErrorCode, err: unknown): ExchangeError {
  const details = { reported: err instanceof Error ? err.message : String(err) };
  switch (code) {
    case ErrorCode.UNAUTHORIZED:
      return new AuthorizationError('unknown', 'unknown', details);
    case ErrorCode.ALREADY_CONFIGURED:
    case ErrorCode.NOT_CONFIGURED:
    case ErrorCode.PAIR_EXISTS:
    case ErrorCode.PAIR_NOT_FOUND:
    case ErrorCode.REGISTRY_EXISTS:
    case ErrorCode.REGISTRY_NOT_FOUND:
      return new LifecycleError(code, 'unknown');
    case ErrorCode.IDENTICAL_ASSETS:
    case ErrorCode.INVALID_ASSET:
    case ErrorCode.INVALID_CUSTODY_REFERENCE:
    case ErrorCode.INVALID_SHARE_MINT:
    case ErrorCode.INVALID_PAIR_REGISTRY:
    case ErrorCode.INVALID_AMOUNT:
    case ErrorCode.INVALID_ADDRESS:
      return new ValidationError(code, undefined, details);
    case ErrorCode.INSUFFICIENT_AMOUNT:
    case ErrorCode.INSUFFICIENT_LIQUIDITY_MINTED:
    case ErrorCode.INSUFFICIENT_LIQUIDITY_BURNED:
    case ErrorCode.INSUFFICIENT_OUTPUT_AMOUNT:
    case ErrorCode.INSUFFICIENT_LIQUIDITY:
    case ErrorCode.INVARIANT_VIOLATED:
      return new EconomicError(code, details);
    case ErrorCode.AMOUNT_OVERFLOW:
    case ErrorCode.ARITHMETIC_OVERFLOW:
    case ErrorCode.ARITHMETIC_UNDERFLOW:
    case ErrorCode.DIVISION_BY_ZERO:
      return new NumericError(code, details);
    case ErrorCode.INSUFFICIENT_BALANCE:
    case ErrorCode.UNKNOWN_ACCOUNT:
    case ErrorCode.TRANSFER_NOT_AUTHORIZED:
      return new LedgerError(code, details);
    case ErrorCode.UNKNOWN_ERROR:
      return new ExchangeError(code, 'unknown', ERROR_MESSAGES[code], details);
  }
}

/**
 * Map a raw error to the appropriate typed error class.
 *
 * - ExchangeError instances pass through unchanged
 * - host failures carrying `Error(Contract, #NNN)` are rebuilt from the code
 * - BigInt `RangeError`s become numeric errors
 * - anything else becomes UNKNOWN_ERROR with the original attached
 */
export function mapError(err: unknown): ExchangeError {
  if (err instanceof ExchangeError) return err;

  const numeric = ErrorParser.extractErrorCode(err);
  if (numeric !== null) {
    const code = ErrorParser.parseCode(numeric);
    if (code) return fromCode(code, err);
  }

  const message = err instanceof Error ? err.message : String(err);

  if (err instanceof RangeError) {
    if (/division by zero/i.test(message)) {
      return new NumericError(ErrorCode.DIVISION_BY_ZERO, { reported: message });
    }
    return new NumericError(ErrorCode.ARITHMETIC_OVERFLOW, { reported: message });
  }

  return new ExchangeError(ErrorCode.UNKNOWN_ERROR, 'unknown', message, {
    originalError: err,
  });
}

/**
 * Narrow an unknown value to an ExchangeError with the given code.
 */
export function isExchangeError(err: unknown, code?: ErrorCode): err is ExchangeError {
  return err instanceof ExchangeError && (code === undefined || err.code === code);
}
