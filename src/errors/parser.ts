/**
 * Stable numeric identifiers for exchange error codes.
 *
 * Hosts report failures as `Error(Contract, #NNN)`; these tables translate
 * between the numeric form and the string codes carried by ExchangeError.
 */

/** Error codes grouped by the range of their numeric identifier. */
export enum ErrorCode {
  // Registry (100-119)
  UNAUTHORIZED = 'UNAUTHORIZED',
  REGISTRY_NOT_FOUND = 'REGISTRY_NOT_FOUND',
  REGISTRY_EXISTS = 'REGISTRY_EXISTS',

  // Pair lifecycle and validation (200-219)
  IDENTICAL_ASSETS = 'IDENTICAL_ASSETS',
  PAIR_EXISTS = 'PAIR_EXISTS',
  PAIR_NOT_FOUND = 'PAIR_NOT_FOUND',
  ALREADY_CONFIGURED = 'ALREADY_CONFIGURED',
  NOT_CONFIGURED = 'NOT_CONFIGURED',
  INVALID_ASSET = 'INVALID_ASSET',
  INVALID_CUSTODY_REFERENCE = 'INVALID_CUSTODY_REFERENCE',
  INVALID_SHARE_MINT = 'INVALID_SHARE_MINT',
  INVALID_PAIR_REGISTRY = 'INVALID_PAIR_REGISTRY',
  INVALID_AMOUNT = 'INVALID_AMOUNT',
  INVALID_ADDRESS = 'INVALID_ADDRESS',

  // Economic (300-319)
  INSUFFICIENT_AMOUNT = 'INSUFFICIENT_AMOUNT',
  INSUFFICIENT_LIQUIDITY_MINTED = 'INSUFFICIENT_LIQUIDITY_MINTED',
  INSUFFICIENT_LIQUIDITY_BURNED = 'INSUFFICIENT_LIQUIDITY_BURNED',
  INSUFFICIENT_OUTPUT_AMOUNT = 'INSUFFICIENT_OUTPUT_AMOUNT',
  INSUFFICIENT_LIQUIDITY = 'INSUFFICIENT_LIQUIDITY',
  INVARIANT_VIOLATED = 'INVARIANT_VIOLATED',

  // Numeric (400-419)
  AMOUNT_OVERFLOW = 'AMOUNT_OVERFLOW',
  ARITHMETIC_OVERFLOW = 'ARITHMETIC_OVERFLOW',
  ARITHMETIC_UNDERFLOW = 'ARITHMETIC_UNDERFLOW',
  DIVISION_BY_ZERO = 'DIVISION_BY_ZERO',

  // Ledger collaborators (500-519)
  INSUFFICIENT_BALANCE = 'INSUFFICIENT_BALANCE',
  UNKNOWN_ACCOUNT = 'UNKNOWN_ACCOUNT',
  TRANSFER_NOT_AUTHORIZED = 'TRANSFER_NOT_AUTHORIZED',

  UNKNOWN_ERROR = 'UNKNOWN_ERROR',
}

/** Registry errors (100-119). */
export const REGISTRY_ERROR_MAP: Record<number, ErrorCode> = {
  100: ErrorCode.UNAUTHORIZED,
  101: ErrorCode.REGISTRY_NOT_FOUND,
  102: ErrorCode.REGISTRY_EXISTS,
};

/** Pair lifecycle and validation errors (200-219). */
export const PAIR_ERROR_MAP: Record<number, ErrorCode> = {
  200: ErrorCode.IDENTICAL_ASSETS,
  201: ErrorCode.PAIR_EXISTS,
  202: ErrorCode.PAIR_NOT_FOUND,
  203: ErrorCode.ALREADY_CONFIGURED,
  204: ErrorCode.NOT_CONFIGURED,
  205: ErrorCode.INVALID_ASSET,
  206: ErrorCode.INVALID_CUSTODY_REFERENCE,
  207: ErrorCode.INVALID_SHARE_MINT,
  208: ErrorCode.INVALID_PAIR_REGISTRY,
  209: ErrorCode.INVALID_AMOUNT,
  210: ErrorCode.INVALID_ADDRESS,
};

/** Economic errors (300-319). */
export const ECONOMIC_ERROR_MAP: Record<number, ErrorCode> = {
  300: ErrorCode.INSUFFICIENT_AMOUNT,
  301: ErrorCode.INSUFFICIENT_LIQUIDITY_MINTED,
  302: ErrorCode.INSUFFICIENT_LIQUIDITY_BURNED,
  303: ErrorCode.INSUFFICIENT_OUTPUT_AMOUNT,
  304: ErrorCode.INSUFFICIENT_LIQUIDITY,
  305: ErrorCode.INVARIANT_VIOLATED,
};

/** Numeric errors (400-419). */
export const NUMERIC_ERROR_MAP: Record<number, ErrorCode> = {
  400: ErrorCode.AMOUNT_OVERFLOW,
  401: ErrorCode.ARITHMETIC_OVERFLOW,
  402: ErrorCode.ARITHMETIC_UNDERFLOW,
  403: ErrorCode.DIVISION_BY_ZERO,
};

/** Custody and share-token collaborator errors (500-519). */
export const LEDGER_ERROR_MAP: Record<number, ErrorCode> = {
  500: ErrorCode.INSUFFICIENT_BALANCE,
  501: ErrorCode.UNKNOWN_ACCOUNT,
  502: ErrorCode.TRANSFER_NOT_AUTHORIZED,
};

/** Human-readable descriptions, used when an error is rebuilt from a number. */
export const ERROR_MESSAGES: Record<ErrorCode, string> = {
  [ErrorCode.UNAUTHORIZED]: 'Only the registry owner can perform this action',
  [ErrorCode.REGISTRY_NOT_FOUND]: 'Registry not found',
  [ErrorCode.REGISTRY_EXISTS]: 'Registry already initialized',
  [ErrorCode.IDENTICAL_ASSETS]: 'Assets cannot be identical',
  [ErrorCode.PAIR_EXISTS]: 'Pair already exists for these assets',
  [ErrorCode.PAIR_NOT_FOUND]: 'Pair not found',
  [ErrorCode.ALREADY_CONFIGURED]: 'Pair is already configured',
  [ErrorCode.NOT_CONFIGURED]: 'Pair is not configured',
  [ErrorCode.INVALID_ASSET]: 'Asset does not belong to this pair',
  [ErrorCode.INVALID_CUSTODY_REFERENCE]: 'Invalid custody account',
  [ErrorCode.INVALID_SHARE_MINT]: 'Invalid share mint',
  [ErrorCode.INVALID_PAIR_REGISTRY]: 'Pair belongs to another registry',
  [ErrorCode.INVALID_AMOUNT]: 'Invalid amount',
  [ErrorCode.INVALID_ADDRESS]: 'Invalid address',
  [ErrorCode.INSUFFICIENT_AMOUNT]: 'Insufficient amount',
  [ErrorCode.INSUFFICIENT_LIQUIDITY_MINTED]: 'Insufficient liquidity minted',
  [ErrorCode.INSUFFICIENT_LIQUIDITY_BURNED]: 'Insufficient liquidity burned',
  [ErrorCode.INSUFFICIENT_OUTPUT_AMOUNT]: 'Insufficient output amount',
  [ErrorCode.INSUFFICIENT_LIQUIDITY]: 'Insufficient liquidity',
  [ErrorCode.INVARIANT_VIOLATED]: 'Constant product decreased',
  [ErrorCode.AMOUNT_OVERFLOW]: 'Amount exceeds maximum allowable token quantity',
  [ErrorCode.ARITHMETIC_OVERFLOW]: 'Arithmetic overflow',
  [ErrorCode.ARITHMETIC_UNDERFLOW]: 'Arithmetic underflow',
  [ErrorCode.DIVISION_BY_ZERO]: 'Division by zero',
  [ErrorCode.INSUFFICIENT_BALANCE]: 'Insufficient balance',
  [ErrorCode.UNKNOWN_ACCOUNT]: 'Unknown account',
  [ErrorCode.TRANSFER_NOT_AUTHORIZED]: 'Transfer not authorized',
  [ErrorCode.UNKNOWN_ERROR]: 'Unknown error',
};

const ALL_MAPS: Array<Record<number, ErrorCode>> = [
  REGISTRY_ERROR_MAP,
  PAIR_ERROR_MAP,
  ECONOMIC_ERROR_MAP,
  NUMERIC_ERROR_MAP,
  LEDGER_ERROR_MAP,
];

/**
 * Utility for translating between numeric host error identifiers and
 * exchange error codes.
 */
export class ErrorParser {
  /**
   * Resolve a numeric identifier to an error code.
   *
   * @returns The code, or null if the number is unassigned.
   */
  static parseCode(code: number): ErrorCode | null {
    if (code >= 100 && code < 120) return REGISTRY_ERROR_MAP[code] ?? null;
    if (code >= 200 && code < 220) return PAIR_ERROR_MAP[code] ?? null;
    if (code >= 300 && code < 320) return ECONOMIC_ERROR_MAP[code] ?? null;
    if (code >= 400 && code < 420) return NUMERIC_ERROR_MAP[code] ?? null;
    if (code >= 500 && code < 520) return LEDGER_ERROR_MAP[code] ?? null;
    return null;
  }

  /**
   * Numeric identifier of an error code, or null for UNKNOWN_ERROR.
   */
  static toNumber(code: ErrorCode): number | null {
    for (const map of ALL_MAPS) {
      for (const [num, mapped] of Object.entries(map)) {
        if (mapped === code) return Number(num);
      }
    }
    return null;
  }

  /**
   * Extract the numeric identifier from `Error(Contract, #NNN)`.
   */
  static extractErrorCode(err: unknown): number | null {
    const message = err instanceof Error ? err.message : String(err);
    const match = message.match(/Error\(Contract,\s*#(\d+)\)/);
    if (!match) return null;
    return parseInt(match[1], 10);
  }
}
