/**
 * Stellar networks the exchange can derive pair addresses for.
 */
export enum Network {
  TESTNET = 'testnet',
  MAINNET = 'mainnet',
  STANDALONE = 'standalone',
}

/**
 * Lifecycle states of a pair record.
 */
export enum PairState {
  UNINITIALIZED = 'uninitialized',
  CONFIGURED = 'configured',
}

/**
 * Which reserve a swap is paying into.
 */
export enum SwapDirection {
  A_TO_B = 'a_to_b',
  B_TO_A = 'b_to_a',
}

/**
 * Logger interface for operation instrumentation.
 *
 * Implement this interface to receive debug, info, and error
 * logs from every registry, liquidity and swap operation.
 * Defaults to undefined (no logging).
 */
export interface Logger {
  /** Debug-level log for operation start and intermediate values. */
  debug(msg: string, data?: unknown): void;
  /** Info-level log for committed operations. */
  info(msg: string, data?: unknown): void;
  /** Error-level log for failed operations and event delivery. */
  error(msg: string, err?: unknown): void;
}
