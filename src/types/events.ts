/**
 * Base exchange event.
 */
export interface ExchangeEventBase {
  /** Event type identifier string */
  type: string;
  /** Address of the pair the event concerns */
  pair: string;
  /** Unix timestamp in milliseconds when the operation committed */
  timestamp: number;
}

/**
 * Emitted when a pair completes configuration.
 */
export interface PairCreatedEvent extends ExchangeEventBase {
  type: 'pair_created';
  /** Address of the registry */
  registry: string;
  /** Smaller asset */
  tokenA: string;
  /** Larger asset */
  tokenB: string;
  /** Registry pair count after this pair */
  pairCount: bigint;
}

/**
 * Liquidity add/remove event.
 */
export interface LiquidityEvent extends ExchangeEventBase {
  type: 'liquidity_added' | 'liquidity_removed';
  /** Address of the liquidity provider */
  sender: string;
  /** Amount of tokenA deposited or withdrawn */
  amountA: bigint;
  /** Amount of tokenB deposited or withdrawn */
  amountB: bigint;
  /** Shares minted to the provider, or burned from them */
  liquidity: bigint;
}

/**
 * Swap event.
 */
export interface SwapEvent extends ExchangeEventBase {
  type: 'swap';
  /** Address of the trader */
  sender: string;
  /** Amount paid in */
  amountIn: bigint;
  /** Amount paid out */
  amountOut: bigint;
  /** True when tokenA was the input asset */
  tokenAIn: boolean;
}

/**
 * Union of all exchange events.
 */
export type ExchangeEvent = PairCreatedEvent | LiquidityEvent | SwapEvent;
