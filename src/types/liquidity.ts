/**
 * Desired and minimum deposit amounts.
 */
export interface AddLiquidityParams {
  /** Desired amount of tokenA to add */
  desiredA: bigint;
  /** Desired amount of tokenB to add */
  desiredB: bigint;
  /** Minimum amount of tokenA to add (slippage protection) */
  minA: bigint;
  /** Minimum amount of tokenB to add (slippage protection) */
  minB: bigint;
}

/**
 * Add liquidity request.
 */
export interface AddLiquidityRequest extends AddLiquidityParams {
  /** Address of the pair */
  pair: string;
  /** Verified identity of the depositor */
  sender: string;
  /** Depositor's custody account holding tokenA */
  sourceA: string;
  /** Depositor's custody account holding tokenB */
  sourceB: string;
  /** Address receiving the shares (defaults to sender) */
  to?: string;
}

/**
 * Shares to redeem and minimum amounts to receive.
 */
export interface RemoveLiquidityParams {
  /** Amount of shares to redeem */
  liquidity: bigint;
  /** Minimum amount of tokenA to receive */
  minA: bigint;
  /** Minimum amount of tokenB to receive */
  minB: bigint;
}

/**
 * Remove liquidity request.
 */
export interface RemoveLiquidityRequest extends RemoveLiquidityParams {
  /** Address of the pair */
  pair: string;
  /** Verified identity of the share holder */
  sender: string;
  /** Custody account receiving tokenA */
  destinationA: string;
  /** Custody account receiving tokenB */
  destinationB: string;
}

/**
 * Liquidity operation result.
 */
export interface LiquidityResult {
  /** Address of the pair */
  pair: string;
  /** Amount of tokenA added or removed */
  amountA: bigint;
  /** Amount of tokenB added or removed */
  amountB: bigint;
  /** Shares minted to the provider or burned from them */
  liquidity: bigint;
  /** Total share supply after the operation */
  totalShares: bigint;
}

/**
 * Quote for adding liquidity.
 */
export interface AddLiquidityQuote {
  /** Amount of tokenA that would be taken */
  amountA: bigint;
  /** Amount of tokenB that would be taken */
  amountB: bigint;
  /** Shares that would be minted to the provider */
  liquidity: bigint;
  /** Shares that would be locked at the burn address */
  lockedLiquidity: bigint;
  /** Provider's share of the pool afterwards, in basis points */
  shareOfPoolBps: number;
}
