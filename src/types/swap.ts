/**
 * Swap request. The input asset is whichever token `source` holds.
 */
export interface SwapRequest {
  /** Address of the pair */
  pair: string;
  /** Verified identity of the trader */
  sender: string;
  /** Trader's custody account paying the input */
  source: string;
  /** Custody account receiving the output */
  destination: string;
  /** Exact amount to pay in */
  amountIn: bigint;
  /** Minimum acceptable output */
  amountOutMin: bigint;
}

/**
 * Read-only quote request.
 */
export interface SwapQuoteRequest {
  /** Address of the pair */
  pair: string;
  /** Asset paid in */
  tokenIn: string;
  /** Exact amount to pay in */
  amountIn: bigint;
  /** Optional slippage tolerance in basis points */
  slippageBps?: number;
}

/**
 * Swap quote returned before execution.
 */
export interface SwapQuote {
  /** The address of the input token */
  tokenIn: string;
  /** The address of the output token */
  tokenOut: string;
  /** The input amount */
  amountIn: bigint;
  /** The expected output amount */
  amountOut: bigint;
  /** Minimum output amount factoring in slippage */
  amountOutMin: bigint;
  /** Price impact of the trade in basis points */
  priceImpactBps: number;
  /** Part of the input kept by the pool as fee */
  feeAmount: bigint;
}

/**
 * Swap execution result.
 */
export interface SwapResult {
  /** Address of the pair */
  pair: string;
  /** Actual input amount */
  amountIn: bigint;
  /** Actual output amount */
  amountOut: bigint;
  /** True when tokenA was the input */
  tokenAIn: boolean;
  /** Reserve of tokenA after the swap */
  reserveA: bigint;
  /** Reserve of tokenB after the swap */
  reserveB: bigint;
}
