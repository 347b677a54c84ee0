import type { Exchange } from '../exchange';
import { DEFAULTS, PRECISION } from '../config';
import { EconomicError, ErrorCode, ValidationError } from '../errors';
import { SwapDirection } from '../types/common';
import { PoolReserves } from '../types/pair';
import { SwapQuote, SwapQuoteRequest, SwapRequest, SwapResult } from '../types/swap';
import { U64_MAX, checkedAdd, checkedDiv, checkedMul, checkedSub, requireU128, toU64 } from '../utils/math';

/**
 * Output for an exact input, constant-product formula with the 0.3% fee
 * taken from the input:
 *
 *   out = in*997*reserveOut / (reserveIn*1000 + in*997)
 */
export function getAmountOut(amountIn: bigint, reserveIn: bigint, reserveOut: bigint): bigint {
  const amountInWithFee = checkedMul(amountIn, PRECISION.FEE_NUMERATOR);
  const numerator = checkedMul(amountInWithFee, reserveOut);
  const denominator = checkedAdd(checkedMul(reserveIn, PRECISION.FEE_DENOMINATOR), amountInWithFee);
  return checkedDiv(numerator, denominator);
}

/**
 * Input needed for an exact output. Rounds up by one so the resulting
 * swap never yields less than `amountOut`.
 */
export function getAmountIn(amountOut: bigint, reserveIn: bigint, reserveOut: bigint): bigint {
  if (amountOut >= reserveOut) {
    throw new EconomicError(ErrorCode.INSUFFICIENT_LIQUIDITY, {
      amountOut: amountOut.toString(),
      reserveOut: reserveOut.toString(),
    });
  }
  const numerator = checkedMul(checkedMul(reserveIn, amountOut), PRECISION.FEE_DENOMINATOR);
  const denominator = checkedMul(checkedSub(reserveOut, amountOut), PRECISION.FEE_NUMERATOR);
  return checkedAdd(checkedDiv(numerator, denominator), 1n);
}

/**
 * Fail with INVARIANT_VIOLATED if the reserve product went down.
 */
export function assertInvariant(
  before: Pick<PoolReserves, 'reserveA' | 'reserveB'>,
  after: Pick<PoolReserves, 'reserveA' | 'reserveB'>,
): void {
  const kBefore = checkedMul(before.reserveA, before.reserveB);
  const kAfter = checkedMul(after.reserveA, after.reserveB);
  if (kAfter < kBefore) {
    throw new EconomicError(ErrorCode.INVARIANT_VIOLATED, {
      kBefore: kBefore.toString(),
      kAfter: kAfter.toString(),
    });
  }
}

/**
 * Amounts a swap moves and the pool it leaves behind.
 */
export interface SwapAmounts {
  direction: SwapDirection;
  amountIn: bigint;
  amountOut: bigint;
  pool: PoolReserves;
}

/**
 * Work out an exact-in swap against the current pool.
 */
export function computeSwap(
  pool: PoolReserves,
  direction: SwapDirection,
  amountIn: bigint,
  amountOutMin: bigint,
): SwapAmounts {
  const input = toU64(requireU128(amountIn, 'amountIn'), 'amountIn');
  const minOut = requireU128(amountOutMin, 'amountOutMin');

  const aIn = direction === SwapDirection.A_TO_B;
  const reserveIn = aIn ? pool.reserveA : pool.reserveB;
  const reserveOut = aIn ? pool.reserveB : pool.reserveA;

  const amountOut = getAmountOut(input, reserveIn, reserveOut);
  if (amountOut < minOut) {
    throw new EconomicError(ErrorCode.INSUFFICIENT_OUTPUT_AMOUNT, {
      amountOut: amountOut.toString(),
      amountOutMin: minOut.toString(),
    });
  }
  toU64(amountOut, 'amountOut');
  if (amountOut === 0n) {
    throw new EconomicError(ErrorCode.INSUFFICIENT_OUTPUT_AMOUNT, { amountOut: '0' });
  }
  if (amountOut > reserveOut) {
    throw new EconomicError(ErrorCode.INSUFFICIENT_LIQUIDITY, {
      amountOut: amountOut.toString(),
      reserveOut: reserveOut.toString(),
    });
  }

  const newIn = checkedAdd(reserveIn, input, U64_MAX);
  const newOut = checkedSub(reserveOut, amountOut);
  const next: PoolReserves = aIn
    ? { reserveA: newIn, reserveB: newOut, totalShares: pool.totalShares }
    : { reserveA: newOut, reserveB: newIn, totalShares: pool.totalShares };

  assertInvariant(pool, next);

  return { direction, amountIn: input, amountOut, pool: next };
}

/**
 * Swap module -- quotes and executes exact-in swaps.
 */
export class SwapModule {
  private exchange: Exchange;

  constructor(exchange: Exchange) {
    this.exchange = exchange;
  }

  /**
   * Expected output, slippage-adjusted minimum and price impact, without
   * executing.
   */
  async quote(request: SwapQuoteRequest): Promise<SwapQuote> {
    const pair = await this.exchange.loadPair(request.pair);
    const record = pair.requireConfigured();
    const direction = pair.directionFor(request.tokenIn);
    const aIn = direction === SwapDirection.A_TO_B;

    const amounts = computeSwap(pair.pool(), direction, request.amountIn, 0n);
    const reserveIn = aIn ? record.reserveA : record.reserveB;
    const reserveOut = aIn ? record.reserveB : record.reserveA;

    const slippageBps = request.slippageBps ?? this.exchange.config.defaultSlippageBps ?? DEFAULTS.slippageBps;
    if (!Number.isInteger(slippageBps) || slippageBps < 0 || slippageBps > 10000) {
      throw new ValidationError(ErrorCode.INVALID_AMOUNT, `slippageBps must be an integer in 0..10000`, {
        slippageBps,
      });
    }
    const amountOutMin =
      amounts.amountOut - (amounts.amountOut * BigInt(slippageBps)) / PRECISION.BPS_DENOMINATOR;

    return {
      tokenIn: request.tokenIn,
      tokenOut: aIn ? record.tokenB : record.tokenA,
      amountIn: amounts.amountIn,
      amountOut: amounts.amountOut,
      amountOutMin,
      priceImpactBps: this.calculatePriceImpact(amounts.amountIn, amounts.amountOut, reserveIn, reserveOut),
      feeAmount:
        (amounts.amountIn * (PRECISION.FEE_DENOMINATOR - PRECISION.FEE_NUMERATOR)) / PRECISION.FEE_DENOMINATOR,
    };
  }

  /**
   * Execute an exact-in swap.
   *
   * The input side is whichever token the source custody holds. After
   * both transfers and the reserve write, the stored reserves are read
   * back and the product re-checked before the scope commits.
   */
  async execute(request: SwapRequest): Promise<SwapResult> {
    return this.exchange.execute(
      'swap',
      () => [request.pair],
      async () => {
        const pair = await this.exchange.loadPair(request.pair);
        const record = pair.requireConfigured();
        const { custody, store } = this.exchange.environment;

        const source = await this.exchange.requireTraderCustody(record, request.source, request.sender);
        const direction = pair.directionFor(source.asset);
        const aIn = direction === SwapDirection.A_TO_B;
        const tokenOut = aIn ? record.tokenB : record.tokenA;
        await this.exchange.requireTraderCustody(record, request.destination, request.sender, tokenOut);

        const before = pair.pool();
        const amounts = computeSwap(before, direction, request.amountIn, request.amountOutMin);

        await custody.transfer({
          from: request.source,
          to: aIn ? record.reserveAccountA : record.reserveAccountB,
          amount: amounts.amountIn,
          authorizer: request.sender,
        });
        await custody.transfer({
          from: aIn ? record.reserveAccountB : record.reserveAccountA,
          to: request.destination,
          amount: amounts.amountOut,
          authorizer: pair.authority(),
        });

        await store.putPair(pair.withPool(amounts.pool).record);

        const after = (await this.exchange.loadPair(request.pair)).pool();
        assertInvariant(before, after);

        return {
          result: {
            pair: request.pair,
            amountIn: amounts.amountIn,
            amountOut: amounts.amountOut,
            tokenAIn: aIn,
            reserveA: after.reserveA,
            reserveB: after.reserveB,
          },
          events: [
            {
              type: 'swap',
              pair: request.pair,
              sender: request.sender,
              amountIn: amounts.amountIn,
              amountOut: amounts.amountOut,
              tokenAIn: aIn,
              timestamp: Date.now(),
            },
          ],
        };
      },
    );
  }

  /**
   * Calculate price impact in basis points.
   */
  private calculatePriceImpact(
    amountIn: bigint,
    amountOut: bigint,
    reserveIn: bigint,
    reserveOut: bigint,
  ): number {
    if (reserveIn === 0n || reserveOut === 0n) return 10000;
    const idealOut = (amountIn * reserveOut) / reserveIn;
    if (idealOut === 0n) return 10000;
    const impact = ((idealOut - amountOut) * 10000n) / idealOut;
    return Number(impact);
  }
}
