import type { Exchange } from '../exchange';
import { PRECISION } from '../config';
import { EconomicError, ErrorCode } from '../errors';
import {
  AddLiquidityParams,
  AddLiquidityQuote,
  AddLiquidityRequest,
  LiquidityResult,
  RemoveLiquidityParams,
  RemoveLiquidityRequest,
} from '../types/liquidity';
import { PoolReserves, SharePosition } from '../types/pair';
import { requireAddress } from '../utils/addresses';
import {
  U64_MAX,
  checkedAdd,
  checkedDiv,
  checkedMul,
  checkedSub,
  requireU128,
  sqrt,
  toBps,
  toU64,
} from '../utils/math';

/**
 * Amounts a deposit takes and the pool it leaves behind.
 */
export interface AddLiquidityAmounts {
  amountA: bigint;
  amountB: bigint;
  /** Shares for the depositor */
  liquidity: bigint;
  /** Shares locked at the burn address (first deposit only) */
  lockedLiquidity: bigint;
  pool: PoolReserves;
}

/**
 * Amounts a withdrawal pays out and the pool it leaves behind.
 */
export interface RemoveLiquidityAmounts {
  amountA: bigint;
  amountB: bigint;
  liquidity: bigint;
  pool: PoolReserves;
}

/**
 * Work out a deposit against the current pool.
 *
 * The first deposit takes both desired amounts and mints
 * `sqrt(amountA * amountB) - MINIMUM_LIQUIDITY` shares, locking the
 * minimum forever. Later deposits take the desired amount of the binding
 * side and the proportional amount of the other, minting shares pro rata.
 * Every division floors, so the depositor is never over-credited.
 */
export function computeAddLiquidity(pool: PoolReserves, params: AddLiquidityParams): AddLiquidityAmounts {
  const desiredA = requireU128(params.desiredA, 'desiredA');
  const desiredB = requireU128(params.desiredB, 'desiredB');
  const minA = requireU128(params.minA, 'minA');
  const minB = requireU128(params.minB, 'minB');

  let amountA: bigint;
  let amountB: bigint;
  let liquidity: bigint;
  let lockedLiquidity = 0n;

  if (pool.reserveA === 0n && pool.reserveB === 0n) {
    amountA = toU64(desiredA, 'desiredA');
    amountB = toU64(desiredB, 'desiredB');

    const root = sqrt(checkedMul(amountA, amountB));
    liquidity = root > PRECISION.MINIMUM_LIQUIDITY ? root - PRECISION.MINIMUM_LIQUIDITY : 0n;
    if (liquidity === 0n) {
      throw new EconomicError(ErrorCode.INSUFFICIENT_LIQUIDITY_MINTED, { root: root.toString() });
    }
    lockedLiquidity = PRECISION.MINIMUM_LIQUIDITY;
  } else {
    const optimalB = checkedDiv(checkedMul(desiredA, pool.reserveB), pool.reserveA);

    if (optimalB <= desiredB) {
      if (optimalB < minB) {
        throw new EconomicError(ErrorCode.INSUFFICIENT_AMOUNT, {
          side: 'B',
          optimal: optimalB.toString(),
          min: minB.toString(),
        });
      }
      const shares = checkedDiv(checkedMul(desiredA, pool.totalShares), pool.reserveA);
      amountA = toU64(desiredA, 'amountA');
      amountB = toU64(optimalB, 'amountB');
      liquidity = toU64(shares, 'liquidity');
    } else {
      const optimalA = checkedDiv(checkedMul(desiredB, pool.reserveA), pool.reserveB);
      if (optimalA < minA) {
        throw new EconomicError(ErrorCode.INSUFFICIENT_AMOUNT, {
          side: 'A',
          optimal: optimalA.toString(),
          min: minA.toString(),
        });
      }
      const shares = checkedDiv(checkedMul(desiredB, pool.totalShares), pool.reserveB);
      amountA = toU64(optimalA, 'amountA');
      amountB = toU64(desiredB, 'amountB');
      liquidity = toU64(shares, 'liquidity');
    }

    if (liquidity === 0n) {
      throw new EconomicError(ErrorCode.INSUFFICIENT_LIQUIDITY_MINTED, {
        amountA: amountA.toString(),
        amountB: amountB.toString(),
      });
    }
  }

  if (amountA < minA || amountB < minB) {
    throw new EconomicError(ErrorCode.INSUFFICIENT_AMOUNT, {
      amountA: amountA.toString(),
      amountB: amountB.toString(),
    });
  }

  return {
    amountA,
    amountB,
    liquidity,
    lockedLiquidity,
    pool: {
      reserveA: checkedAdd(pool.reserveA, amountA, U64_MAX),
      reserveB: checkedAdd(pool.reserveB, amountB, U64_MAX),
      totalShares: checkedAdd(checkedAdd(pool.totalShares, liquidity, U64_MAX), lockedLiquidity, U64_MAX),
    },
  };
}

/**
 * Work out a withdrawal of `liquidity` shares.
 *
 * Payouts are floored, so rounding always favours the pool.
 */
export function computeRemoveLiquidity(pool: PoolReserves, params: RemoveLiquidityParams): RemoveLiquidityAmounts {
  const liquidity = toU64(requireU128(params.liquidity, 'liquidity'), 'liquidity');
  const minA = requireU128(params.minA, 'minA');
  const minB = requireU128(params.minB, 'minB');

  if (liquidity > pool.totalShares) {
    throw new EconomicError(ErrorCode.INSUFFICIENT_LIQUIDITY, {
      liquidity: liquidity.toString(),
      totalShares: pool.totalShares.toString(),
    });
  }

  const amountA = checkedDiv(checkedMul(liquidity, pool.reserveA), pool.totalShares);
  const amountB = checkedDiv(checkedMul(liquidity, pool.reserveB), pool.totalShares);

  if (amountA < minA || amountB < minB) {
    throw new EconomicError(ErrorCode.INSUFFICIENT_AMOUNT, {
      amountA: amountA.toString(),
      amountB: amountB.toString(),
    });
  }
  if (amountA === 0n && amountB === 0n) {
    throw new EconomicError(ErrorCode.INSUFFICIENT_LIQUIDITY_BURNED, { liquidity: liquidity.toString() });
  }

  return {
    amountA: toU64(amountA, 'amountA'),
    amountB: toU64(amountB, 'amountB'),
    liquidity,
    pool: {
      reserveA: checkedSub(pool.reserveA, amountA),
      reserveB: checkedSub(pool.reserveB, amountB),
      totalShares: checkedSub(pool.totalShares, liquidity),
    },
  };
}

/**
 * Liquidity module -- deposits, withdrawals and share positions.
 */
export class LiquidityModule {
  private exchange: Exchange;

  constructor(exchange: Exchange) {
    this.exchange = exchange;
  }

  /**
   * Expected deposit and minted shares, without executing.
   */
  async quote(pairAddress: string, params: AddLiquidityParams): Promise<AddLiquidityQuote> {
    const pair = await this.exchange.loadPair(pairAddress);
    const amounts = computeAddLiquidity(pair.pool(), params);
    return {
      amountA: amounts.amountA,
      amountB: amounts.amountB,
      liquidity: amounts.liquidity,
      lockedLiquidity: amounts.lockedLiquidity,
      shareOfPoolBps: toBps(amounts.liquidity, amounts.pool.totalShares),
    };
  }

  /**
   * Deposit both assets and mint shares.
   *
   * Moves the deposit into the pair's reserve custody, mints the locked
   * minimum on the first deposit, mints the depositor's shares, then
   * writes the new reserves and supply.
   */
  async add(request: AddLiquidityRequest): Promise<LiquidityResult> {
    return this.exchange.execute(
      'addLiquidity',
      () => [request.pair],
      async () => {
        const pair = await this.exchange.loadPair(request.pair);
        const record = pair.requireConfigured();
        const amounts = computeAddLiquidity(pair.pool(), request);

        await this.exchange.requireTraderCustody(record, request.sourceA, request.sender, record.tokenA);
        await this.exchange.requireTraderCustody(record, request.sourceB, request.sender, record.tokenB);
        const recipient = requireAddress(request.to ?? request.sender, 'to');

        const { custody, shares, store } = this.exchange.environment;
        await custody.transfer({
          from: request.sourceA,
          to: record.reserveAccountA,
          amount: amounts.amountA,
          authorizer: request.sender,
        });
        await custody.transfer({
          from: request.sourceB,
          to: record.reserveAccountB,
          amount: amounts.amountB,
          authorizer: request.sender,
        });

        const authority = pair.authority();
        if (amounts.lockedLiquidity > 0n) {
          await shares.mint({
            mint: record.shareMint,
            to: this.exchange.burnAddress,
            amount: amounts.lockedLiquidity,
            authority,
          });
        }
        await shares.mint({
          mint: record.shareMint,
          to: recipient,
          amount: amounts.liquidity,
          authority,
        });

        await store.putPair(pair.withPool(amounts.pool).record);

        return {
          result: {
            pair: request.pair,
            amountA: amounts.amountA,
            amountB: amounts.amountB,
            liquidity: amounts.liquidity,
            totalShares: amounts.pool.totalShares,
          },
          events: [
            {
              type: 'liquidity_added',
              pair: request.pair,
              sender: request.sender,
              amountA: amounts.amountA,
              amountB: amounts.amountB,
              liquidity: amounts.liquidity,
              timestamp: Date.now(),
            },
          ],
        };
      },
    );
  }

  /**
   * Redeem shares for a proportional part of both reserves.
   *
   * Shares are burned before anything leaves custody.
   */
  async remove(request: RemoveLiquidityRequest): Promise<LiquidityResult> {
    return this.exchange.execute(
      'removeLiquidity',
      () => [request.pair],
      async () => {
        const pair = await this.exchange.loadPair(request.pair);
        const record = pair.requireConfigured();
        const amounts = computeRemoveLiquidity(pair.pool(), request);

        await this.exchange.requireTraderCustody(record, request.destinationA, request.sender, record.tokenA);
        await this.exchange.requireTraderCustody(record, request.destinationB, request.sender, record.tokenB);

        const { custody, shares, store } = this.exchange.environment;
        await shares.burn({
          mint: record.shareMint,
          from: request.sender,
          amount: amounts.liquidity,
          authorizer: request.sender,
        });

        const authority = pair.authority();
        await custody.transfer({
          from: record.reserveAccountA,
          to: request.destinationA,
          amount: amounts.amountA,
          authorizer: authority,
        });
        await custody.transfer({
          from: record.reserveAccountB,
          to: request.destinationB,
          amount: amounts.amountB,
          authorizer: authority,
        });

        await store.putPair(pair.withPool(amounts.pool).record);

        return {
          result: {
            pair: request.pair,
            amountA: amounts.amountA,
            amountB: amounts.amountB,
            liquidity: amounts.liquidity,
            totalShares: amounts.pool.totalShares,
          },
          events: [
            {
              type: 'liquidity_removed',
              pair: request.pair,
              sender: request.sender,
              amountA: amounts.amountA,
              amountB: amounts.amountB,
              liquidity: amounts.liquidity,
              timestamp: Date.now(),
            },
          ],
        };
      },
    );
  }

  /**
   * Share balance of `holder` and the reserves it currently redeems for.
   */
  async getPosition(pairAddress: string, holder: string): Promise<SharePosition> {
    const pair = await this.exchange.loadPair(pairAddress);
    const record = pair.requireConfigured();
    const balance = await this.exchange.environment.shares.balanceOf(record.shareMint, holder);

    const { reserveA, reserveB, totalShares } = record;

    return {
      pair: pairAddress,
      holder,
      balance,
      totalShares,
      shareBps: toBps(balance, totalShares),
      amountA: totalShares === 0n ? 0n : checkedDiv(checkedMul(balance, reserveA), totalShares),
      amountB: totalShares === 0n ? 0n : checkedDiv(checkedMul(balance, reserveB), totalShares),
    };
  }
}
