import { ErrorCode, LifecycleError, ValidationError } from '../errors';
import { PairState, SwapDirection } from '../types/common';
import { ConfiguredPair, PairRecord, PoolReserves, UninitializedPair } from '../types/pair';
import { deriveAuthorityAddress } from '../utils/addresses';
import { PairAuthority } from './authority';

/**
 * Fields written by the Uninitialized -> Configured transition.
 */
export interface PairConfiguration {
  tokenA: string;
  tokenB: string;
  reserveAccountA: string;
  reserveAccountB: string;
  shareMint: string;
}

/**
 * Pair lifecycle state machine.
 *
 * `Uninitialized -> Configured` happens once and cannot be undone; every
 * reserve or share mutation requires `Configured`.
 */
export class PairContract {
  readonly record: PairRecord;

  constructor(record: PairRecord) {
    this.record = record;
  }

  /**
   * Allocate a pair under `registry`. No asset ordering is stored yet.
   */
  static create(address: string, registry: string): PairContract {
    const record: UninitializedPair = {
      state: PairState.UNINITIALIZED,
      address,
      registry,
      authority: deriveAuthorityAddress(address),
    };
    return new PairContract(record);
  }

  get address(): string {
    return this.record.address;
  }

  get isConfigured(): boolean {
    return this.record.state === PairState.CONFIGURED;
  }

  /**
   * Fail with ALREADY_CONFIGURED once the transition has happened.
   */
  assertUninitialized(): UninitializedPair {
    if (this.record.state !== PairState.UNINITIALIZED) {
      throw new LifecycleError(ErrorCode.ALREADY_CONFIGURED, this.record.address);
    }
    return this.record;
  }

  /**
   * Fail with NOT_CONFIGURED until the transition has happened.
   */
  requireConfigured(): ConfiguredPair {
    if (this.record.state !== PairState.CONFIGURED) {
      throw new LifecycleError(ErrorCode.NOT_CONFIGURED, this.record.address);
    }
    return this.record;
  }

  /**
   * Perform the one-way transition. Reserves and supply start at zero.
   */
  configure(config: PairConfiguration): PairContract {
    const current = this.assertUninitialized();
    if (config.tokenA >= config.tokenB) {
      throw new ValidationError(ErrorCode.INVALID_ASSET, 'Assets are not in canonical order', {
        tokenA: config.tokenA,
        tokenB: config.tokenB,
      });
    }

    const configured: ConfiguredPair = {
      ...current,
      state: PairState.CONFIGURED,
      ...config,
      reserveA: 0n,
      reserveB: 0n,
      totalShares: 0n,
    };
    return new PairContract(configured);
  }

  /**
   * Current reserves and supply.
   */
  pool(): PoolReserves {
    const { reserveA, reserveB, totalShares } = this.requireConfigured();
    return { reserveA, reserveB, totalShares };
  }

  /**
   * Replace reserves and supply with values the math already validated.
   */
  withPool(pool: PoolReserves): PairContract {
    const current = this.requireConfigured();
    return new PairContract({
      ...current,
      reserveA: pool.reserveA,
      reserveB: pool.reserveB,
      totalShares: pool.totalShares,
    });
  }

  /**
   * Which side a payment in `asset` lands on.
   *
   * @throws {ValidationError} INVALID_ASSET when the asset is neither token
   */
  directionFor(asset: string): SwapDirection {
    const pair = this.requireConfigured();
    if (asset === pair.tokenA) return SwapDirection.A_TO_B;
    if (asset === pair.tokenB) return SwapDirection.B_TO_A;
    throw new ValidationError(ErrorCode.INVALID_ASSET, `Asset ${asset} does not belong to pair ${pair.address}`, {
      asset,
      pair: pair.address,
    });
  }

  /**
   * Capability controlling this pair's reserve custody and share mint.
   */
  authority(): PairAuthority {
    return PairAuthority.issue(this.record.address);
  }
}
