import { PairState } from './common';

/**
 * Registry (factory) record. One per exchange instance.
 */
export interface RegistryRecord {
  /** Address of the registry */
  address: string;
  /** Identity allowed to create pairs and change fee settings */
  owner: string;
  /** Number of pairs that completed configuration */
  pairCount: bigint;
  /** Protocol fee destination (stored, not consulted) */
  feeCollector: string | null;
  /** Protocol fee switch (stored, not consulted) */
  feeEnabled: boolean;
  /** Most recently configured pair */
  lastPair: string | null;
}

interface PairBase {
  /** Deterministic pair address */
  address: string;
  /** Registry the pair was created under */
  registry: string;
  /** Address of the pair's derived authority */
  authority: string;
}

/**
 * Pair allocated but not yet populated. Asset ordering is not decided yet.
 */
export interface UninitializedPair extends PairBase {
  state: PairState.UNINITIALIZED;
}

/**
 * Pair ready for liquidity and swaps.
 */
export interface ConfiguredPair extends PairBase {
  state: PairState.CONFIGURED;
  /** Lexicographically smaller asset */
  tokenA: string;
  /** Lexicographically larger asset */
  tokenB: string;
  /** Reserve of tokenA (u64) */
  reserveA: bigint;
  /** Reserve of tokenB (u64) */
  reserveB: bigint;
  /** Custody account holding reserveA */
  reserveAccountA: string;
  /** Custody account holding reserveB */
  reserveAccountB: string;
  /** Share token class of this pair */
  shareMint: string;
  /** Outstanding shares, including the locked minimum (u64) */
  totalShares: bigint;
}

export type PairRecord = UninitializedPair | ConfiguredPair;

/**
 * The fields liquidity and swap math read and produce.
 */
export interface PoolReserves {
  reserveA: bigint;
  reserveB: bigint;
  totalShares: bigint;
}

/**
 * Share-token position of one holder.
 */
export interface SharePosition {
  /** Address of the pair */
  pair: string;
  /** Address of the holder */
  holder: string;
  /** Share balance of the holder */
  balance: bigint;
  /** Total supply of shares */
  totalShares: bigint;
  /** Holder's share of the pool in basis points */
  shareBps: number;
  /** Implied amount of tokenA belonging to the holder */
  amountA: bigint;
  /** Implied amount of tokenB belonging to the holder */
  amountB: bigint;
}
