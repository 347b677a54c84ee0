import type { PairAuthority } from '../contracts/authority';
import { ExchangeEvent } from './events';
import { PairRecord, RegistryRecord } from './pair';

/**
 * Who signs for a transfer or burn: an account address, or a pair's
 * authority capability.
 */
export type Authorizer = string | PairAuthority;

/**
 * A custody location holding one asset.
 */
export interface CustodyAccount {
  address: string;
  /** Asset held by this account */
  asset: string;
  /** Address that may move funds out */
  owner: string;
  balance: bigint;
}

/**
 * A share-token class.
 */
export interface ShareMint {
  address: string;
  /** Address that may mint */
  authority: string;
  supply: bigint;
}

/**
 * Moves exact amounts of an asset between custody accounts.
 */
export interface CustodyProvider {
  getAccount(address: string): Promise<CustodyAccount | null>;
  /** Fails without moving anything if the source balance is insufficient. */
  transfer(params: { from: string; to: string; amount: bigint; authorizer: Authorizer }): Promise<void>;
}

/**
 * Mints and burns share tokens held by address.
 */
export interface ShareTokenProvider {
  getMint(address: string): Promise<ShareMint | null>;
  balanceOf(mint: string, holder: string): Promise<bigint>;
  mint(params: { mint: string; to: string; amount: bigint; authority: PairAuthority }): Promise<void>;
  burn(params: { mint: string; from: string; amount: bigint; authorizer: Authorizer }): Promise<void>;
}

/**
 * Durable storage for registry and pair records.
 */
export interface RecordStore {
  getRegistry(address: string): Promise<RegistryRecord | null>;
  putRegistry(record: RegistryRecord): Promise<void>;
  getPair(address: string): Promise<PairRecord | null>;
  putPair(record: PairRecord): Promise<void>;
}

/**
 * Receives structured notifications. Delivery is fire-and-forget.
 */
export interface EventSink {
  emit(event: ExchangeEvent): void | Promise<void>;
}

/**
 * Everything the core needs from its host.
 */
export interface LedgerEnvironment {
  store: RecordStore;
  custody: CustodyProvider;
  shares: ShareTokenProvider;
  events?: EventSink;
  /**
   * Run `fn` so that either all of its writes apply or none do.
   */
  atomic<T>(fn: () => Promise<T>): Promise<T>;
}
