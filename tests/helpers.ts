import { StrKey } from '@stellar/stellar-sdk';
import { Exchange } from '../src/exchange';
import { ErrorCode, isExchangeError } from '../src/errors';
import { Network } from '../src/types/common';
import { EventSink } from '../src/types/ledger';
import { PoolReserves } from '../src/types/pair';
import { deriveAuthorityAddress } from '../src/utils/addresses';
import { MemoryLedger } from '../src/test/mocks/MemoryLedger';

/** Contract id with every key byte set to `n`. */
export function contractId(n: number): string {
  return StrKey.encodeContract(Buffer.alloc(32, n));
}

/** Account (G...) address with every key byte set to `n`. */
export function account(n: number): string {
  return StrKey.encodeEd25519PublicKey(Buffer.alloc(32, n));
}

export const OWNER = account(1);
export const TRADER = account(2);
export const OTHER = account(3);

export const REGISTRY = contractId(10);
export const TOKEN_X = contractId(20);
export const TOKEN_Y = contractId(21);
export const TOKEN_Z = contractId(22);

export function createMockLogger() {
  return {
    debug: jest.fn(),
    info: jest.fn(),
    error: jest.fn(),
  };
}

/**
 * Code of the ExchangeError `fn` throws, or null if it returns.
 */
export function thrownCode(fn: () => unknown): ErrorCode | null {
  try {
    fn();
  } catch (err) {
    if (isExchangeError(err)) return err.code;
    throw err;
  }
  return null;
}

/**
 * Deterministic 64-bit LCG; returns values in [0, max).
 */
export function lcg(seed: number): (max: bigint) => bigint {
  let state = BigInt(seed);
  return (max: bigint) => {
    state = (state * 6364136223846793005n + 1442695040888963407n) & ((1n << 64n) - 1n);
    return (state >> 16n) % max;
  };
}

export interface DeployedPair {
  pair: string;
  tokenA: string;
  tokenB: string;
  reserveAccountA: string;
  reserveAccountB: string;
  shareMint: string;
  /** Trader custody holding tokenA */
  traderA: string;
  /** Trader custody holding tokenB */
  traderB: string;
}

export interface Harness {
  ledger: MemoryLedger;
  exchange: Exchange;
  logger: ReturnType<typeof createMockLogger>;
}

export async function createHarness(events?: EventSink): Promise<Harness> {
  const ledger = new MemoryLedger(events);
  const logger = createMockLogger();
  const exchange = new Exchange({ network: Network.TESTNET, environment: ledger, logger });
  await exchange.factory.initialize({ registry: REGISTRY, owner: OWNER });
  return { ledger, exchange, logger };
}

/**
 * Create and configure a pair for `{tokenX, tokenY}`, with reserve custody
 * and a share mint owned by its authority, and fund the trader's custody.
 *
 * `seed` keeps the custody and mint addresses of several pairs apart.
 */
export async function deployPair(
  { ledger, exchange }: Harness,
  tokenX: string = TOKEN_X,
  tokenY: string = TOKEN_Y,
  seed: number = 30,
  traderBalance: bigint = 1_000_000n,
): Promise<DeployedPair> {
  const pair = await exchange.factory.createPair({ registry: REGISTRY, tokenX, tokenY, caller: OWNER });
  const authority = deriveAuthorityAddress(pair);
  const [tokenA, tokenB] = [tokenX, tokenY].sort();

  const reserveAccountA = contractId(seed);
  const reserveAccountB = contractId(seed + 1);
  const shareMint = contractId(seed + 2);
  const traderA = contractId(seed + 3);
  const traderB = contractId(seed + 4);

  ledger.createAccount({ address: reserveAccountA, asset: tokenA, owner: authority });
  ledger.createAccount({ address: reserveAccountB, asset: tokenB, owner: authority });
  ledger.createMint({ address: shareMint, authority });
  ledger.createAccount({ address: traderA, asset: tokenA, owner: TRADER, balance: traderBalance });
  ledger.createAccount({ address: traderB, asset: tokenB, owner: TRADER, balance: traderBalance });

  const xIsA = tokenX === tokenA;
  await exchange.factory.configurePair({
    registry: REGISTRY,
    pair,
    tokenX,
    tokenY,
    custodyX: xIsA ? reserveAccountA : reserveAccountB,
    custodyY: xIsA ? reserveAccountB : reserveAccountA,
    shareMint,
    caller: OWNER,
  });

  return { pair, tokenA, tokenB, reserveAccountA, reserveAccountB, shareMint, traderA, traderB };
}

export async function poolOf(exchange: Exchange, pair: string): Promise<PoolReserves> {
  return (await exchange.loadPair(pair)).pool();
}
