import { Networks, StrKey } from '@stellar/stellar-sdk';
import { Network, Logger } from './types/common';
import { LedgerEnvironment } from './types/ledger';

/**
 * Exchange configuration.
 */
export interface ExchangeConfig {
  /** Network whose passphrase seeds pair address derivation */
  network: Network;
  /** Optional passphrase override (custom or private networks) */
  networkPassphrase?: string;
  /** Records, custody, share tokens and atomic scopes */
  environment: LedgerEnvironment;
  /** Optional logger for operation instrumentation. */
  logger?: Logger;
  /** Holder that receives the permanently locked minimum liquidity */
  burnAddress?: string;
  /** Default slippage tolerance in basis points (0-10000) used by quotes */
  defaultSlippageBps?: number;
}

/**
 * Network passphrases, as published by the Stellar network.
 */
export const NETWORK_PASSPHRASES: Record<Network, string> = {
  [Network.TESTNET]: Networks.TESTNET,
  [Network.MAINNET]: Networks.PUBLIC,
  [Network.STANDALONE]: Networks.STANDALONE,
};

/**
 * Account with an all-zero key; nobody holds its secret, so shares
 * minted to it can never be redeemed.
 */
export const BURN_ADDRESS = StrKey.encodeEd25519PublicKey(Buffer.alloc(32));

/**
 * Default configuration values.
 */
export const DEFAULTS = {
  slippageBps: 50,
} as const;

/**
 * Protocol constants for u64/u128 pool math.
 */
export const PRECISION = {
  BPS_DENOMINATOR: 10000n,
  MINIMUM_LIQUIDITY: 1000n,
  FEE_NUMERATOR: 997n,
  FEE_DENOMINATOR: 1000n,
} as const;
