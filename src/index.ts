export { Exchange, OperationOutcome } from './exchange';
export { ExchangeConfig, NETWORK_PASSPHRASES, BURN_ADDRESS, DEFAULTS, PRECISION } from './config';

export { FactoryModule } from './modules/factory';
export {
  LiquidityModule,
  AddLiquidityAmounts,
  RemoveLiquidityAmounts,
  computeAddLiquidity,
  computeRemoveLiquidity,
} from './modules/liquidity';
export { SwapModule, SwapAmounts, getAmountOut, getAmountIn, assertInvariant, computeSwap } from './modules/swap';

export { PairContract, PairConfiguration } from './contracts/pair';
export { RegistryContract } from './contracts/registry';
export { PairAuthority } from './contracts/authority';

export * from './types/common';
export * from './types/pair';
export * from './types/events';
export * from './types/ledger';
export * from './types/factory';
export * from './types/liquidity';
export * from './types/swap';

export {
  ExchangeError,
  AuthorizationError,
  LifecycleError,
  ValidationError,
  EconomicError,
  NumericError,
  LedgerError,
  ErrorCode,
  ErrorParser,
  ErrorCategory,
  mapError,
  isExchangeError,
} from './errors';

export {
  U64_MAX,
  U128_MAX,
  checkedAdd,
  checkedSub,
  checkedMul,
  checkedDiv,
  toU64,
  requireU128,
  sqrt,
  toBps,
} from './utils/math';
export {
  isValidPublicKey,
  isValidContractId,
  isValidAddress,
  requireAddress,
  sortTokens,
  truncateAddress,
  derivePairAddress,
  deriveAuthorityAddress,
} from './utils/addresses';
export { SerialExecutor } from './utils/serial';
