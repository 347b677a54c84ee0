/**
 * Create the registry for an exchange instance.
 */
export interface InitializeRegistryRequest {
  /** Address the registry record is stored under */
  registry: string;
  /** Identity allowed to create pairs */
  owner: string;
}

/**
 * Allocate a pair record for an unordered asset pair.
 */
export interface CreatePairRequest {
  /** Address of the registry */
  registry: string;
  /** One asset of the pair, in any order */
  tokenX: string;
  /** The other asset */
  tokenY: string;
  /** Verified identity of the caller (must be the registry owner) */
  caller: string;
}

/**
 * Populate an allocated pair and make it tradable.
 */
export interface ConfigurePairRequest {
  /** Address of the registry */
  registry: string;
  /** Address returned by createPair */
  pair: string;
  /** One asset of the pair, in any order */
  tokenX: string;
  /** The other asset */
  tokenY: string;
  /** Custody account that will hold the tokenX reserve */
  custodyX: string;
  /** Custody account that will hold the tokenY reserve */
  custodyY: string;
  /** Share token class of the pair */
  shareMint: string;
  /** Verified identity of the caller (must be the registry owner) */
  caller: string;
}

/**
 * Update the stored protocol fee settings.
 */
export interface SetProtocolFeeRequest {
  /** Address of the registry */
  registry: string;
  /** Verified identity of the caller (must be the registry owner) */
  caller: string;
  /** Fee destination, or null to clear it */
  feeCollector: string | null;
  /** Fee switch */
  feeEnabled: boolean;
}
