import type { Exchange } from '../exchange';
import { PairContract } from '../contracts/pair';
import { RegistryContract } from '../contracts/registry';
import { ErrorCode, LifecycleError, ValidationError } from '../errors';
import {
  ConfigurePairRequest,
  CreatePairRequest,
  InitializeRegistryRequest,
  SetProtocolFeeRequest,
} from '../types/factory';
import { PairRecord, RegistryRecord } from '../types/pair';
import { derivePairAddress, requireAddress, sortTokens } from '../utils/addresses';

/**
 * Registry and pair lifecycle operations.
 *
 * Pairs go through two steps: `createPair` allocates the record at its
 * deterministic address, `configurePair` populates it and makes it
 * tradable. Both are restricted to the registry owner.
 */
export class FactoryModule {
  private exchange: Exchange;

  constructor(exchange: Exchange) {
    this.exchange = exchange;
  }

  /**
   * Create the registry with no pairs and the fee switch off.
   */
  async initialize(request: InitializeRegistryRequest): Promise<RegistryRecord> {
    return this.exchange.execute(
      'initialize',
      () => [requireAddress(request.registry, 'registry')],
      async () => {
        const owner = requireAddress(request.owner, 'owner');
        const { store } = this.exchange.environment;

        if (await store.getRegistry(request.registry)) {
          throw new LifecycleError(ErrorCode.REGISTRY_EXISTS, request.registry);
        }

        const registry = RegistryContract.initialize(request.registry, owner);
        await store.putRegistry(registry.record);
        return { result: registry.record, events: [] };
      },
    );
  }

  /**
   * Fail with UNAUTHORIZED unless `caller` owns the registry.
   */
  async authorizeOwner(registry: string, caller: string): Promise<void> {
    const record = await this.exchange.loadRegistry(registry);
    record.authorize(caller);
  }

  /**
   * Allocate the pair record for `{tokenX, tokenY}`.
   *
   * @returns The pair address.
   */
  async createPair(request: CreatePairRequest): Promise<string> {
    let pairAddress = '';
    return this.exchange.execute(
      'createPair',
      () => {
        sortTokens(request.tokenX, request.tokenY);
        requireAddress(request.tokenX, 'tokenX');
        requireAddress(request.tokenY, 'tokenY');
        requireAddress(request.registry, 'registry');
        pairAddress = this.getPairAddress(request.registry, request.tokenX, request.tokenY);
        return [pairAddress];
      },
      async () => {
        const registry = await this.exchange.loadRegistry(request.registry);
        registry.authorize(request.caller);

        const { store } = this.exchange.environment;
        if (await store.getPair(pairAddress)) {
          throw new LifecycleError(ErrorCode.PAIR_EXISTS, pairAddress);
        }

        const pair = PairContract.create(pairAddress, request.registry);
        await store.putPair(pair.record);
        return { result: pairAddress, events: [] };
      },
    );
  }

  /**
   * Populate an allocated pair and move it to `Configured`.
   *
   * Assets are put in canonical order and each custody account follows its
   * asset. The registry's pair count and last pair are updated in the same
   * atomic scope.
   */
  async configurePair(request: ConfigurePairRequest): Promise<PairRecord> {
    return this.exchange.execute(
      'configurePair',
      () => [request.pair, request.registry],
      async () => {
        const pair = await this.exchange.loadPair(request.pair);
        pair.assertUninitialized();

        const [tokenA, tokenB] = sortTokens(request.tokenX, request.tokenY);

        const registry = await this.exchange.loadRegistry(request.registry);
        registry.authorize(request.caller);

        if (pair.record.registry !== request.registry) {
          throw new ValidationError(ErrorCode.INVALID_PAIR_REGISTRY, undefined, {
            pair: request.pair,
            registry: request.registry,
          });
        }

        const expected = this.getPairAddress(request.registry, tokenA, tokenB);
        if (expected !== request.pair) {
          throw new ValidationError(ErrorCode.INVALID_ASSET, 'Assets do not match the pair address', {
            pair: request.pair,
            expected,
          });
        }

        const tokenXIsA = request.tokenX === tokenA;
        const reserveAccountA = tokenXIsA ? request.custodyX : request.custodyY;
        const reserveAccountB = tokenXIsA ? request.custodyY : request.custodyX;
        const authority = pair.record.authority;

        await this.requireReserveCustody(reserveAccountA, tokenA, authority);
        await this.requireReserveCustody(reserveAccountB, tokenB, authority);
        await this.requireShareMint(request.shareMint, authority);

        const configured = pair.configure({
          tokenA,
          tokenB,
          reserveAccountA,
          reserveAccountB,
          shareMint: request.shareMint,
        });
        const updatedRegistry = registry.recordPair(request.pair);

        const { store } = this.exchange.environment;
        await store.putPair(configured.record);
        await store.putRegistry(updatedRegistry.record);

        return {
          result: configured.record,
          events: [
            {
              type: 'pair_created',
              pair: request.pair,
              registry: request.registry,
              tokenA,
              tokenB,
              pairCount: updatedRegistry.record.pairCount,
              timestamp: Date.now(),
            },
          ],
        };
      },
    );
  }

  /**
   * Owner-only update of the stored protocol fee settings.
   */
  async setProtocolFee(request: SetProtocolFeeRequest): Promise<RegistryRecord> {
    return this.exchange.execute(
      'setProtocolFee',
      () => [request.registry],
      async () => {
        const registry = await this.exchange.loadRegistry(request.registry);
        registry.authorize(request.caller);

        const collector =
          request.feeCollector === null ? null : requireAddress(request.feeCollector, 'feeCollector');
        const updated = registry.withProtocolFee(collector, request.feeEnabled);
        await this.exchange.environment.store.putRegistry(updated.record);
        return { result: updated.record, events: [] };
      },
    );
  }

  /**
   * Read a registry record.
   *
   * @throws {LifecycleError} REGISTRY_NOT_FOUND
   */
  async getRegistry(address: string): Promise<RegistryRecord> {
    const registry = await this.exchange.loadRegistry(address);
    return registry.record;
  }

  /**
   * Deterministic pair address for an unordered asset pair.
   */
  getPairAddress(registry: string, tokenX: string, tokenY: string): string {
    return derivePairAddress(registry, tokenX, tokenY, this.exchange.networkPassphrase);
  }

  /**
   * Read a pair record, or null if none exists at that address.
   */
  async getPair(address: string): Promise<PairRecord | null> {
    return this.exchange.environment.store.getPair(address);
  }

  /**
   * Read the pair record for `{tokenX, tokenY}`, or null if not created.
   */
  async findPair(registry: string, tokenX: string, tokenY: string): Promise<PairRecord | null> {
    return this.getPair(this.getPairAddress(registry, tokenX, tokenY));
  }

  private async requireReserveCustody(address: string, asset: string, authority: string): Promise<void> {
    const account = await this.exchange.environment.custody.getAccount(address);
    if (!account || account.asset !== asset || account.owner !== authority) {
      throw new ValidationError(ErrorCode.INVALID_CUSTODY_REFERENCE, `Invalid reserve custody account: ${address}`, {
        address,
        asset,
      });
    }
  }

  private async requireShareMint(address: string, authority: string): Promise<void> {
    const mint = await this.exchange.environment.shares.getMint(address);
    if (!mint || mint.authority !== authority || mint.supply !== 0n) {
      throw new ValidationError(ErrorCode.INVALID_SHARE_MINT, `Invalid share mint: ${address}`, { address });
    }
  }
}
