import { BURN_ADDRESS, DEFAULTS, ExchangeConfig, NETWORK_PASSPHRASES } from './config';
import { ErrorCode, ExchangeError, LifecycleError, ValidationError, mapError } from './errors';
import { PairContract } from './contracts/pair';
import { RegistryContract } from './contracts/registry';
import { FactoryModule } from './modules/factory';
import { LiquidityModule } from './modules/liquidity';
import { SwapModule } from './modules/swap';
import { Logger, Network } from './types/common';
import { ExchangeEvent } from './types/events';
import { CustodyAccount, LedgerEnvironment } from './types/ledger';
import { ConfiguredPair } from './types/pair';
import { requireAddress } from './utils/addresses';
import { SerialExecutor } from './utils/serial';

/**
 * What an operation body hands back: its result and the events to publish
 * once its writes are committed.
 */
export interface OperationOutcome<T> {
  result: T;
  events: ExchangeEvent[];
}

/**
 * Main entry point for the exchange core.
 *
 * Holds the configuration and host environment, and runs every state
 * changing operation serialized per pair and inside one atomic scope.
 */
export class Exchange {
  readonly network: Network;
  readonly config: ExchangeConfig;
  readonly networkPassphrase: string;
  readonly environment: LedgerEnvironment;
  readonly burnAddress: string;

  private serial: SerialExecutor;
  private _factory: FactoryModule | null = null;
  private _liquidity: LiquidityModule | null = null;
  private _swap: SwapModule | null = null;

  constructor(config: ExchangeConfig) {
    this.config = {
      defaultSlippageBps: DEFAULTS.slippageBps,
      ...config,
    };

    this.network = config.network;
    this.networkPassphrase = config.networkPassphrase ?? NETWORK_PASSPHRASES[config.network];
    this.environment = config.environment;
    this.burnAddress = requireAddress(config.burnAddress ?? BURN_ADDRESS, 'burnAddress');
    this.serial = new SerialExecutor(config.logger);
  }

  get logger(): Logger | undefined {
    return this.config.logger;
  }

  /**
   * Registry and pair lifecycle operations (singleton).
   */
  get factory(): FactoryModule {
    if (!this._factory) {
      this._factory = new FactoryModule(this);
    }
    return this._factory;
  }

  /**
   * Add/remove liquidity operations (singleton).
   */
  get liquidity(): LiquidityModule {
    if (!this._liquidity) {
      this._liquidity = new LiquidityModule(this);
    }
    return this._liquidity;
  }

  /**
   * Swap operations (singleton).
   */
  get swap(): SwapModule {
    if (!this._swap) {
      this._swap = new SwapModule(this);
    }
    return this._swap;
  }

  /**
   * Load a registry record.
   *
   * @throws {LifecycleError} REGISTRY_NOT_FOUND
   */
  async loadRegistry(address: string): Promise<RegistryContract> {
    const record = await this.environment.store.getRegistry(address);
    if (!record) throw new LifecycleError(ErrorCode.REGISTRY_NOT_FOUND, address);
    return new RegistryContract(record);
  }

  /**
   * Load a pair record in whatever state it is in.
   *
   * @throws {LifecycleError} PAIR_NOT_FOUND
   */
  async loadPair(address: string): Promise<PairContract> {
    const record = await this.environment.store.getPair(address);
    if (!record) throw new LifecycleError(ErrorCode.PAIR_NOT_FOUND, address);
    return new PairContract(record);
  }

  /**
   * Load a trader-side custody account for an operation on `pair`.
   *
   * The account must exist, belong to `owner`, hold `asset` when one is
   * given, and must not be one of the pair's reserve accounts.
   *
   * @throws {ValidationError} INVALID_CUSTODY_REFERENCE
   */
  async requireTraderCustody(
    pair: ConfiguredPair,
    address: string,
    owner: string,
    asset?: string,
  ): Promise<CustodyAccount> {
    const account = await this.environment.custody.getAccount(address);
    if (!account) {
      throw new ValidationError(ErrorCode.INVALID_CUSTODY_REFERENCE, `Unknown custody account: ${address}`, {
        address,
      });
    }
    if (address === pair.reserveAccountA || address === pair.reserveAccountB) {
      throw new ValidationError(ErrorCode.INVALID_CUSTODY_REFERENCE, `Custody account ${address} is a pair reserve`, {
        address,
        pair: pair.address,
      });
    }
    if (account.owner !== owner) {
      throw new ValidationError(ErrorCode.INVALID_CUSTODY_REFERENCE, `Custody account ${address} is not owned by ${owner}`, {
        address,
        owner: account.owner,
        sender: owner,
      });
    }
    if (asset !== undefined && account.asset !== asset) {
      throw new ValidationError(ErrorCode.INVALID_CUSTODY_REFERENCE, `Custody account ${address} does not hold ${asset}`, {
        address,
        asset,
      });
    }
    return account;
  }

  /**
   * Run a state-changing operation.
   *
   * Holds the given keys for the whole run, executes `body` inside the
   * environment's atomic scope, publishes the returned events after the
   * scope commits, and rethrows any failure as an {@link ExchangeError}.
   */
  async execute<T>(
    label: string,
    keys: () => string[],
    body: () => Promise<OperationOutcome<T>>,
  ): Promise<T> {
    this.logger?.debug(`${label}: start`);
    try {
      const outcome = await this.serial.run(
        keys(),
        () => this.environment.atomic(body),
        label,
      );
      this.logger?.info(`${label}: committed`, { events: outcome.events.map((e) => e.type) });
      await this.publish(outcome.events);
      return outcome.result;
    } catch (err) {
      const mapped: ExchangeError = mapError(err);
      this.logger?.error(`${label}: ${mapped.code}`, mapped);
      throw mapped;
    }
  }

  private async publish(events: ExchangeEvent[]): Promise<void> {
    const sink = this.environment.events;
    if (!sink) return;

    for (const event of events) {
      try {
        await sink.emit(event);
      } catch (err) {
        this.logger?.error(`event delivery failed: ${event.type}`, err);
      }
    }
  }
}
