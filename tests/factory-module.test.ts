import { AuthorizationError, ErrorCode } from '../src/errors';
import { PairState } from '../src/types/common';
import { deriveAuthorityAddress } from '../src/utils/addresses';
import { EventLog } from '../src/test/mocks/MemoryLedger';
import {
  Harness,
  OTHER,
  OWNER,
  REGISTRY,
  TOKEN_X,
  TOKEN_Y,
  TOKEN_Z,
  contractId,
  createHarness,
  deployPair,
} from './helpers';

const RESERVE_X = contractId(30);
const RESERVE_Y = contractId(31);
const SHARE_MINT = contractId(32);

describe('FactoryModule', () => {
  let harness: Harness;
  let events: EventLog;

  beforeEach(async () => {
    events = new EventLog();
    harness = await createHarness(events);
  });

  describe('initialize', () => {
    it('stores an empty registry', async () => {
      expect(await harness.exchange.factory.getRegistry(REGISTRY)).toEqual({
        address: REGISTRY,
        owner: OWNER,
        pairCount: 0n,
        feeCollector: null,
        feeEnabled: false,
        lastPair: null,
      });
    });

    it('cannot run twice', async () => {
      await expect(
        harness.exchange.factory.initialize({ registry: REGISTRY, owner: OTHER }),
      ).rejects.toMatchObject({ code: ErrorCode.REGISTRY_EXISTS });
      expect((await harness.exchange.factory.getRegistry(REGISTRY)).owner).toBe(OWNER);
    });

    it('validates addresses', async () => {
      await expect(
        harness.exchange.factory.initialize({ registry: contractId(11), owner: 'nobody' }),
      ).rejects.toMatchObject({ code: ErrorCode.INVALID_ADDRESS });
    });

    it('logs start and commit', async () => {
      expect(harness.logger.debug).toHaveBeenCalledWith('initialize: start');
      expect(harness.logger.info).toHaveBeenCalledWith('initialize: committed', { events: [] });
    });
  });

  describe('authorizeOwner', () => {
    it('accepts only the owner', async () => {
      await expect(harness.exchange.factory.authorizeOwner(REGISTRY, OWNER)).resolves.toBeUndefined();
      await expect(harness.exchange.factory.authorizeOwner(REGISTRY, OTHER)).rejects.toBeInstanceOf(
        AuthorizationError,
      );
    });

    it('reports an unknown registry', async () => {
      await expect(harness.exchange.factory.authorizeOwner(contractId(11), OWNER)).rejects.toMatchObject({
        code: ErrorCode.REGISTRY_NOT_FOUND,
      });
    });
  });

  describe('createPair', () => {
    it('allocates an uninitialized record at the derived address', async () => {
      const { exchange } = harness;
      const pair = await exchange.factory.createPair({
        registry: REGISTRY,
        tokenX: TOKEN_Y,
        tokenY: TOKEN_X,
        caller: OWNER,
      });

      expect(pair).toBe(exchange.factory.getPairAddress(REGISTRY, TOKEN_X, TOKEN_Y));
      expect(await exchange.factory.getPair(pair)).toEqual({
        state: PairState.UNINITIALIZED,
        address: pair,
        registry: REGISTRY,
        authority: deriveAuthorityAddress(pair),
      });
      expect((await exchange.factory.getRegistry(REGISTRY)).pairCount).toBe(0n);
    });

    it('allows one record per unordered asset pair', async () => {
      const { exchange } = harness;
      await exchange.factory.createPair({ registry: REGISTRY, tokenX: TOKEN_X, tokenY: TOKEN_Y, caller: OWNER });

      await expect(
        exchange.factory.createPair({ registry: REGISTRY, tokenX: TOKEN_Y, tokenY: TOKEN_X, caller: OWNER }),
      ).rejects.toMatchObject({ code: ErrorCode.PAIR_EXISTS });
    });

    it('rejects identical assets', async () => {
      await expect(
        harness.exchange.factory.createPair({ registry: REGISTRY, tokenX: TOKEN_X, tokenY: TOKEN_X, caller: OWNER }),
      ).rejects.toMatchObject({ code: ErrorCode.IDENTICAL_ASSETS });
    });

    it('is restricted to the owner', async () => {
      const { exchange, logger } = harness;
      await expect(
        exchange.factory.createPair({ registry: REGISTRY, tokenX: TOKEN_X, tokenY: TOKEN_Y, caller: OTHER }),
      ).rejects.toMatchObject({ code: ErrorCode.UNAUTHORIZED, details: { caller: OTHER, owner: OWNER } });

      expect(await exchange.factory.findPair(REGISTRY, TOKEN_X, TOKEN_Y)).toBeNull();
      expect(logger.error).toHaveBeenCalledWith('createPair: UNAUTHORIZED', expect.any(AuthorizationError));
    });
  });

  describe('configurePair', () => {
    let pair: string;

    beforeEach(async () => {
      const { exchange, ledger } = harness;
      pair = await exchange.factory.createPair({ registry: REGISTRY, tokenX: TOKEN_X, tokenY: TOKEN_Y, caller: OWNER });
      const authority = deriveAuthorityAddress(pair);
      ledger.createAccount({ address: RESERVE_X, asset: TOKEN_X, owner: authority });
      ledger.createAccount({ address: RESERVE_Y, asset: TOKEN_Y, owner: authority });
      ledger.createMint({ address: SHARE_MINT, authority });
    });

    function request(overrides: Record<string, string> = {}) {
      return {
        registry: REGISTRY,
        pair,
        tokenX: TOKEN_X,
        tokenY: TOKEN_Y,
        custodyX: RESERVE_X,
        custodyY: RESERVE_Y,
        shareMint: SHARE_MINT,
        caller: OWNER,
        ...overrides,
      };
    }

    it('orders the assets and updates the registry', async () => {
      const { exchange } = harness;
      const [tokenA, tokenB] = [TOKEN_X, TOKEN_Y].sort();
      const record = await exchange.factory.configurePair(request());

      expect(record).toMatchObject({
        state: PairState.CONFIGURED,
        tokenA,
        tokenB,
        reserveAccountA: tokenA === TOKEN_X ? RESERVE_X : RESERVE_Y,
        reserveAccountB: tokenB === TOKEN_X ? RESERVE_X : RESERVE_Y,
        shareMint: SHARE_MINT,
        reserveA: 0n,
        reserveB: 0n,
        totalShares: 0n,
      });

      const registry = await exchange.factory.getRegistry(REGISTRY);
      expect(registry.pairCount).toBe(1n);
      expect(registry.lastPair).toBe(pair);

      expect(events.ofType('pair_created')).toEqual([
        { type: 'pair_created', pair, registry: REGISTRY, tokenA, tokenB, pairCount: 1n, timestamp: expect.any(Number) },
      ]);
    });

    it('stores the same record whichever order the assets come in', async () => {
      const { exchange } = harness;
      const record = await exchange.factory.configurePair(
        request({ tokenX: TOKEN_Y, tokenY: TOKEN_X, custodyX: RESERVE_Y, custodyY: RESERVE_X }),
      );
      const [tokenA] = [TOKEN_X, TOKEN_Y].sort();

      expect(record).toMatchObject({
        tokenA,
        reserveAccountA: tokenA === TOKEN_X ? RESERVE_X : RESERVE_Y,
      });
    });

    it('is irreversible', async () => {
      const { exchange } = harness;
      await exchange.factory.configurePair(request());

      await expect(exchange.factory.configurePair(request())).rejects.toMatchObject({
        code: ErrorCode.ALREADY_CONFIGURED,
      });
      expect((await exchange.factory.getRegistry(REGISTRY)).pairCount).toBe(1n);
      expect(events.ofType('pair_created')).toHaveLength(1);
    });

    it('reports an unknown pair', async () => {
      await expect(harness.exchange.factory.configurePair(request({ pair: contractId(99) }))).rejects.toMatchObject({
        code: ErrorCode.PAIR_NOT_FOUND,
      });
    });

    it('is restricted to the owner', async () => {
      const { exchange } = harness;
      await expect(exchange.factory.configurePair(request({ caller: OTHER }))).rejects.toMatchObject({
        code: ErrorCode.UNAUTHORIZED,
      });
      expect((await exchange.factory.getPair(pair))?.state).toBe(PairState.UNINITIALIZED);
    });

    it('rejects assets that do not match the pair address', async () => {
      await expect(harness.exchange.factory.configurePair(request({ tokenY: TOKEN_Z }))).rejects.toMatchObject({
        code: ErrorCode.INVALID_ASSET,
      });
    });

    it('rejects a pair created under another registry', async () => {
      const { exchange } = harness;
      const otherRegistry = contractId(11);
      await exchange.factory.initialize({ registry: otherRegistry, owner: OWNER });
      const foreign = await exchange.factory.createPair({
        registry: otherRegistry,
        tokenX: TOKEN_X,
        tokenY: TOKEN_Y,
        caller: OWNER,
      });

      await expect(exchange.factory.configurePair(request({ pair: foreign }))).rejects.toMatchObject({
        code: ErrorCode.INVALID_PAIR_REGISTRY,
      });
    });

    it('rejects custody holding the wrong asset', async () => {
      await expect(
        harness.exchange.factory.configurePair(request({ custodyX: RESERVE_Y, custodyY: RESERVE_X })),
      ).rejects.toMatchObject({ code: ErrorCode.INVALID_CUSTODY_REFERENCE });
    });

    it('rejects custody not owned by the pair authority', async () => {
      const { exchange, ledger } = harness;
      const stray = contractId(33);
      ledger.createAccount({ address: stray, asset: TOKEN_X, owner: OTHER });

      await expect(exchange.factory.configurePair(request({ custodyX: stray }))).rejects.toMatchObject({
        code: ErrorCode.INVALID_CUSTODY_REFERENCE,
      });
      await expect(exchange.factory.configurePair(request({ custodyX: contractId(98) }))).rejects.toMatchObject({
        code: ErrorCode.INVALID_CUSTODY_REFERENCE,
      });
    });

    it('rejects a share mint the pair does not control', async () => {
      const { exchange, ledger } = harness;
      const foreignMint = contractId(34);
      ledger.createMint({ address: foreignMint, authority: OTHER });
      const usedMint = contractId(35);
      ledger.createMint({ address: usedMint, authority: deriveAuthorityAddress(pair), supply: 10n });

      await expect(exchange.factory.configurePair(request({ shareMint: foreignMint }))).rejects.toMatchObject({
        code: ErrorCode.INVALID_SHARE_MINT,
      });
      await expect(exchange.factory.configurePair(request({ shareMint: usedMint }))).rejects.toMatchObject({
        code: ErrorCode.INVALID_SHARE_MINT,
      });
      expect((await exchange.factory.getRegistry(REGISTRY)).pairCount).toBe(0n);
    });
  });

  describe('pair count', () => {
    it('counts each configured pair once', async () => {
      const first = await deployPair(harness, TOKEN_X, TOKEN_Y, 30);
      const second = await deployPair(harness, TOKEN_X, TOKEN_Z, 40);

      const registry = await harness.exchange.factory.getRegistry(REGISTRY);
      expect(registry.pairCount).toBe(2n);
      expect(registry.lastPair).toBe(second.pair);
      expect(first.pair).not.toBe(second.pair);
      expect(events.ofType('pair_created').map((e) => e.pairCount)).toEqual([1n, 2n]);
    });
  });

  describe('setProtocolFee', () => {
    it('stores the fee settings', async () => {
      const record = await harness.exchange.factory.setProtocolFee({
        registry: REGISTRY,
        caller: OWNER,
        feeCollector: OTHER,
        feeEnabled: true,
      });

      expect(record.feeCollector).toBe(OTHER);
      expect(record.feeEnabled).toBe(true);
      expect((await harness.exchange.factory.getRegistry(REGISTRY)).feeCollector).toBe(OTHER);
    });

    it('is restricted to the owner', async () => {
      await expect(
        harness.exchange.factory.setProtocolFee({ registry: REGISTRY, caller: OTHER, feeCollector: null, feeEnabled: true }),
      ).rejects.toMatchObject({ code: ErrorCode.UNAUTHORIZED });
    });
  });
});
