import { describe, it, expect } from 'vitest';
import { TokenStatusTracker, classify, type TokenStatusTrackerOptions } from '../../src/analysis/token-status-tracker.js';
import { assertBuyable, requireFeature, tierAllows, TIER_POLICIES } from '../../src/strategy/tiers.js';
import { BotError } from '../../src/errors.js';
import type { TokenPriceAlert, TokenRiskAnalysis } from '../../src/types.js';
import { FakeChainAdapter, tokenAddress } from '../helpers/fake-chain-adapter.js';
import { makeRisk, makeStatus } from '../helpers/factories.js';

const E18 = 10n ** 18n;
const TOKEN = tokenAddress(1);
const THRESHOLDS = { minLiquidityUsd: 10_000, cautionLiquidityUsd: 50_000 };

describe('classify', () => {
  it('should refuse unverified code and dangerous functions', () => {
    expect(classify(makeStatus(), makeRisk({ isVerified: false }), THRESHOLDS)).toBe('Red');
    expect(classify(makeStatus(), makeRisk({ dangerousFunctions: ['mint'] }), THRESHOLDS)).toBe('Red');
  });

  it('should split taxes at 10% and 20%', () => {
    const tax = (t: number) => makeRisk({ tax: { buyTax: 0, sellTax: t, transferTax: 0 } });
    expect(classify(makeStatus(), tax(10), THRESHOLDS)).toBe('Green');
    expect(classify(makeStatus(), tax(10.5), THRESHOLDS)).toBe('Yellow');
    expect(classify(makeStatus(), tax(20), THRESHOLDS)).toBe('Yellow');
    expect(classify(makeStatus(), tax(20.5), THRESHOLDS)).toBe('Red');
  });

  it('should split risk scores at 35 and 75', () => {
    expect(classify(makeStatus(), makeRisk({ score: 34 }), THRESHOLDS)).toBe('Green');
    expect(classify(makeStatus(), makeRisk({ score: 35 }), THRESHOLDS)).toBe('Yellow');
    expect(classify(makeStatus(), makeRisk({ score: 75 }), THRESHOLDS)).toBe('Red');
  });

  it('should classify fractional scores by the side of the boundary they fall on', () => {
    expect(classify(makeStatus(), makeRisk({ score: 34.999 }), THRESHOLDS)).toBe('Green');
    expect(classify(makeStatus(), makeRisk({ score: 35.001 }), THRESHOLDS)).toBe('Yellow');
    expect(classify(makeStatus(), makeRisk({ score: 74.999 }), THRESHOLDS)).toBe('Yellow');
    expect(classify(makeStatus(), makeRisk({ score: 75.001 }), THRESHOLDS)).toBe('Red');
  });

  it('should split liquidity at the configured floors', () => {
    expect(classify(makeStatus({ liquidityUsd: 9_999 }), makeRisk(), THRESHOLDS)).toBe('Red');
    expect(classify(makeStatus({ liquidityUsd: 10_000 }), makeRisk(), THRESHOLDS)).toBe('Yellow');
    expect(classify(makeStatus({ liquidityUsd: 50_000 }), makeRisk(), THRESHOLDS)).toBe('Green');
  });

  it('should fall back to the status fields without a risk analysis', () => {
    expect(classify(makeStatus({ isVerified: false }), null, THRESHOLDS)).toBe('Red');
    expect(classify(makeStatus(), null, THRESHOLDS)).toBe('Green');
  });
});

describe('tiers', () => {
  it('should refuse Red on every tier', () => {
    for (const tier of ['free', 'premium', 'vip'] as const) {
      expect(() => assertBuyable('Red', tier)).toThrow('token is classified Red');
      expect(() => assertBuyable('Green', tier)).not.toThrow();
    }
  });

  it('should keep Yellow tokens off the free tier only', () => {
    const err = (() => {
      try {
        assertBuyable('Yellow', 'free');
      } catch (e) {
        return e;
      }
      return null;
    })();

    expect(err instanceof BotError && err.kind).toBe('TierRestricted');
    expect(err instanceof BotError && err.message).toBe('Yellow tokens are not tradable on the free tier');
    expect(() => assertBuyable('Yellow', 'premium')).not.toThrow();
    expect(() => assertBuyable('Yellow', 'vip')).not.toThrow();
  });

  it('should gate features by tier', () => {
    expect(tierAllows('premium', 'autoTrade')).toBe(true);
    expect(tierAllows('premium', 'sandwich')).toBe(false);
    expect(() => requireFeature('free', 'frontrun')).toThrow('frontrun is not available on the free tier');
    expect(TIER_POLICIES.free.maxTrackedTokens).toBe(5);
  });
});

describe('TokenStatusTracker', () => {
  function setup(opts: Partial<TokenStatusTrackerOptions> = {}, analyze?: (token: string) => Promise<TokenRiskAnalysis>) {
    const adapter = new FakeChainAdapter();
    adapter.addPool({ token: TOKEN, tokenReserve: 1_000_000n * E18, nativeReserve: 100n * E18, symbol: 'PEPE' });
    let now = 1_000;
    const tracker = new TokenStatusTracker(
      {
        adapter,
        risk: { analyze: analyze ?? (async (token) => makeRisk({ token })) },
        activityOf: async () => ({ pendingCount: 3, volumeUsd: 12_000 }),
        holderCount: async () => 250,
      },
      {
        ...THRESHOLDS,
        capacity: 10,
        staleAfterMs: 60_000,
        refreshConcurrency: 2,
        refreshTimeoutMs: 1_000,
        priceAlertPercent: 5,
        clock: () => now,
        ...opts,
      },
    );
    return {
      adapter,
      tracker,
      setNow: (ms: number) => {
        now = ms;
      },
    };
  }

  it('should hold a new token at Red until it is refreshed', async () => {
    const { tracker } = setup();

    expect(await tracker.add(TOKEN)).toBe(true);
    expect(await tracker.add(TOKEN)).toBe(false);

    const status = await tracker.get(TOKEN);
    expect(status?.safetyLevel).toBe('Red');
    expect(status?.riskScore).toBeNull();
  });

  it('should fill market data, activity and the safety level on refresh', async () => {
    const { tracker } = setup();
    await tracker.add(TOKEN);

    await tracker.refresh(TOKEN);

    const status = await tracker.get(TOKEN);
    expect(status).toMatchObject({
      symbol: 'PEPE',
      pairAddress: '0x5000000000000000000000000000000000000001',
      liquidityNative: 200,
      liquidityUsd: 400_000,
      priceNative: 0.0001,
      pendingTxCount: 3,
      volume24h: 12_000,
      holderCount: 250,
      safetyLevel: 'Green',
      riskScore: 0,
      consecutiveFailures: 0,
    });
  });

  it('should raise a price alert when the move crosses the threshold', async () => {
    const { adapter, tracker } = setup();
    const alerts: TokenPriceAlert[] = [];
    tracker.onPriceAlert((a) => alerts.push(a));
    await tracker.add(TOKEN);
    await tracker.refresh(TOKEN);

    adapter.addPool({ token: TOKEN, tokenReserve: 500_000n * E18, nativeReserve: 100n * E18 });
    const alert = await tracker.refresh(TOKEN);

    expect(alert?.direction).toBe('up');
    expect(alert?.changePct).toBeCloseTo(100, 9);
    expect(alerts).toHaveLength(1);
  });

  it('should reject something that is not an address', async () => {
    const { tracker } = setup();

    const err = await tracker.add('not-an-address').catch((e: unknown) => e);

    expect(err instanceof BotError && err.kind).toBe('InvalidInput');
  });

  it('should evict the least recently updated token past capacity', async () => {
    const { tracker, setNow } = setup({ capacity: 2 });
    const [a, b, c] = [tokenAddress(11), tokenAddress(12), tokenAddress(13)];
    setNow(1);
    await tracker.add(a);
    setNow(2);
    await tracker.add(b);
    setNow(3);
    await tracker.add(c);

    expect(tracker.tokens()).toEqual([b, c]);
  });

  it('should sweep tokens not updated within the staleness bound', async () => {
    const { tracker, setNow } = setup({ staleAfterMs: 1_000 });
    await tracker.add(TOKEN);

    setNow(2_000);
    expect(await tracker.sweepStale()).toBe(0);
    setNow(2_001);
    expect(await tracker.sweepStale()).toBe(1);
    expect(tracker.size).toBe(0);
  });

  it('should count failed refreshes without evicting', async () => {
    const { tracker } = setup({}, async () => {
      throw new Error('socket hang up');
    });
    await tracker.add(TOKEN);

    const err = await tracker.refresh(TOKEN).catch((e: unknown) => e);

    expect(err instanceof BotError && err.message).toBe('refresh 0x3000...0001: socket hang up');
    expect((await tracker.get(TOKEN))?.consecutiveFailures).toBe(1);
  });

  it('should time out a hung refresh during a sweep and count it', async () => {
    const { tracker } = setup({ refreshTimeoutMs: 20 }, () => new Promise<TokenRiskAnalysis>(() => undefined));
    await tracker.add(TOKEN);

    expect(await tracker.updateAll()).toEqual([]);
    expect((await tracker.get(TOKEN))?.consecutiveFailures).toBe(1);
  });

  it('should keep hung refreshes within the concurrency bound across sweeps', async () => {
    let running = 0;
    let maxRunning = 0;
    const { adapter, tracker } = setup({ refreshConcurrency: 1, refreshTimeoutMs: 20 }, () => {
      running++;
      maxRunning = Math.max(maxRunning, running);
      return new Promise<TokenRiskAnalysis>(() => undefined);
    });
    const tokens = [1, 2, 3, 4].map((n) => tokenAddress(n));
    for (const token of tokens) {
      adapter.addPool({ token, tokenReserve: 1_000_000n * E18, nativeReserve: 100n * E18 });
      await tracker.add(token);
    }

    await tracker.updateAll();
    await tracker.updateAll();

    expect(maxRunning).toBe(1);
    expect(running).toBe(1);
    expect(tracker.refreshesPending).toBe(4);
    for (const token of tokens) expect(tracker.peek(token)?.consecutiveFailures).toBe(1);
  });

  it('should count a refresh that times out and then fails only once', async () => {
    let fail: (err: Error) => void = () => undefined;
    const { tracker } = setup(
      { refreshTimeoutMs: 20 },
      () =>
        new Promise<TokenRiskAnalysis>((_, reject) => {
          fail = reject;
        }),
    );
    await tracker.add(TOKEN);

    await tracker.updateAll();
    fail(new Error('socket hang up'));
    await new Promise((resolve) => setTimeout(resolve, 10));

    expect(tracker.peek(TOKEN)?.consecutiveFailures).toBe(1);
    expect(tracker.refreshesPending).toBe(0);
  });

  it('should restore its entries from an exported state', async () => {
    const { adapter, tracker } = setup();
    await tracker.add(TOKEN);
    await tracker.refresh(TOKEN);

    const copy = new TokenStatusTracker(
      { adapter, risk: { analyze: async (token) => makeRisk({ token }) } },
      { ...THRESHOLDS, capacity: 10, staleAfterMs: 60_000, refreshConcurrency: 1, refreshTimeoutMs: 1_000, priceAlertPercent: 5 },
      tracker.exportState(),
    );

    expect(copy.peek(TOKEN)?.safetyLevel).toBe('Green');
    expect((await copy.riskOf(TOKEN))?.score).toBe(0);
  });
});
