import { describe, it, expect, afterEach } from 'vitest';
import { SnipeBot } from '../../src/core/snipe-bot.js';
import { BotEmitter } from '../../src/detection/event-emitter.js';
import { Store } from '../../src/data/database.js';
import { MAX_APPROVAL } from '../../src/constants.js';
import { RankedMutex } from '../../src/utils/lock.js';
import type { BotConfig } from '../../src/types.js';
import { FakeChainAdapter, ROUTER, WALLET, tokenAddress } from '../helpers/fake-chain-adapter.js';
import { makeConfig } from '../helpers/config.js';

const E18 = 10n ** 18n;
const TOKEN = tokenAddress(1);

interface Harness {
  bot: SnipeBot;
  adapter: FakeChainAdapter;
  emitter: BotEmitter;
  advance: (ms: number) => void;
}

const stores: Store[] = [];

afterEach(() => {
  for (const s of stores.splice(0)) s.close();
});

function harness(opts: { patch?: (c: BotConfig) => void; verified?: boolean; store?: Store } = {}): Harness {
  const adapter = new FakeChainAdapter();
  adapter.addPool({ token: TOKEN, tokenReserve: 1_000_000n * E18, nativeReserve: 100n * E18, lpLocked: true });
  adapter.setBalance(WALLET, 10n * E18);
  adapter.setAllowance(TOKEN, WALLET, ROUTER, MAX_APPROVAL);

  let now = 1_700_000_000_000;
  const emitter = new BotEmitter();
  const bot = new SnipeBot({
    config: makeConfig(opts.patch),
    adapter,
    verification: { isVerified: async () => opts.verified ?? true },
    holders: { topHolders: async () => null },
    store: opts.store ?? null,
    emitter,
    clock: () => now,
    seed: 7,
  });
  return {
    bot,
    adapter,
    emitter,
    advance: (ms) => {
      now += ms;
    },
  };
}

describe('SnipeBot', () => {
  it('should classify a verified, locked, liquid token Green and buy it', async () => {
    const { bot, adapter } = harness();
    const [, expectedOut] = await adapter.getAmountsOut(E18 / 2n, [adapter.chain.wrappedNative, TOKEN]);

    const result = await bot.buy(TOKEN, 0.5);

    expect(result.success).toBe(true);
    expect(result.amountOut).toBe(expectedOut);
    expect(adapter.sends).toHaveLength(1);
    const status = bot.tracker.peek(TOKEN);
    expect(status?.safetyLevel).toBe('Green');
    expect(status?.riskScore).toBe(0);
    expect(status?.liquidityUsd).toBe(400_000);
    expect(bot.status().openPositions).toBe(1);
  });

  it('should refuse to buy an unverified token', async () => {
    const { bot, adapter } = harness({ verified: false });

    const result = await bot.buy(TOKEN, 0.5);

    expect(result.success).toBe(false);
    expect(result.errorKind).toBe('SafetyRefusal');
    expect(adapter.sends).toHaveLength(0);
    expect(bot.tracker.peek(TOKEN)?.safetyLevel).toBe('Red');
  });

  it('should cap tracked tokens at the tier limit', async () => {
    const { bot } = harness();
    for (let i = 1; i <= 5; i++) await bot.addToken(tokenAddress(i));

    await expect(bot.addToken(tokenAddress(6))).rejects.toThrow('free tier tracks at most 5 tokens');
    expect(bot.tracker.size).toBe(5);
  });

  it('should keep mev mode off the free tier', async () => {
    const { bot } = harness();

    await expect(bot.setMode('mev')).rejects.toThrow('autoTrade is not available on the free tier');
    expect(bot.mode).toBe('manual');
  });

  it('should enter mev mode on vip and step back down to manual on downgrade', async () => {
    const { bot, emitter } = harness({ patch: (c) => (c.trading.tier = 'vip') });
    const modes: string[] = [];
    emitter.on('modeChanged', (m) => modes.push(m));

    await bot.setMode('mev');
    await bot.setTier('free');

    expect(modes).toEqual(['mev', 'auto', 'manual']);
    expect(bot.trades.currentTier).toBe('free');
  });

  it('should rebuild every subsystem whose lock cannot be probed and keep its state', async () => {
    const { bot, emitter, advance } = harness({ patch: (c) => (c.trading.dryRun = true) });
    const rebuilt: Array<[string, number]> = [];
    emitter.on('subsystemRebuilt', (name, staleMs) => rebuilt.push([name, staleMs]));
    await bot.buy(TOKEN, 0.5);
    const oldTrades = bot.trades;

    advance(120_000);
    // Probes from under a higher-ranked lock fail the lock-order check.
    const outer = new RankedMutex('outer', 99);
    await outer.runExclusive(() => bot.checkHealth());

    expect(rebuilt).toEqual([
      ['nonce-manager', 120_000],
      ['gas-optimizer', 120_000],
      ['token-status-tracker', 120_000],
      ['mempool-tracker', 120_000],
      ['strategy-optimizer', 120_000],
      ['trade-manager', 120_000],
      ['ai-coordinator', 120_000],
    ]);
    expect(bot.trades).not.toBe(oldTrades);
    expect(bot.trades.position(TOKEN)?.costBasisNative).toBe(0.5);
    expect(bot.tracker.peek(TOKEN)?.safetyLevel).toBe('Green');

    await bot.checkHealth();
    expect(rebuilt).toHaveLength(7);
  });

  it('should restore positions persisted by an earlier instance', async () => {
    const store = new Store({ path: ':memory:' });
    stores.push(store);
    const first = harness({ store, patch: (c) => (c.trading.dryRun = true) });
    await first.bot.buy(TOKEN, 0.5);
    first.bot.persist();

    const second = harness({ store });

    expect(second.bot.trades.openPositions().map((p) => p.costBasisNative)).toEqual([0.5]);
  });

  it('should record executed trades in the store and summarise them', async () => {
    const store = new Store({ path: ':memory:' });
    stores.push(store);
    const { bot } = harness({ store });
    await bot.start();
    try {
      await bot.buy(TOKEN, 0.5);
      await bot.buy(tokenAddress(9), 0.5);
    } finally {
      await bot.stop();
    }

    const analytics = bot.status().analytics;
    expect(analytics?.totalTrades).toBe(2);
    expect(analytics?.successfulTrades).toBe(1);
    expect(analytics?.failuresByKind).toEqual({ SafetyRefusal: 1 });
  });
});
