import { describe, it, expect, vi } from 'vitest';
import { MempoolTracker, type MempoolTrackerOptions } from '../../src/detection/mempool-tracker.js';
import { gwei } from '../../src/utils/helpers.js';
import { FakeChainAdapter, tokenAddress } from '../helpers/fake-chain-adapter.js';

const E18 = 10n ** 18n;
const TOKEN = tokenAddress(1);
const OTHER = tokenAddress(2);
const KNOWN_BOT = '0x00000000003b3cc22af3ae1eac0440bcee416b40';

function setup(
  overrides: Partial<MempoolTrackerOptions> = {},
  chain: ConstructorParameters<typeof FakeChainAdapter>[0] = {},
) {
  const adapter = new FakeChainAdapter(chain);
  let now = 1_000_000;
  const tracker = new MempoolTracker(adapter, {
    windowMs: 60_000,
    maxSwapsPerToken: 50,
    largeBuyUsd: 10_000,
    minSandwichVictimUsd: 5_000,
    minFrontrunTargetUsd: 2_000,
    mevDetectionEnabled: true,
    degradedAfterMs: 60_000,
    reconnectBaseMs: 10,
    reconnectMaxMs: 100,
    clock: () => now,
    ...overrides,
  });
  return {
    adapter,
    tracker,
    advance: (ms: number) => {
      now += ms;
    },
  };
}

describe('MempoolTracker', () => {
  it('should decode a pending buy and announce its token once', async () => {
    const { adapter, tracker } = setup();
    const announced: string[] = [];
    tracker.onNewToken((token) => announced.push(token));

    const first = await tracker.ingest(adapter.addPendingSwap({ token: TOKEN, value: 2n * E18, gasPrice: gwei(10) }));
    await tracker.ingest(adapter.addPendingSwap({ token: TOKEN, value: E18, gasPrice: gwei(10) }));

    expect(first?.token).toBe(TOKEN);
    expect(first?.isBuy).toBe(true);
    expect(first?.amountUsd).toBe(4_000);
    expect(announced).toEqual([TOKEN]);
    expect(await tracker.pendingSwaps(TOKEN)).toHaveLength(2);
  });

  it('should ignore transactions that are not router swaps', async () => {
    const { tracker } = setup();

    const result = await tracker.ingest({
      hash: '0x01',
      from: KNOWN_BOT,
      to: TOKEN,
      value: 0n,
      data: '0x',
      gasPrice: 1n,
      nonce: 0,
      blockNumber: null,
      transactionIndex: null,
    });

    expect(result).toBeNull();
    expect(tracker.trackedTokenCount).toBe(0);
  });

  it('should aggregate buy pressure and count large buys', async () => {
    const { adapter, tracker } = setup();
    await tracker.ingest(adapter.addPendingSwap({ token: TOKEN, value: 6n * E18, gasPrice: gwei(10) }));
    await tracker.ingest(adapter.addPendingSwap({ token: TOKEN, value: E18, gasPrice: gwei(10) }));

    const metrics = await tracker.metrics(TOKEN);

    expect(metrics.buyPressure).toBe(1);
    expect(metrics.sellPressure).toBe(0);
    expect(metrics.buyVolumeUsd).toBe(14_000);
    expect(metrics.largeBuys).toBe(1);
    expect(metrics.pendingCount).toBe(2);
  });

  it('should drop swaps once they are mined', async () => {
    const { adapter, tracker } = setup();
    const tx = adapter.addPendingSwap({ token: TOKEN, value: E18, gasPrice: gwei(10) });
    await tracker.ingest(tx);

    await tracker.ingestBlock(adapter.mine(tx.hash));

    expect(await tracker.pendingSwaps(TOKEN)).toEqual([]);
  });

  it('should forget activity older than the window', async () => {
    const { adapter, tracker, advance } = setup();
    await tracker.ingest(adapter.addPendingSwap({ token: TOKEN, value: E18, gasPrice: gwei(10) }));

    advance(60_001);

    expect(await tracker.pendingSwaps(TOKEN)).toEqual([]);
    expect(tracker.trackedTokenCount).toBe(0);
  });

  it('should pick the largest eligible sandwich victim and estimate its impact', async () => {
    const { adapter, tracker } = setup({ liquidityNativeOf: () => 100 });
    await tracker.ingest(adapter.addPendingSwap({ token: TOKEN, value: 3n * E18, gasPrice: gwei(10) }));
    await tracker.ingest(adapter.addPendingSwap({ token: OTHER, value: 4n * E18, gasPrice: gwei(10) }));
    await tracker.ingest(adapter.addPendingSwap({ token: TOKEN, value: E18, gasPrice: gwei(10) }));

    const best = await tracker.bestSandwich(TOKEN);
    const anywhere = await tracker.bestSandwich();

    expect(best?.victim.amountUsd).toBe(6_000);
    expect(best?.estimatedImpactPct).toBeCloseTo(6.09, 6);
    expect(best?.potentialProfitUsd).toBeCloseTo(6_000 * 0.0609 * 0.5, 6);
    expect(anywhere?.victim.token).toBe(OTHER);
  });

  it('should not offer a known searcher as a victim', async () => {
    const { adapter, tracker } = setup();
    const tx = adapter.addPendingSwap({ token: TOKEN, value: 5n * E18, gasPrice: gwei(10), from: KNOWN_BOT });
    await tracker.ingest(tx);

    expect(await tracker.bestSandwich(TOKEN)).toBeNull();
    expect(await tracker.bestFrontrunTarget(TOKEN)).toBeNull();
    expect(tracker.mevKindOf(tx.hash)).toBe('known_bot');
  });

  it('should skip victims paying over twice the base fee', async () => {
    const { adapter, tracker } = setup();
    await tracker.setBaseFee(gwei(10));
    await tracker.ingest(adapter.addPendingSwap({ token: TOKEN, value: 5n * E18, gasPrice: gwei(20) }));

    expect(await tracker.bestSandwich(TOKEN)).toBeNull();
    expect((await tracker.metrics(TOKEN)).baseFee).toBe(gwei(10));
  });

  it('should hand a claimed swap to one caller only', async () => {
    const { adapter, tracker } = setup();
    const tx = adapter.addPendingSwap({ token: TOKEN, value: 5n * E18, gasPrice: gwei(10) });
    await tracker.ingest(tx);

    expect(await tracker.claim(tx.hash)).toBe(true);
    expect(await tracker.claim(tx.hash)).toBe(false);
    expect(await tracker.bestFrontrunTarget(TOKEN)).toBeNull();
  });

  it('should discover tokens from mined blocks when there is no push feed', async () => {
    const { adapter, tracker } = setup();
    adapter.mine(adapter.addPendingSwap({ token: TOKEN, value: E18, gasPrice: gwei(10) }).hash);
    const discovered = new Promise<string>((resolve) => tracker.onNewToken((token) => resolve(token)));
    const controller = new AbortController();

    const running = tracker.run(controller.signal);
    expect(await discovered).toBe(TOKEN);
    expect(tracker.health).toBe('polling');
    controller.abort();
    await running;

    expect(tracker.health).toBe('stopped');
  });

  it('should resubscribe after the push feed drops', async () => {
    const { adapter, tracker } = setup({}, { wsUrl: 'ws://127.0.0.1:8546' });
    const states: string[] = [];
    tracker.onHealth((state) => states.push(state));
    const controller = new AbortController();
    const abortListeners = trackAbortListeners();

    const running = tracker.run(controller.signal);
    for (let drop = 1; drop <= 3; drop++) {
      await until(() => adapter.subscriptions === drop && tracker.health === 'streaming');
      adapter.dropSubscription();
    }
    await until(() => adapter.subscriptions === 4 && tracker.health === 'streaming');
    const discovered = new Promise<string>((resolve) => tracker.onNewToken((token) => resolve(token)));
    adapter.emitPending(adapter.addPendingSwap({ token: TOKEN, value: E18, gasPrice: gwei(10) }));
    expect(await discovered).toBe(TOKEN);
    const attached = abortListeners.size;
    vi.restoreAllMocks();
    controller.abort();
    await running;

    // run's own hook, the inbox wait, the poll sleep and the live feed
    expect(attached).toBeLessThanOrEqual(4);
    expect(states.filter((s) => s === 'connecting')).toHaveLength(3);
    expect(states.at(-1)).toBe('stopped');
  });

  it('should carry seen tokens into a replacement', async () => {
    const { adapter, tracker } = setup();
    await tracker.ingest(adapter.addPendingSwap({ token: TOKEN, value: E18, gasPrice: gwei(10) }));
    const replacement = new MempoolTracker(adapter, {
      windowMs: 60_000,
      maxSwapsPerToken: 50,
      largeBuyUsd: 10_000,
      minSandwichVictimUsd: 5_000,
      minFrontrunTargetUsd: 2_000,
      mevDetectionEnabled: true,
      degradedAfterMs: 60_000,
      reconnectBaseMs: 10,
      reconnectMaxMs: 100,
    }, tracker.exportState());
    const announced: string[] = [];
    replacement.onNewToken((token) => announced.push(token));

    await replacement.ingest(adapter.addPendingSwap({ token: TOKEN, value: E18, gasPrice: gwei(10) }));

    expect(announced).toEqual([]);
  });
});

async function until(check: () => boolean): Promise<void> {
  for (let i = 0; i < 200 && !check(); i++) {
    await new Promise((resolve) => setTimeout(resolve, 5));
  }
  expect(check()).toBe(true);
}

/** Abort listeners currently attached to any signal. */
function trackAbortListeners(): Set<unknown> {
  const attached = new Set<unknown>();
  const add = EventTarget.prototype.addEventListener;
  const remove = EventTarget.prototype.removeEventListener;
  vi.spyOn(EventTarget.prototype, 'addEventListener').mockImplementation(function (this: EventTarget, type, listener, options) {
    if (type === 'abort') attached.add(listener);
    add.call(this, type, listener, options);
  });
  vi.spyOn(EventTarget.prototype, 'removeEventListener').mockImplementation(function (this: EventTarget, type, listener, options) {
    if (type === 'abort') attached.delete(listener);
    remove.call(this, type, listener, options);
  });
  return attached;
}
