import { describe, it, expect } from 'vitest';
import { KeyedMutex, LockRank, RankedMutex, Semaphore, currentlyHeldRanks, onLockAcquired } from '../../src/utils/lock.js';
import { BotError } from '../../src/errors.js';
import { sleep } from '../../src/utils/helpers.js';

function lockKind(err: unknown): string | null {
  return err instanceof BotError ? err.kind : null;
}

describe('RankedMutex', () => {
  it('should allow acquiring a higher rank while holding a lower one', async () => {
    const nonce = new RankedMutex('nonce', LockRank.NonceManager);
    const trade = new RankedMutex('trade', LockRank.TradeManager);

    const ranks = await nonce.runExclusive(() => trade.runExclusive(() => currentlyHeldRanks()));

    expect(ranks).toEqual([LockRank.NonceManager, LockRank.TradeManager]);
  });

  it('should reject acquiring a lower rank while holding a higher one', async () => {
    const nonce = new RankedMutex('nonce', LockRank.NonceManager);
    const trade = new RankedMutex('trade', LockRank.TradeManager);

    const err = await trade.runExclusive(() => nonce.runExclusive(() => 'unreachable')).catch((e: unknown) => e);

    expect(lockKind(err)).toBe('LockContention');
    expect(err instanceof Error && err.message).toBe('lock order violation: nonce(1) requested while holding trade(6)');
  });

  it('should reject re-entrant acquisition', async () => {
    const gas = new RankedMutex('gas', LockRank.GasOptimizer);

    const err = await gas.runExclusive(() => gas.runExclusive(() => 1)).catch((e: unknown) => e);

    expect(err instanceof Error && err.message).toBe('re-entrant acquisition of gas');
  });

  it('should time out a waiter and report contention', async () => {
    const m = new RankedMutex('slow', 1, 20);
    const holder = m.runExclusive(() => sleep(100));

    const err = await m.runExclusive(() => 'late').catch((e: unknown) => e);
    await holder;

    expect(lockKind(err)).toBe('LockContention');
    expect(err instanceof Error && err.message).toBe('slow lock not acquired within 20ms');
    expect(m.isLocked).toBe(false);
  });

  it('should serialise writers in arrival order', async () => {
    const m = new RankedMutex('fifo', 1);
    const order: number[] = [];

    await Promise.all(
      [1, 2, 3].map((n) =>
        m.runExclusive(async () => {
          await sleep(5);
          order.push(n);
        }),
      ),
    );

    expect(order).toEqual([1, 2, 3]);
  });

  it('should probe false while held past the timeout and true once free', async () => {
    const m = new RankedMutex('probe', 1);
    const holder = m.runExclusive(() => sleep(60));

    expect(await m.probe(10)).toBe(false);
    await holder;
    expect(await m.probe(10)).toBe(true);
  });

  it('should tell listeners which ranks were held at acquisition', async () => {
    const events: Array<[string, number[]]> = [];
    const off = onLockAcquired((e) => events.push([e.name, e.heldRanks]));
    const low = new RankedMutex('low', 1);
    const high = new RankedMutex('high', 5);

    await low.runExclusive(() => high.runExclusive(() => undefined));
    off();
    await low.runExclusive(() => undefined);

    expect(events).toEqual([
      ['low', []],
      ['high', [1]],
    ]);
  });
});

describe('KeyedMutex', () => {
  it('should serialise per key and drop idle keys', async () => {
    const keyed = new KeyedMutex('token', LockRank.TokenSerial);
    let inside = 0;
    let maxInside = 0;
    const work = async (): Promise<void> => {
      inside++;
      maxInside = Math.max(maxInside, inside);
      await sleep(5);
      inside--;
    };

    await Promise.all([keyed.runExclusive('a', work), keyed.runExclusive('a', work), keyed.runExclusive('b', work)]);

    expect(maxInside).toBe(2);
    expect(keyed.size).toBe(0);
  });
});

describe('Semaphore', () => {
  it('should cap concurrency at its permits', async () => {
    const sem = new Semaphore(2);
    let maxInUse = 0;

    await Promise.all(
      [1, 2, 3, 4].map(() =>
        sem.use(async () => {
          maxInUse = Math.max(maxInUse, sem.inUse);
          await sleep(5);
        }),
      ),
    );

    expect(maxInUse).toBe(2);
    expect(sem.inUse).toBe(0);
  });

  it('should refuse zero permits', () => {
    expect(() => new Semaphore(0)).toThrow('semaphore needs at least one permit, got 0');
  });
});
