import { describe, it, expect } from 'vitest';
import { NonceManager } from '../../src/core/nonce-manager.js';
import { BotError } from '../../src/errors.js';
import { testChain, WALLET } from '../helpers/fake-chain-adapter.js';

function chainWithCount(count: () => number) {
  let fetches = 0;
  return {
    adapter: {
      chain: testChain(),
      getTransactionCount: async () => {
        fetches++;
        return count();
      },
    },
    fetches: () => fetches,
  };
}

describe('NonceManager', () => {
  it('should start from the chain count and increment locally', async () => {
    const { adapter, fetches } = chainWithCount(() => 7);
    const nonces = new NonceManager(adapter);

    expect(await nonces.next(WALLET)).toBe(7);
    expect(await nonces.next(WALLET)).toBe(8);
    expect(fetches()).toBe(1);
  });

  it('should hand out distinct nonces to concurrent callers', async () => {
    const { adapter } = chainWithCount(() => 0);
    const nonces = new NonceManager(adapter);

    const issued = await Promise.all([1, 2, 3, 4, 5].map(() => nonces.next(WALLET)));

    expect([...issued].sort((a, b) => a - b)).toEqual([0, 1, 2, 3, 4]);
  });

  it('should refetch after the ttl and never go backwards', async () => {
    let chain = 0;
    let now = 0;
    const { adapter, fetches } = chainWithCount(() => chain);
    const nonces = new NonceManager(adapter, { ttlMs: 1_000, clock: () => now });
    await nonces.next(WALLET);
    await nonces.next(WALLET);

    now = 1_000;
    expect(await nonces.next(WALLET)).toBe(2);
    expect(fetches()).toBe(2);

    chain = 10;
    now = 2_000;
    expect(await nonces.next(WALLET)).toBe(10);
  });

  it('should rebase downwards on reset', async () => {
    const { adapter } = chainWithCount(() => 3);
    const nonces = new NonceManager(adapter);
    await nonces.update(WALLET, 20);
    expect(nonces.peek(WALLET)).toBe(21);

    expect(await nonces.reset(WALLET)).toBe(3);
    expect(await nonces.next(WALLET)).toBe(3);
  });

  it('should only move forward on update', async () => {
    const { adapter } = chainWithCount(() => 5);
    const nonces = new NonceManager(adapter);
    await nonces.next(WALLET);

    await nonces.update(WALLET, 2);
    expect(nonces.peek(WALLET)).toBe(6);
  });

  it('should report a failed fetch as ChainUnavailable', async () => {
    const nonces = new NonceManager({
      chain: testChain(),
      getTransactionCount: async () => {
        throw new Error('connect ECONNREFUSED');
      },
    });

    const err = await nonces.next(WALLET).catch((e: unknown) => e);

    expect(err instanceof BotError && err.kind).toBe('ChainUnavailable');
  });
});
