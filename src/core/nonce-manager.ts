import { logger } from '../utils/logger.js';
import { BotError, errorMessage } from '../errors.js';
import { LockRank, RankedMutex } from '../utils/lock.js';
import { Heartbeat } from '../utils/health-check.js';
import { addrKey } from '../utils/helpers.js';
import type { Supervised } from './supervisor.js';
import type { ChainAdapter } from './chain-adapter.js';

interface NonceState {
  counter: number;
  fetchedAt: number;
}

export interface NonceManagerOptions {
  /** How long a chain-fetched count is trusted before the next refetch. */
  ttlMs?: number;
  lockTimeoutMs?: number;
  clock?: () => number;
}

/**
 * Per-address nonce issuance. Issued values only increase between resets;
 * the chain count is fetched outside the lock and merged with max().
 */
export class NonceManager implements Supervised {
  readonly name = 'nonce-manager';
  private readonly state = new Map<string, NonceState>();
  private readonly lock: RankedMutex;
  private readonly heartbeat: Heartbeat;
  private readonly ttlMs: number;
  private readonly clock: () => number;

  constructor(
    private readonly adapter: Pick<ChainAdapter, 'chain' | 'getTransactionCount'>,
    opts: NonceManagerOptions = {},
  ) {
    this.ttlMs = opts.ttlMs ?? 30_000;
    this.clock = opts.clock ?? Date.now;
    this.lock = new RankedMutex(this.name, LockRank.NonceManager, opts.lockTimeoutMs);
    this.heartbeat = new Heartbeat(this.clock);
  }

  async next(address: string): Promise<number> {
    const key = this.key(address);
    const cached = this.state.get(key);
    const fresh = cached !== undefined && this.clock() - cached.fetchedAt < this.ttlMs;
    const chainCount = fresh ? null : await this.fetch(address);

    return this.lock.runExclusive(() => {
      let s = this.state.get(key);
      if (!s) {
        s = { counter: chainCount ?? 0, fetchedAt: this.clock() };
        this.state.set(key, s);
      } else if (chainCount !== null) {
        s.counter = Math.max(s.counter, chainCount);
        s.fetchedAt = this.clock();
      }
      const issued = s.counter;
      s.counter++;
      this.heartbeat.touch();
      return issued;
    });
  }

  /** Refetches from chain and rebases the counter, even downwards. */
  async reset(address: string): Promise<number> {
    const chainCount = await this.fetch(address);
    return this.lock.runExclusive(() => {
      this.state.set(this.key(address), { counter: chainCount, fetchedAt: this.clock() });
      this.heartbeat.touch();
      logger.debug(`[nonce] ${address} reset to ${chainCount}`);
      return chainCount;
    });
  }

  /** Advances past a nonce seen on chain (e.g. from a receipt). */
  async update(address: string, observedNonce: number): Promise<void> {
    await this.lock.runExclusive(() => {
      const key = this.key(address);
      const s = this.state.get(key);
      if (!s) {
        this.state.set(key, { counter: observedNonce + 1, fetchedAt: this.clock() });
      } else if (observedNonce >= s.counter) {
        s.counter = observedNonce + 1;
      }
      this.heartbeat.touch();
    });
  }

  peek(address: string): number | undefined {
    return this.state.get(this.key(address))?.counter;
  }

  lastSuccessTs(): number {
    return this.heartbeat.lastSuccessTs;
  }

  async probe(timeoutMs: number): Promise<boolean> {
    const ok = await this.lock.probe(timeoutMs);
    if (ok) this.heartbeat.touch();
    return ok;
  }

  private key(address: string): string {
    return `${this.adapter.chain.id}:${addrKey(address)}`;
  }

  private async fetch(address: string): Promise<number> {
    try {
      return await this.adapter.getTransactionCount(address);
    } catch (err) {
      throw new BotError('ChainUnavailable', `nonce fetch for ${address} failed: ${errorMessage(err)}`, { cause: err });
    }
  }
}
