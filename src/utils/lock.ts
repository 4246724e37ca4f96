import { AsyncLocalStorage } from 'node:async_hooks';
import { BotError } from '../errors.js';

/**
 * Global lock order. A task holding a lock may only acquire locks of equal or
 * higher rank; anything else is rejected before it can deadlock.
 */
export const LockRank = {
  TokenSerial: 0,
  NonceManager: 1,
  GasOptimizer: 2,
  TokenStatusTracker: 3,
  MempoolTracker: 4,
  StrategyOptimizer: 5,
  TradeManager: 6,
  AICoordinator: 7,
} as const;

export type LockRankValue = (typeof LockRank)[keyof typeof LockRank];

export const DEFAULT_WRITE_TIMEOUT_MS = 5_000;
export const DEFAULT_READ_TIMEOUT_MS = 2_000;

interface HeldLock {
  mutex: RankedMutex;
}

export interface LockAcquisition {
  name: string;
  rank: number;
  heldRanks: number[];
}

const heldLocks = new AsyncLocalStorage<readonly HeldLock[]>();
const acquisitionListeners = new Set<(event: LockAcquisition) => void>();

/** Observes every successful acquisition. Returns an unsubscribe function. */
export function onLockAcquired(listener: (event: LockAcquisition) => void): () => void {
  acquisitionListeners.add(listener);
  return () => {
    acquisitionListeners.delete(listener);
  };
}

export function currentlyHeldRanks(): number[] {
  return (heldLocks.getStore() ?? []).map((h) => h.mutex.rank);
}

export class RankedMutex {
  private locked = false;
  private waiters: Array<() => void> = [];
  private readonly readTimeoutMs: number;

  constructor(
    readonly name: string,
    readonly rank: number,
    private readonly writeTimeoutMs = DEFAULT_WRITE_TIMEOUT_MS,
  ) {
    this.readTimeoutMs = Math.min(DEFAULT_READ_TIMEOUT_MS, writeTimeoutMs);
  }

  get isLocked(): boolean {
    return this.locked;
  }

  /** Writer section, bounded by the write timeout unless overridden. */
  runExclusive<T>(fn: () => T | Promise<T>, timeoutMs = this.writeTimeoutMs): Promise<T> {
    return this.run(fn, timeoutMs);
  }

  /** Reader section; same exclusion, shorter bound. */
  read<T>(fn: () => T | Promise<T>): Promise<T> {
    return this.run(fn, this.readTimeoutMs);
  }

  /** Health probe: true when the lock could be taken within the timeout. */
  async probe(timeoutMs = this.readTimeoutMs): Promise<boolean> {
    try {
      await this.run(() => undefined, timeoutMs);
      return true;
    } catch (err) {
      if (err instanceof BotError && err.kind === 'LockContention') return false;
      throw err;
    }
  }

  private async run<T>(fn: () => T | Promise<T>, timeoutMs: number): Promise<T> {
    const stack = heldLocks.getStore() ?? [];
    this.checkOrder(stack);

    await this.acquire(timeoutMs);
    const event: LockAcquisition = {
      name: this.name,
      rank: this.rank,
      heldRanks: stack.map((h) => h.mutex.rank),
    };
    for (const listener of acquisitionListeners) listener(event);

    try {
      return await heldLocks.run([...stack, { mutex: this }], fn);
    } finally {
      this.release();
    }
  }

  private checkOrder(stack: readonly HeldLock[]): void {
    for (const held of stack) {
      if (held.mutex === this) {
        throw new BotError('LockContention', `re-entrant acquisition of ${this.name}`);
      }
      if (held.mutex.rank > this.rank) {
        throw new BotError(
          'LockContention',
          `lock order violation: ${this.name}(${this.rank}) requested while holding ${held.mutex.name}(${held.mutex.rank})`,
        );
      }
    }
  }

  private acquire(timeoutMs: number): Promise<void> {
    if (!this.locked) {
      this.locked = true;
      return Promise.resolve();
    }
    return new Promise((resolve, reject) => {
      const waiter = (): void => {
        clearTimeout(timer);
        resolve();
      };
      const timer = setTimeout(() => {
        const idx = this.waiters.indexOf(waiter);
        if (idx >= 0) this.waiters.splice(idx, 1);
        reject(new BotError('LockContention', `${this.name} lock not acquired within ${timeoutMs}ms`));
      }, timeoutMs);
      this.waiters.push(waiter);
    });
  }

  private release(): void {
    const next = this.waiters.shift();
    // Ownership passes straight to the next waiter; `locked` stays set.
    if (next) next();
    else this.locked = false;
  }
}

/** One mutex per key, created on demand and dropped when idle. */
export class KeyedMutex {
  private readonly mutexes = new Map<string, { mutex: RankedMutex; users: number }>();

  constructor(
    private readonly name: string,
    private readonly rank: number,
    private readonly timeoutMs = DEFAULT_WRITE_TIMEOUT_MS,
  ) {}

  async runExclusive<T>(key: string, fn: () => Promise<T>, timeoutMs = this.timeoutMs): Promise<T> {
    let entry = this.mutexes.get(key);
    if (!entry) {
      entry = { mutex: new RankedMutex(`${this.name}:${key}`, this.rank, this.timeoutMs), users: 0 };
      this.mutexes.set(key, entry);
    }
    entry.users++;
    try {
      return await entry.mutex.runExclusive(fn, timeoutMs);
    } finally {
      entry.users--;
      if (entry.users === 0) this.mutexes.delete(key);
    }
  }

  get size(): number {
    return this.mutexes.size;
  }
}

/** Counting semaphore for bounded parallelism. */
export class Semaphore {
  private available: number;
  private waiters: Array<() => void> = [];

  constructor(readonly permits: number) {
    if (permits < 1) throw new BotError('ConfigInvalid', `semaphore needs at least one permit, got ${permits}`);
    this.available = permits;
  }

  async use<T>(fn: () => Promise<T>): Promise<T> {
    await this.acquire();
    try {
      return await fn();
    } finally {
      this.release();
    }
  }

  get inUse(): number {
    return this.permits - this.available;
  }

  private acquire(): Promise<void> {
    if (this.available > 0) {
      this.available--;
      return Promise.resolve();
    }
    return new Promise((resolve) => this.waiters.push(resolve));
  }

  private release(): void {
    const next = this.waiters.shift();
    if (next) next();
    else this.available++;
  }
}
