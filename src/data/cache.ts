import { LRUCache } from 'lru-cache';
import { Redis } from 'ioredis';
import { randomUUID } from 'node:crypto';
import { logger } from '../utils/logger.js';
import { errorMessage } from '../errors.js';

/**
 * TTL + LRU key/value store. A reader never sees an entry at or past its
 * expiry; a write never shortens the lease of a live entry.
 */
export interface Cache<T> {
  get(key: string): Promise<T | undefined>;
  set(key: string, value: T, ttlMs: number): Promise<void>;
  delete(key: string): Promise<void>;
  clear(): Promise<void>;
  /** Called with the key (or '*' for clear) whenever an entry is invalidated. */
  onInvalidate(cb: (key: string) => void): void;
}

interface Entry<T> {
  value: T;
  expiresAt: number;
}

export interface MemoryCacheOptions {
  max: number;
  clock?: () => number;
}

export class MemoryCache<T> implements Cache<T> {
  private readonly lru: LRUCache<string, Entry<T>>;
  private readonly clock: () => number;
  private readonly listeners: Array<(key: string) => void> = [];

  constructor(opts: MemoryCacheOptions) {
    this.lru = new LRUCache<string, Entry<T>>({ max: opts.max });
    this.clock = opts.clock ?? Date.now;
  }

  async get(key: string): Promise<T | undefined> {
    return this.getSync(key);
  }

  getSync(key: string): T | undefined {
    const entry = this.lru.get(key);
    if (!entry) return undefined;
    if (this.clock() >= entry.expiresAt) {
      this.lru.delete(key);
      return undefined;
    }
    return entry.value;
  }

  async set(key: string, value: T, ttlMs: number): Promise<void> {
    this.setSync(key, value, ttlMs);
  }

  setSync(key: string, value: T, ttlMs: number): void {
    const now = this.clock();
    let expiresAt = now + ttlMs;
    const live = this.lru.peek(key);
    if (live && live.expiresAt > now && live.expiresAt > expiresAt) {
      expiresAt = live.expiresAt;
    }
    this.lru.set(key, { value, expiresAt });
  }

  /** Milliseconds until `key` expires, or 0 if absent. */
  remainingTtl(key: string): number {
    const entry = this.lru.peek(key);
    if (!entry) return 0;
    return Math.max(0, entry.expiresAt - this.clock());
  }

  async delete(key: string): Promise<void> {
    this.deleteLocal(key);
  }

  deleteLocal(key: string): void {
    this.lru.delete(key);
    this.emit(key);
  }

  async clear(): Promise<void> {
    this.clearLocal();
  }

  clearLocal(): void {
    this.lru.clear();
    this.emit('*');
  }

  onInvalidate(cb: (key: string) => void): void {
    this.listeners.push(cb);
  }

  get size(): number {
    return this.lru.size;
  }

  private emit(key: string): void {
    for (const cb of this.listeners) cb(key);
  }
}

// ─── Serialisation ───────────────────────────────────────────────────

export interface Codec<T> {
  encode(value: T): string;
  decode(raw: string): T | undefined;
}

/** JSON with bigint support; `guard` rejects payloads of the wrong shape. */
export function jsonCodec<T>(guard: (value: unknown) => value is T): Codec<T> {
  return {
    encode: (value) => serialize(value),
    decode: (raw) => {
      const parsed = deserialize(raw);
      return guard(parsed) ? parsed : undefined;
    },
  };
}

export function serialize(value: unknown): string {
  return JSON.stringify(value, (_key, v: unknown) =>
    typeof v === 'bigint' ? { $bigint: v.toString() } : v,
  );
}

export function deserialize(raw: string): unknown {
  return JSON.parse(raw, (_key, v: unknown) => {
    if (typeof v === 'object' && v !== null && '$bigint' in v && typeof v.$bigint === 'string') {
      return BigInt(v.$bigint);
    }
    return v;
  });
}

// ─── Distributed layer ───────────────────────────────────────────────

/** The slice of a Redis client this cache uses. */
export interface RedisLike {
  get(key: string): Promise<string | null>;
  setPx(key: string, value: string, ttlMs: number): Promise<void>;
  setKeepTtl(key: string, value: string): Promise<void>;
  pttl(key: string): Promise<number>;
  del(key: string): Promise<void>;
  publish(channel: string, message: string): Promise<void>;
  subscribe(channel: string, onMessage: (message: string) => void): Promise<void>;
  quit(): Promise<void>;
}

export const INVALIDATION_CHANNEL = 'snipebot:cache:invalidate';

/**
 * Local MemoryCache in front of Redis. Writes and deletes publish the key so
 * every other instance drops its local copy. Without Redis it behaves as
 * the local cache alone.
 */
export class RedisCache<T> implements Cache<T> {
  private readonly local: MemoryCache<T>;
  private readonly origin = randomUUID();
  private redisAvailable = false;

  constructor(
    private readonly redis: RedisLike | null,
    private readonly codec: Codec<T>,
    private readonly prefix: string,
    localMax = 1000,
    clock?: () => number,
  ) {
    this.local = new MemoryCache<T>({ max: localMax, clock });
  }

  async init(): Promise<void> {
    if (!this.redis) return;
    try {
      await this.redis.subscribe(INVALIDATION_CHANNEL, (message) => this.handleInvalidation(message));
      this.redisAvailable = true;
    } catch (err) {
      logger.warn(`[cache] Redis unavailable, running with local cache only: ${errorMessage(err)}`);
    }
  }

  async get(key: string): Promise<T | undefined> {
    const hit = this.local.getSync(key);
    if (hit !== undefined || !this.redis || !this.redisAvailable) return hit;

    try {
      const fullKey = this.k(key);
      const [raw, ttl] = await Promise.all([this.redis.get(fullKey), this.redis.pttl(fullKey)]);
      if (raw === null || ttl <= 0) return undefined;
      const value = this.codec.decode(raw);
      if (value === undefined) return undefined;
      this.local.setSync(key, value, ttl);
      return value;
    } catch (err) {
      logger.debug(`[cache] Redis get ${key} failed: ${errorMessage(err)}`);
      return undefined;
    }
  }

  async set(key: string, value: T, ttlMs: number): Promise<void> {
    this.local.setSync(key, value, ttlMs);
    if (!this.redis || !this.redisAvailable) return;

    const fullKey = this.k(key);
    try {
      const remaining = await this.redis.pttl(fullKey);
      const encoded = this.codec.encode(value);
      if (remaining > ttlMs) await this.redis.setKeepTtl(fullKey, encoded);
      else await this.redis.setPx(fullKey, encoded, ttlMs);
      await this.publish(key);
    } catch (err) {
      logger.debug(`[cache] Redis set ${key} failed: ${errorMessage(err)}`);
    }
  }

  async delete(key: string): Promise<void> {
    this.local.deleteLocal(key);
    if (!this.redis || !this.redisAvailable) return;
    try {
      await this.redis.del(this.k(key));
      await this.publish(key);
    } catch (err) {
      logger.debug(`[cache] Redis del ${key} failed: ${errorMessage(err)}`);
    }
  }

  async clear(): Promise<void> {
    this.local.clearLocal();
    if (!this.redis || !this.redisAvailable) return;
    try {
      await this.publish('*');
    } catch (err) {
      logger.debug(`[cache] Redis clear publish failed: ${errorMessage(err)}`);
    }
  }

  onInvalidate(cb: (key: string) => void): void {
    this.local.onInvalidate(cb);
  }

  async close(): Promise<void> {
    this.local.clearLocal();
    if (this.redis) await this.redis.quit();
    this.redisAvailable = false;
  }

  private k(key: string): string {
    return `${this.prefix}:${key}`;
  }

  private publish(key: string): Promise<void> {
    if (!this.redis) return Promise.resolve();
    return this.redis.publish(INVALIDATION_CHANNEL, JSON.stringify({ origin: this.origin, prefix: this.prefix, key }));
  }

  private handleInvalidation(message: string): void {
    let parsed: unknown;
    try {
      parsed = JSON.parse(message);
    } catch {
      logger.debug('[cache] Ignoring malformed invalidation message');
      return;
    }
    if (typeof parsed !== 'object' || parsed === null) return;
    const origin = 'origin' in parsed ? parsed.origin : undefined;
    const prefix = 'prefix' in parsed ? parsed.prefix : undefined;
    const key = 'key' in parsed ? parsed.key : undefined;
    if (origin === this.origin || prefix !== this.prefix || typeof key !== 'string') return;

    if (key === '*') this.local.clearLocal();
    else this.local.deleteLocal(key);
  }
}

/** ioredis behind RedisLike, with a second connection for the subscription. */
export function ioredisClient(url: string): RedisLike {
  const opts = {
    maxRetriesPerRequest: 3,
    lazyConnect: true,
    retryStrategy: (times: number): number | null => {
      if (times > 5) {
        logger.warn('[redis] Max retries reached, giving up');
        return null;
      }
      return Math.min(times * 200, 2000);
    },
  };
  const client = new Redis(url, opts);
  const subscriber = new Redis(url, opts);
  for (const c of [client, subscriber]) {
    c.on('error', (err: unknown) => logger.debug(`[redis] Connection error: ${errorMessage(err)}`));
  }
  client.on('connect', () => logger.info('[redis] Connected'));

  return {
    get: (key) => client.get(key),
    setPx: async (key, value, ttlMs) => {
      await client.set(key, value, 'PX', ttlMs);
    },
    setKeepTtl: async (key, value) => {
      await client.set(key, value, 'KEEPTTL');
    },
    pttl: (key) => client.pttl(key),
    del: async (key) => {
      await client.del(key);
    },
    publish: async (channel, message) => {
      await client.publish(channel, message);
    },
    subscribe: async (channel, onMessage) => {
      await client.connect();
      await subscriber.connect();
      subscriber.on('message', (ch: string, message: string) => {
        if (ch === channel) onMessage(message);
      });
      await subscriber.subscribe(channel);
    },
    quit: async () => {
      await Promise.allSettled([client.quit(), subscriber.quit()]);
    },
  };
}
