import { describe, it, expect } from 'vitest';
import { MemoryCache, RedisCache, jsonCodec, serialize, deserialize, INVALIDATION_CHANNEL, type RedisLike } from '../../src/data/cache.js';

interface Quote {
  amount: bigint;
  route: string;
}

function isQuote(v: unknown): v is Quote {
  return typeof v === 'object' && v !== null && 'amount' in v && typeof v.amount === 'bigint' && 'route' in v && typeof v.route === 'string';
}

/** One in-process Redis shared by every client created from it. */
class FakeRedisServer {
  readonly store = new Map<string, { value: string; expiresAt: number }>();
  private readonly subscribers: Array<{ channel: string; onMessage: (message: string) => void }> = [];
  published: string[] = [];

  constructor(private readonly clock: () => number) {}

  client(opts: { failSubscribe?: boolean } = {}): RedisLike & { gets: number } {
    const server = this;
    return {
      gets: 0,
      async get(key) {
        this.gets++;
        return server.live(key)?.value ?? null;
      },
      async setPx(key, value, ttlMs) {
        server.store.set(key, { value, expiresAt: server.clock() + ttlMs });
      },
      async setKeepTtl(key, value) {
        const live = server.live(key);
        server.store.set(key, { value, expiresAt: live ? live.expiresAt : Number.POSITIVE_INFINITY });
      },
      async pttl(key) {
        const live = server.live(key);
        return live ? live.expiresAt - server.clock() : -2;
      },
      async del(key) {
        server.store.delete(key);
      },
      async publish(channel, message) {
        server.published.push(message);
        for (const s of server.subscribers) if (s.channel === channel) s.onMessage(message);
      },
      async subscribe(channel, onMessage) {
        if (opts.failSubscribe) throw new Error('ECONNREFUSED 127.0.0.1:6379');
        server.subscribers.push({ channel, onMessage });
      },
      async quit() {},
    };
  }

  deliver(message: string): void {
    for (const s of this.subscribers) s.onMessage(message);
  }

  private live(key: string): { value: string; expiresAt: number } | undefined {
    const entry = this.store.get(key);
    if (!entry || entry.expiresAt <= this.clock()) return undefined;
    return entry;
  }
}

describe('MemoryCache', () => {
  function setup() {
    let now = 0;
    const cache = new MemoryCache<string>({ max: 3, clock: () => now });
    return {
      cache,
      setNow: (ms: number) => {
        now = ms;
      },
    };
  }

  it('should hide an entry at its expiry', async () => {
    const { cache, setNow } = setup();
    await cache.set('k', 'v', 100);

    setNow(99);
    expect(await cache.get('k')).toBe('v');
    setNow(100);
    expect(await cache.get('k')).toBeUndefined();
  });

  it('should not shorten the lease of a live entry', async () => {
    const { cache, setNow } = setup();
    await cache.set('k', 'v1', 1_000);
    await cache.set('k', 'v2', 10);

    expect(cache.remainingTtl('k')).toBe(1_000);
    expect(await cache.get('k')).toBe('v2');

    setNow(2_000);
    await cache.set('k', 'v3', 10);
    expect(cache.remainingTtl('k')).toBe(10);
  });

  it('should evict the least recently used entry past its capacity', async () => {
    const { cache } = setup();
    for (const k of ['a', 'b', 'c']) await cache.set(k, k, 1_000);
    await cache.get('a');
    await cache.set('d', 'd', 1_000);

    expect(await cache.get('b')).toBeUndefined();
    expect(await cache.get('a')).toBe('a');
    expect(cache.size).toBe(3);
  });

  it('should report invalidations', async () => {
    const { cache } = setup();
    const seen: string[] = [];
    cache.onInvalidate((k) => seen.push(k));

    await cache.set('k', 'v', 100);
    await cache.delete('k');
    await cache.clear();

    expect(seen).toEqual(['k', '*']);
  });
});

describe('serialization', () => {
  it('should carry bigints through JSON', () => {
    const raw = serialize({ amount: 5n, route: 'v2' });

    expect(raw).toBe('{"amount":{"$bigint":"5"},"route":"v2"}');
    expect(deserialize(raw)).toEqual({ amount: 5n, route: 'v2' });
  });

  it('should reject payloads of the wrong shape', () => {
    const codec = jsonCodec(isQuote);

    expect(codec.decode('{"amount":5,"route":"v2"}')).toBeUndefined();
    expect(codec.decode(codec.encode({ amount: 7n, route: 'v3' }))).toEqual({ amount: 7n, route: 'v3' });
  });
});

describe('RedisCache', () => {
  function setup() {
    let now = 0;
    const clock = () => now;
    const server = new FakeRedisServer(clock);
    const make = (client = server.client()) => new RedisCache<Quote>(client, jsonCodec(isQuote), 'quotes', 100, clock);
    return {
      server,
      make,
      setNow: (ms: number) => {
        now = ms;
      },
    };
  }

  it('should share values between instances through Redis', async () => {
    const { make } = setup();
    const a = make();
    const b = make();
    await a.init();
    await b.init();

    await a.set('k', { amount: 1n, route: 'v2' }, 1_000);

    expect(await b.get('k')).toEqual({ amount: 1n, route: 'v2' });
  });

  it('should drop a stale local copy when another instance writes', async () => {
    const { make } = setup();
    const a = make();
    const b = make();
    await a.init();
    await b.init();
    await a.set('k', { amount: 1n, route: 'v2' }, 1_000);
    await b.get('k');

    await a.set('k', { amount: 2n, route: 'v2' }, 1_000);

    expect(await b.get('k')).toEqual({ amount: 2n, route: 'v2' });
  });

  it('should keep the longer Redis lease on a shorter write', async () => {
    const { server, make } = setup();
    const a = make();
    await a.init();

    await a.set('k', { amount: 1n, route: 'v2' }, 5_000);
    await a.set('k', { amount: 2n, route: 'v2' }, 100);

    expect(server.store.get('quotes:k')?.expiresAt).toBe(5_000);
  });

  it('should fill the local layer with the remaining Redis lease', async () => {
    const { make, setNow } = setup();
    const a = make();
    const b = make();
    await a.init();
    await b.init();
    await a.set('k', { amount: 1n, route: 'v2' }, 1_000);

    setNow(400);
    await b.get('k');
    setNow(1_000);

    expect(await b.get('k')).toBeUndefined();
  });

  it('should fall back to the local layer when Redis is unreachable', async () => {
    const { server, make } = setup();
    const client = server.client({ failSubscribe: true });
    const cache = make(client);
    await cache.init();

    await cache.set('k', { amount: 1n, route: 'v2' }, 1_000);
    await cache.delete('missing');

    expect(await cache.get('k')).toEqual({ amount: 1n, route: 'v2' });
    expect(await cache.get('other')).toBeUndefined();
    expect(client.gets).toBe(0);
    expect(server.store.size).toBe(0);
  });

  it('should work without Redis at all', async () => {
    const cache = new RedisCache<Quote>(null, jsonCodec(isQuote), 'quotes');
    await cache.init();
    await cache.set('k', { amount: 1n, route: 'v2' }, 1_000);

    expect(await cache.get('k')).toEqual({ amount: 1n, route: 'v2' });
  });

  it('should ignore its own and malformed invalidation messages', async () => {
    const { server, make } = setup();
    const a = make();
    await a.init();
    await a.set('k', { amount: 1n, route: 'v2' }, 1_000);

    server.deliver('not json');
    server.deliver(JSON.stringify({ origin: 'other', prefix: 'elsewhere', key: 'k' }));
    expect(await a.get('k')).toEqual({ amount: 1n, route: 'v2' });

    server.deliver(JSON.stringify({ origin: 'other', prefix: 'quotes', key: '*' }));
    server.store.clear();
    expect(await a.get('k')).toBeUndefined();
    expect(JSON.parse(server.published[0] ?? '{}')).toMatchObject({ prefix: 'quotes', key: 'k' });
    expect(INVALIDATION_CHANNEL).toBe('snipebot:cache:invalidate');
  });
});
