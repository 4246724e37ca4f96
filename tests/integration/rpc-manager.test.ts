import { describe, it, expect } from 'vitest';
import { RpcManager, maskUrl, type RpcClient } from '../../src/core/rpc-manager.js';

class FakeClient implements RpcClient {
  destroyed = false;

  constructor(
    readonly url: string,
    readonly generation: number,
    private readonly failing: boolean,
  ) {}

  async getBlockNumber(): Promise<number> {
    if (this.failing) throw new Error('ECONNREFUSED');
    return 100;
  }

  destroy(): void {
    this.destroyed = true;
  }
}

function setup(urls: string[], failing: ReadonlySet<string> = new Set()) {
  const created: FakeClient[] = [];
  const manager = new RpcManager(urls, (url) => {
    const client = new FakeClient(url, created.filter((c) => c.url === url).length, failing.has(url));
    created.push(client);
    return client;
  });
  return { manager, created };
}

describe('RpcManager', () => {
  it('should rotate across healthy endpoints', async () => {
    const { manager } = setup(['http://a', 'http://b', 'http://c']);

    const order: string[] = [];
    for (let i = 0; i < 4; i++) order.push((await manager.acquire()).url);

    expect(order).toEqual(['http://b', 'http://c', 'http://a', 'http://b']);
    expect(manager.primary.url).toBe('http://a');
  });

  it('should count failures and replace the client on the third', async () => {
    const { manager, created } = setup(['http://a', 'http://b'], new Set(['http://a']));
    const resets: string[] = [];
    manager.onClientReset((url) => resets.push(url));

    await manager.checkHealth();
    await manager.checkHealth();
    expect(manager.getStatus()[0]).toEqual({ url: 'http://a', healthy: true, latencyMs: -1, failCount: 2 });

    await manager.checkHealth();

    expect(resets).toEqual(['http://a']);
    expect(created.filter((c) => c.url === 'http://a').map((c) => c.generation)).toEqual([0, 1]);
    expect(created[0]?.destroyed).toBe(true);
    expect(manager.getStatus()[0]).toMatchObject({ healthy: true, failCount: 0 });
  });

  it('should route around an endpoint that keeps failing after its reset', async () => {
    const { manager } = setup(['http://a', 'http://b'], new Set(['http://a']));
    for (let i = 0; i < 6; i++) await manager.checkHealth();

    expect(manager.getStatus()[0]).toMatchObject({ healthy: false, failCount: 3 });
    expect((await manager.acquire()).url).toBe('http://b');
    expect((await manager.acquire()).url).toBe('http://b');
  });

  it('should keep a reset callback error from stopping the check', async () => {
    const { manager } = setup(['http://a'], new Set(['http://a']));
    manager.onClientReset(() => {
      throw new Error('listener bug');
    });

    for (let i = 0; i < 3; i++) await manager.checkHealth();

    expect(manager.getStatus()[0]?.failCount).toBe(0);
  });

  it('should destroy every client', () => {
    const { manager, created } = setup(['http://a', 'http://b']);

    manager.destroy();

    expect(created.every((c) => c.destroyed)).toBe(true);
  });

  it('should refuse to hand out a client without endpoints', async () => {
    const { manager } = setup([]);

    await expect(manager.acquire()).rejects.toThrow('RpcManager has no endpoints');
  });
});

describe('maskUrl', () => {
  it('should hide API keys in paths and query strings', () => {
    expect(maskUrl('https://eth.example.com/v2/0123456789abcdef0123?apikey=test-secret')).toBe(
      'https://eth.example.com/v2/***?apikey=***',
    );
    expect(maskUrl('http://127.0.0.1:8545')).toBe('http://127.0.0.1:8545');
  });
});
