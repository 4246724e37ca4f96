import { FetchRequest, JsonRpcProvider } from 'ethers';
import { logger } from '../utils/logger.js';
import { RateLimiter } from '../utils/rate-limiter.js';
import { errorMessage } from '../errors.js';

/** What the manager needs from a client to health-check and retire it. */
export interface RpcClient {
  getBlockNumber(): Promise<number>;
  destroy(): void;
}

interface RpcEndpoint<P extends RpcClient> {
  url: string;
  client: P;
  limiter: RateLimiter;
  healthy: boolean;
  latencyMs: number;
  failCount: number;
  lastCheck: number;
  lastReset: number;
}

const FETCH_TIMEOUT_MS = 9_000;
const HEALTH_TIMEOUT_MS = 5_000;

/**
 * Several HTTP endpoints for one chain: round-robin over the healthy ones,
 * periodic health checks, and a fresh client after repeated failures.
 */
export class RpcManager<P extends RpcClient> {
  private endpoints: RpcEndpoint<P>[] = [];
  private currentIndex = 0;
  private healthCheckInterval?: ReturnType<typeof setInterval>;
  private resetCallbacks: Array<(url: string) => void> = [];
  private isChecking = false;

  constructor(
    urls: string[],
    private readonly createClient: (url: string) => P,
    rateLimit = 25,
  ) {
    for (const url of urls) {
      this.endpoints.push({
        url,
        client: createClient(url),
        limiter: new RateLimiter(rateLimit, rateLimit),
        healthy: true,
        latencyMs: 0,
        failCount: 0,
        lastCheck: 0,
        lastReset: 0,
      });
    }
  }

  /** ethers providers pinned to `chainId` so construction does no network detection. */
  static forUrls(urls: string[], chainId: number, rateLimit = 25): RpcManager<JsonRpcProvider> {
    return new RpcManager(
      urls,
      (url) => {
        const req = new FetchRequest(url);
        req.timeout = FETCH_TIMEOUT_MS;
        return new JsonRpcProvider(req, chainId, { staticNetwork: true });
      },
      rateLimit,
    );
  }

  onClientReset(callback: (url: string) => void): void {
    this.resetCallbacks.push(callback);
  }

  get size(): number {
    return this.endpoints.length;
  }

  /** Next healthy client, after taking a rate-limit token on its endpoint. */
  async acquire(): Promise<P> {
    const ep = this.pick();
    await ep.limiter.acquire();
    return ep.client;
  }

  /** Primary client, used for long-lived subscriptions. */
  get primary(): P {
    return this.first().client;
  }

  startHealthChecks(intervalMs = 30_000): void {
    if (this.healthCheckInterval) return;
    this.healthCheckInterval = setInterval(() => {
      this.checkHealth().catch((err: unknown) => {
        logger.error(`[rpc] Health check crashed: ${errorMessage(err)}`);
      });
    }, intervalMs);
  }

  stopHealthChecks(): void {
    if (this.healthCheckInterval) {
      clearInterval(this.healthCheckInterval);
      this.healthCheckInterval = undefined;
    }
  }

  destroy(): void {
    this.stopHealthChecks();
    for (const ep of this.endpoints) ep.client.destroy();
  }

  async checkHealth(): Promise<void> {
    if (this.isChecking) {
      logger.debug('[rpc] Health check skipped (previous still running)');
      return;
    }
    this.isChecking = true;

    try {
      for (const ep of this.endpoints) {
        // Health pings never queue behind trading traffic
        if (!ep.limiter.tryAcquire()) continue;

        const start = Date.now();
        let timer: ReturnType<typeof setTimeout> | undefined;
        try {
          await Promise.race([
            ep.client.getBlockNumber(),
            new Promise<never>((_, reject) => {
              timer = setTimeout(() => reject(new Error('health check timeout')), HEALTH_TIMEOUT_MS);
            }),
          ]);
          ep.latencyMs = Date.now() - start;
          ep.healthy = true;
          ep.failCount = 0;
        } catch (err) {
          ep.failCount++;
          ep.latencyMs = -1;
          if (ep.failCount >= 2) {
            logger.error(`[rpc] Endpoint fail: ${hostOf(ep.url)} (${ep.failCount} consecutive, ${Date.now() - start}ms): ${errorMessage(err)}`);
          }
          if (ep.failCount >= 3) ep.healthy = false;
        } finally {
          clearTimeout(timer);
        }
        ep.lastCheck = Date.now();

        if (ep.failCount >= 3 && Date.now() - ep.lastReset >= 30_000) {
          this.resetEndpoint(ep);
        }
      }

      const healthyCount = this.endpoints.filter((e) => e.healthy).length;
      logger.debug(`[rpc] Health check: ${healthyCount}/${this.endpoints.length} healthy`);
    } finally {
      this.isChecking = false;
    }
  }

  getStatus(): Array<{ url: string; healthy: boolean; latencyMs: number; failCount: number }> {
    return this.endpoints.map((e) => ({
      url: maskUrl(e.url),
      healthy: e.healthy,
      latencyMs: e.latencyMs,
      failCount: e.failCount,
    }));
  }

  private pick(): RpcEndpoint<P> {
    const healthy = this.endpoints.filter((e) => e.healthy);
    if (healthy.length === 0) {
      logger.warn('[rpc] No healthy endpoints, using first');
      return this.first();
    }
    this.currentIndex = (this.currentIndex + 1) % healthy.length;
    return healthy[this.currentIndex] ?? this.first();
  }

  private first(): RpcEndpoint<P> {
    const ep = this.endpoints[0];
    if (!ep) throw new Error('RpcManager has no endpoints');
    return ep;
  }

  private resetEndpoint(ep: RpcEndpoint<P>): void {
    logger.warn(`[rpc] CONNECTION RESET: ${hostOf(ep.url)} after ${ep.failCount} consecutive fails`);
    ep.client.destroy();
    ep.client = this.createClient(ep.url);
    ep.lastReset = Date.now();
    ep.failCount = 0;
    ep.healthy = true;

    for (const cb of this.resetCallbacks) {
      try {
        cb(ep.url);
      } catch (err) {
        logger.error(`[rpc] Reset callback error: ${errorMessage(err)}`);
      }
    }
  }
}

function hostOf(url: string): string {
  try {
    return new URL(url).hostname;
  } catch {
    return url;
  }
}

export function maskUrl(url: string): string {
  return url
    .replace(/(api[-_]?key=)[\w-]+/i, '$1***')
    .replace(/\/v[23]\/[0-9a-f]{16,}/i, (m) => `${m.slice(0, 4)}***`);
}
