/**
 * Token bucket for RPC calls, one per endpoint.
 */
export class RateLimiter {
  private tokens: number;
  private lastRefill: number;

  constructor(
    private readonly maxTokens: number = 25,
    private readonly refillRate: number = 25, // tokens per second
    private readonly clock: () => number = Date.now,
  ) {
    this.tokens = maxTokens;
    this.lastRefill = clock();
  }

  private refill(): void {
    const now = this.clock();
    const elapsed = (now - this.lastRefill) / 1000;
    this.tokens = Math.min(this.maxTokens, this.tokens + elapsed * this.refillRate);
    this.lastRefill = now;
  }

  /** Waits until `count` tokens are available. */
  async acquire(count = 1): Promise<void> {
    if (this.tryAcquire(count)) return;

    const deficit = count - this.tokens;
    const waitMs = (deficit / this.refillRate) * 1000;
    await new Promise((r) => setTimeout(r, waitMs));
    this.tokens = 0;
    this.lastRefill = this.clock();
  }

  /** Takes tokens only if they are there right now. */
  tryAcquire(count = 1): boolean {
    this.refill();
    if (this.tokens < count) return false;
    this.tokens -= count;
    return true;
  }

  get available(): number {
    this.refill();
    return Math.floor(this.tokens);
  }
}
