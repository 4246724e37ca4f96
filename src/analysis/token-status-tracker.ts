import { logger } from '../utils/logger.js';
import { BotError, errorMessage, toBotError } from '../errors.js';
import { LockRank, RankedMutex, Semaphore } from '../utils/lock.js';
import { Heartbeat } from '../utils/health-check.js';
import { addrKey, isValidAddress, shortenAddress, tokenUnitsToNumber, weiToNative, withTimeout } from '../utils/helpers.js';
import type { Supervised } from '../core/supervisor.js';
import type { ChainAdapter } from '../core/chain-adapter.js';
import type { RiskAnalyzer } from './risk-analyzer.js';
import type { SafetyLevel, TokenPriceAlert, TokenRiskAnalysis, TokenStatus } from '../types.js';

// ─── Classification ──────────────────────────────────────────────────

export interface LiquidityThresholds {
  minLiquidityUsd: number;
  cautionLiquidityUsd: number;
}

export const RED_SCORE = 75;
export const YELLOW_SCORE = 35;

type ClassifiedStatus = Pick<TokenStatus, 'isVerified' | 'dangerousFunctions' | 'tax' | 'liquidityUsd'>;
type ClassifiedRisk = Pick<TokenRiskAnalysis, 'score' | 'isVerified' | 'dangerousFunctions' | 'tax'>;

/** First matching rule wins. Pure: same inputs, same level. */
export function classify(
  status: ClassifiedStatus,
  risk: ClassifiedRisk | null,
  thresholds: LiquidityThresholds,
): SafetyLevel {
  const verified = risk ? risk.isVerified : status.isVerified;
  const dangerous = risk ? risk.dangerousFunctions : status.dangerousFunctions;
  const tax = risk?.tax ?? status.tax;
  const buyTax = tax?.buyTax ?? 0;
  const sellTax = tax?.sellTax ?? 0;
  const score = risk?.score ?? 0;

  if (!verified || dangerous.length > 0) return 'Red';
  if (buyTax > 20 || sellTax > 20) return 'Red';
  if (status.liquidityUsd < thresholds.minLiquidityUsd || score >= RED_SCORE) return 'Red';
  if (buyTax > 10 || sellTax > 10 || score >= YELLOW_SCORE || status.liquidityUsd < thresholds.cautionLiquidityUsd) {
    return 'Yellow';
  }
  return 'Green';
}

// ─── Tracker ─────────────────────────────────────────────────────────

export interface TokenActivity {
  pendingCount: number;
  volumeUsd: number;
}

export interface TokenStatusTrackerDeps {
  adapter: Pick<ChainAdapter, 'chain' | 'getPair' | 'getReserves' | 'getTokenInfo'>;
  risk: Pick<RiskAnalyzer, 'analyze'>;
  activityOf?: (token: string) => Promise<TokenActivity | null>;
  holderCount?: (token: string) => Promise<number | null>;
}

export interface TokenStatusTrackerOptions extends LiquidityThresholds {
  capacity: number;
  staleAfterMs: number;
  refreshConcurrency: number;
  refreshTimeoutMs: number;
  priceAlertPercent: number;
  lockTimeoutMs?: number;
  clock?: () => number;
}

export interface TrackerState {
  statuses: TokenStatus[];
  risks: TokenRiskAnalysis[];
}

interface PricePoint {
  ts: number;
  price: number;
}

interface Entry {
  status: TokenStatus;
  risk: TokenRiskAnalysis | null;
  history: PricePoint[];
}

interface MarketSnapshot {
  symbol: string;
  decimals: number;
  pair: string | null;
  liquidityNative: number;
  priceNative: number;
}

const DAY_MS = 24 * 60 * 60_000;
const MAX_HISTORY = 288;

/**
 * Materialised view of observed tokens, bounded by capacity (oldest by
 * `lastUpdated` goes first) and by staleness. Chain reads happen outside
 * the lock; only the merge runs under it.
 */
export class TokenStatusTracker implements Supervised {
  readonly name = 'token-status-tracker';
  private readonly lock: RankedMutex;
  private readonly heartbeat: Heartbeat;
  private readonly clock: () => number;
  private readonly semaphore: Semaphore;
  private readonly pending = new Map<string, Promise<TokenPriceAlert | null>>();
  private readonly entries = new Map<string, Entry>();
  private readonly alertCallbacks: Array<(alert: TokenPriceAlert) => void> = [];

  constructor(
    private readonly deps: TokenStatusTrackerDeps,
    private readonly opts: TokenStatusTrackerOptions,
    seed?: TrackerState,
  ) {
    this.clock = opts.clock ?? Date.now;
    this.lock = new RankedMutex(this.name, LockRank.TokenStatusTracker, opts.lockTimeoutMs);
    this.heartbeat = new Heartbeat(this.clock);
    this.semaphore = new Semaphore(opts.refreshConcurrency);

    if (seed) {
      const risks = new Map(seed.risks.map((r) => [addrKey(r.token), r]));
      for (const status of seed.statuses) {
        const key = addrKey(status.address);
        this.entries.set(key, { status: { ...status }, risk: risks.get(key) ?? null, history: [] });
      }
    }
  }

  onPriceAlert(cb: (alert: TokenPriceAlert) => void): void {
    this.alertCallbacks.push(cb);
  }

  /** Starts tracking `token`. Returns false when it was already tracked. */
  async add(token: string): Promise<boolean> {
    if (!isValidAddress(token)) throw new BotError('InvalidInput', `not an address: ${token}`);
    const key = addrKey(token);

    return this.lock.runExclusive(() => {
      this.heartbeat.touch();
      if (this.entries.has(key)) return false;
      this.entries.set(key, { status: this.placeholder(token), risk: null, history: [] });
      this.evictOverCapacity();
      logger.debug(`[tracker] Tracking ${shortenAddress(token)} (${this.entries.size}/${this.opts.capacity})`);
      return true;
    });
  }

  async get(token: string): Promise<TokenStatus | null> {
    return this.lock.read(() => {
      this.heartbeat.touch();
      const entry = this.entries.get(addrKey(token));
      return entry ? { ...entry.status } : null;
    });
  }

  async riskOf(token: string): Promise<TokenRiskAnalysis | null> {
    return this.lock.read(() => {
      this.heartbeat.touch();
      return this.entries.get(addrKey(token))?.risk ?? null;
    });
  }

  async remove(token: string): Promise<boolean> {
    return this.lock.runExclusive(() => {
      this.heartbeat.touch();
      return this.entries.delete(addrKey(token));
    });
  }

  /**
   * Refreshes one token: market data, risk and activity, then the safety
   * level. Returns a price alert when the move crosses the alert threshold.
   */
  async refresh(token: string): Promise<TokenPriceAlert | null> {
    try {
      return await this.load(token);
    } catch (err) {
      await this.recordFailure(addrKey(token), err);
      throw toBotError(err, `refresh ${shortenAddress(token)}`);
    }
  }

  private async load(token: string): Promise<TokenPriceAlert | null> {
    const key = addrKey(token);
    const [market, risk, activity, holders] = await Promise.all([
      this.market(token),
      this.deps.risk.analyze(token),
      this.deps.activityOf?.(token) ?? Promise.resolve(null),
      this.deps.holderCount?.(token) ?? Promise.resolve(null),
    ]);

    const alert = await this.lock.runExclusive(() => {
      const entry = this.entries.get(key);
      if (!entry) return null;
      const now = this.clock();
      const nativeUsd = this.deps.adapter.chain.nativeUsd;
      const s = entry.status;
      const oldPrice = s.priceNative;

      s.symbol = market.symbol;
      s.decimals = market.decimals;
      s.pairAddress = market.pair;
      s.liquidityNative = market.liquidityNative;
      s.liquidityUsd = market.liquidityNative * nativeUsd;
      s.priceNative = market.priceNative;
      s.priceUsd = market.priceNative * nativeUsd;
      s.tax = risk.tax;
      s.dangerousFunctions = [...risk.dangerousFunctions];
      s.isVerified = risk.isVerified;
      s.riskScore = risk.score;
      if (activity) {
        s.pendingTxCount = activity.pendingCount;
        s.volume24h = activity.volumeUsd;
      }
      if (holders !== null) s.holderCount = holders;

      entry.history.push({ ts: now, price: market.priceNative });
      while (entry.history.length > MAX_HISTORY || (entry.history[0] && now - entry.history[0].ts > DAY_MS)) {
        entry.history.shift();
      }
      const dayAgo = entry.history[0]?.price ?? market.priceNative;
      s.change24hPct = dayAgo > 0 ? ((market.priceNative - dayAgo) / dayAgo) * 100 : 0;

      entry.risk = risk;
      s.safetyLevel = classify(s, risk, this.opts);
      s.lastUpdated = now;
      s.consecutiveFailures = 0;
      this.heartbeat.touch();
      return this.priceAlert(s, oldPrice, now);
    });

    if (alert) this.emitAlert(alert);
    return alert;
  }

  /**
   * Sweeps stale entries, then refreshes the rest with bounded parallelism
   * and a per-token timeout. Failures are counted once, never evicted.
   *
   * A refresh that outlives its timeout keeps its permit until it settles,
   * and its token is skipped by later sweeps until then.
   */
  async updateAll(): Promise<TokenPriceAlert[]> {
    await this.sweepStale();
    const alerts: TokenPriceAlert[] = [];

    await Promise.all(
      this.tokens().map(async (token) => {
        const key = addrKey(token);
        if (this.pending.has(key)) {
          logger.debug(`[tracker] Refresh ${shortenAddress(token)} still running, skipped`);
          return;
        }
        const job = this.semaphore.use(() => this.load(token)).finally(() => this.pending.delete(key));
        this.pending.set(key, job);
        try {
          const alert = await withTimeout(job, this.opts.refreshTimeoutMs, `refresh ${shortenAddress(token)}`);
          if (alert) alerts.push(alert);
        } catch (err) {
          await this.recordFailure(key, err);
          logger.warn(`[tracker] Refresh ${shortenAddress(token)} failed: ${errorMessage(err)}`);
        }
      }),
    );
    return alerts;
  }

  /** Refreshes started by a sweep that have not settled yet. */
  get refreshesPending(): number {
    return this.pending.size;
  }

  /** Evicts entries not updated within the staleness bound. Returns how many went. */
  async sweepStale(): Promise<number> {
    return this.lock.runExclusive(() => {
      const cutoff = this.clock() - this.opts.staleAfterMs;
      let removed = 0;
      for (const [key, entry] of this.entries) {
        if (entry.status.lastUpdated < cutoff) {
          this.entries.delete(key);
          removed++;
        }
      }
      if (removed > 0) logger.info(`[tracker] Swept ${removed} stale token(s)`);
      this.heartbeat.touch();
      return removed;
    });
  }

  /** Cache-pressure sweep: drops oldest-by-lastUpdated down to `target` entries. */
  async trim(target: number): Promise<number> {
    return this.lock.runExclusive(() => {
      const removed = this.evictOldest(this.entries.size - target);
      this.heartbeat.touch();
      return removed;
    });
  }

  // ─── Lock-free views ────────────────────────────────────────────────

  tokens(): string[] {
    return [...this.entries.values()].map((e) => e.status.address);
  }

  /** Unlocked snapshot read, for synchronous callers such as impact estimates. */
  peek(token: string): TokenStatus | null {
    const entry = this.entries.get(addrKey(token));
    return entry ? { ...entry.status } : null;
  }

  get size(): number {
    return this.entries.size;
  }

  exportState(): TrackerState {
    const statuses: TokenStatus[] = [];
    const risks: TokenRiskAnalysis[] = [];
    for (const entry of this.entries.values()) {
      statuses.push({ ...entry.status });
      if (entry.risk) risks.push(entry.risk);
    }
    return { statuses, risks };
  }

  lastSuccessTs(): number {
    return this.heartbeat.lastSuccessTs;
  }

  async probe(timeoutMs: number): Promise<boolean> {
    const ok = await this.lock.probe(timeoutMs);
    if (ok) this.heartbeat.touch();
    return ok;
  }

  // ─── Internals ──────────────────────────────────────────────────────

  private placeholder(token: string): TokenStatus {
    return {
      address: token,
      chainId: this.deps.adapter.chain.id,
      symbol: '',
      decimals: 18,
      pairAddress: null,
      routerAddress: this.deps.adapter.chain.router,
      liquidityNative: 0,
      liquidityUsd: 0,
      priceNative: 0,
      priceUsd: 0,
      volume24h: 0,
      change24hPct: 0,
      holderCount: 0,
      pendingTxCount: 0,
      // Unclassified tokens are not tradable.
      safetyLevel: 'Red',
      tax: null,
      dangerousFunctions: [],
      isVerified: false,
      riskScore: null,
      lastUpdated: this.clock(),
      consecutiveFailures: 0,
    };
  }

  private async market(token: string): Promise<MarketSnapshot> {
    const { adapter } = this.deps;
    const wrapped = adapter.chain.wrappedNative;
    const [info, pair] = await Promise.all([adapter.getTokenInfo(token), adapter.getPair(token, wrapped)]);
    if (!pair) {
      return { symbol: info.symbol, decimals: info.decimals, pair: null, liquidityNative: 0, priceNative: 0 };
    }

    const reserves = await adapter.getReserves(pair);
    if (!reserves) {
      return { symbol: info.symbol, decimals: info.decimals, pair, liquidityNative: 0, priceNative: 0 };
    }
    const tokenIsZero = addrKey(reserves.token0) === addrKey(token);
    const tokenReserve = tokenUnitsToNumber(tokenIsZero ? reserves.reserve0 : reserves.reserve1, info.decimals);
    const nativeReserve = weiToNative(tokenIsZero ? reserves.reserve1 : reserves.reserve0);

    return {
      symbol: info.symbol,
      decimals: info.decimals,
      pair,
      // Both sides of the pool, valued in native.
      liquidityNative: nativeReserve * 2,
      priceNative: tokenReserve > 0 ? nativeReserve / tokenReserve : 0,
    };
  }

  private priceAlert(s: TokenStatus, oldPrice: number, now: number): TokenPriceAlert | null {
    if (oldPrice <= 0 || s.priceNative <= 0) return null;
    const changePct = ((s.priceNative - oldPrice) / oldPrice) * 100;
    if (Math.abs(changePct) < this.opts.priceAlertPercent) return null;
    return {
      token: s.address,
      symbol: s.symbol,
      oldPrice,
      newPrice: s.priceNative,
      changePct,
      direction: changePct > 0 ? 'up' : 'down',
      timestamp: now,
    };
  }

  private emitAlert(alert: TokenPriceAlert): void {
    for (const cb of this.alertCallbacks) {
      try {
        cb(alert);
      } catch (err) {
        logger.error(`[tracker] Price-alert callback failed: ${errorMessage(err)}`);
      }
    }
  }

  private async recordFailure(key: string, err: unknown): Promise<void> {
    try {
      await this.lock.runExclusive(() => {
        const entry = this.entries.get(key);
        if (entry) entry.status.consecutiveFailures++;
      });
    } catch (lockErr) {
      logger.warn(`[tracker] Could not record failure for ${key} (${errorMessage(err)}): ${errorMessage(lockErr)}`);
    }
  }

  private evictOverCapacity(): void {
    this.evictOldest(this.entries.size - this.opts.capacity);
  }

  private evictOldest(count: number): number {
    let removed = 0;
    while (removed < count && this.entries.size > 0) {
      let oldestKey: string | null = null;
      let oldestTs = Infinity;
      for (const [key, entry] of this.entries) {
        if (entry.status.lastUpdated < oldestTs) {
          oldestTs = entry.status.lastUpdated;
          oldestKey = key;
        }
      }
      if (oldestKey === null) break;
      this.entries.delete(oldestKey);
      removed++;
    }
    return removed;
  }
}
