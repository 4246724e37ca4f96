import { logger } from '../utils/logger.js';
import { LockRank, RankedMutex } from '../utils/lock.js';
import { Heartbeat } from '../utils/health-check.js';
import { addrKey, clamp, shortenAddress, withTimeout } from '../utils/helpers.js';
import { BotError, errorMessage } from '../errors.js';
import { MemoryCache, type Cache } from '../data/cache.js';
import { NEUTRAL_PREDICTION, type Prediction, type Predictor } from './predictor.js';
import type { Supervised } from '../core/supervisor.js';
import type {
  AIDecision,
  AIFeatures,
  MempoolMetrics,
  SandwichOpportunity,
  TokenRiskAnalysis,
  TokenStatus,
} from '../types.js';

/** Where the coordinator reads its inputs from. Each lookup may fail or return null. */
export interface FeatureSources {
  metrics(token: string): Promise<MempoolMetrics | null>;
  status(token: string): Promise<TokenStatus | null>;
  risk(token: string): Promise<TokenRiskAnalysis | null>;
  bestSandwich(token: string): Promise<SandwichOpportunity | null>;
  holding(token: string): boolean;
}

export interface AICoordinatorOptions {
  autoTradeEnabled: boolean;
  threshold: number;
  cacheTtlMs: number;
  predictorTimeoutMs: number;
  /** Bound on each feature lookup. */
  featureTimeoutMs?: number;
  cache?: Cache<AIDecision>;
  lockTimeoutMs?: number;
  clock?: () => number;
}

const CACHE_PREFIX = 'ai:decision:';
const ACTIONS: ReadonlySet<string> = new Set(['buy', 'sell', 'sandwich', 'frontrun', 'monitor', 'avoid']);

/** Shape check for decisions read back from a shared cache. */
export function isAIDecision(v: unknown): v is AIDecision {
  if (typeof v !== 'object' || v === null) return false;
  const d: Record<string, unknown> = Object.fromEntries(Object.entries(v));
  return (
    typeof d.token === 'string' &&
    typeof d.action === 'string' &&
    ACTIONS.has(d.action) &&
    typeof d.confidence === 'number' &&
    typeof d.reasoning === 'string' &&
    typeof d.timestamp === 'number'
  );
}

export class AICoordinator implements Supervised {
  readonly name = 'ai-coordinator';
  private readonly lock: RankedMutex;
  private readonly heartbeat: Heartbeat;
  private readonly clock: () => number;
  private readonly cache: Cache<AIDecision>;
  private readonly latest = new Map<string, AIDecision>();
  private autoTrade: boolean;
  private threshold: number;

  constructor(
    private readonly predictor: Predictor,
    private readonly sources: FeatureSources,
    private readonly opts: AICoordinatorOptions,
    seed: readonly AIDecision[] = [],
  ) {
    this.clock = opts.clock ?? Date.now;
    this.lock = new RankedMutex(this.name, LockRank.AICoordinator, opts.lockTimeoutMs);
    this.heartbeat = new Heartbeat(this.clock);
    this.cache = opts.cache ?? new MemoryCache<AIDecision>({ max: 1_000, clock: this.clock });
    this.autoTrade = opts.autoTradeEnabled;
    this.threshold = opts.threshold;
    for (const d of seed) this.latest.set(addrKey(d.token), d);
  }

  get confidenceThreshold(): number {
    return this.threshold;
  }

  get autoTradeEnabled(): boolean {
    return this.autoTrade;
  }

  async setThreshold(value: number): Promise<void> {
    await this.lock.runExclusive(() => {
      this.threshold = clamp(value, 0, 1);
    });
  }

  async setAutoTrade(enabled: boolean): Promise<void> {
    await this.lock.runExclusive(() => {
      this.autoTrade = enabled;
    });
  }

  /**
   * Cached decision for a token when younger than the cache TTL, otherwise a
   * fresh prediction. `fresh` skips the cache lookup.
   */
  async decide(token: string, fresh = false): Promise<AIDecision> {
    const key = CACHE_PREFIX + addrKey(token);
    if (!fresh) {
      const cached = await this.cache.get(key);
      if (cached && this.clock() - cached.timestamp < this.opts.cacheTtlMs) return cached;
    }

    const features = await this.gather(token);
    const prediction = await this.predict(features);
    const decision: AIDecision = {
      token,
      action: prediction.action,
      confidence: clamp(prediction.confidence, 0, 1),
      reasoning: prediction.reasoning,
      timestamp: this.clock(),
    };

    await this.cache.set(key, decision, this.opts.cacheTtlMs);
    await this.lock.runExclusive(() => {
      this.latest.set(addrKey(token), decision);
      this.heartbeat.touch();
    });
    logger.debug(`[ai] ${shortenAddress(token)} → ${decision.action} (${decision.confidence.toFixed(2)}): ${decision.reasoning}`);
    return decision;
  }

  /** Decisions for the given tokens, most confident first. Tokens whose lookup fails are skipped. */
  async recommendations(tokens: readonly string[]): Promise<AIDecision[]> {
    const out: AIDecision[] = [];
    for (const token of tokens) {
      try {
        out.push(await this.decide(token));
      } catch (err) {
        logger.warn(`[ai] Decision for ${shortenAddress(token)} failed: ${errorMessage(err)}`);
      }
    }
    return out.sort((a, b) => b.confidence - a.confidence);
  }

  shouldAutoTrade(decision: AIDecision): boolean {
    return this.autoTrade && decision.confidence >= this.threshold;
  }

  async invalidate(token: string): Promise<void> {
    await this.cache.delete(CACHE_PREFIX + addrKey(token));
  }

  lastDecision(token: string): AIDecision | undefined {
    return this.latest.get(addrKey(token));
  }

  /** Last decision per token, for rebuilding after a swap. */
  exportState(): AIDecision[] {
    return [...this.latest.values()];
  }

  lastSuccessTs(): number {
    return this.heartbeat.lastSuccessTs;
  }

  async probe(timeoutMs: number): Promise<boolean> {
    const ok = await this.lock.probe(timeoutMs);
    if (ok) this.heartbeat.touch();
    return ok;
  }

  // ─── Internals ─────────────────────────────────────────────────────

  private async predict(features: AIFeatures): Promise<Prediction> {
    try {
      return await withTimeout(
        this.predictor.predict(features),
        this.opts.predictorTimeoutMs,
        `${this.predictor.name} predictor`,
      );
    } catch (err) {
      if (err instanceof BotError && err.kind === 'Timeout') {
        logger.warn(`[ai] ${err.message}, falling back to monitor`);
        return { ...NEUTRAL_PREDICTION, reasoning: 'predictor timed out' };
      }
      logger.warn(`[ai] Predictor failed for ${shortenAddress(features.token)}: ${errorMessage(err)}`);
      return { ...NEUTRAL_PREDICTION, reasoning: `predictor error: ${errorMessage(err)}` };
    }
  }

  private async gather(token: string): Promise<AIFeatures> {
    const timeoutMs = this.opts.featureTimeoutMs ?? 2_000;
    const [metrics, status, risk, bestSandwich] = await Promise.all([
      this.lookup('metrics', () => this.sources.metrics(token), timeoutMs),
      this.lookup('status', () => this.sources.status(token), timeoutMs),
      this.lookup('risk', () => this.sources.risk(token), timeoutMs),
      this.lookup('sandwich', () => this.sources.bestSandwich(token), timeoutMs),
    ]);
    return { token, metrics, status, risk, bestSandwich, holding: this.sources.holding(token) };
  }

  private async lookup<T>(label: string, fn: () => Promise<T | null>, timeoutMs: number): Promise<T | null> {
    try {
      return await withTimeout(fn(), timeoutMs, `ai ${label} lookup`);
    } catch (err) {
      logger.debug(`[ai] ${label} unavailable: ${errorMessage(err)}`);
      return null;
    }
  }
}
