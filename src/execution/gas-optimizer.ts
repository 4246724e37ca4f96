import { logger } from '../utils/logger.js';
import { LockRank, RankedMutex } from '../utils/lock.js';
import { Heartbeat } from '../utils/health-check.js';
import { clamp, gwei, minBigint, mulFactor, toGwei } from '../utils/helpers.js';
import type { Supervised } from '../core/supervisor.js';
import type { ChainAdapter } from '../core/chain-adapter.js';
import type { Congestion, GasSetting } from '../types.js';

export interface GasOptimizerOptions {
  eip1559: boolean;
  maxGasPriceGwei: number;
  priorityFeeGwei: number;
  priorityBoostPercent: number;
  sampleSize: number;
  /** Starting bias, for a rebuilt instance. */
  bias?: number;
  lockTimeoutMs?: number;
  clock?: () => number;
}

const LEVELS: readonly Congestion[] = ['Low', 'Medium', 'High', 'VeryHigh'];

const LEGACY_MULTIPLIER: Record<Congestion, number> = { Low: 1.05, Medium: 1.1, High: 1.2, VeryHigh: 1.3 };
const PRIORITY_BOOST: Record<Congestion, number> = { Low: 1.0, Medium: 1.2, High: 1.5, VeryHigh: 2.0 };
const BASE_FEE_MULTIPLIER: Record<Congestion, number> = { Low: 1.2, Medium: 1.3, High: 1.5, VeryHigh: 2.0 };
const CONGESTION_SCORE: Record<Congestion, number> = { Low: 2, Medium: 5, High: 7, VeryHigh: 9 };

/** Resubmission bumps: +20%, +50%, +100%, then +200%. */
const RETRY_BUMPS = [1.2, 1.5, 2.0, 3.0] as const;

// ─── Pure helpers ────────────────────────────────────────────────────

/** Nearest-rank percentile. */
export function percentile(samples: readonly number[], p: number): number {
  if (samples.length === 0) return 0;
  const sorted = [...samples].sort((a, b) => a - b);
  const rank = Math.ceil((p / 100) * sorted.length) - 1;
  return sorted[clamp(rank, 0, sorted.length - 1)] ?? 0;
}

function trendLevel(recent: readonly number[]): number {
  const first = recent[0];
  const last = recent[recent.length - 1];
  if (recent.length < 2 || first === undefined || last === undefined || first <= 0) return 0;

  const growthPct = ((last - first) / first) * 100;
  const mean = recent.reduce((s, x) => s + x, 0) / recent.length;
  const std = Math.sqrt(recent.reduce((s, x) => s + (x - mean) ** 2, 0) / recent.length);
  const variationPct = mean > 0 ? (std / mean) * 100 : 0;

  if (growthPct > 20 || variationPct > 30) return 3;
  if (growthPct > 10 || variationPct > 15) return 2;
  if (growthPct > 5 || variationPct > 5) return 1;
  return 0;
}

/**
 * Congestion label from the rolling sample (gwei, oldest first): latest
 * against p50, p90/p50 spread, and the trend over the last 10 samples.
 */
export function congestionFromSamples(samples: readonly number[]): Congestion {
  const latest = samples[samples.length - 1];
  if (samples.length < 2 || latest === undefined) return 'Low';

  const p50 = percentile(samples, 50);
  const p90 = percentile(samples, 90);
  const spread = p50 > 0 ? p90 / p50 : 1;
  const pressure = p50 > 0 ? latest / p50 : 1;

  let level = 0;
  if (pressure >= 1.5 || spread >= 2) level = 3;
  else if (pressure >= 1.25 || spread >= 1.5) level = 2;
  else if (pressure >= 1.1 || spread >= 1.2) level = 1;

  level = Math.max(level, trendLevel(samples.slice(-10)));
  return LEVELS[level] ?? 'Low';
}

export function congestionScore(c: Congestion): number {
  return CONGESTION_SCORE[c];
}

export function isAtLeast(c: Congestion, floor: Congestion): boolean {
  return LEVELS.indexOf(c) >= LEVELS.indexOf(floor);
}

// ─── Optimizer ───────────────────────────────────────────────────────

export interface GasSnapshot {
  p50Gwei: number;
  p90Gwei: number;
  latestGwei: number | null;
  baseFeeGwei: number | null;
  congestion: Congestion;
  samples: number;
}

/**
 * Fee recommendation from a rolling sample of observed gas prices. Every
 * price it hands out is capped at `maxGasPriceGwei`.
 */
export class GasOptimizer implements Supervised {
  readonly name = 'gas-optimizer';
  private readonly lock: RankedMutex;
  private readonly heartbeat: Heartbeat;
  private samples: number[] = [];
  private lastGasPrice: bigint | null = null;
  private baseFee: bigint | null = null;
  private bias: number;

  constructor(private readonly opts: GasOptimizerOptions) {
    this.bias = clamp(opts.bias ?? 1.0, 0.9, 1.3);
    this.lock = new RankedMutex(this.name, LockRank.GasOptimizer, opts.lockTimeoutMs);
    this.heartbeat = new Heartbeat(opts.clock);
  }

  get capWei(): bigint {
    return gwei(this.opts.maxGasPriceGwei);
  }

  /** Pulls gas price and base fee from the chain and records them. */
  async refresh(adapter: Pick<ChainAdapter, 'getGasPrice' | 'getBaseFee'>): Promise<void> {
    const [gasPrice, baseFee] = await Promise.all([adapter.getGasPrice(), adapter.getBaseFee()]);
    await this.record(gasPrice, baseFee);
  }

  async record(gasPrice: bigint, baseFee: bigint | null = this.baseFee): Promise<void> {
    await this.lock.runExclusive(() => {
      this.samples.push(toGwei(gasPrice));
      if (this.samples.length > this.opts.sampleSize) {
        this.samples.splice(0, this.samples.length - this.opts.sampleSize);
      }
      this.lastGasPrice = gasPrice;
      this.baseFee = baseFee;
      this.heartbeat.touch();
    });
  }

  /** Auto-tuning hook: scales every recommendation, bounded to [0.9, 1.3]. */
  async setBias(bias: number): Promise<void> {
    await this.lock.runExclusive(() => {
      this.bias = clamp(bias, 0.9, 1.3);
      logger.info(`[gas] Bias set to ${this.bias.toFixed(3)}`);
    });
  }

  get currentBias(): number {
    return this.bias;
  }

  get currentBaseFee(): bigint | null {
    return this.baseFee;
  }

  congestion(): Congestion {
    return congestionFromSamples(this.samples);
  }

  /** Congestion on a 0–10 scale. */
  congestionScore(): number {
    return congestionScore(this.congestion());
  }

  /** Factor `1 + (congestion − 5)/50` used to scale strategy gas. */
  congestionMultiplier(): number {
    return 1 + (this.congestionScore() - 5) / 50;
  }

  snapshot(): GasSnapshot {
    return {
      p50Gwei: percentile(this.samples, 50),
      p90Gwei: percentile(this.samples, 90),
      latestGwei: this.lastGasPrice === null ? null : toGwei(this.lastGasPrice),
      baseFeeGwei: this.baseFee === null ? null : toGwei(this.baseFee),
      congestion: this.congestion(),
      samples: this.samples.length,
    };
  }

  /** Reference gas price: the last observation, else the sample median. */
  referenceGasPrice(): bigint {
    if (this.lastGasPrice !== null) return this.lastGasPrice;
    const p50 = percentile(this.samples, 50);
    return p50 > 0 ? gwei(p50) : gwei(this.opts.priorityFeeGwei);
  }

  optimal(): GasSetting {
    const c = this.congestion();
    const cap = this.capWei;

    if (!this.opts.eip1559 || this.baseFee === null) {
      const price = mulFactor(this.referenceGasPrice(), LEGACY_MULTIPLIER[c] * this.bias);
      return { kind: 'legacy', gasPrice: minBigint(price, cap) };
    }

    const boost = Math.min(PRIORITY_BOOST[c], 1 + this.opts.priorityBoostPercent / 100);
    const priority = mulFactor(gwei(this.opts.priorityFeeGwei), boost * this.bias);
    const maxFee = minBigint(mulFactor(this.baseFee, BASE_FEE_MULTIPLIER[c]) + priority, cap);
    return {
      kind: 'eip1559',
      maxFeePerGas: maxFee,
      maxPriorityFeePerGas: minBigint(priority, maxFee),
    };
  }

  /** `base` scaled by `multiplier`, capped. Applies to either fee model. */
  scaled(base: GasSetting, multiplier: number): GasSetting {
    const cap = this.capWei;
    if (base.kind === 'legacy') {
      return { kind: 'legacy', gasPrice: minBigint(mulFactor(base.gasPrice, multiplier), cap) };
    }
    const maxFee = minBigint(mulFactor(base.maxFeePerGas, multiplier), cap);
    return {
      kind: 'eip1559',
      maxFeePerGas: maxFee,
      maxPriorityFeePerGas: minBigint(mulFactor(base.maxPriorityFeePerGas, multiplier), maxFee),
    };
  }

  /** Gas price for the `retry`-th generic resubmission (1-based). */
  bumpedGasPrice(base: bigint, retry: number): bigint {
    if (retry <= 0) return minBigint(base, this.capWei);
    const factor = RETRY_BUMPS[Math.min(retry, RETRY_BUMPS.length) - 1] ?? 1;
    return minBigint(mulFactor(base, factor), this.capWei);
  }

  /** `bumpedGasPrice` applied to every fee field of `base`. */
  bumpedGas(base: GasSetting, retry: number): GasSetting {
    if (base.kind === 'legacy') return { kind: 'legacy', gasPrice: this.bumpedGasPrice(base.gasPrice, retry) };
    const maxFee = this.bumpedGasPrice(base.maxFeePerGas, retry);
    return {
      kind: 'eip1559',
      maxFeePerGas: maxFee,
      maxPriorityFeePerGas: minBigint(this.bumpedGasPrice(base.maxPriorityFeePerGas, retry), maxFee),
    };
  }

  lastSuccessTs(): number {
    return this.heartbeat.lastSuccessTs;
  }

  async probe(timeoutMs: number): Promise<boolean> {
    const ok = await this.lock.probe(timeoutMs);
    if (ok) this.heartbeat.touch();
    return ok;
  }
}
