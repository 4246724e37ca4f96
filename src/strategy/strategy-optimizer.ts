import { setImmediate as yieldToLoop } from 'node:timers/promises';
import { logger } from '../utils/logger.js';
import { BotError } from '../errors.js';
import { LockRank, RankedMutex } from '../utils/lock.js';
import { Heartbeat } from '../utils/health-check.js';
import { mulberry32 } from '../utils/random.js';
import { clamp, shortenAddress, toGwei } from '../utils/helpers.js';
import { isAtLeast, type GasOptimizer } from '../execution/gas-optimizer.js';
import { generateScenarios, simulateScenario, type MonteCarloParams } from './monte-carlo.js';
import { competitorDistribution, nashGasMultiplier } from './nash-gas.js';
import { rankProfitAlternatives, type HeldPositionContext } from './profit-decision.js';
import type { Supervised } from '../core/supervisor.js';
import type { ProfitAlternative, RiskTolerance, SimulationResult, StrategyAction } from '../types.js';

/** Minimum success probability a scenario needs at each tolerance. */
export const SUCCESS_THRESHOLD: Readonly<Record<RiskTolerance, number>> = {
  VeryLow: 0.9,
  Low: 0.8,
  Medium: 0.7,
  High: 0.6,
  VeryHigh: 0.5,
};

export interface StrategyRequest {
  token: string;
  action: StrategyAction;
  /** 0..1 */
  aiConfidence: number;
  /** Victim value for front-run/sandwich; intended spend for a buy. */
  baseAmountNative: number;
  competitors: number;
}

export interface OptimizedStrategy {
  token: string;
  action: StrategyAction;
  best: SimulationResult;
  /** Scenario multiplier scaled by congestion, never above the boost cap. */
  gasMultiplier: number;
  amountNative: number;
  usePrivateRelay: boolean;
  /** True when no scenario met the success threshold. */
  fallback: boolean;
  evaluated: number;
}

export interface StrategyOptimizerOptions {
  riskTolerance: RiskTolerance;
  maxGasBoostPercent: number;
  nativeUsd: number;
  relayAvailable: boolean;
  monteCarlo: MonteCarloParams;
  seed?: number;
  lockTimeoutMs?: number;
  clock?: () => number;
}

/**
 * Survivors of the tolerance filter ranked by expected profit weighted by
 * AI confidence; with no survivors, the highest success probability wins.
 */
export function selectBest(
  results: readonly SimulationResult[],
  tolerance: RiskTolerance,
  aiConfidence: number,
): { result: SimulationResult; fallback: boolean } | null {
  const tau = SUCCESS_THRESHOLD[tolerance];
  const weight = 1 + 0.2 * clamp(aiConfidence, 0, 1);

  let best: SimulationResult | null = null;
  for (const r of results) {
    if (r.successProbability < tau) continue;
    if (!best || r.expectedProfitUsd * weight > best.expectedProfitUsd * weight) best = r;
  }
  if (best) return { result: best, fallback: false };

  for (const r of results) {
    if (!best || r.successProbability > best.successProbability) best = r;
  }
  return best ? { result: best, fallback: true } : null;
}

export class StrategyOptimizer implements Supervised {
  readonly name = 'strategy-optimizer';
  private readonly lock: RankedMutex;
  private readonly heartbeat: Heartbeat;
  private readonly seed: number;
  private riskTolerance: RiskTolerance;
  private runs = 0;
  private lastBest: OptimizedStrategy | null = null;

  constructor(
    private readonly gas: Pick<GasOptimizer, 'congestion' | 'congestionScore' | 'congestionMultiplier' | 'referenceGasPrice'>,
    private readonly opts: StrategyOptimizerOptions,
  ) {
    this.lock = new RankedMutex(this.name, LockRank.StrategyOptimizer, opts.lockTimeoutMs);
    this.heartbeat = new Heartbeat(opts.clock);
    this.seed = opts.seed ?? Date.now();
    this.riskTolerance = opts.riskTolerance;
  }

  get gasCap(): number {
    return 1 + this.opts.maxGasBoostPercent / 100;
  }

  get tolerance(): RiskTolerance {
    return this.riskTolerance;
  }

  get lastResult(): OptimizedStrategy | null {
    return this.lastBest;
  }

  async setRiskTolerance(tolerance: RiskTolerance): Promise<void> {
    await this.lock.runExclusive(() => {
      this.riskTolerance = tolerance;
    });
  }

  /**
   * Simulates every scenario of the grid and returns the selected one.
   * The loop yields to the event loop between scenarios so the detection
   * and submission tasks keep running during a batch.
   */
  async optimize(req: StrategyRequest): Promise<OptimizedStrategy> {
    const congestion = this.gas.congestion();
    const scenarios = generateScenarios(req.action, {
      maxGasBoostPercent: this.opts.maxGasBoostPercent,
      congestedEnoughForRelay: isAtLeast(congestion, 'High'),
      relayAvailable: this.opts.relayAvailable,
    });
    if (scenarios.length === 0 || req.baseAmountNative <= 0) {
      throw new BotError('SimulationInfeasible', `no scenario to evaluate for ${shortenAddress(req.token)}`);
    }

    const ctx = {
      congestionScore: this.gas.congestionScore(),
      competitors: req.competitors,
      referenceGasGwei: toGwei(this.gas.referenceGasPrice()),
      nativeUsd: this.opts.nativeUsd,
      baseAmountNative: req.baseAmountNative,
    };
    const rng = mulberry32(this.seed + this.runs);

    const results: SimulationResult[] = [];
    for (const scenario of scenarios) {
      results.push(simulateScenario(scenario, ctx, this.opts.monteCarlo, rng));
      await yieldToLoop();
    }

    const tolerance = this.riskTolerance;
    const picked = selectBest(results, tolerance, req.aiConfidence);
    if (!picked) {
      throw new BotError('SimulationInfeasible', `no scenario result for ${shortenAddress(req.token)}`);
    }

    const { scenario } = picked.result;
    const strategy: OptimizedStrategy = {
      token: req.token,
      action: req.action,
      best: picked.result,
      gasMultiplier: Math.min(this.gasCap, scenario.gasMultiplier * this.gas.congestionMultiplier()),
      amountNative: req.baseAmountNative * scenario.amountFraction,
      usePrivateRelay: scenario.usePrivateRelay,
      fallback: picked.fallback,
      evaluated: results.length,
    };

    await this.lock.runExclusive(() => {
      this.runs++;
      this.lastBest = strategy;
      this.heartbeat.touch();
    });

    logger.debug(`[strategy] ${req.action} ${shortenAddress(req.token)}: ${results.length} scenarios`, {
      gasMultiplier: strategy.gasMultiplier.toFixed(3),
      amountFraction: scenario.amountFraction,
      relay: scenario.usePrivateRelay,
      successProbability: picked.result.successProbability.toFixed(3),
      expectedProfitUsd: picked.result.expectedProfitUsd.toFixed(2),
      fallback: picked.fallback,
      tolerance,
    });
    return strategy;
  }

  /** Best-response multiplier against the competitor bids seen for a token. */
  nashMultiplier(competitorGasPrices: readonly bigint[]): number {
    const dist = competitorDistribution(competitorGasPrices, this.gas.referenceGasPrice());
    return nashGasMultiplier(dist, this.gas.congestionScore(), this.gasCap);
  }

  profitAlternatives(ctx: HeldPositionContext): ProfitAlternative[] {
    return rankProfitAlternatives(ctx);
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
