import { truncatedNormal, type Rng } from '../utils/random.js';
import { AMOUNT_FRACTIONS, DEX_FEE, GAS_MULTIPLIERS } from '../constants.js';
import type { SimulationResult, StrategyAction, StrategyScenario } from '../types.js';

export interface MonteCarloParams {
  trials: number;
  competitionStd: number;
  impactMean: number;
  impactStd: number;
  gasLimit: number;
}

export interface MarketContext {
  /** 0..10, from the gas optimizer. */
  congestionScore: number;
  /** Searchers seen competing for the same flow. */
  competitors: number;
  referenceGasGwei: number;
  nativeUsd: number;
  /** Victim value for front-run/sandwich; intended spend for a plain buy. */
  baseAmountNative: number;
}

/** Relay bundles skip the public auction, so most of the competition never sees them. */
const RELAY_COMPETITION_FACTOR = 0.3;

/** Transactions we pay gas for when the action lands. */
const LEGS: Record<StrategyAction, number> = { buy: 1, frontrun: 2, sandwich: 2 };

// ─── Scenario grid ───────────────────────────────────────────────────

/**
 * Cartesian grid of gas multipliers, amount fractions and relay use. Relay
 * variants exist only at High congestion or above and when a relay is
 * configured; multipliers over the boost cap are pruned.
 */
export function generateScenarios(
  action: StrategyAction,
  opts: { maxGasBoostPercent: number; congestedEnoughForRelay: boolean; relayAvailable: boolean },
): StrategyScenario[] {
  const cap = 1 + opts.maxGasBoostPercent / 100;
  const relayOptions = opts.congestedEnoughForRelay && opts.relayAvailable ? [false, true] : [false];
  const scenarios: StrategyScenario[] = [];

  for (const gasMultiplier of GAS_MULTIPLIERS) {
    if (gasMultiplier > cap) continue;
    for (const amountFraction of AMOUNT_FRACTIONS) {
      for (const usePrivateRelay of relayOptions) {
        scenarios.push({ action, amountFraction, gasMultiplier, usePrivateRelay });
      }
    }
  }
  return scenarios;
}

// ─── Simulation ──────────────────────────────────────────────────────

/** Monotonic in the multiplier: 0.5 at 1.0×, saturating at 0.99. */
export function inclusionBase(gasMultiplier: number): number {
  return Math.min(0.99, 0.5 + (gasMultiplier - 1) * 1.2);
}

/**
 * One trial per iteration: inclusion ahead of the victim is
 * `base(g) × (1 − congestion/2) × (1 − competition)`, with competition and
 * price impact drawn from truncated normals.
 */
export function simulateScenario(
  scenario: StrategyScenario,
  ctx: MarketContext,
  params: MonteCarloParams,
  rng: Rng,
): SimulationResult {
  const congestion = Math.min(1, Math.max(0, ctx.congestionScore / 10));
  const competitionMean = Math.min(1, ctx.competitors * 0.1);
  const amount = ctx.baseAmountNative * scenario.amountFraction;
  const legs = LEGS[scenario.action];
  const feeCost = 2 * DEX_FEE * amount;
  const gasMean = ctx.referenceGasGwei * scenario.gasMultiplier;

  let successes = 0;
  let total = 0;
  let worst = Number.POSITIVE_INFINITY;
  let best = Number.NEGATIVE_INFINITY;

  for (let i = 0; i < params.trials; i++) {
    let competition = truncatedNormal(rng, competitionMean, params.competitionStd, 0, 0.95);
    if (scenario.usePrivateRelay) competition *= RELAY_COMPETITION_FACTOR;

    const p = inclusionBase(scenario.gasMultiplier) * (1 - congestion / 2) * (1 - competition);
    const impact = truncatedNormal(rng, params.impactMean, params.impactStd, 0, 0.5);
    const gasGwei = truncatedNormal(rng, gasMean, gasMean * 0.1, gasMean * 0.8, gasMean * 1.5);
    const gasCost = gasGwei * 1e-9 * params.gasLimit * legs;

    let pnl: number;
    if (rng() < p) {
      successes++;
      pnl = amount * impact - feeCost - gasCost;
    } else {
      // A bundle that misses is never mined and costs nothing.
      pnl = scenario.usePrivateRelay ? 0 : -gasCost - feeCost;
    }

    const pnlUsd = pnl * ctx.nativeUsd;
    total += pnlUsd;
    if (pnlUsd < worst) worst = pnlUsd;
    if (pnlUsd > best) best = pnlUsd;
  }

  const n = Math.max(1, params.trials);
  return {
    scenario,
    successProbability: successes / n,
    expectedProfitUsd: total / n,
    worstCaseUsd: Number.isFinite(worst) ? worst : 0,
    bestCaseUsd: Number.isFinite(best) ? best : 0,
    simulatedTxCount: params.trials * legs,
  };
}
