export type CompetitorStrategy = 'Conservative' | 'Moderate' | 'Aggressive' | 'VeryAggressive';

export type StrategyDistribution = Record<CompetitorStrategy, number>;

export const STRATEGY_MULTIPLIER: Readonly<Record<CompetitorStrategy, number>> = {
  Conservative: 1.05,
  Moderate: 1.2,
  Aggressive: 1.4,
  VeryAggressive: 1.6,
};

/** Buckets a competitor by how far above the baseline it bids. */
export function classifyCompetitor(gasPrice: bigint, baseline: bigint): CompetitorStrategy {
  if (baseline <= 0n) return 'Moderate';
  const ratio = Number((gasPrice * 10_000n) / baseline) / 10_000;
  if (ratio < 1.1) return 'Conservative';
  if (ratio < 1.3) return 'Moderate';
  if (ratio < 1.6) return 'Aggressive';
  return 'VeryAggressive';
}

/** Empirical share of each strategy among observed competitor bids. */
export function competitorDistribution(gasPrices: readonly bigint[], baseline: bigint): StrategyDistribution {
  const dist: StrategyDistribution = { Conservative: 0, Moderate: 0, Aggressive: 0, VeryAggressive: 0 };
  if (gasPrices.length === 0) return dist;
  for (const g of gasPrices) dist[classifyCompetitor(g, baseline)]++;
  for (const k of Object.keys(dist)) {
    if (k === 'Conservative' || k === 'Moderate' || k === 'Aggressive' || k === 'VeryAggressive') {
      dist[k] /= gasPrices.length;
    }
  }
  return dist;
}

/**
 * Best response to the observed field:
 *   ≥ 70% Aggressive or above → VeryAggressive + 10%
 *   ≥ 60% Conservative        → Moderate + 0.05
 *   otherwise                 → Aggressive
 * then scaled by `1 + (congestion − 5)/50` and capped.
 */
export function nashGasMultiplier(dist: StrategyDistribution, congestionScore: number, cap: number): number {
  let multiplier: number;
  if (dist.Aggressive + dist.VeryAggressive >= 0.7) {
    multiplier = STRATEGY_MULTIPLIER.VeryAggressive * 1.1;
  } else if (dist.Conservative >= 0.6) {
    multiplier = STRATEGY_MULTIPLIER.Moderate + 0.05;
  } else {
    multiplier = STRATEGY_MULTIPLIER.Aggressive;
  }
  return Math.min(cap, multiplier * (1 + (congestionScore - 5) / 50));
}
