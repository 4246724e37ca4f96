import type { AIAction, AIFeatures } from '../types.js';

export interface Prediction {
  action: AIAction;
  confidence: number;
  reasoning: string;
}

/** Anything that turns a token's gathered features into a suggested action. */
export interface Predictor {
  readonly name: string;
  predict(features: AIFeatures): Promise<Prediction>;
}

export const NEUTRAL_PREDICTION: Prediction = {
  action: 'monitor',
  confidence: 0,
  reasoning: 'no prediction available',
};

export interface HeuristicThresholds {
  /** Buy-side share of pending volume that counts as strong demand. */
  buyPressure: number;
  sellPressure: number;
  /** Minimum projected sandwich profit worth suggesting. */
  minSandwichUsd: number;
  minLiquidityUsd: number;
}

export const DEFAULT_HEURISTIC_THRESHOLDS: HeuristicThresholds = {
  buyPressure: 0.7,
  sellPressure: 0.65,
  minSandwichUsd: 20,
  minLiquidityUsd: 10_000,
};

/**
 * Rule-based predictor used when no model is plugged in. Rules are checked
 * in order and the first that applies wins.
 */
export class HeuristicPredictor implements Predictor {
  readonly name = 'heuristic';

  constructor(private readonly thresholds: HeuristicThresholds = DEFAULT_HEURISTIC_THRESHOLDS) {}

  async predict(f: AIFeatures): Promise<Prediction> {
    const t = this.thresholds;

    if (f.risk?.isHoneypot) {
      return { action: 'avoid', confidence: 0.95, reasoning: 'honeypot detected' };
    }
    if (f.status?.safetyLevel === 'Red') {
      return { action: 'avoid', confidence: 0.9, reasoning: 'token classified Red' };
    }
    if (!f.status || !f.metrics) {
      return { action: 'monitor', confidence: 0.3, reasoning: 'insufficient data' };
    }

    const { status, metrics } = f;

    if (f.holding && metrics.sellPressure >= t.sellPressure) {
      return {
        action: 'sell',
        confidence: Math.min(0.95, 0.5 + (metrics.sellPressure - t.sellPressure)),
        reasoning: `sell pressure ${(metrics.sellPressure * 100).toFixed(0)}% on held token`,
      };
    }

    const opp = f.bestSandwich;
    if (opp && opp.potentialProfitUsd >= t.minSandwichUsd && status.liquidityUsd >= t.minLiquidityUsd) {
      const edge = Math.min(1, opp.potentialProfitUsd / (t.minSandwichUsd * 10));
      return {
        action: 'sandwich',
        confidence: Math.min(0.95, 0.6 + 0.3 * edge),
        reasoning: `victim ${opp.victim.hash.slice(0, 10)} worth ~$${opp.potentialProfitUsd.toFixed(0)}`,
      };
    }

    if (
      !f.holding &&
      status.safetyLevel === 'Green' &&
      metrics.buyPressure >= t.buyPressure &&
      status.liquidityUsd >= t.minLiquidityUsd
    ) {
      const largeBuyBoost = Math.min(0.15, metrics.largeBuys * 0.05);
      return {
        action: 'buy',
        confidence: Math.min(0.95, 0.55 + (metrics.buyPressure - t.buyPressure) + largeBuyBoost),
        reasoning: `buy pressure ${(metrics.buyPressure * 100).toFixed(0)}%, ${metrics.largeBuys} large buys`,
      };
    }

    return { action: 'monitor', confidence: 0.5, reasoning: 'no actionable signal' };
  }
}
