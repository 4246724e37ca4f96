import { logger } from '../utils/logger.js';
import { clamp } from '../utils/helpers.js';
import type { ErrorKind } from '../errors.js';

export interface TradeOutcome {
  success: boolean;
  kind: 'trade' | 'sandwich';
  errorKind?: ErrorKind;
  profitNative: number;
  /** Confidence of the AI signal that triggered the trade, when there was one. */
  aiConfidence?: number;
}

export interface TunableParams {
  gasBias: number;
  slippage: number;
  aiThreshold: number;
}

export interface AutoTunerOptions {
  minResults: number;
  maxHistory: number;
  /** Below this hit rate the confidence threshold is raised. */
  minAiAccuracy: number;
}

export const DEFAULT_TUNER_OPTIONS: AutoTunerOptions = {
  minResults: 10,
  maxHistory: 100,
  minAiAccuracy: 0.7,
};

const BOUNDS = {
  gasBias: [0.9, 1.3],
  slippage: [0.5, 5],
  aiThreshold: [0.5, 0.95],
} as const;

const GAS_FAILURES: ReadonlySet<ErrorKind> = new Set(['Underpriced', 'ReplacementUnderpriced', 'Timeout']);

/**
 * Next parameter set from the recorded outcomes. Gas-related failures push
 * the bias up, reverts widen slippage, and AI signals that lost money raise
 * the confidence threshold. A clean streak walks each one back slowly.
 */
export function tune(history: readonly TradeOutcome[], current: TunableParams, opts = DEFAULT_TUNER_OPTIONS): TunableParams {
  if (history.length < opts.minResults) return current;

  const n = history.length;
  const successRate = history.filter((o) => o.success).length / n;
  const gasFailures = history.filter((o) => !o.success && o.errorKind !== undefined && GAS_FAILURES.has(o.errorKind)).length;
  const reverts = history.filter((o) => !o.success && o.errorKind === 'ExecutionReverted').length;

  let { gasBias, slippage, aiThreshold } = current;

  if (gasFailures / n > 0.2) gasBias += 0.05;
  else if (successRate > 0.9 && gasFailures === 0) gasBias -= 0.02;

  if (reverts / n > 0.3) slippage += 0.5;
  else if (successRate > 0.9 && reverts === 0) slippage -= 0.1;

  const aiTrades = history.filter((o) => o.aiConfidence !== undefined);
  if (aiTrades.length >= opts.minResults) {
    const accuracy = aiTrades.filter((o) => o.success && o.profitNative > 0).length / aiTrades.length;
    if (accuracy < opts.minAiAccuracy) aiThreshold += 0.05;
    else if (accuracy > 0.85) aiThreshold -= 0.02;
  }

  return {
    gasBias: clamp(gasBias, BOUNDS.gasBias[0], BOUNDS.gasBias[1]),
    slippage: clamp(slippage, BOUNDS.slippage[0], BOUNDS.slippage[1]),
    aiThreshold: clamp(aiThreshold, BOUNDS.aiThreshold[0], BOUNDS.aiThreshold[1]),
  };
}

/** Rolling window of outcomes feeding `tune`. */
export class AutoTuner {
  private history: TradeOutcome[] = [];

  constructor(private readonly opts: AutoTunerOptions = DEFAULT_TUNER_OPTIONS) {}

  record(outcome: TradeOutcome): void {
    this.history.push(outcome);
    if (this.history.length > this.opts.maxHistory) {
      this.history.splice(0, this.history.length - this.opts.maxHistory);
    }
  }

  get size(): number {
    return this.history.length;
  }

  suggest(current: TunableParams): TunableParams {
    const next = tune(this.history, current, this.opts);
    if (next.gasBias !== current.gasBias || next.slippage !== current.slippage || next.aiThreshold !== current.aiThreshold) {
      logger.info('[tuning] Parameters adjusted', {
        gasBias: next.gasBias.toFixed(3),
        slippage: next.slippage.toFixed(2),
        aiThreshold: next.aiThreshold.toFixed(2),
        samples: this.history.length,
      });
    }
    return next;
  }
}
