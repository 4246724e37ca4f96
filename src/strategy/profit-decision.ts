import { clamp } from '../utils/helpers.js';
import type { ProfitAlternative, ProfitDecision } from '../types.js';

const HOUR_S = 3_600;
const DAY_S = 86_400;

export interface HeldPositionContext {
  /** Unrealised profit on the position, in native units. */
  currentProfitNative: number;
  currentPrice: number;
  holdingSeconds: number;
  /** Relative price volatility, 0..1. */
  volatility: number;
  /** Mempool buy-side share of volume, 0..1. */
  buyPressure: number;
  pendingBuyCount: number;
  /** Pending buys large enough to sandwich. */
  potentialVictims: number;
  /** Expected take per victim, in native units. */
  profitPerVictimNative: number;
  sandwichBots: number;
  /** 0..10. */
  congestionScore: number;
  /** 0..100, higher is safer (100 − risk score). */
  tokenScore: number;
  uptrend: boolean;
  now: number;
}

/** Grows with holding time so stale positions lean towards an exit. */
export function timeFactor(holdingSeconds: number): number {
  if (holdingSeconds < HOUR_S) return 0.8;
  if (holdingSeconds < DAY_S) return 1.0;
  if (holdingSeconds < 3 * DAY_S) return 1.2;
  return 1.5;
}

export function scoreAlternative(
  expectedProfitNative: number,
  successProbability: number,
  risk: number,
  horizonSeconds: number,
  holdingSeconds: number,
): number {
  return (
    (expectedProfitNative * successProbability * (1 - risk / 2) * timeFactor(holdingSeconds)) /
    (1 + horizonSeconds / DAY_S)
  );
}

/**
 * Ranked exit alternatives for a held position, best first.
 * TakeProfitNow is always present; the others appear when their
 * preconditions hold.
 */
export function rankProfitAlternatives(ctx: HeldPositionContext): ProfitAlternative[] {
  const out: ProfitAlternative[] = [];
  const add = (
    decision: ProfitDecision,
    expectedProfitNative: number,
    successProbability: number,
    risk: number,
    horizonSeconds: number,
  ): void => {
    out.push({
      decision,
      expectedProfitNative,
      successProbability,
      risk,
      horizonSeconds,
      score: scoreAlternative(expectedProfitNative, successProbability, risk, horizonSeconds, ctx.holdingSeconds),
    });
  };

  add({ kind: 'TakeProfitNow' }, ctx.currentProfitNative, 1, 0, 0);

  const holdHorizon = 4 * HOUR_S;
  add(
    { kind: 'HoldForPriceTarget', targetPrice: ctx.currentPrice * 1.1, deadline: ctx.now + holdHorizon * 1000 },
    ctx.currentProfitNative * 1.1,
    clamp(0.3 + 0.4 * ctx.buyPressure - 0.2 * ctx.volatility, 0.05, 0.95),
    ctx.volatility * 0.5,
    holdHorizon,
  );

  if (ctx.pendingBuyCount > 0 && ctx.holdingSeconds < DAY_S) {
    const horizon = 12 * HOUR_S;
    const share = 1 / (1 + ctx.sandwichBots);
    add(
      { kind: 'ContinueSandwich', maxBuys: ctx.potentialVictims, deadline: ctx.now + horizon * 1000 },
      ctx.currentProfitNative + ctx.potentialVictims * ctx.profitPerVictimNative * share,
      clamp(0.7 - 0.1 * ctx.sandwichBots - 0.03 * ctx.congestionScore, 0.1, 0.9),
      ctx.volatility * 0.8 + ctx.sandwichBots * 0.05,
      horizon,
    );
  }

  if (ctx.tokenScore > 70 && ctx.uptrend) {
    const horizon = 72 * HOUR_S;
    add(
      { kind: 'DCABuy', pct: 50, intervals: 3, windowMs: horizon * 1000 },
      ctx.currentProfitNative * 1.5,
      0.65,
      ctx.volatility * 1.2,
      horizon,
    );
  }

  return out.sort((a, b) => b.score - a.score);
}
