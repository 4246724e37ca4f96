import { describe, it, expect } from 'vitest';
import { rankProfitAlternatives, timeFactor, type HeldPositionContext } from '../../src/strategy/profit-decision.js';
import { AutoTuner, tune, type TradeOutcome, type TunableParams } from '../../src/strategy/auto-tuning.js';

function held(overrides: Partial<HeldPositionContext> = {}): HeldPositionContext {
  return {
    currentProfitNative: 1,
    currentPrice: 0.001,
    holdingSeconds: 0,
    volatility: 0,
    buyPressure: 0,
    pendingBuyCount: 0,
    potentialVictims: 0,
    profitPerVictimNative: 0,
    sandwichBots: 0,
    congestionScore: 0,
    tokenScore: 50,
    uptrend: false,
    now: 1_000,
    ...overrides,
  };
}

describe('timeFactor', () => {
  it('should lean towards exiting the longer a position is held', () => {
    expect(timeFactor(3_599)).toBe(0.8);
    expect(timeFactor(3_600)).toBe(1.0);
    expect(timeFactor(86_400)).toBe(1.2);
    expect(timeFactor(259_200)).toBe(1.5);
  });
});

describe('rankProfitAlternatives', () => {
  it('should always offer taking profit now', () => {
    const ranked = rankProfitAlternatives(held());

    expect(ranked.map((a) => a.decision.kind)).toEqual(['TakeProfitNow', 'HoldForPriceTarget']);
    expect(ranked[0]?.score).toBeCloseTo(0.8, 10);
    const hold = ranked[1]?.decision;
    expect(hold?.kind === 'HoldForPriceTarget' && hold.targetPrice).toBeCloseTo(0.0011, 12);
    expect(hold?.kind === 'HoldForPriceTarget' && hold.deadline).toBe(1_000 + 4 * 3_600_000);
  });

  it('should rank continued sandwiching first when victims are queued', () => {
    const ranked = rankProfitAlternatives(
      held({ pendingBuyCount: 3, potentialVictims: 3, profitPerVictimNative: 0.5, tokenScore: 80, uptrend: true }),
    );

    expect(ranked.map((a) => a.decision.kind)).toEqual(['ContinueSandwich', 'TakeProfitNow', 'HoldForPriceTarget', 'DCABuy']);
    // (1 + 3 × 0.5) × 0.7 × 0.8 / 1.5
    expect(ranked[0]?.score).toBeCloseTo(0.9333333, 6);
    expect(ranked[0]?.decision).toEqual({ kind: 'ContinueSandwich', maxBuys: 3, deadline: 1_000 + 12 * 3_600_000 });
  });

  it('should stop offering sandwiches on positions held a day', () => {
    const ranked = rankProfitAlternatives(held({ pendingBuyCount: 3, potentialVictims: 3, holdingSeconds: 86_400 }));

    expect(ranked.some((a) => a.decision.kind === 'ContinueSandwich')).toBe(false);
  });
});

describe('tune', () => {
  const current: TunableParams = { gasBias: 1, slippage: 1, aiThreshold: 0.75 };
  const ok = (extra: Partial<TradeOutcome> = {}): TradeOutcome => ({ success: true, kind: 'trade', profitNative: 0.1, ...extra });
  const failed = (errorKind: TradeOutcome['errorKind']): TradeOutcome => ({ success: false, kind: 'trade', profitNative: 0, errorKind });

  it('should wait for enough results', () => {
    expect(tune([ok(), failed('Underpriced')], current)).toBe(current);
  });

  it('should raise the gas bias after underpriced failures', () => {
    const history = [...Array.from({ length: 7 }, () => ok()), failed('Underpriced'), failed('Timeout'), failed('Underpriced')];

    expect(tune(history, current)).toEqual({ gasBias: 1.05, slippage: 1, aiThreshold: 0.75 });
  });

  it('should widen slippage after reverts', () => {
    const history = [...Array.from({ length: 6 }, () => ok()), ...Array.from({ length: 4 }, () => failed('ExecutionReverted'))];

    expect(tune(history, current).slippage).toBe(1.5);
  });

  it('should walk everything back after a clean, accurate streak', () => {
    const history = Array.from({ length: 10 }, () => ok({ aiConfidence: 0.9 }));

    const next = tune(history, current);

    expect(next.gasBias).toBeCloseTo(0.98, 10);
    expect(next.slippage).toBeCloseTo(0.9, 10);
    expect(next.aiThreshold).toBeCloseTo(0.73, 10);
  });

  it('should raise the AI threshold when its signals lose money', () => {
    const history = Array.from({ length: 10 }, (_, i) => ok({ aiConfidence: 0.8, profitNative: i < 5 ? 0.1 : -0.1 }));

    expect(tune(history, current).aiThreshold).toBeCloseTo(0.8, 10);
  });

  it('should keep parameters inside their bounds', () => {
    const history = Array.from({ length: 10 }, () => failed('Underpriced'));

    expect(tune(history, { gasBias: 1.3, slippage: 5, aiThreshold: 0.95 }).gasBias).toBe(1.3);
  });
});

describe('AutoTuner', () => {
  it('should keep a bounded window', () => {
    const tuner = new AutoTuner({ minResults: 2, maxHistory: 3, minAiAccuracy: 0.7 });
    for (let i = 0; i < 5; i++) tuner.record({ success: false, kind: 'trade', profitNative: 0, errorKind: 'Underpriced' });

    expect(tuner.size).toBe(3);
    expect(tuner.suggest({ gasBias: 1, slippage: 1, aiThreshold: 0.75 }).gasBias).toBe(1.05);
  });
});
