import type { TradeRecord } from './database.js';

export interface TradeAnalytics {
  totalTrades: number;
  successfulTrades: number;
  failedTrades: number;
  successRate: number;
  sandwiches: number;
  sandwichWins: number;
  emergencyExits: number;
  totalSandwichProfitNative: number;
  totalSandwichProfitUsd: number;
  largestWinUsd: number;
  largestLossUsd: number;
  profitFactor: number;
  failuresByKind: Record<string, number>;
}

/** Aggregates trade history, optionally restricted to records at or after `since`. */
export function summarizeTrades(records: readonly TradeRecord[], since = 0): TradeAnalytics {
  let total = 0;
  let ok = 0;
  let sandwiches = 0;
  let sandwichWins = 0;
  let emergency = 0;
  let profitNative = 0;
  let profitUsd = 0;
  let largestWin = 0;
  let largestLoss = 0;
  let grossProfit = 0;
  let grossLoss = 0;
  const failuresByKind: Record<string, number> = {};

  for (const rec of records) {
    const r = rec.result;
    if (r.timestamp < since) continue;
    total++;
    if (r.success) ok++;
    else {
      const kind = r.errorKind ?? 'Unknown';
      failuresByKind[kind] = (failuresByKind[kind] ?? 0) + 1;
    }

    if (rec.kind !== 'sandwich') continue;
    const s = rec.result;
    sandwiches++;
    if (s.emergency) emergency++;
    if (s.success && s.profitUsd > 0) sandwichWins++;
    profitNative += s.profitNative;
    profitUsd += s.profitUsd;
    if (s.profitUsd > largestWin) largestWin = s.profitUsd;
    if (s.profitUsd < largestLoss) largestLoss = s.profitUsd;
    if (s.profitUsd > 0) grossProfit += s.profitUsd;
    else grossLoss += -s.profitUsd;
  }

  return {
    totalTrades: total,
    successfulTrades: ok,
    failedTrades: total - ok,
    successRate: total > 0 ? ok / total : 0,
    sandwiches,
    sandwichWins,
    emergencyExits: emergency,
    totalSandwichProfitNative: profitNative,
    totalSandwichProfitUsd: profitUsd,
    largestWinUsd: largestWin,
    largestLossUsd: largestLoss,
    profitFactor: grossLoss > 0 ? grossProfit / grossLoss : grossProfit > 0 ? Infinity : 0,
    failuresByKind,
  };
}
