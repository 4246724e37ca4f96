import type { Position, TrailingStop } from '../types.js';
import { logger } from '../utils/logger.js';

export interface StopLossAction {
  shouldSell: boolean;
  reason: 'hard_stop' | 'none';
  currentPnlPct: number;
}

export function pnlPct(position: Position): number {
  if (position.entryPrice <= 0) return 0;
  return ((position.currentPrice - position.entryPrice) / position.entryPrice) * 100;
}

/** Fixed stop below entry. A stop of 0 disables it. */
export function evaluateStopLoss(position: Position, stopLossPct: number): StopLossAction {
  const current = pnlPct(position);
  if (stopLossPct <= 0 || position.entryPrice <= 0 || position.currentPrice <= 0 || position.amount === 0n) {
    return { shouldSell: false, reason: 'none', currentPnlPct: current };
  }
  if (current <= -stopLossPct) {
    logger.info(`[sl] HARD STOP triggered: ${current.toFixed(1)}% <= -${stopLossPct}%`);
    return { shouldSell: true, reason: 'hard_stop', currentPnlPct: current };
  }
  return { shouldSell: false, reason: 'none', currentPnlPct: current };
}

export function trailingStopPrice(highest: number, trailPct: number): number {
  return highest * (1 - trailPct / 100);
}

/**
 * Ratchets the high-water mark and the stop price, then reports whether
 * the current price has fallen to the stop. Mutates `stop`.
 */
export function advanceTrailingStop(stop: TrailingStop, price: number): boolean {
  if (price <= 0) return false;
  if (price > stop.highestPrice) {
    stop.highestPrice = price;
    stop.stopPrice = trailingStopPrice(price, stop.trailPct);
  }
  if (price <= stop.stopPrice) {
    const drop = ((stop.highestPrice - price) / stop.highestPrice) * 100;
    logger.info(`[sl] TRAILING STOP triggered: ${drop.toFixed(1)}% below peak (trail ${stop.trailPct}%)`);
    return true;
  }
  return false;
}
