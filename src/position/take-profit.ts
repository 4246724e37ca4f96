import { pctOf } from '../utils/helpers.js';
import type { LimitOrder } from '../types.js';

/**
 * Limit fill rule: `side × (current − target) ≥ 0`, where a sell counts
 * +1 (fills at or above target) and a buy −1 (at or below).
 */
export function limitOrderReached(order: Pick<LimitOrder, 'side' | 'targetPrice'>, currentPrice: number): boolean {
  if (currentPrice <= 0) return false;
  const side = order.side === 'sell' ? 1 : -1;
  return side * (currentPrice - order.targetPrice) >= 0;
}

export function isExpired(order: { expiresAt: number | null }, now: number): boolean {
  return order.expiresAt !== null && now >= order.expiresAt;
}

/** Token amount for a percentage of a holding. */
export function calculateSellAmount(totalTokens: bigint, sellPct: number): bigint {
  if (sellPct >= 100) return totalTokens;
  return pctOf(totalTokens, sellPct);
}
