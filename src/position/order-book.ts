import { logger } from '../utils/logger.js';
import { addrKey, generateId, shortenAddress } from '../utils/helpers.js';
import { advanceTrailingStop, trailingStopPrice } from './stop-loss.js';
import { isExpired, limitOrderReached } from './take-profit.js';
import type { AutoSandwichConfig, DcaPlan, LimitOrder, OrderSide, TrailingStop } from '../types.js';

export type OrderTrigger =
  | { kind: 'limit'; order: LimitOrder }
  | { kind: 'trailing'; stop: TrailingStop };

export interface OrderBookState {
  limits: LimitOrder[];
  trailing: TrailingStop[];
  dca: DcaPlan[];
  autoSandwich: AutoSandwichConfig[];
}

/**
 * Limit orders, trailing stops, DCA plans and auto-sandwich settings.
 * Like the position book it relies on the trade manager's lock.
 */
export class OrderBook {
  private readonly limits = new Map<string, LimitOrder>();
  private readonly trailing = new Map<string, TrailingStop>();
  private readonly dca = new Map<string, DcaPlan>();
  private readonly autoSandwich = new Map<string, AutoSandwichConfig>();

  constructor(seed?: OrderBookState) {
    for (const o of seed?.limits ?? []) if (o.status === 'Active') this.limits.set(o.id, { ...o });
    for (const s of seed?.trailing ?? []) if (s.status === 'Active') this.trailing.set(s.id, { ...s });
    for (const d of seed?.dca ?? []) if (d.status === 'Active') this.dca.set(d.id, { ...d });
    for (const a of seed?.autoSandwich ?? []) this.autoSandwich.set(addrKey(a.token), { ...a });
  }

  // ─── Registration ──────────────────────────────────────────────────

  addLimit(input: {
    token: string;
    side: OrderSide;
    targetPrice: number;
    percent: number;
    amountNative: number;
    expiresAt: number | null;
    now: number;
  }): LimitOrder {
    const order: LimitOrder = {
      id: generateId('limit'),
      token: input.token,
      side: input.side,
      targetPrice: input.targetPrice,
      percent: input.percent,
      amountNative: input.amountNative,
      expiresAt: input.expiresAt,
      status: 'Active',
      createdAt: input.now,
    };
    this.limits.set(order.id, order);
    logger.info(`[orders] Limit ${order.side} ${shortenAddress(order.token)} @ ${order.targetPrice} (${order.id})`);
    return { ...order };
  }

  addTrailing(input: {
    token: string;
    trailPct: number;
    percent: number;
    currentPrice: number;
    expiresAt: number | null;
    now: number;
  }): TrailingStop {
    const stop: TrailingStop = {
      id: generateId('trail'),
      token: input.token,
      trailPct: input.trailPct,
      percent: input.percent,
      highestPrice: input.currentPrice,
      stopPrice: trailingStopPrice(input.currentPrice, input.trailPct),
      expiresAt: input.expiresAt,
      status: 'Active',
      createdAt: input.now,
    };
    this.trailing.set(stop.id, stop);
    logger.info(`[orders] Trailing stop ${shortenAddress(stop.token)} ${stop.trailPct}% (${stop.id})`);
    return { ...stop };
  }

  addDca(input: { token: string; totalNative: number; intervals: number; intervalMs: number; now: number }): DcaPlan {
    const plan: DcaPlan = {
      id: generateId('dca'),
      token: input.token,
      totalNative: input.totalNative,
      intervals: input.intervals,
      intervalMs: input.intervalMs,
      executed: 0,
      nextAt: input.now,
      status: 'Active',
      createdAt: input.now,
    };
    this.dca.set(plan.id, plan);
    logger.info(`[orders] DCA ${shortenAddress(plan.token)} ${plan.intervals}×${(plan.totalNative / plan.intervals).toFixed(6)} (${plan.id})`);
    return { ...plan };
  }

  setAutoSandwich(config: AutoSandwichConfig): void {
    this.autoSandwich.set(addrKey(config.token), { ...config });
  }

  cancel(id: string): boolean {
    for (const map of [this.limits, this.trailing, this.dca]) {
      const entry = map.get(id);
      if (entry) {
        entry.status = 'Cancelled';
        map.delete(id);
        return true;
      }
    }
    return false;
  }

  // ─── Evaluation ────────────────────────────────────────────────────

  /**
   * Applies one price tick for a token. Triggered orders are marked Filled
   * and removed; expired ones are dropped.
   */
  evaluate(token: string, price: number, now: number): OrderTrigger[] {
    const key = addrKey(token);
    const triggers: OrderTrigger[] = [];

    for (const [id, order] of this.limits) {
      if (addrKey(order.token) !== key) continue;
      if (isExpired(order, now)) {
        order.status = 'Expired';
        this.limits.delete(id);
        continue;
      }
      if (limitOrderReached(order, price)) {
        order.status = 'Filled';
        this.limits.delete(id);
        triggers.push({ kind: 'limit', order: { ...order } });
      }
    }

    for (const [id, stop] of this.trailing) {
      if (addrKey(stop.token) !== key) continue;
      if (isExpired(stop, now)) {
        stop.status = 'Expired';
        this.trailing.delete(id);
        continue;
      }
      if (advanceTrailingStop(stop, price)) {
        stop.status = 'Filled';
        this.trailing.delete(id);
        triggers.push({ kind: 'trailing', stop: { ...stop } });
      }
    }
    return triggers;
  }

  /** Plans with a child buy due; each returned plan has been advanced past that slot. */
  takeDueDca(now: number): Array<{ plan: DcaPlan; amountNative: number }> {
    const due: Array<{ plan: DcaPlan; amountNative: number }> = [];
    for (const [id, plan] of this.dca) {
      if (plan.nextAt > now) continue;
      plan.executed++;
      plan.nextAt = now + plan.intervalMs;
      if (plan.executed >= plan.intervals) {
        plan.status = 'Filled';
        this.dca.delete(id);
      }
      due.push({ plan: { ...plan }, amountNative: plan.totalNative / plan.intervals });
    }
    return due;
  }

  /** Claims one auto-sandwich slot for a token, if enabled and not exhausted. */
  claimAutoSandwich(token: string, victimUsd: number, now: number): AutoSandwichConfig | null {
    const key = addrKey(token);
    const config = this.autoSandwich.get(key);
    if (!config) return null;
    if (now >= config.deadline || config.executed >= config.maxBuys) {
      this.autoSandwich.delete(key);
      return null;
    }
    if (victimUsd < config.minVictimUsd) return null;
    config.executed++;
    return { ...config };
  }

  hasOrdersFor(token: string): boolean {
    const key = addrKey(token);
    for (const o of this.limits.values()) if (addrKey(o.token) === key) return true;
    for (const s of this.trailing.values()) if (addrKey(s.token) === key) return true;
    return false;
  }

  exportState(): OrderBookState {
    return {
      limits: [...this.limits.values()].map((o) => ({ ...o })),
      trailing: [...this.trailing.values()].map((s) => ({ ...s })),
      dca: [...this.dca.values()].map((d) => ({ ...d })),
      autoSandwich: [...this.autoSandwich.values()].map((a) => ({ ...a })),
    };
  }
}
