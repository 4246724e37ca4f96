import { logger } from '../utils/logger.js';
import { addrKey, formatPct, shortenAddress, tokenUnitsToNumber } from '../utils/helpers.js';
import { pnlPct } from './stop-loss.js';
import type { Position } from '../types.js';

export interface BuyFill {
  token: string;
  chainId: number;
  symbol: string;
  decimals: number;
  amount: bigint;
  costNative: number;
  timestamp: number;
}

export interface SellFill {
  token: string;
  amount: bigint;
  proceedsNative: number;
  timestamp: number;
}

/**
 * Open positions keyed by token. Not synchronised on its own: the trade
 * manager only touches it inside its own critical sections.
 */
export class PositionBook {
  private readonly positions = new Map<string, Position>();

  constructor(seed: readonly Position[] = []) {
    for (const p of seed) {
      if (p.amount > 0n) this.positions.set(addrKey(p.token), { ...p });
    }
  }

  get(token: string): Position | undefined {
    return this.positions.get(addrKey(token));
  }

  list(): Position[] {
    return [...this.positions.values()];
  }

  get size(): number {
    return this.positions.size;
  }

  /** Adds to an existing position at a blended entry price, or opens one. Returns true when opened. */
  recordBuy(fill: BuyFill): { position: Position; opened: boolean } {
    const key = addrKey(fill.token);
    const existing = this.positions.get(key);
    const units = tokenUnitsToNumber(fill.amount, fill.decimals);
    const fillPrice = units > 0 ? fill.costNative / units : 0;

    if (existing) {
      existing.amount += fill.amount;
      existing.costBasisNative += fill.costNative;
      const totalUnits = tokenUnitsToNumber(existing.amount, existing.decimals);
      existing.entryPrice = totalUnits > 0 ? existing.costBasisNative / totalUnits : existing.entryPrice;
      existing.updatedAt = fill.timestamp;
      this.revalue(existing);
      return { position: { ...existing }, opened: false };
    }

    const position: Position = {
      token: fill.token,
      chainId: fill.chainId,
      symbol: fill.symbol,
      decimals: fill.decimals,
      amount: fill.amount,
      costBasisNative: fill.costNative,
      entryPrice: fillPrice,
      currentPrice: fillPrice,
      highestPrice: fillPrice,
      realizedPnlNative: 0,
      unrealizedPnlNative: 0,
      boughtAt: fill.timestamp,
      updatedAt: fill.timestamp,
    };
    this.positions.set(key, position);
    logger.info(`[positions] Opened ${position.symbol} ${shortenAddress(position.token)} cost=${fill.costNative.toFixed(6)}`);
    return { position: { ...position }, opened: true };
  }

  /**
   * Reduces the position by the sold amount, realising PnL against the
   * proportional cost basis. Returns the snapshot and whether it closed.
   */
  recordSell(fill: SellFill): { position: Position; closed: boolean } | null {
    const key = addrKey(fill.token);
    const p = this.positions.get(key);
    if (!p) return null;

    const sold = fill.amount > p.amount ? p.amount : fill.amount;
    const fraction = p.amount > 0n ? Number((sold * 1_000_000n) / p.amount) / 1_000_000 : 1;
    const costSold = p.costBasisNative * fraction;

    p.amount -= sold;
    p.costBasisNative -= costSold;
    p.realizedPnlNative += fill.proceedsNative - costSold;
    p.updatedAt = fill.timestamp;
    this.revalue(p);

    const snapshot = { ...p };
    if (p.amount === 0n) {
      this.positions.delete(key);
      logger.info(`[positions] Closed ${p.symbol} realised=${p.realizedPnlNative.toFixed(6)}`);
      return { position: snapshot, closed: true };
    }
    return { position: snapshot, closed: false };
  }

  markPrice(token: string, price: number, timestamp: number): Position | null {
    const p = this.positions.get(addrKey(token));
    if (!p || price <= 0) return null;
    p.currentPrice = price;
    if (price > p.highestPrice) p.highestPrice = price;
    p.updatedAt = timestamp;
    this.revalue(p);
    return { ...p };
  }

  /** Drops a position whose tokens are gone from the wallet. */
  remove(token: string): boolean {
    return this.positions.delete(addrKey(token));
  }

  describe(token: string): string {
    const p = this.get(token);
    if (!p) return `${shortenAddress(token)}: no position`;
    return `${p.symbol} ${formatPct(pnlPct(p))} unrealised=${p.unrealizedPnlNative.toFixed(6)}`;
  }

  private revalue(p: Position): void {
    const units = tokenUnitsToNumber(p.amount, p.decimals);
    p.unrealizedPnlNative = units * p.currentPrice - p.costBasisNative;
  }
}
