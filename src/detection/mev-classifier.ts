import { LRUCache } from 'lru-cache';
import { KNOWN_MEV_BOTS, MEV_HASH_CAPACITY, MEV_HASH_LOW_WATERMARK } from '../constants.js';
import { addrKey } from '../utils/helpers.js';
import type { MevKind } from '../types.js';

export interface MevTx {
  hash: string;
  from: string;
  to: string | null;
  selector: string;
  gasPrice: bigint;
  value: bigint;
  blockNumber: number | null;
}

export interface MevFinding {
  kind: MevKind;
  /** Hashes sent by the searcher; a sandwiched victim is not included. */
  hashes: string[];
  sender: string;
}

const same = (a: string | null, b: string | null): boolean =>
  a !== null && b !== null && addrKey(a) === addrKey(b);

/**
 * Heuristics over an ordered window of swaps:
 * - A,B,C same router+selector, A.from = C.from ≠ B.from, gas(B) < min(gas(A), gas(C)) → sandwich
 * - A,B same selector, different senders, gas(A) > 1.2 × gas(B) → front-run
 * - ≥ 3 zero-value swaps from one sender in one block → arbitrage
 * - sender on the known-bot list → known_bot
 */
export function classifyWindow(txs: readonly MevTx[]): MevFinding[] {
  const findings: MevFinding[] = [];

  for (let i = 0; i + 2 < txs.length; i++) {
    const a = txs[i];
    const b = txs[i + 1];
    const c = txs[i + 2];
    if (!a || !b || !c) continue;
    if (!same(a.to, b.to) || !same(b.to, c.to)) continue;
    if (a.selector !== b.selector || b.selector !== c.selector) continue;
    if (!same(a.from, c.from) || same(a.from, b.from)) continue;
    const minOuter = a.gasPrice < c.gasPrice ? a.gasPrice : c.gasPrice;
    if (b.gasPrice < minOuter) {
      findings.push({ kind: 'sandwich', hashes: [a.hash, c.hash], sender: addrKey(a.from) });
    }
  }

  for (let i = 0; i + 1 < txs.length; i++) {
    const a = txs[i];
    const b = txs[i + 1];
    if (!a || !b) continue;
    if (a.selector !== b.selector || same(a.from, b.from)) continue;
    if (a.gasPrice * 10n > b.gasPrice * 12n) {
      findings.push({ kind: 'frontrun', hashes: [a.hash], sender: addrKey(a.from) });
    }
  }

  const zeroValueBySender = new Map<string, string[]>();
  for (const tx of txs) {
    if (tx.blockNumber === null || tx.value !== 0n) continue;
    const key = `${tx.blockNumber}:${addrKey(tx.from)}`;
    const list = zeroValueBySender.get(key) ?? [];
    list.push(tx.hash);
    zeroValueBySender.set(key, list);
  }
  for (const [key, hashes] of zeroValueBySender) {
    if (hashes.length >= 3) {
      findings.push({ kind: 'arbitrage', hashes, sender: key.slice(key.indexOf(':') + 1) });
    }
  }

  for (const tx of txs) {
    if (KNOWN_MEV_BOTS.has(addrKey(tx.from))) {
      findings.push({ kind: 'known_bot', hashes: [tx.hash], sender: addrKey(tx.from) });
    }
  }

  return findings;
}

/**
 * Identified MEV hashes. Reaching capacity trims the least recently
 * used entries down to the low watermark in one pass.
 */
export class MevHashSet {
  private readonly lru: LRUCache<string, MevKind>;

  constructor(
    private readonly capacity = MEV_HASH_CAPACITY,
    private readonly lowWatermark = MEV_HASH_LOW_WATERMARK,
  ) {
    // lru-cache's own bound sits above ours so the watermark trim is what evicts
    this.lru = new LRUCache<string, MevKind>({ max: capacity + 1 });
  }

  add(hash: string, kind: MevKind): void {
    this.lru.set(hash, kind);
    if (this.lru.size >= this.capacity) {
      while (this.lru.size > this.lowWatermark) {
        if (this.lru.pop() === undefined) break;
      }
    }
  }

  has(hash: string): boolean {
    return this.lru.has(hash);
  }

  kindOf(hash: string): MevKind | undefined {
    return this.lru.peek(hash);
  }

  get size(): number {
    return this.lru.size;
  }
}
