import Database from 'better-sqlite3';
import { mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import { logger } from '../utils/logger.js';
import { BotError, errorMessage } from '../errors.js';
import { deserialize, serialize } from './cache.js';
import type { OrderBookState } from '../position/order-book.js';
import type { Position, SandwichResult, TradeResult } from '../types.js';

export const RECORD_VERSION = 1;

export type TradeRecord =
  | { kind: 'trade'; result: TradeResult }
  | { kind: 'sandwich'; result: SandwichResult };

export interface PersistedState {
  positions: Position[];
  orders: OrderBookState;
  trades: TradeRecord[];
}

interface RecordRow {
  key: string;
  body: string;
}

const POSITIONS_KEY = 'positions';
const ORDERS_KEY = 'orders';
const TRADE_PREFIX = 'trade:';

// ─── Record guards ───────────────────────────────────────────────────

function isObject(v: unknown): v is Record<string, unknown> {
  return typeof v === 'object' && v !== null && !Array.isArray(v);
}

function isPosition(v: unknown): v is Position {
  return (
    isObject(v) &&
    typeof v.token === 'string' &&
    typeof v.amount === 'bigint' &&
    typeof v.decimals === 'number' &&
    typeof v.entryPrice === 'number' &&
    typeof v.costBasisNative === 'number'
  );
}

function hasIdAndToken(v: unknown): boolean {
  return isObject(v) && typeof v.id === 'string' && typeof v.token === 'string';
}

function isOrderBookState(v: unknown): v is OrderBookState {
  return (
    isObject(v) &&
    Array.isArray(v.limits) &&
    v.limits.every(hasIdAndToken) &&
    Array.isArray(v.trailing) &&
    v.trailing.every(hasIdAndToken) &&
    Array.isArray(v.dca) &&
    v.dca.every(hasIdAndToken) &&
    Array.isArray(v.autoSandwich) &&
    v.autoSandwich.every((a) => isObject(a) && typeof a.token === 'string')
  );
}

function isTradeRecord(v: unknown): v is TradeRecord {
  if (!isObject(v)) return false;
  const r = v.result;
  if (!isObject(r)) return false;
  if (typeof r.success !== 'boolean' || typeof r.token !== 'string' || typeof r.timestamp !== 'number') return false;
  return v.kind === 'trade' || v.kind === 'sandwich';
}

/** Unwraps `{ v, data }`; records written by an unknown version are rejected. */
function unwrap<T>(key: string, body: string, guard: (value: unknown) => value is T): T | null {
  let parsed: unknown;
  try {
    parsed = deserialize(body);
  } catch (err) {
    logger.warn(`[db] Record ${key} is not valid JSON: ${errorMessage(err)}`);
    return null;
  }
  if (!isObject(parsed) || parsed.v !== RECORD_VERSION) {
    logger.warn(`[db] Record ${key} has unsupported version, ignoring`);
    return null;
  }
  const data = parsed.data;
  if (!guard(data)) {
    logger.warn(`[db] Record ${key} has unexpected shape, ignoring`);
    return null;
  }
  return data;
}

function isPositionList(v: unknown): v is Position[] {
  return Array.isArray(v) && v.every(isPosition);
}

// ─── Store ───────────────────────────────────────────────────────────

export interface StoreOptions {
  /** File path, or ':memory:'. */
  path: string;
  /** Trade records kept; older ones are pruned on append. */
  maxTrades?: number;
  clock?: () => number;
}

/**
 * Versioned JSON records under string keys in a single SQLite table.
 * Every write runs in a transaction and either lands completely or throws.
 */
export class Store {
  private readonly db: Database.Database;
  private readonly clock: () => number;
  private readonly maxTrades: number;
  private tradeSeq = 0;

  constructor(opts: StoreOptions) {
    if (opts.path !== ':memory:') mkdirSync(dirname(opts.path), { recursive: true });
    this.db = new Database(opts.path);
    if (opts.path !== ':memory:') this.db.pragma('journal_mode = WAL');
    this.db.pragma('synchronous = NORMAL');
    this.clock = opts.clock ?? Date.now;
    this.maxTrades = opts.maxTrades ?? 1_000;
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS records (
        key TEXT PRIMARY KEY,
        version INTEGER NOT NULL,
        body TEXT NOT NULL,
        updated_at INTEGER NOT NULL
      );
      CREATE INDEX IF NOT EXISTS idx_records_updated ON records(updated_at);
    `);
    logger.info(`[db] Opened store at ${opts.path}`);
  }

  savePositions(positions: readonly Position[]): void {
    this.write([[POSITIONS_KEY, positions]]);
  }

  saveOrders(orders: OrderBookState): void {
    this.write([[ORDERS_KEY, orders]]);
  }

  /** Positions and orders in one transaction, so a restart never sees one without the other. */
  saveSnapshot(positions: readonly Position[], orders: OrderBookState): void {
    this.write([
      [POSITIONS_KEY, positions],
      [ORDERS_KEY, orders],
    ]);
  }

  appendTrade(record: TradeRecord): void {
    const key = `${TRADE_PREFIX}${record.result.timestamp.toString().padStart(15, '0')}:${(this.tradeSeq++).toString().padStart(6, '0')}`;
    this.write([[key, record]], () => {
      this.db
        .prepare<[number]>(`
          DELETE FROM records WHERE key IN (
            SELECT key FROM records WHERE key LIKE '${TRADE_PREFIX}%' ORDER BY key DESC LIMIT -1 OFFSET ?
          )
        `)
        .run(this.maxTrades);
    });
  }

  loadPositions(): Position[] {
    const row = this.row(POSITIONS_KEY);
    return row ? unwrap(row.key, row.body, isPositionList) ?? [] : [];
  }

  loadOrders(): OrderBookState {
    const row = this.row(ORDERS_KEY);
    const empty: OrderBookState = { limits: [], trailing: [], dca: [], autoSandwich: [] };
    return row ? unwrap(row.key, row.body, isOrderBookState) ?? empty : empty;
  }

  /** Trade history, oldest first. */
  loadTrades(limit = this.maxTrades): TradeRecord[] {
    const rows = this.db
      .prepare<[number], RecordRow>(
        `SELECT key, body FROM records WHERE key LIKE '${TRADE_PREFIX}%' ORDER BY key DESC LIMIT ?`,
      )
      .all(limit);
    const out: TradeRecord[] = [];
    for (const row of rows.reverse()) {
      const rec = unwrap(row.key, row.body, isTradeRecord);
      if (rec) out.push(rec);
    }
    return out;
  }

  load(): PersistedState {
    return { positions: this.loadPositions(), orders: this.loadOrders(), trades: this.loadTrades() };
  }

  close(): void {
    this.db.close();
    logger.info('[db] Store closed');
  }

  private row(key: string): RecordRow | undefined {
    return this.db.prepare<[string], RecordRow>('SELECT key, body FROM records WHERE key = ?').get(key);
  }

  private write(entries: ReadonlyArray<readonly [string, unknown]>, after?: () => void): void {
    const now = this.clock();
    try {
      const upsert = this.db.prepare<[string, number, string, number]>(`
        INSERT INTO records (key, version, body, updated_at) VALUES (?, ?, ?, ?)
        ON CONFLICT(key) DO UPDATE SET version = excluded.version, body = excluded.body, updated_at = excluded.updated_at
      `);
      const tx = this.db.transaction(() => {
        for (const [key, data] of entries) {
          upsert.run(key, RECORD_VERSION, serialize({ v: RECORD_VERSION, data }), now);
        }
        after?.();
      });
      tx();
    } catch (err) {
      throw new BotError('Other', `store write failed for ${entries.map(([k]) => k).join(', ')}`, { cause: err });
    }
  }
}
