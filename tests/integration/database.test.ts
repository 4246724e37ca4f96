import { describe, it, expect, afterEach } from 'vitest';
import Database from 'better-sqlite3';
import { existsSync, mkdtempSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { Store, RECORD_VERSION, type TradeRecord } from '../../src/data/database.js';
import { OrderBook } from '../../src/position/order-book.js';
import { BotError } from '../../src/errors.js';
import { makePosition, makeSandwichResult, makeTradeResult } from '../helpers/factories.js';

const dirs: string[] = [];

function tempDir(): string {
  const dir = mkdtempSync(join(tmpdir(), 'snipebot-db-'));
  dirs.push(dir);
  return dir;
}

afterEach(() => {
  for (const dir of dirs.splice(0)) rmSync(dir, { recursive: true, force: true });
});

describe('Store', () => {
  it('should round-trip positions with bigint amounts', () => {
    const store = new Store({ path: ':memory:' });
    const positions = [makePosition(), makePosition({ token: '0x3000000000000000000000000000000000000002', amount: 7n })];

    store.savePositions(positions);

    expect(store.loadPositions()).toEqual(positions);
    store.close();
  });

  it('should save positions and orders together', () => {
    const store = new Store({ path: ':memory:' });
    const book = new OrderBook();
    book.addLimit({ token: makePosition().token, side: 'sell', targetPrice: 2, percent: 50, amountNative: 0, expiresAt: null, now: 0 });
    book.setAutoSandwich({ token: makePosition().token, maxBuys: 2, executed: 0, deadline: 10, minVictimUsd: 500 });

    store.saveSnapshot([makePosition()], book.exportState());
    const state = store.load();

    expect(state.positions).toHaveLength(1);
    expect(state.orders).toEqual(book.exportState());
    expect(state.trades).toEqual([]);
    store.close();
  });

  it('should return empty state from a new store', () => {
    const store = new Store({ path: ':memory:' });

    expect(store.load()).toEqual({
      positions: [],
      orders: { limits: [], trailing: [], dca: [], autoSandwich: [] },
      trades: [],
    });
    store.close();
  });

  it('should keep only the newest trades, oldest first', () => {
    const store = new Store({ path: ':memory:', maxTrades: 3 });
    for (const ts of [1, 2, 3, 4, 5]) {
      store.appendTrade({ kind: 'trade', result: makeTradeResult({ timestamp: ts }) });
    }

    expect(store.loadTrades().map((r) => r.result.timestamp)).toEqual([3, 4, 5]);
    expect(store.loadTrades(2).map((r) => r.result.timestamp)).toEqual([4, 5]);
    store.close();
  });

  it('should keep trades with equal timestamps in append order', () => {
    const store = new Store({ path: ':memory:' });
    const records: TradeRecord[] = [
      { kind: 'trade', result: makeTradeResult({ timestamp: 7, txHash: '0x01' }) },
      { kind: 'sandwich', result: makeSandwichResult({ timestamp: 7 }) },
    ];
    for (const r of records) store.appendTrade(r);

    expect(store.loadTrades()).toEqual(records);
    store.close();
  });

  it('should persist to a file across reopen', () => {
    const path = join(tempDir(), 'nested', 'bot.db');
    const first = new Store({ path });
    first.savePositions([makePosition()]);
    first.appendTrade({ kind: 'trade', result: makeTradeResult({ timestamp: 1 }) });
    first.close();

    const second = new Store({ path });

    expect(existsSync(path)).toBe(true);
    expect(second.loadPositions()).toEqual([makePosition()]);
    expect(second.loadTrades()).toHaveLength(1);
    second.close();
  });

  it('should ignore records of another version or shape', () => {
    const path = join(tempDir(), 'bot.db');
    new Store({ path }).close();

    const raw = new Database(path);
    const put = raw.prepare<[string, number, string, number]>(
      'INSERT INTO records (key, version, body, updated_at) VALUES (?, ?, ?, ?)',
    );
    put.run('positions', RECORD_VERSION + 1, JSON.stringify({ v: RECORD_VERSION + 1, data: [] }), 0);
    put.run('orders', RECORD_VERSION, JSON.stringify({ v: RECORD_VERSION, data: { limits: 'none' } }), 0);
    put.run('trade:000000000000001:000000', RECORD_VERSION, 'not json', 0);
    raw.close();

    const store = new Store({ path });
    expect(store.load()).toEqual({
      positions: [],
      orders: { limits: [], trailing: [], dca: [], autoSandwich: [] },
      trades: [],
    });
    store.close();
  });

  it('should raise a store error when a write fails', () => {
    const store = new Store({ path: ':memory:' });
    store.close();

    let caught: unknown;
    try {
      store.savePositions([makePosition()]);
    } catch (err) {
      caught = err;
    }

    expect(caught).toBeInstanceOf(BotError);
    expect(caught instanceof BotError && caught.message).toBe('store write failed for positions');
  });
});
