import { LRUCache } from 'lru-cache';
import { logger } from '../utils/logger.js';
import { BotError, errorMessage } from '../errors.js';
import { LockRank, RankedMutex } from '../utils/lock.js';
import { Heartbeat } from '../utils/health-check.js';
import { BoundedChannel } from '../utils/channel.js';
import { abortable, addrKey, shortenAddress, sleep, weiToNative } from '../utils/helpers.js';
import { decodeSwap, targetToken } from './calldata-decoder.js';
import { MevHashSet, classifyWindow, type MevTx } from './mev-classifier.js';
import { KNOWN_MEV_BOTS } from '../constants.js';
import type { Supervised } from '../core/supervisor.js';
import type { ChainAdapter, Unsubscribe } from '../core/chain-adapter.js';
import type {
  ChainBlock,
  ChainTransaction,
  MempoolHealth,
  MempoolMetrics,
  MevKind,
  PendingSwap,
  SandwichOpportunity,
} from '../types.js';

export interface MempoolTrackerOptions {
  windowMs: number;
  maxSwapsPerToken: number;
  largeBuyUsd: number;
  minSandwichVictimUsd: number;
  minFrontrunTargetUsd: number;
  mevDetectionEnabled: boolean;
  degradedAfterMs: number;
  reconnectBaseMs: number;
  reconnectMaxMs: number;
  channelCapacity?: number;
  /** Blocks fetched per poll tick at most; older gaps are skipped. */
  maxBlocksPerPoll?: number;
  lockTimeoutMs?: number;
  clock?: () => number;
  /** Pool depth in native units, used for the sandwich impact estimate. */
  liquidityNativeOf?: (token: string) => number | null;
  onDrop?: (channel: string) => void;
}

export interface MempoolTrackerState {
  seenTokens: string[];
}

interface TokenActivity {
  /** Windowed sightings, pending or mined, oldest first. */
  events: PendingSwap[];
  pending: Map<string, PendingSwap>;
}

type NewTokenCallback = (token: string, source: PendingSwap) => void;
type HealthCallback = (health: MempoolHealth) => void;

const SEEN_TOKEN_CAPACITY = 10_000;

/**
 * Pending-swap aggregation per token. Ingestion prefers the adapter's push
 * feed and falls back to block polling; decoded swaps pass through a
 * bounded channel so a burst drops messages instead of growing memory.
 */
export class MempoolTracker implements Supervised {
  readonly name = 'mempool-tracker';
  private readonly lock: RankedMutex;
  private readonly heartbeat: Heartbeat;
  private readonly clock: () => number;
  private readonly inbox: BoundedChannel<ChainTransaction>;
  private readonly activity = new Map<string, TokenActivity>();
  /** Pending hash → token key, for removal once mined. */
  private readonly pendingIndex = new Map<string, string>();
  private readonly seenTokens: LRUCache<string, true>;
  private readonly mevHashes = new MevHashSet();
  private readonly mevSenders = new MevHashSet();
  private readonly newTokenCallbacks: NewTokenCallback[] = [];
  private readonly healthCallbacks: HealthCallback[] = [];
  private readonly internal = new AbortController();
  private baseFee: bigint | null = null;
  private lastBlock: number | null = null;
  private state: MempoolHealth = 'connecting';

  constructor(
    private readonly adapter: ChainAdapter,
    private readonly opts: MempoolTrackerOptions,
    seed?: MempoolTrackerState,
  ) {
    this.clock = opts.clock ?? Date.now;
    this.lock = new RankedMutex(this.name, LockRank.MempoolTracker, opts.lockTimeoutMs);
    this.heartbeat = new Heartbeat(this.clock);
    this.inbox = new BoundedChannel('mempool-inbox', opts.channelCapacity ?? 1024, opts.onDrop);
    this.seenTokens = new LRUCache<string, true>({ max: SEEN_TOKEN_CAPACITY });
    for (const token of seed?.seenTokens ?? []) this.seenTokens.set(addrKey(token), true);
  }

  // ─── Subscriptions ──────────────────────────────────────────────────

  /** Fires once per token, on its first decoded swap. */
  onNewToken(cb: NewTokenCallback): () => void {
    this.newTokenCallbacks.push(cb);
    return () => {
      const i = this.newTokenCallbacks.indexOf(cb);
      if (i >= 0) this.newTokenCallbacks.splice(i, 1);
    };
  }

  onHealth(cb: HealthCallback): void {
    this.healthCallbacks.push(cb);
  }

  get health(): MempoolHealth {
    return this.state;
  }

  get isDegraded(): boolean {
    return this.state === 'degraded' || this.state === 'stopped';
  }

  get droppedMessages(): number {
    return this.inbox.dropped;
  }

  // ─── Ingestion ──────────────────────────────────────────────────────

  /** Decodes one pending transaction; non-swaps are ignored. */
  decode(tx: ChainTransaction): PendingSwap | null {
    if (!tx.to) return null;
    const decoded = decodeSwap(this.adapter.router, tx.data, tx.value);
    if (!decoded) return null;

    const token = targetToken(decoded.path, this.adapter.chain.wrappedNative);
    if (!token) return null;

    const isBuy = tx.value > 0n;
    const amountNative = isBuy ? tx.value : decoded.nativeOut ? (decoded.amountOutMin ?? 0n) : 0n;
    return {
      hash: tx.hash,
      from: tx.from,
      to: tx.to,
      isBuy,
      token,
      method: decoded.method,
      amountNative,
      amountUsd: weiToNative(amountNative) * this.adapter.chain.nativeUsd,
      gasPrice: tx.gasPrice,
      nonce: tx.nonce,
      timestamp: this.clock(),
    };
  }

  /** Records a pending transaction. Returns the decoded swap, or null when it is not one. */
  async ingest(tx: ChainTransaction): Promise<PendingSwap | null> {
    const swap = this.decode(tx);
    if (!swap) return null;

    const isNew = await this.lock.runExclusive(() => {
      this.record(swap, true);
      if (KNOWN_MEV_BOTS.has(addrKey(swap.from))) this.flag(swap.hash, swap.from, 'known_bot');
      this.heartbeat.touch();
      const key = addrKey(swap.token);
      if (this.seenTokens.has(key)) return false;
      this.seenTokens.set(key, true);
      return true;
    });

    // Callbacks run outside the lock so they may take lower-ranked locks.
    if (isNew) this.notifyNewToken(swap);
    return swap;
  }

  /**
   * Processes a mined block: drops its transactions from the pending set,
   * classifies MEV patterns and records the base fee. In polling mode the
   * block's swaps also feed the activity windows.
   */
  async ingestBlock(block: ChainBlock): Promise<void> {
    const polling = this.state === 'polling' || this.adapter.chain.wsUrl === '';
    const swaps: PendingSwap[] = [];
    const mevTxs: MevTx[] = [];
    for (const tx of block.transactions) {
      const swap = this.decode(tx);
      if (!swap) continue;
      swaps.push(swap);
      mevTxs.push({
        hash: tx.hash,
        from: tx.from,
        to: tx.to,
        selector: tx.data.slice(0, 10),
        gasPrice: tx.gasPrice,
        value: tx.value,
        blockNumber: tx.blockNumber ?? block.number,
      });
    }
    const findings = this.opts.mevDetectionEnabled ? classifyWindow(mevTxs) : [];

    const discovered = await this.lock.runExclusive(() => {
      if (block.baseFeePerGas !== null) this.baseFee = block.baseFeePerGas;
      if (this.lastBlock === null || block.number > this.lastBlock) this.lastBlock = block.number;

      for (const tx of block.transactions) this.confirm(tx.hash);
      for (const f of findings) {
        for (const hash of f.hashes) this.flag(hash, f.sender, f.kind);
      }

      const fresh: PendingSwap[] = [];
      if (polling) {
        for (const swap of swaps) {
          this.record(swap, false);
          const key = addrKey(swap.token);
          if (!this.seenTokens.has(key)) {
            this.seenTokens.set(key, true);
            fresh.push(swap);
          }
        }
      }
      this.prune();
      this.heartbeat.touch();
      return fresh;
    });

    if (findings.length > 0) {
      logger.debug(`[mempool] Block ${block.number}: ${findings.length} MEV pattern(s)`, {
        kinds: findings.map((f) => f.kind),
      });
    }
    for (const swap of discovered) this.notifyNewToken(swap);
  }

  async setBaseFee(baseFee: bigint | null): Promise<void> {
    await this.lock.runExclusive(() => {
      this.baseFee = baseFee;
      this.heartbeat.touch();
    });
  }

  // ─── Queries ────────────────────────────────────────────────────────

  async metrics(token: string): Promise<MempoolMetrics> {
    return this.lock.read(() => {
      this.prune();
      const activity = this.activity.get(addrKey(token));
      const events = activity?.events ?? [];

      let buyUsd = 0;
      let sellUsd = 0;
      let buys = 0;
      let largeBuys = 0;
      for (const e of events) {
        if (e.isBuy) {
          buyUsd += e.amountUsd;
          buys++;
          if (e.amountUsd >= this.opts.largeBuyUsd) largeBuys++;
        } else {
          sellUsd += e.amountUsd;
        }
      }

      const totalUsd = buyUsd + sellUsd;
      // Token-to-token sells carry no native value; fall back to counts.
      const buyPressure = totalUsd > 0 ? buyUsd / totalUsd : events.length > 0 ? buys / events.length : 0;
      this.heartbeat.touch();
      return {
        buyPressure,
        sellPressure: events.length > 0 ? 1 - buyPressure : 0,
        buyVolumeUsd: buyUsd,
        sellVolumeUsd: sellUsd,
        pendingCount: activity?.pending.size ?? 0,
        largeBuys,
        baseFee: this.baseFee,
      };
    });
  }

  async pendingSwaps(token: string): Promise<PendingSwap[]> {
    return this.lock.read(() => {
      this.prune();
      this.heartbeat.touch();
      return [...(this.activity.get(addrKey(token))?.pending.values() ?? [])];
    });
  }

  /**
   * Largest pending buy that clears the USD threshold and pays under twice
   * the base fee (median pending gas where the chain has no base fee).
   * Searches every token when `token` is omitted.
   */
  async bestSandwich(token?: string): Promise<SandwichOpportunity | null> {
    const victim = await this.lock.read(() => {
      this.prune();
      const candidates = this.candidates(token).filter((s) => s.amountUsd >= this.opts.minSandwichVictimUsd);
      const ceiling = this.gasCeiling();
      const eligible = candidates.filter((s) => ceiling === null || s.gasPrice < ceiling);
      this.heartbeat.touch();
      return eligible.sort((a, b) => b.amountUsd - a.amountUsd)[0] ?? null;
    });
    if (!victim) return null;

    const impact = this.estimateImpact(victim);
    return {
      victim,
      estimatedImpactPct: impact * 100,
      // A front-run of comparable size captures roughly half of the move.
      potentialProfitUsd: victim.amountUsd * impact * 0.5,
    };
  }

  async bestFrontrunTarget(token?: string): Promise<PendingSwap | null> {
    return this.lock.read(() => {
      this.prune();
      const eligible = this.candidates(token).filter((s) => s.amountUsd >= this.opts.minFrontrunTargetUsd);
      this.heartbeat.touch();
      return eligible.sort((a, b) => b.amountUsd - a.amountUsd)[0] ?? null;
    });
  }

  /** Removes a pending swap so a second caller cannot act on it. */
  async claim(hash: string): Promise<boolean> {
    return this.lock.runExclusive(() => {
      const removed = this.removePending(hash);
      this.heartbeat.touch();
      return removed;
    });
  }

  isMev(hash: string): boolean {
    return this.mevHashes.has(hash);
  }

  mevKindOf(hash: string): MevKind | undefined {
    return this.mevHashes.kindOf(hash);
  }

  get trackedTokenCount(): number {
    return this.activity.size;
  }

  /** Lock-free copy for a replacement instance. */
  exportState(): MempoolTrackerState {
    return { seenTokens: [...this.seenTokens.keys()] };
  }

  // ─── Loops ──────────────────────────────────────────────────────────

  /** Runs the push feed (when the chain has one), the inbox consumer and block polling. */
  async run(signal: AbortSignal): Promise<void> {
    const stop = (): void => this.internal.abort();
    signal.addEventListener('abort', stop, { once: true });
    const inner = this.internal.signal;

    try {
      const loops = [this.consume(inner), this.pollBlocks(inner)];
      if (this.adapter.chain.wsUrl) {
        loops.push(this.stream(inner));
      } else {
        logger.info(`[mempool] ${this.adapter.chain.name} has no push endpoint, polling blocks`);
        this.setHealth('polling');
      }
      await Promise.all(loops);
    } finally {
      signal.removeEventListener('abort', stop);
      this.setHealth('stopped');
    }
  }

  private async stream(signal: AbortSignal): Promise<void> {
    let delay = this.opts.reconnectBaseMs;
    let downSince: number | null = null;

    while (!signal.aborted) {
      let lost: (err: Error) => void = () => undefined;
      const connectionLost = new Promise<Error>((resolve) => {
        lost = resolve;
      });

      let unsubscribe: Unsubscribe | null = null;
      try {
        unsubscribe = await this.adapter.subscribePendingTransactions(
          (tx) => {
            this.inbox.send(tx);
          },
          (err) => lost(err),
        );
      } catch (err) {
        logger.warn(`[mempool] Subscribe failed: ${errorMessage(err)}`);
      }

      if (unsubscribe) {
        delay = this.opts.reconnectBaseMs;
        downSince = null;
        this.setHealth('streaming');

        const abort = abortable(signal);
        const reason = await Promise.race([connectionLost, abort.promise]).finally(abort.dispose);
        await unsubscribe().catch((err: unknown) => {
          logger.debug(`[mempool] Unsubscribe failed: ${errorMessage(err)}`);
        });
        if (reason === null) return;
        logger.warn(`[mempool] Subscription lost: ${reason.message}`);
      }

      downSince ??= this.clock();
      if (this.clock() - downSince >= this.opts.degradedAfterMs) {
        this.setHealth('degraded');
      } else if (this.state === 'streaming') {
        this.setHealth('connecting');
      }

      await sleep(delay, signal);
      delay = Math.min(delay * 2, this.opts.reconnectMaxMs);
    }
  }

  private async consume(signal: AbortSignal): Promise<void> {
    for (;;) {
      const tx = await this.inbox.recv(signal);
      if (tx === null) return;
      try {
        await this.ingest(tx);
      } catch (err) {
        if (err instanceof BotError && err.kind === 'LockContention') {
          logger.warn(`[mempool] Dropped ${shortenAddress(tx.hash, 6)}: ${err.message}`);
          continue;
        }
        throw err;
      }
    }
  }

  private async pollBlocks(signal: AbortSignal): Promise<void> {
    const interval = this.adapter.chain.blockTimeMs;
    const maxBlocks = this.opts.maxBlocksPerPoll ?? 5;
    let failingSince: number | null = null;

    while (!signal.aborted) {
      try {
        const head = await this.adapter.getBlockNumber();
        const from = this.lastBlock === null ? head : Math.max(this.lastBlock + 1, head - maxBlocks + 1);
        for (let n = from; n <= head && !signal.aborted; n++) {
          const block = await this.adapter.getBlockWithTransactions(n);
          if (block) await this.ingestBlock(block);
        }
        failingSince = null;
        if (this.state === 'degraded' && !this.adapter.chain.wsUrl) this.setHealth('polling');
      } catch (err) {
        logger.warn(`[mempool] Block poll failed: ${errorMessage(err)}`);
        failingSince ??= this.clock();
        if (!this.adapter.chain.wsUrl && this.clock() - failingSince >= this.opts.degradedAfterMs) {
          this.setHealth('degraded');
        }
      }
      await sleep(interval, signal);
    }
  }

  // ─── Supervision ────────────────────────────────────────────────────

  lastSuccessTs(): number {
    return this.heartbeat.lastSuccessTs;
  }

  async probe(timeoutMs: number): Promise<boolean> {
    const ok = await this.lock.probe(timeoutMs);
    if (ok) this.heartbeat.touch();
    return ok;
  }

  dispose(): void {
    this.internal.abort();
    this.inbox.close();
  }

  // ─── Internals (called under the lock) ──────────────────────────────

  private record(swap: PendingSwap, pending: boolean): void {
    const key = addrKey(swap.token);
    let activity = this.activity.get(key);
    if (!activity) {
      activity = { events: [], pending: new Map() };
      this.activity.set(key, activity);
    }

    activity.events.push(swap);
    if (activity.events.length > this.opts.maxSwapsPerToken) activity.events.shift();

    if (!pending) return;
    activity.pending.set(swap.hash, swap);
    this.pendingIndex.set(swap.hash, key);
    if (activity.pending.size > this.opts.maxSwapsPerToken) {
      const oldest = activity.pending.keys().next();
      if (!oldest.done) this.removePending(oldest.value);
    }
  }

  private confirm(hash: string): void {
    this.removePending(hash);
  }

  private removePending(hash: string): boolean {
    const key = this.pendingIndex.get(hash);
    if (key === undefined) return false;
    this.pendingIndex.delete(hash);
    return this.activity.get(key)?.pending.delete(hash) ?? false;
  }

  private flag(hash: string, sender: string, kind: MevKind): void {
    this.mevHashes.add(hash, kind);
    this.mevSenders.add(addrKey(sender), kind);
  }

  private isMevSwap(s: PendingSwap): boolean {
    return this.mevHashes.has(s.hash) || this.mevSenders.has(addrKey(s.from)) || KNOWN_MEV_BOTS.has(addrKey(s.from));
  }

  /** Pending buys not attributed to a searcher. */
  private candidates(token?: string): PendingSwap[] {
    const pools = token === undefined
      ? [...this.activity.values()]
      : [this.activity.get(addrKey(token))].filter((a): a is TokenActivity => a !== undefined);
    const out: PendingSwap[] = [];
    for (const a of pools) {
      for (const s of a.pending.values()) {
        if (s.isBuy && !this.isMevSwap(s)) out.push(s);
      }
    }
    return out;
  }

  private gasCeiling(): bigint | null {
    if (this.baseFee !== null) return this.baseFee * 2n;
    const prices: bigint[] = [];
    for (const a of this.activity.values()) {
      for (const s of a.pending.values()) prices.push(s.gasPrice);
    }
    if (prices.length === 0) return null;
    prices.sort((a, b) => (a < b ? -1 : a > b ? 1 : 0));
    const median = prices[Math.floor(prices.length / 2)];
    return median === undefined ? null : median * 2n;
  }

  /** Constant-product price move from pushing the victim's input into the pool. */
  private estimateImpact(victim: PendingSwap): number {
    const reserve = this.opts.liquidityNativeOf?.(victim.token) ?? null;
    if (reserve === null || reserve <= 0) return 0;
    const x = weiToNative(victim.amountNative);
    return (1 + x / reserve) ** 2 - 1;
  }

  /** Drops window events older than windowMs, and pending swaps past the same TTL. */
  private prune(): void {
    const cutoff = this.clock() - this.opts.windowMs;
    for (const [key, a] of this.activity) {
      while (a.events.length > 0 && (a.events[0]?.timestamp ?? 0) < cutoff) a.events.shift();
      for (const [hash, s] of a.pending) {
        if (s.timestamp < cutoff) {
          a.pending.delete(hash);
          this.pendingIndex.delete(hash);
        }
      }
      if (a.events.length === 0 && a.pending.size === 0) this.activity.delete(key);
    }
  }

  private notifyNewToken(swap: PendingSwap): void {
    logger.info(`[mempool] New token ${shortenAddress(swap.token)} via ${swap.method}`);
    for (const cb of this.newTokenCallbacks) {
      try {
        cb(swap.token, swap);
      } catch (err) {
        logger.error(`[mempool] New-token callback failed: ${errorMessage(err)}`);
      }
    }
  }

  private setHealth(next: MempoolHealth): void {
    if (this.state === next) return;
    const prev = this.state;
    this.state = next;
    if (next === 'degraded') logger.warn(`[mempool] Degraded (was ${prev})`);
    else logger.info(`[mempool] ${prev} → ${next}`);
    for (const cb of this.healthCallbacks) cb(next);
  }
}
