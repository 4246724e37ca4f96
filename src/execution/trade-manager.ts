import { logger } from '../utils/logger.js';
import { BotError, classifyError, errorMessage, toBotError, type ErrorKind } from '../errors.js';
import { KeyedMutex, LockRank, RankedMutex } from '../utils/lock.js';
import { Heartbeat } from '../utils/health-check.js';
import { withRetry } from '../utils/retry.js';
import { waitForReceipt } from '../utils/confirm-tx.js';
import {
  addrKey,
  clamp,
  formatGwei,
  isValidAddress,
  mulFactor,
  nativeToWei,
  pctOf,
  shortenAddress,
  weiToNative,
} from '../utils/helpers.js';
import { MAX_APPROVAL, SWAP_DEADLINE_SECONDS } from '../constants.js';
import { erc20Interface } from '../core/router-abi.js';
import { gasCeiling, type ChainAdapter } from '../core/chain-adapter.js';
import { decodeSwap, targetToken } from '../detection/calldata-decoder.js';
import { PositionBook } from '../position/position-manager.js';
import { OrderBook, type OrderBookState } from '../position/order-book.js';
import { evaluateStopLoss } from '../position/stop-loss.js';
import { calculateSellAmount } from '../position/take-profit.js';
import { TIER_POLICIES, assertBuyable, requireFeature } from '../strategy/tiers.js';
import {
  activeTrades,
  sandwichAttempts,
  sandwichWins,
  tradeAmountNative,
  tradeGasUsed,
  tradesAttempted,
  tradesFailed,
  tradesSuccessful,
} from '../telemetry/metrics.js';
import type { BotEmitter } from '../detection/event-emitter.js';
import type { Supervised } from '../core/supervisor.js';
import type { GasOptimizer } from './gas-optimizer.js';
import type { SubmissionOutcome, SubmissionPipeline } from './submission.js';
import type {
  AutoSandwichConfig,
  ChainTransaction,
  DcaPlan,
  ExecutionResult,
  GasSetting,
  LimitOrder,
  OrderSide,
  Position,
  ProfitDecision,
  SandwichDefaults,
  SandwichOpportunity,
  SandwichResult,
  Tier,
  TokenStatus,
  TradeResult,
  TrailingStop,
  TxRequest,
} from '../types.js';

/** Used when gas estimation fails for a reason other than a revert. */
const FALLBACK_GAS_LIMIT = 350_000n;

/** Why a sandwich falls back to the emergency sell. */
interface Unwind {
  kind: ErrorKind;
  reason: string;
}

export interface TradeManagerOptions {
  tier: Tier;
  /** Percent. */
  slippage: number;
  reservePercent: number;
  maxPositionSizePercent: number;
  /** Multiplier on estimated gas, 1.3 = 30% headroom. */
  gasLimitHeadroom: number;
  stopLossPct: number;
  minSandwichVictimUsd: number;
  minFrontrunTargetUsd: number;
  sandwich: SandwichDefaults;
  receiptPollMs: number;
  lockTimeoutMs?: number;
  clock?: () => number;
}

export interface TradeManagerDeps {
  adapter: ChainAdapter;
  gas: Pick<GasOptimizer, 'optimal' | 'scaled'>;
  submission: SubmissionPipeline;
  /** Current status of a token, adding it to the tracker when unknown. */
  statusOf: (token: string) => Promise<TokenStatus | null>;
  emitter: BotEmitter;
}

export interface TradeManagerState {
  positions: Position[];
  orders: OrderBookState;
}

export interface TradeConfig {
  slippage?: number;
  gas?: GasSetting;
  privateRelay?: boolean;
  /** Exact token amount; overrides the percentage. */
  amount?: bigint;
}

export interface SandwichParams {
  victimHash: string;
  frontMultiplier?: number;
  backMultiplier?: number;
  amountPercent?: number;
  victimWaitMs?: number;
  usePrivateRelay?: boolean;
}

export interface FrontrunParams {
  targetHash: string;
  amountNative?: number;
  gasMultiplier?: number;
  usePrivateRelay?: boolean;
}

interface LegFill {
  result: TradeResult;
  /** Native spent (buy) or received (sell). */
  native: number;
  gasFeeNative: number;
  tokens: bigint;
}

function gasFee(outcome: SubmissionOutcome): number {
  const r = outcome.receipt;
  return r ? weiToNative(r.gasUsed * r.effectiveGasPrice) : 0;
}

function txGas(tx: ChainTransaction, eip1559: boolean): GasSetting {
  if (eip1559 && tx.maxFeePerGas !== undefined && tx.maxPriorityFeePerGas !== undefined) {
    return { kind: 'eip1559', maxFeePerGas: tx.maxFeePerGas, maxPriorityFeePerGas: tx.maxPriorityFeePerGas };
  }
  return { kind: 'legacy', gasPrice: tx.gasPrice };
}

/**
 * Buys, sells, sandwiches and standing orders. Submissions for one token
 * are serialised by a per-token mutex; positions and orders sit behind the
 * manager's own lock, which is never held across a chain call.
 */
export class TradeManager implements Supervised {
  readonly name = 'trade-manager';
  private readonly lock: RankedMutex;
  private readonly tokenLocks: KeyedMutex;
  private readonly heartbeat: Heartbeat;
  private readonly clock: () => number;
  private readonly positions: PositionBook;
  private readonly orders: OrderBook;
  private tier: Tier;
  private slippage: number;
  private active = 0;
  private successor: TradeManager | null = null;

  constructor(
    private readonly deps: TradeManagerDeps,
    private readonly opts: TradeManagerOptions,
    seed?: TradeManagerState,
  ) {
    this.clock = opts.clock ?? Date.now;
    this.lock = new RankedMutex(this.name, LockRank.TradeManager, opts.lockTimeoutMs);
    this.tokenLocks = new KeyedMutex('token', LockRank.TokenSerial, opts.lockTimeoutMs);
    this.heartbeat = new Heartbeat(this.clock);
    this.positions = new PositionBook(seed?.positions);
    this.orders = new OrderBook(seed?.orders);
    this.tier = opts.tier;
    this.slippage = opts.slippage;
  }

  // ─── Settings ──────────────────────────────────────────────────────

  get currentTier(): Tier {
    return this.tier;
  }

  get currentSlippage(): number {
    return this.slippage;
  }

  get activeTradeCount(): number {
    return this.active;
  }

  async setTier(tier: Tier): Promise<void> {
    await this.lock.runExclusive(() => {
      this.tier = tier;
    });
  }

  async setSlippage(pct: number): Promise<void> {
    await this.lock.runExclusive(() => {
      this.slippage = clamp(pct, 0.1, 50);
    });
  }

  // ─── Trades ────────────────────────────────────────────────────────

  async buy(token: string, amount: bigint, config: TradeConfig = {}): Promise<TradeResult> {
    return this.guardedBuy(token, amount, config, 'buy');
  }

  async sell(token: string, percent: number, config: TradeConfig = {}): Promise<TradeResult> {
    try {
      if (!isValidAddress(token)) throw new BotError('InvalidInput', `invalid token address ${token}`);
      if (config.amount === undefined && !(percent > 0 && percent <= 100)) {
        throw new BotError('InvalidInput', `sell percent must be in (0, 100], got ${percent}`);
      }
      return await this.tokenLocks.runExclusive(addrKey(token), () =>
        this.tracked(async () => (await this.sellCore(token, percent, config, 'sell')).result),
      );
    } catch (err) {
      return this.failed(token, 'sell', 0n, err);
    }
  }

  async executeSandwich(params: SandwichParams): Promise<SandwichResult> {
    const started = this.clock();
    const base: SandwichResult = {
      success: false,
      token: '',
      victimHash: params.victimHash,
      frontTxHash: null,
      backTxHash: null,
      emergency: false,
      frontGasPrice: null,
      backGasPrice: null,
      profitNative: 0,
      profitUsd: 0,
      timestamp: started,
    };
    sandwichAttempts.inc();

    let result: SandwichResult;
    try {
      requireFeature(this.tier, 'sandwich');
      const victim = await this.pendingTarget(params.victimHash, this.opts.minSandwichVictimUsd, 'sandwich victim');
      const { token } = victim;
      base.token = token;
      await this.preflightBuy(token, pctOf(victim.tx.value, params.amountPercent ?? this.opts.sandwich.amountPercent));

      result = await this.tokenLocks.runExclusive(addrKey(token), () =>
        this.tracked(() => this.sandwichCore(victim.tx, token, params, base)),
      );
    } catch (err) {
      const e = toBotError(err, 'sandwich');
      logger.warn(`[trade] Sandwich on ${params.victimHash} aborted: ${e.toString()}`);
      result = { ...base, errorKind: e.kind, error: e.message };
    }

    if (result.success) sandwichWins.inc();
    this.deps.emitter.emit('sandwichExecuted', result);
    return result;
  }

  async executeFrontrun(params: FrontrunParams): Promise<TradeResult> {
    let token = '';
    try {
      requireFeature(this.tier, 'frontrun');
      const target = await this.pendingTarget(params.targetHash, this.opts.minFrontrunTargetUsd, 'front-run target');
      token = target.token;
      const multiplier = params.gasMultiplier ?? this.opts.sandwich.frontMultiplier;
      const gas = this.deps.gas.scaled(txGas(target.tx, this.deps.adapter.chain.eip1559), multiplier);
      const amount =
        params.amountNative !== undefined
          ? nativeToWei(params.amountNative)
          : pctOf(target.tx.value, this.opts.sandwich.amountPercent);
      logger.info(`[trade] Front-running ${params.targetHash} on ${shortenAddress(token)} at ${formatGwei(gasCeiling(gas))}`);
      return await this.guardedBuy(token, amount, { gas, privateRelay: params.usePrivateRelay }, 'frontrun');
    } catch (err) {
      return this.failed(token, 'buy', 0n, err);
    }
  }

  // ─── Standing orders ───────────────────────────────────────────────

  async createLimitOrder(
    token: string,
    side: OrderSide,
    targetPrice: number,
    opts: { percent?: number; amountNative?: number; expiresAt?: number | null } = {},
  ): Promise<LimitOrder> {
    if (!isValidAddress(token)) throw new BotError('InvalidInput', `invalid token address ${token}`);
    if (!(targetPrice > 0)) throw new BotError('InvalidInput', `target price must be positive, got ${targetPrice}`);
    const percent = opts.percent ?? 100;
    const amountNative = opts.amountNative ?? 0;
    if (side === 'sell' && !(percent > 0 && percent <= 100)) {
      throw new BotError('InvalidInput', `sell percent must be in (0, 100], got ${percent}`);
    }
    if (side === 'buy' && !(amountNative > 0)) {
      throw new BotError('InvalidInput', 'buy limit order needs a positive native amount');
    }
    return this.lock.runExclusive(() =>
      this.orders.addLimit({ token, side, targetPrice, percent, amountNative, expiresAt: opts.expiresAt ?? null, now: this.clock() }),
    );
  }

  async createTrailingStop(
    token: string,
    trailPct: number,
    opts: { percent?: number; expiresAt?: number | null } = {},
  ): Promise<TrailingStop> {
    requireFeature(this.tier, 'trailingStop');
    if (!(trailPct > 0 && trailPct < 100)) throw new BotError('InvalidInput', `trail percent must be in (0, 100), got ${trailPct}`);
    const status = await this.deps.statusOf(token);
    const price = this.positions.get(token)?.currentPrice ?? status?.priceNative ?? 0;
    if (!(price > 0)) throw new BotError('InvalidInput', `no price for ${shortenAddress(token)}`);
    return this.lock.runExclusive(() =>
      this.orders.addTrailing({
        token,
        trailPct,
        percent: opts.percent ?? 100,
        currentPrice: price,
        expiresAt: opts.expiresAt ?? null,
        now: this.clock(),
      }),
    );
  }

  /** N equal child buys, one every `intervalMs`; each goes through the full buy checks. */
  async createDcaPlan(token: string, totalNative: number, intervals: number, intervalMs: number): Promise<DcaPlan> {
    if (!isValidAddress(token)) throw new BotError('InvalidInput', `invalid token address ${token}`);
    if (!(totalNative > 0) || !Number.isInteger(intervals) || intervals < 1 || !(intervalMs > 0)) {
      throw new BotError('InvalidInput', 'DCA needs a positive amount, interval count and interval');
    }
    return this.lock.runExclusive(() => this.orders.addDca({ token, totalNative, intervals, intervalMs, now: this.clock() }));
  }

  async enableAutoSandwich(token: string, maxBuys: number, deadline: number, minVictimUsd = this.opts.minSandwichVictimUsd): Promise<AutoSandwichConfig> {
    requireFeature(this.tier, 'sandwich');
    if (!isValidAddress(token)) throw new BotError('InvalidInput', `invalid token address ${token}`);
    const config: AutoSandwichConfig = { token, maxBuys, executed: 0, deadline, minVictimUsd };
    await this.lock.runExclusive(() => this.orders.setAutoSandwich(config));
    logger.info(`[trade] Auto-sandwich on ${shortenAddress(token)}: up to ${maxBuys} until ${new Date(deadline).toISOString()}`);
    return config;
  }

  async cancelOrder(id: string): Promise<boolean> {
    return this.lock.runExclusive(() => this.orders.cancel(id));
  }

  /**
   * One price tick for a token: marks the position, then fires any limit
   * order, trailing stop or stop-loss it crosses.
   */
  async onPriceTick(token: string, price: number): Promise<TradeResult[]> {
    const now = this.clock();
    const { triggers, stopLoss } = await this.lock.runExclusive(() => {
      const position = this.positions.markPrice(token, price, now);
      this.heartbeat.touch();
      return {
        triggers: this.orders.evaluate(token, price, now),
        stopLoss: position ? evaluateStopLoss(position, this.opts.stopLossPct) : null,
      };
    });

    const results: TradeResult[] = [];
    let exited = false;
    for (const trigger of triggers) {
      if (trigger.kind === 'limit') {
        const { order } = trigger;
        const result =
          order.side === 'sell'
            ? await this.sell(order.token, order.percent)
            : await this.buy(order.token, nativeToWei(order.amountNative));
        if (order.side === 'sell' && order.percent >= 100) exited = true;
        this.deps.emitter.emit('orderFilled', order.id, order.token, 'limit');
        results.push(result);
      } else {
        const { stop } = trigger;
        results.push(await this.sell(stop.token, stop.percent));
        if (stop.percent >= 100) exited = true;
        this.deps.emitter.emit('orderFilled', stop.id, stop.token, 'trailing');
      }
    }

    if (stopLoss?.shouldSell && !exited) {
      results.push(await this.sell(token, 100));
      this.deps.emitter.emit('orderFilled', `stop-${addrKey(token)}`, token, 'stop_loss');
    }
    return results;
  }

  async runDueDca(): Promise<TradeResult[]> {
    const due = await this.lock.runExclusive(() => this.orders.takeDueDca(this.clock()));
    const results: TradeResult[] = [];
    for (const { plan, amountNative } of due) {
      const result = await this.buy(plan.token, nativeToWei(amountNative));
      this.deps.emitter.emit('orderFilled', plan.id, plan.token, 'dca');
      results.push(result);
    }
    return results;
  }

  /** Sandwiches the opportunity when auto-sandwich is enabled for its token and has budget left. */
  async maybeAutoSandwich(opp: SandwichOpportunity): Promise<SandwichResult | null> {
    const claimed = await this.lock.runExclusive(() =>
      this.orders.claimAutoSandwich(opp.victim.token, opp.victim.amountUsd, this.clock()),
    );
    if (!claimed) return null;
    logger.info(`[trade] Auto-sandwich ${claimed.executed}/${claimed.maxBuys} on ${shortenAddress(claimed.token)}`);
    return this.executeSandwich({ victimHash: opp.victim.hash });
  }

  async executeProfitDecision(token: string, decision: ProfitDecision): Promise<ExecutionResult> {
    const timestamp = this.clock();
    try {
      switch (decision.kind) {
        case 'TakeProfitNow': {
          const trade = await this.sell(token, 100);
          return { success: trade.success, decision: decision.kind, trade, error: trade.error, timestamp };
        }
        case 'HoldForPriceTarget': {
          const order = await this.createLimitOrder(token, 'sell', decision.targetPrice, {
            percent: 100,
            expiresAt: decision.deadline,
          });
          return { success: true, decision: decision.kind, orderId: order.id, timestamp };
        }
        case 'ContinueSandwich': {
          await this.enableAutoSandwich(token, decision.maxBuys, decision.deadline);
          return { success: true, decision: decision.kind, timestamp };
        }
        case 'DCABuy': {
          const position = this.positions.get(token);
          if (!position) throw new BotError('InvalidInput', `no position in ${shortenAddress(token)} to average into`);
          const total = (position.costBasisNative * decision.pct) / 100;
          const plan = await this.createDcaPlan(token, total, decision.intervals, decision.windowMs / decision.intervals);
          return { success: true, decision: decision.kind, orderId: plan.id, timestamp };
        }
      }
    } catch (err) {
      const e = toBotError(err, decision.kind);
      logger.warn(`[trade] ${decision.kind} on ${shortenAddress(token)} failed: ${e.toString()}`);
      return { success: false, decision: decision.kind, error: e.message, timestamp };
    }
  }

  // ─── Queries ───────────────────────────────────────────────────────

  position(token: string): Position | undefined {
    const p = this.positions.get(token);
    return p ? { ...p } : undefined;
  }

  openPositions(): Position[] {
    return this.positions.list().map((p) => ({ ...p }));
  }

  hasOrdersFor(token: string): boolean {
    return this.orders.hasOrdersFor(token);
  }

  exportState(): TradeManagerState {
    return { positions: this.openPositions(), orders: this.orders.exportState() };
  }

  lastSuccessTs(): number {
    return this.heartbeat.lastSuccessTs;
  }

  /**
   * Routes trades still running on this instance to `next`: their fills
   * land in its books and their slots count against its limit.
   */
  handOff(next: TradeManager): void {
    this.successor = next;
    next.active += this.active;
    activeTrades.set(next.active);
  }

  /** The instance currently holding the books. */
  private get live(): TradeManager {
    let m: TradeManager = this;
    while (m.successor) m = m.successor;
    return m;
  }

  async probe(timeoutMs: number): Promise<boolean> {
    const ok = await this.lock.probe(timeoutMs);
    if (ok) this.heartbeat.touch();
    return ok;
  }

  // ─── Internals ─────────────────────────────────────────────────────

  private async guardedBuy(
    token: string,
    amount: bigint,
    config: TradeConfig,
    label: string,
  ): Promise<TradeResult> {
    try {
      await this.preflightBuy(token, amount);
      return await this.tokenLocks.runExclusive(addrKey(token), () =>
        this.tracked(async () => (await this.buyCore(token, amount, config, label)).result),
      );
    } catch (err) {
      return this.failed(token, 'buy', amount, err);
    }
  }

  /** Address, amount, safety level, tier and reserve checks, in that order. */
  private async preflightBuy(token: string, amount: bigint): Promise<TokenStatus> {
    if (!isValidAddress(token)) throw new BotError('InvalidInput', `invalid token address ${token}`);
    if (amount <= 0n) throw new BotError('InvalidInput', 'buy amount must be positive');

    const status = await this.deps.statusOf(token);
    assertBuyable(status?.safetyLevel ?? 'Red', this.tier);
    if (!status) throw new BotError('SafetyRefusal', `no status for ${shortenAddress(token)}`, { detail: 'Red' });

    const balance = await this.deps.adapter.getBalance(this.deps.adapter.walletAddress);
    const reserve = pctOf(balance, this.opts.reservePercent);
    if (amount + reserve > balance) {
      throw new BotError('ReserveExhausted', `buy of ${weiToNative(amount)} would cut into the ${this.opts.reservePercent}% reserve`);
    }
    if (amount > pctOf(balance, this.opts.maxPositionSizePercent)) {
      throw new BotError('ReserveExhausted', `buy exceeds the ${this.opts.maxPositionSizePercent}% position limit`);
    }
    return status;
  }

  /** Counts the trade against the tier's concurrency limit while `fn` runs. */
  private async tracked<T>(fn: () => Promise<T>): Promise<T> {
    const owner = this.live;
    await owner.lock.runExclusive(() => {
      const max = TIER_POLICIES[owner.tier].maxSimultaneousTrades;
      if (owner.active >= max) {
        throw new BotError('TierRestricted', `${owner.tier} tier allows ${max} simultaneous trade(s)`);
      }
      owner.active++;
      activeTrades.set(owner.active);
    });
    try {
      return await fn();
    } finally {
      const done = this.live;
      await done.lock.runExclusive(() => {
        done.active--;
        activeTrades.set(done.active);
        done.heartbeat.touch();
      });
    }
  }

  private async buyCore(token: string, amount: bigint, config: TradeConfig, label: string): Promise<LegFill> {
    const { adapter, submission } = this.deps;
    const { chain, walletAddress: wallet } = adapter;
    tradesAttempted.inc({ side: 'buy' });
    tradeAmountNative.observe(weiToNative(amount));

    const path = [chain.wrappedNative, token];
    const quoteOut = await this.quote(amount, path);
    if (quoteOut === 0n) throw new BotError('InvalidInput', `no route for ${shortenAddress(token)}`);
    await this.ensureAllowance(token, quoteOut);

    const minOut = pctOf(quoteOut, 100 - (config.slippage ?? this.slippage));
    const data = adapter.router.encodeFunctionData(`${chain.swapFunctions.nativeForTokens}SupportingFeeOnTransferTokens`, [
      minOut,
      path,
      wallet,
      this.deadline(),
    ]);
    const tx: TxRequest = { to: chain.router, data, value: amount };
    const gasLimit = await this.gasLimitFor(tx);

    const before = await adapter.getTokenBalance(token, wallet);
    const outcome = await submission.submit({
      label,
      tx,
      gas: config.gas ?? this.deps.gas.optimal(),
      gasLimit,
      privateRelay: config.privateRelay,
    });
    const received = outcome.dryRun ? quoteOut : (await adapter.getTokenBalance(token, wallet)) - before;

    const status = await this.deps.statusOf(token);
    const costNative = weiToNative(amount);
    const books = this.live;
    const opened = await books.lock.runExclusive(() => {
      if (received <= 0n) return null;
      return books.positions.recordBuy({
        token,
        chainId: chain.id,
        symbol: status?.symbol ?? '???',
        decimals: status?.decimals ?? 18,
        amount: received,
        costNative,
        timestamp: this.clock(),
      });
    });

    const result = this.succeeded(token, 'buy', amount, received, outcome);
    this.deps.emitter.emit('tradeExecuted', result);
    if (opened?.opened) this.deps.emitter.emit('positionOpened', opened.position);
    logger.info(`[trade] BUY ${shortenAddress(token)} ${costNative} → ${received} units (${outcome.hash})`);
    return { result, native: costNative, gasFeeNative: gasFee(outcome), tokens: received };
  }

  private async sellCore(
    token: string,
    percent: number,
    config: TradeConfig & { emergency?: boolean },
    label: string,
  ): Promise<LegFill> {
    const { adapter, submission } = this.deps;
    const { chain, walletAddress: wallet } = adapter;
    tradesAttempted.inc({ side: 'sell' });

    const balance = await adapter.getTokenBalance(token, wallet);
    const requested = config.amount ?? calculateSellAmount(balance, percent);
    const amount = requested > balance ? balance : requested;
    if (amount <= 0n) throw new BotError('InvalidInput', `no ${shortenAddress(token)} balance to sell`);

    await this.ensureAllowance(token, amount);

    const path = [token, chain.wrappedNative];
    let quoteOut = 0n;
    try {
      quoteOut = await this.quote(amount, path);
    } catch (err) {
      if (!config.emergency) throw err;
      logger.warn(`[trade] Emergency sell quote failed, selling without a floor: ${errorMessage(err)}`);
    }
    const minOut = pctOf(quoteOut, 100 - (config.slippage ?? this.slippage));
    const data = adapter.router.encodeFunctionData(`${chain.swapFunctions.tokensForNative}SupportingFeeOnTransferTokens`, [
      amount,
      minOut,
      path,
      wallet,
      this.deadline(),
    ]);
    const tx: TxRequest = { to: chain.router, data, value: 0n };
    const gasLimit = await this.gasLimitFor(tx);

    const nativeBefore = await adapter.getBalance(wallet);
    const outcome = await submission.submit({
      label,
      tx,
      gas: config.gas ?? this.deps.gas.optimal(),
      gasLimit,
      privateRelay: config.privateRelay,
    });

    let proceeds: bigint;
    if (outcome.dryRun) {
      proceeds = quoteOut;
    } else {
      const receipt = outcome.receipt;
      const fee = receipt ? receipt.gasUsed * receipt.effectiveGasPrice : 0n;
      const delta = (await adapter.getBalance(wallet)) - nativeBefore + fee;
      proceeds = delta > 0n ? delta : 0n;
    }
    const proceedsNative = weiToNative(proceeds);

    const books = this.live;
    const closed = await books.lock.runExclusive(() =>
      books.positions.recordSell({ token, amount, proceedsNative, timestamp: this.clock() }),
    );

    const result = this.succeeded(token, 'sell', amount, proceeds, outcome);
    this.deps.emitter.emit('tradeExecuted', result);
    if (closed?.closed) this.deps.emitter.emit('positionClosed', closed.position);
    logger.info(`[trade] SELL ${shortenAddress(token)} ${amount} units → ${proceedsNative} (${outcome.hash})`);
    return { result, native: proceedsNative, gasFeeNative: gasFee(outcome), tokens: amount };
  }

  /**
   * Front leg, ordering check, victim wait, then the back leg or the
   * emergency unwind. Every exit path tries to sell what the front bought.
   */
  private async sandwichCore(
    victim: ChainTransaction,
    token: string,
    params: SandwichParams,
    base: SandwichResult,
  ): Promise<SandwichResult> {
    const cfg = this.opts.sandwich;
    const { adapter, gas } = this.deps;
    const victimGas = txGas(victim, adapter.chain.eip1559);
    const frontGas = gas.scaled(victimGas, params.frontMultiplier ?? cfg.frontMultiplier);
    const backGas = gas.scaled(victimGas, params.backMultiplier ?? cfg.backMultiplier);
    const amount = pctOf(victim.value, params.amountPercent ?? cfg.amountPercent);
    if (amount <= 0n) throw new BotError('InvalidInput', 'front-run amount rounds to zero');

    logger.info(
      `[trade] Sandwich ${shortenAddress(token)} victim=${victim.hash} front=${formatGwei(gasCeiling(frontGas))} back=${formatGwei(gasCeiling(backGas))}`,
    );

    const front = await this.buyCore(token, amount, { gas: frontGas, privateRelay: params.usePrivateRelay }, 'front');
    const result: SandwichResult = {
      ...base,
      frontTxHash: front.result.txHash,
      frontGasPrice: front.result.gasPrice,
    };

    let unwind: Unwind | null = null;
    if (!this.deps.submission.dryRun) {
      unwind = await this.awaitVictim(victim.hash, front.result.txHash, params.victimWaitMs ?? cfg.victimWaitMs);
    }

    if (unwind === null) {
      try {
        const back = await this.sellCore(token, 100, { amount: front.tokens, gas: backGas }, 'back');
        const profitNative = back.native - front.native - front.gasFeeNative - back.gasFeeNative;
        return {
          ...result,
          success: front.result.txHash !== null && back.result.txHash !== null && front.result.txHash !== back.result.txHash,
          backTxHash: back.result.txHash,
          backGasPrice: back.result.gasPrice,
          profitNative,
          profitUsd: profitNative * adapter.chain.nativeUsd,
          timestamp: this.clock(),
        };
      } catch (err) {
        unwind = { kind: classifyError(err), reason: `back-run failed: ${errorMessage(err)}` };
      }
    }

    logger.warn(`[trade] Sandwich on ${shortenAddress(token)} unwinding: ${unwind.reason}`);
    const emergencyGas = gas.scaled(frontGas, cfg.emergencyGasMultiplier);
    try {
      const exit = await this.sellCore(
        token,
        100,
        { amount: front.tokens, gas: emergencyGas, slippage: cfg.emergencySlippage, emergency: true },
        'emergency',
      );
      const profitNative = exit.native - front.native - front.gasFeeNative - exit.gasFeeNative;
      return {
        ...result,
        emergency: true,
        backTxHash: exit.result.txHash,
        backGasPrice: exit.result.gasPrice,
        profitNative,
        profitUsd: profitNative * adapter.chain.nativeUsd,
        errorKind: unwind.kind,
        error: unwind.reason,
        timestamp: this.clock(),
      };
    } catch (err) {
      const e = toBotError(err, 'emergency sell');
      logger.error(`[trade] Emergency sell of ${shortenAddress(token)} failed, position left open: ${e.toString()}`);
      return { ...result, emergency: true, errorKind: e.kind, error: e.message, timestamp: this.clock() };
    }
  }

  /**
   * Null when the victim confirmed after our front leg; otherwise why to
   * unwind: the victim landed first, reverted, or never landed.
   */
  private async awaitVictim(victimHash: string, frontHash: string | null, waitMs: number): Promise<Unwind | null> {
    const { adapter } = this.deps;
    const frontReceipt = frontHash ? await adapter.getTransactionReceipt(frontHash) : null;
    try {
      const victim = await waitForReceipt(adapter, victimHash, {
        timeoutMs: waitMs,
        pollMs: this.opts.receiptPollMs,
        clock: this.clock,
      });
      if (victim.status === 'reverted') return { kind: 'ExecutionReverted', reason: 'victim reverted' };
      if (
        frontReceipt &&
        (victim.blockNumber < frontReceipt.blockNumber ||
          (victim.blockNumber === frontReceipt.blockNumber && victim.transactionIndex < frontReceipt.transactionIndex))
      ) {
        return { kind: 'Other', reason: 'victim landed before the front-run' };
      }
      return null;
    } catch (err) {
      if (classifyError(err) === 'Timeout') return { kind: 'Timeout', reason: `victim not confirmed within ${waitMs}ms` };
      throw err;
    }
  }

  /** A pending router buy worth at least `minUsd`, with the token it buys. */
  private async pendingTarget(
    hash: string,
    minUsd: number,
    label: string,
  ): Promise<{ tx: ChainTransaction; token: string }> {
    const { adapter } = this.deps;
    const tx = await adapter.getTransaction(hash);
    if (!tx) throw new BotError('InvalidInput', `${label} ${hash} not found`);
    if (tx.blockNumber !== null) throw new BotError('InvalidInput', `${label} ${hash} already mined`);

    const swap = decodeSwap(adapter.router, tx.data, tx.value);
    if (!swap || !swap.nativeIn) throw new BotError('InvalidInput', `${label} ${hash} is not a native-in router swap`);
    const token = targetToken(swap.path, adapter.chain.wrappedNative);
    if (!token) throw new BotError('InvalidInput', `${label} ${hash} has no target token`);

    const usd = weiToNative(tx.value) * adapter.chain.nativeUsd;
    if (usd < minUsd) throw new BotError('InvalidInput', `${label} worth $${usd.toFixed(0)} is below $${minUsd}`);
    return { tx, token };
  }

  private async ensureAllowance(token: string, needed: bigint): Promise<void> {
    const { adapter, submission } = this.deps;
    const allowance = await withRetry(
      () => adapter.getAllowance(token, adapter.walletAddress, adapter.chain.router),
      'allowance',
    );
    if (allowance >= needed) return;

    logger.info(`[trade] Approving router for ${shortenAddress(token)}`);
    const tx: TxRequest = {
      to: token,
      data: erc20Interface.encodeFunctionData('approve', [adapter.chain.router, MAX_APPROVAL]),
      value: 0n,
    };
    try {
      await submission.submit({ label: 'approve', tx, gas: this.deps.gas.optimal(), gasLimit: await this.gasLimitFor(tx) });
    } catch (err) {
      throw new BotError('AllowanceMissing', `approve for ${shortenAddress(token)} failed: ${errorMessage(err)}`, { cause: err });
    }
  }

  private async quote(amount: bigint, path: string[]): Promise<bigint> {
    const amounts = await withRetry(() => this.deps.adapter.getAmountsOut(amount, path), 'quote');
    return amounts[amounts.length - 1] ?? 0n;
  }

  private async gasLimitFor(tx: TxRequest): Promise<bigint> {
    try {
      return mulFactor(await this.deps.adapter.estimateGas(tx), this.opts.gasLimitHeadroom);
    } catch (err) {
      const e = toBotError(err, 'estimateGas');
      if (e.kind === 'ExecutionReverted' || e.kind === 'InsufficientFunds') throw e;
      logger.debug(`[trade] Gas estimate failed (${e.kind}), using ${FALLBACK_GAS_LIMIT}`);
      return FALLBACK_GAS_LIMIT;
    }
  }

  private deadline(): bigint {
    return BigInt(Math.floor(this.clock() / 1000) + SWAP_DEADLINE_SECONDS);
  }

  private succeeded(token: string, side: OrderSide, amountIn: bigint, amountOut: bigint, outcome: SubmissionOutcome): TradeResult {
    tradesSuccessful.inc({ side });
    if (outcome.receipt) tradeGasUsed.observe(Number(outcome.receipt.gasUsed));
    return {
      success: true,
      token,
      side,
      txHash: outcome.hash,
      amountIn,
      amountOut,
      gasPrice: gasCeiling(outcome.gas),
      gasUsed: outcome.receipt?.gasUsed ?? null,
      attempts: outcome.attempts,
      timestamp: this.clock(),
    };
  }

  private failed(token: string, side: OrderSide, amountIn: bigint, err: unknown): TradeResult {
    const e = toBotError(err, side);
    tradesFailed.inc({ side, kind: e.kind });
    logger.warn(`[trade] ${side.toUpperCase()} ${token ? shortenAddress(token) : '?'} failed: ${e.toString()}`);
    const result: TradeResult = {
      success: false,
      token,
      side,
      txHash: null,
      amountIn,
      amountOut: 0n,
      gasPrice: null,
      gasUsed: null,
      attempts: 0,
      errorKind: e.kind,
      error: e.message,
      timestamp: this.clock(),
    };
    this.deps.emitter.emit('tradeExecuted', result);
    return result;
  }
}
