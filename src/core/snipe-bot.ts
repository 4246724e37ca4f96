import { logger } from '../utils/logger.js';
import { BotError, errorMessage } from '../errors.js';
import { TaskGroup } from '../utils/tasks.js';
import { BoundedChannel } from '../utils/channel.js';
import { addrKey, nativeToWei, pctOf, shortenAddress, weiToNative } from '../utils/helpers.js';
import { HealthSupervisor, SubsystemSlot } from './supervisor.js';
import { NonceManager } from './nonce-manager.js';
import { hasPrivateRelay, type ChainAdapter } from './chain-adapter.js';
import { GasOptimizer } from '../execution/gas-optimizer.js';
import { SubmissionPipeline } from '../execution/submission.js';
import { TradeManager } from '../execution/trade-manager.js';
import { MempoolTracker } from '../detection/mempool-tracker.js';
import { botEmitter, type BotEmitter } from '../detection/event-emitter.js';
import { RiskAnalyzer } from '../analysis/risk-analyzer.js';
import { RouterTaxProbe, type TaxProbe } from '../analysis/tax-probe.js';
import { ExplorerClient, type HolderSource, type VerificationSource } from '../analysis/explorer.js';
import { TokenStatusTracker } from '../analysis/token-status-tracker.js';
import { StrategyOptimizer } from '../strategy/strategy-optimizer.js';
import { AutoTuner } from '../strategy/auto-tuning.js';
import { TIER_POLICIES, requireFeature, tierAllows } from '../strategy/tiers.js';
import { AICoordinator, type FeatureSources } from '../ai/ai-coordinator.js';
import { HeuristicPredictor, type Predictor } from '../ai/predictor.js';
import { summarizeTrades, type TradeAnalytics } from '../data/analytics.js';
import { channelDrops, subsystemRebuilds, trackedTokens } from '../telemetry/metrics.js';
import type { Cache } from '../data/cache.js';
import type { Store } from '../data/database.js';
import type { NotificationService } from '../telegram/notifications.js';
import type { GasSnapshot } from '../execution/gas-optimizer.js';
import type { HeldPositionContext } from '../strategy/profit-decision.js';
import type {
  AIDecision,
  BotConfig,
  BotMode,
  ExecutionResult,
  MempoolHealth,
  PendingSwap,
  SandwichResult,
  Tier,
  TokenRiskAnalysis,
  TokenStatus,
  TradeResult,
} from '../types.js';

export interface SnipeBotDeps {
  config: BotConfig;
  adapter: ChainAdapter;
  predictor?: Predictor;
  taxProbe?: TaxProbe;
  verification?: VerificationSource;
  holders?: HolderSource;
  riskCache?: Cache<TokenRiskAnalysis>;
  aiCache?: Cache<AIDecision>;
  store?: Store | null;
  notifications?: NotificationService | null;
  emitter?: BotEmitter;
  clock?: () => number;
  /** Seed for the strategy simulations. */
  seed?: number;
}

export type ActionOutcome =
  | { action: 'buy' | 'frontrun'; token: string; trade: TradeResult }
  | { action: 'sandwich'; token: string; sandwich: SandwichResult }
  | { action: 'sell'; token: string; execution: ExecutionResult };

export interface CycleReport {
  discovered: number;
  tracked: number;
  alerts: number;
  recommendations: number;
  executed: ActionOutcome[];
}

export interface BotStatus {
  running: boolean;
  mode: BotMode;
  tier: Tier;
  trackedTokens: number;
  openPositions: number;
  mempoolHealth: MempoolHealth;
  droppedMessages: number;
  gas: GasSnapshot;
  analytics: TradeAnalytics | null;
}

/** Competitor searchers touching a token's pending flow. */
function competitorsIn(pending: readonly PendingSwap[], isMev: (hash: string) => boolean): PendingSwap[] {
  return pending.filter((s) => isMev(s.hash));
}

/**
 * Wires the subsystems together and drives them: mempool ingestion, gas
 * sampling, the discover/refresh/decide/execute cycle, health supervision
 * and persistence. Each stateful subsystem lives in a slot so the health
 * task can swap in a rebuilt instance.
 */
export class SnipeBot {
  private readonly config: BotConfig;
  private readonly adapter: ChainAdapter;
  private readonly emitter: BotEmitter;
  private readonly clock: () => number;
  private readonly tasks = new TaskGroup();
  private readonly supervisor: HealthSupervisor;
  private readonly tuner = new AutoTuner();
  private readonly discovered: BoundedChannel<string>;
  private readonly risk: RiskAnalyzer;
  private readonly submission: SubmissionPipeline;
  private readonly predictor: Predictor;
  private readonly holders: HolderSource;
  private readonly store: Store | null;
  private readonly notifications: NotificationService | null;
  /** AI confidence behind trades in flight, consumed when their result arrives. */
  private readonly signalConfidence = new Map<string, number>();

  private readonly nonceSlot: SubsystemSlot<NonceManager>;
  private readonly gasSlot: SubsystemSlot<GasOptimizer>;
  private readonly trackerSlot: SubsystemSlot<TokenStatusTracker>;
  private readonly mempoolSlot: SubsystemSlot<MempoolTracker>;
  private readonly strategySlot: SubsystemSlot<StrategyOptimizer>;
  private readonly tradeSlot: SubsystemSlot<TradeManager>;
  private readonly aiSlot: SubsystemSlot<AICoordinator>;

  private tier: Tier;
  private currentMode: BotMode;
  private requestedMode: BotMode;
  private running = false;

  constructor(private readonly deps: SnipeBotDeps) {
    const { config, adapter } = deps;
    this.config = config;
    this.adapter = adapter;
    this.emitter = deps.emitter ?? botEmitter;
    this.clock = deps.clock ?? Date.now;
    this.tier = config.trading.tier;
    this.store = deps.store ?? null;
    this.notifications = deps.notifications ?? null;
    this.predictor = deps.predictor ?? new HeuristicPredictor();
    this.supervisor = new HealthSupervisor(config.bot.deadlockThresholdMs, Math.min(2_000, config.bot.lockTimeoutMs), this.clock);
    this.discovered = new BoundedChannel('new-tokens', config.bot.channelCapacity, (name) => channelDrops.inc({ channel: name }));

    const explorer = new ExplorerClient(config.explorer.apiUrl, config.explorer.apiKey);
    this.holders = deps.holders ?? explorer;
    this.risk = new RiskAnalyzer({
      adapter,
      taxProbe: deps.taxProbe ?? new RouterTaxProbe(adapter),
      verification: deps.verification ?? explorer,
      holders: this.holders,
      cache: deps.riskCache,
      clock: this.clock,
    });

    this.nonceSlot = new SubsystemSlot('nonce-manager', this.buildNonces());
    this.gasSlot = new SubsystemSlot('gas-optimizer', this.buildGas());
    this.trackerSlot = new SubsystemSlot('token-status-tracker', this.buildTracker());
    this.mempoolSlot = new SubsystemSlot('mempool-tracker', this.buildMempool());
    this.strategySlot = new SubsystemSlot('strategy-optimizer', this.buildStrategy(config.trading.riskTolerance));

    this.submission = new SubmissionPipeline(
      adapter,
      {
        next: (address) => this.nonceSlot.get().next(address),
        reset: (address) => this.nonceSlot.get().reset(address),
      },
      {
        scaled: (base, multiplier) => this.gasSlot.get().scaled(base, multiplier),
        bumpedGas: (base, retry) => this.gasSlot.get().bumpedGas(base, retry),
      },
      {
        dryRun: config.trading.dryRun,
        receiptTimeoutMs: config.trading.receiptTimeoutMs,
        receiptPollMs: config.trading.receiptPollMs,
      },
    );

    const restored = this.store?.load();
    if (restored && (restored.positions.length > 0 || restored.orders.limits.length > 0)) {
      logger.info(`[bot] Restored ${restored.positions.length} position(s) and ${restored.orders.limits.length} limit order(s)`);
    }
    this.tradeSlot = new SubsystemSlot(
      'trade-manager',
      this.buildTrades(this.tier, config.trading.defaultSlippage, restored ? { positions: restored.positions, orders: restored.orders } : undefined),
    );
    this.aiSlot = new SubsystemSlot('ai-coordinator', this.buildAi(config.trading.autoTradeEnabled, config.trading.autoTradeThreshold));

    this.supervisor.watch(this.nonceSlot, () => this.buildNonces());
    this.supervisor.watch(this.gasSlot, (old) => this.buildGas(old.currentBias));
    this.supervisor.watch(this.trackerSlot, (old) => this.buildTracker(old.exportState()));
    this.supervisor.watch(this.mempoolSlot, (old) => this.buildMempool(old.exportState()));
    this.supervisor.watch(this.strategySlot, (old) => this.buildStrategy(old.tolerance));
    this.supervisor.watch(this.tradeSlot, (old) => {
      const next = this.buildTrades(old.currentTier, old.currentSlippage, old.exportState());
      old.handOff(next);
      return next;
    });
    this.supervisor.watch(this.aiSlot, (old) => this.buildAi(old.autoTradeEnabled, old.confidenceThreshold, old.exportState()));

    this.currentMode = config.trading.autoTradeEnabled && tierAllows(this.tier, 'autoTrade') ? 'auto' : 'manual';
    this.requestedMode = this.currentMode;
  }

  // ─── Lifecycle ─────────────────────────────────────────────────────

  async start(): Promise<void> {
    if (this.running) return;
    this.running = true;
    const { config } = this;

    this.emitter.on('tradeExecuted', this.onTradeResult);
    this.emitter.on('sandwichExecuted', this.onSandwichResult);
    this.notifications?.start(this.emitter);

    try {
      await this.gasSlot.get().refresh(this.adapter);
    } catch (err) {
      logger.warn(`[bot] Initial gas sample failed: ${errorMessage(err)}`);
    }

    this.spawnMempool();
    this.tasks.every('gas', this.adapter.chain.blockTimeMs, () => this.sampleGas());
    this.tasks.every('cycle', config.bot.cycleIntervalSeconds * 1000, async () => {
      await this.runCycle();
    });
    this.tasks.every('health', config.bot.healthIntervalMs, () => this.checkHealth());
    if (this.store) {
      this.tasks.every('persist', config.bot.persistIntervalMs, async () => this.persist());
    }

    logger.info(`[bot] Started on ${this.adapter.chain.name} (mode=${this.currentMode}, tier=${this.tier}${config.trading.dryRun ? ', dry-run' : ''})`);
  }

  /** Stops every task, waits for them up to the drain deadline, then writes a final snapshot. */
  async stop(): Promise<void> {
    if (!this.running) return;
    this.running = false;

    const stuck = await this.tasks.shutdown(this.config.bot.shutdownDrainMs);
    if (stuck.length > 0) logger.warn(`[bot] Tasks still running at shutdown deadline: ${stuck.join(', ')}`);
    this.mempoolSlot.get().dispose();
    this.discovered.close();

    try {
      this.persist();
    } catch (err) {
      logger.error(`[bot] Final snapshot failed: ${errorMessage(err)}`);
    }

    this.emitter.off('tradeExecuted', this.onTradeResult);
    this.emitter.off('sandwichExecuted', this.onSandwichResult);
    this.notifications?.stop();
    await this.notifications?.flush();
    logger.info('[bot] Stopped');
  }

  get isRunning(): boolean {
    return this.running;
  }

  // ─── Mode & tier ───────────────────────────────────────────────────

  get mode(): BotMode {
    return this.currentMode;
  }

  get currentTier(): Tier {
    return this.tier;
  }

  /** `auto` needs auto-trading on the tier; `mev` needs VIP and a live mempool feed. */
  async setMode(mode: BotMode): Promise<void> {
    if (mode !== 'manual') requireFeature(this.tier, 'autoTrade');
    if (mode === 'mev') {
      requireFeature(this.tier, 'sandwich');
      if (this.mempoolSlot.get().isDegraded) {
        throw new BotError('MempoolDegraded', 'mempool feed is degraded; mev mode unavailable');
      }
    }
    await this.aiSlot.get().setAutoTrade(mode !== 'manual');
    this.requestedMode = mode;
    this.applyMode(mode);
  }

  async setTier(tier: Tier): Promise<void> {
    this.tier = tier;
    await this.tradeSlot.get().setTier(tier);
    if (this.currentMode === 'mev' && !tierAllows(tier, 'sandwich')) this.applyMode('auto');
    if (this.currentMode !== 'manual' && !tierAllows(tier, 'autoTrade')) this.applyMode('manual');
    this.requestedMode = this.currentMode;
    const max = TIER_POLICIES[tier].maxTrackedTokens;
    if (this.trackerSlot.get().size > max) await this.trackerSlot.get().trim(max);
  }

  // ─── Manual operations ─────────────────────────────────────────────

  /** Starts tracking a token and refreshes it once. */
  async addToken(token: string): Promise<TokenStatus | null> {
    const tracker = this.trackerSlot.get();
    const max = TIER_POLICIES[this.tier].maxTrackedTokens;
    if (tracker.peek(token) === null && tracker.size >= max) {
      throw new BotError('TierRestricted', `${this.tier} tier tracks at most ${max} tokens`);
    }
    await tracker.add(token);
    await tracker.refresh(token);
    trackedTokens.set(tracker.size);
    return tracker.get(token);
  }

  async removeToken(token: string): Promise<boolean> {
    const removed = await this.trackerSlot.get().remove(token);
    await this.aiSlot.get().invalidate(token);
    trackedTokens.set(this.trackerSlot.get().size);
    return removed;
  }

  buy(token: string, amountNative: number): Promise<TradeResult> {
    return this.tradeSlot.get().buy(token, nativeToWei(amountNative));
  }

  sell(token: string, percent: number): Promise<TradeResult> {
    return this.tradeSlot.get().sell(token, percent);
  }

  // ─── Subsystems ────────────────────────────────────────────────────

  get trades(): TradeManager {
    return this.tradeSlot.get();
  }

  get tracker(): TokenStatusTracker {
    return this.trackerSlot.get();
  }

  get mempool(): MempoolTracker {
    return this.mempoolSlot.get();
  }

  get gas(): GasOptimizer {
    return this.gasSlot.get();
  }

  get strategy(): StrategyOptimizer {
    return this.strategySlot.get();
  }

  get ai(): AICoordinator {
    return this.aiSlot.get();
  }

  get nonces(): NonceManager {
    return this.nonceSlot.get();
  }

  status(): BotStatus {
    return {
      running: this.running,
      mode: this.currentMode,
      tier: this.tier,
      trackedTokens: this.trackerSlot.get().size,
      openPositions: this.tradeSlot.get().openPositions().length,
      mempoolHealth: this.mempoolSlot.get().health,
      droppedMessages: this.mempoolSlot.get().droppedMessages + this.discovered.dropped,
      gas: this.gasSlot.get().snapshot(),
      analytics: this.store ? summarizeTrades(this.store.loadTrades()) : null,
    };
  }

  // ─── Cycle ─────────────────────────────────────────────────────────

  /**
   * One pass of the auto-trade loop: discover, refresh, fire standing
   * orders, ask for recommendations, act on the confident ones, tune.
   */
  async runCycle(): Promise<CycleReport> {
    const discovered = await this.discover();
    const tracker = this.trackerSlot.get();

    const max = TIER_POLICIES[this.tier].maxTrackedTokens;
    if (tracker.size > max) await tracker.trim(max);
    const alerts = await tracker.updateAll();
    trackedTokens.set(tracker.size);

    await this.tickOrders();

    const executed: ActionOutcome[] = [];
    if (this.currentMode === 'mev') executed.push(...(await this.runAutoSandwiches()));
    let recommendations = 0;
    if (this.currentMode !== 'manual' && tierAllows(this.tier, 'aiAnalysis')) {
      const ai = this.aiSlot.get();
      const recs = await ai.recommendations(tracker.tokens());
      recommendations = recs.length;
      for (const rec of recs) {
        if (!ai.shouldAutoTrade(rec)) continue;
        try {
          const outcome = await this.act(rec);
          if (outcome) executed.push(outcome);
        } catch (err) {
          logger.warn(`[bot] ${rec.action} on ${shortenAddress(rec.token)} failed: ${errorMessage(err)}`);
        }
      }
    }

    if (this.config.bot.autoTuningEnabled) await this.tune();

    const report: CycleReport = { discovered, tracked: tracker.size, alerts: alerts.length, recommendations, executed };
    logger.debug('[bot] Cycle complete', { ...report, executed: executed.length });
    return report;
  }

  private async discover(): Promise<number> {
    const tracker = this.trackerSlot.get();
    const max = TIER_POLICIES[this.tier].maxTrackedTokens;
    let added = 0;
    for (const token of this.discovered.drain()) {
      if (tracker.size >= max) break;
      try {
        if (await tracker.add(token)) added++;
      } catch (err) {
        logger.debug(`[bot] Skipping discovered ${shortenAddress(token)}: ${errorMessage(err)}`);
      }
    }
    if (added > 0) logger.info(`[bot] Discovered ${added} new token(s)`);
    return added;
  }

  /** Feeds current prices to the order book and runs due DCA slices. */
  private async tickOrders(): Promise<void> {
    const trades = this.tradeSlot.get();
    const tracker = this.trackerSlot.get();
    const tokens = new Map<string, string>();
    for (const p of trades.openPositions()) tokens.set(addrKey(p.token), p.token);
    for (const t of tracker.tokens()) if (trades.hasOrdersFor(t)) tokens.set(addrKey(t), t);

    for (const token of tokens.values()) {
      const price = tracker.peek(token)?.priceNative ?? 0;
      if (price > 0) await trades.onPriceTick(token, price);
    }
    await trades.runDueDca();
  }

  /** Offers the best pending victim on each token with an auto-sandwich budget. */
  private async runAutoSandwiches(): Promise<ActionOutcome[]> {
    const trades = this.tradeSlot.get();
    const mempool = this.mempoolSlot.get();
    const out: ActionOutcome[] = [];
    for (const p of trades.openPositions()) {
      if (!trades.hasOrdersFor(p.token)) continue;
      const opp = await mempool.bestSandwich(p.token);
      if (!opp || !(await mempool.claim(opp.victim.hash))) continue;
      const sandwich = await trades.maybeAutoSandwich(opp);
      if (sandwich) out.push({ action: 'sandwich', token: p.token, sandwich });
    }
    return out;
  }

  private async act(rec: AIDecision): Promise<ActionOutcome | null> {
    const { token } = rec;
    const trades = this.tradeSlot.get();
    const holding = trades.position(token) !== undefined;

    switch (rec.action) {
      case 'buy': {
        if (holding || !tierAllows(this.tier, 'autoTrade')) return null;
        const balance = await this.adapter.getBalance(this.adapter.walletAddress);
        const budget = weiToNative(pctOf(balance, this.config.trading.maxPositionSizePercent));
        const pending = await this.mempoolSlot.get().pendingSwaps(token);
        const plan = await this.strategySlot.get().optimize({
          token,
          action: 'buy',
          aiConfidence: rec.confidence,
          baseAmountNative: budget,
          competitors: competitorsIn(pending, (h) => this.mempoolSlot.get().isMev(h)).length,
        });
        const gas = this.gasSlot.get();
        this.signalConfidence.set(addrKey(token), rec.confidence);
        const trade = await trades.buy(token, nativeToWei(plan.amountNative), {
          gas: gas.scaled(gas.optimal(), plan.gasMultiplier),
          privateRelay: plan.usePrivateRelay,
        });
        return { action: 'buy', token, trade };
      }

      case 'sell': {
        const position = trades.position(token);
        if (!position) return null;
        const ctx = await this.heldContext(token, position.unrealizedPnlNative, position.currentPrice, position.boughtAt);
        const best = this.strategySlot.get().profitAlternatives(ctx)[0];
        if (!best) return null;
        logger.info(`[bot] ${shortenAddress(token)}: ${best.decision.kind} (score ${best.score.toFixed(4)})`);
        const execution = await trades.executeProfitDecision(token, best.decision);
        return { action: 'sell', token, execution };
      }

      case 'sandwich': {
        if (this.currentMode !== 'mev') return null;
        const mempool = this.mempoolSlot.get();
        const opp = await mempool.bestSandwich(token);
        if (!opp || !(await mempool.claim(opp.victim.hash))) return null;
        const pending = await mempool.pendingSwaps(token);
        const rivals = competitorsIn(pending, (h) => mempool.isMev(h));
        const strategy = this.strategySlot.get();
        const plan = await strategy.optimize({
          token,
          action: 'sandwich',
          aiConfidence: rec.confidence,
          baseAmountNative: weiToNative(opp.victim.amountNative),
          competitors: rivals.length,
        });
        const nash = rivals.length > 0 ? strategy.nashMultiplier(rivals.map((s) => s.gasPrice)) : 0;
        this.signalConfidence.set(`sandwich:${addrKey(token)}`, rec.confidence);
        const sandwich = await trades.executeSandwich({
          victimHash: opp.victim.hash,
          frontMultiplier: Math.min(strategy.gasCap, Math.max(plan.gasMultiplier, nash)),
          amountPercent: plan.best.scenario.amountFraction * 100,
          usePrivateRelay: plan.usePrivateRelay,
        });
        return { action: 'sandwich', token, sandwich };
      }

      case 'frontrun': {
        if (this.currentMode !== 'mev') return null;
        const mempool = this.mempoolSlot.get();
        const target = await mempool.bestFrontrunTarget(token);
        if (!target || !(await mempool.claim(target.hash))) return null;
        const pending = await mempool.pendingSwaps(token);
        const plan = await this.strategySlot.get().optimize({
          token,
          action: 'frontrun',
          aiConfidence: rec.confidence,
          baseAmountNative: weiToNative(target.amountNative),
          competitors: competitorsIn(pending, (h) => mempool.isMev(h)).length,
        });
        this.signalConfidence.set(addrKey(token), rec.confidence);
        const trade = await trades.executeFrontrun({
          targetHash: target.hash,
          amountNative: plan.amountNative,
          gasMultiplier: plan.gasMultiplier,
          usePrivateRelay: plan.usePrivateRelay,
        });
        return { action: 'frontrun', token, trade };
      }

      case 'monitor':
      case 'avoid':
        return null;
    }
  }

  private async heldContext(
    token: string,
    profitNative: number,
    price: number,
    boughtAt: number,
  ): Promise<HeldPositionContext> {
    const mempool = this.mempoolSlot.get();
    const [status, metrics, pending, opp] = await Promise.all([
      this.trackerSlot.get().get(token),
      mempool.metrics(token),
      mempool.pendingSwaps(token),
      mempool.bestSandwich(token),
    ]);
    const now = this.clock();
    const buys = pending.filter((s) => s.isBuy);
    const victims = buys.filter((s) => s.amountUsd >= this.config.trading.minSandwichVictimUsd);
    const nativeUsd = this.adapter.chain.nativeUsd;
    const change = status?.change24hPct ?? 0;
    return {
      currentProfitNative: profitNative,
      currentPrice: price,
      holdingSeconds: Math.max(0, (now - boughtAt) / 1000),
      volatility: Math.min(1, Math.abs(change) / 100),
      buyPressure: metrics.buyPressure,
      pendingBuyCount: buys.length,
      potentialVictims: victims.length,
      profitPerVictimNative: opp && nativeUsd > 0 ? opp.potentialProfitUsd / nativeUsd : 0,
      sandwichBots: competitorsIn(pending, (h) => mempool.isMev(h)).length,
      congestionScore: this.gasSlot.get().congestionScore(),
      tokenScore: 100 - (status?.riskScore ?? 100),
      uptrend: change > 0,
      now,
    };
  }

  private async tune(): Promise<void> {
    const gas = this.gasSlot.get();
    const trades = this.tradeSlot.get();
    const ai = this.aiSlot.get();
    const current = { gasBias: gas.currentBias, slippage: trades.currentSlippage, aiThreshold: ai.confidenceThreshold };
    const next = this.tuner.suggest(current);
    if (next.gasBias !== current.gasBias) await gas.setBias(next.gasBias);
    if (next.slippage !== current.slippage) await trades.setSlippage(next.slippage);
    if (next.aiThreshold !== current.aiThreshold) await ai.setThreshold(next.aiThreshold);
  }

  // ─── Background work ───────────────────────────────────────────────

  private spawnMempool(): void {
    const handle = this.mempoolSlot.weak();
    this.tasks.spawn('mempool', async (signal) => {
      const mempool = handle.upgrade();
      if (!mempool) return;
      await mempool.run(signal);
    });
  }

  private async sampleGas(): Promise<void> {
    const gas = this.gasSlot.get();
    await gas.refresh(this.adapter);
    await this.mempoolSlot.get().setBaseFee(gas.currentBaseFee);
  }

  async checkHealth(): Promise<void> {
    const reports = await this.supervisor.checkAll();
    for (const r of reports) {
      subsystemRebuilds.inc({ subsystem: r.name });
      this.emitter.emit('subsystemRebuilt', r.name, r.staleMs);
      if (r.name === 'mempool-tracker' && this.running) this.spawnMempool();
    }
  }

  /** Writes positions and orders in one transaction. */
  persist(): void {
    if (!this.store) return;
    const state = this.tradeSlot.get().exportState();
    this.store.saveSnapshot(state.positions, state.orders);
  }

  private applyMode(mode: BotMode): void {
    if (mode === this.currentMode) return;
    logger.info(`[bot] Mode ${this.currentMode} → ${mode}`);
    this.currentMode = mode;
    this.emitter.emit('modeChanged', mode);
  }

  private readonly onMempoolHealth = (health: MempoolHealth): void => {
    this.emitter.emit('mempoolHealth', health);
    if (health === 'degraded' && this.currentMode === 'mev') {
      logger.warn('[bot] Mempool degraded, falling back to auto mode');
      this.applyMode('auto');
    } else if ((health === 'streaming' || health === 'polling') && this.requestedMode === 'mev' && this.currentMode !== 'mev') {
      this.applyMode('mev');
    }
  };

  private readonly onNewToken = (token: string, source: PendingSwap): void => {
    this.emitter.emit('newToken', token, source);
    if (tierAllows(this.tier, 'mempoolWatching')) this.discovered.send(token);
  };

  private readonly onTradeResult = (result: TradeResult): void => {
    const key = addrKey(result.token);
    const aiConfidence = this.signalConfidence.get(key);
    this.signalConfidence.delete(key);
    this.tuner.record({ success: result.success, kind: 'trade', errorKind: result.errorKind, profitNative: 0, aiConfidence });
    this.record({ kind: 'trade', result });
  };

  private readonly onSandwichResult = (result: SandwichResult): void => {
    const key = `sandwich:${addrKey(result.token)}`;
    const aiConfidence = this.signalConfidence.get(key);
    this.signalConfidence.delete(key);
    this.tuner.record({
      success: result.success,
      kind: 'sandwich',
      errorKind: result.errorKind,
      profitNative: result.profitNative,
      aiConfidence,
    });
    this.record({ kind: 'sandwich', result });
  };

  private record(entry: Parameters<Store['appendTrade']>[0]): void {
    if (!this.store) return;
    try {
      this.store.appendTrade(entry);
    } catch (err) {
      logger.error(`[bot] Trade history write failed: ${errorMessage(err)}`);
    }
  }

  // ─── Builders ──────────────────────────────────────────────────────

  private buildNonces(): NonceManager {
    return new NonceManager(this.adapter, { lockTimeoutMs: this.config.bot.lockTimeoutMs, clock: this.clock });
  }

  private buildGas(bias?: number): GasOptimizer {
    const { gas } = this.config;
    return new GasOptimizer({
      eip1559: this.adapter.chain.eip1559,
      maxGasPriceGwei: gas.maxGasPriceGwei,
      priorityFeeGwei: gas.priorityFeeGwei,
      priorityBoostPercent: gas.priorityBoostPercent,
      sampleSize: gas.sampleSize,
      bias,
      lockTimeoutMs: this.config.bot.lockTimeoutMs,
      clock: this.clock,
    });
  }

  private buildTracker(seed?: ReturnType<TokenStatusTracker['exportState']>): TokenStatusTracker {
    const t = this.config.tracker;
    const tracker = new TokenStatusTracker(
      {
        adapter: this.adapter,
        risk: this.risk,
        activityOf: async (token) => {
          const m = await this.mempoolSlot.get().metrics(token);
          return { pendingCount: m.pendingCount, volumeUsd: m.buyVolumeUsd + m.sellVolumeUsd };
        },
        holderCount: (token) => this.holderCount(token),
      },
      {
        capacity: t.cacheCapacity,
        staleAfterMs: t.staleAfterMs,
        refreshConcurrency: t.refreshConcurrency,
        refreshTimeoutMs: t.refreshTimeoutMs,
        priceAlertPercent: t.priceAlertPercent,
        minLiquidityUsd: t.minLiquidityUsd,
        cautionLiquidityUsd: t.cautionLiquidityUsd,
        lockTimeoutMs: this.config.bot.lockTimeoutMs,
        clock: this.clock,
      },
      seed,
    );
    tracker.onPriceAlert((alert) => this.emitter.emit('priceAlert', alert));
    return tracker;
  }

  private async holderCount(token: string): Promise<number | null> {
    return this.holders.holderCount ? this.holders.holderCount(token) : null;
  }

  private buildMempool(seed?: ReturnType<MempoolTracker['exportState']>): MempoolTracker {
    const { mempool: m, trading } = this.config;
    const tracker = new MempoolTracker(
      this.adapter,
      {
        windowMs: m.windowMs,
        maxSwapsPerToken: m.maxSwapsPerToken,
        largeBuyUsd: m.largeBuyUsd,
        minSandwichVictimUsd: trading.minSandwichVictimUsd,
        minFrontrunTargetUsd: trading.minFrontrunTargetUsd,
        mevDetectionEnabled: m.mevDetectionEnabled,
        degradedAfterMs: m.degradedAfterMs,
        reconnectBaseMs: m.reconnectBaseMs,
        reconnectMaxMs: m.reconnectMaxMs,
        channelCapacity: this.config.bot.channelCapacity,
        lockTimeoutMs: this.config.bot.lockTimeoutMs,
        clock: this.clock,
        liquidityNativeOf: (token) => this.trackerSlot.get().peek(token)?.liquidityNative ?? null,
        onDrop: (channel) => channelDrops.inc({ channel }),
      },
      seed,
    );
    tracker.onNewToken(this.onNewToken);
    tracker.onHealth(this.onMempoolHealth);
    return tracker;
  }

  private buildStrategy(riskTolerance: BotConfig['trading']['riskTolerance']): StrategyOptimizer {
    const gas = {
      congestion: () => this.gasSlot.get().congestion(),
      congestionScore: () => this.gasSlot.get().congestionScore(),
      congestionMultiplier: () => this.gasSlot.get().congestionMultiplier(),
      referenceGasPrice: () => this.gasSlot.get().referenceGasPrice(),
    };
    return new StrategyOptimizer(gas, {
      riskTolerance,
      maxGasBoostPercent: this.config.gas.maxGasBoostPercent,
      nativeUsd: this.adapter.chain.nativeUsd,
      relayAvailable: hasPrivateRelay(this.adapter),
      monteCarlo: this.config.strategy,
      seed: this.deps.seed,
      lockTimeoutMs: this.config.bot.lockTimeoutMs,
      clock: this.clock,
    });
  }

  private buildTrades(tier: Tier, slippage: number, seed?: ReturnType<TradeManager['exportState']>): TradeManager {
    const t = this.config.trading;
    return new TradeManager(
      {
        adapter: this.adapter,
        gas: {
          optimal: () => this.gasSlot.get().optimal(),
          scaled: (base, multiplier) => this.gasSlot.get().scaled(base, multiplier),
        },
        submission: this.submission,
        statusOf: (token) => this.statusOf(token),
        emitter: this.emitter,
      },
      {
        tier,
        slippage,
        reservePercent: t.reservePercent,
        maxPositionSizePercent: t.maxPositionSizePercent,
        gasLimitHeadroom: t.gasLimitHeadroom,
        stopLossPct: t.stopLossPct,
        minSandwichVictimUsd: t.minSandwichVictimUsd,
        minFrontrunTargetUsd: t.minFrontrunTargetUsd,
        sandwich: this.config.strategy.sandwich,
        receiptPollMs: t.receiptPollMs,
        lockTimeoutMs: this.config.bot.lockTimeoutMs,
        clock: this.clock,
      },
      seed,
    );
  }

  private buildAi(autoTradeEnabled: boolean, threshold: number, seed?: AIDecision[]): AICoordinator {
    const sources: FeatureSources = {
      metrics: (token) => this.mempoolSlot.get().metrics(token),
      status: (token) => this.trackerSlot.get().get(token),
      risk: (token) => this.trackerSlot.get().riskOf(token),
      bestSandwich: (token) => this.mempoolSlot.get().bestSandwich(token),
      holding: (token) => this.tradeSlot.get().position(token) !== undefined,
    };
    return new AICoordinator(this.predictor, sources, {
      autoTradeEnabled,
      threshold,
      cacheTtlMs: this.config.ai.cacheTtlMs,
      predictorTimeoutMs: this.config.ai.predictorTimeoutMs,
      cache: this.deps.aiCache,
      lockTimeoutMs: this.config.bot.lockTimeoutMs,
      clock: this.clock,
    }, seed);
  }

  /** Tracked status, adding and refreshing the token first when it is unknown. */
  private async statusOf(token: string): Promise<TokenStatus | null> {
    const tracker = this.trackerSlot.get();
    const known = await tracker.get(token);
    if (known && known.riskScore !== null) return known;
    await tracker.add(token);
    await tracker.refresh(token);
    return tracker.get(token);
  }
}
