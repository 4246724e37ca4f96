import type { ErrorKind } from './errors.js';

// ─── Bot Configuration ───────────────────────────────────────────────

export type RiskTolerance = 'VeryLow' | 'Low' | 'Medium' | 'High' | 'VeryHigh';
export type Tier = 'free' | 'premium' | 'vip';
export type BotMode = 'manual' | 'auto' | 'mev';

export interface ChainConfig {
  id: number;
  name: string;
  symbol: string;
  rpcUrls: string[];
  wsUrl: string;
  router: string;
  factory: string;
  wrappedNative: string;
  eip1559: boolean;
  blockTimeMs: number;
  nativeUsd: number;
  relayUrl?: string;
  swapFunctions: {
    nativeForTokens: string;
    tokensForNative: string;
  };
}

export interface SandwichDefaults {
  frontMultiplier: number;
  backMultiplier: number;
  amountPercent: number;
  victimWaitMs: number;
  emergencySlippage: number;
  emergencyGasMultiplier: number;
}

export interface BotConfig {
  activeChainId: number;
  chains: ChainConfig[];
  wallet: {
    privateKey: string;
  };
  explorer: {
    apiUrl: string;
    apiKey: string;
  };
  telegram: {
    botToken: string;
    chatId: string;
    enabled: boolean;
    notifyTrades: boolean;
    notifySandwich: boolean;
    notifyPriceAlerts: boolean;
    notifyRecovery: boolean;
  };
  redis: {
    enabled: boolean;
    url: string;
  };
  trading: {
    autoTradeEnabled: boolean;
    autoTradeThreshold: number;
    maxPositionSizePercent: number;
    minSandwichVictimUsd: number;
    minFrontrunTargetUsd: number;
    defaultSlippage: number;
    reservePercent: number;
    riskTolerance: RiskTolerance;
    tier: Tier;
    dryRun: boolean;
    receiptTimeoutMs: number;
    receiptPollMs: number;
    gasLimitHeadroom: number;
    stopLossPct: number;
  };
  bot: {
    cycleIntervalSeconds: number;
    lockTimeoutMs: number;
    healthIntervalMs: number;
    deadlockThresholdMs: number;
    shutdownDrainMs: number;
    autoTuningEnabled: boolean;
    channelCapacity: number;
    dbPath: string;
    persistIntervalMs: number;
  };
  gas: {
    maxGasBoostPercent: number;
    maxGasPriceGwei: number;
    priorityFeeGwei: number;
    priorityBoostPercent: number;
    sampleSize: number;
  };
  mempool: {
    mevDetectionEnabled: boolean;
    windowMs: number;
    maxSwapsPerToken: number;
    largeBuyUsd: number;
    degradedAfterMs: number;
    reconnectBaseMs: number;
    reconnectMaxMs: number;
  };
  tracker: {
    cacheCapacity: number;
    staleAfterMs: number;
    refreshConcurrency: number;
    refreshTimeoutMs: number;
    priceAlertPercent: number;
    minLiquidityUsd: number;
    cautionLiquidityUsd: number;
  };
  strategy: {
    trials: number;
    competitionStd: number;
    impactMean: number;
    impactStd: number;
    gasLimit: number;
    sandwich: SandwichDefaults;
  };
  ai: {
    cacheTtlMs: number;
    predictorTimeoutMs: number;
  };
}

// ─── Chain Primitives ────────────────────────────────────────────────

export interface TxRequest {
  to: string;
  data: string;
  value: bigint;
  nonce?: number;
  gasLimit?: bigint;
  gasPrice?: bigint;
  maxFeePerGas?: bigint;
  maxPriorityFeePerGas?: bigint;
  chainId?: number;
}

export interface ChainTransaction {
  hash: string;
  from: string;
  to: string | null;
  value: bigint;
  data: string;
  nonce: number;
  gasPrice: bigint;
  maxFeePerGas?: bigint;
  maxPriorityFeePerGas?: bigint;
  blockNumber: number | null;
  transactionIndex: number | null;
}

export interface ChainReceipt {
  hash: string;
  status: 'success' | 'reverted';
  blockNumber: number;
  transactionIndex: number;
  gasUsed: bigint;
  effectiveGasPrice: bigint;
  revertReason?: string;
}

export interface ChainBlock {
  number: number;
  timestamp: number;
  baseFeePerGas: bigint | null;
  transactions: ChainTransaction[];
}

export interface PairReserves {
  pair: string;
  token0: string;
  token1: string;
  reserve0: bigint;
  reserve1: bigint;
}

export interface TokenInfo {
  symbol: string;
  decimals: number;
  totalSupply: bigint;
}

export type GasSetting =
  | { kind: 'legacy'; gasPrice: bigint }
  | { kind: 'eip1559'; maxFeePerGas: bigint; maxPriorityFeePerGas: bigint };

// ─── Tokens ──────────────────────────────────────────────────────────

export type SafetyLevel = 'Green' | 'Yellow' | 'Red';

export interface TaxInfo {
  buyTax: number;
  sellTax: number;
  transferTax: number;
}

export interface TokenStatus {
  address: string;
  chainId: number;
  symbol: string;
  decimals: number;
  pairAddress: string | null;
  routerAddress: string;
  liquidityNative: number;
  liquidityUsd: number;
  priceNative: number;
  priceUsd: number;
  volume24h: number;
  change24hPct: number;
  holderCount: number;
  pendingTxCount: number;
  safetyLevel: SafetyLevel;
  tax: TaxInfo | null;
  dangerousFunctions: string[];
  isVerified: boolean;
  riskScore: number | null;
  lastUpdated: number;
  consecutiveFailures: number;
}

export interface TokenRiskAnalysis {
  token: string;
  score: number;
  isHoneypot: boolean;
  dangerousFunctions: string[];
  isVerified: boolean;
  tax: TaxInfo | null;
  liquidityLocked: boolean;
  topHolderPct: number | null;
  top10HolderPct: number | null;
  reasons: string[];
  analyzedAt: number;
}

export interface TokenPriceAlert {
  token: string;
  symbol: string;
  oldPrice: number;
  newPrice: number;
  changePct: number;
  direction: 'up' | 'down';
  timestamp: number;
}

// ─── Mempool ─────────────────────────────────────────────────────────

export interface PendingSwap {
  hash: string;
  from: string;
  to: string;
  isBuy: boolean;
  token: string;
  method: string;
  amountNative: bigint;
  amountUsd: number;
  gasPrice: bigint;
  nonce: number;
  timestamp: number;
}

export interface SandwichOpportunity {
  victim: PendingSwap;
  estimatedImpactPct: number;
  potentialProfitUsd: number;
}

export interface MempoolMetrics {
  /** Share of windowed USD volume on the buy side, 0..1. */
  buyPressure: number;
  sellPressure: number;
  buyVolumeUsd: number;
  sellVolumeUsd: number;
  pendingCount: number;
  largeBuys: number;
  baseFee: bigint | null;
}

export type MevKind = 'sandwich' | 'frontrun' | 'arbitrage' | 'known_bot';
export type MempoolHealth = 'connecting' | 'streaming' | 'polling' | 'degraded' | 'stopped';

// ─── Gas ─────────────────────────────────────────────────────────────

export type Congestion = 'Low' | 'Medium' | 'High' | 'VeryHigh';

// ─── Strategy ────────────────────────────────────────────────────────

export type StrategyAction = 'buy' | 'frontrun' | 'sandwich';

export interface StrategyScenario {
  action: StrategyAction;
  amountFraction: number;
  gasMultiplier: number;
  usePrivateRelay: boolean;
}

export interface SimulationResult {
  scenario: StrategyScenario;
  successProbability: number;
  expectedProfitUsd: number;
  worstCaseUsd: number;
  bestCaseUsd: number;
  simulatedTxCount: number;
}

export type ProfitDecision =
  | { kind: 'TakeProfitNow' }
  | { kind: 'HoldForPriceTarget'; targetPrice: number; deadline: number }
  | { kind: 'ContinueSandwich'; maxBuys: number; deadline: number }
  | { kind: 'DCABuy'; pct: number; intervals: number; windowMs: number };

export interface ProfitAlternative {
  decision: ProfitDecision;
  expectedProfitNative: number;
  successProbability: number;
  risk: number;
  horizonSeconds: number;
  score: number;
}

// ─── AI ──────────────────────────────────────────────────────────────

export type AIAction = 'buy' | 'sell' | 'sandwich' | 'frontrun' | 'monitor' | 'avoid';

export interface AIFeatures {
  token: string;
  metrics: MempoolMetrics | null;
  status: TokenStatus | null;
  risk: TokenRiskAnalysis | null;
  bestSandwich: SandwichOpportunity | null;
  /** Whether the wallet holds an open position in the token. */
  holding: boolean;
}

export interface AIDecision {
  token: string;
  action: AIAction;
  confidence: number;
  reasoning: string;
  timestamp: number;
}

// ─── Positions & Orders ──────────────────────────────────────────────

export interface Position {
  token: string;
  chainId: number;
  symbol: string;
  decimals: number;
  amount: bigint;
  costBasisNative: number;
  entryPrice: number;
  currentPrice: number;
  highestPrice: number;
  realizedPnlNative: number;
  unrealizedPnlNative: number;
  boughtAt: number;
  updatedAt: number;
}

export type OrderStatus = 'Active' | 'Filled' | 'Cancelled' | 'Expired';
export type OrderSide = 'buy' | 'sell';

export interface LimitOrder {
  id: string;
  token: string;
  side: OrderSide;
  targetPrice: number;
  percent: number;
  amountNative: number;
  expiresAt: number | null;
  status: OrderStatus;
  createdAt: number;
}

export interface TrailingStop {
  id: string;
  token: string;
  trailPct: number;
  percent: number;
  highestPrice: number;
  stopPrice: number;
  expiresAt: number | null;
  status: OrderStatus;
  createdAt: number;
}

export interface DcaPlan {
  id: string;
  token: string;
  totalNative: number;
  intervals: number;
  intervalMs: number;
  executed: number;
  nextAt: number;
  status: OrderStatus;
  createdAt: number;
}

export interface AutoSandwichConfig {
  token: string;
  maxBuys: number;
  executed: number;
  deadline: number;
  minVictimUsd: number;
}

// ─── Results ─────────────────────────────────────────────────────────

export interface TradeResult {
  success: boolean;
  token: string;
  side: OrderSide;
  txHash: string | null;
  amountIn: bigint;
  amountOut: bigint;
  gasPrice: bigint | null;
  gasUsed: bigint | null;
  attempts: number;
  errorKind?: ErrorKind;
  error?: string;
  timestamp: number;
}

export interface SandwichResult {
  success: boolean;
  token: string;
  victimHash: string;
  frontTxHash: string | null;
  backTxHash: string | null;
  emergency: boolean;
  frontGasPrice: bigint | null;
  backGasPrice: bigint | null;
  profitNative: number;
  profitUsd: number;
  errorKind?: ErrorKind;
  error?: string;
  timestamp: number;
}

export interface ExecutionResult {
  success: boolean;
  decision: ProfitDecision['kind'];
  trade?: TradeResult;
  orderId?: string;
  error?: string;
  timestamp: number;
}

// ─── Events ──────────────────────────────────────────────────────────

export interface BotEvents {
  newToken: (token: string, source: PendingSwap) => void;
  priceAlert: (alert: TokenPriceAlert) => void;
  tradeExecuted: (result: TradeResult) => void;
  sandwichExecuted: (result: SandwichResult) => void;
  positionOpened: (position: Position) => void;
  positionClosed: (position: Position) => void;
  orderFilled: (orderId: string, token: string, kind: 'limit' | 'trailing' | 'stop_loss' | 'dca') => void;
  mempoolHealth: (health: MempoolHealth) => void;
  subsystemRebuilt: (name: string, staleMs: number) => void;
  modeChanged: (mode: BotMode) => void;
  error: (error: Error, context: string) => void;
}
