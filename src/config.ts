import { readFileSync } from 'fs';
import { resolve } from 'path';
import { parse as parseYaml } from 'yaml';
import { config as dotenvConfig } from 'dotenv';
import { isAddress } from 'ethers';
import { logger } from './utils/logger.js';
import { errorMessage } from './errors.js';
import type { BotConfig, ChainConfig, RiskTolerance, Tier } from './types.js';

dotenvConfig();

type Section = Record<string, unknown>;

const RISK_TOLERANCES: readonly RiskTolerance[] = ['VeryLow', 'Low', 'Medium', 'High', 'VeryHigh'];
const TIERS: readonly Tier[] = ['free', 'premium', 'vip'];

function loadYaml(filePath: string): Section {
  let content: string;
  try {
    content = readFileSync(filePath, 'utf-8');
  } catch {
    logger.warn(`[config] ${filePath} not found, using built-in defaults`);
    return {};
  }
  try {
    return asSection(parseYaml(content));
  } catch (err) {
    logger.error(`[config] ${filePath} is not valid YAML: ${errorMessage(err)}`);
    return {};
  }
}

function asSection(value: unknown): Section {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) return {};
  return Object.fromEntries(Object.entries(value));
}

function env(key: string, fallback = ''): string {
  return process.env[key] ?? fallback;
}

function envBool(key: string, fallback: boolean): boolean {
  const val = process.env[key];
  if (val === undefined || val === '') return fallback;
  return val === 'true' || val === '1';
}

function num(section: Section, key: string, fallback: number): number {
  const v = section[key];
  return typeof v === 'number' && Number.isFinite(v) ? v : fallback;
}

function bool(section: Section, key: string, fallback: boolean): boolean {
  const v = section[key];
  return typeof v === 'boolean' ? v : fallback;
}

function str(section: Section, key: string, fallback: string): string {
  const v = section[key];
  return typeof v === 'string' ? v : fallback;
}

function oneOf<T extends string>(value: string, allowed: readonly T[], fallback: T): T {
  return allowed.find((a) => a === value) ?? fallback;
}

function strings(section: Section, key: string): string[] {
  const v = section[key];
  return Array.isArray(v) ? v.filter((x): x is string => typeof x === 'string' && x.length > 0) : [];
}

function parseChain(raw: unknown): ChainConfig | null {
  const c = asSection(raw);
  const id = num(c, 'id', 0);
  if (id === 0) return null;
  const name = str(c, 'name', `chain-${id}`).toLowerCase();
  const swaps = asSection(c.swap_functions);
  const envKey = name.toUpperCase();

  const rpcFromEnv = env(`RPC_URL_${envKey}`).split(',').filter(Boolean);
  const relay = env(`PRIVATE_RELAY_URL_${envKey}`, str(c, 'relay_url', ''));

  return {
    id,
    name,
    symbol: str(c, 'symbol', 'ETH'),
    rpcUrls: rpcFromEnv.length > 0 ? rpcFromEnv : strings(c, 'rpc_urls'),
    wsUrl: env(`RPC_WS_URL_${envKey}`, str(c, 'ws_url', '')),
    router: str(c, 'router', ''),
    factory: str(c, 'factory', ''),
    wrappedNative: str(c, 'wrapped_native', ''),
    eip1559: bool(c, 'eip1559', true),
    blockTimeMs: num(c, 'block_time_ms', 12_000),
    nativeUsd: num(c, 'native_usd', 0),
    relayUrl: relay || undefined,
    swapFunctions: {
      nativeForTokens: str(swaps, 'native_for_tokens', 'swapExactETHForTokens'),
      tokensForNative: str(swaps, 'tokens_for_native', 'swapExactTokensForETH'),
    },
  };
}

export function loadConfig(yamlPath = resolve(process.cwd(), 'config', 'default.yaml')): BotConfig {
  const yaml = loadYaml(yamlPath);

  const trading = asSection(yaml.trading);
  const bot = asSection(yaml.bot);
  const gas = asSection(yaml.gas);
  const mempool = asSection(yaml.mempool);
  const tracker = asSection(yaml.tracker);
  const strategy = asSection(yaml.strategy);
  const sandwich = asSection(strategy.sandwich);
  const ai = asSection(yaml.ai);
  const telegram = asSection(yaml.telegram);
  const redis = asSection(yaml.redis);

  const chains = (Array.isArray(yaml.chains) ? yaml.chains : [])
    .map(parseChain)
    .filter((c): c is ChainConfig => c !== null);
  const activeChainId = Number(env('CHAIN_ID', String(num(yaml, 'active_chain_id', 1))));

  // Unsuffixed endpoint variables apply to the active chain
  const active = chains.find((c) => c.id === activeChainId);
  if (active) {
    const urls = [env('RPC_URL'), env('RPC_URL_BACKUP')].filter(Boolean);
    if (urls.length > 0) active.rpcUrls = urls;
    active.wsUrl = env('RPC_WS_URL', active.wsUrl);
    active.relayUrl = env('PRIVATE_RELAY_URL', active.relayUrl ?? '') || undefined;
  }

  const redisUrl = env('REDIS_URL');
  const config: BotConfig = {
    activeChainId,
    chains,
    wallet: {
      privateKey: env('PRIVATE_KEY'),
    },
    explorer: {
      apiUrl: env('EXPLORER_API_URL'),
      apiKey: env('EXPLORER_API_KEY'),
    },
    telegram: {
      botToken: env('TELEGRAM_BOT_TOKEN'),
      chatId: env('TELEGRAM_CHAT_ID'),
      enabled: bool(telegram, 'enabled', true),
      notifyTrades: bool(telegram, 'notify_trades', true),
      notifySandwich: bool(telegram, 'notify_sandwich', true),
      notifyPriceAlerts: bool(telegram, 'notify_price_alerts', false),
      notifyRecovery: bool(telegram, 'notify_recovery', true),
    },
    redis: {
      enabled: envBool('REDIS_ENABLED', bool(redis, 'enabled', redisUrl !== '')),
      url: redisUrl || 'redis://localhost:6379',
    },
    trading: {
      autoTradeEnabled: envBool('AUTO_TRADE_ENABLED', bool(trading, 'auto_trade_enabled', false)),
      autoTradeThreshold: num(trading, 'auto_trade_threshold', 0.75),
      maxPositionSizePercent: num(trading, 'max_position_size_percent', 10),
      minSandwichVictimUsd: num(trading, 'min_sandwich_victim_usd', 5000),
      minFrontrunTargetUsd: num(trading, 'min_frontrun_target_usd', 2000),
      defaultSlippage: num(trading, 'default_slippage', 1),
      reservePercent: num(trading, 'reserve_percent', 10),
      riskTolerance: oneOf(str(trading, 'risk_tolerance', 'Medium'), RISK_TOLERANCES, 'Medium'),
      tier: oneOf(env('BOT_TIER', str(trading, 'tier', 'free')), TIERS, 'free'),
      dryRun: envBool('DRY_RUN', bool(trading, 'dry_run', false)),
      receiptTimeoutMs: num(trading, 'receipt_timeout_ms', 60_000),
      receiptPollMs: num(trading, 'receipt_poll_ms', 1_500),
      gasLimitHeadroom: num(trading, 'gas_limit_headroom', 1.3),
      stopLossPct: num(trading, 'stop_loss_pct', 30),
    },
    bot: {
      cycleIntervalSeconds: num(bot, 'cycle_interval_seconds', 15),
      lockTimeoutMs: num(bot, 'lock_timeout_ms', 5_000),
      healthIntervalMs: num(bot, 'health_interval_ms', 60_000),
      deadlockThresholdMs: num(bot, 'deadlock_threshold_ms', 60_000),
      shutdownDrainMs: num(bot, 'shutdown_drain_ms', 10_000),
      autoTuningEnabled: bool(bot, 'auto_tuning_enabled', true),
      channelCapacity: num(bot, 'channel_capacity', 1024),
      dbPath: env('DB_PATH', str(bot, 'db_path', resolve(process.cwd(), 'data', 'bot.db'))),
      persistIntervalMs: num(bot, 'persist_interval_ms', 30_000),
    },
    gas: {
      maxGasBoostPercent: num(gas, 'max_gas_boost_percent', 50),
      maxGasPriceGwei: num(gas, 'max_gas_price_gwei', 500),
      priorityFeeGwei: num(gas, 'priority_fee_gwei', 2),
      priorityBoostPercent: num(gas, 'priority_boost_percent', 20),
      sampleSize: num(gas, 'sample_size', 100),
    },
    mempool: {
      mevDetectionEnabled: bool(mempool, 'mev_detection_enabled', true),
      windowMs: num(mempool, 'window_ms', 300_000),
      maxSwapsPerToken: num(mempool, 'max_swaps_per_token', 200),
      largeBuyUsd: num(mempool, 'large_buy_usd', 10_000),
      degradedAfterMs: num(mempool, 'degraded_after_ms', 60_000),
      reconnectBaseMs: num(mempool, 'reconnect_base_ms', 1_000),
      reconnectMaxMs: num(mempool, 'reconnect_max_ms', 30_000),
    },
    tracker: {
      cacheCapacity: num(tracker, 'cache_capacity', 1000),
      staleAfterMs: num(tracker, 'stale_after_ms', 24 * 60 * 60 * 1000),
      refreshConcurrency: num(tracker, 'refresh_concurrency', 8),
      refreshTimeoutMs: num(tracker, 'refresh_timeout_ms', 10_000),
      priceAlertPercent: num(tracker, 'price_alert_percent', 5),
      minLiquidityUsd: num(tracker, 'min_liquidity_usd', 10_000),
      cautionLiquidityUsd: num(tracker, 'caution_liquidity_usd', 50_000),
    },
    strategy: {
      trials: num(strategy, 'trials', 1000),
      competitionStd: num(strategy, 'competition_std', 0.15),
      impactMean: num(strategy, 'impact_mean', 0.02),
      impactStd: num(strategy, 'impact_std', 0.01),
      gasLimit: num(strategy, 'gas_limit', 250_000),
      sandwich: {
        frontMultiplier: num(sandwich, 'front_multiplier', 1.2),
        backMultiplier: num(sandwich, 'back_multiplier', 1.15),
        amountPercent: num(sandwich, 'amount_percent', 40),
        victimWaitMs: num(sandwich, 'victim_wait_ms', 30_000),
        emergencySlippage: num(sandwich, 'emergency_slippage', 5),
        emergencyGasMultiplier: num(sandwich, 'emergency_gas_multiplier', 1.5),
      },
    },
    ai: {
      cacheTtlMs: num(ai, 'cache_ttl_ms', 5 * 60 * 1000),
      predictorTimeoutMs: num(ai, 'predictor_timeout_ms', 5_000),
    },
  };

  return config;
}

export function validateConfig(config: BotConfig): string[] {
  const errors: string[] = [];
  const active = config.chains.find((c) => c.id === config.activeChainId);

  if (!active) {
    errors.push(`active chain ${config.activeChainId} is not configured`);
  } else {
    if (active.rpcUrls.length === 0) errors.push(`RPC_URL is required for ${active.name}`);
    for (const [field, value] of [
      ['router', active.router],
      ['factory', active.factory],
      ['wrapped_native', active.wrappedNative],
    ] as const) {
      if (!isAddress(value)) errors.push(`${active.name}.${field} is not an address: "${value}"`);
    }
  }
  if (!config.wallet.privateKey) errors.push('PRIVATE_KEY is required');
  if (config.telegram.enabled && config.telegram.botToken && !config.telegram.chatId) {
    errors.push('TELEGRAM_CHAT_ID is required when a Telegram bot token is set');
  }

  const t = config.trading;
  if (t.autoTradeThreshold < 0 || t.autoTradeThreshold > 1) errors.push('auto_trade_threshold must be within [0, 1]');
  if (t.maxPositionSizePercent <= 0 || t.maxPositionSizePercent > 100) errors.push('max_position_size_percent must be within (0, 100]');
  if (t.defaultSlippage < 0 || t.defaultSlippage >= 50) errors.push('default_slippage must be within [0, 50)');
  if (t.reservePercent < 0 || t.reservePercent >= 100) errors.push('reserve_percent must be within [0, 100)');
  if (config.gas.maxGasBoostPercent < 0) errors.push('max_gas_boost_percent must not be negative');
  if (config.bot.cycleIntervalSeconds <= 0) errors.push('cycle_interval_seconds must be positive');
  if (config.bot.lockTimeoutMs <= 0) errors.push('lock_timeout_ms must be positive');
  if (config.tracker.cacheCapacity < 1) errors.push('cache_capacity must be at least 1');
  if (config.tracker.refreshConcurrency < 1) errors.push('refresh_concurrency must be at least 1');
  if (config.strategy.trials < 1) errors.push('strategy.trials must be at least 1');

  return errors;
}
