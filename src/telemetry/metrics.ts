import { Counter, Gauge, Histogram, Registry, collectDefaultMetrics } from 'prom-client';

const registry = new Registry();
collectDefaultMetrics({ register: registry, prefix: 'snipebot_' });

// ─── Counters ────────────────────────────────────────────────────────

export const tradesAttempted = new Counter({
  name: 'snipebot_trades_attempted_total',
  help: 'Trades submitted through the trade manager',
  labelNames: ['side'],
  registers: [registry],
});

export const tradesSuccessful = new Counter({
  name: 'snipebot_trades_successful_total',
  help: 'Trades confirmed on chain',
  labelNames: ['side'],
  registers: [registry],
});

export const tradesFailed = new Counter({
  name: 'snipebot_trades_failed_total',
  help: 'Trades that ended in an error',
  labelNames: ['side', 'kind'],
  registers: [registry],
});

export const sandwichAttempts = new Counter({
  name: 'snipebot_sandwich_attempts_total',
  help: 'Sandwich operations started',
  registers: [registry],
});

export const sandwichWins = new Counter({
  name: 'snipebot_sandwich_wins_total',
  help: 'Sandwich operations that completed with both legs',
  registers: [registry],
});

export const gasBumpRetries = new Counter({
  name: 'snipebot_gas_bump_retries_total',
  help: 'Resubmissions with a raised gas price',
  registers: [registry],
});

export const rpcErrors = new Counter({
  name: 'snipebot_rpc_errors_total',
  help: 'Chain errors by classified kind',
  labelNames: ['kind'],
  registers: [registry],
});

export const channelDrops = new Counter({
  name: 'snipebot_channel_drops_total',
  help: 'Messages dropped by a full bounded channel',
  labelNames: ['channel'],
  registers: [registry],
});

export const subsystemRebuilds = new Counter({
  name: 'snipebot_subsystem_rebuilds_total',
  help: 'Subsystems replaced by the health supervisor',
  labelNames: ['subsystem'],
  registers: [registry],
});

// ─── Histograms ──────────────────────────────────────────────────────

export const tradeGasUsed = new Histogram({
  name: 'snipebot_trade_gas_used',
  help: 'Gas used per confirmed trade',
  buckets: [50_000, 100_000, 150_000, 200_000, 300_000, 500_000],
  registers: [registry],
});

export const tradeAmountNative = new Histogram({
  name: 'snipebot_trade_amount_native',
  help: 'Native amount per trade',
  buckets: [0.01, 0.05, 0.1, 0.5, 1, 5],
  registers: [registry],
});

export const submissionLatency = new Histogram({
  name: 'snipebot_submission_latency_seconds',
  help: 'Time from first send to receipt',
  buckets: [0.5, 1, 2, 5, 10, 30, 60],
  registers: [registry],
});

// ─── Gauges ──────────────────────────────────────────────────────────

export const activeTrades = new Gauge({
  name: 'snipebot_active_trades',
  help: 'Trades currently in the submission pipeline',
  registers: [registry],
});

export const trackedTokens = new Gauge({
  name: 'snipebot_tracked_tokens',
  help: 'Tokens held by the status tracker',
  registers: [registry],
});

/** Prometheus text exposition of every registered metric. */
export function getMetricsText(): Promise<string> {
  return registry.metrics();
}
