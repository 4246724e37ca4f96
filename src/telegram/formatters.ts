import { formatEther } from 'ethers';
import { formatGwei, formatPct, formatUsd, shortenAddress, tokenUnitsToNumber } from '../utils/helpers.js';
import type { BotMode, Position, SandwichResult, TokenPriceAlert, TradeResult } from '../types.js';

export function escapeHtml(text: string): string {
  return text.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;');
}

function code(text: string): string {
  return `<code>${escapeHtml(text)}</code>`;
}

function shortHash(hash: string | null): string {
  return hash ? code(`${hash.slice(0, 10)}…${hash.slice(-6)}`) : '-';
}

export function formatTrade(result: TradeResult, symbol = 'ETH'): string {
  const title = result.side === 'buy' ? 'BUY' : 'SELL';
  if (!result.success) {
    return [
      `🔴 <b>${title} FAILED</b>`,
      ``,
      `Token: ${code(shortenAddress(result.token))}`,
      `Reason: ${code(result.errorKind ?? 'Unknown')} ${escapeHtml(result.error ?? '')}`.trimEnd(),
      `Attempts: ${result.attempts}`,
    ].join('\n');
  }

  const spent = result.side === 'buy' ? `${formatEther(result.amountIn)} ${symbol}` : `${result.amountIn.toString()} tokens`;
  const got = result.side === 'buy' ? `${result.amountOut.toString()} tokens` : `${formatEther(result.amountOut)} ${symbol}`;
  const lines = [
    `${result.side === 'buy' ? '🟢' : '🟠'} <b>${title} EXECUTED</b>`,
    ``,
    `Token: ${code(shortenAddress(result.token))}`,
    `In: <b>${escapeHtml(spent)}</b>`,
    `Out: <b>${escapeHtml(got)}</b>`,
    `TX: ${shortHash(result.txHash)}`,
  ];
  if (result.gasPrice !== null) lines.push(`Gas: ${formatGwei(result.gasPrice)}`);
  if (result.attempts > 1) lines.push(`Attempts: ${result.attempts}`);
  return lines.join('\n');
}

export function formatSandwich(result: SandwichResult, symbol = 'ETH'): string {
  const icon = result.success ? (result.profitUsd >= 0 ? '🥪' : '🟡') : '🔴';
  const title = result.success ? 'SANDWICH COMPLETE' : result.emergency ? 'SANDWICH EMERGENCY EXIT' : 'SANDWICH FAILED';
  const lines = [
    `${icon} <b>${title}</b>`,
    ``,
    `Token: ${code(shortenAddress(result.token))}`,
    `Victim: ${shortHash(result.victimHash)}`,
    `Front: ${shortHash(result.frontTxHash)}`,
    `Back: ${shortHash(result.backTxHash)}`,
  ];
  if (result.success || result.emergency) {
    lines.push(`Profit: <b>${result.profitNative.toFixed(6)} ${symbol}</b> (${formatUsd(result.profitUsd)})`);
  }
  if (result.errorKind) lines.push(`Reason: ${code(result.errorKind)}`);
  return lines.join('\n');
}

export function formatPriceAlert(alert: TokenPriceAlert): string {
  const icon = alert.direction === 'up' ? '📈' : '📉';
  return [
    `${icon} <b>${escapeHtml(alert.symbol)}</b> ${formatPct(alert.changePct)}`,
    `${alert.oldPrice.toPrecision(6)} → ${alert.newPrice.toPrecision(6)}`,
    `Token: ${code(shortenAddress(alert.token))}`,
  ].join('\n');
}

export function formatPositionClosed(position: Position, symbol = 'ETH'): string {
  const pnl = position.realizedPnlNative;
  const held = Math.max(0, Math.round((position.updatedAt - position.boughtAt) / 60_000));
  return [
    `${pnl >= 0 ? '✅' : '❌'} <b>POSITION CLOSED</b> ${escapeHtml(position.symbol)}`,
    ``,
    `Realised: <b>${pnl.toFixed(6)} ${symbol}</b>`,
    `Entry: ${position.entryPrice.toPrecision(6)} | Peak: ${position.highestPrice.toPrecision(6)}`,
    `Held: ${held}m`,
  ].join('\n');
}

export function formatPositionOpened(position: Position, symbol = 'ETH'): string {
  const units = tokenUnitsToNumber(position.amount, position.decimals);
  return [
    `🟢 <b>POSITION OPENED</b> ${escapeHtml(position.symbol)}`,
    `${units.toLocaleString('en-US', { maximumFractionDigits: 2 })} tokens for ${position.costBasisNative.toFixed(6)} ${symbol}`,
  ].join('\n');
}

export function formatRecovery(subsystem: string, staleMs: number): string {
  return `♻️ <b>Subsystem rebuilt</b>: ${code(subsystem)} (stale ${Math.round(staleMs / 1000)}s)`;
}

export function formatModeChange(mode: BotMode): string {
  return `⚙️ Mode: <b>${mode}</b>`;
}

export function formatError(error: Error, context: string): string {
  return `⚠️ <b>Error</b> in ${code(context)}\n${code(error.message.slice(0, 300))}`;
}
