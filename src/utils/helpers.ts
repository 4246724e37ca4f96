import { formatEther, formatUnits, isAddress, parseUnits } from 'ethers';
import { BotError } from '../errors.js';

export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal?.aborted) {
      resolve();
      return;
    }
    const timer = setTimeout(done, ms);
    function done(): void {
      clearTimeout(timer);
      signal?.removeEventListener('abort', done);
      resolve();
    }
    signal?.addEventListener('abort', done, { once: true });
  });
}

/** Resolves null on abort; `dispose` detaches the listener when the caller stops waiting first. */
export function abortable(signal: AbortSignal): { promise: Promise<null>; dispose: () => void } {
  let onAbort: () => void = () => undefined;
  const promise = new Promise<null>((resolve) => {
    onAbort = () => resolve(null);
    if (signal.aborted) resolve(null);
    else signal.addEventListener('abort', onAbort, { once: true });
  });
  return { promise, dispose: () => signal.removeEventListener('abort', onAbort) };
}

/** Rejects with a Timeout BotError when `promise` has not settled within `ms`. */
export async function withTimeout<T>(promise: Promise<T>, ms: number, label: string): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new BotError('Timeout', `${label} timed out after ${ms}ms`)), ms);
  });
  try {
    return await Promise.race([promise, timeout]);
  } finally {
    clearTimeout(timer);
  }
}

export function shortenAddress(address: string, chars = 4): string {
  return `${address.slice(0, chars + 2)}...${address.slice(-chars)}`;
}

export function isValidAddress(input: string): boolean {
  return isAddress(input);
}

/** Lower-cased address used as a map key across subsystems. */
export function addrKey(address: string): string {
  return address.toLowerCase();
}

// ─── Units ───────────────────────────────────────────────────────────

export function weiToNative(wei: bigint): number {
  return Number(formatEther(wei));
}

export function nativeToWei(amount: number): bigint {
  return parseUnits(amount.toFixed(18), 18);
}

export function toGwei(wei: bigint): number {
  return Number(formatUnits(wei, 'gwei'));
}

export function gwei(amount: number): bigint {
  return parseUnits(amount.toString(), 'gwei');
}

export function tokenUnitsToNumber(amount: bigint, decimals: number): number {
  return Number(formatUnits(amount, decimals));
}

const BPS = 10_000n;

/** Multiplies a bigint by a float factor at basis-point precision. */
export function mulFactor(value: bigint, factor: number): bigint {
  return (value * BigInt(Math.round(factor * 10_000))) / BPS;
}

/** `value × pct / 100`, with pct in percent at basis-point precision. */
export function pctOf(value: bigint, pct: number): bigint {
  return (value * BigInt(Math.round(pct * 100))) / BPS;
}

export function minBigint(a: bigint, b: bigint): bigint {
  return a < b ? a : b;
}

// ─── Formatting ──────────────────────────────────────────────────────

export function formatPct(pct: number, decimals = 1): string {
  const sign = pct >= 0 ? '+' : '';
  return `${sign}${pct.toFixed(decimals)}%`;
}

export function formatUsd(usd: number): string {
  if (usd >= 1_000_000) return `$${(usd / 1_000_000).toFixed(2)}M`;
  if (usd >= 1_000) return `$${(usd / 1_000).toFixed(1)}K`;
  return `$${usd.toFixed(2)}`;
}

export function formatGwei(wei: bigint): string {
  return `${toGwei(wei).toFixed(2)} gwei`;
}

export function generateId(prefix = ''): string {
  const id = `${Date.now().toString(36)}-${Math.random().toString(36).slice(2, 8)}`;
  return prefix ? `${prefix}-${id}` : id;
}

export function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}
