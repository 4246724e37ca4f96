import { logger } from '../utils/logger.js';
import { errorMessage, toBotError } from '../errors.js';
import { addrKey, clamp, shortenAddress } from '../utils/helpers.js';
import { LP_LOCKERS } from '../constants.js';
import { isContractCode, scanDangerousFunctions } from './bytecode-scanner.js';
import type { TaxProbe } from './tax-probe.js';
import type { HolderSource, VerificationSource } from './explorer.js';
import type { Cache } from '../data/cache.js';
import type { ChainAdapter } from '../core/chain-adapter.js';
import type { TaxInfo, TokenRiskAnalysis } from '../types.js';

/**
 * Score contributions, 0 = clean, 100 = certain loss.
 *
 *   unverified source:       30
 *   dangerous function:      10 each, at most 30
 *   honeypot (probe):        40
 *   max(buy, sell) tax:      >20% 20, >10% 10, >5% 5
 *   LP not locked:           10
 *   top holder share:        >50% 15, >20% 8
 *   top-10 holder share:     >80% 10, >50% 5
 */
export const RISK_WEIGHTS = {
  unverified: 30,
  dangerousEach: 10,
  dangerousMax: 30,
  honeypot: 40,
  unlockedLiquidity: 10,
} as const;

export interface RiskFindings {
  isVerified: boolean;
  dangerousFunctions: string[];
  isHoneypot: boolean;
  tax: TaxInfo | null;
  liquidityLocked: boolean;
  topHolderPct: number | null;
  top10HolderPct: number | null;
}

export function scoreRisk(f: RiskFindings): { score: number; reasons: string[] } {
  let score = 0;
  const reasons: string[] = [];

  if (!f.isVerified) {
    score += RISK_WEIGHTS.unverified;
    reasons.push('source not verified');
  }
  if (f.dangerousFunctions.length > 0) {
    score += Math.min(f.dangerousFunctions.length * RISK_WEIGHTS.dangerousEach, RISK_WEIGHTS.dangerousMax);
    reasons.push(`dangerous functions: ${f.dangerousFunctions.join(', ')}`);
  }
  if (f.isHoneypot) {
    score += RISK_WEIGHTS.honeypot;
    reasons.push('honeypot');
  }
  if (f.tax) {
    const worst = Math.max(f.tax.buyTax, f.tax.sellTax);
    const taxPoints = worst > 20 ? 20 : worst > 10 ? 10 : worst > 5 ? 5 : 0;
    if (taxPoints > 0) {
      score += taxPoints;
      reasons.push(`tax ${worst}%`);
    }
  }
  if (!f.liquidityLocked) {
    score += RISK_WEIGHTS.unlockedLiquidity;
    reasons.push('liquidity not locked');
  }
  if (f.topHolderPct !== null) {
    const pts = f.topHolderPct > 50 ? 15 : f.topHolderPct > 20 ? 8 : 0;
    if (pts > 0) {
      score += pts;
      reasons.push(`top holder ${f.topHolderPct.toFixed(1)}%`);
    }
  }
  if (f.top10HolderPct !== null) {
    const pts = f.top10HolderPct > 80 ? 10 : f.top10HolderPct > 50 ? 5 : 0;
    if (pts > 0) {
      score += pts;
      reasons.push(`top 10 holders ${f.top10HolderPct.toFixed(1)}%`);
    }
  }

  return { score: clamp(score, 0, 100), reasons };
}

export interface RiskAnalyzerDeps {
  adapter: Pick<ChainAdapter, 'chain' | 'getCode' | 'getPair' | 'getTokenInfo' | 'getTokenBalance'>;
  taxProbe: TaxProbe;
  verification: VerificationSource;
  holders: HolderSource;
  cache?: Cache<TokenRiskAnalysis>;
  cacheTtlMs?: number;
  clock?: () => number;
}

/** Shape check for analyses read back from a shared cache. */
export function isRiskAnalysis(v: unknown): v is TokenRiskAnalysis {
  if (typeof v !== 'object' || v === null) return false;
  const r: Record<string, unknown> = Object.fromEntries(Object.entries(v));
  return (
    typeof r.token === 'string' &&
    typeof r.score === 'number' &&
    typeof r.isHoneypot === 'boolean' &&
    typeof r.isVerified === 'boolean' &&
    Array.isArray(r.dangerousFunctions) &&
    Array.isArray(r.reasons) &&
    typeof r.analyzedAt === 'number'
  );
}

const DEFAULT_CACHE_TTL_MS = 10 * 60_000;
const HOLDER_FETCH_LIMIT = 15;

/**
 * Static and simulated token safety checks combined into one 0-100 score.
 * Only the bytecode read is required; every other check degrades to its
 * most conservative answer when its source fails.
 */
export class RiskAnalyzer {
  private readonly clock: () => number;

  constructor(private readonly deps: RiskAnalyzerDeps) {
    this.clock = deps.clock ?? Date.now;
  }

  async analyze(token: string): Promise<TokenRiskAnalysis> {
    const key = `risk:${this.deps.adapter.chain.id}:${addrKey(token)}`;
    const cached = await this.deps.cache?.get(key);
    if (cached) return cached;

    let code: string;
    try {
      code = await this.deps.adapter.getCode(token);
    } catch (err) {
      throw toBotError(err, `bytecode read for ${token}`);
    }

    if (!isContractCode(code)) {
      return this.finish(key, {
        token,
        score: 100,
        isHoneypot: true,
        dangerousFunctions: [],
        isVerified: false,
        tax: null,
        liquidityLocked: false,
        topHolderPct: null,
        top10HolderPct: null,
        reasons: ['no contract code at address'],
        analyzedAt: this.clock(),
      });
    }

    const dangerousFunctions = scanDangerousFunctions(code);
    const [verified, probe, lp, holders] = await Promise.all([
      this.optional('verification', () => this.deps.verification.isVerified(token)),
      this.optional('tax probe', () => this.deps.taxProbe.probe(token)),
      this.optional('lp lock', () => this.lpStatus(token)),
      this.optional('holders', () => this.holderShares(token)),
    ]);

    const findings: RiskFindings = {
      isVerified: verified === true,
      dangerousFunctions,
      isHoneypot: probe?.isHoneypot ?? false,
      tax: probe?.tax ?? null,
      liquidityLocked: lp?.locked ?? false,
      topHolderPct: holders?.top1 ?? null,
      top10HolderPct: holders?.top10 ?? null,
    };
    const { score, reasons } = scoreRisk(findings);
    if (probe?.reason) reasons.push(probe.reason);

    const analysis: TokenRiskAnalysis = { token, score, ...findings, reasons, analyzedAt: this.clock() };
    logger.info(`[risk] ${shortenAddress(token)} score ${score}`, { reasons });
    return this.finish(key, analysis);
  }

  private async finish(key: string, analysis: TokenRiskAnalysis): Promise<TokenRiskAnalysis> {
    await this.deps.cache?.set(key, analysis, this.deps.cacheTtlMs ?? DEFAULT_CACHE_TTL_MS);
    return analysis;
  }

  private async optional<T>(label: string, fn: () => Promise<T | null>): Promise<T | null> {
    try {
      return await fn();
    } catch (err) {
      logger.warn(`[risk] ${label} check failed: ${errorMessage(err)}`);
      return null;
    }
  }

  /** LP counts as locked when lockers or the burn address hold at least half of the pair's supply. */
  private async lpStatus(token: string): Promise<{ pair: string; locked: boolean } | null> {
    const { adapter } = this.deps;
    const pair = await adapter.getPair(token, adapter.chain.wrappedNative);
    if (!pair) return null;

    const { totalSupply } = await adapter.getTokenInfo(pair);
    if (totalSupply === 0n) return { pair, locked: false };

    const balances = await Promise.all([...LP_LOCKERS].map((locker) => adapter.getTokenBalance(pair, locker)));
    const lockedAmount = balances.reduce((sum, b) => sum + b, 0n);
    return { pair, locked: lockedAmount * 2n >= totalSupply };
  }

  /** Top-1 and top-10 shares of supply in percent, ignoring the pair and lockers. */
  private async holderShares(token: string): Promise<{ top1: number; top10: number } | null> {
    const { adapter } = this.deps;
    const [holders, info, pair] = await Promise.all([
      this.deps.holders.topHolders(token, HOLDER_FETCH_LIMIT),
      adapter.getTokenInfo(token),
      adapter.getPair(token, adapter.chain.wrappedNative),
    ]);
    if (!holders || info.totalSupply === 0n) return null;

    const excluded = new Set(LP_LOCKERS);
    if (pair) excluded.add(addrKey(pair));
    const wallets = holders.filter((h) => !excluded.has(addrKey(h.address))).slice(0, 10);

    const pct = (amount: bigint): number => Number((amount * 1_000_000n) / info.totalSupply) / 10_000;
    const top1 = wallets[0] ? pct(wallets[0].balance) : 0;
    const top10 = pct(wallets.reduce((sum, h) => sum + h.balance, 0n));
    return { top1, top10 };
  }
}
