import { describe, it, expect } from 'vitest';
import { id } from 'ethers';
import { RiskAnalyzer, scoreRisk, isRiskAnalysis, type RiskFindings } from '../../src/analysis/risk-analyzer.js';
import { RouterTaxProbe } from '../../src/analysis/tax-probe.js';
import { scanDangerousFunctions, isContractCode } from '../../src/analysis/bytecode-scanner.js';
import { MemoryCache } from '../../src/data/cache.js';
import { BotError } from '../../src/errors.js';
import type { HolderBalance } from '../../src/analysis/explorer.js';
import type { TokenRiskAnalysis } from '../../src/types.js';
import { FakeChainAdapter, tokenAddress, type PoolSetup } from '../helpers/fake-chain-adapter.js';

const E18 = 10n ** 18n;
const TOKEN = tokenAddress(1);

function selector(sig: string): string {
  return id(sig).slice(2, 10);
}

function findings(overrides: Partial<RiskFindings> = {}): RiskFindings {
  return {
    isVerified: true,
    dangerousFunctions: [],
    isHoneypot: false,
    tax: { buyTax: 0, sellTax: 0, transferTax: 0 },
    liquidityLocked: true,
    topHolderPct: null,
    top10HolderPct: null,
    ...overrides,
  };
}

describe('scanDangerousFunctions', () => {
  it('should find owner functions in the dispatcher', () => {
    const code = `0x6080${'63' + selector('pause()')}14${'63' + selector('mint(address,uint256)')}14`;
    expect(scanDangerousFunctions(code)).toEqual(['mint', 'pause']);
  });

  it('should ignore selectors not preceded by PUSH4', () => {
    expect(scanDangerousFunctions(`0x60${selector('pause()')}`)).toEqual([]);
    expect(scanDangerousFunctions('0x')).toEqual([]);
  });

  it('should tell contracts from empty accounts', () => {
    expect(isContractCode('0x')).toBe(false);
    expect(isContractCode('0x6080')).toBe(true);
  });
});

describe('scoreRisk', () => {
  it('should score a clean token zero', () => {
    expect(scoreRisk(findings())).toEqual({ score: 0, reasons: [] });
  });

  it('should add the weights of each finding', () => {
    const result = scoreRisk(
      findings({
        isVerified: false,
        dangerousFunctions: ['mint', 'pause', 'setFees', 'setTaxes'],
        tax: { buyTax: 12, sellTax: 3, transferTax: 0 },
        liquidityLocked: false,
        topHolderPct: 55,
        top10HolderPct: 60,
      }),
    );

    // 30 + 30 (capped) + 10 + 10 + 15 + 5
    expect(result.score).toBe(100);
    expect(result.reasons).toEqual([
      'source not verified',
      'dangerous functions: mint, pause, setFees, setTaxes',
      'tax 12%',
      'liquidity not locked',
      'top holder 55.0%',
      'top 10 holders 60.0%',
    ]);
  });

  it('should use strict thresholds on taxes and holder shares', () => {
    expect(scoreRisk(findings({ tax: { buyTax: 5, sellTax: 5, transferTax: 5 } })).score).toBe(0);
    expect(scoreRisk(findings({ tax: { buyTax: 0, sellTax: 21, transferTax: 0 } })).score).toBe(20);
    expect(scoreRisk(findings({ topHolderPct: 20, top10HolderPct: 50 })).score).toBe(0);
    expect(scoreRisk(findings({ topHolderPct: 20.5, top10HolderPct: 80.5 })).score).toBe(18);
  });
});

describe('RouterTaxProbe', () => {
  function probeFor(setup: Partial<PoolSetup> = {}) {
    const adapter = new FakeChainAdapter();
    adapter.addPool({ token: TOKEN, tokenReserve: 1_000_000n * E18, nativeReserve: 100n * E18, ...setup });
    return new RouterTaxProbe(adapter);
  }

  it('should measure no tax on a plain token', async () => {
    const result = await probeFor().probe(TOKEN);

    expect(result).toEqual({ tax: { buyTax: 0, sellTax: 0, transferTax: 0 }, isHoneypot: false, receiveRatios: [1, 1] });
  });

  it('should measure a 10% buy tax', async () => {
    const result = await probeFor({ buyTaxPct: 10 }).probe(TOKEN);

    expect(result?.receiveRatios).toEqual([0.9, 0.9]);
    expect(result?.tax.buyTax).toBe(10);
    expect(result?.isHoneypot).toBe(false);
  });

  it('should call a tax above 50% a honeypot', async () => {
    const result = await probeFor({ buyTaxPct: 60 }).probe(TOKEN);

    expect(result?.isHoneypot).toBe(true);
    expect(result?.reason).toBe('effective tax 75%');
  });

  it('should call a token whose buys revert a honeypot', async () => {
    const result = await probeFor({ buyReverts: true }).probe(TOKEN);

    expect(result?.isHoneypot).toBe(true);
    expect(result?.reason).toBe('simulated buy reverts');
    expect(result?.tax.sellTax).toBe(100);
  });

  it('should call a token without a sell quote a honeypot', async () => {
    const result = await probeFor({ sellBlocked: true }).probe(TOKEN);

    expect(result?.reason).toBe('no sell route');
  });

  it('should return null when there is no pool', async () => {
    expect(await new RouterTaxProbe(new FakeChainAdapter()).probe(TOKEN)).toBeNull();
  });
});

describe('RiskAnalyzer', () => {
  function analyzer(opts: {
    setup?: Partial<PoolSetup>;
    verified?: () => Promise<boolean | null>;
    holders?: HolderBalance[] | null;
    adapter?: FakeChainAdapter;
    cache?: MemoryCache<TokenRiskAnalysis>;
  } = {}) {
    const adapter = opts.adapter ?? new FakeChainAdapter();
    const pair = adapter.addPool({ token: TOKEN, tokenReserve: 1_000_000n * E18, nativeReserve: 100n * E18, lpLocked: true, ...opts.setup });
    const risk = new RiskAnalyzer({
      adapter,
      taxProbe: new RouterTaxProbe(adapter),
      verification: { isVerified: opts.verified ?? (async () => true) },
      holders: { topHolders: async () => opts.holders ?? null },
      cache: opts.cache,
      clock: () => 42,
    });
    return { risk, adapter, pair };
  }

  it('should score a verified token with locked liquidity zero', async () => {
    const { risk } = analyzer();

    const result = await risk.analyze(TOKEN);

    expect(result.score).toBe(0);
    expect(result.reasons).toEqual([]);
    expect(result.liquidityLocked).toBe(true);
    expect(result.analyzedAt).toBe(42);
  });

  it('should penalise unverified source and unlocked liquidity', async () => {
    const { risk } = analyzer({ verified: async () => false, setup: { lpLocked: false } });

    const result = await risk.analyze(TOKEN);

    expect(result.score).toBe(40);
    expect(result.reasons).toEqual(['source not verified', 'liquidity not locked']);
  });

  it('should treat a failed verification lookup as unverified', async () => {
    const { risk } = analyzer({
      verified: async () => {
        throw new Error('explorer down');
      },
    });

    expect((await risk.analyze(TOKEN)).isVerified).toBe(false);
  });

  it('should add the honeypot and tax weights from the probe', async () => {
    const { risk } = analyzer({ setup: { buyReverts: true } });

    const result = await risk.analyze(TOKEN);

    expect(result.score).toBe(60);
    expect(result.isHoneypot).toBe(true);
    expect(result.reasons).toEqual(['honeypot', 'tax 100%', 'simulated buy reverts']);
  });

  it('should score dangerous functions found in the bytecode', async () => {
    const code = `0x6080${'63' + selector('setMaxTxAmount(uint256)')}14`;
    const { risk } = analyzer({ setup: { code } });

    const result = await risk.analyze(TOKEN);

    expect(result.dangerousFunctions).toEqual(['setMaxTxAmount']);
    expect(result.score).toBe(10);
  });

  it('should compute holder shares without the pair and lockers', async () => {
    const adapter = new FakeChainAdapter();
    const pair = '0x5000000000000000000000000000000000000001';
    const { risk } = analyzer({
      adapter,
      holders: [
        { address: pair, balance: 900_000n * E18 },
        { address: '0x000000000000000000000000000000000000dead', balance: 800_000n * E18 },
        { address: '0x6000000000000000000000000000000000000001', balance: 600_000n * E18 },
        { address: '0x6000000000000000000000000000000000000002', balance: 400_000n * E18 },
      ],
    });

    const result = await risk.analyze(TOKEN);

    expect(result.topHolderPct).toBe(30);
    expect(result.top10HolderPct).toBe(50);
    expect(result.score).toBe(8);
  });

  it('should score an address without code as certain loss', async () => {
    const { risk } = analyzer();

    const result = await risk.analyze(tokenAddress(9));

    expect(result.score).toBe(100);
    expect(result.reasons).toEqual(['no contract code at address']);
  });

  it('should fail when the bytecode cannot be read', async () => {
    class Broken extends FakeChainAdapter {
      async getCode(): Promise<string> {
        throw new Error('socket hang up');
      }
    }
    const { risk } = analyzer({ adapter: new Broken() });

    const err = await risk.analyze(TOKEN).catch((e: unknown) => e);

    expect(err instanceof BotError && err.kind).toBe('ChainUnavailable');
    expect(err instanceof BotError && err.message).toBe(`bytecode read for ${TOKEN}: socket hang up`);
  });

  it('should serve a repeat analysis from the cache', async () => {
    const cache = new MemoryCache<TokenRiskAnalysis>({ max: 10 });
    const { risk } = analyzer({ cache });

    const first = await risk.analyze(TOKEN);
    const second = await risk.analyze(TOKEN);

    expect(second).toBe(first);
    expect(isRiskAnalysis(second)).toBe(true);
    expect(isRiskAnalysis({ token: TOKEN })).toBe(false);
  });
});
