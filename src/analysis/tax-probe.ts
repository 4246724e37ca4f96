import { logger } from '../utils/logger.js';
import { classifyError, errorMessage } from '../errors.js';
import { mulFactor, nativeToWei, shortenAddress } from '../utils/helpers.js';
import { SWAP_DEADLINE_SECONDS } from '../constants.js';
import { routerInterface } from '../core/router-abi.js';
import type { ChainAdapter } from '../core/chain-adapter.js';
import type { TaxInfo } from '../types.js';

export interface TaxProbeResult {
  tax: TaxInfo;
  isHoneypot: boolean;
  /** Received / quoted on the buy leg, per probe size. */
  receiveRatios: number[];
  reason?: string;
}

export interface TaxProbe {
  /** null when the token has no route to price against. */
  probe(token: string): Promise<TaxProbeResult | null>;
}

/** Received/quoted ratios tried from best to worst; the first that passes bounds the tax. */
const RATIO_STEPS = [1, 0.99, 0.98, 0.97, 0.95, 0.9, 0.85, 0.8, 0.7, 0.5, 0.25, 0] as const;

/** Above this effective tax a token is treated as a trap. */
export const HONEYPOT_TAX_PCT = 50;

type Adapter = Pick<ChainAdapter, 'chain' | 'walletAddress' | 'getAmountsOut' | 'call'>;

/**
 * Simulated buys at two sizes through the router's fee-on-transfer entry
 * point, which checks the recipient's actual balance change against
 * `amountOutMin`. Stepping `amountOutMin` down from the quote finds the
 * share of the quote that really arrives. The sell leg must still quote.
 */
export class RouterTaxProbe implements TaxProbe {
  constructor(
    private readonly adapter: Adapter,
    private readonly sizesNative: readonly number[] = [0.01, 0.1],
  ) {}

  async probe(token: string): Promise<TaxProbeResult | null> {
    const wrapped = this.adapter.chain.wrappedNative;
    const ratios: number[] = [];
    let lastQuote = 0n;

    for (const size of this.sizesNative) {
      const amountIn = nativeToWei(size);
      const quote = await this.quote(amountIn, [wrapped, token]);
      if (quote === null) return null;
      if (quote === 0n) {
        return this.honeypot(ratios, 'buy quote is zero');
      }
      lastQuote = quote;
      ratios.push(await this.receiveRatio(token, amountIn, quote));
    }

    const worst = Math.min(...ratios);
    const buyTax = Math.round((1 - worst) * 10_000) / 100;
    if (worst === 0) return this.honeypot(ratios, 'simulated buy reverts');

    // Two sizes should tax alike; a larger size that loses far more points at an anti-whale trap.
    const [small, large] = ratios;
    if (small !== undefined && large !== undefined && small - large > 0.2) {
      return this.honeypot(ratios, `receive ratio falls from ${small} to ${large} with size`);
    }

    const sellQuote = await this.quote(mulFactor(lastQuote, worst), [token, wrapped]);
    if (sellQuote === null || sellQuote === 0n) {
      return this.honeypot(ratios, 'no sell route');
    }

    // The sell leg cannot be simulated without holding the token; the measured
    // transfer tax stands in for it.
    const tax: TaxInfo = { buyTax, sellTax: buyTax, transferTax: buyTax };
    if (buyTax > HONEYPOT_TAX_PCT) {
      return { tax, isHoneypot: true, receiveRatios: ratios, reason: `effective tax ${buyTax}%` };
    }
    return { tax, isHoneypot: false, receiveRatios: ratios };
  }

  private honeypot(ratios: number[], reason: string): TaxProbeResult {
    return { tax: { buyTax: 100, sellTax: 100, transferTax: 100 }, isHoneypot: true, receiveRatios: ratios, reason };
  }

  private async quote(amountIn: bigint, path: string[]): Promise<bigint | null> {
    try {
      const amounts = await this.adapter.getAmountsOut(amountIn, path);
      return amounts[amounts.length - 1] ?? null;
    } catch (err) {
      if (classifyError(err) === 'ChainUnavailable') throw err;
      logger.debug(`[tax-probe] No quote for ${shortenAddress(path[path.length - 1] ?? '')}: ${errorMessage(err)}`);
      return null;
    }
  }

  private async receiveRatio(token: string, amountIn: bigint, quote: bigint): Promise<number> {
    const deadline = BigInt(Math.floor(Date.now() / 1000) + SWAP_DEADLINE_SECONDS);
    const path = [this.adapter.chain.wrappedNative, token];
    const method = `${this.adapter.chain.swapFunctions.nativeForTokens}SupportingFeeOnTransferTokens`;

    for (const ratio of RATIO_STEPS) {
      const data = routerInterface.encodeFunctionData(method, [
        mulFactor(quote, ratio),
        path,
        this.adapter.walletAddress,
        deadline,
      ]);
      try {
        await this.adapter.call({ to: this.adapter.chain.router, data, value: amountIn });
        return ratio;
      } catch (err) {
        const kind = classifyError(err);
        if (kind !== 'ExecutionReverted') throw err;
      }
    }
    return 0;
  }
}
