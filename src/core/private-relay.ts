import { id, toQuantity, type Wallet } from 'ethers';
import { logger } from '../utils/logger.js';
import { BotError, errorMessage } from '../errors.js';
import type { BundleSimulation } from './chain-adapter.js';

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === 'object' && v !== null && !Array.isArray(v);
}

/**
 * Flashbots-style bundle relay (`eth_sendBundle` / `eth_callBundle`).
 * Requests are signed with the trading wallet in X-Flashbots-Signature.
 */
export class PrivateRelay {
  private readonly url: string;

  constructor(
    url: string,
    private readonly signer: Wallet,
    private readonly timeoutMs = 5_000,
  ) {
    this.url = url.replace(/\/$/, '');
  }

  async sendBundle(signedTxs: string[], targetBlock: number): Promise<string> {
    const result = await this.request('eth_sendBundle', [{ txs: signedTxs, blockNumber: toQuantity(targetBlock) }]);
    const bundleHash = isRecord(result) ? result.bundleHash : undefined;
    if (typeof bundleHash !== 'string') throw new BotError('Unknown', 'relay eth_sendBundle returned no bundle hash');
    logger.info(`[relay] Bundle ${bundleHash} submitted for block ${targetBlock}`);
    return bundleHash;
  }

  async simulateBundle(signedTxs: string[], targetBlock: number): Promise<BundleSimulation> {
    try {
      const result = await this.request('eth_callBundle', [
        { txs: signedTxs, blockNumber: toQuantity(targetBlock), stateBlockNumber: 'latest' },
      ]);
      if (!isRecord(result)) return { success: false, gasUsed: 0n, error: 'relay eth_callBundle returned no result' };
      const txResults = Array.isArray(result.results) ? result.results.filter(isRecord) : [];
      const failure = txResults
        .map((r) => (typeof r.revert === 'string' ? r.revert : typeof r.error === 'string' ? r.error : null))
        .find((e): e is string => e !== null);
      const gasUsed = typeof result.totalGasUsed === 'number' ? BigInt(result.totalGasUsed) : 0n;
      return { success: failure === undefined, gasUsed, error: failure };
    } catch (err) {
      return { success: false, gasUsed: 0n, error: errorMessage(err) };
    }
  }

  private async request(method: string, params: unknown[]): Promise<unknown> {
    const body = JSON.stringify({ jsonrpc: '2.0', id: 1, method, params });
    const signature = `${this.signer.address}:${await this.signer.signMessage(id(body))}`;

    let response: Response;
    try {
      response = await fetch(this.url, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json', 'X-Flashbots-Signature': signature },
        body,
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (err) {
      throw new BotError('ChainUnavailable', `relay ${method} unreachable: ${errorMessage(err)}`, { cause: err });
    }

    if (!response.ok) throw new BotError('ChainUnavailable', `relay ${method} HTTP ${response.status}`);
    const json: unknown = await response.json();
    if (!isRecord(json)) throw new BotError('Unknown', `relay ${method} returned a non-object`);
    if (isRecord(json.error)) throw new BotError('Other', `relay ${method}: ${String(json.error.message)}`);
    if (json.result === undefined) throw new BotError('Unknown', `relay ${method} returned no result`);
    return json.result;
  }
}
