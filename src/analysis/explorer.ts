import { logger } from '../utils/logger.js';
import { errorMessage } from '../errors.js';
import { shortenAddress } from '../utils/helpers.js';

export interface HolderBalance {
  address: string;
  balance: bigint;
}

/** Contract verification status; null when the source could not answer. */
export interface VerificationSource {
  isVerified(token: string): Promise<boolean | null>;
}

/** Largest holders, biggest first; null when unavailable. */
export interface HolderSource {
  topHolders(token: string, limit: number): Promise<HolderBalance[] | null>;
  holderCount?(token: string): Promise<number | null>;
}

const EXPLORER_TIMEOUT_MS = 5_000;

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === 'object' && v !== null && !Array.isArray(v);
}

/**
 * Etherscan-family explorer API (Etherscan, BscScan, Snowtrace share the
 * same query format). Free keys get verification; the holder list needs a
 * paid key and falls back to null otherwise.
 */
export class ExplorerClient implements VerificationSource, HolderSource {
  constructor(
    private readonly apiUrl: string,
    private readonly apiKey: string,
  ) {}

  get configured(): boolean {
    return this.apiUrl !== '';
  }

  async isVerified(token: string): Promise<boolean | null> {
    const result = await this.query({ module: 'contract', action: 'getsourcecode', address: token });
    if (!Array.isArray(result)) return null;
    const first: unknown = result[0];
    if (!isRecord(first)) return null;
    const source = first['SourceCode'];
    return typeof source === 'string' && source.length > 0;
  }

  async topHolders(token: string, limit: number): Promise<HolderBalance[] | null> {
    const result = await this.query({
      module: 'token',
      action: 'tokenholderlist',
      contractaddress: token,
      page: '1',
      offset: String(limit),
    });
    if (!Array.isArray(result)) return null;

    const holders: HolderBalance[] = [];
    for (const row of result) {
      if (!isRecord(row)) continue;
      const address = row['TokenHolderAddress'];
      const quantity = row['TokenHolderQuantity'];
      if (typeof address !== 'string' || typeof quantity !== 'string' || !/^\d+$/.test(quantity)) continue;
      holders.push({ address, balance: BigInt(quantity) });
    }
    return holders.sort((a, b) => (b.balance > a.balance ? 1 : b.balance < a.balance ? -1 : 0));
  }

  async holderCount(token: string): Promise<number | null> {
    const result = await this.query({ module: 'token', action: 'tokenholdercount', contractaddress: token });
    if (typeof result !== 'string' || !/^\d+$/.test(result)) return null;
    return Number(result);
  }

  private async query(params: Record<string, string>): Promise<unknown> {
    if (!this.configured) return null;
    const url = new URL(this.apiUrl);
    for (const [k, v] of Object.entries(params)) url.searchParams.set(k, v);
    if (this.apiKey) url.searchParams.set('apikey', this.apiKey);

    const target = params['address'] ?? params['contractaddress'] ?? '';
    try {
      const response = await fetch(url, {
        signal: AbortSignal.timeout(EXPLORER_TIMEOUT_MS),
        headers: { Accept: 'application/json' },
      });
      if (!response.ok) {
        logger.debug(`[explorer] HTTP ${response.status} for ${params['action']} ${shortenAddress(target)}`);
        return null;
      }
      const body: unknown = await response.json();
      if (!isRecord(body) || body['status'] !== '1') {
        const message = isRecord(body) ? body['message'] : undefined;
        logger.debug(`[explorer] ${params['action']} ${shortenAddress(target)}: ${String(message)}`);
        return null;
      }
      return body['result'];
    } catch (err) {
      logger.debug(`[explorer] ${params['action']} ${shortenAddress(target)} failed: ${errorMessage(err)}`);
      return null;
    }
  }
}
