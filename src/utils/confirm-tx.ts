import { logger } from './logger.js';
import { BotError, errorMessage } from '../errors.js';
import { sleep } from './helpers.js';
import type { ChainAdapter } from '../core/chain-adapter.js';
import type { ChainReceipt } from '../types.js';

export interface ReceiptWaitOptions {
  timeoutMs: number;
  pollMs: number;
  signal?: AbortSignal;
  clock?: () => number;
}

/**
 * Polls for a receipt until it appears or the deadline passes. Lookup
 * failures are retried on the next poll; the deadline raises Timeout.
 */
export async function waitForReceipt(
  adapter: Pick<ChainAdapter, 'getTransactionReceipt'>,
  hash: string,
  opts: ReceiptWaitOptions,
): Promise<ChainReceipt> {
  const clock = opts.clock ?? Date.now;
  const start = clock();
  let consecutiveFails = 0;

  while (clock() - start < opts.timeoutMs) {
    if (opts.signal?.aborted) throw new BotError('Timeout', `receipt wait for ${hash} cancelled`);
    try {
      const receipt = await adapter.getTransactionReceipt(hash);
      if (receipt) {
        logger.debug(`[confirm] ${hash} mined in block ${receipt.blockNumber} after ${clock() - start}ms`);
        return receipt;
      }
      consecutiveFails = 0;
    } catch (err) {
      consecutiveFails++;
      if (consecutiveFails >= 2) {
        logger.debug(`[confirm] ${consecutiveFails} failed receipt lookups for ${hash}: ${errorMessage(err)}`);
      }
    }

    const remaining = opts.timeoutMs - (clock() - start);
    if (remaining <= 0) break;
    await sleep(Math.min(opts.pollMs, remaining), opts.signal);
  }

  throw new BotError('Timeout', `no receipt for ${hash} within ${opts.timeoutMs}ms`);
}
