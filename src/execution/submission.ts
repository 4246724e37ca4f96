import { keccak256, toUtf8Bytes } from 'ethers';
import { LRUCache } from 'lru-cache';
import { logger } from '../utils/logger.js';
import { BotError, classifyError, errorMessage, retryPolicyFor, toBotError } from '../errors.js';
import { waitForReceipt } from '../utils/confirm-tx.js';
import { formatGwei, sleep } from '../utils/helpers.js';
import { applyOverrides, gasCeiling, hashOfSigned, hasPrivateRelay, type ChainAdapter } from '../core/chain-adapter.js';
import { gasBumpRetries, rpcErrors, submissionLatency } from '../telemetry/metrics.js';
import type { NonceManager } from '../core/nonce-manager.js';
import type { GasOptimizer } from './gas-optimizer.js';
import type { ChainReceipt, GasSetting, TxRequest } from '../types.js';

export interface SubmissionRequest {
  /** Log label: 'buy', 'approve', 'front', ... */
  label: string;
  tx: Pick<TxRequest, 'to' | 'data' | 'value'>;
  gas: GasSetting;
  gasLimit: bigint;
  /** Pin the nonce; a repeat with the same intent and nonce reuses the earlier result. */
  nonce?: number;
  privateRelay?: boolean;
  /** When false, resolve once the transaction is accepted. */
  awaitReceipt?: boolean;
  receiptTimeoutMs?: number;
}

export interface SubmissionOutcome {
  hash: string;
  receipt: ChainReceipt | null;
  /** Gas posture of the attempt that landed. */
  gas: GasSetting;
  nonce: number;
  attempts: number;
  idempotencyKey: string;
  /** True when an earlier send under the same key was already mined. */
  reused: boolean;
  dryRun: boolean;
}

export interface SubmissionOptions {
  dryRun: boolean;
  receiptTimeoutMs: number;
  receiptPollMs: number;
  backoffMs?: number;
  signal?: AbortSignal;
}

/** First attempt plus three retries. */
const MAX_ATTEMPTS = 4;

export function intentHash(tx: Pick<TxRequest, 'to' | 'data' | 'value'>): string {
  return keccak256(toUtf8Bytes(`${tx.to.toLowerCase()}|${tx.data.toLowerCase()}|${tx.value.toString()}`));
}

export function idempotencyKey(intent: string, nonce: number): string {
  return `${intent}:${nonce}`;
}

/**
 * Sign, send, await, classify, retry. The nonce lock is held only while a
 * nonce is issued; every chain round trip happens outside it.
 */
export class SubmissionPipeline {
  /** idempotency key → hash of the send that was accepted under it */
  private readonly sent = new LRUCache<string, string>({ max: 1_000 });

  constructor(
    private readonly adapter: ChainAdapter,
    private readonly nonces: Pick<NonceManager, 'next' | 'reset'>,
    private readonly gas: Pick<GasOptimizer, 'scaled' | 'bumpedGas'>,
    private readonly opts: SubmissionOptions,
  ) {}

  get dryRun(): boolean {
    return this.opts.dryRun;
  }

  async submit(req: SubmissionRequest): Promise<SubmissionOutcome> {
    const intent = intentHash(req.tx);
    if (this.opts.dryRun) return this.simulated(req, intent);

    const wallet = this.adapter.walletAddress;
    const awaitReceipt = req.awaitReceipt ?? true;
    const timeoutMs = req.receiptTimeoutMs ?? this.opts.receiptTimeoutMs;
    const backoffMs = this.opts.backoffMs ?? 1_000;

    let nonce = req.nonce ?? (await this.nonces.next(wallet));
    let gas = req.gas;
    let anySent = false;
    let genericRetries = 0;
    /** Set after Timeout/AlreadyKnown: the last send is still in flight, wait on it instead of resending. */
    let rewait = false;
    const started = Date.now();

    for (let attempt = 1; ; attempt++) {
      const key = idempotencyKey(intent, nonce);
      const prior = this.sent.get(key);

      try {
        if (prior !== undefined) {
          const landed = await this.adapter.getTransactionReceipt(prior);
          if (landed) {
            logger.info(`[submit] ${req.label} ${prior} already mined under ${key.slice(0, 10)}…:${nonce}, reusing`);
            return this.finish(req.label, { hash: prior, receipt: landed, gas, nonce, attempts: attempt, idempotencyKey: key, reused: true, dryRun: false });
          }
        }

        let hash: string;
        if (prior !== undefined && rewait) {
          hash = prior;
        } else {
          hash = await this.send(req, nonce, gas);
          this.sent.set(key, hash);
          anySent = true;
          logger.info(`[submit] ${req.label} sent ${hash} nonce=${nonce} gas=${formatGwei(gasCeiling(gas))} attempt ${attempt}`);
        }
        rewait = false;

        if (!awaitReceipt) {
          return { hash, receipt: null, gas, nonce, attempts: attempt, idempotencyKey: key, reused: false, dryRun: false };
        }

        const receipt = await waitForReceipt(this.adapter, hash, {
          timeoutMs,
          pollMs: this.opts.receiptPollMs,
          signal: this.opts.signal,
        });
        submissionLatency.observe((Date.now() - started) / 1000);
        if (receipt.status === 'reverted') {
          throw new BotError('ExecutionReverted', `${req.label} ${hash} reverted`, { detail: receipt.revertReason });
        }
        return this.finish(req.label, { hash, receipt, gas, nonce, attempts: attempt, idempotencyKey: key, reused: false, dryRun: false });
      } catch (err) {
        const kind = classifyError(err);
        rpcErrors.inc({ kind });
        const policy = retryPolicyFor(kind);

        if (!policy.retry || attempt >= MAX_ATTEMPTS || attempt > policy.maxRetries) {
          logger.warn(`[submit] ${req.label} failed after ${attempt} attempt(s): ${kind}`);
          if (!anySent) {
            await this.nonces.reset(wallet).catch((resetErr: unknown) => {
              logger.error(`[submit] ${req.label} nonce reset failed: ${errorMessage(resetErr)}`);
            });
          }
          throw toBotError(err, req.label);
        }

        logger.warn(`[submit] ${req.label} attempt ${attempt} failed (${kind}), retrying`);
        switch (policy.adjustment) {
          case 'bump_gas':
            gas = this.gas.scaled(gas, policy.gasMultiplier);
            gasBumpRetries.inc();
            break;
          case 'reset_nonce':
            if (kind === 'AlreadyKnown' && this.sent.has(key)) {
              rewait = true;
            } else {
              await this.nonces.reset(wallet);
              nonce = await this.nonces.next(wallet);
            }
            break;
          case 'linear_backoff': {
            await sleep(backoffMs * attempt, this.opts.signal);
            // Transport failures resend at the same price; anything else walks the retry bump table.
            if (kind === 'ChainUnavailable') break;
            const bumped = this.gas.bumpedGas(req.gas, ++genericRetries);
            if (gasCeiling(bumped) > gasCeiling(gas)) {
              gas = bumped;
              gasBumpRetries.inc();
            }
            break;
          }
          case 'none':
            rewait = this.sent.has(key);
            break;
        }
      }
    }
  }

  private async send(req: SubmissionRequest, nonce: number, gas: GasSetting): Promise<string> {
    const tx = applyOverrides({ ...req.tx }, { nonce, gasLimit: req.gasLimit, gas }, this.adapter.chain.id);
    const signed = await this.adapter.signTransaction(tx);

    if (req.privateRelay && hasPrivateRelay(this.adapter)) {
      const target = (await this.adapter.getBlockNumber()) + 1;
      const bundle = await this.adapter.sendPrivateBundle([signed], target);
      logger.debug(`[submit] ${req.label} bundled as ${bundle} for block ${target}`);
      return hashOfSigned(signed);
    }
    return this.adapter.sendTransaction(signed);
  }

  private simulated(req: SubmissionRequest, intent: string): SubmissionOutcome {
    const nonce = req.nonce ?? -1;
    const hash = keccak256(toUtf8Bytes(`dry-run:${intent}:${Date.now()}`));
    logger.info(`[submit] DRY RUN ${req.label} → ${hash}`);
    return {
      hash,
      receipt: {
        hash,
        status: 'success',
        blockNumber: 0,
        transactionIndex: 0,
        gasUsed: 0n,
        effectiveGasPrice: gasCeiling(req.gas),
      },
      gas: req.gas,
      nonce,
      attempts: 1,
      idempotencyKey: idempotencyKey(intent, nonce),
      reused: false,
      dryRun: true,
    };
  }

  private finish(label: string, outcome: SubmissionOutcome): SubmissionOutcome {
    if (outcome.attempts > 1) {
      logger.info(`[submit] ${label} landed on attempt ${outcome.attempts} at ${formatGwei(gasCeiling(outcome.gas))}`);
    }
    return outcome;
  }
}
