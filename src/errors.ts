import { isError } from 'ethers';

export type ErrorKind =
  | 'ChainUnavailable'
  | 'LockContention'
  | 'Timeout'
  | 'Underpriced'
  | 'InsufficientFunds'
  | 'NonceTooLow'
  | 'AlreadyKnown'
  | 'ReplacementUnderpriced'
  | 'ExecutionReverted'
  | 'AllowanceMissing'
  | 'SafetyRefusal'
  | 'ReserveExhausted'
  | 'SimulationInfeasible'
  | 'MempoolDegraded'
  | 'ConfigInvalid'
  | 'InvalidInput'
  | 'TierRestricted'
  | 'SubsystemGone'
  | 'Other'
  | 'Unknown';

export class BotError extends Error {
  readonly kind: ErrorKind;
  /** Revert reason for ExecutionReverted, safety level for SafetyRefusal. */
  readonly detail?: string;

  constructor(kind: ErrorKind, message: string, opts: { detail?: string; cause?: unknown } = {}) {
    super(message, opts.cause === undefined ? undefined : { cause: opts.cause });
    this.name = 'BotError';
    this.kind = kind;
    this.detail = opts.detail;
  }

  toString(): string {
    return this.detail ? `${this.kind}(${this.detail}): ${this.message}` : `${this.kind}: ${this.message}`;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

// Order matters: "replacement transaction underpriced" must win over "underpriced".
const MESSAGE_PATTERNS: Array<[RegExp, ErrorKind]> = [
  [/nonce too low|nonce has already been used|nonce expired/i, 'NonceTooLow'],
  [/already known|known transaction/i, 'AlreadyKnown'],
  [/replacement (transaction )?underpriced|replacement fee too low/i, 'ReplacementUnderpriced'],
  [/underpriced|fee too low|max fee per gas less than block base fee|gas price too low/i, 'Underpriced'],
  [/insufficient funds/i, 'InsufficientFunds'],
  [/execution reverted|revert/i, 'ExecutionReverted'],
  [/timed? ?out|deadline exceeded/i, 'Timeout'],
  [/ECONNREFUSED|ECONNRESET|ENOTFOUND|socket hang up|network error|missing response|503|502/i, 'ChainUnavailable'],
];

/**
 * Maps provider and RPC failures to an ErrorKind. ethers error codes are
 * checked first, then the node's error text.
 */
export function classifyError(err: unknown): ErrorKind {
  if (err instanceof BotError) return err.kind;

  if (isError(err, 'INSUFFICIENT_FUNDS')) return 'InsufficientFunds';
  if (isError(err, 'NONCE_EXPIRED')) return 'NonceTooLow';
  if (isError(err, 'REPLACEMENT_UNDERPRICED')) return 'ReplacementUnderpriced';
  if (isError(err, 'CALL_EXCEPTION')) return 'ExecutionReverted';
  if (isError(err, 'TIMEOUT')) return 'Timeout';
  if (isError(err, 'NETWORK_ERROR')) return 'ChainUnavailable';

  const msg = errorMessage(err);
  for (const [pattern, kind] of MESSAGE_PATTERNS) {
    if (pattern.test(msg)) return kind;
  }
  return err instanceof Error ? 'Other' : 'Unknown';
}

export function revertReason(err: unknown): string | undefined {
  if (err instanceof BotError) return err.detail;
  if (isError(err, 'CALL_EXCEPTION')) return err.reason ?? undefined;
  const match = /execution reverted:?\s*(.*)$/i.exec(errorMessage(err));
  return match?.[1] ? match[1].trim() : undefined;
}

/** Wraps anything thrown into a BotError, keeping the original as cause. */
export function toBotError(err: unknown, context?: string): BotError {
  if (err instanceof BotError) return err;
  const kind = classifyError(err);
  const msg = context ? `${context}: ${errorMessage(err)}` : errorMessage(err);
  return new BotError(kind, msg, {
    detail: kind === 'ExecutionReverted' ? revertReason(err) : undefined,
    cause: err,
  });
}

// ─── Retry Policy ────────────────────────────────────────────────────

export type RetryAdjustment = 'none' | 'bump_gas' | 'reset_nonce' | 'linear_backoff';

export interface RetryPolicy {
  retry: boolean;
  maxRetries: number;
  adjustment: RetryAdjustment;
  /** Multiplier applied to the gas price before the next attempt. */
  gasMultiplier: number;
}

const NO_RETRY: RetryPolicy = { retry: false, maxRetries: 0, adjustment: 'none', gasMultiplier: 1 };

export function retryPolicyFor(kind: ErrorKind): RetryPolicy {
  switch (kind) {
    case 'Timeout':
      return { retry: true, maxRetries: 3, adjustment: 'none', gasMultiplier: 1 };
    case 'Underpriced':
      return { retry: true, maxRetries: 3, adjustment: 'bump_gas', gasMultiplier: 1.1 };
    case 'ReplacementUnderpriced':
      return { retry: true, maxRetries: 3, adjustment: 'bump_gas', gasMultiplier: 1.125 };
    case 'NonceTooLow':
    case 'AlreadyKnown':
      return { retry: true, maxRetries: 3, adjustment: 'reset_nonce', gasMultiplier: 1 };
    case 'Other':
    case 'Unknown':
    case 'ChainUnavailable':
      return { retry: true, maxRetries: 3, adjustment: 'linear_backoff', gasMultiplier: 1 };
    default:
      return NO_RETRY;
  }
}
