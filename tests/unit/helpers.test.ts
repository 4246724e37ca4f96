import { describe, it, expect, vi } from 'vitest';
import {
  abortable,
  clamp,
  formatPct,
  formatUsd,
  gwei,
  mulFactor,
  nativeToWei,
  pctOf,
  shortenAddress,
  weiToNative,
  withTimeout,
} from '../../src/utils/helpers.js';
import { BotError } from '../../src/errors.js';

describe('helpers', () => {
  it('should scale bigints at basis-point precision', () => {
    expect(mulFactor(gwei(10), 1.1)).toBe(11_000_000_000n);
    expect(mulFactor(1000n, 1.125)).toBe(1125n);
    expect(pctOf(1000n, 40)).toBe(400n);
    expect(pctOf(1000n, 0.5)).toBe(5n);
  });

  it('should convert between wei and native units', () => {
    expect(nativeToWei(0.5)).toBe(500_000_000_000_000_000n);
    expect(weiToNative(1_500_000_000_000_000_000n)).toBe(1.5);
    expect(gwei(2.1)).toBe(2_100_000_000n);
  });

  it('should shorten addresses', () => {
    expect(shortenAddress('0x1234567890abcdef1234567890abcdef12345678')).toBe('0x1234...5678');
  });

  it('should format percentages and dollar amounts', () => {
    expect(formatPct(12.34)).toBe('+12.3%');
    expect(formatPct(-5)).toBe('-5.0%');
    expect(formatUsd(2_500_000)).toBe('$2.50M');
    expect(formatUsd(4_200)).toBe('$4.2K');
    expect(formatUsd(12)).toBe('$12.00');
  });

  it('should clamp', () => {
    expect(clamp(5, 0, 1)).toBe(1);
    expect(clamp(-1, 0, 1)).toBe(0);
  });

  it('should reject with a Timeout BotError when the promise is too slow', async () => {
    const never = new Promise<void>(() => undefined);
    const err = await withTimeout(never, 10, 'quote').catch((e: unknown) => e);

    expect(err).toBeInstanceOf(BotError);
    expect(err instanceof BotError && err.kind).toBe('Timeout');
    expect(err instanceof BotError && err.message).toBe('quote timed out after 10ms');
  });

  it('should resolve null when the signal aborts', async () => {
    const controller = new AbortController();
    const abort = abortable(controller.signal);
    controller.abort();

    expect(await abort.promise).toBeNull();
  });

  it('should detach its abort listener on dispose', async () => {
    const controller = new AbortController();
    const add = vi.spyOn(controller.signal, 'addEventListener');
    const remove = vi.spyOn(controller.signal, 'removeEventListener');

    const abort = abortable(controller.signal);
    abort.dispose();
    controller.abort();
    const settled = await Promise.race([abort.promise.then(() => 'resolved'), sleepThen('pending')]);

    expect(settled).toBe('pending');
    expect(add).toHaveBeenCalledTimes(1);
    expect(remove).toHaveBeenCalledWith('abort', add.mock.calls[0]?.[1]);
  });
});

function sleepThen(value: string): Promise<string> {
  return new Promise((resolve) => setTimeout(() => resolve(value), 5));
}
