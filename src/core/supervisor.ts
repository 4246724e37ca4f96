import { logger } from '../utils/logger.js';
import { errorMessage } from '../errors.js';

/** What the watchdog needs from every stateful subsystem. */
export interface Supervised {
  readonly name: string;
  lastSuccessTs(): number;
  /** Try-acquire of the subsystem lock; stamps success when it gets it. */
  probe(timeoutMs: number): Promise<boolean>;
  dispose?(): void;
}

/**
 * Holds the one strong reference to a subsystem. Background tasks get
 * WeakHandles; after a swap every old handle stops upgrading.
 */
export class SubsystemSlot<T extends object> {
  private current: T;
  private gen = 0;

  constructor(readonly name: string, initial: T) {
    this.current = initial;
  }

  get(): T {
    return this.current;
  }

  get generation(): number {
    return this.gen;
  }

  weak(): WeakHandle<T> {
    return new WeakHandle(this, new WeakRef(this.current), this.gen);
  }

  /** Installs `next` and returns the instance it replaced. */
  swap(next: T): T {
    const old = this.current;
    this.current = next;
    this.gen++;
    return old;
  }
}

export class WeakHandle<T extends object> {
  constructor(
    private readonly slot: SubsystemSlot<T>,
    private readonly ref: WeakRef<T>,
    private readonly gen: number,
  ) {}

  /** The instance, or null once it has been swapped out or collected. */
  upgrade(): T | null {
    if (this.slot.generation !== this.gen) return null;
    return this.ref.deref() ?? null;
  }
}

export interface RebuildReport {
  name: string;
  staleMs: number;
}

/**
 * Deadlock watchdog: probes each subsystem's lock and rebuilds any whose
 * last-success stamp is older than the threshold.
 */
export class HealthSupervisor {
  private readonly checks: Array<() => Promise<RebuildReport | null>> = [];

  constructor(
    private readonly thresholdMs: number,
    private readonly probeTimeoutMs: number,
    private readonly clock: () => number = Date.now,
  ) {}

  watch<T extends Supervised>(slot: SubsystemSlot<T>, rebuild: (old: T) => T): void {
    this.checks.push(() => this.checkOne(slot, rebuild));
  }

  async checkAll(): Promise<RebuildReport[]> {
    const rebuilt: RebuildReport[] = [];
    for (const check of this.checks) {
      const report = await check();
      if (report) rebuilt.push(report);
    }
    return rebuilt;
  }

  private async checkOne<T extends Supervised>(
    slot: SubsystemSlot<T>,
    rebuild: (old: T) => T,
  ): Promise<RebuildReport | null> {
    const instance = slot.get();
    let reachable = false;
    try {
      reachable = await instance.probe(this.probeTimeoutMs);
    } catch (err) {
      logger.warn(`[supervisor] ${instance.name} probe failed: ${errorMessage(err)}`);
    }

    const staleMs = this.clock() - instance.lastSuccessTs();
    if (staleMs <= this.thresholdMs) return null;

    logger.warn(`[supervisor] ${instance.name} stale for ${Math.round(staleMs / 1000)}s (probe ${reachable ? 'ok' : 'timed out'}), rebuilding`);
    slot.swap(rebuild(instance));
    instance.dispose?.();
    return { name: instance.name, staleMs };
  }
}
