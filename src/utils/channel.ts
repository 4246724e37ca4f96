/**
 * Bounded FIFO between a producer callback and a consumer task. A full
 * channel drops the incoming message and counts it.
 */
export class BoundedChannel<T> {
  private readonly buffer: T[] = [];
  private waiter: (() => void) | null = null;
  private closed = false;
  private droppedCount = 0;

  constructor(
    readonly name: string,
    private readonly capacity: number,
    private readonly onDrop?: (name: string) => void,
  ) {}

  /** Returns false when the message was dropped. */
  send(item: T): boolean {
    if (this.closed) return false;
    if (this.buffer.length >= this.capacity) {
      this.droppedCount++;
      this.onDrop?.(this.name);
      return false;
    }
    this.buffer.push(item);
    this.wake();
    return true;
  }

  /** Takes everything currently buffered without waiting. */
  drain(max = Infinity): T[] {
    return this.buffer.splice(0, Math.min(max, this.buffer.length));
  }

  /** Resolves with the next item, or null once closed or aborted. */
  async recv(signal?: AbortSignal): Promise<T | null> {
    while (this.buffer.length === 0) {
      if (this.closed || signal?.aborted) return null;
      await new Promise<void>((resolve) => {
        const done = (): void => {
          signal?.removeEventListener('abort', done);
          this.waiter = null;
          resolve();
        };
        this.waiter = done;
        signal?.addEventListener('abort', done, { once: true });
      });
    }
    return this.buffer.shift() ?? null;
  }

  close(): void {
    this.closed = true;
    this.wake();
  }

  get size(): number {
    return this.buffer.length;
  }

  get dropped(): number {
    return this.droppedCount;
  }

  private wake(): void {
    const w = this.waiter;
    this.waiter = null;
    w?.();
  }
}
