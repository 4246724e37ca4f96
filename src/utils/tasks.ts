import { logger } from './logger.js';
import { errorMessage } from '../errors.js';
import { sleep } from './helpers.js';

export interface TaskHandle {
  readonly name: string;
  readonly done: Promise<void>;
  cancel(): void;
}

/**
 * Owns long-running loops. Each task gets an AbortSignal; shutdown aborts
 * them all and waits for them to finish, up to a deadline.
 */
export class TaskGroup {
  private readonly tasks = new Map<string, { handle: TaskHandle; controller: AbortController }>();

  spawn(name: string, body: (signal: AbortSignal) => Promise<void>): TaskHandle {
    this.tasks.get(name)?.controller.abort();

    const controller = new AbortController();
    const done = body(controller.signal)
      .catch((err: unknown) => {
        logger.error(`[tasks] ${name} crashed: ${errorMessage(err)}`);
      })
      .finally(() => {
        if (this.tasks.get(name)?.controller === controller) this.tasks.delete(name);
      });

    const handle: TaskHandle = { name, done, cancel: () => controller.abort() };
    this.tasks.set(name, { handle, controller });
    return handle;
  }

  /** Repeats `tick` every `intervalMs` until cancelled. Tick failures are logged, not fatal. */
  every(name: string, intervalMs: number, tick: (signal: AbortSignal) => Promise<void>): TaskHandle {
    return this.spawn(name, async (signal) => {
      while (!signal.aborted) {
        try {
          await tick(signal);
        } catch (err) {
          logger.warn(`[tasks] ${name} tick failed: ${errorMessage(err)}`);
        }
        await sleep(intervalMs, signal);
      }
    });
  }

  has(name: string): boolean {
    return this.tasks.has(name);
  }

  get names(): string[] {
    return [...this.tasks.keys()];
  }

  /** Cancels everything and waits for drain. Returns the names still running at the deadline. */
  async shutdown(deadlineMs: number): Promise<string[]> {
    const entries = [...this.tasks.values()];
    for (const { controller } of entries) controller.abort();

    const drained = Promise.all(entries.map((e) => e.handle.done)).then(() => true);
    const deadline = new AbortController();
    const finished = await Promise.race([drained, sleep(deadlineMs, deadline.signal).then(() => false)]);
    deadline.abort();
    if (finished) return [];
    return [...this.tasks.keys()];
  }
}
