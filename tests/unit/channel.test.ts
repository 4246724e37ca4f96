import { describe, it, expect } from 'vitest';
import { BoundedChannel } from '../../src/utils/channel.js';
import { TaskGroup } from '../../src/utils/tasks.js';
import { sleep } from '../../src/utils/helpers.js';

describe('BoundedChannel', () => {
  it('should drop sends past capacity and count them', () => {
    const dropped: string[] = [];
    const ch = new BoundedChannel<number>('test', 2, (name) => dropped.push(name));

    expect(ch.send(1)).toBe(true);
    expect(ch.send(2)).toBe(true);
    expect(ch.send(3)).toBe(false);

    expect(ch.dropped).toBe(1);
    expect(dropped).toEqual(['test']);
    expect(ch.drain()).toEqual([1, 2]);
  });

  it('should wake a waiting receiver', async () => {
    const ch = new BoundedChannel<string>('test', 4);
    const received = ch.recv();

    ch.send('hello');

    expect(await received).toBe('hello');
  });

  it('should return null to receivers once closed or aborted', async () => {
    const ch = new BoundedChannel<string>('test', 4);
    const controller = new AbortController();
    const waiting = ch.recv(controller.signal);

    controller.abort();
    expect(await waiting).toBeNull();

    ch.close();
    expect(await ch.recv()).toBeNull();
    expect(ch.send('late')).toBe(false);
  });
});

describe('TaskGroup', () => {
  it('should repeat a tick until shutdown', async () => {
    const group = new TaskGroup();
    let ticks = 0;
    group.every('ticker', 5, async () => {
      ticks++;
    });

    await sleep(30);
    const stuck = await group.shutdown(100);

    expect(ticks).toBeGreaterThan(1);
    expect(stuck).toEqual([]);
    expect(group.has('ticker')).toBe(false);
  });

  it('should keep ticking after a failed tick', async () => {
    const group = new TaskGroup();
    let ticks = 0;
    group.every('flaky', 5, async () => {
      ticks++;
      if (ticks === 1) throw new Error('first tick fails');
    });

    await sleep(30);
    await group.shutdown(100);

    expect(ticks).toBeGreaterThan(1);
  });

  it('should name the tasks still running at the deadline', async () => {
    const group = new TaskGroup();
    group.spawn('stubborn', () => sleep(200));

    expect(await group.shutdown(10)).toEqual(['stubborn']);
  });

  it('should replace a task spawned under the same name', async () => {
    const group = new TaskGroup();
    let firstAborted = false;
    group.spawn('loop', async (signal) => {
      await sleep(1_000, signal);
      firstAborted = signal.aborted;
    });

    group.spawn('loop', (signal) => sleep(1_000, signal));
    await sleep(5);

    expect(firstAborted).toBe(true);
    expect(group.names).toEqual(['loop']);
    await group.shutdown(100);
  });
});
