import { describe, expect, it } from 'vitest';

import { KeyedMutex, Semaphore, runPool } from '../src/concurrency.js';

const tick = () => new Promise<void>((resolve) => setTimeout(resolve, 0));

function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

describe('Semaphore', () => {
  it('rejects a non-positive limit', () => {
    expect(() => new Semaphore(0)).toThrow(RangeError);
  });

  it('admits waiters in arrival order', async () => {
    const semaphore = new Semaphore(1);
    const order: string[] = [];
    const gate = deferred();

    const first = semaphore.run(async () => {
      order.push('first');
      await gate.promise;
    });
    const second = semaphore.run(async () => {
      order.push('second');
    });
    const third = semaphore.run(async () => {
      order.push('third');
    });

    await tick();
    expect(order).toEqual(['first']);
    expect(semaphore.inUse).toBe(1);

    gate.resolve();
    await Promise.all([first, second, third]);
    expect(order).toEqual(['first', 'second', 'third']);
    expect(semaphore.inUse).toBe(0);
  });
});

describe('KeyedMutex', () => {
  it('serialises tasks that share a key', async () => {
    const mutex = new KeyedMutex();
    const events: string[] = [];
    const gate = deferred();

    const a = mutex.runExclusive('out.mp3', async () => {
      events.push('a:start');
      await gate.promise;
      events.push('a:end');
    });
    const b = mutex.runExclusive('out.mp3', async () => {
      events.push('b:start');
    });
    const other = mutex.runExclusive('other.mp3', async () => {
      events.push('other');
    });

    await tick();
    expect(events).toEqual(['a:start', 'other']);
    gate.resolve();
    await Promise.all([a, b, other]);
    expect(events).toEqual(['a:start', 'other', 'a:end', 'b:start']);
    expect(mutex.size).toBe(0);
  });

  it('releases the key when a task throws', async () => {
    const mutex = new KeyedMutex();
    await expect(
      mutex.runExclusive('k', async () => {
        throw new Error('boom');
      }),
    ).rejects.toThrow('boom');
    await expect(mutex.runExclusive('k', async () => 'next')).resolves.toBe('next');
  });
});

describe('runPool', () => {
  it('keeps input order and honours the limit', async () => {
    let running = 0;
    let peak = 0;
    const outcomes = await runPool([30, 10, 20, 0], 2, async (delay, index) => {
      running++;
      peak = Math.max(peak, running);
      await new Promise((resolve) => setTimeout(resolve, delay));
      running--;
      return index * 10;
    });

    expect(peak).toBe(2);
    expect(outcomes).toEqual([
      { status: 'done', value: 0 },
      { status: 'done', value: 10 },
      { status: 'done', value: 20 },
      { status: 'done', value: 30 },
    ]);
  });

  it('starts nothing new after the signal aborts', async () => {
    const controller = new AbortController();
    const started: number[] = [];
    const outcomes = await runPool(
      [1, 2, 3],
      1,
      async (item) => {
        started.push(item);
        if (item === 1) controller.abort();
        return item;
      },
      controller.signal,
    );

    expect(started).toEqual([1]);
    expect(outcomes).toEqual([
      { status: 'done', value: 1 },
      { status: 'cancelled' },
      { status: 'cancelled' },
    ]);
  });
});
