/**
 * In-process counting semaphore. Waiters are served in FIFO order.
 */
export class Semaphore {
  private active = 0;
  private readonly waiters: Array<() => void> = [];

  constructor(private readonly maxConcurrent: number) {
    if (!Number.isInteger(maxConcurrent) || maxConcurrent < 1) {
      throw new RangeError(`maxConcurrent must be a positive integer, got ${maxConcurrent}`);
    }
  }

  get inUse(): number {
    return this.active;
  }

  async acquire(): Promise<void> {
    if (this.active < this.maxConcurrent) {
      this.active++;
      return;
    }
    await new Promise<void>((resolve) => this.waiters.push(resolve));
  }

  // The slot passes straight to the next waiter, so `active` only drops when nobody waits.
  release(): void {
    const next = this.waiters.shift();
    if (next) {
      next();
    } else {
      this.active = Math.max(this.active - 1, 0);
    }
  }

  async run<T>(task: () => Promise<T>): Promise<T> {
    await this.acquire();
    try {
      return await task();
    } finally {
      this.release();
    }
  }
}

/** Serialises tasks that share a key; tasks with different keys run freely. */
export class KeyedMutex {
  private readonly tails = new Map<string, Promise<void>>();

  async runExclusive<T>(key: string, task: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    let release: () => void = () => undefined;
    const current = new Promise<void>((resolve) => {
      release = resolve;
    });
    const tail = previous.then(() => current);
    this.tails.set(key, tail);

    await previous;
    try {
      return await task();
    } finally {
      release();
      if (this.tails.get(key) === tail) this.tails.delete(key);
    }
  }

  get size(): number {
    return this.tails.size;
  }
}

export type PoolOutcome<R> = { status: 'done'; value: R } | { status: 'cancelled' };

/**
 * Run `worker` over `items` with at most `limit` in flight. Results keep the
 * input order. Once `signal` aborts no further item is started; items already
 * running finish and the rest come back as `cancelled`.
 */
export async function runPool<T, R>(
  items: readonly T[],
  limit: number,
  worker: (item: T, index: number) => Promise<R>,
  signal?: AbortSignal,
): Promise<PoolOutcome<R>[]> {
  const semaphore = new Semaphore(limit);
  return Promise.all(
    items.map((item, index) =>
      semaphore.run(async (): Promise<PoolOutcome<R>> => {
        if (signal?.aborted) return { status: 'cancelled' };
        return { status: 'done', value: await worker(item, index) };
      }),
    ),
  );
}
