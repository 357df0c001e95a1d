/**
 * Concurrency utilities.
 *
 * Bounded parallelism, per-key mutual exclusion, periodic background jobs
 * and timeouts for calls to slow collaborators.
 */

/**
 * Map over items with at most `limit` calls in flight. Failures go to
 * `onError` and are left out of the result; successes keep input order.
 */
export async function mapSettled<T, R>(
  items: readonly T[],
  limit: number,
  fn: (item: T) => Promise<R>,
  onError: (item: T, error: unknown) => void
): Promise<R[]> {
  const queue = items.entries();
  const results = new Map<number, R>();

  // Lanes share one iterator, so each item is taken exactly once.
  const lane = async (): Promise<void> => {
    for (const [index, item] of queue) {
      try {
        results.set(index, await fn(item));
      } catch (err) {
        onError(item, err);
      }
    }
  };

  const lanes = Math.max(1, Math.min(limit, items.length));
  await Promise.all(Array.from({ length: lanes }, () => lane()));

  return [...results.entries()].sort(([a], [b]) => a - b).map(([, result]) => result);
}

/**
 * Mutual exclusion per key. Work for the same key runs one at a time in
 * arrival order; different keys don't wait on each other.
 */
export class KeyedMutex {
  /** Per key, a promise that settles when the last queued holder releases */
  private tails = new Map<string, Promise<void>>();

  async runExclusive<T>(key: string, fn: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();

    let release: () => void = () => {};
    const held = new Promise<void>((resolve) => {
      release = resolve;
    });
    const tail = previous.then(() => held);
    this.tails.set(key, tail);

    try {
      await previous;
      return await fn();
    } finally {
      release();
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    }
  }

  /** True while work for `key` is running or queued */
  isLocked(key: string): boolean {
    return this.tails.has(key);
  }
}

/**
 * A background job on a fixed interval. Runs never overlap: a run requested
 * while one is in progress joins it. Errors go to `onError`.
 */
export class PeriodicTask {
  private timer: NodeJS.Timeout | undefined;
  private active: Promise<void> | null = null;
  private stopped = true;

  constructor(
    private readonly intervalMs: number,
    private readonly task: () => Promise<void>,
    private readonly onError: (err: unknown) => void
  ) {}

  start(initialDelayMs = this.intervalMs): void {
    if (!this.stopped) return;
    this.stopped = false;
    this.schedule(initialDelayMs);
  }

  run(): Promise<void> {
    if (!this.active) {
      this.active = this.task()
        .catch((err: unknown) => this.onError(err))
        .finally(() => {
          this.active = null;
        });
    }
    return this.active;
  }

  /** Stop scheduling and wait for a run in progress. */
  async stop(): Promise<void> {
    this.stopped = true;
    clearTimeout(this.timer);
    this.timer = undefined;
    await this.active;
  }

  private schedule(delayMs: number): void {
    if (this.stopped) return;
    this.timer = setTimeout(() => {
      this.timer = undefined;
      void this.run().then(() => this.schedule(this.intervalMs));
    }, delayMs);
  }
}

/**
 * Run `fn` with an AbortSignal that fires after `timeoutMs`. Rejects with
 * `onTimeout()` if the deadline passes first, even when `fn` ignores the
 * signal.
 */
export async function withTimeout<T>(
  timeoutMs: number,
  fn: (signal: AbortSignal) => Promise<T>,
  onTimeout: () => Error
): Promise<T> {
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;

  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      // Reject first so the race settles with the timeout, not the abort.
      reject(onTimeout());
      controller.abort();
    }, timeoutMs);
  });

  try {
    return await Promise.race([fn(controller.signal), deadline]);
  } finally {
    clearTimeout(timer);
  }
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
