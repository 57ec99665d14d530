/**
 * Async Lock
 *
 * Mutual exclusion for cooperative async code. Callers queue on a promise
 * chain; each critical section starts only after the previous one settled.
 */

export class AsyncLock {
  private tail: Promise<void> = Promise.resolve();
  private pending = 0;

  /**
   * Run fn exclusively. A rejection from fn reaches the caller but does not
   * poison the lock for later callers.
   */
  async runExclusive<T>(fn: () => Promise<T>): Promise<T> {
    const previous = this.tail;
    let release: () => void = () => {};
    this.tail = new Promise<void>(resolve => {
      release = resolve;
    });
    this.pending++;

    try {
      await previous;
      return await fn();
    } finally {
      this.pending--;
      release();
    }
  }

  isLocked(): boolean {
    return this.pending > 0;
  }
}

/**
 * Lazily-initialized shared value.
 *
 * The first caller runs `init` under the lock with its own argument; callers
 * that arrive while it is running wait and then reuse the published value
 * (their argument is ignored). A failed init publishes nothing, so a later
 * caller may try again.
 */
export class LazySingleton<T, A = void> {
  private readonly lock = new AsyncLock();
  private published: { value: T } | null = null;

  constructor(private readonly init: (arg: A) => Promise<T>) {}

  async get(arg: A): Promise<T> {
    if (this.published) {
      return this.published.value;
    }
    return this.lock.runExclusive(async () => {
      if (this.published) {
        return this.published.value;
      }
      const value = await this.init(arg);
      this.published = { value };
      return value;
    });
  }

  get state(): 'UNINITIALIZED' | 'INITIALIZING' | 'READY' {
    if (this.published) return 'READY';
    return this.lock.isLocked() ? 'INITIALIZING' : 'UNINITIALIZED';
  }
}
