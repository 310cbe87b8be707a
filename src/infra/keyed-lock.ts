/**
 * KeyedLock - per-key promise mutex
 *
 * Serializes async sections that share a key (a job id) while letting
 * different keys proceed concurrently. Waiters run in FIFO order.
 */
export class KeyedLock {
  private readonly chains = new Map<string, Promise<void>>();

  /**
   * Acquire the lock for a key.
   *
   * @returns A function that releases the lock
   */
  async acquire(key: string): Promise<() => void> {
    const previous = this.chains.get(key) ?? Promise.resolve();

    let release: () => void = () => undefined;
    const ours = new Promise<void>((resolve) => {
      release = resolve;
    });

    const chain = previous.then(() => ours);
    this.chains.set(key, chain);

    await previous;

    return () => {
      release();
      // Last holder: drop the entry so idle keys do not accumulate
      if (this.chains.get(key) === chain) {
        this.chains.delete(key);
      }
    };
  }

  /**
   * Run fn while holding the lock for key. The lock is released when fn
   * settles.
   */
  async run<T>(key: string, fn: () => Promise<T>): Promise<T> {
    const release = await this.acquire(key);
    try {
      return await fn();
    } finally {
      release();
    }
  }

  /**
   * Whether any holder or waiter exists for key
   */
  isLocked(key: string): boolean {
    return this.chains.has(key);
  }
}
