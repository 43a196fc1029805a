/**
 * Per-key mutual exclusion.
 *
 * Work submitted under the same key runs one at a time in submission
 * order; different keys never wait on each other. Chains are dropped once
 * the last holder releases, so idle keys cost nothing.
 */
export class KeyedLock {
  private readonly chains = new Map<string, Promise<void>>();

  async run<T>(key: string, work: () => Promise<T>): Promise<T> {
    const previous = this.chains.get(key) ?? Promise.resolve();
    let release = (): void => {};
    const gate = new Promise<void>((resolve) => {
      release = () => resolve();
    });
    const chain = previous.then(() => gate);
    this.chains.set(key, chain);

    await previous;
    try {
      return await work();
    } finally {
      release();
      if (this.chains.get(key) === chain) {
        this.chains.delete(key);
      }
    }
  }

  /** Number of keys with queued or running work. */
  get size(): number {
    return this.chains.size;
  }
}
