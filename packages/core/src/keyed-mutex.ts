/**
 * Promise-chain mutex keyed by an arbitrary string. Tasks that share a key run
 * one after another in arrival order; tasks with different keys do not wait
 * on each other. The chain for a key is dropped once its last task settles.
 */
export class KeyedMutex {
  private readonly chains = new Map<string, Promise<void>>();

  async runExclusive<T>(key: string, task: () => Promise<T>): Promise<T> {
    const previous = this.chains.get(key) ?? Promise.resolve();
    let release: () => void = () => undefined;
    const current = new Promise<void>((resolve) => {
      release = resolve;
    });
    const chain = previous.then(() => current);
    this.chains.set(key, chain);

    await previous;
    try {
      return await task();
    } finally {
      release();
      if (this.chains.get(key) === chain) {
        this.chains.delete(key);
      }
    }
  }
}
