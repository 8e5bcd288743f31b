/**
 * In-process mutex keyed by an arbitrary value
 *
 * Tasks sharing a key run one at a time in arrival order; tasks with
 * different keys do not wait for each other. A key's entry is removed
 * once its queue drains.
 */
export class KeyedMutex<K> {
  private tails = new Map<K, Promise<void>>();

  async runExclusive<T>(key: K, task: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();

    let release: () => void = () => {};
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
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    }
  }
}
