// src/core/user_queue.ts

/**
 * Serialises async work per key. Tasks for one key run strictly one after
 * another in submission order; tasks for different keys never wait on each
 * other. A failing task rejects its own promise only, the chain continues.
 */
export class KeyedSerialQueue<K> {
  private readonly tails = new Map<K, Promise<void>>();

  run<T>(key: K, task: () => T | Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    const result = previous.then(task);
    const tail = result.then(
      () => undefined,
      () => undefined
    );
    this.tails.set(key, tail);
    void tail.then(() => {
      if (this.tails.get(key) === tail) this.tails.delete(key);
    });
    return result;
  }

  /** Resolves once every task queued for `key` so far has settled. */
  async drain(key: K): Promise<void> {
    let tail = this.tails.get(key);
    while (tail) {
      await tail;
      const next = this.tails.get(key);
      if (next === tail) return;
      tail = next;
    }
  }

  isBusy(key: K): boolean {
    return this.tails.has(key);
  }
}
