/**
 * Serializes async work per key.
 *
 * Tasks queued under the same key run one after another in call order;
 * different keys never wait on each other. A failed task does not poison
 * the chain for the tasks behind it.
 */
export class KeyedMutex {
  private readonly tails: Map<string, Promise<void>> = new Map();

  runExclusive<T>(key: string, task: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    const run = previous.then(task);
    const tail = run.then(
      () => undefined,
      () => undefined,
    );

    this.tails.set(key, tail);
    void tail.then(() => {
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    });

    return run;
  }

  /** Number of keys with queued or running work. */
  get size(): number {
    return this.tails.size;
  }
}
