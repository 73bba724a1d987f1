/**
 * Runs tasks one at a time per key, in the order they were submitted for that
 * key. Different keys never wait on each other.
 */
export class KeyedSequencer<K> {
  private readonly tails = new Map<K, Promise<void>>();

  run<T>(key: K, task: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    const result = previous.then(task);
    const tail = result.then(
      () => undefined,
      () => undefined,
    );
    this.tails.set(key, tail);
    void tail.then(() => {
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    });
    return result;
  }

  get activeKeys(): number {
    return this.tails.size;
  }
}
