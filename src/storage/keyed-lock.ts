/**
 * Async mutual exclusion keyed by string.
 *
 * Sections run under the same key execute one after another in call order;
 * sections under different keys never wait on each other. A rejected section
 * does not poison the queue.
 */
export class KeyedLock {
  private tails = new Map<string, Promise<void>>();

  run<T>(key: string, section: () => Promise<T> | T): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    const result = previous.then(() => section());
    const tail = result.then(
      () => undefined,
      () => undefined,
    );
    this.tails.set(key, tail);
    void tail.then(() => {
      if (this.tails.get(key) === tail) this.tails.delete(key);
    });
    return result;
  }

  /** Number of keys with queued or running sections. */
  get activeKeys(): number {
    return this.tails.size;
  }
}
