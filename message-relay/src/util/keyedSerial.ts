// ---------------------------------------------------------------------------
// KeyedSerial — single-writer discipline per key (conversation, user, ...)
//
// Tasks sharing a key run one after another in submission order; tasks on
// different keys interleave freely. A failed task does not block the next.
// ---------------------------------------------------------------------------

export class KeyedSerial {
  private tails = new Map<string, Promise<void>>();

  run<T>(key: string, task: () => Promise<T>): Promise<T> {
    const prev = this.tails.get(key) ?? Promise.resolve();
    const result = prev.then(task);
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

  /** Number of keys with queued or running work. */
  get activeKeys(): number {
    return this.tails.size;
  }
}
