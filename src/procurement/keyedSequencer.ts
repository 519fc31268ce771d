/**
 * Runs async work one-at-a-time per key. Work under different keys runs
 * concurrently; work under the same key runs in submission order.
 */
export class KeyedSequencer {
  private readonly tails = new Map<string, Promise<void>>();

  public run<T>(key: string, work: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    const result = previous.then(work);
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
  public get activeKeys(): number {
    return this.tails.size;
  }
}
