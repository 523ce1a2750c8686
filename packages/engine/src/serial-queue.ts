/**
 * Per-key serial execution.
 *
 * Tasks sharing a key run one at a time in submission order; tasks on
 * different keys interleave freely. The engine keys by session, so two bars
 * for the same (symbol, trading day) are never processed concurrently.
 */

export class SerialQueue {
  private readonly tails = new Map<string, Promise<void>>();

  /**
   * Queue a task behind every earlier task with the same key.
   *
   * The returned promise settles with the task's own outcome. A failed task
   * does not block the ones queued after it.
   */
  run<T>(key: string, task: () => Promise<T> | T): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    const result = previous.then(task);

    // Ordering only: the outcome reaches the caller through `result`
    const tail = result.then(
      () => undefined,
      () => undefined
    );
    this.tails.set(key, tail);

    void tail.then(() => {
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    });

    return result;
  }

  /**
   * Whether tasks are queued or running for the key.
   */
  isBusy(key: string): boolean {
    return this.tails.has(key);
  }

  /**
   * Number of keys with queued or running tasks.
   */
  get size(): number {
    return this.tails.size;
  }

  /**
   * Resolves once every task queued so far has settled.
   */
  async drain(): Promise<void> {
    await Promise.all([...this.tails.values()]);
  }
}
