/**
 * In-process mutual exclusion per partition.
 *
 * Calls for the same partition run one after another in arrival order;
 * calls for different partitions do not wait on each other. Cross-process
 * exclusion is the store's job (compare-and-set on the head).
 */
export class PartitionLock {
  private tails = new Map<string, Promise<void>>();

  async run<T>(partition: string, fn: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(partition) ?? Promise.resolve();
    const result = previous.then(fn);
    // ordering only: the caller receives the outcome through `result`
    const tail = result.then(
      () => undefined,
      () => undefined
    );
    this.tails.set(partition, tail);

    try {
      return await result;
    } finally {
      if (this.tails.get(partition) === tail) {
        this.tails.delete(partition);
      }
    }
  }

  isIdle(partition: string): boolean {
    return !this.tails.has(partition);
  }
}
