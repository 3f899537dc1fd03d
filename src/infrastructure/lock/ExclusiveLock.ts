/**
 * FIFO mutual exclusion for async critical sections.
 *
 * Tasks passed to runExclusive() run one at a time, in the order they were
 * queued. The lock passes to the next task once the current one settles,
 * whether it resolved or rejected; the rejection still reaches the caller.
 */
export class ExclusiveLock {
  private tail: Promise<void> = Promise.resolve();

  runExclusive<T>(task: () => Promise<T> | T): Promise<T> {
    const result = this.tail.then(task);
    this.tail = result.then(
      () => undefined,
      () => undefined
    );
    return result;
  }
}
