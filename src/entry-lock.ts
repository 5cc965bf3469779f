/**
 * Async mutual exclusion for a single cache entry. Tasks run one at a time in
 * the order they were queued; the lock is released whether a task resolves
 * or rejects.
 */
export class EntryLock {
  private tail: Promise<void> = Promise.resolve();

  runExclusive<T>(task: () => Promise<T>): Promise<T> {
    const run = this.tail.then(task);
    // Rejections reach the caller through `run`.
    this.tail = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }
}
