/**
 * AsyncLock — FIFO mutual exclusion over a promise chain.
 *
 * Each holder starts only after every previously queued holder settled.
 * A holder that throws rejects its own caller; the chain keeps going.
 */

export class AsyncLock {
  private tail: Promise<unknown> = Promise.resolve();

  runExclusive<T>(fn: () => T | Promise<T>): Promise<T> {
    const task = this.tail.then(fn);
    // Swallow errors in the chain so a failed holder doesn't block later ones
    this.tail = task.catch(() => undefined);
    return task;
  }
}
