/**
 * Single-writer execution queue
 * Tasks run strictly one at a time in arrival order; a failed task does not block the queue
 */
export class SerialExecutor {
  private tail: Promise<void> = Promise.resolve();
  private pending = 0;

  run<T>(task: () => T | Promise<T>): Promise<T> {
    this.pending++;
    const result = this.tail.then(() => task());

    this.tail = result.then(
      () => {
        this.pending--;
      },
      () => {
        this.pending--;
      }
    );

    return result;
  }

  /**
   * Number of tasks queued or running
   */
  get size(): number {
    return this.pending;
  }

  /**
   * Resolves once every task queued so far has settled
   */
  drain(): Promise<void> {
    return this.tail;
  }
}
