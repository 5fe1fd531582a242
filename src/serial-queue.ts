/**
 * Runs tasks one at a time in submission order (single writer). Each task
 * starts only after the previous one settled, whether it resolved or threw.
 */
export class SerialQueue {
  private tail: Promise<void> = Promise.resolve();
  private pending = 0;

  /** Number of tasks queued or running. */
  public get size(): number {
    return this.pending;
  }

  public run<T>(task: () => T | Promise<T>): Promise<T> {
    this.pending++;
    const result = this.tail.then(task).finally(() => {
      this.pending--;
    });
    // The caller observes failures through `result`; the chain only needs ordering.
    this.tail = result.then(
      () => undefined,
      () => undefined,
    );
    return result;
  }

  /** Resolves once everything queued so far has settled. */
  public idle(): Promise<void> {
    return this.tail;
  }
}
