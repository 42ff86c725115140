/**
 * Runs async tasks one at a time, in call order.
 */
export class SerialLock {
  private tail: Promise<void> = Promise.resolve();
  private pending = 0;

  run<T>(task: () => Promise<T>): Promise<T> {
    const result = this.tail.then(task);
    this.pending++;
    // The chain continues whether the task resolves or rejects; the caller
    // still receives the rejection through `result`.
    this.tail = result.then(
      () => { this.pending--; },
      () => { this.pending--; },
    );
    return result;
  }

  get queued(): number {
    return this.pending;
  }
}
