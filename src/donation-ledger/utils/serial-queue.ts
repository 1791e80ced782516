/**
 * Runs async tasks one at a time, in submission order.
 *
 * A task starts only after the previous one has settled, whether it
 * resolved or rejected. Each caller gets its own task's outcome.
 */
export class SerialQueue {
  private tail: Promise<void> = Promise.resolve();
  private pending = 0;

  run<T>(task: () => Promise<T>): Promise<T> {
    this.pending++;
    const result = this.tail.then(task);
    this.tail = result.then(
      () => this.settle(),
      () => this.settle()
    );
    return result;
  }

  /** Tasks submitted but not yet settled */
  get size(): number {
    return this.pending;
  }

  private settle(): void {
    this.pending--;
  }
}
