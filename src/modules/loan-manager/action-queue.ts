/**
 * Runs actions one at a time, in submission order. A failed action does not
 * block the ones queued behind it.
 */
export class ActionQueue {
  private tail: Promise<void> = Promise.resolve();
  private pending = 0;

  get size(): number {
    return this.pending;
  }

  run<T>(task: () => Promise<T>): Promise<T> {
    this.pending++;
    const result = this.tail.then(task);
    this.tail = result.then(
      () => this.settle(),
      () => this.settle()
    );
    return result;
  }

  private settle(): void {
    this.pending--;
  }
}
