/**
 * A resource pool of size one. Tasks passed to `run` execute one at a time,
 * in the order they were submitted; a failing task does not block the queue.
 */
export class SingleSlot {
  private tail: Promise<void> = Promise.resolve();
  private waiting = 0;

  get pending(): number {
    return this.waiting;
  }

  run<T>(task: () => Promise<T>): Promise<T> {
    this.waiting++;
    const result = this.tail.then(task);
    const settled = result.then(
      () => undefined,
      () => undefined
    );
    this.tail = settled.then(() => {
      this.waiting--;
    });
    return result;
  }
}
