/**
 * FIFO task queue.
 *
 * Tasks run one at a time in submission order; a task starts only after
 * the previous one has settled, whether it resolved or rejected.
 */

export class SerialQueue {
  private _tail: Promise<void> = Promise.resolve();
  private _pending = 0;

  /** Tasks submitted and not yet settled */
  get pending(): number {
    return this._pending;
  }

  run<T>(task: () => T | Promise<T>): Promise<T> {
    this._pending++;
    const result = this._tail.then(task);
    this._tail = result.then(
      () => this._settle(),
      () => this._settle(),
    );
    return result;
  }

  private _settle(): void {
    this._pending--;
  }
}
