/**
 * OperationQueue — runs async tasks one at a time, in arrival order.
 *
 * The vault refuses any operation started while another is in flight.
 * Independent HTTP callers go through this queue so they wait their
 * turn instead; only genuine re-entry still sees REENTRANCY_REJECTED.
 */

export class OperationQueue {
  private _tail: Promise<unknown> = Promise.resolve();
  private _pending = 0;

  /** Tasks queued or running. */
  get pending(): number {
    return this._pending;
  }

  /**
   * Run `task` after every previously enqueued task has settled.
   * A failing task does not affect the ones behind it.
   */
  run<T>(task: () => Promise<T>): Promise<T> {
    this._pending += 1;
    const result = this._tail.then(task, task);
    this._tail = result
      .finally(() => {
        this._pending -= 1;
      })
      .catch(() => undefined);
    return result;
  }

  /** Resolves once the queue is empty. */
  async drain(): Promise<void> {
    while (this._pending > 0) {
      await this._tail;
    }
  }
}
