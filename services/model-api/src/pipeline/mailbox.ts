/**
 * Single-slot handoff between request handlers and the inference worker.
 *
 * A new submission replaces whatever is still waiting in the slot. Items
 * already taken by the worker are not affected.
 */
export class Mailbox<T> {
  private slot: T | undefined;
  private waiter: (() => void) | undefined;
  private closed = false;
  private discardedCount = 0;

  /** Number of items replaced before the worker took them. */
  get discarded(): number {
    return this.discardedCount;
  }

  get pending(): boolean {
    return this.slot !== undefined;
  }

  /** Returns the item that was displaced, if any. */
  submit(item: T): T | undefined {
    if (this.closed) {
      return undefined;
    }
    const displaced = this.slot;
    if (displaced !== undefined) {
      this.discardedCount += 1;
    }
    this.slot = item;
    this.wake();
    return displaced;
  }

  /**
   * Resolves with the pending item once one is available, or undefined after
   * close(). The slot is read when the taker resumes, not when it is woken.
   */
  async take(): Promise<T | undefined> {
    while (!this.closed) {
      const item = this.slot;
      if (item !== undefined) {
        this.slot = undefined;
        return item;
      }
      await new Promise<void>((resolve) => {
        this.waiter = resolve;
      });
    }
    return undefined;
  }

  close(): void {
    this.closed = true;
    this.slot = undefined;
    this.wake();
  }

  private wake(): void {
    const waiter = this.waiter;
    this.waiter = undefined;
    waiter?.();
  }
}
