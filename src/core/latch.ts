/**
 * Latch
 *
 * One-shot completion signal. Waiters resolve `true` once the latch is set,
 * or `false` if the latch is cancelled first (e.g. on disconnect).
 */

export class Latch {
  private done = false;
  private cancelled = false;
  private waiters: Array<(value: boolean) => void> = [];

  /**
   * Set the latch. Subsequent calls are no-ops.
   */
  set(): void {
    if (this.done || this.cancelled) return;
    this.done = true;
    this.flush(true);
  }

  /**
   * Release all waiters with `false`. The latch cannot be set afterwards.
   */
  cancel(): void {
    if (this.done || this.cancelled) return;
    this.cancelled = true;
    this.flush(false);
  }

  isSet(): boolean {
    return this.done;
  }

  isCancelled(): boolean {
    return this.cancelled;
  }

  wait(): Promise<boolean> {
    if (this.done) return Promise.resolve(true);
    if (this.cancelled) return Promise.resolve(false);
    return new Promise((resolve) => {
      this.waiters.push(resolve);
    });
  }

  private flush(value: boolean): void {
    const waiters = this.waiters;
    this.waiters = [];
    for (const resolve of waiters) {
      resolve(value);
    }
  }
}
