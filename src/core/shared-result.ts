/**
 * Shared Result
 *
 * One pending value with many independent waiters. Each waiter carries its
 * own deadline; a waiter giving up detaches itself and leaves the result
 * (and every other waiter) untouched.
 */

type ResultState = 'pending' | 'settled' | 'cancelled';

export class SharedResult<T> {
  private state: ResultState = 'pending';
  private value: T | null = null;
  private waiters: Set<(value: T | null) => void> = new Set();

  /**
   * Publish the value to every current and future waiter. Returns false if
   * the result was already settled or cancelled.
   */
  settle(value: T): boolean {
    if (this.state !== 'pending') return false;
    this.state = 'settled';
    this.value = value;
    this.flush(value);
    return true;
  }

  /**
   * Release every waiter with null. Later waiters also get null.
   */
  cancel(): void {
    if (this.state !== 'pending') return;
    this.state = 'cancelled';
    this.flush(null);
  }

  isDone(): boolean {
    return this.state !== 'pending';
  }

  isSettled(): boolean {
    return this.state === 'settled';
  }

  isCancelled(): boolean {
    return this.state === 'cancelled';
  }

  peek(): T | null {
    return this.value;
  }

  getWaiterCount(): number {
    return this.waiters.size;
  }

  /**
   * Wait for the value, at most `timeoutMs`. Resolves null on timeout or
   * cancellation.
   */
  wait(timeoutMs: number): Promise<T | null> {
    if (this.state === 'settled') return Promise.resolve(this.value);
    if (this.state === 'cancelled') return Promise.resolve(null);

    return new Promise((resolve) => {
      const waiter = (value: T | null): void => {
        clearTimeout(timer);
        resolve(value);
      };
      const timer = setTimeout(() => {
        this.waiters.delete(waiter);
        resolve(null);
      }, Math.max(0, timeoutMs));
      this.waiters.add(waiter);
    });
  }

  private flush(value: T | null): void {
    const waiters = [...this.waiters];
    this.waiters.clear();
    for (const waiter of waiters) {
      waiter(value);
    }
  }
}
