/**
 * Timeout/Retry Scheduler
 *
 * Arms a callback that fires once right away and then once per elapsed
 * timeout, until the try budget runs out. The last invocation receives
 * `failed = true` and the scheduler disarms itself. The same instance can be
 * re-armed with `activate()` afterwards.
 */

import { schedulerLogger } from '../observability/logger.js';

// -----------------------------------------------------------------------------
// Types
// -----------------------------------------------------------------------------

/**
 * Called once per attempt. `failed` is true on the final call, after the
 * try budget is exhausted.
 */
export type TimeoutCallback = (failed: boolean) => void | Promise<void>;

/** Tries value meaning "retry forever". */
export const INFINITE_TRIES = -1;

export const DEFAULT_NUM_TRIES = 3;
export const DEFAULT_TIMEOUT_MS = 3500;

// -----------------------------------------------------------------------------
// Scheduler
// -----------------------------------------------------------------------------

export class TimeoutRetryHandler {
  private readonly logger = schedulerLogger();

  private numTries: number;
  private timeoutMs: number;
  private callback: TimeoutCallback | null = null;

  private triesLeft = 0;
  private active = false;
  private generation = 0;
  private timer: ReturnType<typeof setTimeout> | null = null;

  constructor(numTries: number = DEFAULT_NUM_TRIES, timeoutMs: number = DEFAULT_TIMEOUT_MS) {
    this.numTries = numTries;
    this.timeoutMs = timeoutMs;
  }

  // ---------------------------------------------------------------------------
  // Configuration
  // ---------------------------------------------------------------------------

  setTimeoutCallback(callback: TimeoutCallback): void {
    this.callback = callback;
  }

  setTimeoutMs(timeoutMs: number): void {
    this.timeoutMs = timeoutMs;
  }

  getTimeoutMs(): number {
    return this.timeoutMs;
  }

  setNumTries(numTries: number): void {
    this.numTries = numTries;
  }

  // ---------------------------------------------------------------------------
  // Lifecycle
  // ---------------------------------------------------------------------------

  /**
   * Arm the scheduler. The first attempt runs on the next tick. No-op while
   * already active.
   */
  activate(callback?: TimeoutCallback): void {
    if (callback) {
      this.callback = callback;
    }
    if (this.active) return;

    this.active = true;
    this.triesLeft = this.numTries;
    const generation = ++this.generation;
    this.timer = setTimeout(() => this.tick(generation), 0);
  }

  /**
   * Disarm. Safe to call when idle.
   */
  cancel(): void {
    this.generation++;
    this.active = false;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
  }

  isActive(): boolean {
    return this.active;
  }

  // ---------------------------------------------------------------------------
  // Internals
  // ---------------------------------------------------------------------------

  private tick(generation: number): void {
    this.timer = null;
    if (generation !== this.generation) return;

    if (this.triesLeft !== 0) {
      if (this.triesLeft > 0) {
        this.triesLeft--;
      }
      const running = this.invoke(false);
      if (running) {
        // Next timeout starts once an async callback has finished
        running
          .then(() => this.scheduleNext(generation))
          .catch((error: unknown) => {
            this.logger.error({ err: error }, 'Failed to schedule next retry');
          });
      } else {
        this.scheduleNext(generation);
      }
      return;
    }

    this.active = false;
    this.generation++;
    const running = this.invoke(true);
    running?.catch((error: unknown) => {
      this.logger.error({ err: error }, 'Retry callback rejected');
    });
  }

  private scheduleNext(generation: number): void {
    // The callback may have cancelled or re-armed us
    if (generation === this.generation && this.active) {
      this.timer = setTimeout(() => this.tick(generation), this.timeoutMs);
    }
  }

  /**
   * Run the callback. Returns a promise only for async callbacks; it never
   * rejects.
   */
  private invoke(failed: boolean): Promise<void> | null {
    const callback = this.callback;
    if (!callback) return null;

    try {
      const result = callback(failed);
      if (result instanceof Promise) {
        return result.catch((error: unknown) => {
          this.logger.error({ err: error }, 'Retry callback rejected');
        });
      }
    } catch (error) {
      this.logger.error({ err: error }, 'Retry callback threw');
    }
    return null;
  }
}
