/**
 * Latch and Shared Result Unit Tests
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { Latch } from '../../src/core/latch.js';
import { SharedResult } from '../../src/core/shared-result.js';

describe('Latch', () => {
  it('should resolve waiters with true when set', async () => {
    const latch = new Latch();
    const waiting = latch.wait();

    latch.set();

    await expect(waiting).resolves.toBe(true);
    expect(latch.isSet()).toBe(true);
  });

  it('should resolve waiters with false when cancelled', async () => {
    const latch = new Latch();
    const waiting = latch.wait();

    latch.cancel();

    await expect(waiting).resolves.toBe(false);
    expect(latch.isCancelled()).toBe(true);
  });

  it('should resolve late waiters immediately', async () => {
    const latch = new Latch();
    latch.set();

    await expect(latch.wait()).resolves.toBe(true);
  });

  it('should not be settable after cancel', () => {
    const latch = new Latch();
    latch.cancel();
    latch.set();

    expect(latch.isSet()).toBe(false);
  });
});

describe('SharedResult', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('should deliver the value to every waiter', async () => {
    const result = new SharedResult<string>();
    const first = result.wait(1000);
    const second = result.wait(1000);

    expect(result.settle('value')).toBe(true);

    await expect(first).resolves.toBe('value');
    await expect(second).resolves.toBe('value');
  });

  it('should settle only once', () => {
    const result = new SharedResult<number>();

    expect(result.settle(1)).toBe(true);
    expect(result.settle(2)).toBe(false);
    expect(result.peek()).toBe(1);
  });

  it('should time out one waiter without affecting others', async () => {
    const result = new SharedResult<string>();
    const short = result.wait(100);
    const long = result.wait(1000);

    await vi.advanceTimersByTimeAsync(100);
    await expect(short).resolves.toBeNull();
    expect(result.getWaiterCount()).toBe(1);

    result.settle('late');
    await expect(long).resolves.toBe('late');
  });

  it('should release waiters with null on cancel', async () => {
    const result = new SharedResult<string>();
    const waiting = result.wait(1000);

    result.cancel();

    await expect(waiting).resolves.toBeNull();
    expect(result.isCancelled()).toBe(true);
    await expect(result.wait(1000)).resolves.toBeNull();
  });

  it('should answer late waiters from the settled value', async () => {
    const result = new SharedResult<string>();
    result.settle('cached');

    await expect(result.wait(0)).resolves.toBe('cached');
    expect(result.isSettled()).toBe(true);
  });
});
