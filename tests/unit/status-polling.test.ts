/**
 * Status Polling Unit Tests
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { StatusPolling } from '../../src/connection/status-polling.js';
import type { StatusPollingHost } from '../../src/connection/status-polling.js';
import { DEFAULT_CONNECTION_SETTINGS } from '../../src/connection/types.js';
import type { ConnectionSettings } from '../../src/connection/types.js';
import { Var } from '../../src/core/protocol/defs.js';

const NEW_FW = 0x190b11;
const OLD_FW = 0x160000;

class FakePollingHost implements StatusPollingHost {
  readonly settings: ConnectionSettings = {
    ...DEFAULT_CONNECTION_SETTINGS,
    maxStatusEventBasedValueAgeMs: 1000,
    maxStatusPolledValueAgeMs: 500,
    statusRequestDelayAfterCommandMs: 200,
  };
  readonly sent: string[] = [];
  swAge = NEW_FW;
  serialKnown = true;
  scanCompleted = true;

  getSwAge(): number {
    return this.swAge;
  }

  sendStatusRequest(pck: string): void {
    this.sent.push(pck);
  }

  waitForSerial(): Promise<boolean> {
    return Promise.resolve(this.serialKnown);
  }

  waitForSegmentScan(): Promise<boolean> {
    return Promise.resolve(this.scanCompleted);
  }
}

describe('StatusPolling', () => {
  let host: FakePollingHost;
  let polling: StatusPolling;

  beforeEach(() => {
    vi.useFakeTimers();
    host = new FakePollingHost();
    polling = new StatusPolling(host);
  });

  afterEach(() => {
    polling.cancelAll();
    vi.useRealTimers();
  });

  it('should poll event based items at the event interval', async () => {
    await expect(polling.activate({ kind: 'relays' })).resolves.toBe(true);

    await vi.advanceTimersByTimeAsync(2000);

    expect(host.sent).toEqual(['SMR', 'SMR', 'SMR']);
  });

  it('should poll LEDs at the polled interval', async () => {
    await polling.activate({ kind: 'leds_and_logic_ops' });

    await vi.advanceTimersByTimeAsync(1000);

    expect(host.sent).toEqual(['SMT', 'SMT', 'SMT']);
  });

  it('should stop polling when cancelled', async () => {
    await polling.activate({ kind: 'output', outputId: 2 });
    await vi.advanceTimersByTimeAsync(0);

    polling.cancel({ kind: 'output', outputId: 2 });
    await vi.advanceTimersByTimeAsync(5000);

    expect(host.sent).toEqual(['SMA3']);
    expect(polling.isActive({ kind: 'output', outputId: 2 })).toBe(false);
  });

  it('should not start before the segment scan completed', async () => {
    host.scanCompleted = false;

    await expect(polling.activate({ kind: 'relays' })).resolves.toBe(false);
    expect(polling.isActive({ kind: 'relays' })).toBe(false);
  });

  it('should not poll variables while the serial is unknown', async () => {
    host.serialKnown = false;

    await expect(polling.activate({ kind: 'var', var: Var.VAR4 })).resolves.toBe(false);
  });

  it('should refuse variables the firmware cannot report', async () => {
    host.swAge = OLD_FW;

    await expect(polling.activate({ kind: 'var', var: Var.VAR4 })).resolves.toBe(false);
  });

  it('should keep at most one typeless request outstanding', async () => {
    host.swAge = OLD_FW;
    await polling.activate({ kind: 'var', var: Var.VAR1 });
    await polling.activate({ kind: 'var', var: Var.VAR2 });

    await vi.advanceTimersByTimeAsync(0);

    expect(host.sent).toEqual(['MWV']);
    expect(polling.takeTypelessVar()).toBe(Var.VAR1);
    expect(polling.takeTypelessVar()).toBe(Var.UNKNOWN);
  });

  it('should poll typed variables independently', async () => {
    await polling.activate({ kind: 'var', var: Var.VAR4 });
    await polling.activate({ kind: 'var', var: Var.VAR5 });

    await vi.advanceTimersByTimeAsync(0);

    expect(host.sent).toEqual(['MWT004', 'MWT005']);
  });

  it('should re-poll a variable shortly after a command changed it', async () => {
    host.swAge = OLD_FW;
    await polling.activate({ kind: 'var', var: Var.VAR1 });
    await vi.advanceTimersByTimeAsync(0);
    polling.takeTypelessVar();

    polling.pollAfterCommand(Var.VAR1);
    await vi.advanceTimersByTimeAsync(200);

    expect(host.sent).toEqual(['MWV', 'MWV']);
  });

  it('should not re-poll set-points after a command', async () => {
    await polling.activate({ kind: 'var', var: Var.R1VARSETPOINT });
    await vi.advanceTimersByTimeAsync(0);

    polling.pollAfterCommand(Var.R1VARSETPOINT);
    await vi.advanceTimersByTimeAsync(200);

    expect(host.sent).toEqual(['MWS001']);
  });

  it('should leave S0 inputs out unless asked', async () => {
    await polling.activateAll();

    expect(polling.isActive({ kind: 'relays' })).toBe(true);
    expect(polling.isActive({ kind: 'var', var: Var.VAR12 })).toBe(true);
    expect(polling.isActive({ kind: 'var', var: Var.S0INPUT1 })).toBe(false);

    await polling.activateAll(true);
    expect(polling.isActive({ kind: 'var', var: Var.S0INPUT1 })).toBe(true);
  });
});
