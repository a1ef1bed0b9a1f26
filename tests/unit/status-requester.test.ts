/**
 * Status Requester Unit Tests
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { StatusRequester } from '../../src/connection/status-requester.js';
import { DEFAULT_CONNECTION_SETTINGS } from '../../src/connection/types.js';
import type { ConnectionSettings, RequesterHost } from '../../src/connection/types.js';
import { moduleAddress } from '../../src/core/address.js';
import type { Address } from '../../src/core/address.js';
import type { ModInput } from '../../src/core/protocol/inputs.js';
import type { PckCommand } from '../../src/core/protocol/generator.js';

interface SentCommand {
  address: Address;
  wantsAck: boolean;
  pck: PckCommand;
}

function createHost(settings: Partial<ConnectionSettings> = {}): { host: RequesterHost; sent: SentCommand[] } {
  const sent: SentCommand[] = [];
  const host: RequesterHost = {
    settings: {
      ...DEFAULT_CONNECTION_SETTINGS,
      numTries: 3,
      defaultTimeoutMs: 1000,
      maxResponseAgeMs: 5000,
      ...settings,
    },
    getAddressConn: (address) => ({
      address,
      sendCommand: (wantsAck, pck) => {
        sent.push({ address, wantsAck, pck });
        return true;
      },
    }),
  };
  return { host, sent };
}

const MODULE = moduleAddress(0, 7);

const RELAYS: ModInput = {
  type: 'mod_status_relays',
  source: MODULE,
  states: [true, false, false, false, false, false, false, false],
};

function outputStatus(outputId: number, percent: number): ModInput {
  return { type: 'mod_status_output', source: MODULE, outputId, percent };
}

describe('StatusRequester', () => {
  let requester: StatusRequester;
  let sent: SentCommand[];

  beforeEach(() => {
    vi.useFakeTimers();
    const fake = createHost();
    requester = new StatusRequester(fake.host);
    sent = fake.sent;
  });

  afterEach(() => {
    requester.cancelAll();
    vi.useRealTimers();
  });

  it('should send the request and resolve with the matching response', async () => {
    const pending = requester.request({ address: MODULE, responseType: 'mod_status_relays', pck: 'SMR' });

    await vi.advanceTimersByTimeAsync(0);
    expect(sent).toEqual([{ address: MODULE, wantsAck: false, pck: 'SMR' }]);

    requester.processInput(RELAYS);

    await expect(pending).resolves.toBe(RELAYS);
    expect(requester.getMetrics()).toMatchObject({ requestsSent: 1, responses: 1, failures: 0 });
  });

  it('should retry and resolve null when nothing answers', async () => {
    const pending = requester.request({ address: MODULE, responseType: 'mod_status_relays', pck: 'SMR' });

    await vi.advanceTimersByTimeAsync(2000);
    expect(sent).toHaveLength(3);

    await vi.advanceTimersByTimeAsync(1000);
    await expect(pending).resolves.toBeNull();
    expect(sent).toHaveLength(3);
    expect(requester.getMetrics().failures).toBe(1);
    expect(requester.getRequestCount()).toBe(0);
  });

  it('should share one pending request between callers', async () => {
    const first = requester.request({ address: MODULE, responseType: 'mod_status_relays', pck: 'SMR' });
    await vi.advanceTimersByTimeAsync(0);
    const second = requester.request({ address: MODULE, responseType: 'mod_status_relays', pck: 'SMR' });
    await vi.advanceTimersByTimeAsync(0);

    requester.processInput(RELAYS);

    await expect(first).resolves.toBe(RELAYS);
    await expect(second).resolves.toBe(RELAYS);
    expect(sent).toHaveLength(1);
    expect(requester.getMetrics().cacheHits).toBe(1);
  });

  it('should send once for callers arriving in the same tick', async () => {
    const first = requester.request({ address: MODULE, responseType: 'mod_status_relays', pck: 'SMR', maxAge: -1 });
    const second = requester.request({ address: MODULE, responseType: 'mod_status_relays', pck: 'SMR', maxAge: -1 });
    await vi.advanceTimersByTimeAsync(0);

    expect(sent).toHaveLength(1);
    requester.processInput(RELAYS);

    const [a, b] = await Promise.all([first, second]);
    expect(a).toBe(RELAYS);
    expect(b).toBe(a);
    expect(requester.getMetrics()).toMatchObject({ requestsSent: 1, cacheHits: 1 });
  });

  it('should answer from cache while the response is young enough', async () => {
    const first = requester.request({ address: MODULE, responseType: 'mod_status_relays', pck: 'SMR' });
    await vi.advanceTimersByTimeAsync(0);
    requester.processInput(RELAYS);
    await first;

    await vi.advanceTimersByTimeAsync(1000);
    const cached = requester.request({
      address: MODULE,
      responseType: 'mod_status_relays',
      pck: 'SMR',
      maxAge: 5000,
    });

    await expect(cached).resolves.toBe(RELAYS);
    expect(sent).toHaveLength(1);
  });

  it('should send a fresh request when max age is 0', async () => {
    const first = requester.request({ address: MODULE, responseType: 'mod_status_relays', pck: 'SMR' });
    await vi.advanceTimersByTimeAsync(0);
    requester.processInput(RELAYS);
    await first;

    const fresh = requester.request({ address: MODULE, responseType: 'mod_status_relays', pck: 'SMR', maxAge: 0 });
    await vi.advanceTimersByTimeAsync(0);

    expect(sent).toHaveLength(2);
    requester.processInput(RELAYS);
    await expect(fresh).resolves.toBe(RELAYS);
  });

  it('should only accept responses with matching parameters', async () => {
    const pending = requester.request({
      address: MODULE,
      responseType: 'mod_status_output',
      pck: 'SMA2',
      params: { outputId: 1 },
    });
    await vi.advanceTimersByTimeAsync(0);

    requester.processInput(outputStatus(0, 10));
    requester.processInput(outputStatus(1, 20));

    await expect(pending).resolves.toEqual(outputStatus(1, 20));
  });

  it('should ignore responses from other modules', async () => {
    const pending = requester.request({ address: MODULE, responseType: 'mod_status_relays', pck: 'SMR' });
    await vi.advanceTimersByTimeAsync(0);

    requester.processInput({ ...RELAYS, source: moduleAddress(0, 8) });
    await vi.advanceTimersByTimeAsync(999);
    expect(requester.getMetrics().responses).toBe(0);

    requester.processInput(RELAYS);
    await expect(pending).resolves.toBe(RELAYS);
  });

  it('should release pending callers on cancelAll', async () => {
    const pending = requester.request({ address: MODULE, responseType: 'mod_status_relays', pck: 'SMR' });
    await vi.advanceTimersByTimeAsync(0);

    requester.cancelAll();

    await expect(pending).resolves.toBeNull();
    expect(sent).toHaveLength(1);
    expect(requester.getRequestCount()).toBe(0);
  });

  it('should fail callers queued behind the parallel limit on cancelAll', async () => {
    const fake = createHost({ maxParallelRequests: 1 });
    const limited = new StatusRequester(fake.host);
    const first = limited.request({
      address: MODULE,
      responseType: 'mod_status_output',
      pck: 'SMA1',
      params: { outputId: 0 },
    });
    const second = limited.request({
      address: MODULE,
      responseType: 'mod_status_output',
      pck: 'SMA2',
      params: { outputId: 1 },
    });
    await vi.advanceTimersByTimeAsync(0);
    expect(fake.sent.map((command) => command.pck)).toEqual(['SMA1']);

    limited.cancelAll();
    await vi.advanceTimersByTimeAsync(0);
    limited.processInput(outputStatus(1, 20));

    await expect(first).resolves.toBeNull();
    await expect(second).resolves.toBeNull();
    await vi.advanceTimersByTimeAsync(5000);
    expect(fake.sent.map((command) => command.pck)).toEqual(['SMA1']);
    expect(limited.getRequestCount()).toBe(0);
    expect(limited.getMetrics().failures).toBe(0);
  });

  it('should not resolve requests from before cancelAll with later responses', async () => {
    const stale = requester.request({ address: MODULE, responseType: 'mod_status_relays', pck: 'SMR' });
    await vi.advanceTimersByTimeAsync(0);
    requester.cancelAll();

    const fresh = requester.request({ address: MODULE, responseType: 'mod_status_relays', pck: 'SMR' });
    await vi.advanceTimersByTimeAsync(0);
    requester.processInput(RELAYS);

    await expect(stale).resolves.toBeNull();
    await expect(fresh).resolves.toBe(RELAYS);
    expect(sent).toHaveLength(2);
  });

  it('should prune settled responses older than the max response age', async () => {
    const first = requester.request({ address: MODULE, responseType: 'mod_status_relays', pck: 'SMR' });
    await vi.advanceTimersByTimeAsync(0);
    requester.processInput(RELAYS);
    await first;

    expect(requester.prune()).toBe(0);

    await vi.advanceTimersByTimeAsync(5001);
    expect(requester.prune()).toBe(1);
    expect(requester.getRequestCount()).toBe(0);
  });

  it('should not prune pending requests', async () => {
    const pending = requester.request({ address: MODULE, responseType: 'mod_status_relays', pck: 'SMR' });
    await vi.advanceTimersByTimeAsync(0);

    vi.setSystemTime(Date.now() + 10000);
    expect(requester.prune()).toBe(0);

    requester.processInput(RELAYS);
    await expect(pending).resolves.toBe(RELAYS);
  });
});
