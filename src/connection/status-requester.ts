/**
 * Status Requester
 *
 * Correlates status queries with the responses that arrive later on the
 * input stream. Requests are keyed by (address, response type, parameters);
 * callers asking for the same key share one pending result, and settled
 * results are reused while they are younger than the caller's max age.
 */

import { Semaphore } from 'async-mutex';
import { addressEquals, addressKey } from '../core/address.js';
import type { Address } from '../core/address.js';
import { SharedResult } from '../core/shared-result.js';
import { isInputOfType, isModInput } from '../core/protocol/inputs.js';
import type { Input, InputOfType, ModInput } from '../core/protocol/inputs.js';
import type { PckCommand } from '../core/protocol/generator.js';
import { requesterLogger } from '../observability/logger.js';
import type { RequesterHost } from './types.js';

// -----------------------------------------------------------------------------
// Types
// -----------------------------------------------------------------------------

export type ModInputType = ModInput['type'];

/** Input fields a response must carry to answer a request. */
export type RequestParams = Readonly<Record<string, string | number | boolean>>;

/** Accept any cached response, however old. */
export const ANY_AGE = -1;

export interface StatusRequestOptions<T extends ModInputType> {
  address: Address;
  responseType: T;
  pck: PckCommand;
  requiresAck?: boolean;
  /** ms; 0 forces a fresh request, -1 accepts any cached response */
  maxAge?: number;
  params?: RequestParams;
}

interface StatusRequest {
  readonly key: string;
  readonly address: Address;
  readonly type: ModInputType;
  readonly params: RequestParams;
  /** When the response arrived; -1 while pending */
  timestamp: number;
  readonly result: SharedResult<ModInput>;
}

export interface StatusRequesterMetrics {
  requestsSent: number;
  cacheHits: number;
  responses: number;
  failures: number;
}

export const INITIAL_REQUESTER_METRICS: StatusRequesterMetrics = {
  requestsSent: 0,
  cacheHits: 0,
  responses: 0,
  failures: 0,
};

function requestKey(address: Address, type: ModInputType, params: RequestParams): string {
  const sorted = Object.keys(params)
    .sort()
    .map((name) => [name, params[name]]);
  return `${addressKey(address)}|${type}|${JSON.stringify(sorted)}`;
}

function narrow<T extends ModInputType>(input: ModInput | null, type: T): InputOfType<T> | null {
  return input !== null && isInputOfType(input, type) ? input : null;
}

function isSubset(needle: RequestParams, haystack: RequestParams): boolean {
  return Object.entries(needle).every(([name, value]) => haystack[name] === value);
}

// -----------------------------------------------------------------------------
// Status Requester
// -----------------------------------------------------------------------------

export class StatusRequester {
  private readonly logger = requesterLogger();
  private readonly host: RequesterHost;
  private readonly semaphore: Semaphore;

  private requests: Map<string, StatusRequest> = new Map();
  private metrics: StatusRequesterMetrics;
  private pruneTimer: ReturnType<typeof setInterval> | null = null;
  /** Bumped by cancelAll; requests from an older epoch never resolve */
  private epoch = 0;

  constructor(host: RequesterHost) {
    this.host = host;
    this.semaphore = new Semaphore(host.settings.maxParallelRequests);
    this.metrics = { ...INITIAL_REQUESTER_METRICS };
  }

  // ---------------------------------------------------------------------------
  // Requests
  // ---------------------------------------------------------------------------

  /**
   * Send a status request, or reuse a pending or recent one for the same
   * key. Resolves null once every attempt timed out or the connection
   * dropped, including while still queued behind the parallel limit.
   */
  async request<T extends ModInputType>(options: StatusRequestOptions<T>): Promise<InputOfType<T> | null> {
    const { address, responseType, pck } = options;
    const params = options.params ?? {};
    const maxAge = options.maxAge ?? 0;
    const { numTries, defaultTimeoutMs } = this.host.settings;
    const epoch = this.epoch;

    const cached = this.findRequests(address, responseType, params, maxAge)[0];
    if (cached) {
      this.metrics.cacheHits++;
      this.logger.trace({ key: cached.key }, 'Reusing status request');
      return narrow(await cached.result.wait(defaultTimeoutMs * numTries), responseType);
    }

    const entry: StatusRequest = {
      key: requestKey(address, responseType, params),
      address,
      type: responseType,
      params,
      timestamp: -1,
      result: new SharedResult<ModInput>(),
    };
    this.requests.set(entry.key, entry);

    const response = await this.semaphore.runExclusive(async () => {
      for (let attempt = 0; attempt < numTries; attempt++) {
        if (this.epoch !== epoch) return null;
        if (entry.result.isDone()) return entry.result.peek();
        this.metrics.requestsSent++;
        this.host.getAddressConn(address).sendCommand(options.requiresAck ?? false, pck);
        const value = await entry.result.wait(defaultTimeoutMs);
        if (this.epoch !== epoch) return null;
        if (value !== null) return value;
      }
      return null;
    });

    if (response === null) {
      entry.result.cancel();
      if (this.requests.get(entry.key) === entry) {
        this.requests.delete(entry.key);
      }
      if (this.epoch === epoch) {
        this.metrics.failures++;
        this.logger.debug({ key: entry.key, attempts: numTries }, 'Status request got no response');
      }
    }
    return narrow(response, responseType);
  }

  /**
   * Resolve every pending request this input answers. Inputs must carry
   * logical addresses.
   */
  processInput(input: Input): void {
    if (!isModInput(input)) return;

    const fields = new Map(Object.entries(input));
    for (const entry of this.requests.values()) {
      if (entry.timestamp !== -1 || entry.result.isDone()) continue;
      if (entry.type !== input.type || !addressEquals(entry.address, input.source)) continue;
      if (!Object.entries(entry.params).every(([name, value]) => fields.get(name) === value)) continue;

      entry.timestamp = Date.now();
      entry.result.settle(input);
      this.metrics.responses++;
    }
  }

  // ---------------------------------------------------------------------------
  // Cache Maintenance
  // ---------------------------------------------------------------------------

  /**
   * Drop settled responses older than the max response age. Pending
   * requests are left to their own retry loop.
   */
  prune(): number {
    const cutoff = Date.now() - this.host.settings.maxResponseAgeMs;
    let removed = 0;
    for (const [key, entry] of this.requests) {
      if (entry.timestamp !== -1 && entry.timestamp < cutoff) {
        entry.result.cancel();
        this.requests.delete(key);
        removed++;
      }
    }
    if (removed > 0) {
      this.logger.trace({ removed }, 'Pruned status requests');
    }
    return removed;
  }

  startPruning(): void {
    if (this.pruneTimer) return;
    this.pruneTimer = setInterval(() => this.prune(), this.host.settings.maxResponseAgeMs);
    this.pruneTimer.unref();
  }

  stopPruning(): void {
    if (this.pruneTimer) {
      clearInterval(this.pruneTimer);
      this.pruneTimer = null;
    }
  }

  /**
   * Fail every outstanding request and forget all cached responses.
   */
  cancelAll(): void {
    this.epoch++;
    for (const entry of this.requests.values()) {
      entry.result.cancel();
    }
    this.requests.clear();
  }

  // ---------------------------------------------------------------------------
  // Internals
  // ---------------------------------------------------------------------------

  /**
   * Candidate entries for a lookup, newest response first, pending ones
   * last.
   */
  private findRequests(
    address: Address,
    type: ModInputType,
    params: RequestParams,
    maxAge: number
  ): StatusRequest[] {
    const now = Date.now();
    const matches: StatusRequest[] = [];
    for (const entry of this.requests.values()) {
      if (entry.type !== type || !addressEquals(entry.address, address)) continue;
      if (!isSubset(params, entry.params)) continue;
      if (entry.result.isCancelled()) continue;
      if (entry.timestamp === -1 || maxAge === ANY_AGE || now - entry.timestamp < maxAge) {
        matches.push(entry);
      }
    }
    return matches.sort((a, b) => b.timestamp - a.timestamp);
  }

  // ---------------------------------------------------------------------------
  // Public API
  // ---------------------------------------------------------------------------

  getRequestCount(): number {
    return this.requests.size;
  }

  getMetrics(): Readonly<StatusRequesterMetrics> {
    return { ...this.metrics };
  }
}
