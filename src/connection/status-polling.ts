/**
 * Status Polling
 *
 * One retry scheduler per monitorable item of a module. Each scheduler
 * resends its status request every time its value would be considered
 * stale, forever, until cancelled.
 */

import { INFINITE_TRIES, TimeoutRetryHandler } from '../core/timeout-retry.js';
import {
  ALL_VARS,
  OUTPUT_COUNT,
  S0_INPUTS,
  SW_AGE_TYPED_VARS,
  Var,
  hasTypeInResponse,
  isEventBased,
  shouldPollStatusAfterCommand,
} from '../core/protocol/defs.js';
import * as PckGenerator from '../core/protocol/generator.js';
import { moduleLogger } from '../observability/logger.js';
import { statusItemKey } from './types.js';
import type { ConnectionSettings, StatusItem } from './types.js';

// -----------------------------------------------------------------------------
// Types
// -----------------------------------------------------------------------------

export interface StatusPollingHost {
  readonly settings: Readonly<ConnectionSettings>;
  getSwAge(): number;
  /** Send a status request without acknowledge. */
  sendStatusRequest(pck: string): void;
  waitForSerial(): Promise<boolean>;
  waitForSegmentScan(): Promise<boolean>;
}

/** Every item a module can poll, in activation order. */
export const STATUS_ITEMS: readonly StatusItem[] = [
  ...Array.from({ length: OUTPUT_COUNT }, (_, outputId): StatusItem => ({ kind: 'output', outputId })),
  { kind: 'relays' },
  { kind: 'bin_sensors' },
  { kind: 'leds_and_logic_ops' },
  { kind: 'key_locks' },
  ...ALL_VARS.map((v): StatusItem => ({ kind: 'var', var: v })),
];

// -----------------------------------------------------------------------------
// Status Polling
// -----------------------------------------------------------------------------

export class StatusPolling {
  private readonly logger = moduleLogger();
  private readonly host: StatusPollingHost;
  private readonly handlers: Map<string, TimeoutRetryHandler> = new Map();
  private readonly repollTimers: Set<ReturnType<typeof setTimeout>> = new Set();

  /** Typeless variable request awaiting its response. */
  private lastTypelessVar: Var = Var.UNKNOWN;

  constructor(host: StatusPollingHost) {
    this.host = host;
    const { maxStatusEventBasedValueAgeMs: eventAge, maxStatusPolledValueAgeMs: polledAge } = host.settings;

    for (const item of STATUS_ITEMS) {
      switch (item.kind) {
        case 'output': {
          const { outputId } = item;
          this.register(item, eventAge, () => PckGenerator.requestOutputStatus(outputId));
          break;
        }
        case 'relays':
          this.register(item, eventAge, () => PckGenerator.requestRelaysStatus());
          break;
        case 'bin_sensors':
          this.register(item, eventAge, () => PckGenerator.requestBinSensorsStatus());
          break;
        case 'leds_and_logic_ops':
          this.register(item, polledAge, () => PckGenerator.requestLedsAndLogicOps());
          break;
        case 'key_locks':
          this.register(item, polledAge, () => PckGenerator.requestKeyLockStatus());
          break;
        case 'var': {
          const v = item.var;
          const handler = new TimeoutRetryHandler(INFINITE_TRIES, polledAge);
          handler.setTimeoutCallback((failed) => this.onVarTimeout(v, failed));
          this.handlers.set(statusItemKey(item), handler);
          break;
        }
      }
    }
  }

  private register(item: StatusItem, timeoutMs: number, buildRequest: () => string): void {
    const handler = new TimeoutRetryHandler(INFINITE_TRIES, timeoutMs);
    handler.setTimeoutCallback((failed) => {
      if (!failed) {
        this.host.sendStatusRequest(buildRequest());
      }
    });
    this.handlers.set(statusItemKey(item), handler);
  }

  /**
   * Typeless responses only identify the module, so at most one typeless
   * request may be outstanding. Others wait for their next timeout.
   */
  private onVarTimeout(v: Var, failed: boolean): void {
    if (this.lastTypelessVar === v) {
      this.lastTypelessVar = Var.UNKNOWN;
    }
    if (failed) return;

    const swAge = this.host.getSwAge();
    const typed = hasTypeInResponse(v, swAge);
    if (typed || this.lastTypelessVar === Var.UNKNOWN) {
      this.host.sendStatusRequest(PckGenerator.requestVarStatus(v, swAge));
      if (!typed) {
        this.lastTypelessVar = v;
      }
    }
  }

  private getHandler(item: StatusItem): TimeoutRetryHandler {
    const handler = this.handlers.get(statusItemKey(item));
    if (!handler) {
      throw new RangeError(`Unknown status item: ${statusItemKey(item)}`);
    }
    return handler;
  }

  // ---------------------------------------------------------------------------
  // Activation
  // ---------------------------------------------------------------------------

  /**
   * Start polling an item once the segment is known (and, for variables,
   * the firmware). Resolves false if the item cannot be polled or the
   * session ended first.
   */
  async activate(item: StatusItem): Promise<boolean> {
    const handler = this.getHandler(item);
    if (!(await this.host.waitForSegmentScan())) return false;

    if (item.kind === 'var') {
      if (!(await this.host.waitForSerial())) return false;
      const swAge = this.host.getSwAge();
      if (!this.canRequest(item.var, swAge)) {
        this.logger.debug({ var: item.var, swAge }, 'Variable cannot be polled on this firmware');
        return false;
      }
      const { maxStatusEventBasedValueAgeMs, maxStatusPolledValueAgeMs } = this.host.settings;
      handler.setTimeoutMs(isEventBased(item.var, swAge) ? maxStatusEventBasedValueAgeMs : maxStatusPolledValueAgeMs);
    }

    handler.activate();
    return true;
  }

  cancel(item: StatusItem): void {
    this.getHandler(item).cancel();
    if (item.kind === 'var' && this.lastTypelessVar === item.var) {
      this.lastTypelessVar = Var.UNKNOWN;
    }
  }

  isActive(item: StatusItem): boolean {
    return this.getHandler(item).isActive();
  }

  /**
   * Poll every item. S0 inputs need extra hardware, so they are opt-in.
   */
  async activateAll(activateS0 = false): Promise<void> {
    const items = STATUS_ITEMS.filter((item) => activateS0 || item.kind !== 'var' || !S0_INPUTS.includes(item.var));
    await Promise.all(items.map((item) => this.activate(item)));
  }

  cancelAll(): void {
    for (const handler of this.handlers.values()) {
      handler.cancel();
    }
    for (const timer of this.repollTimers) {
      clearTimeout(timer);
    }
    this.repollTimers.clear();
    this.lastTypelessVar = Var.UNKNOWN;
  }

  // ---------------------------------------------------------------------------
  // Variables
  // ---------------------------------------------------------------------------

  /**
   * Attribute a typeless response to the pending typeless request.
   */
  takeTypelessVar(): Var {
    const v = this.lastTypelessVar;
    this.lastTypelessVar = Var.UNKNOWN;
    return v;
  }

  /**
   * Record a typeless request issued outside the polling schedule.
   */
  markTypelessVar(v: Var): void {
    if (!hasTypeInResponse(v, this.host.getSwAge())) {
      this.lastTypelessVar = v;
    }
  }

  /**
   * Re-poll a polled variable shortly after a command changed it, since the
   * module will not report the change by itself.
   */
  pollAfterCommand(v: Var): void {
    const swAge = this.host.getSwAge();
    const handler = this.handlers.get(statusItemKey({ kind: 'var', var: v }));
    if (!handler?.isActive() || !shouldPollStatusAfterCommand(v, swAge >= SW_AGE_TYPED_VARS)) {
      return;
    }

    const timer = setTimeout(() => {
      this.repollTimers.delete(timer);
      if (handler.isActive()) {
        handler.cancel();
        handler.activate();
      }
    }, this.host.settings.statusRequestDelayAfterCommandMs);
    this.repollTimers.add(timer);
  }

  private canRequest(v: Var, swAge: number): boolean {
    try {
      PckGenerator.requestVarStatus(v, swAge);
      return true;
    } catch (error) {
      if (error instanceof RangeError) return false;
      throw error;
    }
  }
}
