/**
 * Connection Types
 *
 * Settings, state, events and metrics for the gateway connection, plus the
 * narrow interfaces device connections and the status requester use to talk
 * back to it.
 */

import type { Address } from '../core/address.js';
import { DEFAULT_NUM_TRIES, DEFAULT_TIMEOUT_MS } from '../core/timeout-retry.js';
import { OutputPortDimMode, OutputPortStatusMode } from '../core/protocol/defs.js';
import type { Var } from '../core/protocol/defs.js';
import type { PckCommand } from '../core/protocol/generator.js';
import type { StatusRequester } from './status-requester.js';

// -----------------------------------------------------------------------------
// Settings
// -----------------------------------------------------------------------------

export interface ConnectionSettings {
  /** Attempts for acknowledged commands and status requests */
  numTries: number;
  /** Attempts for the segment coupler scan */
  skNumTries: number;
  /** Per-attempt timeout for retries (ms) */
  defaultTimeoutMs: number;
  /** Poll interval for values the module reports on change (ms) */
  maxStatusEventBasedValueAgeMs: number;
  /** Poll interval for values that are only ever polled (ms) */
  maxStatusPolledValueAgeMs: number;
  /** Delay before re-polling a value a command may have changed (ms) */
  statusRequestDelayAfterCommandMs: number;
  /** Keepalive interval (ms) */
  pingSendDelayMs: number;
  /** How long to wait for a keepalive reply before reporting it (ms) */
  pingRecvTimeoutMs: number;
  /** Quiet time on the bus before the next queued write (ms) */
  busIdleTimeMs: number;
  /** Whether module commands request an acknowledge */
  acknowledge: boolean;
  dimMode: OutputPortDimMode;
  statusMode: OutputPortStatusMode;
  /** Concurrent status requests in flight */
  maxParallelRequests: number;
  /** Cached status responses older than this are pruned (ms) */
  maxResponseAgeMs: number;
}

export const DEFAULT_CONNECTION_SETTINGS: ConnectionSettings = {
  numTries: DEFAULT_NUM_TRIES,
  skNumTries: 3,
  defaultTimeoutMs: DEFAULT_TIMEOUT_MS,
  maxStatusEventBasedValueAgeMs: 600000,
  maxStatusPolledValueAgeMs: 30000,
  statusRequestDelayAfterCommandMs: 2000,
  pingSendDelayMs: 600000,
  pingRecvTimeoutMs: 10000,
  busIdleTimeMs: 50,
  acknowledge: true,
  dimMode: OutputPortDimMode.STEPS50,
  statusMode: OutputPortStatusMode.PERCENT,
  maxParallelRequests: 10,
  maxResponseAgeMs: 60000,
};

// -----------------------------------------------------------------------------
// Connection Options
// -----------------------------------------------------------------------------

export interface ConnectionOptions {
  host: string;
  /** Gateway port (default: 4114) */
  port: number;
  username: string;
  password: string;
  /** Label used in logs and events */
  connectionId: string;
  settings: ConnectionSettings;
}

export const DEFAULT_CONNECTION_OPTIONS: ConnectionOptions = {
  host: 'localhost',
  port: 4114,
  username: 'lcn',
  password: 'lcn',
  connectionId: 'PCHK',
  settings: DEFAULT_CONNECTION_SETTINGS,
};

// -----------------------------------------------------------------------------
// Connection State
// -----------------------------------------------------------------------------

export const ConnectionState = {
  DISCONNECTED: 'disconnected',
  SOCKET_CONNECTING: 'socket_connecting',
  SOCKET_CONNECTED: 'socket_connected',
  AWAITING_USERNAME: 'awaiting_username',
  AWAITING_PASSWORD: 'awaiting_password',
  AUTHENTICATED: 'authenticated',
  BUS_DISCONNECTED: 'bus_disconnected',
  SCANNING_SEGMENT: 'scanning_segment',
  READY: 'ready',
} as const;

export type ConnectionState = (typeof ConnectionState)[keyof typeof ConnectionState];

export interface ConnectionManagerState {
  connectionState: ConnectionState;
  socketConnected: boolean;
  busConnected: boolean;
  segmentScanCompleted: boolean;
  /** -1 until resolved */
  localSegmentId: number;
  segmentCouplerIds: number[];
  lastConnected: number | null;
  lastDisconnected: number | null;
  lastPing: number | null;
  lastError: string | null;
}

// -----------------------------------------------------------------------------
// Events
// -----------------------------------------------------------------------------

export type ConnectionEvent =
  | { type: 'state_changed'; from: ConnectionState; to: ConnectionState }
  | { type: 'connection_lost' }
  | { type: 'bus_connection_status_changed'; connected: boolean }
  | { type: 'bus_connected' }
  | { type: 'bus_disconnected' }
  | { type: 'ping_timeout' }
  | { type: 'segment_scan_completed'; localSegmentId: number; couplerIds: number[] }
  | { type: 'error'; error: string };

export type ConnectionEventHandler = (event: ConnectionEvent) => void;

// -----------------------------------------------------------------------------
// Metrics
// -----------------------------------------------------------------------------

export interface ConnectionMetrics {
  linesReceived: number;
  linesSent: number;
  unknownLines: number;
  /** Partial lines discarded for exceeding the line length limit */
  oversizedLines: number;
  pingsSent: number;
  pingTimeouts: number;
  modulesDiscovered: number;
  lastPingLatencyMs: number | null;
}

export const INITIAL_METRICS: ConnectionMetrics = {
  linesReceived: 0,
  linesSent: 0,
  unknownLines: 0,
  oversizedLines: 0,
  pingsSent: 0,
  pingTimeouts: 0,
  modulesDiscovered: 0,
  lastPingLatencyMs: null,
};

// -----------------------------------------------------------------------------
// Status Items
// -----------------------------------------------------------------------------

/**
 * Something a device connection can poll periodically. Motors report through
 * the relay bank, so they poll as `relays`.
 */
export type StatusItem =
  | { kind: 'output'; outputId: number }
  | { kind: 'relays' }
  | { kind: 'bin_sensors' }
  | { kind: 'var'; var: Var }
  | { kind: 'leds_and_logic_ops' }
  | { kind: 'key_locks' };

export function statusItemKey(item: StatusItem): string {
  switch (item.kind) {
    case 'output':
      return `output:${item.outputId}`;
    case 'var':
      return `var:${item.var}`;
    default:
      return item.kind;
  }
}

// -----------------------------------------------------------------------------
// Collaborator Interfaces
// -----------------------------------------------------------------------------

/**
 * Anything commands can be addressed to: a module or a group.
 */
export interface CommandTarget {
  readonly address: Address;
  sendCommand(wantsAck: boolean, pck: PckCommand): boolean;
}

/**
 * What the status requester needs from the connection.
 */
export interface RequesterHost {
  readonly settings: Readonly<ConnectionSettings>;
  getAddressConn(address: Address): CommandTarget;
}

/**
 * What a device connection needs from the connection.
 */
export interface DeviceHost {
  readonly settings: Readonly<ConnectionSettings>;
  readonly statusRequester: StatusRequester;
  getLocalSegmentId(): number;
  /** Write one command line. False when nothing was written. */
  sendCommand(pck: PckCommand, toHost?: boolean): boolean;
  /** Resolves false if the session ends before the scan completes. */
  waitForSegmentScan(): Promise<boolean>;
}
