/**
 * Connection Manager
 *
 * Owns the TCP socket to the gateway. Frames and decodes inbound lines,
 * drives the login handshake, tracks bus state and the local segment id,
 * and routes module inputs to their device connections. Outbound lines go
 * through a write queue that keeps a minimum quiet time on the bus.
 */

import { createConnection } from 'net';
import type { Socket } from 'net';
import {
  UNKNOWN_SEGMENT_ID,
  addressKey,
  groupAddress,
  moduleAddress,
  physicalToLogical,
} from '../core/address.js';
import type { Address } from '../core/address.js';
import { Latch } from '../core/latch.js';
import { TimeoutRetryHandler } from '../core/timeout-retry.js';
import { InputType, isModInput } from '../core/protocol/inputs.js';
import type { Input, InputHandler, ModInput, ModSkInput } from '../core/protocol/inputs.js';
import * as PckGenerator from '../core/protocol/generator.js';
import type { PckCommand } from '../core/protocol/generator.js';
import * as PckParser from '../core/protocol/parser.js';
import { connectionLogger, withLogContext } from '../observability/logger.js';
import type { LogContext } from '../observability/logger.js';
import { GroupConnection, ModuleConnection } from './device.js';
import type { AddressConnection, ModuleDetails } from './device.js';
import {
  PchkAuthenticationError,
  PchkConnectionFailedError,
  PchkConnectionRefusedError,
  PchkLcnNotConnectedError,
  PchkLicenseError,
} from './errors.js';
import { StatusRequester } from './status-requester.js';
import type {
  ConnectionEvent,
  ConnectionEventHandler,
  ConnectionManagerState,
  ConnectionMetrics,
  ConnectionOptions,
  ConnectionSettings,
  DeviceHost,
  RequesterHost,
} from './types.js';
import {
  ConnectionState,
  DEFAULT_CONNECTION_OPTIONS,
  DEFAULT_CONNECTION_SETTINGS,
  INITIAL_METRICS,
} from './types.js';

export interface ConnectionManagerOptions extends Omit<Partial<ConnectionOptions>, 'settings'> {
  settings?: Partial<ConnectionSettings>;
}

export const DEFAULT_CONNECT_TIMEOUT_MS = 30000;

/** Group address the segment coupler scan is broadcast to. */
const SEGMENT_SCAN_ADDRESS = groupAddress(3, 3);

const LINE_FEED = 0x0a;
const CARRIAGE_RETURN = 0x0d;

/** Longest partial line kept while waiting for its line feed. */
export const MAX_LINE_BYTES = 4096;

interface PendingConnect {
  resolve: () => void;
  reject: (error: Error) => void;
  timer: ReturnType<typeof setTimeout>;
}

// -----------------------------------------------------------------------------
// Connection Manager
// -----------------------------------------------------------------------------

export class PchkConnectionManager implements DeviceHost, RequesterHost {
  private readonly logger = connectionLogger();
  private readonly options: Omit<ConnectionOptions, 'settings'>;
  readonly settings: Readonly<ConnectionSettings>;
  readonly statusRequester: StatusRequester;

  private socket: Socket | null = null;
  private readBuffer: Buffer = Buffer.alloc(0);
  private readonly utf8Decoder = new TextDecoder('utf-8', { fatal: true });
  private readonly fallbackDecoder = new TextDecoder('windows-1250');

  private writeQueue: Buffer[] = [];
  private writeTimer: ReturnType<typeof setTimeout> | null = null;
  private lastBusActivity = 0;

  private state: ConnectionManagerState;
  private metrics: ConnectionMetrics;
  private pendingConnect: PendingConnect | null = null;
  private closing = false;

  // Session latches, recreated on every reset
  private socketConnected = new Latch();
  private busConnected = new Latch();
  private segmentScanCompleted = new Latch();

  private readonly segmentScan: TimeoutRetryHandler;
  private pingTimer: ReturnType<typeof setTimeout> | null = null;
  private pingTimeoutTimer: ReturnType<typeof setTimeout> | null = null;
  private pingCounter = 0;
  private pingSentAt: number | null = null;

  /** One connection per module address, keyed by `addressKey` */
  private moduleConns: Map<string, ModuleConnection> = new Map();
  private serialListeners: Set<() => void> = new Set();

  private eventHandlers: Set<ConnectionEventHandler> = new Set();
  private inputHandlers: Set<InputHandler> = new Set();

  constructor(options: ConnectionManagerOptions = {}) {
    const { settings, ...rest } = options;
    this.options = { ...DEFAULT_CONNECTION_OPTIONS, ...rest };
    this.settings = { ...DEFAULT_CONNECTION_SETTINGS, ...settings };
    this.state = this.createInitialState();
    this.metrics = { ...INITIAL_METRICS };
    this.statusRequester = new StatusRequester(this);

    this.segmentScan = new TimeoutRetryHandler(this.settings.skNumTries, this.settings.defaultTimeoutMs);
    this.segmentScan.setTimeoutCallback((failed) => this.onSegmentScanTimeout(failed));
  }

  private createInitialState(): ConnectionManagerState {
    return {
      connectionState: ConnectionState.DISCONNECTED,
      socketConnected: false,
      busConnected: false,
      segmentScanCompleted: false,
      localSegmentId: UNKNOWN_SEGMENT_ID,
      segmentCouplerIds: [],
      lastConnected: null,
      lastDisconnected: null,
      lastPing: null,
      lastError: null,
    };
  }

  // ---------------------------------------------------------------------------
  // Lifecycle
  // ---------------------------------------------------------------------------

  /**
   * Open the socket, log in and wait until the bus is connected and the
   * local segment is known. Any previous session is discarded first.
   */
  async connect(timeoutMs = DEFAULT_CONNECT_TIMEOUT_MS): Promise<void> {
    if (this.socket) {
      await this.close();
    }
    this.closing = false;
    this.resetSession();

    const { host, port, connectionId } = this.options;
    this.logger.debug({ connectionId, host, port }, 'Connecting to gateway');
    this.updateConnectionState(ConnectionState.SOCKET_CONNECTING);

    const ready = new Promise<void>((resolve, reject) => {
      const timer = setTimeout(() => this.onConnectTimeout(), timeoutMs);
      this.pendingConnect = { resolve, reject, timer };
    });

    const socket = createConnection({ host, port });
    this.socket = socket;
    socket.on('connect', () => this.handleSocketConnect(socket));
    socket.on('data', (chunk: Buffer) => this.handleSocketData(socket, chunk));
    socket.on('error', (error) => this.handleSocketError(socket, error));
    socket.on('close', () => this.handleSocketClose(socket));

    return ready;
  }

  /**
   * Tear down the session and close the socket. Safe to call when not
   * connected.
   */
  async close(): Promise<void> {
    this.closing = true;
    const socket = this.socket;
    const closed =
      socket && !socket.destroyed
        ? new Promise<void>((resolve) => socket.once('close', () => resolve()))
        : Promise.resolve();

    this.failConnect(new PchkConnectionFailedError('Connection closed'));
    this.teardown();
    await closed;
    this.logger.debug({ connectionId: this.options.connectionId }, 'Connection closed');
  }

  /**
   * Discard everything tied to the socket and return to DISCONNECTED.
   */
  private teardown(): void {
    this.resetBusState();
    this.clearTimers();
    this.statusRequester.stopPruning();
    this.writeQueue = [];
    this.readBuffer = Buffer.alloc(0);
    this.socketConnected.cancel();
    this.socketConnected = new Latch();
    this.state.socketConnected = false;

    if (this.socket) {
      this.socket.destroy();
      this.socket = null;
      this.state.lastDisconnected = Date.now();
    }
    this.updateConnectionState(ConnectionState.DISCONNECTED);
  }

  private resetSession(): void {
    this.teardown();
    this.pingCounter = 0;
    this.pingSentAt = null;
    this.state.segmentCouplerIds = [];
    this.state.lastError = null;
  }

  /**
   * Forget bus-level state: local segment, device table, pending requests.
   * Per-device futures are lost.
   */
  private resetBusState(): void {
    this.segmentScan.cancel();
    this.setLocalSegmentIdRaw(UNKNOWN_SEGMENT_ID);
    this.cancelRequests();
    this.moduleConns.clear();
    this.statusRequester.cancelAll();

    this.busConnected.cancel();
    this.segmentScanCompleted.cancel();
    this.busConnected = new Latch();
    this.segmentScanCompleted = new Latch();
    this.state.busConnected = false;
    this.state.segmentScanCompleted = false;
  }

  private failConnect(error: Error): void {
    const pending = this.pendingConnect;
    if (!pending) return;
    this.pendingConnect = null;
    clearTimeout(pending.timer);
    this.state.lastError = error.message;
    this.teardown();
    pending.reject(error);
  }

  private onConnectTimeout(): void {
    const authenticated =
      this.state.connectionState === ConnectionState.AUTHENTICATED ||
      this.state.connectionState === ConnectionState.BUS_DISCONNECTED;
    this.logger.debug({ state: this.state.connectionState }, 'Connection attempt timed out');
    this.failConnect(authenticated ? new PchkLcnNotConnectedError() : new PchkConnectionFailedError());
  }

  // ---------------------------------------------------------------------------
  // Socket Events
  // ---------------------------------------------------------------------------

  private handleSocketConnect(socket: Socket): void {
    if (socket !== this.socket) return;
    this.socketConnected.set();
    this.state.socketConnected = true;
    this.state.lastConnected = Date.now();
    this.lastBusActivity = Date.now();
    this.statusRequester.startPruning();
    this.logger.debug(
      { connectionId: this.options.connectionId, remote: `${socket.remoteAddress}:${socket.remotePort}` },
      'Gateway socket connected'
    );
    this.updateConnectionState(ConnectionState.SOCKET_CONNECTED);
    this.updateConnectionState(ConnectionState.AWAITING_USERNAME);
  }

  private handleSocketData(socket: Socket, chunk: Buffer): void {
    if (socket !== this.socket) return;
    this.readBuffer = Buffer.concat([this.readBuffer, chunk]);

    let end = this.readBuffer.indexOf(LINE_FEED);
    while (end !== -1) {
      let line = this.readBuffer.subarray(0, end);
      this.readBuffer = this.readBuffer.subarray(end + 1);
      if (line.length > 0 && line[line.length - 1] === CARRIAGE_RETURN) {
        line = line.subarray(0, line.length - 1);
      }
      this.lastBusActivity = Date.now();
      const text = this.decodeLine(line);
      withLogContext(this.logContext(), () => this.processLine(text));
      // Processing may have closed the socket
      if (socket !== this.socket) return;
      end = this.readBuffer.indexOf(LINE_FEED);
    }

    if (this.readBuffer.length > MAX_LINE_BYTES) {
      this.metrics.oversizedLines++;
      this.logger.warn(
        { bytes: this.readBuffer.length, limit: MAX_LINE_BYTES },
        'Dropping partial line over the length limit'
      );
      this.readBuffer = Buffer.alloc(0);
    }
  }

  private handleSocketError(socket: Socket, error: Error): void {
    if (socket !== this.socket) return;
    this.logger.debug({ err: error, connectionId: this.options.connectionId }, 'Gateway socket error');
    this.state.lastError = error.message;
    this.emitEvent({ type: 'error', error: error.message });
    if (!this.socketConnected.isSet()) {
      this.failConnect(new PchkConnectionRefusedError());
    }
  }

  private handleSocketClose(socket: Socket): void {
    if (socket !== this.socket) return;
    this.socket = null;

    if (this.pendingConnect) {
      this.failConnect(
        this.socketConnected.isSet() ? new PchkConnectionFailedError() : new PchkConnectionRefusedError()
      );
      return;
    }
    if (this.closing) return;

    this.logger.warn({ connectionId: this.options.connectionId }, 'Connection to gateway lost');
    this.emitEvent({ type: 'connection_lost' });
    this.teardown();
  }

  /** Bound into every log line written while an inbound line is handled */
  private logContext(): LogContext {
    return { connectionId: this.options.connectionId, host: `${this.options.host}:${this.options.port}` };
  }

  private decodeLine(line: Buffer): string {
    try {
      return this.utf8Decoder.decode(line);
    } catch (error) {
      if (!(error instanceof TypeError)) throw error;
      this.logger.warn({ err: error }, 'Line is not valid UTF-8, decoding as windows-1250');
      return this.fallbackDecoder.decode(line);
    }
  }

  // ---------------------------------------------------------------------------
  // Outbound
  // ---------------------------------------------------------------------------

  /**
   * Queue one command line. Commands not addressed to the gateway itself
   * are refused while the bus is down.
   */
  sendCommand(pck: PckCommand, toHost = false): boolean {
    if (!toHost && !this.busConnected.isSet()) return false;
    if (!this.socket || this.socket.destroyed) return false;

    const line = PckGenerator.joinCommand(pck, PckGenerator.TERMINATION);
    this.writeQueue.push(typeof line === 'string' ? Buffer.from(line, 'utf-8') : Buffer.from(line));
    this.scheduleWrite();
    return true;
  }

  private scheduleWrite(): void {
    if (this.writeTimer || this.writeQueue.length === 0) return;
    const wait = Math.max(0, this.lastBusActivity + this.settings.busIdleTimeMs - Date.now());
    this.writeTimer = setTimeout(() => {
      this.writeTimer = null;
      this.writeNext();
    }, wait);
  }

  private writeNext(): void {
    const socket = this.socket;
    if (!socket || socket.destroyed) {
      this.writeQueue = [];
      return;
    }
    if (Date.now() - this.lastBusActivity < this.settings.busIdleTimeMs) {
      this.scheduleWrite();
      return;
    }

    const data = this.writeQueue.shift();
    if (data) {
      this.logger.trace({ to: this.options.connectionId, line: data.toString('utf-8').trimEnd() }, 'Sending line');
      socket.write(data);
      this.metrics.linesSent++;
      this.lastBusActivity = Date.now();
    }
    this.scheduleWrite();
  }

  // ---------------------------------------------------------------------------
  // Inbound
  // ---------------------------------------------------------------------------

  private processLine(line: string): void {
    this.metrics.linesReceived++;
    this.logger.trace({ from: this.options.connectionId, line }, 'Received line');

    let inputs: Input[];
    try {
      inputs = PckParser.parse(line);
    } catch (error) {
      this.logger.error({ err: error, line }, 'Failed to parse line');
      this.emitEvent({ type: 'error', error: error instanceof Error ? error.message : String(error) });
      return;
    }

    for (const input of inputs) {
      this.processInput(input);
    }
  }

  /**
   * Dispatch one parsed input. Gateway messages drive the handshake; module
   * messages are routed once the connection is ready.
   */
  processInput(input: Input): void {
    switch (input.type) {
      case InputType.AUTH_USERNAME:
        this.sendCommand(this.options.username, true);
        this.updateConnectionState(ConnectionState.AWAITING_PASSWORD);
        return;
      case InputType.AUTH_PASSWORD:
        this.sendCommand(this.options.password, true);
        return;
      case InputType.AUTH_OK:
        this.logger.debug({ connectionId: this.options.connectionId }, 'Authentication successful');
        this.updateConnectionState(ConnectionState.AUTHENTICATED);
        this.sendCommand(PckGenerator.setDecMode(), true);
        return;
      case InputType.AUTH_FAILED:
        this.logger.debug({ connectionId: this.options.connectionId }, 'Authentication failed');
        this.failConnect(new PchkAuthenticationError());
        return;
      case InputType.LICENSE_ERROR:
        this.logger.debug({ connectionId: this.options.connectionId }, 'License error');
        this.failConnect(new PchkLicenseError());
        return;
      case InputType.DEC_MODE_SET:
        this.sendCommand(PckGenerator.setOperationMode(this.settings.dimMode, this.settings.statusMode), true);
        this.startPing();
        return;
      case InputType.COMMAND_ERROR:
        this.logger.debug({ message: input.message }, 'Gateway reported a command error');
        return;
      case InputType.PING:
        this.onPingReceived();
        return;
      case InputType.LCN_CONN_STATE:
        this.onBusConnectionChanged(input.connected);
        return;
      case InputType.MOD_SK:
        this.onSegmentInfo(input);
        return;
      case InputType.UNKNOWN:
        this.metrics.unknownLines++;
        return;
      default:
        break;
    }

    if (!isModInput(input)) return;
    if (!this.isReady()) {
      this.logger.debug({ type: input.type }, 'Ignoring module input before ready');
      return;
    }
    this.processModInput(input);
  }

  private processModInput(input: ModInput): void {
    const source = physicalToLogical(input.source, this.state.localSegmentId);
    let routed: ModInput = { ...input, source };

    if (!source.isGroup) {
      const conn = this.getModuleConn(source);
      if (routed.type === InputType.MOD_SN) {
        for (const listener of [...this.serialListeners]) {
          listener();
        }
      }
      routed = conn.processInput(routed);
    }

    this.statusRequester.processInput(routed);
    for (const handler of this.inputHandlers) {
      try {
        handler(routed);
      } catch (error) {
        this.logger.error({ err: error }, 'Input handler error');
      }
    }
  }

  // ---------------------------------------------------------------------------
  // Bus & Segment
  // ---------------------------------------------------------------------------

  private onBusConnectionChanged(connected: boolean): void {
    this.emitEvent({ type: 'bus_connection_status_changed', connected });

    if (connected) {
      this.logger.debug({ connectionId: this.options.connectionId }, 'Bus connected');
      this.emitEvent({ type: 'bus_connected' });
      if (this.busConnected.isSet()) return;
      this.busConnected.set();
      this.state.busConnected = true;
      this.startPing();
      this.updateConnectionState(ConnectionState.SCANNING_SEGMENT);
      this.segmentScan.activate();
      return;
    }

    this.logger.debug({ connectionId: this.options.connectionId }, 'Bus disconnected');
    this.emitEvent({ type: 'bus_disconnected' });
    this.resetBusState();
    this.updateConnectionState(ConnectionState.BUS_DISCONNECTED);
  }

  private onSegmentScanTimeout(failed: boolean): void {
    if (!failed) {
      this.sendCommand(
        PckGenerator.joinCommand(
          PckGenerator.generateAddressHeader(SEGMENT_SCAN_ADDRESS, this.state.localSegmentId, false),
          PckGenerator.segmentCouplerScan()
        )
      );
      return;
    }

    if (this.state.localSegmentId === UNKNOWN_SEGMENT_ID) {
      this.logger.debug({ connectionId: this.options.connectionId }, 'No segment coupler found');
      this.setLocalSegmentId(0);
    }
    this.completeSegmentScan();
  }

  private onSegmentInfo(input: ModSkInput): void {
    if (input.source.segmentId === 0) {
      this.setLocalSegmentId(input.reportedSegmentId);
      this.segmentScan.cancel();
      this.completeSegmentScan();
    }
    if (!this.state.segmentCouplerIds.includes(input.reportedSegmentId)) {
      this.state.segmentCouplerIds.push(input.reportedSegmentId);
    }
  }

  private completeSegmentScan(): void {
    if (this.segmentScanCompleted.isSet() || !this.busConnected.isSet()) return;
    this.segmentScanCompleted.set();
    this.state.segmentScanCompleted = true;
    this.emitEvent({
      type: 'segment_scan_completed',
      localSegmentId: this.state.localSegmentId,
      couplerIds: [...this.state.segmentCouplerIds],
    });
    this.updateConnectionState(ConnectionState.READY);

    const pending = this.pendingConnect;
    if (pending) {
      this.pendingConnect = null;
      clearTimeout(pending.timer);
      pending.resolve();
    }
  }

  /**
   * Set the local segment id and move module connections created under the
   * placeholder (segment 0 or the previous id) to the resolved one.
   */
  setLocalSegmentId(localSegmentId: number): void {
    const previous = this.state.localSegmentId;
    this.setLocalSegmentIdRaw(localSegmentId);
    if (localSegmentId === previous || localSegmentId === UNKNOWN_SEGMENT_ID) return;

    for (const [key, conn] of [...this.moduleConns]) {
      const { segmentId, entityId } = conn.address;
      if (segmentId !== 0 && segmentId !== previous) continue;
      const address = moduleAddress(localSegmentId, entityId);
      this.moduleConns.delete(key);
      const newKey = addressKey(address);
      if (this.moduleConns.has(newKey)) {
        conn.cancelRequests();
        continue;
      }
      conn.setAddress(address);
      this.moduleConns.set(newKey, conn);
    }
    this.logger.debug({ localSegmentId, previous }, 'Local segment id set');
  }

  private setLocalSegmentIdRaw(localSegmentId: number): void {
    this.state.localSegmentId = localSegmentId;
  }

  getLocalSegmentId(): number {
    return this.state.localSegmentId;
  }

  waitForSegmentScan(): Promise<boolean> {
    return this.segmentScanCompleted.wait();
  }

  // ---------------------------------------------------------------------------
  // Keepalive
  // ---------------------------------------------------------------------------

  private startPing(): void {
    if (this.pingTimer) return;
    this.sendPing();
  }

  private sendPing(): void {
    this.sendCommand(PckGenerator.ping(this.pingCounter), true);
    this.pingCounter++;
    this.metrics.pingsSent++;
    this.pingSentAt = Date.now();

    this.clearTimer('pingTimeout');
    this.pingTimeoutTimer = setTimeout(() => {
      this.pingTimeoutTimer = null;
      this.metrics.pingTimeouts++;
      this.emitEvent({ type: 'ping_timeout' });
    }, this.settings.pingRecvTimeoutMs);

    this.pingTimer = setTimeout(() => {
      this.pingTimer = null;
      this.sendPing();
    }, this.settings.pingSendDelayMs);
  }

  private onPingReceived(): void {
    this.clearTimer('pingTimeout');
    const now = Date.now();
    this.state.lastPing = now;
    if (this.pingSentAt !== null) {
      this.metrics.lastPingLatencyMs = now - this.pingSentAt;
    }
  }

  // ---------------------------------------------------------------------------
  // Discovery
  // ---------------------------------------------------------------------------

  /**
   * Query every known segment for modules. Each try waits until no serial
   * number has arrived for `timeoutMs`.
   */
  async scanModules(numTries = 3, timeoutMs = 3000): Promise<void> {
    const segmentIds = this.state.segmentCouplerIds.length > 0 ? [...this.state.segmentCouplerIds] : [0];

    for (let attempt = 0; attempt < numTries; attempt++) {
      if (!this.isReady()) return;
      for (const segmentId of segmentIds) {
        this.sendCommand(
          PckGenerator.joinCommand(
            PckGenerator.generateAddressHeader(groupAddress(segmentId, 3), this.state.localSegmentId, true),
            PckGenerator.empty()
          )
        );
      }
      await this.waitForSerialQuiet(timeoutMs);
    }
  }

  private waitForSerialQuiet(timeoutMs: number): Promise<void> {
    return new Promise((resolve) => {
      let timer: ReturnType<typeof setTimeout>;
      const done = (): void => {
        this.serialListeners.delete(extend);
        resolve();
      };
      const extend = (): void => {
        clearTimeout(timer);
        timer = setTimeout(done, timeoutMs);
      };
      timer = setTimeout(done, timeoutMs);
      this.serialListeners.add(extend);
    });
  }

  // ---------------------------------------------------------------------------
  // Device Connections
  // ---------------------------------------------------------------------------

  /**
   * The module connection for an address, created on first use. Segment 0
   * is taken as the local segment once it is known.
   */
  getModuleConn(address: Address, requestSerials = true): ModuleConnection {
    if (address.isGroup) {
      throw new RangeError('Module connection requested for a group address');
    }
    const logical = physicalToLogical(address, this.state.localSegmentId);
    const key = addressKey(logical);

    const existing = this.moduleConns.get(key);
    if (existing) return existing;

    const conn = new ModuleConnection(this, logical, this.settings.acknowledge);
    this.moduleConns.set(key, conn);
    this.metrics.modulesDiscovered++;
    if (requestSerials) {
      conn.requestSerials().catch((error: unknown) => {
        this.logger.error({ err: error, module: logical }, 'Serial request failed');
      });
    }
    return conn;
  }

  /**
   * A fresh connection for a group address. Groups keep no state.
   */
  getGroupConn(address: Address): GroupConnection {
    if (!address.isGroup) {
      throw new RangeError('Group connection requested for a module address');
    }
    return new GroupConnection(this, physicalToLogical(address, this.state.localSegmentId));
  }

  getAddressConn(address: Address, requestSerials = true): AddressConnection {
    return address.isGroup ? this.getGroupConn(address) : this.getModuleConn(address, requestSerials);
  }

  getModuleConns(): ModuleConnection[] {
    return [...this.moduleConns.values()];
  }

  private cancelRequests(): void {
    for (const conn of this.moduleConns.values()) {
      conn.cancelRequests();
    }
  }

  /**
   * Known modules by segment id and module id.
   */
  dumpModules(): Record<string, Record<string, ModuleDetails>> {
    const dump: Record<string, Record<string, ModuleDetails>> = {};
    for (const conn of this.moduleConns.values()) {
      const segment = String(conn.address.segmentId);
      const bySegment = dump[segment] ?? {};
      bySegment[String(conn.address.entityId)] = conn.dumpDetails();
      dump[segment] = bySegment;
    }
    return dump;
  }

  // ---------------------------------------------------------------------------
  // Timer Management
  // ---------------------------------------------------------------------------

  private clearTimers(): void {
    this.clearTimer('ping');
    this.clearTimer('pingTimeout');
    this.clearTimer('write');
  }

  private clearTimer(name: 'ping' | 'pingTimeout' | 'write'): void {
    switch (name) {
      case 'ping':
        if (this.pingTimer) {
          clearTimeout(this.pingTimer);
          this.pingTimer = null;
        }
        break;
      case 'pingTimeout':
        if (this.pingTimeoutTimer) {
          clearTimeout(this.pingTimeoutTimer);
          this.pingTimeoutTimer = null;
        }
        break;
      case 'write':
        if (this.writeTimer) {
          clearTimeout(this.writeTimer);
          this.writeTimer = null;
        }
        break;
    }
  }

  // ---------------------------------------------------------------------------
  // State Updates
  // ---------------------------------------------------------------------------

  private updateConnectionState(state: ConnectionState): void {
    const previous = this.state.connectionState;
    if (previous === state) return;
    this.state.connectionState = state;
    this.emitEvent({ type: 'state_changed', from: previous, to: state });
  }

  // ---------------------------------------------------------------------------
  // Event Emission
  // ---------------------------------------------------------------------------

  private emitEvent(event: ConnectionEvent): void {
    for (const handler of this.eventHandlers) {
      try {
        handler(event);
      } catch (error) {
        this.logger.error({ err: error }, 'Event handler error');
      }
    }
  }

  // ---------------------------------------------------------------------------
  // Public API
  // ---------------------------------------------------------------------------

  onEvent(handler: ConnectionEventHandler): void {
    this.eventHandlers.add(handler);
  }

  offEvent(handler: ConnectionEventHandler): void {
    this.eventHandlers.delete(handler);
  }

  /**
   * Observe routed module inputs (logical addresses). Returns an
   * unsubscribe function.
   */
  onInput(handler: InputHandler): () => void {
    this.inputHandlers.add(handler);
    return () => {
      this.inputHandlers.delete(handler);
    };
  }

  /**
   * Socket up, bus connected and local segment known.
   */
  isReady(): boolean {
    return this.socketConnected.isSet() && this.busConnected.isSet() && this.segmentScanCompleted.isSet();
  }

  isConnected(): boolean {
    return this.socketConnected.isSet();
  }

  getState(): Readonly<ConnectionManagerState> {
    return { ...this.state, segmentCouplerIds: [...this.state.segmentCouplerIds] };
  }

  getMetrics(): Readonly<ConnectionMetrics> {
    return { ...this.metrics };
  }

  getOptions(): Readonly<Omit<ConnectionOptions, 'settings'>> {
    return { ...this.options };
  }
}
