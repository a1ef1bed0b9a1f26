/**
 * Gateway Simulator
 *
 * In-process stand-in for a PCK gateway. Performs the login dialogue,
 * answers keepalives, segment scans and serial requests for a configurable
 * set of modules, and records every line it receives.
 */

import { createServer } from 'net';
import type { Server, Socket } from 'net';
import { createLogger } from '../observability/logger.js';
import * as PckParser from '../core/protocol/parser.js';

// -----------------------------------------------------------------------------
// Types
// -----------------------------------------------------------------------------

export interface SimulatedModule {
  moduleId: number;
  /** 10 hex digits */
  serial: string;
  /** 2 hex digits */
  manu: string;
  /** 6 hex digits */
  firmware: string;
  hardwareType: number;
}

export interface SimulatorConfig {
  /** Port to listen on, 0 for any free port */
  port: number;
  username: string;
  password: string;
  /** Reply to the dec-mode command with a license error */
  licenseError: boolean;
  /** Report the bus as connected after login */
  busConnected: boolean;
  /** Segment id reported by the local segment coupler, null for none */
  segmentId: number | null;
  /** Modules on the local segment */
  modules: SimulatedModule[];
  /** Acknowledge commands that request one */
  autoAck: boolean;
  /** Echo keepalives */
  answerPings: boolean;
}

export const DEFAULT_SIMULATOR_CONFIG: SimulatorConfig = {
  port: 0,
  username: 'lcn',
  password: 'lcn',
  licenseError: false,
  busConnected: true,
  segmentId: null,
  modules: [],
  autoAck: true,
  answerPings: true,
};

export interface SimulatorEvent {
  type: 'client_connected' | 'client_disconnected' | 'login_succeeded' | 'login_failed' | 'line_received';
  clientId: string;
  data?: string;
  timestamp: number;
}

export type SimulatorEventHandler = (event: SimulatorEvent) => void;

type LoginStage = 'username' | 'password' | 'done';

interface SimulatorClient {
  id: string;
  socket: Socket;
  stage: LoginStage;
  username: string;
  buffer: string;
}

/** Scripted reply: lines to send back when a received line matches. */
interface Responder {
  match: (line: string) => boolean;
  replies: string[];
}

const MODULE_COMMAND = /^>([MG])(\d{3})(\d{3})([!.])(.*)$/;

function pad3(value: number): string {
  return value.toString().padStart(3, '0');
}

// -----------------------------------------------------------------------------
// Gateway Simulator
// -----------------------------------------------------------------------------

export class GatewaySimulator {
  private readonly logger = createLogger({ component: 'simulator' });
  private readonly config: SimulatorConfig;
  private server: Server | null = null;
  private clients: Map<string, SimulatorClient> = new Map();
  private eventHandlers: Set<SimulatorEventHandler> = new Set();
  private responders: Responder[] = [];

  /** Lines received after login, in order */
  private receivedLines: string[] = [];
  private eventLog: SimulatorEvent[] = [];
  private clientIdCounter = 0;

  constructor(config: Partial<SimulatorConfig> = {}) {
    this.config = { ...DEFAULT_SIMULATOR_CONFIG, ...config };
  }

  // ---------------------------------------------------------------------------
  // Lifecycle
  // ---------------------------------------------------------------------------

  async start(): Promise<void> {
    return new Promise((resolve, reject) => {
      const server = createServer((socket) => this.handleConnection(socket));
      server.once('error', reject);
      server.listen(this.config.port, '127.0.0.1', () => {
        server.off('error', reject);
        this.server = server;
        this.logger.debug({ port: this.getPort() }, 'Gateway simulator listening');
        resolve();
      });
    });
  }

  async stop(): Promise<void> {
    this.dropClients();
    const server = this.server;
    this.server = null;
    if (!server) return;

    await new Promise<void>((resolve, reject) => {
      server.close((error) => (error ? reject(error) : resolve()));
    });
  }

  /**
   * Close every client socket, as if the gateway went away.
   */
  dropClients(): void {
    for (const client of this.clients.values()) {
      client.socket.destroy();
    }
  }

  getPort(): number {
    const address = this.server?.address();
    return address && typeof address === 'object' ? address.port : this.config.port;
  }

  // ---------------------------------------------------------------------------
  // Connection Handling
  // ---------------------------------------------------------------------------

  private handleConnection(socket: Socket): void {
    const client: SimulatorClient = {
      id: `client-${++this.clientIdCounter}`,
      socket,
      stage: 'username',
      username: '',
      buffer: '',
    };
    this.clients.set(client.id, client);

    socket.setEncoding('utf-8');
    socket.on('data', (chunk: string) => this.handleData(client, chunk));
    socket.on('close', () => {
      this.clients.delete(client.id);
      this.emitEvent({ type: 'client_disconnected', clientId: client.id, timestamp: Date.now() });
    });
    socket.on('error', (error) => this.logger.debug({ err: error, clientId: client.id }, 'Client socket error'));

    this.emitEvent({ type: 'client_connected', clientId: client.id, timestamp: Date.now() });
    this.send(client, 'LCN-PCK/IP 1.0');
    this.send(client, PckParser.AUTH_USERNAME);
  }

  private handleData(client: SimulatorClient, chunk: string): void {
    client.buffer += chunk;
    let end = client.buffer.indexOf('\n');
    while (end !== -1) {
      const line = client.buffer.slice(0, end).replace(/\r$/, '');
      client.buffer = client.buffer.slice(end + 1);
      this.handleLine(client, line);
      end = client.buffer.indexOf('\n');
    }
  }

  private handleLine(client: SimulatorClient, line: string): void {
    switch (client.stage) {
      case 'username':
        client.username = line;
        client.stage = 'password';
        this.send(client, PckParser.AUTH_PASSWORD);
        return;
      case 'password':
        this.handleLogin(client, line);
        return;
      case 'done':
        break;
    }

    this.receivedLines.push(line);
    this.emitEvent({ type: 'line_received', clientId: client.id, data: line, timestamp: Date.now() });
    this.processCommand(client, line);
  }

  private handleLogin(client: SimulatorClient, password: string): void {
    if (client.username !== this.config.username || password !== this.config.password) {
      this.emitEvent({ type: 'login_failed', clientId: client.id, timestamp: Date.now() });
      this.send(client, PckParser.AUTH_FAILED);
      client.socket.end();
      return;
    }

    client.stage = 'done';
    this.emitEvent({ type: 'login_succeeded', clientId: client.id, timestamp: Date.now() });
    this.send(client, PckParser.AUTH_OK);
  }

  private processCommand(client: SimulatorClient, line: string): void {
    for (const responder of this.responders) {
      if (responder.match(line)) {
        for (const reply of responder.replies) {
          this.send(client, reply);
        }
        return;
      }
    }

    if (line === '!CHD') {
      if (this.config.licenseError) {
        this.send(client, PckParser.LICENSE_ERROR);
        return;
      }
      this.send(client, PckParser.DEC_MODE_SET);
      if (this.config.busConnected) {
        this.send(client, PckParser.LCN_CONNECTED);
      }
      return;
    }

    if (line.startsWith('^ping')) {
      if (this.config.answerPings) {
        this.send(client, line);
      }
      return;
    }

    const match = MODULE_COMMAND.exec(line);
    if (match) {
      this.processModuleCommand(client, match);
    }
  }

  private processModuleCommand(client: SimulatorClient, match: RegExpExecArray): void {
    const [, kind, , entity = '0', ackFlag, command = ''] = match;
    const entityId = Number.parseInt(entity, 10);
    const isGroup = kind === 'G';
    const targets = isGroup ? this.config.modules : this.config.modules.filter((mod) => mod.moduleId === entityId);

    if (command === 'SK') {
      if (this.config.segmentId !== null) {
        this.send(client, `=M000005.SK${pad3(this.config.segmentId)}`);
      }
      return;
    }

    for (const mod of targets) {
      if (ackFlag === '!' && this.config.autoAck) {
        this.send(client, `-M000${pad3(mod.moduleId)}!`);
      }
      if (command === 'SN') {
        this.send(
          client,
          `=M000${pad3(mod.moduleId)}.SN${mod.serial}${mod.manu}FW${mod.firmware}HW${mod.hardwareType}`
        );
      }
    }
  }

  // ---------------------------------------------------------------------------
  // Sending Messages
  // ---------------------------------------------------------------------------

  private send(client: SimulatorClient, line: string): void {
    if (!client.socket.destroyed) {
      client.socket.write(`${line}\n`);
    }
  }

  // ---------------------------------------------------------------------------
  // Public Simulation API
  // ---------------------------------------------------------------------------

  /**
   * Send a raw line (or raw bytes) to every logged-in client.
   */
  sendMessage(message: string | Buffer): void {
    for (const client of this.clients.values()) {
      if (client.stage !== 'done' || client.socket.destroyed) continue;
      if (typeof message === 'string') {
        this.send(client, message);
      } else {
        client.socket.write(Buffer.concat([message, Buffer.from('\n')]));
      }
    }
  }

  /**
   * Write bytes to every logged-in client as they are, without a line feed.
   */
  sendRaw(bytes: Buffer): void {
    for (const client of this.clients.values()) {
      if (client.stage !== 'done' || client.socket.destroyed) continue;
      client.socket.write(bytes);
    }
  }

  setBusConnected(connected: boolean): void {
    this.sendMessage(connected ? PckParser.LCN_CONNECTED : PckParser.LCN_DISCONNECTED);
  }

  /**
   * Reply with `replies` whenever a received line matches, instead of the
   * default behaviour. Responders are checked in the order they were added.
   */
  respondTo(match: string | RegExp, replies: string[]): this {
    const test = typeof match === 'string' ? (line: string) => line === match : (line: string) => match.test(line);
    this.responders.push({ match: test, replies });
    return this;
  }

  getReceivedLines(): string[] {
    return [...this.receivedLines];
  }

  clearReceivedLines(): void {
    this.receivedLines = [];
  }

  getClientCount(): number {
    return this.clients.size;
  }

  isRunning(): boolean {
    return this.server !== null;
  }

  // ---------------------------------------------------------------------------
  // Event Handling
  // ---------------------------------------------------------------------------

  onEvent(handler: SimulatorEventHandler): void {
    this.eventHandlers.add(handler);
  }

  offEvent(handler: SimulatorEventHandler): void {
    this.eventHandlers.delete(handler);
  }

  private emitEvent(event: SimulatorEvent): void {
    this.eventLog.push(event);

    for (const handler of this.eventHandlers) {
      try {
        handler(event);
      } catch (error) {
        this.logger.error({ err: error }, 'Simulator event handler error');
      }
    }
  }

  getEventLog(): SimulatorEvent[] {
    return [...this.eventLog];
  }

  /**
   * Wait until a received line satisfies `predicate`. Lines already
   * received count.
   */
  async waitForLine(predicate: (line: string) => boolean, timeout = 5000): Promise<string> {
    const seen = this.receivedLines.find(predicate);
    if (seen !== undefined) return seen;

    return new Promise((resolve, reject) => {
      const timer = setTimeout(() => {
        this.offEvent(handler);
        reject(new Error('Timeout waiting for line'));
      }, timeout);

      const handler: SimulatorEventHandler = (event) => {
        if (event.type === 'line_received' && event.data !== undefined && predicate(event.data)) {
          clearTimeout(timer);
          this.offEvent(handler);
          resolve(event.data);
        }
      };

      this.onEvent(handler);
    });
  }
}
