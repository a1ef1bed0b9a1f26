/**
 * Connection Manager Integration Tests
 *
 * Runs the connection manager against the in-process gateway simulator.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { MAX_LINE_BYTES, PchkConnectionManager } from '../../src/connection/manager.js';
import type { ConnectionManagerOptions } from '../../src/connection/manager.js';
import { GatewaySimulator } from '../../src/connection/simulator.js';
import type { SimulatorConfig } from '../../src/connection/simulator.js';
import {
  PchkAuthenticationError,
  PchkConnectionRefusedError,
  PchkLcnNotConnectedError,
  PchkLicenseError,
} from '../../src/connection/errors.js';
import { ConnectionState } from '../../src/connection/types.js';
import type { ConnectionEvent } from '../../src/connection/types.js';
import { moduleAddress } from '../../src/core/address.js';
import { HardwareType } from '../../src/core/protocol/defs.js';
import type { Input } from '../../src/core/protocol/inputs.js';
import type { ModuleConnection } from '../../src/connection/device.js';
import { getLogContext } from '../../src/observability/logger.js';
import type { LogContext } from '../../src/observability/logger.js';

const PASSWORD = 'test-secret';

const MODULES: SimulatorConfig['modules'] = [
  { moduleId: 7, serial: '1AB20A1234', manu: '01', firmware: '190B11', hardwareType: 15 },
  { moduleId: 12, serial: '0000C0FFEE', manu: '01', firmware: '170206', hardwareType: 11 },
];

describe('PchkConnectionManager Integration', () => {
  let simulator: GatewaySimulator;
  let manager: PchkConnectionManager | null;

  async function startSimulator(config: Partial<SimulatorConfig> = {}): Promise<void> {
    simulator = new GatewaySimulator({ password: PASSWORD, ...config });
    await simulator.start();
  }

  function createManager(options: ConnectionManagerOptions = {}): PchkConnectionManager {
    manager = new PchkConnectionManager({
      host: '127.0.0.1',
      port: simulator.getPort(),
      username: 'lcn',
      password: PASSWORD,
      ...options,
      settings: {
        numTries: 2,
        skNumTries: 1,
        defaultTimeoutMs: 100,
        busIdleTimeMs: 0,
        ...options.settings,
      },
    });
    return manager;
  }

  beforeEach(() => {
    manager = null;
  });

  afterEach(async () => {
    await manager?.close();
    await simulator.stop();
  });

  describe('connection', () => {
    it('should log in and become ready', async () => {
      await startSimulator();
      const conn = createManager();

      await conn.connect(2000);

      expect(conn.isReady()).toBe(true);
      expect(conn.getState()).toMatchObject({
        connectionState: ConnectionState.READY,
        socketConnected: true,
        busConnected: true,
        segmentScanCompleted: true,
        localSegmentId: 0,
        segmentCouplerIds: [],
      });
    });

    it('should walk through the handshake states', async () => {
      await startSimulator();
      const conn = createManager();
      const states: ConnectionState[] = [];
      conn.onEvent((event) => {
        if (event.type === 'state_changed') states.push(event.to);
      });

      await conn.connect(2000);

      expect(states).toEqual([
        ConnectionState.SOCKET_CONNECTING,
        ConnectionState.SOCKET_CONNECTED,
        ConnectionState.AWAITING_USERNAME,
        ConnectionState.AWAITING_PASSWORD,
        ConnectionState.AUTHENTICATED,
        ConnectionState.SCANNING_SEGMENT,
        ConnectionState.READY,
      ]);
    });

    it('should switch modes, start the keepalive and scan for segment couplers', async () => {
      await startSimulator();
      const conn = createManager();

      await conn.connect(2000);
      await waitFor(() => simulator.getReceivedLines().length >= 4, 2000);

      expect(simulator.getReceivedLines().slice(0, 4)).toEqual(['!CHD', '!OM0P', '^ping0', '>G003003.SK']);
    });

    it('should take the local segment id from the segment coupler', async () => {
      await startSimulator({ segmentId: 20 });
      const conn = createManager();
      const events: ConnectionEvent[] = [];
      conn.onEvent((event) => events.push(event));

      await conn.connect(2000);

      expect(conn.getLocalSegmentId()).toBe(20);
      expect(events).toContainEqual({ type: 'segment_scan_completed', localSegmentId: 20, couplerIds: [20] });
    });

    it('should move modules created before the segment was known to the resolved segment', async () => {
      await startSimulator({ segmentId: 20 });
      const conn = createManager();
      let early: ModuleConnection | null = null;
      conn.onEvent((event) => {
        if (event.type === 'bus_connected' && early === null) {
          early = conn.getModuleConn(moduleAddress(0, 7), false);
        }
      });

      await conn.connect(2000);

      expect(early).not.toBeNull();
      expect(conn.getModuleConns()).toEqual([early]);
      expect(conn.getModuleConn(moduleAddress(20, 7), false)).toBe(early);
      expect(conn.getModuleConn(moduleAddress(0, 7), false)).toBe(early);
      expect(conn.getModuleConns()[0]?.address).toEqual(moduleAddress(20, 7));
    });

    it('should refuse bus commands before the bus is connected', async () => {
      await startSimulator();
      const conn = createManager();

      expect(conn.sendCommand('>M000007.SMR')).toBe(false);
    });
  });

  describe('connection failures', () => {
    it('should reject with an authentication error on wrong credentials', async () => {
      await startSimulator();
      const conn = createManager({ password: 'wrong-secret' });

      await expect(conn.connect(2000)).rejects.toBeInstanceOf(PchkAuthenticationError);
      expect(conn.isConnected()).toBe(false);
    });

    it('should reject with a license error', async () => {
      await startSimulator({ licenseError: true });
      const conn = createManager();

      await expect(conn.connect(2000)).rejects.toBeInstanceOf(PchkLicenseError);
    });

    it('should reject with a refused error when nothing listens', async () => {
      await startSimulator();
      const port = simulator.getPort();
      await simulator.stop();
      const conn = createManager({ port });

      await expect(conn.connect(2000)).rejects.toBeInstanceOf(PchkConnectionRefusedError);
    });

    it('should reject with a not-connected error when the bus never comes up', async () => {
      await startSimulator({ busConnected: false });
      const conn = createManager();

      await expect(conn.connect(500)).rejects.toBeInstanceOf(PchkLcnNotConnectedError);
      expect(conn.getState().connectionState).toBe(ConnectionState.DISCONNECTED);
    });
  });

  describe('bus and socket loss', () => {
    it('should reset bus state when the bus disconnects and rescan when it returns', async () => {
      await startSimulator();
      const conn = createManager();
      await conn.connect(2000);
      conn.getModuleConn(moduleAddress(0, 7), false);

      simulator.setBusConnected(false);
      await waitFor(() => conn.getState().connectionState === ConnectionState.BUS_DISCONNECTED, 2000);

      expect(conn.isReady()).toBe(false);
      expect(conn.getModuleConns()).toEqual([]);
      expect(conn.getLocalSegmentId()).toBe(-1);

      simulator.setBusConnected(true);
      await waitFor(() => conn.isReady(), 2000);
      expect(conn.getLocalSegmentId()).toBe(0);
    });

    it('should not resolve status requests from before a bus disconnect after it returns', async () => {
      await startSimulator();
      const conn = createManager();
      await conn.connect(2000);
      const mod = conn.getModuleConn(moduleAddress(0, 7), false);
      const stale = mod.requestStatusRelays();
      await simulator.waitForLine((line) => line === '>M000007.SMR', 2000);

      simulator.setBusConnected(false);
      await waitFor(() => conn.getState().connectionState === ConnectionState.BUS_DISCONNECTED, 2000);
      simulator.setBusConnected(true);
      await waitFor(() => conn.isReady(), 2000);
      simulator.sendMessage(':M000007Rx005');

      await waitFor(() => conn.getModuleConns().length === 1, 2000);

      await expect(stale).resolves.toBeNull();
      expect(conn.getModuleConns()[0]).not.toBe(mod);
    });

    it('should report a lost connection', async () => {
      await startSimulator();
      const conn = createManager();
      const events: ConnectionEvent[] = [];
      conn.onEvent((event) => events.push(event));
      await conn.connect(2000);

      simulator.dropClients();
      await waitFor(() => events.some((event) => event.type === 'connection_lost'), 2000);

      expect(conn.isConnected()).toBe(false);
      expect(conn.getState().connectionState).toBe(ConnectionState.DISCONNECTED);
    });

    it('should report unanswered keepalives', async () => {
      await startSimulator({ answerPings: false });
      const conn = createManager({ settings: { pingRecvTimeoutMs: 100 } });
      const events: ConnectionEvent[] = [];
      conn.onEvent((event) => events.push(event));

      await conn.connect(2000);
      await waitFor(() => events.some((event) => event.type === 'ping_timeout'), 2000);

      expect(conn.getMetrics().pingTimeouts).toBe(1);
    });
  });

  describe('modules', () => {
    it('should discover modules and read their serials', async () => {
      await startSimulator({ modules: MODULES });
      const conn = createManager();
      await conn.connect(2000);

      await conn.scanModules(1, 300);
      await waitFor(() => {
        const mods = conn.getModuleConns();
        return mods.length === 2 && mods.every((mod) => mod.getSerial() !== null);
      }, 2000);

      expect(simulator.getReceivedLines()).toContain('>G000003!LEER');
      expect(conn.dumpModules()).toEqual({
        '0': {
          '7': {
            segmentId: 0,
            moduleId: 7,
            serial: '1AB20A1234',
            firmware: '190B11',
            hardwareType: HardwareType.SH_PLUS,
            hardwareName: 'LCN-SH-Plus',
            pendingAcks: 0,
          },
          '12': {
            segmentId: 0,
            moduleId: 12,
            serial: '0000C0FFEE',
            firmware: '170206',
            hardwareType: HardwareType.UPP,
            hardwareName: 'LCN-UPP',
            pendingAcks: 0,
          },
        },
      });
    });

    it('should deliver acknowledged commands', async () => {
      await startSimulator({ modules: MODULES });
      const conn = createManager();
      await conn.connect(2000);
      const mod = conn.getModuleConn(moduleAddress(0, 7), false);

      mod.dimOutput(0, 50, 0);

      await simulator.waitForLine((line) => line === '>M000007!A1DI050000', 2000);
      await waitFor(() => mod.getPendingAckCount() === 0, 2000);
    });

    it('should answer status requests from module responses', async () => {
      await startSimulator();
      simulator.respondTo('>M000007.SMR', [':M000007Rx005']);
      const conn = createManager();
      await conn.connect(2000);
      const mod = conn.getModuleConn(moduleAddress(0, 7), false);

      const relays = await mod.requestStatusRelays();

      expect(relays?.states).toEqual([true, false, true, false, false, false, false, false]);
    });

    it('should map segment 0 responses onto the local segment', async () => {
      await startSimulator({ segmentId: 20 });
      simulator.respondTo('>M000007.SMR', [':M000007Rx001']);
      const conn = createManager();
      await conn.connect(2000);
      const mod = conn.getModuleConn(moduleAddress(20, 7), false);

      const relays = await mod.requestStatusRelays();

      expect(relays?.source).toEqual(moduleAddress(20, 7));
      expect(simulator.getReceivedLines()).toContain('>M000007.SMR');
    });

    it('should pass module inputs to input handlers', async () => {
      await startSimulator();
      const conn = createManager();
      const received: Input[] = [];
      conn.onInput((input) => received.push(input));
      await conn.connect(2000);

      simulator.sendMessage(':M000007A1050');
      await waitFor(() => received.length > 0, 2000);

      expect(received[0]).toEqual({
        type: 'mod_status_output',
        source: moduleAddress(0, 7),
        outputId: 0,
        percent: 50,
      });
    });

    it('should route inputs inside the connection log context', async () => {
      await startSimulator();
      const conn = createManager();
      const contexts: Array<LogContext | undefined> = [];
      conn.onInput(() => contexts.push(getLogContext()));
      await conn.connect(2000);

      simulator.sendMessage(':M000007A1050');
      await waitFor(() => contexts.length > 0, 2000);

      expect(contexts[0]).toEqual({ connectionId: 'PCHK', host: `127.0.0.1:${simulator.getPort()}` });
      expect(getLogContext()).toBeUndefined();
    });

    it('should drop a partial line over the length limit and keep reading', async () => {
      await startSimulator();
      const conn = createManager();
      const received: Input[] = [];
      conn.onInput((input) => received.push(input));
      await conn.connect(2000);

      simulator.sendRaw(Buffer.alloc(MAX_LINE_BYTES + 1, 0x41));
      await waitFor(() => conn.getMetrics().oversizedLines === 1, 2000);
      simulator.sendMessage(':M000007A1050');
      await waitFor(() => received.length > 0, 2000);

      expect(received[0]).toMatchObject({ type: 'mod_status_output', outputId: 0, percent: 50 });
    });

    it('should decode lines that are not UTF-8 as windows-1250', async () => {
      await startSimulator();
      const conn = createManager();
      const received: Input[] = [];
      conn.onInput((input) => received.push(input));
      await conn.connect(2000);

      const line = Buffer.concat([Buffer.from('=M000007.N1'), Buffer.from([0x8a]), Buffer.from('kola')]);
      simulator.sendMessage(line);
      await waitFor(() => received.length > 0, 2000);

      expect(received[0]).toMatchObject({ type: 'mod_name_comment', blockId: 0, text: 'Škola' });
    });
  });
});

async function waitFor(condition: () => boolean, timeout: number): Promise<void> {
  const start = Date.now();
  while (!condition()) {
    if (Date.now() - start > timeout) {
      throw new Error('Timeout waiting for condition');
    }
    await new Promise((resolve) => setTimeout(resolve, 50));
  }
}
