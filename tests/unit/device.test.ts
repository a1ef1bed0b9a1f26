/**
 * Device Connection Unit Tests
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { GroupConnection, ModuleConnection } from '../../src/connection/device.js';
import { StatusRequester } from '../../src/connection/status-requester.js';
import { DEFAULT_CONNECTION_SETTINGS } from '../../src/connection/types.js';
import type { CommandTarget, ConnectionSettings, DeviceHost, RequesterHost } from '../../src/connection/types.js';
import { addressKey, groupAddress, moduleAddress } from '../../src/core/address.js';
import type { Address } from '../../src/core/address.js';
import { HardwareType, OutputPortStatusMode, Var } from '../../src/core/protocol/defs.js';
import type { ModInput } from '../../src/core/protocol/inputs.js';
import type { PckCommand } from '../../src/core/protocol/generator.js';

// -----------------------------------------------------------------------------
// Fake Connection
// -----------------------------------------------------------------------------

class FakeHost implements DeviceHost, RequesterHost {
  readonly settings: ConnectionSettings;
  readonly statusRequester: StatusRequester;
  readonly sent: string[] = [];
  private readonly targets: Map<string, CommandTarget> = new Map();

  constructor(settings: Partial<ConnectionSettings> = {}) {
    this.settings = {
      ...DEFAULT_CONNECTION_SETTINGS,
      numTries: 3,
      defaultTimeoutMs: 1000,
      acknowledge: false,
      ...settings,
    };
    this.statusRequester = new StatusRequester(this);
  }

  getLocalSegmentId(): number {
    return 0;
  }

  sendCommand(pck: PckCommand): boolean {
    this.sent.push(typeof pck === 'string' ? pck : Buffer.from(pck).toString('utf-8'));
    return true;
  }

  waitForSegmentScan(): Promise<boolean> {
    return Promise.resolve(true);
  }

  getAddressConn(address: Address): CommandTarget {
    const target = this.targets.get(addressKey(address));
    if (!target) {
      throw new RangeError(`No connection for ${addressKey(address)}`);
    }
    return target;
  }

  addModule(moduleId: number, wantsAck?: boolean): ModuleConnection {
    const conn = new ModuleConnection(this, moduleAddress(0, moduleId), wantsAck);
    this.targets.set(addressKey(conn.address), conn);
    return conn;
  }

  /** Route an input the way the connection does: module first, then requester. */
  deliver(conn: ModuleConnection, input: ModInput): void {
    this.statusRequester.processInput(conn.processInput(input));
  }
}

const MODULE = moduleAddress(0, 7);

function serialInput(swAge: number): ModInput {
  return {
    type: 'mod_sn',
    source: MODULE,
    serial: 0x1ab20a1234,
    manu: 1,
    swAge,
    hardwareType: HardwareType.SH_PLUS,
  };
}

describe('ModuleConnection', () => {
  let host: FakeHost;

  beforeEach(() => {
    vi.useFakeTimers();
    host = new FakeHost();
  });

  afterEach(() => {
    host.statusRequester.cancelAll();
    vi.useRealTimers();
  });

  describe('commands', () => {
    it('should prefix commands with the module header', () => {
      const conn = host.addModule(7);

      expect(conn.dimOutput(0, 50, 0)).toBe(true);
      expect(host.sent).toEqual(['>M000007.A1DI050000']);
    });

    it('should send dynamic text as raw parts', () => {
      const conn = host.addModule(7);

      conn.dynText(0, 'Hello');

      expect(host.sent).toEqual(['>M000007.GTDT11Hello']);
    });

    it('should switch the scene register before activating a scene', () => {
      const conn = host.addModule(7);

      conn.activateScene(0, 2, [0], [1]);

      expect(host.sent).toEqual(['>M000007.SZW000', '>M000007.SZA1002', '>M000007.SZA000201000000']);
    });

    it('should set plain variables by reset and increment', () => {
      const conn = host.addModule(7);

      conn.varAbs(Var.VAR1, 25);

      expect(host.sent).toEqual(['>M000007.Z-0014090', '>M000007.ZA25']);
    });
  });

  describe('acknowledged commands', () => {
    it('should deliver one acknowledged command at a time', async () => {
      const conn = host.addModule(7, true);

      conn.dimOutput(0, 50, 0);
      conn.toggleOutput(1, 0);
      await vi.advanceTimersByTimeAsync(0);

      expect(host.sent).toEqual(['>M000007!A1DI050000']);
      expect(conn.getPendingAckCount()).toBe(2);

      conn.processInput({ type: 'mod_ack', source: MODULE, code: -1 });
      await vi.advanceTimersByTimeAsync(0);

      expect(host.sent).toEqual(['>M000007!A1DI050000', '>M000007!A2TA000']);

      conn.processInput({ type: 'mod_ack', source: MODULE, code: -1 });
      expect(conn.getPendingAckCount()).toBe(0);
    });

    it('should resend until the try budget is spent', async () => {
      const conn = host.addModule(7, true);

      conn.beep('N', 1);
      await vi.advanceTimersByTimeAsync(2000);

      expect(host.sent).toEqual(['>M000007!PIN001', '>M000007!PIN001', '>M000007!PIN001']);
      expect(conn.getPendingAckCount()).toBe(1);

      await vi.advanceTimersByTimeAsync(1000);
      expect(conn.getPendingAckCount()).toBe(0);
      expect(host.sent).toHaveLength(3);
    });

    it('should advance the queue on negative acknowledges', async () => {
      const conn = host.addModule(7, true);

      conn.beep('N', 1);
      conn.beep('S', 2);
      await vi.advanceTimersByTimeAsync(0);
      conn.processInput({ type: 'mod_ack', source: MODULE, code: 5 });
      await vi.advanceTimersByTimeAsync(0);

      expect(host.sent).toEqual(['>M000007!PIN001', '>M000007!PIS002']);
    });

    it('should drop queued commands on cancelRequests', async () => {
      const conn = host.addModule(7, true);

      conn.beep('N', 1);
      conn.beep('N', 2);
      conn.cancelRequests();
      await vi.advanceTimersByTimeAsync(5000);

      expect(host.sent).toEqual([]);
      expect(conn.getPendingAckCount()).toBe(0);
    });
  });

  describe('serial discovery', () => {
    it('should request the serial until the module answers', async () => {
      const conn = host.addModule(7);

      await conn.requestSerials();
      await vi.advanceTimersByTimeAsync(1000);
      expect(host.sent).toEqual(['>M000007.SN', '>M000007.SN']);

      conn.processInput(serialInput(0x190b11));
      await vi.advanceTimersByTimeAsync(5000);

      expect(host.sent).toHaveLength(2);
      await expect(conn.waitForSerial()).resolves.toBe(true);
      expect(conn.getSwAge()).toBe(0x190b11);
    });

    it('should describe the module once the serial is known', () => {
      const conn = host.addModule(7);
      expect(conn.dumpDetails()).toMatchObject({ serial: null, firmware: null, hardwareName: null });

      conn.processInput(serialInput(0x190b11));

      expect(conn.dumpDetails()).toEqual({
        segmentId: 0,
        moduleId: 7,
        serial: '1AB20A1234',
        firmware: '190B11',
        hardwareType: HardwareType.SH_PLUS,
        hardwareName: 'LCN-SH-Plus',
        pendingAcks: 0,
      });
    });

    it('should release serial waiters with false on cancelRequests', async () => {
      const conn = host.addModule(7);
      const waiting = conn.waitForSerial();

      conn.cancelRequests();

      await expect(waiting).resolves.toBe(false);
    });
  });

  describe('status requests', () => {
    it('should request relay status through the requester', async () => {
      const conn = host.addModule(7);
      const relays: ModInput = {
        type: 'mod_status_relays',
        source: MODULE,
        states: [false, true, false, false, false, false, false, false],
      };

      const pending = conn.requestStatusRelays();
      await vi.advanceTimersByTimeAsync(0);
      expect(host.sent).toEqual(['>M000007.SMR']);

      host.deliver(conn, relays);

      await expect(pending).resolves.toBe(relays);
    });

    it('should expect native output status in native mode', async () => {
      host = new FakeHost({ statusMode: OutputPortStatusMode.NATIVE });
      const conn = host.addModule(7);
      const native: ModInput = { type: 'mod_status_output_native', source: MODULE, outputId: 1, value: 150 };

      const pending = conn.requestStatusOutput(1);
      await vi.advanceTimersByTimeAsync(0);
      host.deliver(conn, native);

      await expect(pending).resolves.toBe(native);
      expect(host.sent).toEqual(['>M000007.SMA2']);
    });

    it('should attribute typeless variable responses on old firmware', async () => {
      const conn = host.addModule(7);
      conn.processInput(serialInput(0x160000));

      const pending = conn.requestStatusVar(Var.VAR1);
      await vi.advanceTimersByTimeAsync(0);
      expect(host.sent).toEqual(['>M000007.MWV']);

      host.deliver(conn, { type: 'mod_status_var', source: MODULE, var: Var.UNKNOWN, value: 42 });

      await expect(pending).resolves.toEqual({ type: 'mod_status_var', source: MODULE, var: Var.VAR1, value: 42 });
    });

    it('should assemble names from their blocks', async () => {
      const conn = host.addModule(7);

      const pending = conn.requestName();
      await vi.advanceTimersByTimeAsync(0);
      host.deliver(conn, { type: 'mod_name_comment', source: MODULE, command: 'N', blockId: 0, text: 'Living room ' });
      await vi.advanceTimersByTimeAsync(0);
      host.deliver(conn, { type: 'mod_name_comment', source: MODULE, command: 'N', blockId: 1, text: 'lights      ' });

      await expect(pending).resolves.toBe('Living room lights');
      expect(host.sent).toEqual(['>M000007.NMN1', '>M000007.NMN2']);
    });

    it('should report group memberships as logical addresses', async () => {
      const conn = host.addModule(7);

      const pending = conn.requestGroupMemberships(true);
      await vi.advanceTimersByTimeAsync(0);
      host.deliver(conn, {
        type: 'mod_status_groups',
        source: MODULE,
        dynamic: true,
        maxGroups: 12,
        groups: [groupAddress(0, 5)],
      });

      await expect(pending).resolves.toEqual([groupAddress(0, 5)]);
      expect(host.sent).toEqual(['>M000007.GD']);
    });
  });

  describe('input handlers', () => {
    it('should notify handlers until they unsubscribe', () => {
      const conn = host.addModule(7);
      const received: ModInput[] = [];
      const unsubscribe = conn.registerForInputs((input) => received.push(input));
      const ack: ModInput = { type: 'mod_ack', source: MODULE, code: -1 };

      conn.processInput(ack);
      unsubscribe();
      conn.processInput(ack);

      expect(received).toEqual([ack]);
    });

    it('should keep notifying when a handler throws', () => {
      const conn = host.addModule(7);
      const received: ModInput[] = [];
      conn.registerForInputs(() => {
        throw new Error('boom');
      });
      conn.registerForInputs((input) => received.push(input));

      conn.processInput({ type: 'mod_ack', source: MODULE, code: -1 });

      expect(received).toHaveLength(1);
    });
  });
});

describe('GroupConnection', () => {
  let host: FakeHost;

  beforeEach(() => {
    host = new FakeHost();
  });

  it('should never request acknowledges', () => {
    const group = new GroupConnection(host, groupAddress(0, 5));

    group.toggleAllOutputs(0);

    expect(host.sent).toEqual(['>G000005.AU000']);
  });

  it('should send threshold changes in both encodings', () => {
    const group = new GroupConnection(host, groupAddress(0, 5));

    group.varRel(Var.THRS2, 5);

    expect(host.sent).toEqual(['>G000005.SSR0005AR12', '>G000005.SSR0005A01000']);
  });

  it('should send only the typed form for newer variables', () => {
    const group = new GroupConnection(host, groupAddress(0, 5));

    group.varRel(Var.VAR5, 3);

    expect(host.sent).toEqual(['>G000005.Z+0053']);
  });

  it('should update status variables through group 4', () => {
    const group = new GroupConnection(host, groupAddress(0, 4));

    group.varAbs(Var.VAR3, 300);

    expect(host.sent).toEqual(['>G000004.X2066001044']);
  });
});
