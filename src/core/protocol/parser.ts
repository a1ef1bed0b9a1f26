/**
 * PCK Parser
 *
 * Turns one received line into typed inputs. Matchers are tried in a fixed
 * order and the first structural match wins. Lines nobody recognises become
 * a single `unknown` input; parsing never fails.
 */

import { groupAddress, moduleAddress } from '../address.js';
import type { Address } from '../address.js';
import {
  AccessControlPeriphery,
  BatteryStatus,
  KeyAction,
  LedStatus,
  LogicOpStatus,
  SendKeyCommand,
  Var,
  s0IdToVar,
  setPointIdToVar,
  thrsIdToVar,
  toHardwareType,
  varIdToVar,
} from './defs.js';
import type { Input } from './inputs.js';

// -----------------------------------------------------------------------------
// Literal Messages
// -----------------------------------------------------------------------------

export const AUTH_USERNAME = 'Username:';
export const AUTH_PASSWORD = 'Password:';
export const AUTH_OK = 'OK';
export const AUTH_FAILED = 'Authentification failed.';
export const LCN_CONNECTED = '$io:#LCN:connected';
export const LCN_DISCONNECTED = '$io:#LCN:disconnected';
export const LICENSE_ERROR = '$err:(license?)';
export const DEC_MODE_SET = '(dec-mode)';

// -----------------------------------------------------------------------------
// Patterns
// -----------------------------------------------------------------------------

const PATTERN_COMMAND_ERROR = /^\((.+)\?\)/;
const PATTERN_PING = /^\^ping(\d*)/;
const PATTERN_ACK = /^-M(\d{3})(\d{3})(!|\d+)/;
const PATTERN_SK = /^=M(\d{3})(\d{3})\.SK(\d+)/;
const PATTERN_SN = /^=M(\d{3})(\d{3})\.SN([0-9A-F]{10})(..)FW([0-9A-F]{6})HW(\d+)/;
const PATTERN_NAME_COMMENT = /^=M(\d{3})(\d{3})\.([NKO])(\d)(.{0,12})/;
const PATTERN_GROUPS = /^=M(\d{3})(\d{3})\.G([DP])(\d{3})((?:\d{3}){0,12})/;
const PATTERN_OUTPUT_PERCENT = /^:M(\d{3})(\d{3})A(\d)(\d+)/;
const PATTERN_OUTPUT_NATIVE = /^:M(\d{3})(\d{3})O(\d)(\d+)/;
const PATTERN_RELAYS = /^:M(\d{3})(\d{3})Rx(\d+)/;
const PATTERN_BIN_SENSORS = /^:M(\d{3})(\d{3})Bx(\d+)/;
const PATTERN_VAR = /^%M(\d{3})(\d{3})\.A(\d{3})(\d+)/;
const PATTERN_SET_POINT = /^%M(\d{3})(\d{3})\.S(\d)(\d+)/;
const PATTERN_THRESHOLD = /^%M(\d{3})(\d{3})\.T(\d)(\d)(\d+)/;
const PATTERN_S0_INPUT = /^%M(\d{3})(\d{3})\.C(\d)(\d+)/;
const PATTERN_VAR_TYPELESS = /^%M(\d{3})(\d{3})\.(\d+)/;
const PATTERN_THRESHOLDS_REGISTER_1 = /^=M(\d{3})(\d{3})\.S1(\d{5})(\d{5})(\d{5})(\d{5})(\d{5})(\d{5})/;
const PATTERN_LEDS_AND_LOGIC_OPS = /^=M(\d{3})(\d{3})\.TL([AEBF]{12})([NTV]{4})/;
const PATTERN_KEY_LOCKS = /^=M(\d{3})(\d{3})\.TX(\d{3})(\d{3})(\d{3})(\d{3})?/;
const PATTERN_SCENE_OUTPUTS = /^=M(\d{3})(\d{3})\.SZ(\d{3})((?:\d{3}){8})/;
const PATTERN_SEND_COMMAND_HOST = /^(?:\+M004|\$M)(\d{3})(\d{3})\.SKH((?:\d{3}){2})((?:\d{3}){4})?((?:\d{3}){8})?/;
const PATTERN_SEND_KEYS_HOST = /^(?:\+M004|\$M)(\d{3})(\d{3})\.STH(\d{3})(\d{3})/;
const PATTERN_TRANSMITTER = /^=M(\d{3})(\d{3})\.ZI(\d{3})(\d{3})(\d{3})(\d{2})(\d)(\d{3})/;
const PATTERN_ACCESS_CODE = /^=M(\d{3})(\d{3})\.Z([TFC])(\d{3})(\d{3})(\d{3})/;

// -----------------------------------------------------------------------------
// Helpers
// -----------------------------------------------------------------------------

type Matcher = (data: string) => Input[] | null;

function int(value: string | undefined): number {
  return Number.parseInt(value ?? '', 10);
}

function source(match: RegExpExecArray): Address {
  return moduleAddress(int(match[1]), int(match[2]));
}

function oneOf<T extends string>(values: readonly T[], value: string | undefined): T {
  const found = values.find((candidate) => candidate === value);
  if (found === undefined) {
    throw new RangeError(`Unexpected value: ${String(value)}`);
  }
  return found;
}

/** Split a run of fixed-width decimal fields. */
function splitFields(digits: string | undefined, width = 3): number[] {
  const result: number[] = [];
  const text = digits ?? '';
  for (let i = 0; i + width <= text.length; i += width) {
    result.push(int(text.slice(i, i + width)));
  }
  return result;
}

/**
 * Expand a 0..255 byte into 8 booleans, bit 0 first.
 */
export function getBooleanValue(byte: number): boolean[] {
  if (!Number.isInteger(byte) || byte < 0 || byte > 255) {
    throw new RangeError(`Invalid input byte: ${byte}`);
  }
  const result: boolean[] = [];
  for (let i = 0; i < 8; i++) {
    result.push((byte & (1 << i)) !== 0);
  }
  return result;
}

const LED_CHARS = Object.values(LedStatus);
const LOGIC_OP_CHARS = Object.values(LogicOpStatus);
const NAME_COMMANDS = ['N', 'K', 'O'] as const;

/** 2-bit send-key codes, lowest bits = table A. */
const SEND_KEY_CODES: readonly SendKeyCommand[] = [
  SendKeyCommand.DONTSEND,
  SendKeyCommand.HIT,
  SendKeyCommand.MAKE,
  SendKeyCommand.BREAK,
];

const KEY_ACTION_CODES = new Map<number, KeyAction>([
  [1, KeyAction.HIT],
  [2, KeyAction.MAKE],
  [3, KeyAction.BREAK],
]);

const ACCESS_CODE_PERIPHERIES = new Map<string, AccessControlPeriphery>([
  ['T', AccessControlPeriphery.TRANSPONDER],
  ['F', AccessControlPeriphery.FINGERPRINT],
  ['C', AccessControlPeriphery.CODELOCK],
]);

function accessCode(...parts: Array<string | undefined>): string {
  return parts.map((part) => int(part).toString(16).padStart(2, '0')).join('');
}

function literal(text: string, input: Input): Matcher {
  return (data) => (data === text ? [input] : null);
}

function pattern(regex: RegExp, build: (match: RegExpExecArray) => Input[]): Matcher {
  return (data) => {
    const match = regex.exec(data);
    return match ? build(match) : null;
  };
}

// -----------------------------------------------------------------------------
// Matchers (priority order)
// -----------------------------------------------------------------------------

const MATCHERS: readonly Matcher[] = [
  literal(AUTH_USERNAME, { type: 'auth_username' }),
  literal(AUTH_PASSWORD, { type: 'auth_password' }),
  literal(AUTH_OK, { type: 'auth_ok' }),
  literal(AUTH_FAILED, { type: 'auth_failed' }),
  literal(LCN_CONNECTED, { type: 'lcn_conn_state', connected: true }),
  literal(LCN_DISCONNECTED, { type: 'lcn_conn_state', connected: false }),
  literal(LICENSE_ERROR, { type: 'license_error' }),
  literal(DEC_MODE_SET, { type: 'dec_mode_set' }),

  pattern(PATTERN_COMMAND_ERROR, (m) => [{ type: 'command_error', message: m[1] ?? '' }]),

  pattern(PATTERN_PING, (m) => [{ type: 'ping', count: m[1] ? int(m[1]) : null }]),

  pattern(PATTERN_ACK, (m) => [
    { type: 'mod_ack', source: source(m), code: m[3] === '!' ? -1 : int(m[3]) },
  ]),

  pattern(PATTERN_SK, (m) => [{ type: 'mod_sk', source: source(m), reportedSegmentId: int(m[3]) }]),

  pattern(PATTERN_SN, (m) => {
    const manu = m[4] ?? '';
    return [
      {
        type: 'mod_sn',
        source: source(m),
        serial: Number.parseInt(m[3] ?? '', 16),
        manu: /^[0-9A-F]{2}$/.test(manu) ? Number.parseInt(manu, 16) : 0xff,
        swAge: Number.parseInt(m[5] ?? '', 16),
        hardwareType: toHardwareType(int(m[6])),
      },
    ];
  }),

  pattern(PATTERN_NAME_COMMENT, (m) => [
    {
      type: 'mod_name_comment',
      source: source(m),
      command: oneOf(NAME_COMMANDS, m[3]),
      blockId: int(m[4]) - 1,
      text: m[5] ?? '',
    },
  ]),

  pattern(PATTERN_GROUPS, (m) => [
    {
      type: 'mod_status_groups',
      source: source(m),
      dynamic: m[3] === 'D',
      maxGroups: int(m[4]),
      groups: splitFields(m[5]).map((groupId) => groupAddress(0, groupId)),
    },
  ]),

  pattern(PATTERN_OUTPUT_PERCENT, (m) => [
    { type: 'mod_status_output', source: source(m), outputId: int(m[3]) - 1, percent: Number(m[4]) },
  ]),

  pattern(PATTERN_OUTPUT_NATIVE, (m) => [
    { type: 'mod_status_output_native', source: source(m), outputId: int(m[3]) - 1, value: int(m[4]) },
  ]),

  pattern(PATTERN_RELAYS, (m) => [
    { type: 'mod_status_relays', source: source(m), states: getBooleanValue(int(m[3])) },
  ]),

  pattern(PATTERN_BIN_SENSORS, (m) => [
    { type: 'mod_status_bin_sensors', source: source(m), states: getBooleanValue(int(m[3])) },
  ]),

  pattern(PATTERN_VAR, (m) => [
    { type: 'mod_status_var', source: source(m), var: varIdToVar(int(m[3]) - 1), value: int(m[4]) },
  ]),

  pattern(PATTERN_SET_POINT, (m) => [
    { type: 'mod_status_var', source: source(m), var: setPointIdToVar(int(m[3]) - 1), value: int(m[4]) },
  ]),

  pattern(PATTERN_THRESHOLD, (m) => [
    {
      type: 'mod_status_var',
      source: source(m),
      var: thrsIdToVar(int(m[3]) - 1, int(m[4]) - 1),
      value: int(m[5]),
    },
  ]),

  pattern(PATTERN_S0_INPUT, (m) => [
    { type: 'mod_status_var', source: source(m), var: s0IdToVar(int(m[3]) - 1), value: int(m[4]) },
  ]),

  pattern(PATTERN_VAR_TYPELESS, (m) => [
    { type: 'mod_status_var', source: source(m), var: Var.UNKNOWN, value: int(m[3]) },
  ]),

  // Register 1 reports all five thresholds at once; the sixth field is the hysteresis.
  pattern(PATTERN_THRESHOLDS_REGISTER_1, (m) => {
    const addr = source(m);
    return [m[3], m[4], m[5], m[6], m[7]].map((value, thrsId) => ({
      type: 'mod_status_var' as const,
      source: addr,
      var: thrsIdToVar(0, thrsId),
      value: int(value),
    }));
  }),

  pattern(PATTERN_LEDS_AND_LOGIC_OPS, (m) => [
    {
      type: 'mod_status_leds_and_logic_ops',
      source: source(m),
      ledStates: [...(m[3] ?? '')].map((c) => oneOf(LED_CHARS, c)),
      logicOpStates: [...(m[4] ?? '')].map((c) => oneOf(LOGIC_OP_CHARS, c)),
    },
  ]),

  pattern(PATTERN_KEY_LOCKS, (m) => [
    {
      type: 'mod_status_key_locks',
      source: source(m),
      states: [m[3], m[4], m[5], m[6]]
        .filter((table): table is string => table !== undefined)
        .map((table) => getBooleanValue(int(table))),
    },
  ]),

  pattern(PATTERN_SCENE_OUTPUTS, (m) => {
    const fields = splitFields(m[4]);
    return [
      {
        type: 'mod_status_scene_outputs',
        source: source(m),
        sceneId: int(m[3]),
        values: fields.filter((_, i) => i % 2 === 0),
        ramps: fields.filter((_, i) => i % 2 === 1),
      },
    ];
  }),

  pattern(PATTERN_SEND_COMMAND_HOST, (m) => [
    {
      type: 'mod_send_command_host',
      source: source(m),
      parameters: [...splitFields(m[3]), ...splitFields(m[4]), ...splitFields(m[5])],
    },
  ]),

  pattern(PATTERN_SEND_KEYS_HOST, (m) => {
    const actions = int(m[3]);
    return [
      {
        type: 'mod_send_keys_host',
        source: source(m),
        actions: [0, 1, 2].map((table) => SEND_KEY_CODES[(actions >> (2 * table)) & 0x03] ?? SendKeyCommand.DONTSEND),
        keys: getBooleanValue(int(m[4])),
      },
    ];
  }),

  pattern(PATTERN_TRANSMITTER, (m) => {
    const actionCode = int(m[8]);
    const action = KEY_ACTION_CODES.get(actionCode % 10);
    if (!action) {
      throw new RangeError(`Unknown key action: ${actionCode}`);
    }
    return [
      {
        type: 'mod_status_access_control',
        source: source(m),
        periphery: AccessControlPeriphery.TRANSMITTER,
        code: accessCode(m[3], m[4], m[5]),
        transmitter: {
          level: int(m[6]),
          key: int(m[7]) - 1,
          action,
          battery: actionCode >= 10 ? BatteryStatus.WEAK : BatteryStatus.FULL,
        },
      },
    ];
  }),

  pattern(PATTERN_ACCESS_CODE, (m) => {
    const periphery = ACCESS_CODE_PERIPHERIES.get(m[3] ?? '');
    if (!periphery) {
      throw new RangeError(`Unknown access control periphery: ${String(m[3])}`);
    }
    return [
      {
        type: 'mod_status_access_control',
        source: source(m),
        periphery,
        code: accessCode(m[4], m[5], m[6]),
        transmitter: null,
      },
    ];
  }),
];

// -----------------------------------------------------------------------------
// Entry Point
// -----------------------------------------------------------------------------

/**
 * Parse one line (without terminator). Lines that match a shape but carry
 * out-of-range fields are reported as unknown.
 */
export function parse(data: string): Input[] {
  for (const matcher of MATCHERS) {
    let result: Input[] | null;
    try {
      result = matcher(data);
    } catch (error) {
      if (error instanceof RangeError) {
        return [{ type: 'unknown', data }];
      }
      throw error;
    }
    if (result) {
      return result;
    }
  }
  return [{ type: 'unknown', data }];
}
