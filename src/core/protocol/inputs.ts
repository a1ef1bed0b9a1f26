/**
 * Parsed Inputs
 *
 * Closed set of message kinds the gateway can send. The parser returns these
 * as plain tagged values; consumers switch on `type`.
 */

import type { Address } from '../address.js';
import type {
  AccessControlPeriphery,
  BatteryStatus,
  HardwareType,
  KeyAction,
  LedStatus,
  LogicOpStatus,
  SendKeyCommand,
  Var,
} from './defs.js';

// -----------------------------------------------------------------------------
// Input Types
// -----------------------------------------------------------------------------

export const InputType = {
  // Gateway (host) messages
  AUTH_USERNAME: 'auth_username',
  AUTH_PASSWORD: 'auth_password',
  AUTH_OK: 'auth_ok',
  AUTH_FAILED: 'auth_failed',
  LCN_CONN_STATE: 'lcn_conn_state',
  LICENSE_ERROR: 'license_error',
  DEC_MODE_SET: 'dec_mode_set',
  COMMAND_ERROR: 'command_error',
  PING: 'ping',

  // Module messages
  MOD_ACK: 'mod_ack',
  MOD_SK: 'mod_sk',
  MOD_SN: 'mod_sn',
  MOD_NAME_COMMENT: 'mod_name_comment',
  MOD_STATUS_GROUPS: 'mod_status_groups',
  MOD_STATUS_OUTPUT: 'mod_status_output',
  MOD_STATUS_OUTPUT_NATIVE: 'mod_status_output_native',
  MOD_STATUS_RELAYS: 'mod_status_relays',
  MOD_STATUS_BIN_SENSORS: 'mod_status_bin_sensors',
  MOD_STATUS_VAR: 'mod_status_var',
  MOD_STATUS_LEDS_AND_LOGIC_OPS: 'mod_status_leds_and_logic_ops',
  MOD_STATUS_KEY_LOCKS: 'mod_status_key_locks',
  MOD_STATUS_SCENE_OUTPUTS: 'mod_status_scene_outputs',
  MOD_SEND_COMMAND_HOST: 'mod_send_command_host',
  MOD_SEND_KEYS_HOST: 'mod_send_keys_host',
  MOD_STATUS_ACCESS_CONTROL: 'mod_status_access_control',

  UNKNOWN: 'unknown',
} as const;

export type InputType = (typeof InputType)[keyof typeof InputType];

// -----------------------------------------------------------------------------
// Host Inputs
// -----------------------------------------------------------------------------

export interface AuthUsernameInput {
  type: 'auth_username';
}

export interface AuthPasswordInput {
  type: 'auth_password';
}

export interface AuthOkInput {
  type: 'auth_ok';
}

export interface AuthFailedInput {
  type: 'auth_failed';
}

export interface LcnConnStateInput {
  type: 'lcn_conn_state';
  connected: boolean;
}

export interface LicenseErrorInput {
  type: 'license_error';
}

export interface DecModeSetInput {
  type: 'dec_mode_set';
}

export interface CommandErrorInput {
  type: 'command_error';
  message: string;
}

export interface PingInput {
  type: 'ping';
  /** Echoed counter, null when the reply carries none */
  count: number | null;
}

export type HostInput =
  | AuthUsernameInput
  | AuthPasswordInput
  | AuthOkInput
  | AuthFailedInput
  | LcnConnStateInput
  | LicenseErrorInput
  | DecModeSetInput
  | CommandErrorInput
  | PingInput;

// -----------------------------------------------------------------------------
// Module Inputs
// -----------------------------------------------------------------------------

interface ModInputBase {
  /** Sender address. Physical until the connection rewrites it. */
  source: Address;
}

export interface ModAckInput extends ModInputBase {
  type: 'mod_ack';
  /** -1 for a positive acknowledge, otherwise the module's error code */
  code: number;
}

export interface ModSkInput extends ModInputBase {
  type: 'mod_sk';
  reportedSegmentId: number;
}

export interface ModSnInput extends ModInputBase {
  type: 'mod_sn';
  serial: number;
  manu: number;
  swAge: number;
  hardwareType: HardwareType;
}

export interface ModNameCommentInput extends ModInputBase {
  type: 'mod_name_comment';
  /** N = name, K = comment, O = OEM text */
  command: 'N' | 'K' | 'O';
  blockId: number;
  text: string;
}

export interface ModStatusGroupsInput extends ModInputBase {
  type: 'mod_status_groups';
  dynamic: boolean;
  maxGroups: number;
  groups: Address[];
}

export interface ModStatusOutputInput extends ModInputBase {
  type: 'mod_status_output';
  outputId: number;
  percent: number;
}

export interface ModStatusOutputNativeInput extends ModInputBase {
  type: 'mod_status_output_native';
  outputId: number;
  /** 0..200 */
  value: number;
}

export interface ModStatusRelaysInput extends ModInputBase {
  type: 'mod_status_relays';
  states: boolean[];
}

export interface ModStatusBinSensorsInput extends ModInputBase {
  type: 'mod_status_bin_sensors';
  states: boolean[];
}

export interface ModStatusVarInput extends ModInputBase {
  type: 'mod_status_var';
  /** Var.UNKNOWN for typeless responses until the module resolves it */
  var: Var;
  /** Native value */
  value: number;
}

export interface ModStatusLedsAndLogicOpsInput extends ModInputBase {
  type: 'mod_status_leds_and_logic_ops';
  ledStates: LedStatus[];
  logicOpStates: LogicOpStatus[];
}

export interface ModStatusKeyLocksInput extends ModInputBase {
  type: 'mod_status_key_locks';
  /** One 8-entry table per reported key table (3 or 4) */
  states: boolean[][];
}

export interface ModStatusSceneOutputsInput extends ModInputBase {
  type: 'mod_status_scene_outputs';
  sceneId: number;
  values: number[];
  ramps: number[];
}

export interface ModSendCommandHostInput extends ModInputBase {
  type: 'mod_send_command_host';
  parameters: number[];
}

export interface ModSendKeysHostInput extends ModInputBase {
  type: 'mod_send_keys_host';
  /** Commands for tables A-C */
  actions: SendKeyCommand[];
  keys: boolean[];
}

export interface TransmitterDetails {
  level: number;
  key: number;
  action: KeyAction;
  battery: BatteryStatus;
}

export interface ModStatusAccessControlInput extends ModInputBase {
  type: 'mod_status_access_control';
  periphery: AccessControlPeriphery;
  /** Lowercase hex */
  code: string;
  /** Only present for transmitters */
  transmitter: TransmitterDetails | null;
}

export type ModInput =
  | ModAckInput
  | ModSkInput
  | ModSnInput
  | ModNameCommentInput
  | ModStatusGroupsInput
  | ModStatusOutputInput
  | ModStatusOutputNativeInput
  | ModStatusRelaysInput
  | ModStatusBinSensorsInput
  | ModStatusVarInput
  | ModStatusLedsAndLogicOpsInput
  | ModStatusKeyLocksInput
  | ModStatusSceneOutputsInput
  | ModSendCommandHostInput
  | ModSendKeysHostInput
  | ModStatusAccessControlInput;

// -----------------------------------------------------------------------------
// Other
// -----------------------------------------------------------------------------

export interface UnknownInput {
  type: 'unknown';
  data: string;
}

export type Input = HostInput | ModInput | UnknownInput;

export type InputOfType<T extends InputType> = Extract<Input, { type: T }>;

export type InputHandler = (input: Input) => void;

// -----------------------------------------------------------------------------
// Type Guards
// -----------------------------------------------------------------------------

export function isModInput(input: Input): input is ModInput {
  return 'source' in input;
}

export function isInputOfType<T extends InputType>(input: Input, type: T): input is InputOfType<T> {
  return input.type === type;
}
