/**
 * PCK Definitions
 *
 * Enumerations, variable identities and value conversions shared by the
 * parser, the generator and the connection layer.
 */

// -----------------------------------------------------------------------------
// Firmware
// -----------------------------------------------------------------------------

/** Firmware age from which modules send typed variable responses. */
export const SW_AGE_TYPED_VARS = 0x170206;

/** Firmware age from which "dim all outputs" supports the native OY form. */
export const SW_AGE_DIM_ALL_NATIVE = 0x180501;

/** Firmware age assumed for groups, whose members are unknown. */
export const SW_AGE_GROUP_DEFAULT = SW_AGE_TYPED_VARS;

// -----------------------------------------------------------------------------
// Operating Modes
// -----------------------------------------------------------------------------

export const OutputPortDimMode = {
  STEPS50: 'steps50',
  STEPS200: 'steps200',
} as const;

export type OutputPortDimMode = (typeof OutputPortDimMode)[keyof typeof OutputPortDimMode];

export const OutputPortStatusMode = {
  PERCENT: 'P',
  NATIVE: 'N',
} as const;

export type OutputPortStatusMode = (typeof OutputPortStatusMode)[keyof typeof OutputPortStatusMode];

// -----------------------------------------------------------------------------
// Wire Characters
// -----------------------------------------------------------------------------

export const LedStatus = {
  OFF: 'A',
  ON: 'E',
  BLINK: 'B',
  FLICKER: 'F',
} as const;

export type LedStatus = (typeof LedStatus)[keyof typeof LedStatus];

export const LogicOpStatus = {
  NONE: 'N',
  SOME: 'T',
  ALL: 'V',
} as const;

export type LogicOpStatus = (typeof LogicOpStatus)[keyof typeof LogicOpStatus];

export const TimeUnit = {
  SECONDS: 'S',
  MINUTES: 'M',
  HOURS: 'H',
  DAYS: 'D',
} as const;

export type TimeUnit = (typeof TimeUnit)[keyof typeof TimeUnit];

export const RelayStateModifier = {
  ON: '1',
  OFF: '0',
  TOGGLE: 'U',
  NOCHANGE: '-',
} as const;

export type RelayStateModifier = (typeof RelayStateModifier)[keyof typeof RelayStateModifier];

export const KeyLockStateModifier = {
  ON: '1',
  OFF: '0',
  TOGGLE: 'U',
  NOCHANGE: '-',
} as const;

export type KeyLockStateModifier = (typeof KeyLockStateModifier)[keyof typeof KeyLockStateModifier];

export const MotorStateModifier = {
  UP: 'up',
  DOWN: 'down',
  STOP: 'stop',
  TOGGLEONOFF: 'toggle_onoff',
  TOGGLEDIR: 'toggle_dir',
  CYCLE: 'cycle',
  NOCHANGE: 'nochange',
} as const;

export type MotorStateModifier = (typeof MotorStateModifier)[keyof typeof MotorStateModifier];

/** Release time for motors on output ports (firmware before 190C). */
export const MotorReverseTime = {
  RT70: 'rt70',
  RT600: 'rt600',
  RT1200: 'rt1200',
} as const;

export type MotorReverseTime = (typeof MotorReverseTime)[keyof typeof MotorReverseTime];

/** Reference point for relative set-point and threshold commands. */
export const RelVarRef = {
  CURRENT: 'current',
  PROG: 'prog',
} as const;

export type RelVarRef = (typeof RelVarRef)[keyof typeof RelVarRef];

export const SendKeyCommand = {
  HIT: 'K',
  MAKE: 'L',
  BREAK: 'O',
  DONTSEND: '-',
} as const;

export type SendKeyCommand = (typeof SendKeyCommand)[keyof typeof SendKeyCommand];

export const BeepSound = {
  NORMAL: 'N',
  SPECIAL: 'S',
} as const;

export type BeepSound = (typeof BeepSound)[keyof typeof BeepSound];

export const KeyAction = {
  HIT: 'hit',
  MAKE: 'make',
  BREAK: 'break',
} as const;

export type KeyAction = (typeof KeyAction)[keyof typeof KeyAction];

export const BatteryStatus = {
  FULL: 'full',
  WEAK: 'weak',
} as const;

export type BatteryStatus = (typeof BatteryStatus)[keyof typeof BatteryStatus];

export const AccessControlPeriphery = {
  TRANSMITTER: 'transmitter',
  TRANSPONDER: 'transponder',
  FINGERPRINT: 'fingerprint',
  CODELOCK: 'codelock',
} as const;

export type AccessControlPeriphery = (typeof AccessControlPeriphery)[keyof typeof AccessControlPeriphery];

export const TABLE_NAMES = ['A', 'B', 'C', 'D'] as const;

// -----------------------------------------------------------------------------
// Port Counts
// -----------------------------------------------------------------------------

export const OUTPUT_COUNT = 4;
export const RELAY_COUNT = 8;
export const MOTOR_COUNT = 4;
export const BIN_SENSOR_COUNT = 8;
export const LED_COUNT = 12;
export const LOGIC_OP_COUNT = 4;
export const KEY_TABLE_COUNT = 4;
export const KEYS_PER_TABLE = 8;

// -----------------------------------------------------------------------------
// Hardware Types
// -----------------------------------------------------------------------------

export const HardwareType = {
  UNKNOWN: -1,
  SW1_0: 1,
  SW1_1: 2,
  UP1_0: 3,
  UP2: 4,
  SW2: 5,
  UP_PROFI1_PLUS: 6,
  DI12: 7,
  HU: 8,
  SH: 9,
  UPP: 11,
  SK: 12,
  LD: 14,
  SH_PLUS: 15,
  UPS: 17,
  UPS24V: 18,
  GTM: 19,
  SHS: 20,
  ESD: 21,
  EB2: 22,
  MRS: 23,
  EB11: 24,
  UMR: 25,
  UPU: 26,
  UMR24V: 27,
  SHD: 28,
  SHU: 29,
  SR6: 30,
} as const;

export type HardwareType = (typeof HardwareType)[keyof typeof HardwareType];

const HARDWARE_DESCRIPTIONS = new Map<number, string>([
  [HardwareType.SW1_0, 'LCN-SW1.0'],
  [HardwareType.SW1_1, 'LCN-SW1.1'],
  [HardwareType.UP1_0, 'LCN-UP1.0'],
  [HardwareType.UP2, 'LCN-UP2'],
  [HardwareType.SW2, 'LCN-SW2'],
  [HardwareType.UP_PROFI1_PLUS, 'LCN-UP-Profi1-Plus'],
  [HardwareType.DI12, 'LCN-DI12'],
  [HardwareType.HU, 'LCN-HU'],
  [HardwareType.SH, 'LCN-SH'],
  [HardwareType.UPP, 'LCN-UPP'],
  [HardwareType.SK, 'LCN-SK'],
  [HardwareType.LD, 'LCN-LD'],
  [HardwareType.SH_PLUS, 'LCN-SH-Plus'],
  [HardwareType.UPS, 'LCN-UPS'],
  [HardwareType.UPS24V, 'LCN-UPS24V'],
  [HardwareType.GTM, 'LCN-GTM'],
  [HardwareType.SHS, 'LCN-SHS'],
  [HardwareType.ESD, 'LCN-ESD'],
  [HardwareType.EB2, 'LCN-EB2'],
  [HardwareType.MRS, 'LCN-MRS'],
  [HardwareType.EB11, 'LCN-EB11'],
  [HardwareType.UMR, 'LCN-UMR'],
  [HardwareType.UPU, 'LCN-UPU'],
  [HardwareType.UMR24V, 'LCN-UMR24V'],
  [HardwareType.SHD, 'LCN-SHD'],
  [HardwareType.SHU, 'LCN-SHU'],
  [HardwareType.SR6, 'LCN-SR6'],
]);

const HARDWARE_TYPES: readonly HardwareType[] = Object.values(HardwareType);

/**
 * Map a reported hardware id to a known type. Id 10 is a second UP2 id.
 */
export function toHardwareType(id: number): HardwareType {
  const normalized = id === 10 ? HardwareType.UP2 : id;
  return HARDWARE_TYPES.find((type) => type === normalized) ?? HardwareType.UNKNOWN;
}

export function describeHardware(type: HardwareType): string {
  return HARDWARE_DESCRIPTIONS.get(type) ?? 'UnknownModuleType';
}

// -----------------------------------------------------------------------------
// Variables
// -----------------------------------------------------------------------------

export const Var = {
  UNKNOWN: 'UNKNOWN',
  VAR1: 'VAR1',
  VAR2: 'VAR2',
  VAR3: 'VAR3',
  VAR4: 'VAR4',
  VAR5: 'VAR5',
  VAR6: 'VAR6',
  VAR7: 'VAR7',
  VAR8: 'VAR8',
  VAR9: 'VAR9',
  VAR10: 'VAR10',
  VAR11: 'VAR11',
  VAR12: 'VAR12',
  R1VARSETPOINT: 'R1VARSETPOINT',
  R2VARSETPOINT: 'R2VARSETPOINT',
  THRS1: 'THRS1',
  THRS2: 'THRS2',
  THRS3: 'THRS3',
  THRS4: 'THRS4',
  THRS5: 'THRS5',
  THRS2_1: 'THRS2_1',
  THRS2_2: 'THRS2_2',
  THRS2_3: 'THRS2_3',
  THRS2_4: 'THRS2_4',
  THRS3_1: 'THRS3_1',
  THRS3_2: 'THRS3_2',
  THRS3_3: 'THRS3_3',
  THRS3_4: 'THRS3_4',
  THRS4_1: 'THRS4_1',
  THRS4_2: 'THRS4_2',
  THRS4_3: 'THRS4_3',
  THRS4_4: 'THRS4_4',
  S0INPUT1: 'S0INPUT1',
  S0INPUT2: 'S0INPUT2',
  S0INPUT3: 'S0INPUT3',
  S0INPUT4: 'S0INPUT4',
} as const;

export type Var = (typeof Var)[keyof typeof Var];

/** Legacy names: variables 1-3 double as T-var and regulator vars. */
export const TVAR = Var.VAR1;
export const R1VAR = Var.VAR2;
export const R2VAR = Var.VAR3;

export const VARIABLES: readonly Var[] = [
  Var.VAR1, Var.VAR2, Var.VAR3, Var.VAR4, Var.VAR5, Var.VAR6,
  Var.VAR7, Var.VAR8, Var.VAR9, Var.VAR10, Var.VAR11, Var.VAR12,
];

export const SET_POINTS: readonly Var[] = [Var.R1VARSETPOINT, Var.R2VARSETPOINT];

export const THRESHOLDS: readonly (readonly Var[])[] = [
  [Var.THRS1, Var.THRS2, Var.THRS3, Var.THRS4, Var.THRS5],
  [Var.THRS2_1, Var.THRS2_2, Var.THRS2_3, Var.THRS2_4],
  [Var.THRS3_1, Var.THRS3_2, Var.THRS3_3, Var.THRS3_4],
  [Var.THRS4_1, Var.THRS4_2, Var.THRS4_3, Var.THRS4_4],
];

export const S0_INPUTS: readonly Var[] = [Var.S0INPUT1, Var.S0INPUT2, Var.S0INPUT3, Var.S0INPUT4];

/** Every concrete variable, in status-request order. */
export const ALL_VARS: readonly Var[] = [
  ...VARIABLES,
  ...SET_POINTS,
  ...THRESHOLDS.flat(),
  ...S0_INPUTS,
];

function pick(list: readonly Var[], index: number, what: string): Var {
  const value = Number.isInteger(index) ? list[index] : undefined;
  if (value === undefined) {
    throw new RangeError(`Bad ${what}: ${index}`);
  }
  return value;
}

export function varIdToVar(varId: number): Var {
  return pick(VARIABLES, varId, 'variable id');
}

export function setPointIdToVar(setPointId: number): Var {
  return pick(SET_POINTS, setPointId, 'set-point id');
}

/**
 * Register 0 has five thresholds, registers 1-3 have four.
 */
export function thrsIdToVar(registerId: number, thrsId: number): Var {
  const register = THRESHOLDS[registerId];
  if (!register) {
    throw new RangeError(`Bad threshold register id: ${registerId}`);
  }
  return pick(register, thrsId, 'threshold id');
}

export function s0IdToVar(s0Id: number): Var {
  return pick(S0_INPUTS, s0Id, 'S0 input id');
}

/** Variable id 0..11, or -1. */
export function toVarId(v: Var): number {
  return VARIABLES.indexOf(v);
}

/** Set-point id 0..1, or -1. */
export function toSetPointId(v: Var): number {
  return SET_POINTS.indexOf(v);
}

/** Threshold register id 0..3, or -1. */
export function toThrsRegisterId(v: Var): number {
  return THRESHOLDS.findIndex((register) => register.includes(v));
}

/** Threshold id within its register (0..4), or -1. */
export function toThrsId(v: Var): number {
  for (const register of THRESHOLDS) {
    const index = register.indexOf(v);
    if (index !== -1) return index;
  }
  return -1;
}

/** S0 input id 0..3, or -1. */
export function toS0Id(v: Var): number {
  return S0_INPUTS.indexOf(v);
}

/**
 * Whether a status response for this variable names its type. Older
 * firmware answers variables 1-3 and the set-points without one.
 */
export function hasTypeInResponse(v: Var, swAge: number): boolean {
  if (swAge < SW_AGE_TYPED_VARS) {
    return !(toVarId(v) >= 0 && toVarId(v) <= 2) && toSetPointId(v) === -1;
  }
  return true;
}

/**
 * Whether the module reports changes of this variable on its own, so that
 * it only needs slow polling.
 */
export function isEventBased(v: Var, swAge: number): boolean {
  if (toSetPointId(v) !== -1 || toS0Id(v) !== -1) {
    return true;
  }
  return swAge >= SW_AGE_TYPED_VARS;
}

/**
 * Whether the status should be polled after a command changed the value,
 * because the module would not report it by itself.
 */
export function shouldPollStatusAfterCommand(v: Var, isNewFirmware: boolean): boolean {
  if (toSetPointId(v) !== -1) return false;
  if (isNewFirmware && toThrsRegisterId(v) !== -1) return false;
  return true;
}

// -----------------------------------------------------------------------------
// Time Conversions
// -----------------------------------------------------------------------------

/**
 * Round to the nearest integer, ties to the even neighbour. Decides between
 * the percent and native dimming forms.
 */
export function roundHalfEven(value: number): number {
  const floor = Math.floor(value);
  const diff = value - floor;
  if (diff > 0.5) return floor + 1;
  if (diff < 0.5) return floor;
  return floor % 2 === 0 ? floor : floor + 1;
}

const RAMP_TIMES = [0, 250, 500, 660, 1000, 1400, 2000, 3000, 4000, 5000];

/**
 * Convert a ramp duration to the module's 0..250 ramp step.
 */
export function timeToRampValue(timeMs: number): number {
  for (let step = 1; step < RAMP_TIMES.length; step++) {
    const limit = RAMP_TIMES[step] ?? 0;
    if (timeMs < limit) {
      return step - 1;
    }
  }
  if (timeMs < 6000) return 9;
  return Math.floor(Math.min((timeMs / 1000 - 6) / 2 + 10, 250));
}

export function rampValueToTime(rampValue: number): number {
  if (!Number.isInteger(rampValue) || rampValue < 0 || rampValue > 250) {
    throw new RangeError('Ramp value has to be in range 0..250');
  }
  const fixed = RAMP_TIMES[rampValue];
  if (fixed !== undefined) return fixed;
  return ((rampValue - 10) * 2 + 6) * 1000;
}

/**
 * Scale a duration (0..240960 ms) to the native 0..255 timer value used by
 * relay timers.
 */
export function timeToNativeValue(timeMs: number): number {
  if (timeMs < 0 || timeMs > 240960) {
    throw new RangeError('Time has to be in range 0..240960ms');
  }
  const scaled = timeMs / (1000 * 0.03 * 32) + 1;
  const preDecimal = Math.floor(scaled).toString(2).length - 1;
  const decimal = scaled / 2 ** preDecimal - 1;
  return Math.floor(32 * (preDecimal + decimal));
}

export function nativeValueToTime(value: number): number {
  if (!Number.isInteger(value) || value < 0 || value > 255) {
    throw new RangeError('Value has to be in range 0..255');
  }
  const preDecimal = Math.floor(value / 32);
  const decimal = value / 32 - preDecimal;
  const scaled = 2 ** preDecimal * (decimal + 1);
  return Math.floor((scaled - 1) * 1000 * 0.03 * 32);
}
