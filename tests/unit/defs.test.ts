/**
 * Protocol Definitions Unit Tests
 */

import { describe, it, expect } from 'vitest';
import {
  HardwareType,
  Var,
  describeHardware,
  hasTypeInResponse,
  isEventBased,
  nativeValueToTime,
  rampValueToTime,
  roundHalfEven,
  shouldPollStatusAfterCommand,
  thrsIdToVar,
  timeToNativeValue,
  timeToRampValue,
  toHardwareType,
  toThrsId,
  toThrsRegisterId,
  varIdToVar,
} from '../../src/core/protocol/defs.js';

describe('Protocol definitions', () => {
  describe('roundHalfEven', () => {
    it('should round ties to the even neighbour', () => {
      expect(roundHalfEven(100.5)).toBe(100);
      expect(roundHalfEven(101.5)).toBe(102);
      expect(roundHalfEven(0.5)).toBe(0);
      expect(roundHalfEven(-1.5)).toBe(-2);
      expect(roundHalfEven(-0.5)).toBe(0);
    });

    it('should round other values to the nearest integer', () => {
      expect(roundHalfEven(100.6)).toBe(101);
      expect(roundHalfEven(100.4)).toBe(100);
      expect(roundHalfEven(-2.7)).toBe(-3);
    });
  });

  describe('ramp values', () => {
    it('should map short times to the fixed table', () => {
      expect(timeToRampValue(0)).toBe(0);
      expect(timeToRampValue(250)).toBe(1);
      expect(timeToRampValue(999)).toBe(3);
      expect(timeToRampValue(1000)).toBe(4);
      expect(timeToRampValue(5999)).toBe(9);
    });

    it('should map long times linearly and clamp at 250', () => {
      expect(timeToRampValue(6000)).toBe(10);
      expect(timeToRampValue(10000)).toBe(12);
      expect(timeToRampValue(1_000_000)).toBe(250);
    });

    it('should convert ramp values back to times', () => {
      expect(rampValueToTime(4)).toBe(1000);
      expect(rampValueToTime(10)).toBe(6000);
      expect(rampValueToTime(11)).toBe(8000);
      expect(() => rampValueToTime(251)).toThrow(RangeError);
    });
  });

  describe('native timer values', () => {
    it('should convert the range ends', () => {
      expect(timeToNativeValue(0)).toBe(0);
      expect(timeToNativeValue(960)).toBe(32);
      expect(timeToNativeValue(240960)).toBe(255);
    });

    it('should convert native values back to times', () => {
      expect(nativeValueToTime(0)).toBe(0);
      expect(nativeValueToTime(32)).toBe(960);
      expect(nativeValueToTime(255)).toBe(240960);
    });

    it('should reject out-of-range values', () => {
      expect(() => timeToNativeValue(240961)).toThrow(RangeError);
      expect(() => nativeValueToTime(256)).toThrow(RangeError);
    });
  });

  describe('hardware types', () => {
    it('should treat id 10 as UP2', () => {
      expect(toHardwareType(10)).toBe(HardwareType.UP2);
    });

    it('should map unknown ids to UNKNOWN', () => {
      expect(toHardwareType(13)).toBe(HardwareType.UNKNOWN);
      expect(describeHardware(HardwareType.UNKNOWN)).toBe('UnknownModuleType');
    });

    it('should describe known types', () => {
      expect(describeHardware(HardwareType.SH_PLUS)).toBe('LCN-SH-Plus');
    });
  });

  describe('variables', () => {
    it('should map ids to variables', () => {
      expect(varIdToVar(0)).toBe(Var.VAR1);
      expect(thrsIdToVar(0, 4)).toBe(Var.THRS5);
      expect(thrsIdToVar(3, 3)).toBe(Var.THRS4_4);
    });

    it('should reject ids outside the register', () => {
      expect(() => varIdToVar(12)).toThrow(RangeError);
      expect(() => thrsIdToVar(1, 4)).toThrow(RangeError);
      expect(() => thrsIdToVar(4, 0)).toThrow(RangeError);
    });

    it('should locate thresholds', () => {
      expect(toThrsRegisterId(Var.THRS2_3)).toBe(1);
      expect(toThrsId(Var.THRS2_3)).toBe(2);
      expect(toThrsRegisterId(Var.VAR1)).toBe(-1);
    });

    it('should know which responses carry a type', () => {
      expect(hasTypeInResponse(Var.VAR1, 0x160000)).toBe(false);
      expect(hasTypeInResponse(Var.R1VARSETPOINT, 0x160000)).toBe(false);
      expect(hasTypeInResponse(Var.VAR4, 0x160000)).toBe(true);
      expect(hasTypeInResponse(Var.VAR1, 0x170206)).toBe(true);
    });

    it('should know which variables report on their own', () => {
      expect(isEventBased(Var.R1VARSETPOINT, 0x160000)).toBe(true);
      expect(isEventBased(Var.S0INPUT2, 0x160000)).toBe(true);
      expect(isEventBased(Var.VAR1, 0x160000)).toBe(false);
      expect(isEventBased(Var.VAR1, 0x170206)).toBe(true);
    });

    it('should know when to poll after a command', () => {
      expect(shouldPollStatusAfterCommand(Var.R1VARSETPOINT, false)).toBe(false);
      expect(shouldPollStatusAfterCommand(Var.THRS1, true)).toBe(false);
      expect(shouldPollStatusAfterCommand(Var.THRS1, false)).toBe(true);
      expect(shouldPollStatusAfterCommand(Var.VAR1, true)).toBe(true);
    });
  });
});
