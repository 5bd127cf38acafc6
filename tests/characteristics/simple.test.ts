import { describe, it, expect } from 'vitest';
import { BarometricPressureTrendCharacteristic } from '../../src/characteristics/barometric-pressure-trend.js';
import { BatteryLevelCharacteristic } from '../../src/characteristics/battery-level.js';
import { DeviceNameCharacteristic } from '../../src/characteristics/device-name.js';
import {
  HumidityCharacteristic,
  PressureCharacteristic,
  TemperatureCharacteristic,
} from '../../src/characteristics/environmental.js';
import { LengthMismatchError, ValueRangeError } from '../../src/errors.js';
import { expectFailure, expectSuccess, hex, instantiate } from '../helpers/codec-test-utils.js';

// ─── Battery Level ──────────────────────────────────────────────────────────

describe('Battery Level', () => {
  const battery = instantiate(BatteryLevelCharacteristic);

  it('decodes a percentage', () => {
    const result = battery.parse(hex('55'));
    expect(expectSuccess(result)).toBe(85);
    expect(result.characteristic?.unit).toBe('%');
    expect(result.raw).toEqual(hex('55'));
  });

  it('fails on an empty payload', () => {
    const failure = expectFailure(battery.parse(hex('')));
    expect(failure.errorKind).toBe('InsufficientData');
    expect(failure.message).toBe('Battery Level: need 1 bytes, got 0');
  });

  it('fails on a payload that is too long', () => {
    const failure = expectFailure(battery.parse(hex('55 00')));
    expect(failure.errorKind).toBe('LengthMismatch');
    expect(failure.message).toBe('Battery Level: expected at most 1 bytes, got 2');
  });

  it('fails when the value is out of range', () => {
    const failure = expectFailure(battery.parse(hex('65')));
    expect(failure.errorKind).toBe('ValueRange');
    expect(failure.fieldErrors).toEqual([
      { field: 'Battery Level', reason: 'Invalid Battery Level: 101 (expected range [0, 100])' },
    ]);
  });

  it('builds a value and rejects out-of-range input', () => {
    expect(battery.build(85)).toEqual(hex('55'));
    expect(() => battery.build(101)).toThrow(ValueRangeError);
  });
});

// ─── Device Name ────────────────────────────────────────────────────────────

describe('Device Name', () => {
  const name = instantiate(DeviceNameCharacteristic);

  it('decodes UTF-8 up to a NUL terminator', () => {
    expect(expectSuccess(name.parse(Buffer.from('Kit-7\0')))).toBe('Kit-7');
  });

  it('accepts an empty name', () => {
    expect(expectSuccess(name.parse(hex('')))).toBe('');
  });

  it('rejects names longer than 248 bytes', () => {
    const failure = expectFailure(name.parse(Buffer.alloc(249, 0x41)));
    expect(failure.errorKind).toBe('LengthMismatch');
    expect(() => name.build('A'.repeat(249))).toThrow(LengthMismatchError);
  });

  it('builds UTF-8 bytes', () => {
    expect(name.build('Kit')).toEqual(hex('4B 69 74'));
  });
});

// ─── Environmental sensing ──────────────────────────────────────────────────

describe('Temperature', () => {
  const temperature = instantiate(TemperatureCharacteristic);

  it('decodes hundredths of a degree', () => {
    expect(expectSuccess(temperature.parse(hex('F6 FF')))).toBe(-0.1);
    expect(expectSuccess(temperature.parse(hex('64 09')))).toBe(24.04);
  });

  it('decodes 0x8000 as not known', () => {
    const result = temperature.parse(hex('00 80'));
    expect(result.success).toBe(true);
    expect(result.value).toBeUndefined();
    expect(temperature.build(undefined)).toEqual(hex('00 80'));
  });

  it('records the scaled value in the trace', () => {
    const result = temperature.parse(hex('64 09'), undefined, { trace: true });
    expect(result.trace).toEqual([
      'Temperature: 2 bytes passed length checks',
      'temperature = 24.04',
      'Temperature: decoded',
    ]);
  });
});

describe('Humidity', () => {
  const humidity = instantiate(HumidityCharacteristic);

  it('decodes and builds hundredths of a percent', () => {
    expect(expectSuccess(humidity.parse(hex('64 09')))).toBe(24.04);
    expect(humidity.build(24.04)).toEqual(hex('64 09'));
  });

  it('decodes 0xFFFF as not known', () => {
    expect(humidity.parse(hex('FF FF')).value).toBeUndefined();
  });

  it('fails above 100 %', () => {
    expect(expectFailure(humidity.parse(hex('11 27'))).errorKind).toBe('ValueRange');
  });
});

describe('Pressure', () => {
  const pressure = instantiate(PressureCharacteristic);

  it('decodes tenths of a pascal', () => {
    expect(expectSuccess(pressure.parse(hex('10 27 00 00')))).toBe(1000);
    expect(pressure.build(1000)).toEqual(hex('10 27 00 00'));
  });

  it('needs exactly four bytes', () => {
    expect(expectFailure(pressure.parse(hex('10 27'))).errorKind).toBe('InsufficientData');
  });
});

// ─── Barometric Pressure Trend ──────────────────────────────────────────────

describe('Barometric Pressure Trend', () => {
  const trend = instantiate(BarometricPressureTrendCharacteristic);

  it('decodes member names', () => {
    expect(expectSuccess(trend.parse(hex('09')))).toBe('steady');
    expect(expectSuccess(trend.parse(hex('00')))).toBe('unknown');
  });

  it('fails on a reserved code', () => {
    const failure = expectFailure(trend.parse(hex('0A')));
    expect(failure.errorKind).toBe('EnumValue');
    expect(failure.message).toBe(
      'Invalid barometric_pressure_trend: 10 is not one of [0, 1, 2, 3, 4, 5, 6, 7, 8, 9]',
    );
  });

  it('builds from a member name', () => {
    expect(trend.build('rising_then_steady')).toEqual(hex('04'));
  });
});
