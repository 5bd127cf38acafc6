import { describe, it, expect } from 'vitest';
import { TemperatureMeasurementCharacteristic } from '../../src/characteristics/temperature-measurement.js';
import { expectFailure, expectSuccess, hex, instantiate } from '../helpers/codec-test-utils.js';

const thermometer = instantiate(TemperatureMeasurementCharacteristic);

describe('Temperature Measurement', () => {
  it('decodes a Celsius FLOAT', () => {
    expect(expectSuccess(thermometer.parse(hex('00 6D 01 00 FF')))).toEqual({
      temperature: 36.5,
      unit: 'celsius',
    });
  });

  it('decodes the timestamp and temperature type', () => {
    expect(expectSuccess(thermometer.parse(hex('06 6D 01 00 FF E8 07 03 0F 0A 1E 00 02')))).toEqual({
      temperature: 36.5,
      unit: 'celsius',
      timestamp: { year: 2024, month: 3, day: 15, hours: 10, minutes: 30, seconds: 0 },
      temperatureType: 'body',
    });
  });

  it('passes a NaN reading through', () => {
    expect(expectSuccess(thermometer.parse(hex('00 FF FF 7F 00'))).temperature).toBeNaN();
  });

  it('fails on a reserved temperature type', () => {
    const failure = expectFailure(thermometer.parse(hex('04 6D 01 00 FF 0A')));
    expect(failure.errorKind).toBe('FieldFailure');
    expect(failure.fieldErrors).toEqual([
      {
        field: 'temperature_type',
        offset: 5,
        reason: 'Invalid temperature_type: 10 is not one of [1, 2, 3, 4, 5, 6, 7, 8, 9]',
      },
    ]);
    expect(failure.partial).toEqual({ flags: 4, temperature: 36.5 });
  });

  it('fails when the flagged timestamp is cut short', () => {
    const failure = expectFailure(thermometer.parse(hex('02 6D 01 00 FF E8 07')));
    expect(failure.fieldErrors[0]).toEqual({ field: 'timestamp', offset: 5, reason: 'timestamp: need 7 bytes, got 2' });
  });

  it('builds Fahrenheit with a type', () => {
    expect(thermometer.build({ temperature: 36.5, unit: 'fahrenheit', temperatureType: 'ear' })).toEqual(
      hex('05 D0 B1 37 FB 03'),
    );
  });

  it('traces each field', () => {
    const result = thermometer.parse(hex('00 6D 01 00 FF'), undefined, { trace: true });
    expect(result.trace).toEqual([
      'Temperature Measurement: 5 bytes passed length checks',
      'flags @0 [00] -> 0',
      'temperature @1 [6D 01 00 FF] -> 36.5',
      'Temperature Measurement: decoded',
    ]);
  });
});
