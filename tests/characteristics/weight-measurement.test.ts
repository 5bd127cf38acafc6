import { describe, it, expect } from 'vitest';
import { DecodeContext } from '../../src/characteristics/context.js';
import { WeightMeasurementCharacteristic } from '../../src/characteristics/weight-measurement.js';
import { WeightScaleFeatureCharacteristic } from '../../src/characteristics/weight-scale-feature.js';
import { TypeMismatchError, ValueRangeError } from '../../src/errors.js';
import { expectFailure, expectSuccess, hex, instantiate } from '../helpers/codec-test-utils.js';

const weight = instantiate(WeightMeasurementCharacteristic);
const feature = instantiate(WeightScaleFeatureCharacteristic);

describe('Weight Measurement', () => {
  it('decodes SI weight', () => {
    expect(expectSuccess(weight.parse(hex('00 B0 36')))).toEqual({ unit: 'kg', weight: 70 });
  });

  it('decodes imperial weight with BMI and height', () => {
    expect(expectSuccess(weight.parse(hex('09 28 3C E7 00 B2 02')))).toEqual({
      unit: 'lb',
      weight: 154,
      bmi: 23.1,
      height: 69,
    });
  });

  it('decodes a timestamp and user id', () => {
    const value = expectSuccess(weight.parse(hex('06 B0 36 E8 07 03 0F 0A 1E 00 02')));
    expect(value.timestamp).toEqual({ year: 2024, month: 3, day: 15, hours: 10, minutes: 30, seconds: 0 });
    expect(value.userId).toBe(2);
  });

  it('decodes 0xFFFF as an unsuccessful measurement', () => {
    const value = expectSuccess(weight.parse(hex('00 FF FF')));
    expect(value.weight).toBeUndefined();
  });

  it('reports the failing field and what was decoded before it', () => {
    const failure = expectFailure(weight.parse(hex('08 B0 36 E7')));
    expect(failure.errorKind).toBe('FieldFailure');
    expect(failure.fieldErrors).toEqual([{ field: 'bmi', offset: 3, reason: 'bmi: need 2 bytes, got 1' }]);
    expect(failure.partial).toEqual({ flags: 8, weight: 70 });
    expect(failure.message).toBe("field 'bmi' at offset 3: bmi: need 2 bytes, got 1");
  });

  it('fails below the minimum length', () => {
    expect(expectFailure(weight.parse(hex('00 B0'))).errorKind).toBe('InsufficientData');
  });

  it('builds the same bytes it decodes', () => {
    expect(weight.build({ unit: 'lb', weight: 154, bmi: 23.1, height: 69 })).toEqual(hex('09 28 3C E7 00 B2 02'));
    expect(weight.build({ unit: 'kg', weight: undefined })).toEqual(hex('00 FF FF'));
  });

  it('needs BMI and height together', () => {
    expect(() => weight.build({ unit: 'kg', weight: 70, bmi: 22 })).toThrow(TypeMismatchError);
    expect(() => weight.build({ unit: 'kg', weight: 70, bmi: 22 })).toThrow(
      'Invalid height: expected number, got undefined',
    );
  });

  it('adds the scale resolution when Weight Scale Feature is in context', () => {
    const featureResult = feature.parse(hex('24 00 00 00'));
    const context = new DecodeContext([[WeightScaleFeatureCharacteristic.uuid, featureResult]]);
    expect(expectSuccess(weight.parse(hex('00 B0 36'), context)).resolution).toBe(0.05);
  });

  it('ignores a failed feature result in context', () => {
    const context = new DecodeContext([['2A9E', feature.parse(hex('24'))]]);
    expect(expectSuccess(weight.parse(hex('00 B0 36'), context)).resolution).toBeUndefined();
  });
});

describe('Weight Scale Feature', () => {
  it('decodes flags and resolution codes', () => {
    expect(expectSuccess(feature.parse(hex('24 00 00 00')))).toEqual({
      features: ['bmi_supported'],
      weightResolution: 4,
      heightResolution: 0,
    });
    expect(expectSuccess(feature.parse(hex('A4 01 00 00'))).heightResolution).toBe(3);
  });

  it('builds a feature word', () => {
    expect(
      feature.build({ features: ['bmi_supported'], weightResolution: 4, heightResolution: 3 }),
    ).toEqual(hex('A4 01 00 00'));
  });

  it('rejects reserved resolution codes', () => {
    expect(() => feature.build({ features: [], weightResolution: 9, heightResolution: 0 })).toThrow(ValueRangeError);
    expect(() => feature.build({ features: [], weightResolution: 9, heightResolution: 0 })).toThrow(
      'Invalid weight_resolution: 9 (expected range [0, 7])',
    );
  });
});
