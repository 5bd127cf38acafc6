import { decodeFlags, encodeFlags } from '../codec/bit-field.js';
import { DATE_TIME_LENGTH, type DateTimeValue, decodeDateTime, encodeDateTime } from '../codec/ieee11073.js';
import { decodeUint8, encodeUint8, UINT16 } from '../codec/primitives.js';
import { ScaledTemplate } from '../codec/scaled.js';
import { FieldReader, type ParseTrace } from '../diagnostics.js';
import { TypeMismatchError } from '../errors.js';
import { uuid16 } from '../uuid.js';
import { defineConstraints } from '../validation.js';
import { BaseCharacteristic } from './base.js';
import { HEIGHT, type MassUnit, massResolution, massTemplate, massUnitOf } from './body-metrics.js';
import type { DecodeContext } from './context.js';
import { isWeightScaleFeature, WeightScaleFeatureCharacteristic } from './weight-scale-feature.js';

const FLAG_NAMES = ['imperial_units', 'timestamp_present', 'user_id_present', 'bmi_and_height_present'] as const;

type WeightFlag = (typeof FLAG_NAMES)[number];

const BMI = new ScaledTemplate(UINT16, 0.1, { name: 'bmi' });

export interface WeightMeasurement {
  readonly unit: MassUnit;
  /** Undefined when the scale reports "measurement unsuccessful". */
  readonly weight: number | undefined;
  readonly timestamp?: DateTimeValue;
  readonly userId?: number;
  readonly bmi?: number;
  /** Metres with kg, inches with lb. */
  readonly height?: number;
  /** Weight resolution from Weight Scale Feature, in `unit`, when that was decoded too. */
  readonly resolution?: number;
}

/**
 * Weight Measurement (0x2A9D).
 *
 * Layout:
 *   Byte 0    : Flags
 *   Bytes 1-2 : Weight (uint16, 0.005 kg / 0.01 lb, 0xFFFF = unsuccessful)
 *   Then Time Stamp (7), User ID (1), BMI (2) + Height (2), each governed by a flag.
 */
export class WeightMeasurementCharacteristic extends BaseCharacteristic<WeightMeasurement> {
  static readonly uuid = uuid16(0x2a9d);
  static readonly displayName = 'Weight Measurement';

  readonly role = 'measurement';
  readonly constraints = defineConstraints({ minLength: 3, maxLength: 15, expectedType: 'object' });
  readonly dependencies = {
    required: [],
    optional: [WeightScaleFeatureCharacteristic.uuid],
  };

  protected decodeValue(data: Buffer, context: DecodeContext, trace: ParseTrace): WeightMeasurement {
    const reader = new FieldReader(data, trace);
    const flags = decodeFlags(reader.read('flags', 1, decodeUint8), FLAG_NAMES);
    const unit = massUnitOf(flags.has('imperial_units'));

    const weight = reader.read('weight', 2, (d, at) => massTemplate(unit, 'weight', 0xffff).decode(d, at));
    const timestamp = flags.has('timestamp_present')
      ? reader.read('timestamp', DATE_TIME_LENGTH, decodeDateTime)
      : undefined;
    const userId = flags.has('user_id_present') ? reader.read('user_id', 1, decodeUint8) : undefined;

    let bmi: number | undefined;
    let height: number | undefined;
    if (flags.has('bmi_and_height_present')) {
      bmi = reader.read('bmi', 2, (d, at) => BMI.decode(d, at));
      height = reader.read('height', 2, (d, at) => HEIGHT[unit].decode(d, at));
    }

    const feature = context.valueOf(WeightScaleFeatureCharacteristic.uuid);
    const resolution = isWeightScaleFeature(feature) ? massResolution(feature.weightResolution)?.[unit] : undefined;

    return { unit, weight, timestamp, userId, bmi, height, resolution };
  }

  protected encodeValue(value: WeightMeasurement): Buffer {
    const flags = new Set<WeightFlag>();
    if (value.unit === 'lb') flags.add('imperial_units');
    const parts = [massTemplate(value.unit, 'weight', 0xffff).encode(value.weight)];

    if (value.timestamp !== undefined) {
      flags.add('timestamp_present');
      parts.push(encodeDateTime(value.timestamp));
    }
    if (value.userId !== undefined) {
      flags.add('user_id_present');
      parts.push(encodeUint8(value.userId));
    }
    if (value.bmi !== undefined || value.height !== undefined) {
      if (value.bmi === undefined) throw new TypeMismatchError('bmi', 'number', 'undefined');
      if (value.height === undefined) throw new TypeMismatchError('height', 'number', 'undefined');
      flags.add('bmi_and_height_present');
      parts.push(BMI.encode(value.bmi), HEIGHT[value.unit].encode(value.height));
    }

    return Buffer.concat([encodeUint8(encodeFlags(flags, FLAG_NAMES)), ...parts]);
  }
}
