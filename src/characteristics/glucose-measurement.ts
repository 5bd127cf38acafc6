import { decodeFlags, encodeFlags, extractField, mergeFields } from '../codec/bit-field.js';
import { EnumCodec } from '../codec/enum.js';
import {
  DATE_TIME_LENGTH,
  type DateTimeValue,
  decodeDateTime,
  decodeMedicalFloat16,
  encodeDateTime,
  encodeMedicalFloat16,
} from '../codec/ieee11073.js';
import { decodeSint16, decodeUint16, decodeUint8, encodeSint16, encodeUint16, encodeUint8 } from '../codec/primitives.js';
import { FieldReader, type ParseTrace } from '../diagnostics.js';
import { uuid16 } from '../uuid.js';
import { defineConstraints } from '../validation.js';
import { BaseCharacteristic } from './base.js';
import type { DecodeContext } from './context.js';

const FLAG_NAMES = [
  'time_offset_present',
  'concentration_present',
  'units_mol_per_litre',
  'sensor_status_present',
  'context_follows',
] as const;

type GlucoseFlag = (typeof FLAG_NAMES)[number];

const SENSOR_STATUS_NAMES = [
  'device_battery_low',
  'sensor_malfunction',
  'sample_size_insufficient',
  'strip_insertion_error',
  'strip_type_incorrect',
  'result_too_high',
  'result_too_low',
  'temperature_too_high',
  'temperature_too_low',
  'read_interrupted',
  'general_device_fault',
  'time_fault',
] as const;

export type GlucoseSensorStatus = (typeof SENSOR_STATUS_NAMES)[number];

export const GLUCOSE_TYPES = new EnumCodec('glucose_type', {
  1: 'capillary_whole_blood',
  2: 'capillary_plasma',
  3: 'venous_whole_blood',
  4: 'venous_plasma',
  5: 'arterial_whole_blood',
  6: 'arterial_plasma',
  7: 'undetermined_whole_blood',
  8: 'undetermined_plasma',
  9: 'interstitial_fluid',
  10: 'control_solution',
});

export const SAMPLE_LOCATIONS = new EnumCodec('sample_location', {
  1: 'finger',
  2: 'alternate_site_test',
  3: 'earlobe',
  4: 'control_solution',
  15: 'not_available',
});

export type GlucoseType = ReturnType<typeof GLUCOSE_TYPES.decode>;
export type SampleLocation = ReturnType<typeof SAMPLE_LOCATIONS.decode>;

export interface GlucoseConcentration {
  readonly value: number;
  readonly unit: 'kg/L' | 'mol/L';
  readonly type: GlucoseType;
  readonly sampleLocation: SampleLocation;
}

export interface GlucoseMeasurement {
  readonly sequenceNumber: number;
  /** Undefined when the meter sends an all-zero base time. */
  readonly baseTime: DateTimeValue | undefined;
  /** Minutes relative to `baseTime`. */
  readonly timeOffset?: number;
  readonly concentration?: GlucoseConcentration;
  readonly sensorStatus?: readonly GlucoseSensorStatus[];
  /** A Glucose Measurement Context with the same sequence number follows. */
  readonly contextFollows: boolean;
}

export function isGlucoseMeasurement(value: unknown): value is GlucoseMeasurement {
  return (
    typeof value === 'object' &&
    value !== null &&
    'sequenceNumber' in value &&
    typeof value.sequenceNumber === 'number'
  );
}

/**
 * Glucose Measurement (0x2A18).
 *
 *   Byte 0     : Flags
 *   Bytes 1-2  : Sequence Number
 *   Bytes 3-9  : Base Time
 *   Then Time Offset (sint16), Concentration (SFLOAT) + Type/Location (1),
 *   Sensor Status Annunciation (uint16), each governed by a flag.
 */
export class GlucoseMeasurementCharacteristic extends BaseCharacteristic<GlucoseMeasurement> {
  static readonly uuid = uuid16(0x2a18);
  static readonly displayName = 'Glucose Measurement';

  readonly role = 'measurement';
  readonly constraints = defineConstraints({ minLength: 10, maxLength: 17, expectedType: 'object' });

  protected decodeValue(data: Buffer, _context: DecodeContext, trace: ParseTrace): GlucoseMeasurement {
    const reader = new FieldReader(data, trace);
    const flags = decodeFlags(reader.read('flags', 1, decodeUint8), FLAG_NAMES);
    const sequenceNumber = reader.read('sequence_number', 2, decodeUint16);
    const baseTime = reader.read('base_time', DATE_TIME_LENGTH, decodeDateTime);
    const timeOffset = flags.has('time_offset_present') ? reader.read('time_offset', 2, decodeSint16) : undefined;

    let concentration: GlucoseConcentration | undefined;
    if (flags.has('concentration_present')) {
      const value = reader.read('concentration', 2, decodeMedicalFloat16);
      const { type, sampleLocation } = reader.read('type_sample_location', 1, (d, at) => {
        const packed = decodeUint8(d, at);
        return {
          type: GLUCOSE_TYPES.decode(extractField(packed, 0, 4, 8)),
          sampleLocation: SAMPLE_LOCATIONS.decode(extractField(packed, 4, 4, 8)),
        };
      });
      concentration = {
        value,
        unit: flags.has('units_mol_per_litre') ? 'mol/L' : 'kg/L',
        type,
        sampleLocation,
      };
    }

    const sensorStatus = flags.has('sensor_status_present')
      ? [...decodeFlags(reader.read('sensor_status', 2, decodeUint16), SENSOR_STATUS_NAMES)]
      : undefined;

    return {
      sequenceNumber,
      baseTime,
      timeOffset,
      concentration,
      sensorStatus,
      contextFollows: flags.has('context_follows'),
    };
  }

  protected encodeValue(value: GlucoseMeasurement): Buffer {
    const flags = new Set<GlucoseFlag>();
    if (value.contextFollows) flags.add('context_follows');
    const parts = [encodeUint16(value.sequenceNumber), encodeDateTime(value.baseTime)];

    if (value.timeOffset !== undefined) {
      flags.add('time_offset_present');
      parts.push(encodeSint16(value.timeOffset));
    }
    if (value.concentration !== undefined) {
      const c = value.concentration;
      flags.add('concentration_present');
      if (c.unit === 'mol/L') flags.add('units_mol_per_litre');
      parts.push(
        encodeMedicalFloat16(c.value),
        encodeUint8(
          mergeFields(
            [
              { value: GLUCOSE_TYPES.encode(c.type), start: 0, width: 4 },
              { value: SAMPLE_LOCATIONS.encode(c.sampleLocation), start: 4, width: 4 },
            ],
            8,
          ),
        ),
      );
    }
    if (value.sensorStatus !== undefined) {
      flags.add('sensor_status_present');
      parts.push(encodeUint16(encodeFlags(value.sensorStatus, SENSOR_STATUS_NAMES)));
    }

    return Buffer.concat([encodeUint8(encodeFlags(flags, FLAG_NAMES)), ...parts]);
  }
}
