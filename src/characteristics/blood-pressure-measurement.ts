import { decodeFlags, encodeFlags, extractField, setField } from '../codec/bit-field.js';
import {
  DATE_TIME_LENGTH,
  type DateTimeValue,
  decodeDateTime,
  decodeMedicalFloat16,
  encodeDateTime,
  encodeMedicalFloat16,
} from '../codec/ieee11073.js';
import { decodeUint16, decodeUint8, encodeUint16, encodeUint8 } from '../codec/primitives.js';
import { FieldReader, type ParseTrace } from '../diagnostics.js';
import { uuid16 } from '../uuid.js';
import { defineConstraints } from '../validation.js';
import { BaseCharacteristic } from './base.js';
import type { DecodeContext } from './context.js';

const FLAG_NAMES = [
  'units_kpa',
  'timestamp_present',
  'pulse_rate_present',
  'user_id_present',
  'measurement_status_present',
] as const;

type BloodPressureFlag = (typeof FLAG_NAMES)[number];

// Bits 3-4 hold the pulse rate range and are read separately.
const STATUS_NAMES = [
  'body_movement_detected',
  'cuff_too_loose',
  'irregular_pulse_detected',
  null,
  null,
  'improper_measurement_position',
] as const;

export type BloodPressureStatusFlag = Exclude<(typeof STATUS_NAMES)[number], null>;

const PULSE_RANGES = ['within-range', 'above-upper-limit', 'below-lower-limit', 'reserved'] as const;

export type PulseRateRange = (typeof PULSE_RANGES)[number];

export interface BloodPressureStatus {
  readonly flags: readonly BloodPressureStatusFlag[];
  readonly pulseRateRange: PulseRateRange;
}

export interface BloodPressureMeasurement {
  readonly unit: 'mmHg' | 'kPa';
  readonly systolic: number;
  readonly diastolic: number;
  readonly meanArterialPressure: number;
  readonly timestamp?: DateTimeValue;
  /** Beats per minute. */
  readonly pulseRate?: number;
  readonly userId?: number;
  readonly status?: BloodPressureStatus;
}

function pulseRangeOf(bits: number): PulseRateRange {
  return PULSE_RANGES.at(bits) ?? 'reserved';
}

/**
 * Blood Pressure Measurement (0x2A35).
 *
 *   Byte 0    : Flags
 *   Bytes 1-6 : Systolic, Diastolic, Mean Arterial Pressure (SFLOAT each)
 *   Then Time Stamp (7), Pulse Rate (SFLOAT), User ID (1), Measurement Status (2).
 */
export class BloodPressureMeasurementCharacteristic extends BaseCharacteristic<BloodPressureMeasurement> {
  static readonly uuid = uuid16(0x2a35);
  static readonly displayName = 'Blood Pressure Measurement';

  readonly role = 'measurement';
  readonly constraints = defineConstraints({ minLength: 7, maxLength: 19, expectedType: 'object' });

  protected decodeValue(data: Buffer, _context: DecodeContext, trace: ParseTrace): BloodPressureMeasurement {
    const reader = new FieldReader(data, trace);
    const flags = decodeFlags(reader.read('flags', 1, decodeUint8), FLAG_NAMES);

    const systolic = reader.read('systolic', 2, decodeMedicalFloat16);
    const diastolic = reader.read('diastolic', 2, decodeMedicalFloat16);
    const meanArterialPressure = reader.read('mean_arterial_pressure', 2, decodeMedicalFloat16);
    const timestamp = flags.has('timestamp_present')
      ? reader.read('timestamp', DATE_TIME_LENGTH, decodeDateTime)
      : undefined;
    const pulseRate = flags.has('pulse_rate_present')
      ? reader.read('pulse_rate', 2, decodeMedicalFloat16)
      : undefined;
    const userId = flags.has('user_id_present') ? reader.read('user_id', 1, decodeUint8) : undefined;

    let status: BloodPressureStatus | undefined;
    if (flags.has('measurement_status_present')) {
      const raw = reader.read('measurement_status', 2, decodeUint16);
      status = {
        flags: [...decodeFlags(raw, STATUS_NAMES)],
        pulseRateRange: pulseRangeOf(extractField(raw, 3, 2, 16)),
      };
    }

    return {
      unit: flags.has('units_kpa') ? 'kPa' : 'mmHg',
      systolic,
      diastolic,
      meanArterialPressure,
      timestamp,
      pulseRate,
      userId,
      status,
    };
  }

  protected encodeValue(value: BloodPressureMeasurement): Buffer {
    const flags = new Set<BloodPressureFlag>();
    if (value.unit === 'kPa') flags.add('units_kpa');
    const parts = [
      encodeMedicalFloat16(value.systolic),
      encodeMedicalFloat16(value.diastolic),
      encodeMedicalFloat16(value.meanArterialPressure),
    ];

    if (value.timestamp !== undefined) {
      flags.add('timestamp_present');
      parts.push(encodeDateTime(value.timestamp));
    }
    if (value.pulseRate !== undefined) {
      flags.add('pulse_rate_present');
      parts.push(encodeMedicalFloat16(value.pulseRate));
    }
    if (value.userId !== undefined) {
      flags.add('user_id_present');
      parts.push(encodeUint8(value.userId));
    }
    if (value.status !== undefined) {
      flags.add('measurement_status_present');
      const bits = encodeFlags(value.status.flags, STATUS_NAMES);
      parts.push(encodeUint16(setField(bits, PULSE_RANGES.indexOf(value.status.pulseRateRange), 3, 2, 16)));
    }

    return Buffer.concat([encodeUint8(encodeFlags(flags, FLAG_NAMES)), ...parts]);
  }
}
