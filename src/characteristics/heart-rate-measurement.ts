import { decodeFlags, encodeFlags, extractField, setField } from '../codec/bit-field.js';
import { decodeUint16, decodeUint8, encodeUint16, encodeUint8 } from '../codec/primitives.js';
import { FieldReader, type ParseTrace } from '../diagnostics.js';
import { TypeMismatchError } from '../errors.js';
import { uuid16 } from '../uuid.js';
import { defineConstraints } from '../validation.js';
import { BaseCharacteristic } from './base.js';
import type { DecodeContext } from './context.js';

// Bit 0, then the two sensor-contact bits, then bits 3-4.
const FLAG_NAMES = ['uint16_format', null, null, 'energy_expended_present', 'rr_intervals_present'] as const;

type HeartRateFlag = Exclude<(typeof FLAG_NAMES)[number], null>;

export type SensorContact = 'not-supported' | 'not-detected' | 'detected';

/** RR-intervals are sent in units of 1/1024 s. */
const RR_UNITS_PER_SECOND = 1024;

export interface HeartRateMeasurement {
  /** Beats per minute. */
  readonly heartRate: number;
  readonly sensorContact: SensorContact;
  /** kJ since the last reset. */
  readonly energyExpended?: number;
  /** Seconds between successive beats. */
  readonly rrIntervals: readonly number[];
}

function sensorContactOf(bits: number): SensorContact {
  if (bits === 3) return 'detected';
  if (bits === 2) return 'not-detected';
  return 'not-supported';
}

const CONTACT_BITS: Record<SensorContact, number> = {
  'not-supported': 0,
  'not-detected': 2,
  detected: 3,
};

/**
 * Heart Rate Measurement (0x2A37).
 *
 *   Byte 0 : Flags (bit 0 = 16-bit heart rate, bits 1-2 = sensor contact,
 *            bit 3 = energy expended, bit 4 = RR-intervals)
 *   Then heart rate (uint8 or uint16), energy expended (uint16), RR-intervals (uint16 each).
 */
export class HeartRateMeasurementCharacteristic extends BaseCharacteristic<HeartRateMeasurement> {
  static readonly uuid = uuid16(0x2a37);
  static readonly displayName = 'Heart Rate Measurement';

  readonly role = 'measurement';
  readonly constraints = defineConstraints({ minLength: 2, expectedType: 'object' });

  protected decodeValue(data: Buffer, _context: DecodeContext, trace: ParseTrace): HeartRateMeasurement {
    const reader = new FieldReader(data, trace);
    const raw = reader.read('flags', 1, decodeUint8);
    const flags = decodeFlags(raw, FLAG_NAMES);

    const heartRate = flags.has('uint16_format')
      ? reader.read('heart_rate', 2, decodeUint16)
      : reader.read('heart_rate', 1, decodeUint8);
    const energyExpended = flags.has('energy_expended_present')
      ? reader.read('energy_expended', 2, decodeUint16)
      : undefined;

    const rrIntervals: number[] = [];
    if (flags.has('rr_intervals_present')) {
      if (reader.remaining % 2 !== 0) {
        throw reader.fail('rr_intervals', reader.offset, `odd number of bytes (${reader.remaining})`);
      }
      while (reader.remaining > 0) {
        const index = rrIntervals.length;
        rrIntervals.push(reader.read(`rr_intervals[${index}]`, 2, decodeUint16) / RR_UNITS_PER_SECOND);
      }
    }

    return {
      heartRate,
      sensorContact: sensorContactOf(extractField(raw, 1, 2, 8)),
      energyExpended,
      rrIntervals,
    };
  }

  protected encodeValue(value: HeartRateMeasurement): Buffer {
    if (!Number.isInteger(value.heartRate)) {
      throw new TypeMismatchError('heart_rate', 'integer', String(value.heartRate));
    }
    const flags = new Set<HeartRateFlag>();
    const wide = value.heartRate > 0xff;
    if (wide) flags.add('uint16_format');

    const parts = [wide ? encodeUint16(value.heartRate) : encodeUint8(value.heartRate)];
    if (value.energyExpended !== undefined) {
      flags.add('energy_expended_present');
      parts.push(encodeUint16(value.energyExpended));
    }
    if (value.rrIntervals.length > 0) {
      flags.add('rr_intervals_present');
      for (const rr of value.rrIntervals) parts.push(encodeUint16(Math.round(rr * RR_UNITS_PER_SECOND)));
    }

    const raw = setField(encodeFlags(flags, FLAG_NAMES), CONTACT_BITS[value.sensorContact], 1, 2, 8);
    return Buffer.concat([encodeUint8(raw), ...parts]);
  }
}
