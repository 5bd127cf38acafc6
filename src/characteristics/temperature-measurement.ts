import { decodeFlags, encodeFlags } from '../codec/bit-field.js';
import { EnumCodec } from '../codec/enum.js';
import {
  DATE_TIME_LENGTH,
  type DateTimeValue,
  decodeDateTime,
  decodeMedicalFloat32,
  encodeDateTime,
  encodeMedicalFloat32,
} from '../codec/ieee11073.js';
import { decodeUint8, encodeUint8 } from '../codec/primitives.js';
import { FieldReader, type ParseTrace } from '../diagnostics.js';
import { uuid16 } from '../uuid.js';
import { defineConstraints } from '../validation.js';
import { BaseCharacteristic } from './base.js';
import type { DecodeContext } from './context.js';

const FLAG_NAMES = ['fahrenheit', 'timestamp_present', 'temperature_type_present'] as const;

type TemperatureFlag = (typeof FLAG_NAMES)[number];

export const TEMPERATURE_TYPES = new EnumCodec('temperature_type', {
  1: 'armpit',
  2: 'body',
  3: 'ear',
  4: 'finger',
  5: 'gastro_intestinal',
  6: 'mouth',
  7: 'rectum',
  8: 'toe',
  9: 'tympanum',
});

export type TemperatureType = ReturnType<typeof TEMPERATURE_TYPES.decode>;

export interface TemperatureMeasurement {
  /** NaN or ±Infinity when the thermometer reports a special value. */
  readonly temperature: number;
  readonly unit: 'celsius' | 'fahrenheit';
  readonly timestamp?: DateTimeValue;
  readonly temperatureType?: TemperatureType;
}

/**
 * Temperature Measurement (0x2A1C).
 *
 *   Byte 0    : Flags
 *   Bytes 1-4 : Temperature (IEEE 11073 FLOAT)
 *   Then Time Stamp (7) and Temperature Type (1) when flagged.
 */
export class TemperatureMeasurementCharacteristic extends BaseCharacteristic<TemperatureMeasurement> {
  static readonly uuid = uuid16(0x2a1c);
  static readonly displayName = 'Temperature Measurement';

  readonly role = 'measurement';
  readonly constraints = defineConstraints({ minLength: 5, maxLength: 13, expectedType: 'object' });

  protected decodeValue(data: Buffer, _context: DecodeContext, trace: ParseTrace): TemperatureMeasurement {
    const reader = new FieldReader(data, trace);
    const flags = decodeFlags(reader.read('flags', 1, decodeUint8), FLAG_NAMES);
    const temperature = reader.read('temperature', 4, decodeMedicalFloat32);
    const timestamp = flags.has('timestamp_present')
      ? reader.read('timestamp', DATE_TIME_LENGTH, decodeDateTime)
      : undefined;
    const temperatureType = flags.has('temperature_type_present')
      ? reader.read('temperature_type', 1, (d, at) => TEMPERATURE_TYPES.decode(decodeUint8(d, at)))
      : undefined;

    return {
      temperature,
      unit: flags.has('fahrenheit') ? 'fahrenheit' : 'celsius',
      timestamp,
      temperatureType,
    };
  }

  protected encodeValue(value: TemperatureMeasurement): Buffer {
    const flags = new Set<TemperatureFlag>();
    if (value.unit === 'fahrenheit') flags.add('fahrenheit');
    const parts = [encodeMedicalFloat32(value.temperature)];
    if (value.timestamp !== undefined) {
      flags.add('timestamp_present');
      parts.push(encodeDateTime(value.timestamp));
    }
    if (value.temperatureType !== undefined) {
      flags.add('temperature_type_present');
      parts.push(encodeUint8(TEMPERATURE_TYPES.encode(value.temperatureType)));
    }
    return Buffer.concat([encodeUint8(encodeFlags(flags, FLAG_NAMES)), ...parts]);
  }
}
