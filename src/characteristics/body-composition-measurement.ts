import { decodeFlags, encodeFlags } from '../codec/bit-field.js';
import { DATE_TIME_LENGTH, type DateTimeValue, decodeDateTime, encodeDateTime } from '../codec/ieee11073.js';
import { decodeUint16, decodeUint8, encodeUint16, encodeUint8, UINT16 } from '../codec/primitives.js';
import { ScaledTemplate } from '../codec/scaled.js';
import { FieldReader, type ParseTrace } from '../diagnostics.js';
import { uuid16 } from '../uuid.js';
import { defineConstraints } from '../validation.js';
import { BaseCharacteristic } from './base.js';
import { isBodyCompositionFeature, BodyCompositionFeatureCharacteristic } from './body-composition-feature.js';
import { HEIGHT, type MassUnit, massResolution, massTemplate, massUnitOf } from './body-metrics.js';
import type { DecodeContext } from './context.js';

const FLAG_NAMES = [
  'imperial_units',
  'timestamp_present',
  'user_id_present',
  'basal_metabolism_present',
  'muscle_percentage_present',
  'muscle_mass_present',
  'fat_free_mass_present',
  'soft_lean_mass_present',
  'body_water_mass_present',
  'impedance_present',
  'weight_present',
  'height_present',
  'multiple_packet_measurement',
] as const;

type BodyCompositionFlag = (typeof FLAG_NAMES)[number];

const PERCENT = (name: string, unknownRaw?: number): ScaledTemplate =>
  new ScaledTemplate(UINT16, 0.1, { name, unknownRaw });
const IMPEDANCE = new ScaledTemplate(UINT16, 0.1, { name: 'impedance' });

export interface BodyCompositionMeasurement {
  readonly unit: MassUnit;
  /** Undefined when the scale reports "measurement unsuccessful". */
  readonly bodyFatPercentage: number | undefined;
  readonly timestamp?: DateTimeValue;
  readonly userId?: number;
  /** kJ */
  readonly basalMetabolism?: number;
  readonly musclePercentage?: number;
  readonly muscleMass?: number;
  readonly fatFreeMass?: number;
  readonly softLeanMass?: number;
  readonly bodyWaterMass?: number;
  /** Ω */
  readonly impedance?: number;
  readonly weight?: number;
  readonly height?: number;
  /** More packets of the same measurement follow. */
  readonly multiplePacket: boolean;
  /** Mass resolution from Body Composition Feature, in `unit`, when that was decoded too. */
  readonly massResolution?: number;
}

type MassField = 'muscleMass' | 'fatFreeMass' | 'softLeanMass' | 'bodyWaterMass';

const MASS_FIELDS: ReadonlyArray<[MassField, BodyCompositionFlag, string]> = [
  ['muscleMass', 'muscle_mass_present', 'muscle_mass'],
  ['fatFreeMass', 'fat_free_mass_present', 'fat_free_mass'],
  ['softLeanMass', 'soft_lean_mass_present', 'soft_lean_mass'],
  ['bodyWaterMass', 'body_water_mass_present', 'body_water_mass'],
];

/**
 * Body Composition Measurement (0x2A9C).
 *
 * Layout:
 *   Bytes 0-1 : Flags (uint16 LE)
 *   Bytes 2-3 : Body Fat Percentage (uint16 LE, resolution 0.1 %)
 *   Then optional fields in flag-bit order.
 */
export class BodyCompositionMeasurementCharacteristic extends BaseCharacteristic<BodyCompositionMeasurement> {
  static readonly uuid = uuid16(0x2a9c);
  static readonly displayName = 'Body Composition Measurement';

  readonly role = 'measurement';
  readonly constraints = defineConstraints({ minLength: 4, expectedType: 'object' });
  readonly dependencies = {
    required: [],
    optional: [BodyCompositionFeatureCharacteristic.uuid],
  };

  protected decodeValue(data: Buffer, context: DecodeContext, trace: ParseTrace): BodyCompositionMeasurement {
    const reader = new FieldReader(data, trace);
    const flags = decodeFlags(reader.read('flags', 2, decodeUint16), FLAG_NAMES);
    const unit = massUnitOf(flags.has('imperial_units'));
    const optional = <T>(flag: BodyCompositionFlag, read: () => T): T | undefined =>
      flags.has(flag) ? read() : undefined;

    const bodyFatPercentage = reader.read('body_fat_percentage', 2, (d, at) =>
      PERCENT('body_fat_percentage', 0xffff).decode(d, at),
    );
    const timestamp = optional('timestamp_present', () =>
      reader.read('timestamp', DATE_TIME_LENGTH, decodeDateTime),
    );
    const userId = optional('user_id_present', () => reader.read('user_id', 1, decodeUint8));
    const basalMetabolism = optional('basal_metabolism_present', () =>
      reader.read('basal_metabolism', 2, decodeUint16),
    );
    const musclePercentage = optional('muscle_percentage_present', () =>
      reader.read('muscle_percentage', 2, (d, at) => PERCENT('muscle_percentage').decode(d, at)),
    );

    const masses: Partial<Record<MassField, number>> = {};
    for (const [key, flag, field] of MASS_FIELDS) {
      masses[key] = optional(flag, () => reader.read(field, 2, (d, at) => massTemplate(unit, field).decode(d, at)));
    }

    const impedance = optional('impedance_present', () =>
      reader.read('impedance', 2, (d, at) => IMPEDANCE.decode(d, at)),
    );
    const weight = optional('weight_present', () =>
      reader.read('weight', 2, (d, at) => massTemplate(unit, 'weight').decode(d, at)),
    );
    const height = optional('height_present', () => reader.read('height', 2, (d, at) => HEIGHT[unit].decode(d, at)));

    const feature = context.valueOf(BodyCompositionFeatureCharacteristic.uuid);
    const resolution = isBodyCompositionFeature(feature)
      ? massResolution(feature.massResolution)?.[unit]
      : undefined;

    return {
      unit,
      bodyFatPercentage,
      timestamp,
      userId,
      basalMetabolism,
      musclePercentage,
      ...masses,
      impedance,
      weight,
      height,
      multiplePacket: flags.has('multiple_packet_measurement'),
      massResolution: resolution,
    };
  }

  protected encodeValue(value: BodyCompositionMeasurement): Buffer {
    const flags = new Set<BodyCompositionFlag>();
    if (value.unit === 'lb') flags.add('imperial_units');
    if (value.multiplePacket) flags.add('multiple_packet_measurement');

    const parts = [PERCENT('body_fat_percentage', 0xffff).encode(value.bodyFatPercentage)];
    const optional = <T>(flag: BodyCompositionFlag, field: T | undefined, encode: (v: T) => Buffer): void => {
      if (field === undefined) return;
      flags.add(flag);
      parts.push(encode(field));
    };

    optional('timestamp_present', value.timestamp, encodeDateTime);
    optional('user_id_present', value.userId, encodeUint8);
    optional('basal_metabolism_present', value.basalMetabolism, encodeUint16);
    optional('muscle_percentage_present', value.musclePercentage, (v) => PERCENT('muscle_percentage').encode(v));
    for (const [key, flag, field] of MASS_FIELDS) {
      optional(flag, value[key], (v) => massTemplate(value.unit, field).encode(v));
    }
    optional('impedance_present', value.impedance, (v) => IMPEDANCE.encode(v));
    optional('weight_present', value.weight, (v) => massTemplate(value.unit, 'weight').encode(v));
    optional('height_present', value.height, (v) => HEIGHT[value.unit].encode(v));

    return Buffer.concat([encodeUint16(encodeFlags(flags, FLAG_NAMES)), ...parts]);
  }
}
