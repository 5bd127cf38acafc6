import { decodeFlags, encodeFlags, extractField, mergeFields } from '../codec/bit-field.js';
import { EnumCodec } from '../codec/enum.js';
import { decodeMedicalFloat16, encodeMedicalFloat16 } from '../codec/ieee11073.js';
import { decodeUint16, decodeUint8, encodeUint16, encodeUint8 } from '../codec/primitives.js';
import { FieldReader, type ParseTrace } from '../diagnostics.js';
import { TypeMismatchError } from '../errors.js';
import { uuid16 } from '../uuid.js';
import { defineConstraints } from '../validation.js';
import { BaseCharacteristic } from './base.js';
import type { DecodeContext } from './context.js';
import { GlucoseMeasurementCharacteristic, isGlucoseMeasurement } from './glucose-measurement.js';

const FLAG_NAMES = [
  'carbohydrate_present',
  'meal_present',
  'tester_health_present',
  'exercise_present',
  'medication_present',
  'medication_units_litres',
  'hba1c_present',
  'extended_flags_present',
] as const;

type ContextFlag = (typeof FLAG_NAMES)[number];

export const CARBOHYDRATE_TYPES = new EnumCodec('carbohydrate_type', {
  1: 'breakfast',
  2: 'lunch',
  3: 'dinner',
  4: 'snack',
  5: 'drink',
  6: 'supper',
  7: 'brunch',
});

export const MEAL_TYPES = new EnumCodec('meal', {
  1: 'preprandial',
  2: 'postprandial',
  3: 'fasting',
  4: 'casual',
  5: 'bedtime',
});

export const TESTER_TYPES = new EnumCodec('tester', {
  1: 'self',
  2: 'health_care_professional',
  3: 'lab_test',
  15: 'not_available',
});

export const HEALTH_TYPES = new EnumCodec('health', {
  1: 'minor_health_issues',
  2: 'major_health_issues',
  3: 'during_menses',
  4: 'under_stress',
  5: 'no_health_issues',
  15: 'not_available',
});

export const MEDICATION_TYPES = new EnumCodec('medication_id', {
  1: 'rapid_acting_insulin',
  2: 'short_acting_insulin',
  3: 'intermediate_acting_insulin',
  4: 'long_acting_insulin',
  5: 'pre_mixed_insulin',
});

export interface GlucoseMeasurementContext {
  readonly sequenceNumber: number;
  readonly extendedFlags?: number;
  /** Amount in kg. */
  readonly carbohydrate?: { readonly type: ReturnType<typeof CARBOHYDRATE_TYPES.decode>; readonly amount: number };
  readonly meal?: ReturnType<typeof MEAL_TYPES.decode>;
  readonly tester?: ReturnType<typeof TESTER_TYPES.decode>;
  readonly health?: ReturnType<typeof HEALTH_TYPES.decode>;
  /** Duration in seconds, intensity in percent. */
  readonly exercise?: { readonly duration: number; readonly intensity: number };
  readonly medication?: {
    readonly type: ReturnType<typeof MEDICATION_TYPES.decode>;
    readonly amount: number;
    readonly unit: 'kg' | 'L';
  };
  /** Percent. */
  readonly hba1c?: number;
}

/**
 * Glucose Measurement Context (0x2A34).
 *
 * Refines the Glucose Measurement with the same sequence number, so that
 * measurement is a required dependency and the sequence numbers must agree.
 *
 *   Byte 0    : Flags
 *   Bytes 1-2 : Sequence Number
 *   Then Extended Flags (1), Carbohydrate ID (1) + amount (SFLOAT), Meal (1),
 *   Tester/Health (1), Exercise Duration (2) + Intensity (1),
 *   Medication ID (1) + amount (SFLOAT), HbA1c (SFLOAT).
 */
export class GlucoseMeasurementContextCharacteristic extends BaseCharacteristic<GlucoseMeasurementContext> {
  static readonly uuid = uuid16(0x2a34);
  static readonly displayName = 'Glucose Measurement Context';

  readonly role = 'measurement';
  readonly constraints = defineConstraints({ minLength: 3, maxLength: 17, expectedType: 'object' });
  readonly dependencies = {
    required: [GlucoseMeasurementCharacteristic.uuid],
    optional: [],
  };

  protected decodeValue(data: Buffer, context: DecodeContext, trace: ParseTrace): GlucoseMeasurementContext {
    const reader = new FieldReader(data, trace);
    const flags = decodeFlags(reader.read('flags', 1, decodeUint8), FLAG_NAMES);
    const sequenceNumber = reader.read('sequence_number', 2, decodeUint16);

    const measurement = context.valueOf(GlucoseMeasurementCharacteristic.uuid);
    if (isGlucoseMeasurement(measurement) && measurement.sequenceNumber !== sequenceNumber) {
      throw reader.fail(
        'sequence_number',
        1,
        `${sequenceNumber} does not match Glucose Measurement sequence number ${measurement.sequenceNumber}`,
      );
    }

    const extendedFlags = flags.has('extended_flags_present')
      ? reader.read('extended_flags', 1, decodeUint8)
      : undefined;
    const carbohydrate = flags.has('carbohydrate_present')
      ? {
          type: reader.read('carbohydrate_id', 1, (d, at) => CARBOHYDRATE_TYPES.decode(decodeUint8(d, at))),
          amount: reader.read('carbohydrate', 2, decodeMedicalFloat16),
        }
      : undefined;
    const meal = flags.has('meal_present')
      ? reader.read('meal', 1, (d, at) => MEAL_TYPES.decode(decodeUint8(d, at)))
      : undefined;

    let tester: GlucoseMeasurementContext['tester'];
    let health: GlucoseMeasurementContext['health'];
    if (flags.has('tester_health_present')) {
      ({ tester, health } = reader.read('tester_health', 1, (d, at) => {
        const packed = decodeUint8(d, at);
        return {
          tester: TESTER_TYPES.decode(extractField(packed, 0, 4, 8)),
          health: HEALTH_TYPES.decode(extractField(packed, 4, 4, 8)),
        };
      }));
    }

    const exercise = flags.has('exercise_present')
      ? {
          duration: reader.read('exercise_duration', 2, decodeUint16),
          intensity: reader.read('exercise_intensity', 1, decodeUint8),
        }
      : undefined;
    const medication = flags.has('medication_present')
      ? {
          type: reader.read('medication_id', 1, (d, at) => MEDICATION_TYPES.decode(decodeUint8(d, at))),
          amount: reader.read('medication', 2, decodeMedicalFloat16),
          unit: flags.has('medication_units_litres') ? ('L' as const) : ('kg' as const),
        }
      : undefined;
    const hba1c = flags.has('hba1c_present') ? reader.read('hba1c', 2, decodeMedicalFloat16) : undefined;

    return { sequenceNumber, extendedFlags, carbohydrate, meal, tester, health, exercise, medication, hba1c };
  }

  protected encodeValue(value: GlucoseMeasurementContext): Buffer {
    const flags = new Set<ContextFlag>();
    const parts = [encodeUint16(value.sequenceNumber)];

    if (value.extendedFlags !== undefined) {
      flags.add('extended_flags_present');
      parts.push(encodeUint8(value.extendedFlags));
    }
    if (value.carbohydrate !== undefined) {
      flags.add('carbohydrate_present');
      parts.push(
        encodeUint8(CARBOHYDRATE_TYPES.encode(value.carbohydrate.type)),
        encodeMedicalFloat16(value.carbohydrate.amount),
      );
    }
    if (value.meal !== undefined) {
      flags.add('meal_present');
      parts.push(encodeUint8(MEAL_TYPES.encode(value.meal)));
    }
    if (value.tester !== undefined || value.health !== undefined) {
      if (value.tester === undefined) throw new TypeMismatchError('tester', 'tester type', 'undefined');
      if (value.health === undefined) throw new TypeMismatchError('health', 'health type', 'undefined');
      flags.add('tester_health_present');
      parts.push(
        encodeUint8(
          mergeFields(
            [
              { value: TESTER_TYPES.encode(value.tester), start: 0, width: 4 },
              { value: HEALTH_TYPES.encode(value.health), start: 4, width: 4 },
            ],
            8,
          ),
        ),
      );
    }
    if (value.exercise !== undefined) {
      flags.add('exercise_present');
      parts.push(encodeUint16(value.exercise.duration), encodeUint8(value.exercise.intensity));
    }
    if (value.medication !== undefined) {
      flags.add('medication_present');
      if (value.medication.unit === 'L') flags.add('medication_units_litres');
      parts.push(
        encodeUint8(MEDICATION_TYPES.encode(value.medication.type)),
        encodeMedicalFloat16(value.medication.amount),
      );
    }
    if (value.hba1c !== undefined) {
      flags.add('hba1c_present');
      parts.push(encodeMedicalFloat16(value.hba1c));
    }

    return Buffer.concat([encodeUint8(encodeFlags(flags, FLAG_NAMES)), ...parts]);
  }
}
