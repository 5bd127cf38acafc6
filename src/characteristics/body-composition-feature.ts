import { decodeFlags, encodeFlags, extractField, mergeFields } from '../codec/bit-field.js';
import { decodeUint32, encodeUint32 } from '../codec/primitives.js';
import { uuid16 } from '../uuid.js';
import { defineConstraints } from '../validation.js';
import { BaseCharacteristic } from './base.js';
import { checkResolutionCode, MAX_HEIGHT_RESOLUTION_CODE, MAX_MASS_RESOLUTION_CODE } from './body-metrics.js';

const FEATURE_NAMES = [
  'timestamp_supported',
  'multiple_users_supported',
  'basal_metabolism_supported',
  'muscle_percentage_supported',
  'muscle_mass_supported',
  'fat_free_mass_supported',
  'soft_lean_mass_supported',
  'body_water_mass_supported',
  'impedance_supported',
  'weight_supported',
  'height_supported',
] as const;

export type BodyCompositionFeatureFlag = (typeof FEATURE_NAMES)[number];

export interface BodyCompositionFeature {
  readonly features: readonly BodyCompositionFeatureFlag[];
  readonly massResolution: number;
  readonly heightResolution: number;
}

/**
 * Body Composition Feature (0x2A9B), uint32:
 *   bits 0-10  : feature flags
 *   bits 11-14 : mass resolution
 *   bits 15-17 : height resolution
 */
export class BodyCompositionFeatureCharacteristic extends BaseCharacteristic<BodyCompositionFeature> {
  static readonly uuid = uuid16(0x2a9b);
  static readonly displayName = 'Body Composition Feature';

  readonly role = 'feature';
  readonly constraints = defineConstraints({ expectedLength: 4, expectedType: 'object' });

  protected decodeValue(data: Buffer): BodyCompositionFeature {
    const raw = decodeUint32(data, 0);
    return {
      features: [...decodeFlags(extractField(raw, 0, 11), FEATURE_NAMES)],
      massResolution: extractField(raw, 11, 4),
      heightResolution: extractField(raw, 15, 3),
    };
  }

  protected encodeValue(value: BodyCompositionFeature): Buffer {
    return encodeUint32(
      mergeFields([
        { value: encodeFlags(value.features, FEATURE_NAMES), start: 0, width: 11 },
        {
          value: checkResolutionCode('mass_resolution', value.massResolution, MAX_MASS_RESOLUTION_CODE),
          start: 11,
          width: 4,
        },
        {
          value: checkResolutionCode('height_resolution', value.heightResolution, MAX_HEIGHT_RESOLUTION_CODE),
          start: 15,
          width: 3,
        },
      ]),
    );
  }
}

export function isBodyCompositionFeature(value: unknown): value is BodyCompositionFeature {
  return (
    typeof value === 'object' &&
    value !== null &&
    'features' in value &&
    Array.isArray(value.features) &&
    'massResolution' in value &&
    typeof value.massResolution === 'number' &&
    'heightResolution' in value &&
    typeof value.heightResolution === 'number'
  );
}
