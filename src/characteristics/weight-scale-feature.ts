import { decodeFlags, encodeFlags, extractField, mergeFields } from '../codec/bit-field.js';
import { decodeUint32, encodeUint32 } from '../codec/primitives.js';
import { uuid16 } from '../uuid.js';
import { defineConstraints } from '../validation.js';
import { BaseCharacteristic } from './base.js';
import { checkResolutionCode, MAX_HEIGHT_RESOLUTION_CODE, MAX_MASS_RESOLUTION_CODE } from './body-metrics.js';

const FEATURE_NAMES = ['timestamp_supported', 'multiple_users_supported', 'bmi_supported'] as const;

export type WeightScaleFeatureFlag = (typeof FEATURE_NAMES)[number];

export interface WeightScaleFeature {
  readonly features: readonly WeightScaleFeatureFlag[];
  /** Mass resolution code, see `massResolution()`. 0 = not specified. */
  readonly weightResolution: number;
  /** Height resolution code, see `heightResolution()`. 0 = not specified. */
  readonly heightResolution: number;
}

/**
 * Weight Scale Feature (0x2A9E), uint32:
 *   bits 0-2 : feature flags
 *   bits 3-6 : weight resolution
 *   bits 7-9 : height resolution
 */
export class WeightScaleFeatureCharacteristic extends BaseCharacteristic<WeightScaleFeature> {
  static readonly uuid = uuid16(0x2a9e);
  static readonly displayName = 'Weight Scale Feature';

  readonly role = 'feature';
  readonly constraints = defineConstraints({ expectedLength: 4, expectedType: 'object' });

  protected decodeValue(data: Buffer): WeightScaleFeature {
    const raw = decodeUint32(data, 0);
    return {
      features: [...decodeFlags(extractField(raw, 0, 3), FEATURE_NAMES)],
      weightResolution: extractField(raw, 3, 4),
      heightResolution: extractField(raw, 7, 3),
    };
  }

  protected encodeValue(value: WeightScaleFeature): Buffer {
    return encodeUint32(
      mergeFields([
        { value: encodeFlags(value.features, FEATURE_NAMES), start: 0, width: 3 },
        {
          value: checkResolutionCode('weight_resolution', value.weightResolution, MAX_MASS_RESOLUTION_CODE),
          start: 3,
          width: 4,
        },
        {
          value: checkResolutionCode('height_resolution', value.heightResolution, MAX_HEIGHT_RESOLUTION_CODE),
          start: 7,
          width: 3,
        },
      ]),
    );
  }
}

export function isWeightScaleFeature(value: unknown): value is WeightScaleFeature {
  return (
    typeof value === 'object' &&
    value !== null &&
    'features' in value &&
    Array.isArray(value.features) &&
    'weightResolution' in value &&
    typeof value.weightResolution === 'number' &&
    'heightResolution' in value &&
    typeof value.heightResolution === 'number'
  );
}
