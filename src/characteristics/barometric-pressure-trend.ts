import { EnumCodec } from '../codec/enum.js';
import { UINT8 } from '../codec/primitives.js';
import { uuid16 } from '../uuid.js';
import { defineConstraints } from '../validation.js';
import { EnumCharacteristic } from './templates.js';

const TRENDS = new EnumCodec('barometric_pressure_trend', {
  0: 'unknown',
  1: 'continuously_falling',
  2: 'continuously_rising',
  3: 'falling_then_steady',
  4: 'rising_then_steady',
  5: 'falling_before_lesser_rise',
  6: 'falling_before_greater_rise',
  7: 'rising_before_greater_fall',
  8: 'rising_before_lesser_fall',
  9: 'steady',
});

export type BarometricPressureTrend = ReturnType<typeof TRENDS.decode>;

/** Barometric Pressure Trend (0x2AA3): uint8 enumeration, 10-255 reserved. */
export class BarometricPressureTrendCharacteristic extends EnumCharacteristic<BarometricPressureTrend> {
  static readonly uuid = uuid16(0x2aa3);
  static readonly displayName = 'Barometric Pressure Trend';

  readonly role = 'measurement';
  protected readonly format = UINT8;
  protected readonly members = TRENDS;
  readonly constraints = defineConstraints({ expectedLength: 1, expectedType: 'string' });
}
