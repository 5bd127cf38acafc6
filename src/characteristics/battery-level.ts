import { decodeUint8, encodeUint8 } from '../codec/primitives.js';
import { uuid16 } from '../uuid.js';
import { defineConstraints } from '../validation.js';
import { BaseCharacteristic } from './base.js';

/** Battery Level (0x2A19): remaining charge, uint8 percent. */
export class BatteryLevelCharacteristic extends BaseCharacteristic<number> {
  static readonly uuid = uuid16(0x2a19);
  static readonly displayName = 'Battery Level';

  readonly role = 'status';
  readonly constraints = defineConstraints({
    expectedLength: 1,
    minValue: 0,
    maxValue: 100,
    expectedType: 'number',
  });

  protected decodeValue(data: Buffer): number {
    return decodeUint8(data, 0);
  }

  protected encodeValue(value: number): Buffer {
    return encodeUint8(value);
  }
}
