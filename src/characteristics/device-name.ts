import { decodeUtf8, encodeUtf8 } from '../codec/primitives.js';
import { LengthMismatchError } from '../errors.js';
import { uuid16 } from '../uuid.js';
import { defineConstraints } from '../validation.js';
import { BaseCharacteristic } from './base.js';

const MAX_NAME_BYTES = 248;

/** Device Name (0x2A00): UTF-8, optionally NUL-terminated. */
export class DeviceNameCharacteristic extends BaseCharacteristic<string> {
  static readonly uuid = uuid16(0x2a00);
  static readonly displayName = 'Device Name';

  readonly role = 'info';
  readonly constraints = defineConstraints({
    minLength: 0,
    maxLength: MAX_NAME_BYTES,
    expectedType: 'string',
  });

  protected decodeValue(data: Buffer): string {
    return decodeUtf8(data, 0);
  }

  protected encodeValue(value: string): Buffer {
    const bytes = encodeUtf8(value);
    if (bytes.length > MAX_NAME_BYTES) throw new LengthMismatchError(this.name, bytes.length, MAX_NAME_BYTES);
    return bytes;
  }
}
