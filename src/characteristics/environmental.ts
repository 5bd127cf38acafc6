import { SINT16, UINT16, UINT32 } from '../codec/primitives.js';
import { ScaledTemplate } from '../codec/scaled.js';
import { uuid16 } from '../uuid.js';
import { defineConstraints } from '../validation.js';
import { ScaledCharacteristic } from './templates.js';

// Environmental Sensing readings: one scaled little-endian integer each.

/** Temperature (0x2A6E): sint16, 0.01 °C, 0x8000 = not known. */
export class TemperatureCharacteristic extends ScaledCharacteristic {
  static readonly uuid = uuid16(0x2a6e);
  static readonly displayName = 'Temperature';

  readonly role = 'measurement';
  protected readonly template = new ScaledTemplate(SINT16, 0.01, {
    name: 'temperature',
    unknownRaw: -0x8000,
  });
  readonly constraints = defineConstraints({
    expectedLength: 2,
    minValue: -273.15,
    maxValue: 327.67,
    expectedType: 'number',
  });
}

/** Humidity (0x2A6F): uint16, 0.01 %, 0xFFFF = not known. */
export class HumidityCharacteristic extends ScaledCharacteristic {
  static readonly uuid = uuid16(0x2a6f);
  static readonly displayName = 'Humidity';

  readonly role = 'measurement';
  protected readonly template = new ScaledTemplate(UINT16, 0.01, {
    name: 'humidity',
    unknownRaw: 0xffff,
  });
  readonly constraints = defineConstraints({
    expectedLength: 2,
    minValue: 0,
    maxValue: 100,
    expectedType: 'number',
  });
}

/** Pressure (0x2A6D): uint32, 0.1 Pa. */
export class PressureCharacteristic extends ScaledCharacteristic {
  static readonly uuid = uuid16(0x2a6d);
  static readonly displayName = 'Pressure';

  readonly role = 'measurement';
  protected readonly template = new ScaledTemplate(UINT32, 0.1, { name: 'pressure' });
  readonly constraints = defineConstraints({
    expectedLength: 4,
    minValue: 0,
    expectedType: 'number',
  });
}
