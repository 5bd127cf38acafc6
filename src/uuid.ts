import { UuidResolutionError } from './errors.js';

/** Everything after the 16/32-bit slot of the Bluetooth Base UUID. */
export const BT_BASE_UUID_SUFFIX = '00001000800000805f9b34fb';

const HEX_RE = /^[0-9a-f]+$/;

function normalize(input: string | number): string | undefined {
  if (typeof input === 'number') {
    if (!Number.isInteger(input) || input < 0 || input > 0xffffffff) return undefined;
    return `${input.toString(16).padStart(8, '0')}${BT_BASE_UUID_SUFFIX}`;
  }

  let clean = input.trim().toLowerCase().replace(/-/g, '');
  if (clean.startsWith('0x')) clean = clean.slice(2);
  if (!HEX_RE.test(clean)) return undefined;

  switch (clean.length) {
    case 4:
      return `0000${clean}${BT_BASE_UUID_SUFFIX}`;
    case 8:
      return `${clean}${BT_BASE_UUID_SUFFIX}`;
    case 32:
      return clean;
    default:
      return undefined;
  }
}

/**
 * Immutable Bluetooth attribute identifier.
 *
 * Accepts 16-bit (`"2A19"`, `"0x2a19"`, `0x2A19`), 32-bit and 128-bit forms,
 * with or without dashes. The canonical key is the 32-char lowercase long form.
 */
export class BluetoothUuid {
  readonly longForm: string;

  private constructor(longForm: string) {
    this.longForm = longForm;
  }

  /** Parse an identifier; throws UuidResolutionError for malformed input. */
  static from(input: string | number | BluetoothUuid): BluetoothUuid {
    if (input instanceof BluetoothUuid) return input;
    const long = normalize(input);
    if (!long) throw new UuidResolutionError(String(input));
    return new BluetoothUuid(long);
  }

  /** Like `from()`, but returns undefined instead of throwing. */
  static tryParse(input: string | number | BluetoothUuid): BluetoothUuid | undefined {
    if (input instanceof BluetoothUuid) return input;
    const long = normalize(input);
    return long ? new BluetoothUuid(long) : undefined;
  }

  /** True when the identifier sits on the Bluetooth Base UUID (SIG-assigned range). */
  get isSigBase(): boolean {
    return this.longForm.startsWith('0000') && this.longForm.endsWith(BT_BASE_UUID_SUFFIX);
  }

  /** 16-bit form (`"2a19"`) for SIG-assigned identifiers, otherwise the long form. */
  get shortForm(): string {
    return this.isSigBase ? this.longForm.slice(4, 8) : this.longForm;
  }

  get dashedForm(): string {
    const l = this.longForm;
    return `${l.slice(0, 8)}-${l.slice(8, 12)}-${l.slice(12, 16)}-${l.slice(16, 20)}-${l.slice(20)}`;
  }

  equals(other: string | number | BluetoothUuid): boolean {
    const o = BluetoothUuid.tryParse(other);
    return o !== undefined && o.longForm === this.longForm;
  }

  toString(): string {
    return this.dashedForm;
  }
}

/** Canonical key for a 16-bit SIG identifier. */
export function uuid16(code: number): string {
  return `0000${code.toString(16).padStart(4, '0')}${BT_BASE_UUID_SUFFIX}`;
}
