import { SpecialFloatFormatError, ValueRangeError } from '../errors.js';
import { extractField, mergeFields, signExtend } from './bit-field.js';
import { decodeInt, encodeInt, ensureAvailable, UINT16, UINT32 } from './primitives.js';

/**
 * IEEE 11073-20601 medical floats.
 *
 * SFLOAT (16 bit): 4-bit exponent, 12-bit mantissa.
 * FLOAT  (32 bit): 8-bit exponent, 24-bit mantissa.
 * value = mantissa * 10^exponent, both two's complement.
 *
 * Five mantissa codes at the top of the range are reserved. They are only
 * valid with a zero exponent.
 */

export type MedicalFloatKind = 'finite' | 'nan' | 'nres' | 'positive-infinity' | 'negative-infinity' | 'reserved';

export interface MedicalFloatInfo {
  readonly kind: MedicalFloatKind;
  readonly value: number;
  readonly mantissa: number;
  readonly exponent: number;
}

interface FloatLayout {
  readonly name: 'SFLOAT' | 'FLOAT';
  readonly bytes: 2 | 4;
  readonly mantissaBits: number;
  readonly exponentBits: number;
  readonly minExponent: number;
  readonly maxExponent: number;
  /** Largest finite mantissa magnitude; everything above is reserved. */
  readonly maxMantissa: number;
  /** Raw (unsigned) mantissa codes of the reserved values. */
  readonly special: Readonly<Record<Exclude<MedicalFloatKind, 'finite'>, number>>;
}

const SFLOAT: FloatLayout = {
  name: 'SFLOAT',
  bytes: 2,
  mantissaBits: 12,
  exponentBits: 4,
  minExponent: -8,
  maxExponent: 7,
  maxMantissa: 0x07fd,
  special: {
    nan: 0x07ff,
    nres: 0x0800,
    'positive-infinity': 0x07fe,
    'negative-infinity': 0x0802,
    reserved: 0x0801,
  },
};

const FLOAT: FloatLayout = {
  name: 'FLOAT',
  bytes: 4,
  mantissaBits: 24,
  exponentBits: 8,
  minExponent: -128,
  maxExponent: 127,
  maxMantissa: 0x7ffffd,
  special: {
    nan: 0x7fffff,
    nres: 0x800000,
    'positive-infinity': 0x7ffffe,
    'negative-infinity': 0x800002,
    reserved: 0x800001,
  },
};

const SPECIAL_VALUES: Readonly<Record<Exclude<MedicalFloatKind, 'finite'>, number>> = {
  nan: NaN,
  nres: NaN,
  'positive-infinity': Infinity,
  'negative-infinity': -Infinity,
  reserved: NaN,
};

function scale(mantissa: number, exponent: number): number {
  // Dividing by an exact power of ten keeps results like 2404e-2 === 24.04
  return exponent < 0 ? mantissa / 10 ** -exponent : mantissa * 10 ** exponent;
}

function specialKind(layout: FloatLayout, rawMantissa: number): Exclude<MedicalFloatKind, 'finite'> | undefined {
  for (const [kind, code] of Object.entries(layout.special)) {
    if (code === rawMantissa && isSpecialKind(kind)) return kind;
  }
  return undefined;
}

function isSpecialKind(kind: string): kind is Exclude<MedicalFloatKind, 'finite'> {
  return kind in SPECIAL_VALUES;
}

function inspect(layout: FloatLayout, raw: number, bytes: Uint8Array): MedicalFloatInfo {
  const total = layout.mantissaBits + layout.exponentBits;
  const rawMantissa = extractField(raw, 0, layout.mantissaBits, total);
  const exponent = signExtend(extractField(raw, layout.mantissaBits, layout.exponentBits, total), layout.exponentBits);
  const mantissa = signExtend(rawMantissa, layout.mantissaBits);

  const kind = specialKind(layout, rawMantissa);
  if (kind !== undefined) {
    if (exponent !== 0) {
      throw new SpecialFloatFormatError(
        layout.name,
        bytes,
        `reserved mantissa 0x${rawMantissa.toString(16)} with non-zero exponent ${exponent}`,
      );
    }
    return { kind, value: SPECIAL_VALUES[kind], mantissa, exponent };
  }
  return { kind: 'finite', value: scale(mantissa, exponent), mantissa, exponent };
}

function roundHalfAway(x: number): number {
  return Math.sign(x) * Math.round(Math.abs(x));
}

function pack(layout: FloatLayout, mantissa: number, exponent: number): number {
  const total = layout.mantissaBits + layout.exponentBits;
  return mergeFields(
    [
      { value: mantissa & (2 ** layout.mantissaBits - 1), start: 0, width: layout.mantissaBits },
      { value: exponent & (2 ** layout.exponentBits - 1), start: layout.mantissaBits, width: layout.exponentBits },
    ],
    total,
  );
}

/**
 * Pick the (mantissa, exponent) pair closest to `value`. Exponents are tried
 * from the smallest up so the first exact fit keeps the most digits.
 */
function encodeRaw(layout: FloatLayout, value: number): number {
  if (Number.isNaN(value)) return layout.special.nan;
  if (value === Infinity) return layout.special['positive-infinity'];
  if (value === -Infinity) return layout.special['negative-infinity'];
  if (value === 0) return 0;

  let best: { mantissa: number; exponent: number; error: number } | undefined;
  for (let exponent = layout.minExponent; exponent <= layout.maxExponent; exponent++) {
    const mantissa = roundHalfAway(exponent < 0 ? value * 10 ** -exponent : value / 10 ** exponent);
    if (Math.abs(mantissa) > layout.maxMantissa) continue;
    const error = Math.abs(scale(mantissa, exponent) - value);
    if (best === undefined || error < best.error) best = { mantissa, exponent, error };
    if (error === 0) break;
  }

  if (best === undefined) {
    const limit = scale(layout.maxMantissa, layout.maxExponent);
    throw new ValueRangeError(layout.name, value, -limit, limit);
  }
  return pack(layout, best.mantissa, best.exponent);
}

// ─── SFLOAT ──────────────────────────────────────────────────────────────────

export function inspectMedicalFloat16(data: Uint8Array, offset = 0): MedicalFloatInfo {
  ensureAvailable(data, offset, SFLOAT.bytes, SFLOAT.name);
  return inspect(SFLOAT, decodeInt(data, offset, UINT16), data.subarray(offset, offset + SFLOAT.bytes));
}

/** Decode a 2-byte SFLOAT. Reserved codes map to NaN or ±Infinity. */
export function decodeMedicalFloat16(data: Uint8Array, offset = 0): number {
  return inspectMedicalFloat16(data, offset).value;
}

export function encodeMedicalFloat16(value: number): Buffer {
  return encodeInt(encodeRaw(SFLOAT, value), UINT16);
}

// ─── FLOAT ───────────────────────────────────────────────────────────────────

export function inspectMedicalFloat32(data: Uint8Array, offset = 0): MedicalFloatInfo {
  ensureAvailable(data, offset, FLOAT.bytes, FLOAT.name);
  return inspect(FLOAT, decodeInt(data, offset, UINT32), data.subarray(offset, offset + FLOAT.bytes));
}

export function decodeMedicalFloat32(data: Uint8Array, offset = 0): number {
  return inspectMedicalFloat32(data, offset).value;
}

export function encodeMedicalFloat32(value: number): Buffer {
  return encodeInt(encodeRaw(FLOAT, value), UINT32);
}

// ─── Date Time (7 bytes) ─────────────────────────────────────────────────────

export const DATE_TIME_LENGTH = 7;

export interface DateTimeValue {
  readonly year: number;
  readonly month: number;
  readonly day: number;
  readonly hours: number;
  readonly minutes: number;
  readonly seconds: number;
}

const DATE_TIME_BOUNDS: ReadonlyArray<[keyof DateTimeValue, number, number]> = [
  ['year', 1582, 9999],
  ['month', 1, 12],
  ['day', 1, 31],
  ['hours', 0, 23],
  ['minutes', 0, 59],
  ['seconds', 0, 59],
];

function checkDateTime(value: DateTimeValue): void {
  for (const [field, min, max] of DATE_TIME_BOUNDS) {
    const v = value[field];
    if (!Number.isInteger(v) || v < min || v > max) throw new ValueRangeError(field, v, min, max);
  }
}

/**
 * Decode year (uint16) + month, day, hours, minutes, seconds (uint8 each).
 * Seven zero bytes mean "no timestamp" and decode to undefined.
 */
export function decodeDateTime(data: Uint8Array, offset = 0): DateTimeValue | undefined {
  ensureAvailable(data, offset, DATE_TIME_LENGTH, 'date_time');
  const bytes = data.subarray(offset, offset + DATE_TIME_LENGTH);
  if (bytes.every((b) => b === 0)) return undefined;

  const value: DateTimeValue = {
    year: decodeInt(data, offset, UINT16),
    month: bytes[2],
    day: bytes[3],
    hours: bytes[4],
    minutes: bytes[5],
    seconds: bytes[6],
  };
  checkDateTime(value);
  return value;
}

export function encodeDateTime(value: DateTimeValue | undefined): Buffer {
  if (value === undefined) return Buffer.alloc(DATE_TIME_LENGTH);
  checkDateTime(value);
  return Buffer.from([
    ...encodeInt(value.year, UINT16),
    value.month,
    value.day,
    value.hours,
    value.minutes,
    value.seconds,
  ]);
}
