import {
  InsufficientDataError,
  LengthMismatchError,
  TypeMismatchError,
  ValueRangeError,
} from '../errors.js';

export type Endianness = 'little' | 'big';
export type IntWidth = 1 | 2 | 3 | 4;

export interface IntegerFormat {
  readonly width: IntWidth;
  readonly signed: boolean;
  /** Defaults to little-endian, the byte order of every GATT payload. */
  readonly endian?: Endianness;
}

export const UINT8: IntegerFormat = { width: 1, signed: false };
export const SINT8: IntegerFormat = { width: 1, signed: true };
export const UINT16: IntegerFormat = { width: 2, signed: false };
export const SINT16: IntegerFormat = { width: 2, signed: true };
export const UINT24: IntegerFormat = { width: 3, signed: false };
export const SINT24: IntegerFormat = { width: 3, signed: true };
export const UINT32: IntegerFormat = { width: 4, signed: false };
export const SINT32: IntegerFormat = { width: 4, signed: true };

export function formatName(format: IntegerFormat): string {
  return `${format.signed ? 'sint' : 'uint'}${format.width * 8}`;
}

/** Inclusive [min, max] a raw integer of this format can hold. */
export function intRange(format: IntegerFormat): [number, number] {
  const bits = format.width * 8;
  if (format.signed) return [-(2 ** (bits - 1)), 2 ** (bits - 1) - 1];
  return [0, 2 ** bits - 1];
}

export function ensureAvailable(
  data: Uint8Array,
  offset: number,
  width: number,
  subject: string,
): void {
  if (offset < 0 || offset + width > data.length) {
    throw new InsufficientDataError(subject, Math.max(0, data.length - offset), width);
  }
}

function asBuffer(data: Uint8Array): Buffer {
  return Buffer.isBuffer(data) ? data : Buffer.from(data.buffer, data.byteOffset, data.byteLength);
}

// ─── Integers ────────────────────────────────────────────────────────────────

export function decodeInt(data: Uint8Array, offset: number, format: IntegerFormat): number {
  ensureAvailable(data, offset, format.width, formatName(format));
  const buf = asBuffer(data);
  const big = format.endian === 'big';
  if (format.signed) {
    return big ? buf.readIntBE(offset, format.width) : buf.readIntLE(offset, format.width);
  }
  return big ? buf.readUIntBE(offset, format.width) : buf.readUIntLE(offset, format.width);
}

/**
 * Encode an integer. Out-of-range values are rejected rather than wrapped
 * or truncated.
 */
export function encodeInt(value: number, format: IntegerFormat, field?: string): Buffer {
  const name = field ?? formatName(format);
  if (!Number.isInteger(value)) {
    throw new TypeMismatchError(name, 'integer', Number.isFinite(value) ? 'fraction' : String(value));
  }
  const [min, max] = intRange(format);
  if (value < min || value > max) throw new ValueRangeError(name, value, min, max);

  const buf = Buffer.alloc(format.width);
  const big = format.endian === 'big';
  if (format.signed) {
    if (big) buf.writeIntBE(value, 0, format.width);
    else buf.writeIntLE(value, 0, format.width);
  } else if (big) {
    buf.writeUIntBE(value, 0, format.width);
  } else {
    buf.writeUIntLE(value, 0, format.width);
  }
  return buf;
}

export const decodeUint8 = (data: Uint8Array, offset = 0): number => decodeInt(data, offset, UINT8);
export const decodeSint8 = (data: Uint8Array, offset = 0): number => decodeInt(data, offset, SINT8);
export const decodeUint16 = (data: Uint8Array, offset = 0): number =>
  decodeInt(data, offset, UINT16);
export const decodeSint16 = (data: Uint8Array, offset = 0): number =>
  decodeInt(data, offset, SINT16);
export const decodeUint24 = (data: Uint8Array, offset = 0): number =>
  decodeInt(data, offset, UINT24);
export const decodeSint24 = (data: Uint8Array, offset = 0): number =>
  decodeInt(data, offset, SINT24);
export const decodeUint32 = (data: Uint8Array, offset = 0): number =>
  decodeInt(data, offset, UINT32);
export const decodeSint32 = (data: Uint8Array, offset = 0): number =>
  decodeInt(data, offset, SINT32);

export const encodeUint8 = (value: number): Buffer => encodeInt(value, UINT8);
export const encodeSint8 = (value: number): Buffer => encodeInt(value, SINT8);
export const encodeUint16 = (value: number): Buffer => encodeInt(value, UINT16);
export const encodeSint16 = (value: number): Buffer => encodeInt(value, SINT16);
export const encodeUint24 = (value: number): Buffer => encodeInt(value, UINT24);
export const encodeSint24 = (value: number): Buffer => encodeInt(value, SINT24);
export const encodeUint32 = (value: number): Buffer => encodeInt(value, UINT32);
export const encodeSint32 = (value: number): Buffer => encodeInt(value, SINT32);

// ─── IEEE-754 floats (little-endian) ─────────────────────────────────────────

export function decodeFloat32(data: Uint8Array, offset = 0): number {
  ensureAvailable(data, offset, 4, 'float32');
  return asBuffer(data).readFloatLE(offset);
}

export function decodeFloat64(data: Uint8Array, offset = 0): number {
  ensureAvailable(data, offset, 8, 'float64');
  return asBuffer(data).readDoubleLE(offset);
}

export function encodeFloat32(value: number): Buffer {
  const buf = Buffer.alloc(4);
  buf.writeFloatLE(value, 0);
  return buf;
}

export function encodeFloat64(value: number): Buffer {
  const buf = Buffer.alloc(8);
  buf.writeDoubleLE(value, 0);
  return buf;
}

// ─── Strings and opaque blobs ────────────────────────────────────────────────

/** Decode UTF-8 from `offset` up to the first NUL terminator (or end of data). */
export function decodeUtf8(data: Uint8Array, offset = 0): string {
  if (offset > data.length) throw new InsufficientDataError('utf8', 0, offset - data.length);
  const buf = asBuffer(data);
  const nul = buf.indexOf(0, offset);
  return buf.toString('utf8', offset, nul === -1 ? buf.length : nul);
}

export function encodeUtf8(value: string): Buffer {
  return Buffer.from(value, 'utf8');
}

/** Return a copy of `data` after checking `min <= length <= max`. */
export function decodeVariable(data: Uint8Array, min: number, max: number): Buffer {
  if (data.length < min) throw new InsufficientDataError('variable-length field', data.length, min);
  if (data.length > max) throw new LengthMismatchError('variable-length field', data.length, max);
  return Buffer.from(data);
}
