import { TypeMismatchError, ValueRangeError } from '../errors.js';
import { decodeInt, encodeInt, formatName, intRange, type IntegerFormat } from './primitives.js';

/** A scale factor held as `multiplier / 10^decimals` so decoding is decimal-exact. */
export interface DecimalScale {
  readonly multiplier: number;
  readonly decimals: number;
}

const MAX_DECIMALS = 15;

/** Convert a factor like 0.01 or 0.005 into an integer multiplier over a power of ten. */
export function toDecimalScale(factor: number): DecimalScale {
  if (!Number.isFinite(factor) || factor === 0) {
    throw new RangeError(`Scale factor must be a finite non-zero number, got ${factor}`);
  }
  for (let decimals = 0; decimals <= MAX_DECIMALS; decimals++) {
    const m = factor * 10 ** decimals;
    const rounded = Math.round(m);
    if (Math.abs(m - rounded) <= 1e-9 * Math.max(1, Math.abs(m))) {
      return { multiplier: rounded, decimals };
    }
  }
  throw new RangeError(`Scale factor ${factor} has more than ${MAX_DECIMALS} decimal places`);
}

export interface ScaledOptions {
  /** Field name used in error messages. */
  readonly name?: string;
  /** Added to the raw integer before scaling. */
  readonly offset?: number;
  /** Raw integer meaning "value is not known"; decodes to undefined. */
  readonly unknownRaw?: number;
}

/**
 * Linear codec over a fixed-width integer:
 * `value = (raw + offset) * multiplier / 10^decimals`.
 */
export class ScaledTemplate {
  readonly name: string;
  readonly offset: number;
  readonly unknownRaw: number | undefined;
  private readonly scale: DecimalScale;

  constructor(
    readonly format: IntegerFormat,
    scale: number | DecimalScale,
    options: ScaledOptions = {},
  ) {
    this.scale = typeof scale === 'number' ? toDecimalScale(scale) : scale;
    if (!Number.isInteger(this.scale.multiplier) || this.scale.multiplier === 0) {
      throw new RangeError(`Scale multiplier must be a non-zero integer, got ${this.scale.multiplier}`);
    }
    this.name = options.name ?? formatName(format);
    this.offset = options.offset ?? 0;
    this.unknownRaw = options.unknownRaw;
  }

  /** Build from the registry's `M, d, b` form: `value = M * 10^d * (raw + b)`. */
  static fromMdb(
    format: IntegerFormat,
    m: number,
    d: number,
    b: number,
    options: Omit<ScaledOptions, 'offset'> = {},
  ): ScaledTemplate {
    const scale: DecimalScale = d < 0 ? { multiplier: m, decimals: -d } : { multiplier: m * 10 ** d, decimals: 0 };
    return new ScaledTemplate(format, scale, { ...options, offset: b });
  }

  get byteLength(): number {
    return this.format.width;
  }

  /** Smallest step between two representable values. */
  get resolution(): number {
    return Math.abs(this.scale.multiplier) / 10 ** this.scale.decimals;
  }

  /** Physical [min, max] the raw range maps onto. */
  get range(): [number, number] {
    const [lo, hi] = intRange(this.format).map((raw) => this.fromRaw(raw));
    return lo <= hi ? [lo, hi] : [hi, lo];
  }

  fromRaw(raw: number): number {
    return ((raw + this.offset) * this.scale.multiplier) / 10 ** this.scale.decimals;
  }

  toRaw(value: number): number {
    if (!Number.isFinite(value)) throw new TypeMismatchError(this.name, 'finite number', String(value));
    const raw = Math.round((value * 10 ** this.scale.decimals) / this.scale.multiplier) - this.offset;
    const [min, max] = intRange(this.format);
    if (raw < min || raw > max || raw === this.unknownRaw) {
      const [lo, hi] = this.range;
      throw new ValueRangeError(this.name, value, lo, hi);
    }
    return raw;
  }

  decode(data: Uint8Array, offset = 0): number | undefined {
    const raw = decodeInt(data, offset, this.format);
    if (raw === this.unknownRaw) return undefined;
    return this.fromRaw(raw);
  }

  /** Encode a physical value; `undefined` writes the "unknown" raw value when one is declared. */
  encode(value: number | undefined): Buffer {
    if (value === undefined) {
      if (this.unknownRaw === undefined) throw new TypeMismatchError(this.name, 'number', 'undefined');
      return encodeInt(this.unknownRaw, this.format, this.name);
    }
    return encodeInt(this.toRaw(value), this.format, this.name);
  }
}
