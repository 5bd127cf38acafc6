/**
 * Pure bit-field helpers for packed flag bytes, feature bitmaps and status words.
 *
 * All values are unsigned integers of at most 32 bits. Invalid positions or
 * widths are programmer errors and throw RangeError.
 */

export const MAX_BIT_WIDTH = 32;

/** A `(value, start, width)` triple for merge operations. */
export interface BitField {
  readonly value: number;
  readonly start: number;
  readonly width: number;
}

/** A `(start, width)` pair for split operations. */
export interface BitFieldSpec {
  readonly start: number;
  readonly width: number;
}

function checkTotal(total: number): void {
  if (!Number.isInteger(total) || total < 1 || total > MAX_BIT_WIDTH) {
    throw new RangeError(`Total bit width must be 1..${MAX_BIT_WIDTH}, got ${total}`);
  }
}

function checkRange(start: number, width: number, total: number): void {
  checkTotal(total);
  if (!Number.isInteger(start) || !Number.isInteger(width) || start < 0 || width < 1) {
    throw new RangeError(`Invalid bit field: start=${start}, width=${width}`);
  }
  if (start + width > total) {
    throw new RangeError(`Bit field ${start}+${width} exceeds ${total}-bit width`);
  }
}

function checkValue(value: number, total: number): void {
  if (!Number.isInteger(value) || value < 0 || value > lowMask(total)) {
    throw new RangeError(`Value ${value} does not fit in ${total} bits`);
  }
}

function lowMask(width: number): number {
  return width >= 32 ? 0xffffffff : 2 ** width - 1;
}

/** True if the field lies inside the declared total width. */
export function isValidRange(start: number, width: number, total = MAX_BIT_WIDTH): boolean {
  return (
    Number.isInteger(start) &&
    Number.isInteger(width) &&
    start >= 0 &&
    width >= 1 &&
    total >= 1 &&
    total <= MAX_BIT_WIDTH &&
    start + width <= total
  );
}

/** Mask with `width` ones starting at `start`. */
export function createMask(start: number, width: number, total = MAX_BIT_WIDTH): number {
  checkRange(start, width, total);
  return (lowMask(width) << start) >>> 0;
}

export function extractField(value: number, start: number, width: number, total = MAX_BIT_WIDTH): number {
  checkRange(start, width, total);
  checkValue(value, total);
  return ((value >>> start) & lowMask(width)) >>> 0;
}

export function setField(
  value: number,
  field: number,
  start: number,
  width: number,
  total = MAX_BIT_WIDTH,
): number {
  checkRange(start, width, total);
  checkValue(value, total);
  if (!Number.isInteger(field) || field < 0 || field > lowMask(width)) {
    throw new RangeError(`Field value ${field} exceeds ${width}-bit capacity`);
  }
  const mask = createMask(start, width, total);
  return ((value & ~mask) | (field << start)) >>> 0;
}

// ─── Single bits ─────────────────────────────────────────────────────────────

function checkBit(bit: number, total: number): void {
  checkRange(bit, 1, total);
}

export function testBit(value: number, bit: number, total = MAX_BIT_WIDTH): boolean {
  checkBit(bit, total);
  return ((value >>> bit) & 1) === 1;
}

export function setBit(value: number, bit: number, total = MAX_BIT_WIDTH): number {
  checkBit(bit, total);
  return (value | (1 << bit)) >>> 0;
}

export function clearBit(value: number, bit: number, total = MAX_BIT_WIDTH): number {
  checkBit(bit, total);
  return (value & ~(1 << bit)) >>> 0;
}

export function toggleBit(value: number, bit: number, total = MAX_BIT_WIDTH): number {
  checkBit(bit, total);
  return (value ^ (1 << bit)) >>> 0;
}

export function testAny(value: number, mask: number): boolean {
  return ((value & mask) >>> 0) !== 0;
}

export function testAll(value: number, mask: number): boolean {
  return ((value & mask) >>> 0) === mask >>> 0;
}

// ─── Counting and scanning ───────────────────────────────────────────────────

export function popCount(value: number): number {
  let v = value >>> 0;
  let count = 0;
  while (v !== 0) {
    v &= v - 1;
    count++;
  }
  return count;
}

/** Position of the least significant set bit, or undefined for 0. */
export function firstSetBit(value: number): number | undefined {
  const v = value >>> 0;
  if (v === 0) return undefined;
  return 31 - Math.clz32(v & -v);
}

/** Position of the most significant set bit, or undefined for 0. */
export function lastSetBit(value: number): number | undefined {
  const v = value >>> 0;
  if (v === 0) return undefined;
  return 31 - Math.clz32(v);
}

/** Positions of every set bit, lowest first. */
export function setBitPositions(value: number): number[] {
  const positions: number[] = [];
  let v = value >>> 0;
  let bit = 0;
  while (v !== 0) {
    if (v & 1) positions.push(bit);
    v >>>= 1;
    bit++;
  }
  return positions;
}

/** 0 for an even number of set bits, 1 for odd. */
export function parity(value: number): number {
  return popCount(value) & 1;
}

// ─── Width-bounded transforms ────────────────────────────────────────────────

export function rotateLeft(value: number, positions: number, width = MAX_BIT_WIDTH): number {
  checkTotal(width);
  checkValue(value, width);
  const n = ((positions % width) + width) % width;
  if (n === 0) return value;
  const hi = (value * 2 ** n) % 2 ** width;
  const lo = Math.floor(value / 2 ** (width - n));
  return hi + lo;
}

export function rotateRight(value: number, positions: number, width = MAX_BIT_WIDTH): number {
  checkTotal(width);
  const n = ((positions % width) + width) % width;
  return rotateLeft(value, width - n, width);
}

export function reverseBits(value: number, width = MAX_BIT_WIDTH): number {
  checkTotal(width);
  checkValue(value, width);
  let result = 0;
  for (let i = 0; i < width; i++) {
    if (Math.floor(value / 2 ** i) % 2 === 1) result += 2 ** (width - 1 - i);
  }
  return result;
}

/** Copy a field of `width` bits from `source` at `sourceStart` into `dest` at `destStart`. */
export function copyField(
  source: number,
  dest: number,
  sourceStart: number,
  destStart: number,
  width: number,
  total = MAX_BIT_WIDTH,
): number {
  return setField(dest, extractField(source, sourceStart, width, total), destStart, width, total);
}

// ─── Multi-field ─────────────────────────────────────────────────────────────

/** Pack several fields into one integer. Fields must not overlap. */
export function mergeFields(fields: readonly BitField[], total = MAX_BIT_WIDTH): number {
  let result = 0;
  let used = 0;
  for (const f of fields) {
    const mask = createMask(f.start, f.width, total);
    if ((used & mask) !== 0) {
      throw new RangeError(`Bit field at ${f.start}+${f.width} overlaps a previous field`);
    }
    used = (used | mask) >>> 0;
    result = setField(result, f.value, f.start, f.width, total);
  }
  return result;
}

export function splitFields(
  value: number,
  specs: readonly BitFieldSpec[],
  total = MAX_BIT_WIDTH,
): number[] {
  return specs.map((s) => extractField(value, s.start, s.width, total));
}

// ─── Named flags ─────────────────────────────────────────────────────────────

/**
 * Names of the set bits in a bitmap. `names[i]` names bit `i`; `null`
 * entries are reserved bits and are skipped.
 */
export function decodeFlags<K extends string>(
  value: number,
  names: readonly (K | null)[],
): Set<K> {
  const out = new Set<K>();
  names.forEach((name, bit) => {
    if (name !== null && testBit(value, bit)) out.add(name);
  });
  return out;
}

/** Inverse of `decodeFlags()`. */
export function encodeFlags<K extends string>(
  flags: Iterable<K>,
  names: readonly (K | null)[],
): number {
  const wanted = new Set(flags);
  let value = 0;
  names.forEach((name, bit) => {
    if (name !== null && wanted.has(name)) value = setBit(value, bit);
  });
  return value;
}

/** Interpret the low `width` bits of `value` as a two's-complement number. */
export function signExtend(value: number, width: number): number {
  checkTotal(width);
  checkValue(value, width);
  const sign = 2 ** (width - 1);
  return value >= sign ? value - 2 ** width : value;
}
