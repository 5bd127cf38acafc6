import { toHex } from './utils/error.js';

/** Every failure category a decode, encode or lookup can report. */
export type ErrorKind =
  | 'InsufficientData'
  | 'LengthMismatch'
  | 'ValueRange'
  | 'TypeMismatch'
  | 'EnumValue'
  | 'FieldFailure'
  | 'MissingDependency'
  | 'UUIDResolution'
  | 'Collision'
  | 'SpecialFloatFormat'
  | 'DependencyCycle'
  | 'DecodeFailure';

/** Base class for all codec errors. `kind` is the stable, switchable category. */
export abstract class GattCodecError extends Error {
  abstract readonly kind: ErrorKind;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class InsufficientDataError extends GattCodecError {
  readonly kind = 'InsufficientData';

  constructor(
    readonly subject: string,
    readonly actual: number,
    readonly required: number,
  ) {
    super(`${subject}: need ${required} bytes, got ${actual}`);
  }
}

export class LengthMismatchError extends GattCodecError {
  readonly kind = 'LengthMismatch';

  constructor(
    readonly subject: string,
    readonly actual: number,
    readonly maximum: number,
  ) {
    super(`${subject}: expected at most ${maximum} bytes, got ${actual}`);
  }
}

export class ValueRangeError extends GattCodecError {
  readonly kind = 'ValueRange';

  constructor(
    readonly field: string,
    readonly value: number,
    readonly min: number,
    readonly max: number,
  ) {
    super(`Invalid ${field}: ${value} (expected range [${min}, ${max}])`);
  }
}

export class TypeMismatchError extends GattCodecError {
  readonly kind = 'TypeMismatch';

  constructor(
    readonly field: string,
    readonly expected: string,
    readonly actual: string,
  ) {
    super(`Invalid ${field}: expected ${expected}, got ${actual}`);
  }
}

export class EnumValueError extends GattCodecError {
  readonly kind = 'EnumValue';

  constructor(
    readonly field: string,
    readonly value: number,
    readonly validValues: readonly number[],
  ) {
    super(`Invalid ${field}: ${value} is not one of [${validValues.join(', ')}]`);
  }
}

/**
 * A named sub-field of a composite payload failed. `partial` holds whatever
 * was decoded before the failing field.
 */
export class FieldFailureError extends GattCodecError {
  readonly kind = 'FieldFailure';

  constructor(
    readonly field: string,
    readonly offset: number | undefined,
    readonly reason: string,
    readonly partial: Readonly<Record<string, unknown>> = {},
  ) {
    const where = offset === undefined ? `field '${field}'` : `field '${field}' at offset ${offset}`;
    super(`${where}: ${reason}`);
  }
}

export class MissingDependencyError extends GattCodecError {
  readonly kind = 'MissingDependency';

  constructor(
    readonly characteristic: string,
    readonly missing: readonly string[],
  ) {
    super(`${characteristic} requires missing dependencies: ${missing.join(', ')}`);
  }
}

export class UuidResolutionError extends GattCodecError {
  readonly kind = 'UUIDResolution';

  constructor(readonly input: string) {
    super(`Cannot resolve identifier: '${input}'`);
  }
}

export class UuidCollisionError extends GattCodecError {
  readonly kind = 'Collision';

  constructor(
    readonly uuid: string,
    readonly existingName: string,
  ) {
    super(
      `Identifier ${uuid} is already registered as '${existingName}'; ` +
        'pass override: true to replace it',
    );
  }
}

export class SpecialFloatFormatError extends GattCodecError {
  readonly kind = 'SpecialFloatFormat';

  constructor(
    readonly format: 'SFLOAT' | 'FLOAT',
    readonly raw: Uint8Array,
    readonly reason: string,
  ) {
    super(`IEEE 11073 ${format} [${toHex(raw)}]: ${reason}`);
  }
}

export class DependencyCycleError extends GattCodecError {
  readonly kind = 'DependencyCycle';

  constructor(readonly cycle: readonly string[]) {
    super(`Circular characteristic dependency: ${cycle.join(' -> ')}`);
  }
}

/** Wraps an unexpected exception thrown by a concrete decoder. */
export class DecodeFailureError extends GattCodecError {
  readonly kind = 'DecodeFailure';

  constructor(
    readonly characteristic: string,
    readonly inner: unknown,
  ) {
    super(`${characteristic}: ${inner instanceof Error ? inner.message : String(inner)}`);
  }
}

export function isGattCodecError(err: unknown): err is GattCodecError {
  return err instanceof GattCodecError;
}
