import type { BluetoothUuid } from '../uuid.js';
import type { ErrorKind } from '../errors.js';

/** Logical value type a characteristic decodes to, as declared by the registry data. */
export type ValueType =
  | 'int'
  | 'float'
  | 'string'
  | 'boolean'
  | 'bytes'
  | 'dict'
  | 'datetime'
  | 'various'
  | 'unknown';

export type GattProperty =
  | 'broadcast'
  | 'read'
  | 'write-without-response'
  | 'write'
  | 'notify'
  | 'indicate'
  | 'authenticated-signed-writes'
  | 'extended-properties';

/** Registry metadata for one characteristic. Loaded once, never mutated. */
export interface CharacteristicInfo {
  readonly uuid: BluetoothUuid;
  readonly name: string;
  /** Specification identifier, e.g. `org.bluetooth.characteristic.battery_level`. */
  readonly id: string;
  /** Unit symbol (`%`, `°C`, `Pa`), empty when unitless. */
  readonly unit: string;
  readonly valueType: ValueType;
  readonly properties: ReadonlySet<GattProperty>;
}

/** Runtime shape a decoded value must have. */
export type ExpectedType = 'number' | 'string' | 'boolean' | 'object' | 'bytes';

/**
 * Declarative constraints for one characteristic type. Enforced by the
 * validation engine before decode (length) and after decode / before encode
 * (value range and type).
 */
export interface ValidationConstraints {
  readonly expectedLength?: number;
  readonly minLength?: number;
  readonly maxLength?: number;
  /** When true, `expectedLength` acts as a minimum instead of an exact size. */
  readonly allowVariableLength?: boolean;
  readonly minValue?: number;
  readonly maxValue?: number;
  readonly expectedType?: ExpectedType;
}

/** Canonical identifiers another characteristic must (or may) have decoded first. */
export interface DependencyDeclaration {
  readonly required: readonly string[];
  readonly optional: readonly string[];
}

export interface FieldError {
  readonly field: string;
  readonly offset?: number;
  readonly reason: string;
}

/** Authoring role, set explicitly on each characteristic type. */
export type CharacteristicRole =
  | 'measurement'
  | 'feature'
  | 'status'
  | 'info'
  | 'control-point'
  | 'unknown';

interface DecodedBase {
  readonly raw: Buffer;
  readonly message: string;
  readonly fieldErrors: readonly FieldError[];
  readonly trace: readonly string[];
}

export interface DecodeSuccess<T> extends DecodedBase {
  readonly success: true;
  readonly characteristic: CharacteristicInfo;
  readonly value: T;
}

export interface DecodeFailure extends DecodedBase {
  readonly success: false;
  /** Undefined only when the identifier itself could not be resolved. */
  readonly characteristic: CharacteristicInfo | undefined;
  readonly value: undefined;
  readonly errorKind: ErrorKind;
  /** Fields decoded before a composite payload failed. */
  readonly partial?: Readonly<Record<string, unknown>>;
}

export type DecodedResult<T> = DecodeSuccess<T> | DecodeFailure;
