import { MissingDependencyError } from '../errors.js';
import type {
  CharacteristicInfo,
  CharacteristicRole,
  DecodedResult,
  DependencyDeclaration,
  ValidationConstraints,
} from '../interfaces/characteristic.js';
import { createTrace, failureResult, type ParseTrace, successResult } from '../diagnostics.js';
import { createLogger } from '../logger.js';
import { BluetoothUuid } from '../uuid.js';
import { validateInput, validateOutput } from '../validation.js';
import { errMsg } from '../utils/error.js';
import { DecodeContext } from './context.js';

const log = createLogger('Characteristic');

export const NO_DEPENDENCIES: DependencyDeclaration = Object.freeze({ required: [], optional: [] });
export const NO_CONSTRAINTS: Readonly<ValidationConstraints> = Object.freeze({});

export interface ParseOptions {
  /** Collect a step-by-step parse trace on the result. */
  readonly trace?: boolean;
}

/**
 * Contract every characteristic type implements.
 *
 * Subclasses declare their role, constraints and dependencies as readonly
 * fields and implement `decodeValue()` / `encodeValue()` for their byte
 * layout. `parse()` and `build()` wrap those with validation and turn
 * failures into structured results.
 */
export abstract class BaseCharacteristic<T> {
  abstract readonly role: CharacteristicRole;
  readonly constraints: Readonly<ValidationConstraints> = NO_CONSTRAINTS;
  readonly dependencies: DependencyDeclaration = NO_DEPENDENCIES;

  constructor(readonly info: CharacteristicInfo) {}

  get uuid(): BluetoothUuid {
    return this.info.uuid;
  }

  get name(): string {
    return this.info.name;
  }

  /** Decode a payload that already passed input validation. */
  protected abstract decodeValue(data: Buffer, context: DecodeContext, trace: ParseTrace): T;

  /** Encode a value that already passed output validation. */
  protected abstract encodeValue(value: T): Buffer;

  /**
   * validate input → check required dependencies → decode → validate output.
   * Never throws: every failure becomes a `success: false` result.
   */
  parse(data: Uint8Array, context: DecodeContext = new DecodeContext(), options: ParseOptions = {}): DecodedResult<T> {
    const trace = createTrace(options.trace ?? false);
    const raw = Buffer.from(data);
    try {
      validateInput(raw, this.constraints, this.name);
      trace.step(() => `${this.name}: ${raw.length} bytes passed length checks`);

      const missing = this.dependencies.required.filter((id) => !context.hasValue(id));
      if (missing.length > 0) {
        throw new MissingDependencyError(
          this.name,
          missing.map((id) => BluetoothUuid.from(id).shortForm),
        );
      }

      const value = this.decodeValue(raw, context, trace);
      validateOutput(value, this.constraints, this.name);
      trace.step(() => `${this.name}: decoded`);
      return successResult(this.info, raw, value, trace);
    } catch (err) {
      log.debug(`${this.name} [${this.uuid.shortForm}] decode failed: ${errMsg(err)}`);
      return failureResult(this.info, raw, err, trace);
    }
  }

  /** validate output → encode. Throws GattCodecError before producing any bytes. */
  build(value: T): Buffer {
    validateOutput(value, this.constraints, this.name);
    return this.encodeValue(value);
  }
}

/** Constructor shape the registry instantiates characteristic types from. */
export type CharacteristicConstructor = new (info: CharacteristicInfo) => BaseCharacteristic<unknown>;

/** A built-in characteristic type: a constructor plus its static identity. */
export type CharacteristicClass = CharacteristicConstructor & {
  readonly uuid: string;
  readonly displayName: string;
};
