import { BatchDecoder, type BatchInput, type BatchResult } from './batch.js';
import type { CharacteristicConstructor, ParseOptions } from './characteristics/base.js';
import { DecodeContext, type IdentifierInput } from './characteristics/context.js';
import { createTrace, failureResult } from './diagnostics.js';
import { type ErrorKind, isGattCodecError, UuidResolutionError } from './errors.js';
import type { CharacteristicInfo, DecodedResult } from './interfaces/characteristic.js';
import type { Logger } from './logger.js';
import {
  CharacteristicRegistry,
  type CustomMetadata,
  getDefaultRegistry,
  type RegisterOptions,
  type RegisterResult,
} from './registry/registry.js';
import { validateInput } from './validation.js';

export interface TranslatorOptions {
  /** Defaults to the shared process-wide registry. */
  readonly registry?: CharacteristicRegistry;
  readonly logger?: Logger;
  /** Default for `ParseOptions.trace` when a call does not set it. */
  readonly trace?: boolean;
}

/** Outcome of checking a payload's shape without decoding it. */
export type ValidationResult =
  | {
      readonly valid: true;
      readonly characteristic: CharacteristicInfo;
      readonly actualLength: number;
      readonly expectedLength?: number;
    }
  | {
      readonly valid: false;
      readonly characteristic: CharacteristicInfo | undefined;
      readonly actualLength: number;
      readonly expectedLength?: number;
      readonly errorKind: ErrorKind;
      readonly message: string;
    };

/** Entry point for callers holding raw bytes from a transport. */
export class GattTranslator {
  readonly registry: CharacteristicRegistry;
  private readonly batch: BatchDecoder;
  private readonly trace: boolean;

  constructor(options: TranslatorOptions = {}) {
    this.registry = options.registry ?? getDefaultRegistry();
    this.batch = new BatchDecoder(this.registry, options.logger);
    this.trace = options.trace ?? false;
  }

  private parseOptions(options: ParseOptions): ParseOptions {
    return { trace: options.trace ?? this.trace };
  }

  /** Decode one payload. Unknown identifiers yield a `UUIDResolution` failure. */
  parse(
    id: IdentifierInput,
    data: Uint8Array,
    context?: DecodeContext,
    options: ParseOptions = {},
  ): DecodedResult<unknown> {
    const characteristic = this.registry.create(id);
    if (!characteristic) {
      return failureResult(this.registry.resolve(id), data, new UuidResolutionError(String(id)), createTrace(false));
    }
    return characteristic.parse(data, context ?? new DecodeContext(), this.parseOptions(options));
  }

  /** Decode several payloads in dependency order. Throws DependencyCycleError on a cycle. */
  parseBatch(input: BatchInput, context?: DecodeContext, options: ParseOptions = {}): BatchResult {
    return this.batch.decode(input, context, this.parseOptions(options));
  }

  /**
   * Check a payload against the declared length constraints. Nothing is
   * decoded, so value ranges are not checked here. Unknown identifiers and
   * malformed payloads come back as `valid: false`.
   */
  validate(id: IdentifierInput, data: Uint8Array): ValidationResult {
    const actualLength = data.length;
    const characteristic = this.registry.create(id);
    if (!characteristic) {
      const err = new UuidResolutionError(String(id));
      return {
        valid: false,
        characteristic: this.registry.resolve(id),
        actualLength,
        errorKind: err.kind,
        message: err.message,
      };
    }

    const { info, constraints } = characteristic;
    const expectedLength = constraints.expectedLength;
    try {
      validateInput(data, constraints, characteristic.name);
      return { valid: true, characteristic: info, actualLength, expectedLength };
    } catch (err) {
      if (!isGattCodecError(err)) throw err;
      return {
        valid: false,
        characteristic: info,
        actualLength,
        expectedLength,
        errorKind: err.kind,
        message: err.message,
      };
    }
  }

  /** Encode a value. Throws UuidResolutionError or the codec's GattCodecError. */
  build(id: IdentifierInput, value: unknown): Buffer {
    const characteristic = this.registry.create(id);
    if (!characteristic) throw new UuidResolutionError(String(id));
    return characteristic.build(value);
  }

  resolveMetadata(id: IdentifierInput): CharacteristicInfo | undefined {
    return this.registry.resolve(id);
  }

  registerCustom(
    id: IdentifierInput,
    cls: CharacteristicConstructor,
    metadata: CustomMetadata,
    options: RegisterOptions = {},
  ): RegisterResult {
    return this.registry.registerCustom(id, cls, metadata, options);
  }

  unregisterCustom(id: IdentifierInput): boolean {
    return this.registry.unregisterCustom(id);
  }

  supports(id: IdentifierInput): boolean {
    return this.registry.supports(id);
  }

  listSupported(): CharacteristicInfo[] {
    return this.registry.listSupported();
  }
}
