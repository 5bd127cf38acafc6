// ─── Facade ──────────────────────────────────────────────────────────────────

export { GattTranslator, type TranslatorOptions, type ValidationResult } from './translator.js';
export { BatchDecoder, type BatchInput, type BatchResult } from './batch.js';

// ─── Registry ────────────────────────────────────────────────────────────────

export {
  CharacteristicRegistry,
  getDefaultRegistry,
  type CustomMetadata,
  type RegisterOptions,
  type RegisterResult,
  type RegistryOptions,
  type RegistryState,
} from './registry/registry.js';
export {
  StaticSpecSource,
  YamlSpecSource,
  buildSpecData,
  type SpecData,
  type SpecSource,
} from './registry/spec-source.js';
export { normalizeAlias } from './registry/aliases.js';
export { BluetoothUuid, uuid16 } from './uuid.js';

// ─── Characteristics ─────────────────────────────────────────────────────────

export {
  BaseCharacteristic,
  type CharacteristicClass,
  type CharacteristicConstructor,
  type ParseOptions,
} from './characteristics/base.js';
export { EnumCharacteristic, ScaledCharacteristic } from './characteristics/templates.js';
export { DecodeContext, type IdentifierInput } from './characteristics/context.js';
export * from './characteristics/index.js';
export type * from './interfaces/characteristic.js';

// ─── Codecs ──────────────────────────────────────────────────────────────────

export * from './codec/primitives.js';
export * from './codec/bit-field.js';
export * from './codec/ieee11073.js';
export { ScaledTemplate, toDecimalScale, type DecimalScale, type ScaledOptions } from './codec/scaled.js';
export { EnumCodec } from './codec/enum.js';

// ─── Validation, diagnostics, errors ─────────────────────────────────────────

export { defineConstraints, validateInput, validateOutput } from './validation.js';
export { FieldReader, createTrace, type ParseTrace } from './diagnostics.js';
export * from './errors.js';

// ─── Ambient ─────────────────────────────────────────────────────────────────

export { createLogger, setLogLevel, LogLevel, type Logger } from './logger.js';
export { loadCodecConfig } from './config/load.js';
export type { CodecConfig } from './config/schema.js';
