import type { BaseCharacteristic, CharacteristicClass, CharacteristicConstructor } from '../characteristics/base.js';
import type { IdentifierInput } from '../characteristics/context.js';
import { BUILTIN_CHARACTERISTICS } from '../characteristics/index.js';
import { UuidCollisionError, UuidResolutionError } from '../errors.js';
import type { CharacteristicInfo, GattProperty, ValueType } from '../interfaces/characteristic.js';
import { createLogger, type Logger } from '../logger.js';
import { errMsg } from '../utils/error.js';
import { BluetoothUuid } from '../uuid.js';
import { aliasesFor, idFromName, normalizeAlias } from './aliases.js';
import { EMPTY_SPEC, type SpecData, type SpecSource, YamlSpecSource } from './spec-source.js';

export type RegistryState = 'uninitialized' | 'loading' | 'loaded';

/** Metadata supplied with a custom registration. Missing fields get defaults. */
export interface CustomMetadata {
  readonly name: string;
  readonly id?: string;
  readonly unit?: string;
  readonly valueType?: ValueType;
  readonly properties?: Iterable<GattProperty>;
}

export interface RegisterOptions {
  /** Replace an existing spec or built-in entry instead of failing with Collision. */
  readonly override?: boolean;
}

export type RegisterResult =
  | { success: true; info: CharacteristicInfo }
  | { success: false; error: UuidCollisionError | UuidResolutionError };

export interface RegistryOptions {
  readonly source?: SpecSource;
  readonly logger?: Logger;
  readonly builtins?: readonly CharacteristicClass[];
}

interface CustomEntry {
  readonly info: CharacteristicInfo;
  readonly cls: CharacteristicConstructor;
  readonly aliases: readonly string[];
}

/**
 * Identifier → metadata and characteristic type, with alias lookup.
 *
 * Spec data loads once, on first use (`uninitialized → loading → loaded`).
 * After that every lookup is a plain map read. Custom registrations live in
 * their own namespace and shadow spec entries with the same identifier.
 */
export class CharacteristicRegistry {
  private readonly source: SpecSource;
  private readonly log: Logger;
  private readonly builtins: readonly CharacteristicClass[];

  private loaded = false;
  private syncLoading = false;
  private inflight: Promise<void> | undefined;

  private readonly specEntries = new Map<string, CharacteristicInfo>();
  private readonly specAliases = new Map<string, string>();
  private readonly classes = new Map<string, CharacteristicClass>();

  private readonly customEntries = new Map<string, CustomEntry>();
  private readonly customAliases = new Map<string, string>();

  constructor(options: RegistryOptions = {}) {
    this.source = options.source ?? new YamlSpecSource();
    this.log = options.logger ?? createLogger('Registry');
    this.builtins = options.builtins ?? BUILTIN_CHARACTERISTICS;
  }

  get state(): RegistryState {
    if (this.loaded) return 'loaded';
    return this.syncLoading || this.inflight ? 'loading' : 'uninitialized';
  }

  // --- Loading ---

  /**
   * Load synchronously if not loaded yet. The loaded flag is checked first
   * so the common path costs one boolean read.
   */
  ensureLoaded(): void {
    if (this.loaded) return;
    if (this.syncLoading) {
      throw new Error('CharacteristicRegistry accessed re-entrantly while loading spec data');
    }
    this.syncLoading = true;
    try {
      this.commit(this.readSource());
    } finally {
      this.syncLoading = false;
    }
  }

  /**
   * Load asynchronously. Concurrent callers share one read; if a synchronous
   * load finishes first, the async result is dropped.
   */
  preload(): Promise<void> {
    if (this.loaded) return Promise.resolve();
    this.inflight ??= this.source
      .loadAsync()
      .catch((err: unknown) => this.unavailable(err))
      .then((data) => {
        if (!this.loaded) this.commit(data);
      })
      .finally(() => {
        this.inflight = undefined;
      });
    return this.inflight;
  }

  private readSource(): SpecData {
    try {
      return this.source.load();
    } catch (err) {
      return this.unavailable(err);
    }
  }

  private unavailable(err: unknown): SpecData {
    this.log.warn(
      `Specification data unavailable (${this.source.description}): ${errMsg(err)}. ` +
        'Continuing with built-in and custom entries only.',
    );
    return EMPTY_SPEC;
  }

  private commit(data: SpecData): void {
    for (const line of data.skipped) this.log.warn(`Skipping invalid spec entry ${line}`);

    for (const info of data.entries) {
      const key = info.uuid.longForm;
      if (this.specEntries.has(key)) {
        this.log.debug(`Duplicate spec entry for ${info.uuid.shortForm} ('${info.name}'), keeping the first`);
        continue;
      }
      this.specEntries.set(key, info);
    }

    for (const cls of this.builtins) {
      const uuid = BluetoothUuid.from(cls.uuid);
      this.classes.set(uuid.longForm, cls);
      if (!this.specEntries.has(uuid.longForm)) {
        this.log.debug(`No spec entry for built-in '${cls.displayName}', using its own metadata`);
        this.specEntries.set(uuid.longForm, {
          uuid,
          name: cls.displayName,
          id: idFromName(cls.displayName),
          unit: '',
          valueType: 'unknown',
          properties: new Set<GattProperty>(),
        });
      }
    }

    for (const [key, info] of this.specEntries) {
      for (const alias of aliasesFor(info)) {
        const existing = this.specAliases.get(alias);
        if (existing !== undefined && existing !== key) {
          this.log.debug(`Alias '${alias}' already points at ${existing}, ignoring for ${info.uuid.shortForm}`);
          continue;
        }
        this.specAliases.set(alias, key);
      }
    }

    this.loaded = true;
    this.log.debug(
      `Loaded ${this.specEntries.size} characteristics, ${this.classes.size} decoders, ` +
        `${this.specAliases.size} aliases`,
    );
  }

  // --- Lookup ---

  /** Canonical key for an identifier or alias, or undefined when unknown. */
  private keyOf(input: IdentifierInput): string | undefined {
    const uuid = BluetoothUuid.tryParse(input);
    if (uuid && this.hasEntry(uuid.longForm)) return uuid.longForm;
    // Names such as "Cafe" also parse as hex identifiers
    const alias = typeof input === 'string' ? this.aliasKey(normalizeAlias(input)) : undefined;
    return alias ?? uuid?.longForm;
  }

  private hasEntry(key: string): boolean {
    return this.customEntries.has(key) || this.specEntries.has(key);
  }

  private aliasKey(alias: string): string | undefined {
    return this.customAliases.get(alias) ?? this.specAliases.get(alias);
  }

  /** Metadata for an identifier or alias. Returns undefined on a miss, never throws. */
  resolve(input: IdentifierInput): CharacteristicInfo | undefined {
    this.ensureLoaded();
    const key = this.keyOf(input);
    if (key === undefined) return undefined;
    return this.customEntries.get(key)?.info ?? this.specEntries.get(key);
  }

  resolveClass(input: IdentifierInput): CharacteristicConstructor | undefined {
    this.ensureLoaded();
    const key = this.keyOf(input);
    if (key === undefined) return undefined;
    return this.customEntries.get(key)?.cls ?? this.classes.get(key);
  }

  /** Instantiate the characteristic type registered for `input`. */
  create(input: IdentifierInput): BaseCharacteristic<unknown> | undefined {
    const info = this.resolve(input);
    const cls = this.resolveClass(input);
    if (!info || !cls) return undefined;
    return new cls(info);
  }

  /** True when a decoder (built-in or custom) exists for `input`. */
  supports(input: IdentifierInput): boolean {
    return this.resolveClass(input) !== undefined;
  }

  /** Every known entry, custom entries replacing spec entries with the same identifier. */
  list(): CharacteristicInfo[] {
    this.ensureLoaded();
    const merged = new Map(this.specEntries);
    for (const [key, entry] of this.customEntries) merged.set(key, entry.info);
    return [...merged.values()];
  }

  /** Entries that have a decoder. */
  listSupported(): CharacteristicInfo[] {
    return this.list().filter((info) => this.supports(info.uuid));
  }

  // --- Custom registration ---

  registerCustom(
    input: IdentifierInput,
    cls: CharacteristicConstructor,
    metadata: CustomMetadata,
    options: RegisterOptions = {},
  ): RegisterResult {
    this.ensureLoaded();
    const uuid = BluetoothUuid.tryParse(input);
    if (!uuid) return { success: false, error: new UuidResolutionError(String(input)) };

    const key = uuid.longForm;
    const existing = this.customEntries.get(key)?.info ?? this.specEntries.get(key);
    if (existing && !options.override) {
      return { success: false, error: new UuidCollisionError(uuid.toString(), existing.name) };
    }

    this.removeCustom(key);
    const info: CharacteristicInfo = Object.freeze({
      uuid,
      name: metadata.name,
      id: metadata.id ?? idFromName(metadata.name),
      unit: metadata.unit ?? '',
      valueType: metadata.valueType ?? 'unknown',
      properties: new Set(metadata.properties ?? []),
    });
    const aliases = aliasesFor(info);
    this.customEntries.set(key, { info, cls, aliases });
    for (const alias of aliases) {
      const owner = this.aliasKey(alias);
      if (owner !== undefined && owner !== key) {
        this.log.debug(`Alias '${alias}' already points at ${owner}, ignoring for ${uuid.shortForm}`);
        continue;
      }
      this.customAliases.set(alias, key);
    }

    this.log.debug(
      `Registered custom characteristic '${info.name}' at ${uuid.shortForm}` +
        (existing ? ` (replacing '${existing.name}')` : ''),
    );
    return { success: true, info };
  }

  /** Remove a custom entry. Any spec entry it shadowed becomes visible again. */
  unregisterCustom(input: IdentifierInput): boolean {
    this.ensureLoaded();
    const uuid = BluetoothUuid.tryParse(input);
    return uuid ? this.removeCustom(uuid.longForm) : false;
  }

  private removeCustom(key: string): boolean {
    const entry = this.customEntries.get(key);
    if (!entry) return false;
    this.customEntries.delete(key);
    for (const alias of entry.aliases) {
      if (this.customAliases.get(alias) !== key) continue;
      this.customAliases.delete(alias);
      const heir = this.customHeir(alias);
      if (heir !== undefined) this.customAliases.set(alias, heir);
    }
    return true;
  }

  /** Earliest remaining custom entry that declared `alias`, unless a spec entry owns it. */
  private customHeir(alias: string): string | undefined {
    if (this.specAliases.has(alias)) return undefined;
    for (const [key, entry] of this.customEntries) {
      if (entry.aliases.includes(alias)) return key;
    }
    return undefined;
  }
}

// --- Process-wide default ---

let defaultRegistry: CharacteristicRegistry | undefined;

/** Shared registry over the bundled spec data, created on first call. */
export function getDefaultRegistry(): CharacteristicRegistry {
  defaultRegistry ??= new CharacteristicRegistry();
  return defaultRegistry;
}

/** Drop the shared registry (for tests). */
export function _resetDefaultRegistry(): void {
  defaultRegistry = undefined;
}
