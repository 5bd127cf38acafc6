import { existsSync, readFileSync } from 'node:fs';
import { readFile } from 'node:fs/promises';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import type { CharacteristicInfo, GattProperty, ValueType } from '../interfaces/characteristic.js';
import { BluetoothUuid } from '../uuid.js';

const __dirname: string = dirname(fileURLToPath(import.meta.url));

export const DEFAULT_SPEC_FILE = 'characteristic_uuids.yaml';
export const DEFAULT_UNITS_FILE = 'units.yaml';

// --- Schemas ---

const VALUE_TYPES = [
  'int',
  'float',
  'string',
  'boolean',
  'bytes',
  'dict',
  'datetime',
  'various',
  'unknown',
] as const satisfies readonly ValueType[];

const PROPERTIES = [
  'broadcast',
  'read',
  'write-without-response',
  'write',
  'notify',
  'indicate',
  'authenticated-signed-writes',
  'extended-properties',
] as const satisfies readonly GattProperty[];

export const SpecEntrySchema = z.object({
  uuid: z
    .union([z.string(), z.number().int()])
    .refine((v) => BluetoothUuid.tryParse(v) !== undefined, {
      message: 'Must be a 16-, 32- or 128-bit identifier',
    }),
  name: z.string().min(1, 'Name is required'),
  id: z.string().min(1, 'Identifier string is required'),
  unit: z.string().optional(),
  value_type: z.enum(VALUE_TYPES).default('unknown'),
  properties: z.array(z.enum(PROPERTIES)).default([]),
});

const UnitSchema = z.object({
  id: z.string().min(1),
  name: z.string().optional(),
  symbol: z.string(),
});

export type UnitInput = z.input<typeof UnitSchema>;

const SpecDocumentSchema = z.object({
  characteristics: z.array(z.unknown()),
});

const UnitsDocumentSchema = z.object({
  units: z.array(UnitSchema),
});

// --- Result ---

export interface SpecData {
  readonly entries: readonly CharacteristicInfo[];
  /** One line per entry that failed validation and was left out. */
  readonly skipped: readonly string[];
}

export const EMPTY_SPEC: SpecData = Object.freeze({ entries: [], skipped: [] });

/**
 * Provider of the read-only specification data. Errors thrown by either
 * method mean "source unavailable"; the registry degrades to an empty set.
 */
export interface SpecSource {
  readonly description: string;
  load(): SpecData;
  loadAsync(): Promise<SpecData>;
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('; ');
}

/** Validate raw entries and resolve unit ids to their symbols. */
export function buildSpecData(
  rawEntries: readonly unknown[],
  units: readonly UnitInput[] = [],
): SpecData {
  const symbols = new Map(units.map((u) => [u.id, u.symbol]));
  const entries: CharacteristicInfo[] = [];
  const skipped: string[] = [];

  rawEntries.forEach((raw, index) => {
    const result = SpecEntrySchema.safeParse(raw);
    if (!result.success) {
      skipped.push(`characteristics[${index}]: ${formatIssues(result.error)}`);
      return;
    }
    const e = result.data;
    entries.push(
      Object.freeze({
        uuid: BluetoothUuid.from(e.uuid),
        name: e.name,
        id: e.id,
        unit: e.unit === undefined ? '' : (symbols.get(e.unit) ?? e.unit),
        valueType: e.value_type,
        properties: new Set<GattProperty>(e.properties),
      }),
    );
  });

  return { entries, skipped };
}

function parseDocuments(specText: string, unitsText: string | undefined): SpecData {
  const spec = SpecDocumentSchema.safeParse(parseYaml(specText));
  if (!spec.success) throw new Error(`Invalid specification document: ${formatIssues(spec.error)}`);

  let units: UnitInput[] = [];
  if (unitsText !== undefined) {
    const parsed = UnitsDocumentSchema.safeParse(parseYaml(unitsText));
    if (!parsed.success) throw new Error(`Invalid units document: ${formatIssues(parsed.error)}`);
    units = parsed.data.units;
  }
  return buildSpecData(spec.data.characteristics, units);
}

// --- File-backed source ---

/** Walk up from this module until a `data/<file>` exists. */
export function findDataFile(file: string, from: string = __dirname): string {
  let dir = from;
  for (;;) {
    const candidate = join(dir, 'data', file);
    if (existsSync(candidate)) return candidate;
    const parent = dirname(dir);
    if (parent === dir) return join(from, '..', '..', 'data', file);
    dir = parent;
  }
}

/** Reads the bundled YAML files (or the paths given). The units file is optional. */
export class YamlSpecSource implements SpecSource {
  readonly specPath: string;
  readonly unitsPath: string;

  constructor(specPath?: string, unitsPath?: string) {
    this.specPath = specPath ?? findDataFile(DEFAULT_SPEC_FILE);
    this.unitsPath = unitsPath ?? findDataFile(DEFAULT_UNITS_FILE);
  }

  get description(): string {
    return this.specPath;
  }

  load(): SpecData {
    const specText = readFileSync(this.specPath, 'utf8');
    const unitsText = existsSync(this.unitsPath) ? readFileSync(this.unitsPath, 'utf8') : undefined;
    return parseDocuments(specText, unitsText);
  }

  async loadAsync(): Promise<SpecData> {
    const specText = await readFile(this.specPath, 'utf8');
    const unitsText = existsSync(this.unitsPath) ? await readFile(this.unitsPath, 'utf8') : undefined;
    return parseDocuments(specText, unitsText);
  }
}

// --- In-memory source ---

/** Spec data held in memory, for embedding and tests. */
export class StaticSpecSource implements SpecSource {
  readonly description = 'in-memory';
  loadCount = 0;

  constructor(
    private readonly entries: readonly unknown[],
    private readonly units: readonly UnitInput[] = [],
  ) {}

  load(): SpecData {
    this.loadCount++;
    return buildSpecData(this.entries, this.units);
  }

  async loadAsync(): Promise<SpecData> {
    await Promise.resolve();
    return this.load();
  }
}
