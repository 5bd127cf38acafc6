import { z } from 'zod';
import { LogLevel, parseLogLevel } from '../logger.js';
import { type CodecConfig, CodecConfigSchema, formatConfigError } from './schema.js';

type Env = Readonly<Record<string, string | undefined>>;

const BOOLEAN_WORDS: Readonly<Record<string, boolean>> = {
  true: true,
  yes: true,
  '1': true,
  false: false,
  no: false,
  '0': false,
};

/** Boolean env var: true/yes/1 or false/no/0. Unrecognised words pass through so zod reports them. */
function envBoolean(raw: string | undefined): boolean | string | undefined {
  if (raw === undefined || raw.trim() === '') return undefined;
  return BOOLEAN_WORDS[raw.trim().toLowerCase()] ?? raw;
}

function envString(raw: string | undefined): string | undefined {
  const trimmed = raw?.trim();
  return trimmed ? trimmed : undefined;
}

/**
 * Read codec settings from environment variables.
 *
 *   GATT_SPEC_PATH   characteristic registry YAML
 *   GATT_UNITS_PATH  units YAML
 *   GATT_TRACE       collect parse traces by default
 *   LOG_LEVEL        debug | info | warn | error | silent
 *   DEBUG            any non-empty value forces LOG_LEVEL=debug
 *
 * Throws an Error with a formatted message when a value is invalid.
 */
export function loadCodecConfig(env: Env = process.env): CodecConfig {
  const raw = {
    spec_path: envString(env.GATT_SPEC_PATH),
    units_path: envString(env.GATT_UNITS_PATH),
    trace: envBoolean(env.GATT_TRACE),
    log_level: envString(env.DEBUG) ? 'debug' : envString(env.LOG_LEVEL)?.toLowerCase(),
  };

  try {
    return CodecConfigSchema.parse(raw);
  } catch (err) {
    if (err instanceof z.ZodError) throw new Error(formatConfigError(err));
    throw err;
  }
}

/** LogLevel for a validated config. */
export function logLevelOf(config: CodecConfig): LogLevel {
  return parseLogLevel(config.log_level) ?? LogLevel.INFO;
}
