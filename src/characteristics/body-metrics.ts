import { UINT16 } from '../codec/primitives.js';
import { ScaledTemplate } from '../codec/scaled.js';
import { ValueRangeError } from '../errors.js';

// ─── Units ───────────────────────────────────────────────────────────────────

export type MassUnit = 'kg' | 'lb';

/** SI (kg, m) when the unit flag is clear, imperial (lb, in) when set. */
export const massUnitOf = (imperial: boolean): MassUnit => (imperial ? 'lb' : 'kg');

/** Mass fields: 0.005 kg or 0.01 lb per step. */
export function massTemplate(unit: MassUnit, name: string, unknownRaw?: number): ScaledTemplate {
  return new ScaledTemplate(UINT16, unit === 'kg' ? 0.005 : 0.01, { name, unknownRaw });
}

/** Height is metres (0.001) with SI units, inches (0.1) with imperial. */
export const HEIGHT: Record<MassUnit, ScaledTemplate> = {
  kg: new ScaledTemplate(UINT16, 0.001, { name: 'height' }),
  lb: new ScaledTemplate(UINT16, 0.1, { name: 'height' }),
};

// ─── Feature resolutions ─────────────────────────────────────────────────────

export interface MassResolution {
  readonly kg: number;
  readonly lb: number;
}

export interface HeightResolution {
  readonly m: number;
  readonly in: number;
}

// Index 0 means "not specified"; codes past the end are reserved.
const MASS_RESOLUTIONS: readonly MassResolution[] = [
  { kg: 0.5, lb: 1 },
  { kg: 0.2, lb: 0.5 },
  { kg: 0.1, lb: 0.2 },
  { kg: 0.05, lb: 0.1 },
  { kg: 0.02, lb: 0.05 },
  { kg: 0.01, lb: 0.02 },
  { kg: 0.005, lb: 0.01 },
];

const HEIGHT_RESOLUTIONS: readonly HeightResolution[] = [
  { m: 0.01, in: 1 },
  { m: 0.005, in: 0.5 },
  { m: 0.001, in: 0.1 },
];

export const MAX_MASS_RESOLUTION_CODE = MASS_RESOLUTIONS.length;
export const MAX_HEIGHT_RESOLUTION_CODE = HEIGHT_RESOLUTIONS.length;

/** Resolution for a feature's mass code, or undefined when unspecified or reserved. */
export function massResolution(code: number): MassResolution | undefined {
  return code >= 1 ? MASS_RESOLUTIONS.at(code - 1) : undefined;
}

export function heightResolution(code: number): HeightResolution | undefined {
  return code >= 1 ? HEIGHT_RESOLUTIONS.at(code - 1) : undefined;
}

export function checkResolutionCode(field: string, code: number, max: number): number {
  if (!Number.isInteger(code) || code < 0 || code > max) throw new ValueRangeError(field, code, 0, max);
  return code;
}
