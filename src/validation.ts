import { z } from 'zod';
import {
  InsufficientDataError,
  LengthMismatchError,
  TypeMismatchError,
  ValueRangeError,
} from './errors.js';
import type { ExpectedType, ValidationConstraints } from './interfaces/characteristic.js';

// --- Declaration schema ---

const byteCount = z.number().int('Must be an integer').min(0, 'Must not be negative');

const ConstraintsSchema = z
  .object({
    expectedLength: byteCount.optional(),
    minLength: byteCount.optional(),
    maxLength: byteCount.optional(),
    allowVariableLength: z.boolean().optional(),
    minValue: z.number().optional(),
    maxValue: z.number().optional(),
    expectedType: z.enum(['number', 'string', 'boolean', 'object', 'bytes']).optional(),
  })
  .strict()
  .refine((c) => c.minLength === undefined || c.maxLength === undefined || c.minLength <= c.maxLength, {
    message: 'minLength must not exceed maxLength',
    path: ['minLength'],
  })
  .refine((c) => c.minValue === undefined || c.maxValue === undefined || c.minValue <= c.maxValue, {
    message: 'minValue must not exceed maxValue',
    path: ['minValue'],
  })
  .refine(
    (c) => c.expectedLength === undefined || c.maxLength === undefined || c.expectedLength <= c.maxLength,
    { message: 'expectedLength must not exceed maxLength', path: ['expectedLength'] },
  );

/**
 * Check a constraint declaration once, when a characteristic type is defined.
 * A malformed declaration is a programmer error and throws RangeError.
 */
export function defineConstraints(constraints: ValidationConstraints): Readonly<ValidationConstraints> {
  const result = ConstraintsSchema.safeParse(constraints);
  if (!result.success) {
    const detail = result.error.issues
      .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
      .join('; ');
    throw new RangeError(`Invalid validation constraints: ${detail}`);
  }
  return Object.freeze({ ...result.data });
}

// --- Input (raw bytes) ---

/** Length checks. Runs before any decode logic sees the bytes. */
export function validateInput(data: Uint8Array, constraints: ValidationConstraints, subject: string): void {
  const { expectedLength, minLength, maxLength, allowVariableLength } = constraints;
  const length = data.length;

  if (expectedLength !== undefined) {
    if (length < expectedLength) throw new InsufficientDataError(subject, length, expectedLength);
    if (length > expectedLength && !allowVariableLength) {
      throw new LengthMismatchError(subject, length, expectedLength);
    }
  }
  if (minLength !== undefined && length < minLength) {
    throw new InsufficientDataError(subject, length, minLength);
  }
  if (maxLength !== undefined && length > maxLength) {
    throw new LengthMismatchError(subject, length, maxLength);
  }
}

// --- Output (decoded value) ---

export function describeType(value: unknown): string {
  if (value === null) return 'null';
  if (value instanceof Uint8Array) return 'bytes';
  if (Array.isArray(value)) return 'array';
  return typeof value;
}

function matchesType(value: unknown, expected: ExpectedType): boolean {
  switch (expected) {
    case 'bytes':
      return value instanceof Uint8Array;
    case 'object':
      return typeof value === 'object' && value !== null && !(value instanceof Uint8Array);
    default:
      return typeof value === expected;
  }
}

/**
 * Type and range checks on a decoded value, and on a value about to be
 * encoded. `undefined` stands for "value not known" and passes. Non-finite
 * numbers (sentinels) skip the range check.
 */
export function validateOutput(value: unknown, constraints: ValidationConstraints, subject: string): void {
  if (value === undefined) return;

  const { expectedType, minValue, maxValue } = constraints;
  if (expectedType !== undefined && !matchesType(value, expectedType)) {
    throw new TypeMismatchError(subject, expectedType, describeType(value));
  }

  if (typeof value !== 'number' || !Number.isFinite(value)) return;
  if ((minValue !== undefined && value < minValue) || (maxValue !== undefined && value > maxValue)) {
    throw new ValueRangeError(subject, value, minValue ?? -Infinity, maxValue ?? Infinity);
  }
}
