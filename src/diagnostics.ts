import {
  EnumValueError,
  FieldFailureError,
  type GattCodecError,
  isGattCodecError,
  TypeMismatchError,
  ValueRangeError,
} from './errors.js';
import type {
  CharacteristicInfo,
  DecodeFailure,
  DecodeSuccess,
  FieldError,
} from './interfaces/characteristic.js';
import { ensureAvailable } from './codec/primitives.js';
import { errMsg, toHex } from './utils/error.js';

// ─── Parse trace ─────────────────────────────────────────────────────────────

/**
 * Ordered, human-readable decode steps. Messages may be passed as thunks so
 * a disabled trace never formats anything.
 */
export interface ParseTrace {
  readonly enabled: boolean;
  readonly steps: readonly string[];
  step(message: string | (() => string)): void;
}

const NOOP_TRACE: ParseTrace = Object.freeze({
  enabled: false,
  steps: Object.freeze([]),
  step: () => {},
});

export function createTrace(enabled: boolean): ParseTrace {
  if (!enabled) return NOOP_TRACE;
  const steps: string[] = [];
  return {
    enabled: true,
    steps,
    step: (message) => {
      steps.push(typeof message === 'function' ? message() : message);
    },
  };
}

function describe(value: unknown): string {
  return typeof value === 'object' && value !== null ? JSON.stringify(value) : String(value);
}

// ─── Composite field reader ──────────────────────────────────────────────────

/**
 * Sequential reader for multi-field payloads. Every failure is rethrown as a
 * FieldFailureError naming the field and offset, carrying the fields read so far.
 */
export class FieldReader {
  private position = 0;
  private readonly decoded: Record<string, unknown> = {};

  constructor(
    readonly data: Uint8Array,
    private readonly trace: ParseTrace = NOOP_TRACE,
  ) {}

  get offset(): number {
    return this.position;
  }

  get remaining(): number {
    return this.data.length - this.position;
  }

  /** Fields decoded so far, keyed by name. */
  get partial(): Readonly<Record<string, unknown>> {
    return { ...this.decoded };
  }

  /** Decode `width` bytes at the current offset and advance past them. */
  read<T>(field: string, width: number, decode: (data: Uint8Array, offset: number) => T): T {
    const at = this.position;
    try {
      ensureAvailable(this.data, at, width, field);
      const value = decode(this.data, at);
      this.position += width;
      this.decoded[field] = value;
      this.trace.step(() => `${field} @${at} [${toHex(this.data.subarray(at, at + width))}] -> ${describe(value)}`);
      return value;
    } catch (err) {
      throw this.fail(field, at, err);
    }
  }

  fail(field: string, offset: number | undefined, err: unknown): FieldFailureError {
    if (err instanceof FieldFailureError) return err;
    return new FieldFailureError(field, offset, errMsg(err), this.partial);
  }
}

// ─── Result builders ─────────────────────────────────────────────────────────

export function fieldErrorsOf(err: GattCodecError): FieldError[] {
  if (err instanceof FieldFailureError) {
    return [{ field: err.field, offset: err.offset, reason: err.reason }];
  }
  if (err instanceof ValueRangeError || err instanceof TypeMismatchError || err instanceof EnumValueError) {
    return [{ field: err.field, reason: err.message }];
  }
  return [];
}

export function successResult<T>(
  characteristic: CharacteristicInfo,
  raw: Uint8Array,
  value: T,
  trace: ParseTrace,
): DecodeSuccess<T> {
  return {
    success: true,
    characteristic,
    value,
    raw: Buffer.from(raw),
    message: 'ok',
    fieldErrors: [],
    trace: [...trace.steps],
  };
}

export function failureResult(
  characteristic: CharacteristicInfo | undefined,
  raw: Uint8Array,
  err: unknown,
  trace: ParseTrace,
): DecodeFailure {
  const base = {
    success: false,
    characteristic,
    value: undefined,
    raw: Buffer.from(raw),
    trace: [...trace.steps],
  } as const;

  if (!isGattCodecError(err)) {
    return { ...base, errorKind: 'DecodeFailure', message: errMsg(err), fieldErrors: [] };
  }
  return {
    ...base,
    errorKind: err.kind,
    message: err.message,
    fieldErrors: fieldErrorsOf(err),
    ...(err instanceof FieldFailureError ? { partial: err.partial } : {}),
  };
}
