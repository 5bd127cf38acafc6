import { describe, it, expect } from 'vitest';
import { decodeUint16, decodeUint8 } from '../src/codec/primitives.js';
import {
  createTrace,
  failureResult,
  FieldReader,
  fieldErrorsOf,
  successResult,
} from '../src/diagnostics.js';
import {
  EnumValueError,
  FieldFailureError,
  InsufficientDataError,
  MissingDependencyError,
} from '../src/errors.js';
import type { CharacteristicInfo, GattProperty } from '../src/interfaces/characteristic.js';
import { BluetoothUuid } from '../src/uuid.js';
import { hex } from './helpers/codec-test-utils.js';

const INFO: CharacteristicInfo = {
  uuid: BluetoothUuid.from(0x2a19),
  name: 'Battery Level',
  id: 'org.bluetooth.characteristic.battery_level',
  unit: '%',
  valueType: 'int',
  properties: new Set<GattProperty>(['read']),
};

describe('createTrace()', () => {
  it('records steps when enabled, evaluating thunks', () => {
    const trace = createTrace(true);
    trace.step('first');
    trace.step(() => 'second');
    expect(trace.steps).toEqual(['first', 'second']);
  });

  it('ignores steps when disabled without calling thunks', () => {
    const trace = createTrace(false);
    let called = false;
    trace.step(() => {
      called = true;
      return 'never';
    });
    expect(trace.steps).toEqual([]);
    expect(called).toBe(false);
  });
});

describe('FieldReader', () => {
  it('reads fields in order and tracks the offset', () => {
    const reader = new FieldReader(hex('07 34 12'));
    expect(reader.read('flags', 1, decodeUint8)).toBe(7);
    expect(reader.read('value', 2, decodeUint16)).toBe(0x1234);
    expect(reader.offset).toBe(3);
    expect(reader.remaining).toBe(0);
    expect(reader.partial).toEqual({ flags: 7, value: 0x1234 });
  });

  it('names the field, offset and partial result when a read fails', () => {
    const reader = new FieldReader(hex('07 34'));
    reader.read('flags', 1, decodeUint8);
    let caught: unknown;
    try {
      reader.read('value', 2, decodeUint16);
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(FieldFailureError);
    expect(caught).toMatchObject({
      field: 'value',
      offset: 1,
      reason: 'value: need 2 bytes, got 1',
      partial: { flags: 7 },
    });
  });

  it('writes a trace line per field', () => {
    const trace = createTrace(true);
    const reader = new FieldReader(hex('0A FF'), trace);
    reader.read('a', 1, decodeUint8);
    reader.read('b', 1, () => ({ level: 'high' }));
    expect(trace.steps).toEqual(['a @0 [0A] -> 10', 'b @1 [FF] -> {"level":"high"}']);
  });

  it('passes an inner FieldFailureError through unchanged', () => {
    const reader = new FieldReader(hex('00'));
    const inner = new FieldFailureError('nested', 0, 'bad');
    expect(reader.fail('outer', 3, inner)).toBe(inner);
  });
});

describe('fieldErrorsOf()', () => {
  it('lists the failing field', () => {
    expect(fieldErrorsOf(new FieldFailureError('rr', 4, 'odd length'))).toEqual([
      { field: 'rr', offset: 4, reason: 'odd length' },
    ]);
    expect(fieldErrorsOf(new EnumValueError('trend', 12, [0, 1]))).toEqual([
      { field: 'trend', reason: 'Invalid trend: 12 is not one of [0, 1]' },
    ]);
    expect(fieldErrorsOf(new InsufficientDataError('x', 0, 1))).toEqual([]);
  });
});

describe('result builders', () => {
  it('builds a success result with a copy of the raw bytes', () => {
    const raw = hex('55');
    const result = successResult(INFO, raw, 85, createTrace(false));
    raw[0] = 0;
    expect(result).toEqual({
      success: true,
      characteristic: INFO,
      value: 85,
      raw: hex('55'),
      message: 'ok',
      fieldErrors: [],
      trace: [],
    });
  });

  it('carries the error kind and message of a codec error', () => {
    const result = failureResult(INFO, hex(''), new MissingDependencyError('X', ['2a18']), createTrace(false));
    expect(result.success).toBe(false);
    expect(result.errorKind).toBe('MissingDependency');
    expect(result.message).toBe('X requires missing dependencies: 2a18');
    expect(result.value).toBeUndefined();
  });

  it('includes the partial result of a field failure', () => {
    const result = failureResult(
      INFO,
      hex('01'),
      new FieldFailureError('b', 1, 'short', { a: 1 }),
      createTrace(false),
    );
    expect(result.errorKind).toBe('FieldFailure');
    expect(result.partial).toEqual({ a: 1 });
    expect(result.fieldErrors).toEqual([{ field: 'b', offset: 1, reason: 'short' }]);
  });

  it('maps a non-codec error to DecodeFailure', () => {
    const result = failureResult(INFO, hex('01'), new Error('boom'), createTrace(false));
    expect(result.errorKind).toBe('DecodeFailure');
    expect(result.message).toBe('boom');
  });
});
