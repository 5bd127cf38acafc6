import { describe, it, expect } from 'vitest';
import { BaseCharacteristic } from '../../src/characteristics/base.js';
import { ValueRangeError } from '../../src/errors.js';
import type { CharacteristicInfo, GattProperty } from '../../src/interfaces/characteristic.js';
import { BluetoothUuid } from '../../src/uuid.js';
import { defineConstraints } from '../../src/validation.js';
import { expectFailure, expectSuccess, hex } from '../helpers/codec-test-utils.js';

const INFO: CharacteristicInfo = {
  uuid: BluetoothUuid.from('FFF2'),
  name: 'Test Counter',
  id: 'org.bluetooth.characteristic.test_counter',
  unit: '',
  valueType: 'int',
  properties: new Set<GattProperty>(['read']),
};

/** Decodes a uint8 but throws a plain Error on 0xFF. */
class CounterCharacteristic extends BaseCharacteristic<number> {
  readonly role = 'unknown';
  readonly constraints = defineConstraints({ expectedLength: 1, maxValue: 200, expectedType: 'number' });
  encoded = 0;

  protected decodeValue(data: Buffer): number {
    if (data[0] === 0xff) throw new Error('counter overflowed');
    return data[0];
  }

  protected encodeValue(value: number): Buffer {
    this.encoded++;
    return Buffer.from([value]);
  }
}

describe('BaseCharacteristic', () => {
  it('exposes identity from its metadata', () => {
    const counter = new CounterCharacteristic(INFO);
    expect(counter.name).toBe('Test Counter');
    expect(counter.uuid.shortForm).toBe('fff2');
    expect(counter.dependencies).toEqual({ required: [], optional: [] });
  });

  it('accepts any Uint8Array and keeps a copy of the raw bytes', () => {
    const counter = new CounterCharacteristic(INFO);
    const input = new Uint8Array([7]);
    const result = counter.parse(input);
    input[0] = 9;
    expect(expectSuccess(result)).toBe(7);
    expect(result.raw).toEqual(hex('07'));
    expect(result.message).toBe('ok');
    expect(result.fieldErrors).toEqual([]);
  });

  it('turns an unexpected decoder exception into a DecodeFailure result', () => {
    const failure = expectFailure(new CounterCharacteristic(INFO).parse(hex('FF')));
    expect(failure.errorKind).toBe('DecodeFailure');
    expect(failure.message).toBe('counter overflowed');
    expect(failure.characteristic).toBe(INFO);
  });

  it('checks length before decoding', () => {
    const counter = new CounterCharacteristic(INFO);
    expect(expectFailure(counter.parse(hex('FF FF'))).errorKind).toBe('LengthMismatch');
    expect(expectFailure(counter.parse(hex(''))).errorKind).toBe('InsufficientData');
  });

  it('records a trace only when asked', () => {
    const counter = new CounterCharacteristic(INFO);
    expect(counter.parse(hex('07')).trace).toEqual([]);
    expect(counter.parse(hex('07'), undefined, { trace: true }).trace).toEqual([
      'Test Counter: 1 bytes passed length checks',
      'Test Counter: decoded',
    ]);
  });

  it('keeps the trace gathered before a failure', () => {
    const failure = expectFailure(new CounterCharacteristic(INFO).parse(hex('FF'), undefined, { trace: true }));
    expect(failure.trace).toEqual(['Test Counter: 1 bytes passed length checks']);
  });

  it('validates a value before encoding it', () => {
    const counter = new CounterCharacteristic(INFO);
    expect(counter.build(200)).toEqual(hex('C8'));
    expect(() => counter.build(201)).toThrow(ValueRangeError);
    expect(counter.encoded).toBe(1);
  });

  it('fails a decoded value outside the declared range', () => {
    const failure = expectFailure(new CounterCharacteristic(INFO).parse(hex('C9')));
    expect(failure.errorKind).toBe('ValueRange');
    expect(failure.message).toBe('Invalid Test Counter: 201 (expected range [-Infinity, 200])');
  });
});
