import type { EnumCodec } from '../codec/enum.js';
import { decodeInt, encodeInt, type IntegerFormat } from '../codec/primitives.js';
import type { ScaledTemplate } from '../codec/scaled.js';
import type { ParseTrace } from '../diagnostics.js';
import { BaseCharacteristic } from './base.js';
import type { DecodeContext } from './context.js';

/**
 * Single scaled number. Subclasses supply the template and constraints;
 * a raw "unknown" code decodes to undefined.
 */
export abstract class ScaledCharacteristic extends BaseCharacteristic<number | undefined> {
  protected abstract readonly template: ScaledTemplate;

  protected decodeValue(data: Buffer, _context: DecodeContext, trace: ParseTrace): number | undefined {
    const value = this.template.decode(data, 0);
    trace.step(() => `${this.template.name} = ${value === undefined ? 'unknown' : value}`);
    return value;
  }

  protected encodeValue(value: number | undefined): Buffer {
    return this.template.encode(value);
  }
}

/** Single integer enumeration, decoded to its member name. */
export abstract class EnumCharacteristic<N extends string> extends BaseCharacteristic<N> {
  protected abstract readonly format: IntegerFormat;
  protected abstract readonly members: EnumCodec<N>;

  protected decodeValue(data: Buffer): N {
    return this.members.decode(decodeInt(data, 0, this.format));
  }

  protected encodeValue(value: N): Buffer {
    return encodeInt(this.members.encode(value), this.format, this.members.field);
  }
}
