import type { DecodedResult } from '../interfaces/characteristic.js';
import { BluetoothUuid } from '../uuid.js';

export type IdentifierInput = string | number | BluetoothUuid;

function keyOf(id: IdentifierInput): string {
  return BluetoothUuid.from(id).longForm;
}

/**
 * Results of other characteristics available while decoding one payload,
 * keyed by canonical identifier. The batch decoder fills it in dependency order.
 */
export class DecodeContext {
  private readonly results = new Map<string, DecodedResult<unknown>>();

  constructor(entries: Iterable<readonly [IdentifierInput, DecodedResult<unknown>]> = []) {
    for (const [id, result] of entries) this.set(id, result);
  }

  set(id: IdentifierInput, result: DecodedResult<unknown>): this {
    this.results.set(keyOf(id), result);
    return this;
  }

  get(id: IdentifierInput): DecodedResult<unknown> | undefined {
    return this.results.get(keyOf(id));
  }

  has(id: IdentifierInput): boolean {
    return this.results.has(keyOf(id));
  }

  /** True only when a successful decode of `id` is present. */
  hasValue(id: IdentifierInput): boolean {
    return this.get(id)?.success === true;
  }

  /** Decoded value of `id`, or undefined when absent or failed. */
  valueOf(id: IdentifierInput): unknown {
    const result = this.get(id);
    return result?.success ? result.value : undefined;
  }

  keys(): string[] {
    return [...this.results.keys()];
  }

  get size(): number {
    return this.results.size;
  }

  /** A copy that can be extended without touching this one. */
  clone(): DecodeContext {
    return new DecodeContext(this.results);
  }
}
