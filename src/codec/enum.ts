import { EnumValueError, TypeMismatchError } from '../errors.js';

/** Two-way map between raw enumeration codes and member names. */
export class EnumCodec<N extends string> {
  private readonly byCode = new Map<number, N>();
  private readonly byName = new Map<N, number>();

  constructor(
    readonly field: string,
    members: Readonly<Record<number, N>>,
  ) {
    for (const key of Object.keys(members)) {
      const code = Number(key);
      const name = members[code];
      this.byCode.set(code, name);
      this.byName.set(name, code);
    }
  }

  get codes(): number[] {
    return [...this.byCode.keys()];
  }

  get names(): N[] {
    return [...this.byName.keys()];
  }

  has(code: number): boolean {
    return this.byCode.has(code);
  }

  /** Member name for a raw code; EnumValueError for reserved or unknown codes. */
  decode(code: number): N {
    const name = this.byCode.get(code);
    if (name === undefined) throw new EnumValueError(this.field, code, this.codes);
    return name;
  }

  encode(name: N): number {
    const code = this.byName.get(name);
    if (code === undefined) {
      throw new TypeMismatchError(this.field, `one of ${this.names.join(', ')}`, String(name));
    }
    return code;
  }
}
