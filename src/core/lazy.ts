/** Read-only ordered view over a group's components. */
export interface ComponentList<T> extends Iterable<T> {
  readonly length: number;
  get(index: number): T;
  toArray(): T[];
}

/**
 * Maps `source` on demand: each slot is transformed on first access and the
 * result kept, so reading one component never pays for the others.
 * Slots are written once; a transform that throws leaves its slot empty.
 */
export class LazyMappedList<S, T> implements ComponentList<T> {
  private readonly cache: Array<{ value: T } | undefined>;

  constructor(
    private readonly source: readonly S[],
    private readonly transform: (item: S, index: number) => T,
  ) {
    this.cache = new Array<{ value: T } | undefined>(source.length);
  }

  get length(): number {
    return this.source.length;
  }

  get(index: number): T {
    if (!Number.isInteger(index) || index < 0 || index >= this.source.length) {
      throw new RangeError(`Index ${index} out of bounds (length ${this.source.length})`);
    }
    const cached = this.cache[index];
    if (cached) return cached.value;
    const item = this.source[index];
    if (item === undefined) throw new RangeError(`No component at index ${index}`);
    const value = this.transform(item, index);
    this.cache[index] = { value };
    return value;
  }

  toArray(): T[] {
    return Array.from(this, (value) => value);
  }

  *[Symbol.iterator](): Iterator<T> {
    for (let i = 0; i < this.source.length; i++) yield this.get(i);
  }
}

export const emptyList = <T>(): ComponentList<T> =>
  new LazyMappedList<never, T>([], () => {
    throw new RangeError("empty list");
  });
