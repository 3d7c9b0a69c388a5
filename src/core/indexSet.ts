/**
 * Ordered, de-duplicated set of row indexes.
 * Describes the positions a pending mutation will touch.
 */
export class IndexSet implements Iterable<number> {
  private readonly _indexes: number[];

  private constructor(sorted: number[]) {
    this._indexes = sorted;
  }

  static empty(): IndexSet {
    return new IndexSet([]);
  }

  static of(...indexes: number[]): IndexSet {
    return IndexSet.from(indexes);
  }

  static from(indexes: Iterable<number>): IndexSet {
    const unique = new Set<number>();
    for (const index of indexes) {
      if (!Number.isInteger(index) || index < 0) {
        throw new RangeError(`Index set entries must be non-negative integers, got ${index}.`);
      }
      unique.add(index);
    }
    return new IndexSet([...unique].sort((a, b) => a - b));
  }

  /** Indexes `[start, start + length)`. */
  static range(start: number, length: number): IndexSet {
    return new IndexSet(Array.from({ length: Math.max(0, length) }, (_, i) => start + i));
  }

  get size(): number {
    return this._indexes.length;
  }

  first(): number | undefined {
    return this._indexes[0];
  }

  last(): number | undefined {
    return this._indexes[this._indexes.length - 1];
  }

  has(index: number): boolean {
    return this._indexes.includes(index);
  }

  /** Ascending order. */
  [Symbol.iterator](): Iterator<number> {
    return this._indexes[Symbol.iterator]();
  }

  descending(): number[] {
    return [...this._indexes].reverse();
  }

  toArray(): number[] {
    return [...this._indexes];
  }

  equals(other: IndexSet): boolean {
    return (
      other.size === this.size &&
      this._indexes.every((index, i) => other._indexes[i] === index)
    );
  }

  toString(): string {
    return `[${this._indexes.join(", ")}]`;
  }
}
