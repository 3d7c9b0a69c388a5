import { NOT_FOUND } from "./columnType";
import { InvalidatedStateError, OutOfRangeError, translateErrors } from "./errors";
import type { ObjectHandle, ObjectTable } from "./objectTable";

/**
 * Engine-level result set: an ordered sequence of rows produced elsewhere
 * (queries and sorting live outside this package).
 */
export interface ResultsSource {
  readonly className: string;
  isValid(): boolean;
  size(): number;
  /** Row index in the class table of the i-th result. */
  rowAt(index: number): number;
  objects(): ObjectTable;
}

/** Every object of a class, in table order. */
export function allObjects(objects: ObjectTable): ResultsSource {
  return {
    className: objects.className,
    isValid: () => !objects.session.isClosed,
    size: () => objects.size(),
    rowAt: (index) => index,
    objects: () => objects,
  };
}

/**
 * Read-only, live view over a `ResultsSource`.
 * Nothing is copied; every call reads through to the source.
 */
export class ResultsView implements Iterable<ObjectHandle> {
  constructor(private readonly _source: ResultsSource) {}

  get className(): string {
    return this._source.className;
  }

  isInvalidated(): boolean {
    return !this._source.isValid();
  }

  count(): number {
    if (this.isInvalidated()) return 0;
    return translateErrors(() => this._source.size());
  }

  get(index: number): ObjectHandle {
    if (this.isInvalidated()) {
      throw new InvalidatedStateError("Results");
    }
    const count = this.count();
    if (!Number.isInteger(index) || index < 0 || index >= count) {
      throw new OutOfRangeError(index, count);
    }
    const row = translateErrors(() => this._source.rowAt(index));
    return this._source.objects().handle(row);
  }

  indexOf(object: ObjectHandle): number {
    if (this.isInvalidated()) return NOT_FOUND;
    const count = this.count();
    for (let i = 0; i < count; i++) {
      if (this.get(i).equals(object)) return i;
    }
    return NOT_FOUND;
  }

  toArray(): ObjectHandle[] {
    const count = this.count();
    const out: ObjectHandle[] = [];
    for (let i = 0; i < count; i++) {
      out.push(this.get(i));
    }
    return out;
  }

  [Symbol.iterator](): Iterator<ObjectHandle> {
    return this.toArray()[Symbol.iterator]();
  }
}
