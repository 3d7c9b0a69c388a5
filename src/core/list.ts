import type { TableHandle } from "../sources/tableHandle";
import {
  changeAt,
  changeList,
  changeRange,
  changeSet,
  type ChangeTarget,
} from "./changeList";
import { NOT_FOUND } from "./columnType";
import { findFirst, getAt, setAt, verifyValue, type CellAddress } from "./dispatcher";
import {
  InvalidatedStateError,
  OutOfRangeError,
  translateErrors,
  UnsupportedOperationError,
} from "./errors";
import { IndexSet } from "./indexSet";
import type {
  ListObserver,
  NotificationToken,
  ObservationKey,
  ObservationRegistry,
} from "./observation";
import type { Session } from "./session";
import type { CallerValue } from "./values";

/**
 * Ordered, mutable view over a single-column table.
 * Holds no row data and no indexes between calls; every call reads the table.
 * Mutations need an attached table and an open write transaction.
 */
export class PersistedList implements ChangeTarget, Iterable<CallerValue> {
  readonly observationKey: ObservationKey;

  constructor(
    private readonly _session: Session,
    private readonly _table: TableHandle,
    key: ObservationKey,
  ) {
    this.observationKey = { ...key };
  }

  get registry(): ObservationRegistry {
    return this._session.registry;
  }

  /** Property name used in notifications and conversion errors. */
  get property(): string {
    return this.observationKey.property;
  }

  get session(): Session {
    return this._session;
  }

  /** Row count; 0 once invalidated. */
  count(): number {
    if (this.isInvalidated()) return 0;
    return translateErrors(() => this._table.size());
  }

  isInvalidated(): boolean {
    return !this._table.isAttached();
  }

  get(index: number): CallerValue {
    this._verifyAttached();
    this._verifyIndex(index, this._size());
    return translateErrors(() => getAt(this._cell(), index));
  }

  insert(index: number, value: unknown): void {
    this._verifyWritable();
    const count = this._size();
    if (!Number.isInteger(index) || index < 0 || index > count) {
      throw new OutOfRangeError(index, count, true);
    }
    this._verifyValue(value);
    changeAt(this, "insertion", index, () => {
      this._table.insertEmptyRow(index);
      try {
        setAt(this._cell(), index, value);
      } catch (error) {
        this._discardRows([index]);
        throw error;
      }
    });
  }

  append(value: unknown): void {
    this.insert(this.count(), value);
  }

  /**
   * Insert `values[i]` at the i-th smallest index of `indexes`.
   * Indexes are final positions, so they may be sparse.
   */
  insertMany(values: readonly unknown[], indexes: IndexSet): void {
    this._verifyWritable();
    const count = this._size();
    if (indexes.size !== values.length) {
      throw new OutOfRangeError(
        indexes.size,
        values.length,
        true,
        `Got ${values.length} values for ${indexes.size} indexes.`,
      );
    }
    let reachable = count;
    for (const index of indexes) {
      if (index > reachable) {
        throw new OutOfRangeError(index, reachable, true);
      }
      reachable += 1;
    }
    for (const value of values) this._verifyValue(value);
    changeSet(this, "insertion", indexes, () => {
      const inserted: number[] = [];
      try {
        let i = 0;
        for (const index of indexes) {
          this._table.insertEmptyRow(index);
          inserted.push(index);
          setAt(this._cell(), index, values[i]);
          i += 1;
        }
      } catch (error) {
        this._discardRows(inserted.reverse());
        throw error;
      }
    });
  }

  removeAt(index: number): void {
    this._verifyWritable();
    this._verifyIndex(index, this._size());
    changeAt(this, "removal", index, () => {
      this._table.remove(index);
    });
  }

  /** Removes highest first so pending indexes stay valid. */
  removeMany(indexes: IndexSet): void {
    this._verifyWritable();
    const last = indexes.last();
    const count = this._size();
    if (last !== undefined && last >= count) {
      throw new OutOfRangeError(last, count);
    }
    changeSet(this, "removal", indexes, () => {
      for (const index of indexes.descending()) {
        this._table.remove(index);
      }
    });
  }

  replaceAt(index: number, value: unknown): void {
    this._verifyWritable();
    this._verifyIndex(index, this._size());
    this._verifyValue(value);
    changeAt(this, "replacement", index, () => {
      setAt(this._cell(), index, value);
    });
  }

  exchange(a: number, b: number): void {
    this._verifyWritable();
    const count = this._size();
    this._verifyIndex(a, count);
    this._verifyIndex(b, count);
    changeList(
      this,
      "replacement",
      () => {
        this._table.swapRows(a, b);
      },
      () => IndexSet.of(a, b),
    );
  }

  /** Append every value; one notification for the appended range. */
  extend(values: Iterable<unknown>): void {
    this._verifyWritable();
    const items = [...values];
    for (const item of items) this._verifyValue(item);
    const count = this._size();
    changeRange(this, "insertion", count, items.length, () => {
      if (items.length === 0) return;
      const first = this._table.addEmptyRow(items.length);
      try {
        items.forEach((item, i) => setAt(this._cell(), first + i, item));
      } catch (error) {
        this._discardRows(items.map((_, i) => first + items.length - 1 - i));
        throw error;
      }
    });
  }

  clear(): void {
    this._verifyWritable();
    changeRange(this, "removal", 0, this._size(), () => {
      this._table.clear();
    });
  }

  /** Overwrite every row with `value`; announced as a replacement of the whole range. */
  setAllTo(value: unknown): void {
    this._verifyWritable();
    const count = this._size();
    this._verifyValue(value);
    changeRange(this, "replacement", 0, count, () => {
      for (let i = 0; i < count; i++) {
        setAt(this._cell(), i, value);
      }
    });
  }

  /** Key-value assignment; only the whole-element alias `self` is defined. */
  setValue(key: string, value: unknown): void {
    if (key !== "self") {
      throw new UnsupportedOperationError(
        `Lists only accept assignment to 'self', not '${key}'.`,
      );
    }
    this.setAllTo(value);
  }

  /** First index holding `value`, or `NOT_FOUND`. */
  indexOf(value: unknown): number {
    if (this.isInvalidated()) return NOT_FOUND;
    return translateErrors(() => findFirst(this._cell(), value));
  }

  toArray(): CallerValue[] {
    const count = this.count();
    const out: CallerValue[] = [];
    for (let i = 0; i < count; i++) {
      out.push(this.get(i));
    }
    return out;
  }

  [Symbol.iterator](): Iterator<CallerValue> {
    return this.toArray()[Symbol.iterator]();
  }

  /** True when both lists are views of the same table. */
  equals(other: unknown): boolean {
    return (
      other instanceof PersistedList &&
      other._session === this._session &&
      other._table.name === this._table.name
    );
  }

  /**
   * Register for will-change / did-change pairs on this list.
   * Next: keep the token and call `cancel()` when done.
   */
  addObserver(observer: ListObserver): NotificationToken {
    this._verifyAttached();
    return this.registry.ensure(this.observationKey).add(observer);
  }

  private _cell(): CellAddress {
    return { table: this._table, property: this.property };
  }

  /** Remove rows added by a failed insertion, highest first. */
  private _discardRows(rows: readonly number[]): void {
    if (!this._table.isAttached()) return;
    for (const row of rows) {
      this._table.remove(row);
    }
  }

  private _verifyValue(value: unknown): void {
    translateErrors(() => verifyValue(this._cell(), value));
  }

  private _size(): number {
    return translateErrors(() => this._table.size());
  }

  private _verifyIndex(index: number, count: number): void {
    if (!Number.isInteger(index) || index < 0 || index >= count) {
      throw new OutOfRangeError(index, count);
    }
  }

  private _verifyAttached(): void {
    if (this.isInvalidated()) {
      throw new InvalidatedStateError();
    }
  }

  private _verifyWritable(): void {
    this._verifyAttached();
    this._session.verifyInWrite();
  }
}
