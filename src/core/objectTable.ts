import type { TableHandle } from "../sources/tableHandle";
import { changeList, type ChangeTarget } from "./changeList";
import { NOT_FOUND, type ColumnSpec } from "./columnType";
import { findFirst, getAt, setAt, verifyValue } from "./dispatcher";
import {
  InvalidatedStateError,
  OutOfRangeError,
  translateErrors,
  TypeMismatchError,
  UnsupportedOperationError,
} from "./errors";
import { IndexSet } from "./indexSet";
import { PersistedList } from "./list";
import type { ListObserver, NotificationToken } from "./observation";
import type {
  ObjectPropertySchema,
  ObjectSchema,
  PropertySchema,
  ScalarPropertySchema,
} from "./schema";
import type { Session } from "./session";
import type { CallerValue } from "./values";

const ID_COLUMN = 0;

/** Value read from an object property. */
export type PropertyValue = CallerValue | ObjectHandle | PersistedList;

function columnSpecFor(property: ScalarPropertySchema | ObjectPropertySchema): ColumnSpec {
  if (property.type === "object") {
    return { type: "int", nullable: true };
  }
  return { type: property.type, nullable: Boolean(property.optional) };
}

/**
 * Rows of one object class.
 * Column 0 holds a stable object id; every non-list property gets its own column,
 * links store the target's id, and list properties live in per-object tables.
 */
export class ObjectTable {
  private _handle?: TableHandle;
  private _columns: Map<string, number>;
  private _nextId?: number;

  constructor(
    readonly session: Session,
    readonly schema: ObjectSchema,
  ) {
    this._columns = new Map(
      schema.columnProperties().map((property, index) => [property.name, index + 1]),
    );
  }

  get className(): string {
    return this.schema.name;
  }

  size(): number {
    return translateErrors(() => this._table().size());
  }

  /** Append an empty object (defaults not applied) and return its row. */
  create(): number {
    this.session.verifyInWrite();
    return translateErrors(() => {
      const table = this._table();
      const id = this._allocateId();
      const row = table.addEmptyRow();
      table.setInt(ID_COLUMN, row, BigInt(id));
      return row;
    });
  }

  /** Delete the object at `row`; its lists are dropped, which invalidates them. */
  remove(row: number): void {
    this.session.verifyInWrite();
    this._verifyRow(row);
    const id = this.idAt(row);
    translateErrors(() => {
      for (const property of this.schema.properties) {
        if (property.type === "list") {
          this.session.layer.dropTable(this._listTableName(id, property.name));
        }
      }
      this._table().remove(row);
    });
    this.session.registry.releaseOwner(this._ownerId(id));
  }

  idAt(row: number): number {
    this._verifyRow(row);
    return translateErrors(() => Number(this._table().getInt(ID_COLUMN, row)));
  }

  /** Current row of the object with `id`, or `NOT_FOUND` once deleted. */
  rowOf(id: number): number {
    return translateErrors(() => this._table().findFirstInt(ID_COLUMN, BigInt(id)));
  }

  /** Row whose primary key equals `value`, or `NOT_FOUND`. */
  findByPrimaryKey(value: unknown): number {
    const pk = this.schema.primaryKey;
    if (pk === undefined) {
      throw new UnsupportedOperationError(
        `Class '${this.className}' has no primary key.`,
      );
    }
    return translateErrors(() =>
      findFirst({ table: this._table(), col: this._columnOf(pk), property: pk }, value),
    );
  }

  handle(row: number): ObjectHandle {
    return new ObjectHandle(this, this.idAt(row));
  }

  getProperty(row: number, name: string): PropertyValue {
    this._verifyRow(row);
    const property = this._property(name);
    if (property.type === "list") {
      return this.list(row, name);
    }
    const table = this._table();
    const col = this._columnOf(name);
    if (property.type === "object") {
      return translateErrors(() => {
        if (table.isNull(col, row)) return null;
        const target = this.session.objects(property.objectType);
        const id = Number(table.getInt(col, row));
        return target.rowOf(id) === NOT_FOUND ? null : new ObjectHandle(target, id);
      });
    }
    return translateErrors(() => getAt({ table, col, property: name }, row));
  }

  /**
   * Write a scalar property, or a link given as an `ObjectHandle` / `null`.
   * Observers of the property get a `setting` will-change / did-change pair.
   */
  setProperty(row: number, name: string, value: unknown): void {
    this.session.verifyInWrite();
    this._verifyRow(row);
    const property = this._property(name);
    if (property.type === "list") {
      throw new UnsupportedOperationError(
        `List property '${this.className}.${name}' cannot be assigned; mutate the list instead.`,
      );
    }
    const table = this._table();
    const col = this._columnOf(name);
    const target = this._changeTarget(this.idAt(row), name);
    if (property.type === "object") {
      if (value === null) {
        changeList(target, "setting", () => table.setNull(col, row), () => IndexSet.empty());
        return;
      }
      if (
        !(value instanceof ObjectHandle) ||
        value.className !== property.objectType ||
        value.session !== this.session
      ) {
        throw new TypeMismatchError(
          name,
          `a '${property.objectType}' object from this session`,
          value,
        );
      }
      const targetId = value.id;
      changeList(
        target,
        "setting",
        () => table.setInt(col, row, BigInt(targetId)),
        () => IndexSet.empty(),
      );
      return;
    }
    const cell = { table, col, property: name };
    translateErrors(() => verifyValue(cell, value));
    changeList(target, "setting", () => setAt(cell, row, value), () => IndexSet.empty());
  }

  /**
   * Observe property `name` of the object at `row`.
   * For a list property this is the same registration as `list(row, name).addObserver(...)`.
   */
  observe(row: number, name: string, observer: ListObserver): NotificationToken {
    this._property(name);
    const { registry, observationKey } = this._changeTarget(this.idAt(row), name);
    return registry.ensure(observationKey).add(observer);
  }

  /** List stored under `name` for the object at `row`. */
  list(row: number, name: string): PersistedList {
    const property = this._property(name);
    if (property.type !== "list") {
      throw new UnsupportedOperationError(
        `Property '${this.className}.${name}' is not a list.`,
      );
    }
    const id = this.idAt(row);
    const table = translateErrors(() =>
      this.session.layer.openTable(this._listTableName(id, name), [
        { type: property.elementType, nullable: Boolean(property.optional) },
      ]),
    );
    return new PersistedList(this.session, table, {
      ownerId: this._ownerId(id),
      property: name,
    });
  }

  private _changeTarget(id: number, property: string): ChangeTarget {
    return {
      registry: this.session.registry,
      observationKey: { ownerId: this._ownerId(id), property },
    };
  }

  private _ownerId(id: number): string {
    return `${this.className}:${id}`;
  }

  private _listTableName(id: number, property: string): string {
    return `list:${this.className}.${property}:${id}`;
  }

  private _property(name: string): PropertySchema {
    const property = this.schema.property(name);
    if (!property) {
      throw new UnsupportedOperationError(
        `'${name}' is not a property of class '${this.className}'.`,
      );
    }
    return property;
  }

  private _columnOf(name: string): number {
    const col = this._columns.get(name);
    if (col === undefined) {
      throw new UnsupportedOperationError(
        `Property '${this.className}.${name}' has no column.`,
      );
    }
    return col;
  }

  private _verifyRow(row: number): void {
    const size = this.size();
    if (!Number.isInteger(row) || row < 0 || row >= size) {
      throw new OutOfRangeError(row, size);
    }
  }

  private _allocateId(): number {
    if (this._nextId === undefined) {
      const table = this._table();
      let max = 0;
      for (let row = 0; row < table.size(); row++) {
        max = Math.max(max, Number(table.getInt(ID_COLUMN, row)));
      }
      this._nextId = max + 1;
    }
    const id = this._nextId;
    this._nextId += 1;
    return id;
  }

  /** Reopens the class table when a rolled-back write detached it. */
  private _table(): TableHandle {
    if (!this._handle || !this._handle.isAttached()) {
      const columns: ColumnSpec[] = [
        { type: "int" },
        ...this.schema.columnProperties().map(columnSpecFor),
      ];
      this._handle = translateErrors(() =>
        this.session.layer.openTable(`class:${this.className}`, columns),
      );
    }
    return this._handle;
  }
}

/**
 * Reference to a persisted object by class and stable id.
 * Survives row shifts; reports invalid once the object is deleted.
 */
export class ObjectHandle {
  constructor(
    private readonly _objects: ObjectTable,
    readonly id: number,
  ) {}

  get className(): string {
    return this._objects.className;
  }

  get session(): Session {
    return this._objects.session;
  }

  get schema(): ObjectSchema {
    return this._objects.schema;
  }

  isValid(): boolean {
    return !this.session.isClosed && this._objects.rowOf(this.id) !== NOT_FOUND;
  }

  /** Current row index. */
  row(): number {
    if (this.session.isClosed) {
      throw new InvalidatedStateError("Object");
    }
    const row = this._objects.rowOf(this.id);
    if (row === NOT_FOUND) {
      throw new InvalidatedStateError("Object");
    }
    return row;
  }

  get(name: string): PropertyValue {
    return this._objects.getProperty(this.row(), name);
  }

  set(name: string, value: unknown): void {
    this._objects.setProperty(this.row(), name, value);
  }

  list(name: string): PersistedList {
    return this._objects.list(this.row(), name);
  }

  /** Register for change pairs on one property; keep the token to cancel. */
  addObserver(name: string, observer: ListObserver): NotificationToken {
    return this._objects.observe(this.row(), name, observer);
  }

  equals(other: unknown): boolean {
    return (
      other instanceof ObjectHandle &&
      other.session === this.session &&
      other.className === this.className &&
      other.id === this.id
    );
  }
}
