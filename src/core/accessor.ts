import type { TableHandle } from "../sources/tableHandle";
import type { Timestamp } from "./columnType";
import { NOT_FOUND } from "./columnType";
import { TypeMismatchError, UnsupportedOperationError } from "./errors";
import { PersistedList } from "./list";
import type { ObservationKey } from "./observation";
import { ObjectHandle, type ObjectTable } from "./objectTable";
import { ResultsView, type ResultsSource } from "./results";
import type { ObjectSchema, PropertySchema } from "./schema";
import type { Session } from "./session";
import * as values from "./values";

/** Loosely structured input: keyed by property name, or positional. */
export type ValueSet = { readonly [key: string]: unknown } | readonly unknown[];

/** Outcome of resolving a caller value against an object class. */
export type ObjectReference =
  | { kind: "existing"; index: number }
  | { kind: "update"; index: number; value: ValueSet }
  | { kind: "create"; value: ValueSet };

/** Engine-level handles `wrap(...)` lifts into caller-facing objects. */
export type EngineHandle =
  | { kind: "list"; table: TableHandle; key: ObservationKey }
  | { kind: "results"; source: ResultsSource }
  | { kind: "object"; objects: ObjectTable; row: number };

function isPlainObject(value: unknown): value is { readonly [key: string]: unknown } {
  if (!value || typeof value !== "object") return false;
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

export function isValueSet(value: unknown): value is ValueSet {
  return Array.isArray(value) || isPlainObject(value);
}

function isIterable(value: unknown): value is Iterable<unknown> {
  return (
    typeof value === "object" &&
    value !== null &&
    Symbol.iterator in value &&
    typeof value[Symbol.iterator] === "function"
  );
}

/**
 * Marshals values between callers and persisted columns for one object class.
 * Create one per operation; it carries no state beyond the current property.
 */
export class AccessorContext {
  /** Property whose value is being converted; named in conversion errors. */
  currentProperty?: string;

  constructor(
    readonly session: Session,
    readonly schema: ObjectSchema,
    readonly isCreate: boolean,
  ) {}

  /** Context for assigning to an existing object. */
  static forObject(object: ObjectHandle): AccessorContext {
    return new AccessorContext(object.session, object.schema, false);
  }

  /**
   * Value supplied for a property: own key for records, position for arrays.
   * `undefined` means no value was supplied; `null` is an explicit null.
   */
  valueForProperty(source: unknown, propertyName: string, propertyIndex: number): unknown {
    if (Array.isArray(source)) {
      return propertyIndex < source.length ? source[propertyIndex] : undefined;
    }
    if (isPlainObject(source)) {
      return Object.prototype.hasOwnProperty.call(source, propertyName)
        ? source[propertyName]
        : undefined;
    }
    throw new TypeMismatchError(
      `${this.schema.name}.${propertyName}`,
      "an object or array of property values",
      source,
    );
  }

  /** Declared default for a property, `undefined` when it has none. */
  defaultValueForProperty(schema: ObjectSchema, propertyName: string): unknown {
    return schema.defaultValue(propertyName);
  }

  /** Supplied value, falling back to the default when creating. */
  value(source: unknown, propertyIndex: number): unknown {
    const property = this._propertyAt(propertyIndex);
    const supplied = this.valueForProperty(source, property.name, propertyIndex);
    if (supplied !== undefined || !this.isCreate) {
      return supplied;
    }
    return this.defaultValueForProperty(this.schema, property.name);
  }

  toInt(value: unknown): bigint {
    return values.toInt(value, this._label());
  }
  toBool(value: unknown): boolean {
    return values.toBool(value, this._label());
  }
  toFloat(value: unknown): number {
    return values.toFloat(value, this._label());
  }
  toDouble(value: unknown): number {
    return values.toDouble(value, this._label());
  }
  toStringValue(value: unknown): string {
    return values.toString(value, this._label());
  }
  toBinary(value: unknown): Uint8Array {
    return values.toBinary(value, this._label());
  }
  toTimestamp(value: unknown): Timestamp {
    return values.toTimestamp(value, this._label());
  }
  toMixed(value: unknown): never {
    return values.toMixed(value, this._label());
  }

  fromInt(value: bigint): number | bigint {
    return values.fromInt(value);
  }
  fromBool(value: boolean): boolean {
    return values.fromBool(value);
  }
  fromFloat(value: number): number {
    return values.fromFloat(value);
  }
  fromDouble(value: number): number {
    return values.fromDouble(value);
  }
  fromString(value: string): string {
    return values.fromString(value);
  }
  fromBinary(value: Uint8Array): Uint8Array {
    return values.fromBinary(value);
  }
  fromTimestamp(value: Timestamp): Date {
    return values.fromTimestamp(value);
  }

  isNull(value: unknown): value is null {
    return values.isNull(value);
  }
  nullValue(): null {
    return values.nullValue();
  }

  listSize(value: unknown): number {
    return this._sequence(value).length;
  }

  listValueAtIndex(value: unknown, index: number): unknown {
    return this._sequence(value)[index];
  }

  /**
   * Visit each element once, in order.
   * `visit` must not mutate the sequence being enumerated.
   */
  listEnumerate(value: unknown, visit: (element: unknown) => void): void {
    if (Array.isArray(value)) {
      for (const element of value) visit(element);
      return;
    }
    if (typeof value !== "string" && isIterable(value)) {
      for (const element of value) visit(element);
      return;
    }
    throw new TypeMismatchError(this._label(), "a list of values", value);
  }

  /**
   * Decide whether `value` denotes an existing `objectType` row or a new one.
   * With `allowUpdate`, a value set matching an existing primary key overwrites that row.
   */
  resolveObjectIndex(value: unknown, objectType: string, allowUpdate: boolean): ObjectReference {
    const objects = this.session.objects(objectType);
    const schema = objects.schema;

    if (value instanceof ObjectHandle) {
      if (value.className !== objectType) {
        throw new TypeMismatchError(this._label(objectType), `a '${objectType}' object`, value);
      }
      if (value.session === this.session) {
        return { kind: "existing", index: value.row() };
      }
      return this.resolveObjectIndex(snapshot(value), objectType, allowUpdate);
    }

    if (isValueSet(value)) {
      const pk = schema.primaryKey;
      if (pk === undefined) {
        return { kind: "create", value };
      }
      const target = new AccessorContext(this.session, schema, true);
      const pkValue = target.value(value, schema.indexOf(pk));
      if (pkValue === undefined) {
        throw new TypeMismatchError(`${objectType}.${pk}`, "a primary key value", pkValue);
      }
      const index = objects.findByPrimaryKey(pkValue);
      if (index === NOT_FOUND) {
        return { kind: "create", value };
      }
      return allowUpdate ? { kind: "update", index, value } : { kind: "existing", index };
    }

    const pk = schema.primaryKey;
    if (pk === undefined) {
      throw new TypeMismatchError(
        this._label(objectType),
        `a '${objectType}' object or value set`,
        value,
      );
    }
    const index = objects.findByPrimaryKey(value);
    if (index !== NOT_FOUND) {
      return { kind: "existing", index };
    }
    return { kind: "create", value: { [pk]: value } };
  }

  /** Resolve `value` and materialize it, returning the row in `objectType`'s table. */
  addObject(value: unknown, objectType: string, allowUpdate: boolean): number {
    const reference = this.resolveObjectIndex(value, objectType, allowUpdate);
    const objects = this.session.objects(objectType);
    switch (reference.kind) {
      case "existing":
        return reference.index;
      case "update": {
        const context = new AccessorContext(this.session, objects.schema, false);
        context._apply(objects, reference.index, reference.value, allowUpdate);
        return objects.rowOf(objects.idAt(reference.index));
      }
      case "create": {
        const context = new AccessorContext(this.session, objects.schema, true);
        context._verifyRequired(reference.value);
        const id = objects.idAt(objects.create());
        try {
          context._apply(objects, objects.rowOf(id), reference.value, allowUpdate);
        } catch (error) {
          const row = objects.rowOf(id);
          if (row !== NOT_FOUND) objects.remove(row);
          throw error;
        }
        return objects.rowOf(id);
      }
    }
  }

  /** Create (or, with `allowUpdate`, upsert) an object of this context's class. */
  createObject(value: unknown, allowUpdate = false): ObjectHandle {
    const row = this.addObject(value, this.schema.name, allowUpdate);
    return this.session.objects(this.schema.name).handle(row);
  }

  /** Lift an engine handle into its caller-facing form without copying storage. */
  wrap(handle: Extract<EngineHandle, { kind: "list" }>): PersistedList;
  wrap(handle: Extract<EngineHandle, { kind: "results" }>): ResultsView;
  wrap(handle: Extract<EngineHandle, { kind: "object" }>): ObjectHandle;
  wrap(handle: EngineHandle): PersistedList | ResultsView | ObjectHandle;
  wrap(handle: EngineHandle): PersistedList | ResultsView | ObjectHandle {
    switch (handle.kind) {
      case "list":
        return new PersistedList(this.session, handle.table, handle.key);
      case "results":
        return new ResultsView(handle.source);
      case "object":
        return handle.objects.handle(handle.row);
    }
  }

  private _apply(
    objects: ObjectTable,
    row: number,
    source: ValueSet,
    allowUpdate: boolean,
  ): void {
    const pk = this.schema.primaryKey;
    this.schema.properties.forEach((property, index) => {
      if (!this.isCreate && property.name === pk) return;
      this.currentProperty = property.name;
      const supplied = this.value(source, index);
      if (supplied === undefined) return;
      this._assign(objects, row, property, supplied, allowUpdate);
    });
    this.currentProperty = undefined;
  }

  /** Every required scalar must be supplied or defaulted before a row is added. */
  private _verifyRequired(source: ValueSet): void {
    this.schema.properties.forEach((property, index) => {
      if (property.type === "list" || property.type === "object" || property.optional) return;
      if (this.value(source, index) !== undefined) return;
      this.currentProperty = property.name;
      const label = this._label();
      this.currentProperty = undefined;
      throw new TypeMismatchError(
        label,
        `a value (property '${property.name}' is required)`,
        undefined,
      );
    });
  }

  private _assign(
    objects: ObjectTable,
    row: number,
    property: PropertySchema,
    value: unknown,
    allowUpdate: boolean,
  ): void {
    switch (property.type) {
      case "list": {
        const list = objects.list(row, property.name);
        if (!this.isCreate) {
          list.clear();
        }
        if (value === null) return;
        const items: unknown[] = [];
        this.listEnumerate(value, (element) => items.push(element));
        list.extend(items);
        return;
      }
      case "object": {
        if (value === null) {
          objects.setProperty(row, property.name, null);
          return;
        }
        const targetRow = this.addObject(value, property.objectType, allowUpdate);
        const target = this.session.objects(property.objectType).handle(targetRow);
        objects.setProperty(row, property.name, target);
        return;
      }
      default:
        objects.setProperty(row, property.name, value);
    }
  }

  private _sequence(value: unknown): readonly unknown[] {
    const items: unknown[] = [];
    this.listEnumerate(value, (element) => items.push(element));
    return items;
  }

  private _propertyAt(index: number): PropertySchema {
    const property = this.schema.properties[index];
    if (!property) {
      throw new UnsupportedOperationError(
        `Class '${this.schema.name}' has no property at index ${index}.`,
      );
    }
    return property;
  }

  private _label(className = this.schema.name): string {
    return this.currentProperty ? `${className}.${this.currentProperty}` : className;
  }
}

/** Plain value set copied from an object (used when it comes from another session). */
function snapshot(object: ObjectHandle): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  for (const property of object.schema.properties) {
    const value = object.get(property.name);
    out[property.name] = value instanceof PersistedList ? value.toArray() : value;
  }
  return out;
}
