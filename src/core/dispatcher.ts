import type { TableHandle } from "../sources/tableHandle";
import { isColumnType, type ColumnType } from "./columnType";
import {
  assertNever,
  InternalInconsistencyError,
  TypeMismatchError,
  UnsupportedTypeError,
} from "./errors";
import {
  fromBinary,
  fromBool,
  fromDouble,
  fromFloat,
  fromInt,
  fromString,
  fromTimestamp,
  toBinary,
  toBool,
  toDouble,
  toFloat,
  toInt,
  toString,
  toTimestamp,
  type CallerValue,
} from "./values";

/** Column 0 unless the caller addresses a column of a multi-column table. */
export type CellAddress = {
  table: TableHandle;
  col?: number;
  /** Property name used in conversion errors. */
  property?: string;
};

function columnTypeOf(table: TableHandle, col: number): ColumnType {
  const type: unknown = table.getColumnType(col);
  if (!isColumnType(type)) {
    throw new InternalInconsistencyError(
      `Table "${table.name}" reports unknown column type '${String(type)}'.`,
    );
  }
  return type;
}

function unsupported(type: "mixed" | "link"): never {
  throw new UnsupportedTypeError(
    type,
    type === "mixed"
      ? "Untyped 'mixed' values are unsupported in single-column tables."
      : "Object links are unsupported in single-column tables.",
  );
}

/** Write `value` into row `index`, converting it to the column's primitive. */
export function setAt(address: CellAddress, index: number, value: unknown): void {
  const { table } = address;
  const col = address.col ?? 0;
  const property = address.property ?? table.name;
  const type = columnTypeOf(table, col);
  if (value === null) {
    if (type === "mixed" || type === "link") unsupported(type);
    if (!table.isNullable(col)) {
      throw new TypeMismatchError(property, `a non-null ${type}`, value);
    }
    table.setNull(col, index);
    return;
  }
  switch (type) {
    case "int":
      return table.setInt(col, index, toInt(value, property));
    case "bool":
      return table.setBool(col, index, toBool(value, property));
    case "float":
      return table.setFloat(col, index, toFloat(value, property));
    case "double":
      return table.setDouble(col, index, toDouble(value, property));
    case "string":
      return table.setString(col, index, toString(value, property));
    case "binary":
      return table.setBinary(col, index, toBinary(value, property));
    case "timestamp":
      return table.setTimestamp(col, index, toTimestamp(value, property));
    case "mixed":
    case "link":
      return unsupported(type);
    default:
      return assertNever(type, "column type");
  }
}

/** Read row `index` as a caller-facing value. */
export function getAt(address: CellAddress, index: number): CallerValue {
  const { table } = address;
  const col = address.col ?? 0;
  const type = columnTypeOf(table, col);
  if (type === "mixed" || type === "link") unsupported(type);
  if (table.isNullable(col) && table.isNull(col, index)) {
    return null;
  }
  switch (type) {
    case "int":
      return fromInt(table.getInt(col, index));
    case "bool":
      return fromBool(table.getBool(col, index));
    case "float":
      return fromFloat(table.getFloat(col, index));
    case "double":
      return fromDouble(table.getDouble(col, index));
    case "string":
      return fromString(table.getString(col, index));
    case "binary":
      return fromBinary(table.getBinary(col, index));
    case "timestamp":
      return fromTimestamp(table.getTimestamp(col, index));
    default:
      return assertNever(type, "column type");
  }
}

/** Index of the first row equal to `value`, or `NOT_FOUND`. */
export function findFirst(address: CellAddress, value: unknown): number {
  const { table } = address;
  const col = address.col ?? 0;
  const property = address.property ?? table.name;
  const type = columnTypeOf(table, col);
  if (type === "mixed" || type === "link") unsupported(type);
  if (value === null) {
    if (!table.isNullable(col)) {
      throw new TypeMismatchError(property, `a non-null ${type}`, value);
    }
    return table.findFirstNull(col);
  }
  switch (type) {
    case "int":
      return table.findFirstInt(col, toInt(value, property));
    case "bool":
      return table.findFirstBool(col, toBool(value, property));
    case "float":
      return table.findFirstFloat(col, toFloat(value, property));
    case "double":
      return table.findFirstDouble(col, toDouble(value, property));
    case "string":
      return table.findFirstString(col, toString(value, property));
    case "binary":
      return table.findFirstBinary(col, toBinary(value, property));
    case "timestamp":
      return table.findFirstTimestamp(col, toTimestamp(value, property));
    default:
      return assertNever(type, "column type");
  }
}

/**
 * Check that `value` converts to the column's primitive without writing it.
 * Lets mutators fail before any row is touched.
 */
export function verifyValue(address: CellAddress, value: unknown): void {
  const { table } = address;
  const col = address.col ?? 0;
  const property = address.property ?? table.name;
  const type = columnTypeOf(table, col);
  if (type === "mixed" || type === "link") unsupported(type);
  if (value === null) {
    if (!table.isNullable(col)) {
      throw new TypeMismatchError(property, `a non-null ${type}`, value);
    }
    return;
  }
  switch (type) {
    case "int":
      toInt(value, property);
      return;
    case "bool":
      toBool(value, property);
      return;
    case "float":
      toFloat(value, property);
      return;
    case "double":
      toDouble(value, property);
      return;
    case "string":
      toString(value, property);
      return;
    case "binary":
      toBinary(value, property);
      return;
    case "timestamp":
      toTimestamp(value, property);
      return;
    default:
      return assertNever(type, "column type");
  }
}
