/**
 * Column classification for single-column tables.
 * `mixed` and `link` stay in the union so callers get `UnsupportedTypeError`
 * instead of a missing case.
 */
export type ColumnType =
  | "int"
  | "bool"
  | "float"
  | "double"
  | "string"
  | "binary"
  | "timestamp"
  | "mixed"
  | "link";

/** Column types the dispatcher can read, write and search. */
export type PrimitiveColumnType = Exclude<ColumnType, "mixed" | "link">;

export const COLUMN_TYPES: readonly ColumnType[] = [
  "int",
  "bool",
  "float",
  "double",
  "string",
  "binary",
  "timestamp",
  "mixed",
  "link",
];

export const PRIMITIVE_COLUMN_TYPES: readonly PrimitiveColumnType[] = [
  "int",
  "bool",
  "float",
  "double",
  "string",
  "binary",
  "timestamp",
];

/** Column definition handed to a layer when a table is opened. */
export type ColumnSpec = {
  type: ColumnType;
  /** Whether rows may hold `null`. */
  nullable?: boolean;
};

/** Storage primitive for `timestamp` columns. */
export type Timestamp = {
  seconds: bigint;
  /** Always in `[0, 1e9)`. */
  nanoseconds: number;
};

/** Returned by searches that match no row. */
export const NOT_FOUND = -1;

export function isColumnType(value: unknown): value is ColumnType {
  return COLUMN_TYPES.some((type) => type === value);
}

export function isPrimitiveColumnType(
  value: unknown,
): value is PrimitiveColumnType {
  return PRIMITIVE_COLUMN_TYPES.some((type) => type === value);
}
