import type { ColumnSpec, ColumnType, Timestamp } from "../core/columnType";

/**
 * Non-owning handle on a single-column row store.
 * The owning layer decides its lifetime; once detached every accessor throws
 * and `isAttached()` reports false.
 * `col` is always 0 for list tables; object tables pass the column they address.
 */
export interface TableHandle {
  /** Stable table name inside its layer. */
  readonly name: string;
  size(): number;
  isAttached(): boolean;
  getColumnType(col: number): ColumnType;
  isNullable(col: number): boolean;
  /** Insert `count` empty rows before `index`. */
  insertEmptyRow(index: number, count?: number): void;
  /** Append `count` empty rows and return the index of the first. */
  addEmptyRow(count?: number): number;
  remove(index: number): void;
  clear(): void;
  swapRows(a: number, b: number): void;

  getInt(col: number, row: number): bigint;
  setInt(col: number, row: number, value: bigint): void;
  findFirstInt(col: number, value: bigint): number;

  getBool(col: number, row: number): boolean;
  setBool(col: number, row: number, value: boolean): void;
  findFirstBool(col: number, value: boolean): number;

  getFloat(col: number, row: number): number;
  setFloat(col: number, row: number, value: number): void;
  findFirstFloat(col: number, value: number): number;

  getDouble(col: number, row: number): number;
  setDouble(col: number, row: number, value: number): void;
  findFirstDouble(col: number, value: number): number;

  getString(col: number, row: number): string;
  setString(col: number, row: number, value: string): void;
  findFirstString(col: number, value: string): number;

  getBinary(col: number, row: number): Uint8Array;
  setBinary(col: number, row: number, value: Uint8Array): void;
  findFirstBinary(col: number, value: Uint8Array): number;

  getTimestamp(col: number, row: number): Timestamp;
  setTimestamp(col: number, row: number, value: Timestamp): void;
  findFirstTimestamp(col: number, value: Timestamp): number;

  isNull(col: number, row: number): boolean;
  setNull(col: number, row: number): void;
  findFirstNull(col: number): number;
}

/**
 * Storage backend for tables.
 * Implementers own table lifetimes and write transactions.
 */
export interface StorageLayer {
  /** Open (creating when missing) a table with the given columns. */
  openTable(name: string, columns: readonly ColumnSpec[]): TableHandle;
  hasTable(name: string): boolean;
  /** Drop a table and detach every handle on it. */
  dropTable(name: string): void;
  beginWrite(): void;
  commitWrite(): void;
  rollbackWrite(): void;
  /** Detach every handle and release the backend. */
  close(): void;

  readonly type: "memory" | "sqlite";
  readonly identifier: string;
}
