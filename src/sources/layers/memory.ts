import type { ColumnSpec, ColumnType, Timestamp } from "../../core/columnType";
import { NOT_FOUND } from "../../core/columnType";
import { bytesEqual, timestampsEqual } from "../../core/values";
import type { StorageLayer, TableHandle } from "../tableHandle";

type Cell = bigint | boolean | number | string | Uint8Array | Timestamp | null;

function emptyCell(column: ColumnSpec): Cell {
  if (column.nullable) return null;
  switch (column.type) {
    case "int":
      return 0n;
    case "bool":
      return false;
    case "float":
    case "double":
      return 0;
    case "string":
      return "";
    case "binary":
      return new Uint8Array(0);
    case "timestamp":
      return { seconds: 0n, nanoseconds: 0 };
    case "mixed":
    case "link":
      return null;
  }
}

/** Equality for REAL cells; NaN matches NaN. */
function sameNumber(cell: Cell, value: number): boolean {
  if (typeof cell !== "number") return false;
  return cell === value || (Number.isNaN(cell) && Number.isNaN(value));
}

/**
 * In-process table used by the memory layer and by tests.
 * Cells are never mutated in place, so column snapshots can share them.
 */
export class MemoryTable implements TableHandle {
  private _attached = true;

  constructor(
    readonly name: string,
    /** @internal */
    readonly _columns: readonly ColumnSpec[],
    /** @internal */
    public _cells: Cell[][],
  ) {}

  /** @internal */
  detach(): void {
    this._attached = false;
  }

  size(): number {
    this._verifyAttached();
    return this._cells[0]?.length ?? 0;
  }

  isAttached(): boolean {
    return this._attached;
  }

  getColumnType(col: number): ColumnType {
    return this._column(col).type;
  }

  isNullable(col: number): boolean {
    return Boolean(this._column(col).nullable);
  }

  insertEmptyRow(index: number, count = 1): void {
    this._verifyAttached();
    if (index < 0 || index > this.size()) {
      throw new Error(`Row index ${index} out of range in table "${this.name}".`);
    }
    this._columns.forEach((column, col) => {
      const cells = this._cellsOf(col);
      const fill = Array.from({ length: count }, () => emptyCell(column));
      cells.splice(index, 0, ...fill);
    });
  }

  addEmptyRow(count = 1): number {
    const first = this.size();
    this.insertEmptyRow(first, count);
    return first;
  }

  remove(index: number): void {
    this._verifyRow(index);
    for (const cells of this._cells) {
      cells.splice(index, 1);
    }
  }

  clear(): void {
    this._verifyAttached();
    for (const cells of this._cells) {
      cells.length = 0;
    }
  }

  swapRows(a: number, b: number): void {
    this._verifyRow(a);
    this._verifyRow(b);
    for (const cells of this._cells) {
      const tmp = cells[a] ?? null;
      cells[a] = cells[b] ?? null;
      cells[b] = tmp;
    }
  }

  getInt(col: number, row: number): bigint {
    const cell = this._get(col, row, "int");
    if (typeof cell !== "bigint") throw this._nullRead(col, row);
    return cell;
  }
  setInt(col: number, row: number, value: bigint): void {
    this._set(col, row, "int", value);
  }
  findFirstInt(col: number, value: bigint): number {
    return this._find(col, "int", (cell) => cell === value);
  }

  getBool(col: number, row: number): boolean {
    const cell = this._get(col, row, "bool");
    if (typeof cell !== "boolean") throw this._nullRead(col, row);
    return cell;
  }
  setBool(col: number, row: number, value: boolean): void {
    this._set(col, row, "bool", value);
  }
  findFirstBool(col: number, value: boolean): number {
    return this._find(col, "bool", (cell) => cell === value);
  }

  getFloat(col: number, row: number): number {
    const cell = this._get(col, row, "float");
    if (typeof cell !== "number") throw this._nullRead(col, row);
    return cell;
  }
  setFloat(col: number, row: number, value: number): void {
    this._set(col, row, "float", Math.fround(value));
  }
  findFirstFloat(col: number, value: number): number {
    const needle = Math.fround(value);
    return this._find(col, "float", (cell) => sameNumber(cell, needle));
  }

  getDouble(col: number, row: number): number {
    const cell = this._get(col, row, "double");
    if (typeof cell !== "number") throw this._nullRead(col, row);
    return cell;
  }
  setDouble(col: number, row: number, value: number): void {
    this._set(col, row, "double", value);
  }
  findFirstDouble(col: number, value: number): number {
    return this._find(col, "double", (cell) => sameNumber(cell, value));
  }

  getString(col: number, row: number): string {
    const cell = this._get(col, row, "string");
    if (typeof cell !== "string") throw this._nullRead(col, row);
    return cell;
  }
  setString(col: number, row: number, value: string): void {
    this._set(col, row, "string", value);
  }
  findFirstString(col: number, value: string): number {
    return this._find(col, "string", (cell) => cell === value);
  }

  getBinary(col: number, row: number): Uint8Array {
    const cell = this._get(col, row, "binary");
    if (!(cell instanceof Uint8Array)) throw this._nullRead(col, row);
    return Uint8Array.from(cell);
  }
  setBinary(col: number, row: number, value: Uint8Array): void {
    this._set(col, row, "binary", Uint8Array.from(value));
  }
  findFirstBinary(col: number, value: Uint8Array): number {
    return this._find(
      col,
      "binary",
      (cell) => cell instanceof Uint8Array && bytesEqual(cell, value),
    );
  }

  getTimestamp(col: number, row: number): Timestamp {
    const cell = this._get(col, row, "timestamp");
    if (!isTimestampCell(cell)) throw this._nullRead(col, row);
    return { ...cell };
  }
  setTimestamp(col: number, row: number, value: Timestamp): void {
    this._set(col, row, "timestamp", { ...value });
  }
  findFirstTimestamp(col: number, value: Timestamp): number {
    return this._find(
      col,
      "timestamp",
      (cell) => isTimestampCell(cell) && timestampsEqual(cell, value),
    );
  }

  isNull(col: number, row: number): boolean {
    this._verifyRow(row);
    return this._cellsOf(col)[row] === null;
  }

  setNull(col: number, row: number): void {
    this._verifyRow(row);
    if (!this.isNullable(col)) {
      throw new Error(`Column ${col} of table "${this.name}" is not nullable.`);
    }
    this._cellsOf(col)[row] = null;
  }

  findFirstNull(col: number): number {
    this._verifyAttached();
    const index = this._cellsOf(col).indexOf(null);
    return index === -1 ? NOT_FOUND : index;
  }

  private _column(col: number): ColumnSpec {
    this._verifyAttached();
    const column = this._columns[col];
    if (!column) {
      throw new Error(`Table "${this.name}" has no column ${col}.`);
    }
    return column;
  }

  private _cellsOf(col: number): Cell[] {
    this._column(col);
    const cells = this._cells[col];
    if (!cells) {
      throw new Error(`Table "${this.name}" has no storage for column ${col}.`);
    }
    return cells;
  }

  private _get(col: number, row: number, type: ColumnType): Cell {
    this._verifyType(col, type);
    this._verifyRow(row);
    return this._cellsOf(col)[row] ?? null;
  }

  private _set(col: number, row: number, type: ColumnType, value: Cell): void {
    this._verifyType(col, type);
    this._verifyRow(row);
    this._cellsOf(col)[row] = value;
  }

  private _find(col: number, type: ColumnType, match: (cell: Cell) => boolean): number {
    this._verifyType(col, type);
    const index = this._cellsOf(col).findIndex((cell) => cell !== null && match(cell));
    return index === -1 ? NOT_FOUND : index;
  }

  private _verifyType(col: number, type: ColumnType): void {
    const actual = this.getColumnType(col);
    if (actual !== type) {
      throw new Error(
        `Column ${col} of table "${this.name}" holds ${actual} values, not ${type}.`,
      );
    }
  }

  private _verifyRow(row: number): void {
    this._verifyAttached();
    if (!Number.isInteger(row) || row < 0 || row >= this.size()) {
      throw new Error(`Row index ${row} out of range in table "${this.name}".`);
    }
  }

  private _verifyAttached(): void {
    if (!this._attached) {
      throw new Error(`Table "${this.name}" is detached.`);
    }
  }

  private _nullRead(col: number, row: number): Error {
    return new Error(`Row ${row} of column ${col} in table "${this.name}" is null.`);
  }
}

function isTimestampCell(cell: Cell): cell is Timestamp {
  return (
    typeof cell === "object" &&
    cell !== null &&
    !(cell instanceof Uint8Array) &&
    typeof cell.seconds === "bigint"
  );
}

/**
 * In-process storage layer.
 * Write transactions snapshot every table so `rollbackWrite()` restores rows.
 */
export class MemoryLayer implements StorageLayer {
  public readonly type: "memory" = "memory";
  public readonly identifier: string;
  private _tables: Map<string, MemoryTable> = new Map();
  private _snapshot?: Map<string, { columns: readonly ColumnSpec[]; cells: Cell[][] }>;
  private _closed = false;

  constructor(identifier = "memory") {
    this.identifier = identifier;
  }

  openTable(name: string, columns: readonly ColumnSpec[]): MemoryTable {
    this._verifyOpen();
    const existing = this._tables.get(name);
    if (existing) {
      return existing;
    }
    const table = new MemoryTable(
      name,
      columns.map((column) => ({ ...column })),
      columns.map(() => []),
    );
    this._tables.set(name, table);
    return table;
  }

  hasTable(name: string): boolean {
    return this._tables.has(name);
  }

  dropTable(name: string): void {
    this._verifyOpen();
    const table = this._tables.get(name);
    if (!table) return;
    table.detach();
    this._tables.delete(name);
  }

  beginWrite(): void {
    this._verifyOpen();
    if (this._snapshot) {
      throw new Error("A write transaction is already open on this memory layer.");
    }
    this._snapshot = new Map();
    for (const [name, table] of this._tables) {
      this._snapshot.set(name, {
        columns: table._columns,
        cells: table._cells.map((cells) => [...cells]),
      });
    }
  }

  commitWrite(): void {
    if (!this._snapshot) {
      throw new Error("No write transaction is open on this memory layer.");
    }
    this._snapshot = undefined;
  }

  rollbackWrite(): void {
    const snapshot = this._snapshot;
    if (!snapshot) {
      throw new Error("No write transaction is open on this memory layer.");
    }
    this._snapshot = undefined;
    for (const [name, table] of this._tables) {
      const saved = snapshot.get(name);
      if (saved) {
        table._cells = saved.cells;
      } else {
        table.detach();
        this._tables.delete(name);
      }
    }
    // Tables dropped during the write come back under fresh handles.
    for (const [name, saved] of snapshot) {
      if (!this._tables.has(name)) {
        this._tables.set(name, new MemoryTable(name, saved.columns, saved.cells));
      }
    }
  }

  close(): void {
    for (const table of this._tables.values()) {
      table.detach();
    }
    this._tables.clear();
    this._snapshot = undefined;
    this._closed = true;
  }

  private _verifyOpen(): void {
    if (this._closed) {
      throw new Error(`Memory layer "${this.identifier}" is closed.`);
    }
  }
}
