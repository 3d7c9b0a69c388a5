import {
  isColumnType,
  NOT_FOUND,
  type ColumnSpec,
  type ColumnType,
  type Timestamp,
} from "../../core/columnType";
import {
  createSqliteClient,
  type SqliteClient,
  type SqliteStatement,
} from "../../runtime/sqliteClient";
import type { StorageLayer, TableHandle } from "../tableHandle";

const SQLITE_META_TABLE = "__tabula_tables__";
const SQLITE_TABLE_PREFIX = "__rows__";
const NAN_TEXT = "NaN";

function quoteIdent(name: string): string {
  return `"${name.replace(/"/g, '""')}"`;
}

function columnName(col: number): string {
  return `c${col}`;
}

/** Timestamps keep their nanoseconds in a second column beside the seconds. */
function nanosColumnName(col: number): string {
  return `c${col}_ns`;
}

function columnDefinitions(column: ColumnSpec, col: number): string {
  const def = `${columnName(col)} ${sqlTypeFor(column)}`;
  if (column.type !== "timestamp") return def;
  return `${def}, ${nanosColumnName(col)} ${sqlTypeFor(column)}`;
}

function sqlTypeFor(column: ColumnSpec): string {
  const nullable = Boolean(column.nullable);
  switch (column.type) {
    case "int":
    case "bool":
    case "timestamp":
      return nullable ? "INTEGER" : "INTEGER NOT NULL DEFAULT 0";
    case "float":
    case "double":
      return nullable ? "REAL" : "REAL NOT NULL DEFAULT 0";
    case "string":
      return nullable ? "TEXT" : "TEXT NOT NULL DEFAULT ''";
    case "binary":
      return nullable ? "BLOB" : "BLOB NOT NULL DEFAULT x''";
    case "mixed":
    case "link":
      return "INTEGER";
  }
}

function toIndex(value: unknown): number {
  if (typeof value === "bigint") return Number(value);
  if (typeof value === "number") return value;
  throw new Error(`Expected a row position from SQLite, got ${typeof value}.`);
}

function toBigInt(value: unknown): bigint {
  if (typeof value === "bigint") return value;
  if (typeof value === "number" && Number.isInteger(value)) return BigInt(value);
  throw new Error(`Expected an integer from SQLite, got ${typeof value}.`);
}

/** SQLite binds NaN as NULL, so it is stored as text in the REAL column. */
function encodeReal(value: number): number | string {
  return Number.isNaN(value) ? NAN_TEXT : value;
}

function parseColumns(raw: unknown, table: string): ColumnSpec[] {
  const parsed: unknown = typeof raw === "string" ? JSON.parse(raw) : undefined;
  if (!Array.isArray(parsed)) {
    throw new Error(`Stored column definition for "${table}" is malformed.`);
  }
  return parsed.map((entry: unknown) => {
    if (
      typeof entry !== "object" ||
      entry === null ||
      !("type" in entry) ||
      !isColumnType(entry.type)
    ) {
      throw new Error(`Stored column definition for "${table}" is malformed.`);
    }
    const nullable = "nullable" in entry && entry.nullable === true;
    return { type: entry.type, nullable };
  });
}

/**
 * Single table stored in SQLite.
 * Row order lives in an `ord` column that is renumbered on insert and remove.
 */
export class SqliteTable implements TableHandle {
  private _attached = true;
  private _statements: Map<string, SqliteStatement> = new Map();
  private readonly _safeName: string;

  constructor(
    private readonly _db: SqliteClient,
    readonly name: string,
    private readonly _columns: readonly ColumnSpec[],
  ) {
    this._safeName = quoteIdent(`${SQLITE_TABLE_PREFIX}${name}`);
  }

  /** @internal */
  detach(): void {
    this._attached = false;
    this._statements.clear();
  }

  size(): number {
    const row = this._stmt(`SELECT COUNT(*) AS n FROM ${this._safeName}`).get();
    return toIndex(row?.n);
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
    const size = this.size();
    if (index < 0 || index > size) {
      throw new Error(`Row index ${index} out of range in table "${this.name}".`);
    }
    this._shift(index, count);
    const insert = this._stmt(`INSERT INTO ${this._safeName} ("ord") VALUES (?)`);
    for (let i = 0; i < count; i++) {
      insert.run(index + i);
    }
  }

  addEmptyRow(count = 1): number {
    const first = this.size();
    this.insertEmptyRow(first, count);
    return first;
  }

  remove(index: number): void {
    this._verifyRow(index);
    this._stmt(`DELETE FROM ${this._safeName} WHERE "ord" = ?`).run(index);
    this._shift(index + 1, -1);
  }

  clear(): void {
    this._stmt(`DELETE FROM ${this._safeName}`).run();
  }

  swapRows(a: number, b: number): void {
    this._verifyRow(a);
    this._verifyRow(b);
    if (a === b) return;
    this._stmt(
      `UPDATE ${this._safeName}
       SET "ord" = CASE "ord" WHEN ? THEN ? ELSE ? END
       WHERE "ord" IN (?, ?)`,
    ).run(a, b, a, a, b);
  }

  getInt(col: number, row: number): bigint {
    return toBigInt(this._read(col, row, "int"));
  }
  setInt(col: number, row: number, value: bigint): void {
    this._write(col, row, "int", value);
  }
  findFirstInt(col: number, value: bigint): number {
    return this._find(col, "int", value);
  }

  getBool(col: number, row: number): boolean {
    return toBigInt(this._read(col, row, "bool")) !== 0n;
  }
  setBool(col: number, row: number, value: boolean): void {
    this._write(col, row, "bool", value ? 1 : 0);
  }
  findFirstBool(col: number, value: boolean): number {
    return this._find(col, "bool", value ? 1 : 0);
  }

  getFloat(col: number, row: number): number {
    return Math.fround(this._readNumber(col, row, "float"));
  }
  setFloat(col: number, row: number, value: number): void {
    this._write(col, row, "float", encodeReal(Math.fround(value)));
  }
  findFirstFloat(col: number, value: number): number {
    return this._find(col, "float", encodeReal(Math.fround(value)));
  }

  getDouble(col: number, row: number): number {
    return this._readNumber(col, row, "double");
  }
  setDouble(col: number, row: number, value: number): void {
    this._write(col, row, "double", encodeReal(value));
  }
  findFirstDouble(col: number, value: number): number {
    return this._find(col, "double", encodeReal(value));
  }

  getString(col: number, row: number): string {
    const raw = this._read(col, row, "string");
    if (typeof raw !== "string") {
      throw new Error(`Row ${row} of table "${this.name}" holds no string.`);
    }
    return raw;
  }
  setString(col: number, row: number, value: string): void {
    this._write(col, row, "string", value);
  }
  findFirstString(col: number, value: string): number {
    return this._find(col, "string", value);
  }

  getBinary(col: number, row: number): Uint8Array {
    const raw = this._read(col, row, "binary");
    if (!(raw instanceof Uint8Array)) {
      throw new Error(`Row ${row} of table "${this.name}" holds no blob.`);
    }
    return Uint8Array.from(raw);
  }
  setBinary(col: number, row: number, value: Uint8Array): void {
    this._write(col, row, "binary", Buffer.from(value));
  }
  findFirstBinary(col: number, value: Uint8Array): number {
    return this._find(col, "binary", Buffer.from(value));
  }

  getTimestamp(col: number, row: number): Timestamp {
    this._verifyType(col, "timestamp");
    this._verifyRow(row);
    const result = this._stmt(
      `SELECT ${columnName(col)} AS s, ${nanosColumnName(col)} AS ns FROM ${this._safeName} WHERE "ord" = ?`,
    ).get(row);
    if (!result || result.s === null || result.s === undefined) {
      throw new Error(`Row ${row} of column ${col} in table "${this.name}" is null.`);
    }
    return { seconds: toBigInt(result.s), nanoseconds: Number(toBigInt(result.ns)) };
  }
  setTimestamp(col: number, row: number, value: Timestamp): void {
    this._verifyType(col, "timestamp");
    this._verifyRow(row);
    this._stmt(
      `UPDATE ${this._safeName} SET ${columnName(col)} = ?, ${nanosColumnName(col)} = ? WHERE "ord" = ?`,
    ).run(value.seconds, value.nanoseconds, row);
  }
  findFirstTimestamp(col: number, value: Timestamp): number {
    this._verifyType(col, "timestamp");
    const result = this._stmt(
      `SELECT "ord" FROM ${this._safeName}
       WHERE ${columnName(col)} = ? AND ${nanosColumnName(col)} = ? ORDER BY "ord" LIMIT 1`,
    ).get(value.seconds, value.nanoseconds);
    return result ? toIndex(result.ord) : NOT_FOUND;
  }

  isNull(col: number, row: number): boolean {
    this._column(col);
    this._verifyRow(row);
    const result = this._stmt(
      `SELECT ${columnName(col)} AS v FROM ${this._safeName} WHERE "ord" = ?`,
    ).get(row);
    return result?.v === null;
  }

  setNull(col: number, row: number): void {
    if (!this.isNullable(col)) {
      throw new Error(`Column ${col} of table "${this.name}" is not nullable.`);
    }
    this._verifyRow(row);
    const nanos =
      this.getColumnType(col) === "timestamp" ? `, ${nanosColumnName(col)} = NULL` : "";
    this._stmt(
      `UPDATE ${this._safeName} SET ${columnName(col)} = NULL${nanos} WHERE "ord" = ?`,
    ).run(row);
  }

  findFirstNull(col: number): number {
    this._column(col);
    const result = this._stmt(
      `SELECT "ord" FROM ${this._safeName} WHERE ${columnName(col)} IS NULL ORDER BY "ord" LIMIT 1`,
    ).get();
    return result ? toIndex(result.ord) : NOT_FOUND;
  }

  /** Move every row at or after `from` by `delta` positions. */
  private _shift(from: number, delta: number): void {
    if (delta === 0) return;
    this._stmt(
      `UPDATE ${this._safeName} SET "ord" = "ord" + ? WHERE "ord" >= ?`,
    ).run(delta, from);
  }

  private _read(col: number, row: number, type: ColumnType): unknown {
    this._verifyType(col, type);
    this._verifyRow(row);
    const result = this._stmt(
      `SELECT ${columnName(col)} AS v FROM ${this._safeName} WHERE "ord" = ?`,
    ).get(row);
    if (!result || result.v === null || result.v === undefined) {
      throw new Error(`Row ${row} of column ${col} in table "${this.name}" is null.`);
    }
    return result.v;
  }

  private _readNumber(col: number, row: number, type: ColumnType): number {
    const raw = this._read(col, row, type);
    if (typeof raw === "number") return raw;
    if (typeof raw === "bigint") return Number(raw);
    if (raw === NAN_TEXT) return Number.NaN;
    throw new Error(`Row ${row} of table "${this.name}" holds no number.`);
  }

  private _write(col: number, row: number, type: ColumnType, value: unknown): void {
    this._verifyType(col, type);
    this._verifyRow(row);
    this._stmt(
      `UPDATE ${this._safeName} SET ${columnName(col)} = ? WHERE "ord" = ?`,
    ).run(value, row);
  }

  private _find(col: number, type: ColumnType, value: unknown): number {
    this._verifyType(col, type);
    const result = this._stmt(
      `SELECT "ord" FROM ${this._safeName} WHERE ${columnName(col)} = ? ORDER BY "ord" LIMIT 1`,
    ).get(value);
    return result ? toIndex(result.ord) : NOT_FOUND;
  }

  private _column(col: number): ColumnSpec {
    this._verifyAttached();
    const column = this._columns[col];
    if (!column) {
      throw new Error(`Table "${this.name}" has no column ${col}.`);
    }
    return column;
  }

  private _verifyType(col: number, type: ColumnType): void {
    const actual = this._column(col).type;
    if (actual !== type) {
      throw new Error(
        `Column ${col} of table "${this.name}" holds ${actual} values, not ${type}.`,
      );
    }
  }

  private _verifyRow(row: number): void {
    if (!Number.isInteger(row) || row < 0 || row >= this.size()) {
      throw new Error(`Row index ${row} out of range in table "${this.name}".`);
    }
  }

  private _verifyAttached(): void {
    if (!this._attached) {
      throw new Error(`Table "${this.name}" is detached.`);
    }
  }

  private _stmt(sql: string): SqliteStatement {
    this._verifyAttached();
    let statement = this._statements.get(sql);
    if (!statement) {
      statement = this._db.prepare(sql);
      this._statements.set(sql, statement);
    }
    return statement;
  }
}

/**
 * SQLite-backed storage layer.
 * Create via `tabula.layers.sqlite(path)`; pass `:memory:` for a throwaway database.
 */
export class SqliteLayer implements StorageLayer {
  private readonly _db: SqliteClient;
  public readonly type: "sqlite" = "sqlite";
  public readonly identifier: string;
  private _tables: Map<string, SqliteTable> = new Map();
  private _createdInWrite: Set<string> = new Set();
  private _inWrite = false;
  private _closed = false;

  /** Create a SQLite layer backed by the given file path. */
  constructor(path: string) {
    this._db = createSqliteClient(path);
    this.identifier = path;
    this._db.run(
      `CREATE TABLE IF NOT EXISTS ${quoteIdent(SQLITE_META_TABLE)} (
        "name" TEXT PRIMARY KEY,
        "columns" TEXT NOT NULL
      )`,
    );
  }

  openTable(name: string, columns: readonly ColumnSpec[]): SqliteTable {
    this._verifyOpen();
    const cached = this._tables.get(name);
    if (cached) {
      return cached;
    }
    const stored = this._db
      .prepare(`SELECT "columns" FROM ${quoteIdent(SQLITE_META_TABLE)} WHERE "name" = ?`)
      .get(name);
    let effective: ColumnSpec[];
    if (stored) {
      effective = parseColumns(stored.columns, name);
    } else {
      effective = columns.map((column) => ({
        type: column.type,
        nullable: Boolean(column.nullable),
      }));
      const defs = effective
        .map((column, col) => columnDefinitions(column, col))
        .join(", ");
      const safeName = quoteIdent(`${SQLITE_TABLE_PREFIX}${name}`);
      this._db.run(
        `CREATE TABLE ${safeName} ("ord" INTEGER NOT NULL${defs ? `, ${defs}` : ""})`,
      );
      this._db.run(
        `CREATE INDEX ${quoteIdent(`${SQLITE_TABLE_PREFIX}${name}__ord`)} ON ${safeName} ("ord")`,
      );
      this._db
        .prepare(`INSERT INTO ${quoteIdent(SQLITE_META_TABLE)} ("name", "columns") VALUES (?, ?)`)
        .run(name, JSON.stringify(effective));
      if (this._inWrite) {
        this._createdInWrite.add(name);
      }
    }
    const table = new SqliteTable(this._db, name, effective);
    this._tables.set(name, table);
    return table;
  }

  hasTable(name: string): boolean {
    this._verifyOpen();
    return Boolean(
      this._db
        .prepare(`SELECT 1 AS present FROM ${quoteIdent(SQLITE_META_TABLE)} WHERE "name" = ?`)
        .get(name),
    );
  }

  dropTable(name: string): void {
    this._verifyOpen();
    this._tables.get(name)?.detach();
    this._tables.delete(name);
    this._db.run(`DROP TABLE IF EXISTS ${quoteIdent(`${SQLITE_TABLE_PREFIX}${name}`)}`);
    this._db
      .prepare(`DELETE FROM ${quoteIdent(SQLITE_META_TABLE)} WHERE "name" = ?`)
      .run(name);
  }

  beginWrite(): void {
    this._verifyOpen();
    this._db.run("BEGIN IMMEDIATE");
    this._inWrite = true;
  }

  commitWrite(): void {
    this._db.run("COMMIT");
    this._inWrite = false;
    this._createdInWrite.clear();
  }

  rollbackWrite(): void {
    this._db.run("ROLLBACK");
    this._inWrite = false;
    for (const name of this._createdInWrite) {
      this._tables.get(name)?.detach();
      this._tables.delete(name);
    }
    this._createdInWrite.clear();
  }

  /** Detach every table handle and close the SQLite connection. */
  close(): void {
    if (this._closed) return;
    for (const table of this._tables.values()) {
      table.detach();
    }
    this._tables.clear();
    this._closed = true;
    this._db.close();
  }

  private _verifyOpen(): void {
    if (this._closed) {
      throw new Error(`SQLite layer "${this.identifier}" is closed.`);
    }
  }
}
