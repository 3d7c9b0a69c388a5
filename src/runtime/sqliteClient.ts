import { createRequire } from "node:module";

const runtimeRequire = createRequire(import.meta.url);

type SqliteParamInput = unknown[] | Record<string, unknown> | undefined;

/**
 * Prepared statement wrapper.
 * Integers are always read back as `bigint` so 64-bit values survive.
 */
export interface SqliteStatement {
  /** Execute a write statement. */
  run(...params: unknown[]): unknown;
  /** Read one row. */
  get(...params: unknown[]): Record<string, unknown> | undefined;
  /** Read all rows. */
  all(...params: unknown[]): Record<string, unknown>[];
}

/**
 * SQLite client used by `SqliteLayer`.
 * Next: create with `createSqliteClient(...)`.
 */
export interface SqliteClient {
  /** Execute a non-prepared SQL statement. */
  run(sql: string, params?: SqliteParamInput): unknown;
  /** Build a prepared statement wrapper. */
  prepare(sql: string): SqliteStatement;
  /** Close the underlying database handle. */
  close(): void;
}

type BetterSqliteStatementLike = {
  run: (...params: unknown[]) => unknown;
  get: (...params: unknown[]) => unknown;
  all: (...params: unknown[]) => unknown;
  safeIntegers: (toggle?: boolean) => BetterSqliteStatementLike;
};

type BetterSqliteDatabaseLike = {
  prepare: (sql: string) => BetterSqliteStatementLike;
  close: () => void;
};

type BetterSqliteCtor = new (path: string) => BetterSqliteDatabaseLike;

function normalizeParams(args: unknown[]): unknown[] {
  if (args.length === 1 && Array.isArray(args[0])) {
    return args[0];
  }
  return args;
}

function isRow(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function adaptStatement(statement: BetterSqliteStatementLike): SqliteStatement {
  const reader = statement.safeIntegers(true);
  return {
    run(...params: unknown[]): unknown {
      return statement.run(...normalizeParams(params));
    },
    get(...params: unknown[]): Record<string, unknown> | undefined {
      const row = reader.get(...normalizeParams(params));
      return isRow(row) ? row : undefined;
    },
    all(...params: unknown[]): Record<string, unknown>[] {
      const rows = reader.all(...normalizeParams(params));
      return Array.isArray(rows) ? rows.filter(isRow) : [];
    },
  };
}

function isBetterSqliteCtor(value: unknown): value is BetterSqliteCtor {
  return typeof value === "function";
}

function loadBetterSqliteCtor(): BetterSqliteCtor {
  const loaded: unknown = runtimeRequire("better-sqlite3");
  if (isBetterSqliteCtor(loaded)) {
    return loaded;
  }
  const fallback =
    typeof loaded === "object" && loaded !== null && "default" in loaded
      ? loaded.default
      : undefined;
  if (!isBetterSqliteCtor(fallback)) {
    throw new Error(
      'Failed to load "better-sqlite3". Install it to use the SQLite layer.',
    );
  }
  return fallback;
}

/**
 * Open a SQLite database at `path` (use `:memory:` for a private in-memory database).
 * Next: pass into `SqliteLayer`.
 */
export function createSqliteClient(path: string): SqliteClient {
  const DatabaseCtor = loadBetterSqliteCtor();
  const db = new DatabaseCtor(path);
  return {
    run(sql: string, params?: SqliteParamInput): unknown {
      const statement = db.prepare(sql);
      if (params === undefined) {
        return statement.run();
      }
      if (Array.isArray(params)) {
        return statement.run(...params);
      }
      return statement.run(params);
    },
    prepare(sql: string): SqliteStatement {
      return adaptStatement(db.prepare(sql));
    },
    close(): void {
      db.close();
    },
  };
}
