import type { StorageLayer } from "../sources/tableHandle";
import type { ColumnSpec } from "./columnType";
import {
  translateError,
  UnsupportedOperationError,
  WriteTransactionError,
} from "./errors";
import { PersistedList } from "./list";
import { ObjectTable } from "./objectTable";
import { ObservationRegistry } from "./observation";
import type { ObjectSchema } from "./schema";

/** Options for `new Session(...)` / `tabula.session(...)`. */
export type SessionOptions = {
  /** Log every will-change / did-change via `console.debug`. Defaults to `TABULA_TRACE_CHANGES=1`. */
  traceChanges?: boolean;
};

const STANDALONE_OWNER = "$";

/**
 * Persistence session over one storage layer.
 * Owns write transactions, object tables and the observation registry.
 * Closing the session detaches every table, which invalidates every list.
 */
export class Session {
  readonly registry: ObservationRegistry;
  private _schemas: Map<string, ObjectSchema>;
  private _objects: Map<string, ObjectTable> = new Map();
  private _inWrite = false;
  private _closed = false;

  constructor(
    readonly layer: StorageLayer,
    schemas: readonly ObjectSchema[] = [],
    options: SessionOptions = {},
  ) {
    this._schemas = new Map(schemas.map((schema) => [schema.name, schema]));
    this.registry = new ObservationRegistry(
      options.traceChanges ?? process.env.TABULA_TRACE_CHANGES === "1",
    );
  }

  get isClosed(): boolean {
    return this._closed;
  }

  isInWriteTransaction(): boolean {
    return this._inWrite;
  }

  /** @throws WriteTransactionError outside `write(...)`. */
  verifyInWrite(): void {
    if (!this._inWrite || this._closed) {
      throw new WriteTransactionError();
    }
  }

  /**
   * Run `fn` inside a write transaction.
   * Commits when `fn` returns and rolls back when it throws.
   */
  write<T>(fn: () => T): T {
    this._verifyOpen();
    if (this._inWrite) {
      throw new UnsupportedOperationError("Write transactions cannot be nested.");
    }
    try {
      this.layer.beginWrite();
    } catch (error) {
      throw translateError(error);
    }
    this._inWrite = true;
    let result: T;
    try {
      result = fn();
    } catch (error) {
      if (this._inWrite) {
        this._inWrite = false;
        this.layer.rollbackWrite();
      }
      throw error;
    }
    if (!this._inWrite) {
      throw new UnsupportedOperationError(
        "Session was closed inside write(); its changes were rolled back.",
      );
    }
    this._inWrite = false;
    try {
      this.layer.commitWrite();
    } catch (error) {
      throw translateError(error);
    }
    return result;
  }

  schema(className: string): ObjectSchema | undefined {
    return this._schemas.get(className);
  }

  /** Object table for `className`. */
  objects(className: string): ObjectTable {
    this._verifyOpen();
    let table = this._objects.get(className);
    if (!table) {
      const schema = this._schemas.get(className);
      if (!schema) {
        throw new UnsupportedOperationError(
          `Class '${className}' is not part of this session's schema.`,
        );
      }
      table = new ObjectTable(this, schema);
      this._objects.set(className, table);
    }
    return table;
  }

  /**
   * Open a list that belongs to no object.
   * Lists with the same name share one table.
   */
  list(name: string, column: ColumnSpec): PersistedList {
    this._verifyOpen();
    const table = this.layer.openTable(`list:${name}`, [column]);
    return new PersistedList(this, table, { ownerId: STANDALONE_OWNER, property: name });
  }

  /** Roll back any open write transaction, drop observers and close the layer. */
  close(): void {
    if (this._closed) return;
    if (this._inWrite) {
      console.warn(
        "[tabula] Session closed with an open write transaction; rolling back.",
      );
      this._inWrite = false;
      this.layer.rollbackWrite();
    }
    this._closed = true;
    this._objects.clear();
    this.registry.clear();
    this.layer.close();
  }

  private _verifyOpen(): void {
    if (this._closed) {
      throw new UnsupportedOperationError("Session is closed.");
    }
  }
}
