/** Machine-readable error codes carried by every `TabulaError`. */
export type TabulaErrorCode =
  | "out_of_range"
  | "invalidated"
  | "type_mismatch"
  | "unsupported_type"
  | "unsupported_operation"
  | "internal_inconsistency"
  | "write_transaction"
  | "storage";

/**
 * Base class for errors raised by list proxies, the dispatcher and accessor contexts.
 * Storage engine failures never escape raw; they surface as `StorageError`.
 */
export class TabulaError extends Error {
  readonly code: TabulaErrorCode;

  constructor(code: TabulaErrorCode, message: string, options?: ErrorOptions) {
    super(message, options);
    this.code = code;
    this.name = "TabulaError";
  }
}

/** An index fell outside `[0, count)` (reads, removals) or `[0, count]` (inserts). */
export class OutOfRangeError extends TabulaError {
  constructor(index: number, count: number, upperInclusive = false, message?: string) {
    const bound = upperInclusive ? `[0, ${count}]` : `[0, ${count})`;
    super("out_of_range", message ?? `Index ${index} is out of bounds ${bound}.`);
    this.name = "OutOfRangeError";
  }
}

/** The backing table was detached (owner deleted or session closed). */
export class InvalidatedStateError extends TabulaError {
  constructor(what = "List") {
    super(
      "invalidated",
      `${what} has been invalidated: its backing table is no longer attached.`,
    );
    this.name = "InvalidatedStateError";
  }
}

/** A value cannot be converted to the column's storage primitive. */
export class TypeMismatchError extends TabulaError {
  readonly property: string;
  readonly expected: string;

  constructor(property: string, expected: string, received: unknown) {
    super(
      "type_mismatch",
      `Invalid value ${describeValue(received)} for property '${property}': expected ${expected}.`,
    );
    this.property = property;
    this.expected = expected;
    this.name = "TypeMismatchError";
  }
}

/** The requested storage kind is outside what single-column tables hold. */
export class UnsupportedTypeError extends TabulaError {
  constructor(type: string, detail?: string) {
    super(
      "unsupported_type",
      detail ?? `'${type}' columns are not supported here.`,
    );
    this.name = "UnsupportedTypeError";
  }
}

/** The caller asked for an operation the list model does not define. */
export class UnsupportedOperationError extends TabulaError {
  constructor(message: string) {
    super("unsupported_operation", message);
    this.name = "UnsupportedOperationError";
  }
}

/** A column type outside the known set reached a dispatch arm. Always a caller defect. */
export class InternalInconsistencyError extends TabulaError {
  constructor(message: string) {
    super("internal_inconsistency", message);
    this.name = "InternalInconsistencyError";
  }
}

/** A mutation ran outside a write transaction. */
export class WriteTransactionError extends TabulaError {
  constructor() {
    super(
      "write_transaction",
      "Cannot modify persisted data outside of a write transaction. Wrap the change in session.write(...).",
    );
    this.name = "WriteTransactionError";
  }
}

/** Translated storage engine failure; the original error is kept as `cause`. */
export class StorageError extends TabulaError {
  constructor(cause: unknown) {
    super(
      "storage",
      cause instanceof Error ? cause.message : String(cause),
      { cause },
    );
    this.name = "StorageError";
  }
}

/** Map any thrown value onto the error taxonomy. */
export function translateError(error: unknown): TabulaError {
  if (error instanceof TabulaError) {
    return error;
  }
  return new StorageError(error);
}

/**
 * Run `fn`, re-throwing engine failures as `StorageError`.
 * Errors from the taxonomy pass through unchanged.
 */
export function translateErrors<T>(fn: () => T): T {
  try {
    return fn();
  } catch (error) {
    throw translateError(error);
  }
}

/** Exhaustiveness guard for switches over closed unions. */
export function assertNever(value: never, what: string): never {
  throw new InternalInconsistencyError(
    `Unknown ${what} '${String(value)}' reached an exhaustive switch.`,
  );
}

function describeValue(value: unknown): string {
  if (value === null) return "null";
  if (value === undefined) return "undefined";
  if (typeof value === "string") return JSON.stringify(value);
  if (typeof value === "bigint") return `${value}n`;
  if (typeof value === "number" || typeof value === "boolean") {
    return String(value);
  }
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? "Date(Invalid)" : `Date(${value.toISOString()})`;
  }
  if (typeof value === "object") {
    const proto: unknown = Object.getPrototypeOf(value);
    const name =
      proto && typeof proto === "object" && typeof proto.constructor === "function"
        ? proto.constructor.name
        : "Object";
    return `<${name}>`;
  }
  return `<${typeof value}>`;
}
