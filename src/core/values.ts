import type { Timestamp } from "./columnType";
import { TypeMismatchError, UnsupportedTypeError } from "./errors";

const INT64_MIN = -(2n ** 63n);
const INT64_MAX = 2n ** 63n - 1n;
const NANOS_PER_MILLI = 1_000_000;

/** Caller-facing value for every supported column type. */
export type CallerValue =
  | number
  | bigint
  | boolean
  | string
  | Uint8Array
  | Date
  | null;

/** Convert a caller value to a 64-bit integer. Accepts integral numbers and bigints. */
export function toInt(value: unknown, property: string): bigint {
  if (typeof value === "bigint") {
    if (value < INT64_MIN || value > INT64_MAX) {
      throw new TypeMismatchError(property, "a 64-bit integer", value);
    }
    return value;
  }
  if (typeof value === "number" && Number.isSafeInteger(value)) {
    return BigInt(value);
  }
  throw new TypeMismatchError(property, "an integer", value);
}

/** Integers that fit a safe JS number come back as numbers. */
export function fromInt(value: bigint): number | bigint {
  if (
    value >= BigInt(Number.MIN_SAFE_INTEGER) &&
    value <= BigInt(Number.MAX_SAFE_INTEGER)
  ) {
    return Number(value);
  }
  return value;
}

export function toBool(value: unknown, property: string): boolean {
  if (typeof value === "boolean") return value;
  throw new TypeMismatchError(property, "a boolean", value);
}

export function fromBool(value: boolean): boolean {
  return value;
}

/** Rounds to the nearest float32. */
export function toFloat(value: unknown, property: string): number {
  if (typeof value === "number") return Math.fround(value);
  throw new TypeMismatchError(property, "a float", value);
}

export function fromFloat(value: number): number {
  return Math.fround(value);
}

export function toDouble(value: unknown, property: string): number {
  if (typeof value === "number") return value;
  throw new TypeMismatchError(property, "a double", value);
}

export function fromDouble(value: number): number {
  return value;
}

export function toString(value: unknown, property: string): string {
  if (typeof value === "string") return value;
  throw new TypeMismatchError(property, "a string", value);
}

export function fromString(value: string): string {
  return value;
}

/** Copies the bytes so later caller mutations never reach storage. */
export function toBinary(value: unknown, property: string): Uint8Array {
  if (value instanceof Uint8Array) return Uint8Array.from(value);
  if (value instanceof ArrayBuffer) return new Uint8Array(value.slice(0));
  throw new TypeMismatchError(property, "binary data", value);
}

export function fromBinary(value: Uint8Array): Uint8Array {
  return Uint8Array.from(value);
}

export function toTimestamp(value: unknown, property: string): Timestamp {
  if (!(value instanceof Date) || Number.isNaN(value.getTime())) {
    throw new TypeMismatchError(property, "a valid Date", value);
  }
  const ms = value.getTime();
  const seconds = Math.floor(ms / 1000);
  return {
    seconds: BigInt(seconds),
    nanoseconds: (ms - seconds * 1000) * NANOS_PER_MILLI,
  };
}

/** Sub-millisecond precision is truncated: `Date` cannot carry it. */
export function fromTimestamp(value: Timestamp): Date {
  return new Date(
    Number(value.seconds) * 1000 +
      Math.floor(value.nanoseconds / NANOS_PER_MILLI),
  );
}

export function toMixed(_value: unknown, property: string): never {
  throw new UnsupportedTypeError(
    "mixed",
    `Property '${property}' uses the untyped 'mixed' kind, which is unsupported.`,
  );
}

export function isNull(value: unknown): value is null {
  return value === null;
}

export function nullValue(): null {
  return null;
}

export function timestampsEqual(a: Timestamp, b: Timestamp): boolean {
  return a.seconds === b.seconds && a.nanoseconds === b.nanoseconds;
}

export function bytesEqual(a: Uint8Array, b: Uint8Array): boolean {
  if (a.byteLength !== b.byteLength) return false;
  for (let i = 0; i < a.byteLength; i++) {
    if (a[i] !== b[i]) return false;
  }
  return true;
}
