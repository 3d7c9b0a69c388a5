import { describe, expect, test } from "vitest";
import { TypeMismatchError, UnsupportedTypeError } from "./errors";
import {
    bytesEqual,
    fromInt,
    fromTimestamp,
    toBinary,
    toBool,
    toDouble,
    toFloat,
    toInt,
    toMixed,
    toString,
    toTimestamp,
} from "./values";

describe("values", () => {
    test("converts integral numbers and bigints to int64", () => {
        expect(toInt(42, "n")).toBe(42n);
        expect(toInt(-7n, "n")).toBe(-7n);
        expect(toInt(2n ** 63n - 1n, "n")).toBe(9223372036854775807n);
    });

    test("rejects fractional, unsafe and out-of-range integers", () => {
        expect(() => toInt(1.5, "n")).toThrow(TypeMismatchError);
        expect(() => toInt(2 ** 60, "n")).toThrow(TypeMismatchError);
        expect(() => toInt(2n ** 63n, "n")).toThrow(TypeMismatchError);
        expect(() => toInt("1", "n")).toThrow(TypeMismatchError);
    });

    test("reads safe integers back as numbers and large ones as bigints", () => {
        expect(fromInt(12n)).toBe(12);
        expect(fromInt(2n ** 60n)).toBe(1152921504606846976n);
    });

    test("names the property and the expected kind in mismatches", () => {
        try {
            toBool(1, "flags");
            throw new Error("expected a mismatch");
        } catch (error) {
            expect(error).toBeInstanceOf(TypeMismatchError);
            if (error instanceof TypeMismatchError) {
                expect(error.property).toBe("flags");
                expect(error.expected).toBe("a boolean");
                expect(error.code).toBe("type_mismatch");
                expect(error.message).toBe(
                    "Invalid value 1 for property 'flags': expected a boolean.",
                );
            }
        }
    });

    test("rounds floats to float32 and keeps doubles", () => {
        expect(toFloat(0.1, "f")).toBe(Math.fround(0.1));
        expect(toDouble(0.1, "d")).toBe(0.1);
        expect(() => toDouble("0.1", "d")).toThrow(TypeMismatchError);
    });

    test("accepts strings only as strings", () => {
        expect(toString("", "s")).toBe("");
        expect(() => toString(5, "s")).toThrow(TypeMismatchError);
    });

    test("copies binary input", () => {
        const source = new Uint8Array([1, 2, 3]);
        const stored = toBinary(source, "b");
        source[0] = 9;
        expect(Array.from(stored)).toEqual([1, 2, 3]);
        expect(Array.from(toBinary(new Uint8Array([4]).buffer, "b"))).toEqual([4]);
        expect(bytesEqual(new Uint8Array([1, 2]), new Uint8Array([1, 2]))).toBe(true);
        expect(bytesEqual(new Uint8Array([1, 2]), new Uint8Array([1]))).toBe(false);
    });

    test("splits dates into seconds and nanoseconds", () => {
        const ts = toTimestamp(new Date(1_500), "t");
        expect(ts).toEqual({ seconds: 1n, nanoseconds: 500_000_000 });
        expect(fromTimestamp(ts).getTime()).toBe(1_500);
    });

    test("keeps pre-epoch nanoseconds non-negative", () => {
        const ts = toTimestamp(new Date(-1), "t");
        expect(ts).toEqual({ seconds: -1n, nanoseconds: 999_000_000 });
        expect(fromTimestamp(ts).getTime()).toBe(-1);
    });

    test("rejects invalid dates", () => {
        expect(() => toTimestamp(new Date(Number.NaN), "t")).toThrow(
            "Invalid value Date(Invalid) for property 't': expected a valid Date.",
        );
    });

    test("never converts mixed values", () => {
        expect(() => toMixed(1, "m")).toThrow(UnsupportedTypeError);
    });
});
