import { afterEach, beforeEach, describe, expect, test, vi } from "vitest";
import { layerDefs } from "../testing/layerDefs";
import { NOT_FOUND } from "./columnType";
import {
    InvalidatedStateError,
    OutOfRangeError,
    StorageError,
    TypeMismatchError,
    UnsupportedOperationError,
    WriteTransactionError,
} from "./errors";
import { IndexSet } from "./indexSet";
import type { PersistedList } from "./list";
import { Session } from "./session";

function observe(list: PersistedList, events: string[]): void {
    list.addObserver({
        willChange: (property, kind, indexes) => events.push(`will ${property} ${kind} ${indexes}`),
        didChange: (property, kind, indexes) => events.push(`did ${property} ${kind} ${indexes}`),
    });
}

describe.each(layerDefs)("PersistedList on $name", ({ open }) => {
    let session: Session;
    let list: PersistedList;
    let events: string[];

    beforeEach(() => {
        session = new Session(open());
        list = session.list("nums", { type: "int" });
        events = [];
    });

    afterEach(() => {
        session.close();
    });

    function seed(values: number[]): void {
        session.write(() => list.extend(values));
    }

    test("rejects mutations outside a write transaction", () => {
        expect(() => list.append(1)).toThrow(WriteTransactionError);
        expect(list.count()).toBe(0);
    });

    test("inserts, appends and reads by position", () => {
        session.write(() => {
            list.append(10);
            list.append(20);
            list.insert(1, 15);
        });
        expect(list.count()).toBe(3);
        expect(list.get(2)).toBe(20);
        expect(list.toArray()).toEqual([10, 15, 20]);
        expect([...list]).toEqual([10, 15, 20]);
    });

    test("checks bounds against the current count without notifying", () => {
        seed([1]);
        observe(list, events);
        session.write(() => {
            expect(() => list.insert(2, 5)).toThrow("Index 2 is out of bounds [0, 1].");
            expect(() => list.removeAt(1)).toThrow("Index 1 is out of bounds [0, 1).");
            expect(() => list.replaceAt(-1, 5)).toThrow(OutOfRangeError);
            expect(() => list.exchange(0, 1)).toThrow(OutOfRangeError);
        });
        expect(() => list.get(1)).toThrow(OutOfRangeError);
        expect(events).toEqual([]);
    });

    test("announces single-row changes", () => {
        seed([1, 2, 3]);
        observe(list, events);
        session.write(() => {
            list.insert(0, 0);
            list.replaceAt(3, 30);
            list.removeAt(1);
        });
        expect(events).toEqual([
            "will nums insertion [0]",
            "did nums insertion [0]",
            "will nums replacement [3]",
            "did nums replacement [3]",
            "will nums removal [1]",
            "did nums removal [1]",
        ]);
        expect(list.toArray()).toEqual([0, 2, 30]);
    });

    test("observers see the list before and after the change", () => {
        seed([1, 2]);
        const seen: number[] = [];
        list.addObserver({
            willChange: () => seen.push(list.count()),
            didChange: () => seen.push(list.count()),
        });
        session.write(() => list.append(3));
        expect(seen).toEqual([2, 3]);
    });

    test("inserts many values at their final positions", () => {
        seed([1, 2]);
        observe(list, events);
        session.write(() => list.insertMany([7, 8], IndexSet.of(3, 0)));
        expect(list.toArray()).toEqual([7, 1, 2, 8]);
        expect(events).toEqual(["will nums insertion [0, 3]", "did nums insertion [0, 3]"]);
    });

    test("rejects unreachable or mismatched insert sets", () => {
        seed([1, 2]);
        session.write(() => {
            expect(() => list.insertMany([7, 8], IndexSet.of(0, 4))).toThrow(
                "Index 4 is out of bounds [0, 3].",
            );
            expect(() => list.insertMany([7], IndexSet.of(0, 1))).toThrow(
                "Got 1 values for 2 indexes.",
            );
        });
        expect(list.toArray()).toEqual([1, 2]);
    });

    test("removes many rows in one notification", () => {
        seed([1, 2, 3, 4]);
        observe(list, events);
        session.write(() => list.removeMany(IndexSet.of(0, 2)));
        expect(list.toArray()).toEqual([2, 4]);
        expect(events).toEqual(["will nums removal [0, 2]", "did nums removal [0, 2]"]);
        session.write(() => {
            expect(() => list.removeMany(IndexSet.of(2))).toThrow(
                "Index 2 is out of bounds [0, 2).",
            );
        });
    });

    test("exchanges two rows as a replacement of both", () => {
        seed([1, 2, 3]);
        observe(list, events);
        session.write(() => list.exchange(2, 0));
        expect(list.toArray()).toEqual([3, 2, 1]);
        expect(events).toEqual([
            "will nums replacement [0, 2]",
            "did nums replacement [0, 2]",
        ]);
    });

    test("extends with one insertion over the appended range", () => {
        seed([1]);
        observe(list, events);
        session.write(() => list.extend(new Set([5, 6])));
        expect(list.toArray()).toEqual([1, 5, 6]);
        expect(events).toEqual(["will nums insertion [1, 2]", "did nums insertion [1, 2]"]);
    });

    test("sets every row as one replacement", () => {
        seed([1, 2, 3]);
        observe(list, events);
        session.write(() => list.setAllTo(7));
        expect(list.toArray()).toEqual([7, 7, 7]);
        expect(events).toEqual([
            "will nums replacement [0, 1, 2]",
            "did nums replacement [0, 1, 2]",
        ]);
    });

    test("only accepts assignment to self", () => {
        seed([1, 2]);
        session.write(() => {
            list.setValue("self", 4);
            expect(() => list.setValue("count", 4)).toThrow(UnsupportedOperationError);
        });
        expect(list.toArray()).toEqual([4, 4]);
    });

    test("finds values by equality", () => {
        seed([5, 6, 5]);
        expect(list.indexOf(5)).toBe(0);
        expect(list.indexOf(9)).toBe(NOT_FOUND);
        expect(() => list.indexOf("5")).toThrow(TypeMismatchError);
    });

    test("reports no match on an empty list", () => {
        expect(list.count()).toBe(0);
        expect(list.indexOf(1)).toBe(NOT_FOUND);
    });

    test("round-trips timestamps far from the epoch", () => {
        const dates = session.list("dates", { type: "timestamp" });
        session.write(() =>
            dates.extend([
                new Date("1600-03-01T12:00:00.250Z"),
                new Date("2300-01-01T00:00:00.000Z"),
                new Date("9999-12-31T23:59:59.999Z"),
            ]),
        );
        const read = dates.toArray().map((value) => (value instanceof Date ? value.toISOString() : value));
        expect(read).toEqual([
            "1600-03-01T12:00:00.250Z",
            "2300-01-01T00:00:00.000Z",
            "9999-12-31T23:59:59.999Z",
        ]);
        expect(dates.indexOf(new Date("2300-01-01T00:00:00.000Z"))).toBe(1);
    });

    test("stores NaN and infinities as doubles and floats", () => {
        const doubles = session.list("doubles", { type: "double" });
        const floats = session.list("floats", { type: "float" });
        session.write(() => {
            doubles.extend([1.5, Number.NaN, Number.POSITIVE_INFINITY]);
            floats.extend([Number.NaN, Number.NEGATIVE_INFINITY]);
        });
        expect(doubles.toArray()).toEqual([1.5, Number.NaN, Number.POSITIVE_INFINITY]);
        expect(doubles.indexOf(Number.NaN)).toBe(1);
        expect(floats.toArray()).toEqual([Number.NaN, Number.NEGATIVE_INFINITY]);
        expect(floats.indexOf(Number.NaN)).toBe(0);
    });

    test("removes the rows of an insertion whose write fails", () => {
        seed([1, 2]);
        observe(list, events);
        const table = session.layer.openTable("list:nums", [{ type: "int" }]);
        const setInt = vi.spyOn(table, "setInt").mockImplementation(() => {
            throw new Error("disk full");
        });
        session.write(() => {
            expect(() => list.insert(1, 5)).toThrow("disk full");
            expect(() => list.extend([7, 8])).toThrow(StorageError);
            expect(() => list.insertMany([7, 8], IndexSet.of(0, 3))).toThrow(StorageError);
            expect(list.toArray()).toEqual([1, 2]);
        });
        setInt.mockRestore();
        expect(list.toArray()).toEqual([1, 2]);
        expect(events).toEqual([
            "will nums insertion [1]",
            "did nums insertion [1]",
            "will nums insertion [2, 3]",
            "did nums insertion [2, 3]",
            "will nums insertion [0, 3]",
            "did nums insertion [0, 3]",
        ]);
    });

    test("stores nulls in nullable lists", () => {
        const tags = session.list("tags", { type: "string", nullable: true });
        session.write(() => tags.extend(["a", null]));
        expect(tags.toArray()).toEqual(["a", null]);
        expect(tags.indexOf(null)).toBe(1);
        session.write(() => {
            expect(() => list.append(null)).toThrow(
                "Invalid value null for property 'nums': expected a non-null int.",
            );
        });
    });

    test("rejects mistyped values before touching rows", () => {
        seed([1]);
        observe(list, events);
        session.write(() => {
            expect(() => list.insert(0, "one")).toThrow(
                "Invalid value \"one\" for property 'nums': expected an integer.",
            );
            expect(() => list.extend([2, 2.5])).toThrow(TypeMismatchError);
        });
        expect(list.toArray()).toEqual([1]);
        expect(events).toEqual([]);
    });

    test("rolls back with the enclosing write", () => {
        seed([1]);
        expect(() =>
            session.write(() => {
                list.append(2);
                throw new Error("abort");
            }),
        ).toThrow("abort");
        expect(list.toArray()).toEqual([1]);
    });

    test("stops delivering after the token is cancelled", () => {
        const token = list.addObserver({ didChange: () => events.push("did") });
        session.write(() => list.append(1));
        token.cancel();
        session.write(() => list.append(2));
        expect(events).toEqual(["did"]);
    });

    test("fails mutations on a detached table without notifying", () => {
        seed([1, 2]);
        observe(list, events);
        session.write(() => {
            session.layer.dropTable("list:nums");
            expect(() => list.append(3)).toThrow(InvalidatedStateError);
            expect(() => list.clear()).toThrow(
                "List has been invalidated: its backing table is no longer attached.",
            );
        });
        expect(events).toEqual([]);
    });

    test("reports empty once the session closes", () => {
        seed([1, 2]);
        session.close();
        expect(list.isInvalidated()).toBe(true);
        expect(list.count()).toBe(0);
        expect(list.toArray()).toEqual([]);
        expect(list.indexOf(1)).toBe(NOT_FOUND);
        expect(() => list.get(0)).toThrow(InvalidatedStateError);
        expect(() => list.addObserver({})).toThrow(InvalidatedStateError);
    });

    test("compares lists by backing table", () => {
        expect(list.equals(session.list("nums", { type: "int" }))).toBe(true);
        expect(list.equals(session.list("other", { type: "int" }))).toBe(false);
        expect(list.equals([])).toBe(false);
    });
});
