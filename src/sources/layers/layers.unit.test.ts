import { afterEach, describe, expect, test } from "vitest";
import { NOT_FOUND } from "../../core/columnType";
import { layerDefs } from "../../testing/layerDefs";
import type { StorageLayer, TableHandle } from "../tableHandle";

function ints(table: TableHandle): bigint[] {
    const out: bigint[] = [];
    for (let row = 0; row < table.size(); row++) {
        out.push(table.getInt(0, row));
    }
    return out;
}

function fill(table: TableHandle, values: bigint[]): void {
    const first = table.addEmptyRow(values.length);
    values.forEach((value, i) => table.setInt(0, first + i, value));
}

describe.each(layerDefs)("$name layer", ({ open }) => {
    let layer: StorageLayer;

    afterEach(() => {
        layer.close();
    });

    function intTable(name = "nums"): TableHandle {
        return layer.openTable(name, [{ type: "int" }]);
    }

    test("appends and inserts rows at positions", () => {
        layer = open();
        const table = intTable();
        fill(table, [10n, 20n, 30n]);
        table.insertEmptyRow(1);
        table.setInt(0, 1, 99n);
        expect(ints(table)).toEqual([10n, 99n, 20n, 30n]);
        table.insertEmptyRow(4, 2);
        expect(ints(table)).toEqual([10n, 99n, 20n, 30n, 0n, 0n]);
    });

    test("removes, swaps and clears rows", () => {
        layer = open();
        const table = intTable();
        fill(table, [1n, 2n, 3n, 4n]);
        table.remove(0);
        expect(ints(table)).toEqual([2n, 3n, 4n]);
        table.swapRows(0, 2);
        expect(ints(table)).toEqual([4n, 3n, 2n]);
        table.swapRows(1, 1);
        expect(ints(table)).toEqual([4n, 3n, 2n]);
        table.clear();
        expect(table.size()).toBe(0);
    });

    test("rejects rows outside the table", () => {
        layer = open();
        const table = intTable();
        fill(table, [1n]);
        expect(() => table.getInt(0, 1)).toThrow('Row index 1 out of range in table "nums".');
        expect(() => table.insertEmptyRow(3)).toThrow(
            'Row index 3 out of range in table "nums".',
        );
    });

    test("stores 64-bit integers exactly", () => {
        layer = open();
        const table = intTable();
        fill(table, [9223372036854775807n, -9223372036854775808n]);
        expect(ints(table)).toEqual([9223372036854775807n, -9223372036854775808n]);
        expect(table.findFirstInt(0, -9223372036854775808n)).toBe(1);
    });

    test("finds values of every primitive type", () => {
        layer = open();
        const table = layer.openTable("wide", [
            { type: "bool" },
            { type: "float" },
            { type: "double" },
            { type: "string" },
            { type: "binary" },
            { type: "timestamp" },
        ]);
        table.addEmptyRow(2);
        table.setBool(0, 1, true);
        table.setFloat(1, 1, 0.1);
        table.setDouble(2, 1, 0.1);
        table.setString(3, 1, "b");
        table.setBinary(4, 1, new Uint8Array([7, 8]));
        table.setTimestamp(5, 1, { seconds: -1n, nanoseconds: 999_000_000 });

        expect(table.findFirstBool(0, true)).toBe(1);
        expect(table.findFirstFloat(1, 0.1)).toBe(1);
        expect(table.findFirstDouble(2, 0.1)).toBe(1);
        expect(table.findFirstString(3, "b")).toBe(1);
        expect(table.findFirstString(3, "zz")).toBe(NOT_FOUND);
        expect(table.findFirstBinary(4, new Uint8Array([7, 8]))).toBe(1);
        expect(table.findFirstTimestamp(5, { seconds: -1n, nanoseconds: 999_000_000 })).toBe(1);

        expect(table.getBool(0, 0)).toBe(false);
        expect(table.getFloat(1, 1)).toBe(Math.fround(0.1));
        expect(table.getDouble(2, 1)).toBe(0.1);
        expect(Array.from(table.getBinary(4, 1))).toEqual([7, 8]);
        expect(table.getTimestamp(5, 1)).toEqual({ seconds: -1n, nanoseconds: 999_000_000 });
    });

    test("tracks nulls in nullable columns", () => {
        layer = open();
        const table = layer.openTable("opt", [{ type: "string", nullable: true }, { type: "int" }]);
        table.addEmptyRow(2);
        expect(table.isNullable(0)).toBe(true);
        expect(table.isNullable(1)).toBe(false);
        expect(table.isNull(0, 0)).toBe(true);
        table.setString(0, 0, "x");
        expect(table.findFirstNull(0)).toBe(1);
        table.setNull(0, 0);
        expect(table.findFirstNull(0)).toBe(0);
        expect(() => table.setNull(1, 0)).toThrow('Column 1 of table "opt" is not nullable.');
    });

    test("rejects accessors of the wrong type", () => {
        layer = open();
        const table = intTable();
        fill(table, [1n]);
        expect(() => table.getString(0, 0)).toThrow(
            'Column 0 of table "nums" holds int values, not string.',
        );
    });

    test("returns the same handle for an open table", () => {
        layer = open();
        expect(intTable()).toBe(intTable());
        expect(layer.hasTable("nums")).toBe(true);
        expect(layer.hasTable("other")).toBe(false);
    });

    test("detaches handles when a table is dropped", () => {
        layer = open();
        const table = intTable();
        layer.dropTable("nums");
        expect(table.isAttached()).toBe(false);
        expect(layer.hasTable("nums")).toBe(false);
        expect(() => table.size()).toThrow('Table "nums" is detached.');
    });

    test("rolls back rows and tables created during a write", () => {
        layer = open();
        const kept = intTable();
        fill(kept, [1n]);
        layer.beginWrite();
        kept.setInt(0, 0, 5n);
        fill(kept, [6n]);
        const created = intTable("fresh");
        layer.rollbackWrite();
        expect(ints(kept)).toEqual([1n]);
        expect(created.isAttached()).toBe(false);
        expect(layer.hasTable("fresh")).toBe(false);
    });

    test("restores tables dropped during a rolled-back write", () => {
        layer = open();
        fill(intTable(), [3n]);
        layer.beginWrite();
        layer.dropTable("nums");
        layer.rollbackWrite();
        expect(layer.hasTable("nums")).toBe(true);
        expect(ints(intTable())).toEqual([3n]);
    });

    test("keeps committed writes", () => {
        layer = open();
        const table = intTable();
        layer.beginWrite();
        fill(table, [4n]);
        layer.commitWrite();
        expect(ints(table)).toEqual([4n]);
    });

    test("detaches every table on close", () => {
        layer = open();
        const table = intTable();
        layer.close();
        expect(table.isAttached()).toBe(false);
        expect(() => layer.openTable("nums", [{ type: "int" }])).toThrow("is closed.");
    });
});
