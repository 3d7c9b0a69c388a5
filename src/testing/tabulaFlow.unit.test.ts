import type { Result } from "@fkws/klonk-result";
import { describe, expect, test } from "vitest";
import { InvalidatedStateError, StorageError, TypeMismatchError } from "../core/errors";
import type { PersistedList } from "../core/list";
import type { Session } from "../core/session";
import { tabula } from "../tabula";
import { layerDefs } from "./layerDefs";
import { personSchema } from "./schemas";

function errorOf<T>(res: Result<T>): string | undefined {
    if (!res.isErr()) return undefined;
    const error: unknown = res.error;
    return error instanceof Error ? error.message : String(error);
}

function record(list: PersistedList): string[] {
    const events: string[] = [];
    list.addObserver({
        willChange: (property, kind, indexes) => events.push(`will ${property} ${kind} ${indexes}`),
        didChange: (property, kind, indexes) => events.push(`did ${property} ${kind} ${indexes}`),
    });
    return events;
}

describe.each(layerDefs)("tabula flow on $name", ({ open }) => {
    function openSession(): Session {
        return tabula.session(open(), { schemas: [personSchema] }).unwrap();
    }

    test("edits an integer list end to end", () => {
        const session = openSession();
        const list = session.list("values", { type: "int" });
        session.write(() => list.extend([10, 20, 30]));
        const events = record(list);

        session.write(() => list.insert(1, 99));
        expect(list.toArray()).toEqual([10, 99, 20, 30]);
        session.write(() => list.removeAt(0));
        expect(list.toArray()).toEqual([99, 20, 30]);
        session.write(() => list.exchange(0, 2));
        expect(list.toArray()).toEqual([30, 20, 99]);
        expect(list.indexOf(20)).toBe(1);

        expect(events).toEqual([
            "will values insertion [1]",
            "did values insertion [1]",
            "will values removal [0]",
            "did values removal [0]",
            "will values replacement [0, 2]",
            "did values replacement [0, 2]",
        ]);
        session.close();
    });

    test("clears a list with a single removal", () => {
        const session = openSession();
        const list = session.list("values", { type: "int" });
        session.write(() => list.extend([1, 2, 3, 4, 5]));
        const events = record(list);
        session.write(() => list.clear());
        expect(list.count()).toBe(0);
        expect(events).toEqual([
            "will values removal [0, 1, 2, 3, 4]",
            "did values removal [0, 1, 2, 3, 4]",
        ]);
        session.close();
    });

    test("exchange is its own inverse", () => {
        const session = openSession();
        const list = session.list("values", { type: "string" });
        session.write(() => {
            list.extend(["a", "b", "c"]);
            list.exchange(0, 2);
            list.exchange(0, 2);
        });
        expect(list.toArray()).toEqual(["a", "b", "c"]);
        session.close();
    });

    test("insert at count behaves like append", () => {
        const session = openSession();
        const list = session.list("values", { type: "double" });
        session.write(() => {
            list.append(1.5);
            list.insert(list.count(), 2.5);
        });
        expect(list.toArray()).toEqual([1.5, 2.5]);
        expect(list.indexOf(3.5)).toBe(tabula.NOT_FOUND);
        session.close();
    });

    test("pairs notifications when the storage write fails", () => {
        const session = openSession();
        const list = session.list("values", { type: "int" });
        session.write(() => list.extend([1, 2]));
        const events = record(list);
        session.write(() => {
            // Dropping the table between the checks and the write makes the engine fail mid-mutation.
            list.addObserver({
                willChange: () => session.layer.dropTable("list:values"),
            });
            expect(() => list.removeAt(0)).toThrow(StorageError);
        });
        expect(events).toEqual(["will values removal [0]", "did values removal [0]"]);
        expect(() => list.get(0)).toThrow(InvalidatedStateError);
        session.close();
    });

    test("object deletion invalidates its lists", () => {
        const session = openSession();
        const ann = session.write(() =>
            tabula.create(session, "Person", { name: "Ann", scores: [3, 1] }),
        );
        const scores = ann.list("scores");
        const events = record(scores);
        session.write(() => session.objects("Person").remove(ann.row()));
        expect(scores.isInvalidated()).toBe(true);
        expect(tabula.objects(session, "Person").count()).toBe(0);
        session.write(() => {
            expect(() => scores.append(4)).toThrow(InvalidatedStateError);
        });
        expect(events).toEqual([]);
        session.close();
    });

    test("a failed create leaves no object behind", () => {
        const session = openSession();
        session.write(() => {
            expect(() => tabula.create(session, "Person", { name: "Ann", age: "old" })).toThrow(
                TypeMismatchError,
            );
        });
        expect(tabula.objects(session, "Person").count()).toBe(0);
        session.close();
    });

    test("persists objects created through the facade", () => {
        const session = openSession();
        session.write(() => {
            tabula.create(session, "Person", { name: "Ann", age: 30 });
            tabula.create(session, "Person", { name: "Bob", friend: "Ann" });
        });
        const names = tabula
            .objects(session, "Person")
            .toArray()
            .map((person) => person.get("name"));
        expect(names).toEqual(["Ann", "Bob"]);
        session.close();
    });
});

describe("tabula.session", () => {
    test("rejects duplicate classes", () => {
        const res = tabula.session(tabula.layers.memory(), {
            schemas: [personSchema, personSchema],
        });
        expect(errorOf(res)).toBe("Class 'Person' is declared twice.");
    });

    test("rejects links to unknown classes", () => {
        const res = tabula.session(tabula.layers.memory(), {
            schemas: [
                {
                    name: "Dog",
                    properties: [{ name: "owner", type: "object", objectType: "Owner" }],
                },
            ],
        });
        expect(errorOf(res)).toBe("Property 'Dog.owner' links to unknown class 'Owner'.");
    });

    test("validates raw schema definitions", () => {
        const res = tabula.session(tabula.layers.memory(), {
            schemas: [{ name: "dog", properties: [] }],
        });
        expect(errorOf(res)).toBe(
            "'dog' is not allowed as class name. Adhere to this pattern: [A-Z][A-Za-z0-9_]*",
        );
    });

    test("builds index sets", () => {
        expect(tabula.indexes.of(2, 0).toArray()).toEqual([0, 2]);
        expect(tabula.indexes.range(1, 2).toArray()).toEqual([1, 2]);
    });
});
