import { Result } from "@fkws/klonk-result";
import { AccessorContext } from "./core/accessor";
import { IndexSet } from "./core/indexSet";
import { NOT_FOUND } from "./core/columnType";
import { allObjects, ResultsView } from "./core/results";
import { ObjectSchema, type ObjectSchemaInput } from "./core/schema";
import { Session, type SessionOptions } from "./core/session";
import { layers } from "./sources";
import type { StorageLayer } from "./sources/tableHandle";
import type { ObjectHandle } from "./core/objectTable";

type SessionInit = SessionOptions & {
  /** Object classes the session can create and resolve. */
  schemas?: readonly (ObjectSchema | ObjectSchemaInput)[];
};

function toSchema(entry: ObjectSchema | ObjectSchemaInput): Result<ObjectSchema> {
  if (entry instanceof ObjectSchema) {
    return new Result({ success: true, data: entry });
  }
  return ObjectSchema.create(entry);
}

/**
 * Open a session over `layer`.
 * Returns a Result with the first schema error (bad definition, duplicate class,
 * or a link/list pointing at an unknown class).
 */
function session(layer: StorageLayer, init: SessionInit = {}): Result<Session> {
  const schemas: ObjectSchema[] = [];
  for (const entry of init.schemas ?? []) {
    const resolved = toSchema(entry);
    if (resolved.isErr()) {
      return new Result({ success: false, error: resolved.error });
    }
    schemas.push(resolved.unwrap());
  }
  const names = new Set<string>();
  for (const schema of schemas) {
    if (names.has(schema.name)) {
      return new Result({
        success: false,
        error: new Error(`Class '${schema.name}' is declared twice.`),
      });
    }
    names.add(schema.name);
  }
  for (const schema of schemas) {
    for (const property of schema.properties) {
      if (property.type === "object" && !names.has(property.objectType)) {
        return new Result({
          success: false,
          error: new Error(
            `Property '${schema.name}.${property.name}' links to unknown class '${property.objectType}'.`,
          ),
        });
      }
    }
  }
  return new Result({
    success: true,
    data: new Session(layer, schemas, { traceChanges: init.traceChanges }),
  });
}

/** Create `className` objects from a value set (or upsert with `allowUpdate`). */
function create(
  target: Session,
  className: string,
  value: unknown,
  allowUpdate = false,
): ObjectHandle {
  const objects = target.objects(className);
  return new AccessorContext(target, objects.schema, true).createObject(value, allowUpdate);
}

/** Live view of every `className` object. */
function objects(target: Session, className: string): ResultsView {
  return new ResultsView(allObjects(target.objects(className)));
}

/**
 * tabula entrypoint.
 * Next: pick a layer from `tabula.layers`, open `tabula.session(...)`, then work inside `session.write(...)`.
 */
const tabula = {
  layers: layers,
  schema: (input: ObjectSchemaInput): Result<ObjectSchema> => ObjectSchema.create(input),
  session: session,
  create: create,
  objects: objects,
  indexes: {
    of: (...indexes: number[]): IndexSet => IndexSet.of(...indexes),
    range: (start: number, length: number): IndexSet => IndexSet.range(start, length),
  },
  NOT_FOUND: NOT_FOUND,
};

export { tabula };
