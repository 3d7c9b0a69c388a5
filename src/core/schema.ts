import { Result } from "@fkws/klonk-result";
import {
  isColumnType,
  isPrimitiveColumnType,
  type ColumnType,
  type PrimitiveColumnType,
} from "./columnType";

/** Property kinds an object schema can declare. */
export type PropertyType = ColumnType | "object" | "list";

/** Declared default: a value, or a factory called for every new object. */
export type DefaultValue = unknown | (() => unknown);

type PropertyBase = {
  /** Property name (pattern: [A-Za-z_][A-Za-z0-9_]*, no leading `__`). */
  name: string;
  /** Whether the property may hold `null`. */
  optional?: boolean;
  default?: DefaultValue;
};

export type ScalarPropertySchema = PropertyBase & { type: ColumnType };

/** Single-column list of primitives owned by the object. */
export type ListPropertySchema = PropertyBase & {
  type: "list";
  elementType: ColumnType;
};

/** Relationship to an object of `objectType`. Always optional. */
export type ObjectPropertySchema = PropertyBase & {
  type: "object";
  objectType: string;
};

export type PropertySchema =
  | ScalarPropertySchema
  | ListPropertySchema
  | ObjectPropertySchema;

export type ObjectSchemaInput = {
  /** Class name (pattern: [A-Z][A-Za-z0-9_]*). */
  name: string;
  primaryKey?: string;
  properties: PropertySchema[];
};

const CLASS_NAME_PATTERN = /^[A-Z][A-Za-z0-9_]*$/;
const PROPERTY_NAME_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*$/;

function validateProperty(className: string, property: PropertySchema): PropertySchema {
  if (!PROPERTY_NAME_PATTERN.test(property.name) || property.name.startsWith("__")) {
    throw new Error(
      `'${property.name}' is not allowed as property name on '${className}'. Adhere to this pattern: [A-Za-z_][A-Za-z0-9_]*`,
    );
  }
  switch (property.type) {
    case "list":
      if (!isColumnType(property.elementType)) {
        throw new Error(
          `List property '${className}.${property.name}' has unknown element type '${String(property.elementType)}'.`,
        );
      }
      return { ...property };
    case "object":
      if (!property.objectType || !CLASS_NAME_PATTERN.test(property.objectType)) {
        throw new Error(
          `Object property '${className}.${property.name}' needs a valid objectType.`,
        );
      }
      return { ...property, optional: true };
    default:
      if (!isColumnType(property.type)) {
        throw new Error(
          `Property '${className}.${property.name}' has unknown type '${String(property.type)}'.`,
        );
      }
      return { ...property };
  }
}

/**
 * Validated description of a persisted object class.
 * Build with `ObjectSchema.create(...)` or `tabula.schema(...)`.
 */
export class ObjectSchema {
  private readonly _byName: Map<string, number>;

  private constructor(
    readonly name: string,
    readonly properties: readonly PropertySchema[],
    readonly primaryKey?: string,
  ) {
    this._byName = new Map(properties.map((property, index) => [property.name, index]));
  }

  /**
   * Validate a schema definition.
   * Returns a Result with the first validation error when the definition is malformed.
   */
  static create(input: ObjectSchemaInput): Result<ObjectSchema> {
    try {
      if (!CLASS_NAME_PATTERN.test(input.name)) {
        throw new Error(
          `'${input.name}' is not allowed as class name. Adhere to this pattern: [A-Z][A-Za-z0-9_]*`,
        );
      }
      const seen = new Set<string>();
      const properties = input.properties.map((property) => {
        if (seen.has(property.name)) {
          throw new Error(`Property '${input.name}.${property.name}' is declared twice.`);
        }
        seen.add(property.name);
        return validateProperty(input.name, property);
      });
      if (input.primaryKey !== undefined) {
        const pk = properties.find((property) => property.name === input.primaryKey);
        if (!pk) {
          throw new Error(
            `Primary key '${input.primaryKey}' is not a property of '${input.name}'.`,
          );
        }
        if (pk.type !== "int" && pk.type !== "string") {
          throw new Error(
            `Primary key '${input.name}.${pk.name}' must be an int or string property.`,
          );
        }
      }
      return new Result({
        success: true,
        data: new ObjectSchema(input.name, properties, input.primaryKey),
      });
    } catch (error) {
      return new Result({
        success: false,
        error: error instanceof Error ? error : new Error(String(error)),
      });
    }
  }

  get primaryKeyProperty(): PropertySchema | undefined {
    return this.primaryKey === undefined ? undefined : this.property(this.primaryKey);
  }

  property(name: string): PropertySchema | undefined {
    const index = this._byName.get(name);
    return index === undefined ? undefined : this.properties[index];
  }

  indexOf(name: string): number {
    return this._byName.get(name) ?? -1;
  }

  /** Properties stored as columns of the object table (everything but lists). */
  columnProperties(): (ScalarPropertySchema | ObjectPropertySchema)[] {
    return this.properties.filter(
      (property): property is ScalarPropertySchema | ObjectPropertySchema =>
        property.type !== "list",
    );
  }

  /** The declared default for `name`; factories are called on every lookup. */
  defaultValue(name: string): unknown {
    const property = this.property(name);
    if (!property || !("default" in property)) {
      return undefined;
    }
    const value = property.default;
    return typeof value === "function" ? value() : value;
  }
}

export function isPrimitiveProperty(
  property: PropertySchema,
): property is ScalarPropertySchema & { type: PrimitiveColumnType } {
  return isPrimitiveColumnType(property.type);
}
