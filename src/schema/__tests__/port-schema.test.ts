/**
 * Port Schema Engine Tests
 *
 * Covers construction invariants, compatibility, value validation,
 * path resolution and coercion.
 */

import { describe, it, expect } from "vitest";
import {
  PortPathError,
  PortSchemaError,
  arraySchema,
  booleanSchema,
  createPortSchema,
  dateSchema,
  describeSchema,
  floatSchema,
  getSchemaByPath,
  intSchema,
  isCompatible,
  isValidValue,
  mapToSchema,
  objectSchema,
  serializePortSchema,
  stringSchema,
} from "../port-schema";
import type { PortSchema } from "../types";

// ============================================================================
// Fixtures
// ============================================================================

const primitives: Array<[string, PortSchema]> = [
  ["STRING", stringSchema()],
  ["INT", intSchema()],
  ["FLOAT", floatSchema()],
  ["BOOLEAN", booleanSchema()],
  ["DATE", dateSchema()],
];

const address = objectSchema({
  street: stringSchema(),
  zip: stringSchema({ required: true }),
});

const user = objectSchema({
  name: stringSchema({ required: true }),
  age: intSchema(),
  address,
});

// ============================================================================
// Construction
// ============================================================================

describe("createPortSchema", () => {
  it("builds a nested schema from plain data", () => {
    const schema = createPortSchema({
      type: "OBJECT",
      properties: {
        tags: { type: "ARRAY", items: { type: "STRING" } },
        score: { type: "FLOAT", required: true },
      },
    });

    expect(schema).toEqual(
      objectSchema({
        tags: arraySchema(stringSchema()),
        score: floatSchema({ required: true }),
      }),
    );
  });

  it("freezes the result", () => {
    const schema = createPortSchema({ type: "OBJECT", properties: { a: { type: "INT" } } });
    expect(Object.isFrozen(schema)).toBe(true);
    if (schema.type === "OBJECT") {
      expect(Object.isFrozen(schema.properties)).toBe(true);
    }
  });

  it("rejects ARRAY without items", () => {
    expect(() => createPortSchema({ type: "ARRAY" })).toThrow(
      "ARRAY schema at 'schema' requires 'items'",
    );
  });

  it("rejects items on a non-ARRAY schema", () => {
    expect(() =>
      createPortSchema({ type: "STRING", items: { type: "STRING" } }),
    ).toThrow("'items' is only allowed on ARRAY schemas, found on STRING at 'schema'");
  });

  it("rejects properties on a non-OBJECT schema", () => {
    expect(() => createPortSchema({ type: "INT", properties: {} })).toThrow(PortSchemaError);
  });

  it("rejects OBJECT without properties", () => {
    expect(() => createPortSchema({ type: "OBJECT" })).toThrow(
      "OBJECT schema at 'schema' requires 'properties' (use {} for an open object)",
    );
  });

  it("reports the path of a nested violation", () => {
    try {
      createPortSchema({
        type: "OBJECT",
        properties: { list: { type: "ARRAY" } },
      });
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(PortSchemaError);
      if (error instanceof PortSchemaError) {
        expect(error.path).toBe("schema.properties.list");
      }
    }
  });

  it("rejects unknown types and dotted property names", () => {
    expect(() => createPortSchema({ type: "TEXT" })).toThrow("Unknown port type 'TEXT'");
    expect(() =>
      createPortSchema({ type: "OBJECT", properties: { "a.b": { type: "STRING" } } }),
    ).toThrow("Invalid property name 'a.b'");
  });
});

describe("serializePortSchema", () => {
  it("omits absent fields and false required flags", () => {
    expect(serializePortSchema(arraySchema(intSchema({ required: true })))).toEqual({
      type: "ARRAY",
      items: { type: "INT", required: true },
    });
    expect(serializePortSchema(objectSchema())).toEqual({ type: "OBJECT", properties: {} });
  });

  it("round-trips through createPortSchema", () => {
    expect(createPortSchema(serializePortSchema(user))).toEqual(user);
  });
});

describe("describeSchema", () => {
  it("renders nested types", () => {
    expect(describeSchema(arraySchema(stringSchema()))).toBe("ARRAY<STRING>");
    expect(describeSchema(objectSchema())).toBe("OBJECT{*}");
    expect(describeSchema(user)).toBe("OBJECT{name, age, address}");
  });
});

// ============================================================================
// Compatibility
// ============================================================================

describe("isCompatible", () => {
  it("is reflexive", () => {
    for (const [, schema] of primitives) {
      expect(isCompatible(schema, schema)).toBe(true);
    }
    expect(isCompatible(user, user)).toBe(true);
    expect(isCompatible(arraySchema(address), arraySchema(address))).toBe(true);
  });

  it("widens only between INT and FLOAT", () => {
    for (const [sourceName, source] of primitives) {
      for (const [targetName, target] of primitives) {
        const numeric =
          (sourceName === "INT" || sourceName === "FLOAT") &&
          (targetName === "INT" || targetName === "FLOAT");
        expect(isCompatible(source, target)).toBe(sourceName === targetName || numeric);
      }
    }
  });

  it("ignores the required flag", () => {
    expect(isCompatible(stringSchema(), stringSchema({ required: true }))).toBe(true);
  });

  it("compares array items recursively", () => {
    expect(isCompatible(arraySchema(intSchema()), arraySchema(floatSchema()))).toBe(true);
    expect(isCompatible(arraySchema(stringSchema()), arraySchema(intSchema()))).toBe(false);
    expect(isCompatible(arraySchema(stringSchema()), stringSchema())).toBe(false);
    expect(isCompatible(stringSchema(), arraySchema(stringSchema()))).toBe(false);
  });

  it("lets an open target accept any object", () => {
    expect(isCompatible(user, objectSchema())).toBe(true);
    expect(isCompatible(objectSchema(), objectSchema())).toBe(true);
  });

  it("never lets an open source satisfy declared properties", () => {
    expect(isCompatible(objectSchema(), address)).toBe(false);
  });

  it("applies width subtyping", () => {
    const narrow = objectSchema({ name: stringSchema() });
    expect(isCompatible(user, narrow)).toBe(true);
    expect(isCompatible(narrow, user)).toBe(false);
  });

  it("checks nested property compatibility", () => {
    const target = objectSchema({ address: objectSchema({ zip: intSchema() }) });
    expect(isCompatible(user, target)).toBe(false);
  });

  it("rejects null arguments and object/primitive pairs", () => {
    expect(isCompatible(null, stringSchema())).toBe(false);
    expect(isCompatible(stringSchema(), undefined)).toBe(false);
    expect(isCompatible(objectSchema(), stringSchema())).toBe(false);
  });
});

// ============================================================================
// Value Validation
// ============================================================================

describe("isValidValue", () => {
  it("accepts empty values only when not required", () => {
    expect(isValidValue(null, stringSchema())).toBe(true);
    expect(isValidValue("", stringSchema())).toBe(true);
    expect(isValidValue(undefined, stringSchema({ required: true }))).toBe(false);
    expect(isValidValue("", stringSchema({ required: true }))).toBe(false);
  });

  it("checks primitive types exactly", () => {
    expect(isValidValue("x", stringSchema())).toBe(true);
    expect(isValidValue(1, stringSchema())).toBe(false);
    expect(isValidValue(3, intSchema())).toBe(true);
    expect(isValidValue(3.5, intSchema())).toBe(false);
    expect(isValidValue(10n, intSchema())).toBe(true);
    expect(isValidValue(3.5, floatSchema())).toBe(true);
    expect(isValidValue(Number.NaN, floatSchema())).toBe(false);
    expect(isValidValue(false, booleanSchema())).toBe(true);
    expect(isValidValue("false", booleanSchema())).toBe(false);
  });

  it("accepts valid dates and ISO strings for DATE", () => {
    expect(isValidValue(new Date("2024-05-01T10:00:00Z"), dateSchema())).toBe(true);
    expect(isValidValue("2024-05-01", dateSchema())).toBe(true);
    expect(isValidValue("2024-05-01T10:00:00Z", dateSchema())).toBe(true);
    expect(isValidValue(new Date("not a date"), dateSchema())).toBe(false);
    expect(isValidValue("yesterday", dateSchema())).toBe(false);
  });

  it("validates every array element", () => {
    expect(isValidValue([1, 2], arraySchema(intSchema()))).toBe(true);
    expect(isValidValue([1, "2"], arraySchema(intSchema()))).toBe(false);
    expect(isValidValue("1", arraySchema(intSchema()))).toBe(false);
  });

  it("tolerates undeclared properties", () => {
    expect(isValidValue({ name: "Ada", extra: true }, user)).toBe(true);
  });

  it("fails when a required property is missing or invalid", () => {
    expect(isValidValue({ age: 3 }, user)).toBe(false);
    expect(isValidValue({ name: "Ada", address: { street: "Main" } }, user)).toBe(false);
    expect(isValidValue({ name: "Ada", age: "3" }, user)).toBe(false);
  });
});

// ============================================================================
// Path Resolution
// ============================================================================

describe("getSchemaByPath", () => {
  it("returns the schema itself for the empty path", () => {
    expect(getSchemaByPath(user, "")).toBe(user);
  });

  it("returns the identical nested sub-schema", () => {
    const nested = user.properties.address;
    expect(getSchemaByPath(user, "address")).toBe(nested);
    expect(getSchemaByPath(user, "address")).toEqual(address);
    if (nested.type === "OBJECT") {
      expect(getSchemaByPath(user, "address.zip")).toBe(nested.properties.zip);
    }
  });

  it("ignores a trailing dot", () => {
    expect(getSchemaByPath(user, "address.")).toBe(user.properties.address);
  });

  it("rejects empty inner or leading segments", () => {
    expect(() => getSchemaByPath(user, ".address")).toThrow(
      "Invalid path '.address': empty segment",
    );
    expect(() => getSchemaByPath(user, "address..zip")).toThrow(PortPathError);
  });

  it("names the missing property and the alternatives", () => {
    expect(() => getSchemaByPath(user, "address.city")).toThrow(
      "Property 'city' not found at 'address' in path 'address.city'. Available properties: street, zip",
    );
  });

  it("refuses to step into a primitive", () => {
    expect(() => getSchemaByPath(user, "name.first")).toThrow(
      "Cannot resolve 'first' in path 'name.first': 'name' is STRING, not OBJECT",
    );
  });

  it("refuses to step into an open object", () => {
    expect(() => getSchemaByPath(objectSchema(), "anything")).toThrow(
      "Cannot resolve 'anything' in path 'anything': the root declares no properties",
    );
  });
});

// ============================================================================
// Coercion
// ============================================================================

describe("mapToSchema", () => {
  it("converts to strings", () => {
    expect(mapToSchema(42, stringSchema())).toBe("42");
    expect(mapToSchema({ a: 1 }, stringSchema())).toBe('{"a":1}');
    expect(mapToSchema(new Date("2024-05-01T00:00:00.000Z"), stringSchema())).toBe(
      "2024-05-01T00:00:00.000Z",
    );
  });

  it("parses numbers and yields null on failure", () => {
    expect(mapToSchema("12", intSchema())).toBe(12);
    expect(mapToSchema(12.9, intSchema())).toBe(12);
    expect(mapToSchema("12.5", intSchema())).toBeNull();
    expect(mapToSchema("12.5", floatSchema())).toBe(12.5);
    expect(mapToSchema("abc", floatSchema())).toBeNull();
  });

  it("keeps integers beyond the safe range exact", () => {
    expect(mapToSchema(2n ** 60n + 1n, intSchema())).toBe(1152921504606846977n);
    expect(mapToSchema("1152921504606846977", intSchema())).toBe(1152921504606846977n);
    expect(mapToSchema("-9007199254740991", intSchema())).toBe(-9007199254740991);
  });

  it("renders bigints inside objects as digits", () => {
    expect(mapToSchema({ id: 7n }, stringSchema())).toBe('{"id":"7"}');
  });

  it("parses booleans from yes/true/1", () => {
    expect(mapToSchema("YES", booleanSchema())).toBe(true);
    expect(mapToSchema("1", booleanSchema())).toBe(true);
    expect(mapToSchema("no", booleanSchema())).toBe(false);
    expect(mapToSchema(0, booleanSchema())).toBe(false);
  });

  it("rebuilds arrays and wraps scalars", () => {
    expect(mapToSchema(["1", "2"], arraySchema(intSchema()))).toEqual([1, 2]);
    expect(mapToSchema("[1, 2]", arraySchema(stringSchema()))).toEqual(["1", "2"]);
    expect(mapToSchema("7", arraySchema(intSchema()))).toEqual([7]);
  });

  it("drops undeclared properties and fills absent ones with null", () => {
    expect(mapToSchema({ name: "Ada", extra: 1 }, user)).toEqual({
      name: "Ada",
      age: null,
      address: null,
    });
  });

  it("copies open objects and parses JSON text", () => {
    expect(mapToSchema('{"k":"v"}', objectSchema())).toEqual({ k: "v" });
    expect(mapToSchema("not json", objectSchema())).toBeNull();
  });

  it("is idempotent on conforming values", () => {
    const schema = objectSchema({
      name: stringSchema(),
      age: intSchema(),
      tags: arraySchema(stringSchema()),
      address,
    });
    const value = {
      name: "Ada",
      age: 36,
      tags: ["math"],
      address: { street: "Main", zip: "12345" },
    };

    const once = mapToSchema(value, schema);
    expect(once).toEqual(value);
    expect(mapToSchema(once, schema)).toEqual(once);
  });
});
