/**
 * Port Schema Engine
 *
 * Construction, structural compatibility, value validation, nested path
 * resolution and best-effort value coercion for port schemas.
 */

import { ajv } from "./ajv";
import { toJson } from "./json";
import { hasOwn, isRecord, isUnsafeSegment, joinPath, splitPath } from "./path";
import {
  PORT_TYPES,
  type ArraySchema,
  type ObjectSchema,
  type PortSchema,
  type PortSchemaDocument,
  type PortType,
  type PrimitivePortType,
  type PrimitiveSchema,
} from "./types";

// ============================================================================
// Errors
// ============================================================================

/** A schema tree violates the items/properties invariants */
export class PortSchemaError extends Error {
  constructor(
    message: string,
    readonly path: string,
  ) {
    super(message);
    this.name = "PortSchemaError";
  }
}

/** A dotted path does not resolve against a schema or port list */
export class PortPathError extends Error {
  constructor(
    message: string,
    readonly path: string,
  ) {
    super(message);
    this.name = "PortPathError";
  }
}

// ============================================================================
// Construction
// ============================================================================

export interface SchemaOptions {
  required?: boolean;
}

const PORT_TYPE_NAMES: ReadonlySet<string> = new Set(PORT_TYPES);

export function isPortType(value: string): value is PortType {
  return PORT_TYPE_NAMES.has(value);
}

function primitive(
  type: PrimitivePortType,
  options: SchemaOptions,
): PrimitiveSchema {
  return Object.freeze({ type, required: options.required ?? false });
}

export function stringSchema(options: SchemaOptions = {}): PrimitiveSchema {
  return primitive("STRING", options);
}

export function intSchema(options: SchemaOptions = {}): PrimitiveSchema {
  return primitive("INT", options);
}

export function floatSchema(options: SchemaOptions = {}): PrimitiveSchema {
  return primitive("FLOAT", options);
}

export function booleanSchema(options: SchemaOptions = {}): PrimitiveSchema {
  return primitive("BOOLEAN", options);
}

export function dateSchema(options: SchemaOptions = {}): PrimitiveSchema {
  return primitive("DATE", options);
}

export function arraySchema(
  items: PortSchema,
  options: SchemaOptions = {},
): ArraySchema {
  const schema: ArraySchema = {
    type: "ARRAY",
    items: createPortSchema(items, "items"),
    required: options.required ?? false,
  };
  return Object.freeze(schema);
}

/**
 * An empty property map builds an open object schema.
 */
export function objectSchema(
  properties: Record<string, PortSchema> = {},
  options: SchemaOptions = {},
): ObjectSchema {
  const built: Record<string, PortSchema> = {};
  for (const [key, child] of Object.entries(properties)) {
    assertPropertyName(key, "properties");
    built[key] = createPortSchema(child, `properties.${key}`);
  }
  const schema: ObjectSchema = {
    type: "OBJECT",
    properties: Object.freeze(built),
    required: options.required ?? false,
  };
  return Object.freeze(schema);
}

function assertPropertyName(key: string, path: string): void {
  if (key === "" || key.includes(".") || isUnsafeSegment(key)) {
    throw new PortSchemaError(
      `Invalid property name '${key}' at '${path}'`,
      path,
    );
  }
}

/**
 * Build an immutable schema from an untyped tree (e.g. parsed JSON).
 * Enforces: `items` iff ARRAY, `properties` iff OBJECT.
 */
export function createPortSchema(raw: unknown, path = "schema"): PortSchema {
  if (!isRecord(raw)) {
    throw new PortSchemaError(`Port schema at '${path}' must be an object`, path);
  }

  const { type, items, properties, required } = raw;

  if (typeof type !== "string" || !isPortType(type)) {
    throw new PortSchemaError(
      `Unknown port type '${String(type)}' at '${path}'. Expected one of: ${PORT_TYPES.join(", ")}`,
      path,
    );
  }
  if (required !== undefined && typeof required !== "boolean") {
    throw new PortSchemaError(`'required' must be a boolean at '${path}'`, path);
  }
  const isRequired = required === true;

  if (type !== "ARRAY" && items !== undefined && items !== null) {
    throw new PortSchemaError(
      `'items' is only allowed on ARRAY schemas, found on ${type} at '${path}'`,
      path,
    );
  }
  if (type !== "OBJECT" && properties !== undefined && properties !== null) {
    throw new PortSchemaError(
      `'properties' is only allowed on OBJECT schemas, found on ${type} at '${path}'`,
      path,
    );
  }

  if (type === "ARRAY") {
    if (items === undefined || items === null) {
      throw new PortSchemaError(`ARRAY schema at '${path}' requires 'items'`, path);
    }
    const schema: ArraySchema = {
      type,
      items: createPortSchema(items, `${path}.items`),
      required: isRequired,
    };
    return Object.freeze(schema);
  }

  if (type === "OBJECT") {
    if (!isRecord(properties)) {
      throw new PortSchemaError(
        `OBJECT schema at '${path}' requires 'properties' (use {} for an open object)`,
        path,
      );
    }
    const built: Record<string, PortSchema> = {};
    for (const [key, child] of Object.entries(properties)) {
      assertPropertyName(key, `${path}.properties`);
      built[key] = createPortSchema(child, `${path}.properties.${key}`);
    }
    const schema: ObjectSchema = {
      type,
      properties: Object.freeze(built),
      required: isRequired,
    };
    return Object.freeze(schema);
  }

  return Object.freeze({ type, required: isRequired });
}

/**
 * JSON form: `type`, plus `items`/`properties` where they apply and
 * `required` only when set.
 */
export function serializePortSchema(schema: PortSchema): PortSchemaDocument {
  const doc: PortSchemaDocument = { type: schema.type };
  if (schema.type === "ARRAY") {
    doc.items = serializePortSchema(schema.items);
  } else if (schema.type === "OBJECT") {
    doc.properties = Object.fromEntries(
      Object.entries(schema.properties).map(([key, child]) => [
        key,
        serializePortSchema(child),
      ]),
    );
  }
  if (schema.required) doc.required = true;
  return doc;
}

export function describeSchema(schema: PortSchema): string {
  switch (schema.type) {
    case "ARRAY":
      return `ARRAY<${describeSchema(schema.items)}>`;
    case "OBJECT": {
      const keys = Object.keys(schema.properties);
      return keys.length === 0 ? "OBJECT{*}" : `OBJECT{${keys.join(", ")}}`;
    }
    default:
      return schema.type;
  }
}

// ============================================================================
// Compatibility
// ============================================================================

function isNumeric(type: PortType): boolean {
  return type === "INT" || type === "FLOAT";
}

/**
 * May data shaped `source` flow into a slot typed `target`?
 *
 * Width subtyping for objects: every declared target property must exist on
 * the source with a compatible schema; extra source properties are ignored.
 * INT and FLOAT widen into each other.
 */
export function isCompatible(
  source: PortSchema | null | undefined,
  target: PortSchema | null | undefined,
): boolean {
  if (!source || !target) return false;

  if (source.type === "ARRAY" || target.type === "ARRAY") {
    if (source.type !== "ARRAY" || target.type !== "ARRAY") return false;
    return isCompatible(source.items, target.items);
  }

  if (source.type === "OBJECT" || target.type === "OBJECT") {
    if (source.type !== "OBJECT" || target.type !== "OBJECT") return false;
    const sourceProperties = source.properties;
    return Object.entries(target.properties).every(
      ([key, targetProperty]) =>
        hasOwn(sourceProperties, key) &&
        isCompatible(sourceProperties[key], targetProperty),
    );
  }

  if (source.type === target.type) return true;
  return isNumeric(source.type) && isNumeric(target.type);
}

// ============================================================================
// Value Validation
// ============================================================================

const isIsoDateString = ajv.compile<string>({
  type: "string",
  anyOf: [
    { type: "string", format: "date" },
    { type: "string", format: "date-time" },
  ],
});

export function isDateValue(value: unknown): boolean {
  if (value instanceof Date) return !Number.isNaN(value.getTime());
  return isIsoDateString(value);
}

/**
 * Null, undefined and "" are valid iff the schema is not required.
 * Undeclared object properties are tolerated.
 */
export function isValidValue(value: unknown, schema: PortSchema): boolean {
  if (value === null || value === undefined || value === "") {
    return !schema.required;
  }

  switch (schema.type) {
    case "STRING":
      return typeof value === "string";
    case "INT":
      return (
        (typeof value === "number" && Number.isInteger(value)) ||
        typeof value === "bigint"
      );
    case "FLOAT":
      return typeof value === "number" && Number.isFinite(value);
    case "BOOLEAN":
      return typeof value === "boolean";
    case "DATE":
      return isDateValue(value);
    case "ARRAY":
      return (
        Array.isArray(value) &&
        value.every((item) => isValidValue(item, schema.items))
      );
    case "OBJECT": {
      if (!isRecord(value)) return false;
      return Object.entries(schema.properties).every(([key, property]) =>
        hasOwn(value, key)
          ? isValidValue(value[key], property)
          : !property.required,
      );
    }
  }
}

// ============================================================================
// Path Resolution
// ============================================================================

/**
 * Walk `properties` one dot-segment at a time. The empty path is the schema itself.
 */
export function getSchemaByPath(schema: PortSchema, path: string): PortSchema {
  const segments = splitPath(path);
  if (segments === null) {
    throw new PortPathError(`Invalid path '${path}': empty segment`, path);
  }

  let current = schema;
  let walked = "";

  for (const segment of segments) {
    const location = walked === "" ? "the root" : `'${walked}'`;

    if (current.type !== "OBJECT") {
      throw new PortPathError(
        `Cannot resolve '${segment}' in path '${path}': ${location} is ${current.type}, not OBJECT`,
        path,
      );
    }

    const available = Object.keys(current.properties);
    if (available.length === 0) {
      throw new PortPathError(
        `Cannot resolve '${segment}' in path '${path}': ${location} declares no properties`,
        path,
      );
    }

    if (!hasOwn(current.properties, segment)) {
      throw new PortPathError(
        `Property '${segment}' not found at ${location} in path '${path}'. Available properties: ${available.join(", ")}`,
        path,
      );
    }

    current = current.properties[segment];
    walked = joinPath(walked, segment);
  }

  return current;
}

// ============================================================================
// Coercion
// ============================================================================

const INTEGER_PATTERN = /^[+-]?\d+$/;
const TRUTHY_STRINGS = new Set(["true", "yes", "1"]);

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

/** Integers beyond the safe range stay exact as bigints */
function toInt(value: unknown): number | bigint | null {
  if (typeof value === "number") {
    return Number.isFinite(value) ? Math.trunc(value) : null;
  }
  if (typeof value === "bigint") return value;
  if (typeof value === "string") {
    const trimmed = value.trim();
    if (!INTEGER_PATTERN.test(trimmed)) return null;
    const parsed = Number(trimmed);
    return Number.isSafeInteger(parsed) ? parsed : BigInt(trimmed);
  }
  return null;
}

function toFloat(value: unknown): number | null {
  if (typeof value === "number") return Number.isFinite(value) ? value : null;
  if (typeof value === "bigint") return Number(value);
  if (typeof value === "string") {
    const trimmed = value.trim();
    if (trimmed === "") return null;
    const parsed = Number(trimmed);
    return Number.isFinite(parsed) ? parsed : null;
  }
  return null;
}

function toBoolean(value: unknown): boolean | null {
  if (typeof value === "boolean") return value;
  if (typeof value === "number") return value !== 0;
  if (typeof value === "string") {
    return TRUTHY_STRINGS.has(value.trim().toLowerCase());
  }
  return null;
}

function toDate(value: unknown): Date | string | null {
  if (value instanceof Date) return Number.isNaN(value.getTime()) ? null : value;
  if (typeof value === "string") return isDateValue(value) ? value : null;
  if (typeof value === "number" && Number.isFinite(value)) return new Date(value);
  return null;
}

function toText(value: unknown): string {
  if (typeof value === "string") return value;
  if (value instanceof Date) return value.toISOString();
  if (typeof value === "object") return toJson(value) ?? String(value);
  return String(value);
}

/**
 * Best-effort conversion of untyped data into the shape of `schema`.
 * Failed conversions yield null. Objects keep only declared properties
 * (absent ones become null); open objects are copied as-is.
 */
export function mapToSchema(value: unknown, schema: PortSchema): unknown {
  if (value === null || value === undefined) return null;

  switch (schema.type) {
    case "STRING":
      return toText(value);
    case "INT":
      return toInt(value);
    case "FLOAT":
      return toFloat(value);
    case "BOOLEAN":
      return toBoolean(value);
    case "DATE":
      return toDate(value);
    case "ARRAY": {
      const source =
        typeof value === "string" && value.trim().startsWith("[")
          ? parseJson(value)
          : value;
      if (Array.isArray(source)) {
        return source.map((item) => mapToSchema(item, schema.items));
      }
      return [mapToSchema(value, schema.items)];
    }
    case "OBJECT": {
      const source = typeof value === "string" ? parseJson(value) : value;
      if (!isRecord(source)) return null;

      const declared = Object.entries(schema.properties);
      if (declared.length === 0) return { ...source };

      const result: Record<string, unknown> = {};
      for (const [key, property] of declared) {
        result[key] = hasOwn(source, key)
          ? mapToSchema(source[key], property)
          : null;
      }
      return result;
    }
  }
}
