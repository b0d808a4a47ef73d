/**
 * Port builders and port-path resolution
 */

import {
  PortPathError,
  PortSchemaError,
  createPortSchema,
  getSchemaByPath,
  isValidValue,
} from "./port-schema";
import { rootSegment } from "./path";
import type {
  EmbeddingsPort,
  EmbeddingsPortRole,
  LlmPort,
  LlmPortRole,
  Port,
  PortDocument,
  PortSchema,
  RestPort,
  RestPortRole,
  StandardPort,
  VectorDbPort,
  VectorDbPortRole,
} from "./types";

export interface PortOptions {
  defaultValue?: unknown;
}

function checked<P extends Port>(port: P): P {
  if (port.key.trim() === "") {
    throw new PortSchemaError("Port key must not be empty", "key");
  }
  if (
    port.defaultValue !== undefined &&
    !isValidValue(port.defaultValue, port.schema)
  ) {
    throw new PortSchemaError(
      `Default value of port '${port.key}' does not match its ${port.schema.type} schema`,
      `${port.key}.defaultValue`,
    );
  }
  return port;
}

function withDefault(options: PortOptions): { defaultValue?: unknown } {
  return options.defaultValue === undefined
    ? {}
    : { defaultValue: options.defaultValue };
}

export function standardPort(
  key: string,
  schema: PortSchema,
  options: PortOptions = {},
): StandardPort {
  return checked({ portType: "STANDARD", key, schema, ...withDefault(options) });
}

export function restPort(
  key: string,
  role: RestPortRole,
  schema: PortSchema,
  options: PortOptions = {},
): RestPort {
  return checked({ portType: "REST", role, key, schema, ...withDefault(options) });
}

export function llmPort(
  key: string,
  role: LlmPortRole,
  schema: PortSchema,
  options: PortOptions = {},
): LlmPort {
  return checked({ portType: "LLM", role, key, schema, ...withDefault(options) });
}

export function embeddingsPort(
  key: string,
  role: EmbeddingsPortRole,
  schema: PortSchema,
  options: PortOptions = {},
): EmbeddingsPort {
  return checked({
    portType: "EMBEDDINGS",
    role,
    key,
    schema,
    ...withDefault(options),
  });
}

export function vectorDbPort(
  key: string,
  role: VectorDbPortRole,
  schema: PortSchema,
  options: PortOptions = {},
): VectorDbPort {
  return checked({
    portType: "VECTOR_DB",
    role,
    key,
    schema,
    ...withDefault(options),
  });
}

/**
 * Convert a JSON port into a port with an immutable schema.
 * Default values are left for the node validator to judge.
 */
export function portFromDocument(doc: PortDocument, path = "port"): Port {
  const schema = createPortSchema(doc.schema, `${path}/schema`);
  return { ...doc, schema };
}

export function findPort<P extends { key: string }>(
  ports: readonly P[],
  key: string,
): P | undefined {
  return ports.find((port) => port.key === key);
}

/**
 * Resolve `key.nested.path` against a port list: the first segment names a
 * port, the rest index into its schema.
 */
export function resolvePortPath(ports: readonly Port[], path: string): PortSchema {
  const key = rootSegment(path);
  const port = findPort(ports, key);
  if (!port) {
    const available = ports.map((p) => p.key).join(", ") || "none";
    throw new PortPathError(
      `Port '${key}' not found for path '${path}'. Available ports: ${available}`,
      path,
    );
  }
  const rest = path.length > key.length ? path.slice(key.length + 1) : "";
  return getSchemaByPath(port.schema, rest);
}
