/**
 * Node Metamodel Validation
 * Semantic checks on a single node metamodel, run when it enters a catalog
 */

import { IssueCollector } from "../schema/issues";
import { isValidValue } from "../schema/port-schema";
import type {
  CyclicNodeMetamodel,
  NodeMetamodel,
  Port,
  PortKind,
  PortSchema,
  RestNodeMetamodel,
  ValidationResult,
  VectorDbNodeMetamodel,
} from "../schema/types";
import { inputPortsOf } from "../schema/types";
import { analyzeGraph } from "../validator/graph";

const URI_VARIABLE_PATTERN = /\{([^{}]+)\}/g;

function isBlank(value: string | undefined): boolean {
  return value === undefined || value.trim() === "";
}

/** The port family a node kind expects besides STANDARD */
function portFamilyOf(node: NodeMetamodel): PortKind | undefined {
  switch (node.kind) {
    case "LLM":
      return "LLM";
    case "EMBEDDINGS":
      return "EMBEDDINGS";
    case "REST":
      return "REST";
    case "VECTOR_DB":
      return "VECTOR_DB";
    case "GATEWAY":
    case "CYCLIC":
      return undefined;
  }
}

function collectOpenObjects(schema: PortSchema, path: string, found: string[]): void {
  if (schema.type === "ARRAY") {
    collectOpenObjects(schema.items, `${path}.items`, found);
    return;
  }
  if (schema.type !== "OBJECT") return;

  const entries = Object.entries(schema.properties);
  if (entries.length === 0) found.push(path);
  for (const [key, child] of entries) {
    collectOpenObjects(child, `${path}.${key}`, found);
  }
}

function validatePorts(
  node: NodeMetamodel,
  ports: Port[],
  listName: "inputPorts" | "outputPorts",
  issues: IssueCollector,
): void {
  const seen = new Set<string>();
  const family = portFamilyOf(node);

  ports.forEach((port, index) => {
    const path = `node.${listName}[${index}]`;

    if (isBlank(port.key)) {
      issues.addError("Port key must not be empty", path);
    } else if (seen.has(port.key)) {
      issues.addError(`Duplicate port key '${port.key}'`, path);
    }
    seen.add(port.key);

    if (family && port.portType !== "STANDARD" && port.portType !== family) {
      issues.addError(
        `Port '${port.key}' is a ${port.portType} port on a ${node.kind} node`,
        `${path}.portType`,
      );
    }

    const openObjects: string[] = [];
    collectOpenObjects(port.schema, port.key, openObjects);
    for (const openPath of openObjects) {
      issues.addWarning(
        `OBJECT schema at '${openPath}' declares no properties and accepts any object`,
        `${path}.schema`,
      );
    }

    if (
      port.defaultValue !== undefined &&
      !isValidValue(port.defaultValue, port.schema)
    ) {
      issues.addError(
        `Default value of port '${port.key}' does not match its ${port.schema.type} schema`,
        `${path}.defaultValue`,
      );
    }
  });
}

function validateRest(node: RestNodeMetamodel, issues: IssueCollector): void {
  if (isBlank(node.uri)) {
    issues.addError("REST node requires a URI", "node.uri");
    return;
  }
  if (!/^https?:\/\//i.test(node.uri)) {
    issues.addError(
      `URI '${node.uri}' must start with http:// or https://`,
      "node.uri",
    );
  }

  const pathVariables = new Set(
    node.inputPorts
      .filter(
        (port) => port.portType === "REST" && port.role === "REQ_PATH_VARIABLE",
      )
      .map((port) => port.key),
  );
  for (const match of node.uri.matchAll(URI_VARIABLE_PATTERN)) {
    const variable = match[1];
    if (!pathVariables.has(variable)) {
      issues.addError(
        `URI variable '{${variable}}' has no REQ_PATH_VARIABLE input port`,
        "node.uri",
      );
    }
  }
}

function validateVectorDb(
  node: VectorDbNodeMetamodel,
  issues: IssueCollector,
): void {
  const required = {
    uri: node.uri,
    databaseName: node.databaseName,
    collectionName: node.collectionName,
    indexName: node.indexName,
    vectorField: node.vectorField,
  };
  for (const [field, value] of Object.entries(required)) {
    if (isBlank(value)) {
      issues.addError(`Vector database node requires '${field}'`, `node.${field}`);
    }
  }
  const limit = node.parameters?.limit;
  if (limit !== undefined && (!Number.isInteger(limit) || limit < 1)) {
    issues.addError("Search limit must be a positive integer", "node.parameters.limit");
  }
}

function validateCyclic(node: CyclicNodeMetamodel, issues: IssueCollector): void {
  if (!Number.isInteger(node.step) || node.step <= 0) {
    issues.addError("Loop step must be a positive integer", "node.step");
  }
  if (node.start >= node.end) {
    issues.addWarning(
      `Loop range [${node.start}, ${node.end}) is empty; the inner graph never runs`,
      "node.end",
    );
  }
  if (node.nodes.length === 0) {
    issues.addError("Cyclic node must contain at least one inner node", "node.nodes");
    return;
  }

  const ids = new Set<string>();
  for (const inner of node.nodes) {
    if (ids.has(inner.id)) {
      issues.addError(`Duplicate inner node id '${inner.id}'`, `node.nodes.${inner.id}`);
    }
    ids.add(inner.id);
  }
  for (const edge of node.edges) {
    if (!ids.has(edge.sourceNodeId) || !ids.has(edge.targetNodeId)) {
      issues.addError(
        `Inner edge '${edge.id}' references an undeclared node`,
        `node.edges.${edge.id}`,
      );
    }
  }

  const topology = analyzeGraph(
    node.nodes.map((inner) => inner.id),
    node.edges,
  );
  if (topology.cycleNodes.length > 0) {
    issues.addError(
      `Inner graph contains a cycle. Nodes involved in cycles: ${topology.cycleNodes.join(", ")}`,
      "node.edges",
    );
  }
}

export function validateNodeMetamodel(node: NodeMetamodel): ValidationResult {
  const issues = new IssueCollector();

  if (isBlank(node.id)) issues.addError("Node id must not be empty", "node.id");
  if (isBlank(node.name)) issues.addError("Node name must not be empty", "node.name");
  if (isBlank(node.version)) {
    issues.addError("Node version must not be empty", "node.version");
  }
  if (isBlank(node.description)) {
    issues.addWarning("Node has no description", "node.description");
  }
  if (isBlank(node.author)) {
    issues.addWarning("Node has no author", "node.author");
  }

  validatePorts(node, inputPortsOf(node), "inputPorts", issues);
  if (node.kind !== "GATEWAY") {
    validatePorts(node, node.outputPorts, "outputPorts", issues);
  }

  switch (node.kind) {
    case "LLM":
    case "EMBEDDINGS":
      if (isBlank(node.provider)) {
        issues.addError(`${node.kind} node requires a provider`, "node.provider");
      }
      if (isBlank(node.modelName)) {
        issues.addError(`${node.kind} node requires a model name`, "node.modelName");
      }
      break;
    case "REST":
      validateRest(node, issues);
      break;
    case "VECTOR_DB":
      validateVectorDb(node, issues);
      break;
    case "CYCLIC":
      validateCyclic(node, issues);
      break;
    case "GATEWAY":
      break;
  }

  return issues.toResult();
}
