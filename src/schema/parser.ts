/**
 * Document Parsing
 * Turns JSON text into typed workflow and node metamodel objects.
 * Never throws: shape and construction problems come back as validation errors.
 */

import type { ErrorObject } from "ajv";
import { ajv } from "./ajv";
import {
  nodeCatalogJsonSchema,
  nodeMetamodelJsonSchema,
  workflowJsonSchema,
} from "./json-schema";
import { portFromDocument } from "./port";
import { PortSchemaError } from "./port-schema";
import type {
  NodeMetamodel,
  NodeMetamodelDocument,
  ValidationIssue,
  ValidationResult,
  WorkflowMetamodel,
} from "./types";

interface NodeCatalogDocument {
  nodes: NodeMetamodelDocument[];
}

const validateWorkflowShape = ajv.compile<WorkflowMetamodel>(workflowJsonSchema);
const validateNodeShape = ajv.compile<NodeMetamodelDocument>(
  nodeMetamodelJsonSchema,
);
const validateCatalogShape = ajv.compile<NodeCatalogDocument>(
  nodeCatalogJsonSchema,
);

export interface ParseResult<T> {
  value: T | null;
  validation: ValidationResult;
}

function toIssues(
  errors: ErrorObject[] | null | undefined,
  prefix = "",
): ValidationIssue[] {
  return (errors ?? []).map((err) => ({
    componentPath: `${prefix}${err.instancePath}` || "/",
    message: err.message ?? "Unknown validation error",
    severity: "error" as const,
  }));
}

function failed<T>(issues: ValidationIssue[]): ParseResult<T> {
  return {
    value: null,
    validation: { valid: false, errors: issues, warnings: [] },
  };
}

function succeeded<T>(value: T): ParseResult<T> {
  return { value, validation: { valid: true, errors: [], warnings: [] } };
}

function parseJsonText(
  json: string,
): { ok: true; data: unknown } | { ok: false; issue: ValidationIssue } {
  try {
    return { ok: true, data: JSON.parse(json) };
  } catch (e) {
    return {
      ok: false,
      issue: {
        componentPath: "/",
        message: `Invalid JSON: ${e instanceof Error ? e.message : "Unknown error"}`,
        severity: "error",
      },
    };
  }
}

// ============================================================================
// Node Metamodels
// ============================================================================

/**
 * Build schemas for every port; PortSchemaError becomes an issue.
 */
function toNodeMetamodel(
  doc: NodeMetamodelDocument,
  prefix: string,
): ParseResult<NodeMetamodel> {
  try {
    const inputPorts = doc.inputPorts.map((port, i) =>
      portFromDocument(port, `${prefix}/inputPorts/${i}`),
    );
    if (doc.kind === "GATEWAY") {
      return succeeded({ ...doc, inputPorts });
    }
    const outputPorts = doc.outputPorts.map((port, i) =>
      portFromDocument(port, `${prefix}/outputPorts/${i}`),
    );
    return succeeded({ ...doc, inputPorts, outputPorts });
  } catch (e) {
    if (e instanceof PortSchemaError) {
      return failed([
        { componentPath: e.path, message: e.message, severity: "error" },
      ]);
    }
    throw e;
  }
}

export function parseNodeMetamodelValue(
  data: unknown,
): ParseResult<NodeMetamodel> {
  if (!validateNodeShape(data)) {
    return failed(toIssues(validateNodeShape.errors));
  }
  return toNodeMetamodel(data, "");
}

export function parseNodeMetamodel(json: string): ParseResult<NodeMetamodel> {
  const parsed = parseJsonText(json);
  if (!parsed.ok) return failed([parsed.issue]);
  return parseNodeMetamodelValue(parsed.data);
}

/**
 * Parse a catalog document `{ "nodes": [...] }`; every node is converted
 * and every problem reported.
 */
export function parseNodeCatalog(json: string): ParseResult<NodeMetamodel[]> {
  const parsed = parseJsonText(json);
  if (!parsed.ok) return failed([parsed.issue]);

  const data = parsed.data;
  if (!validateCatalogShape(data)) {
    return failed(toIssues(validateCatalogShape.errors));
  }

  const nodes: NodeMetamodel[] = [];
  const issues: ValidationIssue[] = [];
  data.nodes.forEach((doc, i) => {
    const result = toNodeMetamodel(doc, `/nodes/${i}`);
    if (result.value) nodes.push(result.value);
    issues.push(...result.validation.errors);
  });

  return issues.length > 0 ? failed(issues) : succeeded(nodes);
}

// ============================================================================
// Workflows
// ============================================================================

export function parseWorkflowValue(data: unknown): ParseResult<WorkflowMetamodel> {
  if (!validateWorkflowShape(data)) {
    return failed(toIssues(validateWorkflowShape.errors));
  }
  return succeeded(data);
}

export function parseWorkflow(json: string): ParseResult<WorkflowMetamodel> {
  const parsed = parseJsonText(json);
  if (!parsed.ok) return failed([parsed.issue]);
  return parseWorkflowValue(parsed.data);
}
