/**
 * Workflow Validation
 *
 * Static analysis of a workflow definition against a node catalog. Every
 * check runs and accumulates; nothing short-circuits. The input is never
 * mutated, so a validator may be shared and called concurrently.
 */

import type { NodeCatalog } from "../catalog/node-catalog";
import { IssueCollector } from "../schema/issues";
import { rootSegment } from "../schema/path";
import { findPort, resolvePortPath } from "../schema/port";
import {
  PortPathError,
  describeSchema,
  isCompatible,
  isDateValue,
} from "../schema/port-schema";
import type {
  NodeMetamodel,
  PortSchema,
  ValidationResult,
  WorkflowEdge,
  WorkflowMetamodel,
} from "../schema/types";
import { inputPortsOf, outputPortsOf } from "../schema/types";
import { analyzeGraph } from "./graph";

const INTEGER_LITERAL = /^[+-]?\d+$/;

/**
 * Why a condition literal cannot be compared against a port of this schema,
 * or undefined when it can.
 */
export function conditionLiteralProblem(
  literal: string,
  schema: PortSchema,
): string | undefined {
  switch (schema.type) {
    case "STRING":
      return undefined;
    case "BOOLEAN": {
      const lower = literal.trim().toLowerCase();
      return lower === "true" || lower === "false"
        ? undefined
        : `'${literal}' is not a BOOLEAN literal (expected true or false)`;
    }
    case "INT":
      return INTEGER_LITERAL.test(literal.trim())
        ? undefined
        : `'${literal}' is not an INT literal`;
    case "FLOAT":
      return literal.trim() !== "" && Number.isFinite(Number(literal))
        ? undefined
        : `'${literal}' is not a FLOAT literal`;
    case "DATE":
      return isDateValue(literal.trim())
        ? undefined
        : `'${literal}' is not an ISO date or date-time literal`;
    case "ARRAY":
    case "OBJECT":
      return `conditions cannot compare ${schema.type} values`;
  }
}

function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}

export class WorkflowValidator {
  constructor(private readonly catalog: NodeCatalog) {}

  validate(workflow: WorkflowMetamodel): ValidationResult {
    const issues = new IssueCollector();

    // Catalog lookups are cached for this call only
    const cache = new Map<string, NodeMetamodel | undefined>();
    const lookup = (metamodelId: string): NodeMetamodel | undefined => {
      if (!cache.has(metamodelId)) {
        cache.set(metamodelId, this.catalog.getNodeMetamodelById(metamodelId));
      }
      return cache.get(metamodelId);
    };

    this.validateBasics(workflow, issues);
    const metamodels = this.validateNodeReferences(workflow, lookup, issues);
    const validEdges = this.validateEdgeReferences(workflow, issues);
    this.validateStructure(workflow, validEdges, issues);
    this.validatePortConnections(workflow, validEdges, metamodels, issues);
    this.validateConditions(validEdges, metamodels, issues);

    return issues.toResult();
  }

  private validateBasics(workflow: WorkflowMetamodel, issues: IssueCollector): void {
    if (workflow.id.trim() === "") {
      issues.addError("Workflow id must not be empty", "workflow.id");
    }
    if (workflow.name.trim() === "") {
      issues.addError("Workflow name must not be empty", "workflow.name");
    }
    if (workflow.nodes.length === 0) {
      issues.addError("Workflow must contain at least one node", "workflow.nodes");
    }

    const edgeIds = new Set<string>();
    for (const edge of workflow.edges) {
      if (edgeIds.has(edge.id)) {
        issues.addError(`Duplicate edge id '${edge.id}'`, `workflow.edges.${edge.id}`);
      }
      edgeIds.add(edge.id);
    }
  }

  /**
   * Returns the resolved metamodel of every workflow node that has one
   */
  private validateNodeReferences(
    workflow: WorkflowMetamodel,
    lookup: (metamodelId: string) => NodeMetamodel | undefined,
    issues: IssueCollector,
  ): Map<string, NodeMetamodel> {
    const resolved = new Map<string, NodeMetamodel>();
    const seen = new Set<string>();

    for (const node of workflow.nodes) {
      if (seen.has(node.id)) {
        issues.addError(`Duplicate node id '${node.id}'`, `workflow.nodes.${node.id}`);
        continue;
      }
      seen.add(node.id);

      const metamodel = lookup(node.nodeMetamodelId);
      if (!metamodel) {
        issues.addError(
          `Node '${node.id}' references unknown node metamodel '${node.nodeMetamodelId}'`,
          `workflow.nodes.${node.id}.metamodel`,
        );
        continue;
      }
      if (!metamodel.enabled) {
        issues.addWarning(
          `Node '${node.id}' references disabled node metamodel '${node.nodeMetamodelId}'`,
          `workflow.nodes.${node.id}.metamodel`,
        );
      }
      resolved.set(node.id, metamodel);
    }

    return resolved;
  }

  /**
   * Returns the edges whose endpoints both resolve
   */
  private validateEdgeReferences(
    workflow: WorkflowMetamodel,
    issues: IssueCollector,
  ): WorkflowEdge[] {
    const nodeIds = new Set(workflow.nodes.map((n) => n.id));
    const valid: WorkflowEdge[] = [];

    for (const edge of workflow.edges) {
      let ok = true;
      if (!nodeIds.has(edge.sourceNodeId)) {
        issues.addError(
          `Edge '${edge.id}' source node '${edge.sourceNodeId}' does not exist`,
          `workflow.edges.${edge.id}.source`,
        );
        ok = false;
      }
      if (!nodeIds.has(edge.targetNodeId)) {
        issues.addError(
          `Edge '${edge.id}' target node '${edge.targetNodeId}' does not exist`,
          `workflow.edges.${edge.id}.target`,
        );
        ok = false;
      }
      if (edge.sourceNodeId === edge.targetNodeId) {
        issues.addError(
          `Edge '${edge.id}' connects node '${edge.sourceNodeId}' to itself`,
          `workflow.edges.${edge.id}.selfLoop`,
        );
      }
      if (ok) valid.push(edge);
    }

    return valid;
  }

  private validateStructure(
    workflow: WorkflowMetamodel,
    edges: WorkflowEdge[],
    issues: IssueCollector,
  ): void {
    if (workflow.nodes.length === 0) return;

    const topology = analyzeGraph(
      workflow.nodes.map((n) => n.id),
      edges,
    );

    if (topology.cycleNodes.length > 0) {
      issues.addError(
        `Cycle detected: ${topology.order.length} of ${topology.order.length + topology.cycleNodes.length} nodes can be ordered. ` +
          `Nodes involved in cycles: ${topology.cycleNodes.join(", ")}`,
        "workflow.structure.cycle",
      );
    }
    if (topology.entryNodes.length === 0) {
      issues.addError(
        "Workflow has no entry node: every node has an incoming edge",
        "workflow.structure.entry",
      );
    }
    if (topology.exitNodes.length === 0) {
      issues.addError(
        "Workflow has no exit node: every node has an outgoing edge",
        "workflow.structure.exit",
      );
    }
  }

  private validatePortConnections(
    workflow: WorkflowMetamodel,
    edges: WorkflowEdge[],
    metamodels: Map<string, NodeMetamodel>,
    issues: IssueCollector,
  ): void {
    // node id -> input keys satisfied by some incoming edge
    const satisfied = new Map<string, Set<string>>();
    const hasIncoming = new Set<string>();

    for (const edge of edges) {
      hasIncoming.add(edge.targetNodeId);
      const source = metamodels.get(edge.sourceNodeId);
      const target = metamodels.get(edge.targetNodeId);
      if (!source || !target) continue;

      const keys = satisfied.get(edge.targetNodeId) ?? new Set<string>();
      satisfied.set(edge.targetNodeId, keys);

      this.checkEdgeBindings(edge, source, target, keys, issues);
    }

    for (const node of workflow.nodes) {
      const metamodel = metamodels.get(node.id);
      if (!metamodel || !hasIncoming.has(node.id)) continue;

      const keys = satisfied.get(node.id) ?? new Set<string>();
      const unsatisfied = inputPortsOf(metamodel)
        .filter(
          (port) =>
            port.schema.required &&
            port.defaultValue === undefined &&
            !keys.has(port.key),
        )
        .map((port) => port.key);

      if (unsatisfied.length > 0) {
        issues.addWarning(
          `Node '${node.id}' has unsatisfied required inputs: ${unsatisfied.join(", ")}`,
          `workflow.nodes.${node.id}.inputs.unsatisfied`,
        );
      }
    }
  }

  private checkEdgeBindings(
    edge: WorkflowEdge,
    source: NodeMetamodel,
    target: NodeMetamodel,
    satisfied: Set<string>,
    issues: IssueCollector,
  ): void {
    const sourceOutputs = outputPortsOf(source);
    const targetInputs = inputPortsOf(target);
    const explicitlyBound = new Set<string>();
    const edgePath = `workflow.edges.${edge.id}`;

    // Explicit bindings
    for (const [sourcePath, targetPath] of Object.entries(edge.bindings ?? {})) {
      explicitlyBound.add(rootSegment(targetPath));

      let sourceSchema: PortSchema | undefined;
      let targetSchema: PortSchema | undefined;

      try {
        sourceSchema = resolvePortPath(sourceOutputs, sourcePath);
      } catch (e) {
        if (!(e instanceof PortPathError)) throw e;
        issues.addError(
          `Source path '${sourcePath}' does not resolve on node '${edge.sourceNodeId}': ${errorMessage(e)}`,
          `${edgePath}.binding.sourcePath`,
        );
      }

      try {
        targetSchema = resolvePortPath(targetInputs, targetPath);
      } catch (e) {
        if (!(e instanceof PortPathError)) throw e;
        issues.addError(
          `Target path '${targetPath}' does not resolve on node '${edge.targetNodeId}': ${errorMessage(e)}`,
          `${edgePath}.binding.targetPath`,
        );
      }

      if (!sourceSchema || !targetSchema) continue;

      if (!isCompatible(sourceSchema, targetSchema)) {
        issues.addError(
          `Port type mismatch: ${sourcePath} (${describeSchema(sourceSchema)}) cannot be bound to ` +
            `${targetPath} (${describeSchema(targetSchema)}) between nodes ${edge.sourceNodeId} and ${edge.targetNodeId}`,
          `${edgePath}.binding.typeMismatch`,
        );
        continue;
      }
      satisfied.add(rootSegment(targetPath));
    }

    // Implicit bindings: same top-level key on both sides
    for (const targetPort of targetInputs) {
      if (explicitlyBound.has(targetPort.key)) continue;

      const sourcePort = findPort(sourceOutputs, targetPort.key);
      if (!sourcePort) continue;

      if (isCompatible(sourcePort.schema, targetPort.schema)) {
        satisfied.add(targetPort.key);
      } else {
        issues.addWarning(
          `Port type mismatch on implicitly matched port '${targetPort.key}': ` +
            `${describeSchema(sourcePort.schema)} to ${describeSchema(targetPort.schema)} ` +
            `between nodes ${edge.sourceNodeId} and ${edge.targetNodeId}`,
          `${edgePath}.implicitBinding.${targetPort.key}`,
        );
      }
    }
  }

  private validateConditions(
    edges: WorkflowEdge[],
    metamodels: Map<string, NodeMetamodel>,
    issues: IssueCollector,
  ): void {
    for (const edge of edges) {
      const condition = edge.condition;
      const source = metamodels.get(edge.sourceNodeId);
      if (!condition || !source) continue;

      const path = `workflow.edges.${edge.id}.condition`;
      let schema: PortSchema;
      try {
        schema = resolvePortPath(outputPortsOf(source), condition.port);
      } catch (e) {
        if (!(e instanceof PortPathError)) throw e;
        issues.addError(
          `Condition port '${condition.port}' is not an output of node '${edge.sourceNodeId}': ${errorMessage(e)}`,
          path,
        );
        continue;
      }

      const problem = conditionLiteralProblem(condition.targetValue, schema);
      if (problem) {
        issues.addError(`Invalid condition on port '${condition.port}': ${problem}`, path);
      }
    }
  }
}

export function validateWorkflow(
  workflow: WorkflowMetamodel,
  catalog: NodeCatalog,
): ValidationResult {
  return new WorkflowValidator(catalog).validate(workflow);
}
