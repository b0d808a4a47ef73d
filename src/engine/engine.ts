/**
 * Workflow Engine
 *
 * Runs a workflow metamodel against one execution context:
 * - ready queue in declaration order, one node at a time
 * - conditions and bindings applied per outgoing edge
 * - JOIN nodes wait for every incoming edge, MERGE nodes for the first
 * - any node failure ends the run
 */

import type { NodeCatalog } from "../catalog/node-catalog";
import { DEFAULT_CONFIG, type PortflowConfig } from "../config/config";
import { ExecutionContext } from "../context/execution-context";
import { RunLogger } from "../logging/logger";
import { timeoutMiddleware } from "../middleware/builtins";
import {
  middlewareRegistry as globalMiddleware,
  type MiddlewareRegistry,
} from "../middleware/registry";
import type { MiddlewareFunction } from "../middleware/types";
import { NodeInstanceRegistry } from "../registry/instances";
import "../registry/kinds";
import type {
  NodeInstance,
  NodeInstanceProvider,
  NodeScope,
} from "../registry/types";
import type {
  GraphDefinition,
  NodeMetamodel,
  WorkflowEdge,
  WorkflowMetamodel,
  WorkflowNode,
} from "../schema/types";
import { analyzeGraph } from "../validator/graph";
import { applyBindings } from "./bindings";
import { evaluateCondition } from "./conditions";
import {
  GraphDefinitionError,
  NodeExecutionError,
  WorkflowExecutionError,
  messageOf,
  toFailure,
  type ExecutionFailure,
} from "./errors";
import type { EdgeRecord, ExecutionReport, NodeRecord } from "./report";
import { NodeStep } from "./step";

// ============================================================================
// Types
// ============================================================================

export interface EngineOptions {
  /** Resolves the instance behind each workflow node */
  instances: NodeInstanceProvider;
  config?: Partial<PortflowConfig>;
  /** Extra middleware, applied inside the configured ones */
  middleware?: MiddlewareFunction[];
  /** Source of the configured middleware ids (default: global registry) */
  middlewareRegistry?: MiddlewareRegistry;
}

export interface ExecuteOptions {
  /** Values written to the context before the first node */
  initialData?: Record<string, unknown>;
  /** Run against an existing context instead of a fresh one */
  context?: ExecutionContext;
  /** Called with each formatted log line */
  onLog?: (line: string) => void;
  onNodeStart?: (nodeId: string, metamodel: NodeMetamodel) => void;
  onNodeComplete?: (record: NodeRecord) => void;
  onEdgeEvaluated?: (record: EdgeRecord) => void;
  onError?: (failure: ExecutionFailure) => void;
}

export interface ExecutionResult {
  success: boolean;
  context: ExecutionContext;
  logs: string[];
  report: ExecutionReport;
  error?: ExecutionFailure;
  /** Wall-clock run time in milliseconds */
  duration: number;
}

// ============================================================================
// Run
// ============================================================================

/**
 * State of one run; never reused
 */
class WorkflowRun {
  readonly nodes: NodeRecord[] = [];
  readonly edges: EdgeRecord[] = [];

  constructor(
    private readonly provider: NodeInstanceProvider,
    private readonly middleware: MiddlewareFunction[],
    private readonly logger: RunLogger,
    private readonly options: ExecuteOptions,
  ) {}

  /**
   * Schedule a graph to completion. Returns the ids never processed;
   * throws on the first failure.
   */
  async runGraph(
    graph: GraphDefinition,
    context: ExecutionContext,
    parentNodeId?: string,
  ): Promise<string[]> {
    const byId = new Map<string, WorkflowNode>();
    for (const node of graph.nodes) {
      if (byId.has(node.id)) {
        throw new GraphDefinitionError(`Duplicate node id "${node.id}"`, node.id);
      }
      byId.set(node.id, node);
    }

    const outgoing = new Map<string, WorkflowEdge[]>();
    const inDegree = new Map<string, number>();
    for (const node of graph.nodes) {
      outgoing.set(node.id, []);
      inDegree.set(node.id, 0);
    }
    for (const edge of graph.edges) {
      for (const endpoint of [edge.sourceNodeId, edge.targetNodeId]) {
        if (!byId.has(endpoint)) {
          throw new GraphDefinitionError(
            `Edge "${edge.id}" references unknown node "${endpoint}"`,
            null,
          );
        }
      }
      outgoing.get(edge.sourceNodeId)?.push(edge);
      inDegree.set(edge.targetNodeId, (inDegree.get(edge.targetNodeId) ?? 0) + 1);
    }

    const topology = analyzeGraph(
      graph.nodes.map((node) => node.id),
      graph.edges,
    );
    if (topology.cycleNodes.length > 0) {
      throw new GraphDefinitionError(
        `Cycle detected among nodes: ${topology.cycleNodes.join(", ")}`,
        topology.cycleNodes[0],
      );
    }

    const instances = this.resolveAll(graph.nodes);

    const queue = graph.nodes
      .filter((node) => inDegree.get(node.id) === 0)
      .map((node) => node.id);
    const enqueued = new Set(queue);
    const processed = new Set<string>();

    while (queue.length > 0) {
      const nodeId = queue.shift();
      const node = nodeId === undefined ? undefined : byId.get(nodeId);
      const instance = nodeId === undefined ? undefined : instances.get(nodeId);
      if (!node || !instance) break;

      await this.runNode(node, instance, context, parentNodeId);
      processed.add(node.id);

      for (const edge of outgoing.get(node.id) ?? []) {
        const target = byId.get(edge.targetNodeId);
        const targetInstance = instances.get(edge.targetNodeId);
        if (!target || !targetInstance) continue;

        const condition = evaluateCondition(edge.condition, context);
        const bindings = condition.passed
          ? applyBindings(edge, targetInstance.metamodel, context, this.logger)
          : { applied: [], skipped: [] };

        const record: EdgeRecord = {
          edgeId: edge.id,
          sourceNodeId: edge.sourceNodeId,
          targetNodeId: edge.targetNodeId,
          taken: condition.passed,
          reason: condition.reason,
          appliedBindings: bindings.applied,
          skippedBindings: bindings.skipped,
        };
        this.edges.push(record);
        this.options.onEdgeEvaluated?.(record);

        if (!condition.passed) {
          this.logger.info(`Edge ${edge.id} not taken: ${condition.reason}`, node.id);
          continue;
        }
        if (edge.condition) {
          this.logger.info(`Edge ${edge.id} taken: ${condition.reason}`, node.id);
        }

        let ready: boolean;
        if (target.executionType === "MERGE") {
          ready = true;
        } else {
          const remaining = (inDegree.get(target.id) ?? 0) - 1;
          inDegree.set(target.id, remaining);
          ready = remaining === 0;
        }

        if (ready && !enqueued.has(target.id)) {
          enqueued.add(target.id);
          queue.push(target.id);
        }
      }
    }

    return graph.nodes
      .filter((node) => !processed.has(node.id))
      .map((node) => node.id);
  }

  private resolveAll(nodes: WorkflowNode[]): Map<string, NodeInstance> {
    const instances = new Map<string, NodeInstance>();
    for (const node of nodes) {
      let instance: NodeInstance | undefined;
      try {
        instance = this.provider.resolve(node);
      } catch (error) {
        throw new NodeExecutionError(node.id, error);
      }
      if (!instance) {
        throw new NodeExecutionError(
          node.id,
          new Error(`No node instance for metamodel "${node.nodeMetamodelId}"`),
        );
      }
      instances.set(node.id, instance);
    }
    return instances;
  }

  private async runNode(
    node: WorkflowNode,
    instance: NodeInstance,
    context: ExecutionContext,
    parentNodeId?: string,
  ): Promise<void> {
    const { metamodel } = instance;
    const scope: NodeScope = {
      nodeId: node.id,
      log: this.logger.forNode(node.id),
      runGraph: async (graph, innerContext) => {
        const unprocessed = await this.runGraph(graph, innerContext, node.id);
        if (unprocessed.length > 0) {
          this.logger.info(`Inner nodes not reached: ${unprocessed.join(", ")}`, node.id);
        }
      },
    };

    this.options.onNodeStart?.(node.id, metamodel);
    this.logger.info(`Starting ${metamodel.name} (${metamodel.kind})`, node.id);

    const started = performance.now();
    const record: NodeRecord = {
      nodeId: node.id,
      nodeMetamodelId: node.nodeMetamodelId,
      name: metamodel.name,
      kind: metamodel.kind,
      status: "completed",
      durationMs: 0,
    };
    if (parentNodeId !== undefined) record.parentNodeId = parentNodeId;

    const step = new NodeStep(node, instance, this.middleware, scope);
    try {
      await step.run({ context, logger: this.logger });
    } catch (error) {
      record.status = "failed";
      record.error = messageOf(error instanceof NodeExecutionError ? error.cause : error);
      record.durationMs = performance.now() - started;
      this.nodes.push(record);
      this.options.onNodeComplete?.(record);
      // Inner-graph failures keep the id of the inner node
      throw error instanceof NodeExecutionError ? error : new NodeExecutionError(node.id, error);
    }

    record.durationMs = performance.now() - started;
    this.nodes.push(record);
    this.options.onNodeComplete?.(record);
    this.logger.info(`Completed in ${Math.round(record.durationMs)}ms`, node.id);
  }
}

// ============================================================================
// Engine
// ============================================================================

export class WorkflowEngine {
  private readonly provider: NodeInstanceProvider;
  private readonly config: PortflowConfig;
  private readonly middleware: MiddlewareFunction[];

  constructor(options: EngineOptions) {
    this.provider = options.instances;
    this.config = { ...DEFAULT_CONFIG, ...options.config };

    const registry = options.middlewareRegistry ?? globalMiddleware;
    this.middleware = [
      ...(this.config.nodeTimeoutMs > 0 ? [timeoutMiddleware(this.config.nodeTimeoutMs)] : []),
      ...registry.resolve(this.config.middleware),
      ...(options.middleware ?? []),
    ];
  }

  /**
   * Run a workflow. Never throws: failures are reported in the result.
   */
  async execute(
    workflow: WorkflowMetamodel,
    options: ExecuteOptions = {},
  ): Promise<ExecutionResult> {
    const startTime = performance.now();
    const onLog = options.onLog;
    const logger = new RunLogger({
      consoleLevel: this.config.logLevel,
      maxLogs: this.config.maxLogs,
      onLog: onLog ? (line) => onLog(line) : undefined,
    });

    const context = options.context ?? new ExecutionContext();
    if (options.initialData) context.putAll(options.initialData);

    const run = new WorkflowRun(this.provider, this.middleware, logger, options);
    logger.info(`Running workflow "${workflow.id}" (${workflow.nodes.length} nodes)`);

    let unprocessedNodes: string[] = [];
    let error: ExecutionFailure | undefined;
    try {
      if (!workflow.enabled) {
        throw new GraphDefinitionError(`Workflow "${workflow.id}" is disabled`, null);
      }
      unprocessedNodes = await run.runGraph(workflow, context);
    } catch (e) {
      error = toFailure(e);
      const processed = new Set(
        run.nodes.filter((n) => n.parentNodeId === undefined).map((n) => n.nodeId),
      );
      unprocessedNodes = workflow.nodes
        .map((node) => node.id)
        .filter((id) => !processed.has(id));
      logger.error(`Execution failed: ${error.message}`, error.nodeId ?? undefined);
      options.onError?.(error);
    }

    const duration = performance.now() - startTime;
    if (!error) {
      if (unprocessedNodes.length > 0) {
        logger.info(`Nodes not reached: ${unprocessedNodes.join(", ")}`);
      }
      logger.info(`Workflow "${workflow.id}" completed in ${Math.round(duration)}ms`);
    }

    const result: ExecutionResult = {
      success: error === undefined,
      context,
      logs: logger.lines(),
      report: {
        workflowId: workflow.id,
        nodes: run.nodes,
        edges: run.edges,
        unprocessedNodes,
        durationMs: duration,
      },
      duration,
    };
    if (error) result.error = error;
    return result;
  }

  /**
   * Like `execute`, but a failed run throws WorkflowExecutionError
   */
  async executeOrThrow(
    workflow: WorkflowMetamodel,
    options: ExecuteOptions = {},
  ): Promise<ExecutionResult> {
    const result = await this.execute(workflow, options);
    if (result.error) {
      throw new WorkflowExecutionError(workflow.id, result.error);
    }
    return result;
  }
}

/**
 * Run a workflow with instances resolved from a catalog through the
 * built-in kind processors
 */
export async function runWorkflow(
  workflow: WorkflowMetamodel,
  catalog: NodeCatalog,
  options: ExecuteOptions & { config?: Partial<PortflowConfig> } = {},
): Promise<ExecutionResult> {
  const { config, ...executeOptions } = options;
  const engine = new WorkflowEngine({
    instances: new NodeInstanceRegistry({ catalog }),
    config,
  });
  return engine.execute(workflow, executeOptions);
}
