/**
 * Node Instance Types
 * The contract between the engine and node behaviors
 */

import type { ExecutionContext } from "../context/execution-context";
import type {
  GraphDefinition,
  NodeMetamodel,
  WorkflowNode,
} from "../schema/types";

/**
 * Engine services available to a node while it runs
 */
export interface NodeScope {
  /** Workflow-local id of the running node */
  nodeId: string;
  /** Info-level log line attributed to the node */
  log: (message: string) => void;
  /** Schedule a nested graph on the same engine and context */
  runGraph(graph: GraphDefinition, context: ExecutionContext): Promise<void>;
}

/**
 * A resolved, reusable node. Instances are shared across runs and must not
 * keep per-run state.
 */
export interface NodeInstance {
  readonly metamodel: NodeMetamodel;
  /** Reads inputs from and writes outputs to the context; throws to fail the run */
  process(context: ExecutionContext, scope: NodeScope): Promise<void> | void;
}

/**
 * Resolves the instance backing a workflow node. Returning undefined fails
 * the run for that node.
 */
export interface NodeInstanceProvider {
  resolve(node: WorkflowNode): NodeInstance | undefined;
}
