/**
 * Execution Report
 * Per-node and per-edge record of one run
 */

import type { NodeKind } from "../schema/types";
import type { AppliedBinding, SkippedBinding } from "./bindings";

export type NodeStatus = "completed" | "failed";

export interface NodeRecord {
  nodeId: string;
  nodeMetamodelId: string;
  name: string;
  kind: NodeKind;
  status: NodeStatus;
  durationMs: number;
  /** Set for nodes of a cyclic node's inner graph */
  parentNodeId?: string;
  error?: string;
}

export interface EdgeRecord {
  edgeId: string;
  sourceNodeId: string;
  targetNodeId: string;
  taken: boolean;
  reason: string;
  appliedBindings: AppliedBinding[];
  skippedBindings: SkippedBinding[];
}

export interface ExecutionReport {
  workflowId: string;
  /** In processing order; inner-graph nodes appear once per iteration */
  nodes: NodeRecord[];
  edges: EdgeRecord[];
  /** Top-level nodes never processed (untaken branches, failures) */
  unprocessedNodes: string[];
  durationMs: number;
}
