/**
 * Graph analysis shared by the validator and the engine
 */

import type { WorkflowEdge } from "../schema/types";

type EdgeEndpoints = Pick<WorkflowEdge, "sourceNodeId" | "targetNodeId">;

export interface GraphTopology {
  /** Kahn order of every node that could be ordered */
  order: string[];
  /** Nodes left with positive in-degree: a superset of the nodes on cycles */
  cycleNodes: string[];
  /** Nodes with no incoming edges */
  entryNodes: string[];
  /** Nodes with no outgoing edges */
  exitNodes: string[];
}

/**
 * Kahn's algorithm over declared nodes. Edges with an undeclared endpoint
 * are ignored; ties are broken by declaration order.
 */
export function analyzeGraph(
  nodeIds: readonly string[],
  edges: readonly EdgeEndpoints[],
): GraphTopology {
  const ids = Array.from(new Set(nodeIds));
  const declared = new Set(ids);
  const inDegree = new Map<string, number>(ids.map((id) => [id, 0]));
  const outgoing = new Map<string, string[]>(ids.map((id) => [id, []]));

  for (const edge of edges) {
    if (!declared.has(edge.sourceNodeId) || !declared.has(edge.targetNodeId)) {
      continue;
    }
    outgoing.get(edge.sourceNodeId)?.push(edge.targetNodeId);
    inDegree.set(edge.targetNodeId, (inDegree.get(edge.targetNodeId) ?? 0) + 1);
  }

  const entryNodes = ids.filter((id) => inDegree.get(id) === 0);
  const exitNodes = ids.filter((id) => outgoing.get(id)?.length === 0);

  const residual = new Map(inDegree);
  const queue = [...entryNodes];
  const order: string[] = [];

  while (queue.length > 0) {
    const current = queue.shift();
    if (current === undefined) break;
    order.push(current);

    for (const target of outgoing.get(current) ?? []) {
      const remaining = (residual.get(target) ?? 0) - 1;
      residual.set(target, remaining);
      if (remaining === 0) queue.push(target);
    }
  }

  const cycleNodes = ids.filter((id) => (residual.get(id) ?? 0) > 0);

  return { order, cycleNodes, entryNodes, exitNodes };
}

export function hasCycle(topology: GraphTopology): boolean {
  return topology.cycleNodes.length > 0;
}
