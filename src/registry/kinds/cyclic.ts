/**
 * Built-in Kind: Cyclic
 * Runs the inner graph once per iteration value in [start, end)
 */

import { registerNodeKind } from "../registry";

/** Context key holding the current iteration value */
export const ITERATION_KEY = "iteration";

registerNodeKind(
  "CYCLIC",
  "Repeats an inner graph for start <= iteration < end.",
  async (metamodel, context, scope) => {
    const { start, end, step } = metamodel;
    if (!Number.isInteger(step) || step <= 0) {
      throw new Error(
        `Cyclic node "${metamodel.id}" needs a positive integer step, got ${step}`,
      );
    }

    const graph = { nodes: metamodel.nodes, edges: metamodel.edges };
    let iterations = 0;
    for (let i = start; i < end; i += step) {
      context.put(ITERATION_KEY, i);
      try {
        await scope.runGraph(graph, context);
      } finally {
        context.remove(ITERATION_KEY);
      }
      iterations++;
    }
    scope.log(`Completed ${iterations} iteration(s)`);
  },
);
