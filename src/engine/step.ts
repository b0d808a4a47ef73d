/**
 * Node Step
 *
 * Runs one scheduled node as a PocketFlow Node:
 * 1. prep: seed absent input ports with their static defaults
 * 2. exec: process the node through its middleware chain
 * 3. post: seed absent output ports with their static defaults
 *
 * A single attempt; errors propagate to the scheduler.
 */

import { Node } from "pocketflow";
import { deepCopy, type ExecutionContext } from "../context/execution-context";
import type { RunLogger } from "../logging/logger";
import { composeMiddleware } from "../middleware/composer";
import type { MiddlewareContext, MiddlewareFunction } from "../middleware/types";
import type { NodeInstance, NodeScope } from "../registry/types";
import {
  inputPortsOf,
  outputPortsOf,
  type Port,
  type WorkflowNode,
} from "../schema/types";

export interface StepState {
  context: ExecutionContext;
  logger: RunLogger;
}

/**
 * Write each port's default where the context has no value; never
 * overwrites. Returns the seeded keys.
 */
export function seedDefaults(
  ports: readonly Port[],
  context: ExecutionContext,
): string[] {
  const seeded: string[] = [];
  for (const port of ports) {
    if (port.defaultValue === undefined || context.has(port.key)) continue;
    context.put(port.key, deepCopy(port.defaultValue));
    seeded.push(port.key);
  }
  return seeded;
}

export class NodeStep extends Node<StepState> {
  constructor(
    private readonly node: WorkflowNode,
    private readonly instance: NodeInstance,
    private readonly middleware: MiddlewareFunction[],
    private readonly scope: NodeScope,
  ) {
    // One attempt, no retry wait
    super(1, 0);
  }

  async prep(shared: StepState): Promise<MiddlewareContext> {
    const seeded = seedDefaults(inputPortsOf(this.instance.metamodel), shared.context);
    if (seeded.length > 0) {
      shared.logger.debug(`Seeded input defaults: ${seeded.join(", ")}`, this.node.id);
    }
    return {
      nodeId: this.node.id,
      node: this.node,
      metamodel: this.instance.metamodel,
      context: shared.context,
      log: this.scope.log,
    };
  }

  async exec(ctx: MiddlewareContext): Promise<void> {
    const run = composeMiddleware(this.middleware, async (target) => {
      await this.instance.process(target.context, this.scope);
    });
    await run(ctx);
  }

  async post(
    shared: StepState,
    _prepRes: MiddlewareContext,
    _execRes: void,
  ): Promise<string | undefined> {
    const seeded = seedDefaults(outputPortsOf(this.instance.metamodel), shared.context);
    if (seeded.length > 0) {
      shared.logger.debug(`Seeded output defaults: ${seeded.join(", ")}`, this.node.id);
    }
    return undefined;
  }
}
