/**
 * Middleware Types
 *
 * Middleware follows a Koa-style async (ctx, next) pattern around node
 * processing. A middleware can:
 * - Skip the node by not calling next()
 * - Fail the node by throwing
 * - Inspect or restore the execution context before and after next()
 * - Log, time, or enforce policies
 */

import type { ExecutionContext } from "../context/execution-context";
import type { NodeMetamodel, WorkflowNode } from "../schema/types";

// ============================================================================
// Middleware Context
// ============================================================================

export interface MiddlewareContext {
  /** Workflow-local id of the node about to run */
  nodeId: string;
  node: WorkflowNode;
  metamodel: NodeMetamodel;
  /** The run's shared context (mutable) */
  context: ExecutionContext;
  log: (message: string) => void;
}

/**
 * Calls the next middleware or the node itself
 */
export type NextFunction = () => Promise<void>;

export type MiddlewareFunction = (
  ctx: MiddlewareContext,
  next: NextFunction,
) => Promise<void>;

export interface RegisteredMiddleware {
  /** Unique identifier (e.g., 'logging.nodeTimer') */
  id: string;
  name: string;
  description: string;
  category: string;
  execute: MiddlewareFunction;
}
