/**
 * Built-in Middleware
 *
 * Registered out of the box:
 *   - logging.nodeTimer     logs wall-clock time for each node
 *   - guard.requiredInputs  fails a node whose required inputs are absent
 *   - guard.readonlyContext restores the context after the node (dry runs)
 *
 * `timeoutMiddleware(ms)` is a factory; the engine adds it when a node
 * timeout is configured.
 */

import { inputPortsOf } from "../schema/types";
import { middlewareRegistry } from "./registry";
import type { MiddlewareFunction, RegisteredMiddleware } from "./types";

// ============================================================================
// logging.nodeTimer
// ============================================================================

const loggingNodeTimer: RegisteredMiddleware = {
  id: "logging.nodeTimer",
  name: "Node Timer",
  description: "Logs wall-clock duration of each node execution.",
  category: "logging",
  execute: async (ctx, next) => {
    const start = performance.now();
    try {
      await next();
    } finally {
      const elapsed = Math.round(performance.now() - start);
      ctx.log(`[middleware] ${ctx.nodeId} took ${elapsed}ms`);
    }
  },
};

// ============================================================================
// guard.requiredInputs
// ============================================================================

export class MissingInputError extends Error {
  constructor(
    readonly nodeId: string,
    readonly missing: string[],
  ) {
    super(`Missing required inputs: ${missing.join(", ")}`);
    this.name = "MissingInputError";
  }
}

const guardRequiredInputs: RegisteredMiddleware = {
  id: "guard.requiredInputs",
  name: "Required Inputs Guard",
  description:
    "Fails the node unless every required input port has a value in the context.",
  category: "guard",
  execute: async (ctx, next) => {
    const missing = inputPortsOf(ctx.metamodel)
      .filter((port) => port.schema.required && !ctx.context.has(port.key))
      .map((port) => port.key);
    if (missing.length > 0) {
      ctx.log(`[middleware] guard.requiredInputs: missing ${missing.join(", ")}`);
      throw new MissingInputError(ctx.nodeId, missing);
    }
    await next();
  },
};

// ============================================================================
// guard.readonlyContext
// ============================================================================

const guardReadonlyContext: RegisteredMiddleware = {
  id: "guard.readonlyContext",
  name: "Read-Only Context Guard",
  description:
    "Discards every context change the node makes. " +
    "Useful for dry runs of side-effecting nodes.",
  category: "guard",
  execute: async (ctx, next) => {
    const snapshot = ctx.context.snapshot();
    try {
      await next();
    } finally {
      ctx.context.reset(snapshot);
    }
  },
};

// ============================================================================
// Timeout
// ============================================================================

export class NodeTimeoutError extends Error {
  constructor(
    readonly nodeId: string,
    readonly timeoutMs: number,
  ) {
    super(`Node "${nodeId}" timed out after ${timeoutMs}ms`);
    this.name = "NodeTimeoutError";
  }
}

/**
 * Fails the node when it runs longer than `ms`. The node's own work is not
 * cancelled; its result is ignored.
 */
export function timeoutMiddleware(ms: number): MiddlewareFunction {
  return async (ctx, next) => {
    let timeoutId: ReturnType<typeof setTimeout> | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timeoutId = setTimeout(() => reject(new NodeTimeoutError(ctx.nodeId, ms)), ms);
    });
    try {
      await Promise.race([next(), timeout]);
    } finally {
      if (timeoutId !== undefined) clearTimeout(timeoutId);
    }
  };
}

// ============================================================================
// Register all
// ============================================================================

middlewareRegistry.register(loggingNodeTimer);
middlewareRegistry.register(guardRequiredInputs);
middlewareRegistry.register(guardReadonlyContext);
