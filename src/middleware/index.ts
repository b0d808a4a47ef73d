/**
 * Middleware Module
 *
 * Koa-style async (ctx, next) chains wrapped around node processing.
 *
 * Usage:
 *   import { middlewareRegistry } from './middleware';
 *
 *   middlewareRegistry.register({ id: 'audit.trace', ... });
 *
 *   // Enable for every node
 *   PORTFLOW_MIDDLEWARE=audit.trace,logging.nodeTimer
 */

export type {
  MiddlewareContext,
  MiddlewareFunction,
  NextFunction,
  RegisteredMiddleware,
} from "./types";

export { MiddlewareRegistry, middlewareRegistry } from "./registry";

export { composeMiddleware, type MiddlewareTarget } from "./composer";

// Built-in middleware (side-effect: registers on import)
export {
  MissingInputError,
  NodeTimeoutError,
  timeoutMiddleware,
} from "./builtins";
