/**
 * Middleware Composer
 *
 * Composes an ordered list of middleware functions into a single function
 * that wraps node processing.
 *
 * Usage:
 *   const run = composeMiddleware(middlewares, (ctx) => instance.process(...));
 *   await run(ctx);
 */

import type {
  MiddlewareContext,
  MiddlewareFunction,
  NextFunction,
} from "./types";

export type MiddlewareTarget = (ctx: MiddlewareContext) => Promise<void>;

/**
 * Execution order for [mw1, mw2, mw3]:
 *   mw1 → mw2 → mw3 → target
 *
 * A middleware that does not call `next()` short-circuits the chain.
 */
export function composeMiddleware(
  middlewares: MiddlewareFunction[],
  target: MiddlewareTarget,
): MiddlewareTarget {
  if (middlewares.length === 0) {
    return target;
  }

  return (ctx) => {
    let index = -1;

    const dispatch = (i: number): Promise<void> => {
      if (i <= index) {
        return Promise.reject(new Error("next() called multiple times"));
      }
      index = i;

      if (i < middlewares.length) {
        const next: NextFunction = () => dispatch(i + 1);
        return middlewares[i](ctx, next);
      }

      // End of the chain: the node itself
      return target(ctx);
    };

    return dispatch(0);
  };
}
