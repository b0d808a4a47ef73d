/**
 * Middleware Registry
 *
 * Middleware is looked up by id from the engine configuration
 * (`PORTFLOW_MIDDLEWARE`).
 */

import type { RegisteredMiddleware, MiddlewareFunction } from "./types";

export class MiddlewareRegistry {
  private middlewares = new Map<string, RegisteredMiddleware>();

  register(mw: RegisteredMiddleware): void {
    if (this.middlewares.has(mw.id)) {
      console.warn(`Middleware "${mw.id}" is being overwritten`);
    }
    this.middlewares.set(mw.id, mw);
  }

  unregister(id: string): boolean {
    return this.middlewares.delete(id);
  }

  get(id: string): RegisteredMiddleware | undefined {
    return this.middlewares.get(id);
  }

  getExecutable(id: string): MiddlewareFunction | undefined {
    return this.middlewares.get(id)?.execute;
  }

  has(id: string): boolean {
    return this.middlewares.has(id);
  }

  getAll(): RegisteredMiddleware[] {
    return Array.from(this.middlewares.values());
  }

  /** Resolve an ordered list of ids; unknown ids are skipped with a warning */
  resolve(ids: string[]): MiddlewareFunction[] {
    const resolved: MiddlewareFunction[] = [];
    for (const id of ids) {
      const fn = this.getExecutable(id);
      if (fn) {
        resolved.push(fn);
      } else {
        console.warn(`Middleware "${id}" not found in registry, skipping`);
      }
    }
    return resolved;
  }

  clear(): void {
    this.middlewares.clear();
  }

  get size(): number {
    return this.middlewares.size;
  }
}

/** Global middleware registry instance */
export const middlewareRegistry = new MiddlewareRegistry();
