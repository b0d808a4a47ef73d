/**
 * Node Kind Registry
 * Maps each node kind to the function that processes nodes of that kind
 */

import type { ExecutionContext } from "../context/execution-context";
import type { NodeKind, NodeMetamodelOf } from "../schema/types";
import type { NodeScope } from "./types";

// ============================================================================
// Registry Types
// ============================================================================

/**
 * Processor for every metamodel of one kind
 */
export type NodeProcessor<K extends NodeKind = NodeKind> = (
  metamodel: NodeMetamodelOf<K>,
  context: ExecutionContext,
  scope: NodeScope,
) => Promise<void> | void;

export interface RegisteredNodeKind<K extends NodeKind = NodeKind> {
  kind: K;
  description: string;
  process(
    metamodel: NodeMetamodelOf<K>,
    context: ExecutionContext,
    scope: NodeScope,
  ): Promise<void> | void;
}

// ============================================================================
// Registry Implementation
// ============================================================================

export class NodeKindRegistry {
  private kinds = new Map<NodeKind, RegisteredNodeKind>();

  /**
   * Register the processor for a kind, replacing any previous one
   */
  register<K extends NodeKind>(entry: RegisteredNodeKind<K>): void {
    if (this.kinds.has(entry.kind)) {
      console.warn(`Node kind "${entry.kind}" is being overwritten`);
    }
    this.kinds.set(entry.kind, entry);
  }

  unregister(kind: NodeKind): boolean {
    return this.kinds.delete(kind);
  }

  get(kind: NodeKind): RegisteredNodeKind | undefined {
    return this.kinds.get(kind);
  }

  has(kind: NodeKind): boolean {
    return this.kinds.has(kind);
  }

  getKinds(): Set<NodeKind> {
    return new Set(this.kinds.keys());
  }

  getAll(): RegisteredNodeKind[] {
    return Array.from(this.kinds.values());
  }

  clear(): void {
    this.kinds.clear();
  }

  get size(): number {
    return this.kinds.size;
  }
}

// Global kind registry; built-in kinds register on import of the module index
export const nodeKindRegistry = new NodeKindRegistry();

// ============================================================================
// Registration Helpers
// ============================================================================

export function defineNodeKind<K extends NodeKind>(
  kind: K,
  description: string,
  process: NodeProcessor<K>,
): RegisteredNodeKind<K> {
  return { kind, description, process };
}

/**
 * Register a processor on the global registry
 */
export function registerNodeKind<K extends NodeKind>(
  kind: K,
  description: string,
  process: NodeProcessor<K>,
): void {
  nodeKindRegistry.register(defineNodeKind(kind, description, process));
}
