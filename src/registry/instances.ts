/**
 * Node Instance Registry
 * Resolves and caches one node instance per node metamodel id
 */

import type { NodeCatalog } from "../catalog/node-catalog";
import type { NodeMetamodel, WorkflowNode } from "../schema/types";
import { nodeKindRegistry, type NodeKindRegistry } from "./registry";
import type { NodeInstance, NodeInstanceProvider } from "./types";

export class NodeResolutionError extends Error {
  constructor(
    message: string,
    readonly nodeMetamodelId: string,
  ) {
    super(message);
    this.name = "NodeResolutionError";
  }
}

export interface NodeInstanceRegistryOptions {
  /** Source of metamodels for ids without an explicitly registered instance */
  catalog?: NodeCatalog;
  /** Kind processors (default: the global kind registry) */
  kinds?: NodeKindRegistry;
}

/**
 * Owned by the caller and handed to the engine. Instances are created lazily
 * from the catalog and reused until invalidated.
 */
export class NodeInstanceRegistry implements NodeInstanceProvider {
  private instances = new Map<string, NodeInstance>();
  private readonly catalog?: NodeCatalog;
  private readonly kinds: NodeKindRegistry;

  constructor(options: NodeInstanceRegistryOptions = {}) {
    this.catalog = options.catalog;
    this.kinds = options.kinds ?? nodeKindRegistry;
  }

  /**
   * Use a specific instance for its metamodel id
   */
  register(instance: NodeInstance): void {
    this.instances.set(instance.metamodel.id, instance);
  }

  /**
   * The cached instance for a metamodel id, created on first use.
   * Throws when the metamodel is unknown or its kind has no processor.
   */
  getOrCreate(nodeMetamodelId: string): NodeInstance {
    const cached = this.instances.get(nodeMetamodelId);
    if (cached) return cached;

    const metamodel = this.catalog?.getNodeMetamodelById(nodeMetamodelId);
    if (!metamodel) {
      throw new NodeResolutionError(
        `Node metamodel "${nodeMetamodelId}" not found in catalog`,
        nodeMetamodelId,
      );
    }

    const instance = this.create(metamodel);
    this.instances.set(nodeMetamodelId, instance);
    return instance;
  }

  resolve(node: WorkflowNode): NodeInstance {
    return this.getOrCreate(node.nodeMetamodelId);
  }

  /** Drop a cached instance so the next lookup rebuilds it */
  invalidate(nodeMetamodelId: string): boolean {
    return this.instances.delete(nodeMetamodelId);
  }

  has(nodeMetamodelId: string): boolean {
    return this.instances.has(nodeMetamodelId);
  }

  clear(): void {
    this.instances.clear();
  }

  get size(): number {
    return this.instances.size;
  }

  private create(metamodel: NodeMetamodel): NodeInstance {
    const kind = this.kinds.get(metamodel.kind);
    if (!kind) {
      throw new NodeResolutionError(
        `No processor registered for node kind "${metamodel.kind}" (metamodel "${metamodel.id}")`,
        metamodel.id,
      );
    }
    return {
      metamodel,
      process: (context, scope) => kind.process(metamodel, context, scope),
    };
  }
}
