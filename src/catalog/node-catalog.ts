/**
 * Node Catalog
 * Lookup of node metamodels by id
 */

import { formatIssues } from "../schema/issues";
import type { NodeMetamodel, ValidationResult } from "../schema/types";
import { validateNodeMetamodel } from "./node-validator";

/**
 * The one lookup the validator and instance registry depend on
 */
export interface NodeCatalog {
  getNodeMetamodelById(id: string): NodeMetamodel | undefined;
}

export class CatalogRegistrationError extends Error {
  constructor(
    readonly nodeId: string,
    readonly validation: ValidationResult,
  ) {
    super(
      `Node metamodel "${nodeId}" is invalid: ${formatIssues(validation.errors).join("; ")}`,
    );
    this.name = "CatalogRegistrationError";
  }
}

export class InMemoryNodeCatalog implements NodeCatalog {
  private nodes = new Map<string, NodeMetamodel>();

  /**
   * Build a catalog, throwing on the first invalid metamodel
   */
  static from(nodes: NodeMetamodel[]): InMemoryNodeCatalog {
    const catalog = new InMemoryNodeCatalog();
    for (const node of nodes) {
      const validation = catalog.register(node);
      if (!validation.valid) {
        throw new CatalogRegistrationError(node.id, validation);
      }
    }
    return catalog;
  }

  /**
   * Validate and store a metamodel. Metamodels with errors are rejected;
   * an existing entry with the same id is replaced.
   */
  register(node: NodeMetamodel): ValidationResult {
    const validation = validateNodeMetamodel(node);
    if (validation.valid) {
      this.nodes.set(node.id, node);
    }
    return validation;
  }

  getNodeMetamodelById(id: string): NodeMetamodel | undefined {
    return this.nodes.get(id);
  }

  has(id: string): boolean {
    return this.nodes.has(id);
  }

  remove(id: string): boolean {
    return this.nodes.delete(id);
  }

  list(): NodeMetamodel[] {
    return Array.from(this.nodes.values());
  }

  clear(): void {
    this.nodes.clear();
  }

  get size(): number {
    return this.nodes.size;
  }
}
