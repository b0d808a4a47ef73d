/**
 * Catalog Module
 * Node and workflow metamodel lookup plus node metamodel validation
 */

export * from "./node-catalog";
export * from "./node-validator";
export * from "./workflow-catalog";
