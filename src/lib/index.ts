/**
 * Portflow
 *
 * Typed ports, static workflow validation and a dependency-ordered
 * execution engine for AI workflow graphs.
 */

// Schema: data model, port schemas, document parsing
export * from "../schema";

// Execution context
export * from "../context";

// Catalogs
export * from "../catalog";

// Static validation
export * from "../validator";

// Node kinds and instances
export * from "../registry";

// Middleware
export * from "../middleware";

// Engine
export * from "../engine";

// Logging & configuration
export * from "../logging";
export * from "../config";

// Testing utilities
export * from "../testing";
