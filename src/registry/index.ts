/**
 * Registry Module
 * Node kind processors and the node instance registry
 */

export * from "./types";
export * from "./registry";
export * from "./instances";

// Load built-in kinds (side effects: registers kinds)
export { ITERATION_KEY } from "./kinds";
