/**
 * Validator Module
 * Graph analysis and static workflow validation
 */

export * from "./graph";
export * from "./workflow-validator";
