export * from "./errors";
export * from "./conditions";
export * from "./bindings";
export * from "./report";
export { NodeStep, seedDefaults, type StepState } from "./step";
export * from "./engine";
