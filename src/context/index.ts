export { ExecutionContext, ContextPathError, deepCopy } from "./execution-context";
