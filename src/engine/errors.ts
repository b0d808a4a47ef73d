/**
 * Engine Errors
 */

export function messageOf(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * A node failed while being resolved or processed
 */
export class NodeExecutionError extends Error {
  constructor(
    readonly nodeId: string,
    cause: unknown,
  ) {
    super(`Node "${nodeId}" failed: ${messageOf(cause)}`, { cause });
    this.name = "NodeExecutionError";
  }
}

/**
 * The graph cannot be scheduled (disabled workflow, dangling edge, cycle).
 * `nodeId` is null for faults of the workflow as a whole.
 */
export class GraphDefinitionError extends Error {
  constructor(
    message: string,
    readonly nodeId: string | null,
  ) {
    super(message);
    this.name = "GraphDefinitionError";
  }
}

export interface ExecutionFailure {
  /** Failing node, or null for workflow-level faults */
  nodeId: string | null;
  message: string;
  cause?: unknown;
}

export function toFailure(error: unknown): ExecutionFailure {
  if (error instanceof NodeExecutionError) {
    return { nodeId: error.nodeId, message: messageOf(error.cause), cause: error.cause };
  }
  if (error instanceof GraphDefinitionError) {
    return { nodeId: error.nodeId, message: error.message, cause: error };
  }
  return { nodeId: null, message: messageOf(error), cause: error };
}

/**
 * Thrown by `executeOrThrow`; carries the same failure the result reports
 */
export class WorkflowExecutionError extends Error {
  readonly nodeId: string | null;

  constructor(
    readonly workflowId: string,
    failure: ExecutionFailure,
  ) {
    const where = failure.nodeId ? ` at node "${failure.nodeId}"` : "";
    super(`Workflow "${workflowId}" failed${where}: ${failure.message}`, {
      cause: failure.cause,
    });
    this.name = "WorkflowExecutionError";
    this.nodeId = failure.nodeId;
  }
}
