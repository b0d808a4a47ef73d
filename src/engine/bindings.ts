/**
 * Binding Application
 * Copies values along a taken edge from source port paths to target port paths
 */

import {
  ContextPathError,
  ExecutionContext,
  deepCopy,
} from "../context/execution-context";
import type { RunLogger } from "../logging/logger";
import { findPort } from "../schema/port";
import { rootSegment } from "../schema/path";
import { inputPortsOf, type NodeMetamodel, type WorkflowEdge } from "../schema/types";

export interface AppliedBinding {
  source: string;
  target: string;
  /** True when the target's static default stood in for an absent source */
  fromDefault: boolean;
}

export interface SkippedBinding {
  source: string;
  target: string;
  reason: string;
}

export interface BindingOutcome {
  applied: AppliedBinding[];
  skipped: SkippedBinding[];
}

/**
 * The target port's default, narrowed to the target path
 */
function defaultFor(metamodel: NodeMetamodel, targetPath: string): unknown {
  const port = findPort(inputPortsOf(metamodel), rootSegment(targetPath));
  if (port?.defaultValue === undefined) return undefined;
  const scratch = new ExecutionContext({ [port.key]: deepCopy(port.defaultValue) });
  return scratch.get(targetPath);
}

/**
 * Values are copied by reference. A source that is absent (undefined or
 * null) falls back to the target's default; without one the pair is skipped.
 */
export function applyBindings(
  edge: WorkflowEdge,
  target: NodeMetamodel,
  context: ExecutionContext,
  logger: RunLogger,
): BindingOutcome {
  const outcome: BindingOutcome = { applied: [], skipped: [] };

  for (const [source, targetPath] of Object.entries(edge.bindings ?? {})) {
    let value: unknown;
    let fromDefault = false;

    if (context.has(source)) {
      value = context.get(source);
    } else {
      value = defaultFor(target, targetPath);
      fromDefault = true;
    }

    if (value === undefined || value === null) {
      const reason = "source has no value and target has no default";
      outcome.skipped.push({ source, target: targetPath, reason });
      logger.warn(`Binding ${source} -> ${targetPath} skipped: ${reason}`, edge.targetNodeId);
      continue;
    }

    try {
      context.put(targetPath, value);
    } catch (error) {
      if (!(error instanceof ContextPathError)) throw error;
      outcome.skipped.push({ source, target: targetPath, reason: error.message });
      logger.warn(`Binding ${source} -> ${targetPath} skipped: ${error.message}`, edge.targetNodeId);
      continue;
    }

    outcome.applied.push({ source, target: targetPath, fromDefault });
    logger.debug(
      `Bound ${source} -> ${targetPath}${fromDefault ? " (default)" : ""}`,
      edge.targetNodeId,
    );
  }

  return outcome;
}
