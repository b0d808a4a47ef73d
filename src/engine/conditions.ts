/**
 * Edge Conditions
 * Compares a context value against an edge's literal target value
 */

import type { ExecutionContext } from "../context/execution-context";
import { toJson } from "../schema/json";
import type { EdgeCondition } from "../schema/types";

export interface ConditionOutcome {
  passed: boolean;
  reason: string;
}

function describeValue(value: unknown): string {
  if (typeof value === "string") return value;
  if (value instanceof Date) return value.toISOString();
  if (typeof value === "bigint") return value.toString();
  return toJson(value) ?? String(value);
}

/**
 * Comparison follows the runtime type of the context value
 */
export function matchesLiteral(value: unknown, literal: string): boolean {
  if (typeof value === "boolean") {
    return literal.trim().toLowerCase() === String(value);
  }
  if (typeof value === "number") {
    return literal.trim() !== "" && Number(literal) === value;
  }
  if (typeof value === "bigint") {
    return /^[+-]?\d+$/.test(literal.trim()) && BigInt(literal.trim()) === value;
  }
  if (value instanceof Date) {
    const parsed = Date.parse(literal);
    return !Number.isNaN(parsed) && parsed === value.getTime();
  }
  if (typeof value === "string") {
    return value === literal;
  }
  return toJson(value) === literal;
}

/**
 * An absent condition passes; an absent value fails
 */
export function evaluateCondition(
  condition: EdgeCondition | undefined,
  context: ExecutionContext,
): ConditionOutcome {
  if (!condition) {
    return { passed: true, reason: "unconditional" };
  }

  const { port, targetValue } = condition;
  if (!context.has(port)) {
    return {
      passed: false,
      reason: `'${port}' has no value, expected '${targetValue}'`,
    };
  }

  const value = context.get(port);
  if (matchesLiteral(value, targetValue)) {
    return { passed: true, reason: `'${port}' equals '${targetValue}'` };
  }
  return {
    passed: false,
    reason: `'${port}' is '${describeValue(value)}', expected '${targetValue}'`,
  };
}
