/**
 * JSON rendering for context values, which may hold bigints
 */

function bigintReplacer(_key: string, value: unknown): unknown {
  return typeof value === "bigint" ? value.toString() : value;
}

/**
 * `JSON.stringify` that renders bigints as their decimal digits.
 * Returns undefined where `JSON.stringify` does (functions, symbols, undefined).
 */
export function toJson(value: unknown, space?: number): string | undefined {
  return JSON.stringify(value, bigintReplacer, space);
}
