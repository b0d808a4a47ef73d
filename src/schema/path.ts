/**
 * Dotted path helpers shared by port schemas and the execution context
 */

/** Segments that must never be traversed or written on plain objects */
const UNSAFE_SEGMENTS = new Set(["__proto__", "constructor", "prototype"]);

/**
 * Split a dotted path into segments.
 * Trailing empty segments are dropped (`"a.b."` -> `["a", "b"]`).
 * Returns null for a leading or inner empty segment, or a path made only of dots.
 */
export function splitPath(path: string): string[] | null {
  if (path === "") return [];

  const segments = path.split(".");
  while (segments.length > 0 && segments[segments.length - 1] === "") {
    segments.pop();
  }

  if (segments.length === 0) return null;
  if (segments.some((segment) => segment === "")) return null;
  return segments;
}

export function isUnsafeSegment(segment: string): boolean {
  return UNSAFE_SEGMENTS.has(segment);
}

/** First segment of a path (the port key for port paths) */
export function rootSegment(path: string): string {
  const dot = path.indexOf(".");
  return dot === -1 ? path : path.slice(0, dot);
}

export function joinPath(parent: string, segment: string): string {
  return parent === "" ? segment : `${parent}.${segment}`;
}

/** Plain objects only: literals and `Object.create(null)`. */
export function isRecord(value: unknown): value is Record<string, unknown> {
  if (typeof value !== "object" || value === null) return false;
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

export function hasOwn(target: object, key: string): boolean {
  return Object.prototype.hasOwnProperty.call(target, key);
}
