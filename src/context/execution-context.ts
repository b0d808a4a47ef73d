/**
 * Execution Context
 *
 * The per-run key-value store every node port reads from and writes to.
 * Top-level keys live in a flat map; dotted paths (`"user.address.zip"`)
 * traverse nested plain objects, and numeric segments index arrays
 * (`"users.0.name"`). Values are stored by reference.
 */

import { hasOwn, isRecord, isUnsafeSegment, splitPath } from "../schema/path";
import { toJson } from "../schema/json";

export class ContextPathError extends Error {
  constructor(
    message: string,
    readonly path: string,
  ) {
    super(message);
    this.name = "ContextPathError";
  }
}

const INDEX_PATTERN = /^\d+$/;

function isIndex(segment: string): boolean {
  return INDEX_PATTERN.test(segment);
}

function readChild(container: unknown, segment: string): unknown {
  if (isUnsafeSegment(segment)) return undefined;
  if (Array.isArray(container)) {
    return isIndex(segment) ? container[Number(segment)] : undefined;
  }
  if (isRecord(container) && hasOwn(container, segment)) {
    return container[segment];
  }
  return undefined;
}

function isContainer(value: unknown): value is Container {
  return Array.isArray(value) || isRecord(value);
}

type Container = Record<string, unknown> | unknown[];

function emptyContainerFor(nextSegment: string): Container {
  return isIndex(nextSegment) ? [] : {};
}

function assertWritable(container: Container, segment: string, path: string): void {
  if (Array.isArray(container) && !isIndex(segment)) {
    throw new ContextPathError(
      `Segment '${segment}' of context path '${path}' does not index an array`,
      path,
    );
  }
}

function writeChild(
  container: Container,
  segment: string,
  value: unknown,
): void {
  if (Array.isArray(container) && isIndex(segment)) {
    const index = Number(segment);
    while (container.length < index) container.push(null);
    container[index] = value;
    return;
  }
  if (isRecord(container)) {
    container[segment] = value;
  }
}

/**
 * Deep copy of plain objects, arrays, dates, maps and sets. Class instances
 * and other values are shared.
 */
export function deepCopy<T>(value: T): T;
export function deepCopy(value: unknown): unknown {
  if (Array.isArray(value)) return value.map((item) => deepCopy(item));
  if (value instanceof Date) return new Date(value.getTime());
  if (value instanceof Map) {
    return new Map(
      Array.from(value, ([key, child]): [unknown, unknown] => [key, deepCopy(child)]),
    );
  }
  if (value instanceof Set) {
    return new Set(Array.from(value, (item) => deepCopy(item)));
  }
  if (isRecord(value)) {
    const copy: Record<string, unknown> = {};
    for (const [key, child] of Object.entries(value)) {
      copy[key] = deepCopy(child);
    }
    return copy;
  }
  return value;
}

export class ExecutionContext {
  private readonly entries = new Map<string, unknown>();

  constructor(initial?: Record<string, unknown> | ExecutionContext) {
    if (initial instanceof ExecutionContext) {
      for (const [key, value] of initial.entries) {
        this.entries.set(key, deepCopy(value));
      }
    } else if (initial) {
      this.putAll(initial);
    }
  }

  /**
   * A path without dots is a plain top-level key (including `""`).
   * Unresolvable paths yield undefined.
   */
  get(path: string): unknown {
    if (!path.includes(".")) return this.entries.get(path);

    const segments = splitPath(path);
    if (segments === null || segments.length === 0) return undefined;

    const [head, ...rest] = segments;
    let current: unknown = this.entries.get(head);
    for (const segment of rest) {
      if (current === undefined || current === null) return undefined;
      current = readChild(current, segment);
    }
    return current;
  }

  /**
   * Intermediate containers are created as needed: an array when the next
   * segment is numeric, an object otherwise. A non-container value in the
   * way is replaced.
   */
  put(path: string, value: unknown): void {
    if (!path.includes(".")) {
      this.entries.set(path, value);
      return;
    }

    const segments = splitPath(path);
    if (segments === null || segments.length === 0) {
      throw new ContextPathError(`Invalid context path '${path}'`, path);
    }
    const unsafe = segments.find(isUnsafeSegment);
    if (unsafe !== undefined) {
      throw new ContextPathError(
        `Refusing to write through '${unsafe}' in context path '${path}'`,
        path,
      );
    }

    const [head, ...rest] = segments;
    if (rest.length === 0) {
      this.entries.set(head, value);
      return;
    }

    const existing = this.entries.get(head);
    let parent: Container;
    if (isContainer(existing)) {
      parent = existing;
    } else {
      parent = emptyContainerFor(rest[0]);
      this.entries.set(head, parent);
    }

    for (let i = 0; i < rest.length - 1; i++) {
      const segment = rest[i];
      assertWritable(parent, segment, path);
      const child = readChild(parent, segment);
      if (isContainer(child)) {
        parent = child;
      } else {
        const created = emptyContainerFor(rest[i + 1]);
        writeChild(parent, segment, created);
        parent = created;
      }
    }

    const last = rest[rest.length - 1];
    assertWritable(parent, last, path);
    writeChild(parent, last, value);
  }

  /** True when the path holds a value other than null or undefined */
  has(path: string): boolean {
    const value = this.get(path);
    return value !== undefined && value !== null;
  }

  getOrDefault<T>(path: string, fallback: T): unknown {
    return this.has(path) ? this.get(path) : fallback;
  }

  /**
   * Returns whether anything was removed. Array elements are spliced out.
   */
  remove(path: string): boolean {
    if (!path.includes(".")) return this.entries.delete(path);

    const segments = splitPath(path);
    if (segments === null || segments.length === 0) return false;
    if (segments.length === 1) return this.entries.delete(segments[0]);

    const parentPath = segments.slice(0, -1).join(".");
    const last = segments[segments.length - 1];
    const parent = this.get(parentPath);

    if (Array.isArray(parent) && isIndex(last)) {
      const index = Number(last);
      if (index >= parent.length) return false;
      parent.splice(index, 1);
      return true;
    }
    if (isRecord(parent) && !isUnsafeSegment(last) && hasOwn(parent, last)) {
      delete parent[last];
      return true;
    }
    return false;
  }

  putAll(values: Record<string, unknown>): void {
    for (const [path, value] of Object.entries(values)) {
      this.put(path, value);
    }
  }

  keys(): string[] {
    return Array.from(this.entries.keys());
  }

  get size(): number {
    return this.entries.size;
  }

  clear(): void {
    this.entries.clear();
  }

  /**
   * Replace every entry with the given top-level values (keys are not
   * treated as paths).
   */
  reset(values: Record<string, unknown>): void {
    this.entries.clear();
    for (const [key, value] of Object.entries(values)) {
      this.entries.set(key, value);
    }
  }

  /** Deep copy of the whole context, see deepCopy */
  snapshot(): Record<string, unknown> {
    const copy: Record<string, unknown> = {};
    for (const [key, value] of this.entries) {
      copy[key] = deepCopy(value);
    }
    return copy;
  }

  clone(): ExecutionContext {
    return new ExecutionContext(this);
  }

  /**
   * One `key: json` line per top-level entry
   */
  format(): string {
    const lines: string[] = [];
    for (const [key, value] of this.entries) {
      lines.push(`${key}: ${stringify(value)}`);
    }
    return lines.join("\n");
  }
}

function stringify(value: unknown): string {
  if (value === undefined) return "undefined";
  if (typeof value === "bigint") return `${value}n`;
  return toJson(value) ?? String(value);
}
