/**
 * Runtime guard utilities for the loosely shaped JSON that arrives from the
 * library API and from configuration files.
 */

import { InvariantError } from "./errors";

export type PlainObject = Record<string, unknown>;

export function isPlainObject(value: unknown): value is PlainObject {
  if (value === null || typeof value !== "object") return false;
  const proto = Object.getPrototypeOf(value);
  return proto === null || proto === Object.prototype;
}

export function invariant(condition: unknown, message: string, context?: PlainObject): asserts condition {
  if (condition) return;
  throw new InvariantError(message, context && Object.keys(context).length > 0 ? context : undefined);
}

/** Mirrors the truthiness the configuration format relies on: empty strings, lists and maps count as absent. */
export function isEmptyValue(value: unknown): boolean {
  if (value === null || value === undefined) return true;
  if (typeof value === "string") return value.length === 0;
  if (Array.isArray(value)) return value.length === 0;
  if (isPlainObject(value)) return Object.keys(value).length === 0;
  return false;
}

/** Reads `obj.a.b.c` through plain objects only. */
export function readPath(value: unknown, path: string[]): unknown {
  let current: unknown = value;
  for (const key of path) {
    if (!isPlainObject(current)) return undefined;
    current = current[key];
  }
  return current;
}
