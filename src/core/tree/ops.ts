import { NotAContainerError, NotAScalarError } from "../errors";
import { formatDecimal } from "../codec/number";
import type {
  ArrayValue,
  NativeOf,
  ObjectValue,
  Value,
  ValueKind,
} from "./value";

// =========================================================================
// Mutation
// =========================================================================

/**
 * Insert or replace `key`. A `null` value stores a Null node; it never removes
 * the key. The replaced child is not released.
 */
export function put(obj: ObjectValue, key: string, value: Value | null): void {
  obj.entries.set(key, value ?? obj.arena.null());
}

/**
 * Append to the end of an array. A `null` value appends a Null node.
 */
export function append(arr: ArrayValue, value: Value | null): void {
  arr.items.push(value ?? arr.arena.null());
}

// =========================================================================
// Access
// =========================================================================

export function get(obj: ObjectValue, key: string): Value | null {
  return obj.entries.get(key) ?? null;
}

export function at(arr: ArrayValue, index: number): Value | null {
  if (!Number.isInteger(index) || index < 0) return null;
  return arr.items[index] ?? null;
}

export function contains(obj: ObjectValue, key: string): boolean {
  return obj.entries.has(key);
}

/**
 * Typed fetch. Returns the unwrapped scalar (or the container itself) when
 * `key` exists and holds a value of `kind`; `null` otherwise.
 */
export function getT<K extends ValueKind>(obj: ObjectValue, kind: K, key: string): NativeOf<K> | null {
  const value = obj.entries.get(key);
  if (!value) return null;
  return unwrapAs(value, kind);
}

// One extractor per kind, so the generic lookup below stays typed per key.
const EXTRACTORS: { [K in ValueKind]: (v: Value) => NativeOf<K> | null } = {
  object: v => (v.tag === "object" ? v : null),
  array: v => (v.tag === "array" ? v : null),
  string: v => (v.tag === "string" ? v.value : null),
  integer: v => (v.tag === "integer" ? v.value : null),
  float: v => (v.tag === "float" ? v.value : null),
  boolean: v => (v.tag === "boolean" ? v.value : null),
  null: () => null,
};

/**
 * Unwrap `value` if it has variant `kind`, else `null`.
 */
export function unwrapAs<K extends ValueKind>(value: Value, kind: K): NativeOf<K> | null {
  const extract: (v: Value) => NativeOf<K> | null = EXTRACTORS[kind];
  return extract(value);
}

/**
 * Number of children of an object or array.
 */
export function count(value: Value): number {
  switch (value.tag) {
    case "object":
      return value.entries.size;
    case "array":
      return value.items.length;
    case "string":
    case "integer":
    case "float":
    case "boolean":
    case "null":
      throw new NotAContainerError(value.tag);
  }
}

/**
 * Walk nested objects by key. Yields a value only when the last key lands on
 * a non-object leaf.
 */
export function chain(obj: ObjectValue, keys: readonly string[]): Value | null {
  let current = obj;

  for (let depth = 1; depth <= keys.length; depth++) {
    const child = current.entries.get(keys[depth - 1]);
    if (!child) return null;
    if (child.tag === "object") {
      current = child;
      continue;
    }
    return depth === keys.length ? child : null;
  }

  return null;
}

// =========================================================================
// Iteration
// =========================================================================

export interface Entry {
  key: string;
  value: Value;
}

/**
 * Materialized (key, value) list of an object, in insertion order.
 */
export function entries(obj: ObjectValue): Entry[] {
  return Array.from(obj.entries, ([key, value]) => ({ key, value }));
}

/**
 * Forward, single-pass cursor over an array.
 */
export class ArrayCursor {
  private index = 0;

  constructor(private readonly arr: ArrayValue) {}

  next(): Value | null {
    if (this.index >= this.arr.items.length) {
      this.index = Number.POSITIVE_INFINITY;
      return null;
    }
    return this.arr.items[this.index++];
  }
}

export function iterator(arr: ArrayValue): ArrayCursor {
  return new ArrayCursor(arr);
}

// =========================================================================
// Equality & display
// =========================================================================

/**
 * Deep structural equality. Object key order is ignored; a key present in one
 * object and missing in the other makes them unequal.
 */
export function eql(a: Value, b: Value): boolean {
  switch (a.tag) {
    case "object": {
      if (b.tag !== "object") return false;
      if (a.entries.size !== b.entries.size) return false;
      for (const [key, value] of a.entries) {
        const other = b.entries.get(key);
        if (!other || !eql(value, other)) return false;
      }
      return true;
    }
    case "array": {
      if (b.tag !== "array") return false;
      if (a.items.length !== b.items.length) return false;
      return a.items.every((item, i) => eql(item, b.items[i]));
    }
    case "string":
      return b.tag === "string" && a.value === b.value;
    case "integer":
      return b.tag === "integer" && a.value === b.value;
    case "float":
      return b.tag === "float" && a.value === b.value;
    case "boolean":
      return b.tag === "boolean" && a.value === b.value;
    case "null":
      return b.tag === "null";
  }
}

/**
 * Display string of a scalar. Null displays as the empty string.
 */
export function valueToString(value: Value): string {
  switch (value.tag) {
    case "object":
    case "array":
      throw new NotAScalarError(value.tag);
    case "string":
      return value.value;
    case "integer":
      return value.value.toString();
    case "float":
      return formatDecimal(value.value);
    case "boolean":
      return value.value ? "true" : "false";
    case "null":
      return "";
  }
}
