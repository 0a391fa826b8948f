import type { Arena } from "./arena";

/** Arena handle of a node; unique within one store generation. */
export type Handle = number;

export type ValueKind = "object" | "array" | "string" | "integer" | "float" | "boolean" | "null";
export type ContainerKind = "object" | "array";

interface ValueBase {
  readonly id: Handle;
}

// Scalars
export interface StringValue extends ValueBase { readonly tag: "string"; readonly value: string }
export interface IntegerValue extends ValueBase { readonly tag: "integer"; readonly value: bigint }
export interface FloatValue extends ValueBase { readonly tag: "float"; readonly value: number }
export interface BooleanValue extends ValueBase { readonly tag: "boolean"; readonly value: boolean }
export interface NullValue extends ValueBase { readonly tag: "null" }

// Containers. Both keep the arena that owns them so `put(key, null)` and
// `append(null)` can allocate their Null child in the same place.
export interface ObjectValue extends ValueBase {
  readonly tag: "object";
  readonly entries: Map<string, Value>;
  readonly arena: Arena;
}

export interface ArrayValue extends ValueBase {
  readonly tag: "array";
  readonly items: Value[];
  readonly arena: Arena;
}

export type ScalarValue = StringValue | IntegerValue | FloatValue | BooleanValue | NullValue;
export type ContainerValue = ObjectValue | ArrayValue;

export type Value = ContainerValue | ScalarValue;

/** Unwrapped result of a typed fetch, keyed by the requested kind. */
export interface NativeMap {
  object: ObjectValue;
  array: ArrayValue;
  string: string;
  integer: bigint;
  float: number;
  boolean: boolean;
  null: null;
}

export type NativeOf<K extends ValueKind> = NativeMap[K];

export const INT128_MIN = -(2n ** 127n);
export const INT128_MAX = 2n ** 127n - 1n;

export function inInt128Range(n: bigint): boolean {
  return n >= INT128_MIN && n <= INT128_MAX;
}

export function isContainer(v: Value): v is ContainerValue {
  return v.tag === "object" || v.tag === "array";
}

export function isObject(v: Value): v is ObjectValue {
  return v.tag === "object";
}

export function isArray(v: Value): v is ArrayValue {
  return v.tag === "array";
}

export function isScalar(v: Value): v is ScalarValue {
  return !isContainer(v);
}
