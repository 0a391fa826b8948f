import {
  IntegerOverflowError,
  UnknownReferenceError,
  UnsupportedTypeError,
} from "../errors";
import { formatDecimal } from "../codec/number";
import { valueToString } from "../tree/ops";
import type { Value, ValueKind } from "../tree/value";

// =========================================================================
// Outbound: anything -> display string
// =========================================================================

/**
 * Closed set of source kinds the outbound coercion knows how to display.
 * Everything else is `unsupported`.
 */
export type SourceKind =
  | "boolean"
  | "number"
  | "bigint"
  | "string"
  | "bytes"
  | "missing"
  | "scalar-value"
  | "string-list"
  | "formattable"
  | "unsupported";

export interface Classified {
  kind: SourceKind;
  typeName: string;
}

const VALUE_KINDS: ReadonlySet<string> = new Set<ValueKind>([
  "object", "array", "string", "integer", "float", "boolean", "null",
]);

/**
 * Structural check for a tree node coming through an untyped channel.
 */
export function isTreeValue(x: unknown): x is Value {
  return (
    typeof x === "object" &&
    x !== null &&
    "tag" in x &&
    "id" in x &&
    typeof x.tag === "string" &&
    typeof x.id === "number" &&
    VALUE_KINDS.has(x.tag)
  );
}

export function classify(value: unknown): Classified {
  switch (typeof value) {
    case "boolean":
      return { kind: "boolean", typeName: "boolean" };
    case "number":
      return { kind: "number", typeName: "number" };
    case "bigint":
      return { kind: "bigint", typeName: "bigint" };
    case "string":
      return { kind: "string", typeName: "string" };
    case "undefined":
      return { kind: "missing", typeName: "undefined" };
    case "function":
      return { kind: "unsupported", typeName: "function" };
    case "symbol":
      return { kind: "unsupported", typeName: "symbol" };
    case "object":
      break;
  }

  if (value === null) return { kind: "missing", typeName: "null" };
  if (value instanceof Uint8Array) return { kind: "bytes", typeName: value.constructor.name };

  if (isTreeValue(value)) {
    return value.tag === "object" || value.tag === "array"
      ? { kind: "unsupported", typeName: `Value<${value.tag}>` }
      : { kind: "scalar-value", typeName: `Value<${value.tag}>` };
  }

  if (Array.isArray(value)) {
    return value.every(item => typeof item === "string")
      ? { kind: "string-list", typeName: "string[]" }
      : { kind: "unsupported", typeName: "Array" };
  }

  if (
    typeof value === "object" &&
    typeof value.toString === "function" &&
    value.toString !== Object.prototype.toString
  ) {
    return { kind: "formattable", typeName: value.constructor?.name ?? "Object" };
  }

  const ctor = typeof value === "object" ? value.constructor?.name : undefined;
  return { kind: "unsupported", typeName: ctor ?? "Object" };
}

/**
 * Display string for an arbitrary runtime value.
 *
 * Missing values (`null`/`undefined`) contribute nothing. A value outside the
 * closed set of source kinds throws `UnsupportedType` naming its type.
 */
export function coerceString(value: unknown): string {
  const { kind, typeName } = classify(value);

  switch (kind) {
    case "boolean":
    case "bigint":
    case "string":
      return String(value);
    case "number":
      return typeof value === "number" ? formatDecimal(value) : String(value);
    case "bytes":
      return value instanceof Uint8Array
        ? Buffer.from(value.buffer, value.byteOffset, value.byteLength).toString("utf8")
        : "";
    case "missing":
      return "";
    case "scalar-value":
      return isTreeValue(value) ? valueToString(value) : "";
    case "string-list":
      return Array.isArray(value) ? value.join("\n") : "";
    case "formattable":
      return String(value);
    case "unsupported":
      throw new UnsupportedTypeError(typeName);
  }
}

// =========================================================================
// Inbound: tree value -> typed scalar
// =========================================================================

export interface CoerceMap {
  string: string;
  integer: number;
  bigint: bigint;
  float: number;
  boolean: boolean;
  value: Value;
}

export type CoerceKind = keyof CoerceMap;

const COERCIONS: { [K in CoerceKind]: (v: Value, path: string) => CoerceMap[K] } = {
  string: (v, path) => {
    if (v.tag !== "string") throw new UnknownReferenceError(path);
    return v.value;
  },
  integer: (v, path) => {
    if (v.tag !== "integer") throw new UnknownReferenceError(path);
    const n = Number(v.value);
    if (!Number.isSafeInteger(n)) throw new IntegerOverflowError(v.value);
    return n;
  },
  bigint: (v, path) => {
    if (v.tag !== "integer") throw new UnknownReferenceError(path);
    return v.value;
  },
  float: (v, path) => {
    if (v.tag !== "float") throw new UnknownReferenceError(path);
    return v.value;
  },
  boolean: (v, path) => {
    if (v.tag !== "boolean") throw new UnknownReferenceError(path);
    return v.value;
  },
  value: v => v,
};

/**
 * Convert a resolved tree value into the requested type. `resolved` is `null`
 * when the path did not resolve; that and any variant mismatch throw
 * `UnknownReference` for `path`.
 */
export function coerceValue<K extends CoerceKind>(kind: K, resolved: Value | null, path: string): CoerceMap[K] {
  if (!resolved) throw new UnknownReferenceError(path);
  const convert: (v: Value, path: string) => CoerceMap[K] = COERCIONS[kind];
  return convert(resolved, path);
}
