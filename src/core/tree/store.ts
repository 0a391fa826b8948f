import {
  DecodeError,
  IncompatibleRootTypeError,
  InvalidConfigError,
  isTreeError,
  MissingConstantError,
  UnknownReferenceError,
} from "../errors";
import { mergeConfigs, validateConfig, type PartialTreeConfig, type TreeConfig } from "../config";
import { decode, type DecodeOptions } from "../codec/decode";
import { writeJson } from "../codec/encode";
import { positionOf } from "../codec/tokenize";
import { classify, coerceString, coerceValue, type CoerceKind, type CoerceMap } from "../coerce/coerce";
import { chomp, chompLeading } from "../output/text";
import { makeDiagnostic } from "../../outcome/codes";
import { decodeFailed, done, missingConstant, unknownReference } from "../../outcome/constructors";
import type { Outcome } from "../../outcome/outcome";
import type { TraceSink } from "../../ports/trace";
import { traceFromConfig } from "../../adapters/logging";
import { Arena } from "./arena";
import { chain, entries, eql, getT, type Entry } from "./ops";
import { resolvePath } from "./path";
import {
  inInt128Range,
  type ArrayValue,
  type BooleanValue,
  type ContainerKind,
  type FloatValue,
  type IntegerValue,
  type NativeOf,
  type NullValue,
  type ObjectValue,
  type StringValue,
  type Value,
  type ValueKind,
} from "./value";

export interface StoreOptions {
  config?: PartialTreeConfig;
  /** Overrides the sink picked from `config.trace` */
  trace?: TraceSink;
}

/**
 * Owner of one value tree.
 *
 * Every node created through a store is allocated from its arena and lives
 * until `reset()` or `dispose()`. The first `object()`/`array()`/`root()` call
 * fixes the root's variant; later container calls create detached nodes.
 *
 * ```ts
 * const store = new Store();
 * const root = store.object();
 * put(root, "name", store.string("Ada"));
 * put(root, "tags", store.array());
 * store.toJson(); // {"name":"Ada","tags":[]}
 * ```
 */
export class Store {
  readonly config: TreeConfig;
  private readonly trace: TraceSink;
  private readonly arena = new Arena();
  private rootValue: ObjectValue | ArrayValue | null = null;
  private overlayValue: ObjectValue | null = null;
  private readonly consts = new Map<string, Value>();
  private outputBuf = "";
  private outputStarted = false;
  // Scratch space for the encoder; cleared before every encode.
  private jsonBuf: string[] = [];

  constructor(options?: StoreOptions) {
    this.config = mergeConfigs(options?.config ?? {});
    const validation = validateConfig(this.config);
    if (!validation.valid) throw new InvalidConfigError(validation.errors);
    this.trace = options?.trace ?? traceFromConfig(this.config.trace);
  }

  // =========================================================================
  // Root & construction
  // =========================================================================

  get value(): ObjectValue | ArrayValue | null {
    return this.rootValue;
  }

  /**
   * Bind the root as `kind`, or return the existing root when it already has
   * that variant.
   */
  root(kind: "object"): ObjectValue;
  root(kind: "array"): ArrayValue;
  root(kind: ContainerKind): ObjectValue | ArrayValue;
  root(kind: ContainerKind): ObjectValue | ArrayValue {
    const current = this.rootValue;
    if (current) {
      if (current.tag !== kind) throw new IncompatibleRootTypeError(current.tag, kind);
      return current;
    }
    return this.bindRoot(kind === "object" ? this.arena.object() : this.arena.array());
  }

  /** Bind the root as an object on first call; afterwards create a detached object. */
  object(): ObjectValue {
    if (this.rootValue) return this.arena.object();
    return this.bindRoot(this.arena.object());
  }

  /** Bind the root as an array on first call; afterwards create a detached array. */
  array(): ArrayValue {
    if (this.rootValue) return this.arena.array();
    return this.bindRoot(this.arena.array());
  }

  createObject(): ObjectValue {
    return this.arena.object();
  }

  createArray(): ArrayValue {
    return this.arena.array();
  }

  string(value: string): StringValue {
    return this.arena.string(value);
  }

  /**
   * Integers are held as `bigint` in the signed 128-bit range. A `number`
   * must be a safe integer.
   */
  integer(value: bigint | number): IntegerValue {
    if (typeof value === "number" && !Number.isSafeInteger(value)) {
      throw new RangeError(`Not a safe integer: ${value}`);
    }
    const n = BigInt(value);
    if (!inInt128Range(n)) throw new RangeError(`Integer out of 128-bit range: ${n}`);
    return this.arena.integer(n);
  }

  /** Floats must be finite. */
  float(value: number): FloatValue {
    if (!Number.isFinite(value)) throw new RangeError(`Not a finite float: ${value}`);
    return this.arena.float(value);
  }

  boolean(value: boolean): BooleanValue {
    return this.arena.boolean(value);
  }

  null(): NullValue {
    return this.arena.null();
  }

  /** Nodes allocated since the last reset, including ones no longer reachable. */
  allocated(): number {
    return this.arena.size;
  }

  private bindRoot<V extends ObjectValue | ArrayValue>(value: V): V {
    this.rootValue = value;
    this.trace.emit({ tag: "E_RootBound", kind: value.tag });
    return value;
  }

  // =========================================================================
  // Overlay (partial data)
  // =========================================================================

  get overlay(): ObjectValue | null {
    return this.overlayValue;
  }

  setOverlay(overlay: ObjectValue | null): void {
    this.overlayValue = overlay;
  }

  /**
   * Run `fn` with `overlay` installed, restoring the previous overlay after.
   */
  withOverlay<R>(overlay: ObjectValue | null, fn: () => R): R {
    const previous = this.overlayValue;
    this.overlayValue = overlay;
    try {
      return fn();
    } finally {
      this.overlayValue = previous;
    }
  }

  // =========================================================================
  // Lookup
  // =========================================================================

  /**
   * Resolve a dotted path such as `foo.bar.2.baz`. The overlay is consulted
   * first; the root only when the overlay has no match.
   */
  getValue(path: string): Value | null {
    if (this.overlayValue) {
      const fromOverlay = resolvePath(this.overlayValue, path);
      if (fromOverlay) return fromOverlay;
    }
    if (!this.rootValue) return null;
    return resolvePath(this.rootValue, path);
  }

  /** Like `getValue`, throwing `UnknownReference` when nothing resolves. */
  resolve(path: string): Value {
    const value = this.getValue(path);
    if (!value) throw this.unknownReference(path);
    return value;
  }

  /** Like `getValue`, reporting a miss as a recoverable failure. */
  lookup(path: string): Outcome<Value> {
    const value = this.getValue(path);
    return value ? done(value) : unknownReference(path);
  }

  /**
   * Display string of the value at `path`. Objects and arrays have no display
   * form and give `""`.
   */
  getValueString(path: string): string {
    const value = this.resolve(path);
    switch (value.tag) {
      case "object":
      case "array":
        return "";
      case "string":
      case "integer":
      case "float":
      case "boolean":
      case "null":
        return coerceString(value);
    }
  }

  /** Exact-key child of a root object. */
  get(key: string): Value | null {
    if (this.rootValue?.tag !== "object") return null;
    return this.rootValue.entries.get(key) ?? null;
  }

  /** Typed exact-key child of a root object. */
  getT<K extends ValueKind>(kind: K, key: string): NativeOf<K> | null {
    if (this.rootValue?.tag !== "object") return null;
    return getT(this.rootValue, kind, key);
  }

  /** Nested object lookup from the root; see `chain` in ops. */
  chain(keys: readonly string[]): Value | null {
    if (this.rootValue?.tag !== "object") return null;
    return chain(this.rootValue, keys);
  }

  items(selector: "array"): Value[];
  items(selector: "object"): Entry[];
  items(selector: ContainerKind): Value[] | Entry[] {
    const root = this.rootValue;
    if (selector === "array") return root?.tag === "array" ? [...root.items] : [];
    return root?.tag === "object" ? entries(root) : [];
  }

  // =========================================================================
  // Coercion & constants
  // =========================================================================

  /** Display string of an arbitrary value; see `coerceString`. */
  coerceString(value: unknown): string {
    const { kind, typeName } = classify(value);
    if (kind === "unsupported") this.trace.emit({ tag: "E_UnsupportedType", type: typeName });
    return coerceString(value);
  }

  /**
   * Resolve `path` and convert it to `kind`. A miss or a variant mismatch
   * throws `UnknownReference`.
   */
  getCoerce<K extends CoerceKind>(kind: K, path: string): CoerceMap[K] {
    try {
      return coerceValue(kind, this.getValue(path), path);
    } catch (e) {
      if (isTreeError(e, "UnknownReference")) this.trace.emit({ tag: "E_UnknownReference", path });
      throw e;
    }
  }

  /** Register a named constant. Must happen before any render that reads it. */
  addConst(name: string, value: Value): void {
    this.consts.set(name, value);
  }

  /** Like `getConst` with kind `value`, reporting a miss as a failure. */
  constant(name: string): Outcome<Value> {
    const value = this.consts.get(name);
    return value ? done(value) : missingConstant(name);
  }

  getConst<K extends CoerceKind>(kind: K, name: string): CoerceMap[K] {
    const value = this.consts.get(name);
    if (!value) {
      this.trace.emit({ tag: "E_MissingConstant", name });
      throw new MissingConstantError(name);
    }
    return coerceValue(kind, value, name);
  }

  // =========================================================================
  // Output buffer
  // =========================================================================

  /**
   * Append rendered text. The first write into a fresh buffer drops one
   * leading line terminator.
   */
  write(text: string): void {
    if (!this.outputStarted) {
      this.outputStarted = true;
      this.outputBuf += this.config.output.chompFirstWrite ? chompLeading(text) : text;
      return;
    }
    this.outputBuf += text;
  }

  /**
   * Drop one trailing line terminator so a spliced-in fragment does not carry
   * its final newline into the parent.
   */
  chompOutputBuffer(): void {
    this.outputBuf = chomp(this.outputBuf);
  }

  output(): string {
    return this.outputBuf;
  }

  // =========================================================================
  // JSON
  // =========================================================================

  /** Compact JSON of the whole tree, or `""` without a root. */
  toJson(): string {
    return this.encodeRoot(false);
  }

  /** Pretty JSON of the whole tree with a trailing newline, or `""` without a root. */
  toPrettyJson(): string {
    const json = this.encodeRoot(true);
    return json === "" ? "" : `${json}\n`;
  }

  /**
   * Decode JSON text into a detached value owned by this store. The nesting
   * limit defaults to `config.codec.maxDepth`.
   */
  decodeValue(json: string, options?: DecodeOptions): Value {
    return decode(this.arena, json, { maxDepth: options?.maxDepth ?? this.config.codec.maxDepth });
  }

  /**
   * Decode JSON text and bind it as the root. The text must hold an object or
   * array; an existing root is replaced only by one of the same variant.
   */
  fromJson(json: string): ObjectValue | ArrayValue {
    const start = Date.now();
    const mark = this.arena.mark();
    const value = this.decodeValue(json);

    if (value.tag !== "object" && value.tag !== "array") {
      this.arena.rollback(mark);
      throw new DecodeError(makeDiagnostic("E0004", { actual: value.tag }, positionOf(json, 0)));
    }
    if (this.rootValue && this.rootValue.tag !== value.tag) {
      this.arena.rollback(mark);
      throw new IncompatibleRootTypeError(this.rootValue.tag, value.tag);
    }

    this.trace.emit({ tag: "E_Decode", bytes: Buffer.byteLength(json, "utf8"), durationMs: Date.now() - start });
    return this.bindRoot(value);
  }

  /** Like `fromJson`, reporting malformed text as a failure. */
  tryFromJson(json: string): Outcome<ObjectValue | ArrayValue> {
    try {
      return done(this.fromJson(json));
    } catch (e) {
      if (e instanceof DecodeError) return decodeFailed(e.message, e.diagnostic);
      throw e;
    }
  }

  private encodeRoot(pretty: boolean): string {
    if (!this.rootValue) return "";
    this.jsonBuf.length = 0;
    const indent = pretty ? " ".repeat(this.config.codec.indent) : "";
    writeJson(this.jsonBuf, this.rootValue, pretty, indent, 0);
    return this.jsonBuf.join("");
  }

  // =========================================================================
  // Equality & lifecycle
  // =========================================================================

  /** Two stores are equal when both lack a root or their roots are `eql`. */
  eql(other: Store): boolean {
    const a = this.rootValue;
    const b = other.rootValue;
    if (a && b) return eql(a, b);
    return !a && !b;
  }

  /**
   * Drop the root, overlay, constants, every allocated node and both buffers.
   * The store accepts a root of either variant afterwards.
   */
  reset(): void {
    const released = this.arena.clear();
    this.rootValue = null;
    this.overlayValue = null;
    this.consts.clear();
    this.outputBuf = "";
    this.outputStarted = false;
    this.jsonBuf = [];
    this.trace.emit({ tag: "E_Reset", released });
  }

  /** Release everything. Any later allocation throws `StoreDisposed`. */
  dispose(): void {
    this.arena.dispose();
    this.rootValue = null;
    this.overlayValue = null;
    this.consts.clear();
    this.outputBuf = "";
    this.outputStarted = false;
    this.jsonBuf = [];
  }

  private unknownReference(path: string): UnknownReferenceError {
    this.trace.emit({ tag: "E_UnknownReference", path });
    return new UnknownReferenceError(path);
  }
}
