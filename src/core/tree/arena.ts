import { StoreDisposedError } from "../errors";
import type {
  ArrayValue,
  BooleanValue,
  FloatValue,
  Handle,
  IntegerValue,
  NullValue,
  ObjectValue,
  StringValue,
  Value,
} from "./value";

/**
 * Bump allocator for tree nodes. Every node lives until `clear()` or
 * `dispose()`; there is no per-node release, so a child replaced by `put`
 * stays allocated (and reachable through any handle still held) until then.
 */
export class Arena {
  private nodes: Value[] = [];
  private disposed = false;

  /** Number of nodes currently allocated, reachable or not. */
  get size(): number {
    return this.nodes.length;
  }

  get isDisposed(): boolean {
    return this.disposed;
  }

  /** Look a node up by handle. */
  deref(id: Handle): Value | undefined {
    return this.nodes[id];
  }

  owns(value: Value): boolean {
    return this.nodes[value.id] === value;
  }

  string(value: string): StringValue {
    return this.push({ tag: "string", id: this.nextId(), value });
  }

  integer(value: bigint): IntegerValue {
    return this.push({ tag: "integer", id: this.nextId(), value });
  }

  float(value: number): FloatValue {
    return this.push({ tag: "float", id: this.nextId(), value });
  }

  boolean(value: boolean): BooleanValue {
    return this.push({ tag: "boolean", id: this.nextId(), value });
  }

  null(): NullValue {
    return this.push({ tag: "null", id: this.nextId() });
  }

  object(): ObjectValue {
    return this.push({ tag: "object", id: this.nextId(), entries: new Map(), arena: this });
  }

  array(): ArrayValue {
    return this.push({ tag: "array", id: this.nextId(), items: [], arena: this });
  }

  /** Mark for a later `rollback`. */
  mark(): number {
    return this.nodes.length;
  }

  /** Drop every node allocated after `mark`. Used when a decode fails part way. */
  rollback(mark: number): void {
    this.nodes.length = Math.min(mark, this.nodes.length);
  }

  /** Release every node and return how many there were. */
  clear(): number {
    const released = this.nodes.length;
    this.nodes = [];
    return released;
  }

  dispose(): void {
    this.clear();
    this.disposed = true;
  }

  private nextId(): Handle {
    if (this.disposed) throw new StoreDisposedError();
    return this.nodes.length;
  }

  private push<V extends Value>(node: V): V {
    this.nodes.push(node);
    return node;
  }
}
