import { describe, it, expect } from "vitest";
import { Arena } from "../../src/core/tree/arena";
import { StoreDisposedError } from "../../src/core/errors";

describe("Arena", () => {
  it("hands out sequential handles", () => {
    const arena = new Arena();
    const a = arena.string("a");
    const b = arena.integer(1n);
    expect([a.id, b.id]).toEqual([0, 1]);
    expect(arena.deref(1)).toBe(b);
    expect(arena.deref(2)).toBeUndefined();
    expect(arena.owns(a)).toBe(true);
    expect(new Arena().owns(a)).toBe(false);
  });

  it("rolls back to a mark", () => {
    const arena = new Arena();
    arena.null();
    const mark = arena.mark();
    arena.object();
    arena.array();
    arena.rollback(mark);
    expect(arena.size).toBe(1);
    expect(arena.boolean(true).id).toBe(1);
  });

  it("restarts handles after clear and refuses work after dispose", () => {
    const arena = new Arena();
    arena.float(1.5);
    arena.float(2.5);
    expect(arena.clear()).toBe(2);
    expect(arena.string("again").id).toBe(0);

    arena.dispose();
    expect(arena.isDisposed).toBe(true);
    expect(arena.size).toBe(0);
    expect(() => arena.null()).toThrow(StoreDisposedError);
  });
});
