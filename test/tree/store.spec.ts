import { describe, it, expect, vi } from "vitest";
import { Store } from "../../src/core/tree/store";
import { append, count, eql, put } from "../../src/core/tree/ops";
import { clone } from "../../src/core/tree/clone";
import { encode } from "../../src/core/codec/encode";
import type { ArrayValue } from "../../src/core/tree/value";
import {
  IncompatibleRootTypeError,
  InvalidConfigError,
  MissingConstantError,
  StoreDisposedError,
  UnknownReferenceError,
} from "../../src/core/errors";
import { isDone, isFail } from "../../src/outcome/outcome";
import { recordingTrace } from "../../src/adapters/logging";

function nestedArrays(store: Store, depth: number): ArrayValue {
  const root = store.array();
  let current = root;
  for (let level = 1; level < depth; level++) {
    const child = store.createArray();
    append(current, child);
    current = child;
  }
  return root;
}

const SAMPLE =
  '{"name":"Ada","age":36,"ratio":0.5,"ok":true,"none":null,"tags":["a","b"],"nested":{"deep":[1,{"x":-2}]}}';

describe("Store", () => {
  describe("construction", () => {
    it("builds a tree and encodes it compactly", () => {
      const store = new Store();
      const root = store.object();
      put(root, "name", store.string("Ada"));
      put(root, "tags", store.array());
      expect(store.toJson()).toBe('{"name":"Ada","tags":[]}');
    });

    it("encodes pretty JSON with a trailing newline", () => {
      const store = new Store();
      store.fromJson('{"a":1,"b":[true,null]}');
      expect(store.toPrettyJson()).toBe('{\n  "a": 1,\n  "b": [\n    true,\n    null\n  ]\n}\n');
    });

    it("honors the configured indent", () => {
      const store = new Store({ config: { codec: { indent: 4 } } });
      store.fromJson('{"a":1}');
      expect(store.toPrettyJson()).toBe('{\n    "a": 1\n}\n');
    });

    it("gives empty text without a root", () => {
      const store = new Store();
      expect(store.toJson()).toBe("");
      expect(store.toPrettyJson()).toBe("");
    });

    it("stores a Null node when put is given null", () => {
      const store = new Store();
      const root = store.object();
      put(root, "k", null);
      expect(store.toJson()).toBe('{"k":null}');
      expect(store.allocated()).toBe(2);
    });

    it("keeps a replaced child allocated", () => {
      const store = new Store();
      const root = store.object();
      put(root, "k", store.string("a"));
      expect(store.allocated()).toBe(2);
      put(root, "k", store.string("b"));
      expect(store.allocated()).toBe(3);
      expect(count(root)).toBe(1);
      expect(store.toJson()).toBe('{"k":"b"}');
    });

    it("rejects non-finite floats", () => {
      const store = new Store();
      expect(() => store.float(Number.NaN)).toThrow("Not a finite float: NaN");
      expect(() => store.float(Number.POSITIVE_INFINITY)).toThrow(RangeError);
      expect(() => store.float(Number.NEGATIVE_INFINITY)).toThrow(RangeError);
      expect(store.allocated()).toBe(0);
    });

    it("rejects integers outside the supported range", () => {
      const store = new Store();
      expect(() => store.integer(2 ** 53)).toThrow(RangeError);
      expect(() => store.integer(2n ** 127n)).toThrow(RangeError);
      expect(store.integer(-(2n ** 127n)).value).toBe(-(2n ** 127n));
    });
  });

  describe("root fixation", () => {
    it("makes later containers detached once the root is bound", () => {
      const store = new Store();
      const root = store.object();
      const detached = store.array();
      expect(store.value).toBe(root);
      expect(detached.tag).toBe("array");
    });

    it("returns the existing root for the same variant", () => {
      const store = new Store();
      const root = store.root("array");
      expect(store.root("array")).toBe(root);
    });

    it("refuses to rebind the root as the other variant", () => {
      const store = new Store();
      store.object();
      expect(() => store.root("array")).toThrow(IncompatibleRootTypeError);
      expect(() => store.root("array")).toThrow("Root already bound as object, cannot bind array");
    });

    it("refuses JSON of the other variant", () => {
      const store = new Store();
      store.array();
      expect(() => store.fromJson('{"a":1}')).toThrow(IncompatibleRootTypeError);
      expect(store.allocated()).toBe(1);
    });

    it("replaces a root of the same variant", () => {
      const store = new Store();
      store.fromJson('{"a":1}');
      store.fromJson('{"b":2}');
      expect(store.toJson()).toBe('{"b":2}');
    });
  });

  describe("JSON round trip", () => {
    it("reproduces the input exactly", () => {
      const store = new Store();
      store.fromJson(SAMPLE);
      expect(store.toJson()).toBe(SAMPLE);
    });

    it("is idempotent in compact form", () => {
      const first = new Store();
      first.fromJson('{ "b" : [ 1.0 , 2 ], "a" : { } }');
      const once = first.toJson();
      const second = new Store();
      second.fromJson(once);
      expect(once).toBe('{"b":[1.0,2],"a":{}}');
      expect(second.toJson()).toBe(once);
    });

    it("clones trees nested deeper than the decode limit", () => {
      const source = new Store();
      const root = nestedArrays(source, 600);
      const json = source.toJson();
      expect(json).toBe(`${"[".repeat(600)}${"]".repeat(600)}`);

      const target = new Store();
      const copy = clone(root, target);
      expect(eql(copy, root)).toBe(true);
      expect(encode(copy)).toBe(json);
      expect(target.allocated()).toBe(600);
    });

    it("reads deep text back when the limit allows it", () => {
      const source = new Store();
      nestedArrays(source, 600);
      const json = source.toJson();

      expect(() => new Store().fromJson(json)).toThrow("Nesting exceeds 512 levels at line 1, column 513");

      const roomy = new Store({ config: { codec: { maxDepth: 600 } } });
      roomy.fromJson(json);
      expect(roomy.eql(source)).toBe(true);
    });

    it("reports malformed text as a failure through tryFromJson", () => {
      const store = new Store();
      const bad = store.tryFromJson("[1,");
      expect(isFail(bad)).toBe(true);
      if (isFail(bad)) {
        expect(bad.failure.reason).toBe("decode-failed");
        expect(bad.failure.message).toBe("Malformed JSON: unexpected end of input at line 1, column 4");
        expect(bad.failure.context).toEqual({ offset: 3, line: 1, col: 4 });
        expect(bad.failure.diagnostics[0]?.code).toBe("E0001");
      }
      expect(store.allocated()).toBe(0);

      const good = store.tryFromJson('{"a":1}');
      expect(isDone(good)).toBe(true);
      expect(store.toJson()).toBe('{"a":1}');
    });

    it("rejects a scalar top-level value and leaves nothing allocated", () => {
      const store = new Store();
      expect(() => store.fromJson("42")).toThrow("Root value must be an object or array, got integer");
      expect(store.allocated()).toBe(0);
      expect(store.value).toBeNull();
    });

    it("rolls back a failed decode", () => {
      const store = new Store();
      expect(() => store.fromJson("[1,2,")).toThrow("Malformed JSON: unexpected end of input");
      expect(store.allocated()).toBe(0);
    });

    it("enforces the configured nesting limit", () => {
      const store = new Store({ config: { codec: { maxDepth: 2 } } });
      expect(store.fromJson("[[1]]").tag).toBe("array");
      store.reset();
      expect(() => store.fromJson("[[[1]]]")).toThrow("Nesting exceeds 2 levels at line 1, column 3");
    });
  });

  describe("path lookup", () => {
    it("walks objects and arrays", () => {
      const store = new Store();
      store.fromJson(SAMPLE);
      expect(store.getValueString("nested.deep.1.x")).toBe("-2");
      expect(store.getValueString("tags.0")).toBe("a");
    });

    it("returns the scalar reached before the path runs out", () => {
      const store = new Store();
      store.fromJson('{"a":{"b":"leaf"}}');
      const value = store.getValue("a.b.c.d");
      expect(value?.tag).toBe("string");
      expect(store.getValueString("a.b.c.d")).toBe("leaf");
    });

    it("treats out-of-range and non-numeric indexes as missing", () => {
      const store = new Store();
      store.fromJson('{"items":[1,2,3]}');
      expect(store.getValue("items.5")).toBeNull();
      expect(store.getValue("items.x")).toBeNull();
      expect(store.getValue("items.-1")).toBeNull();
      const second = store.getValue("items.1");
      expect(second?.tag === "integer" ? second.value : null).toBe(2n);
    });

    it("gives empty display strings for containers and null", () => {
      const store = new Store();
      store.fromJson(SAMPLE);
      expect(store.getValueString("nested")).toBe("");
      expect(store.getValueString("tags")).toBe("");
      expect(store.getValueString("none")).toBe("");
      expect(store.getValueString("ratio")).toBe("0.5");
      expect(store.getValueString("ok")).toBe("true");
    });

    it("throws UnknownReference for a miss and reports it through lookup", () => {
      const store = new Store();
      store.fromJson(SAMPLE);
      expect(() => store.getValueString("missing.key")).toThrow(UnknownReferenceError);
      expect(() => store.resolve("missing.key")).toThrow("Unknown data reference: missing.key");

      const outcome = store.lookup("missing.key");
      expect(isFail(outcome)).toBe(true);
      if (isFail(outcome)) {
        expect(outcome.failure.reason).toBe("unknown-reference");
        expect(outcome.failure.recoverable).toBe(true);
        expect(outcome.failure.diagnostics[0]?.code).toBe("E0200");
      }
    });

    it("reads exact keys and typed values from a root object", () => {
      const store = new Store();
      store.fromJson(SAMPLE);
      expect(store.get("a.b")).toBeNull();
      expect(store.getT("integer", "age")).toBe(36n);
      expect(store.getT("string", "age")).toBeNull();
      expect(store.getT("float", "ratio")).toBe(0.5);
    });

    it("chains through nested objects to a leaf", () => {
      const store = new Store();
      store.fromJson('{"a":{"b":{"c":5}}}');
      const leaf = store.chain(["a", "b", "c"]);
      expect(leaf?.tag === "integer" ? leaf.value : null).toBe(5n);
      expect(store.chain(["a", "b"])).toBeNull();
      expect(store.chain(["a", "b", "c", "d"])).toBeNull();
      expect(store.chain(["a", "x"])).toBeNull();
    });

    it("lists root items and entries", () => {
      const arrays = new Store();
      arrays.fromJson("[1,2]");
      expect(arrays.items("array")).toHaveLength(2);
      expect(arrays.items("object")).toEqual([]);

      const objects = new Store();
      objects.fromJson('{"x":1,"y":2}');
      expect(objects.items("object").map(e => e.key)).toEqual(["x", "y"]);
      expect(objects.items("array")).toEqual([]);
    });
  });

  describe("overlay", () => {
    it("shadows the root without merging", () => {
      const store = new Store();
      store.fromJson('{"name":"root","only":"r"}');
      const overlay = store.createObject();
      put(overlay, "name", store.string("partial"));

      store.setOverlay(overlay);
      expect(store.getValueString("name")).toBe("partial");
      expect(store.getValueString("only")).toBe("r");
      store.setOverlay(null);
      expect(store.getValueString("name")).toBe("root");
    });

    it("restores the previous overlay after withOverlay", () => {
      const store = new Store();
      store.fromJson('{"name":"root"}');
      const overlay = store.createObject();
      put(overlay, "name", store.string("inner"));

      const seen = store.withOverlay(overlay, () => store.getValueString("name"));
      expect(seen).toBe("inner");
      expect(store.overlay).toBeNull();

      expect(() =>
        store.withOverlay(overlay, () => {
          throw new Error("boom");
        })
      ).toThrow("boom");
      expect(store.overlay).toBeNull();
    });
  });

  describe("equality", () => {
    it("ignores key order", () => {
      const a = new Store();
      const b = new Store();
      a.fromJson('{"x":[1,2.5,"s"],"y":null}');
      b.fromJson('{"y":null,"x":[1,2.5,"s"]}');
      expect(a.eql(b)).toBe(true);
    });

    it("treats disjoint objects of the same size as unequal both ways", () => {
      const a = new Store();
      const b = new Store();
      a.fromJson('{"a":1}');
      b.fromJson('{"b":1}');
      expect(a.eql(b)).toBe(false);
      expect(b.eql(a)).toBe(false);
    });

    it("compares stores without a root", () => {
      const a = new Store();
      const b = new Store();
      expect(a.eql(b)).toBe(true);
      b.object();
      expect(a.eql(b)).toBe(false);
    });
  });

  describe("constants and coercion", () => {
    it("returns registered constants by kind", () => {
      const store = new Store();
      store.addConst("tz", store.string("UTC"));
      store.addConst("limit", store.integer(10));
      expect(store.getConst("string", "tz")).toBe("UTC");
      expect(store.getConst("integer", "limit")).toBe(10);
    });

    it("reports a missing constant as a failure through constant()", () => {
      const store = new Store();
      const missing = store.constant("tz");
      expect(isFail(missing)).toBe(true);
      if (isFail(missing)) {
        expect(missing.failure.reason).toBe("missing-constant");
        expect(missing.failure.message).toBe("Undefined constant: tz");
      }
      const tz = store.string("UTC");
      store.addConst("tz", tz);
      const found = store.constant("tz");
      expect(isDone(found) ? found.value : null).toBe(tz);
    });

    it("throws MissingConstant for an unregistered name", () => {
      const store = new Store();
      expect(() => store.getConst("string", "tz")).toThrow(MissingConstantError);
      expect(() => store.getConst("string", "tz")).toThrow(
        "Undefined constant: tz - call addConst() before rendering"
      );
    });

    it("coerces resolved values", () => {
      const store = new Store();
      store.fromJson('{"s":"text","n":7,"big":1152921504606846976,"f":2.5,"b":false,"o":{}}');
      expect(store.getCoerce("string", "s")).toBe("text");
      expect(store.getCoerce("integer", "n")).toBe(7);
      expect(store.getCoerce("bigint", "big")).toBe(1152921504606846976n);
      expect(store.getCoerce("float", "f")).toBe(2.5);
      expect(store.getCoerce("boolean", "b")).toBe(false);
      expect(store.getCoerce("value", "o").tag).toBe("object");
    });

    it("reports a variant mismatch as UnknownReference", () => {
      const store = new Store();
      store.fromJson('{"s":"text"}');
      expect(() => store.getCoerce("integer", "s")).toThrow(UnknownReferenceError);
    });

    it("refuses integers beyond the safe range for the integer kind", () => {
      const store = new Store();
      store.fromJson('{"big":1152921504606846976}');
      expect(() => store.getCoerce("integer", "big")).toThrow(
        "Integer does not fit a safe JS number: 1152921504606846976"
      );
    });
  });

  describe("output buffer", () => {
    it("drops one leading newline from the first write", () => {
      const store = new Store();
      store.write("\nhello\n");
      store.write("\nworld\n");
      expect(store.output()).toBe("hello\n\nworld\n");
      store.chompOutputBuffer();
      expect(store.output()).toBe("hello\n\nworld");
    });

    it("keeps the first write intact when chomping is off", () => {
      const store = new Store({ config: { output: { chompFirstWrite: false } } });
      store.write("\nhello");
      expect(store.output()).toBe("\nhello");
    });
  });

  describe("lifecycle", () => {
    it("reset discards the root, buffers and constants", () => {
      const store = new Store();
      store.fromJson('{"a":1}');
      store.addConst("c", store.string("x"));
      store.write("out");

      store.reset();
      expect(store.getValue("a")).toBeNull();
      expect(store.toJson()).toBe("");
      expect(store.output()).toBe("");
      expect(store.allocated()).toBe(0);
      expect(() => store.getConst("string", "c")).toThrow(MissingConstantError);

      store.array();
      expect(store.toJson()).toBe("[]");
    });

    it("refuses allocation after dispose", () => {
      const store = new Store();
      store.object();
      store.dispose();
      expect(store.value).toBeNull();
      expect(() => store.string("x")).toThrow(StoreDisposedError);
      expect(() => store.object()).toThrow(StoreDisposedError);
    });
  });

  describe("configuration", () => {
    it("refuses an invalid configuration", () => {
      expect(() => new Store({ config: { codec: { indent: -1 } } })).toThrow(InvalidConfigError);
      expect(() => new Store({ config: { codec: { indent: -1, maxDepth: 0 } } })).toThrow(
        "Invalid configuration: codec.indent must be a non-negative integer; codec.maxDepth must be at least 1"
      );
    });

    it("encodes compactly with a zero indent", () => {
      const store = new Store({ config: { codec: { indent: 0 } } });
      store.fromJson('{"a":[1]}');
      expect(store.toJson()).toBe('{"a":[1]}');
      expect(store.toPrettyJson()).toBe('{\n"a": [\n1\n]\n}\n');
    });

    it("logs to stderr when tracing is enabled in the config", () => {
      const spy = vi.spyOn(console, "error").mockImplementation(() => {});
      try {
        const store = new Store({ config: { trace: { enabled: true, prefix: "[t]" } } });
        expect(() => store.resolve("nope")).toThrow(UnknownReferenceError);
        expect(spy).toHaveBeenCalledTimes(1);
        expect(spy).toHaveBeenCalledWith("[t] Unknown data reference: `nope`");
      } finally {
        spy.mockRestore();
      }
    });

    it("stays quiet by default", () => {
      const spy = vi.spyOn(console, "error").mockImplementation(() => {});
      try {
        const store = new Store();
        expect(() => store.resolve("nope")).toThrow(UnknownReferenceError);
        expect(spy).not.toHaveBeenCalled();
      } finally {
        spy.mockRestore();
      }
    });
  });

  describe("trace events", () => {
    it("records root binding, decoding, misses and resets", () => {
      const trace = recordingTrace();
      const store = new Store({ trace });
      store.fromJson('{"a":1}');
      expect(() => store.resolve("b")).toThrow(UnknownReferenceError);
      store.reset();

      expect(trace.events.map(e => e.tag)).toEqual(["E_Decode", "E_RootBound", "E_UnknownReference", "E_Reset"]);
      expect(trace.events[0]).toMatchObject({ tag: "E_Decode", bytes: 7 });
      expect(trace.events[2]).toEqual({ tag: "E_UnknownReference", path: "b" });
      expect(trace.events[3]).toEqual({ tag: "E_Reset", released: 2 });
    });

    it("records missing constants and unsupported types", () => {
      const trace = recordingTrace();
      const store = new Store({ trace });
      expect(() => store.getConst("string", "nope")).toThrow(MissingConstantError);
      expect(() => store.coerceString(Symbol("s"))).toThrow("Unsupported type: symbol");
      expect(trace.events).toEqual([
        { tag: "E_MissingConstant", name: "nope" },
        { tag: "E_UnsupportedType", type: "symbol" },
      ]);
    });
  });
});
