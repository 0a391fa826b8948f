import { DecodeError } from "../errors";
import { makeDiagnostic } from "../../outcome/codes";
import type { Arena } from "../tree/arena";
import { append, put } from "../tree/ops";
import { inInt128Range, type Value } from "../tree/value";
import { DEFAULT_CODEC_CONFIG } from "../config";
import { malformed, positionOf, tokenize, type Tok } from "./tokenize";

export interface DecodeOptions {
  maxDepth?: number;
}

/**
 * Parse JSON text into new nodes allocated from `arena`.
 *
 * Number tokens containing `.`, `e` or `E` become floats, all others become
 * integers; an integer outside the signed 128-bit range, or a float that
 * overflows to infinity, is rejected. On any error every node allocated by
 * this call is rolled back.
 */
export function decode(arena: Arena, src: string, options?: DecodeOptions): Value {
  const mark = arena.mark();
  try {
    return parse(arena, src, tokenize(src), options?.maxDepth ?? DEFAULT_CODEC_CONFIG.maxDepth);
  } catch (e) {
    arena.rollback(mark);
    throw e;
  }
}

function parse(arena: Arena, src: string, toks: Tok[], maxDepth: number): Value {
  let i = 0;

  function expectMore(): Tok {
    const t = toks[i];
    if (!t) throw malformed(src, src.length, "unexpected end of input");
    return t;
  }

  function parseOne(depth: number): Value {
    const t = expectMore();
    i++;

    switch (t.tag) {
      case "LBrace": {
        if (depth >= maxDepth) throw tooDeep(t.at);
        const obj = arena.object();
        if (expectMore().tag === "RBrace") { i++; return obj; }
        while (true) {
          const k = expectMore();
          if (k.tag !== "Str") throw malformed(src, k.at, "expected string key");
          i++;
          const colon = expectMore();
          if (colon.tag !== "Colon") throw malformed(src, colon.at, "expected ':'");
          i++;
          put(obj, k.s, parseOne(depth + 1));
          const sep = expectMore();
          i++;
          if (sep.tag === "RBrace") return obj;
          if (sep.tag !== "Comma") throw malformed(src, sep.at, "expected ',' or '}'");
        }
      }

      case "LBracket": {
        if (depth >= maxDepth) throw tooDeep(t.at);
        const arr = arena.array();
        if (expectMore().tag === "RBracket") { i++; return arr; }
        while (true) {
          append(arr, parseOne(depth + 1));
          const sep = expectMore();
          i++;
          if (sep.tag === "RBracket") return arr;
          if (sep.tag !== "Comma") throw malformed(src, sep.at, "expected ',' or ']'");
        }
      }

      case "Str":
        return arena.string(t.s);

      case "Num":
        return parseNumber(t.text, t.at);

      case "True":
        return arena.boolean(true);

      case "False":
        return arena.boolean(false);

      case "Null":
        return arena.null();

      case "RBrace":
      case "RBracket":
      case "Colon":
      case "Comma":
        throw malformed(src, t.at, `unexpected '${src[t.at]}'`);
    }
  }

  function parseNumber(text: string, at: number): Value {
    if (/[.eE]/.test(text)) {
      const f = Number(text);
      if (!Number.isFinite(f)) throw outOfRange(text, at);
      return arena.float(f);
    }
    const n = BigInt(text);
    if (!inInt128Range(n)) throw outOfRange(text, at);
    return arena.integer(n);
  }

  function outOfRange(literal: string, at: number): DecodeError {
    return new DecodeError(makeDiagnostic("E0002", { literal }, positionOf(src, at)));
  }

  function tooDeep(at: number): DecodeError {
    return new DecodeError(makeDiagnostic("E0003", { maxDepth }, positionOf(src, at)));
  }

  const value = parseOne(0);
  const rest = toks[i];
  if (rest) throw malformed(src, rest.at, "unexpected trailing content");
  return value;
}
