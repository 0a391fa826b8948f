import { DecodeError } from "../errors";
import { makeDiagnostic } from "../../outcome/codes";
import type { SourcePos } from "../../outcome/diagnostic";

export type Tok =
  | { tag: "LBrace"; at: number }
  | { tag: "RBrace"; at: number }
  | { tag: "LBracket"; at: number }
  | { tag: "RBracket"; at: number }
  | { tag: "Colon"; at: number }
  | { tag: "Comma"; at: number }
  | { tag: "Str"; at: number; s: string }
  | { tag: "Num"; at: number; text: string }
  | { tag: "True"; at: number }
  | { tag: "False"; at: number }
  | { tag: "Null"; at: number };

const NUMBER_RE = /-?(?:0|[1-9]\d*)(?:\.\d+)?(?:[eE][+-]?\d+)?/y;

const ESCAPES: Record<string, string> = {
  "\"": "\"",
  "\\": "\\",
  "/": "/",
  b: "\b",
  f: "\f",
  n: "\n",
  r: "\r",
  t: "\t",
};

export function positionOf(src: string, offset: number): SourcePos {
  let line = 1;
  let col = 1;
  for (let i = 0; i < offset && i < src.length; i++) {
    if (src[i] === "\n") {
      line++;
      col = 1;
    } else {
      col++;
    }
  }
  return { offset, line, col };
}

export function malformed(src: string, offset: number, detail: string): DecodeError {
  return new DecodeError(makeDiagnostic("E0001", { detail }, positionOf(src, offset)));
}

/**
 * Split JSON text into tokens. Number tokens keep their source text so the
 * decoder can tell integers from floats and read integers without rounding.
 */
export function tokenize(src: string): Tok[] {
  const toks: Tok[] = [];
  let i = 0;

  const isWS = (c: string) => c === " " || c === "\t" || c === "\n" || c === "\r";

  while (i < src.length) {
    const c = src[i];

    if (isWS(c)) { i++; continue; }

    if (c === "{") { toks.push({ tag: "LBrace", at: i }); i++; continue; }
    if (c === "}") { toks.push({ tag: "RBrace", at: i }); i++; continue; }
    if (c === "[") { toks.push({ tag: "LBracket", at: i }); i++; continue; }
    if (c === "]") { toks.push({ tag: "RBracket", at: i }); i++; continue; }
    if (c === ":") { toks.push({ tag: "Colon", at: i }); i++; continue; }
    if (c === ",") { toks.push({ tag: "Comma", at: i }); i++; continue; }

    if (c === "\"") {
      const start = i;
      i++;
      let s = "";
      let closed = false;
      while (i < src.length) {
        const d = src[i];
        if (d === "\"") { i++; closed = true; break; }
        if (d === "\\") {
          const e = src[i + 1];
          if (e === "u") {
            const hex = src.slice(i + 2, i + 6);
            if (!/^[0-9a-fA-F]{4}$/.test(hex)) throw malformed(src, i, "invalid \\u escape");
            s += String.fromCharCode(parseInt(hex, 16));
            i += 6;
            continue;
          }
          const mapped = e === undefined ? undefined : ESCAPES[e];
          if (mapped === undefined) throw malformed(src, i, "invalid escape sequence");
          s += mapped;
          i += 2;
          continue;
        }
        if (d.charCodeAt(0) < 0x20) throw malformed(src, i, "control character in string");
        s += d;
        i++;
      }
      if (!closed) throw malformed(src, start, "unterminated string");
      toks.push({ tag: "Str", at: start, s });
      continue;
    }

    if (c === "-" || (c >= "0" && c <= "9")) {
      NUMBER_RE.lastIndex = i;
      const m = NUMBER_RE.exec(src);
      if (!m) throw malformed(src, i, "invalid number");
      const text = m[0];
      const after = src[i + text.length];
      if (after !== undefined && /[0-9.eE+\-]/.test(after)) throw malformed(src, i, "invalid number");
      toks.push({ tag: "Num", at: i, text });
      i += text.length;
      continue;
    }

    if (src.startsWith("true", i)) { toks.push({ tag: "True", at: i }); i += 4; continue; }
    if (src.startsWith("false", i)) { toks.push({ tag: "False", at: i }); i += 5; continue; }
    if (src.startsWith("null", i)) { toks.push({ tag: "Null", at: i }); i += 4; continue; }

    throw malformed(src, i, `unexpected character '${c}'`);
  }

  return toks;
}
