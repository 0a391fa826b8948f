import type { Value } from "../tree/value";
import { formatFloatJson } from "./number";

export interface EncodeOptions {
  pretty?: boolean;
  /** Spaces per nesting level when pretty. */
  indent?: number;
}

/**
 * JSON string literal for `s`. Escapes quotes, backslashes and every control
 * character below U+0020.
 */
export function encodeString(s: string): string {
  let out = "\"";
  for (let i = 0; i < s.length; i++) {
    const c = s.charCodeAt(i);
    switch (c) {
      case 0x22: out += "\\\""; break;
      case 0x5c: out += "\\\\"; break;
      case 0x08: out += "\\b"; break;
      case 0x0c: out += "\\f"; break;
      case 0x0a: out += "\\n"; break;
      case 0x0d: out += "\\r"; break;
      case 0x09: out += "\\t"; break;
      default:
        out += c < 0x20 ? `\\u${c.toString(16).padStart(4, "0")}` : s[i];
    }
  }
  return out + "\"";
}

/**
 * Append the JSON text of `value` to `buf`.
 */
export function writeJson(buf: string[], value: Value, pretty: boolean, indent: string, level: number): void {
  switch (value.tag) {
    case "object": {
      buf.push("{");
      if (pretty) buf.push("\n");
      let index = 0;
      const size = value.entries.size;
      for (const [key, child] of value.entries) {
        if (pretty) buf.push(indent.repeat(level + 1));
        buf.push(encodeString(key), ":");
        if (pretty) buf.push(" ");
        writeJson(buf, child, pretty, indent, level + 1);
        index++;
        if (index < size) buf.push(",");
        if (pretty) buf.push("\n");
      }
      if (pretty) buf.push(indent.repeat(level));
      buf.push("}");
      return;
    }
    case "array": {
      buf.push("[");
      if (pretty) buf.push("\n");
      value.items.forEach((child, index) => {
        if (pretty) buf.push(indent.repeat(level + 1));
        writeJson(buf, child, pretty, indent, level + 1);
        if (index < value.items.length - 1) buf.push(",");
        if (pretty) buf.push("\n");
      });
      if (pretty) buf.push(indent.repeat(level));
      buf.push("]");
      return;
    }
    case "string":
      buf.push(encodeString(value.value));
      return;
    case "integer":
      buf.push(value.value.toString());
      return;
    case "float":
      buf.push(formatFloatJson(value.value));
      return;
    case "boolean":
      buf.push(value.value ? "true" : "false");
      return;
    case "null":
      buf.push("null");
      return;
  }
}

/**
 * Encode a single value (and everything below it) to JSON text.
 */
export function encode(value: Value, options?: EncodeOptions): string {
  const buf: string[] = [];
  writeJson(buf, value, options?.pretty ?? false, " ".repeat(options?.indent ?? 2), 0);
  return buf.join("");
}
