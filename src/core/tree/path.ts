import type { Value } from "./value";

const INDEX_RE = /^\d+$/;

export function splitPath(path: string): string[] {
  return path.split(".");
}

/**
 * Walk a dotted path from `start`.
 *
 * Objects consume a segment as a key and arrays as a decimal index; a missing
 * key, a non-numeric or out-of-range index gives `null`. A scalar reached
 * before the segments run out is returned as-is and the rest of the path is
 * ignored.
 */
export function resolvePath(start: Value, path: string): Value | null {
  let current = start;

  for (const segment of splitPath(path)) {
    switch (current.tag) {
      case "object": {
        const next = current.entries.get(segment);
        if (!next) return null;
        current = next;
        break;
      }
      case "array": {
        if (!INDEX_RE.test(segment)) return null;
        const next = current.items[Number(segment)];
        if (!next) return null;
        current = next;
        break;
      }
      case "string":
      case "integer":
      case "float":
      case "boolean":
      case "null":
        return current;
    }
  }

  return current;
}
