import { encode } from "../codec/encode";
import { Store } from "./store";
import type { Value } from "./value";

/**
 * Deep copy through the codec: `value` is encoded to compact JSON and decoded
 * into `into` (a new store when omitted). The copy shares no nodes with the
 * source. The text comes from the encoder, so no nesting limit applies.
 */
export function clone(value: Value, into: Store = new Store()): Value {
  return into.decodeValue(encode(value), { maxDepth: Number.POSITIVE_INFINITY });
}
