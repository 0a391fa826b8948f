export { encode, encodeString, writeJson, type EncodeOptions } from "./encode";
export { decode, type DecodeOptions } from "./decode";
export { formatDecimal, formatFloatJson } from "./number";
export { tokenize, type Tok } from "./tokenize";
