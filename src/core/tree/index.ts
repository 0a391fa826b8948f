export * from "./value";
export { Arena } from "./arena";
export {
  put,
  append,
  get,
  at,
  contains,
  getT,
  unwrapAs,
  count,
  chain,
  entries,
  iterator,
  ArrayCursor,
  eql,
  valueToString,
  type Entry,
} from "./ops";
export { resolvePath, splitPath } from "./path";
export { Store, type StoreOptions } from "./store";
export { clone } from "./clone";
