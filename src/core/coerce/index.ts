export {
  classify,
  coerceString,
  coerceValue,
  isTreeValue,
  type Classified,
  type CoerceKind,
  type CoerceMap,
  type SourceKind,
} from "./coerce";
