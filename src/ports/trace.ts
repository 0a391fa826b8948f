/**
 * Trace event types emitted by a store and the template registry.
 */
export type TraceEvent =
  | { tag: "E_RootBound"; kind: "object" | "array" }
  | { tag: "E_Reset"; released: number }
  | { tag: "E_Decode"; bytes: number; durationMs: number }
  | { tag: "E_UnknownReference"; path: string }
  | { tag: "E_MissingConstant"; name: string }
  | { tag: "E_UnsupportedType"; type: string }
  | { tag: "E_TemplateRender"; key: string; durationMs: number };

export type TraceTag = TraceEvent["tag"];

/**
 * Trace sink for logging events.
 */
export interface TraceSink {
  emit(event: TraceEvent): void;
}

export const nullTrace: TraceSink = {
  emit(): void {},
};
