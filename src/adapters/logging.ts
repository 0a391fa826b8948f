import type { TraceEvent, TraceSink } from "../ports/trace";
import { nullTrace } from "../ports/trace";
import type { TraceConfig } from "../core/config";

/**
 * Render a trace event as a single log line.
 */
export function formatTraceEvent(event: TraceEvent): string {
  switch (event.tag) {
    case "E_RootBound":
      return `root bound as ${event.kind}`;
    case "E_Reset":
      return `reset, released ${event.released} node(s)`;
    case "E_Decode":
      return `decoded ${event.bytes} byte(s) in ${event.durationMs}ms`;
    case "E_UnknownReference":
      return `Unknown data reference: \`${event.path}\``;
    case "E_MissingConstant":
      return `Undefined constant: \`${event.name}\` - must call addConst() before rendering`;
    case "E_UnsupportedType":
      return `Unsupported type: ${event.type}`;
    case "E_TemplateRender":
      return `rendered ${event.key} in ${event.durationMs}ms`;
  }
}

/**
 * Sink that writes each event to stderr (or the given writer) with a prefix.
 */
export function consoleTrace(
  prefix = "[valtree]",
  write: (line: string) => void = line => console.error(line)
): TraceSink {
  return {
    emit(event: TraceEvent): void {
      write(`${prefix} ${formatTraceEvent(event)}`);
    },
  };
}

export interface RecordingTrace extends TraceSink {
  readonly events: TraceEvent[];
  clear(): void;
}

/**
 * Sink that keeps every event in memory.
 */
export function recordingTrace(): RecordingTrace {
  const events: TraceEvent[] = [];
  return {
    events,
    emit(event: TraceEvent): void {
      events.push(event);
    },
    clear(): void {
      events.length = 0;
    },
  };
}

export function traceFromConfig(config: TraceConfig): TraceSink {
  return config.enabled ? consoleTrace(config.prefix) : nullTrace;
}
