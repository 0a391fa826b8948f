// src/index.ts
// valtree - Public API

// ═══════════════════════════════════════════════════════════════════════════════
// VALUE TREE
// ═══════════════════════════════════════════════════════════════════════════════

export * from "./core/tree";

// ═══════════════════════════════════════════════════════════════════════════════
// CODEC & COERCION
// ═══════════════════════════════════════════════════════════════════════════════

export * from "./core/codec";
export * from "./core/coerce";
export { strip, chomp, chompLeading } from "./core/output/text";

// ═══════════════════════════════════════════════════════════════════════════════
// ERRORS & OUTCOMES
// ═══════════════════════════════════════════════════════════════════════════════

export * from "./core/errors";
export type { Outcome, Done, Fail } from "./outcome/outcome";
export { isDone, isFail } from "./outcome/outcome";
export {
  done,
  fail,
  unknownReference,
  duplicateTemplate,
  unknownTemplateRoot,
  missingConstant,
  decodeFailed,
} from "./outcome/constructors";
export { match, mapOutcome, unwrap, unwrapOr } from "./outcome/matchers";
export { failure, isFailureReason, type Failure, type FailureReason } from "./outcome/failure";
export type { Diagnostic, DiagnosticSeverity, SourcePos } from "./outcome/diagnostic";
export { DIAGNOSTIC_CODES, makeDiagnostic, type DiagnosticCode } from "./outcome/codes";

// ═══════════════════════════════════════════════════════════════════════════════
// CONFIGURATION & TRACE
// ═══════════════════════════════════════════════════════════════════════════════

export * from "./core/config";
export type { TraceEvent, TraceSink, TraceTag } from "./ports/trace";
export { nullTrace } from "./ports/trace";
export { consoleTrace, formatTraceEvent, recordingTrace, traceFromConfig, type RecordingTrace } from "./adapters/logging";

// ═══════════════════════════════════════════════════════════════════════════════
// TEMPLATES
// ═══════════════════════════════════════════════════════════════════════════════

export * from "./manifest";
