export type DiagnosticSeverity = "error" | "warning" | "info";

/** Position in JSON source text (0-based offset, 1-based line and column). */
export interface SourcePos {
  offset: number;
  line: number;
  col: number;
}

export interface Diagnostic {
  code: string;
  severity: DiagnosticSeverity;
  message: string;
  pos?: SourcePos;
  data?: Record<string, unknown>;
}
