import type { Diagnostic, DiagnosticSeverity, SourcePos } from "./diagnostic";

interface DiagCodeDef {
  code: string;
  severity: DiagnosticSeverity;
  category: string;
  template: string;
}

export const DIAGNOSTIC_CODES = {
  E0001: { code: "E0001", severity: "error", category: "Decode", template: "Malformed JSON: {detail}" },
  E0002: { code: "E0002", severity: "error", category: "Decode", template: "Number literal out of range: {literal}" },
  E0003: { code: "E0003", severity: "error", category: "Decode", template: "Nesting exceeds {maxDepth} levels" },
  E0004: { code: "E0004", severity: "error", category: "Decode", template: "Root value must be an object or array, got {actual}" },
  E0005: { code: "E0005", severity: "error", category: "Encode", template: "Cannot encode non-finite float: {value}" },

  E0100: { code: "E0100", severity: "error", category: "Root", template: "Root already bound as {expected}, cannot bind {actual}" },
  E0101: { code: "E0101", severity: "error", category: "Type", template: "Expected object or array, got {actual}" },
  E0102: { code: "E0102", severity: "error", category: "Type", template: "Containers have no string form: {actual}" },
  E0103: { code: "E0103", severity: "error", category: "Type", template: "Integer does not fit a safe JS number: {value}" },

  E0200: { code: "E0200", severity: "error", category: "Reference", template: "Unknown data reference: {path}" },
  E0201: { code: "E0201", severity: "error", category: "Reference", template: "Undefined constant: {name}" },

  E0300: { code: "E0300", severity: "error", category: "Coercion", template: "Unsupported type: {type}" },

  E0400: { code: "E0400", severity: "error", category: "Lifecycle", template: "Store has been disposed" },

  E0500: { code: "E0500", severity: "error", category: "Template", template: "Duplicate template: {path}" },
  E0501: { code: "E0501", severity: "error", category: "Template", template: "Unknown template: {key}" },
  E0502: { code: "E0502", severity: "error", category: "Template", template: "No templates root for prefix {prefix}: {path}" },

  E0600: { code: "E0600", severity: "error", category: "Config", template: "Invalid configuration: {detail}" },

} as const satisfies Record<string, DiagCodeDef>;

export type DiagnosticCode = keyof typeof DIAGNOSTIC_CODES;

export function makeDiagnostic(
  code: DiagnosticCode,
  params?: Record<string, string | number>,
  pos?: SourcePos
): Diagnostic {
  const def: DiagCodeDef = DIAGNOSTIC_CODES[code];

  let message = def.template;
  if (params) {
    for (const [key, value] of Object.entries(params)) {
      message = message.replace(`{${key}}`, String(value));
    }
  }

  return {
    code: def.code,
    severity: def.severity,
    message,
    pos,
    data: params,
  };
}
