import type { Done, Fail } from "./outcome";
import type { Failure } from "./failure";
import { failure } from "./failure";
import { makeDiagnostic } from "./codes";
import type { Diagnostic } from "./diagnostic";

export function done<A>(value: A): Done<A> {
  return { tag: "Done", value };
}

export function fail(f: Failure): Fail {
  return { tag: "Fail", failure: f };
}

export function unknownReference(path: string): Fail {
  return fail(
    failure("unknown-reference", `Unknown data reference: ${path}`, {
      diagnostics: [makeDiagnostic("E0200", { path })],
      context: { path },
      recoverable: true,
    })
  );
}

export function duplicateTemplate(path: string, prefix: string, key: string): Fail {
  return fail(
    failure("duplicate-template", `Duplicate template: ${path}`, {
      diagnostics: [makeDiagnostic("E0500", { path })],
      context: { prefix, key },
      recoverable: false,
    })
  );
}

export function unknownTemplateRoot(prefix: string, path: string): Fail {
  return fail(
    failure("unknown-template-root", `No templates root for prefix ${prefix}: ${path}`, {
      diagnostics: [makeDiagnostic("E0502", { prefix, path })],
      context: { prefix, path },
      recoverable: false,
    })
  );
}

export function missingConstant(name: string): Fail {
  return fail(
    failure("missing-constant", `Undefined constant: ${name}`, {
      diagnostics: [makeDiagnostic("E0201", { name })],
      context: { name },
      recoverable: false,
    })
  );
}

/** Wrap a decode error; `message` keeps the source position. */
export function decodeFailed(message: string, diagnostic: Diagnostic): Fail {
  return fail(
    failure("decode-failed", message, {
      diagnostics: [diagnostic],
      context: diagnostic.pos ? { ...diagnostic.pos } : undefined,
      recoverable: false,
    })
  );
}
