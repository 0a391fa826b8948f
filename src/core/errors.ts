import type { Diagnostic, SourcePos } from "../outcome/diagnostic";
import { makeDiagnostic } from "../outcome/codes";

export type TreeErrorCode =
  | "IncompatibleRootType"
  | "UnknownReference"
  | "UnsupportedType"
  | "MissingConstant"
  | "DecodeError"
  | "EncodeError"
  | "NotAContainer"
  | "NotAScalar"
  | "IntegerOverflow"
  | "StoreDisposed"
  | "DuplicateTemplate"
  | "UnknownTemplate"
  | "InvalidConfig";

// Error Classes
export class TreeError extends Error {
  constructor(
    message: string,
    public readonly code: TreeErrorCode,
    public readonly diagnostic: Diagnostic
  ) {
    super(message);
    this.name = "TreeError";
  }
}

export class IncompatibleRootTypeError extends TreeError {
  constructor(
    public readonly expected: "object" | "array",
    public readonly actual: "object" | "array"
  ) {
    const diag = makeDiagnostic("E0100", { expected, actual });
    super(diag.message, "IncompatibleRootType", diag);
    this.name = "IncompatibleRootTypeError";
  }
}

export class UnknownReferenceError extends TreeError {
  constructor(public readonly path: string) {
    const diag = makeDiagnostic("E0200", { path });
    super(diag.message, "UnknownReference", diag);
    this.name = "UnknownReferenceError";
  }
}

export class UnsupportedTypeError extends TreeError {
  constructor(public readonly typeName: string) {
    const diag = makeDiagnostic("E0300", { type: typeName });
    super(diag.message, "UnsupportedType", diag);
    this.name = "UnsupportedTypeError";
  }
}

export class MissingConstantError extends TreeError {
  constructor(public readonly constName: string) {
    const diag = makeDiagnostic("E0201", { name: constName });
    super(`${diag.message} - call addConst() before rendering`, "MissingConstant", diag);
    this.name = "MissingConstantError";
  }
}

export class DecodeError extends TreeError {
  constructor(diag: Diagnostic) {
    const where = diag.pos ? ` at line ${diag.pos.line}, column ${diag.pos.col}` : "";
    super(`${diag.message}${where}`, "DecodeError", diag);
    this.name = "DecodeError";
  }

  get pos(): SourcePos | undefined {
    return this.diagnostic.pos;
  }
}

export class EncodeError extends TreeError {
  constructor(value: number) {
    const diag = makeDiagnostic("E0005", { value: String(value) });
    super(diag.message, "EncodeError", diag);
    this.name = "EncodeError";
  }
}

export class NotAContainerError extends TreeError {
  constructor(actual: string) {
    const diag = makeDiagnostic("E0101", { actual });
    super(diag.message, "NotAContainer", diag);
    this.name = "NotAContainerError";
  }
}

export class NotAScalarError extends TreeError {
  constructor(actual: "object" | "array") {
    const diag = makeDiagnostic("E0102", { actual });
    super(diag.message, "NotAScalar", diag);
    this.name = "NotAScalarError";
  }
}

export class IntegerOverflowError extends TreeError {
  constructor(value: bigint) {
    const diag = makeDiagnostic("E0103", { value: value.toString() });
    super(diag.message, "IntegerOverflow", diag);
    this.name = "IntegerOverflowError";
  }
}

export class StoreDisposedError extends TreeError {
  constructor() {
    const diag = makeDiagnostic("E0400");
    super(diag.message, "StoreDisposed", diag);
    this.name = "StoreDisposedError";
  }
}

export class DuplicateTemplateError extends TreeError {
  constructor(path: string) {
    const diag = makeDiagnostic("E0500", { path });
    super(diag.message, "DuplicateTemplate", diag);
    this.name = "DuplicateTemplateError";
  }
}

export class UnknownTemplateError extends TreeError {
  constructor(key: string) {
    const diag = makeDiagnostic("E0501", { key });
    super(diag.message, "UnknownTemplate", diag);
    this.name = "UnknownTemplateError";
  }
}

export class InvalidConfigError extends TreeError {
  constructor(public readonly problems: string[]) {
    const diag = makeDiagnostic("E0600", { detail: problems.join("; ") });
    super(diag.message, "InvalidConfig", diag);
    this.name = "InvalidConfigError";
  }
}

export function isTreeError(e: unknown, code?: TreeErrorCode): e is TreeError {
  return e instanceof TreeError && (code === undefined || e.code === code);
}
