import type { Label } from "./types.js";

export type RpyErrorCode =
  | "INPUT_NOT_FOUND"
  | "FILE_READ"
  | "DUPLICATE_LABEL"
  | "INVALID_CONFIGURATION"
  | "IDENTIFIER_COLLISION"
  | "STRUCTURAL_ORDER";

// "warning" never fails a run; "error" means the output is incomplete.
export type Severity = "warning" | "error";

export interface SourceLocation {
  file: string;
  line: number | null;
}

export class RpyError extends Error {
  public readonly code: RpyErrorCode;
  public readonly severity: Severity;
  public readonly location: SourceLocation | null;

  constructor(code: RpyErrorCode, message: string, opts: { severity?: Severity; location?: SourceLocation | null } = {}) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.severity = opts.severity ?? "error";
    this.location = opts.location ?? null;
  }
}

export class InputNotFoundError extends RpyError {
  public readonly inputPath: string;

  constructor(inputPath: string) {
    super("INPUT_NOT_FOUND", `Input directory not found: ${inputPath}`);
    this.inputPath = inputPath;
  }
}

export class FileReadError extends RpyError {
  constructor(filePath: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super("FILE_READ", `Cannot read file: ${reason}`, { severity: "warning", location: { file: filePath, line: null } });
  }
}

export class DuplicateLabelError extends RpyError {
  public readonly labelName: string;
  public readonly occurrences: Label[];

  constructor(labelName: string, occurrences: Label[]) {
    const where = occurrences.map(formatLabelOrigin).join(", ");
    const first = occurrences[0];
    super("DUPLICATE_LABEL", `Duplicate label "${labelName}" (${where}); excluded from the menu`, {
      location: first ? { file: first.file, line: first.line } : null,
    });
    this.labelName = labelName;
    this.occurrences = occurrences;
  }
}

export class InvalidConfigurationError extends RpyError {
  constructor(message: string, location: SourceLocation | null = null) {
    super("INVALID_CONFIGURATION", message, { location });
  }
}

export class IdentifierCollisionError extends RpyError {
  public readonly displayName: string;
  public readonly wanted: string;
  public readonly assigned: string;

  constructor(displayName: string, wanted: string, assigned: string, takenBy: string) {
    super(
      "IDENTIFIER_COLLISION",
      `Character "${displayName}" maps to identifier "${wanted}" already used by "${takenBy}"; using "${assigned}"`,
      { severity: "warning" },
    );
    this.displayName = displayName;
    this.wanted = wanted;
    this.assigned = assigned;
  }
}

export class StructuralOrderError extends RpyError {
  constructor(file: string, line: number) {
    super("STRUCTURAL_ORDER", "Script content before the first label marker", { location: { file, line } });
  }
}

function formatLabelOrigin(label: Label): string {
  return label.line === null ? label.file : `${label.file}:${label.line}`;
}

export function formatDiagnostic(err: RpyError): string {
  if (!err.location) return err.message;
  const where = err.location.line === null ? err.location.file : `${err.location.file}:${err.location.line}`;
  return `${where}: ${err.message}`;
}
