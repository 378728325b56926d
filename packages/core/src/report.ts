import type { RpyError } from "./errors.js";

export interface SourceSummary {
  file: string;
  labels: number;
  // Script statements emitted for a screenplay; null for indexed .rpy files.
  lines: number | null;
}

export interface RunReport {
  command: "index" | "generate";
  inputDir: string;
  outputDir: string;
  sources: SourceSummary[];
  labels: number;
  characters: number;
  written: string[];
  removed: string[];
  warnings: RpyError[];
  errors: RpyError[];
}

export function splitBySeverity(diagnostics: readonly RpyError[]): { warnings: RpyError[]; errors: RpyError[] } {
  return {
    warnings: diagnostics.filter((d) => d.severity === "warning"),
    errors: diagnostics.filter((d) => d.severity === "error"),
  };
}

export function reportSucceeded(report: RunReport): boolean {
  return report.errors.length === 0;
}
