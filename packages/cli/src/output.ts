import { formatDiagnostic } from "@renpy-scribe/core";
import type { RpyError, RunReport } from "@renpy-scribe/core";

export function printJson(obj: unknown): void {
  process.stdout.write(`${JSON.stringify(obj)}\n`);
}

function diagnosticToJson(d: RpyError): Record<string, unknown> {
  return {
    code: d.code,
    type: d.name,
    message: d.message,
    file: d.location?.file ?? null,
    line: d.location?.line ?? null,
  };
}

export function reportToJson(report: RunReport): Record<string, unknown> {
  return {
    ok: report.errors.length === 0,
    command: report.command,
    input_dir: report.inputDir,
    output_dir: report.outputDir,
    sources: report.sources,
    labels: report.labels,
    characters: report.characters,
    written: report.written,
    removed: report.removed,
    warnings: report.warnings.map(diagnosticToJson),
    errors: report.errors.map(diagnosticToJson),
  };
}

function plural(n: number, word: string): string {
  return `${n} ${word}${n === 1 ? "" : "s"}`;
}

export function printReport(report: RunReport, json: boolean): void {
  if (json) {
    printJson(reportToJson(report));
    return;
  }

  for (const s of report.sources) {
    const lines = s.lines === null ? "" : ` lines: ${s.lines}`;
    console.log(`source: ${s.file} labels: ${s.labels}${lines}`);
  }
  for (const p of report.written) console.log(`target: ${p}`);
  for (const p of report.removed) console.log(`removed: ${p}`);

  for (const w of report.warnings) console.error(`warning: ${formatDiagnostic(w)}`);
  for (const e of report.errors) console.error(`error: ${formatDiagnostic(e)}`);

  console.log("");
  if (report.command === "index") {
    console.log(`Processed ${plural(report.sources.length, ".rpy file")} - total labels: ${report.labels}`);
  } else {
    const totalLines = report.sources.reduce((sum, s) => sum + (s.lines ?? 0), 0);
    console.log(`Processed ${plural(report.sources.length, ".txt file")} - total labels: ${report.labels}`);
    console.log(`Found ${plural(report.characters, "character")}`);
    console.log(`Total script lines: ${totalLines}`);
  }
  if (report.written.length === 0) console.log("Nothing written.");
  console.log(`${plural(report.warnings.length, "warning")}, ${plural(report.errors.length, "error")}`);
}
