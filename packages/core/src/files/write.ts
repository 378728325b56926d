import fs from "node:fs";
import path from "node:path";

import { SCRIPT_EXTENSION } from "../defaults.js";
import { InvalidConfigurationError } from "../errors.js";
import type { GeneratedFile, SourceFile } from "../types.js";

function escapeRegExp(raw: string): string {
  return raw.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/** Matches menu page file names: `<prefix><n>.rpy`. */
export function pageFilePattern(prefix: string): RegExp {
  return new RegExp(`^${escapeRegExp(prefix)}\\d+${escapeRegExp(SCRIPT_EXTENSION)}$`);
}

function writeAtomic(filePath: string, content: string): void {
  const tmp = `${filePath}.tmp-${process.pid}-${Date.now()}`;
  try {
    fs.writeFileSync(tmp, content, "utf8");
    fs.renameSync(tmp, filePath);
  } catch (err) {
    fs.rmSync(tmp, { force: true });
    const reason = err instanceof Error ? err.message : String(err);
    throw new Error(`Failed to write ${filePath}: ${reason}`);
  }
}

/** Fails before anything is written when an output would replace a collected source file. */
export function assertNoSourceOverwrite(
  outputDir: string,
  files: readonly GeneratedFile[],
  sources: readonly SourceFile[],
): void {
  const byPath = new Map(sources.map((s) => [s.path, s]));
  for (const f of files) {
    const source = byPath.get(path.join(outputDir, f.fileName));
    if (!source) continue;
    throw new InvalidConfigurationError(
      `Output ${f.fileName} would overwrite a source script; choose another file name prefix or output directory`,
      { file: source.relativePath, line: null },
    );
  }
}

/** Writes every file into `outputDir` (created when missing); returns the written paths. */
export function writeGeneratedFiles(outputDir: string, files: readonly GeneratedFile[]): string[] {
  fs.mkdirSync(outputDir, { recursive: true });
  const written: string[] = [];
  for (const f of files) {
    const target = path.join(outputDir, f.fileName);
    writeAtomic(target, f.content);
    written.push(target);
  }
  return written;
}

/**
 * True when the file still opens with the `label <stem>:` line the menu emitter
 * writes. An unreadable file is not ours; the collector reports it.
 */
export function looksGenerated(filePath: string): boolean {
  const label = path.basename(filePath).replace(/\.[^.]+$/, "");
  let firstLine: string | undefined;
  try {
    firstLine = fs.readFileSync(filePath, "utf8").replace(/^\ufeff/, "").split(/\r?\n/, 1)[0];
  } catch {
    return false;
  }
  return firstLine === `label ${label}:`;
}

/**
 * Deletes files in `outputDir` whose name matches `pattern` but which this run
 * did not produce, so page files from a larger earlier run do not linger.
 * Only files that still open with their own generated label are touched.
 */
export function removeStaleFiles(outputDir: string, pattern: RegExp, keep: readonly GeneratedFile[]): string[] {
  if (!fs.existsSync(outputDir)) return [];
  const keepNames = new Set(keep.map((f) => f.fileName));
  const removed: string[] = [];
  const names = fs
    .readdirSync(outputDir, { withFileTypes: true })
    .filter((e) => e.isFile() && pattern.test(e.name) && !keepNames.has(e.name))
    .map((e) => e.name)
    .sort();
  for (const name of names) {
    const target = path.join(outputDir, name);
    if (!looksGenerated(target)) continue;
    fs.rmSync(target);
    removed.push(target);
  }
  return removed;
}
