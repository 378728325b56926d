import fs from "node:fs";
import path from "node:path";

import { FileReadError, InputNotFoundError } from "../errors.js";
import type { SourceFile } from "../types.js";
import { splitSourceLines } from "./text.js";

export interface CollectOptions {
  extension: string;
  // Absolute paths to leave out, e.g. files a previous run generated.
  exclude?: (absolutePath: string) => boolean;
}

export interface CollectResult {
  files: SourceFile[];
  errors: FileReadError[];
}

export function compareCodePoints(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

export function assertInputDir(inputDir: string): string {
  const abs = path.resolve(inputDir);
  let stat: fs.Stats;
  try {
    stat = fs.statSync(abs);
  } catch {
    throw new InputNotFoundError(abs);
  }
  if (!stat.isDirectory()) throw new InputNotFoundError(abs);
  return abs;
}

function walk(rootDir: string, dir: string, extension: string, out: string[], errors: FileReadError[]): void {
  let entries: fs.Dirent[];
  try {
    entries = fs.readdirSync(dir, { withFileTypes: true });
  } catch (err) {
    errors.push(new FileReadError(path.relative(rootDir, dir) || ".", err));
    return;
  }

  for (const entry of entries) {
    const fullPath = path.join(dir, entry.name);
    if (entry.isDirectory()) {
      walk(rootDir, fullPath, extension, out, errors);
      continue;
    }
    if (!entry.isFile() && !entry.isSymbolicLink()) continue;
    if (!entry.name.toLowerCase().endsWith(extension)) continue;
    out.push(fullPath);
  }
}

function toRelative(rootDir: string, fullPath: string): string {
  return path.relative(rootDir, fullPath).split(path.sep).join("/");
}

/**
 * Finds every file below `inputDir` with the given extension, sorted by
 * relative path. Files that cannot be read are reported and skipped.
 */
export function collectSourceFiles(inputDir: string, opts: CollectOptions): CollectResult {
  const rootDir = assertInputDir(inputDir);
  const extension = opts.extension.toLowerCase();
  const errors: FileReadError[] = [];
  const candidates: string[] = [];
  walk(rootDir, rootDir, extension, candidates, errors);

  const sorted = candidates
    .filter((p) => !(opts.exclude?.(p) ?? false))
    .map((p) => ({ fullPath: p, relativePath: toRelative(rootDir, p) }))
    .sort((a, b) => compareCodePoints(a.relativePath, b.relativePath));

  const files: SourceFile[] = [];
  for (const { fullPath, relativePath } of sorted) {
    let raw: string;
    try {
      raw = fs.readFileSync(fullPath, "utf8");
    } catch (err) {
      errors.push(new FileReadError(relativePath, err));
      continue;
    }
    files.push({ path: fullPath, relativePath, lines: splitSourceLines(raw) });
  }

  return { files, errors };
}
