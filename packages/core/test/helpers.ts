import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import type { Label, SourceFile } from "../src/types.js";

export function makeLabels(names: readonly string[], file = "script.rpy"): Label[] {
  return names.map((name, i) => ({ name, file, line: i + 1, ordinal: i }));
}

export function numberedLabels(count: number, prefix = "label"): Label[] {
  return makeLabels(Array.from({ length: count }, (_, i) => `${prefix}_${i + 1}`));
}

export function sourceFile(relativePath: string, text: string): SourceFile {
  const lines = text.split("\n");
  if (lines[lines.length - 1] === "") lines.pop();
  return { path: `/virtual/${relativePath}`, relativePath, lines };
}

export function mkdtemp(prefix: string): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

export function writeTree(root: string, files: Record<string, string>): void {
  for (const [rel, content] of Object.entries(files)) {
    const full = path.join(root, rel);
    fs.mkdirSync(path.dirname(full), { recursive: true });
    fs.writeFileSync(full, content, "utf8");
  }
}

export function readTree(root: string): Record<string, string> {
  const out: Record<string, string> = {};
  for (const name of fs.readdirSync(root).sort()) {
    const full = path.join(root, name);
    if (fs.statSync(full).isFile()) out[name] = fs.readFileSync(full, "utf8");
  }
  return out;
}
