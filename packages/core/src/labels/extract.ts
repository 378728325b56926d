import type { Label, SourceFile } from "../types.js";

// Top-level declarations only: `label name:`, `label name(args):`, `label global.local:`.
const LABEL_DECLARATION = /^label\s+([A-Za-z_]\w*(?:\.[A-Za-z_]\w*)?)\s*(?:\([^)]*\))?\s*(?:hide\s*)?:/;

export function extractLabelName(line: string): string | null {
  const m = LABEL_DECLARATION.exec(line);
  return m?.[1] ?? null;
}

/** Labels of one file in line order; `ordinal` is file-local until aggregated. */
export function extractLabels(source: SourceFile): Label[] {
  const labels: Label[] = [];
  source.lines.forEach((line, i) => {
    const name = extractLabelName(line);
    if (name) labels.push({ name, file: source.relativePath, line: i + 1, ordinal: labels.length });
  });
  return labels;
}
