import { DuplicateLabelError, InvalidConfigurationError } from "../errors.js";
import type { Label } from "../types.js";

export interface AggregatedLabels {
  labels: Label[];
  duplicates: DuplicateLabelError[];
}

/**
 * Merges per-file label lists (already in file order) into one corpus.
 * A name declared more than once is reported once and left out entirely.
 */
export function aggregateLabels(perFile: ReadonlyArray<readonly Label[]>): AggregatedLabels {
  const all = perFile.flat().map((l, ordinal) => ({ ...l, ordinal }));

  const byName = new Map<string, Label[]>();
  for (const label of all) {
    const group = byName.get(label.name) ?? [];
    group.push(label);
    byName.set(label.name, group);
  }

  const duplicates: DuplicateLabelError[] = [];
  for (const [name, group] of byName) {
    if (group.length > 1) duplicates.push(new DuplicateLabelError(name, group));
  }

  const labels = all
    .filter((l) => (byName.get(l.name)?.length ?? 0) === 1)
    .map((l, ordinal) => ({ ...l, ordinal }));

  return { labels, duplicates };
}

/** Fails when a collected label would clash with a label the menu emitter generates. */
export function assertNoGeneratedLabelClash(labels: readonly Label[], generated: readonly string[]): void {
  const reserved = new Set(generated);
  const clash = labels.find((l) => reserved.has(l.name));
  if (!clash) return;
  throw new InvalidConfigurationError(
    `Label "${clash.name}" is also a generated menu label; choose another main label or file name prefix`,
    { file: clash.file, line: clash.line },
  );
}
