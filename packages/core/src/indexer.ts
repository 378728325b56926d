import path from "node:path";

import { DEFAULT_INDEX_MAIN_LABEL, SCRIPT_EXTENSION } from "./defaults.js";
import type { DuplicateLabelError, RpyError } from "./errors.js";
import { assertInputDir, collectSourceFiles } from "./files/collect.js";
import { assertNoSourceOverwrite, looksGenerated, pageFilePattern, removeStaleFiles, writeGeneratedFiles } from "./files/write.js";
import { aggregateLabels, assertNoGeneratedLabelClash } from "./labels/aggregate.js";
import { extractLabels } from "./labels/extract.js";
import { normalizeLabel } from "./labels/normalize.js";
import { buildJumpMenus } from "./menu/emit.js";
import { IndexOptionsSchema, parseOptions } from "./options.js";
import type { IndexOptionsInput } from "./options.js";
import { splitBySeverity } from "./report.js";
import type { RunReport, SourceSummary } from "./report.js";
import type { GeneratedFile, Label, SourceFile } from "./types.js";

export interface IndexPlanOptions {
  mainLabel: string;
  fileNamePrefix: string;
  labelPageSize: number;
}

export interface IndexPlan {
  labels: Label[];
  files: GeneratedFile[];
  sources: SourceSummary[];
  duplicates: DuplicateLabelError[];
}

/** Pure part of an index run: collected files in, generated menu files out. */
export function planIndex(sources: readonly SourceFile[], opts: IndexPlanOptions): IndexPlan {
  const perFile = sources.map(extractLabels);
  const { labels, duplicates } = aggregateLabels(perFile);

  const menus = buildJumpMenus(labels, {
    mainLabel: opts.mainLabel,
    pagePrefix: opts.fileNamePrefix,
    pageSize: opts.labelPageSize,
  });
  assertNoGeneratedLabelClash(perFile.flat(), menus.generatedLabels);

  const files: GeneratedFile[] = [{ fileName: `${opts.mainLabel}${SCRIPT_EXTENSION}`, content: menus.main }, ...menus.pages];
  const summaries = sources.map((s, i) => ({ file: s.relativePath, labels: perFile[i]?.length ?? 0, lines: null }));
  return { labels, files, sources: summaries, duplicates };
}

/**
 * Collects labels from every .rpy file below the input directory and writes
 * the jump-menu tree into the output directory.
 */
export function indexScripts(raw: IndexOptionsInput): RunReport {
  const options = parseOptions(IndexOptionsSchema, raw);
  const mainLabel = normalizeLabel(options.mainLabel, DEFAULT_INDEX_MAIN_LABEL);
  const inputDir = assertInputDir(options.inputDir);
  const outputDir = path.resolve(options.outputDir ?? process.cwd());
  const pagePattern = pageFilePattern(options.fileNamePrefix);

  // Our own output must not be indexed again when it lives inside the input tree.
  // A user script that only shares the name is still indexed.
  const isOwnOutput = (p: string): boolean => {
    if (path.dirname(p) !== outputDir) return false;
    const name = path.basename(p);
    if (name !== `${mainLabel}${SCRIPT_EXTENSION}` && !pagePattern.test(name)) return false;
    return looksGenerated(p);
  };

  const collected = collectSourceFiles(inputDir, { extension: SCRIPT_EXTENSION, exclude: isOwnOutput });
  const plan = planIndex(collected.files, { ...options, mainLabel });

  const diagnostics: RpyError[] = [...collected.errors, ...plan.duplicates];
  const { warnings, errors } = splitBySeverity(diagnostics);

  if (collected.files.length === 0) {
    return {
      command: "index",
      inputDir,
      outputDir,
      sources: [],
      labels: 0,
      characters: 0,
      written: [],
      removed: [],
      warnings,
      errors,
    };
  }

  assertNoSourceOverwrite(outputDir, plan.files, collected.files);
  const written = writeGeneratedFiles(outputDir, plan.files);
  const removed = removeStaleFiles(outputDir, pagePattern, plan.files);

  return {
    command: "index",
    inputDir,
    outputDir,
    sources: plan.sources,
    labels: plan.labels.length,
    characters: 0,
    written,
    removed,
    warnings,
    errors,
  };
}
