import path from "node:path";

import { DEFAULT_GENERATE_MAIN_LABEL, SCREENPLAY_EXTENSION, SCRIPT_EXTENSION } from "./defaults.js";
import type { RpyError } from "./errors.js";
import { assertInputDir, collectSourceFiles } from "./files/collect.js";
import { pageFilePattern, removeStaleFiles, writeGeneratedFiles } from "./files/write.js";
import { aggregateLabels, assertNoGeneratedLabelClash } from "./labels/aggregate.js";
import { normalizeLabel } from "./labels/normalize.js";
import { buildJumpMenus } from "./menu/emit.js";
import { GenerateOptionsSchema, parseOptions } from "./options.js";
import type { GenerateOptionsInput } from "./options.js";
import { splitBySeverity } from "./report.js";
import type { RunReport, SourceSummary } from "./report.js";
import { emptyScreenplayConfig, loadScreenplayConfig } from "./screenplay/config.js";
import type { ScreenplayConfig } from "./screenplay/config.js";
import { renderInitBlock, renderScreenplayScript } from "./screenplay/emit.js";
import { parseScreenplay } from "./screenplay/parse.js";
import type { ParsedScreenplay } from "./screenplay/parse.js";
import { buildCharacterRegistry } from "./screenplay/registry.js";
import type { CharacterRegistry } from "./screenplay/registry.js";
import type { GeneratedFile, Label, SourceFile } from "./types.js";

export interface GeneratePlanOptions {
  mainLabel: string;
  labelPageSize: number;
  requireLabels: boolean;
  registerMod: boolean;
}

export interface ChapterPlan {
  source: string;
  fileName: string;
  // Label synthesized from the file name; null when the file brings its own.
  chapterLabel: string | null;
  parsed: ParsedScreenplay;
}

export interface GeneratePlan {
  chapters: ChapterPlan[];
  registry: CharacterRegistry;
  labels: Label[];
  files: GeneratedFile[];
  sources: SourceSummary[];
  diagnostics: RpyError[];
}

/** "act1/Intro.txt" -> "act1_Intro" */
export function scriptStem(relativePath: string): string {
  const withoutExt = relativePath.replace(/\.[^./]*$/, "");
  const stem = withoutExt.replace(/^\.+|\.+$/g, "").split("/").join("_");
  return stem || "script";
}

function uniqueFileName(stem: string, used: Set<string>): string {
  let name = `${stem}${SCRIPT_EXTENSION}`;
  for (let n = 2; used.has(name); n += 1) name = `${stem}_${n}${SCRIPT_EXTENSION}`;
  used.add(name);
  return name;
}

function chapterLabels(chapter: ChapterPlan): Label[] {
  const labels: Label[] = [];
  if (chapter.chapterLabel) labels.push({ name: chapter.chapterLabel, file: chapter.source, line: null, ordinal: 0 });
  for (const el of chapter.parsed.elements) {
    if (el.kind === "label") labels.push({ name: el.name, file: chapter.source, line: el.line, ordinal: labels.length });
  }
  return labels;
}

function countStatements(parsed: ParsedScreenplay): number {
  return parsed.elements.filter((el) => el.kind !== "label").length;
}

/** Pure part of a generate run: screenplays and character config in, script files out. */
export function planGenerate(
  sources: readonly SourceFile[],
  opts: GeneratePlanOptions,
  config: ScreenplayConfig,
): GeneratePlan {
  const diagnostics: RpyError[] = [];
  const chapters: ChapterPlan[] = [];
  const usedFileNames = new Set<string>([`${opts.mainLabel}${SCRIPT_EXTENSION}`]);

  for (const source of sources) {
    const stem = scriptStem(source.relativePath);
    const chapterLabel = opts.requireLabels ? null : normalizeLabel(stem);
    const parsed = parseScreenplay(source, { implicitLabel: chapterLabel });
    if (parsed.errors.length > 0) {
      diagnostics.push(...parsed.errors);
      continue;
    }
    chapters.push({ source: source.relativePath, fileName: uniqueFileName(stem, usedFileNames), chapterLabel, parsed });
  }

  // Speakers are merged only after every file is parsed.
  const speakers: string[] = [];
  const seen = new Set<string>();
  for (const ch of chapters) {
    for (const s of ch.parsed.speakers) {
      if (seen.has(s)) continue;
      seen.add(s);
      speakers.push(s);
    }
  }
  const registry = buildCharacterRegistry(speakers, config.characters);
  diagnostics.push(...registry.collisions);

  const perChapter = chapters.map(chapterLabels);
  const { labels, duplicates } = aggregateLabels(perChapter);
  diagnostics.push(...duplicates);

  const menus = buildJumpMenus(labels, {
    mainLabel: opts.mainLabel,
    pagePrefix: `${opts.mainLabel}_`,
    pageSize: opts.labelPageSize,
  });
  assertNoGeneratedLabelClash(perChapter.flat(), menus.generatedLabels);

  const files: GeneratedFile[] = chapters.map((ch) => ({
    fileName: ch.fileName,
    content: renderScreenplayScript(ch.parsed, ch.chapterLabel, registry),
  }));
  files.push({
    fileName: `${opts.mainLabel}${SCRIPT_EXTENSION}`,
    content: renderInitBlock(registry.characters, opts.registerMod ? opts.mainLabel : null) + menus.main,
  });
  files.push(...menus.pages);

  const summaries = chapters.map((ch, i) => ({
    file: ch.source,
    labels: perChapter[i]?.length ?? 0,
    lines: countStatements(ch.parsed),
  }));

  return { chapters, registry, labels, files, sources: summaries, diagnostics };
}

/**
 * Converts every .txt screenplay below the input directory into a .rpy script
 * and writes a main file declaring the characters and a jump menu.
 */
export function generateScripts(raw: GenerateOptionsInput): RunReport {
  const options = parseOptions(GenerateOptionsSchema, raw);
  const mainLabel = normalizeLabel(options.mainLabel, DEFAULT_GENERATE_MAIN_LABEL);
  const config = options.configPath ? loadScreenplayConfig(options.configPath) : emptyScreenplayConfig();
  const inputDir = assertInputDir(options.inputDir);
  const outputDir = path.resolve(options.outputDir ?? process.cwd());

  const collected = collectSourceFiles(inputDir, { extension: SCREENPLAY_EXTENSION });
  const plan = planGenerate(collected.files, { ...options, mainLabel }, config);
  const { warnings, errors } = splitBySeverity([...collected.errors, ...plan.diagnostics]);

  if (plan.chapters.length === 0) {
    return {
      command: "generate",
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

  const written = writeGeneratedFiles(outputDir, plan.files);
  const removed = removeStaleFiles(outputDir, pageFilePattern(`${mainLabel}_`), plan.files);

  return {
    command: "generate",
    inputDir,
    outputDir,
    sources: plan.sources,
    labels: plan.labels.length,
    characters: plan.registry.characters.length,
    written,
    removed,
    warnings,
    errors,
  };
}
