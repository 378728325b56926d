import { StructuralOrderError } from "../errors.js";
import { normalizeLabel } from "../labels/normalize.js";
import type { ScriptElement, SourceFile } from "../types.js";
import { normalizeSpeakerName } from "./names.js";

export const DIRECTIVE_KEYWORDS = [
  "scene",
  "show",
  "hide",
  "with",
  "play",
  "stop",
  "queue",
  "pause",
  "voice",
  "window",
  "jump",
  "call",
  "return",
] as const;

const DIRECTIVES = new Set<string>(DIRECTIVE_KEYWORDS);
const MAX_SPEAKER_LENGTH = 40;

export type ScreenplayLine =
  | { kind: "blank" }
  | { kind: "comment" }
  | { kind: "label"; name: string }
  | { kind: "directive"; statement: string }
  | { kind: "heading"; text: string }
  | { kind: "dialogue"; speaker: string | null; text: string }
  | { kind: "text"; text: string };

function isSceneHeadingLine(trimmed: string): boolean {
  return /^(INT|EXT|EST|I\/E)\.(\s|$)/i.test(trimmed) || /^SCENE\s+\d+\b/i.test(trimmed);
}

function matchLabelMarker(trimmed: string): string | null {
  const m = trimmed.match(/^={2,}\s*(.*?)\s*={2,}$/);
  const inner = m?.[1]?.trim();
  return inner ? normalizeLabel(inner) : null;
}

function matchDirective(trimmed: string): string | null {
  const m = trimmed.match(/^@([a-z]+)(?:\s+(.*))?$/);
  if (!m) return null;
  const keyword = m[1];
  if (!keyword || !DIRECTIVES.has(keyword)) return null;
  const args = (m[2] ?? "").trim();
  return args ? `${keyword} ${args}` : keyword;
}

function matchDialogue(trimmed: string): ScreenplayLine | null {
  // Narration may be written as ": text" to force a line with no speaker.
  if (trimmed.startsWith(":")) {
    const text = trimmed.replace(/^:+/, "").trim();
    if (!text) return { kind: "blank" };
    return { kind: "dialogue", speaker: null, text };
  }

  // The colon must be followed by whitespace or end the line, so "10:30" stays prose.
  const m = trimmed.match(/^([^:]+?)\s*:(?:\s+(.*))?$/);
  const speakerRaw = m?.[1];
  if (!m || !speakerRaw) return null;
  if (speakerRaw.length > MAX_SPEAKER_LENGTH) return null;
  if (!/[\p{L}\p{N}]/u.test(speakerRaw)) return null;

  const speaker = normalizeSpeakerName(speakerRaw);
  return { kind: "dialogue", speaker: speaker || null, text: (m[2] ?? "").trim() };
}

/** Classifies one screenplay line on its own, without any parser context. */
export function classifyLine(line: string): ScreenplayLine {
  const trimmed = line.trim();
  if (!trimmed) return { kind: "blank" };
  if (trimmed.startsWith("#") || trimmed.startsWith("//")) return { kind: "comment" };

  const label = matchLabelMarker(trimmed);
  if (label) return { kind: "label", name: label };

  const directive = matchDirective(trimmed);
  if (directive) return { kind: "directive", statement: directive };

  if (isSceneHeadingLine(trimmed)) return { kind: "heading", text: trimmed };

  return matchDialogue(trimmed) ?? { kind: "text", text: trimmed };
}

export interface ParseOptions {
  // Label the file's content belongs to until the first marker. Without one,
  // content before the first marker is a StructuralOrderError.
  implicitLabel: string | null;
}

export interface ParsedScreenplay {
  file: string;
  elements: ScriptElement[];
  // Distinct speakers in first-seen order.
  speakers: string[];
  errors: StructuralOrderError[];
}

type DialogueElement = Extract<ScriptElement, { kind: "dialogue" }>;

interface ParserContext {
  currentLabel: string | null;
  open: DialogueElement | null;
}

function joinText(a: string, b: string): string {
  return [a, b].filter(Boolean).join(" ");
}

export function parseScreenplay(source: SourceFile, opts: ParseOptions): ParsedScreenplay {
  const elements: ScriptElement[] = [];
  const speakers: string[] = [];
  const seenSpeakers = new Set<string>();
  const errors: StructuralOrderError[] = [];
  const ctx: ParserContext = { currentLabel: opts.implicitLabel, open: null };

  const inLabel = (lineNo: number): boolean => {
    if (ctx.currentLabel !== null) return true;
    if (errors.length === 0) errors.push(new StructuralOrderError(source.relativePath, lineNo));
    return false;
  };

  source.lines.forEach((raw, i) => {
    const lineNo = i + 1;
    const line = classifyLine(raw);

    switch (line.kind) {
      case "blank":
        ctx.open = null;
        return;
      case "comment":
        return;
      case "label":
        ctx.currentLabel = line.name;
        ctx.open = null;
        elements.push({ kind: "label", name: line.name, line: lineNo });
        return;
      case "directive":
        ctx.open = null;
        if (inLabel(lineNo)) elements.push({ kind: "directive", statement: line.statement, line: lineNo });
        return;
      case "heading":
        ctx.open = null;
        if (inLabel(lineNo)) elements.push({ kind: "heading", text: line.text, line: lineNo });
        return;
      case "dialogue": {
        if (!inLabel(lineNo)) return;
        const el: DialogueElement = { kind: "dialogue", speaker: line.speaker, text: line.text, line: lineNo };
        elements.push(el);
        ctx.open = el;
        if (line.speaker !== null && !seenSpeakers.has(line.speaker)) {
          seenSpeakers.add(line.speaker);
          speakers.push(line.speaker);
        }
        return;
      }
      case "text": {
        if (ctx.open) {
          ctx.open.text = joinText(ctx.open.text, line.text);
          return;
        }
        if (!inLabel(lineNo)) return;
        const el: DialogueElement = { kind: "dialogue", speaker: null, text: line.text, line: lineNo };
        elements.push(el);
        ctx.open = el;
        return;
      }
    }
  });

  return { file: source.relativePath, elements, speakers, errors };
}
