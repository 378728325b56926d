import { INDENT, SCRIPT_EXTENSION } from "../defaults.js";
import type { GeneratedFile, Label, MenuPage } from "../types.js";
import { escapeRenpyString } from "../screenplay/escape.js";
import { paginate } from "./paginate.js";

export const BACK_CAPTION = "< BACK";
export const PREV_CAPTION = "< PREV";
export const NEXT_CAPTION = "NEXT >";

export interface JumpMenuEntry {
  caption: string;
  target: string;
}

export interface JumpMenuOptions {
  mainLabel: string;
  pagePrefix: string;
  pageSize: number;
}

export interface JumpMenus {
  // Menu block for the main label; the caller decides which file it goes in.
  main: string;
  pages: GeneratedFile[];
  // Every label name the menus declare, main label included.
  generatedLabels: string[];
}

export function renderJumpMenu(label: string, entries: readonly JumpMenuEntry[]): string {
  let out = `label ${label}:\n\n`;
  if (entries.length === 0) return `${out}${INDENT}pass\n`;

  out += `${INDENT}menu:\n`;
  for (const e of entries) {
    out += `${INDENT}${INDENT}"${escapeRenpyString(e.caption)}":\n`;
    out += `${INDENT}${INDENT}${INDENT}jump ${e.target}\n\n`;
  }
  return out;
}

export function pageLabelName(pagePrefix: string, page: MenuPage): string {
  return `${pagePrefix}${page.index + 1}`;
}

function pageCaption(page: MenuPage): string {
  const first = page.labels[0];
  const last = page.labels[page.labels.length - 1];
  if (!first || !last) return "";
  return first === last ? first.name : `${first.name} - ${last.name}`;
}

function labelEntries(labels: readonly Label[]): JumpMenuEntry[] {
  return labels.map((l) => ({ caption: l.name, target: l.name }));
}

/**
 * Builds the jump-menu tree over `labels`. When everything fits on one page the
 * main menu lists the labels; otherwise it lists pages, each page living in its
 * own file with links back to the main menu and to its neighbours.
 */
export function buildJumpMenus(labels: readonly Label[], opts: JumpMenuOptions): JumpMenus {
  const pages = paginate(labels, opts.pageSize);
  if (pages.length <= 1) {
    return { main: renderJumpMenu(opts.mainLabel, labelEntries(labels)), pages: [], generatedLabels: [opts.mainLabel] };
  }

  const named = pages.map((page) => ({ page, label: pageLabelName(opts.pagePrefix, page) }));
  const main = renderJumpMenu(
    opts.mainLabel,
    named.map(({ page, label }) => ({ caption: pageCaption(page), target: label })),
  );

  const files = named.map(({ page, label }, i): GeneratedFile => {
    const entries: JumpMenuEntry[] = [{ caption: BACK_CAPTION, target: opts.mainLabel }];
    const prev = named[i - 1]?.label;
    const next = named[i + 1]?.label;
    if (prev) entries.push({ caption: PREV_CAPTION, target: prev });
    entries.push(...labelEntries(page.labels));
    if (next) entries.push({ caption: NEXT_CAPTION, target: next });
    return { fileName: `${label}${SCRIPT_EXTENSION}`, content: renderJumpMenu(label, entries) };
  });

  return { main, pages: files, generatedLabels: [opts.mainLabel, ...named.map((n) => n.label)] };
}
