import { ELLIPSIS, INDENT } from "../defaults.js";
import type { Character, ScriptElement } from "../types.js";
import { escapeRenpyString } from "./escape.js";
import type { ParsedScreenplay } from "./parse.js";
import type { CharacterRegistry } from "./registry.js";

interface LabelBlock {
  label: string;
  statements: string[];
}

export function renderSayStatement(characterId: string | null, text: string): string {
  const literal = `"${escapeRenpyString(text || ELLIPSIS)}"`;
  return characterId ? `${characterId} ${literal}` : literal;
}

function renderStatement(el: Exclude<ScriptElement, { kind: "label" }>, registry: CharacterRegistry): string {
  switch (el.kind) {
    case "dialogue": {
      const id = el.speaker === null ? null : (registry.byName.get(el.speaker)?.id ?? null);
      return renderSayStatement(id, el.text);
    }
    case "directive":
      return el.statement;
    case "heading":
      return `# ${el.text}`;
  }
}

function renderBlock(block: LabelBlock): string {
  const body = block.statements.length > 0 ? block.statements.map((s) => `${INDENT}${s}\n`).join("") : `${INDENT}pass\n`;
  return `label ${block.label}:\n\n${body}`;
}

/**
 * Renders one screenplay as label blocks. `chapterLabel` opens the file when
 * given; every `== marker ==` starts a new block.
 */
export function renderScreenplayScript(
  parsed: ParsedScreenplay,
  chapterLabel: string | null,
  registry: CharacterRegistry,
): string {
  const blocks: LabelBlock[] = chapterLabel ? [{ label: chapterLabel, statements: [] }] : [];

  for (const el of parsed.elements) {
    if (el.kind === "label") {
      blocks.push({ label: el.name, statements: [] });
      continue;
    }
    const current = blocks[blocks.length - 1];
    // The parser never yields content outside a label; nothing to attach to otherwise.
    if (!current) continue;
    current.statements.push(renderStatement(el, registry));
  }

  return blocks.map(renderBlock).join("\n");
}

export function renderCharacterDefinition(c: Character): string {
  return `define ${c.id} = Character(u"${escapeRenpyString(c.displayName)}")`;
}

export function renderInitBlock(characters: readonly Character[], modId: string | null): string {
  const lines: string[] = [];
  if (modId) lines.push(`$ mods["${escapeRenpyString(modId)}"] = u"${escapeRenpyString(modId)}"`);
  lines.push(...characters.map(renderCharacterDefinition));
  if (lines.length === 0) lines.push("pass");
  return `init:\n${lines.map((l) => `${INDENT}${l}\n`).join("")}\n`;
}
