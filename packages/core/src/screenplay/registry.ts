import { IdentifierCollisionError } from "../errors.js";
import type { Character } from "../types.js";
import { RESERVED_IDENTIFIERS } from "./reserved.js";

export interface CharacterRegistry {
  // Speakers in first-seen order, then configured characters nobody spoke as.
  characters: Character[];
  byName: ReadonlyMap<string, Character>;
  collisions: IdentifierCollisionError[];
}

/**
 * Lower-case ASCII identifier for a display name ("Old Man" -> "old_man",
 * "Zoë" -> "zoe"). Returns "" when nothing usable is left.
 */
export function synthesizeIdentifier(displayName: string): string {
  const base = displayName
    .normalize("NFKD")
    .replace(/\p{M}+/gu, "")
    .toLowerCase()
    .replace(/[^a-z0-9_]+/g, "_")
    .replace(/^_+|_+$/g, "");
  if (!base) return "";
  if (/^\d/.test(base) || RESERVED_IDENTIFIERS.has(base)) return `ch_${base}`;
  return base;
}

/**
 * Resolves every speaker to a character. Runs once over the merged speaker
 * list of all files, so the result does not depend on how files were parsed.
 */
export function buildCharacterRegistry(
  speakers: readonly string[],
  configured: ReadonlyMap<string, string>,
): CharacterRegistry {
  const characters: Character[] = [];
  const byName = new Map<string, Character>();
  const collisions: IdentifierCollisionError[] = [];
  // identifier -> display name holding it
  const owners = new Map<string, string>();
  for (const [name, id] of configured) owners.set(id, name);

  const add = (c: Character): void => {
    characters.push(c);
    byName.set(c.displayName, c);
  };

  for (const name of speakers) {
    if (byName.has(name)) continue;

    const configuredId = configured.get(name);
    if (configuredId !== undefined) {
      add({ displayName: name, id: configuredId, source: "config" });
      continue;
    }

    const wanted = synthesizeIdentifier(name) || `ch_${characters.length}`;
    let id = wanted;
    const takenBy = owners.get(wanted);
    if (takenBy !== undefined) {
      let n = 2;
      while (owners.has(`${wanted}_${n}`)) n += 1;
      id = `${wanted}_${n}`;
      collisions.push(new IdentifierCollisionError(name, wanted, id, takenBy));
    }
    owners.set(id, name);
    add({ displayName: name, id, source: "synthesized" });
  }

  for (const [name, id] of configured) {
    if (!byName.has(name)) add({ displayName: name, id, source: "config" });
  }

  return { characters, byName, collisions };
}
