import fs from "node:fs";

import { parse, YAMLParseError } from "yaml";
import { z } from "zod";

import { InvalidConfigurationError } from "../errors.js";
import { IDENTIFIER_PATTERN } from "../labels/normalize.js";
import { formatIssues } from "../options.js";
import { normalizeSpeakerName } from "./names.js";
import { RESERVED_IDENTIFIERS } from "./reserved.js";

export const CharacterIdSchema = z
  .string()
  .trim()
  .regex(IDENTIFIER_PATTERN, "must be a valid identifier ([A-Za-z_][A-Za-z0-9_]*)")
  .refine((id) => !RESERVED_IDENTIFIERS.has(id), { message: "is a reserved name" });

export const ScreenplayConfigSchema = z
  .object({
    characters: z.record(z.string(), CharacterIdSchema).nullish(),
  })
  .passthrough();

export interface ScreenplayConfig {
  filePath: string | null;
  // Normalised display name -> identifier, in file order.
  characters: Map<string, string>;
}

export function emptyScreenplayConfig(): ScreenplayConfig {
  return { filePath: null, characters: new Map() };
}

/** Validates an already-parsed YAML document. */
export function screenplayConfigFromDocument(doc: unknown, filePath: string | null): ScreenplayConfig {
  const location = filePath ? { file: filePath, line: null } : null;
  const result = ScreenplayConfigSchema.safeParse(doc ?? {});
  if (!result.success) {
    throw new InvalidConfigurationError(`Invalid config: ${formatIssues(result.error)}`, location);
  }

  const characters = new Map<string, string>();
  const owners = new Map<string, string>();
  for (const [rawName, id] of Object.entries(result.data.characters ?? {})) {
    const name = normalizeSpeakerName(rawName);
    if (!name) throw new InvalidConfigurationError(`Invalid config: empty character name "${rawName}"`, location);
    if (characters.has(name)) {
      throw new InvalidConfigurationError(`Invalid config: character "${name}" is listed more than once`, location);
    }
    const owner = owners.get(id);
    if (owner !== undefined) {
      throw new InvalidConfigurationError(
        `Invalid config: characters "${owner}" and "${name}" share the identifier "${id}"`,
        location,
      );
    }
    owners.set(id, name);
    characters.set(name, id);
  }

  return { filePath, characters };
}

export function loadScreenplayConfig(filePath: string): ScreenplayConfig {
  const location = { file: filePath, line: null };
  let raw: string;
  try {
    raw = fs.readFileSync(filePath, "utf8");
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new InvalidConfigurationError(`Cannot read config: ${reason}`, location);
  }

  let doc: unknown;
  try {
    doc = parse(raw);
  } catch (err) {
    if (err instanceof YAMLParseError) {
      const line = err.linePos?.[0]?.line ?? null;
      throw new InvalidConfigurationError(`Malformed YAML: ${err.message}`, { file: filePath, line });
    }
    throw err;
  }

  return screenplayConfigFromDocument(doc, filePath);
}
