import { FALLBACK_LABEL } from "../defaults.js";

export const IDENTIFIER_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*$/;

export function isValidIdentifier(raw: string): boolean {
  return IDENTIFIER_PATTERN.test(raw);
}

/**
 * Turns free text (a file name, a `== Chapter ==` marker) into a label name:
 * accents dropped, anything outside [A-Za-z0-9_] collapsed to "_", and a
 * "label_" prefix when the result would start with a digit.
 */
export function normalizeLabel(raw: string | null | undefined, fallback: string = FALLBACK_LABEL): string {
  const cleaned = (raw ?? "")
    .normalize("NFKD")
    .replace(/\p{M}+/gu, "")
    .replace(/[^A-Za-z0-9_]+/g, "_")
    .replace(/^_+|_+$/g, "");
  if (!cleaned) return fallback;
  return /^\d/.test(cleaned) ? `label_${cleaned}` : cleaned;
}
