function stripCueSuffixes(raw: string): string {
  // Screenplay cue extensions like (V.O.), (O.S.), (CONT'D) or (whispering).
  return raw.replace(/\s*\([^)]*\)\s*$/, "");
}

export function normalizeSpeakerName(raw: string): string {
  return stripCueSuffixes(raw.normalize("NFC").trim()).replace(/\s+/g, " ").trim();
}
