export interface SourceFile {
  // Absolute path on disk.
  path: string;
  // Path below the input directory, always with "/" separators.
  relativePath: string;
  lines: readonly string[];
}

export interface Label {
  name: string;
  file: string;
  line: number | null; // 1-based; null when synthesized from a file name
  ordinal: number;
}

export interface MenuPage {
  index: number;
  pageSize: number;
  labels: Label[];
}

export type ScriptElement =
  | { kind: "dialogue"; speaker: string | null; text: string; line: number }
  | { kind: "label"; name: string; line: number }
  | { kind: "directive"; statement: string; line: number }
  | { kind: "heading"; text: string; line: number };

export interface Character {
  displayName: string;
  id: string;
  source: "config" | "synthesized";
}

export interface GeneratedFile {
  fileName: string;
  content: string;
}
