export const PROGRAM = "renpy-scribe";
export const VERSION = "1.0.0";
