// Names a character identifier must not shadow: Python keywords, the store
// names Ren'Py itself defines, and statement keywords (`voice "..."` would be
// read as a voice statement, not a say line).
export const RESERVED_IDENTIFIERS: ReadonlySet<string> = new Set([
  "False", "None", "True", "and", "as", "assert", "async", "await", "break", "class",
  "continue", "def", "del", "elif", "else", "except", "finally", "for", "from", "global",
  "if", "import", "in", "is", "lambda", "nonlocal", "not", "or", "pass", "raise",
  "return", "try", "while", "with", "yield",
  "adv", "centered", "config", "extend", "gui", "im", "narrator", "nvl", "persistent",
  "renpy", "store", "style", "ui", "vcentered",
  "call", "camera", "default", "define", "hide", "image", "init", "jump", "label",
  "layeredimage", "menu", "pause", "play", "python", "queue", "scene", "screen", "show",
  "stop", "testcase", "transform", "translate", "voice", "window",
]);
