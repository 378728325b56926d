// Ren'Py string literal: backslash and quote escaped, "[" and "{" doubled so
// they are not read as interpolation or text tags.
export function escapeRenpyString(raw: string): string {
  return raw.replace(/\\/g, "\\\\").replace(/"/g, '\\"').replace(/\[/g, "[[").replace(/\{/g, "{{");
}
