import type { FlagSpec } from "../args.js";

export const INPUT_FLAG: FlagSpec = { key: "input", short: "i", long: "input", kind: "value", arg: "DIR", help: "Input directory (required)" };
export const OUTPUT_FLAG: FlagSpec = {
  key: "output",
  short: "o",
  long: "output",
  kind: "value",
  arg: "DIR",
  help: "Output directory. Default: current directory",
};
export const PAGE_SIZE_FLAG: FlagSpec = {
  key: "label_page_size",
  short: "s",
  long: "label_page_size",
  kind: "value",
  arg: "N",
  help: "Max labels per menu page. Default: 20",
};
export const JSON_FLAG: FlagSpec = { key: "json", long: "json", kind: "switch", help: "Print a JSON report instead of text" };
export const HELP_FLAG: FlagSpec = { key: "help", short: "h", long: "help", kind: "switch", help: "Show this help" };
export const VERSION_FLAG: FlagSpec = { key: "version", short: "v", long: "version", kind: "switch", help: "Show version" };

export function mainLabelFlag(defaultLabel: string): FlagSpec {
  return {
    key: "main_label",
    short: "m",
    long: "main_label",
    kind: "value",
    arg: "NAME",
    help: `Main label name. Default: ${defaultLabel}`,
  };
}
