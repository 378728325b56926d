import { DEFAULT_FILE_NAME_PREFIX, DEFAULT_INDEX_MAIN_LABEL, indexScripts, reportSucceeded } from "@renpy-scribe/core";

import { CliError, parseFlags, parseIntegerValue, renderFlagHelp } from "../args.js";
import type { FlagSpec } from "../args.js";
import { printJson, printReport } from "../output.js";
import { PROGRAM, VERSION } from "../version.js";
import {
  HELP_FLAG,
  INPUT_FLAG,
  JSON_FLAG,
  OUTPUT_FLAG,
  PAGE_SIZE_FLAG,
  VERSION_FLAG,
  mainLabelFlag,
} from "./common.js";

const INDEX_FLAGS: FlagSpec[] = [
  INPUT_FLAG,
  OUTPUT_FLAG,
  mainLabelFlag(DEFAULT_INDEX_MAIN_LABEL),
  PAGE_SIZE_FLAG,
  {
    key: "file_name_prefix",
    short: "p",
    long: "file_name_prefix",
    kind: "value",
    arg: "STR",
    help: `Menu page file name prefix. Default: ${DEFAULT_FILE_NAME_PREFIX}`,
  },
  JSON_FLAG,
  VERSION_FLAG,
  HELP_FLAG,
];

export function printIndexHelp(): void {
  console.log(`Usage: ${PROGRAM} index -i DIR [options]`);
  console.log("Collect labels from .rpy files and build jump menus.");
  console.log("");
  for (const line of renderFlagHelp(INDEX_FLAGS)) console.log(line);
}

export function cmdIndex(args: string[]): number {
  const flags = parseFlags(args, INDEX_FLAGS);
  const json = flags.switches.has("json");

  if (flags.switches.has("help")) {
    printIndexHelp();
    return 0;
  }
  if (flags.switches.has("version")) {
    if (json) printJson({ ok: true, command: "index", version: VERSION });
    else console.log(`${PROGRAM} index ${VERSION}`);
    return 0;
  }
  if (flags.positionals.length > 0) throw new CliError("UNEXPECTED_ARGUMENT", `Unexpected argument: ${flags.positionals[0]}`);

  const input = flags.values.get("input");
  if (!input) throw new CliError("MISSING_INPUT", "Option -i/--input is required");

  const report = indexScripts({
    inputDir: input,
    outputDir: flags.values.get("output"),
    mainLabel: flags.values.get("main_label"),
    labelPageSize: parseIntegerValue(flags.values.get("label_page_size"), "--label_page_size"),
    fileNamePrefix: flags.values.get("file_name_prefix"),
  });

  printReport(report, json);
  return reportSucceeded(report) ? 0 : 1;
}
