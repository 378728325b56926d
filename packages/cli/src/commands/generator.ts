import { DEFAULT_GENERATE_MAIN_LABEL, generateScripts, reportSucceeded } from "@renpy-scribe/core";

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

const GENERATE_FLAGS: FlagSpec[] = [
  INPUT_FLAG,
  OUTPUT_FLAG,
  mainLabelFlag(DEFAULT_GENERATE_MAIN_LABEL),
  PAGE_SIZE_FLAG,
  { key: "config", short: "c", long: "config", kind: "value", arg: "FILE", help: "YAML character config" },
  {
    key: "require_labels",
    short: "r",
    long: "require_labels",
    kind: "switch",
    help: "Do not add a label per file; content must follow a == marker ==",
  },
  {
    key: "register_mod",
    short: "d",
    long: "register_mod",
    kind: "switch",
    help: "Register the main label in the mods dictionary of the init block",
  },
  JSON_FLAG,
  VERSION_FLAG,
  HELP_FLAG,
];

export function printGenerateHelp(): void {
  console.log(`Usage: ${PROGRAM} generate -i DIR [options]`);
  console.log("Read plain text screenplay files and generate .rpy script files.");
  console.log("");
  for (const line of renderFlagHelp(GENERATE_FLAGS)) console.log(line);
  console.log("");
  console.log("Screenplay lines:");
  console.log("  Speaker: text        dialogue (a line without a speaker continues it)");
  console.log("  : text               narration");
  console.log("  == Chapter name ==   label");
  console.log("  @scene bg room       statement (scene show hide with play stop queue pause voice window jump call return)");
  console.log("  INT. ROOM - DAY      scene heading, kept as a comment");
  console.log("  # note, // note      ignored");
}

export function cmdGenerate(args: string[]): number {
  const flags = parseFlags(args, GENERATE_FLAGS);
  const json = flags.switches.has("json");

  if (flags.switches.has("help")) {
    printGenerateHelp();
    return 0;
  }
  if (flags.switches.has("version")) {
    if (json) printJson({ ok: true, command: "generate", version: VERSION });
    else console.log(`${PROGRAM} generate ${VERSION}`);
    return 0;
  }
  if (flags.positionals.length > 0) throw new CliError("UNEXPECTED_ARGUMENT", `Unexpected argument: ${flags.positionals[0]}`);

  const input = flags.values.get("input");
  if (!input) throw new CliError("MISSING_INPUT", "Option -i/--input is required");

  const report = generateScripts({
    inputDir: input,
    outputDir: flags.values.get("output"),
    mainLabel: flags.values.get("main_label"),
    labelPageSize: parseIntegerValue(flags.values.get("label_page_size"), "--label_page_size"),
    configPath: flags.values.get("config"),
    requireLabels: flags.switches.has("require_labels"),
    registerMod: flags.switches.has("register_mod"),
  });

  printReport(report, json);
  return reportSucceeded(report) ? 0 : 1;
}
