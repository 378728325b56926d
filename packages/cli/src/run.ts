import { RpyError, formatDiagnostic } from "@renpy-scribe/core";

import { CliError, isHelpToken, isVersionToken } from "./args.js";
import { cmdGenerate } from "./commands/generator.js";
import { cmdIndex } from "./commands/indexer.js";
import { printJson } from "./output.js";
import { PROGRAM, VERSION } from "./version.js";

const COMMANDS = ["index", "generate"] as const;

export function printMainHelp(): void {
  console.log(`Usage: ${PROGRAM} <command> [options]`);
  console.log("");
  console.log("Commands:");
  console.log("  index      Collect labels from .rpy files and build jump menus");
  console.log("  generate   Convert plain text screenplays into .rpy script files");
  console.log("");
  console.log(`Run "${PROGRAM} <command> --help" for the options of a command.`);
}

function errorMessage(err: unknown): string {
  if (err instanceof RpyError) return `${err.name}: ${formatDiagnostic(err)}`;
  return err instanceof Error ? err.message : String(err);
}

/** Runs one CLI invocation and returns the process exit code. */
export function runCli(argv: readonly string[]): number {
  const [command, ...args] = argv;
  const json = args.includes("--json");

  try {
    if (isHelpToken(command)) {
      printMainHelp();
      return 0;
    }
    if (isVersionToken(command)) {
      console.log(`${PROGRAM} ${VERSION}`);
      return 0;
    }
    switch (command) {
      case "index":
        return cmdIndex(args);
      case "generate":
        return cmdGenerate(args);
      default:
        throw new CliError(
          "UNKNOWN_COMMAND",
          command ? `Unknown command: ${command}\nUsage: ${PROGRAM} [${COMMANDS.join("|")}]` : `Usage: ${PROGRAM} [${COMMANDS.join("|")}]`,
        );
    }
  } catch (err) {
    const message = errorMessage(err);
    if (json) {
      const code = err instanceof CliError || err instanceof RpyError ? err.code : null;
      printJson({ ok: false, command: command ?? null, error_code: code, error: message });
      return 1;
    }
    console.error(message);
    return 1;
  }
}
