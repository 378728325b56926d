export class CliError extends Error {
  public readonly code: string;

  constructor(code: string, message: string) {
    super(message);
    this.name = "CliError";
    this.code = code;
  }
}

export type FlagKind = "value" | "switch";

export interface FlagSpec {
  key: string;
  short?: string;
  // Underscore spelling; the dashed spelling is accepted as well.
  long: string;
  kind: FlagKind;
  // Placeholder shown in help for value options.
  arg?: string;
  help: string;
}

export interface ParsedFlags {
  values: Map<string, string>;
  switches: Set<string>;
  positionals: string[];
}

function normalizeLong(token: string): string {
  return token.slice(2).replace(/-/g, "_");
}

function findSpec(token: string, specs: readonly FlagSpec[]): FlagSpec | null {
  if (token.startsWith("--")) {
    const long = normalizeLong(token);
    return specs.find((s) => s.long === long) ?? null;
  }
  return specs.find((s) => s.short !== undefined && `-${s.short}` === token) ?? null;
}

export function isHelpToken(value: string | undefined): boolean {
  return value === "--help" || value === "-h" || value === "help";
}

export function isVersionToken(value: string | undefined): boolean {
  return value === "--version" || value === "-v";
}

export function parseFlags(args: readonly string[], specs: readonly FlagSpec[]): ParsedFlags {
  const values = new Map<string, string>();
  const switches = new Set<string>();
  const positionals: string[] = [];

  for (let i = 0; i < args.length; i += 1) {
    const a = args[i] ?? "";
    if (!a.startsWith("-") || a === "-") {
      positionals.push(a);
      continue;
    }

    const eq = a.startsWith("--") ? a.indexOf("=") : -1;
    const token = eq >= 0 ? a.slice(0, eq) : a;
    const spec = findSpec(token, specs);
    if (!spec) throw new CliError("UNKNOWN_OPTION", `Unknown option: ${token}`);

    if (spec.kind === "switch") {
      if (eq >= 0) throw new CliError("UNEXPECTED_VALUE", `Option ${token} does not take a value`);
      switches.add(spec.key);
      continue;
    }

    const next = eq >= 0 ? a.slice(eq + 1) : args[i + 1];
    if (next === undefined || (eq < 0 && next.startsWith("-") && next !== "-" && !/^-\d+$/.test(next))) {
      throw new CliError("MISSING_VALUE", `Option ${token} requires a value`);
    }
    values.set(spec.key, next);
    if (eq < 0) i += 1;
  }

  return { values, switches, positionals };
}

export function parseIntegerValue(raw: string | undefined, flag: string): number | undefined {
  if (raw === undefined) return undefined;
  if (!/^[+-]?\d+$/.test(raw.trim())) throw new CliError("INVALID_VALUE", `Option ${flag} expects an integer (got "${raw}")`);
  return Number(raw.trim());
}

export function renderFlagHelp(specs: readonly FlagSpec[]): string[] {
  return specs.map((s) => {
    const names = [s.short ? `-${s.short}` : null, `--${s.long}`].filter(Boolean).join(", ");
    const arg = s.kind === "value" ? ` ${s.arg ?? "VALUE"}` : "";
    return `  ${`${names}${arg}`.padEnd(32)} ${s.help}`;
  });
}
