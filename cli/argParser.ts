// ─────────────────────────────────────────────────────────────
// Argument Parsing — positionals and --flag values
// ─────────────────────────────────────────────────────────────

import { DocCliError } from "../access/accessErrors";

export interface ParsedArgs {
  command: string | null;
  positionals: string[];
  flags: Map<string, string>;
  help: boolean;
}

/** Flags that take a value; every other --flag is boolean */
const FLAGS_WITH_VALUES = new Set(["--n"]);

export function parseArgs(argv: string[]): ParsedArgs {
  const positionals: string[] = [];
  const flags = new Map<string, string>();
  let help = false;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === "--help" || arg === "-h") {
      help = true;
      continue;
    }
    if (arg.startsWith("--")) {
      const eq = arg.indexOf("=");
      if (eq !== -1) {
        flags.set(arg.slice(0, eq), arg.slice(eq + 1));
      } else if (FLAGS_WITH_VALUES.has(arg)) {
        if (i + 1 >= argv.length) {
          throw new DocCliError("InvalidArguments", `Option ${arg} requires a value.`);
        }
        flags.set(arg, argv[++i]);
      } else {
        flags.set(arg, "true");
      }
      continue;
    }
    positionals.push(arg);
  }

  const [command = null, ...rest] = positionals;
  return { command, positionals: rest, flags, help };
}

/** Exactly `count` positionals, or a usage error */
export function expectPositionals(args: ParsedArgs, usage: string, count: number): string[] {
  if (args.positionals.length !== count) {
    throw new DocCliError("InvalidArguments", `Usage: ${usage}`);
  }
  return args.positionals;
}

export function positiveIntFlag(args: ParsedArgs, flag: string, fallback: number): number {
  const raw = args.flags.get(flag);
  if (raw === undefined) return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    throw new DocCliError("InvalidArguments", `Option ${flag} must be a positive integer (got "${raw}").`);
  }
  return value;
}
