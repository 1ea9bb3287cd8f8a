/**
 * Args - Command line argument parsing
 */

export interface ParsedArgs {
  command: string;
  positional: string[];
  flags: Record<string, string | boolean>;
}

// Flags that never take a value, so "-y core" keeps "core" positional
const BOOLEAN_FLAGS = new Set(["y", "yes", "h", "help", "v", "version"]);

/**
 * Parse a flag at args[i] into flags. Returns how many extra args were consumed.
 */
function parseFlag(args: string[], i: number, flags: ParsedArgs["flags"]): number {
  const arg = args[i];
  const key = arg.startsWith("--") ? arg.slice(2) : arg.slice(1);
  const nextArg = args[i + 1];

  if (key.includes("=")) {
    const [k, ...rest] = key.split("=");
    flags[k] = rest.join("=");
    return 0;
  }

  if (BOOLEAN_FLAGS.has(key) || nextArg === undefined || nextArg.startsWith("-")) {
    flags[key] = true;
    return 0;
  }

  flags[key] = nextArg;
  return 1;
}

export function parseArgs(args: string[]): ParsedArgs {
  const result: ParsedArgs = {
    command: "",
    positional: [],
    flags: {},
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    if (arg === "--") {
      // End of options: everything after is positional
      for (const rest of args.slice(i + 1)) {
        if (!result.command) result.command = rest;
        else result.positional.push(rest);
      }
      break;
    }

    if (arg.startsWith("--") || (arg.startsWith("-") && arg.length === 2)) {
      i += parseFlag(args, i, result.flags);
    } else if (!result.command) {
      // First non-flag argument is the command
      result.command = arg;
    } else {
      result.positional.push(arg);
    }
  }

  if (!result.command) {
    result.command = "help";
  }

  return result;
}

export function getString(
  flags: ParsedArgs["flags"],
  ...keys: string[]
): string | undefined {
  for (const key of keys) {
    const value = flags[key];
    if (typeof value === "string") return value;
  }
  return undefined;
}

export function getBool(flags: ParsedArgs["flags"], ...keys: string[]): boolean {
  for (const key of keys) {
    if (flags[key] === true) return true;
  }
  return false;
}
