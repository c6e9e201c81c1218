export type ArgMap = Record<string, string | boolean>;

export interface ParsedArgs {
  command: string;
  positionals: string[];
  args: ArgMap;
}

/**
 * Boolean switches never consume the following token
 */
const FLAGS = new Set(["incremental", "watch", "reset", "no-history", "help", "verbose"]);

/**
 * `--key value`, `--key=value` and `--flag`. A leading option (such as
 * `--view-session <id>`) leaves the command empty.
 */
export function parseArgs(argv: string[]): ParsedArgs {
  const args: ArgMap = {};
  const positionals: string[] = [];

  for (let i = 0; i < argv.length; i++) {
    const token = argv[i];
    if (token === undefined) continue;

    if (token === "-h") {
      args["help"] = true;
    } else if (token.startsWith("--")) {
      const body = token.slice(2);
      const eq = body.indexOf("=");
      if (eq >= 0) {
        args[body.slice(0, eq)] = body.slice(eq + 1);
        continue;
      }
      const next = argv[i + 1];
      if (FLAGS.has(body) || next === undefined || next.startsWith("--")) {
        args[body] = true;
      } else {
        args[body] = next;
        i += 1;
      }
    } else {
      positionals.push(token);
    }
  }

  const [command = "", ...rest] = positionals;
  return { command, positionals: rest, args };
}

export function getArg(args: ArgMap, key: string): string | undefined {
  const value = args[key];
  return typeof value === "string" ? value : undefined;
}

export function getBool(args: ArgMap, key: string, defaultValue: boolean): boolean {
  const value = args[key];
  if (typeof value === "boolean") return value;
  if (typeof value === "string") return value !== "false";
  return defaultValue;
}

/**
 * Positive integer option no larger than `max`, or the default when absent
 */
export function getInt(args: ArgMap, key: string, defaultValue: number, max = Number.MAX_SAFE_INTEGER): number {
  const raw = getArg(args, key);
  if (raw === undefined) {
    return defaultValue;
  }
  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    throw new Error(`--${key} must be a positive integer, got "${raw}"`);
  }
  if (value > max) {
    throw new Error(`--${key} must be at most ${max}, got "${raw}"`);
  }
  return value;
}
