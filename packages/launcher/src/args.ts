/**
 * Minimal argv parser.
 *
 * `--key value`, `--key=value`, boolean flags, short aliases, and list flags
 * that may repeat and take comma-separated values. A boolean flag also takes
 * `--flag=true` / `--flag=false`; any other inline value is kept as a string.
 */

export interface ParsedArgs {
  readonly positionals: readonly string[];
  readonly flags: Readonly<Record<string, string | boolean>>;
  readonly lists: Readonly<Record<string, readonly string[]>>;
}

const ALIASES: Readonly<Record<string, string>> = {
  h: "help",
  c: "config",
  f: "feature",
};

export const BOOLEAN_FLAGS: ReadonlySet<string> = new Set(["help", "dry-run"]);
const LIST_FLAGS = new Set(["feature"]);

export function parseArgv(argv: readonly string[]): ParsedArgs {
  const positionals: string[] = [];
  const flags: Record<string, string | boolean> = {};
  const lists: Record<string, string[]> = {};

  const setValue = (key: string, value: string | true): void => {
    if (LIST_FLAGS.has(key)) {
      const items = value === true ? [] : value.split(",").filter((item) => item.length > 0);
      lists[key] = [...(lists[key] ?? []), ...items];
    } else {
      flags[key] = value;
    }
  };

  let i = 0;
  while (i < argv.length) {
    const arg = argv[i];
    if (arg === undefined) break;

    if (arg === "--") {
      // Everything after -- is positional
      positionals.push(...argv.slice(i + 1));
      break;
    }

    let key: string | undefined;
    if (arg.startsWith("--")) {
      key = arg.slice(2);
    } else if (arg.startsWith("-") && arg.length === 2) {
      const short = arg.slice(1);
      key = ALIASES[short] ?? short;
    }

    if (key === undefined) {
      positionals.push(arg);
    } else {
      const eq = key.indexOf("=");
      if (eq !== -1) {
        const name = key.slice(0, eq);
        const value = key.slice(eq + 1);
        if (BOOLEAN_FLAGS.has(name) && (value === "true" || value === "false")) {
          flags[name] = value === "true";
        } else {
          setValue(name, value);
        }
      } else if (BOOLEAN_FLAGS.has(key)) {
        flags[key] = true;
      } else {
        const next = argv[i + 1];
        if (next !== undefined && !next.startsWith("-")) {
          setValue(key, next);
          i++;
        } else {
          setValue(key, true);
        }
      }
    }

    i++;
  }

  return { positionals, flags, lists };
}
