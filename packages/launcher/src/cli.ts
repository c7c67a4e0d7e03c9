/**
 * CLI pipeline: parse args → load config → apply overrides → prepare → launch.
 */

import { HttpFetcher } from "@cubelaunch/artifact-sync";
import type { ArtifactFetcher, PlatformContext } from "@cubelaunch/core";
import { isLauncherError, ValidationError, wrapError } from "@cubelaunch/errors";
import { deepFreeze } from "@cubelaunch/manifest";

import { BOOLEAN_FLAGS, parseArgv } from "./args.js";
import { type EnvMap, loadConfig } from "./config/index.js";
import { prepareLaunch } from "./orchestrator.js";
import { buildCommandLine, launchProcess, type Spawner } from "./process.js";
import { JsonReporter, type LaunchReporter, TerminalReporter } from "./reporters/index.js";
import type { LauncherConfig, LaunchSummary } from "./types.js";

export type OutputFormat = "terminal" | "json";

export interface CliArgs {
  readonly config: string | undefined;
  readonly version: string | undefined;
  readonly workDir: string | undefined;
  readonly java: string | undefined;
  readonly features: readonly string[];
  readonly concurrency: number | undefined;
  readonly dryRun: boolean;
  readonly format: OutputFormat;
  readonly help: boolean;
}

const KNOWN_FLAGS = new Set([
  "config",
  "version",
  "work-dir",
  "java",
  "concurrency",
  "dry-run",
  "format",
  "help",
]);

function stringFlag(flags: Readonly<Record<string, string | boolean>>, name: string): string | undefined {
  const value = flags[name];
  if (value === true) {
    throw new ValidationError(`--${name} requires a value`, { flag: name });
  }
  return typeof value === "string" ? value : undefined;
}

/**
 * Parses CLI arguments (without the node and script entries).
 *
 * @throws ValidationError on unknown flags or malformed values
 */
export function parseArgs(argv: readonly string[]): CliArgs {
  const { positionals, flags, lists } = parseArgv(argv);

  for (const name of Object.keys(flags)) {
    if (!KNOWN_FLAGS.has(name)) {
      throw new ValidationError(`Unknown option: --${name}`, { flag: name });
    }
  }
  if (positionals.length > 0) {
    throw new ValidationError(`Unexpected argument: ${positionals[0]}`);
  }

  for (const name of BOOLEAN_FLAGS) {
    if (typeof flags[name] === "string") {
      throw new ValidationError(`--${name} takes no value other than true or false`, { flag: name });
    }
  }

  const format = stringFlag(flags, "format") ?? "terminal";
  if (format !== "terminal" && format !== "json") {
    throw new ValidationError(`--format must be "terminal" or "json", got "${format}"`, {
      flag: "format",
    });
  }

  const rawConcurrency = stringFlag(flags, "concurrency");
  let concurrency: number | undefined;
  if (rawConcurrency !== undefined) {
    concurrency = Number(rawConcurrency);
    if (!Number.isInteger(concurrency) || concurrency < 1) {
      throw new ValidationError(`--concurrency must be a positive integer, got "${rawConcurrency}"`, {
        flag: "concurrency",
      });
    }
  }

  return {
    config: stringFlag(flags, "config"),
    version: stringFlag(flags, "version"),
    workDir: stringFlag(flags, "work-dir"),
    java: stringFlag(flags, "java"),
    features: lists.feature ?? [],
    concurrency,
    dryRun: flags["dry-run"] === true,
    format,
    help: flags.help === true,
  };
}

/**
 * Layers CLI flags over the loaded config. Features are added to the
 * configured ones.
 */
export function applyOverrides(config: LauncherConfig, args: CliArgs): LauncherConfig {
  return deepFreeze({
    ...config,
    ...(args.version !== undefined ? { version: args.version } : {}),
    ...(args.workDir !== undefined ? { workDir: args.workDir } : {}),
    ...(args.java !== undefined ? { javaPath: args.java } : {}),
    features: [...new Set([...config.features, ...args.features])],
    sync: {
      ...config.sync,
      ...(args.concurrency !== undefined ? { concurrency: args.concurrency } : {}),
    },
  });
}

export const HELP_TEXT = `
cubelaunch - Synchronize game artifacts and launch a version

Usage: cubelaunch [options]

Options:
  -c, --config <path>        Config file (default: ./cubelaunch.yaml if present)
  --version <selector>       latest-release, latest-snapshot, or a version id
  --work-dir <path>          Directory for libraries, assets and game files
  --java <path>              Java executable
  -f, --feature <name,...>   Enable a launch feature (repeatable)
  --concurrency <n>          Downloads in flight per stage
  --dry-run                  Synchronize and print the command without launching
  --format terminal|json     Output format (default: terminal)
  -h, --help                 Show this help message
`;

export interface CliDependencies {
  /** Defaults to an HttpFetcher configured from the sync settings */
  readonly fetcher?: ArtifactFetcher;
  readonly spawner?: Spawner;
  readonly platform?: PlatformContext;
  readonly env?: EnvMap;
  readonly cwd?: string;
  readonly stdout?: (text: string) => void;
  readonly stderr?: (text: string) => void;
}

function createReporter(format: OutputFormat): LaunchReporter {
  return format === "json" ? new JsonReporter() : new TerminalReporter();
}

/**
 * Runs the CLI and resolves with the process exit code: the game's exit
 * code, 0 after a dry run, or the catalog exit code of the error that
 * stopped the run.
 */
export async function run(argv: readonly string[], deps?: CliDependencies): Promise<number> {
  const stdout = deps?.stdout ?? ((text: string) => console.log(text));
  const stderr = deps?.stderr ?? ((text: string) => console.error(text));

  let format: OutputFormat = "terminal";
  try {
    const args = parseArgs(argv);
    format = args.format;

    if (args.help) {
      stdout(HELP_TEXT);
      return 0;
    }

    const loaded = await loadConfig(args.config, {
      ...(deps?.env ? { env: deps.env } : {}),
      ...(deps?.cwd ? { cwd: deps.cwd } : {}),
    });
    const config = applyOverrides(loaded, args);

    const fetcher =
      deps?.fetcher ??
      new HttpFetcher({
        timeoutMs: config.sync.timeoutMs,
        headers: { "User-Agent": `${config.launcher.name}/${config.launcher.version}` },
      });

    const plan = await prepareLaunch(config, {
      fetcher,
      ...(deps?.platform ? { platform: deps.platform } : {}),
      onUnresolved: () => {},
    });

    const summary: LaunchSummary = {
      version: plan.version.id,
      versionType: plan.version.type,
      stages: plan.reports,
      commandLine: buildCommandLine(plan),
      unresolved: plan.unresolved,
      dryRun: args.dryRun,
    };
    stdout(createReporter(format).report(summary));

    if (args.dryRun) {
      return 0;
    }
    return await launchProcess(plan, deps?.spawner);
  } catch (error: unknown) {
    const launcherError = isLauncherError(error) ? error : wrapError(error);
    const reporter = createReporter(format);
    if (format === "json") {
      stdout(reporter.reportError(launcherError));
    } else {
      stderr(reporter.reportError(launcherError));
    }
    return launcherError.exitCode;
  }
}
