import { ArtifactSyncFailedError, type LauncherError } from "@cubelaunch/errors";
import pc from "picocolors";
import type { LaunchSummary } from "../types.js";
import type { LaunchReporter } from "./types.js";

type Colors = ReturnType<typeof pc.createColors>;

export interface TerminalReporterOptions {
  /** Colour functions; defaults to picocolors' terminal detection */
  readonly colors?: Colors;
}

/**
 * Quotes an argument for display when it contains whitespace or quotes.
 */
function displayArg(arg: string): string {
  return /[\s"']/.test(arg) || arg === "" ? JSON.stringify(arg) : arg;
}

// ---------------------------------------------------------------------------
// Terminal reporter
// ---------------------------------------------------------------------------

/**
 * Renders a human-readable, coloured launch report.
 */
export class TerminalReporter implements LaunchReporter {
  readonly name = "terminal";

  private readonly c: Colors;

  constructor(options?: TerminalReporterOptions) {
    this.c = options?.colors ?? pc;
  }

  report(summary: LaunchSummary): string {
    const { c } = this;
    const lines: string[] = [];

    lines.push("");
    lines.push(c.bold(`Launching ${summary.version} (${summary.versionType})`));
    lines.push("─".repeat(50));

    for (const { stage, report } of summary.stages) {
      const s = report.summary;
      const icon = s.failed > 0 ? c.red("✗") : c.green("✓");
      lines.push(
        `  ${icon} ${stage.padEnd(12)} ${s.fetched} fetched, ${s.alreadyValid} up to date` +
          (s.skipped > 0 ? `, ${s.skipped} skipped` : "") +
          ` ${c.dim(`(${report.durationMs}ms)`)}`,
      );
    }

    if (summary.unresolved.length > 0) {
      lines.push("");
      lines.push(`  ${c.yellow("!")} Unresolved placeholders: ${summary.unresolved.join(", ")}`);
    }

    lines.push("");
    lines.push(summary.dryRun ? c.bold("Command (dry run):") : c.bold("Command:"));
    lines.push(`  ${c.cyan(summary.commandLine.map(displayArg).join(" "))}`);
    lines.push("");

    return lines.join("\n");
  }

  reportError(error: LauncherError): string {
    const { c } = this;
    const lines = [`${c.red(c.bold("Error"))} ${c.dim(`[${error.code}]`)} ${error.message}`];

    if (error instanceof ArtifactSyncFailedError) {
      for (const failure of error.failures) {
        lines.push(`  ${c.red("✗")} ${failure.path}`);
        lines.push(`    ${c.dim(failure.error.message)}`);
      }
    }

    return lines.join("\n");
  }
}
