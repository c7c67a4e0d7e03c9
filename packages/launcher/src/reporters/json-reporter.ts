import type { LauncherError } from "@cubelaunch/errors";
import type { LaunchSummary } from "../types.js";
import type { LaunchReporter } from "./types.js";

// ---------------------------------------------------------------------------
// JSON reporter
// ---------------------------------------------------------------------------

/**
 * Renders the summary as formatted JSON. Per-item results are left out;
 * failed items are listed with their error message.
 */
export class JsonReporter implements LaunchReporter {
  readonly name = "json";

  report(summary: LaunchSummary): string {
    const serializable = {
      version: summary.version,
      versionType: summary.versionType,
      dryRun: summary.dryRun,
      stages: summary.stages.map(({ stage, report }) => ({
        stage,
        durationMs: report.durationMs,
        ...report.summary,
      })),
      unresolved: summary.unresolved,
      commandLine: summary.commandLine,
    };
    return JSON.stringify(serializable, null, 2);
  }

  reportError(error: LauncherError): string {
    return JSON.stringify({ error: error.toJSON() }, null, 2);
  }
}
