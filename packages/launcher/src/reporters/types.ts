import type { LauncherError } from "@cubelaunch/errors";
import type { LaunchSummary } from "../types.js";

/**
 * Reporter interface for formatting launch results.
 */
export interface LaunchReporter {
  readonly name: string;
  report(summary: LaunchSummary): string;
  reportError(error: LauncherError): string;
}
