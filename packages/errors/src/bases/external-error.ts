import { LauncherError, toOptions } from "../base.js";
import type { LauncherErrorOptions, ExternalCodes } from "../types.js";

/**
 * Errors caused by failures outside the process: network, filesystem, child processes.
 */
export class ExternalError<C extends ExternalCodes = "EXTERNAL_UNAVAILABLE"> extends LauncherError<C> {
  readonly _tag = "ExternalError" as const;

  constructor(options: LauncherErrorOptions<C>);
  constructor(message: string, metadata?: Record<string, string>);
  constructor(messageOrOptions: string | LauncherErrorOptions<C>, metadata?: Record<string, string>) {
    super(toOptions(messageOrOptions, "EXTERNAL_UNAVAILABLE" as C, metadata));
  }
}
