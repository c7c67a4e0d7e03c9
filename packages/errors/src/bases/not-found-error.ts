import { LauncherError, toOptions } from "../base.js";
import type { LauncherErrorOptions, NotFoundCodes } from "../types.js";

/**
 * Errors when a referenced file, version or resource does not exist.
 */
export class NotFoundError<C extends NotFoundCodes = "RESOURCE_NOT_FOUND"> extends LauncherError<C> {
  readonly _tag = "NotFoundError" as const;

  constructor(options: LauncherErrorOptions<C>);
  constructor(message: string, metadata?: Record<string, string>);
  constructor(messageOrOptions: string | LauncherErrorOptions<C>, metadata?: Record<string, string>) {
    super(toOptions(messageOrOptions, "RESOURCE_NOT_FOUND" as C, metadata));
  }
}
