import { LauncherError, toOptions } from "../base.js";
import type { LauncherErrorOptions, InternalCodes } from "../types.js";

/**
 * Errors caused by bugs. Also the wrapper for unknown thrown values.
 */
export class InternalError<C extends InternalCodes = "INTERNAL_ERROR"> extends LauncherError<C> {
  readonly _tag = "InternalError" as const;

  constructor(options: LauncherErrorOptions<C>);
  constructor(message: string, metadata?: Record<string, string>);
  constructor(messageOrOptions: string | LauncherErrorOptions<C>, metadata?: Record<string, string>) {
    super(toOptions(messageOrOptions, "INTERNAL_ERROR" as C, metadata));
  }
}
