import { LauncherError, toOptions } from "../base.js";
import type { LauncherErrorOptions, ValidationCodes } from "../types.js";

/**
 * Errors caused by invalid input: CLI flags, configuration, manifest documents.
 */
export class ValidationError<C extends ValidationCodes = "VALIDATION_FAILED"> extends LauncherError<C> {
  readonly _tag = "ValidationError" as const;

  constructor(options: LauncherErrorOptions<C>);
  constructor(message: string, metadata?: Record<string, string>);
  constructor(messageOrOptions: string | LauncherErrorOptions<C>, metadata?: Record<string, string>) {
    super(toOptions(messageOrOptions, "VALIDATION_FAILED" as C, metadata));
  }
}
