import { LauncherError, toOptions } from "../base.js";
import type { LauncherErrorOptions, IntegrityCodes } from "../types.js";

/**
 * Errors when content does not match its published digest.
 * Always fatal for the affected item; the offending bytes are never kept.
 */
export class IntegrityError<C extends IntegrityCodes = "ARTIFACT_INTEGRITY_MISMATCH"> extends LauncherError<C> {
  readonly _tag = "IntegrityError" as const;

  constructor(options: LauncherErrorOptions<C>);
  constructor(message: string, metadata?: Record<string, string>);
  constructor(messageOrOptions: string | LauncherErrorOptions<C>, metadata?: Record<string, string>) {
    super(toOptions(messageOrOptions, "ARTIFACT_INTEGRITY_MISMATCH" as C, metadata));
  }
}
