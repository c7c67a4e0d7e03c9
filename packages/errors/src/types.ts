/**
 * Construction options shared by the base error types.
 */

import type { BaseErrorType, CodesForBase, ErrorCode } from "./catalog.js";

/**
 * Options for constructing a base error type.
 * The code determines domain, exitCode, and isExpected via catalog lookup.
 */
export interface LauncherErrorOptions<C extends ErrorCode> {
  code: C;
  message: string;
  metadata?: Record<string, string> | undefined;
  cause?: Error | undefined;
}

export type { BaseErrorType, CodesForBase };

export type ValidationCodes = CodesForBase<"ValidationError">;
export type NotFoundCodes = CodesForBase<"NotFoundError">;
export type IntegrityCodes = CodesForBase<"IntegrityError">;
export type ExternalCodes = CodesForBase<"ExternalError">;
export type InternalCodes = CodesForBase<"InternalError">;
