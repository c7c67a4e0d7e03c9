/**
 * Type guards for the base error types + code-level discrimination.
 */

import type { LauncherError } from "./base.js";
import { ExternalError } from "./bases/external-error.js";
import { IntegrityError } from "./bases/integrity-error.js";
import { InternalError } from "./bases/internal-error.js";
import { NotFoundError } from "./bases/not-found-error.js";
import { ValidationError } from "./bases/validation-error.js";
import type { ErrorCode } from "./catalog.js";

/** Check if an error is a ValidationError (bad input, config, documents) */
export function isValidationError(error: unknown): error is ValidationError {
  return error instanceof ValidationError;
}

/** Check if an error is a NotFoundError (file, version or resource missing) */
export function isNotFoundError(error: unknown): error is NotFoundError {
  return error instanceof NotFoundError;
}

/** Check if an error is an IntegrityError (digest mismatch) */
export function isIntegrityError(error: unknown): error is IntegrityError {
  return error instanceof IntegrityError;
}

/** Check if an error is an ExternalError (network, filesystem, process) */
export function isExternalError(error: unknown): error is ExternalError {
  return error instanceof ExternalError;
}

/** Check if an error is an InternalError (bug) */
export function isInternalError(error: unknown): error is InternalError {
  return error instanceof InternalError;
}

/**
 * Check if a LauncherError has a specific error code.
 * Narrows the type to include the specific code literal.
 */
export function hasCode<C extends ErrorCode>(
  error: LauncherError,
  code: C,
): error is LauncherError<C> {
  return error.code === code;
}

/**
 * Check if an error represents an expected condition (user-fixable input).
 * Returns false for anything that is not a LauncherError.
 */
export function isExpectedError(error: unknown): boolean {
  return (
    error !== null &&
    typeof error === "object" &&
    "isExpected" in error &&
    error.isExpected === true
  );
}
