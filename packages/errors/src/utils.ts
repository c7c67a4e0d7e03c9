import { LauncherError } from "./base.js";
import { InternalError } from "./bases/internal-error.js";
import { ERROR_CATALOG, type ErrorCatalogEntry, type ErrorCode, type ErrorDomain } from "./catalog.js";

const UNKNOWN_ERROR_MESSAGE = "An unknown error occurred";

export function getCatalogEntry(code: ErrorCode): ErrorCatalogEntry {
  return ERROR_CATALOG[code];
}

/** Own keys only, so `toString` and friends are rejected. */
export function isValidErrorCode(code: string): code is ErrorCode {
  return Object.hasOwn(ERROR_CATALOG, code);
}

export function getAllErrorCodes(): ErrorCode[] {
  return Object.keys(ERROR_CATALOG).filter(isValidErrorCode);
}

/** Codes of one domain, in catalog order */
export function getErrorCodesByDomain(domain: ErrorDomain): ErrorCode[] {
  return getAllErrorCodes().filter((code) => ERROR_CATALOG[code].domain === domain);
}

/**
 * Message of any thrown value: an Error's message, a thrown string as is,
 * a generic text for everything else.
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return typeof error === "string" ? error : UNKNOWN_ERROR_MESSAGE;
}

/**
 * Normalizes a thrown value for reporting. Launcher errors pass through;
 * anything else becomes an InternalError (exit code 70) that keeps the
 * original as its cause.
 */
export function wrapError(error: unknown): LauncherError {
  if (error instanceof LauncherError) {
    return error;
  }
  if (!(error instanceof Error)) {
    return new InternalError(getErrorMessage(error));
  }
  return new InternalError({
    code: "INTERNAL_ERROR",
    message: error.message,
    metadata: { originalName: error.name },
    cause: error,
  });
}

/**
 * Validate catalog consistency (for tests)
 * Checks:
 * - All codes are UPPER_SNAKE_CASE
 * - Every code is prefixed with its domain
 * - Exit codes stay inside the sysexits range (64-78)
 */
export function validateCatalog(): { valid: boolean; errors: string[] } {
  const errors: string[] = [];

  for (const code of getAllErrorCodes()) {
    const entry = ERROR_CATALOG[code];

    if (!/^[A-Z][A-Z0-9_]*$/.test(code)) {
      errors.push(`Code '${code}' is not in UPPER_SNAKE_CASE format`);
    }

    if (!code.startsWith(`${entry.domain.toUpperCase()}_`)) {
      errors.push(`Code '${code}' does not start with its domain '${entry.domain}'`);
    }

    if (entry.exitCode < 64 || entry.exitCode > 78) {
      errors.push(`Code '${code}' has exit code ${entry.exitCode} outside 64-78`);
    }
  }

  return {
    valid: errors.length === 0,
    errors,
  };
}
