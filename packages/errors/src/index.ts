/**
 * @cubelaunch/errors
 *
 * Shared error taxonomy for the cubelaunch packages.
 *
 * The error system is built on 5 behavioral base types:
 * ValidationError, NotFoundError, IntegrityError, ExternalError, InternalError
 *
 * Each error carries a `.code` from the catalog that discriminates
 * the specific error condition. Use `error.code === "XXX"` for
 * fine-grained matching, or `instanceof BaseType` for category matching.
 */

// ============================================================================
// CORE EXPORTS
// ============================================================================

export { type ErrorJSON, isError, isLauncherError, LauncherError } from "./base.js";

export {
  type BaseErrorType,
  type CodesForBase,
  ERROR_CATALOG,
  type ErrorCatalogEntry,
  type ErrorCode,
  type ErrorDomain,
  type ExitCode,
} from "./catalog.js";

export {
  getAllErrorCodes,
  getCatalogEntry,
  getErrorCodesByDomain,
  getErrorMessage,
  isValidErrorCode,
  validateCatalog,
  wrapError,
} from "./utils.js";

export {
  hasCode,
  isExpectedError,
  isExternalError,
  isIntegrityError,
  isInternalError,
  isNotFoundError,
  isValidationError,
} from "./guards.js";

// ============================================================================
// BASE ERROR TYPES
// ============================================================================

export {
  ExternalError,
  IntegrityError,
  InternalError,
  NotFoundError,
  ValidationError,
} from "./bases/index.js";

export type {
  ExternalCodes,
  IntegrityCodes,
  InternalCodes,
  LauncherErrorOptions,
  NotFoundCodes,
  ValidationCodes,
} from "./types.js";

// ============================================================================
// DOMAIN ERRORS
// ============================================================================

export {
  ArtifactFetchError,
  ArtifactIntegrityError,
  ArtifactSyncFailedError,
  ArtifactWriteError,
  type FailedArtifact,
} from "./artifact.js";

export {
  ConfigFileNotFoundError,
  ConfigInterpolationError,
  ConfigParseError,
  ConfigSchemaError,
} from "./config.js";

export { LaunchProcessError } from "./launch.js";

export {
  ManifestIntegrityError,
  ManifestParseError,
  ManifestSchemaError,
  VersionNotFoundError,
} from "./manifest.js";
