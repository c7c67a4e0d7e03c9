/**
 * Error Catalog - Single Source of Truth
 *
 * Every error code used across the cubelaunch packages is declared here.
 * Each code maps to a base error type, a domain, and the process exit code
 * the CLI reports when the error ends a run (BSD sysexits values).
 *
 * Naming convention: DOMAIN_SPECIFIC_ERROR (UPPER_SNAKE_CASE)
 * Domains: INTERNAL, VALIDATION, RESOURCE, EXTERNAL, CONFIG, MANIFEST, ARTIFACT, LAUNCH
 */

/**
 * The behavioral base error types that all error codes map to.
 */
export type BaseErrorType =
  | "ValidationError"
  | "NotFoundError"
  | "IntegrityError"
  | "ExternalError"
  | "InternalError";

export const ERROR_CATALOG = {
  // ============================================================================
  // GENERIC ERRORS
  // ============================================================================
  INTERNAL_ERROR: {
    domain: "internal",
    exitCode: 70,
    baseType: "InternalError" as const,
    isExpected: false,
    title: "Internal error",
    description: "An unexpected error occurred",
  },
  VALIDATION_FAILED: {
    domain: "validation",
    exitCode: 64,
    baseType: "ValidationError" as const,
    isExpected: true,
    title: "Validation failed",
    description: "An input value is invalid",
  },
  RESOURCE_NOT_FOUND: {
    domain: "resource",
    exitCode: 66,
    baseType: "NotFoundError" as const,
    isExpected: true,
    title: "Resource not found",
    description: "The requested resource does not exist",
  },
  EXTERNAL_UNAVAILABLE: {
    domain: "external",
    exitCode: 69,
    baseType: "ExternalError" as const,
    isExpected: false,
    title: "External dependency unavailable",
    description: "A remote service or local facility could not be reached",
  },

  // ============================================================================
  // CONFIG ERRORS - Launcher configuration file
  // ============================================================================
  CONFIG_FILE_NOT_FOUND: {
    domain: "config",
    exitCode: 66,
    baseType: "NotFoundError" as const,
    isExpected: true,
    title: "Config file not found",
    description: "The configuration file named on the command line does not exist",
  },
  CONFIG_PARSE_FAILED: {
    domain: "config",
    exitCode: 78,
    baseType: "ValidationError" as const,
    isExpected: true,
    title: "Config parse failed",
    description: "The configuration file is not valid YAML",
  },
  CONFIG_VALIDATION_FAILED: {
    domain: "config",
    exitCode: 78,
    baseType: "ValidationError" as const,
    isExpected: true,
    title: "Config validation failed",
    description: "The configuration does not match the expected schema",
  },
  CONFIG_INTERPOLATION_FAILED: {
    domain: "config",
    exitCode: 78,
    baseType: "ValidationError" as const,
    isExpected: true,
    title: "Config interpolation failed",
    description: "A referenced environment variable is not set and has no default",
  },

  // ============================================================================
  // MANIFEST ERRORS - Version manifest, version info, asset index documents
  // ============================================================================
  MANIFEST_PARSE_FAILED: {
    domain: "manifest",
    exitCode: 65,
    baseType: "ValidationError" as const,
    isExpected: true,
    title: "Manifest parse failed",
    description: "The manifest document is not valid JSON",
  },
  MANIFEST_VALIDATION_FAILED: {
    domain: "manifest",
    exitCode: 65,
    baseType: "ValidationError" as const,
    isExpected: true,
    title: "Manifest validation failed",
    description: "The manifest document does not match the expected schema",
  },
  MANIFEST_VERSION_NOT_FOUND: {
    domain: "manifest",
    exitCode: 66,
    baseType: "NotFoundError" as const,
    isExpected: true,
    title: "Version not found",
    description: "The requested version is not listed in the version manifest",
  },
  MANIFEST_INTEGRITY_MISMATCH: {
    domain: "manifest",
    exitCode: 65,
    baseType: "IntegrityError" as const,
    isExpected: false,
    title: "Manifest digest mismatch",
    description: "A fetched manifest document does not match its published digest",
  },

  // ============================================================================
  // ARTIFACT ERRORS - Artifact synchronization
  // ============================================================================
  ARTIFACT_FETCH_FAILED: {
    domain: "artifact",
    exitCode: 69,
    baseType: "ExternalError" as const,
    isExpected: false,
    title: "Artifact fetch failed",
    description: "The artifact could not be downloaded from the remote store",
  },
  ARTIFACT_INTEGRITY_MISMATCH: {
    domain: "artifact",
    exitCode: 65,
    baseType: "IntegrityError" as const,
    isExpected: false,
    title: "Artifact digest mismatch",
    description: "The downloaded bytes do not match the expected digest",
  },
  ARTIFACT_WRITE_FAILED: {
    domain: "artifact",
    exitCode: 74,
    baseType: "ExternalError" as const,
    isExpected: false,
    title: "Artifact write failed",
    description: "The artifact could not be read from or written to the local filesystem",
  },
  ARTIFACT_SYNC_FAILED: {
    domain: "artifact",
    exitCode: 69,
    baseType: "ExternalError" as const,
    isExpected: false,
    title: "Artifact synchronization failed",
    description: "One or more artifacts of a synchronization stage failed",
  },

  // ============================================================================
  // LAUNCH ERRORS - Process launch
  // ============================================================================
  LAUNCH_PROCESS_FAILED: {
    domain: "launch",
    exitCode: 71,
    baseType: "ExternalError" as const,
    isExpected: false,
    title: "Launch failed",
    description: "The game process could not be started",
  },
} as const;

// ============================================================================
// TYPE EXPORTS
// ============================================================================

/**
 * Union type of all error codes
 */
export type ErrorCode = keyof typeof ERROR_CATALOG;

/**
 * Type representing a single error catalog entry
 */
export type ErrorCatalogEntry = (typeof ERROR_CATALOG)[ErrorCode];

/**
 * Union type of all domain names
 */
export type ErrorDomain = ErrorCatalogEntry["domain"];

/**
 * Process exit codes used in the catalog
 */
export type ExitCode = ErrorCatalogEntry["exitCode"];

/**
 * Extract all ErrorCodes that belong to a specific BaseErrorType
 */
export type CodesForBase<B extends BaseErrorType> = {
  [K in ErrorCode]: (typeof ERROR_CATALOG)[K]["baseType"] extends B ? K : never;
}[ErrorCode];
