import { IntegrityError } from "./bases/integrity-error.js";
import { NotFoundError } from "./bases/not-found-error.js";
import { ValidationError } from "./bases/validation-error.js";

/**
 * Thrown when a manifest document is not valid JSON.
 */
export class ManifestParseError extends ValidationError<"MANIFEST_PARSE_FAILED"> {
  constructor(
    public readonly document: string,
    reason: string,
    cause?: Error,
  ) {
    super({
      code: "MANIFEST_PARSE_FAILED",
      message: `Failed to parse ${document}: ${reason}`,
      metadata: { document },
      cause,
    });
  }
}

/**
 * Thrown when a manifest document does not match its schema.
 * `issues` holds one `path: message` line per problem.
 */
export class ManifestSchemaError extends ValidationError<"MANIFEST_VALIDATION_FAILED"> {
  constructor(
    public readonly document: string,
    public readonly issues: readonly string[],
    cause?: Error,
  ) {
    super({
      code: "MANIFEST_VALIDATION_FAILED",
      message: `Invalid ${document}:\n${issues.map((i) => `  - ${i}`).join("\n")}`,
      metadata: { document },
      cause,
    });
  }
}

/**
 * Thrown when a version id is not listed in the version manifest.
 */
export class VersionNotFoundError extends NotFoundError<"MANIFEST_VERSION_NOT_FOUND"> {
  constructor(public readonly versionId: string) {
    super({
      code: "MANIFEST_VERSION_NOT_FOUND",
      message: `Version not found in manifest: ${versionId}`,
      metadata: { versionId },
    });
  }
}

/**
 * Thrown when a fetched version document does not match the digest
 * published for it in the version manifest.
 */
export class ManifestIntegrityError extends IntegrityError<"MANIFEST_INTEGRITY_MISMATCH"> {
  constructor(
    public readonly url: string,
    public readonly expectedDigest: string,
    public readonly actualDigest: string,
  ) {
    super({
      code: "MANIFEST_INTEGRITY_MISMATCH",
      message: `Manifest digest mismatch for ${url}: expected ${expectedDigest}, got ${actualDigest}`,
      metadata: { url, expected: expectedDigest, actual: actualDigest },
    });
  }
}
