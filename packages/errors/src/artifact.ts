import { ExternalError } from "./bases/external-error.js";
import { IntegrityError } from "./bases/integrity-error.js";

// ---------------------------------------------------------------------------
// Transport failure
// ---------------------------------------------------------------------------

/**
 * Thrown when an artifact could not be downloaded: network error, timeout,
 * or a non-success HTTP status.
 */
export class ArtifactFetchError extends ExternalError<"ARTIFACT_FETCH_FAILED"> {
  constructor(
    public readonly url: string,
    public readonly reason: string,
    public readonly status?: number | undefined,
    cause?: Error,
  ) {
    super({
      code: "ARTIFACT_FETCH_FAILED",
      message: `Failed to fetch ${url}: ${reason}`,
      metadata: status !== undefined ? { url, status: String(status) } : { url },
      cause,
    });
  }
}

// ---------------------------------------------------------------------------
// Integrity failure
// ---------------------------------------------------------------------------

/**
 * Thrown when fetched bytes do not hash to the expected digest.
 */
export class ArtifactIntegrityError extends IntegrityError<"ARTIFACT_INTEGRITY_MISMATCH"> {
  constructor(
    public readonly url: string,
    public readonly expectedDigest: string,
    public readonly actualDigest: string,
  ) {
    super({
      code: "ARTIFACT_INTEGRITY_MISMATCH",
      message: `Digest mismatch for ${url}: expected ${expectedDigest}, got ${actualDigest}`,
      metadata: { url, expected: expectedDigest, actual: actualDigest },
    });
  }
}

// ---------------------------------------------------------------------------
// Filesystem failure
// ---------------------------------------------------------------------------

/**
 * Thrown when an artifact's destination cannot be read, created or written.
 */
export class ArtifactWriteError extends ExternalError<"ARTIFACT_WRITE_FAILED"> {
  constructor(
    public readonly path: string,
    public readonly reason: string,
    cause?: Error,
  ) {
    super({
      code: "ARTIFACT_WRITE_FAILED",
      message: `Failed to write ${path}: ${reason}`,
      metadata: { path },
      cause,
    });
  }
}

// ---------------------------------------------------------------------------
// Stage abort
// ---------------------------------------------------------------------------

/**
 * A single failed item of a synchronization stage.
 */
export interface FailedArtifact {
  readonly path: string;
  readonly url: string;
  readonly error: Error;
}

/**
 * Thrown by the orchestrator when a synchronization stage had failures.
 * Launch is aborted; the individual errors are kept on `.failures`.
 */
export class ArtifactSyncFailedError extends ExternalError<"ARTIFACT_SYNC_FAILED"> {
  constructor(
    public readonly stage: string,
    public readonly failures: readonly FailedArtifact[],
  ) {
    const first = failures[0];
    super({
      code: "ARTIFACT_SYNC_FAILED",
      message:
        `Synchronization of ${stage} failed for ${failures.length} artifact(s)` +
        (first ? `; first: ${first.error.message}` : ""),
      metadata: { stage, failed: String(failures.length) },
      cause: first?.error,
    });
  }
}
