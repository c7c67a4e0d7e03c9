/**
 * A single binary file to materialize on disk.
 *
 * Produced by the download planner from manifest data and consumed once per
 * synchronization attempt. Descriptors are frozen when created.
 */
export interface ArtifactDescriptor {
  /** Remote location of the file */
  readonly url: string;
  /** Expected SHA-1 digest, hex encoded */
  readonly sha1: string;
  /** Expected size in bytes. Advisory only; validity is decided by the digest */
  readonly size: number;
  /** Absolute destination path */
  readonly path: string;
}

/**
 * Result of ensuring one artifact.
 *
 * - `already-valid`: the file on disk matched its digest, nothing was fetched
 * - `fetched`: the file was downloaded, verified and written
 * - `failed`: transport, integrity or filesystem failure for this item
 * - `skipped`: never dispatched because the batch stopped after a failure
 */
export type SyncOutcome =
  | { readonly kind: "already-valid" }
  | { readonly kind: "fetched"; readonly bytes: number }
  | { readonly kind: "failed"; readonly error: Error }
  | { readonly kind: "skipped"; readonly reason: string };

export type SyncOutcomeKind = SyncOutcome["kind"];

/**
 * Outcome of one descriptor inside a batch, tied back to its input.
 */
export interface SyncItemResult {
  readonly descriptor: ArtifactDescriptor;
  readonly outcome: SyncOutcome;
  readonly durationMs: number;
}

export interface SyncSummary {
  readonly total: number;
  readonly alreadyValid: number;
  readonly fetched: number;
  readonly failed: number;
  readonly skipped: number;
}

/**
 * Aggregate of a batch. `results[i]` belongs to the i-th input descriptor.
 */
export interface SyncReport {
  readonly results: readonly SyncItemResult[];
  readonly summary: SyncSummary;
  readonly durationMs: number;
}
