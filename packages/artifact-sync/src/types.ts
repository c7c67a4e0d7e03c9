/**
 * Configuration types for @cubelaunch/artifact-sync
 */

import type { ArtifactDescriptor, SyncItemResult, SyncOutcome } from "@cubelaunch/core";

/**
 * Anything that can bring one descriptor's file up to date.
 * Implemented by ArtifactStoreClient; tests substitute their own.
 */
export interface ArtifactEnsurer {
  ensure(descriptor: ArtifactDescriptor): Promise<SyncOutcome>;
}

/**
 * Progress callback, invoked once per descriptor as it settles.
 *
 * @param result - The settled item
 * @param completed - Items settled so far, including this one
 * @param total - Items in the batch
 */
export type SyncProgressCallback = (
  result: SyncItemResult,
  completed: number,
  total: number,
) => void;

/**
 * Options for syncAll()
 */
export interface SyncOptions {
  /** Maximum number of artifacts in flight. Default: 4 */
  readonly concurrency?: number;
  /** Stop dispatching new items after the first failure. Default: false */
  readonly stopOnFailure?: boolean;
  /** Called as each item settles, in completion order */
  readonly onItemComplete?: SyncProgressCallback;
}

/**
 * Configuration for the HTTP fetcher
 */
export interface HttpFetcherConfig {
  /** Per-request timeout (ms). Default: 30000 */
  readonly timeoutMs?: number;
  /** Extra request headers, e.g. a User-Agent */
  readonly headers?: Readonly<Record<string, string>>;
}

export const DEFAULT_CONCURRENCY = 4;
export const DEFAULT_FETCH_TIMEOUT_MS = 30_000;
