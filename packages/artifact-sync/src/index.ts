/**
 * @cubelaunch/artifact-sync
 *
 * Content-addressed artifact synchronization: digest verification,
 * fetch-or-skip per artifact, and bounded-concurrency batches.
 */

export { atomicWriteFile } from "./atomic-write.js";
export { computeDigest, normalizeDigest, verifyDigest } from "./digest.js";
export { HttpFetcher } from "./http-fetcher.js";
export { InMemoryFetcher } from "./in-memory-fetcher.js";
export { assertSynced, runWithConcurrency, summarize, syncAll } from "./scheduler.js";
export { ArtifactStoreClient } from "./store-client.js";
export {
  type ArtifactEnsurer,
  DEFAULT_CONCURRENCY,
  DEFAULT_FETCH_TIMEOUT_MS,
  type HttpFetcherConfig,
  type SyncOptions,
  type SyncProgressCallback,
} from "./types.js";
