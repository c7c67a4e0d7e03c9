/**
 * Transport port used by the artifact store and the manifest loaders.
 *
 * Implementations fetch a URL in full. Partial or resumable transfers are
 * not part of the contract; timeouts are the implementation's concern.
 */
export interface ArtifactFetcher {
  /** Fetcher name (for logging and debugging) */
  readonly name: string;
  fetch(url: string, signal?: AbortSignal): Promise<Uint8Array>;
}
