/**
 * HTTP transport with a per-request timeout and error classification.
 */

import type { ArtifactFetcher } from "@cubelaunch/core";
import { ArtifactFetchError, ValidationError } from "@cubelaunch/errors";
import { DEFAULT_FETCH_TIMEOUT_MS, type HttpFetcherConfig } from "./types.js";

function isAbortError(error: unknown): boolean {
  return error instanceof Error && error.name === "AbortError";
}

/**
 * Downloads artifacts with the global `fetch`.
 *
 * Every request gets its own timeout. Failures surface as `ArtifactFetchError`,
 * except an abort requested through the caller's signal, which is re-thrown.
 */
export class HttpFetcher implements ArtifactFetcher {
  readonly name = "http";

  private readonly timeoutMs: number;
  private readonly headers: Readonly<Record<string, string>>;

  constructor(config?: HttpFetcherConfig) {
    if (config?.timeoutMs !== undefined && config.timeoutMs <= 0) {
      throw new ValidationError("timeoutMs must be positive", {
        timeoutMs: String(config.timeoutMs),
      });
    }
    this.timeoutMs = config?.timeoutMs ?? DEFAULT_FETCH_TIMEOUT_MS;
    this.headers = { ...config?.headers };
  }

  async fetch(url: string, signal?: AbortSignal): Promise<Uint8Array> {
    signal?.throwIfAborted();

    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.timeoutMs);

    // Link external signal to internal controller
    const onExternalAbort = () => controller.abort();
    signal?.addEventListener("abort", onExternalAbort, { once: true });

    try {
      const response = await fetch(url, {
        headers: this.headers,
        signal: controller.signal,
      });

      if (!response.ok) {
        throw new ArtifactFetchError(url, `HTTP ${response.status}`, response.status);
      }

      return new Uint8Array(await response.arrayBuffer());
    } catch (error) {
      if (error instanceof ArtifactFetchError) {
        throw error;
      }

      if (isAbortError(error)) {
        if (signal?.aborted) {
          throw error;
        }
        throw new ArtifactFetchError(url, `Request timed out after ${this.timeoutMs}ms`);
      }

      throw new ArtifactFetchError(
        url,
        error instanceof Error ? error.message : String(error),
        undefined,
        error instanceof Error ? error : undefined,
      );
    } finally {
      clearTimeout(timeout);
      signal?.removeEventListener("abort", onExternalAbort);
    }
  }
}
