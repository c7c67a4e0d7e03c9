/**
 * InMemoryFetcher: a URL → bytes map implementing the fetcher port.
 *
 * Used for testing and offline runs. Counts requests per URL so callers can
 * assert that a cache hit performed no transfer.
 */

import type { ArtifactFetcher } from "@cubelaunch/core";
import { ArtifactFetchError } from "@cubelaunch/errors";

const encoder = new TextEncoder();

function toBytes(content: Uint8Array | string): Uint8Array {
  return typeof content === "string" ? encoder.encode(content) : Uint8Array.from(content);
}

export class InMemoryFetcher implements ArtifactFetcher {
  readonly name = "in-memory";

  private readonly entries: Map<string, Uint8Array> = new Map();
  private readonly requests: Map<string, number> = new Map();

  constructor(entries?: Iterable<readonly [string, Uint8Array | string]>) {
    for (const [url, content] of entries ?? []) {
      this.entries.set(url, toBytes(content));
    }
  }

  /**
   * Registers (or replaces) the content served for a URL.
   */
  set(url: string, content: Uint8Array | string): this {
    this.entries.set(url, toBytes(content));
    return this;
  }

  delete(url: string): boolean {
    return this.entries.delete(url);
  }

  /**
   * Serves a copy of the stored bytes. Unknown URLs fail like an HTTP 404.
   */
  async fetch(url: string, signal?: AbortSignal): Promise<Uint8Array> {
    signal?.throwIfAborted();
    this.requests.set(url, (this.requests.get(url) ?? 0) + 1);

    const content = this.entries.get(url);
    if (!content) {
      throw new ArtifactFetchError(url, "HTTP 404", 404);
    }
    return Uint8Array.from(content);
  }

  /**
   * Number of fetches for one URL, or for all URLs when omitted.
   */
  requestCount(url?: string): number {
    if (url !== undefined) {
      return this.requests.get(url) ?? 0;
    }
    let total = 0;
    for (const count of this.requests.values()) {
      total += count;
    }
    return total;
  }

  resetCounts(): void {
    this.requests.clear();
  }
}
