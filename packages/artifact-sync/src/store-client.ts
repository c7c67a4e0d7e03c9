/**
 * ArtifactStoreClient: fetch-or-skip for a single artifact.
 *
 * The destination is checked first: a file whose digest matches is left alone
 * and nothing is fetched. Otherwise the bytes are downloaded, verified, and
 * written atomically. Corrupt bytes never reach the destination.
 */

import { readFile } from "node:fs/promises";
import type { ArtifactDescriptor, ArtifactFetcher, SyncOutcome } from "@cubelaunch/core";
import {
  ArtifactIntegrityError,
  ArtifactWriteError,
  getErrorMessage,
  isError,
} from "@cubelaunch/errors";
import { atomicWriteFile } from "./atomic-write.js";
import { computeDigest, verifyDigest } from "./digest.js";
import type { ArtifactEnsurer } from "./types.js";

function isMissingFileError(error: unknown): boolean {
  return isError(error) && "code" in error && error.code === "ENOENT";
}

export class ArtifactStoreClient implements ArtifactEnsurer {
  private readonly fetcher: ArtifactFetcher;

  constructor(fetcher: ArtifactFetcher) {
    this.fetcher = fetcher;
  }

  /**
   * Bring `descriptor.path` up to date.
   *
   * @returns `already-valid` on a cache hit, `fetched` after a download
   * @throws ArtifactFetchError on transport failure
   * @throws ArtifactIntegrityError when the downloaded bytes do not match
   * @throws ArtifactWriteError on filesystem failure
   */
  async ensure(descriptor: ArtifactDescriptor): Promise<SyncOutcome> {
    const existing = await this.readExisting(descriptor.path);
    if (existing !== undefined) {
      if (verifyDigest(existing, descriptor.sha1)) {
        return { kind: "already-valid" };
      }
      console.warn(`[ArtifactStore] Digest mismatch for ${descriptor.path}, re-fetching`);
    }

    const bytes = await this.fetcher.fetch(descriptor.url);

    if (!verifyDigest(bytes, descriptor.sha1)) {
      throw new ArtifactIntegrityError(descriptor.url, descriptor.sha1, computeDigest(bytes));
    }

    if (descriptor.size > 0 && bytes.byteLength !== descriptor.size) {
      console.warn(
        `[ArtifactStore] Size mismatch for ${descriptor.url}: expected ${descriptor.size}, got ${bytes.byteLength}`,
      );
    }

    try {
      await atomicWriteFile(descriptor.path, bytes);
    } catch (error) {
      throw new ArtifactWriteError(
        descriptor.path,
        getErrorMessage(error),
        isError(error) ? error : undefined,
      );
    }

    return { kind: "fetched", bytes: bytes.byteLength };
  }

  /**
   * Current content of the destination, or undefined when it does not exist.
   */
  private async readExisting(path: string): Promise<Uint8Array | undefined> {
    try {
      return await readFile(path);
    } catch (error) {
      if (isMissingFileError(error)) {
        return undefined;
      }
      throw new ArtifactWriteError(path, getErrorMessage(error), isError(error) ? error : undefined);
    }
  }
}
