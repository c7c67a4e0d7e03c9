/**
 * Loaders for manifest documents, remote (through the fetcher port) and local.
 */

import { readFile } from "node:fs/promises";
import { resolve } from "node:path";

import { computeDigest, verifyDigest } from "@cubelaunch/artifact-sync";
import type { ArtifactFetcher } from "@cubelaunch/core";
import { ManifestIntegrityError, NotFoundError } from "@cubelaunch/errors";

import { parseAssetIndex, parseVersionInfo, parseVersionManifest } from "./parser.js";
import type { AssetIndex, VersionEntry, VersionInfo, VersionManifest } from "./types.js";

export const DEFAULT_VERSION_MANIFEST_URL =
  "https://piston-meta.mojang.com/mc/game/version_manifest_v2.json";

export const DEFAULT_ASSET_BASE_URL = "https://resources.download.minecraft.net";

// Strips a leading BOM.
const decoder = new TextDecoder("utf-8");

/**
 * Fetches and parses the version manifest.
 */
export async function loadVersionManifest(
  fetcher: ArtifactFetcher,
  url: string = DEFAULT_VERSION_MANIFEST_URL,
): Promise<VersionManifest> {
  const bytes = await fetcher.fetch(url);
  return parseVersionManifest(decoder.decode(bytes));
}

/**
 * Fetches one version's info document and checks it against the digest the
 * manifest publishes for it.
 *
 * @throws ManifestIntegrityError when the document does not match `entry.sha1`
 */
export async function loadVersionInfo(
  fetcher: ArtifactFetcher,
  entry: VersionEntry,
): Promise<VersionInfo> {
  const bytes = await fetcher.fetch(entry.url);
  if (!verifyDigest(bytes, entry.sha1)) {
    throw new ManifestIntegrityError(entry.url, entry.sha1, computeDigest(bytes));
  }
  return parseVersionInfo(decoder.decode(bytes));
}

/**
 * Reads a synchronized asset index from disk.
 *
 * @throws NotFoundError when the file does not exist
 */
export async function readAssetIndex(filePath: string): Promise<AssetIndex> {
  const absolutePath = resolve(filePath);

  let bytes: Uint8Array;
  try {
    bytes = await readFile(absolutePath);
  } catch (error: unknown) {
    if (isNodeError(error) && error.code === "ENOENT") {
      throw new NotFoundError({
        code: "RESOURCE_NOT_FOUND",
        message: `Asset index not found: ${absolutePath}`,
        metadata: { path: absolutePath },
        cause: error,
      });
    }
    throw error;
  }

  return parseAssetIndex(decoder.decode(bytes));
}

function isNodeError(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && "code" in error;
}
