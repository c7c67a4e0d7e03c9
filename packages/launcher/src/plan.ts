/**
 * Download planning: manifest documents → artifact descriptors.
 */

import { join, resolve } from "node:path";
import { rulesAllow } from "@cubelaunch/arguments";
import type { ArtifactDescriptor, FeatureSet, PlatformContext } from "@cubelaunch/core";
import type { AssetIndex, VersionInfo } from "@cubelaunch/manifest";
import type { WorkLayout } from "./types.js";

/**
 * Absolute directory layout under a work directory.
 *
 * Natives share the libraries directory; the game runs in `.minecraft`.
 */
export function resolveLayout(workDir: string): WorkLayout {
  const root = resolve(workDir);
  const librariesDir = join(root, "libraries");
  return Object.freeze({
    workDir: root,
    librariesDir,
    versionsDir: join(root, "versions"),
    assetsDir: join(root, "assets"),
    nativesDir: librariesDir,
    gameDir: join(root, ".minecraft"),
  });
}

function descriptor(url: string, sha1: string, size: number, path: string): ArtifactDescriptor {
  return Object.freeze({ url, sha1, size, path });
}

/**
 * Libraries whose rules allow this platform and that carry an artifact.
 */
export function planLibraries(
  info: VersionInfo,
  librariesDir: string,
  platform: PlatformContext,
  features: FeatureSet,
): ArtifactDescriptor[] {
  const descriptors: ArtifactDescriptor[] = [];
  for (const library of info.libraries) {
    const artifact = library.downloads.artifact;
    if (!artifact || !rulesAllow(library.rules, platform, features)) continue;
    descriptors.push(
      descriptor(artifact.url, artifact.sha1, artifact.size, join(librariesDir, artifact.path)),
    );
  }
  return descriptors;
}

export function planClientJar(info: VersionInfo, versionsDir: string): ArtifactDescriptor {
  const client = info.downloads.client;
  return descriptor(
    client.url,
    client.sha1,
    client.size,
    join(versionsDir, info.id, `${info.id}.jar`),
  );
}

export function planAssetIndex(info: VersionInfo, assetsDir: string): ArtifactDescriptor {
  const ref = info.assetIndex;
  return descriptor(ref.url, ref.sha1, ref.size, join(assetsDir, "indexes", `${ref.id}.json`));
}

/**
 * One descriptor per distinct object hash, stored content-addressed under
 * `objects/<first two hex chars>/<hash>`.
 */
export function planAssetObjects(
  index: AssetIndex,
  assetsDir: string,
  baseUrl: string,
): ArtifactDescriptor[] {
  const base = baseUrl.replace(/\/+$/, "");
  const seen = new Set<string>();
  const descriptors: ArtifactDescriptor[] = [];

  for (const object of Object.values(index.objects)) {
    const hash = object.hash.toLowerCase();
    if (seen.has(hash)) continue;
    seen.add(hash);

    const prefix = hash.slice(0, 2);
    descriptors.push(
      descriptor(`${base}/${prefix}/${hash}`, hash, object.size, join(assetsDir, "objects", prefix, hash)),
    );
  }
  return descriptors;
}

/**
 * Joins library paths and the client jar with the platform's path separator.
 */
export function buildClasspath(
  libraryPaths: readonly string[],
  clientJarPath: string,
  platform: PlatformContext,
): string {
  const separator = platform.name === "windows" ? ";" : ":";
  return [...libraryPaths, clientJarPath].join(separator);
}
