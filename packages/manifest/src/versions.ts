import { VersionNotFoundError } from "@cubelaunch/errors";
import type { VersionEntry, VersionManifest } from "./types.js";

/**
 * `latest-release`, `latest-snapshot`, or a literal version id.
 */
export type VersionSelector = "latest-release" | "latest-snapshot" | (string & {});

export function findVersion(manifest: VersionManifest, id: string): VersionEntry | undefined {
  return manifest.versions.find((version) => version.id === id);
}

/**
 * Resolves a selector to a manifest entry.
 *
 * @throws VersionNotFoundError when no entry has the selected id
 */
export function selectVersion(manifest: VersionManifest, selector: VersionSelector): VersionEntry {
  const id =
    selector === "latest-release"
      ? manifest.latest.release
      : selector === "latest-snapshot"
        ? manifest.latest.snapshot
        : selector;

  const entry = findVersion(manifest, id);
  if (!entry) {
    throw new VersionNotFoundError(id);
  }
  return entry;
}
