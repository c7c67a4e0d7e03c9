/**
 * Normalized manifest documents.
 *
 * These are what the parsers return: validated, with the untagged argument
 * and rule unions of the wire format turned into tagged variants, and deeply
 * frozen.
 */

import type { Clause, LaunchArguments } from "@cubelaunch/core";

export type VersionType = "release" | "snapshot" | "old_beta" | "old_alpha";

/**
 * Location and digest of a downloadable file.
 */
export interface FileInfo {
  readonly sha1: string;
  readonly size: number;
  readonly url: string;
}

// ---------------------------------------------------------------------------
// Version manifest
// ---------------------------------------------------------------------------

export interface VersionEntry {
  readonly id: string;
  readonly type: VersionType;
  /** URL of the version info document */
  readonly url: string;
  readonly time: string;
  readonly releaseTime: string;
  /** Digest of the version info document */
  readonly sha1: string;
  readonly complianceLevel?: number | undefined;
}

export interface VersionManifest {
  readonly latest: {
    readonly release: string;
    readonly snapshot: string;
  };
  readonly versions: readonly VersionEntry[];
}

// ---------------------------------------------------------------------------
// Version info
// ---------------------------------------------------------------------------

export interface AssetIndexReference extends FileInfo {
  readonly id: string;
  readonly totalSize: number;
}

export interface VersionDownloads {
  readonly client: FileInfo;
  readonly client_mappings?: FileInfo | undefined;
  readonly server?: FileInfo | undefined;
  readonly server_mappings?: FileInfo | undefined;
}

export interface JavaVersion {
  readonly component: string;
  readonly majorVersion: number;
}

export interface LibraryArtifact extends FileInfo {
  /** Path relative to the libraries directory */
  readonly path: string;
}

export interface Library {
  readonly name: string;
  readonly downloads: {
    readonly artifact?: LibraryArtifact | undefined;
  };
  /** Empty when the document has no rules for this library */
  readonly rules: readonly Clause[];
}

export interface LoggingFile extends FileInfo {
  readonly id: string;
}

export interface SidedLoggingConfiguration {
  readonly argument: string;
  readonly file: LoggingFile;
  readonly type: string;
}

export interface LoggingConfiguration {
  readonly client?: SidedLoggingConfiguration | undefined;
  readonly server?: SidedLoggingConfiguration | undefined;
}

export interface VersionInfo {
  readonly id: string;
  readonly type: VersionType;
  readonly arguments: LaunchArguments;
  readonly assetIndex: AssetIndexReference;
  readonly assets: string;
  readonly complianceLevel?: number | undefined;
  readonly downloads: VersionDownloads;
  readonly javaVersion: JavaVersion;
  readonly libraries: readonly Library[];
  readonly logging?: LoggingConfiguration | undefined;
  readonly mainClass: string;
  readonly minimumLauncherVersion: number;
  readonly releaseTime: string;
  readonly time: string;
}

// ---------------------------------------------------------------------------
// Asset index
// ---------------------------------------------------------------------------

export interface AssetObject {
  readonly hash: string;
  readonly size: number;
}

export interface AssetIndex {
  /** Asset name → object. Several names may share one hash. */
  readonly objects: Readonly<Record<string, AssetObject>>;
}
