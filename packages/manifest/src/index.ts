/**
 * @cubelaunch/manifest
 *
 * Parsing and loading of the version manifest, version info and asset
 * index documents.
 */

export { deepFreeze } from "./freeze.js";
export {
  DEFAULT_ASSET_BASE_URL,
  DEFAULT_VERSION_MANIFEST_URL,
  loadVersionInfo,
  loadVersionManifest,
  readAssetIndex,
} from "./loader.js";
export { normalizeArgument, normalizeArgumentValue, normalizeRule } from "./normalize.js";
export { formatIssues, parseAssetIndex, parseVersionInfo, parseVersionManifest } from "./parser.js";
export {
  AssetIndexSchema,
  FileInfoSchema,
  LaunchArgumentSchema,
  RuleSchema,
  VersionInfoSchema,
  VersionManifestSchema,
} from "./schema.js";
export type {
  AssetIndex,
  AssetIndexReference,
  AssetObject,
  FileInfo,
  JavaVersion,
  Library,
  LibraryArtifact,
  LoggingConfiguration,
  LoggingFile,
  SidedLoggingConfiguration,
  VersionDownloads,
  VersionEntry,
  VersionInfo,
  VersionManifest,
  VersionType,
} from "./types.js";
export { findVersion, selectVersion, type VersionSelector } from "./versions.js";
