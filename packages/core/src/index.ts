/**
 * @cubelaunch/core
 *
 * Shared types for the cubelaunch packages: artifact descriptors and sync
 * outcomes, the transport port, platform/feature context, and the tagged
 * launch-argument grammar.
 */

export const PACKAGE_NAME = "@cubelaunch/core" as const;

export type {
  ArgumentSpec,
  ArgumentValue,
  Clause,
  ClauseAction,
  LaunchArguments,
  PlatformConstraint,
  ResolutionContext,
} from "./argument-types.js";
export type {
  ArtifactDescriptor,
  SyncItemResult,
  SyncOutcome,
  SyncOutcomeKind,
  SyncReport,
  SyncSummary,
} from "./artifact-types.js";
export type { ArtifactFetcher } from "./fetcher-types.js";
export type {
  ConstantsTable,
  FeatureSet,
  PlatformContext,
  PlatformName,
} from "./platform-types.js";
export { isFailedResult, isLiteralSpec } from "./type-guards.js";
