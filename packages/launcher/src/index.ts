/**
 * @cubelaunch/launcher
 *
 * Configuration, download planning, launch orchestration, reporters and CLI.
 */

export { BOOLEAN_FLAGS, type ParsedArgs, parseArgv } from "./args.js";
export {
  applyOverrides,
  type CliArgs,
  type CliDependencies,
  HELP_TEXT,
  type OutputFormat,
  parseArgs,
  run,
} from "./cli.js";
export * from "./config/index.js";
export { buildConstantsTable, type ConstantsInput } from "./constants.js";
export { type LaunchDependencies, prepareLaunch, resolvePlatform } from "./orchestrator.js";
export {
  buildClasspath,
  planAssetIndex,
  planAssetObjects,
  planClientJar,
  planLibraries,
  resolveLayout,
} from "./plan.js";
export {
  buildCommandLine,
  launchProcess,
  type SpawnedProcess,
  type SpawnOptions,
  type Spawner,
} from "./process.js";
export * from "./reporters/index.js";
export type {
  LaunchPlan,
  LaunchSummary,
  LauncherConfig,
  PlayerConfig,
  StageReport,
  SyncConfig,
  SyncStage,
  WorkLayout,
} from "./types.js";
