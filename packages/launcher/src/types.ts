/**
 * Launcher types: configuration, launch plan, summaries.
 */

import type { SyncReport } from "@cubelaunch/core";
import type { VersionEntry } from "@cubelaunch/manifest";

// ---------------------------------------------------------------------------
// Configuration
// ---------------------------------------------------------------------------

export interface PlayerConfig {
  readonly name: string;
  readonly uuid: string;
  readonly accessToken: string;
  readonly userType: string;
  readonly xuid: string;
  readonly clientId: string;
}

export interface SyncConfig {
  /** Artifacts in flight per stage */
  readonly concurrency: number;
  /** Per-request HTTP timeout (ms) */
  readonly timeoutMs: number;
  /** Stop dispatching a stage after its first failure */
  readonly stopOnFailure: boolean;
}

/**
 * Validated, defaulted and frozen launcher configuration.
 */
export interface LauncherConfig {
  readonly workDir: string;
  /** `latest-release`, `latest-snapshot`, or a version id */
  readonly version: string;
  readonly manifestUrl: string;
  readonly assetBaseUrl: string;
  readonly javaPath: string;
  readonly player: PlayerConfig;
  readonly launcher: {
    readonly name: string;
    readonly version: string;
  };
  readonly versionType?: string | undefined;
  readonly features: readonly string[];
  /** Overrides for the detected platform */
  readonly platform: {
    readonly name?: string | undefined;
    readonly arch?: string | undefined;
  };
  readonly sync: SyncConfig;
}

// ---------------------------------------------------------------------------
// Launch plan
// ---------------------------------------------------------------------------

export type SyncStage = "libraries" | "client" | "asset-index" | "assets";

export interface StageReport {
  readonly stage: SyncStage;
  readonly report: SyncReport;
}

/**
 * Directory layout under the work directory. All paths are absolute.
 */
export interface WorkLayout {
  readonly workDir: string;
  readonly librariesDir: string;
  readonly versionsDir: string;
  readonly assetsDir: string;
  readonly nativesDir: string;
  readonly gameDir: string;
}

/**
 * Everything needed to start the game, produced once all artifacts are in place.
 */
export interface LaunchPlan {
  readonly version: VersionEntry;
  readonly javaPath: string;
  readonly jvmArgs: readonly string[];
  readonly mainClass: string;
  readonly gameArgs: readonly string[];
  readonly layout: WorkLayout;
  readonly classpath: string;
  readonly reports: readonly StageReport[];
  /** Placeholders that had no constant, in first-occurrence order */
  readonly unresolved: readonly string[];
}

// ---------------------------------------------------------------------------
// Summary (what reporters render)
// ---------------------------------------------------------------------------

export interface LaunchSummary {
  readonly version: string;
  readonly versionType: string;
  readonly stages: readonly StageReport[];
  readonly commandLine: readonly string[];
  readonly unresolved: readonly string[];
  readonly dryRun: boolean;
}
