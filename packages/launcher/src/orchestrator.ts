/**
 * Launch preparation: resolve the version, synchronize every artifact stage,
 * then resolve the argument vectors.
 *
 * Stages run one after another. Any failed artifact aborts the run with
 * ArtifactSyncFailedError before later stages start.
 */

import { mkdir } from "node:fs/promises";
import { createResolutionContext, detectPlatform, resolveArgumentsDetailed } from "@cubelaunch/arguments";
import {
  ArtifactStoreClient,
  assertSynced,
  type SyncProgressCallback,
  syncAll,
} from "@cubelaunch/artifact-sync";
import type { ArtifactDescriptor, ArtifactFetcher, PlatformContext } from "@cubelaunch/core";
import {
  loadVersionInfo,
  loadVersionManifest,
  readAssetIndex,
  selectVersion,
} from "@cubelaunch/manifest";

import { buildConstantsTable } from "./constants.js";
import {
  buildClasspath,
  planAssetIndex,
  planAssetObjects,
  planClientJar,
  planLibraries,
  resolveLayout,
} from "./plan.js";
import type { LaunchPlan, LauncherConfig, StageReport, SyncStage } from "./types.js";

export interface LaunchDependencies {
  readonly fetcher: ArtifactFetcher;
  /** Detected from the running process when omitted; config overrides apply on top */
  readonly platform?: PlatformContext;
  readonly onStageComplete?: (stage: StageReport) => void;
  readonly onItemComplete?: SyncProgressCallback;
  readonly onUnresolved?: (key: string) => void;
}

/**
 * Platform the run resolves rules against: the detected (or given) platform
 * with any config overrides applied.
 */
export function resolvePlatform(
  config: LauncherConfig,
  detected: PlatformContext = detectPlatform(),
): PlatformContext {
  return Object.freeze({
    name: config.platform.name ?? detected.name,
    arch: config.platform.arch ?? detected.arch,
  });
}

export async function prepareLaunch(
  config: LauncherConfig,
  deps: LaunchDependencies,
): Promise<LaunchPlan> {
  const { fetcher } = deps;
  const platform = resolvePlatform(config, deps.platform);
  const features = new Set(config.features);
  const layout = resolveLayout(config.workDir);
  const client = new ArtifactStoreClient(fetcher);
  const reports: StageReport[] = [];

  const syncStage = async (
    stage: SyncStage,
    descriptors: readonly ArtifactDescriptor[],
  ): Promise<void> => {
    const report = await syncAll(client, descriptors, {
      concurrency: config.sync.concurrency,
      stopOnFailure: config.sync.stopOnFailure,
      ...(deps.onItemComplete ? { onItemComplete: deps.onItemComplete } : {}),
    });
    const stageReport: StageReport = { stage, report };
    reports.push(stageReport);
    deps.onStageComplete?.(stageReport);
    assertSynced(report, stage);
  };

  // 1. Version documents
  const manifest = await loadVersionManifest(fetcher, config.manifestUrl);
  const version = selectVersion(manifest, config.version);
  const info = await loadVersionInfo(fetcher, version);

  // 2. Artifacts
  const libraries = planLibraries(info, layout.librariesDir, platform, features);
  await syncStage("libraries", libraries);

  const clientJar = planClientJar(info, layout.versionsDir);
  await syncStage("client", [clientJar]);

  const assetIndex = planAssetIndex(info, layout.assetsDir);
  await syncStage("asset-index", [assetIndex]);

  const index = await readAssetIndex(assetIndex.path);
  await syncStage("assets", planAssetObjects(index, layout.assetsDir, config.assetBaseUrl));

  // 3. Arguments
  await mkdir(layout.gameDir, { recursive: true });

  const classpath = buildClasspath(
    libraries.map((library) => library.path),
    clientJar.path,
    platform,
  );
  const constants = buildConstantsTable({
    versionName: info.id,
    versionType: config.versionType ?? config.launcher.name,
    assetsIndexName: info.assetIndex.id,
    gameDirectory: layout.gameDir,
    assetsRoot: layout.assetsDir,
    nativesDirectory: layout.nativesDir,
    classpath,
    player: config.player,
    launcher: config.launcher,
  });
  const context = createResolutionContext({ constants, features, platform });
  const resolveOptions = deps.onUnresolved ? { onUnresolved: deps.onUnresolved } : undefined;

  const jvm = resolveArgumentsDetailed(info.arguments.jvm, context, resolveOptions);
  const game = resolveArgumentsDetailed(info.arguments.game, context, resolveOptions);

  return Object.freeze({
    version,
    javaPath: config.javaPath,
    jvmArgs: jvm.args,
    mainClass: info.mainClass,
    gameArgs: game.args,
    layout,
    classpath,
    reports,
    unresolved: [...new Set([...jvm.unresolved, ...game.unresolved])],
  });
}
