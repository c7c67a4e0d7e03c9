/**
 * Zod schema for the launcher config file. Every field has a default, so an
 * empty document is a complete config.
 */

import { DEFAULT_ASSET_BASE_URL, DEFAULT_VERSION_MANIFEST_URL } from "@cubelaunch/manifest";
import { z } from "zod";

export const DEFAULT_LAUNCHER_NAME = "cubelaunch";
export const DEFAULT_LAUNCHER_VERSION = "0.1.0";

export const PlayerConfigSchema = z
  .object({
    name: z.string().min(1).max(16).default("Player"),
    uuid: z.string().uuid().default("00000000-0000-0000-0000-000000000000"),
    accessToken: z.string().default(""),
    userType: z.string().default("msa"),
    xuid: z.string().default(""),
    clientId: z.string().default(""),
  })
  .strict();

export const SyncConfigSchema = z
  .object({
    concurrency: z.number().int().min(1).max(64).default(4),
    timeoutMs: z.number().int().positive().default(30_000),
    stopOnFailure: z.boolean().default(false),
  })
  .strict();

export const LauncherConfigSchema = z
  .object({
    workDir: z.string().min(1).default("./run"),
    version: z.string().min(1).default("latest-release"),
    manifestUrl: z.string().url().default(DEFAULT_VERSION_MANIFEST_URL),
    assetBaseUrl: z.string().url().default(DEFAULT_ASSET_BASE_URL),
    javaPath: z.string().min(1).default("java"),
    player: PlayerConfigSchema.default({}),
    launcher: z
      .object({
        name: z.string().min(1).default(DEFAULT_LAUNCHER_NAME),
        version: z.string().min(1).default(DEFAULT_LAUNCHER_VERSION),
      })
      .strict()
      .default({}),
    /** Reported to the game as `version_type`. Defaults to the launcher name. */
    versionType: z.string().min(1).optional(),
    features: z.array(z.string().min(1)).default([]),
    platform: z
      .object({
        name: z.string().min(1).optional(),
        arch: z.string().min(1).optional(),
      })
      .strict()
      .default({}),
    sync: SyncConfigSchema.default({}),
  })
  .strict();
