import type { ConstantsTable } from "@cubelaunch/core";
import type { PlayerConfig } from "./types.js";

export interface ConstantsInput {
  readonly versionName: string;
  readonly versionType: string;
  readonly assetsIndexName: string;
  readonly gameDirectory: string;
  readonly assetsRoot: string;
  readonly nativesDirectory: string;
  readonly classpath: string;
  readonly player: PlayerConfig;
  readonly launcher: {
    readonly name: string;
    readonly version: string;
  };
}

/**
 * Placeholder values for argument resolution. Keys follow the names used by
 * version documents.
 */
export function buildConstantsTable(input: ConstantsInput): ConstantsTable {
  return Object.freeze({
    auth_player_name: input.player.name,
    version_name: input.versionName,
    game_directory: input.gameDirectory,
    assets_root: input.assetsRoot,
    assets_index_name: input.assetsIndexName,
    auth_uuid: input.player.uuid,
    auth_access_token: input.player.accessToken,
    clientid: input.player.clientId,
    auth_xuid: input.player.xuid,
    user_type: input.player.userType,
    version_type: input.versionType,
    natives_directory: input.nativesDirectory,
    launcher_name: input.launcher.name,
    launcher_version: input.launcher.version,
    classpath: input.classpath,
  });
}
