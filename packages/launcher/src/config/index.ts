export { type EnvMap, interpolateEnvVars } from "./interpolation.js";
export {
  DEFAULT_CONFIG_FILE,
  defaultConfig,
  type LoadConfigOptions,
  loadConfig,
  type ParseConfigOptions,
  parseConfigYaml,
} from "./loader.js";
export {
  DEFAULT_LAUNCHER_NAME,
  DEFAULT_LAUNCHER_VERSION,
  LauncherConfigSchema,
  PlayerConfigSchema,
  SyncConfigSchema,
} from "./schema.js";
