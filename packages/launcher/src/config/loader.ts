/**
 * Config file parsing and loading.
 *
 * Pipeline:
 * 1. Interpolate `${VAR}` / `${VAR:default}` env vars
 * 2. Parse YAML
 * 3. Validate with Zod (applies defaults)
 * 4. Deep freeze
 */

import { readFile } from "node:fs/promises";
import { resolve } from "node:path";

import { ConfigFileNotFoundError, ConfigParseError, ConfigSchemaError } from "@cubelaunch/errors";
import { deepFreeze, formatIssues } from "@cubelaunch/manifest";
import { parse as parseYaml, YAMLParseError } from "yaml";

import type { LauncherConfig } from "../types.js";
import { type EnvMap, interpolateEnvVars } from "./interpolation.js";
import { LauncherConfigSchema } from "./schema.js";

export const DEFAULT_CONFIG_FILE = "cubelaunch.yaml";

export interface ParseConfigOptions {
  readonly env?: EnvMap;
  readonly skipInterpolation?: boolean;
  /** Used in error messages only */
  readonly filePath?: string;
}

export interface LoadConfigOptions extends ParseConfigOptions {
  /** Directory the default config file is looked up in. Default: process.cwd() */
  readonly cwd?: string;
}

/**
 * Parses YAML config text into a validated, frozen LauncherConfig.
 * An empty document yields the defaults.
 */
export function parseConfigYaml(yamlString: string, options?: ParseConfigOptions): LauncherConfig {
  const interpolated =
    options?.skipInterpolation === true ? yamlString : interpolateEnvVars(yamlString, options?.env);

  let parsed: unknown;
  try {
    parsed = parseYaml(interpolated);
  } catch (error: unknown) {
    if (error instanceof YAMLParseError) {
      const pos = error.linePos?.[0];
      throw new ConfigParseError(options?.filePath, error.message, pos?.line, pos?.col, error);
    }
    throw new ConfigParseError(options?.filePath, String(error));
  }

  const result = LauncherConfigSchema.safeParse(parsed ?? {});
  if (!result.success) {
    throw new ConfigSchemaError(formatIssues(result.error), result.error);
  }

  return deepFreeze(result.data);
}

/**
 * The config an empty file produces.
 */
export function defaultConfig(): LauncherConfig {
  return parseConfigYaml("", { skipInterpolation: true });
}

/**
 * Loads the launcher config.
 *
 * With an explicit path the file must exist. Without one, `cubelaunch.yaml`
 * in `cwd` is used when present and the defaults otherwise.
 *
 * @throws ConfigFileNotFoundError when an explicit path does not exist
 */
export async function loadConfig(
  filePath?: string,
  options?: LoadConfigOptions,
): Promise<LauncherConfig> {
  const explicit = filePath !== undefined;
  const absolutePath = explicit
    ? resolve(options?.cwd ?? process.cwd(), filePath)
    : resolve(options?.cwd ?? process.cwd(), DEFAULT_CONFIG_FILE);

  let content: string;
  try {
    content = await readFile(absolutePath, "utf-8");
  } catch (error: unknown) {
    if (isNodeError(error) && error.code === "ENOENT") {
      if (explicit) {
        throw new ConfigFileNotFoundError(absolutePath);
      }
      return defaultConfig();
    }
    throw error;
  }

  return parseConfigYaml(content, { ...options, filePath: absolutePath });
}

function isNodeError(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && "code" in error;
}
