/**
 * Environment variable interpolation for config text.
 *
 * - `${VAR}` resolves from env; a missing variable is an error
 * - `${VAR:fallback}` falls back to `fallback` when VAR is unset
 * - `$${VAR}` is an escape and yields the literal text `${VAR}`
 * - An empty env value counts as set
 * - Single pass; substituted values are not expanded again
 */

import { ConfigInterpolationError } from "@cubelaunch/errors";

const ENV_TOKEN_REGEX = /\$(\$)?\{([A-Za-z_][A-Za-z0-9_]*)(?::([^}]*))?\}/g;

export type EnvMap = Readonly<Record<string, string | undefined>>;

export function interpolateEnvVars(template: string, env: EnvMap = process.env): string {
  const missing = new Set<string>();

  const result = template.replace(
    ENV_TOKEN_REGEX,
    (match: string, escape: string | undefined, name: string, fallback: string | undefined) => {
      if (escape !== undefined) {
        return match.slice(1);
      }

      const value = env[name];
      if (value !== undefined) {
        return value;
      }
      if (fallback !== undefined) {
        return fallback;
      }

      missing.add(name);
      return "";
    },
  );

  if (missing.size > 0) {
    throw new ConfigInterpolationError([...missing]);
  }

  return result;
}
