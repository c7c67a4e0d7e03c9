/**
 * `${key}` substitution for argument templates.
 */

import type { ConstantsTable } from "@cubelaunch/core";

const PLACEHOLDER_REGEX = /\$\{(\w+)\}/g;

export interface SubstitutionResult {
  readonly value: string;
  /** Keys with no constant, in order of appearance (may repeat) */
  readonly unresolved: readonly string[];
}

/**
 * Replaces `${key}` tokens with values from the constants table.
 *
 * - Keys are `\w+`; anything else inside `${...}` is left as is
 * - A key with no constant becomes the empty string and is reported
 * - Single pass; substituted values are never expanded again
 */
export function substitutePlaceholders(
  template: string,
  constants: ConstantsTable,
): SubstitutionResult {
  const unresolved: string[] = [];

  const value = template.replace(PLACEHOLDER_REGEX, (_match, key: string) => {
    if (Object.hasOwn(constants, key)) {
      return constants[key] ?? "";
    }
    unresolved.push(key);
    return "";
  });

  return { value, unresolved };
}
