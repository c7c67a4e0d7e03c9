/**
 * Rule evaluation for guarded arguments and libraries.
 *
 * A clause has a positive result when both its feature check and its
 * platform check pass. `deny` inverts that result. A list of clauses allows
 * only when every clause applies.
 */

import type { Clause, FeatureSet, PlatformContext } from "@cubelaunch/core";

function featuresMatch(
  required: Readonly<Record<string, boolean>> | undefined,
  features: FeatureSet,
): boolean {
  if (!required) return true;
  return Object.entries(required).every(([name, state]) => features.has(name) === state);
}

function platformMatches(clause: Clause, platform: PlatformContext): boolean {
  const os = clause.os;
  if (!os) return true;
  if (os.name !== undefined && os.name !== platform.name) return false;
  if (os.arch !== undefined && os.arch !== platform.arch) return false;
  return true;
}

/**
 * Positive result of a clause, before its action is applied.
 */
export function clauseMatches(
  clause: Clause,
  platform: PlatformContext,
  features: FeatureSet,
): boolean {
  return featuresMatch(clause.features, features) && platformMatches(clause, platform);
}

/**
 * Whether a clause lets its value through: an `allow` clause applies when it
 * matches, a `deny` clause applies when it does not.
 */
export function clauseApplies(
  clause: Clause,
  platform: PlatformContext,
  features: FeatureSet,
): boolean {
  return clauseMatches(clause, platform, features) !== (clause.action === "deny");
}

/**
 * AND across all clauses. An empty list allows.
 */
export function rulesAllow(
  clauses: readonly Clause[],
  platform: PlatformContext,
  features: FeatureSet,
): boolean {
  return clauses.every((clause) => clauseApplies(clause, platform, features));
}
