/**
 * @cubelaunch/arguments
 *
 * Conditional launch arguments: clause evaluation against platform and
 * features, then `${key}` substitution from a constants table.
 */

export {
  createResolutionContext,
  detectPlatform,
  type ResolutionContextInput,
} from "./platform.js";
export { type SubstitutionResult, substitutePlaceholders } from "./placeholders.js";
export {
  type DetailedResolution,
  type ResolveOptions,
  resolveArguments,
  resolveArgumentsDetailed,
} from "./resolver.js";
export { clauseApplies, clauseMatches, rulesAllow } from "./rule-evaluator.js";
