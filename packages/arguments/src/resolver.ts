/**
 * Template resolver: turns argument specs into a flat argument vector.
 */

import {
  type ArgumentSpec,
  type ArgumentValue,
  isLiteralSpec,
  type ResolutionContext,
} from "@cubelaunch/core";
import { substitutePlaceholders } from "./placeholders.js";
import { rulesAllow } from "./rule-evaluator.js";

export interface ResolveOptions {
  /**
   * Called once per occurrence of a placeholder that has no constant.
   * Defaults to a console warning.
   */
  readonly onUnresolved?: (key: string) => void;
}

export interface DetailedResolution {
  readonly args: readonly string[];
  /** Unresolved keys, deduplicated, in order of first occurrence */
  readonly unresolved: readonly string[];
}

function warnUnresolved(key: string): void {
  console.warn(`[ArgumentResolver] Could not resolve placeholder "${key}"`);
}

function expand(value: ArgumentValue): readonly string[] {
  return value.kind === "single" ? [value.value] : value.values;
}

function collect(specs: readonly ArgumentSpec[], context: ResolutionContext): string[] {
  const raw: string[] = [];
  for (const spec of specs) {
    if (isLiteralSpec(spec)) {
      raw.push(spec.value);
    } else if (rulesAllow(spec.rules, context.platform, context.features)) {
      raw.push(...expand(spec.value));
    }
  }
  return raw;
}

/**
 * Resolves specs against the context and reports every unresolved key.
 */
export function resolveArgumentsDetailed(
  specs: readonly ArgumentSpec[],
  context: ResolutionContext,
  options?: ResolveOptions,
): DetailedResolution {
  const onUnresolved = options?.onUnresolved ?? warnUnresolved;
  const unresolved = new Set<string>();

  const args = collect(specs, context).map((template) => {
    const result = substitutePlaceholders(template, context.constants);
    for (const key of result.unresolved) {
      unresolved.add(key);
      onUnresolved(key);
    }
    return result.value;
  });

  return { args, unresolved: [...unresolved] };
}

/**
 * Resolves argument specs to strings, in spec order.
 *
 * Literals are always emitted. Guarded values are emitted only when their
 * rules allow, and multiple values expand in place. Never throws: a missing
 * constant substitutes as the empty string.
 *
 * @example
 * ```typescript
 * resolveArguments(
 *   [{ kind: "literal", value: "--version" }, { kind: "literal", value: "${version_name}" }],
 *   { constants: { version_name: "1.21" }, features: new Set(), platform },
 * ); // ["--version", "1.21"]
 * ```
 */
export function resolveArguments(
  specs: readonly ArgumentSpec[],
  context: ResolutionContext,
  options?: ResolveOptions,
): string[] {
  return [...resolveArgumentsDetailed(specs, context, options).args];
}
