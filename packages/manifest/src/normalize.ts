/**
 * Turns the untagged unions of the wire format into tagged variants.
 *
 * An argument entry is a literal when it is a string and guarded when it is
 * an object; a guarded value is single when it is a string and multiple when
 * it is an array. Deciding this once here keeps the resolver free of shape
 * checks.
 */

import type { ArgumentSpec, ArgumentValue, Clause } from "@cubelaunch/core";
import type { RawLaunchArgument, RawLibrary, RawRule, RawVersionInfo } from "./schema.js";
import type { Library, VersionInfo } from "./types.js";

export function normalizeRule(rule: RawRule): Clause {
  return {
    action: rule.action,
    ...(rule.features !== undefined ? { features: rule.features } : {}),
    ...(rule.os !== undefined ? { os: rule.os } : {}),
  };
}

export function normalizeArgumentValue(value: string | readonly string[]): ArgumentValue {
  return typeof value === "string"
    ? { kind: "single", value }
    : { kind: "multiple", values: [...value] };
}

export function normalizeArgument(entry: RawLaunchArgument): ArgumentSpec {
  if (typeof entry === "string") {
    return { kind: "literal", value: entry };
  }
  return {
    kind: "guarded",
    rules: entry.rules.map(normalizeRule),
    value: normalizeArgumentValue(entry.value),
  };
}

function normalizeLibrary(library: RawLibrary): Library {
  return {
    name: library.name,
    downloads: library.downloads,
    rules: (library.rules ?? []).map(normalizeRule),
  };
}

export function normalizeVersionInfo(raw: RawVersionInfo): VersionInfo {
  return {
    ...raw,
    arguments: {
      game: raw.arguments.game.map(normalizeArgument),
      jvm: raw.arguments.jvm.map(normalizeArgument),
    },
    libraries: raw.libraries.map(normalizeLibrary),
  };
}
