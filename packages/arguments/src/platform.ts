/**
 * Runtime platform detection and resolution-context construction.
 */

import type {
  ConstantsTable,
  FeatureSet,
  PlatformContext,
  PlatformName,
  ResolutionContext,
} from "@cubelaunch/core";

const PLATFORM_NAMES: Readonly<Record<string, PlatformName>> = {
  win32: "windows",
  darwin: "osx",
  linux: "linux",
};

const ARCH_NAMES: Readonly<Record<string, string>> = {
  x64: "x86_64",
  ia32: "x86",
  arm64: "arm64",
};

/**
 * Maps Node's platform/arch identifiers to the names used in version
 * documents. Unknown values pass through unchanged.
 */
export function detectPlatform(
  platform: string = process.platform,
  arch: string = process.arch,
): PlatformContext {
  return Object.freeze({
    name: PLATFORM_NAMES[platform] ?? platform,
    arch: ARCH_NAMES[arch] ?? arch,
  });
}

export interface ResolutionContextInput {
  readonly constants: ConstantsTable;
  readonly features?: Iterable<string>;
  readonly platform?: PlatformContext;
}

/**
 * Builds the frozen context one run resolves its arguments with.
 */
export function createResolutionContext(input: ResolutionContextInput): ResolutionContext {
  const features: FeatureSet = new Set(input.features ?? []);
  return Object.freeze({
    constants: Object.freeze({ ...input.constants }),
    features,
    platform: input.platform ?? detectPlatform(),
  });
}
