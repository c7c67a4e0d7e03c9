/**
 * Operating system as named by version documents.
 */
export type PlatformName = "windows" | "osx" | "linux";

/**
 * Runtime platform a rule clause is evaluated against.
 * Constructed once per run; names follow the version documents
 * (`windows` / `osx` / `linux`, `x86_64` / `x86` / `arm64`).
 */
export interface PlatformContext {
  readonly name: string;
  readonly arch: string;
}

/**
 * Enabled feature names (e.g. `is_demo_user`, `has_custom_resolution`).
 */
export type FeatureSet = ReadonlySet<string>;

/**
 * Placeholder key → value table for `${key}` substitution.
 */
export type ConstantsTable = Readonly<Record<string, string>>;
