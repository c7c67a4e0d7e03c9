import type { ConstantsTable, FeatureSet, PlatformContext } from "./platform-types.js";

// ---------------------------------------------------------------------------
// Rule clauses
// ---------------------------------------------------------------------------

export type ClauseAction = "allow" | "deny";

/**
 * Platform constraint of a clause. An absent field matches any value.
 */
export interface PlatformConstraint {
  readonly name?: string;
  readonly arch?: string;
}

/**
 * One condition attached to a guarded argument or a library.
 *
 * `features` maps a feature name to its required presence:
 * `true` means enabled, `false` means absent.
 */
export interface Clause {
  readonly action: ClauseAction;
  readonly features?: Readonly<Record<string, boolean>>;
  readonly os?: PlatformConstraint;
}

// ---------------------------------------------------------------------------
// Argument grammar
// ---------------------------------------------------------------------------

export type ArgumentValue =
  | { readonly kind: "single"; readonly value: string }
  | { readonly kind: "multiple"; readonly values: readonly string[] };

/**
 * A launch argument: either a literal string, or a value guarded by clauses
 * that must all apply before the value is emitted.
 */
export type ArgumentSpec =
  | { readonly kind: "literal"; readonly value: string }
  | {
      readonly kind: "guarded";
      readonly rules: readonly Clause[];
      readonly value: ArgumentValue;
    };

/**
 * JVM and game argument lists of one version.
 */
export interface LaunchArguments {
  readonly jvm: readonly ArgumentSpec[];
  readonly game: readonly ArgumentSpec[];
}

/**
 * Everything argument resolution reads. Built once at startup and passed
 * explicitly; nothing here is global.
 */
export interface ResolutionContext {
  readonly constants: ConstantsTable;
  readonly features: FeatureSet;
  readonly platform: PlatformContext;
}
